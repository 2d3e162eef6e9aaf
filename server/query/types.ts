export type AggregateFunction = 'COUNT' | 'SUM' | 'AVG' | 'MAX' | 'MIN';

export const AGGREGATE_FUNCTIONS: readonly AggregateFunction[] = ['COUNT', 'SUM', 'AVG', 'MAX', 'MIN'];

export const IDENTITY_FIELD = 'Id';

export interface AggregateSpec {
  function: AggregateFunction;
  /** Defaults to the identity field. */
  field?: string;
  /** Defaults to `{FUNCTION}_{field}`. Ignored for a bare COUNT(Id). */
  alias?: string;
}

export interface QuerySpec {
  object: string;
  aggregates: AggregateSpec[];
  groupBy?: string;
  /** Raw, trusted predicate text. */
  where?: string;
  orderBy?: string;
  limit: number;
}

export type TrendPeriod = 'day' | 'week' | 'month';

export const TREND_PERIODS: readonly TrendPeriod[] = ['day', 'week', 'month'];

export interface TrendSpec extends Omit<QuerySpec, 'groupBy' | 'orderBy' | 'limit'> {
  dateField: string;
  period: TrendPeriod;
  /** Number of periods to look back from now. */
  lookback: number;
  /** `datetime` fields need a timestamp literal for the lower bound. */
  dateFieldKind?: 'date' | 'datetime';
  /** Accepted for symmetry with QuerySpec; trend queries are always capped at 50. */
  limit?: number;
}

export interface SelectSpec {
  object: string;
  fields: string[];
  where?: string;
  orderBy?: string;
  limit: number;
}
