/**
 * SOQL / SOSL construction
 *
 * Every function here is pure: no network access, no throwing. Malformed
 * specs are the caller's problem.
 */

import { format, subDays, subWeeks } from 'date-fns';
import {
  IDENTITY_FIELD,
  type AggregateSpec,
  type QuerySpec,
  type SelectSpec,
  type TrendPeriod,
  type TrendSpec,
} from './types.js';

export const TREND_ROW_CAP = 50;
const DAYS_PER_MONTH = 30;

// ============================================================================
// Literals
// ============================================================================

function escapeQuoted(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

/** Quote a caller-supplied value as a SOQL string literal. */
export function soqlString(value: string): string {
  return `'${escapeQuoted(value)}'`;
}

/**
 * Quoted `%term%` LIKE pattern. Backslashes and quotes are escaped before the
 * wildcard escapes are added, so `\%` and `\_` reach the platform as written.
 */
export function soqlLikeLiteral(term: string): string {
  return `'%${escapeQuoted(term).replace(/[%_]/g, ch => `\\${ch}`)}%'`;
}

const SOSL_RESERVED = /[?&|!{}[\]()^~*:\\"'+-]/g;

export function escapeSoslTerm(term: string): string {
  return term.replace(SOSL_RESERVED, ch => `\\${ch}`);
}

// ============================================================================
// Aggregates
// ============================================================================

export function defaultAlias(fn: string, field: string): string {
  return `${fn}_${field}`.replace(/[^A-Za-z0-9_]/g, '_');
}

function isBareCount(spec: AggregateSpec): boolean {
  return spec.function === 'COUNT' && (spec.field ?? IDENTITY_FIELD) === IDENTITY_FIELD;
}

export function renderAggregate(spec: AggregateSpec): string {
  const field = spec.field ?? IDENTITY_FIELD;
  if (isBareCount(spec)) {
    return `COUNT(${IDENTITY_FIELD})`;
  }
  return `${spec.function}(${field}) ${spec.alias || defaultAlias(spec.function, field)}`;
}

/**
 * Keys under which the platform returns each aggregate: its alias, or
 * `exprN` for unaliased expressions, numbered in select order.
 */
export function aggregateResultKeys(aggregates: AggregateSpec[]): string[] {
  let unaliased = 0;
  return aggregates.map(spec => {
    if (isBareCount(spec)) return `expr${unaliased++}`;
    return spec.alias || defaultAlias(spec.function, spec.field ?? IDENTITY_FIELD);
  });
}

export function buildAggregateQuery(spec: QuerySpec): string {
  const selectParts = spec.aggregates.map(renderAggregate);
  if (spec.groupBy) {
    selectParts.unshift(spec.groupBy);
  }

  let soql = `SELECT ${selectParts.join(', ')} FROM ${spec.object}`;

  if (spec.where && spec.where.trim()) {
    soql += ` WHERE ${spec.where}`;
  }
  if (spec.groupBy) {
    soql += ` GROUP BY ${spec.groupBy}`;
  }
  if (spec.orderBy) {
    soql += ` ORDER BY ${spec.orderBy}`;
  }

  return `${soql} LIMIT ${spec.limit}`;
}

// ============================================================================
// Trends
// ============================================================================

export function bucketExpressions(period: TrendPeriod, dateField: string): string[] {
  switch (period) {
    case 'month':
      return [`CALENDAR_YEAR(${dateField})`, `CALENDAR_MONTH(${dateField})`];
    case 'week':
      return [`CALENDAR_YEAR(${dateField})`, `WEEK_IN_YEAR(${dateField})`];
    case 'day':
      return [`CALENDAR_YEAR(${dateField})`, `DAY_IN_MONTH(${dateField})`];
  }
}

export function trendStartDate(period: TrendPeriod, lookback: number, now: Date = new Date()): Date {
  switch (period) {
    case 'month':
      return subDays(now, lookback * DAYS_PER_MONTH);
    case 'week':
      return subWeeks(now, lookback);
    case 'day':
      return subDays(now, lookback);
  }
}

/**
 * Date fields compare against the server's calendar date; datetime fields
 * against midnight UTC of the UTC calendar date.
 */
export function formatDateLiteral(date: Date, kind: 'date' | 'datetime' = 'date'): string {
  if (kind === 'datetime') {
    return `${date.toISOString().slice(0, 10)}T00:00:00Z`;
  }
  return format(date, 'yyyy-MM-dd');
}

export const DEFAULT_TREND_METRICS: AggregateSpec[] = [
  { function: 'COUNT', field: IDENTITY_FIELD, alias: 'Total' },
];

function renderTrendMetric(spec: AggregateSpec): string {
  const field = spec.field ?? IDENTITY_FIELD;
  return `${spec.function}(${field}) ${spec.alias || defaultAlias(spec.function, field)}`;
}

/**
 * Time-series aggregate. Metrics are always aliased (the buckets make bare
 * expressions ambiguous) and the row cap is fixed regardless of spec.limit.
 */
export function buildTrendQuery(spec: TrendSpec, now: Date = new Date()): string {
  const buckets = bucketExpressions(spec.period, spec.dateField);
  const metrics = spec.aggregates.length > 0 ? spec.aggregates : DEFAULT_TREND_METRICS;
  const start = formatDateLiteral(trendStartDate(spec.period, spec.lookback, now), spec.dateFieldKind);

  let where = `${spec.dateField} >= ${start}`;
  if (spec.where && spec.where.trim()) {
    where += ` AND (${spec.where})`;
  }

  return (
    `SELECT ${buckets.join(', ')}, ${metrics.map(renderTrendMetric).join(', ')} ` +
    `FROM ${spec.object} WHERE ${where} ` +
    `GROUP BY ${buckets.join(', ')} ` +
    `ORDER BY ${buckets.map(b => `${b} DESC`).join(', ')} ` +
    `LIMIT ${TREND_ROW_CAP}`
  );
}

// ============================================================================
// Plain selects and search
// ============================================================================

export function buildSelectQuery(spec: SelectSpec): string {
  let soql = `SELECT ${spec.fields.join(', ')} FROM ${spec.object}`;
  if (spec.where && spec.where.trim()) {
    soql += ` WHERE ${spec.where}`;
  }
  if (spec.orderBy) {
    soql += ` ORDER BY ${spec.orderBy}`;
  }
  return `${soql} LIMIT ${spec.limit}`;
}

export function buildSoslSearch(objectName: string, term: string, fields: string[], limit: number): string {
  const projection = [IDENTITY_FIELD, ...fields.filter(f => f !== IDENTITY_FIELD)].join(', ');
  return `FIND {${escapeSoslTerm(term)}*} IN ALL FIELDS RETURNING ${objectName}(${projection}) LIMIT ${limit}`;
}

export function buildLikeFallback(objectName: string, term: string, fields: string[], limit: number): string {
  const pattern = soqlLikeLiteral(term);
  return buildSelectQuery({
    object: objectName,
    fields: [IDENTITY_FIELD, ...fields.filter(f => f !== IDENTITY_FIELD)],
    where: fields.map(field => `${field} LIKE ${pattern}`).join(' OR '),
    limit,
  });
}
