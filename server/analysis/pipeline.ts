/**
 * Pipeline analysis
 *
 * Four aggregate queries over Opportunity, run one after another and combined
 * in memory: open pipeline by stage, closed won/lost, stage counts, and an
 * optional weighted forecast. The forecast is best-effort; the rest propagate.
 */

import { createLogger } from '../utils/logger.js';
import { RemoteError } from '../connectors/salesforce/errors.js';
import type { SalesforceRecord, SalesforceTransport } from '../connectors/salesforce/types.js';
import { aggregateResultKeys, buildAggregateQuery } from '../query/soql-builder.js';
import type { AggregateSpec, QuerySpec } from '../query/types.js';
import { conversionRate, groupValue, numberValue, ownerFilter, round2, sumBy } from './metrics.js';

const logger = createLogger('Analysis');

export interface PipelineOptions {
  /** SOQL date literal such as THIS_QUARTER or LAST_N_DAYS:90. */
  timeframe?: string;
  ownerId?: string;
  includeForecasting?: boolean;
}

export interface StageBreakdownRow {
  stage: string | null;
  count: number;
  totalValue: number;
  avgDealSize: number;
  avgProbability: number;
}

export interface OutcomeTotals {
  count: number;
  value: number;
}

export type ForecastResult =
  | { available: true; pipelineValue: number; weightedValue: number }
  | { available: false; error: string };

export interface PipelineAnalysis {
  timeframe: string;
  ownerId: string | null;
  summary: {
    totalPipelineValue: number;
    totalOpportunities: number;
    avgDealSize: number;
    stageBreakdown: StageBreakdownRow[];
  };
  winLoss: {
    won: OutcomeTotals;
    lost: OutcomeTotals;
    winRate: number;
  };
  stageCounts: Array<{ stage: string | null; count: number }>;
  forecasting: ForecastResult | null;
  queries: string[];
}

const OPPORTUNITY = 'Opportunity';
const GROUP_CAP = 200;

const STAGE_AGGREGATES: AggregateSpec[] = [
  { function: 'COUNT', field: 'Id' },
  { function: 'SUM', field: 'Amount', alias: 'TotalValue' },
  { function: 'AVG', field: 'Amount', alias: 'AvgDealSize' },
  { function: 'AVG', field: 'Probability', alias: 'AvgProbability' },
];

const OUTCOME_AGGREGATES: AggregateSpec[] = [
  { function: 'COUNT', field: 'Id' },
  { function: 'SUM', field: 'Amount', alias: 'Value' },
];

const FORECAST_AGGREGATES: AggregateSpec[] = [
  { function: 'SUM', field: 'Amount', alias: 'TotalValue' },
  { function: 'AVG', field: 'Probability', alias: 'AvgProbability' },
];

function stageName(row: SalesforceRecord): string | null {
  const value = groupValue(row, 'StageName');
  return typeof value === 'string' ? value : null;
}

async function run(transport: SalesforceTransport, spec: QuerySpec, queries: string[]): Promise<SalesforceRecord[]> {
  const soql = buildAggregateQuery(spec);
  queries.push(soql);
  const result = await transport.query(soql);
  return result.records;
}

export async function getPipelineAnalysis(
  transport: SalesforceTransport,
  options: PipelineOptions = {}
): Promise<PipelineAnalysis> {
  const { timeframe = 'THIS_QUARTER', ownerId, includeForecasting = false } = options;
  const owner = ownerFilter(ownerId);
  const queries: string[] = [];

  const [stageCountKey] = aggregateResultKeys(STAGE_AGGREGATES);
  const stageRows = await run(transport, {
    object: OPPORTUNITY,
    aggregates: STAGE_AGGREGATES,
    groupBy: 'StageName',
    where: `CloseDate >= ${timeframe} AND IsClosed = false${owner}`,
    orderBy: 'SUM(Amount) DESC',
    limit: GROUP_CAP,
  }, queries);

  const stageBreakdown: StageBreakdownRow[] = stageRows.map(row => ({
    stage: stageName(row),
    count: numberValue(row[stageCountKey]),
    totalValue: numberValue(row.TotalValue),
    avgDealSize: round2(numberValue(row.AvgDealSize)),
    avgProbability: round2(numberValue(row.AvgProbability)),
  }));

  const [outcomeCountKey] = aggregateResultKeys(OUTCOME_AGGREGATES);
  const outcomeRows = await run(transport, {
    object: OPPORTUNITY,
    aggregates: OUTCOME_AGGREGATES,
    groupBy: 'IsWon',
    where: `CloseDate = ${timeframe} AND IsClosed = true${owner}`,
    limit: 2,
  }, queries);

  const won: OutcomeTotals = { count: 0, value: 0 };
  const lost: OutcomeTotals = { count: 0, value: 0 };
  for (const row of outcomeRows) {
    const target = groupValue(row, 'IsWon') === true ? won : lost;
    target.count += numberValue(row[outcomeCountKey]);
    target.value += numberValue(row.Value);
  }

  const [countKey] = aggregateResultKeys([{ function: 'COUNT', field: 'Id' }]);
  const countRows = await run(transport, {
    object: OPPORTUNITY,
    aggregates: [{ function: 'COUNT', field: 'Id' }],
    groupBy: 'StageName',
    where: `CloseDate >= ${timeframe}${owner}`,
    limit: GROUP_CAP,
  }, queries);

  let forecasting: ForecastResult | null = null;
  if (includeForecasting) {
    forecasting = await getForecast(transport, timeframe, owner, queries);
  }

  const totalPipelineValue = sumBy(stageRows, 'TotalValue');
  const totalOpportunities = sumBy(stageRows, stageCountKey);

  return {
    timeframe,
    ownerId: ownerId ?? null,
    summary: {
      totalPipelineValue,
      totalOpportunities,
      avgDealSize: totalOpportunities > 0 ? round2(totalPipelineValue / totalOpportunities) : 0,
      stageBreakdown,
    },
    winLoss: {
      won,
      lost,
      winRate: conversionRate(won.count, won.count + lost.count),
    },
    stageCounts: countRows.map(row => ({ stage: stageName(row), count: numberValue(row[countKey]) })),
    forecasting,
    queries,
  };
}

/** Open pipeline closing in the period, weighted by each stage's average probability. */
async function getForecast(
  transport: SalesforceTransport,
  timeframe: string,
  owner: string,
  queries: string[]
): Promise<ForecastResult> {
  try {
    const rows = await run(transport, {
      object: OPPORTUNITY,
      aggregates: FORECAST_AGGREGATES,
      groupBy: 'StageName',
      where: `CloseDate = ${timeframe} AND IsClosed = false${owner}`,
      limit: GROUP_CAP,
    }, queries);

    let pipelineValue = 0;
    let weightedValue = 0;
    for (const row of rows) {
      const value = numberValue(row.TotalValue);
      pipelineValue += value;
      weightedValue += value * numberValue(row.AvgProbability) / 100;
    }

    return { available: true, pipelineValue: round2(pipelineValue), weightedValue: round2(weightedValue) };
  } catch (error) {
    if (!(error instanceof RemoteError)) throw error;
    logger.warn('Forecast query failed', { timeframe, error: error.message });
    return { available: false, error: error.message };
  }
}
