/**
 * At-risk pipeline
 *
 * Open opportunities below a probability threshold, optionally restricted to
 * late stages. Summary, detail and overdue count are separate queries over the
 * same filter.
 */

import type { SalesforceRecord, SalesforceTransport } from '../connectors/salesforce/types.js';
import { aggregateResultKeys, buildAggregateQuery, buildSelectQuery, soqlString } from '../query/soql-builder.js';
import type { AggregateSpec } from '../query/types.js';
import { numberValue, ownerFilter, round2 } from './metrics.js';

export interface AtRiskOptions {
  stages?: string[];
  maxProbability?: number;
  limit?: number;
  ownerId?: string;
}

export interface AtRiskPipeline {
  filter: string;
  summary: { count: number; valueAtRisk: number; avgProbability: number; overdueCount: number };
  deals: SalesforceRecord[];
  queries: string[];
}

const SUMMARY_AGGREGATES: AggregateSpec[] = [
  { function: 'COUNT', field: 'Id' },
  { function: 'SUM', field: 'Amount', alias: 'ValueAtRisk' },
  { function: 'AVG', field: 'Probability', alias: 'AvgProbability' },
];

const OVERDUE_AGGREGATES: AggregateSpec[] = [{ function: 'COUNT', field: 'Id' }];

export function atRiskFilter(options: AtRiskOptions): string {
  const { stages = [], maxProbability = 50, ownerId } = options;
  let filter = `IsClosed = false AND Probability < ${maxProbability}`;
  if (stages.length > 0) {
    filter += ` AND StageName IN (${stages.map(soqlString).join(', ')})`;
  }
  return filter + ownerFilter(ownerId);
}

export async function getAtRiskPipeline(
  transport: SalesforceTransport,
  options: AtRiskOptions = {}
): Promise<AtRiskPipeline> {
  const filter = atRiskFilter(options);
  const queries: string[] = [];

  const summarySoql = buildAggregateQuery({
    object: 'Opportunity',
    aggregates: SUMMARY_AGGREGATES,
    where: filter,
    limit: 1,
  });
  queries.push(summarySoql);
  const [summaryRow] = (await transport.query(summarySoql)).records;

  const dealsSoql = buildSelectQuery({
    object: 'Opportunity',
    fields: ['Id', 'Name', 'Amount', 'Probability', 'StageName', 'CloseDate', 'Owner.Name', 'Account.Name'],
    where: filter,
    orderBy: 'Amount DESC NULLS LAST',
    limit: options.limit ?? 25,
  });
  queries.push(dealsSoql);
  const deals = (await transport.query(dealsSoql)).records;

  const overdueSoql = buildAggregateQuery({
    object: 'Opportunity',
    aggregates: OVERDUE_AGGREGATES,
    where: `${filter} AND CloseDate < TODAY`,
    limit: 1,
  });
  queries.push(overdueSoql);
  const [overdueRow] = (await transport.query(overdueSoql)).records;

  const [countKey] = aggregateResultKeys(SUMMARY_AGGREGATES);
  const [overdueKey] = aggregateResultKeys(OVERDUE_AGGREGATES);

  return {
    filter,
    summary: {
      count: summaryRow ? numberValue(summaryRow[countKey]) : 0,
      valueAtRisk: summaryRow ? numberValue(summaryRow.ValueAtRisk) : 0,
      avgProbability: summaryRow ? round2(numberValue(summaryRow.AvgProbability)) : 0,
      overdueCount: overdueRow ? numberValue(overdueRow[overdueKey]) : 0,
    },
    deals,
    queries,
  };
}
