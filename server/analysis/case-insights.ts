import type { SalesforceRecord, SalesforceTransport } from '../connectors/salesforce/types.js';
import { aggregateResultKeys, buildAggregateQuery, soqlString } from '../query/soql-builder.js';
import type { AggregateSpec, QuerySpec } from '../query/types.js';
import { conversionRate, groupValue, numberValue } from './metrics.js';

export interface CaseInsightsOptions {
  timeframe?: string;
  priority?: string;
  status?: string;
}

export interface CaseInsights {
  timeframe: string;
  filters: { priority: string | null; status: string | null };
  volumeMetrics: Array<{ status: string | null; priority: string | null; count: number }>;
  escalationMetrics: { totalCases: number; escalatedCases: number; escalationRate: number };
  channelBreakdown: Array<{ accountType: string | null; count: number }>;
  ownerPerformance: Array<{ owner: string | null; casesHandled: number }>;
  queries: string[];
}

const CASE = 'Case';
const COUNT_ID: AggregateSpec[] = [{ function: 'COUNT', field: 'Id' }];
const [COUNT_KEY] = aggregateResultKeys(COUNT_ID);

function text(row: SalesforceRecord, field: string): string | null {
  const value = groupValue(row, field);
  return typeof value === 'string' ? value : null;
}

/** Support case volume, escalations, account-type mix and owner load for a period. */
export async function getCaseInsights(
  transport: SalesforceTransport,
  options: CaseInsightsOptions = {}
): Promise<CaseInsights> {
  const { timeframe = 'THIS_MONTH', priority, status } = options;
  let filters = `CreatedDate = ${timeframe}`;
  if (priority) filters += ` AND Priority = ${soqlString(priority)}`;
  if (status) filters += ` AND Status = ${soqlString(status)}`;

  const queries: string[] = [];
  const run = async (spec: QuerySpec): Promise<SalesforceRecord[]> => {
    const soql = buildAggregateQuery(spec);
    queries.push(soql);
    return (await transport.query(soql)).records;
  };

  const volumeRows = await run({
    object: CASE,
    aggregates: COUNT_ID,
    groupBy: 'Status, Priority',
    where: filters,
    orderBy: 'Priority, Status',
    limit: 200,
  });

  const totalRows = await run({ object: CASE, aggregates: COUNT_ID, where: filters, limit: 1 });
  const escalatedRows = await run({
    object: CASE,
    aggregates: COUNT_ID,
    where: `${filters} AND IsEscalated = true`,
    limit: 1,
  });

  const channelRows = await run({
    object: CASE,
    aggregates: COUNT_ID,
    groupBy: 'Account.Type',
    where: `${filters} AND Account.Type != null`,
    orderBy: 'COUNT(Id) DESC',
    limit: 50,
  });

  const ownerRows = await run({
    object: CASE,
    aggregates: COUNT_ID,
    groupBy: 'Owner.Name',
    where: filters,
    orderBy: 'COUNT(Id) DESC',
    limit: 10,
  });

  const totalCases = totalRows.length > 0 ? numberValue(totalRows[0][COUNT_KEY]) : 0;
  const escalatedCases = escalatedRows.length > 0 ? numberValue(escalatedRows[0][COUNT_KEY]) : 0;

  return {
    timeframe,
    filters: { priority: priority ?? null, status: status ?? null },
    volumeMetrics: volumeRows.map(row => ({
      status: text(row, 'Status'),
      priority: text(row, 'Priority'),
      count: numberValue(row[COUNT_KEY]),
    })),
    escalationMetrics: {
      totalCases,
      escalatedCases,
      escalationRate: conversionRate(escalatedCases, totalCases),
    },
    channelBreakdown: channelRows.map(row => ({
      accountType: text(row, 'Account.Type'),
      count: numberValue(row[COUNT_KEY]),
    })),
    ownerPerformance: ownerRows.map(row => ({
      owner: text(row, 'Owner.Name'),
      casesHandled: numberValue(row[COUNT_KEY]),
    })),
    queries,
  };
}
