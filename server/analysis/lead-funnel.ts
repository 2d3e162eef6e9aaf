/**
 * Lead funnel analysis
 *
 * Total and converted lead counts come from two queries with different
 * filters, merged by lead source in memory.
 */

import type { SalesforceRecord, SalesforceTransport } from '../connectors/salesforce/types.js';
import { aggregateResultKeys, buildAggregateQuery, buildSelectQuery, soqlString } from '../query/soql-builder.js';
import type { AggregateSpec, QuerySpec } from '../query/types.js';
import { conversionRate, groupValue, numberValue } from './metrics.js';

export interface LeadFunnelOptions {
  source?: string;
  timeframe?: string;
  conversionStage?: string;
}

export interface FunnelMetric {
  source: string | null;
  totalLeads: number;
  convertedLeads: number;
  conversionRate: number;
}

export interface LeadFunnelAnalysis {
  timeframe: string;
  sourceFilter: string | null;
  conversionStage: string;
  leadVolume: Array<{ source: string | null; status: string | null; count: number }>;
  funnelMetrics: FunnelMetric[];
  overall: { totalLeads: number; convertedLeads: number; conversionRate: number };
  qualityAnalysis: Array<{ source: string | null; rating: string | null; count: number }>;
  topOpportunities: SalesforceRecord[];
  queries: string[];
}

const LEAD = 'Lead';
const GROUP_CAP = 200;
const COUNT_ID: AggregateSpec[] = [{ function: 'COUNT', field: 'Id' }];
const [COUNT_KEY] = aggregateResultKeys(COUNT_ID);

function text(row: SalesforceRecord, field: string): string | null {
  const value = groupValue(row, field);
  return typeof value === 'string' ? value : null;
}

export async function getLeadFunnelAnalysis(
  transport: SalesforceTransport,
  options: LeadFunnelOptions = {}
): Promise<LeadFunnelAnalysis> {
  const { source, timeframe = 'THIS_QUARTER', conversionStage = 'Opportunity' } = options;
  const sourceFilter = source ? ` AND LeadSource = ${soqlString(source)}` : '';
  const base = `CreatedDate = ${timeframe}${sourceFilter}`;
  const queries: string[] = [];

  const run = async (spec: QuerySpec): Promise<SalesforceRecord[]> => {
    const soql = buildAggregateQuery(spec);
    queries.push(soql);
    return (await transport.query(soql)).records;
  };

  const volumeRows = await run({
    object: LEAD,
    aggregates: COUNT_ID,
    groupBy: 'LeadSource, Status',
    where: base,
    orderBy: 'LeadSource, Status',
    limit: GROUP_CAP,
  });

  const totalRows = await run({
    object: LEAD,
    aggregates: COUNT_ID,
    groupBy: 'LeadSource',
    where: base,
    orderBy: 'COUNT(Id) DESC',
    limit: GROUP_CAP,
  });

  const convertedRows = await run({
    object: LEAD,
    aggregates: COUNT_ID,
    groupBy: 'LeadSource',
    where: `${base} AND IsConverted = true`,
    limit: GROUP_CAP,
  });

  const qualityRows = await run({
    object: LEAD,
    aggregates: COUNT_ID,
    groupBy: 'LeadSource, Rating',
    where: `CreatedDate = ${timeframe} AND Rating != null${sourceFilter}`,
    orderBy: 'LeadSource, Rating',
    limit: GROUP_CAP,
  });

  const opportunitySoql = buildSelectQuery({
    object: LEAD,
    fields: [
      'Id',
      'Name',
      'LeadSource',
      'ConvertedAccount.Name',
      'ConvertedOpportunity.Amount',
      'ConvertedOpportunity.StageName',
      'ConvertedOpportunity.CloseDate',
    ],
    where: `${base} AND IsConverted = true AND ConvertedOpportunityId != null`,
    orderBy: 'ConvertedOpportunity.Amount DESC NULLS LAST',
    limit: 20,
  });
  queries.push(opportunitySoql);
  const topOpportunities = (await transport.query(opportunitySoql)).records;

  const convertedBySource = new Map<string | null, number>();
  for (const row of convertedRows) {
    convertedBySource.set(text(row, 'LeadSource'), numberValue(row[COUNT_KEY]));
  }

  const funnelMetrics: FunnelMetric[] = totalRows.map(row => {
    const leadSource = text(row, 'LeadSource');
    const totalLeads = numberValue(row[COUNT_KEY]);
    const convertedLeads = convertedBySource.get(leadSource) ?? 0;
    return {
      source: leadSource,
      totalLeads,
      convertedLeads,
      conversionRate: conversionRate(convertedLeads, totalLeads),
    };
  });

  const totalLeads = funnelMetrics.reduce((acc, m) => acc + m.totalLeads, 0);
  const convertedLeads = funnelMetrics.reduce((acc, m) => acc + m.convertedLeads, 0);

  return {
    timeframe,
    sourceFilter: source ?? null,
    conversionStage,
    leadVolume: volumeRows.map(row => ({
      source: text(row, 'LeadSource'),
      status: text(row, 'Status'),
      count: numberValue(row[COUNT_KEY]),
    })),
    funnelMetrics,
    overall: { totalLeads, convertedLeads, conversionRate: conversionRate(convertedLeads, totalLeads) },
    qualityAnalysis: qualityRows.map(row => ({
      source: text(row, 'LeadSource'),
      rating: text(row, 'Rating'),
      count: numberValue(row[COUNT_KEY]),
    })),
    topOpportunities,
    queries,
  };
}
