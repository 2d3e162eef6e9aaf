/**
 * CRM Engine
 *
 * The explicit handle the process builds once and passes down. It owns the
 * schema cache, the navigator and the search resolver, all sharing one
 * transport.
 */

import { createLogger } from './utils/logger.js';
import { RemoteError } from './connectors/salesforce/errors.js';
import { SchemaIntrospector } from './connectors/salesforce/schema.js';
import type { SalesforceRecord, SalesforceTransport } from './connectors/salesforce/types.js';
import { RelationalNavigator, type ChildNavigation, type ParentNavigation } from './query/navigator.js';
import { SearchResolver, type SearchResult } from './query/search.js';
import {
  aggregateResultKeys,
  buildAggregateQuery,
  buildTrendQuery,
  DEFAULT_TREND_METRICS,
} from './query/soql-builder.js';
import type { AggregateSpec, QuerySpec, TrendPeriod } from './query/types.js';
import { getPipelineAnalysis, type PipelineAnalysis, type PipelineOptions } from './analysis/pipeline.js';
import { getLeadFunnelAnalysis, type LeadFunnelAnalysis, type LeadFunnelOptions } from './analysis/lead-funnel.js';
import { getCaseInsights, type CaseInsights, type CaseInsightsOptions } from './analysis/case-insights.js';
import { getAtRiskPipeline, type AtRiskOptions, type AtRiskPipeline } from './analysis/risk.js';
import { getReportData, type ReportData, type ReportOptions } from './analysis/reports.js';

const logger = createLogger('Engine');

export interface AggregateResult {
  query: string;
  aggregates: AggregateSpec[];
  groupBy: string | null;
  resultKeys: string[];
  totalSize: number;
  records: SalesforceRecord[];
}

export interface TrendRequest {
  object: string;
  dateField?: string;
  period?: TrendPeriod;
  metrics?: AggregateSpec[];
  lookback?: number;
  where?: string;
}

export interface TrendResult {
  query: string;
  period: TrendPeriod;
  lookback: number;
  dateField: string;
  metrics: AggregateSpec[];
  trends: SalesforceRecord[];
}

const KNOWN_DATETIME_FIELDS = new Set([
  'CreatedDate',
  'LastModifiedDate',
  'SystemModstamp',
  'LastViewedDate',
  'LastReferencedDate',
]);

/** Guess used when the field's describe metadata is unavailable. */
export function guessDateFieldKind(dateField: string): 'date' | 'datetime' {
  return KNOWN_DATETIME_FIELDS.has(dateField) || dateField.endsWith('DateTime') ? 'datetime' : 'date';
}

export class CrmEngine {
  readonly schemas: SchemaIntrospector;
  readonly navigator: RelationalNavigator;
  readonly searcher: SearchResolver;

  constructor(readonly transport: SalesforceTransport) {
    this.schemas = new SchemaIntrospector(transport);
    this.navigator = new RelationalNavigator(transport, this.schemas);
    this.searcher = new SearchResolver(transport);
  }

  async aggregate(spec: QuerySpec): Promise<AggregateResult> {
    const query = buildAggregateQuery(spec);
    const result = await this.transport.query(query);
    return {
      query,
      aggregates: spec.aggregates,
      groupBy: spec.groupBy ?? null,
      resultKeys: aggregateResultKeys(spec.aggregates),
      totalSize: result.totalSize,
      records: result.records,
    };
  }

  async trend(request: TrendRequest, now: Date = new Date()): Promise<TrendResult> {
    const dateField = request.dateField ?? 'CreatedDate';
    const period = request.period ?? 'month';
    const lookback = request.lookback ?? 6;
    const metrics = request.metrics && request.metrics.length > 0 ? request.metrics : DEFAULT_TREND_METRICS;

    const query = buildTrendQuery({
      object: request.object,
      aggregates: metrics,
      where: request.where,
      dateField,
      period,
      lookback,
      dateFieldKind: await this.resolveDateFieldKind(request.object, dateField),
    }, now);

    const result = await this.transport.query(query);
    return { query, period, lookback, dateField, metrics, trends: result.records };
  }

  private async resolveDateFieldKind(objectName: string, dateField: string): Promise<'date' | 'datetime'> {
    try {
      const schema = await this.schemas.describe(objectName);
      const field = schema.fields.find(f => f.name === dateField);
      if (field?.rawType === 'datetime') return 'datetime';
      if (field?.rawType === 'date') return 'date';
    } catch (error) {
      if (!(error instanceof RemoteError)) throw error;
      logger.debug('Describe unavailable for trend field, guessing kind', { objectName, dateField });
    }
    return guessDateFieldKind(dateField);
  }

  navigateUp(objectName: string, recordId: string, maxFields = 3): Promise<ParentNavigation> {
    return this.navigator.resolveParents(objectName, recordId, maxFields);
  }

  navigateDown(objectName: string, recordId: string, maxRelationships = 3): Promise<ChildNavigation> {
    return this.navigator.resolveChildren(objectName, recordId, { maxRelationships });
  }

  navigateNamed(objectName: string, recordId: string, relationshipName: string): Promise<SalesforceRecord[]> {
    return this.navigator.resolveNamedRelationship(objectName, recordId, relationshipName);
  }

  related(objectName: string, recordId: string): Promise<ChildNavigation> {
    return this.navigator.listRelated(objectName, recordId);
  }

  search(objectName: string, term: string, fields?: string[], limit?: number): Promise<SearchResult> {
    return this.searcher.lookup(objectName, term, fields, limit);
  }

  pipeline(options?: PipelineOptions): Promise<PipelineAnalysis> {
    return getPipelineAnalysis(this.transport, options);
  }

  leadFunnel(options?: LeadFunnelOptions): Promise<LeadFunnelAnalysis> {
    return getLeadFunnelAnalysis(this.transport, options);
  }

  caseInsights(options?: CaseInsightsOptions): Promise<CaseInsights> {
    return getCaseInsights(this.transport, options);
  }

  atRisk(options?: AtRiskOptions): Promise<AtRiskPipeline> {
    return getAtRiskPipeline(this.transport, options);
  }

  reports(options?: ReportOptions): Promise<ReportData> {
    return getReportData(this.transport, options);
  }
}
