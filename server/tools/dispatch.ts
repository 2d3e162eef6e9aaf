/**
 * Tool dispatch
 *
 * Validates agent-supplied parameters and routes each tool to the engine or to
 * a forwarding call on the record API. Failures propagate to the caller; the
 * HTTP layer decides how to present them.
 */

import { createLogger } from '../utils/logger.js';
import type { CrmEngine } from '../engine.js';
import type { SalesforceRecordApi } from '../connectors/salesforce/types.js';
import { TREND_PERIODS } from '../query/types.js';
import {
  optionalBoolean,
  optionalDateLiteral,
  optionalEnum,
  optionalFieldArray,
  optionalFieldList,
  optionalFieldPath,
  optionalInteger,
  optionalNumber,
  optionalString,
  optionalStringArray,
  parseAggregateSpecs,
  requireObjectName,
  requireRecord,
  requireString,
  ToolInputError,
  type ToolParams,
} from './params.js';

const logger = createLogger('Tools');

export interface ToolContext {
  engine: CrmEngine;
  records: SalesforceRecordApi;
}

/** Best-effort row count of a tool result, for logging. */
export function extractResultRowCount(result: unknown): number | null {
  if (Array.isArray(result)) return result.length;
  if (typeof result !== 'object' || result === null) return null;

  for (const key of ['records', 'trends', 'searchRecords', 'reports', 'deals']) {
    const value: unknown = Reflect.get(result, key);
    if (Array.isArray(value)) return value.length;
  }
  const children: unknown = Reflect.get(result, 'children');
  if (typeof children === 'object' && children !== null) {
    return Object.values(children).reduce<number>(
      (acc, rows) => acc + (Array.isArray(rows) ? rows.length : 0),
      0
    );
  }
  return null;
}

async function runTool(context: ToolContext, toolName: string, params: ToolParams): Promise<unknown> {
  const { engine, records } = context;

  switch (toolName) {
    case 'salesforce_query':
      return engine.transport.query(requireString(params, 'q'));

    case 'salesforce_sobjects':
      return records.listObjects();

    case 'salesforce_recent':
      return records.recent(optionalInteger(params, 'limit', { min: 1, max: 200 }) ?? 20);

    case 'salesforce_search':
      return engine.transport.search(requireString(params, 'q'));

    case 'salesforce_describe':
      return engine.transport.describe(requireObjectName(params));

    case 'salesforce_create':
      return records.createRecord(requireObjectName(params), requireRecord(params, 'record_data'));

    case 'salesforce_update':
      return records.updateRecord(
        requireObjectName(params),
        requireString(params, 'record_id'),
        requireRecord(params, 'record_data')
      );

    case 'salesforce_delete':
      return records.deleteRecord(requireObjectName(params), requireString(params, 'record_id'));

    case 'salesforce_relationships': {
      const objectName = requireObjectName(params);
      const recordId = requireString(params, 'record_id');
      const relationshipName = optionalString(params, 'relationship_name');
      if (relationshipName !== undefined) {
        const related = await engine.navigateNamed(
          objectName,
          recordId,
          requireObjectName(params, 'relationship_name')
        );
        return { relationship: relationshipName, records: related };
      }
      const { children } = await engine.related(objectName, recordId);
      return { relationships: children };
    }

    case 'salesforce_lookup':
      return engine.search(
        requireObjectName(params),
        requireString(params, 'search_term'),
        optionalFieldArray(params, 'search_fields'),
        optionalInteger(params, 'limit', { min: 1, max: 200 })
      );

    case 'salesforce_hierarchy': {
      const objectName = requireObjectName(params);
      const recordId = requireString(params, 'record_id');
      const direction = optionalEnum(params, 'direction', ['up', 'down'] as const) ?? 'down';
      const maxItems = optionalInteger(params, 'max_items', { min: 1, max: 10 }) ?? 3;
      return direction === 'up'
        ? engine.navigateUp(objectName, recordId, maxItems)
        : engine.navigateDown(objectName, recordId, maxItems);
    }

    case 'salesforce_aggregate': {
      const object = requireObjectName(params);
      const aggregates = parseAggregateSpecs(params, 'aggregates', true);
      const groupBy = optionalFieldList(params, 'group_by');
      if (aggregates.length === 0 && groupBy === undefined) {
        throw new ToolInputError('Parameter "aggregates" must not be empty without "group_by"', 'aggregates');
      }
      return engine.aggregate({
        object,
        aggregates,
        groupBy,
        where: optionalString(params, 'where_clause'),
        limit: optionalInteger(params, 'limit', { min: 1, max: 2000 }) ?? 100,
      });
    }

    case 'salesforce_reports':
      return engine.reports({
        reportId: optionalString(params, 'report_id'),
        reportName: optionalString(params, 'report_name'),
      });

    case 'salesforce_trend_analysis':
      return engine.trend({
        object: requireObjectName(params),
        dateField: optionalFieldPath(params, 'date_field'),
        period: optionalEnum(params, 'period', TREND_PERIODS),
        metrics: parseAggregateSpecs(params, 'metrics', false),
        lookback: optionalInteger(params, 'timeframe', { min: 1, max: 366 }),
        where: optionalString(params, 'where_clause'),
      });

    case 'salesforce_pipeline':
      return engine.pipeline({
        timeframe: optionalDateLiteral(params, 'timeframe'),
        ownerId: optionalString(params, 'owner_id'),
        includeForecasting: optionalBoolean(params, 'include_forecasting'),
      });

    case 'salesforce_case_insights':
      return engine.caseInsights({
        timeframe: optionalDateLiteral(params, 'timeframe'),
        priority: optionalString(params, 'priority'),
        status: optionalString(params, 'status'),
      });

    case 'salesforce_lead_funnel':
      return engine.leadFunnel({
        source: optionalString(params, 'source'),
        timeframe: optionalDateLiteral(params, 'timeframe'),
        conversionStage: optionalString(params, 'conversion_stage'),
      });

    case 'salesforce_at_risk':
      return engine.atRisk({
        stages: optionalStringArray(params, 'stages'),
        maxProbability: optionalNumber(params, 'max_probability'),
        ownerId: optionalString(params, 'owner_id'),
        limit: optionalInteger(params, 'limit', { min: 1, max: 200 }),
      });

    default:
      throw new ToolInputError(`Unknown tool: ${toolName}`);
  }
}

export async function executeCrmTool(
  context: ToolContext,
  toolName: string,
  params: ToolParams = {}
): Promise<unknown> {
  const log = logger.child({ tool: toolName });
  const start = Date.now();
  try {
    const result = await runTool(context, toolName, params);
    log.info('Tool call', {
      duration_ms: Date.now() - start,
      rows: extractResultRowCount(result),
    });
    return result;
  } catch (error) {
    log.warn('Tool call failed', {
      duration_ms: Date.now() - start,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}
