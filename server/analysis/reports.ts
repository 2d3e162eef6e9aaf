/**
 * Report access
 *
 * Finds a report by id or name and returns its analytics metadata. When the
 * analytics endpoint is unavailable to the session, the Report record itself
 * is returned instead.
 */

import { createLogger } from '../utils/logger.js';
import { NotFoundError, RemoteError } from '../connectors/salesforce/errors.js';
import type { SalesforceRecord, SalesforceTransport } from '../connectors/salesforce/types.js';
import { buildSelectQuery, soqlLikeLiteral, soqlString } from '../query/soql-builder.js';

const logger = createLogger('Analysis');

export interface ReportOptions {
  reportId?: string;
  reportName?: string;
}

export interface ReportSummary {
  id: string;
  name: string | null;
  developerName: string | null;
}

export type ReportData =
  | { kind: 'list'; message: string; reports: SalesforceRecord[] }
  | { kind: 'candidates'; message: string; reports: ReportSummary[] }
  | { kind: 'report'; reportId: string; metadata: unknown }
  | { kind: 'report-record'; reportId: string; message: string; report: SalesforceRecord | null };

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

export async function getReportData(
  transport: SalesforceTransport,
  options: ReportOptions = {}
): Promise<ReportData> {
  let reportId = options.reportId;

  if (!reportId && options.reportName) {
    const pattern = soqlLikeLiteral(options.reportName);
    const matches = await transport.query(buildSelectQuery({
      object: 'Report',
      fields: ['Id', 'Name', 'DeveloperName'],
      where: `Name LIKE ${pattern} OR DeveloperName LIKE ${pattern}`,
      limit: 10,
    }));

    if (matches.records.length === 0) {
      throw new NotFoundError('Report', options.reportName);
    }

    if (matches.records.length > 1) {
      return {
        kind: 'candidates',
        message: 'Multiple reports found. Please specify reportId or be more specific.',
        reports: matches.records.map(r => ({
          id: String(r.Id),
          name: stringOrNull(r.Name),
          developerName: stringOrNull(r.DeveloperName),
        })),
      };
    }

    reportId = String(matches.records[0].Id);
  }

  if (!reportId) {
    const recent = await transport.query(buildSelectQuery({
      object: 'Report',
      fields: ['Id', 'Name', 'DeveloperName', 'LastRunDate'],
      where: 'LastRunDate != null',
      orderBy: 'LastRunDate DESC',
      limit: 20,
    }));
    return { kind: 'list', message: 'Available reports in your org:', reports: recent.records };
  }

  try {
    const metadata = await transport.get<unknown>(`/analytics/reports/${encodeURIComponent(reportId)}`);
    return { kind: 'report', reportId, metadata };
  } catch (error) {
    if (!(error instanceof RemoteError)) throw error;
    logger.warn('Analytics API unavailable, reading report record', {
      reportId,
      status: error.status,
    });
  }

  const record = await transport.query(buildSelectQuery({
    object: 'Report',
    fields: ['Id', 'Name', 'DeveloperName', 'Description', 'LastRunDate'],
    where: `Id = ${soqlString(reportId)}`,
    limit: 1,
  }));

  return {
    kind: 'report-record',
    reportId,
    message: 'Report found but analytics API access may be limited',
    report: record.records[0] ?? null,
  };
}
