import type { SalesforceRecord } from '../connectors/salesforce/types.js';
import { soqlString } from '../query/soql-builder.js';

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Aggregate cells arrive as numbers, null, or (for some orgs) numeric strings. */
export function numberValue(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

/** Percentage of `part` in `total`, two decimals; 0 when total is 0. */
export function conversionRate(part: number, total: number): number {
  if (total <= 0) return 0;
  return round2((part / total) * 100);
}

export function sumBy(rows: SalesforceRecord[], key: string): number {
  return rows.reduce((acc, row) => acc + numberValue(row[key]), 0);
}

/**
 * Value of a grouped field in an aggregate row. Relationship group-bys
 * (`Owner.Name`) come back keyed by the last path segment (`Name`).
 */
export function groupValue(row: SalesforceRecord, groupByField: string): string | boolean | null {
  const key = groupByField.slice(groupByField.lastIndexOf('.') + 1);
  const value = row[key];
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

export function ownerFilter(ownerId?: string): string {
  return ownerId ? ` AND OwnerId = ${soqlString(ownerId)}` : '';
}
