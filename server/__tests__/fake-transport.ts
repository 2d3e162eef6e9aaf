/**
 * In-process stand-in for the Salesforce transport.
 *
 * Rules are matched in registration order against the query text (substring
 * or regex). Unmatched queries answer with zero rows. Every call is recorded
 * in `calls` in the order it was made.
 */

import type {
  SalesforceDescribeChildRelationship,
  SalesforceDescribeField,
  SalesforceObjectDescribe,
  SalesforceQueryResult,
  SalesforceRecord,
  SalesforceSearchResult,
  SalesforceTransport,
} from '../connectors/salesforce/types.js';

type Matcher = string | RegExp;
type Reply<T> = T | Error;

interface Rule<T> {
  match: Matcher;
  reply: Reply<T>;
}

export interface TransportCall {
  kind: 'query' | 'search' | 'describe' | 'get';
  text: string;
}

function matches(match: Matcher, text: string): boolean {
  return typeof match === 'string' ? text.includes(match) : match.test(text);
}

function settle<T>(reply: Reply<T>): T {
  if (reply instanceof Error) throw reply;
  return reply;
}

export class FakeTransport implements SalesforceTransport {
  calls: TransportCall[] = [];
  private queryRules: Array<Rule<SalesforceRecord[]>> = [];
  private searchRules: Array<Rule<SalesforceRecord[]>> = [];
  private describes = new Map<string, Reply<SalesforceObjectDescribe>>();
  private getRules: Array<Rule<unknown>> = [];

  onQuery(match: Matcher, reply: Reply<SalesforceRecord[]>): this {
    this.queryRules.push({ match, reply });
    return this;
  }

  onSearch(match: Matcher, reply: Reply<SalesforceRecord[]>): this {
    this.searchRules.push({ match, reply });
    return this;
  }

  onDescribe(objectName: string, reply: Reply<SalesforceObjectDescribe>): this {
    this.describes.set(objectName, reply);
    return this;
  }

  onGet(match: Matcher, reply: Reply<unknown>): this {
    this.getRules.push({ match, reply });
    return this;
  }

  callsOf(kind: TransportCall['kind']): string[] {
    return this.calls.filter(c => c.kind === kind).map(c => c.text);
  }

  async query<T = SalesforceRecord>(soql: string): Promise<SalesforceQueryResult<T>> {
    this.calls.push({ kind: 'query', text: soql });
    const rule = this.queryRules.find(r => matches(r.match, soql));
    const records: T[] = [];
    if (rule) {
      // The fake stores plain records; callers in the engine never ask for a narrower T.
      for (const record of settle(rule.reply)) records.push(record as T);
    }
    return { totalSize: records.length, done: true, records };
  }

  async search(sosl: string): Promise<SalesforceSearchResult> {
    this.calls.push({ kind: 'search', text: sosl });
    const rule = this.searchRules.find(r => matches(r.match, sosl));
    return { searchRecords: rule ? settle(rule.reply) : [] };
  }

  async describe(objectName: string): Promise<SalesforceObjectDescribe> {
    this.calls.push({ kind: 'describe', text: objectName });
    const reply = this.describes.get(objectName);
    if (reply === undefined) {
      throw new Error(`FakeTransport: no describe registered for ${objectName}`);
    }
    return settle(reply);
  }

  async get<T = unknown>(path: string): Promise<T> {
    this.calls.push({ kind: 'get', text: path });
    const rule = this.getRules.find(r => matches(r.match, path));
    if (!rule) throw new Error(`FakeTransport: no GET registered for ${path}`);
    return settle(rule.reply) as T;
  }
}

export function field(
  name: string,
  type: string,
  extra: Partial<SalesforceDescribeField> = {}
): SalesforceDescribeField {
  return { name, type, nillable: true, updateable: true, ...extra };
}

export function childRel(
  childSObject: string,
  fieldName: string,
  relationshipName: string | null
): SalesforceDescribeChildRelationship {
  return { childSObject, field: fieldName, relationshipName };
}

export function describeOf(
  name: string,
  fields: SalesforceDescribeField[],
  childRelationships: SalesforceDescribeChildRelationship[] = []
): SalesforceObjectDescribe {
  return { name, fields, childRelationships };
}
