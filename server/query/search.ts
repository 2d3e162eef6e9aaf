/**
 * Search Resolver
 *
 * SOSL first; a LIKE query only when the SOSL call itself fails. An empty SOSL
 * answer is a result, not a reason to fall back.
 */

import { createLogger } from '../utils/logger.js';
import { RemoteError } from '../connectors/salesforce/errors.js';
import type { SalesforceRecord, SalesforceTransport } from '../connectors/salesforce/types.js';
import { buildLikeFallback, buildSoslSearch } from './soql-builder.js';

const logger = createLogger('Search');

export type SearchSource = 'sosl' | 'soql';

export interface SearchResult {
  records: SalesforceRecord[];
  source: SearchSource;
  query: string;
}

export class SearchResolver {
  constructor(private transport: SalesforceTransport) {}

  async lookup(
    objectName: string,
    searchTerm: string,
    fields: string[] = ['Name'],
    limit = 10
  ): Promise<SearchResult> {
    const searchFields = fields.length > 0 ? fields : ['Name'];
    const sosl = buildSoslSearch(objectName, searchTerm, searchFields, limit);

    try {
      const result = await this.transport.search(sosl);
      return { records: result.searchRecords ?? [], source: 'sosl', query: sosl };
    } catch (error) {
      // AuthExpiredError is not a RemoteError: the fallback would fail the same way.
      if (!(error instanceof RemoteError)) throw error;
      logger.warn('SOSL search failed, falling back to LIKE query', {
        objectName,
        status: error.status,
        errorCode: error.errorCode,
      });
    }

    const soql = buildLikeFallback(objectName, searchTerm, searchFields, limit);
    const result = await this.transport.query(soql);
    return { records: result.records, source: 'soql', query: soql };
  }
}
