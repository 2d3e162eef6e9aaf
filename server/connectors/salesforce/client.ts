/**
 * Salesforce REST API Client
 *
 * Pure transport - credentials passed to constructor, no retries, no caching.
 * Failures are classified into AuthExpiredError / RemoteError before they
 * leave this module.
 */

import { createLogger } from '../../utils/logger.js';
import { classifyErrorResponse, RemoteError } from './errors.js';
import type {
  SalesforceApiLimits,
  SalesforceMutationResult,
  SalesforceObjectDescribe,
  SalesforceQueryResult,
  SalesforceRecord,
  SalesforceRecordApi,
  SalesforceSaveResult,
  SalesforceSearchResult,
  SalesforceTransport,
} from './types.js';

const logger = createLogger('Salesforce');

export interface SalesforceClientConfig {
  baseUrl: string;
  accessToken: string;
  timeoutMs?: number;
}

export class SalesforceClient implements SalesforceTransport, SalesforceRecordApi {
  private baseUrl: string;
  private accessToken: string;
  private timeoutMs: number;
  private apiLimits: SalesforceApiLimits = { used: 0, total: 0, percentUsed: 0 };

  constructor(config: SalesforceClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.accessToken = config.accessToken;
    this.timeoutMs = config.timeoutMs ?? 30_000;
  }

  // ==========================================================================
  // HTTP Helpers
  // ==========================================================================

  private async send(path: string, options: RequestInit = {}): Promise<Response> {
    const url = path.startsWith('http') ? path : `${this.baseUrl}${path}`;
    const startTime = Date.now();

    let response: Response;
    try {
      response = await fetch(url, {
        ...options,
        signal: AbortSignal.timeout(this.timeoutMs),
        headers: {
          'Authorization': `Bearer ${this.accessToken}`,
          'Content-Type': 'application/json',
          'Accept': 'application/json',
          ...options.headers,
        },
      });
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('Request failed before a response', { path, timedOut, message });
      throw new RemoteError(
        timedOut
          ? `Salesforce API Error: request timed out after ${this.timeoutMs}ms`
          : `Salesforce API Error: ${message}`,
        0,
        timedOut ? 'REQUEST_TIMEOUT' : 'NETWORK_ERROR'
      );
    }

    const limitInfo = response.headers.get('Sforce-Limit-Info');
    if (limitInfo) {
      this.parseApiLimits(limitInfo);
    }

    logger.debug('API call', {
      path,
      status: response.status,
      duration: Date.now() - startTime,
    });

    if (!response.ok) {
      const body = await response.text();
      throw classifyErrorResponse(response.status, body, response.statusText);
    }

    return response;
  }

  private async request<T>(path: string, options: RequestInit = {}): Promise<T> {
    const response = await this.send(path, options);
    return response.json();
  }

  private parseApiLimits(limitInfo: string): void {
    // Format: "api-usage=25/15000"
    const match = limitInfo.match(/api-usage=(\d+)\/(\d+)/);
    if (!match) return;

    const used = parseInt(match[1], 10);
    const total = parseInt(match[2], 10);
    const percentUsed = total > 0 ? Math.round((used / total) * 100) : 0;

    this.apiLimits = { used, total, percentUsed };

    if (percentUsed >= 80) {
      logger.warn('API limit warning', { used, total, percentUsed });
    }
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  async query<T = SalesforceRecord>(soql: string): Promise<SalesforceQueryResult<T>> {
    return this.request<SalesforceQueryResult<T>>(`/query?q=${encodeURIComponent(soql)}`);
  }

  async search(sosl: string): Promise<SalesforceSearchResult> {
    return this.request<SalesforceSearchResult>(`/search?q=${encodeURIComponent(sosl)}`);
  }

  async describe(objectName: string): Promise<SalesforceObjectDescribe> {
    return this.request<SalesforceObjectDescribe>(`/sobjects/${encodeURIComponent(objectName)}/describe`);
  }

  async get<T = unknown>(path: string): Promise<T> {
    return this.request<T>(path.startsWith('/') ? path : `/${path}`);
  }

  // ==========================================================================
  // Record API
  // ==========================================================================

  async listObjects(): Promise<unknown> {
    return this.request<unknown>('/sobjects');
  }

  async recent(limit: number): Promise<SalesforceRecord[]> {
    return this.request<SalesforceRecord[]>(`/recent?limit=${limit}`);
  }

  async createRecord(objectName: string, data: Record<string, unknown>): Promise<SalesforceSaveResult> {
    return this.request<SalesforceSaveResult>(`/sobjects/${encodeURIComponent(objectName)}`, {
      method: 'POST',
      body: JSON.stringify(data),
    });
  }

  async updateRecord(
    objectName: string,
    recordId: string,
    data: Record<string, unknown>
  ): Promise<SalesforceMutationResult> {
    await this.send(`/sobjects/${encodeURIComponent(objectName)}/${encodeURIComponent(recordId)}`, {
      method: 'PATCH',
      body: JSON.stringify(data),
    });
    return { success: true, id: recordId };
  }

  async deleteRecord(objectName: string, recordId: string): Promise<SalesforceMutationResult> {
    await this.send(`/sobjects/${encodeURIComponent(objectName)}/${encodeURIComponent(recordId)}`, {
      method: 'DELETE',
    });
    return { success: true, id: recordId };
  }

  // ==========================================================================
  // Getters
  // ==========================================================================

  getApiLimits(): SalesforceApiLimits {
    return { ...this.apiLimits };
  }
}
