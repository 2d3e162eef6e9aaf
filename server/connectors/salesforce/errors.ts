/**
 * Salesforce error taxonomy
 *
 * Every failure the engine surfaces is a SalesforceError. Only the child
 * relationship fan-out, the forecast sub-query and the SOSL phase of a lookup
 * catch these; everything else propagates them unchanged.
 */

import type { SalesforceApiErrorEntry } from './types.js';

export class SalesforceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SalesforceError';
  }
}

/** Session token rejected. The caller has to refresh and rerun the whole operation. */
export class AuthExpiredError extends SalesforceError {
  constructor(message = 'Salesforce access token has expired. Please refresh your bearer token.') {
    super(message);
    this.name = 'AuthExpiredError';
  }
}

/**
 * Any other failed call. Status 0 means the request never got an answer
 * (network failure or timeout).
 */
export class RemoteError extends SalesforceError {
  constructor(
    message: string,
    public status: number,
    public errorCode?: string,
    public fields?: string[]
  ) {
    super(message);
    this.name = 'RemoteError';
  }
}

export class NotFoundError extends SalesforceError {
  constructor(
    public objectName: string,
    public recordId: string
  ) {
    super(`Record ${recordId} not found in ${objectName}`);
    this.name = 'NotFoundError';
  }
}

export class ConfigurationError extends SalesforceError {
  constructor(
    message: string,
    public field: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Response classification
// ============================================================================

function isErrorEntry(value: unknown): value is SalesforceApiErrorEntry {
  return typeof value === 'object' && value !== null;
}

function entryMessage(entry: SalesforceApiErrorEntry): string {
  return typeof entry.message === 'string' ? entry.message : JSON.stringify(entry);
}

/**
 * Turn a non-2xx response into the matching error. `bodyText` is the raw
 * response body; it is parsed here so that non-JSON bodies still produce a
 * readable message.
 */
export function classifyErrorResponse(status: number, bodyText: string, statusText = ''): SalesforceError {
  let parsed: unknown;
  try {
    parsed = JSON.parse(bodyText);
  } catch {
    return new RemoteError(`Salesforce API Error: ${bodyText || statusText || status}`, status);
  }

  if (Array.isArray(parsed)) {
    const entries = parsed.filter(isErrorEntry);

    if (status === 401 && entries.some(e => e.errorCode === 'INVALID_SESSION_ID')) {
      return new AuthExpiredError();
    }

    const first = entries[0];
    const messages = entries.map(entryMessage);
    return new RemoteError(
      `Salesforce API Error: ${messages.join(', ')}`,
      status,
      first?.errorCode,
      first?.fields
    );
  }

  return new RemoteError(`Salesforce API Error: ${JSON.stringify(parsed)}`, status);
}
