import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../connectors/salesforce/errors.js';
import { DEFAULT_PORT, DEFAULT_TIMEOUT_MS, loadConfig, loadSalesforceConfig } from '../index.js';

const BASE_URL = 'https://test.my.salesforce.com/services/data/v59.0';

describe('loadSalesforceConfig', () => {
  it('reads the connection settings and strips a trailing slash', () => {
    expect(loadSalesforceConfig({
      SALESFORCE_BASE_URL: `${BASE_URL}/`,
      SALESFORCE_ACCESS_TOKEN: 'test-token',
      SALESFORCE_TIMEOUT_MS: '5000',
    })).toEqual({ baseUrl: BASE_URL, accessToken: 'test-token', timeoutMs: 5000 });
  });

  it('accepts a session id in place of the access token', () => {
    const config = loadSalesforceConfig({ SALESFORCE_BASE_URL: BASE_URL, SALESFORCE_SID: 'test-sid' });

    expect(config.accessToken).toBe('test-sid');
    expect(config.timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
  });

  it('names the missing base URL', () => {
    const error = (() => {
      try {
        loadSalesforceConfig({ SALESFORCE_ACCESS_TOKEN: 'test-token' });
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      field: 'SALESFORCE_BASE_URL',
      message: 'Missing required environment variable: SALESFORCE_BASE_URL',
    });
  });

  it('names the missing token', () => {
    expect(() => loadSalesforceConfig({ SALESFORCE_BASE_URL: BASE_URL, SALESFORCE_ACCESS_TOKEN: '  ' }))
      .toThrow('Missing required environment variable: SALESFORCE_ACCESS_TOKEN (or SALESFORCE_SID)');
  });

  it('rejects a non-positive timeout', () => {
    expect(() => loadSalesforceConfig({
      SALESFORCE_BASE_URL: BASE_URL,
      SALESFORCE_ACCESS_TOKEN: 'test-token',
      SALESFORCE_TIMEOUT_MS: '-1',
    })).toThrow('SALESFORCE_TIMEOUT_MS must be a positive integer, got "-1"');
  });
});

describe('loadConfig', () => {
  const connection = { SALESFORCE_BASE_URL: BASE_URL, SALESFORCE_ACCESS_TOKEN: 'test-token' };

  it('applies defaults for port and log level', () => {
    const config = loadConfig(connection);

    expect(config.port).toBe(DEFAULT_PORT);
    expect(config.logLevel).toBe('info');
  });

  it('reads port and log level', () => {
    const config = loadConfig({ ...connection, PORT: '8080', LOG_LEVEL: 'DEBUG' });

    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe('debug');
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ ...connection, LOG_LEVEL: 'verbose' }))
      .toThrow('LOG_LEVEL must be one of debug, info, warn, error; got "verbose"');
    expect(() => loadConfig({ ...connection, LOG_LEVEL: 'constructor' })).toThrow(ConfigurationError);
  });
});
