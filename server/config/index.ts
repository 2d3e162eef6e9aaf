/**
 * Process configuration
 *
 * Read once at startup from the environment (after dotenv has populated it).
 * Missing connection settings are fatal and never retried.
 */

import { ConfigurationError } from '../connectors/salesforce/errors.js';
import { isLogLevel, type LogLevel } from '../utils/logger.js';

export interface SalesforceConnectionConfig {
  /** REST root, e.g. https://example.my.salesforce.com/services/data/v59.0 */
  baseUrl: string;
  accessToken: string;
  timeoutMs: number;
}

export interface ServerConfig {
  salesforce: SalesforceConnectionConfig;
  port: number;
  logLevel: LogLevel;
}

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_PORT = 3000;

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`, name);
  }
  return value;
}

export function loadSalesforceConfig(env: Env = process.env): SalesforceConnectionConfig {
  const baseUrl = env.SALESFORCE_BASE_URL?.trim();
  const accessToken = env.SALESFORCE_ACCESS_TOKEN?.trim() || env.SALESFORCE_SID?.trim();

  if (!baseUrl) {
    throw new ConfigurationError('Missing required environment variable: SALESFORCE_BASE_URL', 'SALESFORCE_BASE_URL');
  }
  if (!accessToken) {
    throw new ConfigurationError(
      'Missing required environment variable: SALESFORCE_ACCESS_TOKEN (or SALESFORCE_SID)',
      'SALESFORCE_ACCESS_TOKEN'
    );
  }

  return {
    baseUrl: baseUrl.replace(/\/+$/, ''),
    accessToken,
    timeoutMs: readPositiveInt(env, 'SALESFORCE_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
  };
}

export function loadConfig(env: Env = process.env): ServerConfig {
  const logLevel = env.LOG_LEVEL?.trim().toLowerCase() || 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`LOG_LEVEL must be one of debug, info, warn, error; got "${logLevel}"`, 'LOG_LEVEL');
  }

  return {
    salesforce: loadSalesforceConfig(env),
    port: readPositiveInt(env, 'PORT', DEFAULT_PORT),
    logLevel,
  };
}
