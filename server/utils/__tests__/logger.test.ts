import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger, getLogLevel, isLogLevel, setLogLevel } from '../logger.js';

describe('logger', () => {
  beforeEach(() => {
    setLogLevel('info');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel('info');
  });

  it('prefixes messages and appends context as JSON', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    createLogger('Engine', { run: 1 }).info('Tool call', { rows: 3 });

    expect(log).toHaveBeenCalledWith('[Engine] Tool call {"run":1,"rows":3}');
  });

  it('omits empty context', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    createLogger('Search').warn('Falling back');

    expect(warn).toHaveBeenCalledWith('[Search] Falling back');
  });

  it('suppresses levels below the threshold', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const logger = createLogger('Schema');

    logger.debug('hidden');
    setLogLevel('debug');
    logger.debug('shown');

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith('[Schema] shown');
    expect(getLogLevel()).toBe('debug');
  });

  it('includes the error message in error output', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('boom');
    failure.stack = 'stack-trace';

    createLogger('Server').error('Invalid configuration', failure, { field: 'PORT' });

    expect(error).toHaveBeenCalledWith(
      '[Server] Invalid configuration {"error":"boom","errorType":"Error","stack":"stack-trace","field":"PORT"}'
    );
  });

  it('binds extra context on child loggers', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    createLogger('Tools').child({ tool: 'salesforce_query' }).info('Tool call', { rows: 1 });

    expect(log).toHaveBeenCalledWith('[Tools] Tool call {"tool":"salesforce_query","rows":1}');
  });

  it('describes non-Error failures', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    createLogger('Server').error('Startup failed', 'port in use');

    expect(error).toHaveBeenCalledWith('[Server] Startup failed {"error":"port in use"}');
  });

  it('recognises only the four levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
