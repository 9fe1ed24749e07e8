/**
 * Tests for console logging and its redaction.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { SecretString } from '../auth/index.js';
import { createClientFromEnv } from '../client/index.js';
import {
  ConsoleLogger,
  LogLevel,
  NoopLogger,
  createObservabilityFromEnv,
  parseLogLevel,
} from '../observability/index.js';
import { BASE_URL, createServer } from './fixtures.js';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should redact credentials, tokens and secrets', () => {
    const logger = new ConsoleLogger({ context: { client: 'contacts' } });

    const line = JSON.parse(
      logger.format(LogLevel.WARN, 'Login retried', {
        path: '/databases/Contacts/sessions/token-9',
        header: 'Bearer token-9',
        basic: 'Basic YWRtaW46dGVzdC1zZWNyZXQ=',
        password: 'test-secret',
        account: new SecretString('test-secret'),
        fmDataSource: [{ database: 'Archive', username: 'reader', password: 'test-secret' }],
        attempts: 2,
      })
    );

    expect(line.level).toBe('WARN');
    expect(line.message).toBe('Login retried');
    expect(line.context).toEqual({
      client: 'contacts',
      path: '/databases/Contacts/sessions/[REDACTED]',
      header: 'Bearer [REDACTED]',
      basic: 'Basic [REDACTED]',
      password: '[REDACTED]',
      account: '[REDACTED]',
      fmDataSource: [{ database: 'Archive', username: 'reader', password: '[REDACTED]' }],
      attempts: 2,
    });
  });

  it('should leave the login path alone', () => {
    const line = JSON.parse(
      new ConsoleLogger().format(LogLevel.INFO, 'Sending request', {
        path: '/databases/Contacts/sessions',
      })
    );

    expect(line.context).toEqual({ path: '/databases/Contacts/sessions' });
  });

  it('should skip entries below its level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: LogLevel.WARN });

    logger.info('Session opened');
    logger.warn('Session invalidated');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warn.mock.calls[0][0])).message).toBe('Session invalidated');
  });

  it('should keep session tokens out of client logs', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const client = createClientFromEnv(
      { transport: createServer() },
      {
        FM_DATA_URL: BASE_URL,
        FM_DATA_DATABASE: 'Contacts',
        FM_DATA_LAYOUT: 'Contacts',
        FM_DATA_USERNAME: 'admin',
        FM_DATA_PASSWORD: 'test-secret',
        FM_DATA_LOG_LEVEL: 'debug',
      }
    );

    await client.login();
    await client.logout();

    const lines = log.mock.calls.map(([line]) => String(line));
    const logout = lines
      .map((line) => JSON.parse(line))
      .find((entry) => entry.message === 'Sending request' && entry.context.operation === 'logout');
    expect(logout.context).toEqual({
      operation: 'logout',
      method: 'DELETE',
      path: '/databases/Contacts/sessions/[REDACTED]',
    });
    expect(lines.filter((line) => line.includes('token-1'))).toEqual([]);
  });
});

describe('parseLogLevel', () => {
  it('should read level names in any case', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(' Warn ')).toBe(LogLevel.WARN);
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});

describe('createObservabilityFromEnv', () => {
  it('should stay silent without a log level', () => {
    expect(createObservabilityFromEnv({}).logger).toBeInstanceOf(NoopLogger);
    expect(createObservabilityFromEnv({ FM_DATA_LOG_LEVEL: 'info' }).logger).toBeInstanceOf(
      ConsoleLogger
    );
  });
});
