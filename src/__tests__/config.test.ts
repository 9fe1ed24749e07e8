/**
 * Tests for client configuration.
 */

import { describe, it, expect } from 'vitest';
import {
  DataApiConfig,
  DataApiConfigBuilder,
  DEFAULT_API_VERSION,
  DEFAULT_PAGE_SIZE,
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
} from '../config.js';
import { ConfigurationError } from '../errors.js';

function baseBuilder(): DataApiConfigBuilder {
  return DataApiConfig.builder()
    .baseUrl('https://fms.test')
    .database('Contacts')
    .layout('Contacts')
    .credentials('admin', 'test-secret');
}

describe('DataApiConfigBuilder', () => {
  it('should apply defaults', () => {
    const config = baseBuilder().build();

    expect(config.apiVersion).toBe(DEFAULT_API_VERSION);
    expect(config.timeout).toBe(DEFAULT_TIMEOUT);
    expect(config.pageSize).toBe(DEFAULT_PAGE_SIZE);
    expect(config.coerceFields).toBe(true);
    expect(config.userAgent).toBe(DEFAULT_USER_AGENT);
    expect(config.dataSources).toEqual([]);
  });

  it('should strip trailing slashes from the base URL', () => {
    const config = baseBuilder().baseUrl('https://fms.test///').build();
    expect(config.baseUrl).toBe('https://fms.test');
  });

  it('should keep the password out of serialized config', () => {
    const config = baseBuilder().build();

    expect(config.credentials.password.expose()).toBe('test-secret');
    expect(JSON.stringify(config.credentials)).toBe('{"username":"admin","password":"[REDACTED]"}');
    expect(String(config.credentials.password)).toBe('[REDACTED]');
  });

  it('should collect data sources', () => {
    const config = baseBuilder().dataSource('Archive', 'reader', 'test-secret').build();

    expect(config.dataSources).toHaveLength(1);
    expect(config.dataSources[0].database).toBe('Archive');
    expect(config.dataSources[0].username).toBe('reader');
  });

  it('should require credentials', () => {
    const builder = new DataApiConfigBuilder()
      .baseUrl('https://fms.test')
      .database('Contacts')
      .layout('Contacts');

    expect(() => builder.build()).toThrow(
      'Configuration error: Credentials are required (use credentials())'
    );
  });

  it('should reject plain http', () => {
    expect(() => baseBuilder().baseUrl('http://fms.test').build()).toThrow(
      'Configuration error: baseUrl: Base URL must use https, the Data API is only served over TLS'
    );
  });

  it('should reject an empty database', () => {
    expect(() => baseBuilder().database('  ').build()).toThrow(
      'Configuration error: database: Database cannot be empty'
    );
  });

  it('should reject malformed API versions', () => {
    expect(() => baseBuilder().apiVersion('v3.1').build()).toThrow(ConfigurationError);
    expect(baseBuilder().apiVersion('v2').build().apiVersion).toBe('v2');
  });

  it('should reject non-positive timeouts and page sizes', () => {
    expect(() => baseBuilder().timeout(0).build()).toThrow(
      'Configuration error: timeout: Timeout must be greater than 0'
    );
    expect(() => baseBuilder().pageSize(-1).build()).toThrow(
      'Configuration error: pageSize: Page size must be greater than 0'
    );
  });
});

describe('DataApiConfig.fromEnv', () => {
  it('should read FM_DATA_* variables', () => {
    const config = DataApiConfig.fromEnv({
      FM_DATA_URL: 'https://fms.test/',
      FM_DATA_DATABASE: 'Contacts',
      FM_DATA_LAYOUT: 'Web Contacts',
      FM_DATA_USERNAME: 'admin',
      FM_DATA_PASSWORD: 'test-secret',
      FM_DATA_API_VERSION: 'v1',
      FM_DATA_TIMEOUT_MS: '5000',
      FM_DATA_PAGE_SIZE: '25',
      FM_DATA_COERCE_FIELDS: 'false',
      FM_DATA_USER_AGENT: 'contacts-sync/2.0',
    }).build();

    expect(config.baseUrl).toBe('https://fms.test');
    expect(config.layout).toBe('Web Contacts');
    expect(config.apiVersion).toBe('v1');
    expect(config.timeout).toBe(5000);
    expect(config.pageSize).toBe(25);
    expect(config.coerceFields).toBe(false);
    expect(config.userAgent).toBe('contacts-sync/2.0');
    expect(config.credentials.username).toBe('admin');
  });

  it('should ignore unparseable numbers', () => {
    const config = DataApiConfig.fromEnv({
      FM_DATA_URL: 'https://fms.test',
      FM_DATA_DATABASE: 'Contacts',
      FM_DATA_LAYOUT: 'Contacts',
      FM_DATA_USERNAME: 'admin',
      FM_DATA_PASSWORD: 'test-secret',
      FM_DATA_TIMEOUT_MS: 'soon',
    }).build();

    expect(config.timeout).toBe(DEFAULT_TIMEOUT);
  });

  it('should fail without credentials in the environment', () => {
    expect(() =>
      DataApiConfig.fromEnv({
        FM_DATA_URL: 'https://fms.test',
        FM_DATA_DATABASE: 'Contacts',
        FM_DATA_LAYOUT: 'Contacts',
      }).build()
    ).toThrow(ConfigurationError);
  });
});

describe('DataApiConfig.validate', () => {
  it('should accept a built config', () => {
    expect(() => DataApiConfig.validate(baseBuilder().build())).not.toThrow();
  });
});
