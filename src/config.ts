/**
 * Configuration types for the Data API client.
 * @module config
 */

import { z } from 'zod';
import {
  SecretString,
  createCredentials,
  type DataApiCredentials,
  type DataSourceCredentials,
} from './auth/index.js';
import { ConfigurationError } from './errors.js';

/** Package version reported in the default User-Agent. */
export const CLIENT_VERSION = '0.1.0';

/** Default Data API version path segment. */
export const DEFAULT_API_VERSION = 'vLatest';

/** Default operation timeout in milliseconds (30 seconds). */
export const DEFAULT_TIMEOUT = 30000;

/** Default number of records fetched per foundset page. */
export const DEFAULT_PAGE_SIZE = 100;

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = `fm-data-client/${CLIENT_VERSION}`;

/**
 * Data API client configuration.
 */
export interface DataApiConfig {
  /** Server origin, e.g. "https://fms.example.com". */
  baseUrl: string;
  /** Hosted database name, without extension. */
  database: string;
  /** Layout used by record operations unless a call names another one. */
  layout: string;
  /** Account used to open sessions. */
  credentials: DataApiCredentials;
  /** External data sources to authenticate at login. */
  dataSources: DataSourceCredentials[];
  /** API version path segment ("v1", "v2", "vLatest"). */
  apiVersion: string;
  /** Default time allowed for one operation, in milliseconds. */
  timeout: number;
  /** Default foundset page size. */
  pageSize: number;
  /** Convert field values using layout metadata. */
  coerceFields: boolean;
  /** User-Agent header. */
  userAgent: string;
}

const configSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .refine((url) => url.startsWith('https://'), {
      message: 'Base URL must use https, the Data API is only served over TLS',
    }),
  database: z.string().trim().min(1, 'Database cannot be empty'),
  layout: z.string().trim().min(1, 'Layout cannot be empty'),
  credentials: z.object({
    username: z.string().min(1, 'Username cannot be empty'),
    password: z.instanceof(SecretString),
  }),
  dataSources: z.array(
    z.object({
      database: z.string().min(1),
      username: z.string().min(1),
      password: z.instanceof(SecretString),
    })
  ),
  apiVersion: z.string().regex(/^v(\d+|Latest)$/, 'API version must look like v1, v2 or vLatest'),
  timeout: z.number().int().positive('Timeout must be greater than 0'),
  pageSize: z.number().int().positive('Page size must be greater than 0'),
  coerceFields: z.boolean(),
  userAgent: z.string().trim().min(1, 'User-Agent cannot be empty'),
});

/**
 * Validates a Data API configuration.
 * @param config - The configuration to validate.
 * @throws {ConfigurationError} If the configuration is invalid.
 */
export function validateConfig(config: DataApiConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.join('.');
    throw new ConfigurationError(path ? `${path}: ${issue.message}` : issue.message);
  }
}

/**
 * Builder for DataApiConfig.
 */
export class DataApiConfigBuilder {
  private baseUrlValue = '';
  private databaseValue = '';
  private layoutValue = '';
  private credentialsValue?: DataApiCredentials;
  private dataSourcesValue: DataSourceCredentials[] = [];
  private apiVersionValue = DEFAULT_API_VERSION;
  private timeoutValue = DEFAULT_TIMEOUT;
  private pageSizeValue = DEFAULT_PAGE_SIZE;
  private coerceFieldsValue = true;
  private userAgentValue = DEFAULT_USER_AGENT;

  /**
   * Sets the server origin.
   * @param url - The base URL.
   * @returns The builder instance for chaining.
   */
  baseUrl(url: string): this {
    this.baseUrlValue = url.replace(/\/+$/, '');
    return this;
  }

  /**
   * Sets the hosted database name.
   */
  database(name: string): this {
    this.databaseValue = name;
    return this;
  }

  /**
   * Sets the default layout.
   */
  layout(name: string): this {
    this.layoutValue = name;
    return this;
  }

  /**
   * Sets the account used for login.
   * @param username - Account name.
   * @param password - Account password.
   * @returns The builder instance for chaining.
   */
  credentials(username: string, password: string): this {
    this.credentialsValue = createCredentials(username, password);
    return this;
  }

  /**
   * Adds an external data source authenticated at login.
   */
  dataSource(database: string, username: string, password: string): this {
    this.dataSourcesValue.push({
      database,
      username,
      password: new SecretString(password),
    });
    return this;
  }

  /**
   * Sets the API version path segment.
   */
  apiVersion(version: string): this {
    this.apiVersionValue = version;
    return this;
  }

  /**
   * Sets the default operation timeout.
   * @param timeout - The timeout in milliseconds.
   * @returns The builder instance for chaining.
   */
  timeout(timeout: number): this {
    this.timeoutValue = timeout;
    return this;
  }

  /**
   * Sets the default foundset page size.
   */
  pageSize(size: number): this {
    this.pageSizeValue = size;
    return this;
  }

  /**
   * Enables or disables metadata-driven field conversion.
   * When disabled, field values are returned exactly as sent by the server.
   */
  coerceFields(enabled: boolean): this {
    this.coerceFieldsValue = enabled;
    return this;
  }

  /**
   * Sets the User-Agent header.
   */
  userAgent(userAgent: string): this {
    this.userAgentValue = userAgent;
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @returns The validated configuration.
   * @throws {ConfigurationError} If the configuration is invalid.
   */
  build(): DataApiConfig {
    if (!this.credentialsValue) {
      throw new ConfigurationError('Credentials are required (use credentials())');
    }

    const config: DataApiConfig = {
      baseUrl: this.baseUrlValue,
      database: this.databaseValue,
      layout: this.layoutValue,
      credentials: this.credentialsValue,
      dataSources: [...this.dataSourcesValue],
      apiVersion: this.apiVersionValue,
      timeout: this.timeoutValue,
      pageSize: this.pageSizeValue,
      coerceFields: this.coerceFieldsValue,
      userAgent: this.userAgentValue,
    };
    validateConfig(config);
    return config;
  }
}

function readInt(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Creates a configuration builder from environment variables.
 *
 * Environment variables:
 * - FM_DATA_URL: Server origin
 * - FM_DATA_DATABASE: Database name
 * - FM_DATA_LAYOUT: Default layout
 * - FM_DATA_USERNAME / FM_DATA_PASSWORD: Account
 * - FM_DATA_API_VERSION: API version segment
 * - FM_DATA_TIMEOUT_MS: Request timeout in milliseconds
 * - FM_DATA_PAGE_SIZE: Foundset page size
 * - FM_DATA_COERCE_FIELDS: Field conversion (true/false)
 * - FM_DATA_USER_AGENT: Custom User-Agent string
 *
 * @param env - Variables to read, `process.env` by default.
 * @returns A builder pre-configured from the environment.
 */
export function createConfigFromEnv(env: NodeJS.ProcessEnv = process.env): DataApiConfigBuilder {
  const builder = new DataApiConfigBuilder();

  if (env.FM_DATA_URL) {
    builder.baseUrl(env.FM_DATA_URL);
  }
  if (env.FM_DATA_DATABASE) {
    builder.database(env.FM_DATA_DATABASE);
  }
  if (env.FM_DATA_LAYOUT) {
    builder.layout(env.FM_DATA_LAYOUT);
  }
  if (env.FM_DATA_USERNAME && env.FM_DATA_PASSWORD !== undefined) {
    builder.credentials(env.FM_DATA_USERNAME, env.FM_DATA_PASSWORD);
  }
  if (env.FM_DATA_API_VERSION) {
    builder.apiVersion(env.FM_DATA_API_VERSION);
  }

  const timeout = readInt(env.FM_DATA_TIMEOUT_MS);
  if (timeout !== undefined) {
    builder.timeout(timeout);
  }

  const pageSize = readInt(env.FM_DATA_PAGE_SIZE);
  if (pageSize !== undefined) {
    builder.pageSize(pageSize);
  }

  if (env.FM_DATA_COERCE_FIELDS !== undefined) {
    builder.coerceFields(env.FM_DATA_COERCE_FIELDS.toLowerCase() !== 'false');
  }
  if (env.FM_DATA_USER_AGENT) {
    builder.userAgent(env.FM_DATA_USER_AGENT);
  }

  return builder;
}

/**
 * Namespace for DataApiConfig-related utilities.
 */
export namespace DataApiConfig {
  /**
   * Creates a new configuration builder.
   */
  export function builder(): DataApiConfigBuilder {
    return new DataApiConfigBuilder();
  }

  /**
   * Validates a configuration.
   * @throws {ConfigurationError} If the configuration is invalid.
   */
  export function validate(config: DataApiConfig): void {
    validateConfig(config);
  }

  /**
   * Creates a configuration builder from environment variables.
   */
  export function fromEnv(env?: NodeJS.ProcessEnv): DataApiConfigBuilder {
    return createConfigFromEnv(env);
  }
}
