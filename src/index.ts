/**
 * fm-data-client - Typed client for the FileMaker Data API
 *
 * - Session token lifecycle with fail-fast invalidation
 * - Record reads, finds with omit requests, creates, edits and deletes
 * - Lazily paginated foundsets
 * - Records with dirty-field tracking and optimistic locking
 * - Field coercion driven by layout metadata
 * - Portal rows, scripts, globals and container uploads
 *
 * @module fm-data-client
 */

// Types
export type {
  WireValue,
  TimeOfDay,
  ContainerRef,
  FieldValue,
  FieldKind,
  FieldResultType,
  FieldMetadata,
  LayoutMetadata,
  DateFormats,
  ProductInfo,
  DatabaseInfo,
  CatalogEntry,
  ScriptCall,
  ScriptHooks,
  ScriptOutcome,
  ScriptResults,
  PortalRequest,
  SortSpec,
  FindRequest,
  FieldInput,
  PortalInput,
  CallOptions,
  LayoutCallOptions,
  GetRecordOptions,
  GetRecordsOptions,
  FindOptions,
  CreateRecordOptions,
  EditRecordOptions,
  DeleteRecordOptions,
  UploadContainerOptions,
  CreatedRecord,
  ScriptCallResult,
} from './types/index.js';

export { timeOfDay, containerRef, isTimeOfDay, isContainerRef } from './types/index.js';

// Errors
export {
  ServiceCode,
  DataApiError,
  ConfigurationError,
  AuthError,
  NotAuthenticatedError,
  TokenExpiredError,
  ServiceError,
  RecordConflictError,
  StaleRecordError,
  UnknownFieldError,
  FieldValidationError,
  ParseError,
  TimeoutError,
  NetworkError,
  fromServiceMessage,
  isDataApiError,
  isRetryableError,
} from './errors.js';

export type { ErrorDetails } from './errors.js';

// Config
export {
  DataApiConfig,
  DataApiConfigBuilder,
  validateConfig,
  createConfigFromEnv,
  CLIENT_VERSION,
  DEFAULT_API_VERSION,
  DEFAULT_TIMEOUT,
  DEFAULT_PAGE_SIZE,
  DEFAULT_USER_AGENT,
} from './config.js';

// Auth
export { SecretString, createCredentials } from './auth/index.js';
export type { DataApiCredentials, DataSourceCredentials } from './auth/index.js';

// Transport
export { UndiciTransport, createTransport } from './transport/index.js';
export type {
  HttpMethod,
  HttpTransport,
  TransportRequest,
  TransportResponse,
} from './transport/index.js';

// Observability
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  MetricNames,
  NoopMetricsCollector,
  InMemoryMetricsCollector,
  createNoopObservability,
  createInMemoryObservability,
  createConsoleObservability,
  createObservabilityFromEnv,
  parseLogLevel,
  Redactor,
  DEFAULT_REDACT_KEYS,
} from './observability/index.js';

export type {
  ConsoleLoggerOptions,
  LogContext,
  LogEntry,
  Logger,
  MetricEntry,
  MetricLabels,
  MetricName,
  MetricsCollector,
  Observability,
} from './observability/index.js';

// Session
export { SessionManager, SessionState } from './session/index.js';

// Models
export { DataRecord } from './models/record.js';
export type { RecordContext, RecordScope, RecordSchema, DataRecordInit } from './models/record.js';
export { Foundset } from './models/foundset.js';
export type { FoundsetPage, FoundsetOptions, PageLoader } from './models/foundset.js';

// Field coercion
export { COERCION_TABLE, fromWire, toWire, parseFieldKey, lookupField } from './schema/coercion.js';
export type { FieldCodec } from './schema/coercion.js';
export { DEFAULT_DATE_FORMATS, parseWithPattern, formatWithPattern } from './schema/date-format.js';

// Parsing
export { parseEnvelope, parseRecords, parseScriptResults, buildRecord } from './parser/index.js';
export type { ParseContext, Envelope, RecordData } from './parser/index.js';

// Client
export {
  DataApiClient,
  NO_SERVICE_CODE,
  createClient,
  createClientFromEnv,
} from './client/index.js';
export { Deadline } from './client/deadline.js';

export type { DataApiClientOptions } from './client/index.js';
