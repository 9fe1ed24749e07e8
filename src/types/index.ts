/**
 * Domain types shared across the client.
 *
 * @module types
 */

import type { Deadline } from '../client/deadline.js';

// ============================================================================
// Field values
// ============================================================================

/**
 * A field value as it travels over the wire.
 */
export type WireValue = string | number | null;

/**
 * Time of day (or duration) stored in a time field.
 * Hours may exceed 23; the server treats time fields as durations.
 */
export interface TimeOfDay {
  readonly kind: 'time';
  readonly hours: number;
  readonly minutes: number;
  readonly seconds: number;
}

/**
 * Reference to the contents of a container field.
 * The url points at the server's streaming endpoint.
 */
export interface ContainerRef {
  readonly kind: 'container';
  readonly url: string;
}

/**
 * A typed field value after conversion.
 *
 * Dates and timestamps are `Date` objects whose UTC components carry the
 * server's wall-clock value; the Data API has no notion of time zones.
 */
export type FieldValue = string | number | Date | TimeOfDay | ContainerRef | null;

/**
 * Creates a TimeOfDay value.
 */
export function timeOfDay(hours: number, minutes = 0, seconds = 0): TimeOfDay {
  return { kind: 'time', hours, minutes, seconds };
}

/**
 * Creates a ContainerRef value.
 */
export function containerRef(url: string): ContainerRef {
  return { kind: 'container', url };
}

export function isTimeOfDay(value: unknown): value is TimeOfDay {
  return typeof value === 'object' && value !== null && 'kind' in value && value.kind === 'time';
}

export function isContainerRef(value: unknown): value is ContainerRef {
  return typeof value === 'object' && value !== null && 'kind' in value && value.kind === 'container';
}

// ============================================================================
// Metadata
// ============================================================================

/**
 * How a field gets its value.
 */
export type FieldKind = 'normal' | 'calculation' | 'summary';

/**
 * The data type a field (or calculation) produces.
 */
export type FieldResultType = 'text' | 'number' | 'date' | 'time' | 'timeStamp' | 'container';

/**
 * Per-field descriptor from layout metadata.
 */
export interface FieldMetadata {
  readonly name: string;
  readonly type: FieldKind;
  readonly result: FieldResultType;
  /** Number of repetitions defined for the field */
  readonly maxRepeat: number;
  /** Global (session-scoped) storage */
  readonly global: boolean;
}

/**
 * Field metadata of a layout and of each portal on it.
 */
export interface LayoutMetadata {
  readonly name: string;
  readonly fields: ReadonlyMap<string, FieldMetadata>;
  /** Keyed by portal object name; field names carry the related table prefix */
  readonly portals: ReadonlyMap<string, ReadonlyMap<string, FieldMetadata>>;
}

/**
 * Date, time and timestamp patterns used by the server.
 */
export interface DateFormats {
  readonly date: string;
  readonly time: string;
  readonly timeStamp: string;
}

/**
 * Server product information.
 */
export interface ProductInfo {
  readonly name: string;
  readonly version: string;
  readonly buildDate: string;
  readonly formats: DateFormats;
}

/**
 * Entry of the hosted database list.
 */
export interface DatabaseInfo {
  readonly name: string;
}

/**
 * Entry of a layout or script listing. Folders carry their children.
 */
export interface CatalogEntry {
  readonly name: string;
  readonly isFolder: boolean;
  readonly children: readonly CatalogEntry[];
}

// ============================================================================
// Request options
// ============================================================================

/**
 * A script run as part of a request, with an optional parameter.
 */
export type ScriptCall = readonly [name: string, param?: string];

/**
 * Scripts run around a record request.
 */
export interface ScriptHooks {
  /** Runs before the request is processed */
  prerequest?: ScriptCall;
  /** Runs before the found set is sorted */
  presort?: ScriptCall;
  /** Runs after the request */
  after?: ScriptCall;
}

/**
 * Error code and result of one script run.
 */
export interface ScriptOutcome {
  readonly error: number;
  readonly result?: string;
}

/**
 * Script outcomes reported by the last response.
 */
export interface ScriptResults {
  prerequest?: ScriptOutcome;
  presort?: ScriptOutcome;
  after?: ScriptOutcome;
}

/**
 * Portal rows to include in a record response.
 */
export interface PortalRequest {
  /** Portal object name (or related table occurrence name) */
  name: string;
  /** 1-based offset of the first row. Default: 1 */
  offset?: number;
  /** Maximum rows. Default: 50 */
  limit?: number;
}

/**
 * Sort order for one field.
 */
export interface SortSpec {
  fieldName: string;
  /** "ascend", "descend" or the name of a value list */
  sortOrder?: 'ascend' | 'descend' | (string & {});
}

/**
 * One find request: field criteria joined by AND.
 * Several requests in a query are joined by OR; `omit` turns a request into
 * an exclusion. `_omit` is accepted as an alias.
 */
export interface FindRequest {
  [field: string]: string | number | boolean | undefined;
  omit?: boolean | 'true' | 'false';
  _omit?: boolean | 'true' | 'false';
}

/**
 * Field values keyed by field name, as passed to write operations.
 */
export type FieldInput = Record<string, FieldValue>;

/**
 * Portal rows written together with a record, keyed by portal name.
 * Rows carrying a recordId (and optionally modId) edit that row; rows without
 * one create a related record.
 */
export type PortalInput = Record<string, FieldInput[]>;

// ============================================================================
// Operation options
// ============================================================================

export interface CallOptions {
  /** Time allowed for the whole operation in milliseconds. Default: the configured timeout */
  timeout?: number;
  /** Deadline shared with other operations; takes precedence over `timeout` */
  deadline?: Deadline;
}

export interface LayoutCallOptions extends CallOptions {
  /** Layout to use instead of the configured one */
  layout?: string;
}

export interface GetRecordOptions extends LayoutCallOptions {
  portals?: PortalRequest[];
  /** Layout whose fields are returned, when different from the request layout */
  responseLayout?: string;
  scripts?: ScriptHooks;
}

export interface GetRecordsOptions extends GetRecordOptions {
  /** 1-based offset of the first record. Default: 1 */
  offset?: number;
  /** Maximum number of records the foundset yields. Default: all */
  limit?: number;
  sort?: SortSpec[];
  /** Records fetched per page. Default: the configured page size */
  pageSize?: number;
}

export type FindOptions = GetRecordsOptions;

export interface CreateRecordOptions extends LayoutCallOptions {
  portalData?: PortalInput;
  scripts?: ScriptHooks;
}

export interface EditRecordOptions extends CreateRecordOptions {
  /** Modification id the edit is based on; the service rejects a stale one */
  modId?: number;
}

export interface DeleteRecordOptions extends LayoutCallOptions {
  scripts?: ScriptHooks;
}

export interface UploadContainerOptions extends LayoutCallOptions {
  /** Field repetition. Default: 1 */
  repetition?: number;
  /** File name reported to the server. Default: "upload" */
  filename?: string;
  contentType?: string;
}

/**
 * Identity of a newly created record.
 */
export interface CreatedRecord {
  readonly recordId: number;
  readonly modId: number;
}

/**
 * Result of a standalone script call.
 */
export interface ScriptCallResult {
  readonly scriptError: number;
  readonly scriptResult?: string;
}
