/**
 * Data API client.
 *
 * One method per logical operation. Every call except login needs a valid
 * session; the token is attached as a bearer header and a rejected token
 * drops the session so the next call fails fast until the caller logs in
 * again. No call is retried.
 *
 * @module client
 */

import { Blob } from 'node:buffer';
import { FormData } from 'undici';
import { bearerAuthHeader, type DataApiCredentials } from '../auth/index.js';
import { createConfigFromEnv, type DataApiConfig } from '../config.js';
import {
  ParseError,
  ServiceCode,
  ServiceError,
  TokenExpiredError,
  isDataApiError,
} from '../errors.js';
import { Foundset, type FoundsetPage, type PageLoader } from '../models/foundset.js';
import { DataRecord, type RecordContext } from '../models/record.js';
import {
  createNoopObservability,
  createObservabilityFromEnv,
  type Observability,
} from '../observability/index.js';
import {
  createResponseSchema,
  editResponseSchema,
  parseRecords,
  parseResponse,
  parseScriptResults,
  scriptCallResponseSchema,
  type ParseContext,
} from '../parser/index.js';
import { lookupField, toWire } from '../schema/coercion.js';
import { DEFAULT_DATE_FORMATS } from '../schema/date-format.js';
import {
  databasesResponseSchema,
  layoutMetadataResponseSchema,
  layoutsResponseSchema,
  productInfoResponseSchema,
  scriptsResponseSchema,
  toCatalog,
  toDatabaseList,
  toLayoutMetadata,
  toProductInfo,
} from '../schema/metadata.js';
import { SessionManager, SessionState } from '../session/index.js';
import { createTransport, type HttpTransport } from '../transport/index.js';
import type {
  CallOptions,
  CatalogEntry,
  CreateRecordOptions,
  CreatedRecord,
  DatabaseInfo,
  DateFormats,
  DeleteRecordOptions,
  EditRecordOptions,
  FieldInput,
  FieldMetadata,
  FindOptions,
  FindRequest,
  GetRecordOptions,
  GetRecordsOptions,
  LayoutCallOptions,
  LayoutMetadata,
  PortalInput,
  ProductInfo,
  ScriptCallResult,
  ScriptResults,
  UploadContainerOptions,
  WireValue,
} from '../types/index.js';
import type { Deadline } from './deadline.js';
import { ApiExecutor, type ApiRequest, type ApiResponse } from './executor.js';
import { DataApiPaths } from './paths.js';
import {
  compact,
  portalBodyParams,
  portalQueryParams,
  scriptParams,
  sortQueryParam,
} from './params.js';

/**
 * Collaborators a client can be given instead of the defaults.
 */
export interface DataApiClientOptions {
  /** Default: undici fetch */
  transport?: HttpTransport;
  /** Default: no-op logger and metrics */
  observability?: Observability;
}

/**
 * Last error code when the failure carried no service code
 * (timeouts, network and parse failures).
 */
export const NO_SERVICE_CODE = -1;

function encodeFields(
  data: FieldInput,
  fields: ReadonlyMap<string, FieldMetadata> | undefined,
  formats: DateFormats
): Record<string, WireValue> {
  const encoded: Record<string, WireValue> = {};
  for (const [name, value] of Object.entries(data)) {
    encoded[name] = toWire(fields ? lookupField(fields, name) : undefined, value, formats);
  }
  return encoded;
}

function findCriteria(request: FindRequest): Record<string, string> {
  const criteria: Record<string, string> = {};
  for (const [key, value] of Object.entries(request)) {
    if (value === undefined) continue;
    if (key === 'omit' || key === '_omit') {
      if (value === true || value === 'true') {
        criteria.omit = 'true';
      }
      continue;
    }
    criteria[key] = String(value);
  }
  return criteria;
}

function emptyPage(): FoundsetPage {
  return { records: [], foundCount: 0, returnedCount: 0 };
}

/**
 * Client for one database.
 */
export class DataApiClient implements RecordContext {
  readonly config: DataApiConfig;
  readonly session: SessionManager;
  private readonly executor: ApiExecutor;
  private readonly paths: DataApiPaths;
  private readonly observability: Observability;
  private readonly layoutCache = new Map<string, Promise<LayoutMetadata>>();
  private productInfoCache?: Promise<ProductInfo>;
  private lastErrorCode = 0;
  private lastScripts: ScriptResults = {};

  constructor(config: DataApiConfig, options: DataApiClientOptions = {}) {
    this.config = { ...config };
    this.observability = options.observability ?? createNoopObservability();
    this.executor = new ApiExecutor(
      this.config,
      options.transport ?? createTransport(),
      this.observability
    );
    this.paths = new DataApiPaths(config.database);
    this.session = new SessionManager(
      this.executor,
      this.paths,
      config.credentials,
      config.dataSources,
      this.observability
    );
  }

  // ==========================================================================
  // Session
  // ==========================================================================

  get sessionState(): SessionState {
    return this.session.state;
  }

  /**
   * Service code of the most recent response: 0 after success,
   * {@link NO_SERVICE_CODE} when the failure carried none.
   */
  get lastError(): number {
    return this.lastErrorCode;
  }

  /**
   * Script outcomes reported by the most recent successful response.
   */
  get lastScriptResult(): ScriptResults {
    return this.lastScripts;
  }

  /**
   * Opens a session, replacing any session already open.
   */
  async login(credentials?: DataApiCredentials, options: CallOptions = {}): Promise<string> {
    return this.session.login(credentials, options);
  }

  /**
   * Closes the session. Local state is cleared even if the server call fails.
   */
  async logout(options: CallOptions = {}): Promise<void> {
    await this.session.logout(options);
  }

  // ==========================================================================
  // Records
  // ==========================================================================

  /**
   * Fetches one record, with its portal rows.
   */
  async getRecord(recordId: number, options: GetRecordOptions = {}): Promise<DataRecord> {
    const layout = this.layoutOf(options);
    const deadline = this.startDeadline(options);
    const ctx = await this.parseContext(layout, options.responseLayout, deadline);
    const reply = await this.call({
      operation: 'getRecord',
      method: 'GET',
      path: this.paths.record(layout, recordId),
      query: {
        ...portalQueryParams(options.portals),
        'layout.response': options.responseLayout,
        ...scriptParams(options.scripts),
      },
      deadline,
    });

    const page = parseRecords(reply.response, ctx);
    if (page.records.length === 0) {
      throw new ParseError(`Record ${recordId} response carried no record`);
    }
    return page.records[0];
  }

  /**
   * Lists the records of a layout. Pages beyond the first are fetched as
   * the foundset is read. An empty layout yields an empty foundset.
   */
  async getRecords(options: GetRecordsOptions = {}): Promise<Foundset> {
    const layout = this.layoutOf(options);
    const deadline = this.startDeadline(options);
    const ctx = await this.parseContext(layout, options.responseLayout, deadline);

    return this.paginate(options, deadline, async (offset, limit, first, pageDeadline) => {
      const reply = await this.query({
        operation: 'getRecords',
        method: 'GET',
        path: this.paths.records(layout),
        query: {
          _offset: offset,
          _limit: limit,
          _sort: sortQueryParam(options.sort),
          ...portalQueryParams(options.portals),
          'layout.response': options.responseLayout,
          ...scriptParams(first ? options.scripts : undefined),
        },
        deadline: pageDeadline,
      });
      return reply ? parseRecords(reply.response, ctx) : emptyPage();
    });
  }

  /**
   * Runs a find. Requests are joined by OR, criteria within a request by
   * AND; a request with `omit` (or `_omit`) excludes its matches.
   *
   * No matches yields an empty foundset. An empty or invalid query fails
   * with the service error.
   */
  async find(query: FindRequest[], options: FindOptions = {}): Promise<Foundset> {
    const layout = this.layoutOf(options);
    const deadline = this.startDeadline(options);
    const ctx = await this.parseContext(layout, options.responseLayout, deadline);
    const criteria = query.map(findCriteria);

    return this.paginate(options, deadline, async (offset, limit, first, pageDeadline) => {
      const reply = await this.query({
        operation: 'find',
        method: 'POST',
        path: this.paths.find(layout),
        body: compact<unknown>({
          query: criteria,
          sort: options.sort && options.sort.length > 0 ? options.sort : undefined,
          offset: String(offset),
          limit: String(limit),
          ...portalBodyParams(options.portals),
          'layout.response': options.responseLayout,
          ...scriptParams(first ? options.scripts : undefined),
        }),
        deadline: pageDeadline,
      });
      return reply ? parseRecords(reply.response, ctx) : emptyPage();
    });
  }

  /**
   * Creates a record and returns its id and modification id.
   */
  async createRecord(fieldData: FieldInput, options: CreateRecordOptions = {}): Promise<CreatedRecord> {
    const layout = this.layoutOf(options);
    const deadline = this.startDeadline(options);
    const encoded = await this.encodeWrite(layout, fieldData, options.portalData, deadline);
    const reply = await this.call({
      operation: 'createRecord',
      method: 'POST',
      path: this.paths.records(layout),
      body: compact<unknown>({
        fieldData: encoded.fieldData,
        portalData: encoded.portalData,
        ...scriptParams(options.scripts),
      }),
      deadline,
    });
    return parseResponse(createResponseSchema, reply.response, 'create');
  }

  /**
   * Creates an unsaved record on a layout; its first commit creates it on
   * the server.
   */
  newRecord(fieldData: FieldInput, layout: string = this.config.layout): DataRecord {
    return new DataRecord({
      context: this,
      scope: { kind: 'layout', layout },
      recordId: null,
      modId: null,
      fields: new Map(Object.entries(fieldData)),
    });
  }

  /**
   * Edits a record and returns its new modification id.
   *
   * @throws {RecordConflictError} If `modId` is given and no longer current
   */
  async editRecord(
    recordId: number,
    fieldData: FieldInput,
    options: EditRecordOptions = {}
  ): Promise<number> {
    const layout = this.layoutOf(options);
    const deadline = this.startDeadline(options);
    const encoded = await this.encodeWrite(layout, fieldData, options.portalData, deadline);
    const reply = await this.call({
      operation: 'editRecord',
      method: 'PATCH',
      path: this.paths.record(layout, recordId),
      body: compact<unknown>({
        fieldData: encoded.fieldData,
        modId: options.modId === undefined ? undefined : String(options.modId),
        portalData: encoded.portalData,
        ...scriptParams(options.scripts),
      }),
      deadline,
    });
    return parseResponse(editResponseSchema, reply.response, 'edit').modId;
  }

  async deleteRecord(recordId: number, options: DeleteRecordOptions = {}): Promise<void> {
    const layout = this.layoutOf(options);
    await this.call({
      operation: 'deleteRecord',
      method: 'DELETE',
      path: this.paths.record(layout, recordId),
      query: scriptParams(options.scripts),
      deadline: this.startDeadline(options),
    });
  }

  /**
   * Uploads a file into a container field and returns the record's new
   * modification id.
   */
  async uploadContainer(
    recordId: number,
    field: string,
    data: Blob | Uint8Array,
    options: UploadContainerOptions = {}
  ): Promise<number> {
    const layout = this.layoutOf(options);
    const blob =
      data instanceof Blob
        ? data
        : new Blob([data], { type: options.contentType ?? 'application/octet-stream' });
    const form = new FormData();
    form.append('upload', blob, options.filename ?? 'upload');

    const reply = await this.call({
      operation: 'uploadContainer',
      method: 'POST',
      path: this.paths.container(layout, recordId, field, options.repetition ?? 1),
      form,
      deadline: this.startDeadline(options),
    });
    return parseResponse(editResponseSchema, reply.response, 'upload').modId;
  }

  // ==========================================================================
  // Scripts and globals
  // ==========================================================================

  /**
   * Runs a script on a layout.
   */
  async callScript(
    name: string,
    param?: string,
    options: LayoutCallOptions = {}
  ): Promise<ScriptCallResult> {
    const layout = this.layoutOf(options);
    const reply = await this.call({
      operation: 'callScript',
      method: 'POST',
      path: this.paths.script(layout, name),
      body: param === undefined ? {} : { 'script.param': param },
      deadline: this.startDeadline(options),
    });
    return parseResponse(scriptCallResponseSchema, reply.response, 'script');
  }

  /**
   * Sets global fields for the session. Names must be fully qualified
   * ("Table::field").
   */
  async setGlobals(globals: FieldInput, options: CallOptions = {}): Promise<void> {
    const deadline = this.startDeadline(options);
    const formats = await this.dateFormats(deadline);
    await this.call({
      operation: 'setGlobals',
      method: 'PATCH',
      path: this.paths.globals(),
      body: { globalFields: encodeFields(globals, undefined, formats) },
      deadline,
    });
  }

  // ==========================================================================
  // Metadata
  // ==========================================================================

  /**
   * Field and portal metadata of a layout, fetched once per layout.
   */
  async getLayoutMetadata(
    layout: string = this.config.layout,
    options: CallOptions = {}
  ): Promise<LayoutMetadata> {
    return this.layoutMetadata(layout, this.startDeadline(options));
  }

  /**
   * Product name, version and date formats of the server, fetched once.
   */
  async productInfo(options: CallOptions = {}): Promise<ProductInfo> {
    return this.cachedProductInfo(this.startDeadline(options));
  }

  async listDatabases(options: CallOptions = {}): Promise<DatabaseInfo[]> {
    const reply = await this.call({
      operation: 'listDatabases',
      method: 'GET',
      path: this.paths.databases(),
      deadline: this.startDeadline(options),
    });
    return toDatabaseList(parseResponse(databasesResponseSchema, reply.response, 'database list'));
  }

  async listLayouts(options: CallOptions = {}): Promise<CatalogEntry[]> {
    const reply = await this.call({
      operation: 'listLayouts',
      method: 'GET',
      path: this.paths.layouts(),
      deadline: this.startDeadline(options),
    });
    return toCatalog(parseResponse(layoutsResponseSchema, reply.response, 'layout list').layouts);
  }

  async listScripts(options: CallOptions = {}): Promise<CatalogEntry[]> {
    const reply = await this.call({
      operation: 'listScripts',
      method: 'GET',
      path: this.paths.scripts(),
      deadline: this.startDeadline(options),
    });
    return toCatalog(parseResponse(scriptsResponseSchema, reply.response, 'script list').scripts);
  }

  /**
   * Forgets cached layout metadata and product info.
   */
  clearMetadataCache(): void {
    this.layoutCache.clear();
    this.productInfoCache = undefined;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Deadline for an operation: `options.deadline`, or one of
   * `options.timeout` (default: the configured timeout) from now. Pass it
   * as `deadline` to bound several operations by one timeout.
   */
  startDeadline(options: CallOptions = {}): Deadline {
    return this.executor.startDeadline(options);
  }

  private layoutOf(options: LayoutCallOptions): string {
    return options.layout ?? this.config.layout;
  }

  /**
   * Sends an authenticated request. Fails with NotAuthenticatedError before
   * anything is sent when no session is open.
   */
  private async call(request: Omit<ApiRequest, 'authorization'>): Promise<ApiResponse> {
    const token = this.session.currentToken();
    try {
      const reply = await this.executor.execute({
        ...request,
        authorization: bearerAuthHeader(token),
      });
      this.lastErrorCode = ServiceCode.Success;
      this.lastScripts = parseScriptResults(reply.response);
      return reply;
    } catch (error) {
      this.lastErrorCode =
        isDataApiError(error) && error.serviceCode !== undefined ? error.serviceCode : NO_SERVICE_CODE;
      if (error instanceof TokenExpiredError) {
        this.session.invalidate(error.message);
      }
      throw error;
    }
  }

  /**
   * Sends a record query; resolves to undefined when nothing matches.
   */
  private async query(request: Omit<ApiRequest, 'authorization'>): Promise<ApiResponse | undefined> {
    try {
      return await this.call(request);
    } catch (error) {
      if (error instanceof ServiceError && error.serviceCode === ServiceCode.NoRecordsMatch) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * The first page is fetched within the operation's deadline; later pages
   * are read on demand, each with a deadline of its own.
   */
  private async paginate(
    options: GetRecordsOptions,
    deadline: Deadline,
    fetchPage: (offset: number, limit: number, first: boolean, deadline: Deadline) => Promise<FoundsetPage>
  ): Promise<Foundset> {
    if (options.limit === 0) {
      return Foundset.empty();
    }
    const offset = options.offset ?? 1;
    const pageSize = options.pageSize ?? this.config.pageSize;
    const loader: PageLoader = (pageOffset, limit) =>
      fetchPage(pageOffset, limit, false, this.startDeadline(options));

    const first = await fetchPage(offset, Math.min(pageSize, options.limit ?? pageSize), true, deadline);
    return new Foundset(first, { offset, limit: options.limit, pageSize, loader });
  }

  /**
   * Cached layout metadata. Waiting on a lookup another operation started
   * is still bounded by this operation's deadline.
   */
  private async layoutMetadata(layout: string, deadline: Deadline): Promise<LayoutMetadata> {
    const cached = this.layoutCache.get(layout);
    if (cached) {
      return deadline.run(() => cached);
    }
    const pending = this.fetchLayoutMetadata(layout, deadline).catch((error: unknown) => {
      this.layoutCache.delete(layout);
      throw error;
    });
    this.layoutCache.set(layout, pending);
    return pending;
  }

  private async cachedProductInfo(deadline: Deadline): Promise<ProductInfo> {
    const cached = this.productInfoCache;
    if (cached) {
      return deadline.run(() => cached);
    }
    const pending = this.fetchProductInfo(deadline).catch((error: unknown) => {
      this.productInfoCache = undefined;
      throw error;
    });
    this.productInfoCache = pending;
    return pending;
  }

  private async dateFormats(deadline: Deadline): Promise<DateFormats> {
    if (!this.config.coerceFields) {
      return DEFAULT_DATE_FORMATS;
    }
    return (await this.cachedProductInfo(deadline)).formats;
  }

  private async parseContext(
    layout: string,
    responseLayout: string | undefined,
    deadline: Deadline
  ): Promise<ParseContext> {
    if (!this.config.coerceFields) {
      return { layout, formats: DEFAULT_DATE_FORMATS, context: this };
    }
    const metadata = await this.layoutMetadata(responseLayout ?? layout, deadline);
    const formats = await this.dateFormats(deadline);
    return { layout, metadata, formats, context: this };
  }

  private async encodeWrite(
    layout: string,
    fieldData: FieldInput,
    portalData: PortalInput | undefined,
    deadline: Deadline
  ): Promise<{ fieldData: Record<string, WireValue>; portalData?: Record<string, Array<Record<string, WireValue>>> }> {
    const metadata = this.config.coerceFields
      ? await this.layoutMetadata(layout, deadline)
      : undefined;
    const formats = await this.dateFormats(deadline);

    const encoded: Record<string, Array<Record<string, WireValue>>> = {};
    for (const [portal, rows] of Object.entries(portalData ?? {})) {
      const fields = metadata?.portals.get(portal);
      encoded[portal] = rows.map((row) => encodeFields(row, fields, formats));
    }
    return {
      fieldData: encodeFields(fieldData, metadata?.fields, formats),
      portalData: portalData ? encoded : undefined,
    };
  }

  private async fetchLayoutMetadata(layout: string, deadline: Deadline): Promise<LayoutMetadata> {
    const reply = await this.call({
      operation: 'getLayoutMetadata',
      method: 'GET',
      path: this.paths.layout(layout),
      deadline,
    });
    return toLayoutMetadata(
      layout,
      parseResponse(layoutMetadataResponseSchema, reply.response, 'layout metadata')
    );
  }

  private async fetchProductInfo(deadline: Deadline): Promise<ProductInfo> {
    const reply = await this.call({
      operation: 'productInfo',
      method: 'GET',
      path: this.paths.productInfo(),
      deadline,
    });
    return toProductInfo(parseResponse(productInfoResponseSchema, reply.response, 'product info'));
  }
}

/**
 * Creates a client.
 */
export function createClient(config: DataApiConfig, options?: DataApiClientOptions): DataApiClient {
  return new DataApiClient(config, options);
}

/**
 * Creates a client configured from `FM_DATA_*` environment variables.
 * `FM_DATA_LOG_LEVEL` turns on console logging unless `options` brings
 * its own observability.
 *
 * @throws {ConfigurationError} If required variables are missing or invalid
 */
export function createClientFromEnv(
  options: DataApiClientOptions = {},
  env: NodeJS.ProcessEnv = process.env
): DataApiClient {
  return new DataApiClient(createConfigFromEnv(env).build(), {
    ...options,
    observability: options.observability ?? createObservabilityFromEnv(env),
  });
}
