/**
 * In-process Data API server for tests.
 *
 * Implements the transport interface directly, so a client wired to it runs
 * its real request building and parsing against a small simulated database:
 * sessions, layouts with portals, records with modification ids, finds with
 * omit requests, sorting, pagination, scripts, globals and container uploads.
 */

import { ServiceCode } from '../errors.js';
import type { HttpMethod, HttpTransport, TransportRequest, TransportResponse } from '../transport/index.js';
import type { FieldKind, FieldResultType, WireValue } from '../types/index.js';
import { envelope, sleep } from './helpers.js';

export interface InMemoryFieldDefinition {
  name: string;
  /** Default: normal */
  type?: FieldKind;
  /** Default: text */
  result?: FieldResultType;
  /** Default: 1 */
  maxRepeat?: number;
  global?: boolean;
}

export interface InMemoryPortalDefinition {
  /** Related table occurrence; row fields are named "{table}::{field}" */
  table: string;
  fields: InMemoryFieldDefinition[];
}

export interface InMemoryLayoutDefinition {
  name: string;
  /** Default: the layout name */
  table?: string;
  fields: InMemoryFieldDefinition[];
  /** Keyed by portal object name */
  portals?: Record<string, InMemoryPortalDefinition>;
}

export interface InMemoryDataApiOptions {
  /** Default: "Contacts" */
  database?: string;
  /** Username to password. Default: admin / test-secret */
  accounts?: Record<string, string>;
  layouts?: InMemoryLayoutDefinition[];
  /** Folder name to the layouts listed inside it */
  layoutFolders?: Record<string, string[]>;
  /** Script name to implementation; the return value is the script result */
  scripts?: Record<string, (param: string | undefined) => string | undefined>;
  dateFormat?: string;
  timeFormat?: string;
  timeStampFormat?: string;
  /** Milliseconds before every response */
  latency?: number;
}

/**
 * A request as received, with the path below `/fmi/data/{version}`.
 */
export interface RecordedRequest {
  method: HttpMethod;
  path: string;
  query: Record<string, string>;
  body?: unknown;
  authorization?: string;
}

/**
 * A portal row as stored by the server.
 */
export interface StoredPortalRow {
  recordId: number;
  modId: number;
  fields: Record<string, WireValue>;
}

/**
 * Copy of a stored record, as returned by {@link InMemoryDataApi.getStoredRecord}.
 */
export interface StoredRecordSnapshot {
  recordId: number;
  modId: number;
  fieldData: Record<string, WireValue>;
  portals: Record<string, StoredPortalRow[]>;
}

interface StoredRecord {
  recordId: number;
  modId: number;
  fieldData: Record<string, WireValue>;
  portals: Map<string, StoredPortalRow[]>;
}

interface RouteResult {
  response: Record<string, unknown>;
  headers?: Record<string, string>;
}

class ServiceFailure extends Error {
  constructor(
    readonly code: number,
    message: string,
    readonly status = 500
  ) {
    super(message);
  }
}

const DEFAULT_PORTAL_LIMIT = 50;
const DEFAULT_RECORD_LIMIT = 100;
const SCRIPT_MISSING = 104;
const FIELD_NOT_MODIFIABLE = 201;
const FILE_MISSING = 802;

const missingField = (name: string): ServiceFailure =>
  new ServiceFailure(ServiceCode.FieldMissing, `Field ${name} is missing`);
const invalidToken = (): ServiceFailure =>
  new ServiceFailure(ServiceCode.InvalidToken, 'Invalid FileMaker Data API token (*)', 401);

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asWireValue(value: unknown): WireValue {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string' || typeof value === 'number') return value;
  return String(value);
}

function readInt(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === '') return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : fallback;
}

function numeric(value: WireValue | undefined): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return undefined;
}

function compareValues(a: WireValue | undefined, b: WireValue | undefined): number {
  const x = numeric(a);
  const y = numeric(b);
  if (x !== undefined && y !== undefined) return x - y;
  return String(a ?? '').localeCompare(String(b ?? ''));
}

/**
 * Find criterion semantics: "==" exact, "=" empty, "*" non-empty, comparison
 * operators, "a...b" ranges; otherwise every word of the criterion must start
 * a word of the value, case-insensitively.
 */
function matchesCriterion(value: WireValue | undefined, criterion: string): boolean {
  const text = value === null || value === undefined ? '' : String(value);
  if (criterion === '*') return text !== '';
  if (criterion === '=') return text === '';
  if (criterion.startsWith('==')) return text === criterion.slice(2);

  const range = /^(.+)\.\.\.(.+)$/.exec(criterion);
  if (range) {
    return compareValues(text, range[1]) >= 0 && compareValues(text, range[2]) <= 0;
  }
  const comparison = /^(>=|<=|>|<)(.+)$/.exec(criterion);
  if (comparison) {
    const diff = compareValues(text, comparison[2]);
    switch (comparison[1]) {
      case '>=':
        return diff >= 0;
      case '<=':
        return diff <= 0;
      case '>':
        return diff > 0;
      default:
        return diff < 0;
    }
  }

  const words = text.toLowerCase().split(/\s+/);
  return criterion
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word !== '')
    .every((word) => words.some((candidate) => candidate.startsWith(word)));
}

/**
 * Simulated Data API server implementing {@link HttpTransport}.
 */
export class InMemoryDataApi implements HttpTransport {
  readonly database: string;
  private readonly accounts: Record<string, string>;
  private readonly layouts = new Map<string, InMemoryLayoutDefinition>();
  private readonly layoutFolders: Record<string, string[]>;
  private readonly scripts: Record<string, (param: string | undefined) => string | undefined>;
  private readonly formats: { dateFormat: string; timeFormat: string; timeStampFormat: string };
  private readonly records = new Map<string, StoredRecord[]>();
  private readonly tokens = new Set<string>();
  private readonly globals = new Map<string, WireValue>();
  private readonly requests: RecordedRequest[] = [];
  private latency: number;
  private nextRecordId = 1;
  private nextToken = 1;

  constructor(options: InMemoryDataApiOptions = {}) {
    this.database = options.database ?? 'Contacts';
    this.accounts = options.accounts ?? { admin: 'test-secret' };
    for (const layout of options.layouts ?? []) {
      this.layouts.set(layout.name, layout);
      this.records.set(layout.name, []);
    }
    this.layoutFolders = options.layoutFolders ?? {};
    this.scripts = options.scripts ?? {};
    this.formats = {
      dateFormat: options.dateFormat ?? 'MM/dd/yyyy',
      timeFormat: options.timeFormat ?? 'HH:mm:ss',
      timeStampFormat: options.timeStampFormat ?? 'MM/dd/yyyy HH:mm:ss',
    };
    this.latency = options.latency ?? 0;
  }

  // ==========================================================================
  // Test setup and inspection
  // ==========================================================================

  /**
   * Stores a record directly and returns its id.
   */
  addRecord(
    layout: string,
    fieldData: Record<string, WireValue>,
    portals: Record<string, Array<Record<string, WireValue>>> = {}
  ): number {
    const definition = this.layoutOrFail(layout);
    const record: StoredRecord = {
      recordId: this.nextRecordId++,
      modId: 0,
      fieldData: this.blankFields(definition.fields),
      portals: new Map(),
    };
    Object.assign(record.fieldData, fieldData);
    for (const name of Object.keys(definition.portals ?? {})) {
      record.portals.set(
        name,
        (portals[name] ?? []).map((fields) => ({ recordId: this.nextRecordId++, modId: 0, fields: { ...fields } }))
      );
    }
    this.recordsOf(layout).push(record);
    return record.recordId;
  }

  /**
   * Changes a stored record the way another client would, bumping its
   * modification id.
   */
  updateRecord(layout: string, recordId: number, fieldData: Record<string, WireValue>): void {
    const record = this.findRecord(layout, recordId);
    Object.assign(record.fieldData, fieldData);
    record.modId += 1;
  }

  /**
   * Stored state of a record, or undefined once deleted.
   */
  getStoredRecord(layout: string, recordId: number): StoredRecordSnapshot | undefined {
    const record = this.recordsOf(layout).find((r) => r.recordId === recordId);
    if (!record) return undefined;
    return {
      recordId: record.recordId,
      modId: record.modId,
      fieldData: { ...record.fieldData },
      portals: Object.fromEntries(
        [...record.portals].map(([name, rows]) => [name, rows.map((row) => ({ ...row, fields: { ...row.fields } }))])
      ),
    };
  }

  recordCount(layout: string): number {
    return this.recordsOf(layout).length;
  }

  getGlobal(name: string): WireValue | undefined {
    return this.globals.get(name);
  }

  /**
   * Invalidates every open session, as the server does after idle timeout.
   */
  expireTokens(): void {
    this.tokens.clear();
  }

  get openSessions(): number {
    return this.tokens.size;
  }

  setLatency(ms: number): void {
    this.latency = ms;
  }

  getRequests(): RecordedRequest[] {
    return [...this.requests];
  }

  clearRequests(): void {
    this.requests.length = 0;
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  async send(request: TransportRequest): Promise<TransportResponse> {
    if (this.latency > 0) {
      await sleep(this.latency, request.signal);
    }

    const url = new URL(request.url);
    const prefix = /^\/fmi\/data\/v(?:\d+|Latest)/.exec(url.pathname);
    const path = prefix ? url.pathname.slice(prefix[0].length) : url.pathname;
    const query = Object.fromEntries(url.searchParams);
    const body: unknown = typeof request.body === 'string' ? JSON.parse(request.body) : undefined;
    this.requests.push({
      method: request.method,
      path,
      query,
      body,
      authorization: request.headers['Authorization'],
    });

    try {
      if (!prefix) {
        throw new ServiceFailure(3, 'Unsupported URL', 404);
      }
      const segments = path.split('/').filter((s) => s !== '').map(decodeURIComponent);
      const result = this.route(request, segments, query, body);
      return {
        status: 200,
        headers: { 'content-type': 'application/json', ...result.headers },
        body: JSON.stringify(envelope(result.response)),
      };
    } catch (error) {
      if (error instanceof ServiceFailure) {
        return {
          status: error.status,
          headers: { 'content-type': 'application/json' },
          body: JSON.stringify(envelope({}, error.code, error.message)),
        };
      }
      throw error;
    }
  }

  // ==========================================================================
  // Routing
  // ==========================================================================

  private route(
    request: TransportRequest,
    segments: string[],
    query: Record<string, string>,
    body: unknown
  ): RouteResult {
    const method = request.method;
    const [root, db, section, layout, kind, id, ...rest] = segments;

    if (root === 'productInfo' && segments.length === 1 && method === 'GET') {
      return { response: { productInfo: this.productInfo() } };
    }
    if (root !== 'databases') {
      throw new ServiceFailure(3, 'Unsupported URL', 404);
    }
    if (db === undefined && method === 'GET') {
      return { response: { databases: [{ name: this.database }] } };
    }
    if (db !== this.database) {
      throw new ServiceFailure(FILE_MISSING, 'Unable to open file');
    }

    if (section === 'sessions') {
      if (layout === undefined && method === 'POST') {
        return this.login(request.headers['Authorization']);
      }
      if (layout !== undefined && kind === undefined && method === 'DELETE') {
        return this.logout(layout);
      }
    }

    this.authenticate(request.headers['Authorization']);

    if (section === 'globals' && layout === undefined && method === 'PATCH') {
      return this.setGlobals(body);
    }
    if (section === 'scripts' && layout === undefined && method === 'GET') {
      return { response: { scripts: Object.keys(this.scripts).map((name) => ({ name, isFolder: false })) } };
    }
    if (section !== 'layouts') {
      throw new ServiceFailure(3, 'Unsupported URL', 404);
    }
    if (layout === undefined && method === 'GET') {
      return { response: { layouts: this.layoutCatalog() } };
    }
    if (layout === undefined) {
      throw new ServiceFailure(3, 'Unsupported URL', 404);
    }

    const definition = this.layoutOrFail(layout);
    const params = isObject(body) ? body : query;

    if (kind === undefined && method === 'GET') {
      return { response: this.layoutMetadata(definition) };
    }
    if (kind === '_find' && method === 'POST') {
      return this.withScripts(params, () => this.find(definition, body));
    }
    if (kind === 'script' && id !== undefined && method === 'POST') {
      return { response: this.runScriptEndpoint(id, params) };
    }
    if (kind !== 'records') {
      throw new ServiceFailure(3, 'Unsupported URL', 404);
    }

    if (id === undefined) {
      if (method === 'GET') return this.withScripts(params, () => this.listRecords(definition, query));
      if (method === 'POST') return this.withScripts(params, () => this.createRecord(definition, body));
      throw new ServiceFailure(3, 'Unsupported method', 405);
    }

    const recordId = readInt(id, -1);
    if (rest[0] === 'containers' && rest[1] !== undefined && method === 'POST') {
      return this.upload(definition, recordId, rest[1], request);
    }
    switch (method) {
      case 'GET':
        return this.withScripts(params, () => this.readRecord(definition, recordId, query));
      case 'PATCH':
        return this.withScripts(params, () => this.editRecord(definition, recordId, body));
      case 'DELETE':
        return this.withScripts(params, () => this.deleteRecord(definition, recordId));
      default:
        throw new ServiceFailure(3, 'Unsupported method', 405);
    }
  }

  // ==========================================================================
  // Sessions
  // ==========================================================================

  private login(authorization: string | undefined): RouteResult {
    const encoded = authorization?.startsWith('Basic ') ? authorization.slice(6) : '';
    const decoded = Buffer.from(encoded, 'base64').toString('utf8');
    const separator = decoded.indexOf(':');
    const username = decoded.slice(0, separator);
    const password = decoded.slice(separator + 1);
    if (separator < 0 || this.accounts[username] !== password) {
      throw new ServiceFailure(
        ServiceCode.InvalidCredentials,
        'Invalid user account and/or password; please try again',
        401
      );
    }
    const token = `token-${this.nextToken++}`;
    this.tokens.add(token);
    return { response: { token }, headers: { 'x-fm-data-access-token': token } };
  }

  private logout(token: string): RouteResult {
    if (!this.tokens.delete(token)) {
      throw invalidToken();
    }
    return { response: {} };
  }

  private authenticate(authorization: string | undefined): void {
    const token = authorization?.startsWith('Bearer ') ? authorization.slice(7) : undefined;
    if (token === undefined || !this.tokens.has(token)) {
      throw invalidToken();
    }
  }

  // ==========================================================================
  // Metadata
  // ==========================================================================

  private productInfo(): Record<string, string> {
    return {
      name: 'FileMaker Data API Engine',
      buildDate: '01/15/2024',
      version: '21.0.1',
      ...this.formats,
    };
  }

  private layoutCatalog(): Array<Record<string, unknown>> {
    const inFolder = new Set(Object.values(this.layoutFolders).flat());
    const entries: Array<Record<string, unknown>> = [...this.layouts.keys()]
      .filter((name) => !inFolder.has(name))
      .map((name) => ({ name, table: this.tableOf(name) }));
    for (const [folder, names] of Object.entries(this.layoutFolders)) {
      entries.push({
        name: folder,
        isFolder: true,
        folderLayoutNames: names.map((name) => ({ name, table: this.tableOf(name) })),
      });
    }
    return entries;
  }

  private layoutMetadata(definition: InMemoryLayoutDefinition): Record<string, unknown> {
    const describe = (field: InMemoryFieldDefinition): Record<string, unknown> => ({
      name: field.name,
      type: field.type ?? 'normal',
      displayType: 'editText',
      result: field.result ?? 'text',
      global: field.global ?? false,
      autoEnter: false,
      maxRepeat: field.maxRepeat ?? 1,
    });
    const portalMetaData: Record<string, unknown> = {};
    for (const [name, portal] of Object.entries(definition.portals ?? {})) {
      portalMetaData[name] = portal.fields.map(describe);
    }
    return {
      fieldMetaData: definition.fields.map(describe),
      portalMetaData,
      valueLists: [],
    };
  }

  // ==========================================================================
  // Records
  // ==========================================================================

  private listRecords(definition: InMemoryLayoutDefinition, query: Record<string, string>): RouteResult {
    const all = this.recordsOf(definition.name);
    const sort: unknown = query._sort ? JSON.parse(query._sort) : undefined;
    return this.page(
      definition,
      this.sorted(all, sort),
      all.length,
      readInt(query._offset, 1),
      readInt(query._limit, DEFAULT_RECORD_LIMIT),
      query,
      '_'
    );
  }

  private readRecord(
    definition: InMemoryLayoutDefinition,
    recordId: number,
    query: Record<string, string>
  ): RouteResult {
    const record = this.findRecord(definition.name, recordId);
    const total = this.recordsOf(definition.name).length;
    return {
      response: {
        data: [this.serialize(definition, record, query, '_')],
        dataInfo: this.dataInfo(definition, total, 1, 1),
      },
    };
  }

  private find(definition: InMemoryLayoutDefinition, body: unknown): RouteResult {
    if (!isObject(body) || !Array.isArray(body.query)) {
      throw new ServiceFailure(ServiceCode.FindCriteriaEmpty, 'Find criteria are empty');
    }
    const requests = body.query.filter(isObject);
    const all = this.recordsOf(definition.name);
    const hasCriteria = requests.some((request) =>
      Object.keys(request).some((key) => key !== 'omit' && request[key] !== '')
    );
    if (!hasCriteria) {
      throw new ServiceFailure(ServiceCode.FindCriteriaEmpty, 'Find criteria are empty');
    }

    let found: StoredRecord[] = [];
    for (const request of requests) {
      const omit = String(request.omit ?? 'false').toLowerCase() === 'true';
      const criteria = Object.entries(request).filter(([key]) => key !== 'omit');
      for (const [field] of criteria) {
        if (!this.hasField(definition, field)) throw missingField(field);
      }
      const matches = (record: StoredRecord): boolean =>
        criteria.every(([field, criterion]) =>
          matchesCriterion(this.fieldValue(definition, record, field), String(criterion))
        );
      if (omit) {
        found = found.filter((record) => !matches(record));
      } else {
        found = found.concat(all.filter((record) => matches(record) && !found.includes(record)));
      }
    }
    // keep creation order, as the server does for unsorted finds
    found = all.filter((record) => found.includes(record));

    if (found.length === 0) {
      throw new ServiceFailure(ServiceCode.NoRecordsMatch, 'No records match the request');
    }
    return this.page(
      definition,
      this.sorted(found, body.sort),
      all.length,
      readInt(body.offset, 1),
      readInt(body.limit, DEFAULT_RECORD_LIMIT),
      body,
      ''
    );
  }

  private createRecord(definition: InMemoryLayoutDefinition, body: unknown): RouteResult {
    const fieldData: Record<string, unknown> =
      isObject(body) && isObject(body.fieldData) ? body.fieldData : {};
    this.checkWritable(definition, fieldData);

    const record: StoredRecord = {
      recordId: this.nextRecordId++,
      modId: 0,
      fieldData: this.blankFields(definition.fields),
      portals: new Map(Object.keys(definition.portals ?? {}).map((name) => [name, []])),
    };
    for (const [name, value] of Object.entries(fieldData)) {
      record.fieldData[name] = asWireValue(value);
    }
    if (isObject(body) && isObject(body.portalData)) {
      this.writePortals(definition, record, body.portalData);
    }
    this.recordsOf(definition.name).push(record);
    return { response: { recordId: String(record.recordId), modId: String(record.modId) } };
  }

  private editRecord(definition: InMemoryLayoutDefinition, recordId: number, body: unknown): RouteResult {
    const record = this.findRecord(definition.name, recordId);
    const edit: Record<string, unknown> = isObject(body) ? body : {};
    if (edit.modId !== undefined && readInt(edit.modId, -1) !== record.modId) {
      throw new ServiceFailure(ServiceCode.ModIdMismatch, 'Record modification ID does not match');
    }

    const fieldData: Record<string, unknown> = isObject(edit.fieldData) ? { ...edit.fieldData } : {};
    const deleteRelated = fieldData.deleteRelated;
    delete fieldData.deleteRelated;
    this.checkWritable(definition, fieldData);

    if (deleteRelated !== undefined) {
      const targets = Array.isArray(deleteRelated) ? deleteRelated : [deleteRelated];
      for (const target of targets) {
        this.deleteRelated(definition, record, String(target));
      }
    }
    if (isObject(edit.portalData)) {
      this.writePortals(definition, record, edit.portalData);
    }
    for (const [name, value] of Object.entries(fieldData)) {
      record.fieldData[name] = asWireValue(value);
    }
    record.modId += 1;
    return { response: { modId: String(record.modId) } };
  }

  private deleteRecord(definition: InMemoryLayoutDefinition, recordId: number): RouteResult {
    const records = this.recordsOf(definition.name);
    const index = records.findIndex((r) => r.recordId === recordId);
    if (index < 0) {
      throw new ServiceFailure(ServiceCode.RecordMissing, 'Record is missing');
    }
    records.splice(index, 1);
    return { response: {} };
  }

  private upload(
    definition: InMemoryLayoutDefinition,
    recordId: number,
    fieldName: string,
    request: TransportRequest
  ): RouteResult {
    const record = this.findRecord(definition.name, recordId);
    const field = definition.fields.find((f) => f.name === fieldName);
    if (!field || field.result !== 'container') {
      throw missingField(fieldName);
    }
    const form = typeof request.body === 'string' ? undefined : request.body;
    const upload = form?.get('upload');
    if (upload === null || upload === undefined || typeof upload === 'string') {
      throw new ServiceFailure(ServiceCode.FieldMissing, 'Upload is missing');
    }
    record.fieldData[fieldName] =
      `https://fms.test/Streaming_SSL/MainDB/${encodeURIComponent(upload.name)}?RCType=EmbeddedRCFileProcessor`;
    record.modId += 1;
    return { response: { modId: String(record.modId) } };
  }

  private setGlobals(body: unknown): RouteResult {
    const fields = isObject(body) && isObject(body.globalFields) ? body.globalFields : undefined;
    if (!fields) {
      throw new ServiceFailure(ServiceCode.FieldMissing, 'globalFields is missing');
    }
    const known = new Set(
      [...this.layouts.values()].flatMap((layout) =>
        layout.fields.filter((f) => f.global).map((f) => f.name)
      )
    );
    for (const name of Object.keys(fields)) {
      const bare = name.includes('::') ? name.slice(name.indexOf('::') + 2) : name;
      if (!known.has(name) && !known.has(bare)) throw missingField(name);
    }
    for (const [name, value] of Object.entries(fields)) {
      const bare = name.includes('::') ? name.slice(name.indexOf('::') + 2) : name;
      this.globals.set(known.has(name) ? name : bare, asWireValue(value));
    }
    return { response: {} };
  }

  // ==========================================================================
  // Scripts
  // ==========================================================================

  private runScript(name: string, param: unknown): { error: number; result?: string } {
    const script = this.scripts[name];
    if (!script) {
      return { error: SCRIPT_MISSING };
    }
    const result = script(param === undefined ? undefined : String(param));
    return result === undefined ? { error: 0 } : { error: 0, result };
  }

  private runScriptEndpoint(name: string, params: Record<string, unknown>): Record<string, unknown> {
    const outcome = this.runScript(name, params['script.param']);
    return {
      scriptError: String(outcome.error),
      ...(outcome.result === undefined ? {} : { scriptResult: outcome.result }),
    };
  }

  private withScripts(params: Record<string, unknown>, action: () => RouteResult): RouteResult {
    const reported: Record<string, string> = {};
    const run = (key: string, suffix: string): void => {
      const name = params[key];
      if (typeof name !== 'string') return;
      const outcome = this.runScript(name, params[`${key}.param`]);
      reported[`scriptError${suffix}`] = String(outcome.error);
      if (outcome.result !== undefined) {
        reported[`scriptResult${suffix}`] = outcome.result;
      }
    };
    run('script.prerequest', '.prerequest');
    run('script.presort', '.presort');
    const result = action();
    run('script', '');
    return { ...result, response: { ...result.response, ...reported } };
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private layoutOrFail(name: string): InMemoryLayoutDefinition {
    const layout = this.layouts.get(name);
    if (!layout) {
      throw new ServiceFailure(ServiceCode.LayoutMissing, 'Layout is missing');
    }
    return layout;
  }

  private recordsOf(layout: string): StoredRecord[] {
    let records = this.records.get(layout);
    if (!records) {
      this.layoutOrFail(layout);
      records = [];
      this.records.set(layout, records);
    }
    return records;
  }

  private findRecord(layout: string, recordId: number): StoredRecord {
    const record = this.recordsOf(layout).find((r) => r.recordId === recordId);
    if (!record) {
      throw new ServiceFailure(ServiceCode.RecordMissing, 'Record is missing');
    }
    return record;
  }

  private tableOf(layout: string): string {
    return this.layouts.get(layout)?.table ?? layout;
  }

  private blankFields(fields: InMemoryFieldDefinition[]): Record<string, WireValue> {
    const data: Record<string, WireValue> = {};
    for (const field of fields) {
      data[field.name] = '';
      for (let rep = 2; rep <= (field.maxRepeat ?? 1); rep++) {
        data[`${field.name}(${rep})`] = '';
      }
    }
    return data;
  }

  private fieldDefinition(
    fields: InMemoryFieldDefinition[],
    key: string
  ): InMemoryFieldDefinition | undefined {
    const direct = fields.find((f) => f.name === key);
    if (direct) return direct;
    const repetition = /^(.*)\((\d+)\)$/.exec(key);
    if (!repetition) return undefined;
    const field = fields.find((f) => f.name === repetition[1]);
    return field && Number(repetition[2]) <= (field.maxRepeat ?? 1) ? field : undefined;
  }

  private hasField(definition: InMemoryLayoutDefinition, key: string): boolean {
    return this.fieldDefinition(definition.fields, key) !== undefined;
  }

  private fieldValue(
    definition: InMemoryLayoutDefinition,
    record: StoredRecord,
    key: string
  ): WireValue | undefined {
    const field = this.fieldDefinition(definition.fields, key);
    if (field?.global && this.globals.has(field.name)) {
      return this.globals.get(field.name);
    }
    return record.fieldData[key];
  }

  private checkWritable(definition: InMemoryLayoutDefinition, fieldData: Record<string, unknown>): void {
    for (const name of Object.keys(fieldData)) {
      const field = this.fieldDefinition(definition.fields, name);
      if (!field) throw missingField(name);
      if ((field.type ?? 'normal') !== 'normal') {
        throw new ServiceFailure(FIELD_NOT_MODIFIABLE, 'Field cannot be modified');
      }
    }
  }

  private writePortals(
    definition: InMemoryLayoutDefinition,
    record: StoredRecord,
    portalData: Record<string, unknown>
  ): void {
    for (const [portal, rows] of Object.entries(portalData)) {
      const portalDefinition = definition.portals?.[portal];
      const stored = record.portals.get(portal);
      if (!portalDefinition || !stored || !Array.isArray(rows)) {
        throw new ServiceFailure(ServiceCode.FieldMissing, `Portal ${portal} is missing`);
      }
      for (const row of rows.filter(isObject)) {
        const { recordId, modId, ...fields } = row;
        for (const name of Object.keys(fields)) {
          if (!this.fieldDefinition(portalDefinition.fields, name)) throw missingField(name);
        }
        if (recordId === undefined) {
          stored.push({
            recordId: this.nextRecordId++,
            modId: 0,
            fields: Object.fromEntries(Object.entries(fields).map(([k, v]) => [k, asWireValue(v)])),
          });
          continue;
        }
        const target = stored.find((r) => r.recordId === readInt(recordId, -1));
        if (!target) {
          throw new ServiceFailure(ServiceCode.RecordMissing, 'Record is missing');
        }
        if (modId !== undefined && readInt(modId, -1) !== target.modId) {
          throw new ServiceFailure(ServiceCode.ModIdMismatch, 'Record modification ID does not match');
        }
        for (const [name, value] of Object.entries(fields)) {
          target.fields[name] = asWireValue(value);
        }
        target.modId += 1;
      }
    }
  }

  private deleteRelated(definition: InMemoryLayoutDefinition, record: StoredRecord, target: string): void {
    const dot = target.lastIndexOf('.');
    const table = target.slice(0, dot);
    const rowId = readInt(target.slice(dot + 1), -1);
    for (const [portal, rows] of record.portals) {
      if (definition.portals?.[portal]?.table !== table) continue;
      const index = rows.findIndex((row) => row.recordId === rowId);
      if (index >= 0) {
        rows.splice(index, 1);
        return;
      }
    }
    throw new ServiceFailure(ServiceCode.RecordMissing, 'Record is missing');
  }

  private sorted(records: StoredRecord[], sort: unknown): StoredRecord[] {
    if (!Array.isArray(sort) || sort.length === 0) {
      return records;
    }
    const rules = sort.filter(isObject).map((rule) => ({
      field: String(rule.fieldName),
      descending: rule.sortOrder === 'descend',
    }));
    return [...records].sort((a, b) => {
      for (const rule of rules) {
        const diff = compareValues(a.fieldData[rule.field], b.fieldData[rule.field]);
        if (diff !== 0) return rule.descending ? -diff : diff;
      }
      return 0;
    });
  }

  private page(
    definition: InMemoryLayoutDefinition,
    found: StoredRecord[],
    total: number,
    offset: number,
    limit: number,
    params: Record<string, unknown>,
    prefix: '' | '_'
  ): RouteResult {
    if (offset > found.length) {
      throw new ServiceFailure(ServiceCode.NoRecordsMatch, 'No records match the request');
    }
    const slice = found.slice(offset - 1, offset - 1 + limit);
    return {
      response: {
        data: slice.map((record) => this.serialize(definition, record, params, prefix)),
        dataInfo: this.dataInfo(definition, total, found.length, slice.length),
      },
    };
  }

  private dataInfo(
    definition: InMemoryLayoutDefinition,
    total: number,
    found: number,
    returned: number
  ): Record<string, unknown> {
    return {
      database: this.database,
      layout: definition.name,
      table: this.tableOf(definition.name),
      totalRecordCount: total,
      foundCount: found,
      returnedCount: returned,
    };
  }

  private selectedPortals(definition: InMemoryLayoutDefinition, params: Record<string, unknown>): string[] {
    const all = Object.keys(definition.portals ?? {});
    const raw = params.portal;
    const requested: unknown = typeof raw === 'string' ? JSON.parse(raw) : raw;
    if (!Array.isArray(requested)) {
      return all;
    }
    return requested.map(String).filter((name) => all.includes(name));
  }

  private serialize(
    definition: InMemoryLayoutDefinition,
    record: StoredRecord,
    params: Record<string, unknown>,
    prefix: '' | '_'
  ): Record<string, unknown> {
    const fieldData: Record<string, WireValue> = {};
    for (const key of Object.keys(record.fieldData)) {
      fieldData[key] = this.fieldValue(definition, record, key) ?? '';
    }

    const portalData: Record<string, unknown[]> = {};
    const portalDataInfo: Array<Record<string, unknown>> = [];
    for (const portal of this.selectedPortals(definition, params)) {
      const rows = record.portals.get(portal) ?? [];
      const offset = readInt(params[`${prefix}offset.${portal}`], 1);
      const limit = readInt(params[`${prefix}limit.${portal}`], DEFAULT_PORTAL_LIMIT);
      const slice = rows.slice(offset - 1, offset - 1 + limit);
      portalData[portal] = slice.map((row) => ({
        recordId: String(row.recordId),
        ...row.fields,
        modId: String(row.modId),
      }));
      portalDataInfo.push({
        portalObjectName: portal,
        database: this.database,
        table: definition.portals?.[portal]?.table ?? portal,
        foundCount: rows.length,
        returnedCount: slice.length,
      });
    }

    return {
      fieldData,
      portalData,
      ...(portalDataInfo.length > 0 ? { portalDataInfo } : {}),
      recordId: String(record.recordId),
      modId: String(record.modId),
    };
  }
}
