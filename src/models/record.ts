/**
 * Mutable record with dirty-field tracking.
 *
 * Reads and writes are local; only commit, reload and delete reach the
 * server, through the {@link RecordContext} the record was created with.
 *
 * @module models/record
 */

import type { Deadline } from '../client/deadline.js';
import { FieldValidationError, StaleRecordError, UnknownFieldError, errorMessage } from '../errors.js';
import { lookupField, toWire } from '../schema/coercion.js';
import {
  isContainerRef,
  isTimeOfDay,
  type CallOptions,
  type CreateRecordOptions,
  type CreatedRecord,
  type DateFormats,
  type DeleteRecordOptions,
  type EditRecordOptions,
  type FieldInput,
  type FieldMetadata,
  type FieldValue,
  type GetRecordOptions,
} from '../types/index.js';

/**
 * Operations a record needs from the client. Implemented by DataApiClient;
 * the record holds it as a capability and nothing else.
 */
export interface RecordContext {
  createRecord(fieldData: FieldInput, options?: CreateRecordOptions): Promise<CreatedRecord>;
  editRecord(recordId: number, fieldData: FieldInput, options?: EditRecordOptions): Promise<number>;
  deleteRecord(recordId: number, options?: DeleteRecordOptions): Promise<void>;
  getRecord(recordId: number, options?: GetRecordOptions): Promise<DataRecord>;
  /** Deadline shared by the requests of one record operation */
  startDeadline(options?: CallOptions): Deadline;
}

/**
 * Where a record lives: directly on a layout, or as a row of a parent's portal.
 */
export type RecordScope =
  | { readonly kind: 'layout'; readonly layout: string }
  | {
      readonly kind: 'portal';
      readonly portal: string;
      /** Related table occurrence */
      readonly table: string;
      readonly parent: DataRecord;
    };

/**
 * Field metadata and formats used to validate values on `set`.
 */
export interface RecordSchema {
  readonly fields: ReadonlyMap<string, FieldMetadata>;
  readonly formats: DateFormats;
}

export interface DataRecordInit {
  context: RecordContext;
  scope: RecordScope;
  /** Null for a record not yet created on the server */
  recordId: number | null;
  modId: number | null;
  fields: ReadonlyMap<string, FieldValue>;
  /** Builds the portal rows once the parent exists */
  portals?: (parent: DataRecord) => Map<string, DataRecord[]>;
  schema?: RecordSchema;
}

function sameValue(a: FieldValue, b: FieldValue): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  if (isTimeOfDay(a) && isTimeOfDay(b)) {
    return a.hours === b.hours && a.minutes === b.minutes && a.seconds === b.seconds;
  }
  if (isContainerRef(a) && isContainerRef(b)) {
    return a.url === b.url;
  }
  return a === b;
}

/**
 * A record of a layout or a portal row.
 *
 * Field access goes through {@link get} and {@link set}, so fields named like
 * structural attributes ("recordId", "modId") stay reachable.
 */
export class DataRecord {
  private readonly context: RecordContext;
  private readonly recordScope: RecordScope;
  private id: number | null;
  private modification: number | null;
  private values: Map<string, FieldValue>;
  private dirty = new Set<string>();
  private portalRows: Map<string, DataRecord[]>;
  private schema?: RecordSchema;
  private deleted = false;

  constructor(init: DataRecordInit) {
    this.context = init.context;
    this.recordScope = init.scope;
    this.id = init.recordId;
    this.modification = init.modId;
    this.values = new Map(init.fields);
    this.portalRows = init.portals ? init.portals(this) : new Map();
    this.schema = init.schema;
    if (init.recordId === null) {
      // every field of an unsaved record is sent on first commit
      this.dirty = new Set(this.values.keys());
    }
  }

  get recordId(): number | null {
    return this.id;
  }

  get modId(): number | null {
    return this.modification;
  }

  get scope(): RecordScope {
    return this.recordScope;
  }

  get fields(): ReadonlyMap<string, FieldValue> {
    return this.values;
  }

  get dirtyFields(): ReadonlySet<string> {
    return this.dirty;
  }

  get portals(): ReadonlyMap<string, readonly DataRecord[]> {
    return this.portalRows;
  }

  get isDirty(): boolean {
    return this.dirty.size > 0;
  }

  get isDeleted(): boolean {
    return this.deleted;
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  /**
   * Returns a field value.
   * @throws {UnknownFieldError} If the record has no such field
   */
  get(name: string): FieldValue {
    if (!this.values.has(name)) {
      throw new UnknownFieldError(name);
    }
    return this.values.get(name) ?? null;
  }

  /**
   * Changes a field locally and marks it dirty. Assigning the current value
   * leaves the record unchanged.
   *
   * @throws {UnknownFieldError} If the record has no such field
   * @throws {FieldValidationError} If the field cannot be written or the value
   *   does not fit its type
   */
  set(name: string, value: FieldValue): void {
    if (!this.values.has(name)) {
      throw new UnknownFieldError(name);
    }
    const meta = this.schema ? lookupField(this.schema.fields, name) : undefined;
    if (this.schema && meta) {
      if (meta.type !== 'normal') {
        throw new FieldValidationError(name, `${meta.type} fields cannot be modified`);
      }
      try {
        toWire(meta, value, this.schema.formats);
      } catch (error) {
        throw new FieldValidationError(name, errorMessage(error));
      }
    }

    if (sameValue(this.values.get(name) ?? null, value)) {
      return;
    }
    this.values.set(name, value);
    this.dirty.add(name);
  }

  /**
   * Dirty fields and their current values.
   */
  dirtyFieldData(): FieldInput {
    const data: FieldInput = {};
    for (const name of this.dirty) {
      data[name] = this.values.get(name) ?? null;
    }
    return data;
  }

  /**
   * All fields as a plain object.
   */
  toFieldData(): FieldInput {
    return Object.fromEntries(this.values);
  }

  toJSON(): {
    recordId: number | null;
    modId: number | null;
    fieldData: FieldInput;
    portalData: Record<string, unknown[]>;
  } {
    const portalData: Record<string, unknown[]> = {};
    for (const [portal, rows] of this.portalRows) {
      portalData[portal] = rows.map((row) => row.toJSON());
    }
    return {
      recordId: this.id,
      modId: this.modification,
      fieldData: this.toFieldData(),
      portalData,
    };
  }

  /**
   * Sends dirty fields to the server. Does nothing when no field is dirty.
   * A record without a record id is created instead.
   *
   * On failure nothing changes locally, so a conflict can be resolved by
   * reloading and reapplying the edit.
   */
  async commit(options: CallOptions = {}): Promise<void> {
    this.assertUsable();
    if (this.dirty.size === 0) {
      return;
    }

    const scope = this.recordScope;
    if (scope.kind === 'portal') {
      await this.commitPortalRow(scope, options);
      return;
    }

    const sent = this.dirtyFieldData();
    if (this.id === null) {
      const created = await this.context.createRecord(sent, { ...options, layout: scope.layout });
      this.id = created.recordId;
      this.modification = created.modId;
    } else {
      this.modification = await this.context.editRecord(this.id, sent, {
        ...options,
        layout: scope.layout,
        modId: this.modification ?? undefined,
      });
    }
    this.clearCommitted(sent);
  }

  /**
   * Re-reads the record, replacing every field and discarding local edits.
   */
  async reload(options: CallOptions = {}): Promise<void> {
    const recordId = this.requireId();
    const scope = this.recordScope;

    if (scope.kind === 'portal') {
      const parentId = scope.parent.requireId();
      const parent = await this.context.getRecord(parentId, {
        ...options,
        layout: parentLayout(scope.parent),
      });
      const fresh = parent.portals.get(scope.portal)?.find((row) => row.recordId === recordId);
      if (!fresh) {
        throw StaleRecordError.goneFromPortal(scope.portal, recordId);
      }
      this.replaceWith(fresh);
      return;
    }

    const fresh = await this.context.getRecord(recordId, { ...options, layout: scope.layout });
    this.replaceWith(fresh);
  }

  /**
   * Deletes the record. Afterwards commit, reload and delete fail.
   */
  async delete(options: CallOptions = {}): Promise<void> {
    const recordId = this.requireId();
    const scope = this.recordScope;

    if (scope.kind === 'portal') {
      const parent = scope.parent;
      const parentId = parent.requireId();
      parent.modification = await this.context.editRecord(
        parentId,
        { deleteRelated: `${scope.table}.${recordId}` },
        { ...options, layout: parentLayout(parent) }
      );
      const rows = parent.portalRows.get(scope.portal);
      if (rows) {
        parent.portalRows.set(
          scope.portal,
          rows.filter((row) => row !== this)
        );
      }
    } else {
      await this.context.deleteRecord(recordId, { ...options, layout: scope.layout });
    }
    this.deleted = true;
  }

  private async commitPortalRow(
    scope: Extract<RecordScope, { kind: 'portal' }>,
    options: CallOptions
  ): Promise<void> {
    const recordId = this.requireId();
    const parent = scope.parent;
    const parentId = parent.requireId();
    const layout = parentLayout(parent);
    const sent = this.dirtyFieldData();

    const row: FieldInput = { ...sent, recordId: String(recordId) };
    if (this.modification !== null) {
      row.modId = String(this.modification);
    }
    const deadline = this.context.startDeadline(options);
    const parentModId = await this.context.editRecord(
      parentId,
      {},
      { ...options, deadline, layout, portalData: { [scope.portal]: [row] } }
    );

    // the edit is stored: local state follows it whether or not the re-read succeeds
    parent.modification = parentModId;
    this.modification = (this.modification ?? 0) + 1;
    this.clearCommitted(sent);

    // the edit response only reports the parent's modification id
    let refreshed: DataRecord;
    try {
      refreshed = await this.context.getRecord(parentId, { ...options, deadline, layout });
    } catch {
      // keeps the estimated modId; the next reload of the parent corrects it
      return;
    }
    const fresh = refreshed.portals.get(scope.portal)?.find((r) => r.recordId === recordId);
    if (fresh) {
      this.modification = fresh.modification;
    }
  }

  private clearCommitted(sent: FieldInput): void {
    for (const [name, value] of Object.entries(sent)) {
      // fields set again while the commit was in flight stay dirty
      if (sameValue(this.values.get(name) ?? null, value)) {
        this.dirty.delete(name);
      }
    }
  }

  private replaceWith(fresh: DataRecord): void {
    this.modification = fresh.modification;
    this.values = new Map(fresh.values);
    this.portalRows = this.adoptRows(fresh.portalRows);
    this.schema = fresh.schema ?? this.schema;
    this.dirty.clear();
  }

  private adoptRows(source: ReadonlyMap<string, DataRecord[]>): Map<string, DataRecord[]> {
    const adopted = new Map<string, DataRecord[]>();
    for (const [portal, rows] of source) {
      adopted.set(
        portal,
        rows.map(
          (row) =>
            new DataRecord({
              context: this.context,
              scope:
                row.recordScope.kind === 'portal' ? { ...row.recordScope, parent: this } : row.recordScope,
              recordId: row.id,
              modId: row.modification,
              fields: row.values,
              schema: row.schema,
            })
        )
      );
    }
    return adopted;
  }

  private assertUsable(): void {
    if (this.deleted) {
      throw StaleRecordError.deleted(this.id);
    }
    if (this.recordScope.kind === 'portal') {
      this.recordScope.parent.assertUsable();
    }
  }

  private requireId(): number {
    this.assertUsable();
    if (this.id === null) {
      throw StaleRecordError.missingId();
    }
    return this.id;
  }
}

function parentLayout(parent: DataRecord): string | undefined {
  return parent.scope.kind === 'layout' ? parent.scope.layout : undefined;
}
