/**
 * Response parsing: envelope validation and construction of records and
 * foundset pages from record payloads.
 *
 * @module parser
 */

import type { z } from 'zod';
import { ParseError, TokenExpiredError } from '../errors.js';
import { DataRecord, type RecordContext, type RecordSchema } from '../models/record.js';
import type { FoundsetPage } from '../models/foundset.js';
import { fromWire, lookupField } from '../schema/coercion.js';
import type {
  DateFormats,
  FieldMetadata,
  FieldValue,
  LayoutMetadata,
  ScriptOutcome,
  ScriptResults,
  WireValue,
} from '../types/index.js';
import {
  envelopeSchema,
  recordsResponseSchema,
  scriptResultsSchema,
  type Envelope,
  type RecordData,
} from './schemas.js';

export * from './schemas.js';

/**
 * What record construction needs besides the payload.
 */
export interface ParseContext {
  /** Layout the records were read through */
  layout: string;
  /** Absent when field coercion is disabled */
  metadata?: LayoutMetadata;
  formats: DateFormats;
  context: RecordContext;
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Decodes and validates a response envelope.
 *
 * @throws {TokenExpiredError} If a 401 response carries no readable envelope
 * @throws {ParseError} If the body is not JSON or not an envelope
 */
export function parseEnvelope(body: string, httpStatus: number): Envelope {
  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
  } catch (error) {
    if (httpStatus === 401) {
      throw new TokenExpiredError('Service rejected the request with HTTP 401', { httpStatus });
    }
    throw new ParseError(`Response body is not JSON (HTTP ${httpStatus})`, {
      httpStatus,
      cause: error,
    });
  }

  const result = envelopeSchema.safeParse(decoded);
  if (!result.success) {
    throw new ParseError(`Malformed response envelope: ${describeIssue(result.error)}`, {
      httpStatus,
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Validates the `response` part of an envelope against `schema`.
 * @throws {ParseError} If it does not match
 */
export function parseResponse<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  response: unknown,
  operation: string
): T {
  const result = schema.safeParse(response);
  if (!result.success) {
    throw new ParseError(`Unexpected ${operation} response: ${describeIssue(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

function coerceFields(
  raw: Record<string, WireValue>,
  fields: ReadonlyMap<string, FieldMetadata> | undefined,
  formats: DateFormats,
  skip: ReadonlySet<string> = new Set()
): Map<string, FieldValue> {
  const values = new Map<string, FieldValue>();
  for (const [key, value] of Object.entries(raw)) {
    if (skip.has(key)) continue;
    values.set(key, fromWire(fields ? lookupField(fields, key) : undefined, value, formats));
  }
  return values;
}

const ROW_IDENTITY = new Set(['recordId', 'modId']);

function portalTable(data: RecordData, portal: string, rows: RecordData['portalData'][string]): string {
  const info = data.portalDataInfo?.find((entry) => entry.portalObjectName === portal);
  if (info) {
    return info.table;
  }
  const qualified = rows.length > 0 ? Object.keys(rows[0]).find((key) => key.includes('::')) : undefined;
  return qualified ? qualified.slice(0, qualified.indexOf('::')) : portal;
}

/**
 * Builds a record (with its portal rows) from one entry of `response.data`.
 * Fields without metadata are kept as sent.
 */
export function buildRecord(data: RecordData, ctx: ParseContext): DataRecord {
  const schema: RecordSchema | undefined = ctx.metadata
    ? { fields: ctx.metadata.fields, formats: ctx.formats }
    : undefined;

  return new DataRecord({
    context: ctx.context,
    scope: { kind: 'layout', layout: ctx.layout },
    recordId: data.recordId,
    modId: data.modId,
    fields: coerceFields(data.fieldData, ctx.metadata?.fields, ctx.formats),
    schema,
    portals: (parent) => {
      const portals = new Map<string, DataRecord[]>();
      for (const [portal, rows] of Object.entries(data.portalData)) {
        const portalFields = ctx.metadata?.portals.get(portal);
        const table = portalTable(data, portal, rows);
        portals.set(
          portal,
          rows.map(
            (row) =>
              new DataRecord({
                context: ctx.context,
                scope: { kind: 'portal', portal, table, parent },
                recordId: row.recordId,
                modId: row.modId,
                fields: coerceFields(row, portalFields, ctx.formats, ROW_IDENTITY),
                schema: portalFields ? { fields: portalFields, formats: ctx.formats } : undefined,
              })
          )
        );
      }
      return portals;
    },
  });
}

/**
 * Builds a foundset page from a record list or find response.
 */
export function parseRecords(response: unknown, ctx: ParseContext): FoundsetPage {
  const parsed = parseResponse(recordsResponseSchema, response, 'record');
  const records = parsed.data.map((data) => buildRecord(data, ctx));
  return {
    records,
    foundCount: parsed.dataInfo?.foundCount ?? records.length,
    returnedCount: parsed.dataInfo?.returnedCount ?? records.length,
  };
}

function outcome(error: number | undefined, result: string | undefined): ScriptOutcome | undefined {
  if (error === undefined) {
    return undefined;
  }
  return result === undefined ? { error } : { error, result };
}

/**
 * Reads the script error codes and results a response reports.
 */
export function parseScriptResults(response: unknown): ScriptResults {
  const parsed = scriptResultsSchema.safeParse(response);
  if (!parsed.success) {
    return {};
  }
  const data = parsed.data;
  const results: ScriptResults = {};
  const prerequest = outcome(data['scriptError.prerequest'], data['scriptResult.prerequest']);
  const presort = outcome(data['scriptError.presort'], data['scriptResult.presort']);
  const after = outcome(data.scriptError, data.scriptResult);
  if (prerequest) results.prerequest = prerequest;
  if (presort) results.presort = presort;
  if (after) results.after = after;
  return results;
}
