/**
 * Schemas and converters for the metadata endpoints: layout metadata,
 * product info, database, layout and script listings.
 *
 * @module schema/metadata
 */

import { z } from 'zod';
import type {
  CatalogEntry,
  DatabaseInfo,
  FieldKind,
  FieldMetadata,
  FieldResultType,
  LayoutMetadata,
  ProductInfo,
} from '../types/index.js';
import { DEFAULT_DATE_FORMATS } from './date-format.js';

// ============================================================================
// Wire schemas
// ============================================================================

const flag = z.union([z.boolean(), z.string()]).transform((value) =>
  typeof value === 'boolean' ? value : value.toLowerCase() === 'true'
);

export const fieldMetaDataSchema = z
  .object({
    name: z.string(),
    type: z.string().default('normal'),
    result: z.string().default('text'),
    maxRepeat: z.coerce.number().int().positive().default(1),
    global: flag.default(false),
  })
  .passthrough();

export const layoutMetadataResponseSchema = z
  .object({
    fieldMetaData: z.array(fieldMetaDataSchema),
    portalMetaData: z.record(z.array(fieldMetaDataSchema)).default({}),
  })
  .passthrough();

export const productInfoResponseSchema = z.object({
  productInfo: z
    .object({
      name: z.string(),
      version: z.string(),
      buildDate: z.string().default(''),
      dateFormat: z.string().optional(),
      timeFormat: z.string().optional(),
      timeStampFormat: z.string().optional(),
    })
    .passthrough(),
});

export const databasesResponseSchema = z.object({
  databases: z.array(z.object({ name: z.string() }).passthrough()),
});

interface WireCatalogEntry {
  name: string;
  isFolder?: boolean;
  folderLayoutNames?: WireCatalogEntry[];
  folderScriptNames?: WireCatalogEntry[];
}

const catalogEntrySchema: z.ZodType<WireCatalogEntry> = z.lazy(() =>
  z.object({
    name: z.string(),
    isFolder: z.boolean().optional(),
    folderLayoutNames: z.array(catalogEntrySchema).optional(),
    folderScriptNames: z.array(catalogEntrySchema).optional(),
  })
);

export const layoutsResponseSchema = z.object({
  layouts: z.array(catalogEntrySchema),
});

export const scriptsResponseSchema = z.object({
  scripts: z.array(catalogEntrySchema),
});

// ============================================================================
// Converters
// ============================================================================

const RESULT_TYPES: Record<string, FieldResultType> = {
  text: 'text',
  number: 'number',
  date: 'date',
  time: 'time',
  timestamp: 'timeStamp',
  container: 'container',
};

const FIELD_KINDS: Record<string, FieldKind> = {
  normal: 'normal',
  calculation: 'calculation',
  summary: 'summary',
};

function toFieldMetadata(raw: z.infer<typeof fieldMetaDataSchema>): FieldMetadata {
  return {
    name: raw.name,
    type: FIELD_KINDS[raw.type.toLowerCase()] ?? 'normal',
    // unrecognised result types are treated as text so values pass unchanged
    result: RESULT_TYPES[raw.result.toLowerCase()] ?? 'text',
    maxRepeat: raw.maxRepeat,
    global: raw.global,
  };
}

function fieldMap(fields: Array<z.infer<typeof fieldMetaDataSchema>>): Map<string, FieldMetadata> {
  return new Map(fields.map((field) => [field.name, toFieldMetadata(field)]));
}

/**
 * Builds layout metadata from a validated response.
 */
export function toLayoutMetadata(
  name: string,
  response: z.infer<typeof layoutMetadataResponseSchema>
): LayoutMetadata {
  const portals = new Map<string, ReadonlyMap<string, FieldMetadata>>();
  for (const [portal, fields] of Object.entries(response.portalMetaData)) {
    portals.set(portal, fieldMap(fields));
  }
  return { name, fields: fieldMap(response.fieldMetaData), portals };
}

/**
 * Builds product info, falling back to default formats the server omits.
 */
export function toProductInfo(response: z.infer<typeof productInfoResponseSchema>): ProductInfo {
  const info = response.productInfo;
  return {
    name: info.name,
    version: info.version,
    buildDate: info.buildDate,
    formats: {
      date: info.dateFormat ?? DEFAULT_DATE_FORMATS.date,
      time: info.timeFormat ?? DEFAULT_DATE_FORMATS.time,
      timeStamp: info.timeStampFormat ?? DEFAULT_DATE_FORMATS.timeStamp,
    },
  };
}

export function toDatabaseList(response: z.infer<typeof databasesResponseSchema>): DatabaseInfo[] {
  return response.databases.map((db) => ({ name: db.name }));
}

/**
 * Converts a layout or script listing into a folder tree.
 */
export function toCatalog(entries: readonly WireCatalogEntry[]): CatalogEntry[] {
  return entries.map((entry) => ({
    name: entry.name,
    isFolder: entry.isFolder ?? false,
    children: toCatalog(entry.folderLayoutNames ?? entry.folderScriptNames ?? []),
  }));
}
