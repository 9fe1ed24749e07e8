/**
 * zod schemas for response envelopes and record payloads.
 *
 * @module parser/schemas
 */

import { z } from 'zod';

export const wireValueSchema = z.union([z.string(), z.number(), z.null()]);

/**
 * Numeric ids are sent as strings; both forms are accepted.
 */
export const numericIdSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected an integer id, got "${value}"` });
    return z.NEVER;
  }
  return parsed;
});

export const messageSchema = z.object({
  code: z.union([z.string(), z.number()]).transform((code) => Number(code)),
  message: z.string().default(''),
});

export const envelopeSchema = z.object({
  response: z.record(z.unknown()).default({}),
  messages: z.array(messageSchema).min(1, 'Envelope carries no messages'),
});

export type Envelope = z.infer<typeof envelopeSchema>;

export const portalRowSchema = z
  .object({
    recordId: numericIdSchema,
    modId: numericIdSchema,
  })
  .catchall(wireValueSchema);

export const portalDataInfoSchema = z
  .object({
    portalObjectName: z.string().optional(),
    database: z.string().optional(),
    table: z.string(),
    foundCount: z.number().optional(),
    returnedCount: z.number().optional(),
  })
  .passthrough();

export const recordDataSchema = z.object({
  fieldData: z.record(wireValueSchema),
  portalData: z.record(z.array(portalRowSchema)).default({}),
  portalDataInfo: z.array(portalDataInfoSchema).optional(),
  recordId: numericIdSchema,
  modId: numericIdSchema,
});

export type RecordData = z.infer<typeof recordDataSchema>;

export const dataInfoSchema = z
  .object({
    database: z.string().optional(),
    layout: z.string().optional(),
    table: z.string().optional(),
    totalRecordCount: z.number(),
    foundCount: z.number(),
    returnedCount: z.number(),
  })
  .passthrough();

export const recordsResponseSchema = z.object({
  data: z.array(recordDataSchema),
  dataInfo: dataInfoSchema.optional(),
});

export type RecordsResponse = z.infer<typeof recordsResponseSchema>;

export const createResponseSchema = z.object({
  recordId: numericIdSchema,
  modId: numericIdSchema,
});

export const editResponseSchema = z.object({
  modId: numericIdSchema,
});

export const loginResponseSchema = z.object({
  token: z.string().min(1).optional(),
});

const scriptErrorSchema = z.union([z.string(), z.number()]).transform((code) => Number(code));

export const scriptResultsSchema = z
  .object({
    'scriptError.prerequest': scriptErrorSchema.optional(),
    'scriptResult.prerequest': z.string().optional(),
    'scriptError.presort': scriptErrorSchema.optional(),
    'scriptResult.presort': z.string().optional(),
    scriptError: scriptErrorSchema.optional(),
    scriptResult: z.string().optional(),
  })
  .passthrough();

export const scriptCallResponseSchema = z.object({
  scriptError: scriptErrorSchema,
  scriptResult: z.string().optional(),
});
