/**
 * Field coercion table: converts between wire values and typed field values
 * according to a field's declared result type.
 *
 * @module schema/coercion
 */

import {
  containerRef,
  isContainerRef,
  isTimeOfDay,
  timeOfDay,
  type DateFormats,
  type FieldMetadata,
  type FieldResultType,
  type FieldValue,
  type WireValue,
} from '../types/index.js';
import {
  dateFromParts,
  formatWithPattern,
  parseWithPattern,
  partsFromDate,
} from './date-format.js';

/**
 * Conversion pair for one result type.
 */
export interface FieldCodec {
  fromWire(value: WireValue, formats: DateFormats): FieldValue;
  toWire(value: FieldValue, formats: DateFormats): WireValue;
}

const REPETITION_KEY = /^(.*)\((\d+)\)$/;

/**
 * Splits a response key like "Phone(2)" into field name and repetition.
 */
export function parseFieldKey(key: string): { name: string; repetition: number } {
  const match = REPETITION_KEY.exec(key);
  if (!match) {
    return { name: key, repetition: 1 };
  }
  return { name: match[1], repetition: parseInt(match[2], 10) };
}

/**
 * Looks up metadata for a response key, resolving repetition suffixes.
 * Repetitions beyond the field's declared count are not matched.
 */
export function lookupField(
  fields: ReadonlyMap<string, FieldMetadata>,
  key: string
): FieldMetadata | undefined {
  const direct = fields.get(key);
  if (direct) {
    return direct;
  }
  const { name, repetition } = parseFieldKey(key);
  const meta = fields.get(name);
  if (meta && repetition >= 1 && repetition <= meta.maxRepeat) {
    return meta;
  }
  return undefined;
}

function emptyToNull(value: WireValue): WireValue {
  return value === '' ? null : value;
}

const textCodec: FieldCodec = {
  fromWire(value) {
    if (value === null) return null;
    return typeof value === 'number' ? String(value) : value;
  },
  toWire(value) {
    if (value === null) return '';
    if (typeof value === 'string' || typeof value === 'number') return value;
    return String(value);
  },
};

const numberCodec: FieldCodec = {
  fromWire(value) {
    const v = emptyToNull(value);
    if (v === null || typeof v === 'number') return v;
    const parsed = Number(v);
    // number fields may hold text, and integers past 2^53 lose digits as numbers
    if (v.trim() === '' || !Number.isFinite(parsed)) return v;
    if (Number.isInteger(parsed) && !Number.isSafeInteger(parsed)) return v;
    return parsed;
  },
  toWire(value) {
    if (value === null) return '';
    if (typeof value === 'number' || typeof value === 'string') return value;
    throw new TypeError('Number fields accept numbers or strings');
  },
};

function dateCodec(pick: (formats: DateFormats) => string, dateOnly: boolean): FieldCodec {
  return {
    fromWire(value, formats) {
      const v = emptyToNull(value);
      if (v === null || typeof v === 'number') return v;
      const parts = parseWithPattern(pick(formats), v);
      if (!parts) return v;
      return dateFromParts(dateOnly ? { ...parts, hours: 0, minutes: 0, seconds: 0 } : parts);
    },
    toWire(value, formats) {
      if (value === null) return '';
      if (typeof value === 'string' || typeof value === 'number') return value;
      if (value instanceof Date) {
        return formatWithPattern(pick(formats), partsFromDate(value));
      }
      throw new TypeError('Date fields accept Date values or preformatted strings');
    },
  };
}

const timeCodec: FieldCodec = {
  fromWire(value, formats) {
    const v = emptyToNull(value);
    if (v === null || typeof v === 'number') return v;
    const parts = parseWithPattern(formats.time, v);
    if (!parts) return v;
    return timeOfDay(parts.hours, parts.minutes, parts.seconds);
  },
  toWire(value, formats) {
    if (value === null) return '';
    if (typeof value === 'string' || typeof value === 'number') return value;
    if (isTimeOfDay(value)) {
      return formatWithPattern(formats.time, {
        year: 1,
        month: 1,
        day: 1,
        hours: value.hours,
        minutes: value.minutes,
        seconds: value.seconds,
      });
    }
    throw new TypeError('Time fields accept TimeOfDay values or preformatted strings');
  },
};

const containerCodec: FieldCodec = {
  fromWire(value) {
    const v = emptyToNull(value);
    if (v === null) return null;
    return containerRef(String(v));
  },
  toWire(value) {
    if (value === null) return '';
    if (isContainerRef(value)) return value.url;
    if (typeof value === 'string') return value;
    throw new TypeError('Container fields accept ContainerRef values');
  },
};

/**
 * Codec per result type.
 */
export const COERCION_TABLE: Readonly<Record<FieldResultType, FieldCodec>> = {
  text: textCodec,
  number: numberCodec,
  date: dateCodec((formats) => formats.date, true),
  time: timeCodec,
  timeStamp: dateCodec((formats) => formats.timeStamp, false),
  container: containerCodec,
};

/**
 * Converts a wire value for a field. Without metadata the value passes through.
 */
export function fromWire(
  meta: FieldMetadata | undefined,
  value: WireValue,
  formats: DateFormats
): FieldValue {
  if (!meta) {
    return value;
  }
  return COERCION_TABLE[meta.result].fromWire(value, formats);
}

/**
 * Converts a typed value for sending. Without metadata, strings, numbers and
 * null pass through and other values are formatted by their natural type.
 */
export function toWire(
  meta: FieldMetadata | undefined,
  value: FieldValue,
  formats: DateFormats
): WireValue {
  if (meta) {
    return COERCION_TABLE[meta.result].toWire(value, formats);
  }
  if (value === null || typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  if (value instanceof Date) {
    return COERCION_TABLE.timeStamp.toWire(value, formats);
  }
  if (isTimeOfDay(value)) {
    return COERCION_TABLE.time.toWire(value, formats);
  }
  return COERCION_TABLE.container.toWire(value, formats);
}
