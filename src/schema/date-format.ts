/**
 * Parsing and formatting of date, time and timestamp strings according to
 * the patterns reported by the server (e.g. "MM/dd/yyyy HH:mm:ss").
 *
 * @module schema/date-format
 */

import type { DateFormats } from '../types/index.js';

/**
 * Formats used until the server reports its own.
 */
export const DEFAULT_DATE_FORMATS: DateFormats = {
  date: 'MM/dd/yyyy',
  time: 'HH:mm:ss',
  timeStamp: 'MM/dd/yyyy HH:mm:ss',
};

type PatternToken =
  | 'yyyy' | 'yy'
  | 'MM' | 'M'
  | 'dd' | 'd'
  | 'HH' | 'H'
  | 'hh' | 'h'
  | 'mm' | 'm'
  | 'ss' | 's'
  | 'a';

// Longest first so "yyyy" wins over "yy"
const TOKENS: readonly PatternToken[] = [
  'yyyy', 'yy', 'MM', 'M', 'dd', 'd', 'HH', 'H', 'hh', 'h', 'mm', 'm', 'ss', 's', 'a',
];

type Segment = { token: PatternToken } | { literal: string };

/**
 * Components read from or written to a date string.
 * Missing components default to the start of their range.
 */
export interface DateParts {
  year: number;
  month: number;
  day: number;
  hours: number;
  minutes: number;
  seconds: number;
}

const segmentCache = new Map<string, Segment[]>();

function segments(pattern: string): Segment[] {
  const cached = segmentCache.get(pattern);
  if (cached) {
    return cached;
  }

  const result: Segment[] = [];
  let i = 0;
  while (i < pattern.length) {
    const token = TOKENS.find((candidate) => pattern.startsWith(candidate, i));
    if (token) {
      result.push({ token });
      i += token.length;
      continue;
    }
    const last = result[result.length - 1];
    if (last && 'literal' in last) {
      last.literal += pattern[i];
    } else {
      result.push({ literal: pattern[i] });
    }
    i += 1;
  }

  segmentCache.set(pattern, result);
  return result;
}

function tokenRegex(token: PatternToken): string {
  switch (token) {
    case 'yyyy':
      return '(\\d{4})';
    case 'yy':
      return '(\\d{2})';
    case 'H':
    case 'HH':
      // time fields hold durations, so hours are unbounded
      return '(\\d+)';
    case 'a':
      return '([AaPp][Mm])';
    default:
      return '(\\d{1,2})';
  }
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Parses `value` with `pattern`. Returns null when the value does not match.
 */
export function parseWithPattern(pattern: string, value: string): DateParts | null {
  const parts = segments(pattern);
  const source = parts
    .map((part) => ('token' in part ? tokenRegex(part.token) : escapeRegex(part.literal)))
    .join('');
  const match = new RegExp(`^${source}$`).exec(value.trim());
  if (!match) {
    return null;
  }

  const result: DateParts = { year: 1, month: 1, day: 1, hours: 0, minutes: 0, seconds: 0 };
  let pm: boolean | undefined;
  let twelveHour = false;
  let group = 1;

  for (const part of parts) {
    if (!('token' in part)) {
      continue;
    }
    const text = match[group++];
    const num = parseInt(text, 10);
    switch (part.token) {
      case 'yyyy':
        result.year = num;
        break;
      case 'yy':
        result.year = 2000 + num;
        break;
      case 'MM':
      case 'M':
        result.month = num;
        break;
      case 'dd':
      case 'd':
        result.day = num;
        break;
      case 'HH':
      case 'H':
        result.hours = num;
        break;
      case 'hh':
      case 'h':
        result.hours = num;
        twelveHour = true;
        break;
      case 'mm':
      case 'm':
        result.minutes = num;
        break;
      case 'ss':
      case 's':
        result.seconds = num;
        break;
      case 'a':
        pm = text.toUpperCase() === 'PM';
        break;
    }
  }

  if (twelveHour && pm !== undefined) {
    result.hours = (result.hours % 12) + (pm ? 12 : 0);
  }

  if (result.month < 1 || result.month > 12 || result.day < 1 || result.day > 31) {
    return null;
  }
  if (result.minutes > 59 || result.seconds > 59) {
    return null;
  }

  return result;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Formats `parts` with `pattern`.
 */
export function formatWithPattern(pattern: string, parts: DateParts): string {
  return segments(pattern)
    .map((part) => {
      if (!('token' in part)) {
        return part.literal;
      }
      const hours12 = parts.hours % 12 === 0 ? 12 : parts.hours % 12;
      switch (part.token) {
        case 'yyyy':
          return pad(parts.year, 4);
        case 'yy':
          return pad(parts.year % 100, 2);
        case 'MM':
          return pad(parts.month, 2);
        case 'M':
          return String(parts.month);
        case 'dd':
          return pad(parts.day, 2);
        case 'd':
          return String(parts.day);
        case 'HH':
          return pad(parts.hours, 2);
        case 'H':
          return String(parts.hours);
        case 'hh':
          return pad(hours12, 2);
        case 'h':
          return String(hours12);
        case 'mm':
          return pad(parts.minutes, 2);
        case 'm':
          return String(parts.minutes);
        case 'ss':
          return pad(parts.seconds, 2);
        case 's':
          return String(parts.seconds);
        case 'a':
          return parts.hours % 24 >= 12 ? 'PM' : 'AM';
      }
    })
    .join('');
}

/**
 * Reads the UTC components of a Date.
 */
export function partsFromDate(date: Date): DateParts {
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hours: date.getUTCHours(),
    minutes: date.getUTCMinutes(),
    seconds: date.getUTCSeconds(),
  };
}

/**
 * Builds a Date whose UTC components equal `parts`.
 */
export function dateFromParts(parts: DateParts): Date {
  const date = new Date(
    Date.UTC(parts.year, parts.month - 1, parts.day, parts.hours, parts.minutes, parts.seconds)
  );
  // Date.UTC maps years 0-99 onto 1900-1999
  date.setUTCFullYear(parts.year);
  return date;
}
