/**
 * Date Formatting Utilities
 *
 * strftime-style patterns evaluated in an IANA time zone (system zone when
 * none is given). Supported tokens:
 *   %d  day, 2 digits        %e  day, no padding
 *   %m  month, 2 digits      %y  year, 2 digits     %Y  year, 4 digits
 *   %H  hour (00-23)         %I  hour (01-12)       %p  AM/PM
 *   %M  minute               %S  second
 *   %a  weekday (Mon)        %A  weekday (Monday)
 *   %b  month (Jun)          %B  month (June)       %%  literal percent
 */

import { DateRangeError, TemplateError } from './errors';
import type { CalendarDate } from '../types';

export interface DateParts {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
  weekday: number; // 0 = Sunday
}

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];
const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];
const DAY_MS = 24 * 60 * 60 * 1000;

const pad = (value: number, width = 2): string => value.toString().padStart(width, '0');

const DATE_TOKENS = new Map<string, (parts: DateParts) => string>([
  ['d', (p) => pad(p.day)],
  ['e', (p) => String(p.day)],
  ['m', (p) => pad(p.month)],
  ['y', (p) => pad(p.year % 100)],
  ['Y', (p) => pad(p.year, 4)],
  ['H', (p) => pad(p.hour)],
  ['I', (p) => pad(p.hour % 12 === 0 ? 12 : p.hour % 12)],
  ['p', (p) => (p.hour < 12 ? 'AM' : 'PM')],
  ['M', (p) => pad(p.minute)],
  ['S', (p) => pad(p.second)],
  ['a', (p) => WEEKDAYS[p.weekday].slice(0, 3)],
  ['A', (p) => WEEKDAYS[p.weekday]],
  ['b', (p) => MONTHS[p.month - 1].slice(0, 3)],
  ['B', (p) => MONTHS[p.month - 1]],
  ['%', () => '%'],
]);

type CompiledPattern = (parts: DateParts) => string;

const formatterCache = new Map<string, Intl.DateTimeFormat>();
const patternCache = new Map<string, CompiledPattern>();

// ============================================================================
// TIME ZONES
// ============================================================================

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

export function systemTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

function partsFormatter(timeZone: string | undefined): Intl.DateTimeFormat {
  const key = timeZone ?? '';
  let formatter = formatterCache.get(key);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      weekday: 'short',
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
      hour: 'numeric',
      minute: 'numeric',
      second: 'numeric',
    });
    formatterCache.set(key, formatter);
  }
  return formatter;
}

/**
 * Splits an instant into wall-clock fields of the given zone
 */
export function getDateParts(date: Date, timeZone?: string): DateParts {
  const values = new Map<string, string>();
  for (const part of partsFormatter(timeZone).formatToParts(date)) {
    values.set(part.type, part.value);
  }

  const weekdayName = values.get('weekday') ?? '';
  return {
    year: Number(values.get('year')),
    month: Number(values.get('month')),
    day: Number(values.get('day')),
    hour: Number(values.get('hour')),
    minute: Number(values.get('minute')),
    second: Number(values.get('second')),
    weekday: WEEKDAYS.findIndex((name) => name.startsWith(weekdayName)),
  };
}

function zoneOffsetMs(date: Date, timeZone?: string): number {
  const p = getDateParts(date, timeZone);
  const wallClock = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return wallClock - Math.floor(date.getTime() / 1000) * 1000;
}

/**
 * Inverse of getDateParts: the instant at which the zone shows the given wall-clock time
 */
export function zonedTimeToDate(
  parts: Omit<DateParts, 'weekday'>,
  timeZone?: string
): Date {
  const asUtc = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
  const firstGuess = asUtc - zoneOffsetMs(new Date(asUtc), timeZone);
  // Second pass settles guesses that landed across a DST transition
  const offset = zoneOffsetMs(new Date(firstGuess), timeZone);
  return new Date(asUtc - offset);
}

// ============================================================================
// PATTERNS
// ============================================================================

function compileDatePattern(pattern: string): CompiledPattern {
  const cached = patternCache.get(pattern);
  if (cached) {
    return cached;
  }

  const segments: Array<string | ((parts: DateParts) => string)> = [];
  let literal = '';

  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char !== '%') {
      literal += char;
      continue;
    }

    const token = pattern[i + 1];
    const render = token === undefined ? undefined : DATE_TOKENS.get(token);
    if (!render) {
      throw new TemplateError(
        token === undefined
          ? `Date pattern "${pattern}" ends with a lone "%"`
          : `Unknown date token "%${token}" in pattern "${pattern}"`
      );
    }

    if (literal) {
      segments.push(literal);
      literal = '';
    }
    segments.push(render);
    i++;
  }
  if (literal) {
    segments.push(literal);
  }

  const compiled: CompiledPattern = (parts) =>
    segments.map((segment) => (typeof segment === 'string' ? segment : segment(parts))).join('');
  patternCache.set(pattern, compiled);
  return compiled;
}

/**
 * Throws TemplateError when the pattern uses an unknown token
 */
export function validateDatePattern(pattern: string): void {
  compileDatePattern(pattern);
}

export function formatDate(date: Date, pattern: string, timeZone?: string): string {
  return compileDatePattern(pattern)(getDateParts(date, timeZone));
}

// ============================================================================
// CALENDAR DATES
// ============================================================================

export function toCalendarDate(date: Date, timeZone?: string): CalendarDate {
  const p = getDateParts(date, timeZone);
  return `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)}`;
}

/**
 * Validates a YYYY-MM-DD string and returns it unchanged
 */
export function parseCalendarDate(input: string): CalendarDate {
  const trimmed = input.trim();
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(trimmed);
  if (!match) {
    throw new DateRangeError(`Invalid date "${input}", expected YYYY-MM-DD`);
  }

  const [, year, month, day] = match;
  const check = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (check.getUTCMonth() !== Number(month) - 1 || check.getUTCDate() !== Number(day)) {
    throw new DateRangeError(`Invalid date "${input}": no such calendar day`);
  }

  return trimmed;
}

function calendarDateToUtc(date: CalendarDate): number {
  const [year, month, day] = date.split('-').map(Number);
  return Date.UTC(year, month - 1, day);
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier)
 */
export function calendarDaysBetween(from: CalendarDate, to: CalendarDate): number {
  return Math.round((calendarDateToUtc(to) - calendarDateToUtc(from)) / DAY_MS);
}

/**
 * First instant of the calendar day in the given zone
 */
export function startOfCalendarDate(date: CalendarDate, timeZone?: string): Date {
  const [year, month, day] = date.split('-').map(Number);
  return zonedTimeToDate({ year, month, day, hour: 0, minute: 0, second: 0 }, timeZone);
}

export function addCalendarDays(date: CalendarDate, days: number): CalendarDate {
  const shifted = new Date(calendarDateToUtc(date) + days * DAY_MS);
  return `${pad(shifted.getUTCFullYear(), 4)}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
}
