import { MEDIA_KINDS } from '../types';
import type { CalendarDate, ExportFilter, MediaKind, NormalizedMessage } from '../types';
import { isMediaKind } from './kinds';
import { parseCalendarDate, toCalendarDate, isValidTimeZone } from '../utils/dateFormat';
import { DateRangeError, ExportInputError } from '../utils/errors';

export interface ExportFilterInput {
  startDate?: string;
  endDate?: string;
  includedMediaKinds?: Iterable<MediaKind>;
  timeZone?: string;
}

/**
 * Validates user input into an ExportFilter. Bounds are inclusive calendar
 * dates; a missing bound leaves that side open. Media kinds default to all.
 */
export function createExportFilter(input: ExportFilterInput = {}): ExportFilter {
  const startDate = input.startDate ? parseCalendarDate(input.startDate) : undefined;
  const endDate = input.endDate ? parseCalendarDate(input.endDate) : undefined;

  if (startDate && endDate && endDate < startDate) {
    throw new DateRangeError(`End date ${endDate} is before start date ${startDate}`);
  }
  if (input.timeZone !== undefined && !isValidTimeZone(input.timeZone)) {
    throw new ExportInputError(`Unknown time zone "${input.timeZone}"`);
  }

  return Object.freeze({
    startDate,
    endDate,
    includedMediaKinds: new Set(input.includedMediaKinds ?? MEDIA_KINDS),
    timeZone: input.timeZone,
  });
}

export function isWithinDateRange(
  date: CalendarDate,
  filter: Pick<ExportFilter, 'startDate' | 'endDate'>
): boolean {
  if (filter.startDate && date < filter.startDate) return false;
  if (filter.endDate && date > filter.endDate) return false;
  return true;
}

export function passesFilter(message: NormalizedMessage, filter: ExportFilter): boolean {
  if (filter.startDate || filter.endDate) {
    const day = toCalendarDate(message.timestamp, filter.timeZone);
    if (!isWithinDateRange(day, filter)) {
      return false;
    }
  }

  // Text and service records are never removed by the media predicate
  if (isMediaKind(message.kind)) {
    return filter.includedMediaKinds.has(message.kind);
  }
  return true;
}

/**
 * Stable subset of the input that satisfies the date range and media kinds
 */
export function filterMessages(
  messages: readonly NormalizedMessage[],
  filter: ExportFilter
): NormalizedMessage[] {
  return messages.filter((message) => passesFilter(message, filter));
}
