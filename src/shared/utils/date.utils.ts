/**
 * =============================================================================
 * DATE UTILITIES
 * =============================================================================
 *
 * The terminal keeps its books in one local calendar (config.timeZone).
 * Instants are stored in UTC; anything that buckets by day or month converts
 * through here first.
 *
 * Calendar values (CalendarDate, YearMonth) are plain numbers. When date-fns
 * needs a Date for arithmetic or formatting, a "wall clock" Date is built with
 * the local constructor and never compared against real instants.
 * =============================================================================
 */

import { addDays, addMonths, format, getDaysInMonth } from 'date-fns';
import { config } from '../../config/environment';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export interface YearMonth {
  year: number;
  /** 1-12 */
  month: number;
}

export interface CalendarDate extends YearMonth {
  day: number;
}

export interface ZonedDateTime extends CalendarDate {
  hour: number;
  minute: number;
  second: number;
}

/** Half-open interval [from, to) of instants */
export interface DateRange {
  from: Date;
  to: Date;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit'
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

// =============================================================================
// INSTANT <-> LOCAL CALENDAR
// =============================================================================

/**
 * Wall-clock fields of an instant in the given zone
 */
export function zonedParts(instant: Date, timeZone: string = config.timeZone): ZonedDateTime {
  const parts = formatterFor(timeZone).formatToParts(instant);
  const field = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find(part => part.type === type)?.value ?? '0');

  return {
    year: field('year'),
    month: field('month'),
    day: field('day'),
    hour: field('hour') % 24,
    minute: field('minute'),
    second: field('second')
  };
}

function zoneOffsetMs(instant: Date, timeZone: string): number {
  const p = zonedParts(instant, timeZone);
  const wallAsUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  const wholeSeconds = Math.floor(instant.getTime() / 1000) * 1000;
  return wallAsUtc - wholeSeconds;
}

/**
 * The instant at which the zone's clock shows the given wall time.
 * Out-of-range days roll over (day 32 of January is February 1st).
 */
export function zonedTimeToUtc(
  local: CalendarDate & Partial<Pick<ZonedDateTime, 'hour' | 'minute' | 'second'>>,
  timeZone: string = config.timeZone
): Date {
  const guess = Date.UTC(local.year, local.month - 1, local.day, local.hour ?? 0, local.minute ?? 0, local.second ?? 0);
  const firstOffset = zoneOffsetMs(new Date(guess), timeZone);
  const candidate = guess - firstOffset;
  const secondOffset = zoneOffsetMs(new Date(candidate), timeZone);
  return new Date(secondOffset === firstOffset ? candidate : guess - secondOffset);
}

export function toCalendarDate(instant: Date, timeZone: string = config.timeZone): CalendarDate {
  const { year, month, day } = zonedParts(instant, timeZone);
  return { year, month, day };
}

export function toYearMonth(date: YearMonth): YearMonth {
  return { year: date.year, month: date.month };
}

/** `yyyy-MM-dd` */
export function calendarKey(date: CalendarDate): string {
  return `${date.year}-${pad2(date.month)}-${pad2(date.day)}`;
}

export function localDateKey(instant: Date, timeZone: string = config.timeZone): string {
  return calendarKey(toCalendarDate(instant, timeZone));
}

/**
 * Format an instant as it reads on the local clock
 */
export function formatInstant(instant: Date, pattern: string, timeZone: string = config.timeZone): string {
  const p = zonedParts(instant, timeZone);
  return format(new Date(p.year, p.month - 1, p.day, p.hour, p.minute, p.second), pattern);
}

export function toEpochSeconds(instant: Date): number {
  return Math.floor(instant.getTime() / 1000);
}

// =============================================================================
// CALENDAR ARITHMETIC
// =============================================================================

function wallClock(date: CalendarDate): Date {
  return new Date(date.year, date.month - 1, date.day);
}

function fromWallClock(date: Date): CalendarDate {
  return { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() };
}

export function addCalendarDays(date: CalendarDate, amount: number): CalendarDate {
  return fromWallClock(addDays(wallClock(date), amount));
}

export function shiftMonth(month: YearMonth, amount: number): YearMonth {
  return toYearMonth(fromWallClock(addMonths(wallClock({ ...month, day: 1 }), amount)));
}

export function compareYearMonth(a: YearMonth, b: YearMonth): number {
  return a.year !== b.year ? a.year - b.year : a.month - b.month;
}

export function sameYearMonth(a: YearMonth, b: YearMonth): boolean {
  return compareYearMonth(a, b) === 0;
}

export function daysInMonth(month: YearMonth): number {
  return getDaysInMonth(wallClock({ ...month, day: 1 }));
}

/** `yyyy-MM` */
export function monthValue(month: YearMonth): string {
  return format(wallClock({ ...month, day: 1 }), 'yyyy-MM');
}

/** `MMMM yyyy`, e.g. "March 2025" */
export function monthLabel(month: YearMonth): string {
  return format(wallClock({ ...month, day: 1 }), 'MMMM yyyy');
}

/** `MMM dd`, e.g. "Mar 05" */
export function dayLabel(date: CalendarDate): string {
  return format(wallClock(date), 'MMM dd');
}


/**
 * Parse `YYYY-MM`; null for anything else
 */
/** Date constructors read years 0-99 as 1900-1999 */
export const MIN_CALENDAR_YEAR = 1900;

export function parseMonthValue(value: string | undefined): YearMonth | null {
  if (!value) return null;
  const match = /^(\d{4})-(\d{2})$/.exec(value);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  if (year < MIN_CALENDAR_YEAR || month < 1 || month > 12) return null;
  return { year, month };
}

// =============================================================================
// RANGES
// =============================================================================

export function dayRange(date: CalendarDate, timeZone: string = config.timeZone): DateRange {
  return {
    from: zonedTimeToUtc(date, timeZone),
    to: zonedTimeToUtc(addCalendarDays(date, 1), timeZone)
  };
}

export function monthRange(month: YearMonth, timeZone: string = config.timeZone): DateRange {
  const next = shiftMonth(month, 1);
  return {
    from: zonedTimeToUtc({ ...month, day: 1 }, timeZone),
    to: zonedTimeToUtc({ ...next, day: 1 }, timeZone)
  };
}
