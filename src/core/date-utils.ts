import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import type { DateRange, DayISO } from './app-types';
import { DATE_INPUT_FORMAT } from './constants';
import { ValidationError } from './errors';

dayjs.extend(utc);
dayjs.extend(customParseFormat);

const ISO_DAY = 'YYYY-MM-DD';

export function toIsoDay(date: Date): DayISO {
  return dayjs(date).format(ISO_DAY);
}

/**
 * Today's calendar date in the local time zone.
 */
export function todayIso(now: Date = new Date()): DayISO {
  return toIsoDay(now);
}

/**
 * Same day of the previous month, clamped to that month's length
 * (31.03 -> 28.02 or 29.02).
 */
export function subtractOneMonth(day: DayISO): DayISO {
  return dayjs.utc(day).subtract(1, 'month').format(ISO_DAY);
}

export function defaultDateRange(now: Date = new Date()): DateRange {
  const end = todayIso(now);
  return { start: subtractOneMonth(end), end };
}

export function parseInputDate(value: string): DayISO {
  const parsed = dayjs.utc(value.trim(), DATE_INPUT_FORMAT, true);
  if (!parsed.isValid()) {
    throw new ValidationError('Invalid format. Use dd.mm.yyyy');
  }
  return parsed.format(ISO_DAY);
}

export function formatInputDate(day: DayISO): string {
  return dayjs.utc(day).format(DATE_INPUT_FORMAT);
}

export function addDays(day: DayISO, amount: number): DayISO {
  return dayjs.utc(day).add(amount, 'day').format(ISO_DAY);
}

// 0 = Sunday ... 6 = Saturday
export function weekdayOf(day: DayISO): number {
  return dayjs.utc(day).day();
}

export function isWeekday(day: DayISO): boolean {
  const dow = weekdayOf(day);
  return dow !== 0 && dow !== 6;
}

/**
 * 180 -> "+0300", -330 -> "-0530"
 */
export function formatUtcOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  const hh = String(Math.floor(abs / 60)).padStart(2, '0');
  const mm = String(abs % 60).padStart(2, '0');
  return `${sign}${hh}${mm}`;
}

/**
 * Jira "started" value for a wall-clock time on `day`:
 * `startHour` plus `offsetSeconds`, stamped with the given UTC offset.
 * e.g. ("2026-02-23", 3600, 10, 180) -> "2026-02-23T11:00:00.000+0300"
 */
export function composeStarted(
  day: DayISO,
  offsetSeconds: number,
  startHour: number,
  utcOffsetMinutes: number,
): string {
  const wallClock = dayjs.utc(day).hour(startHour).add(offsetSeconds, 'second');
  return `${wallClock.format('YYYY-MM-DDTHH:mm:ss.SSS')}${formatUtcOffset(utcOffsetMinutes)}`;
}

/**
 * Calendar day of a Jira "started" timestamp in its own offset,
 * or null when the value does not look like one.
 */
export function startedDay(started: string): DayISO | null {
  const match = /^(\d{4}-\d{2}-\d{2})T\d{2}:\d{2}/.exec(started);
  if (!match) return null;
  return dayjs.utc(match[1], ISO_DAY, true).isValid() ? match[1] : null;
}

export function clampRangeEndToToday(range: DateRange, now: Date = new Date()): DateRange {
  const today = todayIso(now);
  return range.end > today ? { ...range, end: today } : range;
}
