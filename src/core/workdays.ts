import type { DateRange, DayISO } from './app-types';
import { addDays, isWeekday } from './date-utils';

/**
 * Monday-Friday days of an inclusive range, in ascending order.
 * Each iteration starts over from `range.start`; nothing is precomputed.
 */
export class WorkdaySequence implements Iterable<DayISO> {
  constructor(private readonly range: DateRange) {}

  *[Symbol.iterator](): Iterator<DayISO> {
    // ISO days compare lexicographically
    for (let day = this.range.start; day <= this.range.end; day = addDays(day, 1)) {
      if (isWeekday(day)) yield day;
    }
  }
}

export function countWorkdays(range: DateRange): number {
  let count = 0;
  for (const _day of new WorkdaySequence(range)) count++;
  return count;
}
