import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import type { DateRange } from './core/app-types';
import type { Logger, LogTag } from './core/logger';
import type { RandomSource } from './core/random';

dayjs.extend(utc);

export interface RecordedLine {
  tag: LogTag | null;
  message: string;
}

export function createMemoryLogger(): Logger & { lines: RecordedLine[] } {
  const lines: RecordedLine[] = [];
  return {
    lines,
    info(message) {
      lines.push({ tag: null, message });
    },
    log(tag, message) {
      lines.push({ tag, message });
    },
  };
}

/**
 * Replays the given values in order, wrapping around.
 */
export function sequenceRandom(values: number[]): RandomSource {
  if (values.length === 0) throw new Error('sequenceRandom needs at least one value');
  let idx = 0;
  return () => {
    const value = values[idx % values.length];
    idx++;
    return value;
  };
}

// Calendar days in an inclusive range, weekends included
export function rangeLengthDays(range: DateRange): number {
  return dayjs.utc(range.end).diff(dayjs.utc(range.start), 'day') + 1;
}
