import type { DailySettings, DateRange } from './app-types';
import { MAX_TASK_WEIGHT } from './constants';
import { ConfigurationError } from './errors';

export function validateDailySettings(settings: DailySettings): void {
  const { dailyTargetHours, maxEntryHours } = settings;
  if (!Number.isFinite(dailyTargetHours) || dailyTargetHours <= 0) {
    throw new ConfigurationError('Daily hours must be a positive number.');
  }
  if (!Number.isFinite(maxEntryHours) || maxEntryHours <= 0) {
    throw new ConfigurationError('Max duration per entry must be a positive number.');
  }
  // chunks are whole hours
  if (maxEntryHours < 1) {
    throw new ConfigurationError('Max duration per entry must be at least 1 hour.');
  }
  if (maxEntryHours > dailyTargetHours) {
    throw new ConfigurationError('Max task duration cannot exceed daily hours.');
  }
}

export function validateWeights(tasks: ReadonlyArray<{ key: string; weight: number }>): void {
  for (const task of tasks) {
    if (!Number.isInteger(task.weight) || task.weight < 0 || task.weight > MAX_TASK_WEIGHT) {
      throw new ConfigurationError(`Weight for ${task.key} must be an integer from 0 to ${MAX_TASK_WEIGHT}.`);
    }
  }
  if (!tasks.some((t) => t.weight > 0)) {
    throw new ConfigurationError('At least one task with a positive weight is required.');
  }
}

export function validateDateRange(range: DateRange): void {
  if (range.start > range.end) {
    throw new ConfigurationError('Start date is later than end date.');
  }
}
