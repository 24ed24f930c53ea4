import type { ChunkMode, DayLedger, PlannedWorklog } from '../app-types';
import { HOUR_SECONDS, worklogComment } from '../constants';
import { composeStarted } from '../date-utils';
import { defaultRandom, randomInt, type RandomSource } from '../random';
import type { DistributionStrategy } from './DistributionStrategy';
import { WeightedTaskSelector } from './WeightedTaskSelector';

interface StrategyOptions {
  maxEntryHours: number;
  dayStartHour: number; // wall-clock hour of the first entry, e.g. 10
  utcOffsetMinutes: number; // offset stamped on "started", e.g. 180
  chunkMode?: ChunkMode;
  random?: RandomSource; // only used for chunk sizes in 'random' mode
}

/**
 * Fills a day's remaining time with back-to-back entries, each attributed to
 * a task drawn by weight. Stops as soon as less than one hour is left.
 */
export class WeightedRandomDistributionStrategy<Task extends { key: string; weight: number }>
  implements DistributionStrategy
{
  private readonly maxEntrySeconds: number;
  private readonly chunkMode: ChunkMode;
  private readonly random: RandomSource;

  constructor(
    private readonly selector: WeightedTaskSelector<Task>,
    private readonly options: StrategyOptions,
  ) {
    this.maxEntrySeconds = Math.round(options.maxEntryHours * HOUR_SECONDS);
    this.chunkMode = options.chunkMode ?? 'hourly';
    this.random = options.random ?? defaultRandom;
  }

  planDay(ledger: DayLedger): PlannedWorklog[] {
    if (ledger.skipped) return [];

    const entries: PlannedWorklog[] = [];
    let toAllocate = ledger.remainingSeconds;
    let cursor = 0;

    while (toAllocate >= HOUR_SECONDS) {
      const task = this.selector.pick();
      const chunk = this.nextChunk(toAllocate);

      entries.push({
        issueKey: task.key,
        payload: {
          comment: worklogComment(task.key),
          started: composeStarted(ledger.day, cursor, this.options.dayStartHour, this.options.utcOffsetMinutes),
          timeSpentSeconds: chunk,
        },
      });

      toAllocate -= chunk;
      cursor += chunk;
    }

    return entries;
  }

  private nextChunk(toAllocate: number): number {
    const bound = Math.min(this.maxEntrySeconds, toAllocate);
    if (this.chunkMode === 'random') {
      const maxHours = Math.max(1, Math.floor(bound / HOUR_SECONDS));
      return randomInt(this.random, 1, maxHours) * HOUR_SECONDS;
    }
    return Math.min(HOUR_SECONDS, bound);
  }
}
