import type { DayLedger, PlannedWorklog } from '../app-types';

export interface DistributionStrategy {
  /**
   * Entries for one day in chronological order; empty for a skipped day.
   */
  planDay(ledger: DayLedger): PlannedWorklog[];
}
