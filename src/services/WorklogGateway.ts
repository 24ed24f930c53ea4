import type { DayISO, PlannedWorklog } from '../core/app-types';

/**
 * The two things allocation needs from the tracker: how much the current
 * user already logged on a day, and a way to record a new entry.
 */
export interface WorklogGateway {
  getLoggedSeconds(day: DayISO): Promise<number>;
  submitWorklog(entry: PlannedWorklog): Promise<void>;
}
