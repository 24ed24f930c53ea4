// src/core/app-types.ts

export type ChunkMode = 'hourly' | 'random';

/**
 * Defines the shape of all user-configurable settings for the tool.
 */
export interface AppSettings {
  baseUrl: string;
  token: string;
  dailyTargetHours: number;
  maxEntryHours: number;
  taskLookbackDays: number;
  dayStartHour: number;
  utcOffsetMinutes: number;
  chunkMode: ChunkMode;
}

/**
 * Default values for all application settings.
 */
export const DEFAULT_SETTINGS: AppSettings = {
  baseUrl: 'https://jira.example.com',
  token: '',
  dailyTargetHours: 4,
  maxEntryHours: 2,
  taskLookbackDays: 60,
  dayStartHour: 10,
  utcOffsetMinutes: 180,
  chunkMode: 'hourly',
};

export type DayISO = string; // e.g., "2023-10-02"

export interface DateRange {
  start: DayISO;
  end: DayISO;
}

export interface DailySettings {
  dailyTargetHours: number;
  maxEntryHours: number;
}

export interface IssueRow {
  key: string;
  summary: string;
}

/**
 * An open issue together with the weight the user gave it for this run.
 * A weight of 0 keeps the issue in the table but out of the draw.
 */
export interface WeightedTask extends IssueRow {
  weight: number;
}

/**
 * Per-day record of time already logged and time left to fill.
 */
export interface DayLedger {
  day: DayISO;
  loggedSeconds: number;
  remainingSeconds: number;
  skipped: boolean;
}

// Exact body of POST /rest/api/2/issue/{key}/worklog
export interface WorklogPayload {
  comment: string;
  started: string; // e.g. "2026-02-23T10:00:00.000+0300"
  timeSpentSeconds: number;
}

export interface PlannedWorklog {
  issueKey: string;
  payload: WorklogPayload;
}

export type DayPlan =
  | { status: 'skipped'; ledger: DayLedger }
  | { status: 'done'; ledger: DayLedger; entries: PlannedWorklog[] };
