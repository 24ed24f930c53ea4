// Global constants for allocation and Jira access

export const HOUR_SECONDS = 3600;

// A day with less than this left to fill gets no entries
export const SKIP_THRESHOLD_SECONDS = HOUR_SECONDS;

// Weight bounds accepted from the prompt
export const MIN_TASK_WEIGHT = 1;
export const MAX_TASK_WEIGHT = 5;

// Page size requested from Jira search and worklog endpoints (server may cap)
export const JIRA_PAGE_SIZE = 100;

// Date format used for interactive input and the summary
export const DATE_INPUT_FORMAT = 'DD.MM.YYYY';

// Summaries longer than this are cut in the issues table
export const SUMMARY_COLUMN_WIDTH = 90;

export function worklogComment(issueKey: string): string {
  return `Work on task ${issueKey}`;
}
