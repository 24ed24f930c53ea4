import type { AppSettings, DateRange, IssueRow, WeightedTask } from '../core/app-types';
import { SUMMARY_COLUMN_WIDTH } from '../core/constants';
import { formatInputDate, formatUtcOffset } from '../core/date-utils';
import { formatHours, maskToken } from '../core/format';
import type { PlanSummary } from '../core/WorklogEngine';
import { SETTING_ENV_VARS } from '../services/SettingsService';

export function renderDefaults(settings: AppSettings): string[] {
  const row = (label: string, key: keyof AppSettings, value: string | number) =>
    `  - ${label} [${SETTING_ENV_VARS[key]}]: ${value}`;
  return [
    '',
    'Default values from .env:',
    row('Jira base URL', 'baseUrl', settings.baseUrl),
    row('Jira API token', 'token', maskToken(settings.token)),
    row('Daily hours', 'dailyTargetHours', settings.dailyTargetHours),
    row('Max duration per entry', 'maxEntryHours', settings.maxEntryHours),
    row('Task lookback in days', 'taskLookbackDays', settings.taskLookbackDays),
    row('First entry starts at hour', 'dayStartHour', settings.dayStartHour),
    row('UTC offset in minutes', 'utcOffsetMinutes', `${settings.utcOffsetMinutes} (${formatUtcOffset(settings.utcOffsetMinutes)})`),
    row('Chunk mode', 'chunkMode', settings.chunkMode),
  ];
}

function truncate(text: string, width: number): string {
  return text.length <= width ? text : `${text.slice(0, width - 3)}...`;
}

export function renderIssuesTable(issues: IssueRow[]): string[] {
  if (issues.length === 0) return [];

  const indexWidth = Math.max('#'.length, String(issues.length).length);
  const keyWidth = Math.max('Issue Key'.length, ...issues.map((i) => i.key.length));
  const summaryWidth = SUMMARY_COLUMN_WIDTH;
  const separator = `+-${'-'.repeat(indexWidth)}-+-${'-'.repeat(keyWidth)}-+-${'-'.repeat(summaryWidth)}-+`;
  const line = (index: string, key: string, summary: string) =>
    `| ${index.padEnd(indexWidth)} | ${key.padEnd(keyWidth)} | ${summary.padEnd(summaryWidth)} |`;

  return [
    '',
    'Open issues:',
    separator,
    line('#', 'Issue Key', 'Summary'),
    separator,
    ...issues.map((issue, i) => line(String(i + 1), issue.key, truncate(issue.summary, summaryWidth))),
    separator,
  ];
}

export interface SummaryView {
  range: DateRange;
  dailyTargetHours: number;
  maxEntryHours: number;
  chunkMode: AppSettings['chunkMode'];
  dryRun: boolean;
  tasks: WeightedTask[];
  plan: PlanSummary;
}

export function renderSummary(view: SummaryView): string[] {
  const { plan } = view;
  const lines = [
    '',
    '=== Summary ===',
    `Period: ${formatInputDate(view.range.start)} - ${formatInputDate(view.range.end)}`,
    `Hours per day: ${view.dailyTargetHours}`,
    `Max single-task duration: ${view.maxEntryHours} h`,
    `Chunk mode: ${view.chunkMode}`,
    `Mode: ${view.dryRun ? 'DRY-RUN' : 'REAL POST'}`,
    'Weights:',
    ...view.tasks.map((t) => `  - ${t.key}: ${t.weight} (${t.summary})`),
    `Working days: ${plan.workdays} (skipped: ${plan.skippedDays})`,
    `Planned entries: ${plan.entries} (${formatHours(plan.plannedSeconds)}h)`,
  ];
  const perIssue = Object.entries(plan.perIssueSeconds);
  if (perIssue.length > 0) {
    lines.push('Planned hours per issue:', ...perIssue.map(([key, seconds]) => `  - ${key}: ${formatHours(seconds)}h`));
  }
  lines.push('==============', '');
  return lines;
}

export interface RunResult {
  workdays: number;
  created: number;
  skippedDays: number;
  errors: number;
}

export function renderResult(result: RunResult): string[] {
  return [
    '',
    '=== Result ===',
    `Working days: ${result.workdays}`,
    `Created entries: ${result.created}`,
    `Skipped days: ${result.skippedDays}`,
    `Errors: ${result.errors}`,
  ];
}
