import type { AppSettings, DateRange, DayPlan, WeightedTask } from '../core/app-types';
import { clampRangeEndToToday, defaultDateRange, formatInputDate } from '../core/date-utils';
import { errorMessage } from '../core/errors';
import { formatHours } from '../core/format';
import type { Logger } from '../core/logger';
import { createSeededRandom, defaultRandom } from '../core/random';
import { countWorkdays } from '../core/workdays';
import { WorklogEngine, summarizePlans } from '../core/WorklogEngine';
import { DryRunWorklogGateway } from '../services/DryRunWorklogGateway';
import { IssueProviderService } from '../services/IssueProviderService';
import { JiraWorklogGateway, type JiraClient } from '../services/JiraWorklogGateway';
import type { WorklogGateway } from '../services/WorklogGateway';
import { WorklogSubmissionService } from '../services/WorklogSubmissionService';
import type { Prompter } from './prompts';
import { renderDefaults, renderIssuesTable, renderResult, renderSummary } from './render';

export interface RunOptions {
  dryRun: boolean;
  seed?: number;
}

export interface RunContext {
  settings: AppSettings;
  createClient: (baseUrl: string, token: string) => JiraClient;
  prompter: Prompter;
  logger: Logger;
  now?: Date;
}

/**
 * The interactive session: issues, weights, period, daily settings, plan,
 * confirmation, submission. Resolves to the process exit code.
 */
export async function runWorklogFiller(ctx: RunContext, options: RunOptions): Promise<number> {
  try {
    return await runSteps(ctx, options);
  } catch (err) {
    ctx.logger.log('ERROR', errorMessage(err));
    return 1;
  }
}

async function runSteps(ctx: RunContext, options: RunOptions): Promise<number> {
  const { settings, prompter, logger } = ctx;
  const now = ctx.now ?? new Date();
  const print = (lines: string[]) => lines.forEach((line) => logger.info(line));

  const jira = ctx.createClient(settings.baseUrl, settings.token);

  print(renderDefaults(settings));
  const useDefaults = await prompter.askYesNo('Use these defaults?', true);

  logger.info(`\nStep 1/5: loading open issues for the last ${settings.taskLookbackDays} days...`);
  const issues = await new IssueProviderService(jira).getOpenIssues(settings.taskLookbackDays);
  if (issues.length === 0) {
    logger.log('ERROR', 'No open issues found for the configured JQL.');
    return 1;
  }
  print(renderIssuesTable(issues));

  const tasks: WeightedTask[] = [];
  for (const issue of issues) {
    tasks.push({ ...issue, weight: await prompter.askWeight(issue.key, issue.summary) });
  }

  logger.info('\nStep 2/5: period dates.');
  const range = await askRange(prompter, logger, now);

  logger.info('\nStep 3/5: daily workload settings.');
  let { dailyTargetHours, maxEntryHours } = settings;
  if (useDefaults) {
    logger.info(`Using daily hours [DEFAULT_HOURS]: ${dailyTargetHours}`);
    logger.info(`Using max duration per entry [DEFAULT_MAX_DURATION]: ${maxEntryHours}`);
  } else {
    dailyTargetHours = await prompter.askPositiveNumber('Hours to fill per day', dailyTargetHours);
    maxEntryHours = await prompter.askPositiveNumber('Maximum hours per entry', maxEntryHours);
  }

  const realGateway = new JiraWorklogGateway(jira, logger);
  const gateway: WorklogGateway = options.dryRun ? new DryRunWorklogGateway(realGateway, logger) : realGateway;
  const engine = WorklogEngine.create(gateway, tasks, {
    dailyTargetHours,
    maxEntryHours,
    dayStartHour: settings.dayStartHour,
    utcOffsetMinutes: settings.utcOffsetMinutes,
    chunkMode: settings.chunkMode,
    random: options.seed === undefined ? defaultRandom : createSeededRandom(options.seed),
  });

  logger.info('\nStep 4/5: planning and confirmation.');
  if (countWorkdays(range) === 0) {
    logger.info('No working days (Mon-Fri) in the selected range.');
    return 0;
  }
  const plans = await engine.buildPlan(range, (plan) => reportDay(logger, plan));
  const plan = summarizePlans(plans);
  print(
    renderSummary({ range, dailyTargetHours, maxEntryHours, chunkMode: settings.chunkMode, dryRun: options.dryRun, tasks, plan }),
  );
  if (!(await prompter.askYesNo('Confirm run?'))) {
    logger.info('Cancelled by user.');
    return 0;
  }

  logger.info('\nStep 5/5: submitting worklogs.');
  const submission = new WorklogSubmissionService(gateway, logger);
  const first = await submission.submitPlans(plans);
  let created = first.successes;
  while (!options.dryRun && submission.pendingCount > 0) {
    const retry = await prompter.askYesNo(`Retry ${submission.pendingCount} failed entries?`);
    if (!retry) break;
    created += (await submission.retryPending()).successes;
  }

  print(
    renderResult({
      workdays: plan.workdays,
      created,
      skippedDays: plan.skippedDays,
      errors: submission.pendingCount,
    }),
  );
  return 0;
}

async function askRange(prompter: Prompter, logger: Logger, now: Date): Promise<DateRange> {
  const defaults = defaultDateRange(now);
  for (;;) {
    const start = await prompter.askDate('Start date', defaults.start);
    const end = await prompter.askDate('End date', defaults.end);
    if (start > end) {
      logger.log('ERROR', 'Start date is later than end date.');
      continue;
    }
    const range = clampRangeEndToToday({ start, end }, now);
    if (range.end !== end) {
      logger.log('WARN', `End date ${formatInputDate(end)} is in the future; using ${formatInputDate(range.end)}.`);
    }
    if (range.start > range.end) {
      logger.log('ERROR', 'Start date is in the future.');
      continue;
    }
    return range;
  }
}

function reportDay(logger: Logger, plan: DayPlan): void {
  const { day, loggedSeconds } = plan.ledger;
  if (plan.status === 'skipped') {
    logger.log('SKIP', `${day}: already logged ${formatHours(loggedSeconds)}h, remaining < 1h.`);
    return;
  }
  const toAdd = plan.entries.reduce((sum, e) => sum + e.payload.timeSpentSeconds, 0);
  logger.log('DAY', `${day} logged=${formatHours(loggedSeconds)}h to_add=${formatHours(toAdd)}h`);
}
