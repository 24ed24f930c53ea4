import { CalculationContextService } from '../services/CalculationContextService';
import type { WorklogGateway } from '../services/WorklogGateway';
import type { ChunkMode, DateRange, DayPlan } from './app-types';
import type { DistributionStrategy } from './distribution/DistributionStrategy';
import { WeightedRandomDistributionStrategy } from './distribution/WeightedRandomDistributionStrategy';
import { WeightedTaskSelector } from './distribution/WeightedTaskSelector';
import { defaultRandom, type RandomSource } from './random';
import { validateDailySettings, validateDateRange, validateWeights } from './validation';
import { WorkdaySequence } from './workdays';

export interface EngineOptions {
  dailyTargetHours: number;
  maxEntryHours: number;
  dayStartHour: number;
  utcOffsetMinutes: number;
  chunkMode: ChunkMode;
  random?: RandomSource;
}

export interface PlanSummary {
  workdays: number;
  skippedDays: number;
  entries: number;
  plannedSeconds: number;
  perIssueSeconds: Record<string, number>;
}

export class WorklogEngine {
  constructor(
    private readonly calculationContext: Pick<CalculationContextService, 'getDayLedger'>,
    private readonly strategy: DistributionStrategy,
  ) {}

  /**
   * Validates settings and weights, then wires the calculator, selector and
   * planner. Throws ConfigurationError before anything is queried.
   */
  static create<Task extends { key: string; weight: number }>(
    gateway: Pick<WorklogGateway, 'getLoggedSeconds'>,
    tasks: readonly Task[],
    options: EngineOptions,
  ): WorklogEngine {
    validateDailySettings(options);
    validateWeights(tasks);

    const random = options.random ?? defaultRandom;
    const selector = new WeightedTaskSelector(tasks, random);
    const strategy = new WeightedRandomDistributionStrategy(selector, {
      maxEntryHours: options.maxEntryHours,
      dayStartHour: options.dayStartHour,
      utcOffsetMinutes: options.utcOffsetMinutes,
      chunkMode: options.chunkMode,
      random,
    });
    return new WorklogEngine(new CalculationContextService(gateway, options.dailyTargetHours), strategy);
  }

  /**
   * Plans every workday of the range, strictly one day after another.
   * A failed logged-time query aborts the whole plan.
   */
  public async buildPlan(range: DateRange, onDay?: (plan: DayPlan) => void): Promise<DayPlan[]> {
    validateDateRange(range);

    const plans: DayPlan[] = [];
    for (const day of new WorkdaySequence(range)) {
      const ledger = await this.calculationContext.getDayLedger(day);
      const plan: DayPlan = ledger.skipped
        ? { status: 'skipped', ledger }
        : { status: 'done', ledger, entries: this.strategy.planDay(ledger) };
      plans.push(plan);
      onDay?.(plan);
    }
    return plans;
  }
}

export function summarizePlans(plans: DayPlan[]): PlanSummary {
  const summary: PlanSummary = {
    workdays: plans.length,
    skippedDays: 0,
    entries: 0,
    plannedSeconds: 0,
    perIssueSeconds: {},
  };
  for (const plan of plans) {
    if (plan.status === 'skipped') {
      summary.skippedDays++;
      continue;
    }
    for (const entry of plan.entries) {
      summary.entries++;
      summary.plannedSeconds += entry.payload.timeSpentSeconds;
      summary.perIssueSeconds[entry.issueKey] =
        (summary.perIssueSeconds[entry.issueKey] ?? 0) + entry.payload.timeSpentSeconds;
    }
  }
  return summary;
}
