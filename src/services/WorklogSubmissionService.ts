import type { DayPlan, PlannedWorklog } from '../core/app-types';
import { errorMessage } from '../core/errors';
import type { Logger } from '../core/logger';
import type { WorklogGateway } from './WorklogGateway';

export interface FailedSubmission {
  entry: PlannedWorklog;
  error: string;
}

export interface SubmitResult {
  successes: number;
  failures: number;
  failed: FailedSubmission[];
}

/**
 * Posts planned entries one at a time, in plan order. A failed entry is
 * reported and kept for an explicit retry; the remaining entries are still attempted.
 * Nothing already posted is rolled back.
 */
export class WorklogSubmissionService {
  private readonly pending: PlannedWorklog[] = [];

  constructor(
    private readonly gateway: Pick<WorklogGateway, 'submitWorklog'>,
    private readonly logger: Logger,
  ) {}

  get pendingCount(): number {
    return this.pending.length;
  }

  async submitPlans(plans: DayPlan[]): Promise<SubmitResult> {
    const entries = plans.flatMap((plan) => (plan.status === 'done' ? plan.entries : []));
    const result = await this.submitEntries(entries);
    this.pending.push(...result.failed.map((f) => f.entry));
    return result;
  }

  async retryPending(): Promise<SubmitResult> {
    const retry = this.pending.splice(0, this.pending.length);
    const result = await this.submitEntries(retry);
    this.pending.push(...result.failed.map((f) => f.entry));
    return result;
  }

  private async submitEntries(entries: PlannedWorklog[]): Promise<SubmitResult> {
    let successes = 0;
    const failed: FailedSubmission[] = [];

    for (const entry of entries) {
      try {
        await this.gateway.submitWorklog(entry);
        successes++;
      } catch (err) {
        const error = errorMessage(err);
        this.logger.log('ERR', `${entry.issueKey}: ${error}`);
        failed.push({ entry, error });
      }
    }

    return { successes, failures: failed.length, failed };
  }
}
