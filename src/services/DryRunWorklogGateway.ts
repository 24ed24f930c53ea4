import type { WorklogGateway } from './WorklogGateway';
import type { DayISO, PlannedWorklog } from '../core/app-types';
import type { Logger } from '../core/logger';

/**
 * Same contract as the real gateway, but submitting only prints the payload.
 * Logged-time queries still go to the tracker so the plan matches a real run.
 */
export class DryRunWorklogGateway implements WorklogGateway {
  constructor(
    private readonly source: Pick<WorklogGateway, 'getLoggedSeconds'>,
    private readonly logger: Logger,
  ) {}

  getLoggedSeconds(day: DayISO): Promise<number> {
    return this.source.getLoggedSeconds(day);
  }

  async submitWorklog(entry: PlannedWorklog): Promise<void> {
    this.logger.log('DRY-RUN', `${entry.issueKey} ${JSON.stringify(entry.payload)}`);
  }
}
