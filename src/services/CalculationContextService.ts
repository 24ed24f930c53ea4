// src/services/CalculationContextService.ts
import type { DayISO, DayLedger } from '../core/app-types';
import { HOUR_SECONDS, SKIP_THRESHOLD_SECONDS } from '../core/constants';
import type { WorklogGateway } from './WorklogGateway';

export class CalculationContextService {
  private readonly targetSeconds: number;

  constructor(
    private readonly gateway: Pick<WorklogGateway, 'getLoggedSeconds'>,
    dailyTargetHours: number,
  ) {
    this.targetSeconds = Math.round(dailyTargetHours * HOUR_SECONDS);
  }

  /**
   * Queries the time already logged on `day` (exactly once) and works out
   * what is left of the daily target.
   * A day with less than one hour left is marked skipped. Query failures propagate.
   */
  async getDayLedger(day: DayISO): Promise<DayLedger> {
    const loggedSeconds = await this.gateway.getLoggedSeconds(day);
    const remainingSeconds = Math.max(0, this.targetSeconds - loggedSeconds);

    return {
      day,
      loggedSeconds,
      remainingSeconds,
      skipped: remainingSeconds < SKIP_THRESHOLD_SECONDS,
    };
  }
}
