import type { JiraApiService } from './JiraApiService';
import type { WorklogGateway } from './WorklogGateway';
import type { DayISO, PlannedWorklog } from '../core/app-types';
import type { JiraUser, JiraUserRef, JiraWorklog } from '../core/jira-types';
import { startedDay } from '../core/date-utils';
import { formatHours } from '../core/format';
import { ExternalQueryError, SubmissionError, errorMessage } from '../core/errors';
import type { Logger } from '../core/logger';

export type JiraClient = Pick<JiraApiService, 'getCurrentUser' | 'searchIssues' | 'getIssueWorklogs' | 'logWork'>;

export class JiraWorklogGateway implements WorklogGateway {
  private currentUser: JiraUser | null = null;

  constructor(
    private readonly jira: JiraClient,
    private readonly logger: Logger,
  ) {}

  /**
   * Seconds the current user logged on `day`, across every issue Jira
   * reports as having a worklog by them on that date.
   */
  async getLoggedSeconds(day: DayISO): Promise<number> {
    try {
      const me = await this.getCurrentUser();
      const issues = await this.jira.searchIssues(
        `worklogAuthor=currentUser() AND worklogDate="${day}"`,
        ['key'],
      );
      const keys = [...new Set(issues.map((i) => i.key).filter(Boolean))];

      let total = 0;
      for (const key of keys) {
        const worklogs = await this.jira.getIssueWorklogs(key);
        for (const worklog of worklogs) {
          total += loggedOnDay(worklog, day, me);
        }
      }
      return total;
    } catch (err) {
      throw new ExternalQueryError(`Failed to calculate logged time for ${day}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async submitWorklog(entry: PlannedWorklog): Promise<void> {
    try {
      await this.jira.logWork(entry.issueKey, entry.payload);
    } catch (err) {
      throw new SubmissionError(entry, errorMessage(err), { cause: err });
    }
    this.logger.log(
      'OK',
      `${entry.issueKey} +${formatHours(entry.payload.timeSpentSeconds, 0)}h started=${entry.payload.started}`,
    );
  }

  private async getCurrentUser(): Promise<JiraUser> {
    if (!this.currentUser) {
      this.currentUser = await this.jira.getCurrentUser();
    }
    return this.currentUser;
  }
}

function loggedOnDay(worklog: JiraWorklog, day: DayISO, me: JiraUserRef): number {
  const seconds = worklog.timeSpentSeconds ?? 0;
  if (!worklog.started || seconds <= 0) return 0;
  if (startedDay(worklog.started) !== day) return 0;
  if (!worklog.author || !isSameUser(worklog.author, me)) return 0;
  return seconds;
}

export function isSameUser(a: JiraUserRef, b: JiraUserRef): boolean {
  if (a.accountId && b.accountId) return a.accountId === b.accountId;
  if (a.key && b.key) return a.key === b.key;
  if (a.name && b.name) return a.name === b.name;
  return false;
}
