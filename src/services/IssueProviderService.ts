import type { JiraApiService } from './JiraApiService';
import type { IssueRow } from '../core/app-types';
import type { JiraIssue } from '../core/jira-types';
import { ExternalQueryError, errorMessage } from '../core/errors';

export class IssueProviderService {
  constructor(private readonly jiraApiService: Pick<JiraApiService, 'searchIssues'>) {}

  static buildOpenIssuesJql(lookbackDays: number): string {
    return [
      'assignee=currentUser()',
      'statusCategory!=Done',
      `created>=-${lookbackDays}d`,
    ].join(' AND ') + ' ORDER BY created DESC';
  }

  /**
   * Open issues assigned to the current user and created within the lookback
   * window, newest first. Issues without a key are dropped; a blank summary
   * becomes "no summary".
   */
  async getOpenIssues(lookbackDays: number): Promise<IssueRow[]> {
    const jql = IssueProviderService.buildOpenIssuesJql(lookbackDays);
    let issues: JiraIssue[];
    try {
      issues = await this.jiraApiService.searchIssues(jql, ['key', 'summary']);
    } catch (err) {
      throw new ExternalQueryError(`Failed to fetch issues: ${errorMessage(err)}`, { cause: err });
    }

    const rows: IssueRow[] = [];
    for (const issue of issues) {
      if (!issue.key) continue;
      const summary = (issue.fields?.summary ?? '').trim() || 'no summary';
      rows.push({ key: issue.key, summary });
    }
    return rows;
  }
}
