import { describe, it, expect, vi, beforeEach } from 'vitest';
import { IssueProviderService } from './IssueProviderService';
import { JiraApiService } from './JiraApiService';
import { ExternalQueryError } from '../core/errors';
import type { JiraIssue } from '../core/jira-types';

describe('IssueProviderService', () => {
  let jiraApiServiceMock: Pick<JiraApiService, 'searchIssues'>;
  const searchIssues = vi.fn<JiraApiService['searchIssues']>();
  let issueProviderService: IssueProviderService;

  beforeEach(() => {
    searchIssues.mockReset();
    jiraApiServiceMock = { searchIssues };
    issueProviderService = new IssueProviderService(jiraApiServiceMock);
  });

  it('should construct the open-issues JQL with the lookback window', async () => {
    // Arrange
    searchIssues.mockResolvedValue([]);

    // Act
    await issueProviderService.getOpenIssues(60);

    // Assert
    expect(searchIssues).toHaveBeenCalledWith(
      'assignee=currentUser() AND statusCategory!=Done AND created>=-60d ORDER BY created DESC',
      ['key', 'summary'],
    );
  });

  it('keeps Jira order, trims summaries and drops issues without a key', async () => {
    const issues: JiraIssue[] = [
      { id: '3', key: 'PROJ-3', fields: { summary: '  Newest  ' } },
      { id: '9', key: '', fields: { summary: 'Broken' } },
      { id: '2', key: 'PROJ-2', fields: { summary: '   ' } },
      { id: '1', key: 'PROJ-1', fields: { summary: null } },
    ];
    searchIssues.mockResolvedValue(issues);

    const rows = await issueProviderService.getOpenIssues(30);

    expect(rows).toEqual([
      { key: 'PROJ-3', summary: 'Newest' },
      { key: 'PROJ-2', summary: 'no summary' },
      { key: 'PROJ-1', summary: 'no summary' },
    ]);
  });

  it('wraps search failures as external query errors', async () => {
    searchIssues.mockRejectedValue(new Error('Jira API request failed: 401 Unauthorized'));

    await expect(issueProviderService.getOpenIssues(60)).rejects.toThrow(ExternalQueryError);
    await expect(issueProviderService.getOpenIssues(60)).rejects.toThrow(
      'Failed to fetch issues: Jira API request failed: 401 Unauthorized',
    );
  });
});
