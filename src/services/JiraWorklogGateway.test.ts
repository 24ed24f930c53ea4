import { describe, it, expect, vi, beforeEach } from 'vitest';
import { JiraWorklogGateway, isSameUser } from './JiraWorklogGateway';
import type { JiraApiService } from './JiraApiService';
import { createMemoryLogger } from '../test-helpers';
import { ExternalQueryError, SubmissionError } from '../core/errors';
import type { JiraWorklog } from '../core/jira-types';

const me = { key: 'jdoe', name: 'jdoe', displayName: 'J. Doe' };
const colleague = { key: 'asmith', name: 'asmith' };

describe('JiraWorklogGateway', () => {
  const getCurrentUser = vi.fn<JiraApiService['getCurrentUser']>();
  const searchIssues = vi.fn<JiraApiService['searchIssues']>();
  const getIssueWorklogs = vi.fn<JiraApiService['getIssueWorklogs']>();
  const logWork = vi.fn<JiraApiService['logWork']>();
  let logger: ReturnType<typeof createMemoryLogger>;
  let gateway: JiraWorklogGateway;

  beforeEach(() => {
    vi.resetAllMocks();
    getCurrentUser.mockResolvedValue(me);
    logger = createMemoryLogger();
    gateway = new JiraWorklogGateway({ getCurrentUser, searchIssues, getIssueWorklogs, logWork }, logger);
  });

  describe('getLoggedSeconds', () => {
    it('sums my worklogs started on the day across the issues Jira reports', async () => {
      // Arrange
      searchIssues.mockResolvedValue([
        { id: '1', key: 'PROJ-1', fields: {} },
        { id: '2', key: 'PROJ-2', fields: {} },
        { id: '1', key: 'PROJ-1', fields: {} },
      ]);
      const worklogs: Record<string, JiraWorklog[]> = {
        'PROJ-1': [
          { author: me, started: '2026-02-23T10:00:00.000+0300', timeSpentSeconds: 3600 },
          { author: me, started: '2026-02-24T10:00:00.000+0300', timeSpentSeconds: 7200 }, // other day
          { author: colleague, started: '2026-02-23T12:00:00.000+0300', timeSpentSeconds: 3600 }, // not mine
        ],
        'PROJ-2': [
          { author: me, started: '2026-02-23T15:00:00.000+0300', timeSpentSeconds: 1800 },
          { author: me, started: 'garbage', timeSpentSeconds: 3600 },
          { author: me, started: '2026-02-23T16:00:00.000+0300', timeSpentSeconds: 0 },
        ],
      };
      getIssueWorklogs.mockImplementation(async (key) => worklogs[key] ?? []);

      // Act
      const seconds = await gateway.getLoggedSeconds('2026-02-23');

      // Assert
      expect(seconds).toBe(5400);
      expect(searchIssues).toHaveBeenCalledWith('worklogAuthor=currentUser() AND worklogDate="2026-02-23"', ['key']);
      // duplicate keys are fetched once
      expect(getIssueWorklogs).toHaveBeenCalledTimes(2);
    });

    it('returns 0 when nothing is logged', async () => {
      searchIssues.mockResolvedValue([]);

      await expect(gateway.getLoggedSeconds('2026-02-23')).resolves.toBe(0);
      expect(getIssueWorklogs).not.toHaveBeenCalled();
    });

    it('looks the current user up once per gateway', async () => {
      searchIssues.mockResolvedValue([]);

      await gateway.getLoggedSeconds('2026-02-23');
      await gateway.getLoggedSeconds('2026-02-24');

      expect(getCurrentUser).toHaveBeenCalledTimes(1);
    });

    it('fails the query when any worklog fetch fails', async () => {
      searchIssues.mockResolvedValue([{ id: '1', key: 'PROJ-1', fields: {} }]);
      getIssueWorklogs.mockRejectedValue(new Error('Jira API request failed: 500 Internal Server Error'));

      await expect(gateway.getLoggedSeconds('2026-02-23')).rejects.toThrow(ExternalQueryError);
      await expect(gateway.getLoggedSeconds('2026-02-23')).rejects.toThrow(
        'Failed to calculate logged time for 2026-02-23: Jira API request failed: 500 Internal Server Error',
      );
    });
  });

  describe('submitWorklog', () => {
    const entry = {
      issueKey: 'PROJ-1',
      payload: { comment: 'Work on task PROJ-1', started: '2026-02-23T10:00:00.000+0300', timeSpentSeconds: 3600 },
    };

    it('posts the payload and reports success', async () => {
      logWork.mockResolvedValue(undefined);

      await gateway.submitWorklog(entry);

      expect(logWork).toHaveBeenCalledWith('PROJ-1', entry.payload);
      expect(logger.lines).toEqual([{ tag: 'OK', message: 'PROJ-1 +1h started=2026-02-23T10:00:00.000+0300' }]);
    });

    it('raises a submission error that carries the entry', async () => {
      logWork.mockRejectedValue(new Error('Jira API request failed: 403 Forbidden'));

      const err = await gateway.submitWorklog(entry).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(SubmissionError);
      expect(err).toMatchObject({ entry, message: 'Jira API request failed: 403 Forbidden' });
      expect(logger.lines).toEqual([]);
    });
  });
});

describe('isSameUser', () => {
  it('prefers accountId, then key, then name', () => {
    expect(isSameUser({ accountId: 'a1' }, { accountId: 'a1', key: 'x' })).toBe(true);
    expect(isSameUser({ accountId: 'a1', key: 'x' }, { accountId: 'a2', key: 'x' })).toBe(false);
    expect(isSameUser({ key: 'jdoe' }, { key: 'jdoe' })).toBe(true);
    expect(isSameUser({ name: 'jdoe' }, { name: 'jdoe' })).toBe(true);
    expect(isSameUser({ name: 'jdoe' }, { key: 'jdoe' })).toBe(false);
  });
});
