import type {
  JiraIssue,
  JiraSearchPage,
  JiraUser,
  JiraWorklog,
  JiraWorklogPage,
} from '../core/jira-types';
import type { WorklogPayload } from '../core/app-types';
import { JIRA_PAGE_SIZE } from '../core/constants';
import { ConfigurationError, JiraApiError, errorMessage } from '../core/errors';

interface Page<Item> {
  items: Item[];
  startAt?: number;
  maxResults?: number;
  total?: number;
}

export class JiraApiService {
  private readonly baseUrl: string;
  private readonly JIRA_API_V2 = '/rest/api/2';

  constructor(
    baseUrl: string,
    private readonly token: string,
  ) {
    if (!token) {
      throw new ConfigurationError('Jira token is empty. Pass --token or set DEFAULT_TOKEN in .env.');
    }
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  public async getCurrentUser(): Promise<JiraUser> {
    return this._request<JiraUser>(`${this.JIRA_API_V2}/myself`);
  }

  /**
   * Runs a JQL search and follows pagination until Jira reports no more results.
   */
  public async searchIssues(jql: string, fields: string[]): Promise<JiraIssue[]> {
    return this.collectPages(async (startAt) => {
      const page = await this._request<JiraSearchPage>(`${this.JIRA_API_V2}/search`, {
        method: 'POST',
        body: JSON.stringify({ jql, startAt, maxResults: JIRA_PAGE_SIZE, fields }),
      });
      return { ...page, items: page.issues ?? [] };
    });
  }

  public async getIssueWorklogs(issueKey: string): Promise<JiraWorklog[]> {
    return this.collectPages(async (startAt) => {
      const params = new URLSearchParams({ startAt: String(startAt), maxResults: String(JIRA_PAGE_SIZE) });
      const page = await this._request<JiraWorklogPage>(
        `${this.JIRA_API_V2}/issue/${encodeURIComponent(issueKey)}/worklog?${params.toString()}`,
      );
      return { ...page, items: page.worklogs ?? [] };
    });
  }

  public async logWork(issueKey: string, payload: WorklogPayload): Promise<void> {
    await this._request(`${this.JIRA_API_V2}/issue/${encodeURIComponent(issueKey)}/worklog`, {
      method: 'POST',
      body: JSON.stringify({
        comment: payload.comment,
        started: payload.started,
        timeSpentSeconds: payload.timeSpentSeconds,
      }),
    });
  }

  private async collectPages<Item>(loadPage: (startAt: number) => Promise<Page<Item>>): Promise<Item[]> {
    const all: Item[] = [];
    let startAt = 0;
    for (;;) {
      const page = await loadPage(startAt);
      all.push(...page.items);

      const pageStart = page.startAt ?? startAt;
      const pageSize = page.maxResults ?? page.items.length;
      const total = page.total ?? all.length;
      if (page.items.length === 0 || pageSize <= 0 || pageStart + pageSize >= total) break;
      startAt = pageStart + pageSize;
    }
    return all;
  }

  /**
   * A private helper method to handle all API requests.
   */
  private async _request<T>(endpoint: string, options: RequestInit = {}): Promise<T> {
    const url = `${this.baseUrl}${endpoint}`;
    const method = options.method ?? 'GET';
    const headers = {
      Authorization: `Bearer ${this.token}`,
      Accept: 'application/json',
      'Content-Type': 'application/json',
    };

    let response: Response;
    try {
      response = await fetch(url, { ...options, method, headers });
    } catch (err) {
      throw new JiraApiError(0, `Request failed: ${method} ${url}: ${errorMessage(err)}`);
    }

    const text = await response.text();

    if (!response.ok) {
      throw new JiraApiError(
        response.status,
        `Jira API request failed: ${response.status} ${response.statusText}${describeErrorBody(text)}`,
      );
    }

    // Handle responses with no content
    if (response.status === 204 || text.trim() === '') {
      return {} as T;
    }

    try {
      const data: T = JSON.parse(text);
      return data;
    } catch {
      throw new JiraApiError(response.status, `Non-JSON response for ${method} ${url}`);
    }
  }
}

function describeErrorBody(text: string): string {
  if (!text) return '';
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return ` - ${text.slice(0, 500)}`;
  }
  if (typeof data === 'object' && data !== null) {
    if ('errorMessages' in data && Array.isArray(data.errorMessages) && data.errorMessages.length > 0) {
      return ` - ${data.errorMessages.join('; ')}`;
    }
    if ('errors' in data && typeof data.errors === 'object' && data.errors !== null) {
      const messages = Object.values(data.errors).filter((m): m is string => typeof m === 'string');
      if (messages.length > 0) return ` - ${messages.join('; ')}`;
    }
    if ('message' in data && typeof data.message === 'string') {
      return ` - ${data.message}`;
    }
  }
  return '';
}
