// src/core/jira-types.ts

/**
 * Represents a simplified Jira Issue object.
 */
export interface JiraIssue {
  id: string;
  key: string;
  fields: {
    summary?: string | null;
  };
}

/**
 * Paged response of POST /rest/api/2/search.
 */
export interface JiraSearchPage {
  issues?: JiraIssue[];
  startAt?: number;
  maxResults?: number;
  total?: number;
}

/**
 * Author of a worklog. Server/Data Center fills key and name, Cloud fills accountId.
 */
export interface JiraUserRef {
  accountId?: string;
  key?: string;
  name?: string;
  displayName?: string;
}

/**
 * Represents a worklog entry in Jira.
 */
export interface JiraWorklog {
  id?: string;
  author?: JiraUserRef;
  timeSpentSeconds?: number;
  started?: string; // e.g. "2026-02-23T10:00:00.000+0300"
  comment?: string;
}

/**
 * Paged response of GET /rest/api/2/issue/{key}/worklog.
 */
export interface JiraWorklogPage {
  worklogs?: JiraWorklog[];
  startAt?: number;
  maxResults?: number;
  total?: number;
}

/**
 * Represents the current user's details from Jira.
 */
export interface JiraUser extends JiraUserRef {
  displayName: string;
  emailAddress?: string;
}
