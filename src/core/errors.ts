import type { PlannedWorklog } from './app-types';

/**
 * Invalid or missing settings. Raised before any day is processed.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Failure reading state from Jira (issues, current user, logged time).
 * The run cannot continue without accurate prior state.
 */
export class ExternalQueryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExternalQueryError';
  }
}

/**
 * Failure posting a single worklog entry.
 */
export class SubmissionError extends Error {
  constructor(
    readonly entry: PlannedWorklog,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SubmissionError';
  }
}

/**
 * Malformed interactive input; the prompt asks again.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * The terminal input ended while a question was waiting for an answer.
 */
export class InputClosedError extends Error {
  constructor(message = 'Input closed before an answer was given.') {
    super(message);
    this.name = 'InputClosedError';
  }
}

/**
 * Non-2xx response from the Jira REST API.
 */
export class JiraApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'JiraApiError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
