/**
 * Common Error Types
 */

import { ZodError } from 'zod';

/**
 * Raised when a transport endpoint cannot be opened.
 * Carries the endpoint and the underlying cause so callers can report both.
 */
export class ConnectionError extends Error {
  readonly endpoint: string;
  readonly cause: unknown;

  constructor(endpoint: string, cause: unknown) {
    super(`Failed to connect to ${endpoint}: ${describeError(cause)}`);
    this.name = 'ConnectionError';
    this.endpoint = endpoint;
    this.cause = cause;
  }
}

export class AlreadyRunningError extends Error {
  constructor() {
    super('Acquisition is already running');
    this.name = 'AlreadyRunningError';
  }
}

/**
 * An operation was called in a session state that does not allow it
 */
export class SessionStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SessionStateError';
  }
}

export class ChannelIndexError extends Error {
  readonly index: number;

  constructor(index: number, channelCount: number) {
    super(`Channel index ${index} is out of range (0..${channelCount - 1})`);
    this.name = 'ChannelIndexError';
    this.index = index;
  }
}

export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function fromZodError(message: string, error: ZodError): ConfigValidationError {
  const issues = error.issues.map(issue => {
    const location = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${location}${issue.message}`;
  });
  return new ConfigValidationError(message, issues);
}
