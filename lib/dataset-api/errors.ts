/**
 * Custom error types for the dataset API
 */

import type { HttpMethod } from './types';

/**
 * One candidate endpoint tried while probing
 * `status` is 'error' when the request never produced a response
 */
export interface ProbeAttempt {
  method: HttpMethod;
  url: string;
  status: number | 'error';
  detail: string;
}

function describeAttempts(attempts: readonly ProbeAttempt[]): string {
  return attempts
    .map(attempt => `${attempt.method} ${attempt.url} -> ${attempt.status}${attempt.detail ? ` ${attempt.detail}` : ''}`)
    .join('; ');
}

/**
 * Authentication failed on every candidate endpoint
 */
export class AuthenticationError extends Error {
  constructor(
    message: string,
    public readonly lastError?: string,
    public readonly attempts: readonly ProbeAttempt[] = []
  ) {
    super(message);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }

  toHumanReadable(): string {
    const parts = [this.message];

    if (this.lastError) {
      parts.push(`Last error: ${this.lastError}`);
    }

    return parts.join(' - ');
  }
}

/**
 * Dataset listing failed
 */
export class ListingError extends Error {
  constructor(
    message: string,
    public readonly attempts: readonly ProbeAttempt[] = []
  ) {
    super(message);
    this.name = 'ListingError';
    Object.setPrototypeOf(this, ListingError.prototype);
  }

  toHumanReadable(): string {
    return this.attempts.length > 0 ? `${this.message} (${describeAttempts(this.attempts)})` : this.message;
  }
}

/**
 * A single dataset could not be retrieved from any candidate endpoint
 */
export class FetchError extends Error {
  constructor(
    public readonly identifier: string,
    public readonly attempts: readonly ProbeAttempt[] = []
  ) {
    super(`Failed to fetch dataset '${identifier}' from API.`);
    this.name = 'FetchError';
    Object.setPrototypeOf(this, FetchError.prototype);
  }

  toHumanReadable(): string {
    return this.attempts.length > 0 ? `${this.message} (${describeAttempts(this.attempts)})` : this.message;
  }
}

/**
 * Every upsert candidate was rejected
 */
export class UpsertError extends Error {
  constructor(
    public readonly identifier: string,
    public readonly attempts: readonly ProbeAttempt[]
  ) {
    super(`Upsert attempts failed for dataset '${identifier}'`);
    this.name = 'UpsertError';
    Object.setPrototypeOf(this, UpsertError.prototype);
  }

  toHumanReadable(): string {
    return `${this.message}: ${describeAttempts(this.attempts)}`;
  }
}

/**
 * Delete was not acknowledged with 200/204
 */
export class DeleteError extends Error {
  constructor(
    public readonly identifier: string,
    public readonly statusCode?: number,
    public readonly responseBody: string = ''
  ) {
    super(
      statusCode === undefined
        ? `Delete failed for dataset '${identifier}': ${responseBody}`
        : `Delete failed (${statusCode}): ${responseBody}`
    );
    this.name = 'DeleteError';
    Object.setPrototypeOf(this, DeleteError.prototype);
  }

  toHumanReadable(): string {
    const parts = [this.message, `Dataset: ${this.identifier}`];

    if (this.statusCode) {
      parts.push(`Status: ${this.statusCode}`);
    }

    return parts.join(' | ');
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}:\n${issues.map(issue => `  - ${issue}`).join('\n')}` : message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Message of anything thrown, for logs and per-item outcomes
 */
export function errorMessage(error: unknown): string {
  if (
    error instanceof AuthenticationError ||
    error instanceof ListingError ||
    error instanceof FetchError ||
    error instanceof UpsertError ||
    error instanceof DeleteError
  ) {
    return error.toHumanReadable();
  }
  return error instanceof Error ? error.message : String(error);
}
