/**
 * Custom error classes for search and export operations
 */

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class AuthError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = "AuthError";
    Object.setPrototypeOf(this, AuthError.prototype);
  }
}

export class SearchTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SearchTimeoutError";
    Object.setPrototypeOf(this, SearchTimeoutError.prototype);
  }
}

export class RateLimitError extends Error {
  constructor(
    message: string,
    public readonly retryAfter?: number
  ) {
    super(message);
    this.name = "RateLimitError";
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

export class AbuseLimitError extends Error {
  constructor(
    message: string,
    public readonly retryAfter?: number
  ) {
    super(message);
    this.name = "AbuseLimitError";
    Object.setPrototypeOf(this, AbuseLimitError.prototype);
  }
}

export class GitHubAPIError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = "GitHubAPIError";
    Object.setPrototypeOf(this, GitHubAPIError.prototype);
  }
}

export class ExportIOError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = "ExportIOError";
    Object.setPrototypeOf(this, ExportIOError.prototype);
  }
}

export class NoResultsError extends Error {
  constructor(
    message: string,
    public readonly failedKeywords: string[]
  ) {
    super(message);
    this.name = "NoResultsError";
    Object.setPrototypeOf(this, NoResultsError.prototype);
  }
}

/**
 * Rate limits, timeouts, server errors and network failures are worth
 * another attempt; auth and validation problems never are.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof AuthError || error instanceof ValidationError) {
    return false;
  }
  if (
    error instanceof RateLimitError ||
    error instanceof AbuseLimitError ||
    error instanceof SearchTimeoutError
  ) {
    return true;
  }
  if (error instanceof GitHubAPIError) {
    // No status means the request never got a response
    return error.statusCode === undefined || error.statusCode >= 500;
  }
  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
