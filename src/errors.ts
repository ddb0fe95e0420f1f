/**
 * Error handling for the thread issue scanner.
 *
 * Analysis and delivery report failures through a typed `Result` instead of
 * throwing; the event handlers turn any failure into a private notice.
 */

/**
 * Error codes for categorizing different error types.
 */
export enum ErrorCode {
  // Slack errors
  SLACK_API_ERROR = 'SLACK_API_ERROR',

  // Pipeline errors
  THREAD_FETCH_FAILED = 'THREAD_FETCH_FAILED',
  DELIVERY_FAILED = 'DELIVERY_FAILED',
  CLEANUP_FAILED = 'CLEANUP_FAILED',
  INVALID_TIMESTAMP = 'INVALID_TIMESTAMP',

  // Input / setup errors
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

/**
 * Custom error class for bot errors.
 */
export class ThreadBotError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode
  ) {
    super(message);
    this.name = 'ThreadBotError';
  }
}

export type Ok<T> = { ok: true; value: T };
export type Err = { ok: false; error: ThreadBotError };
export type Result<T> = Ok<T> | Err;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err(error: ThreadBotError): Err {
  return { ok: false, error };
}

/**
 * Type guard for Slack API errors.
 */
interface SlackApiError {
  data?: {
    error?: string;
  };
}

function isSlackError(error: unknown): error is SlackApiError {
  return (
    typeof error === 'object' &&
    error !== null &&
    'data' in error &&
    typeof (error as SlackApiError).data === 'object'
  );
}

/**
 * Short description of a failure, preferring Slack's error code
 * (e.g. `channel_not_found`) over the wrapped message.
 */
export function describeError(error: unknown): string {
  if (isSlackError(error) && error.data?.error) {
    return error.data.error === 'ratelimited' ? 'rate limited by Slack' : error.data.error;
  }
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

/**
 * Normalize anything thrown into a ThreadBotError.
 */
export function toBotError(error: unknown, fallback: ErrorCode = ErrorCode.SLACK_API_ERROR): ThreadBotError {
  if (error instanceof ThreadBotError) {
    return error;
  }
  return new ThreadBotError(describeError(error), fallback);
}

/**
 * Convert any error to the sentence shown to the requester.
 */
export function toUserMessage(error: unknown): string {
  if (error instanceof ThreadBotError) {
    switch (error.code) {
      case ErrorCode.THREAD_FETCH_FAILED:
        return `Could not fetch the thread replies (${error.message}).`;

      case ErrorCode.DELIVERY_FAILED:
        return `Could not post the results to the thread (${error.message}).`;

      case ErrorCode.CLEANUP_FAILED:
        return `Could not remove the status message (${error.message}).`;

      case ErrorCode.INVALID_TIMESTAMP:
        return `A message had an unreadable timestamp (${error.message}).`;

      case ErrorCode.INVALID_INPUT:
        return `Invalid input: ${error.message}`;

      case ErrorCode.INVALID_CONFIG:
        return `Invalid configuration: ${error.message}`;

      case ErrorCode.SLACK_API_ERROR:
        return `Slack error: ${error.message}`;

      default:
        return error.message || 'An unexpected error occurred. Please try again.';
    }
  }

  if (isSlackError(error)) {
    return `Slack error: ${error.data?.error || 'Unknown error'}`;
  }

  if (error instanceof Error) {
    return error.message || 'An unexpected error occurred. Please try again.';
  }

  return 'An unexpected error occurred. Please try again.';
}

/**
 * Create specific error instances for common scenarios.
 */
export const Errors = {
  threadFetchFailed: (cause: unknown) =>
    new ThreadBotError(describeError(cause), ErrorCode.THREAD_FETCH_FAILED),

  deliveryFailed: (cause: unknown) =>
    new ThreadBotError(describeError(cause), ErrorCode.DELIVERY_FAILED),

  cleanupFailed: (cause: unknown) =>
    new ThreadBotError(describeError(cause), ErrorCode.CLEANUP_FAILED),

  invalidTimestamp: (ts: string) =>
    new ThreadBotError(`"${ts}" is not a Slack timestamp`, ErrorCode.INVALID_TIMESTAMP),

  invalidInput: (message: string) =>
    new ThreadBotError(message, ErrorCode.INVALID_INPUT),

  invalidConfig: (message: string) =>
    new ThreadBotError(message, ErrorCode.INVALID_CONFIG),

  slackApiError: (message: string) =>
    new ThreadBotError(message, ErrorCode.SLACK_API_ERROR),
};
