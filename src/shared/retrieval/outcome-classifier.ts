import { ErrorKind } from '../common/errors/retrieval.error';
import { FetchError, FetchErrorKind } from './errors/fetch.error';

export type AttemptDecision =
  | { action: 'retry'; throttled: boolean }
  | { action: 'abort'; kind: ErrorKind };

const THROTTLE_STATUSES = new Set([401, 403, 429]);

/**
 * Maps a failed fetch attempt to retry or abort. Connection-class failures
 * (network errors, timeouts, 401/403/429) are worth another egress identity;
 * anything the upstream reported about the post itself is final.
 */
export function classifyFailure(error: unknown): AttemptDecision {
  if (!(error instanceof FetchError)) {
    return { action: 'abort', kind: ErrorKind.Unexpected };
  }

  switch (error.kind) {
    case FetchErrorKind.Connection:
      return {
        action: 'retry',
        throttled:
          error.statusCode !== undefined &&
          THROTTLE_STATUSES.has(error.statusCode),
      };
    case FetchErrorKind.Forbidden:
      return { action: 'retry', throttled: true };
    case FetchErrorKind.NotFound:
    case FetchErrorKind.Other:
      return { action: 'abort', kind: ErrorKind.UpstreamRejected };
  }
}

/** Kind reported once every attempt failed with a retryable error. */
export function exhaustedKind(lastFailureThrottled: boolean): ErrorKind {
  return lastFailureThrottled
    ? ErrorKind.RateLimited
    : ErrorKind.UpstreamUnavailable;
}
