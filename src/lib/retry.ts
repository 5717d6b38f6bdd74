/**
 * Feedgate — Retry With Backoff
 *
 * The single place where backoff policy for remote calls lives.
 * Callers wrap an operation; they never loop on failures themselves.
 */

import { logger, errorMessage } from './logger';
import { AnalyzerResponseError } from './errors';

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Upper bound of the random jitter, as a fraction of the delay. */
  jitterRatio?: number;
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  /** Name used in log lines. */
  label?: string;
}

export const DEFAULT_RETRY_OPTIONS = {
  maxAttempts: 5,
  baseDelayMs: 1_000,
  maxDelayMs: 60_000,
  jitterRatio: 0.1,
} as const;

const RETRYABLE_STATUS = new Set([408, 409, 429, 500, 502, 503, 504, 529]);

const RETRYABLE_PATTERNS = [
  'rate limit',
  'rate_limit',
  'quota',
  'resource exhausted',
  'too many requests',
  'overloaded',
  'timeout',
  'timed out',
  'connection',
  'econnreset',
  'econnrefused',
  'socket hang up',
  'unavailable',
  'internal error',
];

/** A retryable status code appearing as a whole number in a message. */
const RETRYABLE_STATUS_IN_MESSAGE = /\b(408|429|50[0234]|529)\b/;

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return undefined;
  }
  const { status } = error;
  return typeof status === 'number' ? status : undefined;
}

/**
 * Rate-limit, overload, 5xx, timeout and connection failures are worth
 * another attempt. Everything else is terminal.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof AnalyzerResponseError) return false;

  const status = statusOf(error);
  if (status !== undefined) {
    return RETRYABLE_STATUS.has(status) || status >= 500;
  }

  const message = errorMessage(error).toLowerCase();
  const name = error instanceof Error ? error.name.toLowerCase() : '';
  return (
    name.includes('timeout') ||
    name.includes('connection') ||
    RETRYABLE_STATUS_IN_MESSAGE.test(message) ||
    RETRYABLE_PATTERNS.some(pattern => message.includes(pattern))
  );
}

/**
 * Delay before the retry that follows a failed `attempt` (0-based).
 */
export function backoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'jitterRatio' | 'random'> = {}
): number {
  const base = options.baseDelayMs ?? DEFAULT_RETRY_OPTIONS.baseDelayMs;
  const cap = options.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs;
  const jitterRatio = options.jitterRatio ?? DEFAULT_RETRY_OPTIONS.jitterRatio;
  const random = options.random ?? Math.random;

  const delay = Math.min(base * 2 ** attempt, cap);
  return delay + random() * delay * jitterRatio;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

/**
 * Run `operation`, retrying retryable failures with exponential backoff.
 * Terminal failures and the last failure after exhaustion propagate.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_RETRY_OPTIONS.maxAttempts);
  const isRetryable = options.isRetryable ?? isRetryableError;
  const sleep = options.sleep ?? defaultSleep;
  const label = options.label ?? 'remote call';

  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;

      if (!isRetryable(error)) {
        logger.warn('Non-retryable failure', { label, error: errorMessage(error) });
        throw error;
      }

      if (attempt === maxAttempts - 1) break;

      const delayMs = backoffDelay(attempt, options);
      logger.warn('Retrying after failure', {
        label,
        attempt: attempt + 1,
        maxAttempts,
        delayMs: Math.round(delayMs),
        error: errorMessage(error),
      });
      await sleep(delayMs);
    }
  }

  logger.error('All retries failed', { label, maxAttempts, error: errorMessage(lastError) });
  throw lastError;
}
