/**
 * Retry policy for backend calls
 * Rate limits (429), timeouts and 5xx responses are transient and retried with exponential backoff.
 */

import type { TranslatorOutcome } from '../interfaces/translator.js';

export interface RetryConfig {
  /** Total attempts per chunk, the first one included */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Upper bound of random jitter added to each delay */
  jitterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterMs: 0,
};

const TRANSIENT_STATUS = new Set([408, 409, 429]);

const TRANSIENT_ERROR_NAMES = new Set([
  'APIConnectionError',
  'APIConnectionTimeoutError',
  'RateLimitError',
  'InternalServerError',
  'MalformedResponseError',
]);

const TRANSIENT_MESSAGE_PATTERNS = [
  'rate limit',
  'too many requests',
  'timeout',
  'timed out',
  'network',
  'econnreset',
  'econnrefused',
  'socket hang up',
  'connection error',
  'overloaded',
];

/**
 * Resolves after `ms`, or as soon as `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Delay before the attempt following `attempt` (1-based)
 */
export function computeBackoffDelay(
  attempt: number,
  config: RetryConfig,
  random: () => number = Math.random
): number {
  const exponential = config.baseDelayMs * Math.pow(2, attempt - 1);
  const jitter = config.jitterMs > 0 ? random() * config.jitterMs : 0;
  return Math.min(exponential + jitter, config.maxDelayMs);
}

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'APIUserAbortError');
}

export function isRateLimitError(error: unknown): boolean {
  if (statusOf(error) === 429) return true;
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return message.includes('429') || message.includes('rate limit') || message.includes('too many requests');
  }
  return false;
}

export function isRetryableError(error: unknown): boolean {
  if (isAbortError(error)) return false;
  if (isRateLimitError(error)) return true;

  const status = statusOf(error);
  if (status !== undefined) {
    return TRANSIENT_STATUS.has(status) || status >= 500;
  }

  if (error instanceof Error) {
    if (TRANSIENT_ERROR_NAMES.has(error.name)) return true;
    const message = error.message.toLowerCase();
    return TRANSIENT_MESSAGE_PATTERNS.some((pattern) => message.includes(pattern));
  }
  return false;
}

/**
 * Turn a thrown backend error into a tagged failure outcome
 */
export function classifyError(error: unknown): TranslatorOutcome {
  const message = error instanceof Error ? error.message : String(error);
  return isRetryableError(error)
    ? { status: 'transient-failure', error: message }
    : { status: 'permanent-failure', error: message };
}
