import { sleep } from '../async/sleep.util';

const DEFAULT_MAX_ATTEMPTS = 4;
const DEFAULT_BASE_DELAY_MS = 1000;
const DEFAULT_MAX_DELAY_MS = 60_000;
const DEFAULT_BACKOFF_MULTIPLIER = 2;

export interface IExponentialBackoffOptions {
  readonly maxAttempts?: number;
  readonly baseDelayMs?: number;
  readonly maxDelayMs?: number;
  readonly multiplier?: number;
  readonly shouldRetry: (error: unknown, attempt: number) => boolean;
  /**
   * Replaces the computed backoff for a single retry, e.g. with a server-provided wait.
   * Returning `null` keeps the exponential delay.
   */
  readonly resolveDelayMs?: (error: unknown, attempt: number) => number | null;
  readonly onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const resolvePositiveInteger = (value: number | undefined, fallback: number): number => {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }

  return Math.floor(value);
};

const resolveMultiplier = (value: number | undefined): number => {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 1) {
    return DEFAULT_BACKOFF_MULTIPLIER;
  }

  return value;
};

// attempt is 1-based: the first retry waits baseDelayMs.
export const computeBackoffDelayMs = (
  attempt: number,
  baseDelayMs: number,
  multiplier: number,
  maxDelayMs: number,
): number => Math.min(Math.round(baseDelayMs * multiplier ** (attempt - 1)), maxDelayMs);

export const executeWithExponentialBackoff = async <TResult>(
  operation: (attempt: number) => Promise<TResult>,
  options: IExponentialBackoffOptions,
): Promise<TResult> => {
  const maxAttempts: number = resolvePositiveInteger(options.maxAttempts, DEFAULT_MAX_ATTEMPTS);
  const baseDelayMs: number = resolvePositiveInteger(options.baseDelayMs, DEFAULT_BASE_DELAY_MS);
  const maxDelayMs: number = resolvePositiveInteger(options.maxDelayMs, DEFAULT_MAX_DELAY_MS);
  const multiplier: number = resolveMultiplier(options.multiplier);

  for (let attempt: number = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error: unknown) {
      const shouldRetry: boolean = attempt < maxAttempts && options.shouldRetry(error, attempt);

      if (!shouldRetry) {
        throw error;
      }

      const delayMs: number =
        options.resolveDelayMs?.(error, attempt) ??
        computeBackoffDelayMs(attempt, baseDelayMs, multiplier, maxDelayMs);

      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }

  throw new Error('Unreachable backoff branch');
};
