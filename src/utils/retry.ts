import { logger } from './logger.js';

export class NonRetryableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'NonRetryableError';
  }
}

/** Thrown once the attempt budget is spent; `cause` is the last failure. */
export class ExhaustedError extends Error {
  constructor(
    public readonly label: string,
    public readonly attempts: number,
    cause: unknown,
  ) {
    super(
      `${label}: gave up after ${attempts} attempt(s): ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = 'ExhaustedError';
  }
}

/** Delay in ms to wait after failed attempt `attempt` (1-based). */
export type BackoffSchedule = (attempt: number) => number;

export interface RetryPolicy {
  maxAttempts: number;
  backoff: BackoffSchedule;
}

export interface AttemptEvent {
  label: string;
  attempt: number;
  maxAttempts: number;
  error: unknown;
  /** Delay before the next attempt; null when no further attempt follows. */
  nextDelayMs: number | null;
}

export interface RetryOptions<T> extends RetryPolicy {
  label: string;
  /** Validation gate: throw to reject a result. A rejection uses up the attempt. */
  validate?: (result: T) => void;
  isRetryable?: (err: unknown) => boolean;
  onAttempt?: (event: AttemptEvent) => void;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

/**
 * Exponential backoff with multiplicative jitter: base × factor^(n-1) × U(jitter),
 * capped at maxDelayMs. With the default jitter range the uncapped schedule
 * never decreases as long as factor ≥ 1.5.
 */
export function exponentialBackoff(opts: {
  baseDelayMs: number;
  factor?: number;
  maxDelayMs?: number;
  jitter?: readonly [number, number];
  random?: () => number;
}): BackoffSchedule {
  const { baseDelayMs, factor = 2, maxDelayMs = Number.POSITIVE_INFINITY,
    jitter = [1, 1.5], random = Math.random } = opts;
  return (attempt) => {
    const [lo, hi] = jitter;
    const scale = lo + (hi - lo) * random();
    return Math.min(Math.round(baseDelayMs * Math.pow(factor, attempt - 1) * scale), maxDelayMs);
  };
}

/** A fixed list of delays; the last entry repeats once the list runs out. */
export function scheduleFrom(delaysMs: readonly number[]): BackoffSchedule {
  return (attempt) => delaysMs[Math.min(attempt, delaysMs.length) - 1] ?? 0;
}

/**
 * Run `fn` until it succeeds (and passes `validate`), at most `maxAttempts` times.
 * Holds no state between calls. Sleeps are never shorter than the previous
 * one, whatever the schedule returns.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions<T>): Promise<T> {
  const { label, maxAttempts, backoff, validate, sleep = defaultSleep, onAttempt,
    isRetryable = (e) => !(e instanceof NonRetryableError) } = opts;
  let lastErr: unknown;
  let lastDelay = 0;
  let attempt = 0;
  while (attempt < maxAttempts) {
    attempt++;
    try {
      const result = await fn(attempt);
      validate?.(result);
      return result;
    } catch (err) {
      lastErr = err;
      const final = attempt >= maxAttempts || !isRetryable(err);
      const delay = final ? null : Math.max(lastDelay, backoff(attempt));
      logger.warn(`Retry [${label}] attempt ${attempt}/${maxAttempts} failed`, {
        error: String(err),
        nextDelayMs: delay,
      });
      onAttempt?.({ label, attempt, maxAttempts, error: err, nextDelayMs: delay });
      if (delay === null) break;
      lastDelay = delay;
      await sleep(delay);
    }
  }
  throw new ExhaustedError(label, attempt, lastErr);
}
