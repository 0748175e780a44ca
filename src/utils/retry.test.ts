import {
  ExhaustedError,
  NonRetryableError,
  exponentialBackoff,
  scheduleFrom,
  withRetry,
  type AttemptEvent,
} from './retry.js';

function recorder() {
  const sleeps: number[] = [];
  return { sleeps, sleep: async (ms: number) => { sleeps.push(ms); } };
}

describe('withRetry', () => {
  it('returns the first success after k-1 failures', async () => {
    const { sleeps, sleep } = recorder();
    let calls = 0;
    const result = await withRetry(async (attempt) => {
      calls++;
      if (attempt < 3) throw new Error(`boom ${attempt}`);
      return 'ok';
    }, { label: 'test', maxAttempts: 5, backoff: scheduleFrom([10, 20, 40]), sleep });

    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(sleeps).toEqual([10, 20]);
  });

  it('throws ExhaustedError carrying the last failure once attempts run out', async () => {
    const { sleeps, sleep } = recorder();
    let calls = 0;
    const err = await withRetry(async (attempt) => {
      calls++;
      throw new Error(`boom ${attempt}`);
    }, { label: 'story', maxAttempts: 3, backoff: scheduleFrom([10, 20, 40]), sleep }).catch((e: unknown) => e);

    expect(calls).toBe(3);
    expect(sleeps).toEqual([10, 20]);
    expect(err).toBeInstanceOf(ExhaustedError);
    if (!(err instanceof ExhaustedError)) return;
    expect(err.label).toBe('story');
    expect(err.attempts).toBe(3);
    expect(err.cause).toBeInstanceOf(Error);
    expect(err.message).toBe('story: gave up after 3 attempt(s): boom 3');
  });

  it('never sleeps less than the previous delay', async () => {
    const { sleeps, sleep } = recorder();
    await withRetry(async () => { throw new Error('nope'); }, {
      label: 'mono', maxAttempts: 5, backoff: scheduleFrom([10, 50, 20, 60]), sleep,
    }).catch(() => undefined);

    expect(sleeps).toEqual([10, 50, 50, 60]);
    for (let i = 1; i < sleeps.length; i++) {
      expect(sleeps[i]).toBeGreaterThanOrEqual(sleeps[i - 1] ?? 0);
    }
  });

  it('counts a validation rejection as a failed attempt', async () => {
    const { sleep } = recorder();
    let calls = 0;
    const result = await withRetry(async () => ++calls, {
      label: 'gate',
      maxAttempts: 5,
      backoff: () => 0,
      sleep,
      validate: (n) => { if (n < 3) throw new Error(`too small: ${n}`); },
    });

    expect(result).toBe(3);
    expect(calls).toBe(3);
  });

  it('stops at once on a non-retryable failure', async () => {
    const { sleeps, sleep } = recorder();
    let calls = 0;
    const err = await withRetry(async () => {
      calls++;
      throw new NonRetryableError('bad request');
    }, { label: 'fatal', maxAttempts: 5, backoff: () => 100, sleep }).catch((e: unknown) => e);

    expect(calls).toBe(1);
    expect(sleeps).toEqual([]);
    expect(err).toBeInstanceOf(ExhaustedError);
    if (err instanceof ExhaustedError) {
      expect(err.attempts).toBe(1);
      expect(err.cause).toBeInstanceOf(NonRetryableError);
    }
  });

  it('makes a single call without sleeping when maxAttempts is 1', async () => {
    const { sleeps, sleep } = recorder();
    let calls = 0;
    await expect(withRetry(async () => {
      calls++;
      throw new Error('once');
    }, { label: 'single', maxAttempts: 1, backoff: () => 100, sleep })).rejects.toBeInstanceOf(ExhaustedError);

    expect(calls).toBe(1);
    expect(sleeps).toEqual([]);
  });

  it('reports every failed attempt to onAttempt', async () => {
    const { sleep } = recorder();
    const events: AttemptEvent[] = [];
    await withRetry(async () => { throw new Error('x'); }, {
      label: 'observe', maxAttempts: 3, backoff: scheduleFrom([5, 15]), sleep,
      onAttempt: (e) => events.push(e),
    }).catch(() => undefined);

    expect(events.map((e) => [e.attempt, e.nextDelayMs])).toEqual([[1, 5], [2, 15], [3, null]]);
    expect(events.every((e) => e.label === 'observe' && e.maxAttempts === 3)).toBe(true);
  });
});

describe('exponentialBackoff', () => {
  it('doubles from the base delay and stops at the cap', () => {
    const backoff = exponentialBackoff({ baseDelayMs: 10_000, maxDelayMs: 60_000, random: () => 0 });
    expect([1, 2, 3, 4, 5].map(backoff)).toEqual([10_000, 20_000, 40_000, 60_000, 60_000]);
  });

  it('applies up to 50% jitter and stays non-decreasing', () => {
    const values = [1, 0, 1, 0, 1];
    let i = 0;
    const backoff = exponentialBackoff({
      baseDelayMs: 10_000,
      maxDelayMs: 60_000,
      random: () => values[i++ % values.length] ?? 0,
    });
    expect([1, 2, 3, 4, 5].map(backoff)).toEqual([15_000, 20_000, 60_000, 60_000, 60_000]);
  });
});

describe('scheduleFrom', () => {
  it('repeats the last delay once the list runs out', () => {
    const backoff = scheduleFrom([1, 2]);
    expect([1, 2, 3, 4].map(backoff)).toEqual([1, 2, 2, 2]);
  });
});
