import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TimeoutError } from '../../../src/core/errors.js';
import { backoffDelay, poll, type PollPolicy, sleep } from '../../../src/core/utils/poll.js';

const policy: PollPolicy = { interval: 100, increment: 100, maxInterval: 250, timeout: 1000 };

describe('backoffDelay', () => {
  it('grows linearly up to the cap', () => {
    expect([0, 1, 2, 3, 9].map((attempt) => backoffDelay(policy, attempt))).toEqual([100, 200, 250, 250, 250]);
  });
});

describe('poll', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the observation that is done', async () => {
    const check = vi.fn(async ({ attempt }: { attempt: number }) => ({
      done: attempt === 2,
      state: `attempt ${attempt}`,
      value: attempt,
    }));

    const result = poll('web', check, policy);
    await vi.advanceTimersByTimeAsync(300);

    await expect(result).resolves.toEqual({ done: true, state: 'attempt 2', value: 2 });
    expect(check).toHaveBeenCalledTimes(3);
  });

  it('fails exactly at the deadline with the last observed state', async () => {
    const check = vi.fn(async () => ({ done: false, state: 'waiting' }));

    const result = poll('Deployment/web', check, policy);
    const assertion = expect(result).rejects.toThrow(
      'Timeout after 1000ms waiting for Deployment/web to be ready (last observed: waiting)'
    );

    await vi.advanceTimersByTimeAsync(999);
    expect(check).toHaveBeenCalledTimes(5);

    await vi.advanceTimersByTimeAsync(1);
    await assertion;
    // t=0, 100, 300, 550, 800 and the last check at 1000
    expect(check).toHaveBeenCalledTimes(6);
  });

  it('treats a throwing check as not done', async () => {
    const result = poll('db', async () => {
      throw new Error('connection refused');
    }, { ...policy, timeout: 0 });

    await expect(result).rejects.toThrow('(last observed: error: connection refused)');
  });

  it('stops when the signal aborts', async () => {
    const controller = new AbortController();
    const check = vi.fn(async () => ({ done: false, state: 'rolling out' }));

    const result = poll('web', check, policy, controller.signal);
    const assertion = expect(result).rejects.toMatchObject({
      name: 'TimeoutError',
      aborted: true,
      message: 'Run deadline reached while waiting for web (last observed: rolling out)',
    });

    await vi.advanceTimersByTimeAsync(50);
    controller.abort();
    await vi.advanceTimersByTimeAsync(0);
    await assertion;
    expect(check).toHaveBeenCalledTimes(1);
  });

  it('gives up on a check that never settles at the deadline', async () => {
    const check = vi.fn(() => new Promise<{ done: boolean; state: string }>(() => undefined));

    const result = poll('Deployment/web', check, policy);
    const assertion = expect(result).rejects.toThrow(
      'Timeout after 1000ms waiting for Deployment/web to be ready (last observed: check did not complete)'
    );

    await vi.advanceTimersByTimeAsync(1000);
    await assertion;
    expect(check).toHaveBeenCalledTimes(1);
  });

  it('keeps the last observed state when a later check hangs', async () => {
    const check = vi.fn(async ({ attempt }: { attempt: number }) => {
      if (attempt === 0) {
        return { done: false, state: 'rolling out' };
      }
      return new Promise<{ done: boolean; state: string }>(() => undefined);
    });

    const result = poll('web', check, policy);
    const assertion = expect(result).rejects.toThrow(
      '(last observed: rolling out; next check did not complete)'
    );

    await vi.advanceTimersByTimeAsync(1000);
    await assertion;
    expect(check).toHaveBeenCalledTimes(2);
  });

  it('stops waiting on an in-flight check when the signal aborts', async () => {
    const controller = new AbortController();
    const check = vi.fn(() => new Promise<{ done: boolean; state: string }>(() => undefined));

    const result = poll('web', check, policy, controller.signal);
    const assertion = expect(result).rejects.toMatchObject({
      aborted: true,
      message: 'Run deadline reached while waiting for web (last observed: check did not complete)',
    });

    await vi.advanceTimersByTimeAsync(20);
    controller.abort();
    await vi.advanceTimersByTimeAsync(0);
    await assertion;
  });

  it('measures a shared deadline but reports the configured timeout', async () => {
    const check = vi.fn(async () => ({ done: false, state: 'waiting' }));

    const result = poll('db', check, policy, undefined, { deadline: Date.now() });

    await expect(result).rejects.toMatchObject({
      timeoutMs: 1000,
      message: 'Timeout after 1000ms waiting for db to be ready (last observed: waiting)',
    });
    expect(check).toHaveBeenCalledTimes(1);
  });

  it('raises a TimeoutError', async () => {
    await expect(poll('x', async () => ({ done: false, state: 's' }), { ...policy, timeout: 0 })).rejects.toBeInstanceOf(
      TimeoutError
    );
  });
});

describe('sleep', () => {
  it('resolves at once for an aborted signal', async () => {
    await expect(sleep(60_000, AbortSignal.abort())).resolves.toBeUndefined();
  });
});
