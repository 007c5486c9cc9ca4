/**
 * Bounded polling
 *
 * The single wait primitive of the reconciler: readiness checks, exec-ready
 * waits and anything else that has to "wait until" go through `poll`.
 */

import { TimeoutError } from '../errors.js';
import { errorMessage } from './error-helpers.js';

export interface PollPolicy {
  /** Delay after the first check, in milliseconds */
  interval: number;
  /** Added to the delay after every further check */
  increment: number;
  /** Upper bound for a single delay */
  maxInterval: number;
  /** Hard deadline measured from the first check */
  timeout: number;
}

export const DEFAULT_POLL_POLICY: PollPolicy = {
  interval: 2000,
  increment: 1000,
  maxInterval: 10000,
  timeout: 300000,
};

export interface PollAttempt {
  attempt: number;
  /** Time left until the deadline; checks should not block longer */
  remainingMs: number;
}

export interface PollObservation<T> {
  done: boolean;
  /** Human readable state, reported in the TimeoutError when the deadline passes */
  state: string;
  value?: T;
}

/**
 * Delay before check number `attempt + 1`
 */
export function backoffDelay(policy: PollPolicy, attempt: number): number {
  return Math.min(policy.interval + attempt * policy.increment, policy.maxInterval);
}

/**
 * Resolves after `ms`, or as soon as the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
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

type BoundedResult<T> = { kind: 'settled'; value: T } | { kind: 'deadline' } | { kind: 'aborted' };

/**
 * Run one check, but stop waiting for it at `ms` or when the signal aborts.
 * A check that is abandoned keeps running; its result is ignored.
 */
function bounded<T>(run: () => Promise<T>, ms: number, signal?: AbortSignal): Promise<BoundedResult<T>> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      resolve({ kind: 'aborted' });
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve({ kind: 'aborted' });
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve({ kind: 'deadline' });
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });

    run().then(
      (value) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve({ kind: 'settled', value });
      },
      (error: unknown) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export interface PollOptions {
  /**
   * Absolute deadline (epoch milliseconds) shared with other polls. When
   * set it replaces `Date.now() + policy.timeout`; the TimeoutError still
   * reports `policy.timeout`.
   */
  deadline?: number;
}

/**
 * Run `check` until it reports done.
 *
 * A check that throws counts as not done; its message becomes the observed
 * state. A check that has not settled by the deadline is abandoned. The last
 * check runs at the deadline, and if it is still not done a TimeoutError is
 * raised. An aborted signal raises a TimeoutError with `aborted` set, also
 * while a check is in flight.
 */
export async function poll<T>(
  resource: string,
  check: (attempt: PollAttempt) => Promise<PollObservation<T>>,
  policy: PollPolicy = DEFAULT_POLL_POLICY,
  signal?: AbortSignal,
  options: PollOptions = {}
): Promise<PollObservation<T>> {
  const deadline = options.deadline ?? Date.now() + policy.timeout;
  let lastState = 'not checked';

  for (let attempt = 0; ; attempt++) {
    if (signal?.aborted) {
      throw new TimeoutError(resource, lastState, policy.timeout, true);
    }

    const remainingMs = Math.max(deadline - Date.now(), 0);
    let outcome: BoundedResult<PollObservation<T>> | undefined;
    try {
      outcome = await bounded(() => check({ attempt, remainingMs }), remainingMs, signal);
    } catch (error) {
      lastState = `error: ${errorMessage(error)}`;
    }

    if (outcome?.kind === 'aborted') {
      throw new TimeoutError(resource, inFlight(lastState), policy.timeout, true);
    }
    if (outcome?.kind === 'deadline') {
      throw new TimeoutError(resource, inFlight(lastState), policy.timeout);
    }
    if (outcome?.kind === 'settled') {
      if (outcome.value.done) {
        return outcome.value;
      }
      lastState = outcome.value.state;
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new TimeoutError(resource, lastState, policy.timeout);
    }

    await sleep(Math.min(backoffDelay(policy, attempt), remaining), signal);
  }
}

function inFlight(lastState: string): string {
  return lastState === 'not checked' ? 'check did not complete' : `${lastState}; next check did not complete`;
}
