export { errorMessage, toError } from './error-helpers.js';
export { backoffDelay, DEFAULT_POLL_POLICY, poll, sleep } from './poll.js';
export type { PollAttempt, PollObservation, PollOptions, PollPolicy } from './poll.js';
export { withRetry } from './retry.js';
export type { RetryOptions } from './retry.js';
