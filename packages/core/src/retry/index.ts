export { runWithRetry, retrySchedule, nextRetryState } from './retry';
export { DEFAULT_RETRY_POLICY } from './retry.types';
export type {
  RetryPolicy,
  AttemptResult,
  RetryState,
  RetryOutcome,
  RetryHooks,
} from './retry.types';
