import type {
  AttemptResult,
  RetryHooks,
  RetryOutcome,
  RetryPolicy,
  RetryState,
} from './retry.types';
import { DEFAULT_RETRY_POLICY } from './retry.types';

const defaultSleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

/**
 * Delays that precede each retry. Each step is floored to whole
 * milliseconds before the next multiplication, so the default policy
 * yields [50, 75, 112, 168, 252].
 */
export function retrySchedule(policy: RetryPolicy = DEFAULT_RETRY_POLICY): number[] {
  const delays: number[] = [];
  let delay = Math.floor(policy.initialDelayMs);
  for (let i = 0; i < policy.maxRetries; i++) {
    delays.push(delay);
    delay = Math.floor(delay * policy.backoffFactor);
  }
  return delays;
}

/**
 * Computes the state that follows an attempt.
 * Pure, so the transitions can be tested without running anything.
 */
export function nextRetryState<T>(
  attempt: number,
  result: AttemptResult<T>,
  policy: RetryPolicy
): RetryState<T> {
  if (result.kind === 'success') {
    return { state: 'success', value: result.value, attempts: attempt };
  }
  if (attempt > policy.maxRetries) {
    return {
      state: 'failed',
      reason: result.detail ?? `gave up after ${attempt} attempts`,
      attempts: attempt,
    };
  }
  return { state: 'attempting', attempt: attempt + 1 };
}

/**
 * Runs attempt until it succeeds or the retry budget is spent.
 *
 * Only a `conflict` result is retried. Anything the attempt throws
 * propagates immediately.
 */
export async function runWithRetry<T>(
  attempt: (attemptNumber: number) => Promise<AttemptResult<T>>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {}
): Promise<RetryOutcome<T>> {
  const sleep = hooks.sleep ?? defaultSleep;
  const schedule = retrySchedule(policy);

  let state: RetryState<T> = { state: 'attempting', attempt: 1 };
  while (state.state === 'attempting') {
    const current: number = state.attempt;
    hooks.onAttempt?.(current);

    const result = await attempt(current);
    state = nextRetryState(current, result, policy);

    if (state.state === 'attempting' && result.kind === 'conflict') {
      const delay = schedule[current - 1] ?? 0;
      hooks.onConflict?.(current, delay, result.detail);
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }
  return state;
}
