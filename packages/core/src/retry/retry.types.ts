/**
 * Retry types
 *
 * The retry loop is an explicit state machine:
 * Attempting(n) -> Success(value) | Failed(reason), or Attempting(n + 1).
 */

export type RetryPolicy = {
  /** Retries after the first attempt (5 => 6 attempts) */
  maxRetries: number;
  /** Delay before the first retry */
  initialDelayMs: number;
  /** Factor applied to the delay after every retry */
  backoffFactor: number;
};

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxRetries: 5,
  initialDelayMs: 50,
  backoffFactor: 1.5,
};

/** What a single attempt reports back to the loop */
export type AttemptResult<T> =
  | { kind: 'success'; value: T }
  | { kind: 'conflict'; detail?: string };

export type RetryState<T> =
  | { state: 'attempting'; attempt: number }
  | { state: 'success'; value: T; attempts: number }
  | { state: 'failed'; reason: string; attempts: number };

export type RetryOutcome<T> = Extract<RetryState<T>, { state: 'success' | 'failed' }>;

export type RetryHooks = {
  /** Injectable for tests; defaults to a setTimeout-based sleep */
  sleep?: (ms: number) => Promise<void>;
  /** Called for every Attempting(n) transition, n starting at 1 */
  onAttempt?: (attempt: number) => void;
  /** Called after an attempt lost, with the delay that follows it */
  onConflict?: (attempt: number, delayMs: number, detail?: string) => void;
};
