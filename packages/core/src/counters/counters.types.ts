import type { SyncBranch } from '../sync_branch/sync_branch';

/**
 * Next free numbers on the sync branch, persisted as counters.json
 */
export interface CounterState {
  spec_number: number;
  standalone_task_number: number;
}

export type CounterField = keyof CounterState;

export const EMPTY_COUNTER_STATE: Readonly<CounterState> = {
  spec_number: 0,
  standalone_task_number: 0,
};

/**
 * counters.json as read from a commit
 */
export type CounterReadResult =
  | { status: 'missing'; state: CounterState }
  | { status: 'corrupt'; state: CounterState; reason: string }
  | { status: 'valid'; state: CounterState };

/**
 * Highest numbers already used by local task IDs; null when none
 */
export interface LocalIdUsage {
  maxSpec: number | null;
  maxStandalone: number | null;
}

export interface CounterVerification {
  ok: boolean;
  /** Human-readable report; empty when ok */
  message: string;
  conflicts: string[];
}

export interface CounterAllocatorDependencies {
  syncBranch: SyncBranch;
  /** Absolute path of the local tasks JSONL file, scanned for used IDs */
  tasksFilePath: string;
  /** Remote consulted by verifyCountersBeforePush */
  remote: string;
}
