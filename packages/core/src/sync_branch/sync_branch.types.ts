import type { IGitObjectStore } from '../git/git_object_store';
import type { RetryHooks, RetryPolicy } from '../retry';

export type SyncBranchDependencies = {
  store: IGitObjectStore;
  /** Short branch name, e.g. "task-sync" */
  branch: string;
  retryPolicy?: RetryPolicy;
  /** Forwarded to the retry loop (sleep injection, attempt observers) */
  retryHooks?: RetryHooks;
};

/**
 * What one CAS attempt wants to do with the tip it was handed.
 *
 * - commit: create a commit from treeSha and parents, then CAS the ref to it
 * - advance: CAS the ref to an existing commit (fast-forward)
 * - noop: leave the ref alone and report the tip
 */
export type CasPlan<T> =
  | { kind: 'commit'; treeSha: string; parents: readonly string[]; message: string; value: T }
  | { kind: 'advance'; commitSha: string; value: T }
  | { kind: 'noop'; value: T };

export type CasCommit<T> = {
  value: T;
  /** Branch tip after the transaction */
  commitSha: string;
  /** False when the plan was a noop */
  created: boolean;
};

export type CasPlanner<T> = (tip: string) => Promise<CasPlan<T>>;
