import type { IGitObjectStore } from "../git/git_object_store";
import type { RetryHooks } from "../retry";
import type { SyncSettings } from "../config_manager/config_manager.types";
import type { SyncStateStore } from "../sync_state_store/sync_state_store";

/**
 * Relationship between the local sync branch and the remote-tracking ref
 */
export const SyncStatus = {
  UNINITIALIZED: "uninitialized",
  NO_REMOTE: "no_remote",
  UP_TO_DATE: "up_to_date",
  AHEAD: "ahead",
  BEHIND: "behind",
  DIVERGED: "diverged",
} as const;

export type SyncStatus = (typeof SyncStatus)[keyof typeof SyncStatus];

/**
 * One task id that differed on both sides during a pull
 */
export interface SyncConflict {
  task_id: string;
  resolution: "last_write_wins";
  winner: "local" | "remote";
  local_updated_at: string | null;
  remote_updated_at: string | null;
}

/**
 * Result of pull (and of the push step of the CLI)
 */
export interface SyncResult {
  success: boolean;
  operation: "pull" | "push";
  message: string;
  /** Local tasks added or replaced */
  tasks_updated: number;
  conflicts: SyncConflict[];
  /** Sync branch tip after the operation */
  commit_sha?: string;
  started_at: string;
  completed_at: string;
}

/**
 * Result of commit(); created=false is the reported no-op
 */
export interface SyncCommitResult {
  commit_sha: string;
  created: boolean;
}

/**
 * Local-only bookkeeping persisted in .tasksync/.sync-state.json
 */
export interface SyncState {
  branch_name: string;
  tasks_file: string;
  remote_name: string;
  initialized: boolean;
  last_commit_sha: string | null;
  last_sync_at: string | null;
  last_push_at: string | null;
  last_push_sha: string | null;
}

/**
 * SyncService Dependencies
 */
export interface SyncServiceDependencies {
  /** Object database and refs (required) */
  store: IGitObjectStore;
  /** Local bookkeeping persistence (required) */
  stateStore: SyncStateStore;
  /** Absolute project root; the tasks file is resolved against it (required) */
  projectRoot: string;
  /** Sync settings with defaults applied (required) */
  settings: SyncSettings;
  /** Retry observers and sleep injection, mainly for tests */
  retryHooks?: RetryHooks;
  /** Clock for SyncState and SyncResult timestamps */
  now?: () => Date;
}
