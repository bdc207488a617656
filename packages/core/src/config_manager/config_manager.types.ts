/**
 * TaskSync Configuration Types
 */

/** Directory holding every tasksync file, locally and on the sync branch */
export const TASKSYNC_DIR = '.tasksync';

/** Path of counters.json inside the sync branch tree */
export const COUNTERS_FILE = `${TASKSYNC_DIR}/counters.json`;

/** Local-only bookkeeping, relative to the project root */
export const SYNC_STATE_FILE = `${TASKSYNC_DIR}/.sync-state.json`;

export const CONFIG_FILE = `${TASKSYNC_DIR}/config.json`;

/**
 * Shape of .tasksync/config.json. Every field is optional.
 */
export interface TaskSyncConfig {
  /** Project prefix used in generated IDs */
  projectName?: string;
  sync?: Partial<SyncSettings>;
}

/**
 * Sync settings with defaults applied
 */
export interface SyncSettings {
  branch: string;
  remote: string;
  /** Project-relative path of the tasks JSONL file; also its path on the branch */
  tasksFile: string;
  maxRetries: number;
  initialDelayMs: number;
  backoffFactor: number;
  /** Timeout of each git invocation */
  gitTimeoutMs: number;
  /** Timeout of the read-only probes behind getStatus() */
  statusTimeoutMs: number;
}

export const DEFAULT_SYNC_SETTINGS: Readonly<SyncSettings> = {
  branch: 'task-sync',
  remote: 'origin',
  tasksFile: `${TASKSYNC_DIR}/tasks.jsonl`,
  maxRetries: 5,
  initialDelayMs: 50,
  backoffFactor: 1.5,
  gitTimeoutMs: 60_000,
  statusTimeoutMs: 10_000,
};

export interface IConfigManager {
  loadConfig(): Promise<TaskSyncConfig | null>;
  getSyncSettings(): Promise<SyncSettings>;
  getProjectName(): Promise<string | null>;
}
