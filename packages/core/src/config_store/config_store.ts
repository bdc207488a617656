/**
 * ConfigStore Interface
 *
 * Abstraction for .tasksync/config.json persistence
 * (filesystem, or memory for tests).
 *
 * NOTE: Local sync bookkeeping (.sync-state.json) is handled by
 * SyncStateStore, not ConfigStore. Config is versioned with the project;
 * sync state is per working copy.
 */

import type { TaskSyncConfig } from '../config_manager/config_manager.types';

/**
 * Implementations:
 * - FsConfigStore: Filesystem-based (.tasksync/config.json)
 * - MemoryConfigStore: In-memory for tests
 */
export interface ConfigStore {
  /**
   * Load project configuration
   *
   * @returns TaskSyncConfig or null if not found/invalid
   */
  loadConfig(): Promise<TaskSyncConfig | null>;

  saveConfig(config: TaskSyncConfig): Promise<void>;
}
