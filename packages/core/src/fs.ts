/**
 * Filesystem-dependent implementations
 *
 * This module exports all implementations that require filesystem or git
 * CLI access. Use ./memory for in-memory alternatives.
 */

// GitObjectStore
export { LocalGitObjectStore, createExecCommand } from './git/local';

// ConfigStore + ConfigManager Factory
export {
  FsConfigStore,
  // Factory with explicit projectRoot (for DI containers)
  createConfigManager,
} from './config_store/fs';

// SyncStateStore
export { FsSyncStateStore } from './sync_state_store/fs/fs_sync_state_store';

// SyncService Factory
export { createSyncService } from './sync/fs';
