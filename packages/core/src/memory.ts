/**
 * In-memory implementations (no filesystem or git binary required)
 *
 * Suitable for tests and for embedding the sync protocol in other tools.
 */

// GitObjectStore
export { MemoryGitObjectStore } from './git/memory';

// ConfigStore
export { MemoryConfigStore } from './config_store/memory/memory_config_store';

// SyncStateStore
export { MemorySyncStateStore } from './sync_state_store/memory/memory_sync_state_store';
