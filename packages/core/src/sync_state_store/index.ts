export type { SyncStateStore } from './sync_state_store';
export { hasUnpushedChanges } from './sync_state_store';
export { FsSyncStateStore } from './fs/fs_sync_state_store';
export { MemorySyncStateStore } from './memory/memory_sync_state_store';
