/**
 * SyncStateStore - Local sync bookkeeping persistence
 *
 * Interface for storing and retrieving .tasksync/.sync-state.json.
 * Sync state is machine-local, NOT versioned in Git and never
 * authoritative: the branch refs are.
 *
 * Implementations:
 * - FsSyncStateStore: Filesystem-based (production)
 * - MemorySyncStateStore: In-memory (tests)
 */

import type { SyncState } from '../sync/types';

export interface SyncStateStore {
  /**
   * Load sync state from storage.
   *
   * @returns SyncState or null if not found or unreadable
   */
  loadState(): Promise<SyncState | null>;

  saveState(state: SyncState): Promise<void>;
}

/**
 * True when the last local commit has not been pushed yet
 */
export function hasUnpushedChanges(state: SyncState): boolean {
  return state.last_commit_sha !== null && state.last_commit_sha !== state.last_push_sha;
}
