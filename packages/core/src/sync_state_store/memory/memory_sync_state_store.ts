/**
 * MemorySyncStateStore - In-memory implementation of SyncStateStore
 */

import type { SyncStateStore } from '../sync_state_store';
import type { SyncState } from '../../sync/types';

export class MemorySyncStateStore implements SyncStateStore {
  private state: SyncState | null = null;

  async loadState(): Promise<SyncState | null> {
    return this.state ? { ...this.state } : null;
  }

  async saveState(state: SyncState): Promise<void> {
    this.state = { ...state };
  }

  // ==================== Test Helper Methods ====================

  setState(state: SyncState | null): void {
    this.state = state ? { ...state } : null;
  }

  getState(): SyncState | null {
    return this.state;
  }
}
