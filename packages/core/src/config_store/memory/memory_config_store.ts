/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 */

import type { ConfigStore } from '../config_store';
import type { TaskSyncConfig } from '../../config_manager/config_manager.types';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ projectName: 'demo' });
 * const manager = new ConfigManager(configStore);
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: TaskSyncConfig | null = null;

  async loadConfig(): Promise<TaskSyncConfig | null> {
    return this.config;
  }

  async saveConfig(config: TaskSyncConfig): Promise<void> {
    this.config = config;
  }

  // ==================== Test Helper Methods ====================

  /**
   * Set configuration directly (for test setup); null clears it
   */
  setConfig(config: TaskSyncConfig | null): void {
    this.config = config;
  }

  getConfig(): TaskSyncConfig | null {
    return this.config;
  }
}
