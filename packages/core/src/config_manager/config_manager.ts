/**
 * ConfigManager - Project Configuration Manager
 *
 * Provides typed access to .tasksync/config.json with defaults applied.
 * Uses ConfigStore abstraction for backend-agnostic persistence.
 */

import type { ConfigStore } from '../config_store/config_store';
import type { RetryPolicy } from '../retry';
import type { IConfigManager, SyncSettings, TaskSyncConfig } from './config_manager.types';
import { DEFAULT_SYNC_SETTINGS } from './config_manager.types';

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * // Production usage
 * const configManager = new ConfigManager(new FsConfigStore('/path/to/project'));
 *
 * // Test usage
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ sync: { branch: 'shared-state' } });
 * const configManager = new ConfigManager(configStore);
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;

  constructor(configStore: ConfigStore) {
    this.configStore = configStore;
  }

  /**
   * Load project configuration; null when there is none (or it is invalid)
   */
  async loadConfig(): Promise<TaskSyncConfig | null> {
    return this.configStore.loadConfig();
  }

  /**
   * Sync settings from config.json, each missing field taken from the defaults
   */
  async getSyncSettings(): Promise<SyncSettings> {
    const config = await this.loadConfig();
    const sync = config?.sync ?? {};

    return {
      branch: sync.branch ?? DEFAULT_SYNC_SETTINGS.branch,
      remote: sync.remote ?? DEFAULT_SYNC_SETTINGS.remote,
      tasksFile: sync.tasksFile ?? DEFAULT_SYNC_SETTINGS.tasksFile,
      maxRetries: sync.maxRetries ?? DEFAULT_SYNC_SETTINGS.maxRetries,
      initialDelayMs: sync.initialDelayMs ?? DEFAULT_SYNC_SETTINGS.initialDelayMs,
      backoffFactor: sync.backoffFactor ?? DEFAULT_SYNC_SETTINGS.backoffFactor,
      gitTimeoutMs: sync.gitTimeoutMs ?? DEFAULT_SYNC_SETTINGS.gitTimeoutMs,
      statusTimeoutMs: sync.statusTimeoutMs ?? DEFAULT_SYNC_SETTINGS.statusTimeoutMs,
    };
  }

  async getProjectName(): Promise<string | null> {
    const config = await this.loadConfig();
    return config?.projectName ?? null;
  }

  /**
   * Update the sync section of config.json, keeping every other field
   */
  async updateSyncSettings(update: Partial<SyncSettings>): Promise<void> {
    const config: TaskSyncConfig = (await this.loadConfig()) ?? {};
    await this.configStore.saveConfig({
      ...config,
      sync: { ...config.sync, ...update },
    });
  }
}

/**
 * CAS retry policy described by the sync settings
 */
export function retryPolicyFromSettings(settings: SyncSettings): RetryPolicy {
  return {
    maxRetries: settings.maxRetries,
    initialDelayMs: settings.initialDelayMs,
    backoffFactor: settings.backoffFactor,
  };
}
