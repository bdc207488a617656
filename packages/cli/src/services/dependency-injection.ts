import { Config, ConfigStore, Fs, Sync } from '@tasksync/core';

/**
 * Dependency Injection Service for the tasksync CLI
 *
 * Creates and caches the core services for the project the CLI runs in.
 * The project root is the nearest directory with a .git entry, or the
 * working directory when there is none (SyncService then reports that
 * the directory is not a git repository).
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private configManager: Config.ConfigManager | null = null;
  private syncService: Sync.SyncService | null = null;
  private projectRoot: string | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Resets the singleton instance (useful for testing)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  getProjectRoot(): string {
    if (!this.projectRoot) {
      this.projectRoot = process.env['TASKSYNC_PROJECT_ROOT']
        || ConfigStore.FsConfigStore.findProjectRoot()
        || process.cwd();
    }
    return this.projectRoot;
  }

  async getConfigManager(): Promise<Config.ConfigManager> {
    if (!this.configManager) {
      this.configManager = Fs.createConfigManager(this.getProjectRoot());
    }
    return this.configManager;
  }

  /**
   * Creates and returns the SyncService, reading sync settings once
   */
  async getSyncService(): Promise<Sync.SyncService> {
    if (this.syncService) {
      return this.syncService;
    }

    try {
      const configManager = await this.getConfigManager();
      const settings = await configManager.getSyncSettings();
      this.syncService = Fs.createSyncService(this.getProjectRoot(), settings);
      return this.syncService;
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`❌ Failed to initialize sync service: ${error.message}`);
      }
      throw new Error('❌ Unknown error initializing sync service.');
    }
  }

  /**
   * Drops the cached SyncService so the next call re-reads config.json
   */
  invalidateSyncService(): void {
    this.syncService = null;
  }
}
