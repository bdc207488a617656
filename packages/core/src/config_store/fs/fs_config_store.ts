/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Handles persistence of .tasksync/config.json to the local filesystem.
 * Also provides static utility methods for project root detection.
 */

import * as path from 'path';
import { existsSync } from 'fs';
import type { ConfigStore } from '../config_store';
import type { TaskSyncConfig } from '../../config_manager/config_manager.types';
import { CONFIG_FILE } from '../../config_manager/config_manager.types';
import { SchemaValidationCache, formatSchemaErrors } from '../../schemas/schema_cache';
import { readFileIfExists, writeFileAtomic } from '../../fs_utils/atomic_write';
import { createLogger } from '../../logger/logger';

const logger = createLogger('[Config] ');

/**
 * Filesystem-based ConfigStore implementation.
 *
 * Implements fail-safe pattern: a missing file is null, and so is a file
 * that is not JSON or does not match the config schema (with a warning),
 * so every setting falls back to its default.
 */
export class FsConfigStore implements ConfigStore {
  private readonly configPath: string;

  constructor(projectRootPath: string) {
    this.configPath = path.join(projectRootPath, CONFIG_FILE);
  }

  async loadConfig(): Promise<TaskSyncConfig | null> {
    const content = await readFileIfExists(this.configPath);
    if (content === null) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      logger.warn(`Ignoring ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }

    const validate = SchemaValidationCache.getSchemaValidator<TaskSyncConfig>('config');
    if (!validate(parsed)) {
      logger.warn(`Ignoring ${this.configPath}: ${formatSchemaErrors(validate.errors)}`);
      return null;
    }
    return parsed;
  }

  async saveConfig(config: TaskSyncConfig): Promise<void> {
    await writeFileAtomic(this.configPath, `${JSON.stringify(config, null, 2)}\n`);
  }

  // ==================== Static Utility Methods ====================

  /**
   * Finds the project root by searching upwards for a .git entry
   * (a directory, or a file in linked worktrees).
   *
   * @param startPath - Starting path (default: process.cwd())
   * @returns Absolute path to project root, or null if not found
   */
  static findProjectRoot(startPath: string = process.cwd()): string | null {
    let currentPath = path.resolve(startPath);
    // Prevent infinite loop by stopping at the filesystem root
    while (currentPath !== path.parse(currentPath).root) {
      if (existsSync(path.join(currentPath, '.git'))) {
        return currentPath;
      }
      currentPath = path.dirname(currentPath);
    }

    // Final check at the root directory
    if (existsSync(path.join(currentPath, '.git'))) {
      return currentPath;
    }
    return null;
  }
}
