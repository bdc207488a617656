/**
 * FsSyncStateStore - Filesystem implementation of SyncStateStore
 */

import * as path from 'path';
import type { SyncStateStore } from '../sync_state_store';
import type { SyncState } from '../../sync/types';
import { SYNC_STATE_FILE } from '../../config_manager/config_manager.types';
import { SchemaValidationCache, formatSchemaErrors } from '../../schemas/schema_cache';
import { readFileIfExists, writeFileAtomic } from '../../fs_utils/atomic_write';
import { createLogger } from '../../logger/logger';

const logger = createLogger('[SyncState] ');

/**
 * Stores sync state in .tasksync/.sync-state.json.
 * Implements fail-safe pattern: returns null instead of throwing for
 * missing or malformed files.
 */
export class FsSyncStateStore implements SyncStateStore {
  private readonly statePath: string;

  constructor(projectRootPath: string) {
    this.statePath = path.join(projectRootPath, SYNC_STATE_FILE);
  }

  async loadState(): Promise<SyncState | null> {
    const content = await readFileIfExists(this.statePath);
    if (content === null) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      logger.warn(`Ignoring unreadable ${this.statePath}`);
      return null;
    }

    const validate = SchemaValidationCache.getSchemaValidator<SyncState>('syncState');
    if (!validate(parsed)) {
      logger.warn(`Ignoring ${this.statePath}: ${formatSchemaErrors(validate.errors)}`);
      return null;
    }
    return {
      branch_name: parsed.branch_name,
      tasks_file: parsed.tasks_file,
      remote_name: parsed.remote_name,
      initialized: parsed.initialized,
      last_commit_sha: parsed.last_commit_sha ?? null,
      last_sync_at: parsed.last_sync_at ?? null,
      last_push_at: parsed.last_push_at ?? null,
      last_push_sha: parsed.last_push_sha ?? null,
    };
  }

  async saveState(state: SyncState): Promise<void> {
    await writeFileAtomic(this.statePath, `${JSON.stringify(state, null, 2)}\n`);
  }
}
