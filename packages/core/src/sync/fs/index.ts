import { LocalGitObjectStore } from '../../git/local/local_git_object_store';
import { createExecCommand } from '../../git/local/exec_command';
import { FsSyncStateStore } from '../../sync_state_store/fs/fs_sync_state_store';
import type { SyncSettings } from '../../config_manager/config_manager.types';
import { SyncService } from '../sync_service';

/**
 * SyncService over the git CLI and the filesystem, for one project root
 */
export function createSyncService(projectRoot: string, settings: SyncSettings): SyncService {
  const store = new LocalGitObjectStore({
    repoRoot: projectRoot,
    execCommand: createExecCommand(projectRoot),
    timeoutMs: settings.gitTimeoutMs,
  });
  return new SyncService({
    store,
    stateStore: new FsSyncStateStore(projectRoot),
    projectRoot,
    settings,
  });
}
