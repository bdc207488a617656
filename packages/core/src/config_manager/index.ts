export { ConfigManager, retryPolicyFromSettings } from './config_manager';
export {
  DEFAULT_SYNC_SETTINGS,
  TASKSYNC_DIR,
  COUNTERS_FILE,
  SYNC_STATE_FILE,
  CONFIG_FILE,
} from './config_manager.types';
export type { IConfigManager, TaskSyncConfig, SyncSettings } from './config_manager.types';
