import { ConfigManager } from '../../config_manager/config_manager';
import { FsConfigStore } from './fs_config_store';

export { FsConfigStore } from './fs_config_store';

/**
 * ConfigManager over .tasksync/config.json in projectRoot
 */
export function createConfigManager(projectRoot: string): ConfigManager {
  return new ConfigManager(new FsConfigStore(projectRoot));
}
