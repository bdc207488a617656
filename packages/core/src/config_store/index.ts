export type { ConfigStore } from './config_store';
export { FsConfigStore, createConfigManager } from './fs';
export { MemoryConfigStore } from './memory/memory_config_store';
