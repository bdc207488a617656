export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";
export * as Counters from "./counters";
export * as FsUtils from "./fs_utils";
export * as Git from "./git";
export * as Ids from "./ids";
export * as Logger from "./logger";
export * as Retry from "./retry";
export * as Schemas from "./schemas";
export * as Sync from "./sync";
export * as SyncBranch from "./sync_branch";
export * as SyncState from "./sync_state_store";

// Implementations
export * as Fs from "./fs";
export * as Memory from "./memory";
