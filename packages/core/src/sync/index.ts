// Main service
export { SyncService } from "./sync_service";
export type { ISyncService } from "./sync";

// Task file handling
export { parseTasksJsonl, serializeTasksJsonl, isTask } from "./tasks_jsonl";
export type { Task, ParsedTasks } from "./tasks_jsonl";
export { mergeTasks, resolveWinner } from "./task_merge";
export type { TaskMergeResult } from "./task_merge";
export { canonicalize } from "./canonical_json";

// Types
export { SyncStatus } from "./types";
export type {
  SyncConflict,
  SyncResult,
  SyncCommitResult,
  SyncState,
  SyncServiceDependencies,
} from "./types";

// Errors
export {
  SyncError,
  NotInitializedError,
  SyncAlreadyInitializedError,
  NotAGitRepositoryError,
  TasksFileNotFoundError,
  SyncConflictRetryError,
  isSyncError,
  isNotInitializedError,
  isSyncAlreadyInitializedError,
  isNotAGitRepositoryError,
  isTasksFileNotFoundError,
  isSyncConflictRetryError,
} from "./errors";
