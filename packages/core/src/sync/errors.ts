/**
 * Base error class for all sync-related errors
 */
export class SyncError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SyncError";
    Object.setPrototypeOf(this, SyncError.prototype);
  }
}

/**
 * Error thrown when an operation needs the sync branch and it does not exist
 */
export class NotInitializedError extends SyncError {
  public branch: string;

  constructor(branchName: string) {
    super(
      `Sync branch "${branchName}" is not initialized. ` +
      `Run 'tasksync sync init' first.`
    );
    this.name = "NotInitializedError";
    this.branch = branchName;
    Object.setPrototypeOf(this, NotInitializedError.prototype);
  }
}

/**
 * Error thrown when initialize() finds the sync branch already present
 */
export class SyncAlreadyInitializedError extends SyncError {
  public branch: string;

  constructor(branchName: string) {
    super(`Sync branch "${branchName}" is already initialized.`);
    this.name = "SyncAlreadyInitializedError";
    this.branch = branchName;
    Object.setPrototypeOf(this, SyncAlreadyInitializedError.prototype);
  }
}

/**
 * Error thrown when the project directory is not inside a git repository
 */
export class NotAGitRepositoryError extends SyncError {
  constructor(public path: string) {
    super(`${path} is not inside a git repository.`);
    this.name = "NotAGitRepositoryError";
    Object.setPrototypeOf(this, NotAGitRepositoryError.prototype);
  }
}

/**
 * Error thrown when commit() cannot find the local tasks file
 */
export class TasksFileNotFoundError extends SyncError {
  constructor(public tasksFile: string) {
    super(`Tasks file not found: ${tasksFile}`);
    this.name = "TasksFileNotFoundError";
    Object.setPrototypeOf(this, TasksFileNotFoundError.prototype);
  }
}

/**
 * Error thrown when a sync-branch update keeps losing the ref race
 */
export class SyncConflictRetryError extends SyncError {
  constructor(
    public operation: string,
    public attempts: number
  ) {
    super(
      `Could not ${operation}: the sync branch kept moving ` +
      `(${attempts} attempts). Try again.`
    );
    this.name = "SyncConflictRetryError";
    Object.setPrototypeOf(this, SyncConflictRetryError.prototype);
  }
}

export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}

export function isNotInitializedError(error: unknown): error is NotInitializedError {
  return error instanceof NotInitializedError;
}

export function isSyncAlreadyInitializedError(
  error: unknown
): error is SyncAlreadyInitializedError {
  return error instanceof SyncAlreadyInitializedError;
}

export function isNotAGitRepositoryError(error: unknown): error is NotAGitRepositoryError {
  return error instanceof NotAGitRepositoryError;
}

export function isTasksFileNotFoundError(error: unknown): error is TasksFileNotFoundError {
  return error instanceof TasksFileNotFoundError;
}

export function isSyncConflictRetryError(error: unknown): error is SyncConflictRetryError {
  return error instanceof SyncConflictRetryError;
}
