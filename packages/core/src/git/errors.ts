/**
 * Custom Error Classes for the git object store
 *
 * These errors provide typed exceptions for better error handling
 * and diagnostics in plumbing operations.
 */

/**
 * Base error class for all Git-related errors
 */
export class GitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GitError';
    Object.setPrototypeOf(this, GitError.prototype);
  }
}

/**
 * Error thrown when a Git command fails
 */
export class GitCommandError extends GitError {
  public readonly stderr: string;
  public readonly stdout?: string | undefined;
  public readonly command?: string | undefined;

  constructor(message: string, stderr: string = '', command?: string, stdout?: string) {
    super(message);
    this.name = 'GitCommandError';
    this.stderr = stderr;
    this.stdout = stdout;
    this.command = command;
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}

/**
 * Error thrown when a tree path cannot be represented as git tree entries
 */
export class InvalidTreePathError extends GitError {
  public readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super(`Invalid tree path "${filePath}": ${reason}`);
    this.name = 'InvalidTreePathError';
    this.filePath = filePath;
    Object.setPrototypeOf(this, InvalidTreePathError.prototype);
  }
}

/**
 * Error thrown when an object the caller referenced is not in the database
 */
export class ObjectNotFoundError extends GitError {
  public readonly sha: string;

  constructor(sha: string, expectedType?: string) {
    super(expectedType ? `${expectedType} object not found: ${sha}` : `Object not found: ${sha}`);
    this.name = 'ObjectNotFoundError';
    this.sha = sha;
    Object.setPrototypeOf(this, ObjectNotFoundError.prototype);
  }
}

export function isGitError(error: unknown): error is GitError {
  return error instanceof GitError;
}

export function isGitCommandError(error: unknown): error is GitCommandError {
  return error instanceof GitCommandError;
}
