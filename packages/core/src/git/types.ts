/**
 * Type Definitions for the git object store
 *
 * These types define the contracts for plumbing operations,
 * dependencies, and data structures used throughout the module.
 */

/**
 * Options for executing shell commands
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
  /** Timeout in milliseconds */
  timeout?: number;
  /** Data written to the command's stdin */
  input?: string;
};

/**
 * Result of executing a shell command
 */
export type ExecResult = {
  /** Exit code (0 = success) */
  exitCode: number;
  /** Standard output */
  stdout: string;
  /** Standard error output */
  stderr: string;
};

export type ExecCommand = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;

/**
 * Author information for commits
 */
export type CommitAuthor = {
  /** Author name */
  name: string;
  /** Author email */
  email: string;
};

/**
 * Dependencies required by LocalGitObjectStore
 *
 * This module uses dependency injection to allow testing with mocks
 * and support different execution environments.
 */
export type GitObjectStoreDependencies = {
  /** Path to the Git repository root (optional, auto-detected if not provided) */
  repoRoot?: string;
  /** Function to execute shell commands (required) */
  execCommand: ExecCommand;
  /** Identity used for commit-tree when the repository has none configured */
  author?: CommitAuthor;
  /** Default timeout for every git call, in milliseconds (default: 60000) */
  timeoutMs?: number;
};

/**
 * Per-call options for read-only probes
 */
export type GitCallOptions = {
  /** Overrides the store's default timeout */
  timeoutMs?: number;
};

export type TreeEntryType = 'blob' | 'tree' | 'commit';

/**
 * One line of `git ls-tree` output
 */
export type TreeEntry = {
  /** File mode, e.g. "100644", "100755", "040000", "120000", "160000" */
  mode: string;
  type: TreeEntryType;
  sha: string;
  /** Entry name, never containing "/" */
  name: string;
};

/**
 * Outcome of a non-forced push of a single ref
 */
export type PushOutcome = 'pushed' | 'rejected';

/** Mode used for regular files written by the store */
export const FILE_MODE = '100644' as const;

/** Mode used for subtrees */
export const TREE_MODE = '040000' as const;
