/**
 * Git object store - plumbing primitives
 *
 * Business-agnostic access to the object database and refs. Nothing in
 * this module touches the working tree, the index or HEAD.
 *
 * @module git
 */

export type { IGitObjectStore } from './git_object_store';

export { LocalGitObjectStore, createExecCommand } from './local';
export { MemoryGitObjectStore } from './memory';
export { buildTreeWithFile, mergeTrees, splitTreePath } from './tree_builder';

export type {
  GitObjectStoreDependencies,
  ExecCommand,
  ExecOptions,
  ExecResult,
  CommitAuthor,
  GitCallOptions,
  TreeEntry,
  TreeEntryType,
  PushOutcome,
} from './types';
export { FILE_MODE, TREE_MODE } from './types';

export {
  GitError,
  GitCommandError,
  InvalidTreePathError,
  ObjectNotFoundError,
  isGitError,
  isGitCommandError,
} from './errors';
