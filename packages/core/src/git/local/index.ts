/**
 * Local Git Object Store - CLI-based implementation
 *
 * Uses execCommand to run git plumbing commands.
 *
 * @module git/local
 */

export { LocalGitObjectStore, parseLsTree } from './local_git_object_store';
export { createExecCommand, TIMEOUT_EXIT_CODE } from './exec_command';
