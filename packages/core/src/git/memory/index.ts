/**
 * Memory Git Object Store - in-process implementation
 *
 * @module git/memory
 */

export { MemoryGitObjectStore } from './memory_git_object_store';
