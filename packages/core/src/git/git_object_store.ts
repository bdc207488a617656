/**
 * IGitObjectStore - Working-tree-independent git primitives
 *
 * Every operation reads or writes the object database and refs directly.
 * None of them touches the working tree, the index or HEAD.
 *
 * Implementations:
 * - LocalGitObjectStore: git CLI plumbing (packages/core/src/git/local/)
 * - MemoryGitObjectStore: in-process object database (packages/core/src/git/memory/)
 *
 * @module git/git_object_store
 */

import type { GitCallOptions, PushOutcome, TreeEntry } from './types';

export interface IGitObjectStore {
  /** True when the store points at a usable repository */
  isRepository(options?: GitCallOptions): Promise<boolean>;

  /** Resolves a ref (or commit sha) to a commit sha, or null when absent */
  resolveRef(ref: string, options?: GitCallOptions): Promise<string | null>;

  /**
   * Reads a file from the tree of a ref.
   * Returns null when the ref, the path or a blob at that path is absent.
   */
  getFileAtRef(ref: string, filePath: string, options?: GitCallOptions): Promise<string | null>;

  /** Stores content as a blob and returns its sha */
  writeBlob(content: string): Promise<string>;

  /** Lists the direct entries of a tree */
  readTree(treeSha: string): Promise<TreeEntry[]>;

  /** Writes a tree from entries and returns its sha (empty list = empty tree) */
  writeTree(entries: readonly TreeEntry[]): Promise<string>;

  /**
   * Returns a tree identical to baseTreeSha except for the blob at filePath.
   * Only the subtrees along filePath are rewritten.
   */
  buildTreeWithFile(baseTreeSha: string | null, filePath: string, blobSha: string): Promise<string>;

  /** Returns the tree sha of a commit */
  getCommitTree(commitSha: string): Promise<string>;

  /** Creates a commit object; an empty parent list creates a root commit */
  commitTree(treeSha: string, parents: readonly string[], message: string): Promise<string>;

  /**
   * Atomically moves ref to newSha if it currently points at expectedOldSha.
   * expectedOldSha = null requires that the ref does not exist yet.
   * Returns false on mismatch instead of throwing.
   */
  updateRef(ref: string, newSha: string, expectedOldSha: string | null): Promise<boolean>;

  /** Best common ancestor of two commits, or null when unrelated */
  getMergeBase(commitA: string, commitB: string, options?: GitCallOptions): Promise<string | null>;

  /** True when a remote with that name is configured */
  hasRemote(remote: string, options?: GitCallOptions): Promise<boolean>;

  /**
   * Fetches one branch of a remote into trackingRef.
   * Returns false when the remote has no such branch.
   */
  fetchRef(remote: string, branch: string, trackingRef: string): Promise<boolean>;

  /**
   * Pushes localRef to refs/heads/<remoteBranch> without forcing and moves
   * trackingRef along on success.
   */
  pushRef(remote: string, localRef: string, remoteBranch: string, trackingRef: string): Promise<PushOutcome>;
}
