/**
 * ISyncService - Task state synchronization interface
 *
 * The contract collaborators (task backends, ID call-sites) depend on.
 * Implementations handle the I/O specifics:
 * - SyncService: any IGitObjectStore (git CLI plumbing or in-memory)
 *
 * @module sync
 */

import type { SyncCommitResult, SyncResult, SyncState, SyncStatus } from "./types";

export interface ISyncService {
  /** True when the repository exists and the sync branch ref resolves */
  isInitialized(): Promise<boolean>;

  /**
   * Creates the sync branch as an orphan commit over the empty tree.
   *
   * @throws SyncAlreadyInitializedError if the branch already exists
   * @throws NotAGitRepositoryError outside a git repository
   */
  initialize(): Promise<void>;

  /**
   * Snapshots the local tasks file onto the sync branch.
   * A snapshot identical to the tip is reported with created=false.
   */
  commit(message?: string): Promise<SyncCommitResult>;

  /** Fetches and merges the remote sync branch; remote problems are results, not exceptions */
  pull(): Promise<SyncResult>;

  /** Fast-forwards the remote sync branch; false when rejected or unreachable */
  push(): Promise<boolean>;

  /** Local vs remote-tracking relationship, without network access */
  getStatus(): Promise<SyncStatus>;

  getState(): Promise<SyncState>;

  allocateSpecNumber(): Promise<number>;

  allocateStandaloneNumber(): Promise<number>;
}
