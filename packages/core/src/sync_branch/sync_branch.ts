/**
 * SyncBranch - the never-checked-out branch that holds shared state
 *
 * Every mutation goes through transact(): read the tip, let the caller plan
 * a commit on top of it, then move the ref with a compare-and-swap against
 * the tip that was read. A lost CAS discards the attempt and replans from
 * the new tip; nothing of the losing attempt is reachable afterwards.
 */

import type { IGitObjectStore } from '../git/git_object_store';
import type { GitCallOptions } from '../git/types';
import { runWithRetry, DEFAULT_RETRY_POLICY } from '../retry';
import type { RetryHooks, RetryOutcome, RetryPolicy } from '../retry';
import { NotInitializedError } from '../sync/errors';
import { createLogger } from '../logger/logger';
import type { CasCommit, CasPlanner, SyncBranchDependencies } from './sync_branch.types';

const logger = createLogger('[SyncBranch] ');

export class SyncBranch {
  readonly store: IGitObjectStore;
  readonly branch: string;
  readonly ref: string;
  private readonly retryPolicy: RetryPolicy;
  private readonly retryHooks: RetryHooks;

  constructor(dependencies: SyncBranchDependencies) {
    this.store = dependencies.store;
    this.branch = dependencies.branch;
    this.ref = `refs/heads/${dependencies.branch}`;
    this.retryPolicy = dependencies.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.retryHooks = dependencies.retryHooks ?? {};
  }

  /** Where fetch and push keep the last known remote tip */
  trackingRef(remote: string): string {
    return `refs/remotes/${remote}/${this.branch}`;
  }

  /** Current tip of the branch, or null when it does not exist */
  async tip(options?: GitCallOptions): Promise<string | null> {
    return this.store.resolveRef(this.ref, options);
  }

  /**
   * Tip of the branch.
   *
   * @throws NotInitializedError when the branch does not exist
   */
  async requireTip(): Promise<string> {
    const tip = await this.tip();
    if (!tip) {
      throw new NotInitializedError(this.branch);
    }
    return tip;
  }

  /** Reads a file from a commit on the branch (or any commit sha) */
  async readFile(commitSha: string, filePath: string): Promise<string | null> {
    return this.store.getFileAtRef(commitSha, filePath);
  }

  /**
   * Writes content at filePath on top of the tree of commitSha and returns
   * the new tree. The commit is not created.
   */
  async treeWithFile(commitSha: string, filePath: string, content: string): Promise<string> {
    const baseTree = await this.store.getCommitTree(commitSha);
    const blobSha = await this.store.writeBlob(content);
    return this.store.buildTreeWithFile(baseTree, filePath, blobSha);
  }

  /**
   * Creates the branch as a root commit over treeSha. Returns null when the
   * ref already exists, whoever created it.
   */
  async create(treeSha: string, message: string): Promise<string | null> {
    const commitSha = await this.store.commitTree(treeSha, [], message);
    const created = await this.store.updateRef(this.ref, commitSha, null);
    return created ? commitSha : null;
  }

  /**
   * Runs planner against the current tip under the CAS retry loop.
   *
   * @throws NotInitializedError when the branch does not exist
   */
  async transact<T>(planner: CasPlanner<T>): Promise<RetryOutcome<CasCommit<T>>> {
    return runWithRetry<CasCommit<T>>(
      async (attempt) => {
        const expected = await this.requireTip();
        const plan = await planner(expected);

        if (plan.kind === 'noop') {
          return { kind: 'success', value: { value: plan.value, commitSha: expected, created: false } };
        }

        const target = plan.kind === 'commit'
          ? await this.store.commitTree(plan.treeSha, plan.parents, plan.message)
          : plan.commitSha;

        if (await this.store.updateRef(this.ref, target, expected)) {
          return { kind: 'success', value: { value: plan.value, commitSha: target, created: true } };
        }

        logger.debug(`CAS on ${this.ref} lost at attempt ${attempt} (expected ${expected})`);
        return { kind: 'conflict', detail: `${this.ref} moved away from ${expected}` };
      },
      this.retryPolicy,
      this.retryHooks
    );
  }
}
