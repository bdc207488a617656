import * as path from "path";
import type { IGitObjectStore } from "../git/git_object_store";
import type { GitCallOptions } from "../git/types";
import { isGitCommandError, isGitError } from "../git/errors";
import { mergeTrees } from "../git/tree_builder";
import type { SyncSettings } from "../config_manager/config_manager.types";
import { COUNTERS_FILE } from "../config_manager/config_manager.types";
import { retryPolicyFromSettings } from "../config_manager/config_manager";
import type { SyncStateStore } from "../sync_state_store/sync_state_store";
import { SyncBranch } from "../sync_branch/sync_branch";
import { CounterAllocator } from "../counters/counter_allocator";
import { maxCounterState, parseCounterState, serializeCounterState } from "../counters/counter_state";
import { readFileIfExists, writeFileAtomic } from "../fs_utils/atomic_write";
import { createLogger } from "../logger/logger";
import {
  NotAGitRepositoryError,
  NotInitializedError,
  SyncAlreadyInitializedError,
  SyncConflictRetryError,
  TasksFileNotFoundError,
} from "./errors";
import { mergeTasks } from "./task_merge";
import { parseTasksJsonl, serializeTasksJsonl } from "./tasks_jsonl";
import type { ISyncService } from "./sync";
import { SyncStatus } from "./types";
import type {
  SyncCommitResult,
  SyncConflict,
  SyncResult,
  SyncServiceDependencies,
  SyncState,
} from "./types";

const logger = createLogger("[SyncService] ");

const DEFAULT_COMMIT_MESSAGE = "Update tasks";

/**
 * What the pull transaction decided against the tip it was handed
 */
type PullPlan = {
  kind: "up_to_date" | "fast_forward" | "merge";
  tasksUpdated: number;
  conflicts: SyncConflict[];
  /** Serialized merged tasks, written to the local file after the CAS */
  mergedContent: string | null;
};

/**
 * SyncService - Keeps the local tasks file eventually consistent with other
 * worktrees through the sync branch
 *
 * Responsibilities:
 * - Create the sync branch (initialize)
 * - Snapshot local tasks onto it (commit)
 * - Merge the remote branch per task id (pull)
 * - Publish it without forcing (push)
 * - Classify local vs remote-tracking state (getStatus)
 *
 * Every branch mutation goes through SyncBranch.transact, so a concurrent
 * writer costs a retry, never a lost update. The working tree, index and
 * HEAD are never touched.
 */
export class SyncService implements ISyncService {
  private readonly store: IGitObjectStore;
  private readonly stateStore: SyncStateStore;
  private readonly projectRoot: string;
  private readonly settings: SyncSettings;
  private readonly now: () => Date;
  private readonly syncBranch: SyncBranch;
  private readonly counters: CounterAllocator;

  constructor(dependencies: SyncServiceDependencies) {
    if (!dependencies.store) {
      throw new Error("IGitObjectStore is required for SyncService");
    }
    if (!dependencies.stateStore) {
      throw new Error("SyncStateStore is required for SyncService");
    }

    this.store = dependencies.store;
    this.stateStore = dependencies.stateStore;
    this.projectRoot = dependencies.projectRoot;
    this.settings = dependencies.settings;
    this.now = dependencies.now ?? (() => new Date());

    this.syncBranch = new SyncBranch({
      store: this.store,
      branch: this.settings.branch,
      retryPolicy: retryPolicyFromSettings(this.settings),
      ...(dependencies.retryHooks ? { retryHooks: dependencies.retryHooks } : {}),
    });
    this.counters = new CounterAllocator({
      syncBranch: this.syncBranch,
      tasksFilePath: this.tasksFilePath,
      remote: this.settings.remote,
    });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PATHS & BOOKKEEPING
  // ═══════════════════════════════════════════════════════════════════════

  /** Absolute path of the local tasks file */
  get tasksFilePath(): string {
    return path.resolve(this.projectRoot, this.settings.tasksFile);
  }

  /** Path of the tasks file inside the sync branch tree */
  private get branchTasksPath(): string {
    return path.posix.normalize(this.settings.tasksFile.split(path.sep).join("/"));
  }

  private get trackingRef(): string {
    return this.syncBranch.trackingRef(this.settings.remote);
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private emptyState(): SyncState {
    return {
      branch_name: this.settings.branch,
      tasks_file: this.settings.tasksFile,
      remote_name: this.settings.remote,
      initialized: false,
      last_commit_sha: null,
      last_sync_at: null,
      last_push_at: null,
      last_push_sha: null,
    };
  }

  /**
   * Saved bookkeeping with the current settings applied. `initialized` is
   * taken from the branch ref, not from the file.
   */
  async getState(): Promise<SyncState> {
    const saved = await this.stateStore.loadState();
    const state: SyncState = {
      ...this.emptyState(),
      ...(saved ?? {}),
      branch_name: this.settings.branch,
      tasks_file: this.settings.tasksFile,
      remote_name: this.settings.remote,
    };
    state.initialized = await this.isInitialized();
    return state;
  }

  private async recordState(update: Partial<SyncState>): Promise<void> {
    const current = await this.getState();
    await this.stateStore.saveState({ ...current, ...update });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // INITIALIZATION
  // ═══════════════════════════════════════════════════════════════════════

  async isInitialized(): Promise<boolean> {
    if (!(await this.store.isRepository())) {
      return false;
    }
    return (await this.syncBranch.tip()) !== null;
  }

  async initialize(): Promise<void> {
    if (!(await this.store.isRepository())) {
      throw new NotAGitRepositoryError(this.projectRoot);
    }
    if (await this.syncBranch.tip()) {
      throw new SyncAlreadyInitializedError(this.settings.branch);
    }

    const emptyTree = await this.store.writeTree([]);
    const commitSha = await this.syncBranch.create(emptyTree, "Initialize task sync branch");
    if (!commitSha) {
      // another process created it between the check and the CAS
      throw new SyncAlreadyInitializedError(this.settings.branch);
    }

    logger.info(`Initialized sync branch '${this.settings.branch}' at ${commitSha.slice(0, 8)}`);
    await this.recordState({ initialized: true, last_commit_sha: commitSha });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // COMMIT
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * @throws NotInitializedError when the sync branch does not exist
   * @throws TasksFileNotFoundError when the local tasks file is missing
   * @throws SyncConflictRetryError when every retry lost the CAS
   */
  async commit(message: string = DEFAULT_COMMIT_MESSAGE): Promise<SyncCommitResult> {
    const content = await readFileIfExists(this.tasksFilePath);
    if (content === null) {
      throw new TasksFileNotFoundError(this.settings.tasksFile);
    }

    const outcome = await this.syncBranch.transact<null>(async (tip) => {
      const treeSha = await this.syncBranch.treeWithFile(tip, this.branchTasksPath, content);
      if (treeSha === await this.store.getCommitTree(tip)) {
        return { kind: "noop", value: null };
      }
      return { kind: "commit", treeSha, parents: [tip], message, value: null };
    });

    if (outcome.state === "failed") {
      throw new SyncConflictRetryError("commit tasks", outcome.attempts);
    }

    const { commitSha, created } = outcome.value;
    if (created) {
      logger.info(`Committed tasks to '${this.settings.branch}': ${commitSha.slice(0, 8)}`);
      await this.recordState({ last_commit_sha: commitSha });
    } else {
      logger.debug("Tasks unchanged, nothing to commit");
    }
    return { commit_sha: commitSha, created };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PULL
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Fetches the remote sync branch and merges it per task id.
   *
   * Never throws for a missing remote, a fetch failure or an uninitialized
   * branch: those come back as success=false.
   */
  async pull(): Promise<SyncResult> {
    const startedAt = this.timestamp();
    const log = (msg: string) => logger.debug(`[pull] ${msg}`);
    const finish = (fields: Omit<SyncResult, "operation" | "started_at" | "completed_at">): SyncResult => ({
      operation: "pull",
      ...fields,
      started_at: startedAt,
      completed_at: this.timestamp(),
    });
    const failure = (message: string): SyncResult =>
      finish({ success: false, message, tasks_updated: 0, conflicts: [] });

    // ═══════════════════════════════════════════════════════════
    // PHASE 0: Pre-flight checks
    // ═══════════════════════════════════════════════════════════
    const localTip = await this.syncBranch.tip();
    if (!localTip) {
      return failure(new NotInitializedError(this.settings.branch).message);
    }

    const remote = this.settings.remote;
    let remoteTip: string | null;
    try {
      if (!(await this.store.hasRemote(remote))) {
        return failure(`No remote '${remote}' configured. Add one with: git remote add ${remote} <url>`);
      }

      // ═══════════════════════════════════════════════════════════
      // PHASE 1: Fetch
      // ═══════════════════════════════════════════════════════════
      log(`Fetching ${remote}/${this.settings.branch}`);
      const found = await this.store.fetchRef(remote, this.settings.branch, this.trackingRef);
      remoteTip = found ? await this.store.resolveRef(this.trackingRef) : null;
    } catch (error) {
      if (isGitError(error)) {
        const cause = isGitCommandError(error) && error.stderr ? error.stderr : error.message;
        logger.warn(`Fetch from ${remote} failed: ${cause}`);
        return failure(`Failed to fetch remote: ${cause}`);
      }
      throw error;
    }

    if (!remoteTip) {
      return finish({
        success: true,
        message: "No remote sync branch found. Nothing to pull.",
        tasks_updated: 0,
        conflicts: [],
        commit_sha: localTip,
      });
    }

    // ═══════════════════════════════════════════════════════════
    // PHASE 2: Merge under CAS
    // ═══════════════════════════════════════════════════════════
    const localContent = (await readFileIfExists(this.tasksFilePath)) ?? "";
    const localTasks = parseTasksJsonl(localContent, this.settings.tasksFile).tasks;
    const fetchedTip = remoteTip;

    const outcome = await this.syncBranch.transact<PullPlan>(async (tip) => {
      const base = tip === fetchedTip ? tip : await this.store.getMergeBase(tip, fetchedTip);
      if (base === fetchedTip) {
        log("Remote tip already contained in local branch");
        return {
          kind: "noop",
          value: { kind: "up_to_date", tasksUpdated: 0, conflicts: [], mergedContent: null },
        };
      }

      const remoteContent = await this.syncBranch.readFile(fetchedTip, this.branchTasksPath);
      const remoteTasks = remoteContent === null
        ? []
        : parseTasksJsonl(remoteContent, `${remote}/${this.settings.branch}`).tasks;
      const merged = mergeTasks(localTasks, remoteTasks);
      const mergedContent = serializeTasksJsonl(merged.tasks);

      let treeSha = await this.store.getCommitTree(fetchedTip);
      if (base !== tip) {
        // other paths: remote side on a clash, local-only entries kept
        treeSha = await mergeTrees(this.store, treeSha, await this.store.getCommitTree(tip));
      }
      if (remoteContent !== null || merged.tasks.length > 0) {
        treeSha = await this.store.buildTreeWithFile(
          treeSha,
          this.branchTasksPath,
          await this.store.writeBlob(mergedContent)
        );
      }

      const localCounters = parseCounterState(await this.syncBranch.readFile(tip, COUNTERS_FILE));
      const remoteCounters = parseCounterState(await this.syncBranch.readFile(fetchedTip, COUNTERS_FILE));
      if (localCounters.status !== "missing" || remoteCounters.status !== "missing") {
        const counters = maxCounterState(localCounters.state, remoteCounters.state);
        treeSha = await this.store.buildTreeWithFile(
          treeSha,
          COUNTERS_FILE,
          await this.store.writeBlob(serializeCounterState(counters))
        );
      }

      const plan: PullPlan = {
        kind: "merge",
        tasksUpdated: merged.tasksUpdated,
        conflicts: merged.conflicts,
        mergedContent,
      };

      if (base === tip && treeSha === await this.store.getCommitTree(fetchedTip)) {
        return { kind: "advance", commitSha: fetchedTip, value: { ...plan, kind: "fast_forward" } };
      }

      let message = `Merge ${remote}/${this.settings.branch} (${merged.tasksUpdated} tasks updated)`;
      if (merged.conflicts.length > 0) {
        message += ` [${merged.conflicts.length} conflicts resolved]`;
      }
      return { kind: "commit", treeSha, parents: [tip, fetchedTip], message, value: plan };
    });

    if (outcome.state === "failed") {
      return failure(new SyncConflictRetryError("merge remote changes", outcome.attempts).message);
    }

    // ═══════════════════════════════════════════════════════════
    // PHASE 3: Local file and bookkeeping
    // ═══════════════════════════════════════════════════════════
    const { value: plan, commitSha } = outcome.value;
    for (const conflict of plan.conflicts) {
      logger.warn(
        `Conflict on task ${conflict.task_id}: ${conflict.winner} version kept ` +
        `(local: ${conflict.local_updated_at ?? "none"}, remote: ${conflict.remote_updated_at ?? "none"})`
      );
    }

    if (plan.mergedContent !== null && plan.tasksUpdated > 0) {
      await writeFileAtomic(this.tasksFilePath, plan.mergedContent);
    }
    await this.recordState({ last_commit_sha: commitSha, last_sync_at: this.timestamp() });

    let message: string;
    if (plan.kind === "up_to_date") {
      message = "Already up to date with remote";
    } else if (plan.tasksUpdated > 0) {
      message = `Merged ${plan.tasksUpdated} tasks from remote`;
    } else {
      message = "Local tasks are up to date with remote";
    }
    if (plan.conflicts.length > 0) {
      message += ` (${plan.conflicts.length} conflicts resolved)`;
    }

    return finish({
      success: true,
      message,
      tasks_updated: plan.tasksUpdated,
      conflicts: plan.conflicts,
      commit_sha: commitSha,
    });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PUSH
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Fast-forwards the remote branch to the local tip. A rejection means the
   * remote moved on; pull first, push never merges.
   */
  async push(): Promise<boolean> {
    const tip = await this.syncBranch.tip();
    if (!tip) {
      logger.warn(new NotInitializedError(this.settings.branch).message);
      return false;
    }

    const remote = this.settings.remote;
    try {
      if (!(await this.store.hasRemote(remote))) {
        logger.warn(`No remote '${remote}' configured, nothing to push to`);
        return false;
      }

      const outcome = await this.store.pushRef(remote, this.syncBranch.ref, this.settings.branch, this.trackingRef);
      if (outcome === "rejected") {
        logger.warn(
          `Push to ${remote}/${this.settings.branch} rejected: the remote has commits this branch lacks. ` +
          `Pull first.`
        );
        return false;
      }
    } catch (error) {
      if (isGitError(error)) {
        logger.error(`Push to ${remote} failed: ${isGitCommandError(error) && error.stderr ? error.stderr : error.message}`);
        return false;
      }
      throw error;
    }

    logger.info(`Pushed '${this.settings.branch}' to ${remote} at ${tip.slice(0, 8)}`);
    await this.recordState({ last_push_at: this.timestamp(), last_push_sha: tip });
    return true;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // STATUS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Compares the local tip with the remote-tracking ref. No network access;
   * the tracking ref is as fresh as the last fetch or push. A failed probe
   * never reports a synced state.
   */
  async getStatus(): Promise<SyncStatus> {
    const probe: GitCallOptions = { timeoutMs: this.settings.statusTimeoutMs };

    let localTip: string | null;
    try {
      localTip = (await this.store.isRepository(probe)) ? await this.syncBranch.tip(probe) : null;
    } catch (error) {
      if (!isGitError(error)) throw error;
      logger.warn(`Could not read local sync branch: ${error.message}`);
      return SyncStatus.UNINITIALIZED;
    }
    if (!localTip) {
      return SyncStatus.UNINITIALIZED;
    }

    try {
      if (!(await this.store.hasRemote(this.settings.remote, probe))) {
        return SyncStatus.NO_REMOTE;
      }
      const remoteTip = await this.store.resolveRef(this.trackingRef, probe);
      if (!remoteTip) {
        return SyncStatus.NO_REMOTE;
      }
      if (remoteTip === localTip) {
        return SyncStatus.UP_TO_DATE;
      }

      const base = await this.store.getMergeBase(localTip, remoteTip, probe);
      if (base === remoteTip) return SyncStatus.AHEAD;
      if (base === localTip) return SyncStatus.BEHIND;
      return SyncStatus.DIVERGED;
    } catch (error) {
      if (!isGitError(error)) throw error;
      logger.warn(`Could not compare with ${this.settings.remote}: ${error.message}`);
      return SyncStatus.NO_REMOTE;
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // COUNTERS
  // ═══════════════════════════════════════════════════════════════════════

  async allocateSpecNumber(): Promise<number> {
    return this.counters.allocateSpecNumber();
  }

  async allocateStandaloneNumber(): Promise<number> {
    return this.counters.allocateStandaloneNumber();
  }

  /** Allocator bound to this service's store and branch */
  getCounterAllocator(): CounterAllocator {
    return this.counters;
  }
}
