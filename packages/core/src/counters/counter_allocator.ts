/**
 * CounterAllocator - collision-free numbers for spec and standalone IDs
 *
 * Counters live in counters.json on the sync branch. Every allocation
 * re-reads them from the branch tip, increments one field and commits the
 * result with a compare-and-swap on the branch ref. A lost CAS persists
 * nothing, so no number is ever issued twice or skipped.
 */

import type { SyncBranch } from '../sync_branch/sync_branch';
import type { SpecNumberAllocator, StandaloneNumberAllocator } from '../ids/id.types';
import { tryParseId, specNumberOf, standaloneNumberOf } from '../ids/id_parser';
import { parseTasksJsonl } from '../sync/tasks_jsonl';
import { isGitError } from '../git/errors';
import { COUNTERS_FILE } from '../config_manager/config_manager.types';
import { readFileIfExists } from '../fs_utils/atomic_write';
import { createLogger } from '../logger/logger';
import { CounterAllocationError } from './counters.errors';
import {
  incrementCounter,
  parseCounterState,
  serializeCounterState,
} from './counter_state';
import type {
  CounterAllocatorDependencies,
  CounterField,
  CounterReadResult,
  CounterState,
  CounterVerification,
  LocalIdUsage,
} from './counters.types';

const logger = createLogger('[Counters] ');

const FIELD_LABELS: Record<CounterField, string> = {
  spec_number: 'spec number',
  standalone_task_number: 'standalone task number',
};

export class CounterAllocator implements SpecNumberAllocator, StandaloneNumberAllocator {
  private readonly syncBranch: SyncBranch;
  private readonly tasksFilePath: string;
  private readonly remote: string;

  constructor(dependencies: CounterAllocatorDependencies) {
    this.syncBranch = dependencies.syncBranch;
    this.tasksFilePath = dependencies.tasksFilePath;
    this.remote = dependencies.remote;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // READ OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  private async readAt(commitSha: string): Promise<CounterReadResult> {
    const content = await this.syncBranch.readFile(commitSha, COUNTERS_FILE);
    const result = parseCounterState(content);
    if (result.status === 'corrupt') {
      logger.warn(`counters.json at ${commitSha.slice(0, 8)} is corrupt (${result.reason}); using zeroed counters`);
    }
    return result;
  }

  /**
   * Counter state at the branch tip; zeroed when counters.json is absent
   * or corrupt.
   *
   * @throws NotInitializedError when the sync branch does not exist
   */
  async readCounters(): Promise<CounterState> {
    const tip = await this.syncBranch.requireTip();
    return (await this.readAt(tip)).state;
  }

  /** True when the branch exists and has a counters.json */
  async countersExist(): Promise<boolean> {
    const tip = await this.syncBranch.tip();
    if (!tip) {
      return false;
    }
    return (await this.syncBranch.readFile(tip, COUNTERS_FILE)) !== null;
  }

  /**
   * Highest spec and standalone numbers used by IDs in the local tasks file.
   * Legacy and foreign IDs are ignored.
   */
  async scanLocalTaskIds(): Promise<LocalIdUsage> {
    const content = await readFileIfExists(this.tasksFilePath);
    if (content === null) {
      logger.debug(`No tasks file at ${this.tasksFilePath}`);
      return { maxSpec: null, maxStandalone: null };
    }

    let maxSpec: number | null = null;
    let maxStandalone: number | null = null;
    for (const task of parseTasksJsonl(content, this.tasksFilePath).tasks) {
      const parsed = tryParseId(task.id);
      if (!parsed) continue;

      const spec = specNumberOf(parsed);
      if (spec !== null && (maxSpec === null || spec > maxSpec)) {
        maxSpec = spec;
      }
      const standalone = standaloneNumberOf(parsed);
      if (standalone !== null && (maxStandalone === null || standalone > maxStandalone)) {
        maxStandalone = standalone;
      }
    }
    return { maxSpec, maxStandalone };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // WRITE OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Makes sure counters.json exists on the branch. When it is missing (or
   * corrupt) the counters are seeded past the highest local IDs; otherwise
   * the existing state is returned unchanged.
   *
   * @throws NotInitializedError when the sync branch does not exist
   */
  async ensureCounters(): Promise<CounterState> {
    await this.syncBranch.requireTip();
    const usage = await this.scanLocalTaskIds();
    const seeded: CounterState = {
      spec_number: usage.maxSpec === null ? 0 : usage.maxSpec + 1,
      standalone_task_number: usage.maxStandalone === null ? 0 : usage.maxStandalone + 1,
    };

    const outcome = await this.syncBranch.transact<CounterState>(async (tip) => {
      const current = await this.readAt(tip);
      if (current.status === 'valid') {
        return { kind: 'noop', value: current.state };
      }
      const treeSha = await this.syncBranch.treeWithFile(tip, COUNTERS_FILE, serializeCounterState(seeded));
      return { kind: 'commit', treeSha, parents: [tip], message: 'Initialize counters', value: seeded };
    });

    if (outcome.state === 'failed') {
      throw new CounterAllocationError('initial counters', outcome.attempts - 1, outcome.attempts);
    }
    if (outcome.value.created) {
      logger.info(
        `Initialized counters: spec=${seeded.spec_number}, standalone=${seeded.standalone_task_number}`
      );
    }
    return outcome.value.value;
  }

  private async allocate(field: CounterField): Promise<number> {
    const outcome = await this.syncBranch.transact<number>(async (tip) => {
      const { state } = await this.readAt(tip);
      const { issued, next } = incrementCounter(state, field);
      const treeSha = await this.syncBranch.treeWithFile(tip, COUNTERS_FILE, serializeCounterState(next));
      return {
        kind: 'commit',
        treeSha,
        parents: [tip],
        message: `Allocate ${FIELD_LABELS[field]} ${issued}`,
        value: issued,
      };
    });

    if (outcome.state === 'failed') {
      throw new CounterAllocationError(FIELD_LABELS[field], outcome.attempts - 1, outcome.attempts);
    }
    logger.debug(`Allocated ${FIELD_LABELS[field]} ${outcome.value.value} in ${outcome.attempts} attempt(s)`);
    return outcome.value.value;
  }

  /**
   * Allocates the next spec number.
   *
   * @throws NotInitializedError when the sync branch does not exist
   * @throws CounterAllocationError when every retry lost the CAS
   */
  async allocateSpecNumber(): Promise<number> {
    return this.allocate('spec_number');
  }

  /**
   * Allocates the next standalone task number.
   *
   * @throws NotInitializedError when the sync branch does not exist
   * @throws CounterAllocationError when every retry lost the CAS
   */
  async allocateStandaloneNumber(): Promise<number> {
    return this.allocate('standalone_task_number');
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRE-PUSH VERIFICATION
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Checks that no local task ID uses a number the remote counters have not
   * issued yet, which would collide with the next allocation elsewhere.
   *
   * Anything that prevents the check (no branch, no remote, fetch failure,
   * no remote counters) counts as nothing to verify.
   */
  async verifyCountersBeforePush(): Promise<CounterVerification> {
    const ok: CounterVerification = { ok: true, message: '', conflicts: [] };

    if (!(await this.syncBranch.tip())) {
      logger.debug('Sync branch not initialized, skipping counter verification');
      return ok;
    }

    const store = this.syncBranch.store;
    const trackingRef = this.syncBranch.trackingRef(this.remote);
    let remoteContent: string | null;
    try {
      if (!(await store.hasRemote(this.remote))) {
        return ok;
      }
      if (!(await store.fetchRef(this.remote, this.syncBranch.branch, trackingRef))) {
        return ok;
      }
      remoteContent = await store.getFileAtRef(trackingRef, COUNTERS_FILE);
    } catch (error) {
      if (isGitError(error)) {
        logger.debug(`Could not fetch remote counters: ${error.message}`);
        return ok;
      }
      throw error;
    }

    const remote = parseCounterState(remoteContent);
    if (remote.status !== 'valid') {
      return ok;
    }

    const usage = await this.scanLocalTaskIds();
    const conflicts: string[] = [];
    if (usage.maxSpec !== null && usage.maxSpec >= remote.state.spec_number) {
      conflicts.push(
        `Local spec number ${usage.maxSpec} conflicts with remote counter (next: ${remote.state.spec_number})`
      );
    }
    if (usage.maxStandalone !== null && usage.maxStandalone >= remote.state.standalone_task_number) {
      conflicts.push(
        `Local standalone task number ${usage.maxStandalone} conflicts with remote counter ` +
        `(next: ${remote.state.standalone_task_number})`
      );
    }

    if (conflicts.length === 0) {
      return ok;
    }
    return {
      ok: false,
      conflicts,
      message: formatCollisionMessage(conflicts, usage, remote.state, this.remote, this.syncBranch.branch),
    };
  }
}

function formatCollisionMessage(
  conflicts: readonly string[],
  usage: LocalIdUsage,
  remote: CounterState,
  remoteName: string,
  branch: string
): string {
  return [
    'ID collision detected!',
    '',
    'Local task IDs use numbers the remote sync branch has not issued yet.',
    '',
    'Conflicts:',
    ...conflicts.map(conflict => `  - ${conflict}`),
    '',
    'Current state:',
    `  Local max spec:         ${usage.maxSpec ?? 'none'}`,
    `  Remote next spec:       ${remote.spec_number}`,
    `  Local max standalone:   ${usage.maxStandalone ?? 'none'}`,
    `  Remote next standalone: ${remote.standalone_task_number}`,
    '',
    'Resolution:',
    `  1. Pull the sync branch: tasksync sync --pull (fetches ${remoteName}/${branch})`,
    '  2. Renumber the conflicting task IDs from the updated counters',
    '  3. Push again',
  ].join('\n');
}
