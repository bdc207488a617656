import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { SubCommandHandler } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { Counters, Sync, SyncState } from '@tasksync/core';

/**
 * SyncCommand Options - CLI flags and arguments for sync subcommands
 */
export interface SyncRunOptions extends BaseCommandOptions {
  message?: string;
  pull?: boolean;
  push?: boolean;
}

export interface SyncInitOptions extends BaseCommandOptions {
  branch?: string;
}

/** Everything `tasksync sync` did, reported as-is under --json */
export interface SyncRunReport {
  pull: Sync.SyncResult | null;
  commit: Sync.SyncCommitResult;
  pushed: boolean | null;
}

const INIT_HINT = "Run 'tasksync sync init' first.";

/**
 * SyncCommand - Task synchronization CLI Interface
 *
 * Pure CLI layer that delegates all business logic to SyncService from
 * @tasksync/core and only formats the outcome.
 *
 * Exit codes: 0 on success or no-op, 1 on any failure.
 */
export class SyncCommand extends BaseCommand {

  /**
   * Register is not used here since we use registerSyncCommands in sync.ts
   */
  register(_program: Command): void {
    // Not used - registration handled in sync.ts
  }

  protected override subCommands(): Record<string, SubCommandHandler<BaseCommandOptions>> {
    return {
      status: (options) => this.executeStatus(options),
      counters: (options) => this.executeCounters(options),
      'verify-counters': (options) => this.executeVerifyCounters(options),
    };
  }

  /**
   * tasksync sync init - create the sync branch and seed its counters
   */
  async executeInit(options: SyncInitOptions): Promise<void> {
    try {
      if (options.branch) {
        const configManager = await this.dependencyService.getConfigManager();
        await configManager.updateSyncSettings({ branch: options.branch });
        this.dependencyService.invalidateSyncService();
      }

      const syncService = await this.dependencyService.getSyncService();
      await syncService.initialize();
      const counters = await syncService.getCounterAllocator().ensureCounters();
      const state = await syncService.getState();

      this.handleSuccess(
        { branch: state.branch_name, counters },
        options,
        `Initialized sync branch '${state.branch_name}' ` +
        `(next spec ${counters.spec_number}, next standalone ${counters.standalone_task_number})`
      );
    } catch (error) {
      if (Sync.isSyncAlreadyInitializedError(error) || Sync.isNotAGitRepositoryError(error)) {
        this.handleError(error.message, options, error);
        return;
      }
      this.handleError(
        `Init failed: ${error instanceof Error ? error.message : String(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * tasksync sync [--pull] [--push] - pull, then commit, then push
   */
  async executeSync(options: SyncRunOptions): Promise<void> {
    try {
      const syncService = await this.dependencyService.getSyncService();
      if (!(await syncService.isInitialized())) {
        this.handleError(`Sync branch not initialized. ${INIT_HINT}`, options);
        return;
      }

      let pullResult: Sync.SyncResult | null = null;
      if (options.pull) {
        this.progress('🔄 Pulling tasks from remote...', options);
        pullResult = await syncService.pull();
        if (!pullResult.success) {
          this.handleError(`Pull failed: ${pullResult.message}`, options);
          return;
        }
        this.progress(`📥 ${pullResult.message}`, options);
      }

      const commit = await syncService.commit(options.message);
      this.progress(
        commit.created
          ? `📝 Committed tasks at ${commit.commit_sha.slice(0, 8)}`
          : 'ℹ️  No task changes to commit',
        options
      );

      let pushed: boolean | null = null;
      if (options.push) {
        const verification = await syncService.getCounterAllocator().verifyCountersBeforePush();
        if (!verification.ok) {
          this.handleError(verification.message, options);
          return;
        }

        this.progress('📤 Pushing sync branch...', options);
        pushed = await syncService.push();
        if (!pushed) {
          const state = await syncService.getState();
          this.handleError(
            `Push to ${state.remote_name}/${state.branch_name} failed. ` +
            `Run 'tasksync sync --pull --push' to merge remote changes first.`,
            options
          );
          return;
        }
      }

      const report: SyncRunReport = { pull: pullResult, commit, pushed };
      this.handleSuccess(report, options, this.summarize(report));
    } catch (error) {
      if (Sync.isTasksFileNotFoundError(error) || Sync.isNotInitializedError(error)) {
        this.handleError(error.message, options, error);
        return;
      }
      this.handleError(
        `Sync failed: ${error instanceof Error ? error.message : String(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * tasksync sync status - local branch vs remote-tracking ref
   */
  async executeStatus(options: BaseCommandOptions): Promise<void> {
    const syncService = await this.dependencyService.getSyncService();
    const status = await syncService.getStatus();
    const state = await syncService.getState();

    if (options.json) {
      this.handleSuccess({ status, state }, options);
      return;
    }
    if (options.quiet) {
      console.log(status);
      return;
    }

    console.log(`Sync status: ${status}`);
    const hint = this.statusHint(status, state.remote_name);
    if (hint) {
      console.log(`💡 ${hint}`);
    }
    if (options.verbose) {
      console.log(`  Branch:       ${state.branch_name}`);
      console.log(`  Remote:       ${state.remote_name}`);
      console.log(`  Tasks file:   ${state.tasks_file}`);
      console.log(`  Last commit:  ${state.last_commit_sha ?? '-'}`);
      console.log(`  Last sync:    ${state.last_sync_at ?? '-'}`);
      console.log(`  Last push:    ${state.last_push_at ?? '-'}`);
      if (SyncState.hasUnpushedChanges(state)) {
        console.log('  ⚠️  Local commits not pushed yet');
      }
    }
  }

  /**
   * tasksync sync counters - next numbers stored on the sync branch
   */
  async executeCounters(options: BaseCommandOptions): Promise<void> {
    const syncService = await this.dependencyService.getSyncService();
    let counters: Counters.CounterState;
    try {
      counters = await syncService.getCounterAllocator().readCounters();
    } catch (error) {
      if (Sync.isNotInitializedError(error)) {
        this.handleError(error.message, options, error);
        return;
      }
      throw error;
    }

    this.handleSuccess(
      counters,
      options,
      `Next spec number: ${counters.spec_number}, next standalone task number: ${counters.standalone_task_number}`
    );
  }

  /**
   * tasksync sync verify-counters - local task IDs vs remote counters
   */
  async executeVerifyCounters(options: BaseCommandOptions): Promise<void> {
    const syncService = await this.dependencyService.getSyncService();
    const verification = await syncService.getCounterAllocator().verifyCountersBeforePush();

    if (!verification.ok) {
      this.handleError(verification.message, options);
      return;
    }
    this.handleSuccess(verification, options, 'Local task IDs are consistent with remote counters');
  }

  // ===== Helpers =====

  private progress(line: string, options: BaseCommandOptions): void {
    if (!options.json && !options.quiet) {
      console.log(line);
    }
  }

  private statusHint(status: Sync.SyncStatus, remote: string): string | null {
    switch (status) {
      case Sync.SyncStatus.UNINITIALIZED:
        return INIT_HINT;
      case Sync.SyncStatus.NO_REMOTE:
        return `Add the remote with 'git remote add ${remote} <url>' if needed, then run 'tasksync sync --push'.`;
      case Sync.SyncStatus.AHEAD:
        return "Run 'tasksync sync --push' to publish local commits.";
      case Sync.SyncStatus.BEHIND:
        return "Run 'tasksync sync --pull' to bring in remote changes.";
      case Sync.SyncStatus.DIVERGED:
        return "Run 'tasksync sync --pull --push' to merge remote changes and publish them.";
      default:
        return null;
    }
  }

  private summarize(report: SyncRunReport): string {
    const parts: string[] = [];
    if (report.pull) {
      parts.push(`${report.pull.tasks_updated} task(s) updated from remote`);
      if (report.pull.conflicts.length > 0) {
        parts.push(`${report.pull.conflicts.length} conflict(s) resolved`);
      }
    }
    parts.push(report.commit.created ? 'tasks committed' : 'nothing to commit');
    if (report.pushed) {
      parts.push('pushed');
    }
    return `Sync complete: ${parts.join(', ')}`;
  }
}
