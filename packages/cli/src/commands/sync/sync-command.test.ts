/**
 * SyncCommand Unit Tests
 *
 * Tests the CLI layer for `tasksync sync` and its subcommands using a
 * mocked DependencyInjectionService. Git behavior is covered by the
 * SyncService tests in packages/core/src/sync/.
 */

import { Sync } from '@tasksync/core';

const mockCounterAllocator = {
  ensureCounters: jest.fn(),
  readCounters: jest.fn(),
  verifyCountersBeforePush: jest.fn(),
};

const mockSyncService = {
  isInitialized: jest.fn(),
  initialize: jest.fn(),
  pull: jest.fn(),
  commit: jest.fn(),
  push: jest.fn(),
  getStatus: jest.fn(),
  getState: jest.fn(),
  getCounterAllocator: jest.fn(() => mockCounterAllocator),
};

const mockConfigManager = {
  updateSyncSettings: jest.fn().mockResolvedValue(undefined),
};

const mockDependencyService = {
  getSyncService: jest.fn().mockResolvedValue(mockSyncService),
  getConfigManager: jest.fn().mockResolvedValue(mockConfigManager),
  invalidateSyncService: jest.fn(),
};

jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn(() => mockDependencyService)
  }
}));

import { SyncCommand } from './sync-command';

const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

const STATE: Sync.SyncState = {
  branch_name: 'task-sync',
  tasks_file: '.tasksync/tasks.jsonl',
  remote_name: 'origin',
  initialized: true,
  last_commit_sha: null,
  last_sync_at: null,
  last_push_at: null,
  last_push_sha: null,
};

function pullResult(overrides: Partial<Sync.SyncResult> = {}): Sync.SyncResult {
  return {
    success: true,
    operation: 'pull',
    message: 'Already up to date with remote',
    tasks_updated: 0,
    conflicts: [],
    started_at: '2026-01-02T03:04:05.000Z',
    completed_at: '2026-01-02T03:04:05.000Z',
    ...overrides,
  };
}

function loggedLines(): unknown[] {
  return mockConsoleLog.mock.calls.map(call => call[0]);
}

describe('SyncCommand', () => {
  let syncCommand: SyncCommand;

  beforeEach(() => {
    jest.clearAllMocks();
    syncCommand = new SyncCommand();

    mockSyncService.isInitialized.mockResolvedValue(true);
    mockSyncService.getState.mockResolvedValue(STATE);
    mockSyncService.commit.mockResolvedValue({ commit_sha: 'abcdef1234567890', created: true });
    mockSyncService.push.mockResolvedValue(true);
    mockCounterAllocator.verifyCountersBeforePush.mockResolvedValue({ ok: true, message: '', conflicts: [] });
  });

  describe('tasksync sync', () => {
    it('should refuse to run before the sync branch exists', async () => {
      mockSyncService.isInitialized.mockResolvedValue(false);

      await syncCommand.executeSync({});

      expect(mockConsoleError).toHaveBeenCalledWith("❌ Sync branch not initialized. Run 'tasksync sync init' first.");
      expect(mockProcessExit).toHaveBeenCalledWith(1);
      expect(mockSyncService.commit).not.toHaveBeenCalled();
    });

    it('should only commit without --pull or --push', async () => {
      await syncCommand.executeSync({});

      expect(mockSyncService.commit).toHaveBeenCalledWith(undefined);
      expect(mockSyncService.pull).not.toHaveBeenCalled();
      expect(mockSyncService.push).not.toHaveBeenCalled();
      expect(loggedLines()).toEqual([
        '📝 Committed tasks at abcdef12',
        '✅ Sync complete: tasks committed',
      ]);
      expect(mockProcessExit).not.toHaveBeenCalled();
    });

    it('should pass the commit message through', async () => {
      await syncCommand.executeSync({ message: 'Close bd-007' });

      expect(mockSyncService.commit).toHaveBeenCalledWith('Close bd-007');
    });

    it('should pull, then commit, then push', async () => {
      mockSyncService.pull.mockResolvedValue(pullResult({
        message: 'Merged 2 tasks from remote (1 conflicts resolved)',
        tasks_updated: 2,
        conflicts: [{
          task_id: 'bd-001',
          resolution: 'last_write_wins',
          winner: 'remote',
          local_updated_at: '2026-01-01T00:00:00Z',
          remote_updated_at: '2026-01-02T00:00:00Z',
        }],
      }));
      mockSyncService.commit.mockResolvedValue({ commit_sha: 'abcdef1234567890', created: false });

      await syncCommand.executeSync({ pull: true, push: true });

      const pullOrder = mockSyncService.pull.mock.invocationCallOrder[0];
      const commitOrder = mockSyncService.commit.mock.invocationCallOrder[0];
      const pushOrder = mockSyncService.push.mock.invocationCallOrder[0];
      expect(pullOrder).toBeLessThan(commitOrder ?? 0);
      expect(commitOrder).toBeLessThan(pushOrder ?? 0);

      expect(loggedLines()).toEqual([
        '🔄 Pulling tasks from remote...',
        '📥 Merged 2 tasks from remote (1 conflicts resolved)',
        'ℹ️  No task changes to commit',
        '📤 Pushing sync branch...',
        '✅ Sync complete: 2 task(s) updated from remote, 1 conflict(s) resolved, nothing to commit, pushed',
      ]);
      expect(mockProcessExit).not.toHaveBeenCalled();
    });

    it('should stop when the pull fails', async () => {
      mockSyncService.pull.mockResolvedValue(pullResult({
        success: false,
        message: 'Failed to fetch remote: connection refused',
      }));

      await syncCommand.executeSync({ pull: true });

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Pull failed: Failed to fetch remote: connection refused');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
      expect(mockSyncService.commit).not.toHaveBeenCalled();
    });

    it('should not push when local IDs collide with remote counters', async () => {
      mockCounterAllocator.verifyCountersBeforePush.mockResolvedValue({
        ok: false,
        message: 'ID collision detected!',
        conflicts: ['Local spec number 4 conflicts with remote counter (next: 3)'],
      });

      await syncCommand.executeSync({ push: true });

      expect(mockConsoleError).toHaveBeenCalledWith('❌ ID collision detected!');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
      expect(mockSyncService.push).not.toHaveBeenCalled();
    });

    it('should fail with a pull hint when the push is rejected', async () => {
      mockSyncService.push.mockResolvedValue(false);

      await syncCommand.executeSync({ push: true });

      expect(mockConsoleError).toHaveBeenCalledWith(
        "❌ Push to origin/task-sync failed. Run 'tasksync sync --pull --push' to merge remote changes first."
      );
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('should report a missing tasks file', async () => {
      mockSyncService.commit.mockRejectedValue(new Sync.TasksFileNotFoundError('/repo/.tasksync/tasks.jsonl'));

      await syncCommand.executeSync({});

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Tasks file not found: /repo/.tasksync/tasks.jsonl');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('should print only the JSON report with --json', async () => {
      await syncCommand.executeSync({ push: true, json: true });

      expect(mockConsoleLog).toHaveBeenCalledTimes(1);
      expect(mockConsoleLog).toHaveBeenCalledWith(JSON.stringify({
        success: true,
        data: {
          pull: null,
          commit: { commit_sha: 'abcdef1234567890', created: true },
          pushed: true,
        },
      }, null, 2));
    });

    it('should print JSON errors with --json', async () => {
      mockSyncService.push.mockResolvedValue(false);

      await syncCommand.executeSync({ push: true, json: true });

      expect(mockConsoleLog).toHaveBeenLastCalledWith(JSON.stringify({
        success: false,
        error: "Push to origin/task-sync failed. Run 'tasksync sync --pull --push' to merge remote changes first.",
        exitCode: 1,
      }, null, 2));
      expect(mockConsoleError).not.toHaveBeenCalled();
    });

    it('should stay silent on success with --quiet', async () => {
      await syncCommand.executeSync({ quiet: true });

      expect(mockConsoleLog).not.toHaveBeenCalled();
      expect(mockProcessExit).not.toHaveBeenCalled();
    });
  });

  describe('tasksync sync init', () => {
    beforeEach(() => {
      mockSyncService.initialize.mockResolvedValue(undefined);
      mockCounterAllocator.ensureCounters.mockResolvedValue({ spec_number: 13, standalone_task_number: 5 });
    });

    it('should initialize the branch and seed counters', async () => {
      await syncCommand.executeInit({});

      expect(mockConfigManager.updateSyncSettings).not.toHaveBeenCalled();
      expect(mockSyncService.initialize).toHaveBeenCalledTimes(1);
      expect(mockCounterAllocator.ensureCounters).toHaveBeenCalledTimes(1);
      expect(mockConsoleLog).toHaveBeenCalledWith(
        "✅ Initialized sync branch 'task-sync' (next spec 13, next standalone 5)"
      );
    });

    it('should save --branch before creating the service', async () => {
      mockSyncService.getState.mockResolvedValue({ ...STATE, branch_name: 'shared-tasks' });

      await syncCommand.executeInit({ branch: 'shared-tasks' });

      expect(mockConfigManager.updateSyncSettings).toHaveBeenCalledWith({ branch: 'shared-tasks' });
      expect(mockDependencyService.invalidateSyncService).toHaveBeenCalledTimes(1);
      const saveOrder = mockConfigManager.updateSyncSettings.mock.invocationCallOrder[0];
      const serviceOrder = mockDependencyService.getSyncService.mock.invocationCallOrder[0];
      expect(saveOrder).toBeLessThan(serviceOrder ?? 0);
      expect(mockConsoleLog).toHaveBeenCalledWith(
        "✅ Initialized sync branch 'shared-tasks' (next spec 13, next standalone 5)"
      );
    });

    it('should fail when the branch already exists', async () => {
      mockSyncService.initialize.mockRejectedValue(new Sync.SyncAlreadyInitializedError('task-sync'));

      await syncCommand.executeInit({});

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Sync branch "task-sync" is already initialized.');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
      expect(mockCounterAllocator.ensureCounters).not.toHaveBeenCalled();
    });
  });

  describe('tasksync sync status', () => {
    it('should print the status', async () => {
      mockSyncService.getStatus.mockResolvedValue(Sync.SyncStatus.UP_TO_DATE);

      await syncCommand.executeSubCommand('status', {});

      expect(loggedLines()).toEqual(['Sync status: up_to_date']);
      expect(mockProcessExit).not.toHaveBeenCalled();
    });

    it('should hint at init when uninitialized', async () => {
      mockSyncService.getStatus.mockResolvedValue(Sync.SyncStatus.UNINITIALIZED);

      await syncCommand.executeSubCommand('status', {});

      expect(loggedLines()).toEqual([
        'Sync status: uninitialized',
        "💡 Run 'tasksync sync init' first.",
      ]);
    });

    const nextSteps: Array<[Sync.SyncStatus, string]> = [
      [Sync.SyncStatus.BEHIND, "💡 Run 'tasksync sync --pull' to bring in remote changes."],
      [Sync.SyncStatus.DIVERGED, "💡 Run 'tasksync sync --pull --push' to merge remote changes and publish them."],
      [Sync.SyncStatus.AHEAD, "💡 Run 'tasksync sync --push' to publish local commits."],
      [
        Sync.SyncStatus.NO_REMOTE,
        "💡 Add the remote with 'git remote add origin <url>' if needed, then run 'tasksync sync --push'.",
      ],
    ];

    it.each(nextSteps)('should suggest the next step when %s', async (status, hint) => {
      mockSyncService.getStatus.mockResolvedValue(status);

      await syncCommand.executeSubCommand('status', {});

      expect(loggedLines()).toEqual([`Sync status: ${status}`, hint]);
    });

    it('should show bookkeeping with --verbose', async () => {
      mockSyncService.getStatus.mockResolvedValue(Sync.SyncStatus.AHEAD);
      mockSyncService.getState.mockResolvedValue({
        ...STATE,
        last_commit_sha: 'c0ffee00',
        last_sync_at: '2026-01-02T03:04:05.000Z',
      });

      await syncCommand.executeSubCommand('status', { verbose: true });

      expect(loggedLines()).toEqual([
        'Sync status: ahead',
        "💡 Run 'tasksync sync --push' to publish local commits.",
        '  Branch:       task-sync',
        '  Remote:       origin',
        '  Tasks file:   .tasksync/tasks.jsonl',
        '  Last commit:  c0ffee00',
        '  Last sync:    2026-01-02T03:04:05.000Z',
        '  Last push:    -',
        '  ⚠️  Local commits not pushed yet',
      ]);
    });

    it('should print status and state with --json', async () => {
      mockSyncService.getStatus.mockResolvedValue(Sync.SyncStatus.NO_REMOTE);

      await syncCommand.executeSubCommand('status', { json: true });

      expect(mockConsoleLog).toHaveBeenCalledWith(JSON.stringify({
        success: true,
        data: { status: 'no_remote', state: STATE },
      }, null, 2));
    });
  });

  describe('tasksync sync counters', () => {
    it('should print the next numbers', async () => {
      mockCounterAllocator.readCounters.mockResolvedValue({ spec_number: 3, standalone_task_number: 1 });

      await syncCommand.executeSubCommand('counters', {});

      expect(mockConsoleLog).toHaveBeenCalledWith('✅ Next spec number: 3, next standalone task number: 1');
    });

    it('should fail before initialization', async () => {
      mockCounterAllocator.readCounters.mockRejectedValue(new Sync.NotInitializedError('task-sync'));

      await syncCommand.executeSubCommand('counters', {});

      expect(mockConsoleError).toHaveBeenCalledWith(
        "❌ Sync branch \"task-sync\" is not initialized. Run 'tasksync sync init' first."
      );
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });
  });

  describe('tasksync sync verify-counters', () => {
    it('should succeed when IDs are consistent', async () => {
      await syncCommand.executeSubCommand('verify-counters', {});

      expect(mockConsoleLog).toHaveBeenCalledWith('✅ Local task IDs are consistent with remote counters');
      expect(mockProcessExit).not.toHaveBeenCalled();
    });

    it('should exit 1 on a collision', async () => {
      mockCounterAllocator.verifyCountersBeforePush.mockResolvedValue({
        ok: false,
        message: 'ID collision detected!',
        conflicts: [],
      });

      await syncCommand.executeSubCommand('verify-counters', {});

      expect(mockConsoleError).toHaveBeenCalledWith('❌ ID collision detected!');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });
  });

  describe('sub-command routing', () => {
    it('should reject unknown sub-commands', async () => {
      await syncCommand.executeSubCommand('rebase', {});

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Unknown sub-command: rebase');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('should report unexpected failures of a sub-command', async () => {
      mockSyncService.getStatus.mockRejectedValue(new Error('disk unavailable'));

      await syncCommand.executeSubCommand('status', {});

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Failed to execute status: disk unavailable');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });
  });
});
