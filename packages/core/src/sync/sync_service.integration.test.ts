/**
 * SyncService against real git repositories.
 *
 * SAFETY: temporary repositories and bare remotes only, removed after each
 * test. Nothing reaches the network.
 */

import * as fs from 'fs';
import * as path from 'path';
import { SyncService } from './sync_service';
import { SyncStatus } from './types';
import { NotAGitRepositoryError } from './errors';
import { parseTasksJsonl, serializeTasksJsonl } from './tasks_jsonl';
import type { Task } from './tasks_jsonl';
import { FsSyncStateStore } from '../sync_state_store/fs/fs_sync_state_store';
import { DEFAULT_SYNC_SETTINGS } from '../config_manager/config_manager.types';
import {
  createBareRemote,
  createLocalStore,
  createPlainDir,
  createRepoWithRemote,
  git,
  removeTempDir,
} from '../integration/git_test_helpers';

const TASKS_FILE = '.tasksync/tasks.jsonl';

describe('SyncService (git)', () => {
  const cleanup: string[] = [];

  afterEach(() => {
    for (const dir of cleanup.splice(0)) {
      removeTempDir(dir);
    }
  });

  function createService(projectRoot: string): SyncService {
    return new SyncService({
      store: createLocalStore(projectRoot),
      stateStore: new FsSyncStateStore(projectRoot),
      projectRoot,
      settings: { ...DEFAULT_SYNC_SETTINGS },
    });
  }

  function writeTasks(projectRoot: string, tasks: Task[]): void {
    const file = path.join(projectRoot, TASKS_FILE);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, serializeTasksJsonl(tasks));
  }

  function readTasks(projectRoot: string): Task[] {
    return parseTasksJsonl(fs.readFileSync(path.join(projectRoot, TASKS_FILE), 'utf8')).tasks;
  }

  function setup(): { remote: string; repoA: string; repoB: string } {
    const remote = createBareRemote();
    const repoA = createRepoWithRemote(remote);
    const repoB = createRepoWithRemote(remote);
    cleanup.push(remote, repoA, repoB);
    return { remote, repoA, repoB };
  }

  it('should refuse to initialize outside a git repository', async () => {
    const dir = createPlainDir();
    cleanup.push(dir);
    const service = createService(dir);

    expect(await service.isInitialized()).toBe(false);
    expect(await service.getStatus()).toBe(SyncStatus.UNINITIALIZED);
    await expect(service.initialize()).rejects.toBeInstanceOf(NotAGitRepositoryError);
  });

  it('should share tasks between two clones without touching their checkouts', async () => {
    const { remote, repoA, repoB } = setup();
    const headA = git(repoA, 'rev-parse', 'HEAD');
    const branchA = git(repoA, 'rev-parse', '--abbrev-ref', 'HEAD');
    const serviceA = createService(repoA);
    const serviceB = createService(repoB);

    await serviceA.initialize();
    writeTasks(repoA, [{ id: 't1', title: 'from A', updated_at: '2026-01-01T10:00:00.000Z' }]);
    expect((await serviceA.commit()).created).toBe(true);
    expect(await serviceA.getStatus()).toBe(SyncStatus.NO_REMOTE);
    expect(await serviceA.push()).toBe(true);
    expect(await serviceA.getStatus()).toBe(SyncStatus.UP_TO_DATE);

    await serviceB.initialize();
    const pulled = await serviceB.pull();
    expect(pulled.success).toBe(true);
    expect(pulled.tasks_updated).toBe(1);
    expect(readTasks(repoB)).toEqual([{ id: 't1', title: 'from A', updated_at: '2026-01-01T10:00:00.000Z' }]);

    writeTasks(repoB, [{ id: 't1', title: 'from B', updated_at: '2026-01-01T11:00:00.000Z' }]);
    await serviceB.commit('Edit t1');
    expect(await serviceB.push()).toBe(true);

    const result = await serviceA.pull();
    expect(result.success).toBe(true);
    expect(result.conflicts).toHaveLength(1);
    expect(result.conflicts[0]?.winner).toBe('remote');
    expect(readTasks(repoA)[0]?.title).toBe('from B');
    expect(git(repoA, 'rev-parse', 'task-sync')).toBe(git(remote, 'rev-parse', 'task-sync'));

    expect(git(repoA, 'rev-parse', 'HEAD')).toBe(headA);
    expect(git(repoA, 'rev-parse', '--abbrev-ref', 'HEAD')).toBe(branchA);
    expect(git(repoA, 'diff', '--cached', '--name-only')).toBe('');

    const state = await serviceA.getState();
    expect(state.initialized).toBe(true);
    expect(state.last_commit_sha).toBe(git(repoA, 'rev-parse', 'task-sync'));
    expect(fs.existsSync(path.join(repoA, '.tasksync', '.sync-state.json'))).toBe(true);
  });

  it('should reject a push over unknown remote commits and leave the remote alone', async () => {
    const { remote, repoA, repoB } = setup();
    const serviceA = createService(repoA);
    const serviceB = createService(repoB);

    await serviceA.initialize();
    writeTasks(repoA, [{ id: 't1' }]);
    await serviceA.commit();
    await serviceA.push();
    const remoteTip = git(remote, 'rev-parse', 'task-sync');

    await serviceB.initialize();
    writeTasks(repoB, [{ id: 't2' }]);
    await serviceB.commit();

    expect(await serviceB.push()).toBe(false);
    expect(git(remote, 'rev-parse', 'task-sync')).toBe(remoteTip);

    expect((await serviceB.pull()).success).toBe(true);
    expect(await serviceB.push()).toBe(true);
    expect(readTasks(repoB).map(task => task.id)).toEqual(['t2', 't1']);
  });

  it('should report a failed pull when the remote is unreachable', async () => {
    const { repoA } = setup();
    git(repoA, 'remote', 'set-url', 'origin', path.join(repoA, 'missing-remote'));
    const service = createService(repoA);
    await service.initialize();

    const result = await service.pull();

    expect(result.success).toBe(false);
    expect(result.message).toMatch(/^Failed to fetch remote: /);
    expect(await service.push()).toBe(false);
  });
});
