/**
 * Per-task last-write-wins merge
 *
 * Pure: no I/O, so the resolution of every pair of records is fixed by
 * the records alone.
 */

import type { Task } from './tasks_jsonl';
import type { SyncConflict } from './types';
import { canonicalize } from './canonical_json';

export type TaskMergeResult = {
  tasks: Task[];
  conflicts: SyncConflict[];
  /** Local tasks that were added or replaced by the remote side */
  tasksUpdated: number;
};

/**
 * Decides which side of a conflicting pair wins.
 *
 * - later updated_at wins
 * - equal updated_at: remote
 * - local has no timestamp: remote
 * - only remote has no timestamp: local
 */
export function resolveWinner(local: Task, remote: Task): 'local' | 'remote' {
  const localTime = parseTimestamp(local.updated_at);
  const remoteTime = parseTimestamp(remote.updated_at);

  if (localTime === null) return 'remote';
  if (remoteTime === null) return 'local';
  if (localTime.epochMs !== remoteTime.epochMs) {
    return localTime.epochMs > remoteTime.epochMs ? 'local' : 'remote';
  }
  return localTime.subMsNanos > remoteTime.subMsNanos ? 'local' : 'remote';
}

type Instant = { epochMs: number; subMsNanos: number };

const FRACTION_PATTERN = /T\d{2}:\d{2}:\d{2}\.(\d+)/;

/**
 * Date.parse stops at milliseconds; digits after the third fractional one
 * are kept apart so microsecond timestamps still order.
 */
function parseTimestamp(value: string | null | undefined): Instant | null {
  if (!value) return null;
  const epochMs = Date.parse(value);
  if (Number.isNaN(epochMs)) return null;

  const fraction = FRACTION_PATTERN.exec(value)?.[1] ?? '';
  const subMsNanos = Number(fraction.slice(3, 9).padEnd(6, '0'));
  return { epochMs, subMsNanos };
}

/**
 * Indexes tasks by id; a repeated id keeps its first position and its
 * last content.
 */
function indexTasks(tasks: readonly Task[]): Map<string, Task> {
  const byId = new Map<string, Task>();
  for (const task of tasks) {
    byId.set(task.id, task);
  }
  return byId;
}

/**
 * Merges two task lists by id.
 *
 * Order: local tasks in their order, then remote-only tasks in remote order.
 * No task present on only one side is ever dropped.
 */
export function mergeTasks(localTasks: readonly Task[], remoteTasks: readonly Task[]): TaskMergeResult {
  const local = indexTasks(localTasks);
  const remote = indexTasks(remoteTasks);

  const tasks: Task[] = [];
  const conflicts: SyncConflict[] = [];
  let tasksUpdated = 0;

  for (const [id, localTask] of local) {
    const remoteTask = remote.get(id);
    if (!remoteTask || canonicalize(localTask) === canonicalize(remoteTask)) {
      tasks.push(localTask);
      continue;
    }

    const winner = resolveWinner(localTask, remoteTask);
    conflicts.push({
      task_id: id,
      resolution: 'last_write_wins',
      winner,
      local_updated_at: localTask.updated_at ?? null,
      remote_updated_at: remoteTask.updated_at ?? null,
    });
    if (winner === 'remote') {
      tasks.push(remoteTask);
      tasksUpdated += 1;
    } else {
      tasks.push(localTask);
    }
  }

  for (const [id, remoteTask] of remote) {
    if (!local.has(id)) {
      tasks.push(remoteTask);
      tasksUpdated += 1;
    }
  }

  return { tasks, conflicts, tasksUpdated };
}
