/**
 * Tasks JSONL codec
 *
 * One JSON object per line. Only `id` (identity) and `updated_at`
 * (conflict resolution) are interpreted; every other field is carried
 * through untouched.
 */

import { createLogger } from '../logger/logger';

const logger = createLogger('[Tasks] ');

export type Task = {
  id: string;
  /** ISO-8601 timestamp of the last change */
  updated_at?: string | null;
  [field: string]: unknown;
};

export type ParsedTasks = {
  tasks: Task[];
  /** Lines that were not a JSON object with a string id */
  skipped: number;
};

export function isTask(value: unknown): value is Task {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const id: unknown = Reflect.get(value, 'id');
  const updatedAt: unknown = Reflect.get(value, 'updated_at');
  return typeof id === 'string' && id.length > 0 &&
    (updatedAt === undefined || updatedAt === null || typeof updatedAt === 'string');
}

/**
 * Parses JSONL content. Blank lines are ignored; malformed lines are
 * skipped with a warning instead of failing the whole file.
 */
export function parseTasksJsonl(content: string, source = 'tasks file'): ParsedTasks {
  const tasks: Task[] = [];
  let skipped = 0;

  content.split('\n').forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line.length === 0) return;

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch {
      value = undefined;
    }

    if (isTask(value)) {
      tasks.push(value);
    } else {
      skipped += 1;
      logger.warn(`Skipping malformed line ${index + 1} in ${source}`);
    }
  });

  return { tasks, skipped };
}

export function serializeTasksJsonl(tasks: readonly Task[]): string {
  return tasks.map(task => `${JSON.stringify(task)}\n`).join('');
}
