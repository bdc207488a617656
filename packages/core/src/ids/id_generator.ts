import type {
  EpicId,
  PlanId,
  SpecId,
  SpecNumberAllocator,
  StandaloneId,
  StandaloneNumberAllocator,
  TaskId,
} from './id.types';
import { createEpicId, createPlanId, createSpecId, createStandaloneId, createTaskId } from './id_parser';

const PLAN_LETTER_SEQUENCE = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
const EPIC_CHAR_SEQUENCE = '0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';

/**
 * Generates a Spec ID (e.g., 'p-054') with a number allocated on the sync branch.
 */
export async function generateSpecId(project: string, allocator: SpecNumberAllocator): Promise<SpecId> {
  const number = await allocator.allocateSpecNumber();
  return createSpecId(project, number);
}

/**
 * Generates a Standalone task ID (e.g., 'p-s017') with a number allocated on the sync branch.
 */
export async function generateStandaloneId(
  project: string,
  allocator: StandaloneNumberAllocator
): Promise<StandaloneId> {
  const number = await allocator.allocateStandaloneNumber();
  return createStandaloneId(project, number);
}

/**
 * Generates a Plan ID (e.g., 'p-054A').
 */
export function generatePlanId(spec: SpecId, letter: string): PlanId {
  return createPlanId(spec, letter);
}

/**
 * Generates an Epic ID (e.g., 'p-054A-0').
 */
export function generateEpicId(plan: PlanId, char: string): EpicId {
  return createEpicId(plan, char);
}

/**
 * Generates a Task ID (e.g., 'p-054A-0.1'). Task numbers start at 1.
 */
export function generateTaskId(epic: EpicId, number: number): TaskId {
  return createTaskId(epic, number);
}

/**
 * First plan letter not in use, in the order A-Z, a-z, 0-9.
 *
 * @throws Error when all 62 letters are taken
 */
export function nextPlanLetter(existing: readonly string[]): string {
  const used = new Set(existing);
  for (const letter of PLAN_LETTER_SEQUENCE) {
    if (!used.has(letter)) return letter;
  }
  throw new Error('All plan letters exhausted (62 letters used). Cannot create more plans for this spec.');
}

/**
 * First epic char not in use, in the order 0-9, a-z, A-Z.
 *
 * @throws Error when all 62 chars are taken
 */
export function nextEpicChar(existing: readonly string[]): string {
  const used = new Set(existing);
  for (const char of EPIC_CHAR_SEQUENCE) {
    if (!used.has(char)) return char;
  }
  throw new Error('All epic chars exhausted (62 chars used). Cannot create more epics for this plan.');
}
