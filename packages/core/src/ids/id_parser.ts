/**
 * ID Parsing Utilities for hierarchical task IDs
 *
 * Parses strings into the ParsedId union once; everything downstream
 * matches on `type` instead of re-inspecting the string.
 * Complements id_generator.ts (which creates IDs).
 *
 * @module ids/id_parser
 */

import type {
  EpicId,
  IdType,
  ParsedId,
  PlanId,
  SpecId,
  StandaloneId,
  TaskId,
} from './id.types';
import { InvalidIdError, LegacyIdError } from './id.errors';

const PROJECT = '[a-z][a-z0-9-]*';
// at least 3 digits: zero-padded below 1000, wider above
const NUMBER = '\\d{3,}';
const PLAN_LETTER = '[A-Za-z0-9]';
const EPIC_CHAR = '[0-9a-zA-Z]';

const SPEC_REGEX = new RegExp(`^(${PROJECT})-(${NUMBER})$`);
const PLAN_REGEX = new RegExp(`^(${PROJECT})-(${NUMBER})(${PLAN_LETTER})$`);
const EPIC_REGEX = new RegExp(`^(${PROJECT})-(${NUMBER})(${PLAN_LETTER})-(${EPIC_CHAR})$`);
const TASK_REGEX = new RegExp(`^(${PROJECT})-(${NUMBER})(${PLAN_LETTER})-(${EPIC_CHAR})\\.(\\d+)$`);
const STANDALONE_REGEX = new RegExp(`^(${PROJECT})-s(${NUMBER})$`);

// project ends in a letter; suffix has a letter and is not s<digits>
const LEGACY_REGEX = /^([a-z](?:[a-z0-9-]*[a-z])?)-(?!s\d+$)(?=.*[a-z])[a-z0-9]{3,}$/;

const PROJECT_REGEX = new RegExp(`^${PROJECT}$`);
const PLAN_LETTER_REGEX = new RegExp(`^${PLAN_LETTER}$`);
const EPIC_CHAR_REGEX = new RegExp(`^${EPIC_CHAR}$`);

// ==================== Constructors ====================

function assertProject(project: string): void {
  if (!PROJECT_REGEX.test(project)) {
    throw new InvalidIdError(project, 'project must match [a-z][a-z0-9-]*');
  }
}

function assertCount(id: string, value: number, min: number): void {
  if (!Number.isSafeInteger(value) || value < min) {
    throw new InvalidIdError(id, `number must be an integer >= ${min}`);
  }
}

export function createSpecId(project: string, number: number): SpecId {
  assertProject(project);
  assertCount(`${project}-${number}`, number, 0);
  return { type: 'spec', project, number };
}

export function createPlanId(spec: SpecId, letter: string): PlanId {
  if (!PLAN_LETTER_REGEX.test(letter)) {
    throw new InvalidIdError(`${formatId(spec)}${letter}`, 'plan letter must be one of A-Z, a-z, 0-9');
  }
  return { type: 'plan', spec, letter };
}

export function createEpicId(plan: PlanId, char: string): EpicId {
  if (!EPIC_CHAR_REGEX.test(char)) {
    throw new InvalidIdError(`${formatId(plan)}-${char}`, 'epic char must be one of 0-9, a-z, A-Z');
  }
  return { type: 'epic', plan, char };
}

export function createTaskId(epic: EpicId, number: number): TaskId {
  assertCount(`${formatId(epic)}.${number}`, number, 1);
  return { type: 'task', epic, number };
}

export function createStandaloneId(project: string, number: number): StandaloneId {
  assertProject(project);
  assertCount(`${project}-s${number}`, number, 0);
  return { type: 'standalone', project, number };
}

// ==================== Formatting ====================

function pad(value: number): string {
  return String(value).padStart(3, '0');
}

/**
 * Formats a parsed ID back into its string form.
 *
 * @example
 * formatId(parseId('p-054A-0.1')) // 'p-054A-0.1'
 */
export function formatId(id: ParsedId): string {
  switch (id.type) {
    case 'spec':
      return `${id.project}-${pad(id.number)}`;
    case 'plan':
      return `${formatId(id.spec)}${id.letter}`;
    case 'epic':
      return `${formatId(id.plan)}-${id.char}`;
    case 'task':
      return `${formatId(id.epic)}.${id.number}`;
    case 'standalone':
      return `${id.project}-s${pad(id.number)}`;
  }
}

// ==================== Parsing ====================

/**
 * Parses a string ID into its typed form.
 *
 * When an ID matches both the plan and the spec pattern (p-0549), it is a
 * plan: spec 054 with letter "9". Spec 549 is written p-549.
 *
 * @throws LegacyIdError for old random IDs such as p-k7m
 * @throws InvalidIdError for anything else that is not an ID
 */
export function parseId(id: string): ParsedId {
  let match = TASK_REGEX.exec(id);
  if (match) {
    const [, project = '', spec = '', letter = '', char = '', task = ''] = match;
    const epic = createEpicId(createPlanId(createSpecId(project, Number(spec)), letter), char);
    return createTaskId(epic, Number(task));
  }

  match = EPIC_REGEX.exec(id);
  if (match) {
    const [, project = '', spec = '', letter = '', char = ''] = match;
    return createEpicId(createPlanId(createSpecId(project, Number(spec)), letter), char);
  }

  match = PLAN_REGEX.exec(id);
  if (match) {
    const [, project = '', spec = '', letter = ''] = match;
    return createPlanId(createSpecId(project, Number(spec)), letter);
  }

  match = SPEC_REGEX.exec(id);
  if (match) {
    const [, project = '', spec = ''] = match;
    return createSpecId(project, Number(spec));
  }

  match = STANDALONE_REGEX.exec(id);
  if (match) {
    const [, project = '', number = ''] = match;
    return createStandaloneId(project, Number(number));
  }

  if (LEGACY_REGEX.test(id)) {
    throw new LegacyIdError(id);
  }
  throw new InvalidIdError(id);
}

/** parseId without the throw: null for legacy and invalid IDs */
export function tryParseId(id: string): ParsedId | null {
  try {
    return parseId(id);
  } catch (error) {
    if (error instanceof InvalidIdError) {
      return null;
    }
    throw error;
  }
}

/** True for every recognized format, legacy random IDs included */
export function validateId(id: string): boolean {
  return (
    TASK_REGEX.test(id) ||
    EPIC_REGEX.test(id) ||
    PLAN_REGEX.test(id) ||
    SPEC_REGEX.test(id) ||
    STANDALONE_REGEX.test(id) ||
    LEGACY_REGEX.test(id)
  );
}

/** ID type without building the parent chain; null for legacy and invalid IDs */
export function getIdType(id: string): IdType | null {
  if (TASK_REGEX.test(id)) return 'task';
  if (EPIC_REGEX.test(id)) return 'epic';
  if (PLAN_REGEX.test(id)) return 'plan';
  if (SPEC_REGEX.test(id)) return 'spec';
  if (STANDALONE_REGEX.test(id)) return 'standalone';
  return null;
}

/**
 * Parent in the hierarchy as a string.
 *
 * @example
 * getParentId('p-054A-0.1') // 'p-054A-0'
 * getParentId('p-054')      // null
 * getParentId('p-s017')     // null
 */
export function getParentId(id: string): string | null {
  const parsed = tryParseId(id);
  if (!parsed) return null;

  switch (parsed.type) {
    case 'task':
      return formatId(parsed.epic);
    case 'epic':
      return formatId(parsed.plan);
    case 'plan':
      return formatId(parsed.spec);
    case 'spec':
    case 'standalone':
      return null;
  }
}

/** Spec number an ID is filed under; null for standalone IDs */
export function specNumberOf(id: ParsedId): number | null {
  switch (id.type) {
    case 'spec':
      return id.number;
    case 'plan':
      return id.spec.number;
    case 'epic':
      return id.plan.spec.number;
    case 'task':
      return id.epic.plan.spec.number;
    case 'standalone':
      return null;
  }
}

/** Standalone number of an ID; null for the spec hierarchy */
export function standaloneNumberOf(id: ParsedId): number | null {
  switch (id.type) {
    case 'standalone':
      return id.number;
    case 'spec':
    case 'plan':
    case 'epic':
    case 'task':
      return null;
  }
}
