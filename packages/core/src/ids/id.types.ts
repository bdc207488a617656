/**
 * Hierarchical task IDs as a tagged union.
 *
 * - spec:       p-054
 * - plan:       p-054A
 * - epic:       p-054A-0
 * - task:       p-054A-0.1
 * - standalone: p-s017
 *
 * Children carry their full parent chain, so a task knows its spec number
 * without reparsing.
 */

export type SpecId = {
  type: 'spec';
  project: string;
  number: number;
};

export type PlanId = {
  type: 'plan';
  spec: SpecId;
  letter: string;
};

export type EpicId = {
  type: 'epic';
  plan: PlanId;
  char: string;
};

export type TaskId = {
  type: 'task';
  epic: EpicId;
  number: number;
};

export type StandaloneId = {
  type: 'standalone';
  project: string;
  number: number;
};

/** IDs that belong to the spec → plan → epic → task hierarchy */
export type SpecTaskId = SpecId | PlanId | EpicId | TaskId;

export type ParsedId = SpecTaskId | StandaloneId;

export type IdType = ParsedId['type'];

/** Anything that can hand out spec numbers (CounterAllocator, SyncService) */
export interface SpecNumberAllocator {
  allocateSpecNumber(): Promise<number>;
}

/** Anything that can hand out standalone task numbers */
export interface StandaloneNumberAllocator {
  allocateStandaloneNumber(): Promise<number>;
}
