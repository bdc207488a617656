import type { CounterReadResult, CounterState, CounterField } from './counters.types';
import { EMPTY_COUNTER_STATE } from './counters.types';
import { SchemaValidationCache, formatSchemaErrors } from '../schemas/schema_cache';

/**
 * Interprets counters.json content. Absent or corrupt content yields the
 * zero state; the status tells the two apart.
 */
export function parseCounterState(content: string | null): CounterReadResult {
  if (content === null) {
    return { status: 'missing', state: { ...EMPTY_COUNTER_STATE } };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return {
      status: 'corrupt',
      state: { ...EMPTY_COUNTER_STATE },
      reason: error instanceof Error ? error.message : String(error),
    };
  }

  const validate = SchemaValidationCache.getSchemaValidator<CounterState>('counters');
  if (!validate(parsed)) {
    return {
      status: 'corrupt',
      state: { ...EMPTY_COUNTER_STATE },
      reason: formatSchemaErrors(validate.errors),
    };
  }

  return {
    status: 'valid',
    state: { spec_number: parsed.spec_number, standalone_task_number: parsed.standalone_task_number },
  };
}

/** Pretty-printed with a trailing newline, keys in a fixed order */
export function serializeCounterState(state: CounterState): string {
  const ordered: CounterState = {
    spec_number: state.spec_number,
    standalone_task_number: state.standalone_task_number,
  };
  return `${JSON.stringify(ordered, null, 2)}\n`;
}

/**
 * Pure increment: returns the issued value and the state to persist.
 */
export function incrementCounter(
  state: CounterState,
  field: CounterField
): { issued: number; next: CounterState } {
  const issued = state[field];
  return { issued, next: { ...state, [field]: issued + 1 } };
}

/** Field-wise maximum, used when two histories are merged */
export function maxCounterState(a: CounterState, b: CounterState): CounterState {
  return {
    spec_number: Math.max(a.spec_number, b.spec_number),
    standalone_task_number: Math.max(a.standalone_task_number, b.standalone_task_number),
  };
}
