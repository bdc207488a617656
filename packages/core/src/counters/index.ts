export { CounterAllocator } from './counter_allocator';
export {
  parseCounterState,
  serializeCounterState,
  incrementCounter,
  maxCounterState,
} from './counter_state';
export { CounterAllocationError, isCounterAllocationError } from './counters.errors';
export { EMPTY_COUNTER_STATE } from './counters.types';
export type {
  CounterState,
  CounterField,
  CounterReadResult,
  LocalIdUsage,
  CounterVerification,
  CounterAllocatorDependencies,
} from './counters.types';
