export {
  parseId,
  tryParseId,
  validateId,
  getIdType,
  getParentId,
  formatId,
  specNumberOf,
  standaloneNumberOf,
  createSpecId,
  createPlanId,
  createEpicId,
  createTaskId,
  createStandaloneId,
} from './id_parser';
export {
  generateSpecId,
  generateStandaloneId,
  generatePlanId,
  generateEpicId,
  generateTaskId,
  nextPlanLetter,
  nextEpicChar,
} from './id_generator';
export { InvalidIdError, LegacyIdError, isInvalidIdError, isLegacyIdError } from './id.errors';
export type {
  SpecId,
  PlanId,
  EpicId,
  TaskId,
  StandaloneId,
  SpecTaskId,
  ParsedId,
  IdType,
  SpecNumberAllocator,
  StandaloneNumberAllocator,
} from './id.types';
