export { SyncBranch } from './sync_branch';
export type { SyncBranchDependencies, CasPlan, CasCommit, CasPlanner } from './sync_branch.types';
