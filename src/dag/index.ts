export * from './types.js';
export { ActionDAG } from './action-dag.js';
export {
  GoalDecomposerRegistry,
  parseGoal,
  extractTarget,
  BROWSE_DECOMPOSER,
  SEARCH_DECOMPOSER,
  EXTRACT_DECOMPOSER,
  GENERIC_DECOMPOSER,
  type GoalDecomposer,
} from './goal.js';
export { DagBuilder, type BuildRequest, type DagBuilderOptions, type RuleSource } from './dag-builder.js';
