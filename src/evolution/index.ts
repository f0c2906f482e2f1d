export * from './types.js';
export { BudgetController } from './budget-controller.js';
export { EvolutionController } from './evolution-controller.js';
export { RuleStatsUpdater } from './rule-stats-updater.js';
export { dominates, isImprovement, paretoFrontier, compareFrontier, type Objectives } from './pareto.js';
