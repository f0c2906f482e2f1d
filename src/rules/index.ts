export * from './types.js';
export * from './schema.js';
export * from './rule.js';
export { RuleSet } from './rule-set.js';
