import type { WorldModelDiff } from '../simulation/types.js';

export type Objectives = Pick<WorldModelDiff, 'successDelta' | 'ruleCountDelta' | 'specializationScoreDelta'>;

/**
 * `a` dominates `b` when it is no worse on every objective (higher success,
 * lower rule count, lower specialization) and strictly better on one.
 */
export function dominates(a: Objectives, b: Objectives): boolean {
  const noWorse =
    a.successDelta >= b.successDelta &&
    a.ruleCountDelta <= b.ruleCountDelta &&
    a.specializationScoreDelta <= b.specializationScoreDelta;
  const better =
    a.successDelta > b.successDelta ||
    a.ruleCountDelta < b.ruleCountDelta ||
    a.specializationScoreDelta < b.specializationScoreDelta;
  return noWorse && better;
}

/** Success must not drop, and something must get better */
export function isImprovement(diff: Objectives): boolean {
  if (diff.successDelta > 0) return true;
  return diff.successDelta === 0 && (diff.ruleCountDelta < 0 || diff.specializationScoreDelta < 0);
}

/**
 * Items no other item dominates, in input order.
 */
export function paretoFrontier<T>(items: readonly T[], objectives: (item: T) => Objectives): T[] {
  return items.filter(candidate => !items.some(other => other !== candidate && dominates(objectives(other), objectives(candidate))));
}

/** successDelta desc, then ruleCountDelta asc; stable otherwise */
export function compareFrontier(a: Objectives, b: Objectives): number {
  if (a.successDelta !== b.successDelta) return b.successDelta - a.successDelta;
  return a.ruleCountDelta - b.ruleCountDelta;
}
