import type { Rule } from '../rules/types.js';
import type { SimulationMetrics, SpecializationWeights, TaskOutcome, WorldModelDiff } from './types.js';

export const DEFAULT_SPECIALIZATION: SpecializationWeights = { conditionWeight: 1, orderWeight: 0 };

/** Rules that still count toward the model's size */
export function ruleCount(rules: readonly Rule[]): number {
  return rules.filter(r => r.metadata.status !== 'DEPRECATED').length;
}

/**
 * Weighted count of conditions (and optionally order predecessors) over
 * ACTIVE rules. Adding a condition to an ACTIVE rule always raises it.
 */
export function specializationScore(
  rules: readonly Rule[],
  weights: SpecializationWeights = DEFAULT_SPECIALIZATION,
): number {
  let score = 0;
  for (const rule of rules) {
    if (rule.metadata.status !== 'ACTIVE') continue;
    score += rule.conditions.length * weights.conditionWeight;
    score += (rule.order?.mustFollow.length ?? 0) * weights.orderWeight;
  }
  return score;
}

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}

export function computeMetrics(
  outcomes: TaskOutcome[],
  rules: readonly Rule[],
  weights: SpecializationWeights = DEFAULT_SPECIALIZATION,
): SimulationMetrics {
  return {
    tasks: outcomes.length,
    successRate: outcomes.length === 0 ? 0 : outcomes.filter(o => o.status === 'SUCCESS').length / outcomes.length,
    meanExecutionTime: mean(outcomes.map(o => o.durationMs)),
    ruleCount: ruleCount(rules),
    specializationScore: specializationScore(rules, weights),
    stability: mean(outcomes.map(o => o.nodeSuccessRatio)),
  };
}

export function diffMetrics(patched: SimulationMetrics, baseline: SimulationMetrics): WorldModelDiff {
  return {
    successDelta: patched.successRate - baseline.successRate,
    meanExecutionTimeDelta: patched.meanExecutionTime - baseline.meanExecutionTime,
    ruleCountDelta: patched.ruleCount - baseline.ruleCount,
    specializationScoreDelta: patched.specializationScore - baseline.specializationScore,
    stabilityDelta: patched.stability - baseline.stability,
  };
}
