import type { ExecutionReport } from '../engine/types.js';
import type { Rule, RuleStatus } from '../rules/types.js';
import { systemClock, type Clock } from '../utils/clock.js';
import type {
  LifecycleConfig,
  RuleHealthReport,
  RuleTransition,
  RuleUsage,
  StatsUpdateResult,
} from './types.js';

const DEFAULT_LIFECYCLE: LifecycleConfig = {
  decayRate: 0.05,
  cooldownThreshold: 0.3,
  deprecateAfterCycles: 3,
  learningRate: 0.1,
};

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Once-per-cycle confidence and lifecycle bookkeeping.
 *
 * Used rules move toward the cycle's success ratio (EMA), unused ones decay.
 * ACTIVE drops to COOLDOWN under the threshold; COOLDOWN becomes DEPRECATED
 * after `deprecateAfterCycles` consecutive cycles under it. Transitions only
 * move forward: a COOLDOWN rule that climbs back resets its streak but is not
 * reactivated.
 */
export class RuleStatsUpdater {
  private readonly config: LifecycleConfig;

  constructor(config?: Partial<LifecycleConfig>, private readonly clock: Clock = systemClock) {
    this.config = { ...DEFAULT_LIFECYCLE, ...config };
  }

  /**
   * Per-rule outcome counts: each node a rule built or constrained counts once,
   * as a success if it SUCCEEDED and a failure if it FAILED.
   */
  static collectUsage(reports: readonly ExecutionReport[]): Map<string, RuleUsage> {
    const usage = new Map<string, RuleUsage>();
    for (const report of reports) {
      const statusOf = new Map(report.nodes.map(n => [n.nodeId, n.status]));
      const seen = new Set<string>();
      for (const entry of report.trace.entries) {
        const key = `${entry.ruleId}\u0000${entry.nodeId}`;
        if (seen.has(key)) continue;
        seen.add(key);

        const status = statusOf.get(entry.nodeId);
        if (status !== 'SUCCEEDED' && status !== 'FAILED') continue;
        const counts = usage.get(entry.ruleId) ?? { successes: 0, failures: 0 };
        if (status === 'SUCCEEDED') counts.successes++;
        else counts.failures++;
        usage.set(entry.ruleId, counts);
      }
    }
    return usage;
  }

  update(
    rules: readonly Rule[],
    usage: ReadonlyMap<string, RuleUsage>,
    explicitDeprecations: Iterable<string> = [],
  ): StatsUpdateResult {
    const now = this.clock.now();
    const forced = new Set(explicitDeprecations);
    const transitions: RuleTransition[] = [];
    let changed = false;

    const next = rules.map(original => {
      const rule = structuredClone(original);
      const meta = rule.metadata;
      const from: RuleStatus = meta.status;
      if (from === 'DEPRECATED') return rule;

      const used = usage.get(rule.id);
      if (used && used.successes + used.failures > 0) {
        const ratio = used.successes / (used.successes + used.failures);
        meta.successCount += used.successes;
        meta.failureCount += used.failures;
        meta.confidence = clamp01(meta.confidence + this.config.learningRate * (ratio - meta.confidence));
      } else {
        meta.confidence = clamp01(meta.confidence * (1 - this.config.decayRate));
      }

      const low = meta.confidence < this.config.cooldownThreshold;
      if (forced.has(rule.id)) {
        meta.status = 'DEPRECATED';
      } else if (from === 'ACTIVE') {
        meta.lowConfidenceStreak = low ? 1 : 0;
        if (low) meta.status = 'COOLDOWN';
      } else {
        meta.lowConfidenceStreak = low ? meta.lowConfidenceStreak + 1 : 0;
        if (meta.lowConfidenceStreak >= this.config.deprecateAfterCycles) meta.status = 'DEPRECATED';
      }

      meta.lastUpdated = now;
      changed = true;
      if (meta.status !== from) {
        transitions.push({ ruleId: rule.id, from, to: meta.status, confidence: meta.confidence });
      }
      return rule;
    });

    return { rules: next, transitions, changed };
  }

  healthReport(rules: readonly Rule[]): RuleHealthReport {
    const live = rules.filter(r => r.metadata.status !== 'DEPRECATED');
    const lowConfidence = live
      .filter(r => r.metadata.confidence < this.config.cooldownThreshold)
      .map(r => ({ ruleId: r.id, confidence: r.metadata.confidence, status: r.metadata.status }));
    return {
      total: rules.length,
      active: rules.filter(r => r.metadata.status === 'ACTIVE').length,
      cooldown: rules.filter(r => r.metadata.status === 'COOLDOWN').length,
      deprecated: rules.filter(r => r.metadata.status === 'DEPRECATED').length,
      averageConfidence: live.length === 0 ? 0 : live.reduce((sum, r) => sum + r.metadata.confidence, 0) / live.length,
      lowConfidence,
    };
  }
}
