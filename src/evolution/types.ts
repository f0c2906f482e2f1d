/**
 * Evolution control types: patch budget, ranking decisions and rule
 * lifecycle bookkeeping.
 */

import type { BudgetExceededError } from '../core/errors.js';
import type { PatchProposal } from '../patch/types.js';
import type { Rule, RuleStatus } from '../rules/types.js';
import type { WorldModelDiff } from '../simulation/types.js';

// ─── Budget ─────────────────────────────────────────────────────────────────

export interface PatchBudget {
  /** Length of one budget window */
  windowMs: number;
  maxPatchesPerWindow: number;
  /** Net growth in non-deprecated rules allowed per window */
  maxRuleCountIncrease: number;
}

/** One accepted patch, as the budget remembers it */
export interface BudgetLedgerEntry {
  appliedAt: number;
  ruleCountDelta: number;
}

export interface BudgetWindowState {
  /** Start of the rolling window ending now */
  windowStart: number;
  patchesThisWindow: number;
  ruleCountIncrease: number;
}

export interface BudgetStatus extends PatchBudget, BudgetWindowState {
  patchesAvailable: number;
  ruleCountAvailable: number;
  /** When the oldest counted patch leaves the window; null when none is counted */
  nextExpiryAt: number | null;
}

// ─── Controller ─────────────────────────────────────────────────────────────

export type RejectionReason = 'BUDGET_EXCEEDED' | 'NO_IMPROVEMENT' | 'DOMINATED';

export interface PatchDecision {
  batchId: number;
  /** Position in the ranked frontier, 0 first */
  rank: number;
  baseVersion: string;
  proposal: PatchProposal;
  diff: WorldModelDiff;
}

export interface Rejection {
  proposalId: string;
  reason: RejectionReason;
  error?: BudgetExceededError;
  dominatedBy?: string;
}

export interface EvaluationOutcome {
  batchId: number;
  accepted: PatchDecision[];
  rejected: Rejection[];
}

export interface EvolutionControllerOptions {
  /** Reject proposals whose diff is not an improvement over the baseline */
  requireImprovement?: boolean;
}

// ─── Rule lifecycle ─────────────────────────────────────────────────────────

export interface LifecycleConfig {
  /** Fractional confidence loss per cycle for unused rules */
  decayRate: number;
  cooldownThreshold: number;
  /** Consecutive low-confidence cycles before COOLDOWN becomes DEPRECATED */
  deprecateAfterCycles: number;
  /** EMA weight of the latest cycle's success ratio */
  learningRate: number;
}

export interface RuleUsage {
  successes: number;
  failures: number;
}

export interface RuleTransition {
  ruleId: string;
  from: RuleStatus;
  to: RuleStatus;
  confidence: number;
}

export interface StatsUpdateResult {
  rules: Rule[];
  transitions: RuleTransition[];
  changed: boolean;
}

export interface RuleHealthReport {
  total: number;
  active: number;
  cooldown: number;
  deprecated: number;
  averageConfidence: number;
  lowConfidence: Array<{ ruleId: string; confidence: number; status: RuleStatus }>;
}
