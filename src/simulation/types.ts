import type { RuleLoopError } from '../core/errors.js';
import type { Goal } from '../dag/types.js';
import type { ReportStatus } from '../engine/types.js';
import type { PatchProposal } from '../patch/types.js';
import type { WorldState } from '../rules/types.js';

export interface SimulationTask {
  id: string;
  goal: string | Goal;
  state?: WorldState;
}

export interface SimulationMetrics {
  tasks: number;
  /** Fraction of tasks whose report status was SUCCESS */
  successRate: number;
  /** Mean report duration in clock units */
  meanExecutionTime: number;
  /** Non-deprecated rules */
  ruleCount: number;
  /** Weighted condition count over ACTIVE rules */
  specializationScore: number;
  /** Mean per-task fraction of nodes that succeeded */
  stability: number;
}

/** patched minus baseline, per metric */
export interface WorldModelDiff {
  successDelta: number;
  meanExecutionTimeDelta: number;
  ruleCountDelta: number;
  specializationScoreDelta: number;
  stabilityDelta: number;
}

export type TaskOutcomeStatus = ReportStatus | 'UNBUILDABLE';

export interface TaskOutcome {
  taskId: string;
  status: TaskOutcomeStatus;
  durationMs: number;
  nodeSuccessRatio: number;
  error?: string;
}

export interface SimulationResult {
  proposal: PatchProposal;
  baseVersion: string;
  baseline: SimulationMetrics;
  patched: SimulationMetrics;
  diff: WorldModelDiff;
  baselineOutcomes: TaskOutcome[];
  patchedOutcomes: TaskOutcome[];
}

export interface SimulationFailure {
  proposal: PatchProposal;
  error: RuleLoopError;
}

export interface SimulationBatch {
  baseVersion: string;
  results: SimulationResult[];
  failures: SimulationFailure[];
}

export interface SpecializationWeights {
  conditionWeight: number;
  orderWeight: number;
}
