import type { PatchEdit, PatchProposal } from '../../src/patch/types.js';
import type { SimulationMetrics, SimulationResult, WorldModelDiff } from '../../src/simulation/types.js';

export function proposal(id: string, edits: PatchEdit[], baseVersion = 'v0'): PatchProposal {
  return {
    id,
    edits,
    rationale: `test proposal ${id}`,
    provenance: { source: 'manual', taskIds: [], baseVersion, blamedRuleIds: [], nodeIds: [] },
  };
}

export function diff(overrides: Partial<WorldModelDiff> = {}): WorldModelDiff {
  return {
    successDelta: 0,
    meanExecutionTimeDelta: 0,
    ruleCountDelta: 0,
    specializationScoreDelta: 0,
    stabilityDelta: 0,
    ...overrides,
  };
}

const ZERO_METRICS: SimulationMetrics = {
  tasks: 0,
  successRate: 0,
  meanExecutionTime: 0,
  ruleCount: 0,
  specializationScore: 0,
  stability: 0,
};

/** A simulation result carrying only what the controller looks at */
export function simResult(p: PatchProposal, d: WorldModelDiff, baseVersion = 'v0'): SimulationResult {
  return {
    proposal: p,
    baseVersion,
    baseline: { ...ZERO_METRICS },
    patched: { ...ZERO_METRICS },
    diff: d,
    baselineOutcomes: [],
    patchedOutcomes: [],
  };
}
