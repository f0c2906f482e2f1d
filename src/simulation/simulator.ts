/**
 * Simulator: scores a proposal by replaying a fixed task set against the
 * baseline rules and against a fork with the proposal's edits applied.
 *
 * Forks are never committed. Every run gets its own TickClock, so durations
 * depend only on what the run did and repeated simulations agree exactly.
 */

import { isRuleLoopError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { DagBuilder } from '../dag/dag-builder.js';
import type { BuildResult } from '../dag/types.js';
import { Engine } from '../engine/engine.js';
import type { Capability } from '../engine/types.js';
import { applyEdits } from '../patch/apply-edits.js';
import type { PatchProposal } from '../patch/types.js';
import type { Rule } from '../rules/types.js';
import { TickClock } from '../utils/clock.js';
import type { WorldModelSnapshot } from '../world/types.js';
import { DEFAULT_SPECIALIZATION, computeMetrics, diffMetrics } from './metrics.js';
import type {
  SimulationBatch,
  SimulationFailure,
  SimulationResult,
  SimulationTask,
  SpecializationWeights,
  TaskOutcome,
} from './types.js';

export interface SimulatorOptions {
  builder: DagBuilder;
  capability: Capability;
  nodeTimeoutMs?: number;
  maxConcurrency?: number;
  specialization?: SpecializationWeights;
  initialConfidence?: number;
}

interface Arm {
  label: string;
  version: string;
  rules: readonly Rule[];
}

export class Simulator {
  private readonly weights: SpecializationWeights;
  private logger = getLogger();
  private armCounter = 0;

  constructor(private readonly options: SimulatorOptions) {
    this.weights = options.specialization ?? DEFAULT_SPECIALIZATION;
  }

  /**
   * Apply `proposal` to a fork of `baseline` without committing it.
   * Throws whatever the edits throw.
   */
  fork(baseline: WorldModelSnapshot, proposal: PatchProposal): Rule[] {
    return applyEdits(baseline.rules, proposal.edits, {
      now: baseline.createdAt,
      initialConfidence: this.options.initialConfidence ?? 0.5,
      proposalId: proposal.id,
    });
  }

  async simulate(
    baseline: WorldModelSnapshot,
    proposal: PatchProposal,
    tasks: SimulationTask[],
  ): Promise<SimulationResult> {
    const baselineOutcomes = await this.runArm({ label: 'baseline', version: baseline.version, rules: baseline.rules }, tasks);
    return this.simulateAgainst(baseline, baselineOutcomes, proposal, tasks);
  }

  /**
   * Simulate every proposal on its own fork, in parallel. Proposals whose
   * edits cannot be applied land in `failures`.
   */
  async simulateBatch(
    baseline: WorldModelSnapshot,
    proposals: PatchProposal[],
    tasks: SimulationTask[],
  ): Promise<SimulationBatch> {
    const baselineOutcomes = await this.runArm({ label: 'baseline', version: baseline.version, rules: baseline.rules }, tasks);

    const settled = await Promise.all(
      proposals.map(async (proposal): Promise<SimulationResult | SimulationFailure> => {
        try {
          return await this.simulateAgainst(baseline, baselineOutcomes, proposal, tasks);
        } catch (err) {
          if (isRuleLoopError(err)) {
            this.logger.debug({ proposalId: proposal.id, error: err.message }, 'Proposal could not be forked');
            return { proposal, error: err };
          }
          throw err;
        }
      }),
    );

    const results: SimulationResult[] = [];
    const failures: SimulationFailure[] = [];
    for (const entry of settled) {
      if ('error' in entry) failures.push(entry);
      else results.push(entry);
    }
    return { baseVersion: baseline.version, results, failures };
  }

  private async simulateAgainst(
    baseline: WorldModelSnapshot,
    baselineOutcomes: TaskOutcome[],
    proposal: PatchProposal,
    tasks: SimulationTask[],
  ): Promise<SimulationResult> {
    const forked = this.fork(baseline, proposal);
    const patchedOutcomes = await this.runArm(
      { label: proposal.id, version: `${baseline.version}+${proposal.id}`, rules: forked },
      tasks,
    );
    const baselineMetrics = computeMetrics(baselineOutcomes, baseline.rules, this.weights);
    const patchedMetrics = computeMetrics(patchedOutcomes, forked, this.weights);
    return {
      proposal,
      baseVersion: baseline.version,
      baseline: baselineMetrics,
      patched: patchedMetrics,
      diff: diffMetrics(patchedMetrics, baselineMetrics),
      baselineOutcomes,
      patchedOutcomes,
    };
  }

  /** Tasks run one after another; each builds against `arm.rules` */
  private async runArm(arm: Arm, tasks: SimulationTask[]): Promise<TaskOutcome[]> {
    const armId = ++this.armCounter;
    const outcomes: TaskOutcome[] = [];
    for (const task of tasks) {
      let built: BuildResult;
      try {
        built = this.options.builder.build({ version: arm.version, rules: arm.rules }, { goal: task.goal, state: task.state });
      } catch (err) {
        if (!isRuleLoopError(err)) throw err;
        outcomes.push({ taskId: task.id, status: 'UNBUILDABLE', durationMs: 0, nodeSuccessRatio: 0, error: err.message });
        continue;
      }

      const engine = new Engine(this.options.capability, {
        nodeTimeoutMs: this.options.nodeTimeoutMs,
        maxConcurrency: this.options.maxConcurrency,
        clock: new TickClock(),
      });
      const report = await engine.execute(built.dag, built.trace, {
        taskId: task.id,
        runId: `sim${armId}:${arm.label}:${task.id}`,
      });
      const succeeded = report.nodes.filter(n => n.status === 'SUCCEEDED').length;
      outcomes.push({
        taskId: task.id,
        status: report.status,
        durationMs: report.durationMs,
        nodeSuccessRatio: report.nodes.length === 0 ? 1 : succeeded / report.nodes.length,
      });
    }
    return outcomes;
  }
}
