/**
 * EvolutionController: decides which simulated proposals may be applied.
 *
 * A batch is filtered by budget and (optionally) improvement, reduced to its
 * Pareto frontier and ranked. Decisions are only valid for the latest batch
 * and the version they were simulated against.
 */

import { EventEmitter } from 'node:events';
import { BudgetExceededError, InvalidProposalError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { SimulationResult } from '../simulation/types.js';
import type { BudgetController } from './budget-controller.js';
import { compareFrontier, dominates, isImprovement, paretoFrontier } from './pareto.js';
import type {
  BudgetStatus,
  EvaluationOutcome,
  EvolutionControllerOptions,
  PatchDecision,
  Rejection,
} from './types.js';

interface ActiveBatch {
  id: number;
  frontier: Set<string>;
  applied: Set<string>;
}

export class EvolutionController extends EventEmitter {
  private readonly requireImprovement: boolean;
  private batchCounter = 0;
  private active: ActiveBatch | null = null;
  private logger = getLogger();

  constructor(private readonly budget: BudgetController, options: EvolutionControllerOptions = {}) {
    super();
    this.requireImprovement = options.requireImprovement ?? true;
  }

  evaluate(results: SimulationResult[]): EvaluationOutcome {
    const batchId = ++this.batchCounter;
    const rejected: Rejection[] = [];
    const survivors: SimulationResult[] = [];

    for (const result of results) {
      try {
        this.budget.check(result.diff.ruleCountDelta);
      } catch (err) {
        if (!(err instanceof BudgetExceededError)) throw err;
        rejected.push({ proposalId: result.proposal.id, reason: 'BUDGET_EXCEEDED', error: err });
        continue;
      }
      if (this.requireImprovement && !isImprovement(result.diff)) {
        rejected.push({ proposalId: result.proposal.id, reason: 'NO_IMPROVEMENT' });
        continue;
      }
      survivors.push(result);
    }

    const frontier = paretoFrontier(survivors, r => r.diff);
    for (const result of survivors) {
      if (frontier.includes(result)) continue;
      const dominator = survivors.find(other => dominates(other.diff, result.diff));
      rejected.push({ proposalId: result.proposal.id, reason: 'DOMINATED', dominatedBy: dominator?.proposal.id });
    }

    const accepted: PatchDecision[] = [...frontier]
      .sort((a, b) => compareFrontier(a.diff, b.diff))
      .map((r, rank) => ({ batchId, rank, baseVersion: r.baseVersion, proposal: r.proposal, diff: r.diff }));

    this.active = { id: batchId, frontier: new Set(accepted.map(d => d.proposal.id)), applied: new Set() };

    this.logger.info(
      { batchId, candidates: results.length, accepted: accepted.length, rejected: rejected.length },
      'Proposal batch evaluated',
    );
    this.emit('evolution:evaluated', { batchId, accepted, rejected });
    return { batchId, accepted, rejected };
  }

  /**
   * Re-check a decision right before it is committed. Throws
   * InvalidProposalError for stale decisions, BudgetExceededError when the
   * budget no longer allows it.
   */
  assertAdmissible(decision: PatchDecision, currentVersion: string): void {
    const id = decision.proposal.id;
    if (!this.active || this.active.id !== decision.batchId) {
      throw new InvalidProposalError(`decision belongs to batch ${decision.batchId}, which is no longer current`, id);
    }
    if (!this.active.frontier.has(id)) {
      throw new InvalidProposalError('proposal is not on the Pareto frontier', id);
    }
    if (this.active.applied.has(id)) {
      throw new InvalidProposalError('proposal was already applied', id);
    }
    if (decision.baseVersion !== currentVersion) {
      throw new InvalidProposalError(
        `simulated against ${decision.baseVersion} but current version is ${currentVersion}`,
        id,
      );
    }
    this.budget.check(decision.diff.ruleCountDelta);
  }

  recordApplied(decision: PatchDecision): void {
    this.budget.record(decision.diff.ruleCountDelta);
    this.active?.applied.add(decision.proposal.id);
    this.emit('evolution:applied', { batchId: decision.batchId, proposalId: decision.proposal.id });
  }

  getBudgetStatus(): BudgetStatus {
    return this.budget.getStatus();
  }
}
