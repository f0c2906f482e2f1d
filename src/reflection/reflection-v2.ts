/**
 * Advisor-assisted reflection: ask an external advisor for edits and keep
 * only candidates that pass the schema, the edit whitelist and the rule-id
 * check. The advisor call is bounded by `timeoutMs`; a timeout yields no
 * proposals.
 */

import { InvalidProposalError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { ExecutionReport } from '../engine/types.js';
import type { PatchEdit, PatchProposal } from '../patch/types.js';
import { describeIssues } from '../rules/schema.js';
import { RuleSet } from '../rules/rule-set.js';
import type { Rule } from '../rules/types.js';
import { contentHash } from '../utils/crypto.js';
import { TimeoutError, withTimeout } from '../utils/timeout.js';
import { assignBlame } from './blame.js';
import { AdvisorEditSchema, CandidateEnvelopeSchema, isWhitelisted } from './proposal-schema.js';
import type { Advisor, AdvisorReflection, FailureContext } from './types.js';

export interface ReflectionV2Options {
  timeoutMs?: number;
}

function editRuleId(edit: PatchEdit): string | null {
  return edit.op === 'ADD_RULE' ? null : edit.ruleId;
}

export class ReflectionV2 {
  private readonly timeoutMs: number;
  private logger = getLogger();

  constructor(private readonly advisor: Advisor, options: ReflectionV2Options = {}) {
    this.timeoutMs = options.timeoutMs ?? 10000;
  }

  buildContext(report: ExecutionReport, rules: readonly Rule[]): FailureContext {
    return {
      taskId: report.taskId,
      version: report.version,
      goal: report.goal,
      status: report.status,
      failedNodes: assignBlame(report).map(b => ({
        nodeId: b.nodeId,
        action: b.action,
        failure: b.failure,
        ruleIds: b.ruleIds,
      })),
      skippedNodeIds: report.nodes.filter(n => n.status === 'SKIPPED').map(n => n.nodeId),
      trace: structuredClone(report.trace),
      rules: structuredClone([...rules]),
    };
  }

  async reflect(report: ExecutionReport, rules: readonly Rule[]): Promise<AdvisorReflection> {
    const result: AdvisorReflection = { proposals: [], rejected: [], timedOut: false };
    if (report.status === 'SUCCESS') return result;

    const context = this.buildContext(report, rules);
    let candidates: unknown[];
    try {
      candidates = await withTimeout(signal => this.advisor.propose(context, signal), this.timeoutMs);
    } catch (err) {
      if (err instanceof TimeoutError) {
        this.logger.warn({ taskId: report.taskId, timeoutMs: this.timeoutMs }, 'Advisor timed out');
        result.timedOut = true;
        return result;
      }
      const error = toError(err);
      this.logger.warn({ taskId: report.taskId, error: error.message }, 'Advisor failed');
      result.advisorError = error.message;
      return result;
    }

    if (!Array.isArray(candidates)) {
      result.rejected.push(new InvalidProposalError('advisor did not return a list of candidates'));
      return result;
    }

    const ruleSet = new RuleSet(rules);
    const seen = new Set<string>();
    candidates.forEach((candidate, index) => {
      try {
        const proposal = this.validate(candidate, index, report, ruleSet);
        if (seen.has(proposal.id)) return;
        seen.add(proposal.id);
        result.proposals.push(proposal);
      } catch (err) {
        if (!(err instanceof InvalidProposalError)) throw err;
        this.logger.debug({ taskId: report.taskId, index, error: err.message }, 'Advisor candidate discarded');
        result.rejected.push(err);
      }
    });
    return result;
  }

  private validate(candidate: unknown, index: number, report: ExecutionReport, ruleSet: RuleSet): PatchProposal {
    const ref = `advisor#${index}`;
    const envelope = CandidateEnvelopeSchema.safeParse(candidate);
    if (!envelope.success) {
      throw new InvalidProposalError(describeIssues(envelope.error), ref);
    }

    const edits: PatchEdit[] = [];
    envelope.data.edits.forEach((raw, i) => {
      if (!isWhitelisted(raw.op)) {
        throw new InvalidProposalError(`edit ${i}: kind "${raw.op}" is not allowed`, ref);
      }
      const parsed = AdvisorEditSchema.safeParse(raw);
      if (!parsed.success) {
        throw new InvalidProposalError(`edit ${i}: ${describeIssues(parsed.error)}`, ref);
      }
      const ruleId = editRuleId(parsed.data);
      if (ruleId !== null && !ruleSet.has(ruleId)) {
        throw new InvalidProposalError(`edit ${i}: unknown rule id "${ruleId}"`, ref);
      }
      edits.push(parsed.data);
    });

    const blamed = [...new Set(edits.map(editRuleId).filter((id): id is string => id !== null))];
    return {
      id: `v2_${contentHash({ edits })}`,
      edits,
      rationale: envelope.data.rationale,
      provenance: {
        source: 'reflection-v2',
        taskIds: [report.taskId],
        baseVersion: report.version,
        blamedRuleIds: blamed,
        nodeIds: report.nodes.filter(n => n.status === 'FAILED').map(n => `${report.taskId}/${n.nodeId}`),
      },
    };
  }
}
