/**
 * Rule-based reflection.
 *
 * Failures are grouped by blamed rule across all given reports and each rule
 * receives at most one proposal, chosen by fixed priority:
 *
 *   1. ADD_CONDITION         a failure reported a missing precondition
 *   2. ADD_ORDER_CONSTRAINT  a failure reported a required predecessor
 *   3. NARROW_SCOPE          anything else; excludes the failing goal target
 *
 * Failures no rule is responsible for can teach a new rule (ADD_RULE) when
 * their signature names the missing key or predecessor. Output depends only
 * on the reports and rules passed in.
 */

import { getLogger } from '../core/logger.js';
import type { ExecutionReport } from '../engine/types.js';
import { describeEdit } from '../patch/apply-edits.js';
import type { PatchEdit, PatchProposal } from '../patch/types.js';
import { hasCondition } from '../rules/rule.js';
import { RuleSet } from '../rules/rule-set.js';
import type { Rule, RuleCondition } from '../rules/types.js';
import { contentHash } from '../utils/crypto.js';
import { assignBlame } from './blame.js';
import type { Blame } from './types.js';

interface BlameGroup {
  key: string;
  ruleId?: string;
  blames: Blame[];
}

export class ReflectionV1 {
  private logger = getLogger();

  reflect(report: ExecutionReport, rules: readonly Rule[] | RuleSet): PatchProposal[] {
    return this.reflectAll([report], rules);
  }

  reflectAll(reports: readonly ExecutionReport[], rules: readonly Rule[] | RuleSet): PatchProposal[] {
    const ruleSet = rules instanceof RuleSet ? rules : new RuleSet(rules);
    const groups = new Map<string, BlameGroup>();

    for (const report of reports) {
      if (report.status === 'SUCCESS') continue;
      for (const blame of assignBlame(report)) {
        if (blame.ruleIds.length === 0) {
          const key = `unattributed:${blame.action.name}`;
          const group = groups.get(key) ?? { key, blames: [] };
          group.blames.push(blame);
          groups.set(key, group);
          continue;
        }
        for (const ruleId of blame.ruleIds) {
          const key = `rule:${ruleId}`;
          const group = groups.get(key) ?? { key, ruleId, blames: [] };
          group.blames.push(blame);
          groups.set(key, group);
        }
      }
    }

    const proposals: PatchProposal[] = [];
    for (const group of groups.values()) {
      const proposal = group.ruleId
        ? this.repairRule(group.ruleId, group.blames, ruleSet)
        : this.learnRule(group.blames, ruleSet);
      if (proposal) proposals.push(proposal);
    }

    this.logger.debug({ reports: reports.length, proposals: proposals.length }, 'Rule-based reflection finished');
    return proposals;
  }

  private repairRule(ruleId: string, blames: Blame[], ruleSet: RuleSet): PatchProposal | null {
    const rule = ruleSet.getRule(ruleId);
    if (!rule || rule.metadata.status === 'DEPRECATED') return null;

    const edit = this.conditionEdit(rule, blames) ?? this.orderEdit(rule, blames) ?? this.scopeEdit(rule, blames);
    if (!edit) return null;
    return this.toProposal([edit], blames, [ruleId]);
  }

  private conditionEdit(rule: Rule, blames: Blame[]): PatchEdit | null {
    for (const blame of blames) {
      const missing = blame.failure.code === 'MISSING_PRECONDITION' ? blame.failure.missing : undefined;
      if (!missing) continue;
      const condition: RuleCondition = { key: missing.key, operator: 'eq', value: missing.value };
      if (!hasCondition(rule, condition)) {
        return { op: 'ADD_CONDITION', ruleId: rule.id, condition };
      }
    }
    return null;
  }

  private orderEdit(rule: Rule, blames: Blame[]): PatchEdit | null {
    for (const blame of blames) {
      const required = blame.failure.code === 'ORDER_VIOLATION' ? blame.failure.requiredAction : undefined;
      if (!required || required === blame.action.name) continue;
      if (rule.order && rule.order.action !== blame.action.name) continue;
      if (rule.order?.mustFollow.includes(required)) continue;
      return { op: 'ADD_ORDER_CONSTRAINT', ruleId: rule.id, action: blame.action.name, mustFollow: [required] };
    }
    return null;
  }

  private scopeEdit(rule: Rule, blames: Blame[]): PatchEdit | null {
    for (const blame of blames) {
      const key = blame.goal.target ? 'goal.target' : 'goal.kind';
      const value = blame.goal.target ? blame.goal.target : blame.goal.kind;
      if (!hasCondition(rule, { key, operator: 'neq', value })) {
        return { op: 'NARROW_SCOPE', ruleId: rule.id, key, value };
      }
    }
    return null;
  }

  private learnRule(blames: Blame[], ruleSet: RuleSet): PatchProposal | null {
    for (const blame of blames) {
      const { failure, action, goal } = blame;
      const scope: RuleCondition[] = [{ key: 'goal.kind', operator: 'eq', value: goal.kind }];

      if (failure.code === 'MISSING_PRECONDITION' && failure.missing) {
        const id = `learned-pre:${action.name}:${failure.missing.key}`;
        if (ruleSet.has(id)) continue;
        return this.toProposal(
          [{
            op: 'ADD_RULE',
            rule: {
              id,
              description: `${action.name} requires ${failure.missing.key}=${JSON.stringify(failure.missing.value)}`,
              conditions: scope,
              body: { kind: 'precondition', action: action.name, requires: { [failure.missing.key]: failure.missing.value } },
            },
          }],
          blames,
          [],
        );
      }

      if (failure.code === 'ORDER_VIOLATION' && failure.requiredAction && failure.requiredAction !== action.name) {
        const id = `learned-order:${action.name}:${failure.requiredAction}`;
        if (ruleSet.has(id)) continue;
        return this.toProposal(
          [{
            op: 'ADD_RULE',
            rule: {
              id,
              description: `${action.name} must follow ${failure.requiredAction}`,
              conditions: scope,
              body: { kind: 'order' },
              order: { action: action.name, mustFollow: [failure.requiredAction] },
            },
          }],
          blames,
          [],
        );
      }
    }
    return null;
  }

  private toProposal(edits: PatchEdit[], blames: Blame[], blamedRuleIds: string[]): PatchProposal {
    const taskIds = [...new Set(blames.map(b => b.taskId))];
    const nodeIds = [...new Set(blames.map(b => `${b.taskId}/${b.nodeId}`))];
    const reasons = [...new Set(blames.map(b => b.failure.code))].join(', ');
    return {
      id: `v1_${contentHash({ edits })}`,
      edits,
      rationale: `${edits.map(describeEdit).join('; ')} (${blames.length} failure(s): ${reasons})`,
      provenance: {
        source: 'reflection-v1',
        taskIds,
        baseVersion: blames[0]?.version ?? '',
        blamedRuleIds,
        nodeIds,
      },
    };
  }
}
