import { DuplicateRuleIdError, InvalidProposalError } from '../core/errors.js';
import { assertNever, createRule, hasCondition } from '../rules/rule.js';
import { RuleSet } from '../rules/rule-set.js';
import type { Rule, RuleCondition } from '../rules/types.js';
import type { PatchEdit } from './types.js';

export interface EditContext {
  /** Stamped into `lastUpdated` of every rule an edit touches */
  now: number;
  initialConfidence: number;
  proposalId?: string;
}

/**
 * Apply `edits` in order to a copy of `rules`. The input is never mutated;
 * the first invalid edit throws and nothing is returned. The result is
 * validated for duplicate ids and cyclic order constraints.
 */
export function applyEdits(rules: readonly Rule[], edits: readonly PatchEdit[], ctx: EditContext): Rule[] {
  const working: Rule[] = rules.map(r => structuredClone(r));
  const index = new Map(working.map((r, i) => [r.id, i]));

  const target = (ruleId: string): Rule => {
    const i = index.get(ruleId);
    const rule = i === undefined ? undefined : working[i];
    if (!rule) {
      throw new InvalidProposalError(`edit references unknown rule "${ruleId}"`, ctx.proposalId);
    }
    return rule;
  };

  const editable = (ruleId: string): Rule => {
    const rule = target(ruleId);
    if (rule.metadata.status === 'DEPRECATED') {
      throw new InvalidProposalError(`rule "${ruleId}" is deprecated`, ctx.proposalId);
    }
    return rule;
  };

  const addCondition = (rule: Rule, condition: RuleCondition): void => {
    if (hasCondition(rule, condition)) {
      throw new InvalidProposalError(`rule "${rule.id}" already has condition on "${condition.key}"`, ctx.proposalId);
    }
    rule.conditions.push({ ...condition });
    rule.metadata.lastUpdated = ctx.now;
  };

  for (const edit of edits) {
    switch (edit.op) {
      case 'ADD_CONDITION': {
        const { condition } = edit;
        if ((condition.operator === 'eq' || condition.operator === 'neq') && condition.value === undefined) {
          throw new InvalidProposalError(`${condition.operator} condition on "${condition.key}" needs a value`, ctx.proposalId);
        }
        addCondition(editable(edit.ruleId), condition);
        break;
      }
      case 'NARROW_SCOPE':
        addCondition(editable(edit.ruleId), { key: edit.key, operator: 'neq', value: edit.value });
        break;
      case 'ADD_ORDER_CONSTRAINT': {
        const rule = editable(edit.ruleId);
        if (edit.mustFollow.length === 0) {
          throw new InvalidProposalError('order constraint needs at least one predecessor', ctx.proposalId);
        }
        if (edit.mustFollow.includes(edit.action)) {
          throw new InvalidProposalError(`"${edit.action}" cannot follow itself`, ctx.proposalId);
        }
        if (rule.order && rule.order.action !== edit.action) {
          throw new InvalidProposalError(
            `rule "${rule.id}" already orders "${rule.order.action}", not "${edit.action}"`,
            ctx.proposalId,
          );
        }
        const mustFollow = rule.order ? [...rule.order.mustFollow] : [];
        for (const before of edit.mustFollow) {
          if (!mustFollow.includes(before)) mustFollow.push(before);
        }
        rule.order = { action: edit.action, mustFollow };
        rule.metadata.lastUpdated = ctx.now;
        break;
      }
      case 'DEPRECATE_RULE': {
        const rule = target(edit.ruleId);
        if (rule.metadata.status !== 'DEPRECATED') {
          rule.metadata.status = 'DEPRECATED';
          rule.metadata.lastUpdated = ctx.now;
        }
        break;
      }
      case 'ADD_RULE': {
        if (index.has(edit.rule.id)) throw new DuplicateRuleIdError(edit.rule.id);
        const rule = createRule(edit.rule, ctx.now, ctx.initialConfidence);
        index.set(rule.id, working.length);
        working.push(rule);
        break;
      }
      default:
        assertNever(edit);
    }
  }

  new RuleSet(working).validate();
  return working;
}

export function describeEdit(edit: PatchEdit): string {
  switch (edit.op) {
    case 'ADD_CONDITION': {
      const c = edit.condition;
      const rhs = c.value === undefined ? '' : ` ${JSON.stringify(c.value)}`;
      return `add condition ${c.key} ${c.operator}${rhs} to ${edit.ruleId}`;
    }
    case 'ADD_ORDER_CONSTRAINT':
      return `order ${edit.action} after ${edit.mustFollow.join(', ')} in ${edit.ruleId}`;
    case 'NARROW_SCOPE':
      return `exclude ${edit.key}=${JSON.stringify(edit.value)} from ${edit.ruleId}`;
    case 'DEPRECATE_RULE':
      return `deprecate ${edit.ruleId}`;
    case 'ADD_RULE':
      return `add rule ${edit.rule.id}`;
    default:
      return assertNever(edit);
  }
}
