import { createRule } from '../../src/rules/rule.js';
import type {
  Action,
  Rule,
  RuleCondition,
  RuleDefinition,
  RuleMetadata,
  StateValue,
} from '../../src/rules/types.js';

/** Holds for every goal */
export const ANY_GOAL: RuleCondition = { key: 'goal.kind', operator: 'exists' };

export function preconditionDef(
  id: string,
  action: string,
  requires: Record<string, StateValue>,
  conditions: RuleCondition[] = [ANY_GOAL],
): RuleDefinition {
  return { id, description: `${action} precondition`, conditions, body: { kind: 'precondition', action, requires } };
}

export function effectDef(
  id: string,
  action: Action,
  produces: Record<string, StateValue>,
  conditions: RuleCondition[] = [ANY_GOAL],
): RuleDefinition {
  return { id, description: `${action.name} effect`, conditions, body: { kind: 'effect', action, produces } };
}

export function orderDef(
  id: string,
  action: string,
  mustFollow: string[],
  conditions: RuleCondition[] = [ANY_GOAL],
): RuleDefinition {
  return { id, description: `${action} ordering`, conditions, body: { kind: 'order' }, order: { action, mustFollow } };
}

export function rule(def: RuleDefinition, metadata: Partial<RuleMetadata> = {}): Rule {
  return createRule({ ...def, metadata: { ...def.metadata, ...metadata } }, 0);
}
