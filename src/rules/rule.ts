import { InvalidProposalError } from '../core/errors.js';
import { RuleDefinitionSchema, describeIssues } from './schema.js';
import type {
  Rule,
  RuleCondition,
  RuleConstraint,
  RuleDefinition,
  RuleMetadata,
  WorldState,
} from './types.js';

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

/**
 * Validate a definition and fill in default metadata.
 * Definitions are checked with the same schema proposals go through.
 */
export function createRule(definition: RuleDefinition, now: number, initialConfidence = 0.5): Rule {
  const parsed = RuleDefinitionSchema.safeParse(definition);
  if (!parsed.success) {
    throw new InvalidProposalError(`rule "${definition.id}" is malformed: ${describeIssues(parsed.error)}`);
  }
  const def = parsed.data;
  const metadata: RuleMetadata = {
    successCount: def.metadata?.successCount ?? 0,
    failureCount: def.metadata?.failureCount ?? 0,
    confidence: def.metadata?.confidence ?? initialConfidence,
    status: def.metadata?.status ?? 'ACTIVE',
    lastUpdated: def.metadata?.lastUpdated ?? now,
    lowConfidenceStreak: def.metadata?.lowConfidenceStreak ?? 0,
  };

  const rule: Rule = {
    id: def.id,
    description: def.description ?? '',
    conditions: def.conditions.map(c => ({ ...c })),
    body: structuredClone(def.body),
    metadata,
  };
  if (def.order) {
    rule.order = { action: def.order.action, mustFollow: [...def.order.mustFollow] };
  }
  return rule;
}

export function conditionHolds(condition: RuleCondition, state: WorldState): boolean {
  const present = Object.prototype.hasOwnProperty.call(state, condition.key);
  const actual = present ? state[condition.key] : undefined;

  switch (condition.operator) {
    case 'eq':
      return present && actual === condition.value;
    case 'neq':
      return !present || actual !== condition.value;
    case 'exists':
      return present && actual !== null;
    case 'absent':
      return !present || actual === null;
    default:
      return assertNever(condition.operator);
  }
}

/** A rule applies when it is ACTIVE and every condition holds */
export function ruleApplies(rule: Rule, state: WorldState): boolean {
  return rule.metadata.status === 'ACTIVE' && rule.conditions.every(c => conditionHolds(c, state));
}

/**
 * What `rule` imposes on an action named `actionName`, whatever its kind.
 */
export function constraintsFor(rule: Rule, actionName: string): RuleConstraint[] {
  const out: RuleConstraint[] = [];
  const body = rule.body;

  switch (body.kind) {
    case 'precondition':
      if (body.action === actionName) {
        for (const key of Object.keys(body.requires).sort()) {
          out.push({ type: 'requires', key, value: body.requires[key] });
        }
      }
      break;
    case 'effect':
      if (body.action.name === actionName) {
        for (const key of Object.keys(body.produces).sort()) {
          out.push({ type: 'produces', key, value: body.produces[key] });
        }
      }
      break;
    case 'order':
      break;
    default:
      assertNever(body);
  }

  if (rule.order && rule.order.action === actionName) {
    for (const predecessor of rule.order.mustFollow) {
      out.push({ type: 'follows', predecessor });
    }
  }
  return out;
}

export function sameCondition(a: RuleCondition, b: RuleCondition): boolean {
  return a.key === b.key && a.operator === b.operator && (a.value ?? null) === (b.value ?? null);
}

export function hasCondition(rule: Rule, condition: RuleCondition): boolean {
  return rule.conditions.some(c => sameCondition(c, condition));
}

/** Deterministic ordering: higher confidence first, then id */
export function compareRules(a: Rule, b: Rule): number {
  if (a.metadata.confidence !== b.metadata.confidence) {
    return b.metadata.confidence - a.metadata.confidence;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
