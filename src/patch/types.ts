import type { RuleCondition, RuleDefinition, StateValue } from '../rules/types.js';

export interface AddConditionEdit {
  op: 'ADD_CONDITION';
  ruleId: string;
  condition: RuleCondition;
}

export interface AddOrderConstraintEdit {
  op: 'ADD_ORDER_CONSTRAINT';
  ruleId: string;
  action: string;
  mustFollow: string[];
}

/** Excludes the context `key = value` from the rule's scope */
export interface NarrowScopeEdit {
  op: 'NARROW_SCOPE';
  ruleId: string;
  key: string;
  value: StateValue;
}

export interface DeprecateRuleEdit {
  op: 'DEPRECATE_RULE';
  ruleId: string;
}

export interface AddRuleEdit {
  op: 'ADD_RULE';
  rule: RuleDefinition;
}

export type PatchEdit = AddConditionEdit | AddOrderConstraintEdit | NarrowScopeEdit | DeprecateRuleEdit | AddRuleEdit;
export type PatchEditKind = PatchEdit['op'];

export type ProposalSource = 'reflection-v1' | 'reflection-v2' | 'manual';

export interface ProposalProvenance {
  source: ProposalSource;
  taskIds: string[];
  /** Version the failing runs executed against */
  baseVersion: string;
  blamedRuleIds: string[];
  nodeIds: string[];
}

export interface PatchProposal {
  id: string;
  edits: PatchEdit[];
  rationale: string;
  provenance: ProposalProvenance;
}
