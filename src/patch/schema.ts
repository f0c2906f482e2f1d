import { z } from 'zod';
import { RuleConditionSchema, RuleDefinitionSchema, StateValueSchema } from '../rules/schema.js';
import type {
  AddConditionEdit,
  AddOrderConstraintEdit,
  DeprecateRuleEdit,
  NarrowScopeEdit,
  PatchEdit,
  PatchProposal,
} from './types.js';

const ruleId = z.string().min(1);

export const AddConditionEditSchema: z.ZodType<AddConditionEdit> = z
  .object({ op: z.literal('ADD_CONDITION'), ruleId, condition: RuleConditionSchema })
  .strict();

export const AddOrderConstraintEditSchema: z.ZodType<AddOrderConstraintEdit> = z
  .object({
    op: z.literal('ADD_ORDER_CONSTRAINT'),
    ruleId,
    action: z.string().min(1),
    mustFollow: z.array(z.string().min(1)).min(1),
  })
  .strict();

export const NarrowScopeEditSchema: z.ZodType<NarrowScopeEdit> = z
  .object({ op: z.literal('NARROW_SCOPE'), ruleId, key: z.string().min(1), value: StateValueSchema })
  .strict();

export const DeprecateRuleEditSchema: z.ZodType<DeprecateRuleEdit> = z
  .object({ op: z.literal('DEPRECATE_RULE'), ruleId })
  .strict();

export const PatchEditSchema: z.ZodType<PatchEdit> = z.union([
  AddConditionEditSchema,
  AddOrderConstraintEditSchema,
  NarrowScopeEditSchema,
  DeprecateRuleEditSchema,
  z.object({ op: z.literal('ADD_RULE'), rule: RuleDefinitionSchema }).strict(),
]);

export const PatchProposalSchema: z.ZodType<PatchProposal> = z.object({
  id: z.string().min(1),
  edits: z.array(PatchEditSchema).min(1),
  rationale: z.string(),
  provenance: z.object({
    source: z.enum(['reflection-v1', 'reflection-v2', 'manual']),
    taskIds: z.array(z.string()),
    baseVersion: z.string(),
    blamedRuleIds: z.array(z.string()),
    nodeIds: z.array(z.string()),
  }),
});
