import { z } from 'zod';
import {
  AddConditionEditSchema,
  AddOrderConstraintEditSchema,
  DeprecateRuleEditSchema,
  NarrowScopeEditSchema,
} from '../patch/schema.js';
import type { PatchEdit, PatchEditKind } from '../patch/types.js';

/** Edit kinds an advisor may propose; ADD_RULE is never accepted from it */
export const ADVISOR_EDIT_WHITELIST: ReadonlySet<PatchEditKind> = new Set<PatchEditKind>([
  'ADD_CONDITION',
  'ADD_ORDER_CONSTRAINT',
  'NARROW_SCOPE',
  'DEPRECATE_RULE',
]);

export const CandidateEnvelopeSchema = z.object({
  rationale: z.string().min(1).max(2000),
  edits: z.array(z.object({ op: z.string() }).passthrough()).min(1).max(16),
});

export const AdvisorEditSchema: z.ZodType<PatchEdit> = z.union([
  AddConditionEditSchema,
  AddOrderConstraintEditSchema,
  NarrowScopeEditSchema,
  DeprecateRuleEditSchema,
]);

export function isWhitelisted(op: string): boolean {
  for (const kind of ADVISOR_EDIT_WHITELIST) {
    if (kind === op) return true;
  }
  return false;
}
