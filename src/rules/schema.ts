import { z } from 'zod';
import type {
  Action,
  OrderConstraint,
  Rule,
  RuleBody,
  RuleCondition,
  RuleDefinition,
  RuleMetadata,
  StateValue,
} from './types.js';

export const StateValueSchema: z.ZodType<StateValue> = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const ActionSchema: z.ZodType<Action> = z.object({
  name: z.string().min(1),
  params: z.record(z.string(), StateValueSchema),
});

export const RuleConditionSchema: z.ZodType<RuleCondition> = z
  .object({
    key: z.string().min(1),
    operator: z.enum(['eq', 'neq', 'exists', 'absent']),
    value: StateValueSchema.optional(),
  })
  .strict()
  .refine(c => (c.operator === 'eq' || c.operator === 'neq' ? c.value !== undefined : true), {
    message: 'eq/neq conditions need a value',
  });

export const OrderConstraintSchema: z.ZodType<OrderConstraint> = z
  .object({
    action: z.string().min(1),
    mustFollow: z.array(z.string().min(1)).min(1),
  })
  .strict();

export const RuleBodySchema: z.ZodType<RuleBody> = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('precondition'),
    action: z.string().min(1),
    requires: z.record(z.string(), StateValueSchema).refine(r => Object.keys(r).length > 0, {
      message: 'a precondition must require at least one key',
    }),
  }),
  z.object({
    kind: z.literal('effect'),
    action: ActionSchema,
    produces: z.record(z.string(), StateValueSchema).refine(r => Object.keys(r).length > 0, {
      message: 'an effect must produce at least one key',
    }),
  }),
  z.object({ kind: z.literal('order') }),
]);

export const RuleMetadataSchema: z.ZodType<RuleMetadata> = z.object({
  successCount: z.number().int().min(0),
  failureCount: z.number().int().min(0),
  confidence: z.number().min(0).max(1),
  status: z.enum(['ACTIVE', 'COOLDOWN', 'DEPRECATED']),
  lastUpdated: z.number(),
  lowConfidenceStreak: z.number().int().min(0),
});

const ruleShape = {
  id: z.string().min(1).max(128),
  conditions: z.array(RuleConditionSchema).min(1),
  body: RuleBodySchema,
  order: OrderConstraintSchema.optional(),
};

export const RuleDefinitionSchema: z.ZodType<RuleDefinition> = z
  .object({
    ...ruleShape,
    description: z.string().optional(),
    metadata: z
      .object({
        successCount: z.number().int().min(0),
        failureCount: z.number().int().min(0),
        confidence: z.number().min(0).max(1),
        status: z.enum(['ACTIVE', 'COOLDOWN', 'DEPRECATED']),
        lastUpdated: z.number(),
        lowConfidenceStreak: z.number().int().min(0),
      })
      .partial()
      .optional(),
  })
  .refine(r => r.body.kind !== 'order' || r.order !== undefined, {
    message: 'an order rule needs an order constraint',
    path: ['order'],
  });

export const RuleSchema: z.ZodType<Rule> = z.object({
  ...ruleShape,
  description: z.string(),
  metadata: RuleMetadataSchema,
});

/**
 * Flatten zod issues into one line for error messages
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.length > 0 ? i.path.join('.') : '$'}: ${i.message}`).join('; ');
}
