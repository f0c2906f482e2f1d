import { z } from 'zod';

// ===== Configuration =====

export const RuleLoopConfigSchema = z.object({
  engine: z.object({
    /** Per-node capability timeout; a timed-out node fails with ActionFailure */
    nodeTimeoutMs: z.number().int().positive().default(30_000),
    /** Max nodes in flight across independent branches */
    maxConcurrency: z.number().int().min(1).max(64).default(4),
  }).default({}),
  advisor: z.object({
    timeoutMs: z.number().int().positive().default(10_000),
  }).default({}),
  budget: z.object({
    windowMs: z.number().int().positive().default(24 * 60 * 60 * 1000),
    maxPatchesPerWindow: z.number().int().min(0).default(10),
    maxRuleCountIncrease: z.number().int().min(0).default(20),
  }).default({}),
  lifecycle: z.object({
    /** Fraction of confidence lost per cycle by an unused rule */
    decayRate: z.number().min(0).max(1).default(0.05),
    cooldownThreshold: z.number().min(0).max(1).default(0.3),
    /** Consecutive below-threshold cycles before COOLDOWN becomes DEPRECATED */
    deprecateAfterCycles: z.number().int().min(1).default(3),
    /** EMA weight applied to a used rule's success ratio */
    learningRate: z.number().min(0).max(1).default(0.1),
    initialConfidence: z.number().min(0).max(1).default(0.5),
  }).default({}),
  simulation: z.object({
    conditionWeight: z.number().positive().default(1),
    orderWeight: z.number().min(0).default(0),
  }).default({}),
  controller: z.object({
    /** Reject proposals that do not improve on the baseline */
    requireImprovement: z.boolean().default(true),
  }).default({}),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    verbose: z.boolean().default(false),
    /** JSON log destination when not verbose; defaults to ~/.ruleloop/logs/ruleloop.log */
    file: z.string().min(1).optional(),
  }).default({}),
});

export type RuleLoopConfig = z.infer<typeof RuleLoopConfigSchema>;
export type RuleLoopConfigInput = z.input<typeof RuleLoopConfigSchema>;

// ===== Events =====

export interface RuleLoopEvents {
  'cycle:start': { cycle: number; version: string; tasks: number };
  'cycle:complete': { cycle: number; version: string; applied: string[]; proposals: number };
  'task:complete': { taskId: string; version: string; status: string; durationMs: number };
  'proposal:rejected': { proposalId?: string; reason: string };
  'patch:applied': { proposalId: string; version: string; parentVersion: string };
  'version:rollback': { from: string; to: string };
  'rule:transition': { ruleId: string; from: string; to: string };
}
