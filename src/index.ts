/**
 * ruleloop: a self-improving rule-driven task engine.
 *
 * Goals are planned into action DAGs from a versioned rule set, executed
 * against a pluggable capability layer, and failures feed back into
 * simulated, budgeted rule patches.
 */

export const VERSION = '0.1.0';

// Core
export { EvolutionSystem } from './core/system.js';
export type {
  EvolutionSystemOptions,
  EvolutionStepResult,
  RunTaskOptions,
  SystemState,
  ProposalFailure,
} from './core/system.js';
export { ConfigManager } from './core/config.js';
export { EventBus } from './core/events.js';
export { createLogger, getLogger, setLogger, type LogLevel, type LoggerOptions } from './core/logger.js';
export { AsyncMutex, AsyncSemaphore } from './core/mutex.js';
export { RuleLoopConfigSchema } from './core/types.js';
export type { RuleLoopConfig, RuleLoopConfigInput, RuleLoopEvents } from './core/types.js';
export * from './core/errors.js';

// Domain
export * from './rules/index.js';
export * from './dag/index.js';
export * from './engine/index.js';
export * from './patch/index.js';
export * from './reflection/index.js';
export * from './simulation/index.js';
export * from './evolution/index.js';
export * from './world/index.js';

// Utils
export { systemClock, TickClock, ManualClock, type Clock } from './utils/clock.js';
export { withTimeout, TimeoutError, sleep } from './utils/timeout.js';
export { contentHash, stableStringify } from './utils/crypto.js';
