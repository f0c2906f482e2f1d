export * from './types.js';
export { Engine, toFailureInfo, type EngineOptions } from './engine.js';
export { CapabilityRouter, type CapabilityHandler } from './capability-router.js';
