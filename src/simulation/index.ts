export * from './types.js';
export { Simulator, type SimulatorOptions } from './simulator.js';
export {
  computeMetrics,
  diffMetrics,
  ruleCount,
  specializationScore,
  DEFAULT_SPECIALIZATION,
} from './metrics.js';
