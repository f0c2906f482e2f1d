export * from './types.js';
export { assignBlame } from './blame.js';
export { ReflectionV1 } from './reflection-v1.js';
export { ReflectionV2, type ReflectionV2Options } from './reflection-v2.js';
export { ADVISOR_EDIT_WHITELIST, isWhitelisted } from './proposal-schema.js';
