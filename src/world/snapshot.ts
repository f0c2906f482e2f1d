import type { Rule } from '../rules/types.js';
import type { WorldModelSnapshot } from './types.js';

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Copy `rules` and freeze the result; later edits always start from a clone.
 */
export function createSnapshot(input: {
  version: string;
  parentVersion: string | null;
  rules: readonly Rule[];
  createdAt: number;
}): WorldModelSnapshot {
  return deepFreeze({
    version: input.version,
    parentVersion: input.parentVersion,
    rules: structuredClone([...input.rules]),
    createdAt: input.createdAt,
  });
}
