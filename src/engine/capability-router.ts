import { ActionFailureError } from '../core/errors.js';
import type { Action } from '../rules/types.js';
import type { Capability, CapabilityContext, Observation } from './types.js';

export type CapabilityHandler = (action: Action, context: CapabilityContext) => Promise<Observation>;

/**
 * Dispatches actions by the namespace before the first dot of their name,
 * e.g. `browser.open` goes to the `browser` capability.
 */
export class CapabilityRouter implements Capability {
  private handlers = new Map<string, CapabilityHandler>();

  register(namespace: string, handler: Capability | CapabilityHandler): this {
    if (this.handlers.has(namespace)) {
      throw new Error(`Capability namespace "${namespace}" is already registered`);
    }
    this.handlers.set(
      namespace,
      typeof handler === 'function' ? handler : (action, context) => handler.execute(action, context),
    );
    return this;
  }

  unregister(namespace: string): boolean {
    return this.handlers.delete(namespace);
  }

  namespaces(): string[] {
    return [...this.handlers.keys()];
  }

  async execute(action: Action, context: CapabilityContext): Promise<Observation> {
    const dot = action.name.indexOf('.');
    const namespace = dot === -1 ? action.name : action.name.slice(0, dot);
    const handler = this.handlers.get(namespace);
    if (!handler) {
      throw new ActionFailureError(`no capability registered for "${namespace}"`, { code: 'CAPABILITY_ERROR' });
    }
    return handler(action, context);
  }
}
