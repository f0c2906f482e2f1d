import { EventEmitter } from 'eventemitter3';
import type { RuleLoopEvents } from './types.js';

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof RuleLoopEvents>(event: K, listener: (data: RuleLoopEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof RuleLoopEvents>(event: K, listener: (data: RuleLoopEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof RuleLoopEvents>(event: K, listener: (data: RuleLoopEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof RuleLoopEvents>(event: K, data: RuleLoopEvents[K]): void {
    this.emitter.emit(event, data);
  }

  listenerCount(event: keyof RuleLoopEvents): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
