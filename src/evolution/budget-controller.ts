/**
 * BudgetController: rolling patch budget.
 *
 * Keeps a ledger of accepted patches. A patch counts against the limits for
 * `windowMs` after it was applied, so no span of that length ever holds more
 * than `maxPatchesPerWindow` patches or more than `maxRuleCountIncrease` net
 * rule growth. `rollover()` drops entries that have left the window.
 */

import { EventEmitter } from 'node:events';
import { BudgetExceededError } from '../core/errors.js';
import { systemClock, type Clock } from '../utils/clock.js';
import type { BudgetLedgerEntry, BudgetStatus, BudgetWindowState, PatchBudget } from './types.js';

const DEFAULT_BUDGET: PatchBudget = {
  windowMs: 24 * 60 * 60 * 1000,
  maxPatchesPerWindow: 10,
  maxRuleCountIncrease: 20,
};

export class BudgetController extends EventEmitter {
  private readonly budget: PatchBudget;
  private ledger: BudgetLedgerEntry[] = [];

  constructor(budget?: Partial<PatchBudget>, private readonly clock: Clock = systemClock) {
    super();
    this.budget = { ...DEFAULT_BUDGET, ...budget };
    if (this.budget.windowMs <= 0) throw new RangeError('windowMs must be positive');
  }

  /**
   * Drop ledger entries that no longer fall inside the window ending at
   * `now`. Returns how many were dropped.
   */
  rollover(now: number = this.clock.now()): number {
    const live = this.ledger.filter(e => e.appliedAt + this.budget.windowMs > now);
    const expired = this.ledger.length - live.length;
    if (expired === 0) return 0;
    this.ledger = live;
    this.emit('evolution:budget:rollover', { expired, ...this.windowState(now) });
    return expired;
  }

  /**
   * Throw BudgetExceededError if one more patch growing the rule count by
   * `ruleCountDelta` would exceed either limit.
   */
  check(ruleCountDelta: number): void {
    const now = this.clock.now();
    this.rollover(now);
    const { patchesThisWindow, ruleCountIncrease } = this.windowState(now);
    if (patchesThisWindow + 1 > this.budget.maxPatchesPerWindow) {
      throw new BudgetExceededError('patches', patchesThisWindow, 1, this.budget.maxPatchesPerWindow);
    }
    if (ruleCountDelta > 0 && ruleCountIncrease + ruleCountDelta > this.budget.maxRuleCountIncrease) {
      throw new BudgetExceededError('ruleCount', ruleCountIncrease, ruleCountDelta, this.budget.maxRuleCountIncrease);
    }
  }

  canAccept(ruleCountDelta: number): boolean {
    try {
      this.check(ruleCountDelta);
      return true;
    } catch (err) {
      if (err instanceof BudgetExceededError) return false;
      throw err;
    }
  }

  /** Consume one patch; checks first, so a failed record changes nothing */
  record(ruleCountDelta: number): void {
    this.check(ruleCountDelta);
    const now = this.clock.now();
    this.ledger.push({ appliedAt: now, ruleCountDelta });
    this.emit('evolution:budget:consumed', this.windowState(now));
  }

  getStatus(): BudgetStatus {
    const now = this.clock.now();
    this.rollover(now);
    const state = this.windowState(now);
    const oldest = this.ledger.length > 0 ? Math.min(...this.ledger.map(e => e.appliedAt)) : null;
    return {
      ...this.budget,
      ...state,
      patchesAvailable: Math.max(0, this.budget.maxPatchesPerWindow - state.patchesThisWindow),
      ruleCountAvailable: Math.max(0, this.budget.maxRuleCountIncrease - state.ruleCountIncrease),
      nextExpiryAt: oldest === null ? null : oldest + this.budget.windowMs,
    };
  }

  private windowState(now: number): BudgetWindowState {
    const windowStart = now - this.budget.windowMs;
    const live = this.ledger.filter(e => e.appliedAt > windowStart);
    return {
      windowStart,
      patchesThisWindow: live.length,
      ruleCountIncrease: live.reduce((sum, e) => sum + e.ruleCountDelta, 0),
    };
  }
}
