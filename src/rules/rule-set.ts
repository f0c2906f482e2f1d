import { CyclicOrderConstraintError, DuplicateRuleIdError } from '../core/errors.js';
import { compareRules, ruleApplies } from './rule.js';
import type { Rule, RuleStatusCounts, WorldState } from './types.js';

/**
 * An ordered collection of rules with unique ids.
 */
export class RuleSet {
  private rules = new Map<string, Rule>();

  constructor(rules: Iterable<Rule> = []) {
    for (const rule of rules) {
      this.addRule(rule);
    }
  }

  addRule(rule: Rule): void {
    if (this.rules.has(rule.id)) {
      throw new DuplicateRuleIdError(rule.id);
    }
    this.rules.set(rule.id, rule);
  }

  getRule(id: string): Rule | undefined {
    return this.rules.get(id);
  }

  has(id: string): boolean {
    return this.rules.has(id);
  }

  get size(): number {
    return this.rules.size;
  }

  /** Rules in insertion order */
  toArray(): Rule[] {
    return [...this.rules.values()];
  }

  /**
   * ACTIVE rules whose conditions hold in `state`, most confident first.
   */
  applicableRules(state: WorldState): Rule[] {
    return this.toArray()
      .filter(r => ruleApplies(r, state))
      .sort(compareRules);
  }

  countByStatus(): RuleStatusCounts {
    const counts: RuleStatusCounts = { ACTIVE: 0, COOLDOWN: 0, DEPRECATED: 0, total: 0 };
    for (const rule of this.rules.values()) {
      counts[rule.metadata.status]++;
      counts.total++;
    }
    return counts;
  }

  /**
   * Check that the order constraints of non-deprecated rules are acyclic.
   * Throws CyclicOrderConstraintError naming the actions on the cycle.
   */
  validate(): void {
    const edges = new Map<string, string[]>();
    for (const rule of this.rules.values()) {
      if (!rule.order || rule.metadata.status === 'DEPRECATED') continue;
      for (const before of rule.order.mustFollow) {
        const list = edges.get(before) ?? [];
        if (!list.includes(rule.order.action)) list.push(rule.order.action);
        edges.set(before, list);
      }
    }

    const WHITE = 0;
    const GRAY = 1;
    const BLACK = 2;
    const color = new Map<string, number>();
    const path: string[] = [];

    const visit = (node: string): string[] | null => {
      color.set(node, GRAY);
      path.push(node);
      for (const next of edges.get(node) ?? []) {
        const c = color.get(next) ?? WHITE;
        if (c === GRAY) {
          return [...path.slice(path.indexOf(next)), next];
        }
        if (c === WHITE) {
          const found = visit(next);
          if (found) return found;
        }
      }
      path.pop();
      color.set(node, BLACK);
      return null;
    };

    for (const node of [...edges.keys()].sort()) {
      if ((color.get(node) ?? WHITE) !== WHITE) continue;
      const cycle = visit(node);
      if (cycle) throw new CyclicOrderConstraintError(cycle);
    }
  }
}
