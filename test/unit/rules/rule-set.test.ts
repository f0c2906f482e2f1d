import { describe, it, expect } from 'vitest';
import { CyclicOrderConstraintError, DuplicateRuleIdError } from '../../../src/core/errors.js';
import { RuleSet } from '../../../src/rules/rule-set.js';
import { orderDef, preconditionDef, rule } from '../../helpers/rules.js';

describe('RuleSet', () => {
  it('rejects duplicate ids', () => {
    const set = new RuleSet([rule(orderDef('o1', 'b', ['a']))]);

    expect(() => set.addRule(rule(orderDef('o1', 'c', ['a'])))).toThrow(DuplicateRuleIdError);
    expect(set.size).toBe(1);
  });

  it('returns applicable rules by confidence then id', () => {
    const set = new RuleSet([
      rule(preconditionDef('z', 'x', { k: 1 }), { confidence: 0.4 }),
      rule(preconditionDef('b', 'x', { k: 1 }), { confidence: 0.8 }),
      rule(preconditionDef('a', 'x', { k: 1 }), { confidence: 0.8 }),
      rule(preconditionDef('dep', 'x', { k: 1 }), { confidence: 1, status: 'DEPRECATED' }),
      rule(preconditionDef('cool', 'x', { k: 1 }), { confidence: 1, status: 'COOLDOWN' }),
      rule(preconditionDef('scoped', 'x', { k: 1 }, [{ key: 'site', operator: 'eq', value: 'other' }])),
    ]);

    expect(set.applicableRules({ 'goal.kind': 'browse' }).map(r => r.id)).toEqual(['a', 'b', 'z']);
  });

  it('keeps deprecated rules in the set', () => {
    const set = new RuleSet([
      rule(orderDef('a', 'b', ['a']), { status: 'DEPRECATED' }),
      rule(orderDef('c', 'd', ['c'])),
    ]);

    expect(set.getRule('a')?.metadata.status).toBe('DEPRECATED');
    expect(set.countByStatus()).toEqual({ ACTIVE: 1, COOLDOWN: 0, DEPRECATED: 1, total: 2 });
  });

  it('reports the cycle formed by order constraints', () => {
    const set = new RuleSet([
      rule(orderDef('r1', 'b', ['a'])),
      rule(orderDef('r2', 'c', ['b'])),
      rule(orderDef('r3', 'a', ['c'])),
    ]);

    let caught: unknown;
    try {
      set.validate();
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CyclicOrderConstraintError);
    if (caught instanceof CyclicOrderConstraintError) {
      expect(caught.cycle).toEqual(['a', 'b', 'c', 'a']);
    }
  });

  it('ignores order constraints of deprecated rules', () => {
    const set = new RuleSet([
      rule(orderDef('r1', 'b', ['a'])),
      rule(orderDef('r2', 'a', ['b']), { status: 'DEPRECATED' }),
    ]);

    expect(() => set.validate()).not.toThrow();
  });
});
