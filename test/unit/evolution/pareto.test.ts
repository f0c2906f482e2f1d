import { describe, it, expect } from 'vitest';
import { compareFrontier, dominates, isImprovement, paretoFrontier } from '../../../src/evolution/pareto.js';
import { diff } from '../../helpers/proposals.js';

describe('pareto', () => {
  describe('dominates', () => {
    it('needs no worse everywhere and better somewhere', () => {
      expect(dominates(diff({ successDelta: 0.5 }), diff({ successDelta: 0.2 }))).toBe(true);
      expect(dominates(diff({ successDelta: 0.5, ruleCountDelta: -1 }), diff({ successDelta: 0.5 }))).toBe(true);
      expect(dominates(diff({ successDelta: 0.5 }), diff({ successDelta: 0.5 }))).toBe(false);
    });

    it('treats a trade-off as incomparable', () => {
      const precise = diff({ successDelta: 0.5, specializationScoreDelta: 2 });
      const broad = diff({ successDelta: 0.25, specializationScoreDelta: 0 });

      expect(dominates(precise, broad)).toBe(false);
      expect(dominates(broad, precise)).toBe(false);
    });
  });

  describe('isImprovement', () => {
    it('accepts higher success, or equal success with a smaller model', () => {
      expect(isImprovement(diff({ successDelta: 0.1, ruleCountDelta: 2 }))).toBe(true);
      expect(isImprovement(diff({ ruleCountDelta: -1 }))).toBe(true);
      expect(isImprovement(diff({ specializationScoreDelta: -1 }))).toBe(true);
    });

    it('rejects no change and lower success', () => {
      expect(isImprovement(diff())).toBe(false);
      expect(isImprovement(diff({ successDelta: -0.1, ruleCountDelta: -5 }))).toBe(false);
    });
  });

  it('keeps undominated items in input order', () => {
    const items = [
      { id: 'a', d: diff({ successDelta: 0.2, specializationScoreDelta: 1 }) },
      { id: 'b', d: diff({ successDelta: 0.5, specializationScoreDelta: 2 }) },
      { id: 'c', d: diff({ successDelta: 0.5, specializationScoreDelta: 1 }) },
      { id: 'd', d: diff({ successDelta: 0.1, specializationScoreDelta: -1 }) },
    ];

    expect(paretoFrontier(items, i => i.d).map(i => i.id)).toEqual(['c', 'd']);
  });

  it('ranks by success, then by rule count', () => {
    const ranked = [
      diff({ successDelta: 0.2, ruleCountDelta: 1 }),
      diff({ successDelta: 0.5, ruleCountDelta: 2 }),
      diff({ successDelta: 0.5, ruleCountDelta: 0 }),
    ].sort(compareFrontier);

    expect(ranked.map(d => [d.successDelta, d.ruleCountDelta])).toEqual([
      [0.5, 0],
      [0.5, 2],
      [0.2, 1],
    ]);
  });
});
