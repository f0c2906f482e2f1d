import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InvalidProposalError, UnknownVersionError } from '../../../src/core/errors.js';
import { BudgetController } from '../../../src/evolution/budget-controller.js';
import { EvolutionController } from '../../../src/evolution/evolution-controller.js';
import { PatchApplier } from '../../../src/patch/patch-applier.js';
import type { PatchEdit } from '../../../src/patch/types.js';
import { ManualClock } from '../../../src/utils/clock.js';
import { exportModel } from '../../../src/world/serialization.js';
import { effectDef, preconditionDef } from '../../helpers/rules.js';
import { diff, proposal, simResult } from '../../helpers/proposals.js';

const SEEDS = [
  preconditionDef('p-click', 'browser.click', { loggedIn: true }),
  effectDef('e-login', { name: 'auth.login', params: {} }, { loggedIn: true }),
];

const scopeToSearch: PatchEdit = {
  op: 'ADD_CONDITION',
  ruleId: 'p-click',
  condition: { key: 'goal.kind', operator: 'eq', value: 'search' },
};

describe('PatchApplier', () => {
  let clock: ManualClock;
  let controller: EvolutionController;
  let applier: PatchApplier;

  beforeEach(() => {
    clock = new ManualClock(100);
    controller = new EvolutionController(new BudgetController({}, clock));
    applier = PatchApplier.create(SEEDS, { controller, clock });
  });

  it('starts at v0 with the seed rules', () => {
    const root = applier.versions.current();

    expect(root.version).toBe('v0');
    expect(root.parentVersion).toBeNull();
    expect(root.rules.map(r => r.id)).toEqual(['p-click', 'e-login']);
    expect(Object.isFrozen(root.rules[0].metadata)).toBe(true);
    expect(applier.versions.auditTrail()).toEqual([
      { kind: 'init', note: '2 seed rules', seq: 0, version: 'v0', previousVersion: null, timestamp: 100 },
    ]);
  });

  it('commits an admitted decision as a child of the current version', () => {
    const listener = vi.fn();
    applier.on('patch:applied', listener);
    const p = proposal('p1', [scopeToSearch]);
    const [decision] = controller.evaluate([simResult(p, diff({ successDelta: 0.5, specializationScoreDelta: 1 }))]).accepted;

    clock.set(200);
    const snapshot = applier.apply(decision);

    expect(snapshot.version).toBe('v1');
    expect(snapshot.parentVersion).toBe('v0');
    expect(snapshot.createdAt).toBe(200);
    expect(snapshot.rules[0].conditions).toHaveLength(2);
    expect(applier.versions.require('v0').rules[0].conditions).toHaveLength(1);
    expect(applier.versions.currentVersion).toBe('v1');
    expect(applier.versions.auditTrail('v1')).toMatchObject([
      { kind: 'patch', version: 'v1', previousVersion: 'v0', proposal: { id: 'p1' } },
    ]);
    expect(controller.getBudgetStatus().patchesThisWindow).toBe(1);
    expect(listener).toHaveBeenCalledWith({ proposalId: 'p1', version: 'v1', parentVersion: 'v0' });
  });

  it('refuses to apply the same decision twice', () => {
    const [decision] = controller.evaluate([simResult(proposal('p1', [scopeToSearch]), diff({ successDelta: 0.5 }))]).accepted;
    applier.apply(decision);

    expect(() => applier.apply(decision)).toThrow('proposal was already applied');
  });

  it('leaves the store untouched when an edit fails', () => {
    const p = proposal('p1', [scopeToSearch, { op: 'DEPRECATE_RULE', ruleId: 'missing' }]);
    const [decision] = controller.evaluate([simResult(p, diff({ successDelta: 0.5 }))]).accepted;

    expect(() => applier.apply(decision)).toThrow(InvalidProposalError);
    expect(applier.versions.currentVersion).toBe('v0');
    expect(applier.versions.size).toBe(1);
    expect(applier.versions.auditTrail()).toHaveLength(1);
    expect(controller.getBudgetStatus().patchesThisWindow).toBe(0);
  });

  it('rejects a decision simulated against an older version', () => {
    const a = proposal('a', [scopeToSearch]);
    const b = proposal('b', [{ op: 'NARROW_SCOPE', ruleId: 'e-login', key: 'goal.target', value: 'x' }]);
    const same = diff({ successDelta: 0.5 });
    const { accepted } = controller.evaluate([simResult(a, same), simResult(b, same)]);

    applier.apply(accepted[0]);

    expect(() => applier.apply(accepted[1])).toThrow('simulated against v0 but current version is v1');
  });

  it('rejects decisions from a superseded batch', () => {
    const [old] = controller.evaluate([simResult(proposal('a', [scopeToSearch]), diff({ successDelta: 0.5 }))]).accepted;
    controller.evaluate([]);

    expect(() => applier.apply(old)).toThrow('which is no longer current');
  });

  describe('rollback', () => {
    it('moves current to an earlier version and records it', () => {
      const listener = vi.fn();
      applier.on('version:rollback', listener);
      const [decision] = controller.evaluate([simResult(proposal('a', [scopeToSearch]), diff({ successDelta: 0.5 }))]).accepted;
      applier.apply(decision);

      const target = applier.rollback('v0');

      expect(target.version).toBe('v0');
      expect(applier.versions.currentVersion).toBe('v0');
      expect(applier.versions.has('v1')).toBe(true);
      expect(applier.versions.auditTrail().at(-1)).toMatchObject({
        kind: 'rollback',
        version: 'v0',
        previousVersion: 'v1',
        note: 'rollback from v1',
      });
      expect(listener).toHaveBeenCalledWith({ from: 'v1', to: 'v0' });
    });

    it('fails on an unknown version without moving current', () => {
      expect(() => applier.rollback('v9')).toThrow(UnknownVersionError);
      expect(applier.versions.currentVersion).toBe('v0');
      expect(applier.versions.auditTrail()).toHaveLength(1);
    });

    it('branches the next commit from the rolled-back version', () => {
      const [decision] = controller.evaluate([simResult(proposal('a', [scopeToSearch]), diff({ successDelta: 0.5 }))]).accepted;
      applier.apply(decision);
      applier.rollback('v0');

      const stats = applier.commitStats(applier.versions.current().rules, []);

      expect(stats.version).toBe('v2');
      expect(stats.parentVersion).toBe('v0');
      expect(applier.versions.children('v0')).toEqual(['v1', 'v2']);
    });
  });

  describe('commitStats', () => {
    it('records transitions without touching the budget', () => {
      const rules = applier.versions.current().rules.map(r => ({
        ...r,
        metadata: { ...r.metadata, confidence: 0.2, status: 'COOLDOWN' as const, lowConfidenceStreak: 1 },
      }));

      const snapshot = applier.commitStats(rules, [{ ruleId: 'p-click', from: 'ACTIVE', to: 'COOLDOWN', confidence: 0.2 }]);

      expect(snapshot.rules[0].metadata.status).toBe('COOLDOWN');
      expect(applier.versions.auditTrail('v1')).toMatchObject([
        { kind: 'stats', transitions: [{ ruleId: 'p-click', from: 'ACTIVE', to: 'COOLDOWN' }] },
      ]);
      expect(controller.getBudgetStatus().patchesThisWindow).toBe(0);
    });

    it('rejects rules that do not match the current version', () => {
      const rules = applier.versions.current().rules.slice(0, 1);

      expect(() => applier.commitStats(rules, [])).toThrow('Stats update does not match the rules of v0');
    });
  });

  it('restores from an export and keeps numbering versions', () => {
    const [decision] = controller.evaluate([simResult(proposal('a', [scopeToSearch]), diff({ successDelta: 0.5 }))]).accepted;
    applier.apply(decision);
    const model = exportModel(applier.versions, 300);

    const restored = PatchApplier.restore(model, {
      controller: new EvolutionController(new BudgetController({}, clock)),
      clock,
    });

    expect(restored.versions.currentVersion).toBe('v1');
    expect(restored.versions.ancestors('v1')).toEqual(['v0']);
    expect(restored.versions.auditTrail()).toEqual(applier.versions.auditTrail());
    expect(restored.commitStats(restored.versions.current().rules, []).version).toBe('v2');
  });
});
