import { describe, it, expect, beforeEach } from 'vitest';
import { UnknownVersionError } from '../../../src/core/errors.js';
import { ManualClock } from '../../../src/utils/clock.js';
import { createSnapshot } from '../../../src/world/snapshot.js';
import { VersionStore } from '../../../src/world/version-store.js';
import { preconditionDef, rule } from '../../helpers/rules.js';

const RULES = [rule(preconditionDef('p-click', 'browser.click', { loggedIn: true }))];

function child(version: string, parentVersion: string, createdAt = 0) {
  return createSnapshot({ version, parentVersion, rules: RULES, createdAt });
}

describe('VersionStore', () => {
  let clock: ManualClock;
  let store: VersionStore;

  beforeEach(() => {
    clock = new ManualClock(10);
    store = new VersionStore(createSnapshot({ version: 'v0', parentVersion: null, rules: RULES, createdAt: 10 }), clock);
  });

  it('rejects a root with a parent', () => {
    expect(() => new VersionStore(child('v1', 'v0'), clock)).toThrow('Root snapshot v1 must not have a parent');
  });

  it('hands out monotonic version ids', () => {
    expect(store.nextVersionId()).toBe('v1');
    expect(store.nextVersionId()).toBe('v2');
  });

  it('commits children of the current version and indexes them', () => {
    clock.set(20);
    const record = store.commit(child('v1', 'v0'), { kind: 'stats' });

    expect(record).toEqual({ kind: 'stats', seq: 1, version: 'v1', previousVersion: 'v0', timestamp: 20 });
    expect(store.currentVersion).toBe('v1');
    expect(store.children('v0')).toEqual(['v1']);
    expect(store.ancestors('v1')).toEqual(['v0']);
    expect(store.versions()).toEqual(['v0', 'v1']);
  });

  it('refuses a snapshot whose parent is not current', () => {
    store.commit(child('v1', 'v0'), { kind: 'stats' });

    expect(() => store.commit(child('v2', 'v0'), { kind: 'stats' })).toThrow(
      'Snapshot parent v0 is not the current version v1',
    );
    expect(store.size).toBe(2);
  });

  it('refuses an existing version id', () => {
    expect(() => store.commit(child('v0', 'v0'), { kind: 'stats' })).toThrow('Version v0 already exists');
  });

  it('repoints to a recorded version and logs it', () => {
    store.commit(child('v1', 'v0'), { kind: 'stats' });
    store.repoint('v0');

    expect(store.currentVersion).toBe('v0');
    expect(store.auditTrail('v0').map(r => r.kind)).toEqual(['init', 'rollback']);
    expect(store.auditTrail().at(-1)?.note).toBe('rollback from v1');
  });

  it('throws UnknownVersion for ids never recorded', () => {
    expect(() => store.require('v7')).toThrow(UnknownVersionError);
    expect(() => store.repoint('v7')).toThrow(UnknownVersionError);
    expect(() => store.children('v7')).toThrow(UnknownVersionError);
    expect(store.get('v7')).toBeUndefined();
    expect(store.currentVersion).toBe('v0');
  });

  it('returns copies of the audit log', () => {
    store.auditTrail().pop();
    expect(store.auditTrail()).toHaveLength(1);
  });

  describe('restore', () => {
    it('rebuilds the arena and continues numbering after the highest id', () => {
      const restored = VersionStore.restore(
        [store.require('v0'), child('v1', 'v0'), child('v4', 'v1')],
        [],
        'v1',
        clock,
      );

      expect(restored.currentVersion).toBe('v1');
      expect(restored.ancestors('v4')).toEqual(['v1', 'v0']);
      expect(restored.nextVersionId()).toBe('v5');
    });

    it('rejects snapshots whose parent is missing', () => {
      expect(() => VersionStore.restore([store.require('v0'), child('v2', 'v1')], [], 'v0', clock)).toThrow(
        UnknownVersionError,
      );
    });

    it('rejects an unknown current version', () => {
      expect(() => VersionStore.restore([store.require('v0')], [], 'v3', clock)).toThrow(UnknownVersionError);
    });
  });
});
