/**
 * VersionStore: arena of immutable world-model snapshots.
 *
 * Snapshots are keyed by version id and indexed parent -> children. The audit
 * log is append-only; `current` is the only thing that ever moves, and it
 * only moves through `commit` and `repoint`.
 */

import { UnknownVersionError } from '../core/errors.js';
import type { Clock } from '../utils/clock.js';
import type { AuditInput, AuditRecord, VersionReader, WorldModelSnapshot } from './types.js';

export const ROOT_VERSION = 'v0';

export class VersionStore implements VersionReader {
  /** Snapshots keyed by version id, in creation order */
  private snapshots: Map<string, WorldModelSnapshot> = new Map();

  /** Version ids grouped by parent */
  private childIndex: Map<string, string[]> = new Map();

  private audit: AuditRecord[] = [];
  private pointer: string;
  private counter = 0;

  constructor(root: WorldModelSnapshot, private readonly clock: Clock) {
    if (root.parentVersion !== null) {
      throw new Error(`Root snapshot ${root.version} must not have a parent`);
    }
    this.insert(root);
    this.pointer = root.version;
    this.bumpCounter(root.version);
    this.append({ kind: 'init', note: `${root.rules.length} seed rules` }, null);
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  get currentVersion(): string {
    return this.pointer;
  }

  get size(): number {
    return this.snapshots.size;
  }

  current(): WorldModelSnapshot {
    return this.require(this.pointer);
  }

  get(version: string): WorldModelSnapshot | undefined {
    return this.snapshots.get(version);
  }

  require(version: string): WorldModelSnapshot {
    const snapshot = this.snapshots.get(version);
    if (!snapshot) throw new UnknownVersionError(version);
    return snapshot;
  }

  has(version: string): boolean {
    return this.snapshots.has(version);
  }

  versions(): string[] {
    return [...this.snapshots.keys()];
  }

  children(version: string): string[] {
    this.require(version);
    return [...(this.childIndex.get(version) ?? [])];
  }

  ancestors(version: string): string[] {
    const chain: string[] = [];
    let parent = this.require(version).parentVersion;
    while (parent !== null) {
      chain.push(parent);
      parent = this.require(parent).parentVersion;
    }
    return chain;
  }

  /** The full log, or only the records that created or moved to `version` */
  auditTrail(version?: string): AuditRecord[] {
    if (version === undefined) return [...this.audit];
    this.require(version);
    return this.audit.filter(r => r.version === version);
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  /** Next monotonic version id; ids are never reused */
  nextVersionId(): string {
    let id: string;
    do {
      id = `v${++this.counter}`;
    } while (this.snapshots.has(id));
    return id;
  }

  /**
   * Store `snapshot` as a child of the current version and advance to it.
   * Every check runs before the first write.
   */
  commit(snapshot: WorldModelSnapshot, record: AuditInput): AuditRecord {
    if (this.snapshots.has(snapshot.version)) {
      throw new Error(`Version ${snapshot.version} already exists`);
    }
    if (snapshot.parentVersion !== this.pointer) {
      throw new Error(`Snapshot parent ${snapshot.parentVersion ?? 'null'} is not the current version ${this.pointer}`);
    }
    const previous = this.pointer;
    this.insert(snapshot);
    this.pointer = snapshot.version;
    return this.append(record, previous);
  }

  repoint(version: string, note?: string): AuditRecord {
    this.require(version);
    const previous = this.pointer;
    this.pointer = version;
    return this.append({ kind: 'rollback', note: note ?? `rollback from ${previous}` }, previous);
  }

  // ---------------------------------------------------------------------------
  // Restore
  // ---------------------------------------------------------------------------

  /**
   * Rebuild a store from exported snapshots (parents before children) and
   * audit records.
   */
  static restore(
    snapshots: WorldModelSnapshot[],
    audit: AuditRecord[],
    currentVersion: string,
    clock: Clock,
  ): VersionStore {
    const [root, ...rest] = snapshots;
    if (!root) throw new Error('Cannot restore an empty version store');
    const store = new VersionStore(root, clock);
    for (const snapshot of rest) {
      if (snapshot.parentVersion === null || !store.has(snapshot.parentVersion)) {
        throw new UnknownVersionError(snapshot.parentVersion ?? 'null');
      }
      if (store.has(snapshot.version)) throw new Error(`Duplicate version ${snapshot.version}`);
      store.insert(snapshot);
      store.bumpCounter(snapshot.version);
    }
    store.require(currentVersion);
    store.pointer = currentVersion;
    if (audit.length > 0) store.audit = audit.map(r => ({ ...r }));
    return store;
  }

  private insert(snapshot: WorldModelSnapshot): void {
    this.snapshots.set(snapshot.version, snapshot);
    if (snapshot.parentVersion !== null) {
      const siblings = this.childIndex.get(snapshot.parentVersion) ?? [];
      siblings.push(snapshot.version);
      this.childIndex.set(snapshot.parentVersion, siblings);
    }
  }

  private bumpCounter(version: string): void {
    const match = /^v(\d+)$/.exec(version);
    if (match) this.counter = Math.max(this.counter, Number(match[1]));
  }

  private append(input: AuditInput, previous: string | null): AuditRecord {
    const record: AuditRecord = {
      ...input,
      seq: this.audit.length,
      version: this.pointer,
      previousVersion: previous,
      timestamp: this.clock.now(),
    };
    this.audit.push(record);
    return record;
  }
}
