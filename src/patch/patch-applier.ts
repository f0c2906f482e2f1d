/**
 * PatchApplier: the only writer of the world model.
 *
 * Owns the VersionStore; everything else sees it through `versions`, a
 * read-only view. A commit validates everything first and then writes, so a
 * failed `apply` leaves the store exactly as it was.
 */

import { EventEmitter } from 'node:events';
import { getLogger } from '../core/logger.js';
import type { EvolutionController } from '../evolution/evolution-controller.js';
import type { PatchDecision, RuleTransition } from '../evolution/types.js';
import { createRule } from '../rules/rule.js';
import { RuleSet } from '../rules/rule-set.js';
import type { Rule, RuleDefinition } from '../rules/types.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { importModel } from '../world/serialization.js';
import { createSnapshot } from '../world/snapshot.js';
import type { VersionReader, WorldModelSnapshot } from '../world/types.js';
import { ROOT_VERSION, VersionStore } from '../world/version-store.js';
import { applyEdits } from './apply-edits.js';

export interface PatchApplierOptions {
  controller: EvolutionController;
  clock?: Clock;
  initialConfidence?: number;
}

export class PatchApplier extends EventEmitter {
  private readonly controller: EvolutionController;
  private readonly clock: Clock;
  private readonly initialConfidence: number;
  private logger = getLogger();

  private constructor(private readonly store: VersionStore, options: PatchApplierOptions) {
    super();
    this.controller = options.controller;
    this.clock = options.clock ?? systemClock;
    this.initialConfidence = options.initialConfidence ?? 0.5;
  }

  /** Start a fresh model at `v0` from seed rule definitions */
  static create(seedRules: readonly RuleDefinition[], options: PatchApplierOptions): PatchApplier {
    const clock = options.clock ?? systemClock;
    const now = clock.now();
    const rules = new RuleSet(seedRules.map(def => createRule(def, now, options.initialConfidence)));
    rules.validate();
    const root = createSnapshot({ version: ROOT_VERSION, parentVersion: null, rules: rules.toArray(), createdAt: now });
    return new PatchApplier(new VersionStore(root, clock), options);
  }

  /** Resume from an exported model */
  static restore(model: unknown, options: PatchApplierOptions): PatchApplier {
    const store = importModel(model, options.clock ?? systemClock);
    return new PatchApplier(store, options);
  }

  get versions(): VersionReader {
    return this.store;
  }

  /**
   * Commit a controller decision as a new child of the current version.
   */
  apply(decision: PatchDecision): WorldModelSnapshot {
    const current = this.store.current();
    this.controller.assertAdmissible(decision, current.version);

    const now = this.clock.now();
    const rules = applyEdits(current.rules, decision.proposal.edits, {
      now,
      initialConfidence: this.initialConfidence,
      proposalId: decision.proposal.id,
    });

    const snapshot = createSnapshot({
      version: this.store.nextVersionId(),
      parentVersion: current.version,
      rules,
      createdAt: now,
    });
    this.store.commit(snapshot, { kind: 'patch', proposal: decision.proposal, diff: decision.diff });
    this.controller.recordApplied(decision);

    this.logger.info(
      { proposalId: decision.proposal.id, version: snapshot.version, parentVersion: current.version },
      'Patch applied',
    );
    this.emit('patch:applied', { proposalId: decision.proposal.id, version: snapshot.version, parentVersion: current.version });
    return snapshot;
  }

  /**
   * Commit rule metadata produced by the stats updater. Rule ids must match
   * the current version exactly; the patch budget is not involved.
   */
  commitStats(rules: readonly Rule[], transitions: readonly RuleTransition[]): WorldModelSnapshot {
    const current = this.store.current();
    const expected = current.rules.map(r => r.id).join('\u0000');
    if (rules.map(r => r.id).join('\u0000') !== expected) {
      throw new Error(`Stats update does not match the rules of ${current.version}`);
    }
    new RuleSet(rules).validate();

    const now = this.clock.now();
    const snapshot = createSnapshot({
      version: this.store.nextVersionId(),
      parentVersion: current.version,
      rules,
      createdAt: now,
    });
    this.store.commit(snapshot, {
      kind: 'stats',
      transitions: transitions.map(t => ({ ruleId: t.ruleId, from: t.from, to: t.to })),
    });
    this.logger.debug({ version: snapshot.version, transitions: transitions.length }, 'Rule stats committed');
    return snapshot;
  }

  /**
   * Point `current` at a recorded version. History is kept; the next commit
   * branches from the rolled-back version.
   */
  rollback(version: string): WorldModelSnapshot {
    const from = this.store.currentVersion;
    const target = this.store.require(version);
    this.store.repoint(version, `rollback from ${from}`);
    this.logger.info({ from, to: version }, 'Rolled back');
    this.emit('version:rollback', { from, to: version });
    return target;
  }
}
