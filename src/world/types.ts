import type { PatchProposal } from '../patch/types.js';
import type { Rule, RuleStatus } from '../rules/types.js';
import type { WorldModelDiff } from '../simulation/types.js';

/** An immutable, versioned rule set */
export interface WorldModelSnapshot {
  readonly version: string;
  readonly parentVersion: string | null;
  readonly rules: readonly Rule[];
  readonly createdAt: number;
}

export type AuditKind = 'init' | 'patch' | 'stats' | 'rollback';

export interface RuleTransitionRecord {
  ruleId: string;
  from: RuleStatus;
  to: RuleStatus;
}

export interface AuditRecord {
  seq: number;
  kind: AuditKind;
  /** Current version after the record was written */
  version: string;
  /** Current version before the record was written */
  previousVersion: string | null;
  timestamp: number;
  proposal?: PatchProposal;
  diff?: WorldModelDiff;
  transitions?: RuleTransitionRecord[];
  note?: string;
}

export type AuditInput = Omit<AuditRecord, 'seq' | 'version' | 'previousVersion' | 'timestamp'>;

/** Read access to the version store */
export interface VersionReader {
  readonly currentVersion: string;
  readonly size: number;
  current(): WorldModelSnapshot;
  get(version: string): WorldModelSnapshot | undefined;
  require(version: string): WorldModelSnapshot;
  has(version: string): boolean;
  versions(): string[];
  children(version: string): string[];
  /** Parent chain of `version`, nearest first, ending at the root */
  ancestors(version: string): string[];
  auditTrail(version?: string): AuditRecord[];
}
