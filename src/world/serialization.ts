import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { PatchProposalSchema } from '../patch/schema.js';
import { RuleSchema, describeIssues } from '../rules/schema.js';
import type { WorldModelDiff } from '../simulation/types.js';
import type { Clock } from '../utils/clock.js';
import { writeFileSafeAsync } from '../utils/fs.js';
import { createSnapshot } from './snapshot.js';
import type { AuditRecord, VersionReader, WorldModelSnapshot } from './types.js';
import { VersionStore } from './version-store.js';

export const EXPORT_FORMAT = 'ruleloop.world-model';
export const EXPORT_FORMAT_VERSION = 1;

const WorldModelDiffSchema: z.ZodType<WorldModelDiff> = z.object({
  successDelta: z.number(),
  meanExecutionTimeDelta: z.number(),
  ruleCountDelta: z.number(),
  specializationScoreDelta: z.number(),
  stabilityDelta: z.number(),
});

const status = z.enum(['ACTIVE', 'COOLDOWN', 'DEPRECATED']);

const AuditRecordSchema: z.ZodType<AuditRecord> = z.object({
  seq: z.number().int().min(0),
  kind: z.enum(['init', 'patch', 'stats', 'rollback']),
  version: z.string(),
  previousVersion: z.string().nullable(),
  timestamp: z.number(),
  proposal: PatchProposalSchema.optional(),
  diff: WorldModelDiffSchema.optional(),
  transitions: z.array(z.object({ ruleId: z.string(), from: status, to: status })).optional(),
  note: z.string().optional(),
});

const SnapshotSchema = z.object({
  version: z.string().min(1),
  parentVersion: z.string().nullable(),
  createdAt: z.number(),
  rules: z.array(RuleSchema),
});

export const ExportedModelSchema = z.object({
  format: z.literal(EXPORT_FORMAT),
  formatVersion: z.literal(EXPORT_FORMAT_VERSION),
  exportedAt: z.number(),
  currentVersion: z.string(),
  versions: z.array(SnapshotSchema).min(1),
  audit: z.array(AuditRecordSchema),
});

export type ExportedModel = z.infer<typeof ExportedModelSchema>;

/**
 * Everything needed to rebuild any version: every snapshot with its parent,
 * full rules and metadata, plus the audit trail.
 */
export function exportModel(store: VersionReader, exportedAt: number): ExportedModel {
  const versions = store.versions().map(v => {
    const snapshot = store.require(v);
    return {
      version: snapshot.version,
      parentVersion: snapshot.parentVersion,
      createdAt: snapshot.createdAt,
      rules: structuredClone([...snapshot.rules]),
    };
  });
  return {
    format: EXPORT_FORMAT,
    formatVersion: EXPORT_FORMAT_VERSION,
    exportedAt,
    currentVersion: store.currentVersion,
    versions,
    audit: structuredClone(store.auditTrail()),
  };
}

export function parseExportedModel(data: unknown): ExportedModel {
  const parsed = ExportedModelSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(`Invalid world model export: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function importModel(data: unknown, clock: Clock): VersionStore {
  const model = parseExportedModel(data);
  const snapshots: WorldModelSnapshot[] = model.versions.map(v => createSnapshot(v));
  return VersionStore.restore(snapshots, model.audit, model.currentVersion, clock);
}

export async function saveModel(filePath: string, model: ExportedModel): Promise<void> {
  await writeFileSafeAsync(filePath, JSON.stringify(model, null, 2));
}

export async function loadModel(filePath: string): Promise<ExportedModel> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read world model from ${filePath}`, err instanceof Error ? err : undefined);
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`World model at ${filePath} is not valid JSON`, err instanceof Error ? err : undefined);
  }
  return parseExportedModel(data);
}
