import type { FailureCode } from '../core/errors.js';
import type { BuildTrace, Goal, NodeStatus } from '../dag/types.js';
import type { Action, StateValue } from '../rules/types.js';

export interface Observation {
  kind: string;
  payload?: unknown;
}

export interface CapabilityContext {
  /** Identifies one execution; capabilities may key per-run state on it */
  runId: string;
  nodeId: string;
  /** Aborted when the node times out or the run is cancelled */
  signal: AbortSignal;
}

/**
 * The side-effecting layer actions are delegated to. Resolves with an
 * observation or rejects, preferably with an ActionFailureError.
 */
export interface Capability {
  execute(action: Action, context: CapabilityContext): Promise<Observation>;
}

export type ReportStatus = 'SUCCESS' | 'PARTIAL' | 'FAILURE';

export interface FailureInfo {
  code: FailureCode;
  reason: string;
  missing?: { key: string; value: StateValue };
  requiredAction?: string;
}

export type ExecutionEventType =
  | 'run:started'
  | 'node:started'
  | 'node:succeeded'
  | 'node:failed'
  | 'node:skipped'
  | 'run:completed';

export interface ExecutionEvent {
  seq: number;
  timestamp: number;
  type: ExecutionEventType;
  nodeId?: string;
  action?: string;
  failure?: FailureInfo;
  /** Predecessors that did not succeed */
  blockedBy?: string[];
  /** Set on skips caused by cancelling the run */
  cancelled?: boolean;
}

export interface NodeResult {
  nodeId: string;
  action: Action;
  status: NodeStatus;
  predecessors: string[];
  observation?: Observation;
  failure?: FailureInfo;
}

export interface ExecutionReport {
  runId: string;
  taskId: string;
  version: string;
  goal: Goal;
  status: ReportStatus;
  /** Results in topological order */
  nodes: NodeResult[];
  events: ExecutionEvent[];
  trace: BuildTrace;
  startedAt: number;
  finishedAt: number;
  durationMs: number;
  /** Present when the run was aborted through `ExecuteOptions.signal` */
  cancelled?: true;
}

export interface ExecuteOptions {
  taskId?: string;
  runId?: string;
  /**
   * Cancels the run. Nodes that have not started are SKIPPED; calls in
   * flight see their own signal abort and fail with TIMEOUT.
   */
  signal?: AbortSignal;
}
