import type { Action, WorldState } from '../rules/types.js';
import type { ActionDAG } from './action-dag.js';

export type NodeStatus = 'PENDING' | 'RUNNING' | 'SUCCEEDED' | 'FAILED' | 'SKIPPED';

export interface ActionNode {
  readonly id: string;
  readonly action: Action;
  readonly predecessors: ReadonlySet<string>;
  readonly status: NodeStatus;
}

export type GoalKind = 'browse' | 'search' | 'extract' | 'generic';

export interface Goal {
  description: string;
  kind: string;
  target: string;
}

/**
 * A rule that `produced` a node caused it to be added to the DAG; a rule
 * that `constrained` a node added an incoming edge to it.
 */
export type TraceRole = 'produced' | 'constrained';

export interface BuildTraceEntry {
  nodeId: string;
  ruleId: string;
  role: TraceRole;
  rationale: string;
}

export interface BuildTrace {
  goal: Goal;
  version: string;
  entries: BuildTraceEntry[];
}

export interface BuildResult {
  dag: ActionDAG;
  trace: BuildTrace;
  /** World state plus goal facts the rules were evaluated against */
  facts: WorldState;
}

export interface SerializedDag {
  nodes: Array<{ id: string; action: Action; predecessors: string[] }>;
}
