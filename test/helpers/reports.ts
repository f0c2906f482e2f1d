import type { BuildTraceEntry, NodeStatus } from '../../src/dag/types.js';
import type { ExecutionReport, FailureInfo, NodeResult, ReportStatus } from '../../src/engine/types.js';

export interface NodeSpec {
  id: string;
  action: string;
  status: NodeStatus;
  predecessors?: string[];
  failure?: FailureInfo;
}

/** Hand-built execution report for reflection and stats tests */
export function report(
  nodes: NodeSpec[],
  entries: BuildTraceEntry[] = [],
  overrides: { taskId?: string; goal?: string; kind?: string; target?: string; version?: string } = {},
): ExecutionReport {
  const results: NodeResult[] = nodes.map(n => {
    const result: NodeResult = {
      nodeId: n.id,
      action: { name: n.action, params: {} },
      status: n.status,
      predecessors: n.predecessors ?? [],
    };
    if (n.failure) result.failure = n.failure;
    return result;
  });
  const succeeded = nodes.filter(n => n.status === 'SUCCEEDED').length;
  const status: ReportStatus = succeeded === nodes.length ? 'SUCCESS' : succeeded > 0 ? 'PARTIAL' : 'FAILURE';
  const goal = {
    description: overrides.goal ?? 'search for cats',
    kind: overrides.kind ?? 'search',
    target: overrides.target ?? 'cats',
  };
  const version = overrides.version ?? 'v0';
  const taskId = overrides.taskId ?? 't1';

  return {
    runId: `run-${taskId}`,
    taskId,
    version,
    goal,
    status,
    nodes: results,
    events: [],
    trace: { goal, version, entries },
    startedAt: 0,
    finishedAt: 1,
    durationMs: 1,
  };
}

export function entry(nodeId: string, ruleId: string, role: BuildTraceEntry['role'] = 'constrained'): BuildTraceEntry {
  return { nodeId, ruleId, role, rationale: `${ruleId} on ${nodeId}` };
}
