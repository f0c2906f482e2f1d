import type { ExecutionReport, NodeResult } from '../engine/types.js';
import type { Blame } from './types.js';

/**
 * Walk back from every FAILED or SKIPPED node to the FAILED nodes that caused
 * it, and attach the rules recorded for each of those in the build trace.
 * Results follow the report's node order.
 */
export function assignBlame(report: ExecutionReport): Blame[] {
  const byId = new Map(report.nodes.map(n => [n.nodeId, n]));
  const roots = new Set<string>();

  const walk = (node: NodeResult, seen: Set<string>): void => {
    if (seen.has(node.nodeId)) return;
    seen.add(node.nodeId);
    if (node.status === 'FAILED') {
      roots.add(node.nodeId);
      return;
    }
    for (const p of node.predecessors) {
      const pred = byId.get(p);
      if (pred && pred.status !== 'SUCCEEDED') walk(pred, seen);
    }
  };

  for (const node of report.nodes) {
    if (node.status === 'FAILED' || node.status === 'SKIPPED') walk(node, new Set());
  }

  const blames: Blame[] = [];
  for (const node of report.nodes) {
    if (!roots.has(node.nodeId) || !node.failure) continue;
    const ruleIds: string[] = [];
    for (const entry of report.trace.entries) {
      if (entry.nodeId === node.nodeId && !ruleIds.includes(entry.ruleId)) ruleIds.push(entry.ruleId);
    }
    blames.push({
      taskId: report.taskId,
      version: report.version,
      goal: report.goal,
      nodeId: node.nodeId,
      action: node.action,
      failure: node.failure,
      ruleIds,
    });
  }
  return blames;
}
