/**
 * Engine: runs an ActionDAG against a capability layer.
 *
 * A node starts once every predecessor has settled. If any predecessor did not
 * succeed the node is SKIPPED, so one failure cascades to everything that
 * depends on it. Independent branches run concurrently up to
 * `maxConcurrency`; each capability call is bounded by `nodeTimeoutMs`.
 * Aborting `ExecuteOptions.signal` skips every node that has not started.
 */

import { EventEmitter } from 'node:events';
import { nanoid } from 'nanoid';
import { ActionFailureError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { AsyncSemaphore } from '../core/mutex.js';
import type { ActionDAG } from '../dag/action-dag.js';
import type { BuildTrace } from '../dag/types.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { TimeoutError, withTimeout } from '../utils/timeout.js';
import type {
  Capability,
  ExecuteOptions,
  ExecutionEvent,
  ExecutionReport,
  FailureInfo,
  NodeResult,
  Observation,
  ReportStatus,
} from './types.js';

export interface EngineOptions {
  nodeTimeoutMs?: number;
  maxConcurrency?: number;
  clock?: Clock;
}

export function toFailureInfo(err: unknown): FailureInfo {
  if (err instanceof ActionFailureError) {
    const info: FailureInfo = { code: err.failureCode, reason: err.reason };
    if (err.missing) info.missing = { ...err.missing };
    if (err.requiredAction) info.requiredAction = err.requiredAction;
    return info;
  }
  if (err instanceof TimeoutError) {
    return { code: 'TIMEOUT', reason: err.message };
  }
  return { code: 'CAPABILITY_ERROR', reason: toError(err).message };
}

export class Engine extends EventEmitter {
  private readonly nodeTimeoutMs: number;
  private readonly maxConcurrency: number;
  private readonly clock: Clock;
  private logger = getLogger();

  constructor(private readonly capability: Capability, options: EngineOptions = {}) {
    super();
    this.nodeTimeoutMs = options.nodeTimeoutMs ?? 30000;
    this.maxConcurrency = options.maxConcurrency ?? 4;
    this.clock = options.clock ?? systemClock;
  }

  async execute(dag: ActionDAG, trace: BuildTrace, options: ExecuteOptions = {}): Promise<ExecutionReport> {
    const runId = options.runId ?? `run_${nanoid(10)}`;
    const taskId = options.taskId ?? runId;
    const runSignal = options.signal;
    const semaphore = new AsyncSemaphore(this.maxConcurrency);
    const events: ExecutionEvent[] = [];
    const observations = new Map<string, Observation>();
    const failures = new Map<string, FailureInfo>();

    const record = (event: Omit<ExecutionEvent, 'seq' | 'timestamp'>): void => {
      const full: ExecutionEvent = { seq: events.length, timestamp: this.clock.now(), ...event };
      events.push(full);
      this.emit('engine:event', { runId, event: full });
    };

    dag.resetStatuses();
    const startedAt = this.clock.now();
    record({ type: 'run:started' });

    const settled = new Map<string, Promise<void>>();

    const runNode = (nodeId: string): Promise<void> => {
      const existing = settled.get(nodeId);
      if (existing) return existing;

      const promise = (async () => {
        const predecessors = dag.predecessorsOf(nodeId);
        await Promise.all(predecessors.map(runNode));

        const node = dag.getNode(nodeId);
        if (!node) return;

        const blockedBy = predecessors.filter(p => dag.getNode(p)?.status !== 'SUCCEEDED');
        if (blockedBy.length > 0) {
          dag.setStatus(nodeId, 'SKIPPED');
          record({ type: 'node:skipped', nodeId, action: node.action.name, blockedBy });
          return;
        }

        const cancel = (): boolean => {
          if (!runSignal?.aborted) return false;
          dag.setStatus(nodeId, 'SKIPPED');
          record({ type: 'node:skipped', nodeId, action: node.action.name, blockedBy: [], cancelled: true });
          return true;
        };
        if (cancel()) return;

        await semaphore.withPermit(async () => {
          if (cancel()) return;
          dag.setStatus(nodeId, 'RUNNING');
          record({ type: 'node:started', nodeId, action: node.action.name });
          try {
            const observation = await withTimeout(
              signal => this.capability.execute(node.action, { runId, nodeId, signal }),
              this.nodeTimeoutMs,
              runSignal,
            );
            observations.set(nodeId, observation);
            dag.setStatus(nodeId, 'SUCCEEDED');
            record({ type: 'node:succeeded', nodeId, action: node.action.name });
          } catch (err) {
            const failure = toFailureInfo(err);
            failures.set(nodeId, failure);
            dag.setStatus(nodeId, 'FAILED');
            record({ type: 'node:failed', nodeId, action: node.action.name, failure });
            this.logger.debug({ runId, nodeId, action: node.action.name, failure }, 'Node failed');
          }
        });
      })();

      settled.set(nodeId, promise);
      return promise;
    };

    const order = dag.topologicalOrder();
    await Promise.all(order.map(runNode));

    const nodes: NodeResult[] = order.flatMap(id => {
      const node = dag.getNode(id);
      if (!node) return [];
      const result: NodeResult = {
        nodeId: id,
        action: node.action,
        status: node.status,
        predecessors: [...node.predecessors],
      };
      const observation = observations.get(id);
      if (observation) result.observation = observation;
      const failure = failures.get(id);
      if (failure) result.failure = failure;
      return [result];
    });

    const status = this.summarize(nodes);
    record({ type: 'run:completed' });
    const finishedAt = this.clock.now();

    const report: ExecutionReport = {
      runId,
      taskId,
      version: trace.version,
      goal: trace.goal,
      status,
      nodes,
      events,
      trace,
      startedAt,
      finishedAt,
      durationMs: finishedAt - startedAt,
    };
    if (runSignal?.aborted) {
      report.cancelled = true;
      this.logger.warn({ runId, taskId }, 'Execution cancelled');
    }

    this.logger.info(
      { runId, taskId, version: trace.version, status, nodes: nodes.length, durationMs: report.durationMs },
      'Execution finished',
    );
    this.emit('engine:complete', report);
    return report;
  }

  private summarize(nodes: NodeResult[]): ReportStatus {
    const succeeded = nodes.filter(n => n.status === 'SUCCEEDED').length;
    if (succeeded === nodes.length) return 'SUCCESS';
    return succeeded > 0 ? 'PARTIAL' : 'FAILURE';
  }
}
