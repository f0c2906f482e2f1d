import { CyclicOrderConstraintError } from '../core/errors.js';
import { stableStringify } from '../utils/crypto.js';
import type { Action } from '../rules/types.js';
import type { ActionNode, NodeStatus, SerializedDag } from './types.js';

interface MutableNode {
  id: string;
  action: Action;
  predecessors: Set<string>;
  status: NodeStatus;
}

/**
 * A directed acyclic graph of actions. Edges point from a predecessor to the
 * node that waits on it. Every mutation keeps the graph acyclic.
 */
export class ActionDAG {
  private nodeMap = new Map<string, MutableNode>();
  private successors = new Map<string, Set<string>>();
  private counter = 0;

  addNode(action: Action, predecessors: string[] = []): ActionNode {
    for (const p of predecessors) {
      if (!this.nodeMap.has(p)) throw new Error(`Unknown predecessor node: ${p}`);
    }
    const id = `n${++this.counter}`;
    const node: MutableNode = { id, action, predecessors: new Set(), status: 'PENDING' };
    this.nodeMap.set(id, node);
    this.successors.set(id, new Set());
    for (const p of predecessors) this.addEdge(p, id);
    return node;
  }

  /**
   * Add an edge `from -> to`. Returns false when it already exists.
   * Throws CyclicOrderConstraintError (node ids) when it would close a cycle.
   */
  addEdge(from: string, to: string): boolean {
    const target = this.require(to);
    this.require(from);
    if (target.predecessors.has(from)) return false;

    const back = this.pathBetween(to, from);
    if (back) throw new CyclicOrderConstraintError([...back, to]);

    target.predecessors.add(from);
    this.successors.get(from)?.add(to);
    return true;
  }

  hasEdge(from: string, to: string): boolean {
    return this.nodeMap.get(to)?.predecessors.has(from) ?? false;
  }

  /** Node ids on a path from `from` to `to`, or null if none */
  pathBetween(from: string, to: string): string[] | null {
    if (from === to) return [from];
    const parent = new Map<string, string>();
    const queue = [from];
    const seen = new Set([from]);
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const next of this.successors.get(current) ?? []) {
        if (seen.has(next)) continue;
        seen.add(next);
        parent.set(next, current);
        if (next === to) {
          const path = [to];
          let step = parent.get(to);
          while (step !== undefined) {
            path.unshift(step);
            step = parent.get(step);
          }
          return path;
        }
        queue.push(next);
      }
    }
    return null;
  }

  wouldCreateCycle(from: string, to: string): boolean {
    return this.pathBetween(to, from) !== null;
  }

  getNode(id: string): ActionNode | undefined {
    return this.nodeMap.get(id);
  }

  /** Nodes in creation order */
  nodes(): ActionNode[] {
    return [...this.nodeMap.values()];
  }

  get size(): number {
    return this.nodeMap.size;
  }

  predecessorsOf(id: string): string[] {
    return [...this.require(id).predecessors];
  }

  dependentsOf(id: string): string[] {
    return [...(this.successors.get(id) ?? [])];
  }

  findByAction(name: string): ActionNode[] {
    return this.nodes().filter(n => n.action.name === name);
  }

  /** First node running exactly this action (name and params) */
  findAction(action: Action): ActionNode | undefined {
    const key = stableStringify(action);
    return this.nodes().find(n => stableStringify(n.action) === key);
  }

  /**
   * Kahn's algorithm; ties broken by creation order so the result is stable.
   */
  topologicalOrder(): string[] {
    const inDegree = new Map<string, number>();
    for (const node of this.nodeMap.values()) inDegree.set(node.id, node.predecessors.size);

    const ready = [...this.nodeMap.keys()].filter(id => inDegree.get(id) === 0);
    const order: string[] = [];
    while (ready.length > 0) {
      ready.sort((a, b) => this.creationIndex(a) - this.creationIndex(b));
      const id = ready.shift();
      if (id === undefined) break;
      order.push(id);
      for (const next of this.successors.get(id) ?? []) {
        const remaining = (inDegree.get(next) ?? 0) - 1;
        inDegree.set(next, remaining);
        if (remaining === 0) ready.push(next);
      }
    }
    return order;
  }

  /** Parallel waves: every node's predecessors sit in an earlier wave */
  waves(): string[][] {
    const level = new Map<string, number>();
    const result: string[][] = [];
    for (const id of this.topologicalOrder()) {
      let depth = 0;
      for (const p of this.require(id).predecessors) {
        depth = Math.max(depth, (level.get(p) ?? 0) + 1);
      }
      level.set(id, depth);
      (result[depth] ??= []).push(id);
    }
    return result;
  }

  setStatus(id: string, status: NodeStatus): void {
    this.require(id).status = status;
  }

  resetStatuses(): void {
    for (const node of this.nodeMap.values()) node.status = 'PENDING';
  }

  toJSON(): SerializedDag {
    return {
      nodes: this.nodes().map(n => ({ id: n.id, action: n.action, predecessors: [...n.predecessors] })),
    };
  }

  private creationIndex(id: string): number {
    return Number(id.slice(1));
  }

  private require(id: string): MutableNode {
    const node = this.nodeMap.get(id);
    if (!node) throw new Error(`Unknown node: ${id}`);
    return node;
  }
}
