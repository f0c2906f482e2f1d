import {
  CyclicOrderConstraintError,
  RuleConflictError,
  UnsatisfiableGoalError,
} from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { RuleSet } from '../rules/rule-set.js';
import type { Action, Rule, StateValue, WorldState } from '../rules/types.js';
import { ActionDAG } from './action-dag.js';
import { GoalDecomposerRegistry, type GoalDecomposer } from './goal.js';
import type { ActionNode, BuildResult, BuildTraceEntry, Goal } from './types.js';

/** The part of a world-model snapshot the builder reads */
export interface RuleSource {
  readonly version: string;
  readonly rules: readonly Rule[];
}

export interface BuildRequest {
  goal: string | Goal;
  state?: WorldState;
}

export interface DagBuilderOptions {
  decomposers?: GoalDecomposer[];
}

interface Requirement {
  ruleId: string;
  value: StateValue;
}

function formatValue(value: StateValue): string {
  return JSON.stringify(value);
}

/**
 * Builds an ActionDAG for a goal from the rules of one world-model version.
 *
 * 1. Seed the goal's action sequence as a chain.
 * 2. For every node, satisfy each unmet precondition with a producer node
 *    taken from the applicable effect rules (reusing an existing node when one
 *    already runs the producing action).
 * 3. Add the edges order rules demand.
 *
 * Building never mutates the rules it reads.
 */
export class DagBuilder {
  readonly decomposers: GoalDecomposerRegistry;
  private logger = getLogger();

  constructor(options: DagBuilderOptions = {}) {
    this.decomposers = new GoalDecomposerRegistry(options.decomposers);
  }

  build(source: RuleSource, request: BuildRequest): BuildResult {
    const goal = typeof request.goal === 'string' ? this.decomposers.parse(request.goal) : request.goal;

    const ruleSet = new RuleSet(source.rules);
    ruleSet.validate();

    const facts: WorldState = {
      ...(request.state ?? {}),
      'goal.kind': goal.kind,
      'goal.target': goal.target,
    };
    const applicable = ruleSet.applicableRules(facts);
    const requirements = this.collectRequirements(applicable);
    this.checkEffects(applicable);

    const dag = new ActionDAG();
    const entries: BuildTraceEntry[] = [];

    let previous: ActionNode | undefined;
    for (const action of this.decomposers.decompose(goal)) {
      previous = dag.addNode(action, previous ? [previous.id] : []);
    }

    // Precondition expansion; injected producers join the worklist
    const worklist = dag.nodes().map(n => n.id);
    const expanded = new Set<string>();
    while (worklist.length > 0) {
      const nodeId = worklist.shift();
      if (nodeId === undefined || expanded.has(nodeId)) continue;
      expanded.add(nodeId);

      const node = dag.getNode(nodeId);
      if (!node) continue;
      const needs = requirements.get(node.action.name);
      if (!needs) continue;

      for (const [key, requirement] of needs) {
        if (Object.prototype.hasOwnProperty.call(facts, key) && facts[key] === requirement.value) continue;

        const producers = applicable.filter(
          r => r.body.kind === 'effect' && Object.prototype.hasOwnProperty.call(r.body.produces, key) &&
            r.body.produces[key] === requirement.value && r.body.action.name !== node.action.name,
        );
        if (producers.length === 0) {
          throw new UnsatisfiableGoalError(goal.description, node.action.name, key, requirement.ruleId);
        }

        let producerNode: ActionNode | undefined;
        let producerRule: Rule | undefined;
        for (const rule of producers) {
          if (rule.body.kind !== 'effect') continue;
          const existing = dag.findAction(rule.body.action);
          if (existing) {
            producerNode = existing;
            producerRule = rule;
            break;
          }
        }

        if (!producerNode || !producerRule) {
          producerRule = producers[0];
          const producedAction: Action | undefined =
            producerRule.body.kind === 'effect' ? producerRule.body.action : undefined;
          if (!producedAction) continue;
          producerNode = dag.addNode(producedAction);
          worklist.push(producerNode.id);
          entries.push({
            nodeId: producerNode.id,
            ruleId: producerRule.id,
            role: 'produced',
            rationale: `injected ${producedAction.name} to establish ${key}=${formatValue(requirement.value)} for ${node.action.name}`,
          });
        }

        this.link(dag, producerNode, node);
        entries.push({
          nodeId: node.id,
          ruleId: requirement.ruleId,
          role: 'constrained',
          rationale: `${node.action.name} requires ${key}=${formatValue(requirement.value)} from ${producerNode.action.name}`,
        });
      }
    }

    // Order constraints
    for (const rule of applicable) {
      if (!rule.order) continue;
      for (const target of dag.findByAction(rule.order.action)) {
        for (const before of rule.order.mustFollow) {
          for (const predecessor of dag.findByAction(before)) {
            if (predecessor.id === target.id || dag.hasEdge(predecessor.id, target.id)) continue;
            this.link(dag, predecessor, target);
            entries.push({
              nodeId: target.id,
              ruleId: rule.id,
              role: 'constrained',
              rationale: `${target.action.name} must follow ${predecessor.action.name}`,
            });
          }
        }
      }
    }

    this.logger.debug(
      { goal: goal.description, version: source.version, nodes: dag.size, traced: entries.length },
      'DAG built',
    );

    return { dag, trace: { goal, version: source.version, entries }, facts };
  }

  /**
   * Gather per-action requirements, failing on contradictory values.
   */
  private collectRequirements(applicable: Rule[]): Map<string, Map<string, Requirement>> {
    const byAction = new Map<string, Map<string, Requirement>>();
    for (const rule of applicable) {
      if (rule.body.kind !== 'precondition') continue;
      const needs = byAction.get(rule.body.action) ?? new Map<string, Requirement>();
      for (const key of Object.keys(rule.body.requires).sort()) {
        const value = rule.body.requires[key];
        const existing = needs.get(key);
        if (existing && existing.value !== value) {
          throw new RuleConflictError(
            key,
            [existing.ruleId, rule.id],
            `${rule.body.action} requires both ${formatValue(existing.value)} and ${formatValue(value)}`,
          );
        }
        if (!existing) needs.set(key, { ruleId: rule.id, value });
      }
      byAction.set(rule.body.action, needs);
    }
    return byAction;
  }

  /** Two effect rules for the same action may not disagree on an outcome */
  private checkEffects(applicable: Rule[]): void {
    const claims = new Map<string, Requirement>();
    for (const rule of applicable) {
      if (rule.body.kind !== 'effect') continue;
      for (const [key, value] of Object.entries(rule.body.produces)) {
        const claimKey = `${rule.body.action.name}\u0000${key}`;
        const existing = claims.get(claimKey);
        if (existing && existing.value !== value) {
          throw new RuleConflictError(
            key,
            [existing.ruleId, rule.id],
            `${rule.body.action.name} is declared to produce both ${formatValue(existing.value)} and ${formatValue(value)}`,
          );
        }
        if (!existing) claims.set(claimKey, { ruleId: rule.id, value });
      }
    }
  }

  private link(dag: ActionDAG, from: ActionNode, to: ActionNode): void {
    const back = dag.pathBetween(to.id, from.id);
    if (back) {
      const names = back.map(id => dag.getNode(id)?.action.name ?? id);
      throw new CyclicOrderConstraintError([...names, to.action.name]);
    }
    dag.addEdge(from.id, to.id);
  }
}
