/**
 * EvolutionSystem: the control surface.
 *
 * Wires builder, engine, reflection, simulator, controller, applier and stats
 * updater together. `runTask` executes one goal against the current version;
 * `evolveStep` runs one full improvement cycle. Cycles are serialized.
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { DagBuilder } from '../dag/dag-builder.js';
import type { GoalDecomposer } from '../dag/goal.js';
import type { Goal } from '../dag/types.js';
import { Engine } from '../engine/engine.js';
import type { Capability, ExecutionReport } from '../engine/types.js';
import { BudgetController } from '../evolution/budget-controller.js';
import { EvolutionController } from '../evolution/evolution-controller.js';
import { RuleStatsUpdater } from '../evolution/rule-stats-updater.js';
import type {
  BudgetStatus,
  EvaluationOutcome,
  RuleHealthReport,
  RuleTransition,
} from '../evolution/types.js';
import { PatchApplier } from '../patch/patch-applier.js';
import type { PatchProposal } from '../patch/types.js';
import { ReflectionV1 } from '../reflection/reflection-v1.js';
import { ReflectionV2 } from '../reflection/reflection-v2.js';
import type { Advisor } from '../reflection/types.js';
import { RuleSet } from '../rules/rule-set.js';
import type { RuleDefinition, RuleStatusCounts, WorldState } from '../rules/types.js';
import { Simulator } from '../simulation/simulator.js';
import type { SimulationBatch, SimulationTask } from '../simulation/types.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { exportModel, loadModel, saveModel, type ExportedModel } from '../world/serialization.js';
import type { VersionReader, WorldModelSnapshot } from '../world/types.js';
import { ConfigError, isRuleLoopError, type RuleLoopError } from './errors.js';
import { EventBus } from './events.js';
import { createLogger, getLogger, setLogger } from './logger.js';
import { AsyncMutex } from './mutex.js';
import { RuleLoopConfigSchema, type RuleLoopConfig, type RuleLoopConfigInput } from './types.js';

export interface EvolutionSystemOptions {
  capability: Capability;
  advisor?: Advisor;
  seedRules?: RuleDefinition[];
  /** Exported model to resume from; takes precedence over `seedRules` */
  model?: unknown;
  config?: RuleLoopConfigInput;
  clock?: Clock;
  decomposers?: GoalDecomposer[];
  events?: EventBus;
}

export interface RunTaskOptions {
  taskId?: string;
  state?: WorldState;
  /** Cancels the run; nodes that have not started are skipped */
  signal?: AbortSignal;
}

export interface ProposalFailure {
  proposalId: string;
  error: RuleLoopError;
}

export interface EvolutionStepResult {
  cycle: number;
  baseVersion: string;
  /** Current version once the cycle finished */
  version: string;
  reports: ExecutionReport[];
  unbuildable: Array<{ taskId: string; error: RuleLoopError }>;
  proposals: PatchProposal[];
  simulation: SimulationBatch | null;
  evaluation: EvaluationOutcome | null;
  applied: WorldModelSnapshot | null;
  applyFailures: ProposalFailure[];
  transitions: RuleTransition[];
}

export interface SystemState {
  currentVersion: string;
  parentVersion: string | null;
  versionCount: number;
  ruleCounts: RuleStatusCounts;
  budget: BudgetStatus;
  health: RuleHealthReport;
  cycles: number;
  tasksRun: number;
}

export class EvolutionSystem {
  readonly config: RuleLoopConfig;
  readonly events: EventBus;
  readonly builder: DagBuilder;

  private readonly capability: Capability;
  private readonly clock: Clock;
  private readonly controller: EvolutionController;
  private readonly applier: PatchApplier;
  private readonly simulator: Simulator;
  private readonly reflectionV1: ReflectionV1;
  private readonly reflectionV2: ReflectionV2 | null;
  private readonly statsUpdater: RuleStatsUpdater;
  private readonly mutex = new AsyncMutex();
  private logger: Logger;
  private cycles = 0;
  private tasksRun = 0;

  constructor(options: EvolutionSystemOptions) {
    const parsed = RuleLoopConfigSchema.safeParse(options.config ?? {});
    if (!parsed.success) {
      throw new ConfigError(`Invalid configuration: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    }
    this.config = parsed.data;
    if (options.config?.logging) {
      setLogger(createLogger({ name: 'ruleloop', ...this.config.logging }));
    }
    // Every component below captures the shared logger when constructed
    this.logger = getLogger();
    this.events = options.events ?? new EventBus();
    this.capability = options.capability;
    this.clock = options.clock ?? systemClock;
    this.builder = new DagBuilder({ decomposers: options.decomposers });

    const budget = new BudgetController(this.config.budget, this.clock);
    this.controller = new EvolutionController(budget, { requireImprovement: this.config.controller.requireImprovement });

    const applierOptions = {
      controller: this.controller,
      clock: this.clock,
      initialConfidence: this.config.lifecycle.initialConfidence,
    };
    this.applier = options.model !== undefined
      ? PatchApplier.restore(options.model, applierOptions)
      : PatchApplier.create(options.seedRules ?? [], applierOptions);

    this.simulator = new Simulator({
      builder: this.builder,
      capability: this.capability,
      nodeTimeoutMs: this.config.engine.nodeTimeoutMs,
      maxConcurrency: this.config.engine.maxConcurrency,
      specialization: this.config.simulation,
      initialConfidence: this.config.lifecycle.initialConfidence,
    });
    this.reflectionV1 = new ReflectionV1();
    this.reflectionV2 = options.advisor
      ? new ReflectionV2(options.advisor, { timeoutMs: this.config.advisor.timeoutMs })
      : null;
    this.statsUpdater = new RuleStatsUpdater(this.config.lifecycle, this.clock);
  }

  static async fromFile(filePath: string, options: Omit<EvolutionSystemOptions, 'model' | 'seedRules'>): Promise<EvolutionSystem> {
    const model = await loadModel(filePath);
    return new EvolutionSystem({ ...options, model });
  }

  get versions(): VersionReader {
    return this.applier.versions;
  }

  /**
   * Build and execute one goal against the current version. Build errors
   * (unsatisfiable goal, rule conflict) propagate; the model is not touched.
   */
  async runTask(goal: string | Goal, options: RunTaskOptions = {}): Promise<ExecutionReport> {
    const snapshot = this.versions.current();
    return this.execute(snapshot, goal, options.taskId ?? `task_${nanoid(8)}`, options.state, options.signal);
  }

  /**
   * One improvement cycle over `tasks`:
   * run, reflect, simulate, rank, apply at most one patch, update rule stats.
   */
  async evolveStep(tasks: SimulationTask[]): Promise<EvolutionStepResult> {
    return this.mutex.runExclusive(() => this.cycle(tasks));
  }

  private async cycle(tasks: SimulationTask[]): Promise<EvolutionStepResult> {
    const cycle = ++this.cycles;
    const base = this.versions.current();
    this.events.emit('cycle:start', { cycle, version: base.version, tasks: tasks.length });

    const result: EvolutionStepResult = {
      cycle,
      baseVersion: base.version,
      version: base.version,
      reports: [],
      unbuildable: [],
      proposals: [],
      simulation: null,
      evaluation: null,
      applied: null,
      applyFailures: [],
      transitions: [],
    };

    for (const task of tasks) {
      try {
        result.reports.push(await this.execute(base, task.goal, task.id, task.state));
      } catch (err) {
        if (!isRuleLoopError(err)) throw err;
        this.logger.warn({ cycle, taskId: task.id, error: err.message }, 'Task could not be built');
        result.unbuildable.push({ taskId: task.id, error: err });
      }
    }

    result.proposals = await this.reflect(result.reports, base);

    if (result.proposals.length > 0) {
      result.simulation = await this.simulator.simulateBatch(base, result.proposals, tasks);
      for (const failure of result.simulation.failures) {
        this.events.emit('proposal:rejected', { proposalId: failure.proposal.id, reason: failure.error.code });
      }

      result.evaluation = this.controller.evaluate(result.simulation.results);
      for (const rejection of result.evaluation.rejected) {
        this.events.emit('proposal:rejected', { proposalId: rejection.proposalId, reason: rejection.reason });
      }

      // One patch per cycle: once the version moves, the other decisions are stale
      for (const decision of result.evaluation.accepted) {
        try {
          const snapshot = this.applier.apply(decision);
          result.applied = snapshot;
          this.events.emit('patch:applied', {
            proposalId: decision.proposal.id,
            version: snapshot.version,
            parentVersion: base.version,
          });
          break;
        } catch (err) {
          if (!isRuleLoopError(err)) throw err;
          this.logger.warn({ proposalId: decision.proposal.id, error: err.message }, 'Patch rejected at apply');
          result.applyFailures.push({ proposalId: decision.proposal.id, error: err });
          this.events.emit('proposal:rejected', { proposalId: decision.proposal.id, reason: err.code });
        }
      }
    }

    const usage = RuleStatsUpdater.collectUsage(result.reports);
    const stats = this.statsUpdater.update(this.versions.current().rules, usage);
    if (stats.changed) {
      this.applier.commitStats(stats.rules, stats.transitions);
      result.transitions = stats.transitions;
      for (const t of stats.transitions) {
        this.events.emit('rule:transition', { ruleId: t.ruleId, from: t.from, to: t.to });
      }
    }

    result.version = this.versions.currentVersion;
    this.logger.info(
      {
        cycle,
        baseVersion: base.version,
        version: result.version,
        proposals: result.proposals.length,
        applied: result.applied?.version ?? null,
      },
      'Evolution cycle complete',
    );
    this.events.emit('cycle:complete', {
      cycle,
      version: result.version,
      applied: result.applied ? [result.applied.version] : [],
      proposals: result.proposals.length,
    });
    return result;
  }

  rollback(version: string): WorldModelSnapshot {
    const from = this.versions.currentVersion;
    const snapshot = this.applier.rollback(version);
    this.events.emit('version:rollback', { from, to: version });
    return snapshot;
  }

  getState(): SystemState {
    const current = this.versions.current();
    return {
      currentVersion: current.version,
      parentVersion: current.parentVersion,
      versionCount: this.versions.size,
      ruleCounts: new RuleSet(current.rules).countByStatus(),
      budget: this.controller.getBudgetStatus(),
      health: this.statsUpdater.healthReport(current.rules),
      cycles: this.cycles,
      tasksRun: this.tasksRun,
    };
  }

  exportModel(): ExportedModel {
    return exportModel(this.versions, this.clock.now());
  }

  async saveModel(filePath: string): Promise<void> {
    await saveModel(filePath, this.exportModel());
    this.logger.info({ filePath, version: this.versions.currentVersion }, 'World model saved');
  }

  private async execute(
    snapshot: WorldModelSnapshot,
    goal: string | Goal,
    taskId: string,
    state?: WorldState,
    signal?: AbortSignal,
  ): Promise<ExecutionReport> {
    const { dag, trace } = this.builder.build(snapshot, { goal, state });
    const engine = new Engine(this.capability, {
      nodeTimeoutMs: this.config.engine.nodeTimeoutMs,
      maxConcurrency: this.config.engine.maxConcurrency,
      clock: this.clock,
    });
    const report = await engine.execute(dag, trace, { taskId, signal });
    this.tasksRun++;
    this.events.emit('task:complete', {
      taskId,
      version: snapshot.version,
      status: report.status,
      durationMs: report.durationMs,
    });
    return report;
  }

  private async reflect(reports: ExecutionReport[], base: WorldModelSnapshot): Promise<PatchProposal[]> {
    const failing = reports.filter(r => r.status !== 'SUCCESS');
    if (failing.length === 0) return [];

    const proposals = this.reflectionV1.reflectAll(failing, base.rules);
    if (this.reflectionV2) {
      for (const report of failing) {
        const advised = await this.reflectionV2.reflect(report, base.rules);
        proposals.push(...advised.proposals);
        for (const rejection of advised.rejected) {
          this.events.emit('proposal:rejected', { proposalId: rejection.proposalId, reason: rejection.message });
        }
      }
    }

    const unique = new Map<string, PatchProposal>();
    for (const p of proposals) if (!unique.has(p.id)) unique.set(p.id, p);
    return [...unique.values()];
  }
}
