/**
 * End-to-end improvement loop: failing runs are reflected on, proposals are
 * simulated and ranked, one patch is applied and the next cycle succeeds.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { EventBus } from '../../src/core/events.js';
import { EvolutionSystem } from '../../src/core/system.js';
import type { FailureContext } from '../../src/reflection/types.js';
import { ManualClock } from '../../src/utils/clock.js';
import { ScriptedAdvisor } from '../helpers/advisor.js';
import { effectDef } from '../helpers/rules.js';
import { ScriptedCapability } from '../helpers/scripted-capability.js';

const TASKS = [
  { id: 'cats', goal: 'search for cats' },
  { id: 'dogs', goal: 'search for dogs' },
];

function capability(): ScriptedCapability {
  return new ScriptedCapability({
    'browser.click': { requires: { loggedIn: true } },
    'auth.login': { produces: { loggedIn: true } },
  });
}

/** Suggests narrowing the login effect away from the failing target */
function narrowingAdvisor(): ScriptedAdvisor {
  return new ScriptedAdvisor((context: FailureContext) => [
    {
      rationale: `login does not help with ${context.goal.target}`,
      edits: [{ op: 'NARROW_SCOPE', ruleId: 'e-login', key: 'goal.kind', value: context.goal.kind }],
    },
    { rationale: 'add a rule', edits: [{ op: 'ADD_RULE', rule: { id: 'x' } }] },
  ]);
}

describe('evolution loop', () => {
  let dir: string;
  let clock: ManualClock;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ruleloop-loop-'));
    clock = new ManualClock(0);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('learns from failures, improves and persists', async () => {
    const events = new EventBus();
    const seen: string[] = [];
    events.on('cycle:start', e => seen.push(`start:${e.version}`));
    events.on('patch:applied', e => seen.push(`patch:${e.version}`));
    events.on('cycle:complete', e => seen.push(`complete:${e.version}`));

    const advisor = narrowingAdvisor();
    const system = new EvolutionSystem({
      capability: capability(),
      advisor,
      seedRules: [effectDef('e-login', { name: 'auth.login', params: {} }, { loggedIn: true })],
      clock,
      events,
    });

    // Cycle 1: both tasks fail on click; one learned rule wins over the advisor's narrowing
    const first = await system.evolveStep(TASKS);

    expect(first.reports.map(r => r.status)).toEqual(['PARTIAL', 'PARTIAL']);
    expect(advisor.contexts.map(c => c.taskId)).toEqual(['cats', 'dogs']);
    expect(first.proposals.map(p => p.provenance.source)).toEqual(['reflection-v1', 'reflection-v2']);
    expect(first.evaluation?.accepted.map(d => d.proposal.provenance.source)).toEqual(['reflection-v1']);
    expect(first.evaluation?.rejected.map(r => r.reason)).toEqual(['NO_IMPROVEMENT']);
    expect(first.applied?.version).toBe('v1');
    expect(first.version).toBe('v2');

    // Cycle 2: everything succeeds, nothing to propose, rule stats move up
    const second = await system.evolveStep(TASKS);

    expect(second.reports.map(r => r.status)).toEqual(['SUCCESS', 'SUCCESS']);
    expect(second.proposals).toEqual([]);
    expect(second.version).toBe('v3');
    const learned = system.versions.current().rules.find(r => r.id === 'learned-pre:browser.click:loggedIn');
    expect(learned?.metadata.successCount).toBe(2);
    expect(learned?.metadata.confidence).toBeCloseTo(0.5275);

    expect(seen).toEqual(['start:v0', 'patch:v1', 'complete:v2', 'start:v2', 'complete:v3']);

    // Persist and resume
    const file = join(dir, 'model.json');
    await system.saveModel(file);
    const resumed = await EvolutionSystem.fromFile(file, { capability: capability(), clock });

    expect(resumed.versions.currentVersion).toBe('v3');
    expect(resumed.versions.ancestors('v3')).toEqual(['v2', 'v1', 'v0']);
    expect(resumed.versions.auditTrail().map(r => r.kind)).toEqual(['init', 'patch', 'stats', 'stats']);
    expect((await resumed.runTask('search for birds')).status).toBe('SUCCESS');
  });

  it('replays a rolled-back version exactly as before', async () => {
    const system = new EvolutionSystem({
      capability: capability(),
      seedRules: [effectDef('e-login', { name: 'auth.login', params: {} }, { loggedIn: true })],
      clock,
    });
    await system.evolveStep(TASKS);

    system.rollback('v0');
    const report = await system.runTask('search for cats');

    expect(report.version).toBe('v0');
    expect(report.status).toBe('PARTIAL');
    expect(system.versions.children('v0')).toEqual(['v1']);
  });
});
