import { describe, it, expect } from 'vitest';
import { ActionFailureError } from '../../../src/core/errors.js';
import { CapabilityRouter } from '../../../src/engine/capability-router.js';
import type { CapabilityContext } from '../../../src/engine/types.js';
import { ScriptedCapability } from '../../helpers/scripted-capability.js';

const context: CapabilityContext = { runId: 'r', nodeId: 'n1', signal: new AbortController().signal };

describe('CapabilityRouter', () => {
  it('routes by the namespace before the first dot', async () => {
    const browser = new ScriptedCapability();
    const router = new CapabilityRouter()
      .register('browser', browser)
      .register('filesystem', async action => ({ kind: 'written', payload: action.params.path }));

    await router.execute({ name: 'browser.open', params: { url: 'x' } }, context);
    const written = await router.execute({ name: 'filesystem.write', params: { path: 'out.txt' } }, context);

    expect(browser.callsFor('r')).toEqual(['browser.open']);
    expect(written).toEqual({ kind: 'written', payload: 'out.txt' });
    expect(router.namespaces()).toEqual(['browser', 'filesystem']);
  });

  it('fails with ActionFailure for an unknown namespace', async () => {
    const router = new CapabilityRouter();

    await expect(router.execute({ name: 'robot.move', params: {} }, context)).rejects.toThrow(ActionFailureError);
    await expect(router.execute({ name: 'robot.move', params: {} }, context)).rejects.toThrow(
      'Action failed: no capability registered for "robot"',
    );
  });

  it('rejects a second registration of a namespace', () => {
    const router = new CapabilityRouter().register('browser', new ScriptedCapability());

    expect(() => router.register('browser', new ScriptedCapability())).toThrow('already registered');
    expect(router.unregister('browser')).toBe(true);
  });
});
