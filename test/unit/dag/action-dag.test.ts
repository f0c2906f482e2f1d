import { describe, it, expect, beforeEach } from 'vitest';
import { CyclicOrderConstraintError } from '../../../src/core/errors.js';
import { ActionDAG } from '../../../src/dag/action-dag.js';

const act = (name: string, params: Record<string, string> = {}) => ({ name, params });

describe('ActionDAG', () => {
  let dag: ActionDAG;

  beforeEach(() => {
    dag = new ActionDAG();
  });

  it('assigns sequential node ids', () => {
    const a = dag.addNode(act('a'));
    const b = dag.addNode(act('b'), [a.id]);

    expect([a.id, b.id]).toEqual(['n1', 'n2']);
    expect(dag.predecessorsOf('n2')).toEqual(['n1']);
    expect(dag.dependentsOf('n1')).toEqual(['n2']);
    expect(b.status).toBe('PENDING');
  });

  it('rejects unknown predecessors', () => {
    expect(() => dag.addNode(act('a'), ['n9'])).toThrow('Unknown predecessor node: n9');
  });

  it('reports duplicate edges without adding them', () => {
    const a = dag.addNode(act('a'));
    const b = dag.addNode(act('b'), [a.id]);

    expect(dag.addEdge(a.id, b.id)).toBe(false);
    expect(dag.predecessorsOf(b.id)).toEqual([a.id]);
  });

  it('refuses an edge that would close a cycle', () => {
    const a = dag.addNode(act('a'));
    const b = dag.addNode(act('b'), [a.id]);
    const c = dag.addNode(act('c'), [b.id]);

    expect(dag.wouldCreateCycle(c.id, a.id)).toBe(true);
    expect(() => dag.addEdge(c.id, a.id)).toThrow(CyclicOrderConstraintError);
    try {
      dag.addEdge(c.id, a.id);
    } catch (err) {
      if (err instanceof CyclicOrderConstraintError) expect(err.cycle).toEqual(['n1', 'n2', 'n3', 'n1']);
    }
    expect(dag.hasEdge(c.id, a.id)).toBe(false);
  });

  it('orders a diamond topologically and in waves', () => {
    const a = dag.addNode(act('a'));
    const b = dag.addNode(act('b'), [a.id]);
    const c = dag.addNode(act('c'), [a.id]);
    dag.addNode(act('d'), [b.id, c.id]);

    expect(dag.topologicalOrder()).toEqual(['n1', 'n2', 'n3', 'n4']);
    expect(dag.waves()).toEqual([['n1'], ['n2', 'n3'], ['n4']]);
  });

  it('breaks topological ties by creation order', () => {
    const late = dag.addNode(act('late'));
    const early = dag.addNode(act('early'));
    dag.addEdge(early.id, late.id);

    expect(dag.topologicalOrder()).toEqual(['n2', 'n1']);
  });

  it('finds nodes by action name and by exact action', () => {
    dag.addNode(act('open', { url: 'a' }));
    dag.addNode(act('open', { url: 'b' }));

    expect(dag.findByAction('open').map(n => n.id)).toEqual(['n1', 'n2']);
    expect(dag.findAction(act('open', { url: 'b' }))?.id).toBe('n2');
    expect(dag.findAction(act('open', { url: 'c' }))).toBeUndefined();
  });

  it('resets statuses', () => {
    const a = dag.addNode(act('a'));
    dag.setStatus(a.id, 'FAILED');
    dag.resetStatuses();

    expect(dag.getNode(a.id)?.status).toBe('PENDING');
  });

  it('serializes nodes with their predecessors', () => {
    const a = dag.addNode(act('a'));
    dag.addNode(act('b'), [a.id]);

    expect(dag.toJSON()).toEqual({
      nodes: [
        { id: 'n1', action: act('a'), predecessors: [] },
        { id: 'n2', action: act('b'), predecessors: ['n1'] },
      ],
    });
  });
});
