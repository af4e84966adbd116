import { describe, it, expect } from 'vitest';
import { DependencyGraph } from './dependency-graph.js';
import type { RepoNode, SelfStatus } from './types.js';

function node(name: string, deps: string[] = []): RepoNode {
  return { name, localPath: `/fleet/${name}`, declaredDependencies: new Set(deps) };
}

function statuses(map: Record<string, SelfStatus>): (name: string) => SelfStatus {
  return name => map[name] ?? 'no_stamp';
}

describe('DependencyGraph.detectCycles', () => {
  it('finds a three-node cycle exactly once', () => {
    const graph = new DependencyGraph([node('A', ['B']), node('B', ['C']), node('C', ['A'])]);
    const cycles = graph.detectCycles();

    expect(cycles).toHaveLength(1);
    expect(cycles[0]).toEqual(['A', 'B', 'C', 'A']);
    expect(new Set(cycles[0])).toEqual(new Set(['A', 'B', 'C']));
  });

  it('reports a self-dependency as a cycle', () => {
    const graph = new DependencyGraph([node('A', ['A'])]);
    expect(graph.detectCycles()).toEqual([['A', 'A']]);
  });

  it('finds every distinct cycle', () => {
    const graph = new DependencyGraph([
      node('A', ['B']), node('B', ['A']),
      node('C', ['D']), node('D', ['C']),
      node('E', ['A']),
    ]);
    expect(graph.detectCycles()).toEqual([['A', 'B', 'A'], ['C', 'D', 'C']]);
  });

  it('returns nothing for an acyclic graph with shared dependencies', () => {
    const graph = new DependencyGraph([node('A', ['B', 'C']), node('B', ['C']), node('C')]);
    expect(graph.detectCycles()).toEqual([]);
  });

  it('does not follow edges to unconfigured repos', () => {
    const graph = new DependencyGraph([node('A', ['Ghost'])]);
    expect(graph.detectCycles()).toEqual([]);
  });
});

describe('DependencyGraph anomalies', () => {
  it('lists missing and unused repos', () => {
    const graph = new DependencyGraph([node('A', ['B', 'Ghost']), node('B'), node('Lonely')]);
    expect(graph.missingRepos()).toEqual(['Ghost']);
    expect(graph.unusedRepos()).toEqual(['A', 'Lonely']);
    expect(graph.allNames()).toEqual(['A', 'B', 'Ghost', 'Lonely']);
  });

  it('exposes edges in declaration order', () => {
    const graph = new DependencyGraph([node('A', ['B', 'C']), node('B')]);
    expect(graph.edges()).toEqual([{ from: 'A', to: 'B' }, { from: 'A', to: 'C' }]);
  });
});

describe('DependencyGraph.evaluate', () => {
  it('passes a repo whose dependency is prod', () => {
    const graph = new DependencyGraph([node('A', ['B']), node('B')]);
    const result = graph.evaluate(statuses({ A: 'build', B: 'prod' }));
    expect(result.get('A')).toEqual({ selfStatus: 'build', depsOk: true });
  });

  it('fails a repo whose dependency is only build', () => {
    const graph = new DependencyGraph([node('A', ['B']), node('B')]);
    expect(graph.evaluate(statuses({ A: 'prod', B: 'build' })).get('A')?.depsOk).toBe(false);
  });

  it('treats a repo without dependencies as satisfied', () => {
    const graph = new DependencyGraph([node('A')]);
    expect(graph.evaluate(statuses({ A: 'no_stamp' })).get('A')?.depsOk).toBe(true);
  });

  it('propagates failure through a chain of dependencies', () => {
    const graph = new DependencyGraph([node('A', ['B']), node('B', ['C']), node('C', ['D']), node('D')]);
    const result = graph.evaluate(statuses({ A: 'prod', B: 'prod', C: 'prod', D: 'build' }));

    expect(result.get('C')?.depsOk).toBe(false);
    expect(result.get('B')?.depsOk).toBe(false);
    expect(result.get('A')?.depsOk).toBe(false);
    expect(result.get('D')?.depsOk).toBe(true);
  });

  it('passes a chain where everything is prod', () => {
    const graph = new DependencyGraph([node('A', ['B']), node('B', ['C']), node('C')]);
    const result = graph.evaluate(statuses({ A: 'prod', B: 'prod', C: 'prod' }));
    expect([...result.values()].every(r => r.depsOk)).toBe(true);
  });

  it('fails repos depending on an unconfigured repo', () => {
    const graph = new DependencyGraph([node('A', ['Ghost'])]);
    const result = graph.evaluate(statuses({ A: 'prod' }));

    expect(result.get('A')?.depsOk).toBe(false);
    expect(result.get('Ghost')).toEqual({ selfStatus: 'unconfigured', depsOk: false });
  });

  it('pins every cycle member to false even when all are prod', () => {
    const graph = new DependencyGraph([node('A', ['B']), node('B', ['C']), node('C', ['A']), node('D', ['A'])]);
    const result = graph.evaluate(statuses({ A: 'prod', B: 'prod', C: 'prod', D: 'prod' }));

    expect(result.get('A')?.depsOk).toBe(false);
    expect(result.get('B')?.depsOk).toBe(false);
    expect(result.get('C')?.depsOk).toBe(false);
    expect(result.get('D')?.depsOk).toBe(false);
  });

  it('fails repos whose dependency has no clone or stamp', () => {
    const graph = new DependencyGraph([node('A', ['B', 'C']), node('B'), node('C')]);
    const result = graph.evaluate(statuses({ A: 'prod', B: 'prod', C: 'no_clone' }));
    expect(result.get('A')?.depsOk).toBe(false);
  });
});
