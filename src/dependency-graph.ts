import { comparePaths } from './scanner.js';
import type { RepoNode, SelfStatus } from './types.js';

export interface NodeEvaluation {
  selfStatus: SelfStatus;
  depsOk: boolean;
}

export interface GraphEdge {
  from: string;
  to: string;
}

type Color = 'unvisited' | 'on_stack' | 'done';

/**
 * Repository dependency graph. Nodes are the configured repos; edges may
 * point at names that were never configured (reported by `missingRepos`).
 */
export class DependencyGraph {
  private nodes = new Map<string, RepoNode>();
  private adjacency = new Map<string, string[]>();

  constructor(nodes: readonly RepoNode[]) {
    for (const node of nodes) {
      this.nodes.set(node.name, node);
      this.adjacency.set(node.name, [...node.declaredDependencies]);
    }
  }

  has(name: string): boolean {
    return this.nodes.has(name);
  }

  node(name: string): RepoNode | undefined {
    return this.nodes.get(name);
  }

  dependenciesOf(name: string): string[] {
    return [...(this.adjacency.get(name) ?? [])];
  }

  edges(): GraphEdge[] {
    const edges: GraphEdge[] = [];
    for (const [from, deps] of this.adjacency) {
      for (const to of deps) edges.push({ from, to });
    }
    return edges;
  }

  /** Configured names plus every name referenced as a dependency, sorted. */
  allNames(): string[] {
    const names = new Set(this.nodes.keys());
    for (const deps of this.adjacency.values()) deps.forEach(d => names.add(d));
    return [...names].sort(comparePaths);
  }

  missingRepos(): string[] {
    return this.allNames().filter(n => !this.nodes.has(n));
  }

  unusedRepos(): string[] {
    const referenced = new Set<string>();
    for (const deps of this.adjacency.values()) deps.forEach(d => referenced.add(d));
    return [...this.nodes.keys()].filter(n => !referenced.has(n)).sort(comparePaths);
  }

  /**
   * Every distinct cycle, each closed on itself (`[a, b, a]`). Rotations of
   * one cycle are reported once.
   */
  detectCycles(): string[][] {
    const color = new Map<string, Color>();
    const stack: string[] = [];
    const cycles: string[][] = [];
    const seen = new Set<string>();

    const visit = (name: string): void => {
      color.set(name, 'on_stack');
      stack.push(name);

      for (const dep of this.adjacency.get(name) ?? []) {
        if (!this.nodes.has(dep)) continue;
        const state = color.get(dep) ?? 'unvisited';
        if (state === 'on_stack') {
          const cycle = [...stack.slice(stack.indexOf(dep)), dep];
          const key = cycleKey(cycle);
          if (!seen.has(key)) {
            seen.add(key);
            cycles.push(cycle);
          }
        } else if (state === 'unvisited') {
          visit(dep);
        }
      }

      stack.pop();
      color.set(name, 'done');
    };

    for (const name of this.nodes.keys()) {
      if ((color.get(name) ?? 'unvisited') === 'unvisited') visit(name);
    }
    return cycles;
  }

  /**
   * Computes `depsOk` for every node by fixed-point iteration. Cycle members
   * and unconfigured names are pinned false; everything else starts true and
   * can only drop to false, so the loop ends after at most V rounds.
   */
  evaluate(
    statusOf: (name: string) => SelfStatus,
    cycles: readonly string[][] = this.detectCycles(),
  ): Map<string, NodeEvaluation> {
    const names = this.allNames();
    const selfStatus = new Map<string, SelfStatus>();
    for (const name of names) {
      selfStatus.set(name, this.nodes.has(name) ? statusOf(name) : 'unconfigured');
    }

    const pinned = new Set<string>(cycles.flat());
    for (const name of names) {
      if (!this.nodes.has(name)) pinned.add(name);
    }

    const depsOk = new Map<string, boolean>();
    for (const name of names) depsOk.set(name, !pinned.has(name));

    let changed = true;
    while (changed) {
      changed = false;
      for (const name of names) {
        if (!depsOk.get(name)) continue;
        const satisfied = this.dependenciesOf(name).every(dep =>
          this.nodes.has(dep) && selfStatus.get(dep) === 'prod' && depsOk.get(dep) === true);
        if (!satisfied) {
          depsOk.set(name, false);
          changed = true;
        }
      }
    }

    const result = new Map<string, NodeEvaluation>();
    for (const name of names) {
      result.set(name, {
        selfStatus: selfStatus.get(name) ?? 'unconfigured',
        depsOk: depsOk.get(name) ?? false,
      });
    }
    return result;
  }
}

function cycleKey(cycle: readonly string[]): string {
  const ring = cycle.slice(0, -1);
  let best = ring;
  for (let i = 1; i < ring.length; i++) {
    const rotated = [...ring.slice(i), ...ring.slice(0, i)];
    if (rotated.join('\u0000') < best.join('\u0000')) best = rotated;
  }
  return best.join('\u0000');
}
