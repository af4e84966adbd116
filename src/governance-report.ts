import { existsSync } from 'fs';
import type { AggregatedIndex } from './aggregated-index.js';
import type { DependencyGraph } from './dependency-graph.js';
import type { StampStore } from './stamp.js';
import type { GovernanceReport, RepoNode, RepoStatus, SelfStatus, ValidationMode } from './types.js';

export interface SelfState {
  selfStatus: SelfStatus;
  highestMode: ValidationMode | null;
  hasStamp: boolean;
  problems: string[];
}

/** Where a configured repo stands on its own, before dependencies are considered. */
export function resolveSelfState(node: RepoNode, stamps: StampStore): SelfState {
  if (!existsSync(node.localPath)) {
    return {
      selfStatus: 'no_clone',
      highestMode: null,
      hasStamp: false,
      problems: [`CloneMissing: working copy not found at ${node.localPath}`],
    };
  }

  const lookup = stamps.read(node.localPath);
  switch (lookup.kind) {
    case 'ok':
      return { selfStatus: lookup.stamp.highestMode, highestMode: lookup.stamp.highestMode, hasStamp: true, problems: [] };
    case 'missing':
      return {
        selfStatus: 'no_stamp',
        highestMode: null,
        hasStamp: false,
        problems: [`StampMissing: no validation stamp at ${stamps.pathFor(node.localPath)}`],
      };
    case 'unreadable':
      return { selfStatus: 'no_stamp', highestMode: null, hasStamp: false, problems: [`StampUnreadable: ${lookup.error.message}`] };
    case 'unknown_mode':
      return { selfStatus: 'no_stamp', highestMode: null, hasStamp: false, problems: [`UnknownMode: ${lookup.error.message}`] };
  }
}

export interface ReportInput {
  graph: DependencyGraph;
  selfStates: Map<string, SelfState>;
  /** Fingerprint counts, for the "no metadata records" check. */
  index?: AggregatedIndex;
  now?: () => Date;
}

export function buildGovernanceReport(input: ReportInput): GovernanceReport {
  const { graph, selfStates } = input;
  const cycles = graph.detectCycles();
  const evaluation = graph.evaluate(name => selfStates.get(name)?.selfStatus ?? 'no_stamp', cycles);
  const counts = input.index?.countsByRepo() ?? {};

  const cycleMembers = new Set(cycles.flat());
  const repos: Record<string, RepoStatus> = {};

  for (const name of graph.allNames()) {
    const dependencies = graph.dependenciesOf(name);
    const evaluated = evaluation.get(name);
    const selfStatus = evaluated?.selfStatus ?? 'unconfigured';
    const depsOk = evaluated?.depsOk ?? false;

    if (!graph.has(name)) {
      repos[name] = {
        selfStatus: 'unconfigured',
        highestMode: null,
        hasStamp: false,
        dependencies,
        depsOk: false,
        problems: [`${name} is referenced as a dependency but is not configured`],
      };
      continue;
    }

    const state = selfStates.get(name);
    const problems = [...(state?.problems ?? [])];

    if (selfStatus !== 'no_clone' && input.index && (counts[name] ?? 0) === 0) {
      problems.push('no metadata records found');
    }
    if (cycleMembers.has(name)) {
      problems.push('CycleDetected: part of a dependency cycle');
    }
    for (const dep of dependencies) {
      const depStatus = evaluation.get(dep);
      if (!graph.has(dep)) {
        problems.push(`dependency ${dep} is not configured`);
      } else if (depStatus?.selfStatus !== 'prod') {
        problems.push(`dependency ${dep} is ${depStatus?.selfStatus ?? 'unknown'}, not prod`);
      } else if (!depStatus.depsOk) {
        problems.push(`dependency ${dep} has unsatisfied dependencies`);
      }
    }

    repos[name] = {
      selfStatus,
      highestMode: state?.highestMode ?? null,
      hasStamp: state?.hasStamp ?? false,
      dependencies,
      depsOk,
      problems,
    };
  }

  const degraded = cycles.length > 0 || Object.values(repos).some(r => r.problems.length > 0);

  return {
    generatedAt: (input.now ?? (() => new Date()))().toISOString(),
    repos,
    cycles,
    missingRepos: graph.missingRepos(),
    unusedRepos: graph.unusedRepos(),
    overallStatus: degraded ? 'degraded' : 'ok',
  };
}

export interface StatusDocument {
  generated_at: string;
  repos: Record<string, {
    self_status: SelfStatus;
    highest_mode: ValidationMode | null;
    has_stamp: boolean;
    dependencies: string[];
    deps_ok: boolean;
    problems: string[];
  }>;
  cycles: string[][];
  missing_repos: string[];
  unused_repos: string[];
  overall_status: GovernanceReport['overallStatus'];
}

export function toStatusDocument(report: GovernanceReport): StatusDocument {
  const repos: StatusDocument['repos'] = {};
  for (const [name, r] of Object.entries(report.repos)) {
    repos[name] = {
      self_status: r.selfStatus,
      highest_mode: r.highestMode,
      has_stamp: r.hasStamp,
      dependencies: r.dependencies,
      deps_ok: r.depsOk,
      problems: r.problems,
    };
  }
  return {
    generated_at: report.generatedAt,
    repos,
    cycles: report.cycles,
    missing_repos: report.missingRepos,
    unused_repos: report.unusedRepos,
    overall_status: report.overallStatus,
  };
}

export interface GraphDocument {
  generated_at: string;
  nodes: Array<{ name: string; path: string; depends_on: string[]; file_count: number }>;
  edges: Array<{ from: string; to: string }>;
  cycles: string[][];
}

export function toGraphDocument(graph: DependencyGraph, report: GovernanceReport, index?: AggregatedIndex): GraphDocument {
  const counts = index?.countsByRepo() ?? {};
  const nodes: GraphDocument['nodes'] = [];
  for (const name of graph.allNames()) {
    const node = graph.node(name);
    if (!node) continue;
    nodes.push({
      name,
      path: node.localPath,
      depends_on: graph.dependenciesOf(name),
      file_count: counts[name] ?? 0,
    });
  }
  return { generated_at: report.generatedAt, nodes, edges: graph.edges(), cycles: report.cycles };
}
