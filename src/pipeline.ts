import { existsSync, readFileSync } from 'fs';
import { join, posix, relative, sep } from 'path';
import { AggregatedIndex } from './aggregated-index.js';
import { DependencyGraph } from './dependency-graph.js';
import { FingerprintScanner, comparePaths } from './scanner.js';
import { parseFingerprints, serializeFingerprints } from './fingerprints.js';
import { buildGovernanceReport, resolveSelfState, toGraphDocument, toStatusDocument } from './governance-report.js';
import { loadCanonicalSet, planPath, planRepairs, writePlan } from './repair-planner.js';
import { writeFileAtomic, writeJson } from './output.js';
import { toRepoNodes, repoRoot } from './config.js';
import type { LoadedConfig, RepoConfig } from './config.js';
import type { CanonicalLoad } from './repair-planner.js';
import type { ScanResult } from './scanner.js';
import type { SelfState } from './governance-report.js';
import type { StampStore } from './stamp.js';
import type { GovernanceReport, RepairPlan } from './types.js';

export type PipelineLog = (message: string) => void;

export const OUTPUT_PATHS = {
  aggregated: join('meta', 'aggregated_files.jsonl'),
  graph: join('meta', 'dependency_graph.json'),
  status: join('meta', 'dependency_status.json'),
} as const;

export function repoFingerprintPath(hubRoot: string, repo: string): string {
  return join(hubRoot, 'repos', repo, 'files.jsonl');
}

interface PipelineComponents {
  loaded: LoadedConfig;
  stamps: StampStore;
  log?: PipelineLog;
  now?: () => Date;
}

export interface PipelineResult {
  index: AggregatedIndex;
  report: GovernanceReport;
  plans: Map<string, RepairPlan | null>;
  filesScanned: number;
  scanErrors: number;
}

/**
 * One governance run over the configured fleet:
 * scan → stamps → graph → repair plans. Configuration is loaded by the
 * caller, so a missing config never reaches this point.
 */
export class Pipeline {
  private canonicalSets = new Map<string, CanonicalLoad>();

  constructor(private components: PipelineComponents) {}

  async runFull(): Promise<PipelineResult> {
    const { loaded, stamps } = this.components;
    const { hubRoot, config } = loaded;
    const log = this.components.log ?? (() => {});
    const now = this.components.now ?? (() => new Date());
    this.canonicalSets.clear();

    // Phase 1: Scan
    log(`Phase 1/4: Fingerprinting ${config.repos.length} repositories...`);
    const index = new AggregatedIndex();
    let filesScanned = 0;
    let scanErrors = 0;
    for (const repo of config.repos) {
      const root = repoRoot(hubRoot, repo);
      const fingerprintPath = repoFingerprintPath(hubRoot, repo.name);

      if (!existsSync(root)) {
        if (existsSync(fingerprintPath)) {
          const parsed = parseFingerprints(readFileSync(fingerprintPath, 'utf-8'));
          index.setRepo(repo.name, parsed.records);
          log(`  ${repo.name}: no working copy, reusing ${parsed.records.length} stored records`);
        } else {
          log(`  ${repo.name}: no working copy at ${root}`);
        }
        continue;
      }

      const scan = await this.scanRepo(repo);
      for (const err of scan.errors) log(`  ${repo.name}: could not read ${err.path}: ${err.message}`);
      writeFileAtomic(fingerprintPath, serializeFingerprints(scan.records));
      index.setRepo(repo.name, scan.records);
      filesScanned += scan.records.length;
      scanErrors += scan.errors.length;
      log(`  ${repo.name}: ${scan.records.length} files (${scan.errors.length} unreadable)`);
    }
    for (const warning of index.getWarnings()) log(`  index: ${warning.message}`);
    index.write(join(hubRoot, OUTPUT_PATHS.aggregated));

    // Phase 2: Stamps
    log('Phase 2/4: Reading validation stamps...');
    const nodes = toRepoNodes(hubRoot, config);
    const selfStates = new Map<string, SelfState>();
    for (const node of nodes) {
      const state = resolveSelfState(node, stamps);
      selfStates.set(node.name, state);
      log(`  ${node.name}: ${state.selfStatus}`);
    }

    // Phase 3: Graph
    log('Phase 3/4: Evaluating dependency graph...');
    const graph = new DependencyGraph(nodes);
    const report = buildGovernanceReport({ graph, selfStates, index, now });
    for (const cycle of report.cycles) log(`  cycle: ${cycle.join(' -> ')}`);
    if (report.missingRepos.length > 0) log(`  missing repos: ${report.missingRepos.join(', ')}`);
    writeJson(join(hubRoot, OUTPUT_PATHS.graph), toGraphDocument(graph, report, index));
    writeJson(join(hubRoot, OUTPUT_PATHS.status), toStatusDocument(report));
    log(`  Overall status: ${report.overallStatus}`);

    // Phase 4: Repair plans
    log('Phase 4/4: Planning canonical repairs...');
    const plans = new Map<string, RepairPlan | null>();
    for (const repo of config.repos) {
      if (!repo.canonical && Object.keys(repo.relocations).length === 0) continue;
      const plan = await this.planFor(repo, index, now);
      plans.set(repo.name, plan);
      if (!plan) {
        log(`  ${repo.name}: not indexed, no plan`);
        continue;
      }
      writePlan(planPath(hubRoot, repo.name), plan);
      log(`  ${repo.name}: ${plan.actions.length === 0 ? 'no drift' : `${plan.actions.length} actions`}`);
    }

    return { index, report, plans, filesScanned, scanErrors };
  }

  /**
   * Fingerprints a working copy. Besides the allow-listed subtrees, every
   * canonical path and relocation endpoint is tracked, so plans can see them.
   */
  async scanRepo(repo: RepoConfig): Promise<ScanResult> {
    const { hubRoot, config } = this.components.loaded;
    const scanner = new FingerprintScanner(repoRoot(hubRoot, repo), repo.name, {
      include: repo.include ?? config.include,
      exclude: config.exclude,
      files: await this.trackedFiles(repo),
      concurrency: config.hashConcurrency,
    });
    return scanner.scan();
  }

  async trackedFiles(repo: RepoConfig): Promise<string[]> {
    const canonical = await this.canonicalFor(repo);
    const relocated = Object.entries(repo.relocations).flat();
    return [...new Set([...canonical.files.keys(), ...relocated])].sort(comparePaths);
  }

  async planFor(repo: RepoConfig, index: AggregatedIndex, now: () => Date = () => new Date()): Promise<RepairPlan | null> {
    const { hubRoot } = this.components.loaded;
    const canonicalRoot = repo.canonical?.root;
    const canonical = await this.canonicalFor(repo);

    return planRepairs({
      repo: repo.name,
      canonicalRoot: canonicalRoot ? toPosix(relative(hubRoot, join(hubRoot, canonicalRoot))) : '',
      canonical: canonical.files,
      index,
      relocations: repo.relocations,
      now,
    });
  }

  /** The hub's canonical set for `repo`, hashed once per pipeline. */
  private async canonicalFor(repo: RepoConfig): Promise<CanonicalLoad> {
    const cached = this.canonicalSets.get(repo.name);
    if (cached) return cached;

    const { hubRoot, config } = this.components.loaded;
    const canonical = repo.canonical
      ? await loadCanonicalSet(join(hubRoot, repo.canonical.root), config.hashConcurrency)
      : { files: new Map<string, string>(), errors: [] };
    for (const err of canonical.errors) {
      this.components.log?.(`  ${repo.name}: could not read canonical ${err.path}: ${err.message}`);
    }
    this.canonicalSets.set(repo.name, canonical);
    return canonical;
  }
}

function toPosix(p: string): string {
  return p.split(sep).join(posix.sep);
}
