import { copyFileSync, existsSync, mkdirSync, readFileSync, renameSync } from 'fs';
import { dirname, join, posix } from 'path';
import { z } from 'zod';
import { FingerprintScanner, comparePaths } from './scanner.js';
import { resolveInside, writeJson } from './output.js';
import { errorMessage } from './errors.js';
import type { AggregatedIndex } from './aggregated-index.js';
import type { RepairAction, RepairPlan, ScanError } from './types.js';

/** Relative path → content hash of the hub's authoritative copy. */
export type CanonicalSet = Map<string, string>;

export interface CanonicalLoad {
  files: CanonicalSet;
  errors: ScanError[];
}

export async function loadCanonicalSet(canonicalRoot: string, concurrency?: number): Promise<CanonicalLoad> {
  if (!existsSync(canonicalRoot)) return { files: new Map(), errors: [] };
  const scanner = new FingerprintScanner(canonicalRoot, 'canonical', { include: ['.'], concurrency });
  const result = await scanner.scan();
  return {
    files: new Map(result.records.map(r => [r.relativePath, r.contentHash])),
    errors: result.errors,
  };
}

export interface PlanInput {
  repo: string;
  /** Canonical root as recorded in the plan (relative to the hub root). */
  canonicalRoot: string;
  canonical: CanonicalSet;
  index: AggregatedIndex;
  relocations?: Record<string, string>;
  now?: () => Date;
}

export function actionTarget(action: RepairAction): string {
  return action.type === 'write_file' ? action.targetPath : action.toPath;
}

/**
 * Pulls a repo toward the canonical set. Files the repo has beyond the
 * canonical set are left alone. Returns null when the repo is not indexed.
 */
export function planRepairs(input: PlanInput): RepairPlan | null {
  const { repo, canonical, index } = input;
  if (!index.has(repo)) return null;

  const actions: RepairAction[] = [];
  for (const [path, hash] of canonical) {
    const record = index.lookup(repo, path);
    if (record && record.contentHash === hash) continue;
    actions.push({
      type: 'write_file',
      targetPath: path,
      canonicalPath: posix.join(input.canonicalRoot, path),
      reason: record ? 'hash_mismatch' : 'missing_in_repo',
    });
  }

  for (const [fromPath, toPath] of Object.entries(input.relocations ?? {})) {
    if (canonical.has(toPath)) continue;
    if (index.lookup(repo, fromPath) && !index.lookup(repo, toPath)) {
      actions.push({ type: 'move_file', fromPath, toPath });
    }
  }

  actions.sort((a, b) => comparePaths(actionTarget(a), actionTarget(b)));

  return {
    repo,
    generatedAt: (input.now ?? (() => new Date()))().toISOString(),
    canonicalRoot: input.canonicalRoot,
    actions,
  };
}

// Plan documents

const ActionDocumentSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('write_file'),
    target_path: z.string().min(1),
    canonical_path: z.string().min(1),
    reason: z.enum(['missing_in_repo', 'hash_mismatch']),
  }),
  z.object({
    type: z.literal('move_file'),
    from_path: z.string().min(1),
    to_path: z.string().min(1),
  }),
]);

const PlanDocumentSchema = z.object({
  repo: z.string(),
  generated_at: z.string(),
  canonical_root: z.string(),
  actions: z.array(ActionDocumentSchema),
});

export type PlanDocument = z.infer<typeof PlanDocumentSchema>;

export function toPlanDocument(plan: RepairPlan): PlanDocument {
  return {
    repo: plan.repo,
    generated_at: plan.generatedAt,
    canonical_root: plan.canonicalRoot,
    actions: plan.actions.map(a => a.type === 'write_file'
      ? { type: a.type, target_path: a.targetPath, canonical_path: a.canonicalPath, reason: a.reason }
      : { type: a.type, from_path: a.fromPath, to_path: a.toPath }),
  };
}

export function fromPlanDocument(doc: PlanDocument): RepairPlan {
  return {
    repo: doc.repo,
    generatedAt: doc.generated_at,
    canonicalRoot: doc.canonical_root,
    actions: doc.actions.map((a): RepairAction => a.type === 'write_file'
      ? { type: a.type, targetPath: a.target_path, canonicalPath: a.canonical_path, reason: a.reason }
      : { type: a.type, fromPath: a.from_path, toPath: a.to_path }),
  };
}

export function planPath(hubRoot: string, repo: string): string {
  return join(hubRoot, 'repairs', repo, 'repair_plan.json');
}

export function writePlan(path: string, plan: RepairPlan): void {
  writeJson(path, toPlanDocument(plan));
}

export function readPlan(path: string): RepairPlan {
  return fromPlanDocument(PlanDocumentSchema.parse(JSON.parse(readFileSync(path, 'utf-8'))));
}

// Applying plans

export interface AppliedAction {
  action: RepairAction;
  outcome: 'applied' | 'skipped' | 'failed';
  message?: string;
}

/**
 * Applies `plan` to the working copy at `repoRoot`. Canonical paths resolve
 * against `hubRoot`. An action whose path leaves its root fails. Each action
 * is independent: one failure does not stop the rest.
 */
export function applyRepairPlan(plan: RepairPlan, repoRoot: string, hubRoot: string): AppliedAction[] {
  return plan.actions.map(action => {
    try {
      if (action.type === 'write_file') {
        const target = resolveInside(repoRoot, action.targetPath);
        const source = resolveInside(hubRoot, action.canonicalPath);
        mkdirSync(dirname(target), { recursive: true });
        copyFileSync(source, target);
        return { action, outcome: 'applied' };
      }

      const from = resolveInside(repoRoot, action.fromPath);
      const to = resolveInside(repoRoot, action.toPath);
      if (!existsSync(from)) return { action, outcome: 'skipped', message: 'source no longer exists' };
      if (existsSync(to)) return { action, outcome: 'skipped', message: 'destination already exists' };
      mkdirSync(dirname(to), { recursive: true });
      renameSync(from, to);
      return { action, outcome: 'applied' };
    } catch (err) {
      return { action, outcome: 'failed', message: errorMessage(err) };
    }
  });
}
