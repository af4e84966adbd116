import { existsSync, readdirSync, statSync } from 'fs';
import { join } from 'path';
import { FingerprintScanner } from './scanner.js';
import { contentDigest, serializeFingerprints } from './fingerprints.js';
import { writeFileAtomic } from './output.js';
import type { StampStore } from './stamp.js';
import type { ValidationRules } from './config.js';
import type { ScanError, ValidationMode, ValidationStamp } from './types.js';

export const REPO_FINGERPRINT_FILE = join('meta', 'files.jsonl');

// Never reported as unexpected root entries.
const IGNORED_ROOT_ENTRIES = new Set(['.git', '.github', '.gitignore', 'meta', '.DS_Store']);

export interface StructureCheck {
  issues: string[];
  warnings: string[];
}

/**
 * Layout check. In `build` mode unexpected root entries are warnings; in
 * `prod` they count as issues.
 */
export function checkStructure(repoRoot: string, rules: ValidationRules | undefined, mode: ValidationMode): StructureCheck {
  const issues: string[] = [];
  const warnings: string[] = [];

  if (!existsSync(repoRoot)) {
    return { issues: [`working copy not found at ${repoRoot}`], warnings };
  }

  for (const dir of rules?.required_dirs ?? []) {
    const abs = join(repoRoot, dir);
    if (!existsSync(abs) || !statSync(abs).isDirectory()) issues.push(`missing required directory: ${dir}`);
  }
  for (const file of rules?.required_files ?? []) {
    const abs = join(repoRoot, file);
    if (!existsSync(abs) || !statSync(abs).isFile()) issues.push(`missing required file: ${file}`);
  }

  const allowed = rules?.allowed_root_entries;
  if (allowed) {
    const allowedSet = new Set(allowed);
    const unexpected = readdirSync(repoRoot)
      .filter(name => !allowedSet.has(name) && !IGNORED_ROOT_ENTRIES.has(name))
      .sort();
    for (const name of unexpected) {
      if (mode === 'prod') issues.push(`unexpected root entry: ${name}`);
      else warnings.push(`unexpected root entry: ${name}`);
    }
  }

  return { issues, warnings };
}

export interface ValidateRepoOptions {
  repo: string;
  repoRoot: string;
  mode: ValidationMode;
  commit: string;
  rules?: ValidationRules;
  include?: string[];
  exclude?: string[];
  /** Extra files to fingerprint outside the include subtrees. */
  files?: string[];
  concurrency?: number;
  stamps: StampStore;
  now?: () => Date;
}

export interface ValidateRepoResult {
  check: StructureCheck;
  scanErrors: ScanError[];
  contentIndexHash: string | null;
  /** The stored stamp after merging, or null when validation failed. */
  stamp: ValidationStamp | null;
}

/**
 * Validates a working copy, writes its fingerprint file and, when the
 * structure passes, records a stamp for `commit` at `mode`.
 */
export async function validateRepo(options: ValidateRepoOptions): Promise<ValidateRepoResult> {
  const { repo, repoRoot, mode } = options;
  const check = checkStructure(repoRoot, options.rules, mode);
  if (!existsSync(repoRoot)) {
    return { check, scanErrors: [], contentIndexHash: null, stamp: null };
  }

  const scanner = new FingerprintScanner(repoRoot, repo, {
    include: options.include,
    exclude: options.exclude,
    files: options.files,
    concurrency: options.concurrency,
  });
  const scan = await scanner.scan();
  writeFileAtomic(join(repoRoot, REPO_FINGERPRINT_FILE), serializeFingerprints(scan.records));
  const contentIndexHash = contentDigest(scan.records);

  if (check.issues.length > 0) {
    return { check, scanErrors: scan.errors, contentIndexHash, stamp: null };
  }

  const stamp = options.stamps.record(repoRoot, {
    repo,
    commit: options.commit,
    highestMode: mode,
    contentIndexHash,
    validatedAt: (options.now ?? (() => new Date()))().toISOString(),
  });
  return { check, scanErrors: scan.errors, contentIndexHash, stamp };
}
