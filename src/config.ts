import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join, resolve } from 'path';
import { z } from 'zod';
import { ConfigInvalidError, ConfigMissingError } from './errors.js';
import { normalizeRelative } from './scanner.js';
import type { RepoNode } from './types.js';

export const CONFIG_CANDIDATES = ['fleet.config.json', join('tools', 'repos_config.json')];

const relativePath = z.string().min(1);

/** A path that stays inside the tree it is relative to. */
export const containedPath = z.string().min(1).refine(
  p => Boolean(normalizeRelative(p)),
  'must be a relative path that stays inside its root',
);

/** Like containedPath, but `.` (the root itself) is allowed. */
const containedSubtree = z.string().min(1).refine(
  p => normalizeRelative(p) !== null,
  'must be a relative path that stays inside its root',
);

const ValidationRulesSchema = z.object({
  required_dirs: z.array(containedPath).default([]),
  required_files: z.array(containedPath).default([]),
  allowed_root_entries: z.array(relativePath).optional(),
});

const CanonicalSchema = z.object({
  root: containedPath,
  files: z.array(containedPath).default([]),
});

const RepoConfigSchema = z.object({
  name: z.string().min(1),
  path: relativePath,
  depends_on: z.array(z.string().min(1)).default([]),
  include: z.array(containedSubtree).optional(),
  canonical: CanonicalSchema.optional(),
  relocations: z.record(containedPath, containedPath).default({}),
  validation: ValidationRulesSchema.optional(),
});

export const HubConfigSchema = z
  .object({
    include: z.array(containedSubtree).default(['src', 'tools']),
    exclude: z.array(z.string()).default([]),
    hashConcurrency: z.number().int().positive().default(8),
    repos: z.array(RepoConfigSchema),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.repos.forEach((repo, i) => {
      if (seen.has(repo.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate repo name "${repo.name}"`,
          path: ['repos', i, 'name'],
        });
      }
      seen.add(repo.name);
    });
  });

export type HubConfig = z.infer<typeof HubConfigSchema>;
export type RepoConfig = HubConfig['repos'][number];
export type ValidationRules = z.infer<typeof ValidationRulesSchema>;

export interface LoadedConfig {
  hubRoot: string;
  configPath: string;
  config: HubConfig;
}

export function findConfigPath(hubRoot: string, explicitPath?: string): string | null {
  if (explicitPath) {
    const abs = isAbsolute(explicitPath) ? explicitPath : resolve(hubRoot, explicitPath);
    return existsSync(abs) ? abs : null;
  }
  for (const candidate of CONFIG_CANDIDATES) {
    const abs = join(hubRoot, candidate);
    if (existsSync(abs)) return abs;
  }
  return null;
}

export function parseConfig(raw: unknown, source: string): HubConfig {
  const result = HubConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigInvalidError(`Invalid configuration in ${source}: ${issues}`, {
      details: { path: source },
    });
  }
  return result.data;
}

export function loadConfig(hubRoot: string, explicitPath?: string): LoadedConfig {
  const configPath = findConfigPath(hubRoot, explicitPath);
  if (!configPath) {
    const searched = explicitPath ? [explicitPath] : CONFIG_CANDIDATES;
    throw new ConfigMissingError(
      `No hub configuration found under ${hubRoot} (looked for ${searched.join(', ')})`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigInvalidError(`Cannot parse ${configPath} as JSON`, { cause: err });
  }

  const config = parseConfig(raw, configPath);
  const envConcurrency = process.env.FLEETGOV_HASH_CONCURRENCY;
  if (envConcurrency) {
    const parsed = parseInt(envConcurrency, 10);
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new ConfigInvalidError(`FLEETGOV_HASH_CONCURRENCY must be a positive integer, got "${envConcurrency}"`);
    }
    config.hashConcurrency = parsed;
  }

  return { hubRoot, configPath, config };
}

export function repoRoot(hubRoot: string, repo: RepoConfig): string {
  return isAbsolute(repo.path) ? repo.path : resolve(hubRoot, repo.path);
}

export function findRepo(config: HubConfig, name: string): RepoConfig | undefined {
  return config.repos.find(r => r.name === name);
}

export function toRepoNodes(hubRoot: string, config: HubConfig): RepoNode[] {
  return config.repos.map(repo => ({
    name: repo.name,
    localPath: repoRoot(hubRoot, repo),
    declaredDependencies: new Set(repo.depends_on),
  }));
}
