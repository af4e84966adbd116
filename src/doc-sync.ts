import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { ConfigInvalidError, ConfigMissingError } from './errors.js';
import { containedPath } from './config.js';
import { writeFileAtomic } from './output.js';

const DocItemSchema = z.object({
  canonical_path: containedPath,
  target_path: containedPath,
  template: containedPath,
  required_reference: z.boolean().default(false),
  mode: z.string().trim().toLowerCase().pipe(z.enum(['excerpt', 'link-only'])).default('excerpt'),
});

export const DocRegistrySchema = z.object({
  source_repo: z.string().min(1),
  source_ref: z.string().min(1).default('main'),
  items: z.array(DocItemSchema).default([]),
});

export type DocRegistry = z.infer<typeof DocRegistrySchema>;

export type DocSyncOutcome = 'unchanged' | 'updated' | 'missing_canonical' | 'missing_template' | 'invalid';

export interface DocSyncResult {
  targetPath: string;
  outcome: DocSyncOutcome;
}

/** Outcomes that mean the registry and the repo disagree. */
export const FAILED_OUTCOMES: ReadonlySet<DocSyncOutcome> = new Set(['missing_canonical', 'missing_template', 'invalid']);

export function loadDocRegistry(path: string): DocRegistry {
  if (!existsSync(path)) throw new ConfigMissingError(`No doc registry at ${path}`);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigInvalidError(`Cannot parse ${path} as JSON`, { cause: err });
  }
  const result = DocRegistrySchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigInvalidError(`Invalid doc registry in ${path}: ${issues}`);
  }
  return result.data;
}

/** LF line endings, no trailing spaces, exactly one final newline. */
export function normalizeDoc(text: string): string {
  const lines = text.replace(/\r\n?/g, '\n').split('\n').map(line => line.trimEnd());
  return lines.join('\n').trimEnd() + '\n';
}

/** Replaces each `{KEY}` placeholder, in the order the keys are given. */
export function renderTemplate(template: string, subs: Record<string, string>): string {
  let out = template;
  for (const [key, value] of Object.entries(subs)) {
    out = out.split(`{${key}}`).join(value);
  }
  return out;
}

export function canonicalSourceUrl(sourceRepo: string, sourceRef: string, canonicalPath: string): string {
  return `https://github.com/${sourceRepo}/blob/${sourceRef}/${canonicalPath}`;
}

export interface SyncDocsOptions {
  registry: DocRegistry;
  /** Checkout holding the canonical documents. */
  sourceRoot: string;
  repoRoot: string;
  repoName: string;
  dryRun?: boolean;
}

/**
 * Renders each registry item's template with the canonical document (or only
 * a link to it, in `link-only` mode) and writes the target when it differs.
 */
export function syncDocs(options: SyncDocsOptions): DocSyncResult[] {
  const { registry, sourceRoot, repoRoot, repoName } = options;
  const results: DocSyncResult[] = [];

  for (const item of registry.items) {
    const targetPath = item.target_path;
    const canonicalFile = join(sourceRoot, item.canonical_path);
    if (!existsSync(canonicalFile)) {
      results.push({ targetPath, outcome: 'missing_canonical' });
      continue;
    }
    const templateFile = join(repoRoot, item.template);
    if (!existsSync(templateFile)) {
      results.push({ targetPath, outcome: 'missing_template' });
      continue;
    }

    const template = readFileSync(templateFile, 'utf-8');
    if (item.required_reference && !template.includes('{CANONICAL_SOURCE_URL}')) {
      results.push({ targetPath, outcome: 'invalid' });
      continue;
    }

    const canonical = normalizeDoc(readFileSync(canonicalFile, 'utf-8'));
    const rendered = normalizeDoc(renderTemplate(template, {
      REPO_NAME: repoName,
      CANONICAL_CONTENT: item.mode === 'link-only' ? '' : canonical,
      CANONICAL_SOURCE_URL: canonicalSourceUrl(registry.source_repo, registry.source_ref, item.canonical_path),
    }));

    const targetFile = join(repoRoot, targetPath);
    const current = existsSync(targetFile) ? normalizeDoc(readFileSync(targetFile, 'utf-8')) : '';
    if (current === rendered) {
      results.push({ targetPath, outcome: 'unchanged' });
      continue;
    }

    if (!options.dryRun) writeFileAtomic(targetFile, rendered);
    results.push({ targetPath, outcome: 'updated' });
  }

  return results;
}
