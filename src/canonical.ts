import { copyFileSync, existsSync, mkdirSync, statSync } from 'fs';
import { dirname, join } from 'path';

export interface ExportResult {
  copied: string[];
  skipped: string[];
}

/**
 * Copies the listed surface files of a repo into the hub's canonical root,
 * keeping their relative paths. Missing sources are skipped and reported.
 */
export function exportCanonical(repoRoot: string, canonicalRoot: string, files: readonly string[]): ExportResult {
  const copied: string[] = [];
  const skipped: string[] = [];

  for (const rel of files) {
    const src = join(repoRoot, rel);
    if (!existsSync(src) || !statSync(src).isFile()) {
      skipped.push(rel);
      continue;
    }
    const dst = join(canonicalRoot, rel);
    mkdirSync(dirname(dst), { recursive: true });
    copyFileSync(src, dst);
    copied.push(rel);
  }

  return { copied, skipped };
}
