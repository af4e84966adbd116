import { mkdirSync, renameSync, writeFileSync } from 'fs';
import { dirname, isAbsolute, relative, resolve, sep } from 'path';
import { UsageError } from './errors.js';

/**
 * Replaces `path` whole: the content goes to a sibling temp file that is then
 * renamed over the target, so readers never see a partial document.
 */
export function writeFileAtomic(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  const tmp = `${path}.${process.pid}.tmp`;
  writeFileSync(tmp, content);
  renameSync(tmp, path);
}

export function writeJson(path: string, data: unknown): void {
  writeFileAtomic(path, JSON.stringify(data, null, 2) + '\n');
}

/** Absolute form of `rel` under `root`; throws when it would land outside. */
export function resolveInside(root: string, rel: string): string {
  const base = resolve(root);
  const abs = resolve(base, rel);
  const fromBase = relative(base, abs);
  if (fromBase === '' || fromBase === '..' || fromBase.startsWith(`..${sep}`) || isAbsolute(fromBase)) {
    throw new UsageError(`path "${rel}" resolves outside ${base}`);
  }
  return abs;
}
