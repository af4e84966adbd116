import { readdirSync, existsSync, statSync, createReadStream } from 'fs';
import { join, posix } from 'path';
import { createHash } from 'crypto';
import ignore from 'ignore';
import { ConcurrencyLimiter } from './limiter.js';
import { errorMessage } from './errors.js';
import type { FileRecord, ScanError } from './types.js';

export interface ScanResult {
  repo: string;
  rootPath: string;
  observedAt: string;
  records: FileRecord[];
  errors: ScanError[];
}

export interface ScannerOptions {
  /** Subtrees to walk, relative to the root. `.` walks the whole tree. */
  include?: string[];
  exclude?: string[];
  /** Individual files fingerprinted wherever they sit, when present. */
  files?: string[];
  concurrency?: number;
  /** Content digest of one file; defaults to streaming SHA-256. */
  hasher?: (absPath: string) => Promise<string>;
}

export const DEFAULT_INCLUDE = ['src', 'tools'];
export const HASH_CHUNK_BYTES = 64 * 1024;

const DEFAULT_IGNORE = [
  '.git', '.svn', '.hg',
  '__pycache__', '.pytest_cache', '.mypy_cache', '.ruff_cache', '.tox',
  'node_modules', '.DS_Store', 'Thumbs.db', '*.pyc',
];

export async function hashFile(absPath: string): Promise<string> {
  const hash = createHash('sha256');
  const stream = createReadStream(absPath, { highWaterMark: HASH_CHUNK_BYTES });
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export function hashText(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

export class FingerprintScanner {
  private ig: ReturnType<typeof ignore>;
  private include: string[];
  private files: string[];
  private limiter: ConcurrencyLimiter;
  private hasher: (absPath: string) => Promise<string>;

  constructor(
    private rootPath: string,
    private repo: string,
    options: ScannerOptions = {},
  ) {
    this.ig = ignore();
    this.ig.add(DEFAULT_IGNORE);
    if (options.exclude?.length) this.ig.add(options.exclude);
    this.include = options.include ?? DEFAULT_INCLUDE;
    this.files = options.files ?? [];
    this.limiter = new ConcurrencyLimiter(options.concurrency ?? 8);
    this.hasher = options.hasher ?? hashFile;
  }

  async scan(): Promise<ScanResult> {
    const observedAt = new Date().toISOString();
    const errors: ScanError[] = [];
    const paths = new Set<string>();

    for (const subtree of this.include) {
      const rel = normalizeRelative(subtree);
      if (rel === null) {
        errors.push({ path: subtree, message: 'allow-listed subtree escapes the repository root' });
        continue;
      }
      const abs = rel ? join(this.rootPath, rel) : this.rootPath;
      if (!existsSync(abs)) continue;
      if (!statSync(abs).isDirectory()) {
        errors.push({ path: rel, message: 'allow-listed subtree is not a directory' });
        continue;
      }
      this.walkDir(abs, rel, paths, errors);
    }

    for (const file of this.files) {
      const rel = normalizeRelative(file);
      if (!rel) {
        errors.push({ path: file, message: 'tracked file escapes the repository root' });
        continue;
      }
      const abs = join(this.rootPath, rel);
      if (existsSync(abs) && statSync(abs).isFile()) paths.add(rel);
    }

    const hashed = await this.limiter.map([...paths], async (relPath): Promise<FileRecord | ScanError> => {
      const abs = join(this.rootPath, relPath);
      try {
        const contentHash = await this.hasher(abs);
        return {
          repo: this.repo,
          relativePath: relPath,
          contentHash,
          sizeBytes: statSync(abs).size,
          observedAt,
        };
      } catch (err) {
        return { path: relPath, message: errorMessage(err) };
      }
    });

    const records: FileRecord[] = [];
    for (const item of hashed) {
      if ('contentHash' in item) records.push(item);
      else errors.push(item);
    }
    records.sort((a, b) => comparePaths(a.relativePath, b.relativePath));
    errors.sort((a, b) => comparePaths(a.path, b.path));

    return { repo: this.repo, rootPath: this.rootPath, observedAt, records, errors };
  }

  private walkDir(absPath: string, relPath: string, paths: Set<string>, errors: ScanError[]): void {
    let entries;
    try {
      entries = readdirSync(absPath, { withFileTypes: true });
    } catch (err) {
      errors.push({ path: relPath || '.', message: errorMessage(err) });
      return;
    }

    for (const entry of entries) {
      const entryRelPath = relPath ? `${relPath}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        if (this.ig.ignores(`${entryRelPath}/`)) continue;
        this.walkDir(join(absPath, entry.name), entryRelPath, paths, errors);
      } else if (entry.isFile()) {
        if (this.ig.ignores(entryRelPath)) continue;
        paths.add(entryRelPath);
      }
    }
  }
}

/**
 * Posix form of a path relative to a root, `''` for the root itself, or null
 * when it is absolute or climbs out of the root.
 */
export function normalizeRelative(path: string): string | null {
  const normalized = posix.normalize(path.replace(/\\/g, '/')).replace(/\/+$/, '');
  if (posix.isAbsolute(normalized) || /^[A-Za-z]:/.test(normalized)) return null;
  if (normalized === '..' || normalized.startsWith('../')) return null;
  return normalized === '.' ? '' : normalized;
}

/** Code-unit order, so serialized output does not depend on locale. */
export function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
