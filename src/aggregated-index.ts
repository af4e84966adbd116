import { existsSync, readFileSync } from 'fs';
import { parseFingerprints, serializeFingerprints } from './fingerprints.js';
import { writeFileAtomic } from './output.js';
import { comparePaths } from './scanner.js';
import type { FileRecord } from './types.js';

export interface IndexWarning {
  repo?: string;
  message: string;
}

/**
 * Fingerprints of every known repository, keyed by (repo, path). A repo can
 * be present with zero records, which is distinct from not being indexed.
 */
export class AggregatedIndex {
  private byRepo = new Map<string, Map<string, FileRecord>>();
  private warnings: IndexWarning[] = [];

  static fromJsonl(text: string): AggregatedIndex {
    const index = new AggregatedIndex();
    const parsed = parseFingerprints(text);
    for (const { line, reason } of parsed.skipped) {
      index.warnings.push({ message: `skipped line ${line}: ${reason}` });
    }
    const grouped = new Map<string, FileRecord[]>();
    for (const record of parsed.records) {
      const list = grouped.get(record.repo) ?? [];
      list.push(record);
      grouped.set(record.repo, list);
    }
    for (const [repo, records] of grouped) index.setRepo(repo, records);
    return index;
  }

  static load(path: string): AggregatedIndex {
    if (!existsSync(path)) return new AggregatedIndex();
    return AggregatedIndex.fromJsonl(readFileSync(path, 'utf-8'));
  }

  /** Replaces everything known about `repo`. Later duplicates of a path win. */
  setRepo(repo: string, records: readonly FileRecord[]): void {
    const byPath = new Map<string, FileRecord>();
    for (const record of records) {
      if (record.repo !== repo) {
        this.warnings.push({ repo, message: `record for ${record.repo}:${record.relativePath} ignored` });
        continue;
      }
      if (byPath.has(record.relativePath)) {
        this.warnings.push({ repo, message: `duplicate path ${record.relativePath}; keeping the last record` });
      }
      byPath.set(record.relativePath, record);
    }
    const sorted = [...byPath.entries()].sort(([a], [b]) => comparePaths(a, b));
    this.byRepo.set(repo, new Map(sorted));
  }

  has(repo: string): boolean {
    return this.byRepo.has(repo);
  }

  lookup(repo: string, path: string): FileRecord | undefined {
    return this.byRepo.get(repo)?.get(path);
  }

  /** Records of one repo in path order, or undefined when the repo is not indexed. */
  entries(repo: string): FileRecord[] | undefined {
    const records = this.byRepo.get(repo);
    return records ? [...records.values()] : undefined;
  }

  repos(): string[] {
    return [...this.byRepo.keys()].sort(comparePaths);
  }

  countsByRepo(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const repo of this.repos()) {
      counts[repo] = this.byRepo.get(repo)?.size ?? 0;
    }
    return counts;
  }

  getWarnings(): IndexWarning[] {
    return [...this.warnings];
  }

  toJsonl(): string {
    return this.repos().map(repo => serializeFingerprints(this.entries(repo) ?? [])).join('');
  }

  write(path: string): void {
    writeFileAtomic(path, this.toJsonl());
  }
}
