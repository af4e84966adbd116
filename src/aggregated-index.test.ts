import { describe, it, expect } from 'vitest';
import { mkdtempSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { AggregatedIndex } from './aggregated-index.js';
import type { FileRecord } from './types.js';

function rec(repo: string, path: string, hashChar: string): FileRecord {
  return {
    repo,
    relativePath: path,
    contentHash: hashChar.repeat(64),
    sizeBytes: 10,
    observedAt: '2026-01-05T10:00:00.000Z',
  };
}

describe('AggregatedIndex', () => {
  it('looks up records by repo and path', () => {
    const index = new AggregatedIndex();
    index.setRepo('CosDen', [rec('CosDen', 'src/api.py', 'a')]);

    expect(index.lookup('CosDen', 'src/api.py')?.contentHash).toBe('a'.repeat(64));
    expect(index.lookup('CosDen', 'src/missing.py')).toBeUndefined();
    expect(index.lookup('Other', 'src/api.py')).toBeUndefined();
  });

  it('orders entries by path regardless of input order', () => {
    const index = new AggregatedIndex();
    index.setRepo('CosDen', [rec('CosDen', 'tools/z.py', 'a'), rec('CosDen', 'src/a.py', 'b')]);
    expect(index.entries('CosDen')?.map(r => r.relativePath)).toEqual(['src/a.py', 'tools/z.py']);
  });

  it('serializes byte-identically for any insertion order', () => {
    const a = new AggregatedIndex();
    a.setRepo('Beta', [rec('Beta', 'y.py', 'c'), rec('Beta', 'x.py', 'd')]);
    a.setRepo('Alpha', [rec('Alpha', 'm.py', 'e')]);

    const b = new AggregatedIndex();
    b.setRepo('Alpha', [rec('Alpha', 'm.py', 'e')]);
    b.setRepo('Beta', [rec('Beta', 'x.py', 'd'), rec('Beta', 'y.py', 'c')]);

    expect(a.toJsonl()).toBe(b.toJsonl());
    expect(a.toJsonl().split('\n').filter(Boolean).map(l => JSON.parse(l).path)).toEqual(['m.py', 'x.py', 'y.py']);
  });

  it('distinguishes an indexed repo with no files from an unknown repo', () => {
    const index = new AggregatedIndex();
    index.setRepo('Empty', []);

    expect(index.has('Empty')).toBe(true);
    expect(index.entries('Empty')).toEqual([]);
    expect(index.has('Unknown')).toBe(false);
    expect(index.entries('Unknown')).toBeUndefined();
  });

  it('counts records per repo', () => {
    const index = new AggregatedIndex();
    index.setRepo('CosDen', [rec('CosDen', 'a.py', 'a'), rec('CosDen', 'b.py', 'b')]);
    index.setRepo('Empty', []);
    expect(index.countsByRepo()).toEqual({ CosDen: 2, Empty: 0 });
  });

  it('keeps one record per path and warns about duplicates', () => {
    const index = new AggregatedIndex();
    index.setRepo('CosDen', [rec('CosDen', 'a.py', 'a'), rec('CosDen', 'a.py', 'b')]);

    expect(index.entries('CosDen')).toHaveLength(1);
    expect(index.lookup('CosDen', 'a.py')?.contentHash).toBe('b'.repeat(64));
    expect(index.getWarnings()).toEqual([
      { repo: 'CosDen', message: 'duplicate path a.py; keeping the last record' },
    ]);
  });

  it('replaces a repo wholesale on a later setRepo', () => {
    const index = new AggregatedIndex();
    index.setRepo('CosDen', [rec('CosDen', 'old.py', 'a')]);
    index.setRepo('CosDen', [rec('CosDen', 'new.py', 'b')]);
    expect(index.entries('CosDen')?.map(r => r.relativePath)).toEqual(['new.py']);
  });

  it('writes a complete file and loads it back', () => {
    const tmp = mkdtempSync(join(tmpdir(), 'fleetgov-index-'));
    const path = join(tmp, 'meta', 'aggregated_files.jsonl');
    writeFileSync(join(tmp, 'stale.txt'), 'unrelated');

    const index = new AggregatedIndex();
    index.setRepo('CosDen', [rec('CosDen', 'a.py', 'a')]);
    index.setRepo('Other', [rec('Other', 'b.py', 'b')]);
    index.write(path);

    const loaded = AggregatedIndex.load(path);
    expect(loaded.repos()).toEqual(['CosDen', 'Other']);
    expect(loaded.lookup('Other', 'b.py')?.contentHash).toBe('b'.repeat(64));
    expect(readFileSync(path, 'utf-8')).toBe(index.toJsonl());
  });

  it('loads an empty index when the file does not exist', () => {
    const tmp = mkdtempSync(join(tmpdir(), 'fleetgov-index-'));
    expect(AggregatedIndex.load(join(tmp, 'nope.jsonl')).repos()).toEqual([]);
  });

  it('warns about malformed lines when parsing', () => {
    const index = AggregatedIndex.fromJsonl('garbage\n');
    expect(index.repos()).toEqual([]);
    expect(index.getWarnings()).toEqual([{ message: 'skipped line 1: malformed JSON' }]);
  });
});
