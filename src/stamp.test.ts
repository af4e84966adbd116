import { describe, it, expect } from 'vitest';
import { mkdtempSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { StampStore, maxMode, mergeStamps, parseMode } from './stamp.js';
import { UnknownModeError } from './errors.js';
import type { ValidationMode, ValidationStamp } from './types.js';

function stamp(commit: string, mode: ValidationMode, hashChar = 'a', at = '2026-01-05T10:00:00.000Z'): ValidationStamp {
  return { repo: 'CosDen', commit, highestMode: mode, contentIndexHash: hashChar.repeat(64), validatedAt: at };
}

describe('mode lattice', () => {
  it('orders build below prod', () => {
    expect(maxMode('build', 'prod')).toBe('prod');
    expect(maxMode('prod', 'build')).toBe('prod');
    expect(maxMode('build', 'build')).toBe('build');
  });

  it('refuses unknown modes instead of defaulting', () => {
    expect(parseMode('prod')).toBe('prod');
    expect(() => parseMode('staging')).toThrow(UnknownModeError);
    expect(() => parseMode('')).toThrow('Unknown validation mode ""');
  });
});

describe('mergeStamps', () => {
  const modes: ValidationMode[] = ['build', 'prod'];

  it('takes the stronger mode for the same commit', () => {
    for (const a of modes) {
      for (const b of modes) {
        expect(mergeStamps(stamp('c1', a), stamp('c1', b)).highestMode).toBe(maxMode(a, b));
      }
    }
  });

  it('never downgrades prod to build within a commit', () => {
    const merged = mergeStamps(stamp('c1', 'prod', 'a'), stamp('c1', 'build', 'b', '2026-01-06T00:00:00.000Z'));
    expect(merged).toEqual({
      repo: 'CosDen',
      commit: 'c1',
      highestMode: 'prod',
      contentIndexHash: 'b'.repeat(64),
      validatedAt: '2026-01-06T00:00:00.000Z',
    });
  });

  it('replaces the stamp outright for a different commit', () => {
    const incoming = stamp('c2', 'build', 'b');
    expect(mergeStamps(stamp('c1', 'prod'), incoming)).toBe(incoming);
  });

  it('returns incoming when there is no existing stamp', () => {
    const incoming = stamp('c1', 'build');
    expect(mergeStamps(null, incoming)).toBe(incoming);
  });
});

describe('StampStore', () => {
  function repoDir(): string {
    return mkdtempSync(join(tmpdir(), 'fleetgov-stamp-'));
  }

  function writeStamp(root: string, doc: unknown): void {
    mkdirSync(join(root, 'meta'), { recursive: true });
    writeFileSync(join(root, 'meta', 'validation_stamp.json'), typeof doc === 'string' ? doc : JSON.stringify(doc));
  }

  it('reports a missing stamp', () => {
    expect(new StampStore().read(repoDir())).toEqual({ kind: 'missing' });
  });

  it('reads a stamp document', () => {
    const root = repoDir();
    writeStamp(root, {
      repo: 'CosDen', commit: 'c1', highest_mode: 'prod', meta_sha256: 'a'.repeat(64), validated_at: '2026-01-05T10:00:00.000Z',
    });
    expect(new StampStore().read(root)).toEqual({ kind: 'ok', stamp: stamp('c1', 'prod') });
  });

  it('reports an unreadable stamp', () => {
    const root = repoDir();
    writeStamp(root, '{ truncated');
    const lookup = new StampStore().read(root);
    expect(lookup.kind).toBe('unreadable');
  });

  it('reports a stamp with missing fields as unreadable', () => {
    const root = repoDir();
    writeStamp(root, { repo: 'CosDen', highest_mode: 'prod' });
    expect(new StampStore().read(root).kind).toBe('unreadable');
  });

  it('reports an unknown mode', () => {
    const root = repoDir();
    writeStamp(root, {
      repo: 'CosDen', commit: 'c1', highest_mode: 'release', meta_sha256: 'x', validated_at: '2026-01-05T10:00:00.000Z',
    });
    const lookup = new StampStore().read(root);
    expect(lookup.kind).toBe('unknown_mode');
    if (lookup.kind === 'unknown_mode') expect(lookup.error.mode).toBe('release');
  });

  it('reports a non-string mode as unknown rather than unreadable', () => {
    const root = repoDir();
    writeStamp(root, {
      repo: 'CosDen', commit: 'c1', highest_mode: 2, meta_sha256: 'x', validated_at: '2026-01-05T10:00:00.000Z',
    });
    const lookup = new StampStore().read(root);
    expect(lookup.kind).toBe('unknown_mode');
    if (lookup.kind === 'unknown_mode') expect(lookup.error.mode).toBe('2');
  });

  it('reports a stamp without a mode as unreadable', () => {
    const root = repoDir();
    writeStamp(root, { repo: 'CosDen', commit: 'c1', meta_sha256: 'x', validated_at: '2026-01-05T10:00:00.000Z' });
    expect(new StampStore().read(root).kind).toBe('unreadable');
  });

  it('merges with the stored stamp when recording the same commit', () => {
    const root = repoDir();
    const store = new StampStore();
    store.record(root, stamp('c1', 'prod'));
    const merged = store.record(root, stamp('c1', 'build', 'b'));

    expect(merged.highestMode).toBe('prod');
    const onDisk = JSON.parse(readFileSync(join(root, 'meta', 'validation_stamp.json'), 'utf-8'));
    expect(onDisk).toEqual({
      repo: 'CosDen',
      commit: 'c1',
      highest_mode: 'prod',
      meta_sha256: 'b'.repeat(64),
      validated_at: '2026-01-05T10:00:00.000Z',
    });
  });

  it('starts over for a new commit', () => {
    const root = repoDir();
    const store = new StampStore();
    store.record(root, stamp('c1', 'prod'));
    expect(store.record(root, stamp('c2', 'build')).highestMode).toBe('build');
  });

  it('overwrites an unusable stamp', () => {
    const root = repoDir();
    writeStamp(root, '{ truncated');
    const store = new StampStore();
    store.record(root, stamp('c1', 'build'));
    expect(store.read(root)).toEqual({ kind: 'ok', stamp: stamp('c1', 'build') });
  });
});
