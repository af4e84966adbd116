import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { StampUnreadableError, UnknownModeError, errorMessage } from './errors.js';
import { writeJson } from './output.js';
import type { ValidationMode, ValidationStamp } from './types.js';

export const STAMP_FILE = join('meta', 'validation_stamp.json');

const MODE_LEVEL: Record<ValidationMode, number> = {
  build: 1,
  prod: 2,
};

export function isValidationMode(value: string): value is ValidationMode {
  return Object.prototype.hasOwnProperty.call(MODE_LEVEL, value);
}

/** Never defaults: anything outside the lattice throws UnknownModeError. */
export function parseMode(value: string): ValidationMode {
  if (!isValidationMode(value)) throw new UnknownModeError(value);
  return value;
}

export function maxMode(a: ValidationMode, b: ValidationMode): ValidationMode {
  return MODE_LEVEL[a] >= MODE_LEVEL[b] ? a : b;
}

/**
 * Combines the stamp on disk with a new validation pass. Within one commit
 * the mode only strengthens; a new commit starts over from `incoming`.
 */
export function mergeStamps(existing: ValidationStamp | null, incoming: ValidationStamp): ValidationStamp {
  if (!existing || existing.commit !== incoming.commit) return incoming;
  return { ...incoming, highestMode: maxMode(existing.highestMode, incoming.highestMode) };
}

const StampDocumentSchema = z.object({
  repo: z.string(),
  commit: z.string(),
  // Checked against the lattice in fromStampDocument.
  highest_mode: z.unknown().refine(value => value !== undefined, 'Required'),
  meta_sha256: z.string(),
  validated_at: z.string(),
});

export type StampDocument = z.infer<typeof StampDocumentSchema>;

export function toStampDocument(stamp: ValidationStamp): StampDocument {
  return {
    repo: stamp.repo,
    commit: stamp.commit,
    highest_mode: stamp.highestMode,
    meta_sha256: stamp.contentIndexHash,
    validated_at: stamp.validatedAt,
  };
}

export function fromStampDocument(doc: StampDocument): ValidationStamp {
  return {
    repo: doc.repo,
    commit: doc.commit,
    highestMode: parseMode(typeof doc.highest_mode === 'string' ? doc.highest_mode : JSON.stringify(doc.highest_mode)),
    contentIndexHash: doc.meta_sha256,
    validatedAt: doc.validated_at,
  };
}

export type StampLookup =
  | { kind: 'ok'; stamp: ValidationStamp }
  | { kind: 'missing' }
  | { kind: 'unreadable'; error: StampUnreadableError }
  | { kind: 'unknown_mode'; error: UnknownModeError };

/** One stamp document per repository, at a fixed path under its root. */
export class StampStore {
  constructor(private readonly stampFile: string = STAMP_FILE) {}

  pathFor(repoRoot: string): string {
    return join(repoRoot, this.stampFile);
  }

  read(repoRoot: string): StampLookup {
    const path = this.pathFor(repoRoot);
    if (!existsSync(path)) return { kind: 'missing' };

    let doc: StampDocument;
    try {
      doc = StampDocumentSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
    } catch (err) {
      return {
        kind: 'unreadable',
        error: new StampUnreadableError(`Cannot read stamp ${path}: ${errorMessage(err)}`, { cause: err }),
      };
    }

    try {
      return { kind: 'ok', stamp: fromStampDocument(doc) };
    } catch (err) {
      if (err instanceof UnknownModeError) return { kind: 'unknown_mode', error: err };
      throw err;
    }
  }

  /**
   * Merges `incoming` into the stored stamp and writes the result. A stored
   * stamp that cannot be used is replaced.
   */
  record(repoRoot: string, incoming: ValidationStamp): ValidationStamp {
    const current = this.read(repoRoot);
    const merged = mergeStamps(current.kind === 'ok' ? current.stamp : null, incoming);
    writeJson(this.pathFor(repoRoot), toStampDocument(merged));
    return merged;
  }
}
