import { z } from 'zod';
import { hashText } from './scanner.js';
import type { FileRecord } from './types.js';

export const FingerprintLineSchema = z.object({
  repo: z.string().min(1),
  path: z.string().min(1),
  sha256: z.string().regex(/^[0-9a-f]{64}$/, 'expected 64 lowercase hex characters'),
  size_bytes: z.number().int().nonnegative(),
  timestamp: z.string().datetime({ offset: true }),
});

export type FingerprintLine = z.infer<typeof FingerprintLineSchema>;

export interface ParsedFingerprints {
  records: FileRecord[];
  /** 1-based line numbers with the reason each was skipped. */
  skipped: Array<{ line: number; reason: string }>;
}

export function toLine(record: FileRecord): FingerprintLine {
  return {
    repo: record.repo,
    path: record.relativePath,
    sha256: record.contentHash,
    size_bytes: record.sizeBytes,
    timestamp: record.observedAt,
  };
}

export function fromLine(line: FingerprintLine): FileRecord {
  return {
    repo: line.repo,
    relativePath: line.path,
    contentHash: line.sha256,
    sizeBytes: line.size_bytes,
    observedAt: line.timestamp,
  };
}

/** Serializes records as newline-delimited JSON, in the order given. */
export function serializeFingerprints(records: readonly FileRecord[]): string {
  return records.map(r => JSON.stringify(toLine(r)) + '\n').join('');
}

/**
 * SHA-256 over `path`, `sha256` and `size_bytes` of each record. Observation
 * times are left out, so identical trees digest identically.
 */
export function contentDigest(records: readonly FileRecord[]): string {
  return hashText(records.map(r => `${r.relativePath}\t${r.contentHash}\t${r.sizeBytes}\n`).join(''));
}

export function parseFingerprints(text: string): ParsedFingerprints {
  const records: FileRecord[] = [];
  const skipped: ParsedFingerprints['skipped'] = [];

  text.split('\n').forEach((raw, i) => {
    const line = raw.trim();
    if (!line) return;

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      skipped.push({ line: i + 1, reason: 'malformed JSON' });
      return;
    }

    const parsed = FingerprintLineSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      skipped.push({ line: i + 1, reason: `${issue.path.join('.')}: ${issue.message}` });
      return;
    }
    records.push(fromLine(parsed.data));
  });

  return { records, skipped };
}
