import { existsSync, readdirSync, readFileSync } from 'fs';
import { join, posix } from 'path';
import { z } from 'zod';
import { ConfigInvalidError, ConfigMissingError } from './errors.js';
import { writeFileAtomic } from './output.js';

export const LOCK_FILE = 'fleetgov.canonical.lock.json';
export const WORKFLOW_DIR = posix.join('.github', 'workflows');

const HEADER_RE = /^\s*#\s*fleetgov:\s*(.+)\s*$/;
const NAME_RE = /^\s*name:\s*.+\s*$/;

const LockSchema = z.object({
  sha256: z.string().trim().min(1),
  canonical_source: z.string().trim().min(1).default('hub'),
});

export type CanonicalLock = z.infer<typeof LockSchema>;

export function readLock(repoRoot: string): CanonicalLock {
  const path = join(repoRoot, LOCK_FILE);
  if (!existsSync(path)) throw new ConfigMissingError(`No canonical lock at ${path}`);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigInvalidError(`Cannot parse ${path} as JSON`, { cause: err });
  }
  const result = LockSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigInvalidError(`Invalid canonical lock in ${path}: ${result.error.issues[0].path.join('.')}: ${result.error.issues[0].message}`);
  }
  return result.data;
}

export function headerLine(lock: CanonicalLock, workflowPath: string): string {
  return `# fleetgov: canonical_sha256=${lock.sha256} source=${lock.canonical_source} path=${workflowPath}\n`;
}

export type HeaderOutcome = 'stamped' | 'unchanged' | 'no_name';

/**
 * Puts `header` on the line right after the first `name:` line, replacing a
 * header already there. Nothing else in the document changes.
 */
export function stampWorkflowText(text: string, header: string): { text: string; outcome: HeaderOutcome } {
  const lines = text.split(/(?<=\n)/);
  const nameIdx = lines.findIndex(line => NAME_RE.test(line));
  if (nameIdx === -1) return { text, outcome: 'no_name' };

  const before = lines.slice(0, nameIdx + 1);
  if (!before[nameIdx].endsWith('\n')) before[nameIdx] += '\n';
  const next = lines[nameIdx + 1];

  if (next !== undefined && HEADER_RE.test(next)) {
    if (next === header) return { text, outcome: 'unchanged' };
    return { text: [...before, header, ...lines.slice(nameIdx + 2)].join(''), outcome: 'stamped' };
  }
  return { text: [...before, header, ...lines.slice(nameIdx + 1)].join(''), outcome: 'stamped' };
}

export interface WorkflowStampResult {
  path: string;
  outcome: HeaderOutcome;
}

/** Stamps every `.yml` then `.yaml` workflow of a repo with its canonical lock. */
export function stampWorkflowHeaders(repoRoot: string): WorkflowStampResult[] {
  const lock = readLock(repoRoot);
  const dir = join(repoRoot, WORKFLOW_DIR);
  if (!existsSync(dir)) return [];

  const names = readdirSync(dir);
  const workflows = [
    ...names.filter(n => n.endsWith('.yml')).sort(),
    ...names.filter(n => n.endsWith('.yaml')).sort(),
  ];

  return workflows.map(name => {
    const relPath = posix.join(WORKFLOW_DIR, name);
    const abs = join(repoRoot, relPath);
    const { text, outcome } = stampWorkflowText(readFileSync(abs, 'utf-8'), headerLine(lock, relPath));
    if (outcome === 'stamped') writeFileAtomic(abs, text);
    return { path: relPath, outcome };
  });
}
