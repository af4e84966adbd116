// Layer 0 - Fingerprints
export interface FileRecord {
  repo: string;
  relativePath: string;
  contentHash: string;
  sizeBytes: number;
  observedAt: string;
}

export interface ScanError {
  path: string;
  message: string;
}

// Validation stamps
export type ValidationMode = 'build' | 'prod';

export interface ValidationStamp {
  repo: string;
  commit: string;
  highestMode: ValidationMode;
  contentIndexHash: string;
  validatedAt: string;
}

export type SelfStatus = 'no_clone' | 'no_stamp' | 'build' | 'prod' | 'unconfigured';

// Dependency graph
export interface RepoNode {
  name: string;
  localPath: string;
  declaredDependencies: Set<string>;
}

// Repair plans
export type RepairReason = 'missing_in_repo' | 'hash_mismatch';

export type RepairAction =
  | { type: 'write_file'; targetPath: string; canonicalPath: string; reason: RepairReason }
  | { type: 'move_file'; fromPath: string; toPath: string };

export interface RepairPlan {
  repo: string;
  generatedAt: string;
  canonicalRoot: string;
  actions: RepairAction[];
}

// Governance report
export interface RepoStatus {
  selfStatus: SelfStatus;
  highestMode: ValidationMode | null;
  hasStamp: boolean;
  dependencies: string[];
  depsOk: boolean;
  problems: string[];
}

export type OverallStatus = 'ok' | 'degraded';

export interface GovernanceReport {
  generatedAt: string;
  repos: Record<string, RepoStatus>;
  cycles: string[][];
  missingRepos: string[];
  unusedRepos: string[];
  overallStatus: OverallStatus;
}
