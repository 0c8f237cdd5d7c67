import type { PipelineErrorCode } from '../utils/errors';

export type RecordKind = 'job' | 'chat';

export type RecordStatus = 'active' | 'incomplete';

// Extracted values are kept as plain strings or string lists
export type FieldValue = string | string[];

export type RecordFields = Record<string, FieldValue>;

// Shape produced by the extractor and accepted by the record store
export interface RecordInput {
  naturalKey: string;
  kind: RecordKind;
  title: string;
  description: string;
  sourceUrl: string | null;
  fields: RecordFields;
}

export interface SnapshotInput {
  recordId: number | null;
  content: string;
  capturedAt?: Date;
  sourceUrl?: string | null;
  pageTitle?: string | null;
}

export interface ArtifactInput {
  providerKind: string;
  provider: string;
  text: string;
  generatedAt?: Date;
}

export type RetentionTarget = 'snapshots' | 'records';

export type RetentionRule =
  | { target: RetentionTarget; maxAgeMs: number }
  | { target: RetentionTarget; maxCount: number };

export interface DedupeResult {
  groups: number;
  recordsRemoved: number;
  snapshotsRelinked: number;
  artifactsRelinked: number;
}

export interface DuplicateStats {
  totalRecords: number;
  duplicateGroups: number;
  potentialDuplicates: number;
}

export interface StoreHealth {
  records: number;
  snapshots: number;
  orphanSnapshots: number;
  artifacts: number;
  sizeBytes: number;
  pageCount: number;
  freePages: number;
  fragmentation: number;
  integrity: string[];
  integrityOk: boolean;
  sizeLimitBytes: number | null;
  sizeLimitExceeded: boolean;
}

export interface CapturedDocument {
  content: string;
  url: string;
  title: string;
  capturedAt: Date;
}

export type RunStatus = 'completed' | 'degraded' | 'aborted';

export interface IngestionReport {
  status: RunStatus;
  reason?: PipelineErrorCode;
  error?: string;
  ruleSet: string | null;
  processed: number;
  created: number;
  updated: number;
  duplicatesSkipped: number;
  dropped: number;
  failed: number;
  snapshotId: number | null;
  source: {
    url: string;
    title: string;
    contentLength: number;
  } | null;
  durationMs: number;
}

export interface PruneOutcome {
  rule: RetentionRule;
  removed: number;
}

export interface MaintenanceReport {
  status: RunStatus;
  reason?: PipelineErrorCode;
  error?: string;
  checkOnly: boolean;
  duplicates: DuplicateStats | null;
  dedupe: DedupeResult | null;
  pruned: PruneOutcome[];
  orphansRemoved: number;
  staleSessionsMarked: number;
  optimized: boolean;
  health: StoreHealth | null;
  durationMs: number;
}
