import type {
  BatchStatus,
  CollectionKind,
  CollectionStatus,
  MergeOutcome,
  SourceId,
} from './enums.js';

// Immutable audit record of one collection or reconciliation attempt
export interface CollectionLogEntry {
  logId: string;
  entityKey?: string;
  source?: SourceId;
  kind: CollectionKind;
  status: CollectionStatus;
  recordsChanged: number;
  errors: string[];
  durationMs: number;
  detail: Record<string, unknown>;
  timestamp: string;
  batchId?: string;
}

// Something the orchestrator collects for
export interface CollectionTarget {
  name: string;
  identityKey?: string;
  certId?: number;
  assetRank?: number;
  website?: string;
}

export interface CollectionQuery {
  target: CollectionTarget;
  batchId: string;
}

export interface ReconcileSummary {
  total: number;
  created: number;
  updated: number;
  unchanged: number;
  ambiguous: number;
  failed: number;
  results: Array<
    | { index: number; ok: true; identityKey: string; outcome: MergeOutcome; changed: boolean }
    | { index: number; ok: false; error: string; code: string }
  >;
}

export interface EntityCollectionOutcome {
  target: string;
  identityKey?: string;
  status: CollectionStatus;
  observations: number;
  errors: string[];
}

export interface BatchSummary {
  batchId: string;
  status: BatchStatus;
  startedAt: string;
  completedAt: string;
  cancelled: boolean;
  counts: {
    targets: number;
    processed: number;
    created: number;
    updated: number;
    ambiguous: number;
    failed: number;
    skipped: number;
    tasksCreated: number;
  };
  entities: EntityCollectionOutcome[];
}

export interface ProfileStats {
  totalBanks: number;
  banksWithMrmData: number;
  mrmCoveragePercentage: number;
  averageCompletenessScore: number;
  pendingResearchTasks: number;
  recentCollectionActivities: number;
  personsNeedingReview: number;
}
