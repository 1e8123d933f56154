// Where an observation came from
export const SourceId = {
  REGISTRY_API: 'registry_api',
  REGULATORY_FILING: 'regulatory_filing',
  OFFICIAL_WEBSITE: 'official_website',
  PROFESSIONAL_NETWORK: 'professional_network',
  MANUAL_CURATION: 'manual_curation',
  THIRD_PARTY: 'third_party',
} as const;
export type SourceId = (typeof SourceId)[keyof typeof SourceId];

// Canonical entity kind
export const EntityKind = {
  BANK: 'bank',
  PERSON: 'person',
} as const;
export type EntityKind = (typeof EntityKind)[keyof typeof EntityKind];

// Bank classification by total assets
export const SizeCategory = {
  MEGA: 'mega',
  LARGE: 'large',
  REGIONAL: 'regional',
  COMMUNITY: 'community',
  SMALL: 'small',
} as const;
export type SizeCategory = (typeof SizeCategory)[keyof typeof SizeCategory];

// Data quality derived from completeness
export const QualityStatus = {
  EXCELLENT: 'excellent',
  GOOD: 'good',
  FAIR: 'fair',
  POOR: 'poor',
  UNKNOWN: 'unknown',
} as const;
export type QualityStatus = (typeof QualityStatus)[keyof typeof QualityStatus];

// What an MRM department does
export const FunctionTag = {
  GOVERNANCE: 'governance',
  VALIDATION: 'validation',
  RISK_MANAGEMENT: 'risk_management',
  ANALYTICS: 'analytics',
  AI_ML: 'ai_ml',
  CREDIT_RISK: 'credit_risk',
  MARKET_RISK: 'market_risk',
  OPERATIONAL_RISK: 'operational_risk',
} as const;
export type FunctionTag = (typeof FunctionTag)[keyof typeof FunctionTag];

// Fields the completeness checklist can track
export const TrackableField = {
  NAME: 'name',
  CERT_ID: 'certId',
  ASSET_RANK: 'assetRank',
  TOTAL_ASSETS: 'totalAssets',
  HAS_DEPARTMENT: 'hasDepartment',
  HAS_LEADER: 'hasLeader',
  LEADER_NAME: 'leaderName',
  LEADER_TITLE: 'leaderTitle',
  LEADER_HANDLE: 'leaderHandle',
  SOURCE_URL: 'sourceUrl',
  NOTES: 'notes',
  VERIFIED: 'verified',
  DATA_SOURCE: 'dataSource',
  TITLE: 'title',
  PROFILE_HANDLE: 'profileHandle',
  EMPLOYER: 'employer',
} as const;
export type TrackableField = (typeof TrackableField)[keyof typeof TrackableField];

// Result of applying one observation
export const MergeOutcome = {
  CREATED: 'created',
  UPDATED: 'updated',
  MERGED_AMBIGUOUS: 'merged_ambiguous',
} as const;
export type MergeOutcome = (typeof MergeOutcome)[keyof typeof MergeOutcome];

// Research task lifecycle
export const TaskStatus = {
  PENDING: 'pending',
  IN_PROGRESS: 'in_progress',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;
export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

export const TaskType = {
  MRM_RESEARCH: 'mrm_research',
  VERIFICATION: 'verification',
} as const;
export type TaskType = (typeof TaskType)[keyof typeof TaskType];

// Batch collection lifecycle
export const BatchStatus = {
  PENDING: 'pending',
  RUNNING: 'running',
  COMPLETED: 'completed',
  PARTIALLY_FAILED: 'partially_failed',
  FAILED: 'failed',
} as const;
export type BatchStatus = (typeof BatchStatus)[keyof typeof BatchStatus];

// Collection log
export const CollectionStatus = {
  SUCCESS: 'success',
  PARTIAL: 'partial',
  FAILED: 'failed',
} as const;
export type CollectionStatus = (typeof CollectionStatus)[keyof typeof CollectionStatus];

export const CollectionKind = {
  COLLECTION: 'collection',
  RECONCILIATION: 'reconciliation',
  MATCH_REVIEW: 'match_review',
  BATCH: 'batch',
} as const;
export type CollectionKind = (typeof CollectionKind)[keyof typeof CollectionKind];
