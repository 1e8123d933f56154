import type {
  EntityKind,
  FunctionTag,
  QualityStatus,
  SizeCategory,
  SourceId,
} from './enums.js';

export type FieldScalar = string | number | boolean;

// A losing value kept on an exact weight/timestamp tie
export interface FieldNote {
  value: FieldScalar;
  source: SourceId;
  observedAt: string;
}

// Provenance envelope around every merged value
export interface FieldValue<T extends FieldScalar = FieldScalar> {
  value: T;
  source: SourceId;
  observedAt: string;
  confidence: number; // 0..1
  notes?: FieldNote[];
}

export type FieldMap<K extends string> = Partial<Record<K, FieldValue>>;

// A value that was replaced, kept for audit
export interface SupersededValue {
  field: string;
  previous: FieldValue;
  supersededBy: SourceId;
  supersededAt: string;
}

export interface BankFields {
  name: string;
  certId: number;
  rssdId: number;
  assetRank: number;
  totalAssets: number; // millions USD
  headquartersCity: string;
  headquartersState: string;
  website: string;
  notes: string;
}

export interface PersonFields {
  name: string;
  title: string;
  department: string;
  profileHandle: string;
  email: string;
  employer: string;
}

export interface DepartmentFields {
  name: string;
  parentOrg: string;
  reportingStructure: string;
  teamSize: number;
}

export type BankField = keyof BankFields;
export type PersonField = keyof PersonFields;
export type DepartmentField = keyof DepartmentFields;

export interface MRMDepartment {
  key: string; // normalized department name
  fields: FieldMap<DepartmentField>;
  functions: FunctionTag[];
}

interface EntityBase {
  identityKey: string;
  kind: EntityKind;
  lookupKeys: string[];
  dataSources: SourceId[];
  completenessScore: number;
  confidenceScore: number;
  qualityStatus: QualityStatus;
  lastVerifiedAt?: string;
  needsReview: boolean;
  reviewReason?: string;
  history: SupersededValue[];
  version: number;
  createdAt: string;
  updatedAt: string;
}

export interface BankEntity extends EntityBase {
  kind: 'bank';
  attributes: FieldMap<BankField>;
  sourceUrls: string[];
  tags: string[];
  departments: MRMDepartment[];
  leadership: string[]; // person identity keys
  sizeCategory?: SizeCategory;
}

export interface PersonEntity extends EntityBase {
  kind: 'person';
  attributes: FieldMap<PersonField>;
  employers: string[]; // normalized employer names
  bankKeys: string[];
}

export type Entity = BankEntity | PersonEntity;

// Scores stamped by the score calculator
export interface EntityScores {
  completenessScore: number;
  confidenceScore: number;
  qualityStatus: QualityStatus;
  sizeCategory?: SizeCategory;
}
