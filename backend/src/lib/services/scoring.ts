import {
  QualityStatus,
  SizeCategory,
  TrackableField,
  type BankEntity,
  type Entity,
  type EntityScores,
  type FieldMap,
  type PersonEntity,
  type SourceId,
} from '@mrm/shared';
import type { ReliabilityTable } from '../config.js';
import { weightLookup } from './mergePolicy.js';

export interface ChecklistItem<C> {
  field: TrackableField;
  weight: number;
  satisfied: (context: C) => boolean;
}

export interface BankScoringContext {
  bank: BankEntity;
  leaders: PersonEntity[];
}

const hasValue = (fields: FieldMap<string>, key: string): boolean => {
  const value = fields[key]?.value;
  return value !== undefined && value !== '';
};

// Weights are fixed so scores stay comparable across versions; total is 15
export const BANK_CHECKLIST: readonly ChecklistItem<BankScoringContext>[] = [
  { field: TrackableField.NAME, weight: 1, satisfied: ({ bank }) => hasValue(bank.attributes, 'name') },
  { field: TrackableField.CERT_ID, weight: 1, satisfied: ({ bank }) => hasValue(bank.attributes, 'certId') },
  { field: TrackableField.ASSET_RANK, weight: 1, satisfied: ({ bank }) => hasValue(bank.attributes, 'assetRank') },
  { field: TrackableField.TOTAL_ASSETS, weight: 1, satisfied: ({ bank }) => hasValue(bank.attributes, 'totalAssets') },
  { field: TrackableField.HAS_DEPARTMENT, weight: 2, satisfied: ({ bank }) => bank.departments.length > 0 },
  { field: TrackableField.HAS_LEADER, weight: 2, satisfied: ({ bank }) => bank.leadership.length > 0 },
  {
    field: TrackableField.LEADER_NAME,
    weight: 1,
    satisfied: ({ leaders }) => leaders.some((leader) => hasValue(leader.attributes, 'name')),
  },
  {
    field: TrackableField.LEADER_TITLE,
    weight: 1,
    satisfied: ({ leaders }) => leaders.some((leader) => hasValue(leader.attributes, 'title')),
  },
  {
    field: TrackableField.LEADER_HANDLE,
    weight: 1,
    satisfied: ({ leaders }) => leaders.some((leader) => hasValue(leader.attributes, 'profileHandle')),
  },
  { field: TrackableField.SOURCE_URL, weight: 1, satisfied: ({ bank }) => bank.sourceUrls.length > 0 },
  { field: TrackableField.NOTES, weight: 1, satisfied: ({ bank }) => hasValue(bank.attributes, 'notes') },
  { field: TrackableField.VERIFIED, weight: 1, satisfied: ({ bank }) => bank.lastVerifiedAt !== undefined },
  { field: TrackableField.DATA_SOURCE, weight: 1, satisfied: ({ bank }) => bank.dataSources.length > 0 },
];
export const BANK_CHECKLIST_TOTAL = 15;

export const PERSON_CHECKLIST: readonly ChecklistItem<PersonEntity>[] = [
  { field: TrackableField.NAME, weight: 1, satisfied: (person) => hasValue(person.attributes, 'name') },
  { field: TrackableField.TITLE, weight: 1, satisfied: (person) => hasValue(person.attributes, 'title') },
  {
    field: TrackableField.PROFILE_HANDLE,
    weight: 1,
    satisfied: (person) => hasValue(person.attributes, 'profileHandle'),
  },
  { field: TrackableField.EMPLOYER, weight: 1, satisfied: (person) => hasValue(person.attributes, 'employer') },
  { field: TrackableField.VERIFIED, weight: 1, satisfied: (person) => person.lastVerifiedAt !== undefined },
];
export const PERSON_CHECKLIST_TOTAL = 5;

// Integer weights are summed first and divided once, so recomputation is exact
export function completeness<C>(
  checklist: readonly ChecklistItem<C>[],
  total: number,
  context: C
): number {
  const satisfied = checklist
    .filter((item) => item.satisfied(context))
    .reduce((sum, item) => sum + item.weight, 0);
  return Math.min(1, satisfied / total);
}

// Checklist fields the entity is still missing
export function missingFields<C>(checklist: readonly ChecklistItem<C>[], context: C): TrackableField[] {
  return checklist.filter((item) => !item.satisfied(context)).map((item) => item.field);
}

export function qualityStatus(completenessScore: number): QualityStatus {
  if (completenessScore >= 0.9) return QualityStatus.EXCELLENT;
  if (completenessScore >= 0.7) return QualityStatus.GOOD;
  if (completenessScore >= 0.5) return QualityStatus.FAIR;
  if (completenessScore > 0) return QualityStatus.POOR;
  return QualityStatus.UNKNOWN;
}

// Total assets are in millions of USD
export function sizeCategory(totalAssetsMillions: number): SizeCategory {
  const billions = totalAssetsMillions / 1000;
  if (billions > 500) return SizeCategory.MEGA;
  if (billions > 100) return SizeCategory.LARGE;
  if (billions > 10) return SizeCategory.REGIONAL;
  if (billions > 1) return SizeCategory.COMMUNITY;
  return SizeCategory.SMALL;
}

// Distinct sources currently holding at least one field value, sorted
export function contributingSources(entity: Entity): SourceId[] {
  const sources = new Set<SourceId>();
  const collect = (fields: FieldMap<string>) => {
    for (const field of Object.values(fields)) {
      if (field) sources.add(field.source);
    }
  };

  collect(entity.attributes);
  if (entity.kind === 'bank') {
    for (const department of entity.departments) {
      collect(department.fields);
    }
  }
  return [...sources].sort();
}

/**
 * Mean reliability weight across distinct contributing sources, so one weak
 * field cannot dominate. Zero when nothing has been recorded.
 */
export function confidence(entity: Entity, weights: ReliabilityTable): number {
  const sources = contributingSources(entity);
  if (sources.length === 0) {
    return 0;
  }
  const weightOf = weightLookup(weights, entity.kind);
  const sum = sources.reduce((total, source) => total + weightOf(source), 0);
  return sum / sources.length;
}

/**
 * Derive every score for an entity from its current merged state. Pure and
 * idempotent; leaders are only consulted for banks.
 */
export function computeScores(
  entity: Entity,
  weights: ReliabilityTable,
  leaders: PersonEntity[] = []
): EntityScores {
  const completenessScore =
    entity.kind === 'bank'
      ? completeness(BANK_CHECKLIST, BANK_CHECKLIST_TOTAL, { bank: entity, leaders })
      : completeness(PERSON_CHECKLIST, PERSON_CHECKLIST_TOTAL, entity);

  const scores: EntityScores = {
    completenessScore,
    confidenceScore: confidence(entity, weights),
    qualityStatus: qualityStatus(completenessScore),
  };

  if (entity.kind === 'bank') {
    const totalAssets = entity.attributes.totalAssets?.value;
    if (typeof totalAssets === 'number') {
      scores.sizeCategory = sizeCategory(totalAssets);
    }
  }

  return scores;
}

// Stamp scores onto an entity; the only place scores are written
export function applyScores<E extends Entity>(entity: E, scores: EntityScores): E {
  return {
    ...entity,
    completenessScore: scores.completenessScore,
    confidenceScore: scores.confidenceScore,
    qualityStatus: scores.qualityStatus,
    ...(entity.kind === 'bank' &&
      scores.sizeCategory !== undefined && { sizeCategory: scores.sizeCategory }),
  };
}

export function sameScores(a: Entity, b: Entity): boolean {
  return (
    a.completenessScore === b.completenessScore &&
    a.confidenceScore === b.confidenceScore &&
    a.qualityStatus === b.qualityStatus &&
    (a.kind !== 'bank' || b.kind !== 'bank' || a.sizeCategory === b.sizeCategory)
  );
}
