import type {
  EntityKind,
  FieldMap,
  FieldNote,
  FieldScalar,
  FieldValue,
  SourceId,
  SupersededValue,
} from '@mrm/shared';
import type { ReliabilityTable } from '../config.js';

const UNKNOWN_SOURCE_WEIGHT = 0.5;

export type WeightOf = (source: SourceId) => number;

// Reliability lookup for one entity kind; persons use the person weight where one is set
export function weightLookup(table: ReliabilityTable, kind: EntityKind): WeightOf {
  return (source) => {
    const entry = table[source];
    if (!entry) {
      return UNKNOWN_SOURCE_WEIGHT;
    }
    return kind === 'person' ? (entry.person ?? entry.generic) : entry.generic;
  };
}

export type MergeDecision =
  | 'initial' // nothing there before
  | 'authoritative' // incoming source strictly more reliable
  | 'fresher' // equal reliability, later observation
  | 'refreshed' // same value, provenance updated
  | 'kept' // existing more reliable or fresher
  | 'tie' // exact tie, incoming kept as a note
  | 'unchanged'; // nothing to do

export interface FieldMergeResult {
  value: FieldValue;
  decision: MergeDecision;
  superseded?: FieldValue;
}

function sameNote(a: FieldNote, b: FieldNote): boolean {
  return a.value === b.value && a.source === b.source && a.observedAt === b.observedAt;
}

function withoutNotes(field: FieldValue): FieldValue {
  const { notes: _notes, ...rest } = field;
  return rest;
}

/**
 * Merge one field value, in order:
 *   1. nothing existing: incoming wins
 *   2. incoming source strictly more reliable: incoming wins regardless of recency
 *   3. equal reliability: later observedAt wins
 *   4. equal reliability and timestamp: existing stays, incoming becomes a note
 * An existing value from a strictly more reliable source is always kept.
 */
export function resolveField(
  existing: FieldValue | undefined,
  incoming: FieldValue,
  weightOf: WeightOf
): FieldMergeResult {
  if (!existing) {
    return { value: incoming, decision: 'initial' };
  }

  const existingWeight = weightOf(existing.source);
  const incomingWeight = weightOf(incoming.source);
  const sameValue = existing.value === incoming.value;

  let incomingWins: boolean;
  if (incomingWeight !== existingWeight) {
    incomingWins = incomingWeight > existingWeight;
  } else {
    const existingTime = Date.parse(existing.observedAt);
    const incomingTime = Date.parse(incoming.observedAt);
    if (incomingTime === existingTime) {
      if (sameValue) {
        return { value: existing, decision: 'unchanged' };
      }
      const note: FieldNote = {
        value: incoming.value,
        source: incoming.source,
        observedAt: incoming.observedAt,
      };
      const notes = existing.notes ?? [];
      if (notes.some((known) => sameNote(known, note))) {
        return { value: existing, decision: 'unchanged' };
      }
      return { value: { ...existing, notes: [...notes, note] }, decision: 'tie' };
    }
    incomingWins = incomingTime > existingTime;
  }

  if (!incomingWins) {
    return { value: existing, decision: 'kept' };
  }
  if (sameValue) {
    if (existing.source === incoming.source && existing.observedAt === incoming.observedAt) {
      return { value: existing, decision: 'unchanged' };
    }
    return {
      value: { ...incoming, ...(existing.notes && { notes: existing.notes }) },
      decision: 'refreshed',
    };
  }
  return {
    value: incoming,
    decision: incomingWeight > existingWeight ? 'authoritative' : 'fresher',
    superseded: withoutNotes(existing),
  };
}

// merge(existing?, incoming) -> FieldValue
export function mergeFieldValue(
  existing: FieldValue | undefined,
  incoming: FieldValue,
  weightOf: WeightOf
): FieldValue {
  return resolveField(existing, incoming, weightOf).value;
}

export interface FieldMapMerge<K extends string> {
  fields: FieldMap<K>;
  changed: string[];
  superseded: SupersededValue[];
}

/**
 * Merge every provided value into a field map. `path` prefixes the field names
 * reported as changed or superseded (e.g. "departments[model risk].").
 */
export function mergeFieldMap<K extends string>(
  existing: FieldMap<K>,
  incoming: ReadonlyArray<readonly [K, FieldValue]>,
  weightOf: WeightOf,
  supersededAt: string,
  path = ''
): FieldMapMerge<K> {
  const fields: FieldMap<K> = { ...existing };
  const changed: string[] = [];
  const superseded: SupersededValue[] = [];

  for (const [field, value] of incoming) {
    const result = resolveField(fields[field], value, weightOf);
    if (result.decision === 'unchanged' || result.decision === 'kept') {
      continue;
    }
    fields[field] = result.value;
    changed.push(`${path}${field}`);
    if (result.superseded) {
      superseded.push({
        field: `${path}${field}`,
        previous: result.superseded,
        supersededBy: value.source,
        supersededAt,
      });
    }
  }

  return { fields, changed, superseded };
}

// Additive set merge preserving first-seen order
export function mergeSet<T extends FieldScalar>(
  existing: readonly T[],
  incoming: readonly T[]
): { values: T[]; added: T[] } {
  const known = new Set(existing);
  const added: T[] = [];
  for (const value of incoming) {
    if (!known.has(value)) {
      known.add(value);
      added.push(value);
    }
  }
  return { values: [...existing, ...added], added };
}

// FieldValue for an observed scalar; confidence clamped to [0, 1]
export function fieldValue(
  value: FieldScalar,
  source: SourceId,
  observedAt: string,
  confidence: number
): FieldValue {
  return {
    value,
    source,
    observedAt,
    confidence: Math.min(1, Math.max(0, confidence)),
  };
}
