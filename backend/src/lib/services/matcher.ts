import type {
  BankEntity,
  BankObservation,
  Entity,
  Observation,
  PersonEntity,
  PersonObservation,
} from '@mrm/shared';
import { keys, normalizeHandle, normalizeOrgName } from '../normalize.js';

/**
 * Lookup key -> identity keys. Certificate and handle keys resolve to one
 * entity; name keys may resolve to several once ambiguous entities exist.
 * An overlay sees its parent's keys while keeping its own additions local.
 */
export class EntityIndex {
  private readonly byKey = new Map<string, string[]>();

  constructor(private readonly parent?: EntityIndex) {}

  overlay(): EntityIndex {
    return new EntityIndex(this);
  }

  add(entity: Pick<Entity, 'identityKey' | 'lookupKeys'>): void {
    for (const key of entity.lookupKeys) {
      const owners = this.byKey.get(key);
      if (!owners) {
        this.byKey.set(key, [entity.identityKey]);
      } else if (!owners.includes(entity.identityKey)) {
        owners.push(entity.identityKey);
      }
    }
  }

  lookup(key: string): readonly string[] {
    const own = this.byKey.get(key) ?? [];
    const inherited = this.parent?.lookup(key) ?? [];
    if (inherited.length === 0) return own;
    return [...new Set([...inherited, ...own])];
  }

  has(key: string): boolean {
    return this.byKey.has(key) || (this.parent?.has(key) ?? false);
  }

  // Identity keys reachable from any of the given lookup keys, first-seen order
  resolve(lookupKeys: readonly string[]): string[] {
    const found = new Set<string>();
    for (const key of lookupKeys) {
      for (const identityKey of this.lookup(key)) {
        found.add(identityKey);
      }
    }
    return [...found];
  }

  clear(): void {
    this.byKey.clear();
  }

  get size(): number {
    return this.byKey.size;
  }
}

export type MatchDecision =
  | { kind: 'exact' | 'name' | 'confirmed'; entity: Entity; key: string }
  | { kind: 'ambiguous'; candidateKeys: string[]; reason: string }
  | { kind: 'none' };

/**
 * Name-and-affiliation keys of a person observation: the employer pair when an
 * employer is named, then the pair scoped to the referencing bank. A name with
 * no affiliation has none, so it can only ever match through the review path.
 */
export function pairKeysFor(observation: PersonObservation): string[] {
  const { name } = observation.fields;
  if (!name) return [];
  const { employer, bankKey } = observation;
  return [
    ...(employer && normalizeOrgName(employer) !== '' ? [keys.person(name, employer)] : []),
    ...(bankKey !== undefined ? [keys.personAt(name, bankKey)] : []),
  ];
}

// Every lookup key an observation could match on, strongest first
export function candidateKeysFor(observation: Observation): string[] {
  if (observation.kind === 'bank') {
    const { certId, name } = observation.fields;
    return [
      ...(certId !== undefined ? [keys.cert(certId)] : []),
      ...(name ? [keys.bankName(name)] : []),
    ];
  }

  const { profileHandle, name } = observation.fields;
  return [
    ...(profileHandle ? [keys.handle(profileHandle)] : []),
    ...pairKeysFor(observation),
    ...(name ? [keys.personName(name)] : []),
  ];
}

function withKey<E extends Entity>(candidates: readonly E[], key: string): E[] {
  return candidates.filter((candidate) => candidate.lookupKeys.includes(key));
}

function candidateCertId(bank: BankEntity): number | undefined {
  const certId = bank.attributes.certId?.value;
  return typeof certId === 'number' ? certId : undefined;
}

function candidateHandle(person: PersonEntity): string | undefined {
  const handle = person.attributes.profileHandle?.value;
  return typeof handle === 'string' && handle !== '' ? normalizeHandle(handle) : undefined;
}

function matchBank(
  observation: BankObservation,
  candidates: readonly BankEntity[]
): MatchDecision {
  const { certId, name } = observation.fields;

  if (certId !== undefined) {
    const key = keys.cert(certId);
    const [byCert, ...others] = withKey(candidates, key);
    if (byCert && others.length === 0) {
      return { kind: 'exact', entity: byCert, key };
    }
    if (byCert) {
      return {
        kind: 'ambiguous',
        candidateKeys: [byCert, ...others].map((entity) => entity.identityKey),
        reason: `several entities answer to ${key}`,
      };
    }
  }

  if (!name) {
    return { kind: 'none' };
  }

  const key = keys.bankName(name);
  const byName = withKey(candidates, key);
  if (byName.length === 0) {
    return { kind: 'none' };
  }

  const compatible = byName.filter((bank) => {
    const known = candidateCertId(bank);
    return certId === undefined || known === undefined || known === certId;
  });
  const [only, ...rest] = compatible;
  if (only && rest.length === 0) {
    return { kind: 'name', entity: only, key };
  }
  return {
    kind: 'ambiguous',
    candidateKeys: byName.map((entity) => entity.identityKey),
    reason:
      compatible.length === 0
        ? 'same name but different certificate ids'
        : 'several banks share this name',
  };
}

function overlaps(person: PersonEntity, observation: PersonObservation): boolean {
  const employer = observation.employer ? normalizeOrgName(observation.employer) : undefined;
  return (
    (employer !== undefined && employer !== '' && person.employers.includes(employer)) ||
    (observation.bankKey !== undefined && person.bankKeys.includes(observation.bankKey))
  );
}

function matchPerson(
  observation: PersonObservation,
  candidates: readonly PersonEntity[],
  index: EntityIndex
): MatchDecision {
  const { profileHandle, name } = observation.fields;
  const handle = profileHandle ? normalizeHandle(profileHandle) : undefined;

  if (profileHandle) {
    const key = keys.handle(profileHandle);
    const [byHandle] = withKey(candidates, key);
    if (byHandle) {
      return { kind: 'exact', entity: byHandle, key };
    }
  }

  if (!name) {
    return { kind: 'none' };
  }

  for (const pairKey of pairKeysFor(observation)) {
    const byPair = withKey(candidates, pairKey);
    if (byPair.length === 0) continue;

    const compatible = byPair.filter((person) => {
      const known = candidateHandle(person);
      return handle === undefined || known === undefined || known === handle;
    });
    const [only, ...rest] = compatible;
    if (only && rest.length === 0) {
      return { kind: 'exact', entity: only, key: pairKey };
    }
    return {
      kind: 'ambiguous',
      candidateKeys: byPair.map((entity) => entity.identityKey),
      reason:
        compatible.length === 0
          ? 'same name and employer but different profile handles'
          : 'several persons share this name and employer',
    };
  }

  const sameName = withKey(candidates, keys.personName(name));
  if (sameName.length === 0) {
    return { kind: 'none' };
  }

  // Same name alone never merges; it needs an unclaimed handle to confirm
  const overlapping = sameName.filter((person) => overlaps(person, observation));
  const [candidate, ...others] = overlapping;
  if (
    candidate &&
    others.length === 0 &&
    profileHandle &&
    !index.has(keys.handle(profileHandle)) &&
    candidateHandle(candidate) === undefined
  ) {
    return { kind: 'confirmed', entity: candidate, key: keys.personName(name) };
  }

  return {
    kind: 'ambiguous',
    candidateKeys: sameName.map((entity) => entity.identityKey),
    reason:
      overlapping.length === 0
        ? 'same name without a shared employer or bank'
        : 'same name and shared employer but identity not confirmed',
  };
}

/**
 * Decide whether an observation describes one of the candidate entities.
 * `none` and `ambiguous` both mean a new entity is created; ambiguous ones are
 * flagged for review instead of being merged.
 */
export function match(
  observation: Observation,
  candidates: readonly Entity[],
  index: EntityIndex
): MatchDecision {
  if (observation.kind === 'bank') {
    const banks = candidates.filter((entity): entity is BankEntity => entity.kind === 'bank');
    return matchBank(observation, banks);
  }
  const persons = candidates.filter((entity): entity is PersonEntity => entity.kind === 'person');
  return matchPerson(observation, persons, index);
}
