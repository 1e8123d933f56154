import {
  CollectionKind,
  CollectionStatus,
  MergeOutcome,
  QualityStatus,
  type BankEntity,
  type BankField,
  type BankObservation,
  type Entity,
  type FieldScalar,
  type FieldValue,
  type Observation,
  type PersonEntity,
  type PersonField,
  type PersonObservation,
  type ReconcileSummary,
  type SourceId,
  type SupersededValue,
} from '@mrm/shared';
import type { EngineConfig } from '../config.js';
import {
  AmbiguousMatchError,
  AppError,
  ConflictError,
  StorageError,
  ValidationError,
  toAppError,
} from '../errors.js';
import { KeyedLock } from '../keyedLock.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import { keys, normalizeHandle, normalizeOrgName } from '../normalize.js';
import { sleep as defaultSleep, type Clock, type Sleep } from '../rateLimiter.js';
import type { RecordStore } from '../store.js';
import { parseObservation } from '../validation.js';
import { newLogEntry, recordLog } from './collectionLog.js';
import { mergeDepartments } from './departments.js';
import {
  EntityIndex,
  candidateKeysFor,
  match,
  pairKeysFor,
  type MatchDecision,
} from './matcher.js';
import { fieldValue, mergeFieldMap, mergeSet, weightLookup, type WeightOf } from './mergePolicy.js';
import { applyScores, computeScores, sameScores } from './scoring.js';

export interface ReconciliationDeps {
  store: RecordStore;
  config: EngineConfig;
  logger?: Logger;
  clock?: Clock;
  sleep?: Sleep;
}

export interface ReconcileOptions {
  batchId?: string;
}

export interface Reconciled {
  entity: Entity;
  outcome: MergeOutcome;
  changed: boolean;
  fieldsChanged: string[];
}

export type ReconcileResult = ({ ok: true } & Reconciled) | { ok: false; error: AppError };

const BANK_FIELDS: readonly BankField[] = [
  'name',
  'certId',
  'rssdId',
  'assetRank',
  'totalAssets',
  'headquartersCity',
  'headquartersState',
  'website',
  'notes',
];

const PERSON_FIELDS: readonly Exclude<PersonField, 'employer'>[] = [
  'name',
  'title',
  'department',
  'profileHandle',
  'email',
];

// Lock on a resolved entity, taken after the observation's lookup-key locks
const entityLock = (identityKey: string) => `ENTITY#${identityKey}`;

type Creation = Extract<MatchDecision, { kind: 'none' | 'ambiguous' }>;

function isCreation(decision: MatchDecision): decision is Creation {
  return decision.kind === 'none' || decision.kind === 'ambiguous';
}

function baseIdentityKey(observation: Observation): string {
  if (observation.kind === 'bank') {
    const { certId, name } = observation.fields;
    if (certId !== undefined) return keys.cert(certId);
    if (name) return keys.bankName(name);
    throw new ValidationError('Bank observation needs a name or a registry certificate id');
  }
  const { profileHandle, name } = observation.fields;
  if (profileHandle) return keys.handle(profileHandle);
  // A name with no affiliation gets a key no observation looks up
  if (name) return pairKeysFor(observation)[0] ?? keys.person(name, '');
  throw new ValidationError('Person observation needs a name or a profile handle');
}

type Envelope = Pick<
  Entity,
  | 'identityKey'
  | 'lookupKeys'
  | 'dataSources'
  | 'completenessScore'
  | 'confidenceScore'
  | 'qualityStatus'
  | 'needsReview'
  | 'history'
  | 'version'
  | 'createdAt'
  | 'updatedAt'
>;

function envelope(identityKey: string, now: string): Envelope {
  return {
    identityKey,
    lookupKeys: [identityKey],
    dataSources: [],
    completenessScore: 0,
    confidenceScore: 0,
    qualityStatus: QualityStatus.UNKNOWN,
    needsReview: false,
    history: [],
    version: 0,
    createdAt: now,
    updatedAt: now,
  };
}

function newBank(identityKey: string, now: string): BankEntity {
  return {
    ...envelope(identityKey, now),
    kind: 'bank',
    attributes: {},
    sourceUrls: [],
    tags: [],
    departments: [],
    leadership: [],
  };
}

function newPerson(identityKey: string, now: string): PersonEntity {
  return {
    ...envelope(identityKey, now),
    kind: 'person',
    attributes: {},
    employers: [],
    bankKeys: [],
  };
}

interface EnvelopeMerge {
  dataSources: SourceId[];
  lookupKeys: string[];
  keysAdded: number;
  lastVerifiedAt?: string;
  history: SupersededValue[];
  changed: string[];
}

function mergeEnvelope(
  entity: Entity,
  observation: Observation,
  superseded: readonly SupersededValue[]
): EnvelopeMerge {
  const dataSources = mergeSet(entity.dataSources, [observation.source]);
  const lookupKeys = mergeSet(entity.lookupKeys, candidateKeysFor(observation));
  const changed = dataSources.added.length > 0 ? ['dataSources'] : [];

  let lastVerifiedAt = entity.lastVerifiedAt;
  if (
    observation.verified &&
    (lastVerifiedAt === undefined ||
      Date.parse(observation.observedAt) > Date.parse(lastVerifiedAt))
  ) {
    lastVerifiedAt = observation.observedAt;
    changed.push('lastVerifiedAt');
  }

  return {
    dataSources: dataSources.values,
    lookupKeys: lookupKeys.values,
    keysAdded: lookupKeys.added.length,
    ...(lastVerifiedAt !== undefined && { lastVerifiedAt }),
    history: [...entity.history, ...superseded],
    changed,
  };
}

// Writes of one observation: the entity it resolves to plus any leaders it names
interface Draft {
  base: Entity;
  next: Entity;
}

interface Review {
  identityKey: string;
  candidateKeys: string[];
  reason: string;
}

interface PendingWrites {
  drafts: Map<string, Draft>;
  index: EntityIndex;
  reviews: Review[];
}

// A merge that lost a version race is redone from fresh reads this many times at most
const MAX_MERGE_ATTEMPTS = 3;

// Lookup keys that can also be identity keys, so the store answers them directly
const isIdentityForm = (key: string) => !key.startsWith('PNAME:');

function outcomeOf(decision: MatchDecision): MergeOutcome {
  if (decision.kind === 'ambiguous') return MergeOutcome.MERGED_AMBIGUOUS;
  return decision.kind === 'none' ? MergeOutcome.CREATED : MergeOutcome.UPDATED;
}

/**
 * Folds observations into canonical entities. Each observation is matched,
 * merged field by field and rescored; the entity and every leader it names
 * are committed together while the observation's locks are held. A commit
 * that loses to another writer is redone from fresh reads. Failures are
 * returned as results, never thrown.
 */
export class ReconciliationEngine {
  private readonly index = new EntityIndex();
  private readonly locks = new KeyedLock();
  private readonly store: RecordStore;
  private readonly config: EngineConfig;
  private readonly log: Logger;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly weights: Record<Entity['kind'], WeightOf>;

  constructor(deps: ReconciliationDeps) {
    this.store = deps.store;
    this.config = deps.config;
    this.log = deps.logger ?? rootLogger;
    this.clock = deps.clock ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
    this.weights = {
      bank: weightLookup(deps.config.reliabilityWeights, 'bank'),
      person: weightLookup(deps.config.reliabilityWeights, 'person'),
    };
  }

  // Rebuild the lookup index from the store
  async load(): Promise<number> {
    const entities = await this.store.queryEntities(() => true);
    this.index.clear();
    for (const entity of entities) {
      this.index.add(entity);
    }
    this.log.info({ entities: entities.length }, 'Entity index loaded');
    return entities.length;
  }

  lockKeysFor(observation: Observation): string[] {
    return candidateKeysFor(observation);
  }

  /**
   * Apply one observation. Lock keys are registered before this returns, so
   * observations sharing a key apply in the order this method was called.
   */
  reconcile(input: unknown, options: ReconcileOptions = {}): Promise<ReconcileResult> {
    const started = this.clock();
    const parsed = this.parse(input);
    if (parsed instanceof AppError) {
      return this.fail(parsed, undefined, options, started);
    }

    const pending = this.locks.run(this.lockKeysFor(parsed), () => this.apply(parsed, options));
    return this.settle(pending, parsed, options, started);
  }

  // Apply a stream of observations; one failure never stops the rest
  async reconcileMany(
    inputs: readonly unknown[],
    options: ReconcileOptions = {}
  ): Promise<ReconcileSummary> {
    const results = await Promise.all(inputs.map((input) => this.reconcile(input, options)));

    const summary: ReconcileSummary = {
      total: inputs.length,
      created: 0,
      updated: 0,
      unchanged: 0,
      ambiguous: 0,
      failed: 0,
      results: [],
    };

    results.forEach((result, index) => {
      if (!result.ok) {
        summary.failed++;
        summary.results.push({ index, ok: false, error: result.error.message, code: result.error.code });
        return;
      }
      if (result.outcome === MergeOutcome.CREATED) summary.created++;
      else if (result.outcome === MergeOutcome.MERGED_AMBIGUOUS) summary.ambiguous++;
      else if (result.changed) summary.updated++;
      else summary.unchanged++;
      summary.results.push({
        index,
        ok: true,
        identityKey: result.entity.identityKey,
        outcome: result.outcome,
        changed: result.changed,
      });
    });

    return summary;
  }

  private parse(input: unknown): Observation | AppError {
    try {
      return parseObservation(input);
    } catch (error) {
      return toAppError(error);
    }
  }

  private async settle(
    pending: Promise<Reconciled>,
    observation: Observation,
    options: ReconcileOptions,
    started: number
  ): Promise<ReconcileResult> {
    let reconciled: Reconciled;
    try {
      reconciled = await pending;
    } catch (error) {
      return this.fail(error, observation, options, started);
    }

    // Banks score their leaders, so a changed person rescores the banks that reference it
    if (reconciled.entity.kind === 'person' && reconciled.changed) {
      await this.refreshBankScores(reconciled.entity);
    }
    return { ok: true, ...reconciled };
  }

  private async fail(
    error: unknown,
    observation: Observation | undefined,
    options: ReconcileOptions,
    started: number
  ): Promise<ReconcileResult> {
    const appError = toAppError(error);
    const entityKey = observation ? candidateKeysFor(observation)[0] : undefined;

    this.log.error(
      {
        error: appError,
        code: appError.code,
        identityKey: entityKey,
        source: observation?.source,
        operation: 'reconcile',
        batchId: options.batchId,
      },
      'Observation failed to reconcile'
    );

    await recordLog(
      this.store,
      newLogEntry(
        {
          ...(entityKey !== undefined && { entityKey }),
          ...(observation && { source: observation.source }),
          kind: CollectionKind.RECONCILIATION,
          status: CollectionStatus.FAILED,
          recordsChanged: 0,
          errors: [appError.message],
          durationMs: this.clock() - started,
          detail: {
            code: appError.code,
            ...(observation?.observationId !== undefined && {
              observationId: observation.observationId,
            }),
          },
          ...(options.batchId !== undefined && { batchId: options.batchId }),
        },
        this.now()
      ),
      this.log
    );

    return { ok: false, error: appError };
  }

  // Runs while holding the observation's lookup-key locks
  private apply(observation: Observation, options: ReconcileOptions): Promise<Reconciled> {
    return this.retryOnConflict(candidateKeysFor(observation)[0], async () => {
      const writes = this.pendingWrites();
      const { identityKey, decision } = await this.resolve(observation, writes);

      return this.locks.run([entityLock(identityKey)], async () => {
        const staged =
          observation.kind === 'bank'
            ? await this.stageBank(observation, identityKey, decision, writes, options)
            : await this.stagePerson(observation, identityKey, decision, writes);
        return this.finish(staged, writes, observation);
      });
    });
  }

  private async retryOnConflict<T>(
    identityKey: string | undefined,
    attempt: () => Promise<T>
  ): Promise<T> {
    for (let n = 1; ; n++) {
      try {
        return await attempt();
      } catch (error) {
        if (!(error instanceof ConflictError) || n >= MAX_MERGE_ATTEMPTS) {
          throw error;
        }
        this.log.warn(
          { error, identityKey, attempt: n },
          'Entity changed during the merge, retrying'
        );
      }
    }
  }

  private pendingWrites(): PendingWrites {
    return { drafts: new Map(), index: this.index.overlay(), reviews: [] };
  }

  private async resolve(
    observation: Observation,
    writes: PendingWrites
  ): Promise<{ identityKey: string; decision: MatchDecision }> {
    const candidates = await this.candidates(observation, writes);
    const decision = match(observation, candidates, writes.index);
    const base = baseIdentityKey(observation);
    const identityKey =
      decision.kind === 'ambiguous'
        ? await this.allocateIdentityKey(base, writes)
        : decision.kind === 'none'
          ? base
          : decision.entity.identityKey;
    return { identityKey, decision };
  }

  /**
   * Entities the index knows for the observation's keys, plus whatever the
   * store holds under its identity-form keys: another engine sharing the
   * store may have written those since this one loaded its index.
   */
  private async candidates(observation: Observation, writes: PendingWrites): Promise<Entity[]> {
    const lookupKeys = candidateKeysFor(observation);
    const indexed = writes.index.resolve(lookupKeys);
    const unindexed = [...lookupKeys.filter(isIdentityForm), baseIdentityKey(observation)].filter(
      (key) => !writes.index.has(key)
    );

    const identityKeys = [...new Set([...indexed, ...unindexed])];
    const found = await Promise.all(identityKeys.map((key) => this.read(key, writes)));
    const entities = found.filter((entity): entity is Entity => entity !== null);
    for (const entity of entities) {
      if (!writes.drafts.has(entity.identityKey)) this.index.add(entity);
    }
    return entities;
  }

  // Staged state first, then the store
  private async read(identityKey: string, writes: PendingWrites): Promise<Entity | null> {
    return writes.drafts.get(identityKey)?.next ?? this.store.getEntity(identityKey);
  }

  // New identity key for an ambiguous match, disambiguated with a #n suffix
  private async allocateIdentityKey(base: string, writes: PendingWrites): Promise<string> {
    let identityKey = base;
    for (
      let n = 2;
      writes.index.has(identityKey) || (await this.read(identityKey, writes));
      n++
    ) {
      identityKey = `${base}#${n}`;
    }
    return identityKey;
  }

  private async stored(identityKey: string, writes: PendingWrites): Promise<Entity> {
    const entity = await this.read(identityKey, writes);
    if (!entity) {
      throw new StorageError('getEntity', `indexed entity ${identityKey} is missing`);
    }
    return entity;
  }

  private valueFactory(observation: Observation, weightOf: WeightOf) {
    const confidence = observation.confidence ?? weightOf(observation.source);
    return (value: FieldScalar): FieldValue =>
      fieldValue(value, observation.source, observation.observedAt, confidence);
  }

  private async stageBank(
    observation: BankObservation,
    identityKey: string,
    decision: MatchDecision,
    writes: PendingWrites,
    options: ReconcileOptions
  ): Promise<Reconciled> {
    const now = this.now();
    let current: BankEntity;
    if (isCreation(decision)) {
      current = newBank(identityKey, now);
    } else {
      const stored = await this.stored(identityKey, writes);
      if (stored.kind !== 'bank') {
        throw new StorageError('getEntity', `${identityKey} is not a bank`);
      }
      current = stored;
    }

    const weightOf = this.weights.bank;
    const toValue = this.valueFactory(observation, weightOf);

    const entries: Array<readonly [BankField, FieldValue]> = [];
    for (const field of BANK_FIELDS) {
      const value = observation.fields[field];
      if (value !== undefined) entries.push([field, toValue(value)]);
    }
    const attributes = mergeFieldMap(current.attributes, entries, weightOf, now);
    const departments = mergeDepartments(
      current.departments,
      observation.departments,
      toValue,
      weightOf,
      now
    );
    const sourceUrls = mergeSet(current.sourceUrls, [
      ...(observation.fields.sourceUrls ?? []),
      ...(observation.sourceUrl ? [observation.sourceUrl] : []),
    ]);
    const tags = mergeSet(current.tags, observation.fields.tags ?? []);

    const bankName = attributes.fields.name?.value;
    const leaderKeys = await this.stageLeaders(
      observation,
      identityKey,
      typeof bankName === 'string' ? bankName : undefined,
      writes,
      options
    );
    const leadership = mergeSet(current.leadership, leaderKeys);
    const merged = mergeEnvelope(current, observation, [
      ...attributes.superseded,
      ...departments.superseded,
    ]);

    const fieldsChanged = [
      ...attributes.changed,
      ...departments.changed,
      ...(sourceUrls.added.length > 0 ? ['sourceUrls'] : []),
      ...(tags.added.length > 0 ? ['tags'] : []),
      ...(leadership.added.length > 0 ? ['leadership'] : []),
      ...merged.changed,
    ];

    const draft: BankEntity = {
      ...current,
      attributes: attributes.fields,
      departments: departments.departments,
      sourceUrls: sourceUrls.values,
      tags: tags.values,
      leadership: leadership.values,
      dataSources: merged.dataSources,
      lookupKeys: merged.lookupKeys,
      history: merged.history,
      ...(merged.lastVerifiedAt !== undefined && { lastVerifiedAt: merged.lastVerifiedAt }),
      ...(decision.kind === 'ambiguous' && { needsReview: true, reviewReason: decision.reason }),
    };
    const leaders = await this.loadLeaders(draft.leadership, writes);
    const next = applyScores(draft, computeScores(draft, this.config.reliabilityWeights, leaders));

    return this.stage(current, next, fieldsChanged, merged.keysAdded, decision, writes);
  }

  /**
   * Leadership entries become person observations staged inside the bank's
   * critical section, so they commit with the bank or not at all. Person
   * locks nest inside bank locks, never the reverse.
   */
  private async stageLeaders(
    observation: BankObservation,
    bankKey: string,
    bankName: string | undefined,
    writes: PendingWrites,
    options: ReconcileOptions
  ): Promise<string[]> {
    const resolved: string[] = [];
    for (const leader of observation.leadership) {
      const personObservation: PersonObservation = {
        kind: 'person',
        source: observation.source,
        observedAt: observation.observedAt,
        ...(observation.confidence !== undefined && { confidence: observation.confidence }),
        ...(observation.verified !== undefined && { verified: observation.verified }),
        fields: { ...leader },
        ...(bankName !== undefined && { employer: bankName }),
        bankKey,
      };
      const identityKey = await this.locks.run(this.lockKeysFor(personObservation), async () => {
        const { identityKey, decision } = await this.resolve(personObservation, writes);
        await this.locks.run([entityLock(identityKey)], () =>
          this.stagePerson(personObservation, identityKey, decision, writes)
        );
        return identityKey;
      });
      resolved.push(identityKey);
    }
    if (resolved.length > 0) {
      this.log.debug(
        { identityKey: bankKey, leaders: resolved, batchId: options.batchId },
        'Leaders staged'
      );
    }
    return resolved;
  }

  private async stagePerson(
    observation: PersonObservation,
    identityKey: string,
    decision: MatchDecision,
    writes: PendingWrites
  ): Promise<Reconciled> {
    const now = this.now();
    let current: PersonEntity;
    if (isCreation(decision)) {
      current = newPerson(identityKey, now);
    } else {
      const stored = await this.stored(identityKey, writes);
      if (stored.kind !== 'person') {
        throw new StorageError('getEntity', `${identityKey} is not a person`);
      }
      current = stored;
    }

    const weightOf = this.weights.person;
    const toValue = this.valueFactory(observation, weightOf);

    const entries: Array<readonly [PersonField, FieldValue]> = [];
    for (const field of PERSON_FIELDS) {
      const value = observation.fields[field];
      if (value === undefined) continue;
      entries.push([field, toValue(field === 'profileHandle' ? normalizeHandle(value) : value)]);
    }
    if (observation.employer) {
      entries.push(['employer', toValue(observation.employer)]);
    }

    const attributes = mergeFieldMap(current.attributes, entries, weightOf, now);
    const employers = mergeSet(
      current.employers,
      observation.employer ? [normalizeOrgName(observation.employer)] : []
    );
    const bankKeys = mergeSet(current.bankKeys, observation.bankKey ? [observation.bankKey] : []);
    const merged = mergeEnvelope(current, observation, attributes.superseded);

    const fieldsChanged = [
      ...attributes.changed,
      ...(employers.added.length > 0 ? ['employers'] : []),
      ...(bankKeys.added.length > 0 ? ['bankKeys'] : []),
      ...merged.changed,
    ];

    const draft: PersonEntity = {
      ...current,
      attributes: attributes.fields,
      employers: employers.values,
      bankKeys: bankKeys.values,
      dataSources: merged.dataSources,
      lookupKeys: merged.lookupKeys,
      history: merged.history,
      ...(merged.lastVerifiedAt !== undefined && { lastVerifiedAt: merged.lastVerifiedAt }),
      ...(decision.kind === 'ambiguous' && { needsReview: true, reviewReason: decision.reason }),
    };
    const next = applyScores(draft, computeScores(draft, this.config.reliabilityWeights));

    return this.stage(current, next, fieldsChanged, merged.keysAdded, decision, writes);
  }

  // Record the next state as a draft when anything changed; unchanged merges stage nothing
  private stage(
    current: Entity,
    next: Entity,
    fieldsChanged: string[],
    keysAdded: number,
    decision: MatchDecision,
    writes: PendingWrites
  ): Reconciled {
    const outcome = outcomeOf(decision);
    const changed =
      isCreation(decision) ||
      fieldsChanged.length > 0 ||
      keysAdded > 0 ||
      !sameScores(current, next);
    if (!changed) {
      return { entity: current, outcome, changed: false, fieldsChanged: [] };
    }

    const base = writes.drafts.get(next.identityKey)?.base ?? current;
    writes.drafts.set(next.identityKey, { base, next });
    writes.index.add(next);
    if (decision.kind === 'ambiguous') {
      writes.reviews.push({
        identityKey: next.identityKey,
        candidateKeys: decision.candidateKeys,
        reason: decision.reason,
      });
    }
    return { entity: next, outcome, changed: true, fieldsChanged };
  }

  private async finish(
    staged: Reconciled,
    writes: PendingWrites,
    observation: Observation
  ): Promise<Reconciled> {
    const committed = await this.commit([...writes.drafts.values()]);

    for (const review of writes.reviews) {
      await this.recordReview(review, observation);
    }

    const entity = committed.find((e) => e.identityKey === staged.entity.identityKey);
    if (!entity) {
      return staged;
    }
    this.log.debug(
      {
        identityKey: entity.identityKey,
        outcome: staged.outcome,
        fieldsChanged: staged.fieldsChanged,
        entitiesWritten: committed.length,
        source: observation.source,
      },
      'Observation reconciled'
    );
    return { ...staged, entity };
  }

  // One atomic write per observation; a storage failure is retried once after a backoff
  private async commit(drafts: readonly Draft[]): Promise<Entity[]> {
    if (drafts.length === 0) {
      return [];
    }
    const updatedAt = this.now();
    const entities = drafts.map(
      ({ base, next }): Entity => ({ ...next, version: base.version + 1, updatedAt })
    );

    try {
      await this.store.upsertEntities(entities);
    } catch (error) {
      if (!(error instanceof StorageError)) {
        throw error;
      }
      this.log.warn(
        {
          error,
          identityKeys: entities.map((entity) => entity.identityKey),
          operation: 'upsertEntities',
        },
        'Entity write failed, retrying once'
      );
      await this.sleep(this.config.storageRetryDelayMs);
      await this.store.upsertEntities(entities);
    }

    for (const entity of entities) {
      this.index.add(entity);
    }
    return entities;
  }

  private async recordReview(review: Review, observation: Observation): Promise<void> {
    const { identityKey, candidateKeys, reason } = review;
    const warning = new AmbiguousMatchError(identityKey, candidateKeys, reason);
    this.log.warn(
      { identityKey, candidateKeys, reason, source: observation.source },
      'Ambiguous match, created a new entity for review'
    );
    await recordLog(
      this.store,
      newLogEntry(
        {
          entityKey: identityKey,
          source: observation.source,
          kind: CollectionKind.MATCH_REVIEW,
          status: CollectionStatus.PARTIAL,
          recordsChanged: 1,
          errors: [warning.message],
          durationMs: 0,
          detail: { candidateKeys, reason },
        },
        this.now()
      ),
      this.log
    );
  }

  private async loadLeaders(
    leadership: readonly string[],
    writes?: PendingWrites
  ): Promise<PersonEntity[]> {
    const found = await Promise.all(
      leadership.map((key) => (writes ? this.read(key, writes) : this.store.getEntity(key)))
    );
    return found.filter((entity): entity is PersonEntity => entity?.kind === 'person');
  }

  private async refreshBankScores(person: PersonEntity): Promise<void> {
    for (const bankKey of person.bankKeys) {
      try {
        await this.locks.run([entityLock(bankKey)], () =>
          this.retryOnConflict(bankKey, () => this.rescoreBank(bankKey, person.identityKey))
        );
      } catch (error) {
        this.log.error(
          { error, identityKey: bankKey, operation: 'rescore' },
          'Failed to refresh bank scores'
        );
      }
    }
  }

  // A person naming a bank joins its leadership; the bank is rescored either way
  private async rescoreBank(bankKey: string, personKey: string): Promise<void> {
    const bank = await this.store.getEntity(bankKey);
    if (bank?.kind !== 'bank') {
      return;
    }
    const leadership = mergeSet(bank.leadership, [personKey]);
    const draft: BankEntity = { ...bank, leadership: leadership.values };
    const leaders = await this.loadLeaders(draft.leadership);
    const next = applyScores(draft, computeScores(draft, this.config.reliabilityWeights, leaders));
    if (leadership.added.length === 0 && sameScores(bank, next)) {
      return;
    }
    await this.commit([{ base: bank, next }]);
  }

  private now(): string {
    return new Date(this.clock()).toISOString();
  }
}
