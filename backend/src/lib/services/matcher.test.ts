import { describe, it, expect } from 'vitest';
import type {
  BankEntity,
  BankObservation,
  FieldValue,
  PersonEntity,
  PersonObservation,
} from '@mrm/shared';
import { EntityIndex, candidateKeysFor, match, pairKeysFor } from './matcher.js';

const AT = '2026-01-01T00:00:00Z';

const fv = (value: string | number): FieldValue => ({
  value,
  source: 'registry_api',
  observedAt: AT,
  confidence: 0.95,
});

function bank(identityKey: string, lookupKeys: string[], certId?: number): BankEntity {
  return {
    identityKey,
    kind: 'bank',
    lookupKeys,
    dataSources: ['registry_api'],
    completenessScore: 0,
    confidenceScore: 0,
    qualityStatus: 'unknown',
    needsReview: false,
    history: [],
    version: 1,
    createdAt: AT,
    updatedAt: AT,
    attributes: { name: fv('Acme Bank'), ...(certId !== undefined && { certId: fv(certId) }) },
    sourceUrls: [],
    tags: [],
    departments: [],
    leadership: [],
  };
}

function person(
  identityKey: string,
  lookupKeys: string[],
  extra: { handle?: string; employers?: string[]; bankKeys?: string[] } = {}
): PersonEntity {
  return {
    identityKey,
    kind: 'person',
    lookupKeys,
    dataSources: ['professional_network'],
    completenessScore: 0,
    confidenceScore: 0,
    qualityStatus: 'unknown',
    needsReview: false,
    history: [],
    version: 1,
    createdAt: AT,
    updatedAt: AT,
    attributes: {
      name: fv('Jane Doe'),
      ...(extra.handle !== undefined && { profileHandle: fv(extra.handle) }),
    },
    employers: extra.employers ?? [],
    bankKeys: extra.bankKeys ?? [],
  };
}

function bankObs(fields: BankObservation['fields']): BankObservation {
  return { kind: 'bank', source: 'registry_api', observedAt: AT, fields, departments: [], leadership: [] };
}

function personObs(
  fields: PersonObservation['fields'],
  extra: { employer?: string; bankKey?: string } = {}
): PersonObservation {
  return { kind: 'person', source: 'professional_network', observedAt: AT, fields, ...extra };
}

describe('EntityIndex', () => {
  it('maps lookup keys to one or more identity keys', () => {
    const index = new EntityIndex();
    index.add({ identityKey: 'CERT:1', lookupKeys: ['CERT:1', 'NAME:acmebank'] });
    index.add({ identityKey: 'CERT:2', lookupKeys: ['CERT:2', 'NAME:acmebank'] });
    index.add({ identityKey: 'CERT:1', lookupKeys: ['CERT:1', 'NAME:acmebank'] });

    expect(index.lookup('NAME:acmebank')).toEqual(['CERT:1', 'CERT:2']);
    expect(index.resolve(['CERT:2', 'NAME:acmebank'])).toEqual(['CERT:2', 'CERT:1']);
    expect(index.has('CERT:3')).toBe(false);
    expect(index.size).toBe(3);

    index.clear();
    expect(index.size).toBe(0);
  });

  it('keeps overlay additions out of the parent', () => {
    const index = new EntityIndex();
    index.add({ identityKey: 'CERT:1', lookupKeys: ['CERT:1', 'NAME:acmebank'] });
    const overlay = index.overlay();
    overlay.add({ identityKey: 'NAME:acmebank#2', lookupKeys: ['NAME:acmebank#2', 'NAME:acmebank'] });

    expect(overlay.lookup('NAME:acmebank')).toEqual(['CERT:1', 'NAME:acmebank#2']);
    expect(overlay.has('CERT:1')).toBe(true);
    expect(overlay.has('NAME:acmebank#2')).toBe(true);
    expect(index.lookup('NAME:acmebank')).toEqual(['CERT:1']);
    expect(index.has('NAME:acmebank#2')).toBe(false);
  });
});

describe('pairKeysFor', () => {
  it('pairs the name with the employer and with the referencing bank', () => {
    expect(pairKeysFor(personObs({ name: 'John Smith' }, { employer: 'Acme Bank', bankKey: 'CERT:1' }))).toEqual([
      'PERSON:john smith|acmebank',
      'PERSON:john smith@CERT:1',
    ]);
  });

  it('never pairs with an employer that normalizes to nothing', () => {
    expect(pairKeysFor(personObs({ name: 'John Smith' }, { employer: '...' }))).toEqual([]);
    expect(pairKeysFor(personObs({ name: 'John Smith' }, { employer: '...', bankKey: 'CERT:2' }))).toEqual([
      'PERSON:john smith@CERT:2',
    ]);
    expect(pairKeysFor(personObs({ profileHandle: 'john-smith' }, { employer: 'Acme Bank' }))).toEqual([]);
  });
});

describe('candidateKeysFor', () => {
  it('lists bank keys strongest first', () => {
    expect(candidateKeysFor(bankObs({ name: 'Acme Bank, N.A.', certId: 42 }))).toEqual([
      'CERT:42',
      'NAME:acmebank',
    ]);
  });

  it('lists person keys strongest first', () => {
    expect(
      candidateKeysFor(personObs({ name: 'Jane Doe', profileHandle: 'Jane-Doe' }, { employer: 'Acme Bank' }))
    ).toEqual(['HANDLE:jane-doe', 'PERSON:jane doe|acmebank', 'PNAME:jane doe']);
  });
});

describe('match banks', () => {
  const index = new EntityIndex();

  it('matches exactly on the certificate id', () => {
    const existing = bank('CERT:42', ['CERT:42', 'NAME:acmebank'], 42);
    const decision = match(bankObs({ certId: 42, name: 'Other Name' }), [existing], index);
    expect(decision).toEqual({ kind: 'exact', entity: existing, key: 'CERT:42' });
  });

  it('matches on the normalized name when certificates do not conflict', () => {
    const existing = bank('NAME:acmebank', ['NAME:acmebank']);
    const decision = match(bankObs({ name: 'ACME BANK, N.A.', certId: 42 }), [existing], index);
    expect(decision).toEqual({ kind: 'name', entity: existing, key: 'NAME:acmebank' });
  });

  it('treats the same name with different certificates as ambiguous', () => {
    const existing = bank('CERT:1', ['CERT:1', 'NAME:acmebank'], 1);
    expect(match(bankObs({ name: 'Acme Bank', certId: 2 }), [existing], index)).toEqual({
      kind: 'ambiguous',
      candidateKeys: ['CERT:1'],
      reason: 'same name but different certificate ids',
    });
  });

  it('treats a name shared by several banks as ambiguous', () => {
    const first = bank('CERT:1', ['CERT:1', 'NAME:acmebank'], 1);
    const second = bank('CERT:2', ['CERT:2', 'NAME:acmebank'], 2);
    expect(match(bankObs({ name: 'Acme Bank' }), [first, second], index)).toEqual({
      kind: 'ambiguous',
      candidateKeys: ['CERT:1', 'CERT:2'],
      reason: 'several banks share this name',
    });
  });

  it('returns none without candidates', () => {
    expect(match(bankObs({ name: 'Acme Bank' }), [], index)).toEqual({ kind: 'none' });
  });
});

describe('match persons', () => {
  it('matches exactly on the profile handle', () => {
    const index = new EntityIndex();
    const existing = person('HANDLE:jane-doe', ['HANDLE:jane-doe'], { handle: 'jane-doe' });
    const decision = match(personObs({ profileHandle: 'https://example.com/in/Jane-Doe' }), [existing], index);
    expect(decision).toEqual({ kind: 'exact', entity: existing, key: 'HANDLE:jane-doe' });
  });

  it('matches on name and employer when handles agree', () => {
    const index = new EntityIndex();
    const existing = person('PERSON:jane doe|acmebank', ['PERSON:jane doe|acmebank', 'PNAME:jane doe']);
    const decision = match(personObs({ name: 'Jane Doe', title: 'CRO' }, { employer: 'Acme Bank' }), [existing], index);
    expect(decision).toEqual({ kind: 'exact', entity: existing, key: 'PERSON:jane doe|acmebank' });
  });

  it('refuses to merge same name and employer with different handles', () => {
    const index = new EntityIndex();
    const existing = person('HANDLE:jane-doe-1', ['HANDLE:jane-doe-1', 'PERSON:jane doe|acmebank'], {
      handle: 'jane-doe-1',
    });
    const decision = match(
      personObs({ name: 'Jane Doe', profileHandle: 'jane-doe-2' }, { employer: 'Acme Bank' }),
      [existing],
      index
    );
    expect(decision).toEqual({
      kind: 'ambiguous',
      candidateKeys: ['HANDLE:jane-doe-1'],
      reason: 'same name and employer but different profile handles',
    });
  });

  it('never merges on a bare name', () => {
    const index = new EntityIndex();
    const existing = person('PERSON:jane doe|acmebank', ['PERSON:jane doe|acmebank', 'PNAME:jane doe'], {
      employers: ['acmebank'],
    });
    expect(match(personObs({ name: 'Jane Doe' }, { employer: 'Other Bank' }), [existing], index)).toEqual({
      kind: 'ambiguous',
      candidateKeys: ['PERSON:jane doe|acmebank'],
      reason: 'same name without a shared employer or bank',
    });
  });

  it('confirms a same-name match through a shared bank and an unclaimed handle', () => {
    const index = new EntityIndex();
    const existing = person('PERSON:jane doe|acmebank', ['PERSON:jane doe|acmebank', 'PNAME:jane doe'], {
      employers: ['acmebank'],
      bankKeys: ['CERT:42'],
    });
    const decision = match(
      personObs({ name: 'Jane Doe', profileHandle: 'jane-doe' }, { employer: 'Acme Holdings', bankKey: 'CERT:42' }),
      [existing],
      index
    );
    expect(decision).toEqual({ kind: 'confirmed', entity: existing, key: 'PNAME:jane doe' });
  });

  it('does not confirm when the handle already belongs to someone', () => {
    const index = new EntityIndex();
    index.add({ identityKey: 'HANDLE:jane-doe', lookupKeys: ['HANDLE:jane-doe'] });
    const existing = person('PERSON:jane doe|acmebank', ['PERSON:jane doe|acmebank', 'PNAME:jane doe'], {
      bankKeys: ['CERT:42'],
    });
    const decision = match(
      personObs({ name: 'Jane Doe', profileHandle: 'jane-doe' }, { bankKey: 'CERT:42' }),
      [existing],
      index
    );
    expect(decision).toEqual({
      kind: 'ambiguous',
      candidateKeys: ['PERSON:jane doe|acmebank'],
      reason: 'same name and shared employer but identity not confirmed',
    });
  });
});
