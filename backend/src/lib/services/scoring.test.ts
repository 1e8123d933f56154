import { describe, it, expect } from 'vitest';
import type { BankEntity, FieldValue, PersonEntity, SourceId } from '@mrm/shared';
import { DEFAULT_RELIABILITY_WEIGHTS } from '../config.js';
import {
  BANK_CHECKLIST,
  BANK_CHECKLIST_TOTAL,
  PERSON_CHECKLIST,
  PERSON_CHECKLIST_TOTAL,
  applyScores,
  computeScores,
  confidence,
  contributingSources,
  missingFields,
  qualityStatus,
  sameScores,
  sizeCategory,
} from './scoring.js';

const AT = '2026-01-01T00:00:00Z';

const fv = (value: string | number, source: SourceId = 'registry_api'): FieldValue => ({
  value,
  source,
  observedAt: AT,
  confidence: 0.9,
});

function bank(overrides: Partial<BankEntity> = {}): BankEntity {
  return {
    identityKey: 'CERT:628',
    kind: 'bank',
    lookupKeys: ['CERT:628'],
    dataSources: [],
    completenessScore: 0,
    confidenceScore: 0,
    qualityStatus: 'unknown',
    needsReview: false,
    history: [],
    version: 1,
    createdAt: AT,
    updatedAt: AT,
    attributes: {},
    sourceUrls: [],
    tags: [],
    departments: [],
    leadership: [],
    ...overrides,
  };
}

function person(attributes: PersonEntity['attributes'], lastVerifiedAt?: string): PersonEntity {
  return {
    identityKey: 'HANDLE:jane-doe',
    kind: 'person',
    lookupKeys: ['HANDLE:jane-doe'],
    dataSources: ['professional_network'],
    completenessScore: 0,
    confidenceScore: 0,
    qualityStatus: 'unknown',
    needsReview: false,
    history: [],
    version: 1,
    createdAt: AT,
    updatedAt: AT,
    attributes,
    employers: [],
    bankKeys: [],
    ...(lastVerifiedAt !== undefined && { lastVerifiedAt }),
  };
}

describe('qualityStatus', () => {
  it('maps completeness onto quality bands', () => {
    expect(qualityStatus(0.95)).toBe('excellent');
    expect(qualityStatus(0.9)).toBe('excellent');
    expect(qualityStatus(0.7)).toBe('good');
    expect(qualityStatus(0.5)).toBe('fair');
    expect(qualityStatus(0.01)).toBe('poor');
    expect(qualityStatus(0)).toBe('unknown');
  });
});

describe('sizeCategory', () => {
  it('classifies total assets given in millions', () => {
    expect(sizeCategory(3_400_000)).toBe('mega');
    expect(sizeCategory(500_000)).toBe('large');
    expect(sizeCategory(150_000)).toBe('large');
    expect(sizeCategory(50_000)).toBe('regional');
    expect(sizeCategory(5_000)).toBe('community');
    expect(sizeCategory(800)).toBe('small');
  });
});

describe('computeScores for banks', () => {
  it('scores a registry-only bank', () => {
    const entity = bank({
      dataSources: ['registry_api'],
      attributes: {
        name: fv('JPMorgan Chase Bank'),
        certId: fv(628),
        assetRank: fv(1),
        totalAssets: fv(3_400_000),
      },
    });

    const scores = computeScores(entity, DEFAULT_RELIABILITY_WEIGHTS);
    expect(scores).toEqual({
      completenessScore: 5 / 15,
      confidenceScore: 0.95,
      qualityStatus: 'poor',
      sizeCategory: 'mega',
    });
  });

  it('reaches fair at 8 of 15 points', () => {
    const entity = bank({
      dataSources: ['registry_api'],
      sourceUrls: ['https://example.com/about'],
      attributes: {
        name: fv('Acme Bank'),
        certId: fv(42),
        assetRank: fv(30),
        totalAssets: fv(50_000),
      },
      departments: [{ key: 'model risk', fields: { name: fv('Model Risk') }, functions: [] }],
    });

    const scores = computeScores(entity, DEFAULT_RELIABILITY_WEIGHTS);
    expect(scores.completenessScore).toBe(8 / 15);
    expect(scores.qualityStatus).toBe('fair');
    expect(scores.sizeCategory).toBe('regional');
  });

  it('credits leader fields from the resolved leaders', () => {
    const entity = bank({ leadership: ['HANDLE:jane-doe'] });
    const leader = person({
      name: fv('Jane Doe'),
      title: fv('Head of Model Risk'),
      profileHandle: fv('jane-doe'),
    });

    const context = { bank: entity, leaders: [leader] };
    expect(missingFields(BANK_CHECKLIST, context)).toEqual([
      'name',
      'certId',
      'assetRank',
      'totalAssets',
      'hasDepartment',
      'sourceUrl',
      'notes',
      'verified',
      'dataSource',
    ]);
    expect(computeScores(entity, DEFAULT_RELIABILITY_WEIGHTS, [leader]).completenessScore).toBe(5 / 15);
  });

  it('credits a leader profile handle on its own', () => {
    const entity = bank({ leadership: ['HANDLE:jane-doe'] });
    const leader = person({ profileHandle: fv('jane-doe') });

    const missing = missingFields(BANK_CHECKLIST, { bank: entity, leaders: [leader] });
    expect(missing).toContain('leaderName');
    expect(missing).toContain('leaderTitle');
    expect(missing).not.toContain('leaderHandle');
    expect(computeScores(entity, DEFAULT_RELIABILITY_WEIGHTS, [leader]).completenessScore).toBe(3 / 15);
  });

  it('never lowers completeness as fields are filled in', () => {
    const leader = person({ name: fv('Jane Doe'), title: fv('CRO'), profileHandle: fv('jane-doe') });
    const steps: Array<Partial<BankEntity>> = [
      { dataSources: ['registry_api'] },
      { attributes: { name: fv('Acme Bank') } },
      { attributes: { name: fv('Acme Bank'), certId: fv(42) } },
      { attributes: { name: fv('Acme Bank'), certId: fv(42), assetRank: fv(30), totalAssets: fv(50_000) } },
      { departments: [{ key: 'model risk', fields: { name: fv('Model Risk') }, functions: [] }] },
      { leadership: ['HANDLE:jane-doe'] },
      { sourceUrls: ['https://example.com/about'] },
      {
        attributes: {
          name: fv('Acme Bank'),
          certId: fv(42),
          assetRank: fv(30),
          totalAssets: fv(50_000),
          notes: fv('MRM team of 40'),
        },
      },
      { lastVerifiedAt: AT },
    ];

    let entity = bank();
    const scores = [computeScores(entity, DEFAULT_RELIABILITY_WEIGHTS, [leader]).completenessScore];
    for (const step of steps) {
      entity = { ...entity, ...step };
      scores.push(computeScores(entity, DEFAULT_RELIABILITY_WEIGHTS, [leader]).completenessScore);
    }

    scores.slice(1).forEach((score, i) => expect(score).toBeGreaterThanOrEqual(scores[i] ?? 0));
    expect(scores[scores.length - 1]).toBe(1);
    expect(qualityStatus(1)).toBe('excellent');
  });

  it('leaves the size category unset without total assets', () => {
    expect(computeScores(bank(), DEFAULT_RELIABILITY_WEIGHTS)).toEqual({
      completenessScore: 0,
      confidenceScore: 0,
      qualityStatus: 'unknown',
    });
  });
});

describe('checklists', () => {
  it('weigh up to their published totals', () => {
    const sum = (weights: number[]) => weights.reduce((total, weight) => total + weight, 0);
    expect(sum(BANK_CHECKLIST.map((item) => item.weight))).toBe(BANK_CHECKLIST_TOTAL);
    expect(sum(PERSON_CHECKLIST.map((item) => item.weight))).toBe(PERSON_CHECKLIST_TOTAL);
  });
});

describe('computeScores for persons', () => {
  it('scores the five person fields', () => {
    const entity = person(
      {
        name: fv('Jane Doe', 'professional_network'),
        title: fv('Head of Model Risk', 'professional_network'),
        employer: fv('Acme Bank', 'professional_network'),
      },
      AT
    );
    const scores = computeScores(entity, DEFAULT_RELIABILITY_WEIGHTS);
    expect(scores.completenessScore).toBe(4 / 5);
    expect(scores.qualityStatus).toBe('good');
    expect(scores.confidenceScore).toBe(0.8);
    expect(scores).not.toHaveProperty('sizeCategory');
  });
});

describe('confidence', () => {
  it('averages over distinct sources, not fields', () => {
    const entity = bank({
      attributes: {
        name: fv('Acme Bank', 'third_party'),
        certId: fv(42, 'registry_api'),
        assetRank: fv(7, 'registry_api'),
        totalAssets: fv(9_000, 'registry_api'),
      },
    });
    expect(contributingSources(entity)).toEqual(['registry_api', 'third_party']);
    expect(confidence(entity, DEFAULT_RELIABILITY_WEIGHTS)).toBeCloseTo((0.95 + 0.5) / 2, 10);
  });

  it('counts department field sources', () => {
    const entity = bank({
      departments: [{ key: 'mrm', fields: { name: fv('MRM', 'official_website') }, functions: [] }],
    });
    expect(contributingSources(entity)).toEqual(['official_website']);
  });
});

describe('applyScores / sameScores', () => {
  it('stamps scores and compares them', () => {
    const entity = bank({ attributes: { totalAssets: fv(3_400_000) } });
    const scored = applyScores(entity, computeScores(entity, DEFAULT_RELIABILITY_WEIGHTS));
    expect(scored.completenessScore).toBe(1 / 15);
    expect(scored.sizeCategory).toBe('mega');
    expect(sameScores(entity, scored)).toBe(false);
    expect(sameScores(scored, { ...scored })).toBe(true);
  });
});
