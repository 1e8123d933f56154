import { describe, it, expect, beforeEach } from 'vitest';
import type { BankObservation, CollectionTarget, SourceId } from '@mrm/shared';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config.js';
import { ValidationError } from '../errors.js';
import { MemoryRecordStore } from '../store.js';
import { BatchOrchestrator, type Collector, type Reconciler } from './orchestrator.js';
import { ReconciliationEngine, type ReconcileResult } from './reconciliation.js';
import { ResearchScheduler } from './scheduler.js';

const NOW = Date.parse('2026-03-01T00:00:00Z');

const config: EngineConfig = {
  ...DEFAULT_ENGINE_CONFIG,
  subBatchSize: 2,
  concurrency: 2,
  interSourceDelayMs: 1000,
  interBatchCooldownMs: 5000,
};

const targets: CollectionTarget[] = [
  { name: 'Alpha Bank', certId: 1, assetRank: 10 },
  { name: 'Beta Bank', certId: 2, assetRank: 20 },
  { name: 'Gamma Bank', certId: 3, assetRank: 30 },
];

function observation(source: SourceId, target: CollectionTarget, extra: Partial<BankObservation['fields']> = {}) {
  const result: BankObservation = {
    kind: 'bank',
    source,
    observedAt: '2026-02-01T00:00:00Z',
    fields: { name: target.name, ...(target.certId !== undefined && { certId: target.certId }), ...extra },
    departments: [],
    leadership: [],
  };
  return result;
}

const registry: Collector = {
  source: 'registry_api',
  fetch: async ({ target }) => [
    observation('registry_api', target, target.assetRank !== undefined ? { assetRank: target.assetRank } : {}),
  ],
};

const website: Collector = {
  source: 'official_website',
  fetch: async ({ target }) => [
    { ...observation('official_website', target, { notes: `${target.name} runs an MRM team` }), sourceUrl: 'https://example.com/about' },
  ],
};

function failing(source: SourceId, failFor: string): Collector {
  return {
    source,
    fetch: async ({ target }) => {
      if (target.name === failFor) throw new Error('HTTP 503');
      return [observation(source, target)];
    },
  };
}

describe('BatchOrchestrator', () => {
  let store: MemoryRecordStore;
  let engine: ReconciliationEngine;
  let scheduler: ResearchScheduler;
  let waits: number[];
  const sleep = async (ms: number) => {
    waits.push(ms);
  };

  beforeEach(() => {
    waits = [];
    store = new MemoryRecordStore();
    engine = new ReconciliationEngine({ store, config, clock: () => NOW, sleep });
    scheduler = new ResearchScheduler({ store, config, clock: () => NOW });
  });

  function orchestrator(collectors: Collector[], overrides: Partial<{ engine: Reconciler; config: EngineConfig; clock: () => number }> = {}) {
    return new BatchOrchestrator({
      engine: overrides.engine ?? engine,
      scheduler,
      store,
      collectors,
      config: overrides.config ?? config,
      clock: overrides.clock ?? (() => NOW),
      sleep,
    });
  }

  it('collects, reconciles and schedules research for every target', async () => {
    const summary = await orchestrator([registry, website]).run(targets, { batchId: 'batch-1' });

    expect(summary).toMatchObject({
      batchId: 'batch-1',
      status: 'completed',
      startedAt: '2026-03-01T00:00:00.000Z',
      completedAt: '2026-03-01T00:00:00.000Z',
      cancelled: false,
      counts: {
        targets: 3,
        processed: 3,
        created: 3,
        updated: 3,
        ambiguous: 0,
        failed: 0,
        skipped: 0,
        tasksCreated: 6,
      },
    });
    expect(summary.entities).toEqual([
      { target: 'Alpha Bank', identityKey: 'CERT:1', status: 'success', observations: 2, errors: [] },
      { target: 'Beta Bank', identityKey: 'CERT:2', status: 'success', observations: 2, errors: [] },
      { target: 'Gamma Bank', identityKey: 'CERT:3', status: 'success', observations: 2, errors: [] },
    ]);

    const bank = await store.getEntity('CERT:1');
    expect(bank?.dataSources).toEqual(['registry_api', 'official_website']);
    expect(bank?.completenessScore).toBe(6 / 15);

    const collection = await store.queryLogs((entry) => entry.kind === 'collection');
    expect(collection).toHaveLength(6);
    expect(collection.every((entry) => entry.batchId === 'batch-1' && entry.status === 'success')).toBe(true);

    const [batch] = await store.queryLogs((entry) => entry.kind === 'batch');
    expect(batch).toMatchObject({
      status: 'success',
      recordsChanged: 6,
      errors: [],
      detail: { batchStatus: 'completed', cancelled: false },
    });
  });

  it('spaces requests per source and cools down between sub-batches', async () => {
    await orchestrator([registry, website]).run(targets);

    // Beta waits one slot, Gamma two, for each source; one cooldown after the first sub-batch
    expect([...waits].sort((a, b) => a - b)).toEqual([1000, 1000, 2000, 2000, 5000]);
  });

  it('submits observations in collector order whatever order fetches finish in', async () => {
    const submitted: string[] = [];
    const recorder: Reconciler = {
      reconcile: async (input) => {
        if (typeof input === 'object' && input !== null && 'source' in input) {
          submitted.push(String(input.source));
        }
        return { ok: false, error: new ValidationError('not stored') };
      },
    };
    let releaseSlow: () => void = () => undefined;
    const slow: Collector = {
      source: 'registry_api',
      fetch: async ({ target }) => {
        await new Promise<void>((resolve) => {
          releaseSlow = resolve;
        });
        return [observation('registry_api', target)];
      },
    };
    const fast: Collector = {
      source: 'third_party',
      fetch: async ({ target }) => {
        setTimeout(() => releaseSlow(), 0);
        return [observation('third_party', target)];
      },
    };

    await orchestrator([slow, fast], { engine: recorder }).run([targets[0] ?? { name: 'Alpha Bank' }]);
    expect(submitted).toEqual(['registry_api', 'third_party']);
  });

  it('records a failing collector without stopping the entity or the batch', async () => {
    const summary = await orchestrator([registry, failing('third_party', 'Beta Bank')]).run(targets);

    expect(summary.status).toBe('partially_failed');
    expect(summary.counts.failed).toBe(1);
    expect(summary.counts.processed).toBe(3);
    expect(summary.entities[1]).toEqual({
      target: 'Beta Bank',
      identityKey: 'CERT:2',
      status: 'partial',
      observations: 1,
      errors: ['Collector third_party failed: HTTP 503'],
    });

    const [failed] = await store.queryLogs(
      (entry) => entry.kind === 'collection' && entry.status === 'failed'
    );
    expect(failed).toMatchObject({
      entityKey: 'CERT:2',
      source: 'third_party',
      recordsChanged: 0,
      errors: ['Collector third_party failed: HTTP 503'],
      detail: { target: 'Beta Bank', observations: 0 },
    });
  });

  it('marks an entity failed when every collector fails', async () => {
    const summary = await orchestrator([failing('registry_api', 'Alpha Bank')]).run([
      { name: 'Alpha Bank', identityKey: 'CERT:1' },
    ]);

    expect(summary.entities).toEqual([
      {
        target: 'Alpha Bank',
        status: 'failed',
        observations: 0,
        errors: ['Collector registry_api failed: HTTP 503'],
      },
    ]);
    expect(summary.status).toBe('partially_failed');
    const [entry] = await store.queryLogs((e) => e.kind === 'collection');
    expect(entry?.entityKey).toBe('CERT:1');
  });

  it('counts reconciliation failures as partial entities', async () => {
    const rejecting: Reconciler = {
      reconcile: async (): Promise<ReconcileResult> => ({
        ok: false,
        error: new ValidationError('Malformed observation'),
      }),
    };
    const summary = await orchestrator([registry], { engine: rejecting }).run([targets[0] ?? { name: 'x' }]);

    expect(summary.entities[0]).toMatchObject({ status: 'partial', errors: ['Malformed observation'] });
    expect(summary.status).toBe('partially_failed');
  });

  it('keeps going when research scheduling fails', async () => {
    const broken = new BatchOrchestrator({
      engine,
      scheduler: {
        scan: async () => {
          throw new Error('scan down');
        },
      },
      store,
      collectors: [registry],
      config,
      clock: () => NOW,
      sleep,
    });

    const summary = await broken.run(targets);
    expect(summary.status).toBe('partially_failed');
    expect(summary.counts.processed).toBe(3);
    expect(summary.counts.failed).toBe(0);

    const [batch] = await store.queryLogs((entry) => entry.kind === 'batch');
    expect(batch?.errors).toEqual([
      'Research scheduling failed: scan down',
      'Research scheduling failed: scan down',
    ]);
  });

  it('stops starting work once cancelled and reports what was skipped', async () => {
    const controller = new AbortController();
    const cancelling: Collector = {
      source: 'registry_api',
      fetch: async ({ target }) => {
        controller.abort();
        return [observation('registry_api', target)];
      },
    };

    const summary = await orchestrator([cancelling], {
      config: { ...config, subBatchSize: 1, concurrency: 1 },
    }).run(targets, { signal: controller.signal });

    expect(summary.status).toBe('completed');
    expect(summary.cancelled).toBe(true);
    expect(summary.counts).toMatchObject({ processed: 1, skipped: 2, created: 1 });
    expect(waits).not.toContain(5000);
  });

  it('stops at the deadline', async () => {
    let now = NOW;
    const slow: Collector = {
      source: 'registry_api',
      fetch: async ({ target }) => {
        now += 60_000;
        return [observation('registry_api', target)];
      },
    };

    const summary = await orchestrator([slow], {
      config: { ...config, subBatchSize: 1, concurrency: 1 },
      clock: () => now,
    }).run(targets, { deadline: NOW + 90_000 });

    expect(summary.counts.processed).toBe(2);
    expect(summary.counts.skipped).toBe(1);
    expect(summary.cancelled).toBe(true);
  });

  describe('setup failures', () => {
    it('fails the batch when no collectors are configured', async () => {
      await expect(orchestrator([]).run(targets, { batchId: 'b-empty' })).rejects.toThrow(
        'No collectors configured'
      );

      const [batch] = await store.queryLogs((entry) => entry.kind === 'batch');
      expect(batch).toMatchObject({
        batchId: 'b-empty',
        status: 'failed',
        recordsChanged: 0,
        errors: ['No collectors configured'],
        detail: { batchStatus: 'failed', cancelled: false },
      });
      expect(await store.queryEntities(() => true)).toEqual([]);
    });

    it('rejects two collectors for the same source', async () => {
      await expect(orchestrator([registry, registry]).run(targets)).rejects.toThrow(
        'Duplicate collector sources'
      );
    });

    it('rejects an invalid configuration', async () => {
      await expect(
        orchestrator([registry], { config: { ...config, concurrency: 0 } }).run(targets)
      ).rejects.toThrow('Invalid engine configuration');
    });
  });
});
