import { ulid } from 'ulid';
import {
  BatchStatus,
  CollectionKind,
  CollectionStatus,
  MergeOutcome,
  type BatchSummary,
  type CollectionQuery,
  type CollectionTarget,
  type Entity,
  type EntityCollectionOutcome,
  type Observation,
  type SourceId,
} from '@mrm/shared';
import { engineConfigSchema, type EngineConfig } from '../config.js';
import { CollectorError, OrchestrationError, errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import { SourceRateLimiter, sleep as defaultSleep, type Clock, type Sleep } from '../rateLimiter.js';
import type { RecordStore } from '../store.js';
import { newLogEntry, recordLog } from './collectionLog.js';
import type { ReconcileOptions, ReconcileResult } from './reconciliation.js';
import type { ResearchScheduler } from './scheduler.js';

/**
 * A source connector. Implementations throw CollectorError on failure; any
 * other thrown value is wrapped into one.
 */
export interface Collector {
  readonly source: SourceId;
  fetch(query: CollectionQuery, signal?: AbortSignal): Promise<Observation[]>;
}

export interface Reconciler {
  reconcile(input: unknown, options?: ReconcileOptions): Promise<ReconcileResult>;
}

export interface OrchestratorDeps {
  engine: Reconciler;
  scheduler: Pick<ResearchScheduler, 'scan'>;
  store: RecordStore;
  collectors: readonly Collector[];
  config: EngineConfig;
  logger?: Logger;
  clock?: Clock;
  sleep?: Sleep;
}

export interface BatchOptions {
  batchId?: string;
  signal?: AbortSignal;
  deadline?: number; // epoch ms; no new work starts after it
}

// Valid batch status transitions
const VALID_TRANSITIONS: Record<BatchStatus, BatchStatus[]> = {
  pending: ['running', 'failed'],
  running: ['completed', 'partially_failed', 'failed'],
  completed: [],
  partially_failed: [],
  failed: [],
};

const MAX_LOGGED_ERRORS = 50;

interface FetchResult {
  collector: Collector;
  observations: Observation[];
  error?: CollectorError;
  durationMs: number;
}

interface EntityRun {
  outcome: EntityCollectionOutcome;
  created: number;
  updated: number;
  ambiguous: number;
  failed: boolean;
  bankKeys: string[];
}

interface BatchContext {
  batchId: string;
  log: Logger;
  limiter: SourceRateLimiter;
  options: BatchOptions;
}

function toCollectorError(source: SourceId, error: unknown): CollectorError {
  return error instanceof CollectorError ? error : new CollectorError(source, errorMessage(error));
}

/**
 * Drives collection for a list of targets: sequential sub-batches, a bounded
 * worker pool inside each, per-source rate limiting shared by every worker,
 * and a scheduler pass plus cooldown between sub-batches. Only setup problems
 * fail a batch; everything else becomes a per-entity outcome.
 */
export class BatchOrchestrator {
  private readonly engine: Reconciler;
  private readonly scheduler: Pick<ResearchScheduler, 'scan'>;
  private readonly store: RecordStore;
  private readonly collectors: readonly Collector[];
  private readonly config: EngineConfig;
  private readonly log: Logger;
  private readonly clock: Clock;
  private readonly sleep: Sleep;

  constructor(deps: OrchestratorDeps) {
    this.engine = deps.engine;
    this.scheduler = deps.scheduler;
    this.store = deps.store;
    this.collectors = deps.collectors;
    this.config = deps.config;
    this.log = deps.logger ?? rootLogger;
    this.clock = deps.clock ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async run(targets: readonly CollectionTarget[], options: BatchOptions = {}): Promise<BatchSummary> {
    const batchId = options.batchId ?? ulid();
    const log = this.log.child({ batchId });
    const started = this.clock();
    const startedAt = new Date(started).toISOString();

    let status: BatchStatus = BatchStatus.PENDING;
    const moveTo = (next: BatchStatus) => {
      if (!VALID_TRANSITIONS[status].includes(next)) {
        throw new OrchestrationError(`Invalid batch transition from ${status} to ${next}`);
      }
      log.info({ from: status, to: next }, 'Batch status changed');
      status = next;
    };

    try {
      this.validateSetup();
    } catch (error) {
      moveTo(BatchStatus.FAILED);
      await this.recordBatch(batchId, BatchStatus.FAILED, [errorMessage(error)], started);
      throw error;
    }

    moveTo(BatchStatus.RUNNING);
    const context: BatchContext = {
      batchId,
      log,
      limiter: new SourceRateLimiter(this.config.interSourceDelayMs, this.clock, this.sleep),
      options,
    };

    const counts: BatchSummary['counts'] = {
      targets: targets.length,
      processed: 0,
      created: 0,
      updated: 0,
      ambiguous: 0,
      failed: 0,
      skipped: 0,
      tasksCreated: 0,
    };
    const entities: EntityCollectionOutcome[] = [];
    const errors: string[] = [];
    let schedulerFailed = false;

    log.info(
      { targets: targets.length, subBatchSize: this.config.subBatchSize, concurrency: this.config.concurrency },
      'Starting batch collection'
    );

    try {
      for (let offset = 0; offset < targets.length; offset += this.config.subBatchSize) {
        if (this.stopped(options)) break;

        const chunk = targets.slice(offset, offset + this.config.subBatchSize);
        const runs = await this.runSubBatch(chunk, context);

        const bankKeys = new Set<string>();
        for (const run of runs) {
          counts.processed++;
          counts.created += run.created;
          counts.updated += run.updated;
          counts.ambiguous += run.ambiguous;
          if (run.failed) counts.failed++;
          entities.push(run.outcome);
          errors.push(...run.outcome.errors);
          run.bankKeys.forEach((key) => bankKeys.add(key));
        }

        try {
          counts.tasksCreated += await this.scheduleResearch([...bankKeys]);
        } catch (error) {
          schedulerFailed = true;
          errors.push(`Research scheduling failed: ${errorMessage(error)}`);
          log.error({ error, operation: 'scan', banks: bankKeys.size }, 'Research scheduling failed');
        }

        const more = offset + this.config.subBatchSize < targets.length;
        if (more && !this.stopped(options)) {
          await this.sleep(this.config.interBatchCooldownMs, options.signal);
        }
      }
    } catch (error) {
      moveTo(BatchStatus.FAILED);
      await this.recordBatch(batchId, BatchStatus.FAILED, [errorMessage(error)], started, counts);
      throw error instanceof OrchestrationError
        ? error
        : new OrchestrationError(`Batch ${batchId} failed: ${errorMessage(error)}`);
    }

    counts.skipped = counts.targets - counts.processed;
    const cancelled = counts.skipped > 0;
    const finalStatus =
      counts.failed > 0 || schedulerFailed ? BatchStatus.PARTIALLY_FAILED : BatchStatus.COMPLETED;
    moveTo(finalStatus);

    await this.recordBatch(batchId, finalStatus, errors, started, counts, cancelled);
    log.info({ status: finalStatus, cancelled, ...counts }, 'Batch collection finished');

    return {
      batchId,
      status: finalStatus,
      startedAt,
      completedAt: new Date(this.clock()).toISOString(),
      cancelled,
      counts,
      entities,
    };
  }

  private validateSetup(): void {
    if (this.collectors.length === 0) {
      throw new OrchestrationError('No collectors configured');
    }
    const sources = this.collectors.map((collector) => collector.source);
    const duplicates = sources.filter((source, i) => sources.indexOf(source) !== i);
    if (duplicates.length > 0) {
      throw new OrchestrationError('Duplicate collector sources', { sources: [...new Set(duplicates)] });
    }
    const result = engineConfigSchema.safeParse(this.config);
    if (!result.success) {
      throw new OrchestrationError('Invalid engine configuration', { issues: result.error.issues });
    }
  }

  private stopped(options: BatchOptions): boolean {
    return (
      options.signal?.aborted === true ||
      (options.deadline !== undefined && this.clock() >= options.deadline)
    );
  }

  // Bounded worker pool; workers stop taking targets once the batch is stopped
  private async runSubBatch(
    chunk: readonly CollectionTarget[],
    context: BatchContext
  ): Promise<EntityRun[]> {
    const runs = new Map<number, EntityRun>();
    let currentIndex = 0;

    const worker = async (): Promise<void> => {
      while (currentIndex < chunk.length) {
        if (this.stopped(context.options)) return;

        const index = currentIndex++;
        const target = chunk[index];
        if (!target) break;

        runs.set(index, await this.collectEntity(target, context));
      }
    };

    const workers = Math.min(this.config.concurrency, chunk.length);
    await Promise.all(Array.from({ length: workers }, () => worker()));

    return [...runs.entries()].sort(([a], [b]) => a - b).map(([, run]) => run);
  }

  // Waits for the source's rate-limit slot; a failure becomes part of the result
  private async fetchFrom(
    collector: Collector,
    query: CollectionQuery,
    context: BatchContext
  ): Promise<FetchResult> {
    await context.limiter.acquire(collector.source);
    const started = this.clock();
    try {
      const observations = await collector.fetch(query, context.options.signal);
      return { collector, observations, durationMs: this.clock() - started };
    } catch (error) {
      return {
        collector,
        observations: [],
        error: toCollectorError(collector.source, error),
        durationMs: this.clock() - started,
      };
    }
  }

  private async collectEntity(target: CollectionTarget, context: BatchContext): Promise<EntityRun> {
    const { batchId, log } = context;
    const query: CollectionQuery = { target, batchId };

    // Fetch concurrently, then submit in collector order
    const fetched = await Promise.all(
      this.collectors.map((collector) => this.fetchFrom(collector, query, context))
    );
    const submitted = fetched.map(({ observations }) =>
      observations.map((observation) => this.engine.reconcile(observation, { batchId }))
    );
    const results = await Promise.all(submitted.map((group) => Promise.all(group)));

    const run: EntityRun = {
      outcome: { target: target.name, status: CollectionStatus.SUCCESS, observations: 0, errors: [] },
      created: 0,
      updated: 0,
      ambiguous: 0,
      failed: false,
      bankKeys: [],
    };
    let failedCollectors = 0;

    for (const [i, fetchResult] of fetched.entries()) {
      const { collector, error } = fetchResult;
      const group = results[i] ?? [];
      const errors: string[] = [];
      let changed = 0;

      if (error) {
        failedCollectors++;
        errors.push(error.message);
        log.error(
          { error, target: target.name, source: collector.source, operation: 'fetch' },
          'Collector failed'
        );
      }

      for (const result of group) {
        run.outcome.observations++;
        if (!result.ok) {
          errors.push(result.error.message);
          continue;
        }
        if (result.changed) changed++;
        if (result.outcome === MergeOutcome.CREATED) run.created++;
        else if (result.outcome === MergeOutcome.MERGED_AMBIGUOUS) run.ambiguous++;
        else if (result.changed) run.updated++;

        if (result.entity.kind === 'bank') {
          if (run.outcome.identityKey === undefined) {
            run.outcome.identityKey = result.entity.identityKey;
          }
          if (!run.bankKeys.includes(result.entity.identityKey)) {
            run.bankKeys.push(result.entity.identityKey);
          }
        }
      }

      run.outcome.errors.push(...errors);
      const entityKey = run.outcome.identityKey ?? target.identityKey;
      await recordLog(
        this.store,
        newLogEntry(
          {
            ...(entityKey !== undefined && { entityKey }),
            source: collector.source,
            kind: CollectionKind.COLLECTION,
            status: error
              ? CollectionStatus.FAILED
              : errors.length > 0
                ? CollectionStatus.PARTIAL
                : CollectionStatus.SUCCESS,
            recordsChanged: changed,
            errors,
            durationMs: fetchResult.durationMs,
            detail: { target: target.name, observations: group.length },
            batchId,
          },
          new Date(this.clock()).toISOString()
        ),
        log
      );
    }

    if (failedCollectors === this.collectors.length) {
      run.outcome.status = CollectionStatus.FAILED;
    } else if (run.outcome.errors.length > 0) {
      run.outcome.status = CollectionStatus.PARTIAL;
    }
    run.failed = run.outcome.status !== CollectionStatus.SUCCESS;

    log.debug(
      { target: target.name, status: run.outcome.status, observations: run.outcome.observations },
      'Entity collected'
    );
    return run;
  }

  private async scheduleResearch(bankKeys: readonly string[]): Promise<number> {
    if (bankKeys.length === 0) {
      return 0;
    }
    const found = await Promise.all(bankKeys.map((key) => this.store.getEntity(key)));
    const banks = found.filter((entity): entity is Entity => entity !== null);
    const tasks = await this.scheduler.scan(banks);
    return tasks.length;
  }

  private async recordBatch(
    batchId: string,
    status: BatchStatus,
    errors: readonly string[],
    started: number,
    counts?: BatchSummary['counts'],
    cancelled = false
  ): Promise<void> {
    await recordLog(
      this.store,
      newLogEntry(
        {
          kind: CollectionKind.BATCH,
          status:
            status === BatchStatus.COMPLETED
              ? CollectionStatus.SUCCESS
              : status === BatchStatus.PARTIALLY_FAILED
                ? CollectionStatus.PARTIAL
                : CollectionStatus.FAILED,
          recordsChanged: counts ? counts.created + counts.updated + counts.ambiguous : 0,
          errors: errors.slice(0, MAX_LOGGED_ERRORS),
          durationMs: this.clock() - started,
          detail: { batchStatus: status, cancelled, ...(counts && { counts }) },
          batchId,
        },
        new Date(this.clock()).toISOString()
      ),
      this.log
    );
  }
}
