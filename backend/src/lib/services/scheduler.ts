import { ulid } from 'ulid';
import { TaskStatus, TaskType, type Entity, type ResearchTask } from '@mrm/shared';
import type { EngineConfig } from '../config.js';
import { ConflictError } from '../errors.js';
import { KeyedLock } from '../keyedLock.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import type { Clock } from '../rateLimiter.js';
import type { RecordStore } from '../store.js';
import { isOpen } from './tasks.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SchedulerDeps {
  store: RecordStore;
  config: EngineConfig;
  logger?: Logger;
  clock?: Clock;
}

function displayName(entity: Entity): string {
  const name = entity.attributes.name?.value;
  return typeof name === 'string' ? name : entity.identityKey;
}

function assetRank(entity: Entity): number | undefined {
  if (entity.kind !== 'bank') return undefined;
  const rank = entity.attributes.assetRank?.value;
  return typeof rank === 'number' ? rank : undefined;
}

const openKey = (entityKey: string, taskType: TaskType) => `${entityKey}|${taskType}`;

/**
 * Turns entity state into follow-up work: research for under-filled
 * entities, verification for stale ones. Never more than one open task per
 * entity and task type: scans sharing an entity and task type run one after
 * the other, and the store refuses an open duplicate written elsewhere.
 */
export class ResearchScheduler {
  private readonly locks = new KeyedLock();
  private readonly store: RecordStore;
  private readonly config: EngineConfig;
  private readonly log: Logger;
  private readonly clock: Clock;

  constructor(deps: SchedulerDeps) {
    this.store = deps.store;
    this.config = deps.config;
    this.log = deps.logger ?? rootLogger;
    this.clock = deps.clock ?? Date.now;
  }

  needsResearch(entity: Entity): boolean {
    return entity.completenessScore < this.config.completenessThreshold;
  }

  needsVerification(entity: Entity, now: number = this.clock()): boolean {
    if (entity.lastVerifiedAt === undefined) return true;
    return now - Date.parse(entity.lastVerifiedAt) > this.config.stalenessDays * DAY_MS;
  }

  priorityFor(entity: Entity): number {
    let priority = 5;
    const rank = assetRank(entity);
    if (rank !== undefined && rank <= this.config.priorityRankCutoff) {
      priority += 3;
    }
    if (entity.completenessScore < this.config.completenessThreshold / 2) {
      priority += 2;
    }
    return Math.min(10, Math.max(1, priority));
  }

  // Persist and return the tasks the given entities need right now
  scan(entities: readonly Entity[]): Promise<ResearchTask[]> {
    const now = this.clock();
    const wanted = entities.flatMap((entity) =>
      this.taskTypesFor(entity, now).map((taskType) => ({ entity, taskType }))
    );
    const lockKeys = wanted.map(({ entity, taskType }) => openKey(entity.identityKey, taskType));

    return this.locks.run(lockKeys, async () => {
      const entityKeys = new Set(entities.map((entity) => entity.identityKey));
      const existing = await this.store.queryTasks(
        (task) => isOpen(task) && entityKeys.has(task.entityKey)
      );
      const open = new Set(existing.map((task) => openKey(task.entityKey, task.taskType)));

      const created: ResearchTask[] = [];
      for (const { entity, taskType } of wanted) {
        const key = openKey(entity.identityKey, taskType);
        if (open.has(key)) continue;

        const task = this.newTask(entity, taskType, now);
        try {
          await this.store.upsertTask(task);
        } catch (error) {
          if (!(error instanceof ConflictError)) throw error;
          this.log.debug({ entityKey: entity.identityKey, taskType }, 'Task already open elsewhere');
          open.add(key);
          continue;
        }
        open.add(key);
        created.push(task);
      }

      if (created.length > 0) {
        this.log.info(
          { scanned: entities.length, created: created.length },
          'Research tasks scheduled'
        );
      }
      return created;
    });
  }

  // Entities needing research, highest priority first, then by asset rank
  selectForResearch(entities: readonly Entity[], limit: number): Entity[] {
    return entities
      .filter((entity) => this.needsResearch(entity))
      .map((entity) => ({ entity, priority: this.priorityFor(entity), rank: assetRank(entity) }))
      .sort(
        (a, b) =>
          b.priority - a.priority ||
          (a.rank ?? Number.MAX_SAFE_INTEGER) - (b.rank ?? Number.MAX_SAFE_INTEGER)
      )
      .slice(0, limit)
      .map(({ entity }) => entity);
  }

  private taskTypesFor(entity: Entity, now: number): TaskType[] {
    const types: TaskType[] = [];
    if (this.needsResearch(entity)) types.push(TaskType.MRM_RESEARCH);
    if (this.needsVerification(entity, now)) types.push(TaskType.VERIFICATION);
    return types;
  }

  private newTask(entity: Entity, taskType: TaskType, now: number): ResearchTask {
    const name = displayName(entity);
    const description =
      taskType === TaskType.MRM_RESEARCH
        ? `Research MRM profile for ${name} (completeness ${Math.round(entity.completenessScore * 100)}%)`
        : entity.lastVerifiedAt === undefined
          ? `Verify ${name}: never verified`
          : `Verify ${name}: last verified ${entity.lastVerifiedAt.slice(0, 10)}`;

    return {
      taskId: ulid(),
      entityKey: entity.identityKey,
      taskType,
      priority: this.priorityFor(entity),
      status: TaskStatus.PENDING,
      description,
      createdAt: new Date(now).toISOString(),
      dueAt: new Date(now + this.config.taskDueDays * DAY_MS).toISOString(),
    };
  }
}
