import type { CollectionLogEntry, Entity, ResearchTask } from '@mrm/shared';
import { ConflictError } from './errors.js';
import { isOpen } from './services/tasks.js';

/**
 * Persistence the engine depends on. Entities are addressed by identity key,
 * tasks by id; the log is append-only.
 *
 * `upsertEntities` writes all of its entities or none. Each must carry the
 * successor of the stored version (version 1 for an entity not stored yet);
 * otherwise the whole write fails with ConflictError. `upsertTask` refuses
 * a second open task for the same entity and task type the same way.
 */
export interface RecordStore {
  getEntity(identityKey: string): Promise<Entity | null>;
  upsertEntity(entity: Entity): Promise<void>;
  upsertEntities(entities: readonly Entity[]): Promise<void>;
  queryEntities(predicate: (entity: Entity) => boolean): Promise<Entity[]>;

  getTask(taskId: string): Promise<ResearchTask | null>;
  upsertTask(task: ResearchTask): Promise<void>;
  queryTasks(predicate: (task: ResearchTask) => boolean): Promise<ResearchTask[]>;

  appendLog(entry: CollectionLogEntry): Promise<void>;
  queryLogs(predicate: (entry: CollectionLogEntry) => boolean): Promise<CollectionLogEntry[]>;
}

// In-process store. Values are cloned on the way in and out, so callers only see snapshots.
export class MemoryRecordStore implements RecordStore {
  private readonly entities = new Map<string, Entity>();
  private readonly tasks = new Map<string, ResearchTask>();
  private readonly logs: CollectionLogEntry[] = [];

  async getEntity(identityKey: string): Promise<Entity | null> {
    const entity = this.entities.get(identityKey);
    return entity ? structuredClone(entity) : null;
  }

  async upsertEntity(entity: Entity): Promise<void> {
    this.entities.set(entity.identityKey, structuredClone(entity));
  }

  async upsertEntities(entities: readonly Entity[]): Promise<void> {
    for (const entity of entities) {
      const storedVersion = this.entities.get(entity.identityKey)?.version ?? 0;
      if (storedVersion !== entity.version - 1) {
        throw new ConflictError(`${entity.identityKey} changed during the merge`, {
          identityKey: entity.identityKey,
          expectedVersion: entity.version - 1,
          storedVersion,
        });
      }
    }
    for (const entity of entities) {
      this.entities.set(entity.identityKey, structuredClone(entity));
    }
  }

  async queryEntities(predicate: (entity: Entity) => boolean): Promise<Entity[]> {
    return [...this.entities.values()].filter(predicate).map((entity) => structuredClone(entity));
  }

  async getTask(taskId: string): Promise<ResearchTask | null> {
    const task = this.tasks.get(taskId);
    return task ? { ...task } : null;
  }

  async upsertTask(task: ResearchTask): Promise<void> {
    if (isOpen(task)) {
      const clash = [...this.tasks.values()].find(
        (other) =>
          other.taskId !== task.taskId &&
          other.entityKey === task.entityKey &&
          other.taskType === task.taskType &&
          isOpen(other)
      );
      if (clash) {
        throw new ConflictError(`An open ${task.taskType} task already exists for ${task.entityKey}`, {
          taskId: clash.taskId,
        });
      }
    }
    this.tasks.set(task.taskId, { ...task });
  }

  async queryTasks(predicate: (task: ResearchTask) => boolean): Promise<ResearchTask[]> {
    return [...this.tasks.values()].filter(predicate).map((task) => ({ ...task }));
  }

  async appendLog(entry: CollectionLogEntry): Promise<void> {
    this.logs.push(structuredClone(entry));
  }

  async queryLogs(
    predicate: (entry: CollectionLogEntry) => boolean
  ): Promise<CollectionLogEntry[]> {
    return this.logs.filter(predicate).map((entry) => structuredClone(entry));
  }
}
