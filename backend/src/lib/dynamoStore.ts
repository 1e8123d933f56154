import { TransactionCanceledException } from '@aws-sdk/client-dynamodb';
import type { CollectionLogEntry, Entity, ResearchTask } from '@mrm/shared';
import { config } from './config.js';
import { getItem, putItem, scanAll, stripKeys, transactWrite } from './dynamodb.js';
import { ConflictError, StorageError, errorMessage } from './errors.js';
import { isOpen } from './services/tasks.js';
import type { RecordStore } from './store.js';

type EntityItem = { PK: string; SK: string; record: Entity };
type TaskItem = ResearchTask & { PK: string; SK: string };
type LogItem = CollectionLogEntry & { PK: string; SK: string };
type OpenTaskItem = { PK: string; SK: string; taskId: string };

function isConditionFailure(error: unknown): boolean {
  return (
    error instanceof TransactionCanceledException &&
    (error.CancellationReasons ?? []).some((reason) => reason.Code === 'ConditionalCheckFailed')
  );
}

// Client failures become StorageError; a failed write condition becomes the given conflict
async function guard<T>(
  operation: string,
  fn: () => Promise<T>,
  conflict?: () => ConflictError
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (conflict && isConditionFailure(error)) {
      throw conflict();
    }
    throw new StorageError(operation, errorMessage(error));
  }
}

const openTaskKey = (task: ResearchTask) => ({
  PK: `OPENTASK#${task.entityKey}#${task.taskType}`,
  SK: 'META',
});

const entityItem = (entity: Entity): EntityItem & { GSI1PK: string; GSI1SK: string } => ({
  PK: `ENTITY#${entity.identityKey}`,
  SK: 'META',
  GSI1PK: `KIND#${entity.kind}`,
  GSI1SK: `ENTITY#${entity.identityKey}`,
  record: entity,
});

const taskItem = (task: ResearchTask): TaskItem & { GSI1PK: string; GSI1SK: string } => ({
  PK: `TASK#${task.taskId}`,
  SK: 'META',
  GSI1PK: `TASKSTATUS#${task.status}`,
  GSI1SK: `TS#${task.createdAt}`,
  ...task,
});

/**
 * Single-table DynamoDB store.
 *
 *   ENTITY#<identityKey> / META           entity (GSI1: KIND#<kind>)
 *   TASK#<taskId>        / META           research task (GSI1: TASKSTATUS#<status>)
 *   OPENTASK#<entityKey>#<taskType> / META   id of the task last opened for that work
 *   LOG#<yyyy-mm>        / LOG#<ts>#<id>  collection log (GSI1: LOGENTITY#<key>)
 *
 * Predicate queries scan the relevant key prefix and filter client-side.
 * Entity groups are written in one transaction, each Put conditioned on the
 * version it replaces.
 */
export class DynamoRecordStore implements RecordStore {
  constructor(private readonly table: string = config.tables.profiles) {}

  async getEntity(identityKey: string): Promise<Entity | null> {
    const item = await guard('getEntity', () =>
      getItem<EntityItem>({
        TableName: this.table,
        Key: { PK: `ENTITY#${identityKey}`, SK: 'META' },
      })
    );
    return item ? item.record : null;
  }

  async upsertEntity(entity: Entity): Promise<void> {
    await guard('upsertEntity', () =>
      putItem({
        TableName: this.table,
        Item: entityItem(entity),
      })
    );
  }

  async upsertEntities(entities: readonly Entity[]): Promise<void> {
    if (entities.length === 0) return;
    const identityKeys = entities.map((entity) => entity.identityKey);

    await guard(
      'upsertEntities',
      () =>
        transactWrite({
          TransactItems: entities.map((entity) => ({
            Put: {
              TableName: this.table,
              Item: entityItem(entity),
              ...(entity.version === 1
                ? { ConditionExpression: 'attribute_not_exists(PK)' }
                : {
                    ConditionExpression: '#record.#version = :expected',
                    ExpressionAttributeNames: { '#record': 'record', '#version': 'version' },
                    ExpressionAttributeValues: { ':expected': entity.version - 1 },
                  }),
            },
          })),
        }),
      () => new ConflictError(`${identityKeys.join(', ')} changed during the merge`, { identityKeys })
    );
  }

  async queryEntities(predicate: (entity: Entity) => boolean): Promise<Entity[]> {
    const items = await guard('queryEntities', () =>
      scanAll<EntityItem>({
        TableName: this.table,
        FilterExpression: 'begins_with(PK, :prefix)',
        ExpressionAttributeValues: { ':prefix': 'ENTITY#' },
      })
    );
    return items.map((item) => item.record).filter(predicate);
  }

  async getTask(taskId: string): Promise<ResearchTask | null> {
    const item = await guard('getTask', () =>
      getItem<TaskItem>({
        TableName: this.table,
        Key: { PK: `TASK#${taskId}`, SK: 'META' },
      })
    );
    return item ? stripKeys(item) : null;
  }

  /**
   * Closed tasks are plain puts. An open task also claims the OPENTASK item
   * for its entity and task type; a claim held by a task that has since
   * closed is taken over, one held by a task still open is a conflict.
   */
  async upsertTask(task: ResearchTask): Promise<void> {
    if (!isOpen(task)) {
      await guard('upsertTask', () => putItem({ TableName: this.table, Item: taskItem(task) }));
      return;
    }

    try {
      await this.claimOpenTask(task);
    } catch (error) {
      if (!(error instanceof ConflictError)) throw error;
      const claim = await guard('upsertTask', () =>
        getItem<OpenTaskItem>({ TableName: this.table, Key: openTaskKey(task) })
      );
      const holder = claim ? await this.getTask(claim.taskId) : null;
      if (!claim || (holder && isOpen(holder))) throw error;
      await this.claimOpenTask(task, claim.taskId);
    }
  }

  // Write the task and its claim together; `staleHolder` is the closed task the claim moves from
  private async claimOpenTask(task: ResearchTask, staleHolder?: string): Promise<void> {
    await guard(
      'upsertTask',
      () =>
        transactWrite({
          TransactItems: [
            { Put: { TableName: this.table, Item: taskItem(task) } },
            {
              Put: {
                TableName: this.table,
                Item: { ...openTaskKey(task), taskId: task.taskId },
                ...(staleHolder === undefined
                  ? {
                      ConditionExpression: 'attribute_not_exists(PK) OR taskId = :taskId',
                      ExpressionAttributeValues: { ':taskId': task.taskId },
                    }
                  : {
                      ConditionExpression: 'taskId = :holder',
                      ExpressionAttributeValues: { ':holder': staleHolder },
                    }),
              },
            },
          ],
        }),
      () =>
        new ConflictError(`An open ${task.taskType} task already exists for ${task.entityKey}`, {
          taskId: task.taskId,
        })
    );
  }

  async queryTasks(predicate: (task: ResearchTask) => boolean): Promise<ResearchTask[]> {
    const items = await guard('queryTasks', () =>
      scanAll<TaskItem>({
        TableName: this.table,
        FilterExpression: 'begins_with(PK, :prefix)',
        ExpressionAttributeValues: { ':prefix': 'TASK#' },
      })
    );
    return items.map((item) => stripKeys(item)).filter(predicate);
  }

  async appendLog(entry: CollectionLogEntry): Promise<void> {
    const yearMonth = entry.timestamp.substring(0, 7); // YYYY-MM

    await guard('appendLog', () =>
      putItem({
        TableName: this.table,
        Item: {
          PK: `LOG#${yearMonth}`,
          SK: `LOG#${entry.timestamp}#${entry.logId}`,
          ...(entry.entityKey && {
            GSI1PK: `LOGENTITY#${entry.entityKey}`,
            GSI1SK: `LOG#${entry.timestamp}#${entry.logId}`,
          }),
          ...entry,
        },
        // Log entries are immutable
        ConditionExpression: 'attribute_not_exists(PK)',
      })
    );
  }

  async queryLogs(
    predicate: (entry: CollectionLogEntry) => boolean
  ): Promise<CollectionLogEntry[]> {
    const items = await guard('queryLogs', () =>
      scanAll<LogItem>({
        TableName: this.table,
        FilterExpression: 'begins_with(PK, :prefix)',
        ExpressionAttributeValues: { ':prefix': 'LOG#' },
      })
    );
    return items.map((item) => stripKeys(item)).filter(predicate);
  }
}
