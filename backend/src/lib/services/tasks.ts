import {
  TaskStatus,
  type ResearchTask,
  type TaskTransitionRequest,
} from '@mrm/shared';
import { InvalidStateTransitionError, NotFoundError } from '../errors.js';
import { logger } from '../logger.js';
import type { RecordStore } from '../store.js';

// Valid task status transitions
const VALID_TRANSITIONS: Record<TaskStatus, TaskStatus[]> = {
  pending: ['in_progress', 'completed', 'failed'],
  in_progress: ['completed', 'failed', 'pending'],
  failed: ['pending'], // Can be retried
  completed: [],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isOpen(task: ResearchTask): boolean {
  return task.status === TaskStatus.PENDING || task.status === TaskStatus.IN_PROGRESS;
}

// Highest priority first, then oldest
export function compareTasks(a: ResearchTask, b: ResearchTask): number {
  return b.priority - a.priority || a.createdAt.localeCompare(b.createdAt);
}

export async function getTask(store: RecordStore, taskId: string): Promise<ResearchTask> {
  const task = await store.getTask(taskId);
  if (!task) {
    throw new NotFoundError('Task', taskId);
  }
  return task;
}

/**
 * Move a task to a new status. Completion stamps completedAt; findings and
 * assignee are recorded when given.
 */
export async function transitionTask(
  store: RecordStore,
  taskId: string,
  request: TaskTransitionRequest,
  now: Date = new Date()
): Promise<ResearchTask> {
  const task = await getTask(store, taskId);

  if (!canTransition(task.status, request.status)) {
    throw new InvalidStateTransitionError(task.status, request.status);
  }

  const updated: ResearchTask = {
    ...task,
    status: request.status,
    ...(request.assignedTo !== undefined && { assignedTo: request.assignedTo }),
    ...(request.findings !== undefined && { findings: request.findings }),
    ...(request.status === TaskStatus.COMPLETED && { completedAt: now.toISOString() }),
  };

  await store.upsertTask(updated);

  logger.info({ taskId, from: task.status, to: updated.status }, 'Research task transitioned');

  return updated;
}

export async function listOpenTasks(store: RecordStore, limit?: number): Promise<ResearchTask[]> {
  const tasks = await store.queryTasks(isOpen);
  tasks.sort(compareTasks);
  return limit === undefined ? tasks : tasks.slice(0, limit);
}

export async function listTasks(
  store: RecordStore,
  status?: TaskStatus
): Promise<ResearchTask[]> {
  const tasks = await store.queryTasks((task) => status === undefined || task.status === status);
  return tasks.sort(compareTasks);
}
