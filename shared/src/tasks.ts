import type { TaskStatus, TaskType } from './enums.js';

// Follow-up work for an under-filled or stale entity
export interface ResearchTask {
  taskId: string;
  entityKey: string;
  taskType: TaskType;
  priority: number; // 1 = low, 10 = high
  status: TaskStatus;
  description: string;
  createdAt: string;
  dueAt?: string;
  assignedTo?: string;
  completedAt?: string;
  findings?: string;
}

export interface TaskTransitionRequest {
  status: TaskStatus;
  assignedTo?: string;
  findings?: string;
}
