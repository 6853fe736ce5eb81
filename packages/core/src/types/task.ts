import type { Priority } from './priority.js';

/** Opaque, stable for the lifetime of the task. Not meant for display. */
export type TaskId = string;

export interface SubTask {
  readonly title: string;
  readonly isDone: boolean;
}

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly isDone: boolean;
  readonly priority: Priority;
  readonly subTasks: readonly SubTask[];
}

/** A removed task together with the canonical index it was removed from */
export interface DeletionRecord {
  readonly task: Task;
  readonly index: number;
}
