import type { Task } from '../types/task.js';
import type { TaskStore } from '../store/task-store.js';

/**
 * Canonical index of a task taken from the visible sequence, matched by id.
 * -1 when the task is no longer in the collection.
 */
export function resolveCanonicalIndex(tasks: readonly Task[], visibleTask: Pick<Task, 'id'>): number {
  return tasks.findIndex(t => t.id === visibleTask.id);
}

/** Canonical index of the row at `visibleIndex` in the store's current view, or -1 */
export function resolveVisibleRow(store: TaskStore, visibleIndex: number): number {
  const task = store.getVisibleTasks()[visibleIndex];
  if (!task) return -1;
  return resolveCanonicalIndex(store.getSnapshot(), task);
}
