/**
 * Derives the visible sequence from the canonical collection: filter, then
 * search, then a stable priority sort. Pure; inputs are never mutated.
 *
 * Sorting is by urgency rank: ascending lists High first, descending lists
 * Low first.
 */

import type { Task } from '../types/task.js';
import { Priority } from '../types/priority.js';
import { FilterType, SortDirection } from '../types/view-options.js';
import type { ViewOptions } from '../types/view-options.js';

/** A visible task and its position in the canonical collection */
export interface VisibleRow {
  readonly task: Task;
  readonly canonicalIndex: number;
}

const PRIORITY_RANK: Record<Priority, number> = {
  [Priority.High]: 0,
  [Priority.Medium]: 1,
  [Priority.Low]: 2,
};

function matchesFilter(task: Task, filter: FilterType): boolean {
  switch (filter) {
    case FilterType.Pending: return !task.isDone;
    case FilterType.Completed: return task.isDone;
    default: return true;
  }
}

export function projectRows(tasks: readonly Task[], view: ViewOptions): VisibleRow[] {
  const query = view.searchQuery.toLowerCase();
  const rows: VisibleRow[] = [];

  tasks.forEach((task, canonicalIndex) => {
    if (!matchesFilter(task, view.filter)) return;
    if (query && !task.title.toLowerCase().includes(query)) return;
    rows.push({ task, canonicalIndex });
  });

  const direction = view.sortDirection === SortDirection.Descending ? -1 : 1;
  // Ties fall back to canonical order, never to filtered position
  rows.sort((a, b) =>
    (PRIORITY_RANK[a.task.priority] - PRIORITY_RANK[b.task.priority]) * direction || a.canonicalIndex - b.canonicalIndex,
  );

  return rows;
}

export function projectTasks(tasks: readonly Task[], view: ViewOptions): Task[] {
  return projectRows(tasks, view).map(row => row.task);
}
