/**
 * Owns the canonical task collection and the view parameters.
 *
 * Tasks are addressed by canonical index. An index outside the valid range
 * makes the operation a no-op: nothing changes, nothing is saved and no
 * observer is notified. Every applied mutation replaces the collection with
 * a new array, starts a save of the whole collection and notifies observers
 * before returning. Saves run in call order; a failed save keeps the
 * in-memory state and is reported through `persistenceError`.
 */

import type { DeletionRecord, Task, TaskId } from '../types/task.js';
import type { Priority } from '../types/priority.js';
import { DEFAULT_VIEW, SortDirection } from '../types/view-options.js';
import type { FilterType, ViewOptions } from '../types/view-options.js';
import type { TaskRepository } from '../persistence/task-repository.js';
import { DeletionBuffer } from '../undo/deletion-buffer.js';
import { projectRows, projectTasks } from '../view/view-projector.js';
import type { VisibleRow } from '../view/view-projector.js';
import {
  createTask, withDetails, withToggledStatus,
  withSubTaskAdded, withSubTaskToggled, withSubTaskRemoved,
} from '../model/task-helpers.js';
import { createLogger } from '../logging/log-buffer.js';

const log = createLogger('store');

export class TaskStore {
  private repository: TaskRepository;
  private tasks: Task[] = [];
  private view: ViewOptions = DEFAULT_VIEW;
  private deletions = new DeletionBuffer();
  private listeners = new Set<() => void>();
  private pendingSave: Promise<void> = Promise.resolve();
  private saveError: Error | null = null;

  private constructor(repository: TaskRepository) {
    this.repository = repository;
  }

  /** Load the collection and return a ready store. Rejects when the stored document is malformed. */
  static async open(repository: TaskRepository): Promise<TaskStore> {
    const store = new TaskStore(repository);
    store.tasks = await repository.load();
    return store;
  }

  // ── Read accessors ────────────────────────────────────

  get filter(): FilterType { return this.view.filter; }
  get searchQuery(): string { return this.view.searchQuery; }
  get sortDirection(): SortDirection { return this.view.sortDirection; }
  get viewOptions(): ViewOptions { return this.view; }
  get size(): number { return this.tasks.length; }
  get lastDeleted(): DeletionRecord | null { return this.deletions.last; }
  get persistenceError(): Error | null { return this.saveError; }

  getVisibleTasks(): Task[] {
    return projectTasks(this.tasks, this.view);
  }

  getVisibleRows(): VisibleRow[] {
    return projectRows(this.tasks, this.view);
  }

  /** Canonical index of the task with `id`, or -1 */
  indexOf(id: TaskId): number {
    return this.tasks.findIndex(t => t.id === id);
  }

  // ── Task mutations ────────────────────────────────────

  /** Insert a new pending task at the front of the collection */
  addTask(title: string, priority: Priority): Task {
    const task = createTask(title, priority, new Set(this.tasks.map(t => t.id)));
    this.commit([task, ...this.tasks]);
    return task;
  }

  updateTask(index: number, title: string, priority: Priority): boolean {
    const task = this.tasks[index];
    if (!task) return false;
    return this.replaceAt(index, withDetails(task, title, priority));
  }

  toggleTaskStatus(index: number): boolean {
    const task = this.tasks[index];
    if (!task) return false;
    return this.replaceAt(index, withToggledStatus(task));
  }

  /** Remove the task and remember it for `undoLastDelete`. Returns null when out of range. */
  deleteTask(index: number): Task | null {
    const task = this.tasks[index];
    if (!task) return null;
    this.deletions.remember(task, index);
    this.commit(this.tasks.filter((_, i) => i !== index));
    return task;
  }

  /**
   * Insert `task` at `index` (0..size inclusive). Refused when the index is
   * out of range or a task with the same id is already present.
   */
  insertTask(index: number, task: Task): boolean {
    if (!Number.isInteger(index) || index < 0 || index > this.tasks.length) return false;
    if (this.indexOf(task.id) !== -1) return false;
    const next = [...this.tasks];
    next.splice(index, 0, task);
    this.commit(next);
    return true;
  }

  /**
   * Put the most recently deleted task back where it was. The index is
   * clamped when the collection has shrunk since. Empties the buffer.
   */
  undoLastDelete(): Task | null {
    const record = this.deletions.take();
    if (!record) return null;
    const index = Math.min(record.index, this.tasks.length);
    return this.insertTask(index, record.task) ? record.task : null;
  }

  /**
   * Seed the deletion buffer with a record kept outside this store, e.g.
   * one persisted by an earlier process, so `undoLastDelete` can restore it.
   */
  restoreDeletion(record: DeletionRecord): void {
    this.deletions.remember(record.task, record.index);
  }

  // ── Sub-task mutations ────────────────────────────────

  addSubTask(taskIndex: number, title: string): boolean {
    const task = this.tasks[taskIndex];
    if (!task) return false;
    return this.replaceAt(taskIndex, withSubTaskAdded(task, title));
  }

  toggleSubTaskStatus(taskIndex: number, subIndex: number): boolean {
    const task = this.tasks[taskIndex];
    if (!task || !task.subTasks[subIndex]) return false;
    return this.replaceAt(taskIndex, withSubTaskToggled(task, subIndex));
  }

  removeSubTask(taskIndex: number, subIndex: number): boolean {
    const task = this.tasks[taskIndex];
    if (!task || !task.subTasks[subIndex]) return false;
    return this.replaceAt(taskIndex, withSubTaskRemoved(task, subIndex));
  }

  // ── View parameters (never persisted) ─────────────────

  setFilter(filter: FilterType): void {
    this.view = { ...this.view, filter };
    this.notify();
  }

  setSearchQuery(searchQuery: string): void {
    this.view = { ...this.view, searchQuery };
    this.notify();
  }

  toggleSortOrder(): void {
    const sortDirection = this.view.sortDirection === SortDirection.Ascending
      ? SortDirection.Descending
      : SortDirection.Ascending;
    this.view = { ...this.view, sortDirection };
    this.notify();
  }

  // ── Persistence ───────────────────────────────────────

  /** Resolves once every save started so far has settled */
  flush(): Promise<void> {
    return this.pendingSave;
  }

  // ── Subscription (useSyncExternalStore) ───────────────

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  };

  getSnapshot = (): readonly Task[] => {
    return this.tasks;
  };

  // ── Private ───────────────────────────────────────────

  private replaceAt(index: number, task: Task): boolean {
    const next = [...this.tasks];
    next[index] = task;
    this.commit(next);
    return true;
  }

  private commit(next: Task[]): void {
    this.tasks = next;
    this.scheduleSave(next);
    this.notify();
  }

  private scheduleSave(snapshot: readonly Task[]): void {
    this.pendingSave = this.pendingSave
      .then(() => this.repository.save(snapshot))
      .then(
        () => {
          if (this.saveError) {
            this.saveError = null;
            this.notify();
          }
        },
        (err: unknown) => {
          this.saveError = err instanceof Error ? err : new Error(String(err));
          log.warn('Save failed, changes are kept in memory:', this.saveError.message);
          this.notify();
        },
      );
  }

  /** A throwing observer is logged and does not stop the others */
  private notify(): void {
    for (const fn of this.listeners) {
      try {
        fn();
      } catch (err: unknown) {
        log.error('Observer failed:', err);
      }
    }
  }
}
