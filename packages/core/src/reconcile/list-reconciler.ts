import type { Task } from '../types/task.js';
import type { TaskStore } from '../store/task-store.js';
import { diffVisible } from './list-diff.js';
import type { ListChange } from './list-diff.js';
import { resolveCanonicalIndex } from './resolve.js';

/** Something that shows the visible sequence and can animate single rows */
export interface RenderSurface {
  insertItem(index: number, task: Task): void;
  /** `placeholder` is the removed task, to draw while the row animates out */
  removeItem(index: number, placeholder: Task): void;
  /** Called for rows that stayed in place but whose task changed */
  changeItem?(index: number, task: Task): void;
}

/**
 * Keeps a rendering surface in step with the store. The surface is expected
 * to show `rows` when the reconciler is created; after that it only receives
 * incremental updates.
 */
export class ListReconciler {
  private store: TaskStore;
  private surface: RenderSurface;
  private visible: Task[];
  private unsubscribe: () => void;

  constructor(store: TaskStore, surface: RenderSurface) {
    this.store = store;
    this.surface = surface;
    this.visible = store.getVisibleTasks();
    this.unsubscribe = store.subscribe(() => {
      this.sync();
    });
  }

  /** What the surface currently shows */
  get rows(): readonly Task[] {
    return this.visible;
  }

  /** Recompute the view, push the differences to the surface and return them */
  sync(): ListChange[] {
    const next = this.store.getVisibleTasks();
    const changes = diffVisible(this.visible, next);
    this.visible = next;

    for (const change of changes) {
      switch (change.type) {
        case 'remove':
          this.surface.removeItem(change.index, change.item);
          break;
        case 'insert':
          this.surface.insertItem(change.index, change.item);
          break;
        case 'change':
          this.surface.changeItem?.(change.index, change.item);
          break;
      }
    }
    return changes;
  }

  /** Canonical index of the row the surface shows at `visibleIndex`, or -1 */
  resolve(visibleIndex: number): number {
    const task = this.visible[visibleIndex];
    if (!task) return -1;
    return resolveCanonicalIndex(this.store.getSnapshot(), task);
  }

  dispose(): void {
    this.unsubscribe();
  }
}
