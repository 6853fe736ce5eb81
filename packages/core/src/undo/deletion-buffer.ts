import type { DeletionRecord, Task } from '../types/task.js';

/**
 * Holds the most recent deletion only. Recording a new one replaces it.
 */
export class DeletionBuffer {
  private record: DeletionRecord | null = null;

  get last(): DeletionRecord | null {
    return this.record;
  }

  remember(task: Task, index: number): void {
    this.record = { task, index };
  }

  /** Returns the record and empties the buffer */
  take(): DeletionRecord | null {
    const record = this.record;
    this.record = null;
    return record;
  }

  clear(): void {
    this.record = null;
  }
}
