import { ZodError } from 'zod';
import type { Task } from '../types/task.js';
import type { Preferences } from './preferences.js';
import { decodeTasks, describeIssues, encodeTasks } from '../codec/task-codec.js';
import { TaskDocumentError } from '../errors.js';
import { TASKS_SLOT } from '../config.js';

/** Loads and saves the whole task collection. */
export interface TaskRepository {
  /** An absent slot is an empty collection. A malformed one throws TaskDocumentError. */
  load(): Promise<Task[]>;
  /** Overwrites the stored collection with `tasks` */
  save(tasks: readonly Task[]): Promise<void>;
}

/** Keeps the collection as one JSON document in a single preference slot. */
export class PreferencesTaskRepository implements TaskRepository {
  private preferences: Preferences;
  private slot: string;

  constructor(preferences: Preferences, slot: string = TASKS_SLOT) {
    this.preferences = preferences;
    this.slot = slot;
  }

  async load(): Promise<Task[]> {
    const text = await this.preferences.getString(this.slot);
    if (text === null) return [];

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (err: unknown) {
      throw new TaskDocumentError(this.slot, err instanceof Error ? err.message : String(err), { cause: err });
    }

    try {
      return decodeTasks(document);
    } catch (err: unknown) {
      if (err instanceof ZodError) {
        throw new TaskDocumentError(this.slot, describeIssues(err), { cause: err });
      }
      throw err;
    }
  }

  async save(tasks: readonly Task[]): Promise<void> {
    await this.preferences.setString(this.slot, JSON.stringify(encodeTasks(tasks)));
  }
}
