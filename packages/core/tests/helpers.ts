import { createTestDb, type ProtaskDb } from '../src/db.js';
import { SqlitePreferences, type Preferences } from '../src/persistence/preferences.js';
import { PreferencesTaskRepository, type TaskRepository } from '../src/persistence/task-repository.js';
import { TaskStore } from '../src/store/task-store.js';
import type { Task } from '../src/types/task.js';

export interface TestStore {
  db: ProtaskDb;
  preferences: SqlitePreferences;
  repository: PreferencesTaskRepository;
  store: TaskStore;
}

/** A store over a fresh in-memory database */
export async function openTestStore(): Promise<TestStore> {
  const db = createTestDb();
  const preferences = new SqlitePreferences(db);
  const repository = new PreferencesTaskRepository(preferences);
  const store = await TaskStore.open(repository);
  return { db, preferences, repository, store };
}

export function titles(tasks: readonly Task[]): string[] {
  return tasks.map(t => t.title);
}

/** In-memory Preferences whose writes can be made to fail */
export class FlakyPreferences implements Preferences {
  readonly values = new Map<string, string>();
  failWrites = false;

  async getString(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async setString(key: string, value: string): Promise<void> {
    if (this.failWrites) throw new Error('disk full');
    this.values.set(key, value);
  }

  async getInt(key: string): Promise<number | null> {
    const raw = this.values.get(key);
    return raw === undefined ? null : Number.parseInt(raw, 10);
  }

  async setInt(key: string, value: number): Promise<void> {
    await this.setString(key, String(value));
  }

  async remove(key: string): Promise<void> {
    this.values.delete(key);
  }
}

/** Repository that records each saved snapshot */
export class RecordingRepository implements TaskRepository {
  readonly saves: Task[][] = [];
  private initial: Task[];

  constructor(initial: Task[] = []) {
    this.initial = initial;
  }

  async load(): Promise<Task[]> {
    return [...this.initial];
  }

  async save(tasks: readonly Task[]): Promise<void> {
    this.saves.push([...tasks]);
  }
}
