import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import {
  createTestDb,
  SqlitePreferences,
  TaskDocumentError,
  ThemeMode,
  Priority,
  clearLogs,
  getLogHistory,
  setConsoleEcho,
} from '@protask/core';
import type { Preferences, Task } from '@protask/core';
import { openContext } from '../src/context.js';
import { runCli } from '../src/program.js';

let prefs: Preferences;
let logSpy: MockInstance<typeof console.log>;

beforeEach(() => {
  prefs = new SqlitePreferences(createTestDb());
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  setConsoleEcho(false);
  clearLogs();
});

afterEach(() => {
  setConsoleEcho(true);
  vi.restoreAllMocks();
});

/** One process invocation: fresh context over the shared preferences */
async function invoke(...args: string[]): Promise<number> {
  const ctx = await openContext(prefs);
  return runCli(args, ctx);
}

async function storedTasks(): Promise<Task[]> {
  return (await openContext(prefs)).store.getSnapshot().slice();
}

function output(): string {
  return logSpy.mock.calls.map(call => call.map(String).join(' ')).join('\n');
}

describe('add', () => {
  it('adds to the front and reports the visible row', async () => {
    expect(await invoke('add', 'Buy milk')).toBe(0);
    expect(await invoke('add', 'Walk dog', '-p', 'high')).toBe(0);
    expect(await invoke('add', 'Read', '--priority', 'low')).toBe(0);

    expect((await storedTasks()).map(t => [t.title, t.priority])).toEqual([
      ['Read', Priority.Low],
      ['Walk dog', Priority.High],
      ['Buy milk', Priority.Medium],
    ]);
    expect(output()).toContain('Added "Read" at row 3');
  });

  it('says when the new task is hidden by the view', async () => {
    await invoke('--filter', 'completed', 'add', 'Hidden');
    expect(output()).toContain('Added "Hidden" (hidden by the current view)');
  });

  it('rejects a blank title', async () => {
    expect(await invoke('add', '   ')).toBe(1);
    expect(await storedTasks()).toEqual([]);
    expect(output()).toContain('Please enter a task description.');
  });

  it('rejects an unknown priority', async () => {
    expect(await invoke('add', 'Task', '-p', 'urgent')).toBe(1);
    expect(await storedTasks()).toEqual([]);
  });
});

describe('list', () => {
  it('prints the empty-list hint', async () => {
    expect(await invoke('list')).toBe(0);
    expect(output()).toContain('Your task list is empty!');
  });

  it('runs by default and counts filtered rows', async () => {
    await invoke('add', 'Buy milk');
    await invoke('add', 'Walk dog', '-p', 'high');
    logSpy.mockClear();

    expect(await invoke('--search', 'MILK')).toBe(0);
    expect(output()).toContain('Buy milk');
    expect(output()).not.toContain('Walk dog');
    expect(output()).toContain('1 of 2 task(s) shown');
  });

  it('rejects an unknown filter', async () => {
    expect(await invoke('--filter', 'someday', 'list')).toBe(1);
    expect(output()).toContain("Unknown filter 'someday'. Use all, pending or completed.");
  });
});

describe('check and edit', () => {
  beforeEach(async () => {
    await invoke('add', 'Low one', '-p', 'low');
    await invoke('add', 'High one', '-p', 'high');
  });

  it('toggles the task at the visible row', async () => {
    expect(await invoke('check', '1')).toBe(0);
    expect((await storedTasks()).map(t => [t.title, t.isDone])).toEqual([
      ['High one', true],
      ['Low one', false],
    ]);
    expect(output()).toContain('Completed "High one"');
  });

  it('counts rows within the filtered view', async () => {
    await invoke('check', '1');
    expect(await invoke('--filter', 'pending', 'check', '1')).toBe(0);
    expect((await storedTasks()).every(t => t.isDone)).toBe(true);
  });

  it('counts rows in descending order', async () => {
    expect(await invoke('--desc', 'check', '1')).toBe(0);
    expect((await storedTasks()).find(t => t.isDone)?.title).toBe('Low one');
  });

  it('fails for a row that does not exist', async () => {
    expect(await invoke('check', '3')).toBe(1);
    expect(output()).toContain('Row 3 not found');
  });

  it('edit keeps the priority unless given', async () => {
    expect(await invoke('edit', '2', 'Lower one')).toBe(0);
    expect(await invoke('edit', '1', 'Top one', '-p', 'medium')).toBe(0);
    expect((await storedTasks()).map(t => [t.title, t.priority])).toEqual([
      ['Top one', Priority.Medium],
      ['Lower one', Priority.Low],
    ]);
  });
});

describe('tasks with the same title and priority', () => {
  beforeEach(async () => {
    await invoke('add', 'Same');
    await invoke('add', 'Same');
    await invoke('add', 'Other', '-p', 'low');
  });

  it('check toggles only the task at the given row', async () => {
    // canonical: Other, Same (second), Same (first)
    expect(await invoke('check', '2')).toBe(0);
    expect((await storedTasks()).map(t => t.isDone)).toEqual([false, false, true]);

    expect(await invoke('--desc', 'check', '2')).toBe(0);
    expect((await storedTasks()).map(t => t.isDone)).toEqual([false, true, true]);
  });

  it('delete removes only the task at the given row', async () => {
    const before = await storedTasks();
    expect(await invoke('--desc', 'delete', '3')).toBe(0);
    expect((await storedTasks()).map(t => t.id)).toEqual([before[0]?.id, before[1]?.id]);
  });
});

describe('delete and undo', () => {
  beforeEach(async () => {
    await invoke('add', 'A');
    await invoke('add', 'B');
  });

  it('restores the deleted task in a later invocation', async () => {
    expect(await invoke('delete', '2')).toBe(0);
    expect((await storedTasks()).map(t => t.title)).toEqual(['B']);

    expect(await invoke('undo')).toBe(0);
    expect((await storedTasks()).map(t => t.title)).toEqual(['B', 'A']);
    expect(await prefs.getString('lastDeleted')).toBeNull();
    expect(output()).toContain('Restored "A"');
  });

  it('keeps the task id through delete and undo', async () => {
    const before = await storedTasks();
    await invoke('delete', '1');
    await invoke('undo');
    expect(await storedTasks()).toEqual(before);
  });

  it('has nothing to undo twice', async () => {
    await invoke('delete', '1');
    await invoke('undo');
    logSpy.mockClear();
    expect(await invoke('undo')).toBe(0);
    expect(output()).toContain('Nothing to undo');
  });

  it('puts the task at the end when the list has shrunk since', async () => {
    await invoke('delete', '2');
    await invoke('delete', '1');
    // only the second deletion is kept; it was at index 0 of a one-row list
    await invoke('add', 'C');
    const record = JSON.parse((await prefs.getString('lastDeleted')) ?? 'null');
    await prefs.setString('lastDeleted', JSON.stringify({ ...record, index: 5 }));

    expect(await invoke('undo')).toBe(0);
    expect((await storedTasks()).map(t => t.title)).toEqual(['C', 'B']);
  });

  it('warns when the deleted task is back already', async () => {
    const [first] = await storedTasks();
    await prefs.setString('lastDeleted', JSON.stringify({ index: 0, task: first }));

    expect(await invoke('undo')).toBe(0);
    expect(output()).toContain('"B" is already in the list');
    expect(await prefs.getString('lastDeleted')).toBeNull();
    expect(await storedTasks()).toHaveLength(2);
  });

  it('ignores an unreadable undo record', async () => {
    await prefs.setString('lastDeleted', '{oops');
    expect(await invoke('undo')).toBe(0);
    expect(output()).toContain('Nothing to undo');
    expect(getLogHistory().at(-1)?.scope).toBe('cli');
  });
});

describe('sub', () => {
  beforeEach(async () => {
    await invoke('add', 'Trip');
  });

  it('adds, toggles and removes sub-tasks', async () => {
    await invoke('sub', 'add', '1', 'Tickets');
    await invoke('sub', 'add', '1', 'Hotel');
    expect(await invoke('sub', 'check', '1', '2')).toBe(0);
    expect((await storedTasks())[0]?.subTasks).toEqual([
      { title: 'Tickets', isDone: false },
      { title: 'Hotel', isDone: true },
    ]);

    expect(await invoke('sub', 'rm', '1', '1')).toBe(0);
    expect((await storedTasks())[0]?.subTasks).toEqual([{ title: 'Hotel', isDone: true }]);
  });

  it('fails for a missing sub-task', async () => {
    expect(await invoke('sub', 'check', '1', '3')).toBe(1);
    expect(output()).toContain('Sub-task 3 not found');
  });
});

describe('theme', () => {
  it('shows System by default', async () => {
    expect(await invoke('theme')).toBe(0);
    expect(output()).toContain('Theme: System');
  });

  it('toggle and system are saved', async () => {
    await invoke('theme', 'toggle');
    expect(await prefs.getInt('themeMode')).toBe(ThemeMode.Light);
    await invoke('theme', 'toggle');
    expect(await prefs.getInt('themeMode')).toBe(ThemeMode.Dark);
    await invoke('theme', 'system');
    expect(await prefs.getInt('themeMode')).toBe(ThemeMode.System);
  });

  it('rejects an unknown action', async () => {
    expect(await invoke('theme', 'sepia')).toBe(1);
  });
});

describe('storage problems', () => {
  it('refuses to open a malformed task document', async () => {
    await prefs.setString('tasks', '{"not":"a list"}');
    await expect(openContext(prefs)).rejects.toBeInstanceOf(TaskDocumentError);
  });

  it('exits with 1 when the tasks cannot be saved', async () => {
    const failing: Preferences = {
      getString: key => prefs.getString(key),
      getInt: key => prefs.getInt(key),
      setString: async () => { throw new Error('disk full'); },
      setInt: (key, value) => prefs.setInt(key, value),
      remove: key => prefs.remove(key),
    };
    const ctx = await openContext(failing);
    expect(await runCli(['add', 'Lost'], ctx)).toBe(1);
    expect(output()).toContain('Could not save tasks: disk full');
  });
});
