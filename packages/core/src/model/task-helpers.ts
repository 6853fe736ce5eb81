import type { Priority } from '../types/priority.js';
import type { SubTask, Task, TaskId } from '../types/task.js';

const ID_CHARS = '0123456789abcdefghijklmnopqrstuvwxyz';
const ID_LENGTH = 8;

/** Generate a random task ID that is not in `taken` */
export function generateId(taken: ReadonlySet<TaskId> = new Set()): TaskId {
  for (;;) {
    let id = '';
    for (let i = 0; i < ID_LENGTH; i++) {
      id += ID_CHARS[Math.floor(Math.random() * ID_CHARS.length)];
    }
    if (!taken.has(id)) return id;
  }
}

/** Create a new, pending Task with no sub-tasks */
export function createTask(title: string, priority: Priority, taken?: ReadonlySet<TaskId>): Task {
  return {
    id: generateId(taken),
    title,
    isDone: false,
    priority,
    subTasks: [],
  };
}

/** Return a copy of the task with a new title and priority */
export function withDetails(task: Task, title: string, priority: Priority): Task {
  return { ...task, title, priority };
}

/** Return a copy of the task with `isDone` flipped */
export function withToggledStatus(task: Task): Task {
  return { ...task, isDone: !task.isDone };
}

/** Return a copy of the task with a pending sub-task appended */
export function withSubTaskAdded(task: Task, title: string): Task {
  const subTask: SubTask = { title, isDone: false };
  return { ...task, subTasks: [...task.subTasks, subTask] };
}

/** Return a copy of the task with one sub-task's `isDone` flipped */
export function withSubTaskToggled(task: Task, subIndex: number): Task {
  return {
    ...task,
    subTasks: task.subTasks.map((st, i) => (i === subIndex ? { ...st, isDone: !st.isDone } : st)),
  };
}

/** Return a copy of the task without the sub-task at `subIndex` */
export function withSubTaskRemoved(task: Task, subIndex: number): Task {
  return { ...task, subTasks: task.subTasks.filter((_, i) => i !== subIndex) };
}

/** Completed and total sub-task counts */
export function subTaskProgress(task: Task): { done: number; total: number } {
  return {
    done: task.subTasks.filter(st => st.isDone).length,
    total: task.subTasks.length,
  };
}
