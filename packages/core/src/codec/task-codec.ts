/**
 * Task document encoding. The persisted shape is
 * `{ id, title, isDone, priority, subTasks: [{ title, isDone }] }` with
 * `priority` as its ordinal.
 *
 * Decoding tolerates records written before a field existed: `priority`
 * falls back to Medium, `subTasks` to an empty list and `id` to a fresh one.
 * `title` and `isDone` are required.
 */

import { z } from 'zod';
import { Priority } from '../types/priority.js';
import type { DeletionRecord, SubTask, Task, TaskId } from '../types/task.js';
import { generateId } from '../model/task-helpers.js';

export interface SubTaskDocument {
  title: string;
  isDone: boolean;
}

export interface TaskDocument {
  id: string;
  title: string;
  isDone: boolean;
  priority: number;
  subTasks: SubTaskDocument[];
}

const subTaskSchema = z.object({
  title: z.string(),
  isDone: z.boolean(),
});

const taskDocumentSchema = z.object({
  id: z.string().min(1).optional().catch(undefined),
  title: z.string(),
  isDone: z.boolean(),
  priority: z.union([z.literal(Priority.Low), z.literal(Priority.Medium), z.literal(Priority.High)]).catch(Priority.Medium),
  subTasks: z.array(subTaskSchema).nullish(),
});

const taskCollectionSchema = z.array(taskDocumentSchema);

const deletionRecordSchema = z.object({
  index: z.number().int().min(0),
  task: taskDocumentSchema,
});

type DecodedTask = z.infer<typeof taskDocumentSchema>;

function toTask(raw: DecodedTask, taken: Set<TaskId>): Task {
  const id = raw.id !== undefined && !taken.has(raw.id) ? raw.id : generateId(taken);
  taken.add(id);
  const subTasks: SubTask[] = (raw.subTasks ?? []).map(st => ({ title: st.title, isDone: st.isDone }));
  return {
    id,
    title: raw.title,
    isDone: raw.isDone,
    priority: raw.priority,
    subTasks,
  };
}

export function encodeTask(task: Task): TaskDocument {
  return {
    id: task.id,
    title: task.title,
    isDone: task.isDone,
    priority: task.priority,
    subTasks: task.subTasks.map(st => ({ title: st.title, isDone: st.isDone })),
  };
}

export function encodeTasks(tasks: readonly Task[]): TaskDocument[] {
  return tasks.map(encodeTask);
}

/**
 * Decode a parsed document array. Throws a ZodError when any element is
 * malformed; there is no partial result.
 */
export function decodeTasks(input: unknown): Task[] {
  const parsed = taskCollectionSchema.parse(input);
  const taken = new Set<TaskId>();
  return parsed.map(raw => toTask(raw, taken));
}

export function encodeDeletionRecord(record: DeletionRecord): { index: number; task: TaskDocument } {
  return { index: record.index, task: encodeTask(record.task) };
}

/** Returns null for anything that is not a valid record */
export function decodeDeletionRecord(input: unknown): DeletionRecord | null {
  const result = deletionRecordSchema.safeParse(input);
  if (!result.success) return null;
  return { index: result.data.index, task: toTask(result.data.task, new Set()) };
}

/** Zod issues as `path: message`, joined with semicolons */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
