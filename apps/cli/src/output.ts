/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import { Priority, subTaskProgress } from '@protask/core';
import type { Task, SubTask, Priority as PriorityType } from '@protask/core';

// --- Formatting functions ---

export function formatCheckbox(isDone: boolean): string {
  return isDone ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatPriority(priority: PriorityType): string {
  switch (priority) {
    case Priority.High: return chalk.red.bold('>>>');
    case Priority.Medium: return chalk.yellow('>> ');
    default: return chalk.blue('>  ');
  }
}

export function formatProgress(task: Task): string {
  const { done, total } = subTaskProgress(task);
  if (total === 0) return '';
  return chalk.dim(`  (${done}/${total})`);
}

export function formatTitle(task: Pick<Task, 'title' | 'isDone'>): string {
  return task.isDone ? chalk.strikethrough.dim(task.title) : task.title;
}

export function formatTaskLine(row: number, task: Task, width: number): string {
  const num = chalk.dim(String(row).padStart(width, ' ') + '.');
  return `${num} ${formatCheckbox(task.isDone)} ${formatPriority(task.priority)} ${formatTitle(task)}${formatProgress(task)}`;
}

export function formatSubTaskLine(index: number, subTask: SubTask, indent: number): string {
  return `${' '.repeat(indent)}${chalk.dim(`${index + 1})`)} ${formatCheckbox(subTask.isDone)} ${formatTitle(subTask)}`;
}

/** Print the visible sequence, numbering rows from 1 */
export function printTasks(tasks: readonly Task[], showSubTasks: boolean): void {
  const width = String(tasks.length).length;
  tasks.forEach((task, i) => {
    console.log(formatTaskLine(i + 1, task, width));
    if (!showSubTasks) return;
    task.subTasks.forEach((st, j) => {
      console.log(formatSubTaskLine(j, st, width + 6));
    });
  });
}

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

// --- Utilities ---

export function truncate(s: string, maxLen: number): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen - 1) + '…';
}
