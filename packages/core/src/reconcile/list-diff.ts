/**
 * Turns two visible sequences into the incremental updates a rendering
 * surface needs. Rows are matched by task id: the common head and tail are
 * paired directly and a longest common subsequence is taken over the rest,
 * so a row that moved shows up as a removal plus an insertion.
 *
 * Order of the result: removals at old positions, highest first; then
 * insertions at new positions, lowest first; then changes at new positions.
 * Applying them in that order to `previous` yields `next`.
 */

import type { Task } from '../types/task.js';

export type ListChange =
  | { readonly type: 'remove'; readonly index: number; readonly item: Task }
  | { readonly type: 'insert'; readonly index: number; readonly item: Task }
  | { readonly type: 'change'; readonly index: number; readonly item: Task };

export function diffVisible(previous: readonly Task[], next: readonly Task[]): ListChange[] {
  const removals: ListChange[] = [];
  const insertions: ListChange[] = [];
  const changes: ListChange[] = [];

  const pushIfChanged = (before: Task, after: Task, index: number): void => {
    if (before !== after) changes.push({ type: 'change', index, item: after });
  };

  // Common head and tail are matched directly; only the middle needs the LCS table
  let head = 0;
  while (head < previous.length && head < next.length && previous[head]?.id === next[head]?.id) head++;

  let prevEnd = previous.length;
  let nextEnd = next.length;
  while (prevEnd > head && nextEnd > head && previous[prevEnd - 1]?.id === next[nextEnd - 1]?.id) {
    prevEnd--;
    nextEnd--;
  }

  for (let k = 0; k < head; k++) {
    const before = previous[k];
    const after = next[k];
    if (before && after) pushIfChanged(before, after, k);
  }

  const n = prevEnd - head;
  const m = nextEnd - head;
  const width = m + 1;

  // lcs[i * width + j] = length of the LCS of the middles from i and j on
  const lcs = new Uint32Array((n + 1) * width);
  const at = (i: number, j: number): number => lcs[i * width + j] ?? 0;

  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      lcs[i * width + j] = previous[head + i]?.id === next[head + j]?.id
        ? at(i + 1, j + 1) + 1
        : Math.max(at(i + 1, j), at(i, j + 1));
    }
  }

  let i = 0;
  let j = 0;
  while (i < n || j < m) {
    const before = previous[head + i];
    const after = next[head + j];
    if (i < n && j < m && before && after && before.id === after.id) {
      pushIfChanged(before, after, head + j);
      i++;
      j++;
    } else if (i < n && before && (j >= m || at(i + 1, j) >= at(i, j + 1))) {
      removals.push({ type: 'remove', index: head + i, item: before });
      i++;
    } else if (j < m && after) {
      insertions.push({ type: 'insert', index: head + j, item: after });
      j++;
    } else {
      break;
    }
  }

  const offset = next.length - previous.length;
  for (let k = prevEnd; k < previous.length; k++) {
    const before = previous[k];
    const after = next[k + offset];
    if (before && after) pushIfChanged(before, after, k + offset);
  }

  return [...removals.reverse(), ...insertions, ...changes];
}

/** Apply changes produced by `diffVisible` to a copy of `list` */
export function applyListChanges(list: readonly Task[], changes: readonly ListChange[]): Task[] {
  const result = [...list];
  for (const change of changes) {
    switch (change.type) {
      case 'remove':
        result.splice(change.index, 1);
        break;
      case 'insert':
        result.splice(change.index, 0, change.item);
        break;
      case 'change':
        result[change.index] = change.item;
        break;
    }
  }
  return result;
}
