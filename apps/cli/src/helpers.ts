/**
 * CLI helpers: view flags, row resolution, argument parsing.
 */

import type { Command } from 'commander';
import type { TaskStore, Priority as PriorityType, FilterType as FilterTypeValue } from '@protask/core';
import { Priority, FilterType, SortDirection, resolveVisibleRow } from '@protask/core';

/** Global options shared by every command */
export interface ViewFlags {
  filter?: string;
  search?: string;
  desc?: boolean;
}

/** Read the global view flags without trusting commander's loose typing */
export function readViewFlags(cmd: Command): ViewFlags {
  const g = cmd.optsWithGlobals();
  return {
    filter: typeof g['filter'] === 'string' ? g['filter'] : undefined,
    search: typeof g['search'] === 'string' ? g['search'] : undefined,
    desc: g['desc'] === true,
  };
}

/**
 * Parse a filter name into a FilterType value.
 */
export function parseFilterArg(value: string): FilterTypeValue | null {
  switch (value.toLowerCase()) {
    case 'all': return FilterType.All;
    case 'pending': case 'todo': return FilterType.Pending;
    case 'completed': case 'done': return FilterType.Completed;
    default: return null;
  }
}

/**
 * Parse a priority name into a Priority value.
 */
export function parsePriorityArg(level: string): PriorityType | null {
  switch (level.toLowerCase()) {
    case 'high': case 'h': return Priority.High;
    case 'medium': case 'med': case 'm': return Priority.Medium;
    case 'low': case 'l': return Priority.Low;
    default: return null;
  }
}

/** A 1-based row number as a 0-based index, or null when not a positive integer */
export function parseRow(value: string): number | null {
  if (!/^\d+$/.test(value.trim())) return null;
  const row = Number.parseInt(value, 10);
  return row >= 1 ? row - 1 : null;
}

/** Trimmed title, or null when nothing is left */
export function normalizeTitle(title: string): string | null {
  const trimmed = title.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** Point the store's view at what the flags ask for. Throws on an unknown filter. */
export function applyViewFlags(store: TaskStore, flags: ViewFlags): void {
  if (flags.filter !== undefined) {
    const filter = parseFilterArg(flags.filter);
    if (filter === null) {
      throw new Error(`Unknown filter '${flags.filter}'. Use all, pending or completed.`);
    }
    store.setFilter(filter);
  }
  if (flags.search !== undefined) {
    store.setSearchQuery(flags.search);
  }
  const wanted = flags.desc ? SortDirection.Descending : SortDirection.Ascending;
  if (store.sortDirection !== wanted) {
    store.toggleSortOrder();
  }
}

/**
 * Resolve a 1-based visible row argument to a canonical index.
 * Throws with a user-facing message when the row does not exist.
 */
export function resolveRowArg(store: TaskStore, value: string): number {
  const visibleIndex = parseRow(value);
  const canonicalIndex = visibleIndex === null ? -1 : resolveVisibleRow(store, visibleIndex);
  if (canonicalIndex === -1) {
    throw new Error(`Row ${value} not found`);
  }
  return canonicalIndex;
}

/** A 1-based sub-task number as a 0-based index. Throws when not a positive integer. */
export function parseSubTaskArg(value: string): number {
  const index = parseRow(value);
  if (index === null) {
    throw new Error(`Invalid sub-task number '${value}'`);
  }
  return index;
}
