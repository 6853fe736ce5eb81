// Types
export { Priority, PriorityName } from './types/priority.js';
export { FilterType, SortDirection, DEFAULT_VIEW } from './types/view-options.js';
export type { ViewOptions } from './types/view-options.js';
export { ThemeMode, ThemeModeName, isThemeMode } from './types/theme-mode.js';
export type { TaskId, SubTask, Task, DeletionRecord } from './types/task.js';

// Errors
export { TaskDocumentError } from './errors.js';

// Configuration
export { TASKS_SLOT, THEME_SLOT, LAST_DELETED_SLOT, getDefaultDbPath, resolveDbPath } from './config.js';

// Database
export { createDb, createTestDb, getRawDb, closeDb, withRetry, CREATE_SCHEMA_SQL } from './db.js';
export type { ProtaskDb } from './db.js';
export * from './schema/index.js';
export * from './queries/index.js';

// Entity helpers and codec
export { generateId, createTask, subTaskProgress } from './model/task-helpers.js';
export {
  encodeTask, encodeTasks, decodeTasks,
  encodeDeletionRecord, decodeDeletionRecord, describeIssues,
} from './codec/task-codec.js';
export type { TaskDocument, SubTaskDocument } from './codec/task-codec.js';

// Persistence
export { SqlitePreferences } from './persistence/preferences.js';
export type { Preferences } from './persistence/preferences.js';
export { PreferencesTaskRepository } from './persistence/task-repository.js';
export type { TaskRepository } from './persistence/task-repository.js';

// Store, view, reconciliation
export { TaskStore } from './store/task-store.js';
export { DeletionBuffer } from './undo/deletion-buffer.js';
export { projectRows, projectTasks } from './view/view-projector.js';
export type { VisibleRow } from './view/view-projector.js';
export { diffVisible, applyListChanges } from './reconcile/list-diff.js';
export type { ListChange } from './reconcile/list-diff.js';
export { resolveCanonicalIndex, resolveVisibleRow } from './reconcile/resolve.js';
export { ListReconciler } from './reconcile/list-reconciler.js';
export type { RenderSurface } from './reconcile/list-reconciler.js';

// Theme
export { ThemePreference } from './theme/theme-preference.js';

// Logging
export { createLogger, setConsoleEcho, getLogHistory, clearLogs, onLog } from './logging/log-buffer.js';
export type { LogEntry, Logger } from './logging/log-buffer.js';
