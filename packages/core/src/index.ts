// Types
export type { TaskId, IsoDate, Task, MutationResult } from './types/index.js';
export { changed, unchanged } from './types/index.js';

// Errors
export {
  TaskError,
  ValidationError,
  NotFoundError,
  StorageError,
  isTaskError,
  describeError,
} from './errors.js';
export type { TaskErrorCode } from './errors.js';

// Schema
export * from './schema/index.js';

// Store
export { TaskStore, encodeTasks, decodeTasks, CsvFormatError, renumber, hasDenseIds, compareForDisplay, sortTasksForDisplay } from './store/index.js';
export { getConfigDir, getDefaultStorePath } from './paths.js';

// Parsers
export { formatDate, isIsoDate, compilePattern, matchesPattern } from './parsers/index.js';

// Queries
export * from './queries/index.js';
