export type { TaskId, IsoDate, Task } from './task.js';
export type { MutationResult } from './results.js';
export { changed, unchanged } from './results.js';
