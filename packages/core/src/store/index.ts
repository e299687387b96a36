export { TaskStore } from './task-store.js';
export { encodeTasks, decodeTasks, CsvFormatError } from './csv-codec.js';
export { renumber, hasDenseIds, compareForDisplay, sortTasksForDisplay } from './renumber.js';
