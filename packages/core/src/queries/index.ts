// Task helpers
export {
  createTask,
  normalizeDescription,
  withDoneToggled,
  withPinToggled,
  resolveActiveIds,
  resolveStoredIds,
} from './task-helpers.js';

// Command operations
export {
  CLEAR_DATE,
  listTasks,
  dumpTasks,
  addTasks,
  updateTask,
  toggleDone,
  scheduleTasks,
  setDeadlines,
  togglePin,
  deleteTasks,
  pruneDone,
  purgeTasks,
} from './task-queries.js';
