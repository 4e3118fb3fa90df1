// Task helpers
export {
  generateId,
  parseStoredDay,
  storeDay,
  toTask,
  toCompletion,
  sortTasksForDisplay,
} from './task-helpers.js';

// Task queries
export {
  getTaskById,
  getAllTasks,
  getActiveTasks,
  getTasksWithCompletions,
  getTaskWithCompletions,
  insertTask,
  addTask,
  updateTask,
  softDeleteTask,
  softDeleteTasks,
  restoreTask,
  deleteTask,
  deleteTasks,
  reorderTasks,
} from './task-queries.js';
export type { NewTaskInput, TaskChanges, TaskFilter } from './task-queries.js';

// Completion queries
export {
  SqliteCompletionStore,
  toggleCompletion,
  toggleCompletions,
  getCompletionsForDay,
  getCompletionHistory,
  getRecentHistory,
} from './completion-queries.js';
export type { ToggleOptions, DayHistory } from './completion-queries.js';

// Category queries
export {
  isValidCategoryName,
  normalizeColor,
  categoryExists,
  getAllCategories,
  getCategoryNames,
  createCategory,
  deleteCategory,
  renameCategory,
} from './category-queries.js';
export type { CategoryInput } from './category-queries.js';

// Config queries
export {
  getConfig,
  setConfig,
  deleteConfig,
  getFirstWeekday,
  setFirstWeekday,
  getDefaultCategory,
  setDefaultCategory,
} from './config-queries.js';
