/**
 * Task operations barrel export.
 */

export {
  addTask,
  toggleTask,
  removeTask,
  moveTaskUp,
  moveTaskDown,
  renameTask,
  isValidIndex,
  INVALID_TASK_NUMBER,
  type RenameResult,
} from './operations.js';
