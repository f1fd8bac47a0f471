export {
  addTask, editTask, completeTask, deleteTask, normalizeTags,
} from './task-operations.js';
export type { AddTaskInput, EditTaskChanges } from './task-operations.js';
export {
  runTransaction, addTaskAt, editTaskAt, completeTaskAt, deleteTaskAt, listTasksAt,
} from './transaction.js';
