/**
 * Task type definitions.
 */

/** A single task. Identified only by its position in the list. */
export interface Task {
  description: string;
  completed: boolean;
}

/**
 * On-disk shape of one task in the backing file.
 * The key names are kept compatible with files written by earlier releases.
 */
export interface TaskRecord {
  description: string;
  isCompleted: boolean;
}

/** The persisted file: an ordered array of task records. */
export type TaskFile = TaskRecord[];
