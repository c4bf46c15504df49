/**
 * Pure task list operations.
 *
 * Each function takes the current list and returns a new one; the input is
 * never mutated. Failures throw TodoError and return nothing, so a caller
 * that catches them still holds the untouched list.
 *
 * Indices are 0-based.
 */

import type { Task } from '../../types/task.js';
import { TodoError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';

/** Message for an index outside the list. */
export const INVALID_TASK_NUMBER = 'Invalid task number.';

/** Result of a rename: the new list plus both descriptions. */
export interface RenameResult {
  tasks: Task[];
  from: string;
  to: string;
}

// ============================================================================
// Bounds helpers
// ============================================================================

/** True when `index` addresses an existing task. */
export function isValidIndex(tasks: readonly Task[], index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < tasks.length;
}

function requireTask(tasks: readonly Task[], index: number): Task {
  const task = isValidIndex(tasks, index) ? tasks[index] : undefined;
  if (!task) {
    throw new TodoError(ExitCode.NOT_FOUND, INVALID_TASK_NUMBER);
  }
  return task;
}

function swap(tasks: readonly Task[], a: number, b: number): Task[] {
  const next = [...tasks];
  const first = requireTask(tasks, a);
  const second = requireTask(tasks, b);
  next[a] = second;
  next[b] = first;
  return next;
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Append a new, incomplete task.
 */
export function addTask(tasks: readonly Task[], description: string): Task[] {
  return [...tasks, { description, completed: false }];
}

/**
 * Flip the completed flag of the task at `index`.
 */
export function toggleTask(tasks: readonly Task[], index: number): Task[] {
  const task = requireTask(tasks, index);
  return tasks.map((t, i) => (i === index ? { ...task, completed: !task.completed } : t));
}

/**
 * Delete the task at `index`; later tasks shift up by one.
 */
export function removeTask(tasks: readonly Task[], index: number): Task[] {
  requireTask(tasks, index);
  return tasks.filter((_, i) => i !== index);
}

/**
 * Swap the task at `index` with the one above it. Valid for [1, len).
 */
export function moveTaskUp(tasks: readonly Task[], index: number): Task[] {
  if (!isValidIndex(tasks, index) || index === 0) {
    throw new TodoError(ExitCode.INVALID_POSITION, 'Cannot move task up.');
  }
  return swap(tasks, index, index - 1);
}

/**
 * Swap the task at `index` with the one below it. Valid for [0, len-1).
 */
export function moveTaskDown(tasks: readonly Task[], index: number): Task[] {
  if (!isValidIndex(tasks, index) || index === tasks.length - 1) {
    throw new TodoError(ExitCode.INVALID_POSITION, 'Cannot move task down.');
  }
  return swap(tasks, index, index + 1);
}

/**
 * Replace the description of the task at `index`.
 */
export function renameTask(tasks: readonly Task[], index: number, description: string): RenameResult {
  const task = requireTask(tasks, index);
  return {
    tasks: tasks.map((t, i) => (i === index ? { ...task, description } : t)),
    from: task.description,
    to: description,
  };
}
