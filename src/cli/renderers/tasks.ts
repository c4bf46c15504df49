/**
 * Text renderers for the task list.
 *
 * Each renderer returns one string, possibly multi-line, without a trailing
 * newline; the REPL driver terminates it when printing.
 */

import type { Task } from '../../types/task.js';

/** Checkbox marker for a task's completion state. */
export function checkbox(task: Task): string {
  return task.completed ? '[X]' : '[ ]';
}

/** One numbered line, `position` being 1-based. */
export function renderTaskLine(task: Task, position: number): string {
  return `${position}. ${checkbox(task)} ${task.description}`;
}

/**
 * The whole list, numbered 1..N and framed by blank lines,
 * or `No tasks.` when empty.
 */
export function renderTaskList(tasks: readonly Task[]): string {
  if (tasks.length === 0) return 'No tasks.';
  const lines = tasks.map((task, i) => renderTaskLine(task, i + 1));
  return ['', ...lines, ''].join('\n');
}

/** Old and new description after a rename. */
export function renderRename(from: string, to: string): string {
  return [`  From: ${from}`, `  To:   ${to}`].join('\n');
}
