/**
 * File-backed task store.
 *
 * Owns the ordered task list and the path of its backing file. The list is
 * loaded once, held in memory, and written out in full after every
 * successful mutation. There is no locking; one process is assumed.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import type { Task, TaskFile, TaskRecord } from '../types/task.js';
import { ExitCode, getExitCodeName } from '../types/exit-codes.js';
import { TodoError, describeError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import {
  addTask,
  moveTaskDown,
  moveTaskUp,
  removeTask,
  renameTask,
  toggleTask,
} from '../core/tasks/operations.js';
import { atomicWriteJson, safeReadFile } from './atomic.js';
import { parseJson } from './json.js';

// === FILE SCHEMA ===

/** Backing-file schema. A record without `isCompleted` is incomplete. */
export const taskFileSchema = z.array(
  z.object({
    description: z.string(),
    isCompleted: z.boolean().default(false),
  }),
);

// === RECORD <-> DOMAIN CONVERSION ===

/** Convert a file record to a domain Task. */
function recordToTask(record: TaskRecord): Task {
  return { description: record.description, completed: record.isCompleted };
}

/** Convert a domain Task to its file record. */
function taskToRecord(task: Task): TaskRecord {
  return { description: task.description, isCompleted: task.completed };
}

// === RESULTS ===

/** Outcome of load(). */
export type LoadResult =
  | { status: 'loaded'; count: number }
  | { status: 'missing' }
  | { status: 'failed'; error: TodoError };

/** Outcome of save(). The in-memory list is kept either way. */
export type SaveResult =
  | { saved: true }
  | { saved: false; error: TodoError };

/** Outcome of a successful mutation. */
export interface MutationResult {
  tasks: readonly Task[];
  save: SaveResult;
}

/** Outcome of a successful rename. */
export interface RenameMutationResult extends MutationResult {
  from: string;
  to: string;
}

/** Options for the TaskStore constructor. */
export interface TaskStoreOptions {
  /** Logger to use. Default: getLogger('store'). */
  logger?: Logger;
  /** Initial tasks, for callers that build a store in memory. */
  tasks?: readonly Task[];
}

// === STORE ===

export class TaskStore {
  readonly filePath: string;
  private tasks: readonly Task[];
  private readonly log: Logger;

  constructor(filePath: string, options?: TaskStoreOptions) {
    this.filePath = filePath;
    this.tasks = options?.tasks ? [...options.tasks] : [];
    this.log = options?.logger ?? getLogger('store');
  }

  /**
   * Create a store and load its backing file in one step.
   */
  static async open(
    filePath: string,
    options?: TaskStoreOptions,
  ): Promise<{ store: TaskStore; load: LoadResult }> {
    const store = new TaskStore(filePath, options);
    const load = await store.load();
    return { store, load };
  }

  /** Read-only snapshot of the current list. */
  list(): readonly Task[] {
    return this.tasks;
  }

  /**
   * Replace the in-memory list with the backing file's contents.
   *
   * An absent file leaves the list empty. An unreadable or malformed file
   * also leaves it empty and is reported; the next save overwrites it.
   */
  async load(): Promise<LoadResult> {
    this.tasks = [];

    let content: string | null;
    try {
      content = await safeReadFile(this.filePath);
    } catch (err) {
      const error = err instanceof TodoError
        ? err
        : new TodoError(ExitCode.FILE_ERROR, `Error reading file: ${this.filePath}: ${describeError(err)}`, { cause: err });
      this.log.error({ err: error, code: getExitCodeName(error.code), file: this.filePath }, 'Failed to read task file');
      return { status: 'failed', error };
    }

    if (content === null) {
      this.log.info({ file: this.filePath }, 'No task file yet, starting empty');
      return { status: 'missing' };
    }

    const parsed = parseJson<TaskFile>(content, taskFileSchema);
    if (!parsed.ok) {
      const error = new TodoError(
        ExitCode.VALIDATION_ERROR,
        `Error parsing tasks file: ${this.filePath}: ${parsed.reason}`,
        { cause: parsed.cause, fix: `Repair or move ${this.filePath} aside; the next change overwrites it.` },
      );
      this.log.error({ err: error, code: getExitCodeName(error.code), file: this.filePath }, 'Failed to parse task file');
      return { status: 'failed', error };
    }

    this.tasks = parsed.data.map(recordToTask);
    this.log.info({ file: this.filePath, count: this.tasks.length }, 'Loaded tasks');
    return { status: 'loaded', count: this.tasks.length };
  }

  /**
   * Serialize the full list and overwrite the backing file.
   * Failures are logged and returned, never thrown.
   */
  async save(): Promise<SaveResult> {
    const data: TaskFile = this.tasks.map(taskToRecord);
    try {
      await atomicWriteJson(this.filePath, data);
    } catch (err) {
      const error = err instanceof TodoError
        ? err
        : new TodoError(ExitCode.FILE_ERROR, `Error writing file: ${this.filePath}: ${describeError(err)}`, { cause: err });
      this.log.error({ err: error, code: getExitCodeName(error.code), file: this.filePath }, 'Failed to write task file');
      return { saved: false, error };
    }
    this.log.debug({ file: this.filePath, count: data.length }, 'Saved tasks');
    return { saved: true };
  }

  /** Append a new incomplete task. */
  async add(description: string): Promise<MutationResult> {
    return this.commit(addTask(this.tasks, description));
  }

  /** Flip the completed flag at `index`. Throws NOT_FOUND when out of range. */
  async toggle(index: number): Promise<MutationResult> {
    return this.commit(toggleTask(this.tasks, index));
  }

  /** Delete the task at `index`. Throws NOT_FOUND when out of range. */
  async remove(index: number): Promise<MutationResult> {
    return this.commit(removeTask(this.tasks, index));
  }

  /** Swap `index` with `index - 1`. Throws INVALID_POSITION at the top. */
  async moveUp(index: number): Promise<MutationResult> {
    return this.commit(moveTaskUp(this.tasks, index));
  }

  /** Swap `index` with `index + 1`. Throws INVALID_POSITION at the bottom. */
  async moveDown(index: number): Promise<MutationResult> {
    return this.commit(moveTaskDown(this.tasks, index));
  }

  /** Replace the description at `index`. Throws NOT_FOUND when out of range. */
  async rename(index: number, description: string): Promise<RenameMutationResult> {
    const { tasks, from, to } = renameTask(this.tasks, index, description);
    const result = await this.commit(tasks);
    return { ...result, from, to };
  }

  private async commit(tasks: readonly Task[]): Promise<MutationResult> {
    this.tasks = tasks;
    const save = await this.save();
    return { tasks: this.tasks, save };
  }
}
