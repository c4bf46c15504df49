/**
 * Tests for the file-backed task store.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, readFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { pino } from 'pino';
import { TaskStore } from '../task-store.js';
import { ExitCode } from '../../types/exit-codes.js';
import { safeReadFile } from '../atomic.js';

const logger = pino({ level: 'silent' });

describe('TaskStore', () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'todo-store-test-'));
    filePath = join(tempDir, 'tasks.json');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('starts empty when the file does not exist', async () => {
      const { store, load } = await TaskStore.open(filePath, { logger });
      expect(load).toEqual({ status: 'missing' });
      expect(store.list()).toEqual([]);
    });

    it('reads the compact array format', async () => {
      await writeFile(filePath, '[{"description":"buy milk","isCompleted":true},{"description":"walk dog","isCompleted":false}]');
      const { store, load } = await TaskStore.open(filePath, { logger });
      expect(load).toEqual({ status: 'loaded', count: 2 });
      expect(store.list()).toEqual([
        { description: 'buy milk', completed: true },
        { description: 'walk dog', completed: false },
      ]);
    });

    it('treats a record without isCompleted as incomplete', async () => {
      await writeFile(filePath, '[{"description":"buy milk"}]');
      const { store } = await TaskStore.open(filePath, { logger });
      expect(store.list()).toEqual([{ description: 'buy milk', completed: false }]);
    });

    it('reports invalid JSON and leaves the list empty', async () => {
      await writeFile(filePath, '[{"description": ');
      const { store, load } = await TaskStore.open(filePath, { logger });
      expect(load.status).toBe('failed');
      if (load.status !== 'failed') return;
      expect(load.error.code).toBe(ExitCode.VALIDATION_ERROR);
      expect(load.error.message.startsWith(`Error parsing tasks file: ${filePath}: `)).toBe(true);
      expect(store.list()).toEqual([]);
    });

    it('reports a file that is not an array', async () => {
      await writeFile(filePath, '{"tasks": []}');
      const { load } = await TaskStore.open(filePath, { logger });
      if (load.status !== 'failed') throw new Error(`unexpected status ${load.status}`);
      expect(load.error.message).toBe(`Error parsing tasks file: ${filePath}: Expected array, received object`);
      expect(load.error.fix).toBe(`Repair or move ${filePath} aside; the next change overwrites it.`);
    });

    it('reports a record with a non-string description and names its path', async () => {
      await writeFile(filePath, '[{"description":"ok","isCompleted":false},{"description":42,"isCompleted":false}]');
      const { store, load } = await TaskStore.open(filePath, { logger });
      if (load.status !== 'failed') throw new Error(`unexpected status ${load.status}`);
      expect(load.error.message).toBe(`Error parsing tasks file: ${filePath}: 1.description: Expected string, received number`);
      expect(store.list()).toEqual([]);
    });

    it('reports an unreadable file as a FILE_ERROR', async () => {
      await mkdir(filePath);
      const { store, load } = await TaskStore.open(filePath, { logger });
      if (load.status !== 'failed') throw new Error(`unexpected status ${load.status}`);
      expect(load.error.code).toBe(ExitCode.FILE_ERROR);
      expect(load.error.message.startsWith(`Error reading file: ${filePath}: `)).toBe(true);
      expect(store.list()).toEqual([]);
    });

    it('overwrites a corrupt file on the next save', async () => {
      await writeFile(filePath, 'not json');
      const { store } = await TaskStore.open(filePath, { logger });
      await store.add('fresh start');
      const saved = JSON.parse(await readFile(filePath, 'utf8'));
      expect(saved).toEqual([{ description: 'fresh start', isCompleted: false }]);
    });
  });

  describe('save', () => {
    it('writes the list with 2-space indentation and a trailing newline', async () => {
      const store = new TaskStore(filePath, { logger });
      await store.add('buy milk');
      const content = await readFile(filePath, 'utf8');
      expect(content).toBe('[\n  {\n    "description": "buy milk",\n    "isCompleted": false\n  }\n]\n');
    });

    it('round-trips the ordered list', async () => {
      const store = new TaskStore(filePath, { logger });
      await store.add('first');
      await store.add('second');
      await store.add('third');
      await store.toggle(1);
      await store.moveDown(0);

      const { store: reloaded } = await TaskStore.open(filePath, { logger });
      expect(reloaded.list()).toEqual(store.list());
      expect(reloaded.list()).toEqual([
        { description: 'second', completed: true },
        { description: 'first', completed: false },
        { description: 'third', completed: false },
      ]);
    });

    it('writes an empty array after the last task is removed', async () => {
      const store = new TaskStore(filePath, { logger });
      await store.add('only');
      await store.remove(0);
      expect(await readFile(filePath, 'utf8')).toBe('[]\n');
    });

    it('reports a write failure and keeps the in-memory change', async () => {
      const blocker = join(tempDir, 'blocker');
      await writeFile(blocker, 'a file, not a directory');
      const store = new TaskStore(join(blocker, 'tasks.json'), { logger });

      const result = await store.add('buy milk');
      expect(result.save.saved).toBe(false);
      if (result.save.saved) return;
      expect(result.save.error.code).toBe(ExitCode.FILE_ERROR);
      expect(result.save.error.message.startsWith(`Error writing file: ${join(blocker, 'tasks.json')}: `)).toBe(true);
      expect(store.list()).toEqual([{ description: 'buy milk', completed: false }]);
    });

    it('logs the write failure with its exit code name', async () => {
      const blocker = join(tempDir, 'blocker');
      await writeFile(blocker, 'a file, not a directory');
      const records: string[] = [];
      const recording = pino({ level: 'error' }, { write: (line: string) => { records.push(line); } });
      const target = join(blocker, 'tasks.json');

      await new TaskStore(target, { logger: recording }).add('buy milk');

      expect(records).toHaveLength(1);
      const record = JSON.parse(records[0] ?? '');
      expect(record).toMatchObject({
        level: 50,
        msg: 'Failed to write task file',
        code: 'FILE_ERROR',
        file: target,
        err: { type: 'TodoError', code: ExitCode.FILE_ERROR },
      });
      expect(record.err.message.startsWith(`Error writing file: ${target}: `)).toBe(true);
    });
  });

  describe('mutations', () => {
    it('add appends an incomplete task and grows the list by one', async () => {
      const store = new TaskStore(filePath, { logger, tasks: [{ description: 'a', completed: true }] });
      const result = await store.add('b');
      expect(result.tasks).toEqual([
        { description: 'a', completed: true },
        { description: 'b', completed: false },
      ]);
      expect(result.save).toEqual({ saved: true });
    });

    it('toggle twice restores the original flag', async () => {
      const store = new TaskStore(filePath, { logger, tasks: [{ description: 'a', completed: false }] });
      await store.toggle(0);
      expect(store.list()[0]?.completed).toBe(true);
      await store.toggle(0);
      expect(store.list()[0]?.completed).toBe(false);
    });

    it('rejects an out-of-range index without writing', async () => {
      const store = new TaskStore(filePath, { logger, tasks: [{ description: 'a', completed: false }] });
      await expect(store.toggle(1)).rejects.toThrow('Invalid task number.');
      await expect(store.remove(-1)).rejects.toThrow('Invalid task number.');
      await expect(store.rename(3, 'b')).rejects.toThrow('Invalid task number.');
      expect(await safeReadFile(filePath)).toBeNull();
      expect(store.list()).toEqual([{ description: 'a', completed: false }]);
    });

    it('moveUp on the first task and moveDown on the last leave the list unchanged', async () => {
      const tasks = [
        { description: 'a', completed: false },
        { description: 'b', completed: false },
      ];
      const store = new TaskStore(filePath, { logger, tasks });
      await expect(store.moveUp(0)).rejects.toThrow('Cannot move task up.');
      await expect(store.moveDown(1)).rejects.toThrow('Cannot move task down.');
      expect(store.list()).toEqual(tasks);
    });

    it('remove keeps the remaining tasks in their original order', async () => {
      const store = new TaskStore(filePath, {
        logger,
        tasks: ['a', 'b', 'c', 'd'].map((description) => ({ description, completed: false })),
      });
      const result = await store.remove(1);
      expect(result.tasks.map((t) => t.description)).toEqual(['a', 'c', 'd']);
    });

    it('rename reports the old and new description', async () => {
      const store = new TaskStore(filePath, { logger, tasks: [{ description: 'buy milk', completed: true }] });
      const result = await store.rename(0, 'buy oat milk');
      expect(result.from).toBe('buy milk');
      expect(result.to).toBe('buy oat milk');
      expect(result.tasks).toEqual([{ description: 'buy oat milk', completed: true }]);
    });

    it('does not share its list with the caller', async () => {
      const tasks = [{ description: 'a', completed: false }];
      const store = new TaskStore(filePath, { logger, tasks });
      await store.add('b');
      expect(tasks).toHaveLength(1);
    });
  });
});
