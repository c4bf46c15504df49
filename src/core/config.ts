/**
 * Configuration engine.
 *
 * Resolution priority: Project config > Global config > Defaults.
 * Each layer is a partial document; the merged result is validated with zod.
 */

import { z } from 'zod';
import type { TodoConfig } from '../types/config.js';
import { ExitCode } from '../types/exit-codes.js';
import { TodoError } from './errors.js';
import { readValidatedJson } from '../store/json.js';
import { getConfigPath, getGlobalConfigPath } from './paths.js';

/** Default configuration values. */
export const DEFAULTS: TodoConfig = {
  dataFile: 'tasks.json',
  prompt: '> ',
  logging: {
    level: 'info',
    filePath: 'logs/todo.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

const loggingSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
  filePath: z.string().min(1),
  maxFileSize: z.number().int().positive(),
  maxFiles: z.number().int().positive(),
});

/** Schema of a fully resolved config. */
export const configSchema = z.object({
  dataFile: z.string().min(1),
  prompt: z.string(),
  logging: loggingSchema,
});

/** Schema of one config file layer. Unknown keys are rejected. */
const configLayerSchema = z
  .object({
    dataFile: z.string().min(1),
    prompt: z.string(),
    logging: loggingSchema.partial().strict(),
  })
  .partial()
  .strict();

type ConfigLayer = z.infer<typeof configLayerSchema>;

/** Options for loadConfig. */
export interface LoadConfigOptions {
  /** Home directory holding the global .todo directory. Default: os.homedir(). */
  home?: string;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else if (sourceVal !== undefined) {
      result[key] = sourceVal;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

async function readLayer(filePath: string): Promise<ConfigLayer | null> {
  return readValidatedJson(filePath, configLayerSchema, {
    label: 'Invalid config',
    code: ExitCode.CONFIG_ERROR,
    fix: `Correct or remove ${filePath}`,
  });
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < global config < project config.
 */
export async function loadConfig(cwd?: string, options?: LoadConfigOptions): Promise<TodoConfig> {
  let merged: Record<string, unknown> = { ...structuredClone(DEFAULTS) };

  const globalConfig = await readLayer(getGlobalConfigPath(options?.home));
  if (globalConfig) {
    merged = deepMerge(merged, globalConfig);
  }

  const projectConfig = await readLayer(getConfigPath(cwd));
  if (projectConfig) {
    merged = deepMerge(merged, projectConfig);
  }

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    throw new TodoError(
      ExitCode.CONFIG_ERROR,
      `Invalid config: ${result.error.issues.map((i) => i.message).join('; ')}`,
      { cause: result.error },
    );
  }
  return result.data;
}
