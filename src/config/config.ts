import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ReckonConfigSchema, type ReckonConfig } from './schema.js';

export const CONFIG_FILE_NAME = 'reckon.json';

export interface LoadConfigOptions {
  /** Directory searched for reckon.json. Defaults to the working directory. */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Values below the config file in priority, e.g. the package version. */
  defaults?: Record<string, unknown>;
}

/**
 * Load config with priority: CLI flags > env vars > reckon.json > defaults
 */
export async function loadConfig(
  overrides?: Record<string, unknown>,
  options: LoadConfigOptions = {},
): Promise<ReckonConfig> {
  const fileConfig = await loadJSON(resolve(options.cwd ?? '.', CONFIG_FILE_NAME));
  const envConfig = loadEnvVars(options.env ?? process.env);

  const merged = deepMerge(options.defaults ?? {}, fileConfig, envConfig, overrides ?? {});

  return ReckonConfigSchema.parse(merged);
}

export function loadEnvVars(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  const level = env.RECKON_LOG_LEVEL || env.LOG_LEVEL;
  if (level) {
    result.logging = { level: level.toLowerCase() };
  }

  const requireInitialize = env.RECKON_REQUIRE_INITIALIZE;
  if (requireInitialize) {
    result.server = { requireInitialize: ['1', 'true', 'yes'].includes(requireInitialize.toLowerCase()) };
  }

  return result;
}

async function loadJSON(path: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw err;
  }

  const parsed: unknown = JSON.parse(content);
  if (!isPlainObject(parsed)) {
    throw new Error(`${path} must contain a JSON object`);
  }
  return parsed;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(...objects: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const obj of objects) {
    for (const [key, value] of Object.entries(obj)) {
      const existing = result[key];
      if (isPlainObject(value) && isPlainObject(existing)) {
        result[key] = deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
  }
  return result;
}
