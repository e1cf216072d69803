import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { FleetmonConfig } from '@fleetmon/shared';
import {
  ConfigValidationError,
  FLEETMON_CONFIG_FILES,
  fleetmonConfigSchema,
} from '@fleetmon/shared';

export interface LoadConfigOptions {
  path?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

type ConfigObject = Record<string, unknown>;

function isObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(config: ConfigObject, name: string): ConfigObject {
  const existing = config[name];
  const copy: ConfigObject = isObject(existing) ? { ...existing } : {};
  config[name] = copy;
  return copy;
}

export function findConfigFile(cwd: string = process.cwd()): string | null {
  for (const file of FLEETMON_CONFIG_FILES) {
    const candidate = join(cwd, file);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

function readConfigFile(path: string): ConfigObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigValidationError([`${path}: ${reason}`]);
  }
  if (!isObject(parsed)) {
    throw new ConfigValidationError([`${path}: expected a JSON object`]);
  }
  return parsed;
}

/**
 * Environment variables win over the config file. Numeric variables that do
 * not parse are passed through as strings so validation reports them.
 */
export function applyEnvOverrides(raw: ConfigObject, env: NodeJS.ProcessEnv): ConfigObject {
  const config: ConfigObject = { ...raw };

  if (env.FLEETMON_API_HOST) {
    section(config, 'api').host = env.FLEETMON_API_HOST;
  }
  if (env.FLEETMON_API_PORT) {
    const port = Number(env.FLEETMON_API_PORT);
    section(config, 'api').port = Number.isNaN(port) ? env.FLEETMON_API_PORT : port;
  }
  if (env.FLEETMON_STREAM_CAPACITY) {
    const capacity = Number(env.FLEETMON_STREAM_CAPACITY);
    section(config, 'streams').capacity = Number.isNaN(capacity)
      ? env.FLEETMON_STREAM_CAPACITY
      : capacity;
  }
  if (env.FLEETMON_PERSISTENCE) {
    const persistence = section(config, 'persistence');
    if (env.FLEETMON_PERSISTENCE === 'off') {
      persistence.enabled = false;
    } else {
      persistence.backend = env.FLEETMON_PERSISTENCE;
    }
  }
  if (env.FLEETMON_DB_PATH) {
    section(config, 'persistence').path = env.FLEETMON_DB_PATH;
  }
  if (env.FLEETMON_LOG_LEVEL) {
    section(config, 'log').level = env.FLEETMON_LOG_LEVEL;
  }

  return config;
}

export function loadConfig(options: LoadConfigOptions = {}): FleetmonConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let raw: ConfigObject = {};
  if (options.path) {
    const path = resolve(cwd, options.path);
    if (!existsSync(path)) {
      throw new ConfigValidationError([`Config file not found: ${path}`]);
    }
    raw = readConfigFile(path);
  } else {
    const found = findConfigFile(cwd);
    if (found) raw = readConfigFile(found);
  }

  const result = fleetmonConfigSchema.safeParse(applyEnvOverrides(raw, env));
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
}
