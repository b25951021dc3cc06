/**
 * Config Loader
 *
 * Loads config/engram.json with {env:VAR} resolution.
 * Supports ENGRAM_CONFIG env var to override config path.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { type Config, configSchema } from './schema';

const DEFAULT_CONFIG_PATH = 'config/engram.json';

/**
 * Resolve {env:VAR} patterns in text.
 * Returns empty string if env var is not set.
 */
export function resolveEnvVars(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(/\{env:([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => {
    return env[varName] ?? '';
  });
}

/**
 * Freeze a parsed config all the way down.
 * Configuration is process-wide and never mutated after start.
 */
function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export type ConfigIssue = { path: string; message: string };

/**
 * Thrown by `parseConfig` with every schema issue attached.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: ConfigIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse config text (after env resolution) into a frozen Config.
 */
export function parseConfig(text: string, env: NodeJS.ProcessEnv = process.env): Readonly<Config> {
  let data: unknown;
  try {
    data = JSON.parse(resolveEnvVars(text, env));
  } catch {
    throw new ConfigError('Invalid JSON in config file');
  }

  const result = configSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(
      'Invalid config',
      result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }

  return deepFreeze(result.data);
}

/**
 * Load and validate config from file. Exits the process on failure.
 */
export function loadConfig(configPath: string): Readonly<Config> {
  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      console.error(`Config file not found: ${configPath}`);
      console.error('Create config/engram.json or point ENGRAM_CONFIG at a config file.');
      process.exit(1);
    }
    throw err;
  }

  try {
    return parseConfig(text);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(`${err.message}: ${configPath}`);
    for (const issue of err.issues) {
      console.error(`  ${issue.path}: ${issue.message}`);
    }
    process.exit(1);
  }
}

// Lazy load and cache
let cachedConfig: Readonly<Config> | null = null;

export function getConfig(): Readonly<Config> {
  if (!cachedConfig) {
    const configPath = process.env['ENGRAM_CONFIG'] ?? resolve(process.cwd(), DEFAULT_CONFIG_PATH);
    cachedConfig = loadConfig(configPath);
  }
  return cachedConfig;
}
