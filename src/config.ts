import { promises as fs } from 'fs';
import path from 'path';
import { homedir } from 'os';
import { ConfigError, errorMessage } from './errors.js';
import { isPackageManager, PACKAGE_MANAGERS } from './packageManager.js';
import type { PackageManager, RunOptions, UpsweepConfig } from './types.js';

const CONFIG_FILENAME = '.upsweep.json';

// Keeps timeout * 1000 within what setTimeout accepts
export const MAX_TIMEOUT_SECONDS = 2_147_483;

export const DEFAULTS = {
  concurrency: 4,
  timeoutSeconds: 300,
  python: 'python3'
} as const;

export function getConfigPath(home: string = homedir()): string {
  return path.join(home, CONFIG_FILENAME);
}

/**
 * Read the user configuration. A missing file is not an error and yields `null`.
 */
export async function loadConfig(configPath: string = getConfigPath()): Promise<UpsweepConfig | null> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError([`${configPath} is not valid JSON (${errorMessage(error)})`]);
  }

  const problems = validateConfig(raw);
  if (problems.length > 0) {
    throw new ConfigError(problems.map(p => `${configPath}: ${p}`));
  }

  return toConfig(raw);
}

export function validateConfig(raw: unknown): string[] {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return ['configuration must be a JSON object'];
  }

  const errors: string[] = [];
  const config: Record<string, unknown> = { ...raw };

  if (config.packageManager !== undefined && !isPackageManager(config.packageManager)) {
    errors.push(`packageManager must be one of ${PACKAGE_MANAGERS.join(', ')}`);
  }
  if (config.concurrency !== undefined && !isInteger(config.concurrency, 0)) {
    errors.push('concurrency must be an integer >= 0');
  }
  if (config.timeout !== undefined && !isInteger(config.timeout, 1, MAX_TIMEOUT_SECONDS)) {
    errors.push(`timeout must be a whole number of seconds between 1 and ${MAX_TIMEOUT_SECONDS}`);
  }
  if (config.python !== undefined && (typeof config.python !== 'string' || !config.python.trim())) {
    errors.push('python must be a non-empty string');
  }
  for (const key of ['global', 'async'] as const) {
    if (config[key] !== undefined && typeof config[key] !== 'boolean') {
      errors.push(`${key} must be true or false`);
    }
  }
  if (
    config.exclude !== undefined &&
    (!Array.isArray(config.exclude) || !config.exclude.every(name => typeof name === 'string'))
  ) {
    errors.push('exclude must be an array of package names');
  }

  return errors;
}

function isInteger(value: unknown, min: number, max = Number.MAX_SAFE_INTEGER): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max;
}

function toConfig(raw: unknown): UpsweepConfig {
  const config: UpsweepConfig = {};
  if (typeof raw !== 'object' || raw === null) return config;
  const source: Record<string, unknown> = { ...raw };

  if (isPackageManager(source.packageManager)) config.packageManager = source.packageManager;
  if (typeof source.concurrency === 'number') config.concurrency = source.concurrency;
  if (typeof source.timeout === 'number') config.timeout = source.timeout;
  if (typeof source.python === 'string') config.python = source.python;
  if (typeof source.global === 'boolean') config.global = source.global;
  if (typeof source.async === 'boolean') config.async = source.async;
  if (Array.isArray(source.exclude)) {
    config.exclude = source.exclude.filter((name): name is string => typeof name === 'string');
  }
  return config;
}

export interface CliFlags {
  async?: boolean;
  concurrency?: string;
  timeout?: string;
  manager?: string;
  global?: boolean;
  python?: string;
  exclude?: string;
  list?: boolean;
  yes?: boolean;
}

/**
 * Merge command-line flags over the config file over defaults.
 */
export function resolveOptions(flags: CliFlags, config: UpsweepConfig | null): RunOptions {
  const errors: string[] = [];

  let packageManager: PackageManager | undefined = config?.packageManager;
  if (flags.manager !== undefined) {
    if (isPackageManager(flags.manager)) {
      packageManager = flags.manager;
    } else {
      errors.push(`Invalid package manager: ${flags.manager} (valid: ${PACKAGE_MANAGERS.join(', ')})`);
    }
  }

  const concurrency = parseIntegerFlag('--concurrency', flags.concurrency, 0, errors) ?? config?.concurrency ?? DEFAULTS.concurrency;
  const timeoutSeconds = parseIntegerFlag('--timeout', flags.timeout, 1, errors, MAX_TIMEOUT_SECONDS) ?? config?.timeout ?? DEFAULTS.timeoutSeconds;

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }

  const excludeFromFlag = flags.exclude
    ? flags.exclude.split(',').map(name => name.trim()).filter(Boolean)
    : [];

  return {
    packageManager,
    mode: flags.async || config?.async ? 'concurrent' : 'sequential',
    concurrency,
    timeoutMs: timeoutSeconds * 1000,
    python: flags.python || config?.python || DEFAULTS.python,
    global: flags.global ?? config?.global ?? false,
    exclude: [...new Set([...(config?.exclude ?? []), ...excludeFromFlag])],
    listOnly: flags.list === true,
    yes: flags.yes === true
  };
}

function parseIntegerFlag(
  flag: string,
  value: string | undefined,
  min: number,
  errors: string[],
  max?: number
): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    errors.push(`${flag} must be an integer >= ${min} (got "${value}")`);
    return undefined;
  }
  if (max !== undefined && parsed > max) {
    errors.push(`${flag} must be at most ${max} (got "${value}")`);
    return undefined;
  }
  return parsed;
}
