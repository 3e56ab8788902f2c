/**
 * Tool-wide settings: built-in defaults, then an optional JSON file, then
 * `DEVDECK_*` environment overrides.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';

import {
  DEFAULT_LOG_RETENTION,
  DEFAULT_MIN_VISIBLE_MS,
  DEFAULT_RECENT_LOG_LIMIT,
  DEFAULT_TICK_MS,
} from '../constants.js';
import { ConfigError } from '../contracts/errors.js';
import { errorCode, errorMessage } from '../utils/errno.js';
import { formatSchemaIssues } from './schemaIssues.js';

export const ToolConfigSchema = z
  .object({
    tickMs: z.number().int().min(1).max(1000).default(DEFAULT_TICK_MS),
    minVisibleMs: z.number().int().min(0).default(DEFAULT_MIN_VISIBLE_MS),
    logRetention: z.number().int().min(1).default(DEFAULT_LOG_RETENTION),
    recentLogLimit: z.number().int().min(1).default(DEFAULT_RECENT_LOG_LIMIT),
    trustedConfigSource: z.boolean().default(true),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .strict();

export type ToolConfig = z.infer<typeof ToolConfigSchema>;

export interface LoadToolConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Explicit file; null skips the file layer. */
  configPath?: string | null;
}

type EnvOverride = {
  variable: string;
  key: keyof ToolConfig;
  parse: (raw: string) => number | boolean | string | null;
};

const parseInteger = (raw: string): number | null => {
  const trimmed = raw.trim();
  return /^-?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
};

const parseBoolean = (raw: string): boolean | null => {
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return null;
};

const ENV_OVERRIDES: readonly EnvOverride[] = [
  { variable: 'DEVDECK_TICK_MS', key: 'tickMs', parse: parseInteger },
  { variable: 'DEVDECK_MIN_VISIBLE_MS', key: 'minVisibleMs', parse: parseInteger },
  { variable: 'DEVDECK_LOG_RETENTION', key: 'logRetention', parse: parseInteger },
  { variable: 'DEVDECK_TRUSTED_CONFIG', key: 'trustedConfigSource', parse: parseBoolean },
  { variable: 'DEVDECK_LOG_LEVEL', key: 'logLevel', parse: (raw) => raw.trim().toLowerCase() || null },
];

export function resolveToolConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env.DEVDECK_CONFIG?.trim();
  if (explicit) {
    return path.resolve(explicit);
  }

  const xdgConfigHome = env.XDG_CONFIG_HOME?.trim();
  if (xdgConfigHome) {
    return path.join(xdgConfigHome, 'devdeck', 'config.json');
  }

  const homeDir = env.HOME || os.homedir();
  return path.join(homeDir, '.config', 'devdeck', 'config.json');
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return {};
    }
    throw new ConfigError(filePath, errorMessage(error));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(filePath, `invalid JSON (${errorMessage(error)})`);
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(filePath, 'expected a JSON object');
  }
  return { ...parsed };
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const { variable, key, parse } of ENV_OVERRIDES) {
    const raw = env[variable];
    if (raw === undefined || raw.trim() === '') {
      continue;
    }
    const value = parse(raw);
    if (value === null) {
      throw new ConfigError(variable, `cannot parse value "${raw}"`);
    }
    overrides[key] = value;
  }
  return overrides;
}

export function loadToolConfig({ env = process.env, configPath }: LoadToolConfigOptions = {}): ToolConfig {
  const filePath = configPath === undefined ? resolveToolConfigPath(env) : configPath;
  const fromFile = filePath === null ? {} : readConfigFile(filePath);
  const merged = { ...fromFile, ...readEnvOverrides(env) };

  const result = ToolConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(filePath ?? 'environment', formatSchemaIssues(result.error));
  }
  return result.data;
}

export default { loadToolConfig, resolveToolConfigPath, ToolConfigSchema };
