/**
 * Configuration loader
 * Loads configuration from YAML/JSON, merges it over defaults and validates the result
 */

import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'yaml';
import { env } from '../lib/env';
import { logger } from '../lib/logger';
import { ConfigError } from '../lib/errors';
import { DEFAULT_CATALOG_PATH } from '../engine/catalog';
import { DEFAULT_OUTREACH_PATH } from '../engine/roster';
import { StackreachConfig } from './types';
import { ConfigSchema } from './schema';

// Default configuration
export const DEFAULT_CONFIG: StackreachConfig = {
  version: '1.0.0',
  catalog: {
    signaturesPath: DEFAULT_CATALOG_PATH,
    outreachPath: DEFAULT_OUTREACH_PATH,
  },
  scoring: {
    combine: 'product',
    defaultSpecialization: 1,
    specialization: {},
    technologyOverrides: {},
  },
  outreach: {
    maxSupportingTechs: 2,
  },
  rotation: {
    windowHours: 0,
  },
  dedup: {
    rescanAfterHours: 24 * 30,
  },
  fetch: {
    timeout: 15000,
    retries: 1,
    retryDelay: 2000,
    requestsPerMinute: 60,
    emailPatterns: [
      '[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\\.[a-zA-Z]{2,}',
    ],
  },
  outbox: {
    format: 'both',
    directory: path.join(env.DATA_DIR, 'outbox'),
    filenamePattern: 'outbox_{date}_{count}',
  },
  pipeline: {
    batchSize: 100,
    maxDomainsPerRun: 500,
    parallelism: 5,
  },
};

let loadedConfig: StackreachConfig | null = null;

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Objects merge key by key; arrays and scalars from the override replace the base
export function deepMerge(base: unknown, override: unknown): unknown {
  if (override === undefined) return base;
  if (!isPlainObject(base) || !isPlainObject(override)) return override;

  const result: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value !== undefined) {
      result[key] = deepMerge(base[key], value);
    }
  }
  return result;
}

export function resolveConfig(userConfig: unknown): StackreachConfig {
  const parsed = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, userConfig ?? {}));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`${issue.path.join('.')}: ${issue.message}`);
  }
  return parsed.data;
}

export function loadConfig(configPath?: string): StackreachConfig {
  if (loadedConfig && !configPath) {
    return loadedConfig;
  }

  const configFile = configPath || path.join(env.CONFIG_DIR, 'config.yaml');
  const jsonConfigFile = configPath || path.join(env.CONFIG_DIR, 'config.json');

  let userConfig: unknown = {};

  // Try YAML first, then JSON
  if (fs.existsSync(configFile)) {
    logger.info(`Loading config from ${configFile}`);
    const content = fs.readFileSync(configFile, 'utf-8');
    userConfig = configFile.endsWith('.json') ? JSON.parse(content) : YAML.parse(content);
  } else if (fs.existsSync(jsonConfigFile)) {
    logger.info(`Loading config from ${jsonConfigFile}`);
    const content = fs.readFileSync(jsonConfigFile, 'utf-8');
    userConfig = JSON.parse(content);
  } else {
    logger.warn(`No config file found, using defaults. Expected at: ${configFile}`);
    writeDefaultConfig(configFile);
  }

  loadedConfig = resolveConfig(userConfig);
  return loadedConfig;
}

export function writeDefaultConfig(configPath: string): void {
  const dir = path.dirname(configPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const content = YAML.stringify(DEFAULT_CONFIG, { indent: 2 });
  fs.writeFileSync(configPath, content);
  logger.info(`Wrote default config to ${configPath}`);
}

export function reloadConfig(): StackreachConfig {
  loadedConfig = null;
  return loadConfig();
}

export function getConfig(): StackreachConfig {
  return loadConfig();
}
