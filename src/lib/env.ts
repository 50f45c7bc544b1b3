/**
 * Environment variable handling for Stackreach
 * All paths come from env vars, with defaults under the user's home directory
 */

import * as path from 'path';
import * as fs from 'fs';

export interface EnvConfig {
  DATA_DIR: string;
  CONFIG_DIR: string;
  LOG_DIR: string;
  DB_PATH: string;
  NODE_ENV: string;
}

// sql.js database that never touches disk
export const MEMORY_DB = ':memory:';

function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

export function getEnvConfig(): EnvConfig {
  const defaultBase = process.env.HOME || process.env.USERPROFILE || '/var/lib/stackreach';
  const root = path.join(defaultBase, '.stackreach');

  const config: EnvConfig = {
    DATA_DIR: process.env.DATA_DIR || path.join(root, 'data'),
    CONFIG_DIR: process.env.CONFIG_DIR || path.join(root, 'config'),
    LOG_DIR: process.env.LOG_DIR || path.join(root, 'logs'),
    DB_PATH: process.env.DB_PATH || path.join(root, 'state.db'),
    NODE_ENV: process.env.NODE_ENV || 'development',
  };

  ensureDir(config.DATA_DIR);
  ensureDir(config.CONFIG_DIR);
  ensureDir(config.LOG_DIR);
  if (config.DB_PATH !== MEMORY_DB) {
    ensureDir(path.dirname(config.DB_PATH));
  }

  return config;
}

export const env = getEnvConfig();
