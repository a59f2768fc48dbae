import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import Joi from 'joi';
import type { LogLevel } from './core/logger.js';

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  dbPath: string;
  maxWorkers: number;
  apiKey: string | null;
  dataRoot: string | null;
  logLevel: LogLevel;
}

interface RawEnv {
  NODE_ENV: AppConfig['nodeEnv'];
  PORT: number;
  DB_PATH: string;
  MAX_WORKERS: number;
  API_KEY?: string;
  DATA_ROOT: string;
  LOG_LEVEL: LogLevel;
}

export const envSchema = Joi.object<RawEnv>({
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
  PORT: Joi.number().integer().min(0).max(65535).default(3000),
  DB_PATH: Joi.string().default('harvestq.db'),
  MAX_WORKERS: Joi.number().integer().min(1).max(64).default(2),
  API_KEY: Joi.string().allow(''),
  // empty string turns per-job output directories off
  DATA_ROOT: Joi.string().allow('').default('data'),
  LOG_LEVEL: Joi.string().valid('debug', 'info', 'warn', 'error').default('info'),
}).unknown(true);

/**
 * Loads `ENV_FILE`, or `.env.<NODE_ENV>`, falling back to `.env`. Variables
 * already set in the process win over the file.
 */
export function loadEnv(cwd = process.cwd()): string | null {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const candidates = process.env.ENV_FILE ? [process.env.ENV_FILE, '.env'] : [`.env.${nodeEnv}`, '.env'];
  for (const file of candidates) {
    const envPath = path.resolve(cwd, file);
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath });
      return file;
    }
  }
  return null;
}

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const { value, error } = envSchema.validate(env, { abortEarly: false });
  if (error) throw new Error(`Invalid environment: ${error.message}`);
  return {
    nodeEnv: value.NODE_ENV,
    port: value.PORT,
    dbPath: value.DB_PATH,
    maxWorkers: value.MAX_WORKERS,
    apiKey: value.API_KEY ? value.API_KEY : null,
    dataRoot: value.DATA_ROOT ? value.DATA_ROOT : null,
    logLevel: value.LOG_LEVEL,
  };
}

export function loadConfig(): AppConfig {
  loadEnv();
  return parseConfig(process.env);
}
