import dotenv from 'dotenv';
import { ChainError } from '../core/errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface ChainConfig {
  difficulty: number;
  miningCheckInterval: number;
  logLevel: LogLevel;
  dbPath: string;
}

export const DEFAULT_CONFIG: ChainConfig = {
  difficulty: 2,
  miningCheckInterval: 10000,
  logLevel: 'info',
  dbPath: './chain.db'
};

function parseInteger(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ChainError(`${name} must be an integer >= ${min}, got "${raw}"`, 'INVALID_CONFIG');
  }
  return value;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  if (raw === undefined || raw === '') {
    return DEFAULT_CONFIG.logLevel;
  }
  const level = raw.toLowerCase();
  if (!isLogLevel(level)) {
    throw new ChainError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`, 'INVALID_CONFIG');
  }
  return level;
}

/**
 * Read chain settings. Without an explicit environment, `.env` is loaded
 * into process.env first.
 */
export function loadConfig(source?: NodeJS.ProcessEnv): ChainConfig {
  if (source === undefined) {
    dotenv.config();
  }
  const env = source ?? process.env;
  return {
    difficulty: parseInteger(env, 'CHAIN_DIFFICULTY', DEFAULT_CONFIG.difficulty, 0),
    miningCheckInterval: parseInteger(env, 'MINING_CHECK_INTERVAL', DEFAULT_CONFIG.miningCheckInterval, 1),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    dbPath: env.CHAIN_DB_PATH || DEFAULT_CONFIG.dbPath
  };
}
