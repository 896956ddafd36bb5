import dotenv from 'dotenv';
import { ConfigError } from '../errors';

dotenv.config();

export const ENV = {
  SL_BASE_URL: process.env.SL_BASE_URL || 'https://www.slgr.gr/en/',
  DATA_DIR: process.env.DATA_DIR || 'SuperLeague_Data',

  REQUEST_TIMEOUT_MS: parseInt(process.env.REQUEST_TIMEOUT_MS || '30000', 10),
  PAGE_DELAY_MS: parseInt(process.env.PAGE_DELAY_MS || '1000', 10),

  MAX_RETRIES: parseInt(process.env.MAX_RETRIES || '0', 10),
  RETRY_DELAY_MS: parseInt(process.env.RETRY_DELAY_MS || '5000', 10),

  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  const known: readonly string[] = LOG_LEVELS;
  return known.includes(value);
}

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export function validateEnv(env: typeof ENV = ENV): void {
  if (!isHttpUrl(env.SL_BASE_URL)) {
    throw new ConfigError(`SL_BASE_URL must be an absolute http(s) URL, got "${env.SL_BASE_URL}"`);
  }
  if (!env.DATA_DIR.trim()) {
    throw new ConfigError('DATA_DIR must not be empty');
  }

  const counts: Array<[string, number]> = [
    ['REQUEST_TIMEOUT_MS', env.REQUEST_TIMEOUT_MS],
    ['PAGE_DELAY_MS', env.PAGE_DELAY_MS],
    ['MAX_RETRIES', env.MAX_RETRIES],
    ['RETRY_DELAY_MS', env.RETRY_DELAY_MS],
  ];
  for (const [name, value] of counts) {
    if (!Number.isInteger(value) || value < 0) {
      throw new ConfigError(`${name} must be a non-negative integer`);
    }
  }
  if (!isLogLevel(env.LOG_LEVEL)) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${env.LOG_LEVEL}"`);
  }
  if (env.REQUEST_TIMEOUT_MS === 0) {
    throw new ConfigError('REQUEST_TIMEOUT_MS must be greater than 0');
  }
}
