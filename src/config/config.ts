import type { AppConfig, LoggingConfig } from '../types/index.js';

const VALID_LOG_LEVELS: readonly LoggingConfig['level'][] = ['debug', 'info', 'warn', 'error'];

function getEnv(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const num = parseInt(value, 10);
  if (isNaN(num)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return num;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function parseLogLevel(value: string): LoggingConfig['level'] {
  const level = VALID_LOG_LEVELS.find(candidate => candidate === value);
  if (!level) {
    throw new Error(`Invalid LOG_LEVEL: ${value}. Must be one of: ${VALID_LOG_LEVELS.join(', ')}`);
  }
  return level;
}

export function loadConfig(): AppConfig {
  const processing = {
    maxConcurrency: getEnvNumber('MAX_CONCURRENCY', 1),
  };

  if (processing.maxConcurrency < 1) {
    throw new Error(`MAX_CONCURRENCY must be at least 1, got: ${processing.maxConcurrency}`);
  }

  const logging = {
    level: parseLogLevel(getEnv('LOG_LEVEL', 'info')),
    pretty: getEnvBoolean('LOG_PRETTY', process.env.NODE_ENV !== 'production'),
  };

  return {
    processing,
    logging,
  };
}

let config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

// For testing: reset config
export function resetConfig(): void {
  config = null;
}
