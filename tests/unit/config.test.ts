import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { loadConfig } from '../../src/config/config.js';

describe('Configuration', () => {
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = { ...process.env };
    delete process.env.LOG_LEVEL;
    delete process.env.LOG_PRETTY;
    delete process.env.MAX_CONCURRENCY;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should set default values for optional configuration', () => {
    const config = loadConfig();

    expect(config.processing.maxConcurrency).toBe(1);
    expect(config.logging.level).toBe('info');
  });

  it('should load configuration from environment variables', () => {
    process.env.LOG_LEVEL = 'debug';
    process.env.LOG_PRETTY = 'false';
    process.env.MAX_CONCURRENCY = '4';

    const config = loadConfig();

    expect(config.logging).toEqual({ level: 'debug', pretty: false });
    expect(config.processing.maxConcurrency).toBe(4);
  });

  it('should default pretty logging off in production', () => {
    process.env.NODE_ENV = 'production';

    expect(loadConfig().logging.pretty).toBe(false);
  });

  it('should reject an unknown log level', () => {
    process.env.LOG_LEVEL = 'verbose';

    expect(() => loadConfig()).toThrow('Invalid LOG_LEVEL: verbose. Must be one of: debug, info, warn, error');
  });

  it('should reject a non-numeric concurrency', () => {
    process.env.MAX_CONCURRENCY = 'many';

    expect(() => loadConfig()).toThrow('Environment variable MAX_CONCURRENCY must be a number, got: many');
  });

  it('should reject a concurrency below one', () => {
    process.env.MAX_CONCURRENCY = '0';

    expect(() => loadConfig()).toThrow('MAX_CONCURRENCY must be at least 1, got: 0');
  });
});
