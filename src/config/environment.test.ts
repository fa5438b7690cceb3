import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { getEnvironment } from './environment.js';
import { getConfig, resetConfig } from './index.js';

const KEYS = ['MERKLE_HASH_ALGORITHM', 'LOG_LEVEL', 'LOG_FILE'] as const;

describe('environment', () => {
  const saved = new Map<string, string | undefined>(KEYS.map(key => [key, process.env[key]]));

  beforeEach(() => {
    for (const key of KEYS) delete process.env[key];
    resetConfig();
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    resetConfig();
  });

  it('applies defaults', () => {
    const env = getEnvironment();
    expect(env.NODE_ENV).toBe('test');
    expect(env.MERKLE_HASH_ALGORITHM).toBe('sha256');
    expect(env.LOG_LEVEL).toBe('info');
    expect(env.LOG_FILE).toBeUndefined();
  });

  it('lists every invalid variable', () => {
    process.env.LOG_LEVEL = 'verbose';
    process.env.MERKLE_HASH_ALGORITHM = 'sha 256';
    expect(() => getEnvironment()).toThrow(/^Environment validation failed:\n/);
    expect(() => getEnvironment()).toThrow('MERKLE_HASH_ALGORITHM: Invalid hash algorithm name');
  });

  it('maps the environment into the app config', () => {
    process.env.MERKLE_HASH_ALGORITHM = 'sha512';
    process.env.LOG_LEVEL = 'debug';
    process.env.LOG_FILE = '/tmp/merkle.log';

    expect(getConfig()).toEqual({
      hashing: { algorithm: 'sha512' },
      logging: { level: 'debug', file: '/tmp/merkle.log', console: false },
      serialization: { proofVersion: 1, treeVersion: 1 }
    });
  });

  it('caches until reset', () => {
    expect(getConfig().hashing.algorithm).toBe('sha256');
    process.env.MERKLE_HASH_ALGORITHM = 'sha384';
    expect(getConfig().hashing.algorithm).toBe('sha256');
    resetConfig();
    expect(getConfig().hashing.algorithm).toBe('sha384');
  });
});
