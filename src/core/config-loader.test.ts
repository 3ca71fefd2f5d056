import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { applyLoggingConfig, loadConfig } from './config-loader.js';
import { createLogger, resetLogging } from './logger.js';
import { DEFAULT_CONFIG } from '../types/config.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

function createTempRoot(): string {
  const root = join(
    tmpdir(),
    `surface-sdk-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`,
  );
  mkdirSync(root, { recursive: true });
  return root;
}

let testRoot: string;

beforeEach(() => {
  testRoot = createTempRoot();
});

afterEach(() => {
  resetLogging();
  rmSync(testRoot, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

describe('loadConfig', () => {
  it('returns the defaults when the file does not exist', () => {
    expect(loadConfig(join(testRoot, 'missing.toml'))).toEqual(DEFAULT_CONFIG);
  });

  it('returns the defaults for an empty file', () => {
    const path = join(testRoot, 'surface-sdk.toml');
    writeFileSync(path, '\n  \n');
    expect(loadConfig(path)).toEqual(DEFAULT_CONFIG);
  });

  it('parses client and logging sections', () => {
    const path = join(testRoot, 'surface-sdk.toml');
    writeFileSync(
      path,
      [
        '# local controller',
        '[client]',
        'plugin_id = "demo"',
        'port = 4000',
        'auto_close = false',
        '',
        '[logging]',
        'level = "warn"',
      ].join('\n'),
    );

    const config = loadConfig(path);
    expect(config.client.pluginId).toBe('demo');
    expect(config.client.port).toBe(4000);
    expect(config.client.autoClose).toBe(false);
    expect(config.client.maxWorkers).toBe(8);
    expect(config.logging).toEqual({ level: 'warn' });
  });

  it('names the file when the TOML is invalid', () => {
    const path = join(testRoot, 'broken.toml');
    writeFileSync(path, '[client\nport = ');
    expect(() => loadConfig(path)).toThrow(`Invalid TOML in ${path}:`);
  });

  it('rejects invalid values', () => {
    const path = join(testRoot, 'surface-sdk.toml');
    writeFileSync(path, '[client]\nmax_workers = 0\n');
    expect(() => loadConfig(path)).toThrow('client: maxWorkers must be a positive integer');
  });

  it('returns copies that do not alias the defaults', () => {
    const config = loadConfig(join(testRoot, 'missing.toml'));
    config.client.port = 1;
    expect(DEFAULT_CONFIG.client.port).toBe(12136);
  });
});

// ---------------------------------------------------------------------------
// applyLoggingConfig()
// ---------------------------------------------------------------------------

describe('applyLoggingConfig', () => {
  it('writes JSONL to the configured file at the configured level', () => {
    const file = join(testRoot, 'logs', 'sdk.jsonl');
    const sink = applyLoggingConfig({ level: 'warn', file });

    const logger = createLogger('test');
    logger.info('dropped');
    logger.warn('kept');
    sink?.close();
    logger.warn('after close');

    const lines = readFileSync(file, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      level: 'warn',
      component: 'test',
      msg: 'kept',
    });
  });

  it('opens no sink without a file', () => {
    expect(applyLoggingConfig({ level: 'error' })).toBeUndefined();
  });
});
