import { describe, it, expect, afterEach } from 'vitest';
import {
  DEFAULT_CONFIG,
  parseConfig,
  resolveClientOptions,
  resolveConfigPath,
} from './config.js';

// ---------------------------------------------------------------------------
// resolveConfigPath()
// ---------------------------------------------------------------------------

describe('resolveConfigPath', () => {
  const originalEnv = process.env['SURFACE_SDK_CONFIG'];

  afterEach(() => {
    if (originalEnv !== undefined) {
      process.env['SURFACE_SDK_CONFIG'] = originalEnv;
    } else {
      delete process.env['SURFACE_SDK_CONFIG'];
    }
  });

  it('uses $SURFACE_SDK_CONFIG relative to the working directory', () => {
    process.env['SURFACE_SDK_CONFIG'] = 'conf/sdk.toml';
    expect(resolveConfigPath('/work')).toBe('/work/conf/sdk.toml');
  });

  it('keeps an absolute $SURFACE_SDK_CONFIG', () => {
    process.env['SURFACE_SDK_CONFIG'] = '/etc/sdk.toml';
    expect(resolveConfigPath('/work')).toBe('/etc/sdk.toml');
  });

  it('falls back to surface-sdk.toml when unset', () => {
    delete process.env['SURFACE_SDK_CONFIG'];
    expect(resolveConfigPath('/work')).toBe('/work/surface-sdk.toml');
  });

  it('falls back to surface-sdk.toml when empty', () => {
    process.env['SURFACE_SDK_CONFIG'] = '';
    expect(resolveConfigPath('/work')).toBe('/work/surface-sdk.toml');
  });
});

// ---------------------------------------------------------------------------
// DEFAULT_CONFIG
// ---------------------------------------------------------------------------

describe('DEFAULT_CONFIG', () => {
  it('targets the local controller port', () => {
    expect(DEFAULT_CONFIG.client.host).toBe('127.0.0.1');
    expect(DEFAULT_CONFIG.client.port).toBe(12136);
  });

  it('leaves the plugin id to the caller', () => {
    expect(DEFAULT_CONFIG.client.pluginId).toBeUndefined();
  });

  it('logs at info', () => {
    expect(DEFAULT_CONFIG.logging).toEqual({ level: 'info' });
  });
});

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

describe('parseConfig', () => {
  it('returns defaults for empty input', () => {
    expect(parseConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('maps snake_case keys of the client section', () => {
    const config = parseConfig({
      client: {
        plugin_id: 'demo',
        port: 4000,
        poll_interval_ms: 25,
        auto_close: false,
        check_plugin_id: false,
        update_states_on_broadcast: false,
        max_workers: 2,
        max_send_buffer_bytes: 4096,
        allow_implicit_states: false,
      },
    });

    expect(config.client).toEqual({
      pluginId: 'demo',
      host: '127.0.0.1',
      port: 4000,
      pollIntervalMs: 25,
      autoClose: false,
      checkPluginId: false,
      updateStatesOnBroadcast: false,
      maxWorkers: 2,
      maxSendBufferBytes: 4096,
      allowImplicitStates: false,
    });
  });

  it('parses the logging section', () => {
    expect(parseConfig({ logging: { level: 'debug', file: 'logs/sdk.jsonl' } }).logging).toEqual({
      level: 'debug',
      file: 'logs/sdk.jsonl',
    });
  });

  it('ignores unknown sections', () => {
    expect(parseConfig({ extra: { anything: true } })).toEqual(DEFAULT_CONFIG);
  });

  it('rejects a section that is not a table', () => {
    expect(() => parseConfig({ client: 5 })).toThrow('[client] must be a table');
  });

  it('rejects a wrongly typed value', () => {
    expect(() => parseConfig({ client: { port: '4000' } })).toThrow('client.port must be a number');
  });

  it('rejects an out-of-range port', () => {
    expect(() => parseConfig({ client: { port: 70000 } })).toThrow(
      'client: port must be an integer between 1 and 65535',
    );
  });

  it('rejects an empty plugin id', () => {
    expect(() => parseConfig({ client: { plugin_id: ' ' } })).toThrow(
      'client: pluginId must be a non-empty string',
    );
  });

  it('rejects an invalid logging level', () => {
    expect(() => parseConfig({ logging: { level: 'verbose' } })).toThrow(
      'Invalid logging.level: "verbose". Must be one of: debug, info, warn, error',
    );
  });
});

// ---------------------------------------------------------------------------
// resolveClientOptions()
// ---------------------------------------------------------------------------

describe('resolveClientOptions', () => {
  it('fills every default', () => {
    expect(resolveClientOptions({ pluginId: 'demo' })).toEqual({
      ...DEFAULT_CONFIG.client,
      pluginId: 'demo',
    });
  });

  it('does not let undefined mask a default', () => {
    expect(resolveClientOptions({ pluginId: 'demo', port: undefined }).port).toBe(12136);
  });

  it('rejects a zero worker count', () => {
    expect(() => resolveClientOptions({ pluginId: 'demo', maxWorkers: 0 })).toThrow(
      'maxWorkers must be a positive integer',
    );
  });
});
