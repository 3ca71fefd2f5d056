/**
 * SDK configuration schema and config-file resolution.
 *
 * Defines the TypeScript types for the `surface-sdk.toml` sections, their
 * defaults, and the validation applied both to parsed TOML and to options
 * passed to a PluginClient in code.
 */

import { resolve } from 'node:path';
import { LOG_LEVELS, isLogLevel, type LogLevel } from '../core/logger.js';
import {
  DEFAULT_HOST,
  DEFAULT_MAX_SEND_BUFFER_BYTES,
  DEFAULT_PORT,
} from './protocol.js';
import { isRecord } from './json.js';

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

/** Runtime options of a PluginClient. */
export interface ClientOptions {
  /** Plugin id declared in the descriptor. Sent when pairing. */
  pluginId: string;
  host: string;
  port: number;
  /** Upper bound on how long the read loop waits between polls. */
  pollIntervalMs: number;
  /** Disconnect when the controller sends `closePlugin`. */
  autoClose: boolean;
  /** Reject inbound messages addressed to another plugin id. */
  checkPluginId: boolean;
  /** Resend every known state value when the controller broadcasts a page change. */
  updateStatesOnBroadcast: boolean;
  /** Handler invocations allowed to run at once. */
  maxWorkers: number;
  /** Outbound bytes that may be queued before `send()` refuses. */
  maxSendBufferBytes: number;
  /** Allow `stateUpdate` for ids neither declared nor created. */
  allowImplicitStates: boolean;
}

/** Options accepted in code: everything but `pluginId` has a default. */
export type ClientOptionsInput = Pick<ClientOptions, 'pluginId'> &
  Partial<Omit<ClientOptions, 'pluginId'>>;

/** `[client]` section. `plugin_id` may be left to code. */
export type ClientConfig = Omit<ClientOptions, 'pluginId'> & { pluginId?: string };

/** `[logging]` section. */
export interface LoggingConfig {
  level: LogLevel;
  /** Append JSONL log entries to this file instead of stdout. */
  file?: string;
}

export interface SdkConfig {
  client: ClientConfig;
  logging: LoggingConfig;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CLIENT_OPTIONS: Readonly<Omit<ClientOptions, 'pluginId'>> = {
  host: DEFAULT_HOST,
  port: DEFAULT_PORT,
  pollIntervalMs: 10,
  autoClose: true,
  checkPluginId: true,
  updateStatesOnBroadcast: true,
  maxWorkers: 8,
  maxSendBufferBytes: DEFAULT_MAX_SEND_BUFFER_BYTES,
  allowImplicitStates: true,
};

/** Default configuration applied when the config file is absent or partial. */
export const DEFAULT_CONFIG: SdkConfig = {
  client: { ...DEFAULT_CLIENT_OPTIONS },
  logging: { level: 'info' },
};

/** Conventional config file name, looked up in the working directory. */
export const CONFIG_FILE_NAME = 'surface-sdk.toml';

// ---------------------------------------------------------------------------
// resolveConfigPath()
// ---------------------------------------------------------------------------

/**
 * Resolve the config file path.
 *
 * Precedence:
 *  1. `$SURFACE_SDK_CONFIG` environment variable (if non-empty)
 *  2. `surface-sdk.toml` in the working directory
 */
export function resolveConfigPath(cwd: string = process.cwd()): string {
  const fromEnv = process.env['SURFACE_SDK_CONFIG'];
  if (fromEnv !== undefined && fromEnv.length > 0) {
    return resolve(cwd, fromEnv);
  }
  return resolve(cwd, CONFIG_FILE_NAME);
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Check the ranges of already-typed client options. Throws on the first
 * invalid field.
 */
export function validateClientOptions(options: ClientConfig): void {
  if (options.pluginId !== undefined && options.pluginId.trim().length === 0) {
    throw new Error('pluginId must be a non-empty string');
  }
  if (options.host.length === 0) {
    throw new Error('host must be a non-empty string');
  }
  if (!Number.isInteger(options.port) || options.port < 1 || options.port > 65535) {
    throw new Error('port must be an integer between 1 and 65535');
  }
  if (!Number.isFinite(options.pollIntervalMs) || options.pollIntervalMs <= 0) {
    throw new Error('pollIntervalMs must be a positive number');
  }
  if (!Number.isInteger(options.maxWorkers) || options.maxWorkers < 1) {
    throw new Error('maxWorkers must be a positive integer');
  }
  if (!Number.isInteger(options.maxSendBufferBytes) || options.maxSendBufferBytes < 1) {
    throw new Error('maxSendBufferBytes must be a positive integer');
  }
}

/** Merge options given in code with the defaults and validate the result. */
export function resolveClientOptions(input: ClientOptionsInput): ClientOptions {
  const options: ClientOptions = { ...DEFAULT_CLIENT_OPTIONS, ...definedOnly(input) };
  validateClientOptions(options);
  return options;
}

/** Drop keys explicitly set to `undefined` so they do not mask defaults. */
function definedOnly(input: ClientOptionsInput): ClientOptionsInput {
  const result: ClientOptionsInput = { pluginId: input.pluginId };
  if (input.host !== undefined) result.host = input.host;
  if (input.port !== undefined) result.port = input.port;
  if (input.pollIntervalMs !== undefined) result.pollIntervalMs = input.pollIntervalMs;
  if (input.autoClose !== undefined) result.autoClose = input.autoClose;
  if (input.checkPluginId !== undefined) result.checkPluginId = input.checkPluginId;
  if (input.updateStatesOnBroadcast !== undefined) {
    result.updateStatesOnBroadcast = input.updateStatesOnBroadcast;
  }
  if (input.maxWorkers !== undefined) result.maxWorkers = input.maxWorkers;
  if (input.maxSendBufferBytes !== undefined) result.maxSendBufferBytes = input.maxSendBufferBytes;
  if (input.allowImplicitStates !== undefined) {
    result.allowImplicitStates = input.allowImplicitStates;
  }
  return result;
}

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

function readString(section: Record<string, unknown>, key: string, label: string): string | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw new Error(`${label} must be a string`);
  return value;
}

function readNumber(section: Record<string, unknown>, key: string, label: string): number | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') throw new Error(`${label} must be a number`);
  return value;
}

function readBoolean(
  section: Record<string, unknown>,
  key: string,
  label: string,
): boolean | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') throw new Error(`${label} must be a boolean`);
  return value;
}

function readSection(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const section = raw[name];
  if (section === undefined) return {};
  if (!isRecord(section)) throw new Error(`[${name}] must be a table`);
  return section;
}

/**
 * Parse and validate a raw config object (e.g. from TOML parsing) into a
 * fully typed `SdkConfig`. Applies defaults for missing sections and
 * fields. Unknown sections and keys are ignored.
 */
export function parseConfig(raw: Record<string, unknown>): SdkConfig {
  const d = DEFAULT_CLIENT_OPTIONS;

  // --- client ---
  const rawClient = readSection(raw, 'client');
  const client: ClientConfig = {
    host: readString(rawClient, 'host', 'client.host') ?? d.host,
    port: readNumber(rawClient, 'port', 'client.port') ?? d.port,
    pollIntervalMs:
      readNumber(rawClient, 'poll_interval_ms', 'client.poll_interval_ms') ?? d.pollIntervalMs,
    autoClose: readBoolean(rawClient, 'auto_close', 'client.auto_close') ?? d.autoClose,
    checkPluginId:
      readBoolean(rawClient, 'check_plugin_id', 'client.check_plugin_id') ?? d.checkPluginId,
    updateStatesOnBroadcast:
      readBoolean(rawClient, 'update_states_on_broadcast', 'client.update_states_on_broadcast') ??
      d.updateStatesOnBroadcast,
    maxWorkers: readNumber(rawClient, 'max_workers', 'client.max_workers') ?? d.maxWorkers,
    maxSendBufferBytes:
      readNumber(rawClient, 'max_send_buffer_bytes', 'client.max_send_buffer_bytes') ??
      d.maxSendBufferBytes,
    allowImplicitStates:
      readBoolean(rawClient, 'allow_implicit_states', 'client.allow_implicit_states') ??
      d.allowImplicitStates,
  };
  const pluginId = readString(rawClient, 'plugin_id', 'client.plugin_id');
  if (pluginId !== undefined) client.pluginId = pluginId;

  try {
    validateClientOptions(client);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`client: ${message}`, { cause: err });
  }

  // --- logging ---
  const rawLogging = readSection(raw, 'logging');
  const level = rawLogging['level'] ?? DEFAULT_CONFIG.logging.level;
  if (!isLogLevel(level)) {
    throw new Error(
      `Invalid logging.level: "${String(level)}". Must be one of: ${LOG_LEVELS.join(', ')}`,
    );
  }
  const logging: LoggingConfig = { level };
  const file = readString(rawLogging, 'file', 'logging.file');
  if (file !== undefined) logging.file = file;

  return { client, logging };
}
