/**
 * TOML-based configuration loader for the plugin SDK.
 *
 * Reads `surface-sdk.toml` (or the file named by `$SURFACE_SDK_CONFIG`),
 * parses it with smol-toml and validates it into a fully typed
 * `SdkConfig`. `applyLoggingConfig()` points the global logger at the
 * configured level and destination.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { DEFAULT_CONFIG, parseConfig, resolveConfigPath } from '../types/config.js';
import type { LoggingConfig, SdkConfig } from '../types/config.js';
import { configureLogging, createFileLogSink, type FileLogSink } from './logger.js';

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

function defaults(): SdkConfig {
  return {
    client: { ...DEFAULT_CONFIG.client },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}

/**
 * Load and validate a config file.
 *
 * If the file does not exist or is empty, returns the defaults.
 * Throws on invalid TOML syntax or invalid values.
 */
export function loadConfig(configPath: string = resolveConfigPath()): SdkConfig {
  if (!existsSync(configPath)) {
    return defaults();
  }

  const content = readFileSync(configPath, 'utf-8');
  if (content.trim().length === 0) {
    return defaults();
  }

  let raw: Record<string, unknown>;
  try {
    raw = parseTOML(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid TOML in ${configPath}: ${reason}`, { cause: err });
  }
  return parseConfig(raw);
}

// ---------------------------------------------------------------------------
// applyLoggingConfig()
// ---------------------------------------------------------------------------

/**
 * Apply a `[logging]` section to the global logger.
 *
 * Returns the file sink when one was opened so the caller can close it.
 */
export function applyLoggingConfig(logging: LoggingConfig): FileLogSink | undefined {
  if (logging.file === undefined) {
    configureLogging({ level: logging.level });
    return undefined;
  }
  const sink = createFileLogSink(logging.file);
  configureLogging({ level: logging.level, sink });
  return sink;
}
