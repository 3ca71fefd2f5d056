/**
 * `surface-sdk convert <descriptor>`: turn an existing descriptor back into
 * a YAML declaration that `generate` expands into the same document.
 *
 * Output goes to `plugin.yaml` beside the descriptor unless `out` names
 * another file, or `-` for stdout. An invalid descriptor is reported like
 * `validate` does and nothing is written.
 */

import { dirname, join } from 'node:path';
import { DescriptorValidationError, isClientError } from './core/client-error.js';
import { descriptorToDeclaration, serializeDeclaration } from './core/declaration-converter.js';
import { assertValidDescriptor, violationLocation } from './core/descriptor-validator.js';
import type { Logger } from './core/logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ConvertDeps {
  readFile: (path: string) => string;
  writeFile: (path: string, content: string) => void;
  stdout: (msg: string) => void;
  stderr: (msg: string) => void;
  logger?: Logger;
}

export interface ConvertCommandOptions {
  /** Output path; `-` writes to stdout. */
  out?: string;
}

/** Conventional declaration file name. */
export const DECLARATION_FILE_NAME = 'plugin.yaml';

const STDOUT_TARGET = '-';

// ---------------------------------------------------------------------------
// runConvert
// ---------------------------------------------------------------------------

/**
 * Convert the descriptor at `descriptorPath` into a declaration.
 *
 * @returns Exit code (0 = written, 1 = failure).
 */
export function runConvert(
  descriptorPath: string,
  deps: ConvertDeps,
  options: ConvertCommandOptions = {},
): number {
  let text: string;
  try {
    text = deps.readFile(descriptorPath);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    deps.stderr(`  ERROR [${descriptorPath}] Cannot read descriptor: ${detail}`);
    return 1;
  }

  let output: string;
  try {
    const doc: unknown = JSON.parse(text);
    assertValidDescriptor(doc);
    output = serializeDeclaration(descriptorToDeclaration(doc));
    deps.logger?.debug('descriptor converted', { plugin: doc.id, sdk: doc.sdk });
  } catch (err) {
    if (err instanceof SyntaxError) {
      deps.stderr(`  FAIL  ${descriptorPath}: Invalid JSON syntax: ${err.message}`);
      return 1;
    }
    if (!isClientError(err)) throw err;
    deps.stderr(`  FAIL  ${descriptorPath}: ${err.message}`);
    if (err instanceof DescriptorValidationError) {
      for (const violation of err.violations) {
        deps.stderr(`  ERROR [${violationLocation(violation)}] ${violation.message}`);
      }
    }
    return 1;
  }

  const target = options.out ?? join(dirname(descriptorPath), DECLARATION_FILE_NAME);
  if (target === STDOUT_TARGET) {
    deps.stdout(output.trimEnd());
    return 0;
  }

  try {
    deps.writeFile(target, output);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    deps.stderr(`  ERROR [${target}] Cannot write declaration: ${detail}`);
    return 1;
  }
  deps.stdout(`  PASS  wrote ${target}`);
  return 0;
}
