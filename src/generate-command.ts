/**
 * `surface-sdk generate <declaration>`: expand a declaration file into a
 * descriptor and write it.
 *
 * The declaration may be JSON or YAML. Output goes to `entry.tp` beside
 * the declaration unless `out` names another file, or `-` for stdout.
 * Nothing is written when the generated descriptor is invalid.
 */

import { dirname, join } from 'node:path';
import { DescriptorValidationError, isClientError } from './core/client-error.js';
import { parseDeclarationText } from './core/declaration-loader.js';
import { generateDescriptor, serializeDescriptor } from './core/descriptor-generator.js';
import { violationLocation } from './core/descriptor-validator.js';
import type { Logger } from './core/logger.js';
import { DESCRIPTOR_FILE_NAME } from './types/descriptor.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GenerateDeps {
  readFile: (path: string) => string;
  writeFile: (path: string, content: string) => void;
  stdout: (msg: string) => void;
  stderr: (msg: string) => void;
  logger?: Logger;
}

export interface GenerateCommandOptions {
  /** Output path; `-` writes to stdout. */
  out?: string;
  indent?: number;
  sdkVersion?: number;
  skipInvalid?: boolean;
}

const STDOUT_TARGET = '-';

// ---------------------------------------------------------------------------
// runGenerate
// ---------------------------------------------------------------------------

/**
 * Generate a descriptor from `declarationPath`.
 *
 * @returns Exit code (0 = written, 1 = failure).
 */
export function runGenerate(
  declarationPath: string,
  deps: GenerateDeps,
  options: GenerateCommandOptions = {},
): number {
  let text: string;
  try {
    text = deps.readFile(declarationPath);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    deps.stderr(`  ERROR [${declarationPath}] Cannot read declaration: ${detail}`);
    return 1;
  }

  let output: string;
  try {
    const declaration = parseDeclarationText(text, declarationPath);
    const { descriptor, warnings } = generateDescriptor(declaration, {
      sdkVersion: options.sdkVersion,
      skipInvalid: options.skipInvalid ?? false,
      logger: deps.logger,
    });
    for (const warning of warnings) {
      deps.stderr(`  WARN  ${warning}`);
    }
    output = serializeDescriptor(descriptor, options.indent ?? 2);
  } catch (err) {
    if (!isClientError(err)) throw err;
    deps.stderr(`  FAIL  ${declarationPath}: ${err.message}`);
    if (err instanceof DescriptorValidationError) {
      for (const violation of err.violations) {
        deps.stderr(`  ERROR [${violationLocation(violation)}] ${violation.message}`);
      }
    }
    return 1;
  }

  const target = options.out ?? join(dirname(declarationPath), DESCRIPTOR_FILE_NAME);
  if (target === STDOUT_TARGET) {
    deps.stdout(output.trimEnd());
    return 0;
  }

  try {
    deps.writeFile(target, output);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    deps.stderr(`  ERROR [${target}] Cannot write descriptor: ${detail}`);
    return 1;
  }
  deps.stdout(`  PASS  wrote ${target}`);
  return 0;
}
