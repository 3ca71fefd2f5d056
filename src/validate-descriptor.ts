/**
 * Descriptor file validation for `surface-sdk validate [file]`.
 *
 * Reads a descriptor (conventionally `entry.tp`), validates it against
 * the rule table for its SDK version and reports pass/fail with one line
 * per violation. Works without a controller.
 */

import { isClientError } from './core/client-error.js';
import { validateDescriptorText, violationLocation } from './core/descriptor-validator.js';
import type { ValidationReport } from './core/descriptor-validator.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Injectable dependencies for the validator. */
export interface ValidateDescriptorDeps {
  /** Read a file's contents as a string. Throws on missing file. */
  readFile: (path: string) => string;
  /** Write to stdout. */
  stdout: (msg: string) => void;
  /** Write to stderr. */
  stderr: (msg: string) => void;
}

export interface ValidateDescriptorOptions {
  /** Check against this SDK version instead of the file's `sdk`. */
  sdkVersion?: number;
}

// ---------------------------------------------------------------------------
// validateDescriptorFile
// ---------------------------------------------------------------------------

/**
 * Validate the descriptor at `filePath` and print the outcome.
 *
 * @returns The report, or `null` when the file could not be read.
 */
export function validateDescriptorFile(
  filePath: string,
  deps: ValidateDescriptorDeps,
  options: ValidateDescriptorOptions = {},
): ValidationReport | null {
  let text: string;
  try {
    text = deps.readFile(filePath);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    deps.stderr(`  FAIL  ${filePath}`);
    deps.stderr(`  ERROR [${filePath}] Cannot read descriptor: ${detail}`);
    return null;
  }

  let report: ValidationReport;
  try {
    report = validateDescriptorText(text, options);
  } catch (err) {
    if (!isClientError(err)) throw err;
    deps.stderr(`  FAIL  ${filePath}`);
    deps.stderr(`  ERROR [${err.field ?? filePath}] ${err.message}`);
    return null;
  }

  return reportResult(filePath, report, deps);
}

// ---------------------------------------------------------------------------
// Output formatting
// ---------------------------------------------------------------------------

function reportResult(
  filePath: string,
  report: ValidationReport,
  deps: ValidateDescriptorDeps,
): ValidationReport {
  if (report.valid) {
    deps.stdout(`  PASS  ${filePath} (SDK ${report.sdkVersion})`);
  } else {
    const count = report.violations.length;
    deps.stderr(
      `  FAIL  ${filePath} (SDK ${report.sdkVersion}): ${count} violation${count === 1 ? '' : 's'}`,
    );
  }

  for (const violation of report.violations) {
    deps.stderr(`  ERROR [${violationLocation(violation)}] ${violation.message}`);
  }

  return report;
}
