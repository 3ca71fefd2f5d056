#!/usr/bin/env node
/**
 * Production entry point for the surface-sdk CLI.
 *
 * Wires real dependencies (filesystem, process streams, logging) into
 * CliDeps and dispatches to the CLI command handler.
 *
 * Usage:
 *   surface-sdk validate entry.tp
 *   surface-sdk generate plugin.yaml --out entry.tp
 *   surface-sdk convert entry.tp --out plugin.yaml
 */

import { readFileSync, realpathSync, writeFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { parseArgs, runCommand } from './cli.js';
import type { CliDeps } from './cli.js';
import { configureLogging, createLogger, createStreamSink } from './core/logger.js';

// ---------------------------------------------------------------------------
// main()
// ---------------------------------------------------------------------------

/**
 * Production main(): wires real deps and dispatches commands.
 *
 * Log entries go to stderr so that `generate --out -` leaves stdout to the
 * descriptor.
 *
 * @param argv - Process arguments (defaults to process.argv).
 * @returns Exit code (0 = success, non-zero = failure).
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const args = parseArgs(argv);

  configureLogging({
    level: args.flags['debug'] ? 'debug' : 'error',
    sink: createStreamSink((line) => process.stderr.write(line)),
  });

  const deps: CliDeps = {
    stdout: (msg: string) => process.stdout.write(`${msg}\n`),
    stderr: (msg: string) => process.stderr.write(`${msg}\n`),
    readFile: (path: string) => readFileSync(path, 'utf-8'),
    writeFile: (path: string, content: string) => writeFileSync(path, content, 'utf-8'),
    logger: createLogger('cli'),
  };

  return runCommand(args, deps);
}

// ---------------------------------------------------------------------------
// Entry point: run when executed directly
// ---------------------------------------------------------------------------

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (script === undefined) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

/* c8 ignore next 10 */
if (isEntryPoint()) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
      process.exitCode = 1;
    },
  );
}
