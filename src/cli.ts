/**
 * surface-sdk CLI.
 *
 * Provides the `surface-sdk` command with subcommands:
 *   - `validate [file]`: Check a descriptor file (default `./entry.tp`).
 *   - `generate <declaration>`: Expand a JSON or YAML declaration into a
 *     descriptor.
 *   - `convert <descriptor>`: Turn a descriptor back into a YAML declaration.
 *
 * All external dependencies are injected via {@link CliDeps} for testability.
 * The real `main()` wires production dependencies and calls `runCommand()`.
 */

import { VERSION } from './index.js';
import { isSupportedSdkVersion } from './core/entity-model.js';
import type { Logger } from './core/logger.js';
import { DECLARATION_FILE_NAME, runConvert } from './convert-command.js';
import { runGenerate } from './generate-command.js';
import { DESCRIPTOR_FILE_NAME } from './types/descriptor.js';
import { validateDescriptorFile } from './validate-descriptor.js';

// ---------------------------------------------------------------------------
// CLI dependency injection
// ---------------------------------------------------------------------------

/** Injectable dependencies for CLI commands. */
export interface CliDeps {
  /** Write to stdout. */
  stdout: (msg: string) => void;
  /** Write to stderr. */
  stderr: (msg: string) => void;
  /** Read file contents as string. */
  readFile: (path: string) => string;
  /** Write string contents to a file. */
  writeFile: (path: string, content: string) => void;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Parsed CLI arguments. */
export interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Record<string, boolean>;
  /** Values of options that take one (`--out file` or `--out=file`). */
  options: Record<string, string>;
}

const VALUE_OPTIONS: ReadonlySet<string> = new Set(['out', 'indent', 'sdk']);

/**
 * Parse process.argv into a command, positionals, flags and options.
 *
 * Expects argv in the form: [node, script, command?, ...args]
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};
  const positionals: string[] = [];
  let command = '';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      const name = eq === -1 ? body : body.slice(0, eq);
      if (VALUE_OPTIONS.has(name)) {
        if (eq !== -1) {
          options[name] = body.slice(eq + 1);
        } else {
          options[name] = args[i + 1] ?? '';
          i++;
        }
      } else {
        flags[name] = true;
      }
    } else if (!command) {
      command = arg;
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags, options };
}

// ---------------------------------------------------------------------------
// Command dispatch
// ---------------------------------------------------------------------------

const USAGE = `Usage: surface-sdk <command>

Commands:
  validate [file]          Validate a descriptor file (default: ./${DESCRIPTOR_FILE_NAME})
  generate <declaration>   Generate a descriptor from a JSON or YAML declaration
  convert <descriptor>     Convert a descriptor into a YAML declaration

Options:
  --sdk <n>          Target SDK version (validate, generate)
  --out <file|->     Output file, or - for stdout (generate; default: ${DESCRIPTOR_FILE_NAME} beside the declaration)
                     (convert; default: ${DECLARATION_FILE_NAME} beside the descriptor)
  --indent <n>       JSON indentation, 0 to 8 (generate; default: 2)
  --skip-invalid     Omit attributes too new for the target SDK version (generate)
  --debug            Log at debug level to stderr
  --version          Show version number
  --help             Show this help message`;

/**
 * Dispatch parsed arguments to the appropriate handler.
 *
 * @returns Process exit code (0 = success, 1 = failure).
 */
export async function runCommand(args: ParsedArgs, deps: CliDeps): Promise<number> {
  if (args.flags['version']) {
    deps.stdout(VERSION);
    return 0;
  }

  if (args.command === '' || args.flags['help']) {
    deps.stdout(USAGE);
    return 0;
  }

  switch (args.command) {
    case 'validate':
      return validate(deps, args);
    case 'generate':
      return generate(deps, args);
    case 'convert':
      return convert(deps, args);
    default:
      deps.stderr(`Unknown command: "${args.command}"\n`);
      deps.stdout(USAGE);
      return 1;
  }
}

// ---------------------------------------------------------------------------
// Option values
// ---------------------------------------------------------------------------

type OptionResult = { ok: true; value: number | undefined } | { ok: false };

function readSdkOption(deps: CliDeps, args: ParsedArgs): OptionResult {
  const raw = args.options['sdk'];
  if (raw === undefined) return { ok: true, value: undefined };
  const value = Number(raw);
  if (raw.trim() === '' || !isSupportedSdkVersion(value)) {
    deps.stderr(`Invalid --sdk value: "${raw}"`);
    return { ok: false };
  }
  return { ok: true, value };
}

function readIndentOption(deps: CliDeps, args: ParsedArgs): OptionResult {
  const raw = args.options['indent'];
  if (raw === undefined) return { ok: true, value: undefined };
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value) || value < 0 || value > 8) {
    deps.stderr(`Invalid --indent value: "${raw}" (expected an integer from 0 to 8)`);
    return { ok: false };
  }
  return { ok: true, value };
}

// ---------------------------------------------------------------------------
// validate
// ---------------------------------------------------------------------------

/** Validate a descriptor file. Exit 0 when valid. */
export async function validate(deps: CliDeps, args: ParsedArgs): Promise<number> {
  const sdk = readSdkOption(deps, args);
  if (!sdk.ok) return 1;

  const filePath = args.positionals[0] ?? DESCRIPTOR_FILE_NAME;
  const report = validateDescriptorFile(filePath, deps, { sdkVersion: sdk.value });
  return report?.valid === true ? 0 : 1;
}

// ---------------------------------------------------------------------------
// generate
// ---------------------------------------------------------------------------

/** Generate a descriptor from a declaration file. Exit 0 when written. */
export async function generate(deps: CliDeps, args: ParsedArgs): Promise<number> {
  const declarationPath = args.positionals[0];
  if (declarationPath === undefined) {
    deps.stderr('generate: missing declaration file\n');
    deps.stdout(USAGE);
    return 1;
  }

  const sdk = readSdkOption(deps, args);
  const indent = readIndentOption(deps, args);
  if (!sdk.ok || !indent.ok) return 1;

  const out = args.options['out'];
  if (out === '') {
    deps.stderr('--out needs a file name or -');
    return 1;
  }

  return runGenerate(declarationPath, deps, {
    out,
    indent: indent.value,
    sdkVersion: sdk.value,
    skipInvalid: args.flags['skip-invalid'] === true,
  });
}

// ---------------------------------------------------------------------------
// convert
// ---------------------------------------------------------------------------

/** Convert a descriptor file into a declaration. Exit 0 when written. */
export async function convert(deps: CliDeps, args: ParsedArgs): Promise<number> {
  const descriptorPath = args.positionals[0];
  if (descriptorPath === undefined) {
    deps.stderr('convert: missing descriptor file\n');
    deps.stdout(USAGE);
    return 1;
  }

  const out = args.options['out'];
  if (out === '') {
    deps.stderr('--out needs a file name or -');
    return 1;
  }

  return runConvert(descriptorPath, deps, { out });
}
