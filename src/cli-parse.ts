#!/usr/bin/env node
/**
 * CLI Parse Entry Point
 *
 * Implements argument parsing and the run loop for kestrel-parse.
 * Lexes or parses a Kestrel source file and prints the result or its
 * diagnostics.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { formatDecl, formatExpr } from './ast-printer.js';
import { type DiagnosticFormat, formatDiagnostic } from './cli-error-formatter.js';
import { type Grammar, isFormat, isGrammar, loadConfig } from './cli-config.js';
import { toLspDiagnostic } from './cli-lsp-diagnostic.js';
import { formatError, readVersion } from './cli-shared.js';
import type { KestrelError } from './error-classes.js';
import { lex } from './lexer/index.js';
import { parseSource } from './parser/index.js';
import type { SourceId } from './source-span.js';
import { type SpannedToken, TOKEN_TYPES } from './token-types.js';

/** Source id assigned to the file being processed */
const FILE_SOURCE_ID: SourceId = 0;

/**
 * Parsed command-line arguments for kestrel-parse.
 * `grammar` and `format` stay undefined when not given so that
 * configuration can supply them.
 */
export type ParsedCliArgs =
  | {
      mode: 'run';
      file: string;
      grammar: Grammar | undefined;
      format: DiagnosticFormat | undefined;
      config: string | undefined;
    }
  | { mode: 'help' }
  | { mode: 'version' };

export interface CliWriter {
  write(chunk: string): unknown;
}

export interface CliIO {
  readonly stdout: CliWriter;
  readonly stderr: CliWriter;
  /** Directory used to resolve the file and kestrel.yaml */
  readonly cwd: string;
}

export const USAGE = `kestrel-parse - Parse Kestrel source files

Usage: kestrel-parse [options] <file>

Options:
  --grammar <g>   What the file holds: expr (default), decl, program or tokens
  --format <fmt>  Output format: human (default) or json
  --config <path> Configuration file (default: ./kestrel.yaml when present)
  -h, --help      Show this help message
  -v, --version   Show version number`;

// ============================================================
// ARGUMENT PARSING
// ============================================================

const VALUE_FLAGS = new Set(['--grammar', '--format', '--config']);
const BOOLEAN_FLAGS = new Set(['--help', '-h', '--version', '-v']);

function flagValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  if (index === -1) return undefined;
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new Error(`${flag} requires an argument`);
  }
  return value;
}

function checkedFlagValue<T extends string>(
  argv: string[],
  flag: string,
  guard: (value: unknown) => value is T,
  invalid: (value: string) => string
): T | undefined {
  const value = flagValue(argv, flag);
  if (value === undefined || guard(value)) return value;
  throw new Error(invalid(value));
}

/**
 * Parse command-line arguments for kestrel-parse
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws Error on unknown flags, missing or invalid values, or a missing file
 */
export function parseCliArgs(argv: string[]): ParsedCliArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const grammar = checkedFlagValue(
    argv,
    '--grammar',
    isGrammar,
    (v) => `Invalid grammar: ${v}. Expected expr, decl, program or tokens`
  );
  const format = checkedFlagValue(
    argv,
    '--format',
    isFormat,
    (v) => `Invalid format: ${v}. Expected human or json`
  );
  const config = flagValue(argv, '--config');

  let file: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (VALUE_FLAGS.has(arg)) {
      i++; // Skip the flag's value
      continue;
    }
    if (arg.startsWith('-')) {
      if (!BOOLEAN_FLAGS.has(arg)) {
        throw new Error(`Unknown option: ${arg}`);
      }
      continue;
    }

    if (file !== undefined) {
      throw new Error(`Unexpected argument: ${arg}`);
    }
    file = arg;
  }

  if (file === undefined) {
    throw new Error('Missing file argument');
  }

  return { mode: 'run', file, grammar, format, config };
}

// ============================================================
// OUTPUT
// ============================================================

function tokenPayload(token: SpannedToken): string | undefined {
  const value = token.value;
  switch (value.type) {
    case TOKEN_TYPES.INT_LIT:
      return value.value.toString();
    case TOKEN_TYPES.REAL_LIT:
    case TOKEN_TYPES.BOOL_LIT:
      return String(value.value);
    case TOKEN_TYPES.CHAR_LIT:
      return JSON.stringify(value.value);
    case TOKEN_TYPES.IDENTIFIER:
      return value.value.text;
    default:
      return undefined;
  }
}

/**
 * One line per token: `start..end TYPE payload`
 */
export function formatTokens(
  tokens: readonly SpannedToken[],
  format: DiagnosticFormat
): string {
  if (format === 'json') {
    const items = tokens.map((token) => {
      const payload = tokenPayload(token);
      return {
        type: token.value.type,
        start: token.span.start,
        end: token.span.end,
        ...(payload !== undefined ? { value: payload } : {}),
      };
    });
    return JSON.stringify(items, null, 2);
  }

  return tokens
    .map((token) => {
      const payload = tokenPayload(token);
      const head = `${token.span.start}..${token.span.end} ${token.value.type}`;
      return payload === undefined ? head : `${head} ${payload}`;
    })
    .join('\n');
}

function formatItems(
  file: string,
  items: readonly string[],
  format: DiagnosticFormat
): string {
  if (format === 'json') {
    return JSON.stringify({ file, items }, null, 2);
  }
  return items.join('\n');
}

function formatDiagnostics(
  errors: readonly KestrelError[],
  source: string,
  file: string,
  format: DiagnosticFormat
): string {
  if (format === 'json') {
    const diagnostics = errors.map((err) =>
      toLspDiagnostic(err.toDiagnostic(), source, file)
    );
    return JSON.stringify({ file, diagnostics }, null, 2);
  }
  return errors
    .map((err) => formatDiagnostic(err.toDiagnostic(), source, file, 'human'))
    .join('\n\n');
}

// ============================================================
// RUN
// ============================================================

function renderSource(
  source: string,
  file: string,
  grammar: Grammar,
  format: DiagnosticFormat
): { output: string; errors: readonly KestrelError[] } {
  switch (grammar) {
    case 'tokens': {
      const lexed = lex(FILE_SOURCE_ID, source);
      return lexed.success
        ? { output: formatTokens(lexed.tokens, format), errors: [] }
        : { output: '', errors: lexed.errors.map((e) => e.value) };
    }
    case 'expr': {
      const result = parseSource(FILE_SOURCE_ID, source, 'expression');
      return result.success
        ? { output: formatItems(file, [formatExpr(result.value)], format), errors: [] }
        : { output: '', errors: result.errors };
    }
    case 'decl': {
      const result = parseSource(FILE_SOURCE_ID, source, 'declaration');
      return result.success
        ? { output: formatItems(file, [formatDecl(result.value)], format), errors: [] }
        : { output: '', errors: result.errors };
    }
    case 'program': {
      const result = parseSource(FILE_SOURCE_ID, source, 'program');
      return result.success
        ? { output: formatItems(file, result.value.map(formatDecl), format), errors: [] }
        : { output: '', errors: result.errors };
    }
  }
}

/**
 * Process one file.
 *
 * @returns exit code: 0 success, 1 diagnostics reported, 2 configuration
 *   or file errors
 */
export async function runParse(
  args: Extract<ParsedCliArgs, { mode: 'run' }>,
  io: CliIO
): Promise<number> {
  let grammar: Grammar;
  let format: DiagnosticFormat;
  try {
    const config = loadConfig(io.cwd, args.config);
    grammar = args.grammar ?? config?.grammar ?? 'expr';
    format = args.format ?? config?.format ?? 'human';
  } catch (err) {
    io.stderr.write(`Error: ${formatError(err)}\n`);
    return 2;
  }

  let source: string;
  try {
    source = await readFile(resolve(io.cwd, args.file), 'utf-8');
  } catch (err) {
    io.stderr.write(`Error: ${formatError(err)}\n`);
    return 2;
  }

  const { output, errors } = renderSource(source, args.file, grammar, format);
  if (errors.length > 0) {
    io.stderr.write(`${formatDiagnostics(errors, source, args.file, format)}\n`);
    return 1;
  }

  if (output !== '') {
    io.stdout.write(`${output}\n`);
  }
  return 0;
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Main entry point for kestrel-parse CLI.
 */
async function main(): Promise<void> {
  let args: ParsedCliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`Error: ${formatError(err)}`);
    console.error('Run kestrel-parse --help for usage');
    process.exitCode = 2;
    return;
  }

  if (args.mode === 'help') {
    console.log(USAGE);
    return;
  }

  if (args.mode === 'version') {
    console.log(await readVersion());
    return;
  }

  process.exitCode = await runParse(args, {
    stdout: process.stdout,
    stderr: process.stderr,
    cwd: process.cwd(),
  });
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main().catch((err: unknown) => {
    console.error(`Error: ${formatError(err)}`);
    process.exitCode = 1;
  });
}
