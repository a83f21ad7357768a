/**
 * Configuration Loader for kestrel-parse
 * Loads and validates kestrel.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import * as yaml from 'yaml';
import type { DiagnosticFormat } from './cli-error-formatter.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file looked up in the working directory */
export const CONFIG_FILE_NAME = 'kestrel.yaml';

export const GRAMMARS = ['expr', 'decl', 'program', 'tokens'] as const;
export type Grammar = (typeof GRAMMARS)[number];

export const FORMATS = ['human', 'json'] as const;

export interface ParseConfig {
  readonly grammar?: Grammar | undefined;
  readonly format?: DiagnosticFormat | undefined;
}

// ============================================================
// VALIDATION
// ============================================================

export function isGrammar(value: unknown): value is Grammar {
  return GRAMMARS.some((g) => g === value);
}

export function isFormat(value: unknown): value is DiagnosticFormat {
  return FORMATS.some((f) => f === value);
}

function readOption<T>(
  entries: ReadonlyMap<string, unknown>,
  key: string,
  guard: (value: unknown) => value is T,
  allowed: readonly string[]
): T | undefined {
  const value = entries.get(key);
  if (value === undefined || guard(value)) {
    return value;
  }
  throw new Error(
    `Invalid configuration: ${key} has invalid value "${String(value)}" (must be ${allowed.join(', ')})`
  );
}

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
function validateConfig(data: unknown): ParseConfig {
  // Empty documents parse to null
  if (data === null || data === undefined) {
    return {};
  }
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  const entries = new Map<string, unknown>(Object.entries(data));
  for (const key of entries.keys()) {
    if (key !== 'grammar' && key !== 'format') {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  const grammar = readOption(entries, 'grammar', isGrammar, GRAMMARS);
  const format = readOption(entries, 'format', isFormat, FORMATS);

  return { grammar, format };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from `explicitPath`, or from kestrel.yaml in `cwd`.
 *
 * @returns ParseConfig, or null when no explicit path was given and
 *   the working directory has no kestrel.yaml
 * @throws Error with "Invalid configuration: {reason}" on read, YAML or
 *   validation failure
 */
export function loadConfig(
  cwd: string,
  explicitPath?: string | undefined
): ParseConfig | null {
  const configPath =
    explicitPath === undefined
      ? join(cwd, CONFIG_FILE_NAME)
      : resolve(cwd, explicitPath);

  // A missing default file is not an error
  if (explicitPath === undefined && !existsSync(configPath)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read ${configPath} (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return validateConfig(parsedData);
}
