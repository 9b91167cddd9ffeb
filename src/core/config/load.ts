import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigParseError, ConfigReadError } from '../errors.js';
import { parseConfig } from './parse.js';
import type { Config } from './schema.js';

/** Primary config file name looked up in the working and home directories. */
export const DEFAULT_CONFIG_FILE = '.kafka-topic-audit.yaml';
const ALTERNATE_CONFIG_FILE = '.kafka-topic-audit.yml';

/** A parsed config together with where it came from. */
export interface LoadedConfig {
  readonly config: Config;
  readonly path: string;
}

/**
 * Candidate config paths in lookup order: working directory first, then home.
 * Home entries that repeat a working-directory entry are skipped.
 */
export function candidateConfigPaths(cwd: string, home: string | null): readonly string[] {
  const paths = [join(cwd, DEFAULT_CONFIG_FILE), join(cwd, ALTERNATE_CONFIG_FILE)];

  if (home !== null && home !== '') {
    for (const name of [DEFAULT_CONFIG_FILE, ALTERNATE_CONFIG_FILE]) {
      const candidate = join(home, name);
      if (!paths.includes(candidate)) {
        paths.push(candidate);
      }
    }
  }

  return paths;
}

/**
 * Load the first candidate that exists.
 * Returns `null` when none exist; a file that exists but fails to read or
 * parse is an error.
 */
export function loadFirstConfig(paths: readonly string[]): LoadedConfig | null {
  for (const path of paths) {
    const text = readOptional(path);
    if (text === null) {
      continue;
    }
    return { config: parseAt(path, text), path };
  }
  return null;
}

/** Load a config file the caller named explicitly. */
export function loadConfigFromPath(path: string): Config {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error: unknown) {
    throw new ConfigReadError(path, error);
  }
  return parseAt(path, text);
}

function parseAt(path: string, text: string): Config {
  try {
    return parseConfig(text);
  } catch (error: unknown) {
    if (error instanceof ConfigParseError) {
      throw error.withPath(path);
    }
    throw error;
  }
}

function readOptional(path: string): string | null {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error: unknown) {
    if (isNotFound(error)) {
      return null;
    }
    throw new ConfigReadError(path, error);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
