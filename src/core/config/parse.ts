import { ConfigParseError } from '../errors.js';
import { parseDuration } from './duration.js';
import { booleanSpellingSchema, isConfigKey } from './schema.js';
import type { Config } from './schema.js';
import { leadingIndent, parseInlineList, parseScalar, stripInlineComment } from './scalar.js';

interface MutableConfig {
  bootstrapServers: string;
  authMechanism: string;
  excludeTopics: string[];
  excludeInternal: boolean | null;
  format: string;
  timeoutMs: number | null;
  hasTimeout: boolean;
}

/**
 * Parse the text of a config file.
 *
 * The grammar is a line-oriented `key: value` subset: scalars, quoted
 * scalars, inline `[a, b]` lists and indented `- item` block lists for
 * `exclude_topics`. Anything outside it throws a line-numbered
 * {@link ConfigParseError}.
 */
export function parseConfig(text: string): Config {
  const cfg: MutableConfig = {
    bootstrapServers: '',
    authMechanism: '',
    excludeTopics: [],
    excludeInternal: null,
    format: '',
    timeoutMs: null,
    hasTimeout: false,
  };

  const lines = (text.startsWith('\uFEFF') ? text.slice(1) : text).split('\n');

  for (let i = 0; i < lines.length; i++) {
    const lineNum = i + 1;
    const line = cleanLine(lines[i] ?? '');
    const trimmed = line.trim();
    if (trimmed === '') {
      continue;
    }

    if (trimmed.startsWith('-')) {
      throw new ConfigParseError('unexpected list item', lineNum);
    }

    const colon = line.indexOf(':');
    if (colon === -1) {
      throw new ConfigParseError('expected key: value', lineNum);
    }

    const key = line.slice(0, colon).trim();
    const value = line.slice(colon + 1).trim();

    if (!isConfigKey(key)) {
      throw new ConfigParseError(`unknown key "${key}"`, lineNum);
    }

    switch (key) {
      case 'bootstrap_servers':
        cfg.bootstrapServers = withLine(lineNum, key, () => parseScalar(value).trim());
        break;
      case 'auth_mechanism':
        cfg.authMechanism = withLine(lineNum, key, () => parseScalar(value).trim());
        break;
      case 'exclude_topics':
        if (value === '') {
          const block = parseBlockList(lines, i + 1, leadingIndent(line));
          cfg.excludeTopics.push(...block.items);
          i = block.next - 1;
        } else {
          cfg.excludeTopics.push(...withLine(lineNum, key, () => parseInlineList(value)));
        }
        break;
      case 'exclude_internal':
        cfg.excludeInternal = withLine(lineNum, key, () => parseBoolean(parseScalar(value).trim()));
        break;
      case 'format':
        cfg.format = withLine(lineNum, key, () => parseScalar(value).trim().toLowerCase());
        break;
      case 'timeout':
        cfg.timeoutMs = withLine(lineNum, key, () => parseDuration(parseScalar(value).trim()));
        cfg.hasTimeout = true;
        break;
    }
  }

  return {
    ...cfg,
    excludeTopics: normalizeList(cfg.excludeTopics),
  };
}

interface BlockList {
  readonly items: readonly string[];
  /** Index of the first line after the block. */
  readonly next: number;
}

/** Consume `- item` lines indented deeper than the key that opened the block. */
function parseBlockList(lines: readonly string[], start: number, keyIndent: number): BlockList {
  const items: string[] = [];

  for (let i = start; i < lines.length; i++) {
    const lineNum = i + 1;
    const line = cleanLine(lines[i] ?? '');
    if (line.trim() === '') {
      continue;
    }

    if (leadingIndent(line) <= keyIndent) {
      return { items, next: i };
    }

    const item = line.trimStart();
    if (!item.startsWith('-')) {
      throw new ConfigParseError('invalid list item for exclude_topics', lineNum);
    }

    const body = item.slice(1).trim();
    if (body === '') {
      throw new ConfigParseError('empty list item for exclude_topics', lineNum);
    }

    items.push(withLine(lineNum, 'exclude_topics item', () => parseScalar(body)));
  }

  return { items, next: lines.length };
}

function parseBoolean(text: string): boolean {
  const parsed = booleanSpellingSchema.safeParse(text);
  if (!parsed.success) {
    throw new Error(`invalid boolean "${text}"`);
  }
  return parsed.data;
}

/** Drop the trailing carriage return and any comment. */
function cleanLine(raw: string): string {
  return stripInlineComment(raw.endsWith('\r') ? raw.slice(0, -1) : raw);
}

/** Trim entries and drop blanks; nothing left collapses to `null`. */
function normalizeList(items: readonly string[]): readonly string[] | null {
  const out = items.map((item) => item.trim()).filter((item) => item !== '');
  return out.length > 0 ? out : null;
}

/** Run a value parser and attach the line number and key to any failure. */
function withLine<T>(lineNum: number, what: string, fn: () => T): T {
  try {
    return fn();
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigParseError(`parse ${what}: ${detail}`, lineNum);
  }
}
