import type { OccurrenceSource } from './types.js';

/** A topic name found on a given line. */
export interface Extracted {
  readonly topic: string;
  readonly line: number;
  readonly source: OccurrenceSource;
}

const TOPIC_CONFIG_LINE = /^\s*(?:-\s*)?["']?([A-Za-z0-9_.-]*topics?[A-Za-z0-9_.-]*)["']?\s*[:=]\s*(.*?)\s*,?\s*$/i;
const ENV_LINE = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/;
const QUOTED_TOKEN = /["'`]([A-Za-z0-9._-]{3,249})["'`]/g;
const PLAIN_TOKEN = /[A-Za-z0-9._-]{3,249}/g;
const INTEGER = /^[+-]?\d+$/;
const FORBIDDEN_CHARS = /[{}[\]()$]/;
const UPPER_SNAKE = /^[A-Z0-9_]*[A-Z][A-Z0-9_]*$/;

const STOP_WORDS: ReadonlySet<string> = new Set([
  'topic',
  'topics',
  'kafka',
  'true',
  'false',
  'null',
  'nil',
  'none',
  'default',
  'latest',
  'earliest',
  'name',
  'value',
  'string',
]);

/**
 * Whether a token looks like a topic name rather than a number, URL,
 * placeholder, constant name or keyword. `context` is the text it came from.
 */
export function isLikelyTopic(candidate: string, context: string): boolean {
  if (candidate.length < 3) {
    return false;
  }
  if (INTEGER.test(candidate)) {
    return false;
  }
  if (candidate.toLowerCase().startsWith('http')) {
    return false;
  }
  if (FORBIDDEN_CHARS.test(candidate)) {
    return false;
  }
  if (context.includes('${' + candidate + '}')) {
    return false;
  }
  if (UPPER_SNAKE.test(candidate) && !candidate.includes('.') && !candidate.includes('-')) {
    return false;
  }
  return !STOP_WORDS.has(candidate.toLowerCase());
}

/** Cut a `#` comment that is outside single or double quotes. */
export function stripInlineComment(value: string): string {
  let inSingle = false;
  let inDouble = false;
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch === "'" && !inDouble) {
      inSingle = !inSingle;
    } else if (ch === '"' && !inSingle) {
      inDouble = !inDouble;
    } else if (ch === '#' && !inSingle && !inDouble) {
      return value.slice(0, i).trim();
    }
  }
  return value.trim();
}

/** Width of the leading whitespace; a tab counts as two. */
export function leadingIndent(line: string): number {
  let indent = 0;
  for (const ch of line) {
    if (ch === ' ') {
      indent++;
    } else if (ch === '\t') {
      indent += 2;
    } else {
      break;
    }
  }
  return indent;
}

/** Distinct likely topic names in a config or env value, in order of appearance. */
export function extractTopicCandidates(rawValue: string): string[] {
  const value = stripInlineComment(rawValue);
  if (value === '' || (value.startsWith('${') && value.endsWith('}'))) {
    return [];
  }

  const seen = new Set<string>();
  for (const [token] of value.matchAll(PLAIN_TOKEN)) {
    if (isLikelyTopic(token, value)) {
      seen.add(token);
    }
  }
  return [...seen];
}

function splitLines(content: string): string[] {
  return content.split(/\r?\n/);
}

/**
 * YAML or JSON: values of keys that mention `topic`, including block lists
 * opened by an empty, `|` or `>` value.
 */
export function extractFromConfig(content: string): Extracted[] {
  const found: Extracted[] = [];
  let listIndent = -1;

  splitLines(content).forEach((line, index) => {
    const lineNo = index + 1;
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith('//')) {
      return;
    }

    if (listIndent >= 0) {
      const indent = leadingIndent(line);
      if (indent > listIndent && trimmed.startsWith('-')) {
        for (const topic of extractTopicCandidates(trimmed.slice(1).trim())) {
          found.push({ topic, line: lineNo, source: 'config' });
        }
        return;
      }
      if (indent <= listIndent) {
        listIndent = -1;
      }
    }

    const match = TOPIC_CONFIG_LINE.exec(line);
    if (match === null) {
      return;
    }
    const value = (match[2] ?? '').trim();
    if (value === '' || value === '|' || value === '>') {
      listIndent = leadingIndent(line);
      return;
    }
    for (const topic of extractTopicCandidates(value)) {
      found.push({ topic, line: lineNo, source: 'config' });
    }
  });

  return found;
}

/** `.env` files: assignments whose key contains `TOPIC`. */
export function extractFromEnv(content: string): Extracted[] {
  const found: Extracted[] = [];

  splitLines(content).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) {
      return;
    }
    const match = ENV_LINE.exec(line);
    if (match === null || !(match[1] ?? '').toUpperCase().includes('TOPIC')) {
      return;
    }
    for (const topic of extractTopicCandidates(stripInlineComment(match[2] ?? ''))) {
      found.push({ topic, line: index + 1, source: 'env' });
    }
  });

  return found;
}

/** Source files: quoted tokens on lines that mention `topic` or `kafka`. */
export function extractFromSource(content: string): Extracted[] {
  const found: Extracted[] = [];

  splitLines(content).forEach((line, index) => {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('//') || trimmed.startsWith('#') || trimmed.startsWith('*')) {
      return;
    }
    const lower = line.toLowerCase();
    if (!lower.includes('topic') && !lower.includes('kafka')) {
      return;
    }
    for (const match of line.matchAll(QUOTED_TOKEN)) {
      const topic = match[1];
      if (topic !== undefined && isLikelyTopic(topic, line)) {
        found.push({ topic, line: index + 1, source: 'sourceCode' });
      }
    }
  });

  return found;
}
