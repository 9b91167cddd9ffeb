/**
 * Scalar and list helpers for the config file grammar.
 *
 * Errors are thrown as plain `Error`s without a line number; the line-oriented
 * parser attaches the location.
 */

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
  '\\': '\\',
  '"': '"',
};

/**
 * Cut a line at the first `#` that is not inside quotes.
 * Single and double quotes are tracked independently; a backslash escapes the
 * next character only inside double quotes.
 */
export function stripInlineComment(line: string): string {
  let inSingle = false;
  let inDouble = false;
  let escaped = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (escaped) {
      escaped = false;
    } else if (ch === '\\' && inDouble) {
      escaped = true;
    } else if (ch === "'" && !inDouble) {
      inSingle = !inSingle;
    } else if (ch === '"' && !inSingle) {
      inDouble = !inDouble;
    } else if (ch === '#' && !inSingle && !inDouble) {
      return line.slice(0, i);
    }
  }

  return line;
}

/**
 * Parse a scalar value.
 * `"..."` is unescaped, `'...'` is taken verbatim, partial quoting is rejected.
 */
export function parseScalar(raw: string): string {
  const value = raw.trim();
  if (value === '') {
    return '';
  }

  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return unquoteDouble(value);
  }

  if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
    return value.slice(1, -1);
  }

  if (value.startsWith("'") || value.startsWith('"') || value.endsWith("'") || value.endsWith('"')) {
    throw new Error('unterminated quoted string');
  }

  return value;
}

/** Unescape a double-quoted literal, quotes included. */
export function unquoteDouble(quoted: string): string {
  if (quoted.length < 2 || !quoted.startsWith('"') || !quoted.endsWith('"')) {
    throw new Error('invalid syntax');
  }

  const body = quoted.slice(1, -1);
  let out = '';

  for (let i = 0; i < body.length; i++) {
    const ch = body.charAt(i);
    if (ch === '"' || ch === '\n') {
      throw new Error('invalid syntax');
    }
    if (ch !== '\\') {
      out += ch;
      continue;
    }

    const next = body.charAt(i + 1);
    if (next === '') {
      throw new Error('invalid syntax');
    }

    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      out += simple;
      i += 1;
      continue;
    }

    if (next === 'x' || next === 'u' || next === 'U') {
      const width = next === 'x' ? 2 : next === 'u' ? 4 : 8;
      const digits = body.slice(i + 2, i + 2 + width);
      if (digits.length !== width || !/^[0-9A-Fa-f]+$/.test(digits)) {
        throw new Error('invalid syntax');
      }
      const code = Number.parseInt(digits, 16);
      if (next !== 'x' && (code > 0x10ffff || (code >= 0xd800 && code <= 0xdfff))) {
        throw new Error('invalid syntax');
      }
      out += String.fromCodePoint(code);
      i += 1 + width;
      continue;
    }

    if (next >= '0' && next <= '7') {
      const digits = body.slice(i + 1, i + 4);
      if (!/^[0-7]{3}$/.test(digits)) {
        throw new Error('invalid syntax');
      }
      const code = Number.parseInt(digits, 8);
      if (code > 0xff) {
        throw new Error('invalid syntax');
      }
      out += String.fromCharCode(code);
      i += 3;
      continue;
    }

    throw new Error('invalid syntax');
  }

  return out;
}

/**
 * Split the interior of an inline list on commas outside quotes.
 * Parts are returned raw; callers scalar-parse each one.
 */
export function splitInlineList(input: string): string[] {
  const parts: string[] = [];
  let current = '';
  let inSingle = false;
  let inDouble = false;
  let escaped = false;

  for (const ch of input) {
    if (escaped) {
      current += ch;
      escaped = false;
    } else if (ch === '\\' && inDouble) {
      current += ch;
      escaped = true;
    } else if (ch === "'" && !inDouble) {
      inSingle = !inSingle;
      current += ch;
    } else if (ch === '"' && !inSingle) {
      inDouble = !inDouble;
      current += ch;
    } else if (ch === ',' && !inSingle && !inDouble) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }

  if (inSingle || inDouble) {
    throw new Error('unterminated quoted string in inline list');
  }

  parts.push(current);
  return parts;
}

/**
 * Parse an `exclude_topics` value given on the key line.
 * `[a, b]` is an inline list; anything else is a single pattern.
 */
export function parseInlineList(raw: string): string[] {
  const value = raw.trim();
  if (value === '') {
    return [];
  }

  if (!value.startsWith('[')) {
    return [parseScalar(value)];
  }

  if (!value.endsWith(']')) {
    throw new Error('inline list must end with ]');
  }

  const inner = value.slice(1, -1).trim();
  if (inner === '') {
    return [];
  }

  return splitInlineList(inner).map((part) => parseScalar(part));
}

/** Indentation width: a space counts 1, a tab counts 2. */
export function leadingIndent(line: string): number {
  let indent = 0;
  for (const ch of line) {
    if (ch === ' ') {
      indent += 1;
    } else if (ch === '\t') {
      indent += 2;
    } else {
      break;
    }
  }
  return indent;
}
