/**
 * Single-level glob matching: `*` matches any run of non-`/` characters,
 * `?` one non-`/` character, `[...]` a character class with ranges and `^`
 * negation, and `\` escapes the next character.
 */

type GlobToken =
  | { readonly kind: 'literal'; readonly char: string }
  | { readonly kind: 'any' }
  | { readonly kind: 'star' }
  | { readonly kind: 'class'; readonly negated: boolean; readonly ranges: readonly (readonly [number, number])[] };

/** Thrown when a glob pattern is malformed. */
export class GlobSyntaxError extends Error {
  constructor(detail: string) {
    super(`syntax error in pattern: ${detail}`);
    this.name = 'GlobSyntaxError';
  }
}

/** Compile a pattern into tokens, throwing {@link GlobSyntaxError} when malformed. */
export function compileGlob(pattern: string): readonly GlobToken[] {
  const chars = Array.from(pattern);
  const tokens: GlobToken[] = [];

  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i];
    switch (ch) {
      case '*':
        tokens.push({ kind: 'star' });
        break;
      case '?':
        tokens.push({ kind: 'any' });
        break;
      case '\\': {
        const next = chars[i + 1];
        if (next === undefined) {
          throw new GlobSyntaxError('trailing backslash');
        }
        tokens.push({ kind: 'literal', char: next });
        i += 1;
        break;
      }
      case '[': {
        const parsed = parseClass(chars, i + 1);
        tokens.push(parsed.token);
        i = parsed.end;
        break;
      }
      default:
        tokens.push({ kind: 'literal', char: ch ?? '' });
    }
  }

  return tokens;
}

/** Match a name against a pattern. Malformed patterns throw. */
export function globMatch(pattern: string, name: string): boolean {
  return matchTokens(compileGlob(pattern), Array.from(name));
}

interface ParsedClass {
  readonly token: GlobToken;
  /** Index of the closing `]`. */
  readonly end: number;
}

function parseClass(chars: readonly string[], start: number): ParsedClass {
  let i = start;
  let negated = false;
  if (chars[i] === '^') {
    negated = true;
    i += 1;
  }

  const ranges: (readonly [number, number])[] = [];
  for (;;) {
    const ch = chars[i];
    if (ch === undefined) {
      throw new GlobSyntaxError('unterminated character class');
    }
    if (ch === ']' && ranges.length > 0) {
      return { token: { kind: 'class', negated, ranges }, end: i };
    }

    const lo = classChar(chars, i);
    i = lo.next;
    let hi = lo.code;
    if (chars[i] === '-') {
      const upper = classChar(chars, i + 1);
      hi = upper.code;
      i = upper.next;
      if (hi < lo.code) {
        throw new GlobSyntaxError('character range out of order');
      }
    }
    ranges.push([lo.code, hi]);
  }
}

function classChar(chars: readonly string[], at: number): { readonly code: number; readonly next: number } {
  let ch = chars[at];
  let next = at + 1;
  if (ch === undefined || ch === '-' || ch === ']') {
    throw new GlobSyntaxError('bad character class');
  }
  if (ch === '\\') {
    ch = chars[at + 1];
    next = at + 2;
    if (ch === undefined) {
      throw new GlobSyntaxError('trailing backslash');
    }
  }
  return { code: ch.codePointAt(0) ?? 0, next };
}

function matchesSingle(token: GlobToken, ch: string): boolean {
  switch (token.kind) {
    case 'literal':
      return token.char === ch;
    case 'any':
      return ch !== '/';
    case 'class': {
      const code = ch.codePointAt(0) ?? 0;
      const inRange = token.ranges.some(([lo, hi]) => code >= lo && code <= hi);
      return inRange !== token.negated;
    }
    case 'star':
      return false;
  }
}

function matchTokens(tokens: readonly GlobToken[], chars: readonly string[]): boolean {
  let ti = 0;
  let ci = 0;
  let starTi = -1;
  let starCi = -1;

  while (ci < chars.length) {
    const token = tokens[ti];
    const ch = chars[ci] ?? '';
    if (token !== undefined && token.kind === 'star') {
      starTi = ti;
      starCi = ci;
      ti += 1;
      continue;
    }
    if (token !== undefined && matchesSingle(token, ch)) {
      ti += 1;
      ci += 1;
      continue;
    }
    // Let the last star absorb one more character, unless it is a separator.
    if (starTi >= 0 && chars[starCi] !== '/') {
      starCi += 1;
      ci = starCi;
      ti = starTi + 1;
      continue;
    }
    return false;
  }

  while (tokens[ti]?.kind === 'star') {
    ti += 1;
  }
  return ti === tokens.length;
}
