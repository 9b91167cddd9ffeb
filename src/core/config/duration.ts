/** Milliseconds per duration unit. */
const UNIT_MS: ReadonlyMap<string, number> = new Map([
  ['ns', 1e-6],
  ['us', 1e-3],
  ['µs', 1e-3],
  ['μs', 1e-3],
  ['ms', 1],
  ['s', 1000],
  ['m', 60_000],
  ['h', 3_600_000],
]);

const TERM_PATTERN = /^(\d*)(?:\.(\d*))?([^\d.]*)/;

/**
 * Parse a duration such as `30s`, `1m30s`, `1.5h` or `250ms` into milliseconds.
 * A bare `0` is accepted; every other term needs a unit.
 */
export function parseDuration(input: string): number {
  let rest = input;
  let sign = 1;

  if (rest.startsWith('-') || rest.startsWith('+')) {
    sign = rest.startsWith('-') ? -1 : 1;
    rest = rest.slice(1);
  }

  if (rest === '0') {
    return 0;
  }
  if (rest === '') {
    throw new Error(`invalid duration "${input}"`);
  }

  let total = 0;
  while (rest !== '') {
    const match = TERM_PATTERN.exec(rest);
    if (match === null) {
      throw new Error(`invalid duration "${input}"`);
    }

    const whole = match[1] ?? '';
    const fraction = match[2] ?? '';
    const unitText = match[3] ?? '';
    if (whole === '' && fraction === '') {
      throw new Error(`invalid duration "${input}"`);
    }

    if (unitText === '') {
      throw new Error(`missing unit in duration "${input}"`);
    }
    const factor = UNIT_MS.get(unitText);
    if (factor === undefined) {
      throw new Error(`unknown unit "${unitText}" in duration "${input}"`);
    }

    const magnitude = Number(`${whole === '' ? '0' : whole}.${fraction === '' ? '0' : fraction}`);
    total += magnitude * factor;
    rest = rest.slice(match[0].length);
  }

  return sign * total;
}
