/**
 * Cell tokens read as "no value". Matches the NA spellings common spreadsheet
 * and dataframe tools write into CSV exports.
 */
export const MISSING_TOKENS: ReadonlySet<string> = new Set([
  '',
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
]);

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** True when a raw cell should be treated as missing. */
export function isMissing(raw: string | null | undefined): boolean {
  if (raw === undefined || raw === null) return true;
  return MISSING_TOKENS.has(raw.trim());
}

/**
 * Parse a raw CSV cell as a finite number.
 *
 * Behavior:
 * - Surrounding whitespace is ignored.
 * - Accepts integers, decimals and exponent notation (`1`, `-2.5`, `.5`, `1e3`).
 * - Rejects hex, thousands separators, `Infinity` and anything `Number()` would
 *   coerce loosely (e.g. `''` or `'0x10'`).
 * - Returns `null` when the cell is not numeric.
 *
 * Examples:
 * ```ts
 * parseNumber(' 42 ')  // => 42
 * parseNumber('1e-3')  // => 0.001
 * parseNumber('1,000') // => null
 * ```
 */
export function parseNumber(raw: string): number | null {
  const trimmed = raw.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

/**
 * Coerce an already-typed cell to a finite number, or `null`.
 * Used by the lenient coordinate readers, which skip rather than fail.
 */
export function toFiniteNumber(value: number | string | Date | null): number | null {
  if (value === null) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') return parseNumber(value);
  return null;
}

/** Arithmetic mean of the non-null values, or `null` when there are none. */
export function mean(values: ReadonlyArray<number | null>): number | null {
  let sum = 0;
  let count = 0;
  for (const v of values) {
    if (v === null) continue;
    sum += v;
    count++;
  }
  return count === 0 ? null : sum / count;
}
