/**
 * Explicit parse-or-null conversions.
 *
 * Failure is a return variant, never an exception: one corrupt value must
 * not abort a batch. Callers that only want the value use `valueOrNull`.
 */

export type ParseResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly reason: 'missing' | 'malformed'; readonly raw: string };

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

function missing(raw: string): ParseResult<never> {
  return { ok: false, reason: 'missing', raw };
}

function malformed(raw: string): ParseResult<never> {
  return { ok: false, reason: 'malformed', raw };
}

/**
 * Parse a base-10 integer. Blank input is `missing`, anything else that is
 * not an optionally signed run of digits is `malformed`.
 */
export function parseIntegerField(raw: string | null | undefined): ParseResult<number> {
  const s = (raw ?? '').trim();
  if (!s) return missing(raw ?? '');
  if (!INTEGER_PATTERN.test(s)) return malformed(raw ?? '');

  const n = Number.parseInt(s, 10);
  if (!Number.isSafeInteger(n)) return malformed(raw ?? '');
  return { ok: true, value: n };
}

/**
 * Parse a decimal number (plain or exponent notation).
 *
 * `impliedDecimals` shifts the decimal point left, for fixed-width fields
 * that store "0000012345" meaning 123.45.
 */
export function parseDecimalField(
  raw: string | null | undefined,
  impliedDecimals = 0
): ParseResult<number> {
  const s = (raw ?? '').trim();
  if (!s) return missing(raw ?? '');
  if (!DECIMAL_PATTERN.test(s)) return malformed(raw ?? '');

  const n = Number(s);
  if (!Number.isFinite(n)) return malformed(raw ?? '');
  return { ok: true, value: impliedDecimals > 0 ? n / 10 ** impliedDecimals : n };
}

/**
 * Parse a count or size that must not be negative
 */
export function parseNonNegativeField(raw: string | null | undefined): ParseResult<number> {
  const parsed = parseDecimalField(raw);
  if (parsed.ok && parsed.value < 0) return malformed(raw ?? '');
  return parsed;
}

export function valueOrNull<T>(result: ParseResult<T>): T | null {
  return result.ok ? result.value : null;
}
