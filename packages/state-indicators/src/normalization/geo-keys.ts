/**
 * Geographic Key Normalization
 *
 * The two inputs encode geography differently:
 * - microdata carries the state as a 2-digit positional integer
 * - the health table carries a 5-digit county FIPS identifier whose leading
 *   zero may have been lost when it was stored as a number
 *
 * Both normalize to an integer `stateFips`. Keys that fail validation drop
 * their record before aggregation.
 *
 * @module normalization/geo-keys
 */

export type InvalidKeyReason = 'missing' | 'length' | 'non-numeric' | 'out-of-range';

export type CountyFipsResult =
  | {
      readonly ok: true;
      /** Exactly 5 decimal digits */
      readonly fips: string;
      readonly stateFips: number;
      readonly countyFips: number;
    }
  | { readonly ok: false; readonly reason: InvalidKeyReason; readonly raw: string };

export type StateKeyResult =
  | { readonly ok: true; readonly stateFips: number }
  | { readonly ok: false; readonly reason: InvalidKeyReason };

const COUNTY_FIPS_WIDTH = 5;
const DIGITS_ONLY = /^\d+$/;

/**
 * Normalize a county FIPS identifier.
 *
 * Numeric identifiers are stringified and left-padded with zeros to width 5
 * (6037 → "06037"). String identifiers must already be exactly 5 decimal
 * digits after trimming: "6037" is rejected rather than guessed at.
 *
 * @example
 * normalizeCountyFips('06037') // { ok: true, fips: '06037', stateFips: 6, countyFips: 37 }
 * normalizeCountyFips(6037)    // { ok: true, fips: '06037', ... }
 * normalizeCountyFips('6037')  // { ok: false, reason: 'length', raw: '6037' }
 * normalizeCountyFips('ABCDE') // { ok: false, reason: 'non-numeric', raw: 'ABCDE' }
 */
export function normalizeCountyFips(raw: string | number | null | undefined): CountyFipsResult {
  if (raw === null || raw === undefined) {
    return { ok: false, reason: 'missing', raw: '' };
  }

  let candidate: string;
  if (typeof raw === 'number') {
    if (!Number.isSafeInteger(raw) || raw < 0) {
      return { ok: false, reason: 'non-numeric', raw: String(raw) };
    }
    candidate = String(raw).padStart(COUNTY_FIPS_WIDTH, '0');
  } else {
    candidate = raw.trim();
    if (candidate === '') return { ok: false, reason: 'missing', raw };
  }

  if (candidate.length !== COUNTY_FIPS_WIDTH) {
    return { ok: false, reason: 'length', raw: String(raw) };
  }
  if (!DIGITS_ONLY.test(candidate)) {
    return { ok: false, reason: 'non-numeric', raw: String(raw) };
  }

  return {
    ok: true,
    fips: candidate,
    stateFips: Number.parseInt(candidate.slice(0, 2), 10),
    countyFips: Number.parseInt(candidate.slice(2), 10),
  };
}

/**
 * Accept the microdata state code as read from its positional field.
 *
 * There is no check against a list of known states: unknown codes pass here
 * and only fail to resolve to a name at formatting time.
 */
export function normalizeMicrodataState(value: number | null): StateKeyResult {
  if (value === null) return { ok: false, reason: 'missing' };
  if (!Number.isInteger(value) || value < 1 || value > 99) {
    return { ok: false, reason: 'out-of-range' };
  }
  return { ok: true, stateFips: value };
}

/**
 * Tally of rejected keys by reason
 */
export class InvalidKeyCounter {
  private readonly counts = new Map<InvalidKeyReason, number>();

  record(reason: InvalidKeyReason): void {
    this.counts.set(reason, (this.counts.get(reason) ?? 0) + 1);
  }

  get total(): number {
    let sum = 0;
    for (const n of this.counts.values()) sum += n;
    return sum;
  }

  toJSON(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }
}
