/**
 * Record and aggregate types shared across the reconciliation pipeline.
 *
 * Person-level microdata and county-level health data never reference each
 * other directly. They meet only through `stateFips` after each side has
 * been aggregated on its own.
 */

/**
 * Health insurance coverage codes as published in the microdata extract
 */
export const INSURANCE_CODES = {
  unknown: 0,
  no: 1,
  yes: 2,
} as const;

export type InsuranceCode = (typeof INSURANCE_CODES)[keyof typeof INSURANCE_CODES];

/**
 * Education level value meaning "not reported"
 */
export const EDUCATION_MISSING = 99;

/**
 * Group quarters codes counted as household / non-institutional population
 */
export const HOUSEHOLD_GROUP_QUARTERS: ReadonlySet<number> = new Set([1, 2, 5]);

/**
 * One decoded microdata line. Every field is null when it was blank,
 * truncated, or not numeric.
 */
export interface PersonRecord {
  readonly year: number | null;
  readonly sampleId: number | null;
  readonly serialId: number | null;
  readonly stateFips: number | null;
  readonly countyFips: number | null;
  readonly groupQuarterType: number | null;
  readonly personNumber: number | null;
  /** Decoded but not applied to any statistic */
  readonly personWeight: number | null;
  readonly hasInsurance: number | null;
  /** Ordinal 0-11, or 99 when missing */
  readonly educationLevel: number | null;
  readonly educationDetailed: number | null;
}

/**
 * One validated county row from the health-indicator table
 */
export interface CountyHealthRecord {
  /** Exactly 5 decimal digits, zero-padded */
  readonly fipsCode: string;
  /** First two digits of fipsCode */
  readonly stateFips: number;
  readonly homicideCount: number | null;
  readonly population: number | null;
  /** Null unless population > 0 and homicideCount is known */
  readonly homicideRatePer100k: number | null;
}

/**
 * Per-state aggregate of the microdata (unweighted)
 */
export interface MicrodataStateAggregate {
  readonly stateFips: number;
  /** Null when no record in the state reported an education level */
  readonly educationMean: number | null;
  /** Fraction in [0, 1] */
  readonly insuredRate: number;
  readonly personCount: number;
}

/**
 * Per-state aggregate of the county health table (ratio of sums)
 */
export interface HealthStateAggregate {
  readonly stateFips: number;
  readonly homicides: number;
  readonly population: number;
  readonly countyCount: number;
  readonly homicideRatePer100k: number | null;
}

/**
 * Joined per-state row, before formatting
 */
export interface JoinedStateRow {
  readonly stateFips: number;
  readonly educationMean: number | null;
  readonly insuredRate: number;
  readonly homicideRatePer100k: number | null;
}

/**
 * Final output row of the health-join summary
 */
export interface StateSummaryRow {
  readonly stateFips: number;
  readonly stateName: string | null;
  readonly educationMean: number | null;
  readonly insuredRate: number;
  readonly homicideRatePer100k: number | null;
}

/**
 * Final output row of the microdata-only descriptive summary
 */
export interface StateDescriptiveRow {
  readonly stateFips: number;
  readonly stateName: string | null;
  readonly educationMean: number | null;
  readonly insuredRate: number;
  readonly personCount: number;
}
