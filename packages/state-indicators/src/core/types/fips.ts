/**
 * FIPS Code Mappings and Utilities
 *
 * Single source of truth for US state FIPS code → name conversions.
 * Covers the 50 states + DC. Territories and multi-state aggregate codes
 * are absent and resolve to null.
 *
 * Source: US Census Bureau FIPS codes
 * https://www.census.gov/library/reference/code-lists/ansi.html
 */

import { z } from 'zod';
import stateNamesRaw from '../../data/canonical/state-names.json' with { type: 'json' };

const StateNamesFileSchema = z.object({
  meta: z.object({
    source: z.string(),
    description: z.string(),
  }),
  states: z.record(z.string().regex(/^\d{2}$/), z.string().min(1)),
});

/**
 * State FIPS code → State name mapping, keyed by 2-digit code ('06')
 */
export const STATE_FIPS_TO_NAME: Readonly<Record<string, string>> =
  StateNamesFileSchema.parse(stateNamesRaw).states;

/**
 * Format a numeric state code as its 2-digit FIPS string
 *
 * @example
 * formatStateFips(6) // '06'
 * formatStateFips(48) // '48'
 */
export function formatStateFips(code: number): string {
  return String(code).padStart(2, '0');
}

/**
 * Get state name from a numeric state code
 *
 * @example
 * getStateNameFromCode(6) // 'California'
 * getStateNameFromCode(72) // null (Puerto Rico is not in the table)
 * getStateNameFromCode(99) // null
 */
export function getStateNameFromCode(code: number): string | null {
  if (!Number.isInteger(code) || code < 0) return null;
  return STATE_FIPS_TO_NAME[formatStateFips(code)] ?? null;
}
