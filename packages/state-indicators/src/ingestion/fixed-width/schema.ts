/**
 * Fixed-width column schemas.
 *
 * Offsets are 0-indexed, start inclusive, end exclusive. Columns between
 * declared ranges are skipped. Offsets come from the upstream data
 * dictionary and are never inferred from data.
 */

export type ColumnKind = 'int' | 'float';

export interface ColumnSpec<Name extends string = string> {
  readonly name: Name;
  readonly start: number;
  readonly end: number;
  readonly kind: ColumnKind;
  /** Digits after an implied decimal point (float columns only) */
  readonly impliedDecimals?: number;
}

export type PersonField =
  | 'year'
  | 'sampleId'
  | 'serialId'
  | 'stateFips'
  | 'countyFips'
  | 'groupQuarterType'
  | 'personNumber'
  | 'personWeight'
  | 'hasInsurance'
  | 'educationLevel'
  | 'educationDetailed';

/**
 * Person-level microdata extract layout
 */
export const MICRODATA_COLUMNS: readonly ColumnSpec<PersonField>[] = [
  { name: 'year', start: 0, end: 4, kind: 'int' },
  { name: 'sampleId', start: 4, end: 10, kind: 'int' },
  { name: 'serialId', start: 10, end: 18, kind: 'int' },
  { name: 'stateFips', start: 54, end: 56, kind: 'int' },
  { name: 'countyFips', start: 56, end: 59, kind: 'int' },
  { name: 'groupQuarterType', start: 71, end: 72, kind: 'int' },
  { name: 'personNumber', start: 72, end: 76, kind: 'int' },
  { name: 'personWeight', start: 76, end: 86, kind: 'float', impliedDecimals: 2 },
  { name: 'hasInsurance', start: 86, end: 87, kind: 'int' },
  { name: 'educationLevel', start: 87, end: 89, kind: 'int' },
  { name: 'educationDetailed', start: 89, end: 92, kind: 'int' },
];

/**
 * Line length needed to carry every column of a schema
 */
export function schemaWidth(columns: readonly ColumnSpec[]): number {
  return columns.reduce((max, col) => Math.max(max, col.end), 0);
}

/**
 * Reject overlapping, inverted or negative ranges
 *
 * @throws Error on an invalid schema
 */
export function assertValidSchema(columns: readonly ColumnSpec[]): void {
  const sorted = [...columns].sort((a, b) => a.start - b.start);
  const names = new Set<string>();

  for (let i = 0; i < sorted.length; i++) {
    const col = sorted[i];
    if (col.start < 0 || col.end <= col.start) {
      throw new Error(`Invalid column range for ${col.name}: [${col.start}, ${col.end})`);
    }
    if (names.has(col.name)) {
      throw new Error(`Duplicate column name: ${col.name}`);
    }
    names.add(col.name);

    const prev = sorted[i - 1];
    if (prev && prev.end > col.start) {
      throw new Error(`Columns ${prev.name} and ${col.name} overlap`);
    }
  }
}
