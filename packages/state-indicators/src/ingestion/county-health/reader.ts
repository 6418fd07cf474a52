/**
 * County Health Table Reader
 *
 * Loads the delimited county-level health-indicator table. Required columns
 * are reached through an explicit column map (logical field → header text)
 * checked once against the header row, never by ad-hoc string lookups per row.
 *
 * ENCODING: Source files carry non-UTF-8 Latin-1 bytes in their headers, so
 * the default decoding is `latin1`, which cannot fail on any byte sequence.
 *
 * @module ingestion/county-health/reader
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { MissingColumnError, SourceUnavailableError } from '../../core/errors.js';
import type { CountyHealthRecord } from '../../core/types/records.js';
import { parseDecimalField, parseNonNegativeField, valueOrNull } from '../../core/utils/parse.js';
import { InvalidKeyCounter, normalizeCountyFips } from '../../normalization/geo-keys.js';

// ============================================================================
// Schema
// ============================================================================

export const HealthColumnMapSchema = z.object({
  fips: z.string().min(1),
  homicides: z.string().min(1),
  population: z.string().min(1),
});

/**
 * Logical field → header text in the source file
 */
export type HealthColumnMap = z.infer<typeof HealthColumnMapSchema>;

export const DEFAULT_HEALTH_COLUMNS: HealthColumnMap = {
  fips: 'FIPS',
  homicides: '# Homicides',
  population: 'Population',
};

export type TextEncoding = 'latin1' | 'utf8';

export interface CountyHealthReadOptions {
  readonly columns?: HealthColumnMap;
  readonly delimiter?: string;
  readonly encoding?: TextEncoding;
  /**
   * Treat the FIPS column as numeric, restoring leading zeros lost by
   * spreadsheet exports ("6037" → "06037")
   */
  readonly fipsAsNumber?: boolean;
}

export interface CountyHealthReadStats {
  readonly rowsRead: number;
  readonly invalidFipsTotal: number;
  readonly invalidFips: Readonly<Record<string, number>>;
  /** Homicide or population cells present but not a non-negative number */
  readonly malformedValues: number;
}

export interface CountyHealthTable {
  readonly records: readonly CountyHealthRecord[];
  readonly stats: CountyHealthReadStats;
}

const CsvRowsSchema = z.array(z.array(z.string()));

// ============================================================================
// Derivations
// ============================================================================

/**
 * Per-county homicide rate per 100,000 residents.
 *
 * Null unless both values are known and population is positive.
 */
export function countyHomicideRate(
  homicides: number | null,
  population: number | null
): number | null {
  if (homicides === null || population === null || population <= 0) return null;
  return (homicides / population) * 100_000;
}

// ============================================================================
// Parsing
// ============================================================================

type ColumnIndexes = Record<keyof HealthColumnMap, number>;

const HEALTH_FIELDS = ['fips', 'homicides', 'population'] as const satisfies readonly (keyof HealthColumnMap)[];

function resolveColumns(header: readonly string[], columns: HealthColumnMap): ColumnIndexes {
  const find = (name: string): number => {
    const exact = header.indexOf(name);
    if (exact !== -1) return exact;
    const lower = name.toLowerCase();
    return header.findIndex((h) => h.toLowerCase() === lower);
  };

  const indexes: ColumnIndexes = {
    fips: find(columns.fips),
    homicides: find(columns.homicides),
    population: find(columns.population),
  };

  const missing = HEALTH_FIELDS
    .filter((field) => indexes[field] === -1)
    .map((field) => ({ field, header: columns[field] }));

  if (missing.length > 0) {
    throw new MissingColumnError(missing, header);
  }
  return indexes;
}

function fipsCellValue(cell: string, fipsAsNumber: boolean): string | number {
  if (!fipsAsNumber) return cell;
  const parsed = parseDecimalField(cell);
  return parsed.ok && Number.isInteger(parsed.value) ? parsed.value : cell;
}

/**
 * Parse the decoded text of a county health table.
 *
 * Rows whose FIPS identifier fails validation are dropped entirely.
 *
 * @throws MissingColumnError when a required column is absent from the header
 */
export function parseCountyHealthText(
  text: string,
  options: CountyHealthReadOptions = {}
): CountyHealthTable {
  const columns = options.columns ?? DEFAULT_HEALTH_COLUMNS;

  const rows = CsvRowsSchema.parse(
    parse(text, {
      delimiter: options.delimiter ?? ',',
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true,
    })
  );

  const [header = [], ...body] = rows;
  const idx = resolveColumns(header, columns);

  const invalid = new InvalidKeyCounter();
  const records: CountyHealthRecord[] = [];
  let malformedValues = 0;

  for (const row of body) {
    const key = normalizeCountyFips(fipsCellValue(row[idx.fips] ?? '', options.fipsAsNumber ?? false));
    if (!key.ok) {
      invalid.record(key.reason);
      continue;
    }

    const homicides = parseNonNegativeField(row[idx.homicides]);
    const population = parseNonNegativeField(row[idx.population]);
    if (!homicides.ok && homicides.reason === 'malformed') malformedValues += 1;
    if (!population.ok && population.reason === 'malformed') malformedValues += 1;

    const homicideCount = valueOrNull(homicides);
    const pop = valueOrNull(population);

    records.push({
      fipsCode: key.fips,
      stateFips: key.stateFips,
      homicideCount,
      population: pop,
      homicideRatePer100k: countyHomicideRate(homicideCount, pop),
    });
  }

  return {
    records,
    stats: {
      rowsRead: body.length,
      invalidFipsTotal: invalid.total,
      invalidFips: invalid.toJSON(),
      malformedValues,
    },
  };
}

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);

/**
 * Drop a leading UTF-8 byte-order mark. Decoded as Latin-1 it would become
 * part of the first header.
 */
export function stripUtf8Bom(bytes: Buffer): Buffer {
  return bytes.subarray(0, UTF8_BOM.length).equals(UTF8_BOM) ? bytes.subarray(UTF8_BOM.length) : bytes;
}

/**
 * Read and parse a county health table from disk.
 *
 * @throws SourceUnavailableError when the file cannot be read
 * @throws MissingColumnError when a required column is absent
 */
export async function readCountyHealthTable(
  path: string,
  options: CountyHealthReadOptions = {}
): Promise<CountyHealthTable> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (error) {
    throw new SourceUnavailableError(path, error);
  }
  return parseCountyHealthText(stripUtf8Bom(bytes).toString(options.encoding ?? 'latin1'), options);
}
