/**
 * Summary Table Formatting
 *
 * Turns joined per-state rows into the published table:
 * - state code → full name (50 states + DC; anything else stays null and the
 *   row is still emitted)
 * - floats rounded to a fixed number of decimals (default 4)
 * - sorted by rounded education mean, descending; equal values keep their
 *   ascending state-code order; null means sort last
 *
 * @module output/summary-table
 */

import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { getStateNameFromCode } from '../core/types/fips.js';
import type {
  JoinedStateRow,
  MicrodataStateAggregate,
  StateDescriptiveRow,
  StateSummaryRow,
} from '../core/types/records.js';
import { parseDecimalField, valueOrNull } from '../core/utils/parse.js';
import { formatCsv, type TableColumn } from './tabular.js';

export const DEFAULT_DECIMALS = 4;

export const SUMMARY_HEADER = ['state', 'education', 'insured_rate', 'homicides'] as const;
export const DESCRIPTIVE_HEADER = ['state', 'education', 'insured_rate', 'persons'] as const;

export interface SummaryFormatOptions {
  readonly decimals?: number;
  readonly resolveName?: (stateFips: number) => string | null;
}

/**
 * A summary row as stored on disk (the state code is not persisted)
 */
export type SummaryTableRecord = Omit<StateSummaryRow, 'stateFips'>;

// ============================================================================
// Rounding and ordering
// ============================================================================

export function roundTo(value: number, decimals: number): number {
  return Number(value.toFixed(decimals));
}

function roundNullable(value: number | null, decimals: number): number | null {
  return value === null ? null : roundTo(value, decimals);
}

function compareEducationDesc(a: number | null, b: number | null): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return b - a;
}

/**
 * Stable sort by education mean, descending. Input order breaks ties.
 */
export function sortByEducation<Row extends { readonly educationMean: number | null }>(
  rows: readonly Row[]
): Row[] {
  return [...rows].sort((a, b) => compareEducationDesc(a.educationMean, b.educationMean));
}

const byStateCode = <Row extends { readonly stateFips: number }>(rows: Iterable<Row>): Row[] =>
  [...rows].sort((a, b) => a.stateFips - b.stateFips);

// ============================================================================
// Formatting
// ============================================================================

/**
 * Round, name and order joined rows
 */
export function formatSummaryTable(
  rows: Iterable<JoinedStateRow>,
  options: SummaryFormatOptions = {}
): StateSummaryRow[] {
  const decimals = options.decimals ?? DEFAULT_DECIMALS;
  const resolveName = options.resolveName ?? getStateNameFromCode;

  const formatted = byStateCode(rows).map(
    (row): StateSummaryRow => ({
      stateFips: row.stateFips,
      stateName: resolveName(row.stateFips),
      educationMean: roundNullable(row.educationMean, decimals),
      insuredRate: roundTo(row.insuredRate, decimals),
      homicideRatePer100k: roundNullable(row.homicideRatePer100k, decimals),
    })
  );

  return sortByEducation(formatted);
}

/**
 * Round, name and order the microdata-only aggregates
 */
export function formatDescriptiveTable(
  aggregates: Iterable<MicrodataStateAggregate>,
  options: SummaryFormatOptions = {}
): StateDescriptiveRow[] {
  const decimals = options.decimals ?? DEFAULT_DECIMALS;
  const resolveName = options.resolveName ?? getStateNameFromCode;

  const formatted = byStateCode(aggregates).map(
    (agg): StateDescriptiveRow => ({
      stateFips: agg.stateFips,
      stateName: resolveName(agg.stateFips),
      educationMean: roundNullable(agg.educationMean, decimals),
      insuredRate: roundTo(agg.insuredRate, decimals),
      personCount: agg.personCount,
    })
  );

  return sortByEducation(formatted);
}

/**
 * State codes that did not resolve to a name
 */
export function unresolvedStateCodes(
  rows: readonly { readonly stateFips: number; readonly stateName: string | null }[]
): number[] {
  return rows.filter((row) => row.stateName === null).map((row) => row.stateFips);
}

// ============================================================================
// CSV
// ============================================================================

export const SUMMARY_COLUMNS: readonly TableColumn<SummaryTableRecord>[] = [
  { header: SUMMARY_HEADER[0], value: (r) => r.stateName },
  { header: SUMMARY_HEADER[1], value: (r) => r.educationMean, align: 'right' },
  { header: SUMMARY_HEADER[2], value: (r) => r.insuredRate, align: 'right' },
  { header: SUMMARY_HEADER[3], value: (r) => r.homicideRatePer100k, align: 'right' },
];

export const DESCRIPTIVE_COLUMNS: readonly TableColumn<StateDescriptiveRow>[] = [
  { header: DESCRIPTIVE_HEADER[0], value: (r) => r.stateName },
  { header: DESCRIPTIVE_HEADER[1], value: (r) => r.educationMean, align: 'right' },
  { header: DESCRIPTIVE_HEADER[2], value: (r) => r.insuredRate, align: 'right' },
  { header: DESCRIPTIVE_HEADER[3], value: (r) => r.personCount, align: 'right' },
];

export function toSummaryCsv(rows: readonly SummaryTableRecord[]): string {
  return formatCsv(rows, SUMMARY_COLUMNS);
}

export function toDescriptiveCsv(rows: readonly StateDescriptiveRow[]): string {
  return formatCsv(rows, DESCRIPTIVE_COLUMNS);
}

const numberOrNull = (raw: string): number | null => valueOrNull(parseDecimalField(raw));

const SummaryCsvRowSchema = z.object({
  state: z.string(),
  education: z.string(),
  insured_rate: z.string().transform((raw, ctx) => {
    const value = numberOrNull(raw);
    if (value === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `insured_rate is not a number: "${raw}"` });
      return z.NEVER;
    }
    return value;
  }),
  homicides: z.string(),
});

/**
 * Read a summary table written by `toSummaryCsv`
 *
 * @throws ZodError when a row lacks a numeric insured rate
 */
export function parseSummaryCsv(text: string): SummaryTableRecord[] {
  const records = z
    .array(SummaryCsvRowSchema)
    .parse(parse(text, { columns: true, skip_empty_lines: true }));

  return records.map((r) => ({
    stateName: r.state === '' ? null : r.state,
    educationMean: numberOrNull(r.education),
    insuredRate: r.insured_rate,
    homicideRatePer100k: numberOrNull(r.homicides),
  }));
}
