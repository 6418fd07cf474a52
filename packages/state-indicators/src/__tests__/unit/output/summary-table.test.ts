/**
 * Summary Table Formatting Tests
 *
 * - names for the 50 states + DC, null otherwise
 * - rounding, then a stable sort on the rounded education value
 * - CSV layout and read-back
 */

import { describe, it, expect } from 'vitest';
import type { JoinedStateRow } from '../../../core/types/records.js';
import { getStateNameFromCode, STATE_FIPS_TO_NAME } from '../../../core/types/fips.js';
import {
  formatDescriptiveTable,
  formatSummaryTable,
  parseSummaryCsv,
  roundTo,
  sortByEducation,
  toDescriptiveCsv,
  toSummaryCsv,
  unresolvedStateCodes,
} from '../../../output/summary-table.js';

const JOINED: JoinedStateRow[] = [
  { stateFips: 72, educationMean: 4, insuredRate: 0.7, homicideRatePer100k: 1 },
  { stateFips: 2, educationMean: 5.12344, insuredRate: 0.9, homicideRatePer100k: null },
  { stateFips: 99, educationMean: null, insuredRate: 0.25, homicideRatePer100k: null },
  { stateFips: 4, educationMean: 6, insuredRate: 0.5, homicideRatePer100k: 2.25 },
  { stateFips: 1, educationMean: 5.12341, insuredRate: 0.81234, homicideRatePer100k: 3.45678 },
];

describe('state names', () => {
  it('covers the 50 states and DC', () => {
    expect(Object.keys(STATE_FIPS_TO_NAME)).toHaveLength(51);
    expect(getStateNameFromCode(6)).toBe('California');
    expect(getStateNameFromCode(11)).toBe('District of Columbia');
  });

  it('returns null for territories and aggregate codes', () => {
    expect(getStateNameFromCode(72)).toBeNull();
    expect(getStateNameFromCode(99)).toBeNull();
  });
});

describe('roundTo', () => {
  it('rounds to the requested places', () => {
    expect(roundTo(3.45678, 4)).toBe(3.4568);
    expect(roundTo(0.81234, 2)).toBe(0.81);
  });
});

describe('formatSummaryTable', () => {
  it('sorts by rounded education descending, ties by state code, nulls last', () => {
    const rows = formatSummaryTable(JOINED);

    expect(rows.map((r) => r.stateFips)).toEqual([4, 1, 2, 72, 99]);
  });

  it('rounds floats to 4 places and resolves names', () => {
    const rows = formatSummaryTable(JOINED);

    expect(rows[1]).toEqual({
      stateFips: 1,
      stateName: 'Alabama',
      educationMean: 5.1234,
      insuredRate: 0.8123,
      homicideRatePer100k: 3.4568,
    });
    expect(rows[2].educationMean).toBe(5.1234);
  });

  it('keeps rows whose state code has no name', () => {
    const rows = formatSummaryTable(JOINED);

    expect(unresolvedStateCodes(rows)).toEqual([72, 99]);
    expect(rows[3].stateName).toBeNull();
  });

  it('honors a custom decimal count', () => {
    const rows = formatSummaryTable(JOINED, { decimals: 1 });

    expect(rows.map((r) => r.educationMean)).toEqual([6, 5.1, 5.1, 4, null]);
  });
});

describe('summary CSV', () => {
  it('writes the header, the rows and empty cells for nulls', () => {
    const csv = toSummaryCsv(formatSummaryTable(JOINED));

    expect(csv).toBe(
      [
        'state,education,insured_rate,homicides',
        'Arizona,6,0.5,2.25',
        'Alabama,5.1234,0.8123,3.4568',
        'Alaska,5.1234,0.9,',
        ',4,0.7,1',
        ',,0.25,',
        '',
      ].join('\n')
    );
  });

  it('reads back into rows that are already in sorted order', () => {
    const parsed = parseSummaryCsv(toSummaryCsv(formatSummaryTable(JOINED)));

    expect(parsed[0]).toEqual({
      stateName: 'Arizona',
      educationMean: 6,
      insuredRate: 0.5,
      homicideRatePer100k: 2.25,
    });
    expect(parsed[4]).toEqual({
      stateName: null,
      educationMean: null,
      insuredRate: 0.25,
      homicideRatePer100k: null,
    });
    expect(sortByEducation(parsed)).toEqual(parsed);
  });

  it('rejects a row without a numeric insured rate', () => {
    const header = 'state,education,insured_rate,homicides';

    expect(() => parseSummaryCsv(`${header}\nAlabama,6,,10\n`)).toThrow(
      'insured_rate is not a number: \\"\\"'
    );
    expect(() => parseSummaryCsv(`${header}\nAlabama,6,n/a,10\n`)).toThrow(
      'insured_rate is not a number: \\"n/a\\"'
    );
  });
});

describe('descriptive table', () => {
  it('rounds and names microdata aggregates', () => {
    const rows = formatDescriptiveTable(
      [{ stateFips: 6, educationMean: 7.123456, insuredRate: 0.333333, personCount: 3 }],
      { decimals: 2 }
    );

    expect(rows).toEqual([
      { stateFips: 6, stateName: 'California', educationMean: 7.12, insuredRate: 0.33, personCount: 3 },
    ]);
    expect(toDescriptiveCsv(rows)).toBe('state,education,insured_rate,persons\nCalifornia,7.12,0.33,3\n');
  });
});
