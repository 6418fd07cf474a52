/**
 * County Health Table Reader Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MissingColumnError, SourceUnavailableError } from '../../../core/errors.js';
import {
  countyHomicideRate,
  parseCountyHealthText,
  readCountyHealthTable,
} from '../../../ingestion/county-health/reader.js';

const TABLE = [
  'FIPS,State,County,# Homicides,Population',
  '06037,California,Los Angeles,600,10000000',
  '06001,California,Alameda,,1600000',
  '6075,California,San Francisco,40,870000',
  'ABCDE,Nowhere,Nowhere,1,100',
  '48201,Texas,Harris,-5,4700000',
].join('\n');

describe('countyHomicideRate', () => {
  it('is per 100,000 residents', () => {
    expect(countyHomicideRate(10, 100_000)).toBeCloseTo(10, 10);
  });

  it('is null without a positive population', () => {
    expect(countyHomicideRate(3, 0)).toBeNull();
    expect(countyHomicideRate(null, 1000)).toBeNull();
  });
});

describe('parseCountyHealthText', () => {
  it('keeps rows with valid FIPS and drops the rest', () => {
    const table = parseCountyHealthText(TABLE);

    expect(table.records.map((r) => r.fipsCode)).toEqual(['06037', '06001', '48201']);
    expect(table.stats).toEqual({
      rowsRead: 5,
      invalidFipsTotal: 2,
      invalidFips: { length: 1, 'non-numeric': 1 },
      malformedValues: 1,
    });
  });

  it('derives state codes and county rates', () => {
    const [la, alameda, harris] = parseCountyHealthText(TABLE).records;

    expect(la.stateFips).toBe(6);
    expect(la.homicideRatePer100k).toBeCloseTo(6, 10);
    expect(alameda.homicideCount).toBeNull();
    expect(alameda.homicideRatePer100k).toBeNull();
    expect(harris.stateFips).toBe(48);
    expect(harris.homicideCount).toBeNull();
  });

  it('restores leading zeros when FIPS is read as a number', () => {
    const table = parseCountyHealthText(TABLE, { fipsAsNumber: true });

    expect(table.records.map((r) => r.fipsCode)).toEqual(['06037', '06001', '06075', '48201']);
    expect(table.stats.invalidFips).toEqual({ 'non-numeric': 1 });
  });

  it('matches headers case-insensitively when there is no exact match', () => {
    const table = parseCountyHealthText('fips,# homicides,population\n01001,2,50000\n');

    expect(table.records).toHaveLength(1);
    expect(table.records[0].homicideRatePer100k).toBeCloseTo(4, 10);
  });

  it('uses a custom column map and delimiter', () => {
    const table = parseCountyHealthText('code;deaths;residents\n36061;30;1500000\n', {
      delimiter: ';',
      columns: { fips: 'code', homicides: 'deaths', population: 'residents' },
    });

    expect(table.records[0]).toMatchObject({
      fipsCode: '36061',
      stateFips: 36,
      homicideCount: 30,
      population: 1500000,
    });
    expect(table.records[0].homicideRatePer100k).toBeCloseTo(2, 10);
  });

  it('lists every missing column', () => {
    const run = (): unknown => parseCountyHealthText('FIPS,Deaths,Residents\n01001,1,100\n');

    expect(run).toThrow(MissingColumnError);
    expect(run).toThrow(
      'Required column(s) not found: homicides ("# Homicides"), population ("Population"). ' +
        'Available headers: FIPS, Deaths, Residents'
    );
  });
});

describe('readCountyHealthTable', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'county-health-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('decodes Latin-1 headers by default', async () => {
    const path = join(dir, 'health.csv');
    const text = 'FIPS,Homicidios,Población\n72001,5,25000\n';
    await writeFile(path, Buffer.from(text, 'latin1'));

    const table = await readCountyHealthTable(path, {
      columns: { fips: 'FIPS', homicides: 'Homicidios', population: 'Población' },
    });

    expect(table.records).toHaveLength(1);
    expect(table.records[0].homicideRatePer100k).toBeCloseTo(20, 10);
  });

  it('strips a UTF-8 byte-order mark under the default encoding', async () => {
    const path = join(dir, 'health.csv');
    const text = 'FIPS,# Homicides,Population\n01001,2,50000\n';
    await writeFile(path, Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from(text, 'utf8')]));

    const table = await readCountyHealthTable(path);

    expect(table.records.map((r) => r.fipsCode)).toEqual(['01001']);
    expect(table.records[0].homicideRatePer100k).toBeCloseTo(4, 10);
  });

  it('raises SourceUnavailableError for a missing file', async () => {
    await expect(readCountyHealthTable(join(dir, 'absent.csv'))).rejects.toBeInstanceOf(
      SourceUnavailableError
    );
  });
});
