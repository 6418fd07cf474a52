/**
 * Pipeline Tests
 *
 * End to end over in-memory sources: decode → filter → aggregate → join → format.
 */

import { describe, it, expect } from 'vitest';
import { runDescribe, runHealthJoin, runPipeline } from '../../../pipeline/run-pipeline.js';
import { microdataLine, person } from '../../fixtures/microdata.js';

const MICRODATA = [
  person(1, 2, 8),
  person(1, 1, 4),
  person(6, 2, 10),
  person(6, 2, 10),
  microdataLine({ stateFips: 72, hasInsurance: 1, educationLevel: 5 }),
  microdataLine({ stateFips: 6, groupQuarterType: 3, educationLevel: 0 }),
];

const HEALTH = [
  'FIPS,# Homicides,Population',
  '01001,10,100000',
  '01003,1,1000000',
  '06037,600,10000000',
  '72001,5,25000',
  '6075,40,870000',
].join('\n');

describe('runHealthJoin', () => {
  it('produces the sorted, rounded, named summary', async () => {
    const result = await runHealthJoin({
      strategy: 'health-join',
      microdata: MICRODATA,
      health: { text: HEALTH },
    });

    expect(result.rows).toEqual([
      { stateFips: 6, stateName: 'California', educationMean: 10, insuredRate: 1, homicideRatePer100k: 6 },
      { stateFips: 1, stateName: 'Alabama', educationMean: 6, insuredRate: 0.5, homicideRatePer100k: 1 },
      { stateFips: 72, stateName: null, educationMean: 5, insuredRate: 0, homicideRatePer100k: 20 },
    ]);
  });

  it('reports what was read, dropped and joined', async () => {
    const { diagnostics } = await runHealthJoin({
      strategy: 'health-join',
      microdata: MICRODATA,
      health: { text: HEALTH },
    });

    expect(diagnostics.microdata.parse.linesRead).toBe(6);
    expect(diagnostics.microdata.aggregation.excludedGroupQuarters).toBe(1);
    expect(diagnostics.microdata.states).toBe(3);
    expect(diagnostics.health.read.invalidFips).toEqual({ length: 1 });
    expect(diagnostics.health.aggregation.countiesUsed).toBe(4);
    expect(diagnostics.join.strategy).toBe('inner');
    expect(diagnostics.join.degraded).toBe(false);
    expect(diagnostics.unresolvedStateCodes).toEqual([72]);
  });

  it('degrades to a left join when no state matches', async () => {
    const result = await runHealthJoin({
      strategy: 'health-join',
      microdata: MICRODATA,
      health: { text: 'FIPS,# Homicides,Population\n09001,3,100000\n' },
    });

    expect(result.diagnostics.join.degraded).toBe(true);
    expect(result.diagnostics.join.missingHomicideStates).toEqual([1, 6, 72]);
    expect(result.rows.map((r) => r.homicideRatePer100k)).toEqual([null, null, null]);
  });

  it('passes read options to the county table', async () => {
    const result = await runHealthJoin({
      strategy: 'health-join',
      microdata: [person(6, 2, 7)],
      health: { text: 'code|deaths|people\n6037|600|10000000\n' },
      healthOptions: {
        delimiter: '|',
        fipsAsNumber: true,
        columns: { fips: 'code', homicides: 'deaths', population: 'people' },
      },
    });

    expect(result.rows).toEqual([
      { stateFips: 6, stateName: 'California', educationMean: 7, insuredRate: 1, homicideRatePer100k: 6 },
    ]);
  });
});

describe('runDescribe', () => {
  it('summarizes microdata alone', async () => {
    const result = await runDescribe({ strategy: 'describe', microdata: MICRODATA, decimals: 2 });

    expect(result.rows).toEqual([
      { stateFips: 6, stateName: 'California', educationMean: 10, insuredRate: 1, personCount: 2 },
      { stateFips: 1, stateName: 'Alabama', educationMean: 6, insuredRate: 0.5, personCount: 2 },
      { stateFips: 72, stateName: null, educationMean: 5, insuredRate: 0, personCount: 1 },
    ]);
    expect(result.diagnostics.unresolvedStateCodes).toEqual([72]);
  });
});

describe('runPipeline', () => {
  it('dispatches on strategy', async () => {
    const result = await runPipeline({ strategy: 'describe', microdata: [] });

    expect(result.strategy).toBe('describe');
    expect(result.rows).toEqual([]);
  });
});
