/**
 * State Aggregation
 *
 * Two strategies, both grouped by integer `stateFips`:
 *
 * 1. Unweighted mean (microdata): mean education level and share of insured
 *    persons. Every person counts once. The person weight is decoded by the
 *    reader but NOT applied here; weighted estimates differ materially and
 *    are not what this summary reports.
 *
 * 2. Population-weighted ratio (county health table):
 *      rate = Σ homicides / Σ population × 100,000
 *    A mean of county rates would over-weight small counties and is never used.
 *
 * @module aggregation/state-aggregator
 */

import {
  EDUCATION_MISSING,
  HOUSEHOLD_GROUP_QUARTERS,
  INSURANCE_CODES,
  type CountyHealthRecord,
  type HealthStateAggregate,
  type MicrodataStateAggregate,
  type PersonRecord,
} from '../core/types/records.js';
import { InvalidKeyCounter, normalizeMicrodataState } from '../normalization/geo-keys.js';

// ============================================================================
// Microdata: unweighted means
// ============================================================================

interface StateTally {
  persons: number;
  insured: number;
  educationSum: number;
  educationCount: number;
}

export interface MicrodataAggregationStats {
  readonly recordsSeen: number;
  /** Dropped because group quarters type is not household population */
  readonly excludedGroupQuarters: number;
  readonly invalidStateKeys: number;
  readonly invalidStateKeysByReason: Readonly<Record<string, number>>;
  readonly personsAggregated: number;
  /** Persons counted for insurance whose education level was missing */
  readonly missingEducation: number;
}

export interface MicrodataAggregation {
  /** Keyed by stateFips, iteration order ascending by state code */
  readonly states: ReadonlyMap<number, MicrodataStateAggregate>;
  readonly stats: MicrodataAggregationStats;
}

/**
 * Whether a record belongs to the household / non-institutional population
 */
export function isHouseholdPopulation(record: PersonRecord): boolean {
  return record.groupQuarterType !== null && HOUSEHOLD_GROUP_QUARTERS.has(record.groupQuarterType);
}

function hasReportedEducation(level: number | null): level is number {
  return level !== null && level !== EDUCATION_MISSING && level >= 0 && level <= 11;
}

/**
 * Streaming accumulator: O(states) memory regardless of record count
 */
export class MicrodataStateAccumulator {
  private readonly tallies = new Map<number, StateTally>();
  private readonly invalidKeys = new InvalidKeyCounter();
  private recordsSeen = 0;
  private excludedGroupQuarters = 0;
  private personsAggregated = 0;
  private missingEducation = 0;

  add(record: PersonRecord): void {
    this.recordsSeen += 1;

    if (!isHouseholdPopulation(record)) {
      this.excludedGroupQuarters += 1;
      return;
    }

    const key = normalizeMicrodataState(record.stateFips);
    if (!key.ok) {
      this.invalidKeys.record(key.reason);
      return;
    }

    let tally = this.tallies.get(key.stateFips);
    if (!tally) {
      tally = { persons: 0, insured: 0, educationSum: 0, educationCount: 0 };
      this.tallies.set(key.stateFips, tally);
    }

    tally.persons += 1;
    if (record.hasInsurance === INSURANCE_CODES.yes) tally.insured += 1;
    if (hasReportedEducation(record.educationLevel)) {
      tally.educationSum += record.educationLevel;
      tally.educationCount += 1;
    } else {
      this.missingEducation += 1;
    }
    this.personsAggregated += 1;
  }

  result(): MicrodataAggregation {
    const states = new Map<number, MicrodataStateAggregate>();
    const codes = [...this.tallies.keys()].sort((a, b) => a - b);

    for (const stateFips of codes) {
      const tally = this.tallies.get(stateFips);
      if (!tally) continue;
      states.set(stateFips, {
        stateFips,
        educationMean: tally.educationCount > 0 ? tally.educationSum / tally.educationCount : null,
        insuredRate: tally.insured / tally.persons,
        personCount: tally.persons,
      });
    }

    return {
      states,
      stats: {
        recordsSeen: this.recordsSeen,
        excludedGroupQuarters: this.excludedGroupQuarters,
        invalidStateKeys: this.invalidKeys.total,
        invalidStateKeysByReason: this.invalidKeys.toJSON(),
        personsAggregated: this.personsAggregated,
        missingEducation: this.missingEducation,
      },
    };
  }
}

/**
 * Aggregate a (possibly lazy) sequence of person records by state
 */
export async function aggregateMicrodata(
  records: AsyncIterable<PersonRecord> | Iterable<PersonRecord>
): Promise<MicrodataAggregation> {
  const accumulator = new MicrodataStateAccumulator();
  for await (const record of records) {
    accumulator.add(record);
  }
  return accumulator.result();
}

// ============================================================================
// County health: ratio of sums
// ============================================================================

export interface HealthAggregationStats {
  readonly countiesSeen: number;
  /** Missing homicides or population, or population <= 0 */
  readonly countiesWithoutRate: number;
  readonly countiesUsed: number;
}

export interface HealthAggregation {
  /** Keyed by stateFips, iteration order ascending by state code */
  readonly states: ReadonlyMap<number, HealthStateAggregate>;
  readonly stats: HealthAggregationStats;
}

/**
 * Population-weighted homicide rate per state
 */
export function aggregateHomicideRates(counties: Iterable<CountyHealthRecord>): HealthAggregation {
  const sums = new Map<number, { homicides: number; population: number; counties: number }>();
  let countiesSeen = 0;
  let countiesWithoutRate = 0;

  for (const county of counties) {
    countiesSeen += 1;
    const { homicideCount, population } = county;
    if (homicideCount === null || population === null || population <= 0) {
      countiesWithoutRate += 1;
      continue;
    }

    const entry = sums.get(county.stateFips) ?? { homicides: 0, population: 0, counties: 0 };
    entry.homicides += homicideCount;
    entry.population += population;
    entry.counties += 1;
    sums.set(county.stateFips, entry);
  }

  const states = new Map<number, HealthStateAggregate>();
  for (const stateFips of [...sums.keys()].sort((a, b) => a - b)) {
    const entry = sums.get(stateFips);
    if (!entry) continue;
    states.set(stateFips, {
      stateFips,
      homicides: entry.homicides,
      population: entry.population,
      countyCount: entry.counties,
      homicideRatePer100k:
        entry.population > 0 ? (entry.homicides / entry.population) * 100_000 : null,
    });
  }

  return {
    states,
    stats: {
      countiesSeen,
      countiesWithoutRate,
      countiesUsed: countiesSeen - countiesWithoutRate,
    },
  };
}
