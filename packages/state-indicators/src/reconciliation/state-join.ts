/**
 * State Aggregate Join
 *
 * Combines the microdata and health aggregates on `stateFips`.
 *
 * STRATEGY:
 * - Inner join first: only states present on both sides survive.
 * - If no inner-joined row carries a homicide rate, the join has collapsed
 *   (typically a key-encoding mismatch between the sources). It is re-run as
 *   a left join with the microdata side authoritative. Rates stay null where
 *   the health side has nothing; no value is ever filled in.
 *
 * @module reconciliation/state-join
 */

import type {
  HealthStateAggregate,
  JoinedStateRow,
  MicrodataStateAggregate,
} from '../core/types/records.js';
import { silentLogger, type Logger } from '../core/utils/logger.js';

export type JoinStrategy = 'inner' | 'left';

export interface StateJoinResult {
  /** Ascending by state code */
  readonly rows: readonly JoinedStateRow[];
  readonly strategy: JoinStrategy;
  /** True when the inner join collapsed and the left join was used */
  readonly degraded: boolean;
  /** Inner-join rows that carried a homicide rate */
  readonly innerMatches: number;
  /** Output states whose homicide rate is null */
  readonly missingHomicideStates: readonly number[];
  /** Microdata states with no health aggregate */
  readonly unmatchedMicrodataStates: readonly number[];
  /** Health states with no microdata aggregate */
  readonly unmatchedHealthStates: readonly number[];
}

function toRow(
  micro: MicrodataStateAggregate,
  health: HealthStateAggregate | undefined
): JoinedStateRow {
  return {
    stateFips: micro.stateFips,
    educationMean: micro.educationMean,
    insuredRate: micro.insuredRate,
    homicideRatePer100k: health?.homicideRatePer100k ?? null,
  };
}

const ascending = (a: number, b: number): number => a - b;

/**
 * Join per-state aggregates, degrading to a left join when the inner join
 * yields no homicide data.
 */
export function joinStateAggregates(
  microdata: ReadonlyMap<number, MicrodataStateAggregate>,
  health: ReadonlyMap<number, HealthStateAggregate>,
  log: Logger = silentLogger
): StateJoinResult {
  const microCodes = [...microdata.keys()].sort(ascending);
  const unmatchedMicrodataStates = microCodes.filter((code) => !health.has(code));
  const unmatchedHealthStates = [...health.keys()]
    .filter((code) => !microdata.has(code))
    .sort(ascending);

  const inner: JoinedStateRow[] = [];
  for (const code of microCodes) {
    const micro = microdata.get(code);
    const h = health.get(code);
    if (micro && h) inner.push(toRow(micro, h));
  }

  const innerMatches = inner.filter((row) => row.homicideRatePer100k !== null).length;

  let rows: JoinedStateRow[];
  let strategy: JoinStrategy;
  if (innerMatches > 0) {
    rows = inner;
    strategy = 'inner';
  } else {
    rows = [];
    for (const code of microCodes) {
      const micro = microdata.get(code);
      if (micro) rows.push(toRow(micro, health.get(code)));
    }
    strategy = 'left';
  }

  const missingHomicideStates = rows
    .filter((row) => row.homicideRatePer100k === null)
    .map((row) => row.stateFips);

  const degraded = strategy === 'left';
  if (degraded) {
    log.warn('Inner join produced no homicide data; fell back to left join', {
      microdataStates: microCodes.length,
      healthStates: health.size,
      missingHomicideStates: missingHomicideStates.length,
      sampleMicrodataKeys: microCodes.slice(0, 5),
      sampleHealthKeys: [...health.keys()].sort(ascending).slice(0, 5),
    });
  } else if (unmatchedMicrodataStates.length > 0 || unmatchedHealthStates.length > 0) {
    log.info('States dropped by inner join', {
      unmatchedMicrodataStates,
      unmatchedHealthStates,
    });
  }

  return {
    rows,
    strategy,
    degraded,
    innerMatches,
    missingHomicideStates,
    unmatchedMicrodataStates,
    unmatchedHealthStates,
  };
}
