import { describe, it, expect, vi } from 'vitest';
import type { HealthStateAggregate, MicrodataStateAggregate } from '../../../core/types/records.js';
import { Logger } from '../../../core/utils/logger.js';
import { joinStateAggregates } from '../../../reconciliation/state-join.js';

function micro(stateFips: number, educationMean: number | null = 6): MicrodataStateAggregate {
  return { stateFips, educationMean, insuredRate: 0.9, personCount: 10 };
}

function health(stateFips: number, homicideRatePer100k: number | null = 5): HealthStateAggregate {
  return { stateFips, homicides: 5, population: 100_000, countyCount: 1, homicideRatePer100k };
}

const byCode = <T extends { stateFips: number }>(items: T[]): Map<number, T> =>
  new Map(items.map((item) => [item.stateFips, item]));

describe('joinStateAggregates', () => {
  it('inner-joins on state code', () => {
    const result = joinStateAggregates(
      byCode([micro(6), micro(1), micro(36)]),
      byCode([health(1, 4.2), health(6, 5.5), health(48)])
    );

    expect(result.strategy).toBe('inner');
    expect(result.degraded).toBe(false);
    expect(result.innerMatches).toBe(2);
    expect(result.rows).toEqual([
      { stateFips: 1, educationMean: 6, insuredRate: 0.9, homicideRatePer100k: 4.2 },
      { stateFips: 6, educationMean: 6, insuredRate: 0.9, homicideRatePer100k: 5.5 },
    ]);
    expect(result.unmatchedMicrodataStates).toEqual([36]);
    expect(result.unmatchedHealthStates).toEqual([48]);
    expect(result.missingHomicideStates).toEqual([]);
  });

  it('falls back to a left join when the key sets are disjoint', () => {
    const result = joinStateAggregates(
      byCode([micro(1), micro(2), micro(3)]),
      byCode([health(9), health(10), health(11)])
    );

    expect(result.strategy).toBe('left');
    expect(result.degraded).toBe(true);
    expect(result.rows).toHaveLength(3);
    expect(result.rows.map((r) => r.homicideRatePer100k)).toEqual([null, null, null]);
    expect(result.missingHomicideStates).toEqual([1, 2, 3]);
    expect(result.unmatchedHealthStates).toEqual([9, 10, 11]);
  });

  it('falls back when matched states carry no rate', () => {
    const result = joinStateAggregates(byCode([micro(4), micro(5)]), byCode([health(5, null)]));

    expect(result.strategy).toBe('left');
    expect(result.innerMatches).toBe(0);
    expect(result.rows.map((r) => r.stateFips)).toEqual([4, 5]);
  });

  it('warns when it degrades', () => {
    const log = new Logger({ level: 'warn', service: 'test', pretty: true });
    const warn = vi.spyOn(log, 'warn').mockImplementation(() => undefined);

    joinStateAggregates(byCode([micro(1)]), byCode([health(2)]), log);

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe('Inner join produced no homicide data; fell back to left join');
  });
});
