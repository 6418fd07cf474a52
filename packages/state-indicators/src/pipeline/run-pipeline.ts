/**
 * Reconciliation Pipeline
 *
 * One pass over the inputs with a strategy choice:
 * - `describe`: microdata only, per-state education and insurance summary
 * - `health-join`: microdata joined with county homicide rates
 *
 * FLOW (health-join):
 *   county table → FIPS validation → ratio-of-sums per state ─┐
 *   fixed-width lines → PersonRecord → GQ filter → means ─────┴→ join → format
 *
 * Microdata is streamed through the accumulator; at no point is the person
 * table held in memory.
 *
 * @module pipeline/run-pipeline
 */

import {
  aggregateHomicideRates,
  MicrodataStateAccumulator,
  type HealthAggregationStats,
  type MicrodataAggregation,
  type MicrodataAggregationStats,
} from '../aggregation/state-aggregator.js';
import type { StateDescriptiveRow, StateSummaryRow } from '../core/types/records.js';
import { silentLogger, type Logger } from '../core/utils/logger.js';
import {
  parseCountyHealthText,
  readCountyHealthTable,
  type CountyHealthReadOptions,
  type CountyHealthReadStats,
  type CountyHealthTable,
} from '../ingestion/county-health/reader.js';
import {
  FixedWidthRecordReader,
  readPersonRecords,
  type FixedWidthParseStats,
} from '../ingestion/fixed-width/reader.js';
import { MICRODATA_COLUMNS } from '../ingestion/fixed-width/schema.js';
import {
  formatDescriptiveTable,
  formatSummaryTable,
  unresolvedStateCodes,
} from '../output/summary-table.js';
import { joinStateAggregates, type StateJoinResult } from '../reconciliation/state-join.js';

// ============================================================================
// Types
// ============================================================================

export type PipelineStrategy = 'describe' | 'health-join';

/** A file path, or lines already in memory */
export type MicrodataSource = string | AsyncIterable<string> | Iterable<string>;

/** A file path, or decoded table text */
export type HealthSource = { readonly path: string } | { readonly text: string };

interface BaseRequest {
  readonly microdata: MicrodataSource;
  readonly decimals?: number;
  readonly logger?: Logger;
}

export interface DescribeRequest extends BaseRequest {
  readonly strategy: 'describe';
}

export interface HealthJoinRequest extends BaseRequest {
  readonly strategy: 'health-join';
  readonly health: HealthSource;
  readonly healthOptions?: CountyHealthReadOptions;
}

export type PipelineRequest = DescribeRequest | HealthJoinRequest;

export interface MicrodataDiagnostics {
  readonly parse: FixedWidthParseStats;
  readonly aggregation: MicrodataAggregationStats;
  readonly states: number;
}

export interface HealthDiagnostics {
  readonly read: CountyHealthReadStats;
  readonly aggregation: HealthAggregationStats;
  readonly states: number;
}

export type JoinDiagnostics = Omit<StateJoinResult, 'rows'>;

export interface DescribeResult {
  readonly strategy: 'describe';
  readonly rows: readonly StateDescriptiveRow[];
  readonly diagnostics: {
    readonly microdata: MicrodataDiagnostics;
    readonly unresolvedStateCodes: readonly number[];
  };
}

export interface HealthJoinResult {
  readonly strategy: 'health-join';
  readonly rows: readonly StateSummaryRow[];
  readonly diagnostics: {
    readonly microdata: MicrodataDiagnostics;
    readonly health: HealthDiagnostics;
    readonly join: JoinDiagnostics;
    readonly unresolvedStateCodes: readonly number[];
  };
}

export type PipelineResult = DescribeResult | HealthJoinResult;

// ============================================================================
// Stages
// ============================================================================

async function aggregateMicrodataSource(
  source: MicrodataSource,
  log: Logger
): Promise<{ aggregation: MicrodataAggregation; diagnostics: MicrodataDiagnostics }> {
  const reader = new FixedWidthRecordReader(MICRODATA_COLUMNS);
  const accumulator = new MicrodataStateAccumulator();

  for await (const record of readPersonRecords(source, reader)) {
    accumulator.add(record);
  }

  const aggregation = accumulator.result();
  const diagnostics: MicrodataDiagnostics = {
    parse: reader.stats,
    aggregation: aggregation.stats,
    states: aggregation.states.size,
  };

  log.info('Microdata aggregated', {
    linesRead: diagnostics.parse.linesRead,
    excludedGroupQuarters: diagnostics.aggregation.excludedGroupQuarters,
    invalidStateKeys: diagnostics.aggregation.invalidStateKeys,
    personsAggregated: diagnostics.aggregation.personsAggregated,
    states: diagnostics.states,
  });
  if (diagnostics.parse.malformedLines > 0 || diagnostics.parse.truncatedLines > 0) {
    log.warn('Microdata lines with missing fields', {
      truncatedLines: diagnostics.parse.truncatedLines,
      malformedLines: diagnostics.parse.malformedLines,
      malformedByField: diagnostics.parse.malformedByField,
    });
  }

  return { aggregation, diagnostics };
}

async function loadHealthTable(
  source: HealthSource,
  options: CountyHealthReadOptions | undefined
): Promise<CountyHealthTable> {
  return 'path' in source
    ? readCountyHealthTable(source.path, options)
    : parseCountyHealthText(source.text, options);
}

function warnUnresolved(codes: readonly number[], log: Logger): void {
  if (codes.length > 0) {
    log.warn('State codes without a name', { stateCodes: codes });
  }
}

// ============================================================================
// Strategies
// ============================================================================

/**
 * Microdata-only descriptive summary
 */
export async function runDescribe(request: DescribeRequest): Promise<DescribeResult> {
  const log = request.logger ?? silentLogger;

  const { aggregation, diagnostics } = await aggregateMicrodataSource(request.microdata, log);
  const rows = formatDescriptiveTable(aggregation.states.values(), { decimals: request.decimals });
  const unresolved = unresolvedStateCodes(rows);
  warnUnresolved(unresolved, log);

  return {
    strategy: 'describe',
    rows,
    diagnostics: { microdata: diagnostics, unresolvedStateCodes: unresolved },
  };
}

/**
 * Education, insurance and homicide-rate summary per state
 */
export async function runHealthJoin(request: HealthJoinRequest): Promise<HealthJoinResult> {
  const log = request.logger ?? silentLogger;

  const table = await loadHealthTable(request.health, request.healthOptions);
  const health = aggregateHomicideRates(table.records);
  const healthDiagnostics: HealthDiagnostics = {
    read: table.stats,
    aggregation: health.stats,
    states: health.states.size,
  };

  log.info('County health table aggregated', {
    rowsRead: table.stats.rowsRead,
    invalidFips: table.stats.invalidFipsTotal,
    countiesUsed: health.stats.countiesUsed,
    countiesWithoutRate: health.stats.countiesWithoutRate,
    states: health.states.size,
  });
  if (table.stats.invalidFipsTotal > 0) {
    log.warn('County rows dropped for invalid FIPS', { byReason: table.stats.invalidFips });
  }

  const micro = await aggregateMicrodataSource(request.microdata, log);
  const joined = joinStateAggregates(micro.aggregation.states, health.states, log);
  const rows = formatSummaryTable(joined.rows, { decimals: request.decimals });
  const unresolved = unresolvedStateCodes(rows);
  warnUnresolved(unresolved, log);

  const join: JoinDiagnostics = {
    strategy: joined.strategy,
    degraded: joined.degraded,
    innerMatches: joined.innerMatches,
    missingHomicideStates: joined.missingHomicideStates,
    unmatchedMicrodataStates: joined.unmatchedMicrodataStates,
    unmatchedHealthStates: joined.unmatchedHealthStates,
  };
  log.info('Summary table ready', {
    rows: rows.length,
    strategy: join.strategy,
    missingHomicideStates: join.missingHomicideStates.length,
  });

  return {
    strategy: 'health-join',
    rows,
    diagnostics: {
      microdata: micro.diagnostics,
      health: healthDiagnostics,
      join,
      unresolvedStateCodes: unresolved,
    },
  };
}

/**
 * Run the pipeline with the strategy named in the request
 */
export async function runPipeline(request: PipelineRequest): Promise<PipelineResult> {
  switch (request.strategy) {
    case 'describe':
      return runDescribe(request);
    case 'health-join':
      return runHealthJoin(request);
  }
}
