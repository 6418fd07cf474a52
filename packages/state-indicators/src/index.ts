/**
 * State Indicators - State-level summaries from census microdata and
 * county health tables
 *
 * state-indicators provides:
 * - Streaming fixed-width microdata decoding (plain or gzip)
 * - County FIPS and microdata state-key normalization
 * - Per-state unweighted means and ratio-of-sums homicide rates
 * - Inner join with automatic left-join degradation
 * - Sorted, rounded, state-named summary tables (CSV)
 *
 * @packageDocumentation
 */

// Errors
export {
    StateIndicatorsError,
    SourceUnavailableError,
    MissingColumnError,
    ConfigError,
    type StateIndicatorsErrorCode,
} from './core/errors.js';

// Records and state codes
export {
    INSURANCE_CODES,
    EDUCATION_MISSING,
    HOUSEHOLD_GROUP_QUARTERS,
    type InsuranceCode,
    type PersonRecord,
    type CountyHealthRecord,
    type MicrodataStateAggregate,
    type HealthStateAggregate,
    type JoinedStateRow,
    type StateSummaryRow,
    type StateDescriptiveRow,
} from './core/types/records.js';
export { STATE_FIPS_TO_NAME, formatStateFips, getStateNameFromCode } from './core/types/fips.js';

// Field parsing
export {
    parseIntegerField,
    parseDecimalField,
    parseNonNegativeField,
    valueOrNull,
    type ParseResult,
} from './core/utils/parse.js';

// Logging
export { Logger, logger, createLogger, silentLogger, type LogLevel, type LogMetadata } from './core/utils/logger.js';

// Fixed-width microdata
export {
    MICRODATA_COLUMNS,
    assertValidSchema,
    schemaWidth,
    type ColumnKind,
    type ColumnSpec,
    type PersonField,
} from './ingestion/fixed-width/schema.js';
export {
    FixedWidthRecordReader,
    decodeFixedWidthLine,
    readFixedWidthLines,
    readPersonRecords,
    sliceColumn,
    toPersonRecord,
    type DecodedLine,
    type FixedWidthParseStats,
} from './ingestion/fixed-width/reader.js';

// County health table
export {
    DEFAULT_HEALTH_COLUMNS,
    HealthColumnMapSchema,
    countyHomicideRate,
    parseCountyHealthText,
    readCountyHealthTable,
    type HealthColumnMap,
    type TextEncoding,
    type CountyHealthReadOptions,
    type CountyHealthReadStats,
    type CountyHealthTable,
} from './ingestion/county-health/reader.js';

// Key normalization
export {
    normalizeCountyFips,
    normalizeMicrodataState,
    InvalidKeyCounter,
    type InvalidKeyReason,
    type CountyFipsResult,
    type StateKeyResult,
} from './normalization/geo-keys.js';

// Aggregation
export {
    MicrodataStateAccumulator,
    aggregateMicrodata,
    aggregateHomicideRates,
    isHouseholdPopulation,
    type MicrodataAggregation,
    type MicrodataAggregationStats,
    type HealthAggregation,
    type HealthAggregationStats,
} from './aggregation/state-aggregator.js';

// Join
export { joinStateAggregates, type JoinStrategy, type StateJoinResult } from './reconciliation/state-join.js';

// Output
export {
    DEFAULT_DECIMALS,
    SUMMARY_HEADER,
    DESCRIPTIVE_HEADER,
    formatSummaryTable,
    formatDescriptiveTable,
    parseSummaryCsv,
    roundTo,
    sortByEducation,
    toDescriptiveCsv,
    toSummaryCsv,
    unresolvedStateCodes,
    type SummaryFormatOptions,
    type SummaryTableRecord,
} from './output/summary-table.js';
export { formatCsv, formatTable, type TableColumn } from './output/tabular.js';

// Pipeline
export {
    runPipeline,
    runDescribe,
    runHealthJoin,
    type PipelineStrategy,
    type PipelineRequest,
    type PipelineResult,
    type DescribeRequest,
    type DescribeResult,
    type HealthJoinRequest,
    type HealthJoinResult,
    type MicrodataSource,
    type HealthSource,
} from './pipeline/run-pipeline.js';
