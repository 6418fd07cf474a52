/**
 * Fixed-Width Record Reader
 *
 * Streams positional records out of a plain or gzip-compressed text file and
 * decodes each line against a column schema.
 *
 * DECODING RULES:
 * - A column whose end offset lies past the end of the line is truncated and
 *   becomes null. Later columns are still read at their own offsets, so a
 *   short line never shifts values into the wrong fields.
 * - Blank columns become null.
 * - Non-numeric content becomes null and is counted as malformed.
 *
 * Files are decoded as Latin-1, which maps every byte to one character:
 * string offsets equal byte offsets.
 *
 * @module ingestion/fixed-width/reader
 */

import { createReadStream } from 'node:fs';
import { open } from 'node:fs/promises';
import type { Readable } from 'node:stream';
import { createGunzip } from 'node:zlib';
import { SourceUnavailableError } from '../../core/errors.js';
import type { PersonRecord } from '../../core/types/records.js';
import { parseDecimalField, parseIntegerField, type ParseResult } from '../../core/utils/parse.js';
import {
  assertValidSchema,
  MICRODATA_COLUMNS,
  type ColumnSpec,
  type PersonField,
} from './schema.js';

// ============================================================================
// Types
// ============================================================================

export interface DecodedLine<Name extends string> {
  readonly values: ReadonlyMap<Name, number | null>;
  /** Columns cut off by a short line */
  readonly truncated: readonly Name[];
  /** Columns present but not parseable as their declared kind */
  readonly malformed: readonly Name[];
}

export interface FixedWidthParseStats {
  readonly linesRead: number;
  readonly truncatedLines: number;
  readonly malformedLines: number;
  /** Malformed value count per column name */
  readonly malformedByField: Readonly<Record<string, number>>;
}

// ============================================================================
// Line decoding
// ============================================================================

/**
 * Slice one column out of a line. Null when the line ends before the column does.
 */
export function sliceColumn(line: string, column: ColumnSpec): string | null {
  if (line.length < column.end) return null;
  return line.slice(column.start, column.end);
}

function parseColumn(raw: string, column: ColumnSpec): ParseResult<number> {
  return column.kind === 'int'
    ? parseIntegerField(raw)
    : parseDecimalField(raw, column.impliedDecimals ?? 0);
}

/**
 * Decode one line against a schema without touching any statistics
 */
export function decodeFixedWidthLine<Name extends string>(
  line: string,
  columns: readonly ColumnSpec<Name>[]
): DecodedLine<Name> {
  const values = new Map<Name, number | null>();
  const truncated: Name[] = [];
  const malformed: Name[] = [];

  for (const column of columns) {
    const raw = sliceColumn(line, column);
    if (raw === null) {
      truncated.push(column.name);
      values.set(column.name, null);
      continue;
    }

    const parsed = parseColumn(raw, column);
    if (parsed.ok) {
      values.set(column.name, parsed.value);
    } else {
      if (parsed.reason === 'malformed') malformed.push(column.name);
      values.set(column.name, null);
    }
  }

  return { values, truncated, malformed };
}

// ============================================================================
// Reader
// ============================================================================

/**
 * Stateful reader: decodes lines and keeps running parse statistics
 */
export class FixedWidthRecordReader<Name extends string> {
  private readonly columns: readonly ColumnSpec<Name>[];
  private linesRead = 0;
  private truncatedLines = 0;
  private malformedLines = 0;
  private readonly malformedByField = new Map<Name, number>();

  constructor(columns: readonly ColumnSpec<Name>[]) {
    assertValidSchema(columns);
    this.columns = columns;
  }

  decode(line: string): DecodedLine<Name> {
    const decoded = decodeFixedWidthLine(line, this.columns);

    this.linesRead += 1;
    if (decoded.truncated.length > 0) this.truncatedLines += 1;
    if (decoded.malformed.length > 0) this.malformedLines += 1;
    for (const name of decoded.malformed) {
      this.malformedByField.set(name, (this.malformedByField.get(name) ?? 0) + 1);
    }

    return decoded;
  }

  /**
   * Lazily decode a sequence of lines. Blank lines are skipped.
   */
  async *rows(lines: AsyncIterable<string> | Iterable<string>): AsyncGenerator<DecodedLine<Name>> {
    for await (const line of lines) {
      if (line.trim() === '') continue;
      yield this.decode(line);
    }
  }

  get stats(): FixedWidthParseStats {
    return {
      linesRead: this.linesRead,
      truncatedLines: this.truncatedLines,
      malformedLines: this.malformedLines,
      malformedByField: Object.fromEntries(this.malformedByField),
    };
  }
}

// ============================================================================
// File access
// ============================================================================

const GZIP_MAGIC = [0x1f, 0x8b] as const;

/**
 * True when the file starts with the gzip magic bytes, whatever its name
 */
export async function isGzipFile(path: string): Promise<boolean> {
  const handle = await open(path, 'r');
  try {
    const { bytesRead, buffer } = await handle.read({ buffer: Buffer.alloc(2), position: 0 });
    return bytesRead === GZIP_MAGIC.length && GZIP_MAGIC.every((byte, i) => buffer[i] === byte);
  } finally {
    await handle.close();
  }
}

/**
 * Stream the lines of a fixed-width file. Gzip content is detected by its
 * magic bytes and decompressed on the fly.
 *
 * The file handle is released on every outcome, including early exit by the
 * consumer.
 *
 * @throws SourceUnavailableError when the file cannot be opened, read or decompressed
 */
export async function* readFixedWidthLines(path: string): AsyncGenerator<string> {
  let compressed: boolean;
  try {
    compressed = await isGzipFile(path);
  } catch (error) {
    throw new SourceUnavailableError(path, error);
  }

  const source = createReadStream(path);
  const input: Readable = compressed ? source.pipe(createGunzip()) : source;
  if (input !== source) {
    // pipe() does not forward errors from the file stream
    source.on('error', (err) => input.destroy(err));
  }
  input.setEncoding('latin1');

  let pending = '';
  try {
    for await (const chunk of input) {
      pending += String(chunk);
      const lines = pending.split('\n');
      pending = lines.pop() ?? '';
      for (const line of lines) {
        yield line.endsWith('\r') ? line.slice(0, -1) : line;
      }
    }
  } catch (error) {
    throw new SourceUnavailableError(path, error);
  } finally {
    input.destroy();
    source.destroy();
  }

  if (pending.length > 0) {
    yield pending.endsWith('\r') ? pending.slice(0, -1) : pending;
  }
}

/**
 * Map a decoded microdata line to a PersonRecord
 */
export function toPersonRecord(decoded: DecodedLine<PersonField>): PersonRecord {
  const get = (name: PersonField): number | null => decoded.values.get(name) ?? null;
  return {
    year: get('year'),
    sampleId: get('sampleId'),
    serialId: get('serialId'),
    stateFips: get('stateFips'),
    countyFips: get('countyFips'),
    groupQuarterType: get('groupQuarterType'),
    personNumber: get('personNumber'),
    personWeight: get('personWeight'),
    hasInsurance: get('hasInsurance'),
    educationLevel: get('educationLevel'),
    educationDetailed: get('educationDetailed'),
  };
}

/**
 * Lazily read PersonRecords from a microdata file or an in-memory line source.
 *
 * Pass a reader to inspect parse statistics once the sequence is consumed.
 */
export async function* readPersonRecords(
  source: string | AsyncIterable<string> | Iterable<string>,
  reader: FixedWidthRecordReader<PersonField> = new FixedWidthRecordReader(MICRODATA_COLUMNS)
): AsyncGenerator<PersonRecord> {
  const lines = typeof source === 'string' ? readFixedWidthLines(source) : source;
  for await (const decoded of reader.rows(lines)) {
    yield toPersonRecord(decoded);
  }
}
