import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { MalformedRecordError } from '../errors.js';
import {
  SNAPSHOT_COLUMNS,
  isRecordKind,
  recordKey,
  type RecordKind,
  type SnapshotColumn,
  type SnapshotRecord
} from './types.js';

const cellFor = (record: SnapshotRecord, column: SnapshotColumn): string => {
  const value = record[column];
  return value === undefined ? '' : String(value);
};

/**
 * Serialize records to snapshot CSV: header row, then one row per record in
 * SNAPSHOT_COLUMNS order, empty cells for absent optional fields.
 */
export const serialize = (records: readonly SnapshotRecord[]): string => {
  const rows = records.map(record => SNAPSHOT_COLUMNS.map(column => cellFor(record, column)));
  return stringify([[...SNAPSHOT_COLUMNS], ...rows]);
};

const isStringRow = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every(cell => typeof cell === 'string');

const parseRows = (text: string): string[][] => {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true // column count is checked per row below, with row context
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedRecordError(0, '*', `unparseable CSV: ${message}`);
  }

  if (!Array.isArray(parsed) || !parsed.every(isStringRow)) {
    throw new MalformedRecordError(0, '*', 'unexpected CSV structure');
  }
  return parsed;
};

/** Which optional columns each kind may fill */
const ALLOWED_OPTIONAL: Record<RecordKind, ReadonlySet<SnapshotColumn>> = {
  Track: new Set<SnapshotColumn>(['albumName', 'durationSeconds', 'isrc']),
  Playlist: new Set<SnapshotColumn>(['albumName', 'durationSeconds', 'isrc', 'sourcePlaylistName']),
  Album: new Set<SnapshotColumn>(),
  Artist: new Set<SnapshotColumn>()
};

const REQUIRED: readonly SnapshotColumn[] = ['title', 'primaryArtistName', 'sourceEntityId'];

const parseDuration = (cell: string, row: number): number => {
  const value = Number(cell);
  if (cell.trim() !== cell || !Number.isFinite(value) || value < 0) {
    throw new MalformedRecordError(row, 'durationSeconds', `"${cell}" is not a non-negative number of seconds`);
  }
  return value;
};

const toRecord = (cells: string[], row: number): SnapshotRecord => {
  if (cells.length !== SNAPSHOT_COLUMNS.length) {
    throw new MalformedRecordError(
      row,
      '*',
      `expected ${SNAPSHOT_COLUMNS.length} columns, found ${cells.length}`
    );
  }

  const cell = (column: SnapshotColumn): string => cells[SNAPSHOT_COLUMNS.indexOf(column)];

  const kind = cell('kind');
  if (!isRecordKind(kind)) {
    throw new MalformedRecordError(row, 'kind', `unknown kind "${kind}"`);
  }

  for (const column of REQUIRED) {
    if (cell(column) === '') {
      throw new MalformedRecordError(row, column, 'required value is missing');
    }
  }

  if (kind === 'Playlist' && cell('sourcePlaylistName') === '') {
    throw new MalformedRecordError(row, 'sourcePlaylistName', 'required for Playlist rows');
  }

  const allowed = ALLOWED_OPTIONAL[kind];
  for (const column of ['albumName', 'durationSeconds', 'isrc', 'sourcePlaylistName'] as const) {
    if (cell(column) !== '' && !allowed.has(column)) {
      throw new MalformedRecordError(row, column, `not allowed on ${kind} rows`);
    }
  }

  const optional = (column: SnapshotColumn): string | undefined => {
    const value = cell(column);
    return value === '' ? undefined : value;
  };

  const duration = optional('durationSeconds');

  return {
    kind,
    title: cell('title'),
    primaryArtistName: cell('primaryArtistName'),
    albumName: optional('albumName'),
    durationSeconds: duration === undefined ? undefined : parseDuration(duration, row),
    isrc: optional('isrc'),
    sourcePlaylistName: optional('sourcePlaylistName'),
    sourceEntityId: cell('sourceEntityId')
  };
};

/**
 * Parse snapshot CSV. Rows are numbered from 1 after the header; any problem
 * aborts with MalformedRecordError naming the row and column.
 */
export const deserialize = (text: string): SnapshotRecord[] => {
  const rows = parseRows(text);
  if (rows.length === 0) {
    return [];
  }

  const [header, ...body] = rows;
  SNAPSHOT_COLUMNS.forEach((column, index) => {
    if (header[index] !== column) {
      throw new MalformedRecordError(0, column, `header must be "${SNAPSHOT_COLUMNS.join(',')}"`);
    }
  });
  if (header.length !== SNAPSHOT_COLUMNS.length) {
    throw new MalformedRecordError(0, '*', `header has ${header.length} columns, expected ${SNAPSHOT_COLUMNS.length}`);
  }

  const seen = new Set<string>();
  return body.map((cells, index) => {
    const row = index + 1;
    const record = toRecord(cells, row);
    const key = recordKey(record);
    if (seen.has(key)) {
      throw new MalformedRecordError(row, 'sourceEntityId', `duplicate ${record.kind} "${record.sourceEntityId}"`);
    }
    seen.add(key);
    return record;
  });
};
