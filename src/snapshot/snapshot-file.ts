import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { logger } from '../logger.js';
import { MalformedRecordError, SnapshotReadError } from '../errors.js';
import { deserialize, serialize } from './codec.js';
import type { RecordKind, SnapshotRecord } from './types.js';

export interface ReadSnapshotOptions {
  /** Reject the file when any row is of another kind */
  expectKind?: RecordKind;
}

export const readSnapshotFile = async (
  path: string,
  options: ReadSnapshotOptions = {}
): Promise<SnapshotRecord[]> => {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new SnapshotReadError(path, error);
  }

  const records = deserialize(content);

  if (options.expectKind) {
    const index = records.findIndex(record => record.kind !== options.expectKind);
    if (index !== -1) {
      throw new MalformedRecordError(
        index + 1,
        'kind',
        `expected only ${options.expectKind} rows, found ${records[index].kind}`
      );
    }
  }

  logger.debug({ path, recordCount: records.length }, 'loaded snapshot file');
  return records;
};

export const writeSnapshotFile = async (path: string, records: readonly SnapshotRecord[]): Promise<void> => {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, serialize(records), 'utf-8');
  logger.debug({ path, recordCount: records.length }, 'wrote snapshot file');
};

/**
 * Newest snapshot in a directory whose name contains the given tag, e.g.
 * "tracks" matches spotify_tracks_20250912_101500.csv. Timestamped names
 * sort chronologically.
 */
export const findLatestSnapshot = async (directory: string, tag: string): Promise<string | null> => {
  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (error) {
    logger.debug({ directory, error }, 'snapshot directory not readable');
    return null;
  }

  const matches = entries
    .filter(name => name.endsWith('.csv') && name.includes(`_${tag}_`))
    .sort();

  const latest = matches.at(-1);
  return latest ? join(directory, latest) : null;
};
