/**
 * Tests for reading, writing and locating snapshot files
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { findLatestSnapshot, readSnapshotFile, writeSnapshotFile } from '../snapshot-file.js';
import { MalformedRecordError, SnapshotReadError } from '../../errors.js';
import { createAlbumRecord, createTrackRecord } from '../../__tests__/helpers/index.js';

vi.mock('../../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}));

describe('snapshot files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'snapshot-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write a file that reads back to the same records', async () => {
    const records = [createTrackRecord(), createTrackRecord({ title: 'Other Track', sourceEntityId: 'src-track-2' })];
    const path = join(dir, 'nested', 'spotify_tracks_20250101_120000.csv');

    await writeSnapshotFile(path, records);

    expect(await readSnapshotFile(path)).toEqual(records);
    const text = await readFile(path, 'utf-8');
    expect(text.split('\n')[1]).toBe('Track,Test Track,Test Artist,Test Album,200,,,src-track-1');
  });

  it('should raise SnapshotReadError for a missing file', async () => {
    const path = join(dir, 'missing.csv');

    await expect(readSnapshotFile(path)).rejects.toBeInstanceOf(SnapshotReadError);
    await expect(readSnapshotFile(path)).rejects.toMatchObject({ path });
  });

  it('should reject rows of another kind when a kind is expected', async () => {
    const path = join(dir, 'spotify_tracks_20250101_120000.csv');
    await writeSnapshotFile(path, [createTrackRecord(), createAlbumRecord()]);

    const read = readSnapshotFile(path, { expectKind: 'Track' });

    await expect(read).rejects.toBeInstanceOf(MalformedRecordError);
    await expect(readSnapshotFile(path, { expectKind: 'Track' })).rejects.toMatchObject({ row: 2, column: 'kind' });
  });

  it('should pass malformed content through as MalformedRecordError', async () => {
    const path = join(dir, 'broken.csv');
    await writeFile(path, 'kind,title\nTrack,Halo\n', 'utf-8');

    await expect(readSnapshotFile(path)).rejects.toMatchObject({ name: 'MalformedRecordError', row: 0 });
  });

  describe('findLatestSnapshot', () => {
    it('should pick the newest file for the tag', async () => {
      await writeFile(join(dir, 'spotify_tracks_20250101_120000.csv'), '');
      await writeFile(join(dir, 'spotify_tracks_20250302_080000.csv'), '');
      await writeFile(join(dir, 'spotify_albums_20250401_090000.csv'), '');
      await writeFile(join(dir, 'spotify_tracks_20250501_090000.log'), '');

      expect(await findLatestSnapshot(dir, 'tracks')).toBe(join(dir, 'spotify_tracks_20250302_080000.csv'));
      expect(await findLatestSnapshot(dir, 'albums')).toBe(join(dir, 'spotify_albums_20250401_090000.csv'));
    });

    it('should return null when nothing matches', async () => {
      await writeFile(join(dir, 'spotify_albums_20250401_090000.csv'), '');

      expect(await findLatestSnapshot(dir, 'artists')).toBeNull();
    });

    it('should return null for a missing directory', async () => {
      expect(await findLatestSnapshot(join(dir, 'nope'), 'tracks')).toBeNull();
    });
  });
});
