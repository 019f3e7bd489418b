/**
 * Tests for snapshot CSV serialization and validation
 */

import { describe, it, expect } from 'vitest';
import { deserialize, serialize } from '../codec.js';
import { MalformedRecordError } from '../../errors.js';
import type { SnapshotRecord } from '../types.js';

const HEADER = 'kind,title,primaryArtistName,albumName,durationSeconds,isrc,sourcePlaylistName,sourceEntityId';

const csv = (...rows: string[]): string => [HEADER, ...rows].join('\n') + '\n';

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
};

const expectMalformed = (text: string, row: number, column: string): MalformedRecordError => {
  const error = captureError(() => deserialize(text));
  expect(error).toBeInstanceOf(MalformedRecordError);
  if (!(error instanceof MalformedRecordError)) {
    throw error;
  }
  expect(error.row).toBe(row);
  expect(error.column).toBe(column);
  return error;
};

describe('snapshot codec', () => {
  const records: SnapshotRecord[] = [
    {
      kind: 'Track',
      title: 'Get Lucky',
      primaryArtistName: 'Daft Punk',
      albumName: 'Random Access Memories',
      durationSeconds: 369,
      isrc: 'USQX91300108',
      sourceEntityId: 'sp-track-1'
    },
    { kind: 'Album', title: 'Discovery', primaryArtistName: 'Daft Punk', sourceEntityId: 'sp-album-1' },
    { kind: 'Artist', title: 'Daft Punk', primaryArtistName: 'Daft Punk', sourceEntityId: 'sp-artist-1' },
    {
      kind: 'Playlist',
      title: 'Hello, Goodbye',
      primaryArtistName: 'The Beatles',
      durationSeconds: 212,
      sourcePlaylistName: 'Sunday "Chill"',
      sourceEntityId: 'pl-1:sp-track-2:0'
    }
  ];

  describe('serialize', () => {
    it('should write the header followed by one row per record', () => {
      const text = serialize(records.slice(0, 2));

      expect(text).toBe(
        csv(
          'Track,Get Lucky,Daft Punk,Random Access Memories,369,USQX91300108,,sp-track-1',
          'Album,Discovery,Daft Punk,,,,,sp-album-1'
        )
      );
    });

    it('should quote cells containing commas and quotes', () => {
      const text = serialize([records[3]]);

      expect(text.split('\n')[1]).toBe(
        'Playlist,"Hello, Goodbye",The Beatles,,212,,"Sunday ""Chill""",pl-1:sp-track-2:0'
      );
    });

    it('should write only the header for no records', () => {
      expect(serialize([])).toBe(`${HEADER}\n`);
    });
  });

  describe('deserialize', () => {
    it('should read back what serialize wrote', () => {
      expect(deserialize(serialize(records))).toEqual(records);
    });

    it('should treat empty optional cells as absent', () => {
      const [record] = deserialize(csv('Track,Halo,Beyoncé,,,,,sp-1'));

      expect(record.albumName).toBeUndefined();
      expect(record.durationSeconds).toBeUndefined();
      expect(record.isrc).toBeUndefined();
      expect(record.primaryArtistName).toBe('Beyoncé');
    });

    it('should accept fractional durations', () => {
      const [record] = deserialize(csv('Track,Halo,Beyonce,,261.5,,,sp-1'));
      expect(record.durationSeconds).toBe(261.5);
    });

    it('should return no records for empty input or a lone header', () => {
      expect(deserialize('')).toEqual([]);
      expect(deserialize(`${HEADER}\n`)).toEqual([]);
    });

    it('should ignore a byte order mark', () => {
      const [record] = deserialize('\uFEFF' + csv('Artist,Daft Punk,Daft Punk,,,,,sp-artist-1'));
      expect(record.kind).toBe('Artist');
    });

    it('should reject an unknown kind with row and column', () => {
      const error = expectMalformed(csv('Track,Halo,Beyonce,,,,,sp-1', 'Podcast,Episode 1,Host,,,,,sp-2'), 2, 'kind');
      expect(error.message).toBe('row 2, column "kind": unknown kind "Podcast"');
    });

    it('should reject a missing required value', () => {
      expectMalformed(csv('Track,,Beyonce,,,,,sp-1'), 1, 'title');
      expectMalformed(csv('Track,Halo,,,,,,sp-1'), 1, 'primaryArtistName');
      expectMalformed(csv('Track,Halo,Beyonce,,,,,'), 1, 'sourceEntityId');
    });

    it('should require a playlist name on Playlist rows', () => {
      expectMalformed(csv('Playlist,Halo,Beyonce,,,,,pl-1:sp-1:0'), 1, 'sourcePlaylistName');
    });

    it('should reject fields the kind does not carry', () => {
      const error = expectMalformed(csv('Album,Discovery,Daft Punk,,,FRZ039800212,,sp-album-1'), 1, 'isrc');
      expect(error.message).toBe('row 1, column "isrc": not allowed on Album rows');

      expectMalformed(csv('Track,Halo,Beyonce,,,,Road Trip,sp-1'), 1, 'sourcePlaylistName');
    });

    it('should reject durations that are not non-negative numbers', () => {
      expectMalformed(csv('Track,Halo,Beyonce,,abc,,,sp-1'), 1, 'durationSeconds');
      expectMalformed(csv('Track,Halo,Beyonce,,-5,,,sp-1'), 1, 'durationSeconds');
      expectMalformed(csv('Track,Halo,Beyonce,, 12,,,sp-1'), 1, 'durationSeconds');
    });

    it('should reject a row with the wrong number of cells', () => {
      const error = expectMalformed(csv('Track,Halo,Beyonce,sp-1'), 1, '*');
      expect(error.message).toBe('row 1, column "*": expected 8 columns, found 4');
    });

    it('should reject a duplicate entity of the same kind', () => {
      expectMalformed(csv('Track,Halo,Beyonce,,,,,sp-1', 'Track,Halo (Live),Beyonce,,,,,sp-1'), 2, 'sourceEntityId');
    });

    it('should allow the same id under different kinds', () => {
      const parsed = deserialize(csv('Album,Discovery,Daft Punk,,,,,id-1', 'Artist,Daft Punk,Daft Punk,,,,,id-1'));
      expect(parsed).toHaveLength(2);
    });

    it('should reject a header in another column order', () => {
      const text = 'title,kind,primaryArtistName,albumName,durationSeconds,isrc,sourcePlaylistName,sourceEntityId\n';
      expectMalformed(text, 0, 'kind');
    });

    it('should reject a header with extra columns', () => {
      expectMalformed(`${HEADER},notes\n`, 0, '*');
    });

    it('should report unparseable CSV as row 0', () => {
      expectMalformed(csv('Track,"Halo,Beyonce,,,,,sp-1'), 0, '*');
    });
  });
});
