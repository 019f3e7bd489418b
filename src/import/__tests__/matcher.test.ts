/**
 * Tests for candidate scoring and match resolution
 */

import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_MATCH_OPTIONS, resolve, scoreCandidate } from '../matcher.js';
import {
  createAlbumRecord,
  createArtistRecord,
  createCandidate,
  createTrackRecord
} from '../../__tests__/helpers/index.js';

vi.mock('../../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}));

describe('matcher', () => {
  describe('scoreCandidate', () => {
    it('should give an exact match 0.95 without durations', () => {
      const record = createTrackRecord({ durationSeconds: undefined });
      const scored = scoreCandidate(record, createCandidate());

      expect(scored.score).toBe(0.95);
      expect(scored.via).toBe('exact');
    });

    it('should treat case, punctuation and accents as exact', () => {
      const record = createTrackRecord({ title: 'Halo', primaryArtistName: 'Beyoncé', durationSeconds: undefined });
      const scored = scoreCandidate(record, createCandidate({ title: 'HALO!', artistName: 'Beyonce' }));

      expect(scored).toMatchObject({ score: 0.95, via: 'exact' });
    });

    it('should add the duration bonus within tolerance', () => {
      const record = createTrackRecord({ durationSeconds: 200 });

      expect(scoreCandidate(record, createCandidate({ durationSeconds: 203 })).score).toBe(1);
      expect(scoreCandidate(record, createCandidate({ durationSeconds: 197 })).score).toBe(1);
    });

    it('should penalize a duration outside tolerance', () => {
      const record = createTrackRecord({ durationSeconds: 200 });

      expect(scoreCandidate(record, createCandidate({ durationSeconds: 204 })).score).toBe(0.7);
    });

    it('should ignore durations for albums and artists', () => {
      const scored = scoreCandidate(createAlbumRecord({ durationSeconds: 200 }), createCandidate({
        title: 'Test Album',
        durationSeconds: 3000
      }));

      expect(scored.score).toBe(0.95);
    });

    it('should score a reordered title below an exact match', () => {
      const record = createTrackRecord({ title: 'Beatles The', primaryArtistName: 'Band', durationSeconds: undefined });
      const scored = scoreCandidate(record, createCandidate({ title: 'The Beatles', artistName: 'Band' }));

      expect(scored).toMatchObject({ score: 0.9, via: 'fuzzy' });
    });

    it('should keep scores within [0, 1]', () => {
      const record = createTrackRecord({ title: 'Halo', primaryArtistName: 'Beyonce', durationSeconds: 100 });
      const scored = scoreCandidate(record, createCandidate({ title: 'Crazy', artistName: 'Jay', durationSeconds: 500 }));

      expect(scored.score).toBe(0);
    });
  });

  describe('resolve', () => {
    it('should report not-found without candidates', () => {
      expect(resolve(createTrackRecord(), [])).toEqual({ status: 'not-found' });
    });

    it('should report not-found with the best score when nothing reaches the threshold', () => {
      const record = createTrackRecord({ title: 'Halo', primaryArtistName: 'Beyonce', durationSeconds: undefined });
      const result = resolve(record, [createCandidate({ title: 'Crazy in Love', artistName: 'Jay-Z' })]);

      expect(result.status).toBe('not-found');
      if (result.status === 'not-found') {
        expect(result.bestScore).toBeDefined();
        expect(result.bestScore).toBeLessThan(DEFAULT_MATCH_OPTIONS.acceptThreshold);
      }
    });

    it('should accept the ISRC hit over closer-scoring candidates', () => {
      const record = createTrackRecord({
        title: 'Get Lucky',
        primaryArtistName: 'Daft Punk',
        durationSeconds: 369,
        isrc: 'USQX91300108'
      });
      const candidates = [
        createCandidate({ destinationEntityId: 't1', title: 'Get Lucky', artistName: 'Daft Punk', durationSeconds: 369 }),
        createCandidate({
          destinationEntityId: 't2',
          title: 'Get Lucky (Radio Edit)',
          artistName: 'Daft Punk',
          durationSeconds: 248,
          isrc: 'usqx91300108'
        }),
        createCandidate({ destinationEntityId: 't3', title: 'Get Lucky', artistName: 'Daft Punk', durationSeconds: 370 })
      ];

      const result = resolve(record, candidates);

      expect(result).toEqual({ status: 'matched', candidate: candidates[1], score: 1, via: 'isrc' });
    });

    it('should match an exact candidate that clears the margin', () => {
      const record = createTrackRecord({ durationSeconds: 200 });
      const candidates = [
        createCandidate({ destinationEntityId: 'live', durationSeconds: 260 }),
        createCandidate({ destinationEntityId: 'studio', durationSeconds: 201 })
      ];

      const result = resolve(record, candidates);

      expect(result).toEqual({
        status: 'matched',
        candidate: candidates[1],
        score: 1,
        margin: 0.3,
        via: 'exact'
      });
    });

    it('should accept a margin exactly equal to the minimum', () => {
      const record = createTrackRecord({ durationSeconds: 200 });
      const candidates = [
        createCandidate({ destinationEntityId: 'a', durationSeconds: 200 }),
        createCandidate({ destinationEntityId: 'b' })
      ];

      const result = resolve(record, candidates);

      expect(result).toMatchObject({ status: 'matched', score: 1, margin: 0.05 });
    });

    it('should report ambiguous when the top scores are too close', () => {
      const record = createTrackRecord({ durationSeconds: undefined });
      const candidates = [
        createCandidate({ destinationEntityId: 'first' }),
        createCandidate({ destinationEntityId: 'second' }),
        createCandidate({ destinationEntityId: 'other', title: 'Completely Different', artistName: 'Nobody' })
      ];

      const result = resolve(record, candidates);

      expect(result).toEqual({
        status: 'ambiguous',
        topCandidates: [
          { candidate: candidates[0], score: 0.95 },
          { candidate: candidates[1], score: 0.95 }
        ]
      });
    });

    it('should never match when the margin is below the minimum', () => {
      const record = createTrackRecord({ durationSeconds: undefined });
      const candidates = [createCandidate({ destinationEntityId: 'x' }), createCandidate({ destinationEntityId: 'y' })];

      const result = resolve(record, candidates, { ...DEFAULT_MATCH_OPTIONS, minMargin: 0.01 });

      expect(result.status).toBe('ambiguous');
    });

    it('should match a single candidate above the threshold without a margin', () => {
      const result = resolve(createArtistRecord(), [createCandidate({ title: 'Test Artist' })]);

      expect(result).toMatchObject({ status: 'matched', score: 0.95, via: 'exact' });
      if (result.status === 'matched') {
        expect(result.margin).toBeUndefined();
      }
    });

    it('should honour a custom threshold', () => {
      const record = createTrackRecord({ durationSeconds: undefined });

      const result = resolve(record, [createCandidate()], { ...DEFAULT_MATCH_OPTIONS, acceptThreshold: 0.96 });

      expect(result).toEqual({ status: 'not-found', bestScore: 0.95 });
    });

    it('should not match symbol-only titles that differ', () => {
      const record = createAlbumRecord({ title: '÷', primaryArtistName: 'Ed Sheeran' });

      const result = resolve(record, [
        createCandidate({ destinationEntityId: 'multiply', title: '×', artistName: 'Ed Sheeran' })
      ]);

      expect(result).toEqual({ status: 'not-found', bestScore: 0.36 });
    });

    it('should pick the identical symbol-only title among similar ones', () => {
      const record = createAlbumRecord({ title: '÷', primaryArtistName: 'Ed Sheeran' });
      const candidates = [
        createCandidate({ destinationEntityId: 'multiply', title: '×', artistName: 'Ed Sheeran' }),
        createCandidate({ destinationEntityId: 'divide', title: '÷', artistName: 'Ed Sheeran' }),
        createCandidate({ destinationEntityId: 'plus', title: '+', artistName: 'Ed Sheeran' })
      ];

      const result = resolve(record, candidates);

      expect(result).toEqual({
        status: 'matched',
        candidate: candidates[1],
        score: 0.95,
        margin: 0.59,
        via: 'exact'
      });
    });

    it('should give the same result for the same inputs', () => {
      const record = createTrackRecord({ durationSeconds: 200 });
      const candidates = [
        createCandidate({ destinationEntityId: 'a', title: 'Test Track (Live)', durationSeconds: 240 }),
        createCandidate({ destinationEntityId: 'b', durationSeconds: 199 })
      ];

      expect(resolve(record, candidates)).toEqual(resolve(record, candidates));
      expect(candidates.map(candidate => candidate.destinationEntityId)).toEqual(['a', 'b']);
    });
  });
});
