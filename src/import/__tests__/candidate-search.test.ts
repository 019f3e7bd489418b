/**
 * Tests for search query construction and the search adapter
 */

import { describe, it, expect, vi } from 'vitest';
import { CandidateSearchAdapter, buildSearchQuery } from '../candidate-search.js';
import { AuthorizationError, CatalogApiError } from '../../errors.js';
import {
  FakeDestinationCatalog,
  createAlbumRecord,
  createArtistRecord,
  createCandidate,
  createFakeClock,
  createPlaylistRecord,
  createTestInvoker,
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

describe('candidate search', () => {
  describe('buildSearchQuery', () => {
    it('should combine title, artist and album for tracks', () => {
      const record = createTrackRecord({
        title: 'Get Lucky (feat. Pharrell Williams)',
        primaryArtistName: 'Daft Punk',
        albumName: 'Random Access Memories'
      });

      expect(buildSearchQuery(record)).toBe('Get Lucky Daft Punk Random Access Memories');
    });

    it('should not repeat the title when the album has the same name', () => {
      const record = createTrackRecord({ title: 'Instant Crush', primaryArtistName: 'Daft Punk', albumName: 'Instant Crush' });

      expect(buildSearchQuery(record)).toBe('Instant Crush Daft Punk');
    });

    it('should use the artist name once for artist records', () => {
      expect(buildSearchQuery(createArtistRecord({ title: 'Daft Punk', primaryArtistName: 'Daft Punk' }))).toBe(
        'Daft Punk'
      );
    });

    it('should use title and artist for albums', () => {
      expect(buildSearchQuery(createAlbumRecord({ title: 'Discovery', primaryArtistName: 'Daft Punk' }))).toBe(
        'Discovery Daft Punk'
      );
    });

    it('should build playlist entries like tracks', () => {
      const record = createPlaylistRecord({ title: 'Halo', primaryArtistName: 'Beyoncé', albumName: undefined });

      expect(buildSearchQuery(record)).toBe('Halo Beyoncé');
    });
  });

  describe('CandidateSearchAdapter', () => {
    it('should search the type matching the record kind', async () => {
      const album = createCandidate({ destinationEntityId: 'alb-1', title: 'Discovery', artistName: 'Daft Punk' });
      const destination = new FakeDestinationCatalog({
        albums: [album],
        tracks: [createCandidate({ title: 'Discovery' })]
      });
      const adapter = new CandidateSearchAdapter(destination, createTestInvoker());

      const results = await adapter.search(createAlbumRecord({ title: 'Discovery', primaryArtistName: 'Daft Punk' }));

      expect(results).toEqual([album]);
    });

    it('should keep the destination order and cap at the limit', async () => {
      const tracks = [1, 2, 3, 4].map(n => createCandidate({ destinationEntityId: `t${n}`, title: 'Test Track' }));
      const destination = new FakeDestinationCatalog({ tracks });
      const adapter = new CandidateSearchAdapter(destination, createTestInvoker(), 3);

      const results = await adapter.search(createTrackRecord());

      expect(results.map(result => result.destinationEntityId)).toEqual(['t1', 't2', 't3']);
    });

    it('should return an empty list when nothing is found', async () => {
      const adapter = new CandidateSearchAdapter(new FakeDestinationCatalog(), createTestInvoker());

      expect(await adapter.search(createTrackRecord())).toEqual([]);
    });

    it('should retry a rate-limited search through the invoker', async () => {
      const clock = createFakeClock();
      const destination = new FakeDestinationCatalog({ tracks: [createCandidate()] }).failNext(
        'search',
        new CatalogApiError('slow down', { statusCode: 429, retryAfterSeconds: 2 })
      );
      const adapter = new CandidateSearchAdapter(destination, createTestInvoker(clock));

      const results = await adapter.search(createTrackRecord());

      expect(results).toHaveLength(1);
      expect(destination.calls.search).toBe(2);
      expect(clock.sleeps).toEqual([2000]);
    });

    it('should surface authorization failures', async () => {
      const destination = new FakeDestinationCatalog().failNext(
        'search',
        new CatalogApiError('unauthorized', { statusCode: 401 })
      );
      const adapter = new CandidateSearchAdapter(destination, createTestInvoker());

      await expect(adapter.search(createTrackRecord())).rejects.toBeInstanceOf(AuthorizationError);
    });
  });
});
