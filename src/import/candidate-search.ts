import { logger } from '../logger.js';
import { describeRecord, isTrackLike, type RecordKind, type SnapshotRecord } from '../snapshot/types.js';
import type { DestinationCatalog, SearchType } from '../catalog/types.js';
import type { RateLimitedInvoker } from './rate-limited-invoker.js';
import { cleanSearchText, foldString } from './similarity.js';
import type { MatchCandidate } from './types.js';

export const DEFAULT_SEARCH_LIMIT = 10;

const SEARCH_TYPES: Record<RecordKind, SearchType> = {
  Track: 'tracks',
  Playlist: 'tracks',
  Album: 'albums',
  Artist: 'artists'
};

/**
 * Query text for a record: title, primary artist and (for tracks) album,
 * each without bracketed qualifiers, skipping a part that repeats an earlier
 * one (an artist record's title is the artist name).
 */
export const buildSearchQuery = (record: SnapshotRecord): string => {
  const parts = [record.title, record.primaryArtistName];
  if (isTrackLike(record.kind) && record.albumName) {
    parts.push(record.albumName);
  }

  const seen = new Set<string>();
  const query: string[] = [];
  for (const part of parts) {
    const cleaned = cleanSearchText(part);
    const key = foldString(cleaned);
    if (!key || seen.has(key)) {
      continue;
    }
    seen.add(key);
    query.push(cleaned);
  }
  return query.join(' ');
};

export class CandidateSearchAdapter {
  constructor(
    private readonly destination: DestinationCatalog,
    private readonly invoker: RateLimitedInvoker,
    private readonly limit: number = DEFAULT_SEARCH_LIMIT
  ) {}

  /**
   * Destination hits for a record in the destination's own relevance order,
   * at most `limit` of them; empty when nothing was found.
   */
  async search(record: SnapshotRecord): Promise<MatchCandidate[]> {
    const type = SEARCH_TYPES[record.kind];
    const query = buildSearchQuery(record);

    const results = await this.invoker.invoke(`search ${type} "${query}"`, () =>
      this.destination.search(type, query, this.limit)
    );

    logger.debug({ record: describeRecord(record), query, resultCount: results.length }, 'searched destination catalog');
    return results.slice(0, this.limit);
  }
}
