import { logger as rootLogger, type Logger } from '../logger.js';
import { AuthorizationError, describeError } from '../errors.js';
import { describeRecord, type SnapshotRecord } from '../snapshot/types.js';
import type { DestinationCatalog, FavoriteKind } from '../catalog/types.js';
import type { RateLimitedInvoker } from './rate-limited-invoker.js';
import type { ImportOutcome, MatchCandidate, MatchResult, PlaylistMapping } from './types.js';

/** sourcePlaylistName -> destination playlist, owned by one import session */
export type PlaylistMappings = Map<string, PlaylistMapping>;

export interface MutationApplierOptions {
  playlistDescription?: string;
  logger?: Logger;
}

const DEFAULT_PLAYLIST_DESCRIPTION = 'Imported with catalog-transfer';

const skipReason = (match: Exclude<MatchResult, { status: 'matched' }>): string => {
  if (match.status === 'ambiguous') {
    const competing = match.topCandidates
      .map(({ candidate, score }) => `${candidate.destinationEntityId} (${score.toFixed(2)})`)
      .join(', ');
    return `ambiguous match: ${competing}`;
  }
  return match.bestScore === undefined
    ? 'no match found'
    : `no match found (best score ${match.bestScore.toFixed(2)})`;
};

/**
 * Turns a match into a destination change. Every mutation is preceded by an
 * existence check, so replaying a snapshot never adds anything twice.
 */
export class MutationApplier {
  private readonly playlistDescription: string;
  private readonly logger: Logger;

  constructor(
    private readonly destination: DestinationCatalog,
    private readonly invoker: RateLimitedInvoker,
    options: MutationApplierOptions = {}
  ) {
    this.playlistDescription = options.playlistDescription ?? DEFAULT_PLAYLIST_DESCRIPTION;
    this.logger = options.logger ?? rootLogger;
  }

  async apply(record: SnapshotRecord, match: MatchResult, playlists: PlaylistMappings): Promise<ImportOutcome> {
    if (match.status !== 'matched') {
      return { record, status: 'Skipped', reason: skipReason(match) };
    }

    try {
      const outcome =
        record.kind === 'Playlist'
          ? await this.insertIntoPlaylist(record, match.candidate, playlists)
          : await this.favorite(record, record.kind, match.candidate);
      return { ...outcome, score: match.score };
    } catch (error) {
      if (error instanceof AuthorizationError) {
        throw error;
      }
      this.logger.error({ record: describeRecord(record), error: describeError(error) }, 'failed to apply match');
      return {
        record,
        status: 'Failed',
        reason: describeError(error),
        score: match.score
      };
    }
  }

  private async favorite(record: SnapshotRecord, kind: FavoriteKind, candidate: MatchCandidate): Promise<ImportOutcome> {
    const entityId = candidate.destinationEntityId;

    const present = await this.invoker.invoke(`check favorite ${kind} ${entityId}`, () =>
      this.destination.hasFavorite(kind, entityId)
    );
    if (present) {
      this.logger.debug({ record: describeRecord(record), entityId }, 'already in destination library');
      return { record, status: 'AlreadyPresent', destinationEntityId: entityId };
    }

    await this.invoker.invoke(`add favorite ${kind} ${entityId}`, () => this.destination.addFavorite(kind, entityId));
    this.logger.info({ record: describeRecord(record), kind, entityId }, 'added favorite');
    return { record, status: 'Imported', destinationEntityId: entityId };
  }

  private async insertIntoPlaylist(
    record: SnapshotRecord,
    candidate: MatchCandidate,
    playlists: PlaylistMappings
  ): Promise<ImportOutcome> {
    // The codec guarantees a playlist name on Playlist rows
    const playlistName = record.sourcePlaylistName ?? '';
    const mapping = await this.resolvePlaylist(playlistName, playlists);
    const entityId = candidate.destinationEntityId;

    if (mapping.entityIds.has(entityId)) {
      return { record, status: 'AlreadyPresent', destinationEntityId: entityId };
    }

    await this.invoker.invoke(`add ${entityId} to playlist ${mapping.destinationPlaylistId}`, () =>
      this.destination.addToPlaylist(mapping.destinationPlaylistId, entityId)
    );
    mapping.entityIds.add(entityId);
    this.logger.info({ record: describeRecord(record), playlist: playlistName, entityId }, 'added track to playlist');
    return { record, status: 'Imported', destinationEntityId: entityId };
  }

  /**
   * Destination playlist for a source playlist name: cached, else an existing
   * playlist with that name (left over from an earlier run), else a new one.
   */
  private async resolvePlaylist(name: string, playlists: PlaylistMappings): Promise<PlaylistMapping> {
    const cached = playlists.get(name);
    if (cached) {
      return cached;
    }

    const existing = await this.invoker.invoke(`find playlist "${name}"`, () =>
      this.destination.findPlaylistByName(name)
    );

    let mapping: PlaylistMapping;
    if (existing) {
      const items = await this.invoker.invoke(`list playlist ${existing.id}`, () =>
        this.destination.listPlaylistItems(existing.id)
      );
      mapping = { destinationPlaylistId: existing.id, entityIds: new Set(items) };
      this.logger.info({ playlist: name, playlistId: existing.id, itemCount: items.length }, 'using existing destination playlist');
    } else {
      const created = await this.invoker.invoke(`create playlist "${name}"`, () =>
        this.destination.createPlaylist(name, this.playlistDescription)
      );
      mapping = { destinationPlaylistId: created.id, entityIds: new Set<string>() };
      this.logger.info({ playlist: name, playlistId: created.id }, 'created destination playlist');
    }

    playlists.set(name, mapping);
    return mapping;
  }
}
