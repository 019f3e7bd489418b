import { join } from 'node:path';
import { format } from 'date-fns';
import { logger } from '../logger.js';
import { writeSnapshotFile } from '../snapshot/snapshot-file.js';
import { recordKey, type RecordKind, type SnapshotRecord } from '../snapshot/types.js';
import type { Page, SourceCatalog, SourceTrack } from '../catalog/types.js';
import type { RateLimitedInvoker } from '../import/rate-limited-invoker.js';

export const EXPORT_KINDS = ['tracks', 'albums', 'artists', 'playlists'] as const;

export type ExportKind = (typeof EXPORT_KINDS)[number];

export const isExportKind = (value: string): value is ExportKind => EXPORT_KINDS.some(kind => kind === value);

/** Record kind written to (and expected in) each kind's snapshot */
export const RECORD_KIND_FOR: Record<ExportKind, RecordKind> = {
  tracks: 'Track',
  albums: 'Album',
  artists: 'Artist',
  playlists: 'Playlist'
};

export interface ExportOptions {
  directory: string;
  invoker: RateLimitedInvoker;
  /** Timestamp used in file names */
  now?: Date;
}

export interface ExportSummary {
  kind: ExportKind;
  path: string;
  recordCount: number;
}

export const snapshotFileName = (kind: ExportKind, at: Date): string =>
  `spotify_${kind}_${format(at, 'yyyyMMdd_HHmmss')}.csv`;

const collectPages = async <T>(
  invoker: RateLimitedInvoker,
  label: string,
  fetchPage: (cursor?: string) => Promise<Page<T>>
): Promise<T[]> => {
  const all: T[] = [];
  let cursor: string | undefined;

  while (true) {
    const page = await invoker.invoke(label, () => fetchPage(cursor));
    all.push(...page.items);
    logger.debug({ label, fetched: all.length }, 'export progress');
    if (page.next === null) {
      break;
    }
    cursor = page.next;
  }

  return all;
};

const trackFields = (track: SourceTrack) => ({
  title: track.name,
  primaryArtistName: track.artists[0] ?? '',
  albumName: track.albumName || undefined,
  durationSeconds: Math.round(track.durationMs / 1000),
  isrc: track.isrc || undefined
});

/** Drop rows a snapshot cannot hold (no title, artist or playlist name) and repeated keys */
const keepValid = (records: SnapshotRecord[]): SnapshotRecord[] => {
  const seen = new Set<string>();
  return records.filter(record => {
    const key = recordKey(record);
    const unnamedPlaylist = record.kind === 'Playlist' && !record.sourcePlaylistName;
    if (!record.title || !record.primaryArtistName || unnamedPlaylist || seen.has(key)) {
      logger.debug({ key, title: record.title }, 'skipping source item');
      return false;
    }
    seen.add(key);
    return true;
  });
};

const exportRecords = async (
  source: SourceCatalog,
  kind: ExportKind,
  invoker: RateLimitedInvoker
): Promise<SnapshotRecord[]> => {
  switch (kind) {
    case 'tracks': {
      const tracks = await collectPages(invoker, 'spotify saved tracks', cursor => source.savedTracks(cursor));
      return tracks.map((track): SnapshotRecord => ({ kind: 'Track', ...trackFields(track), sourceEntityId: track.id }));
    }
    case 'albums': {
      const albums = await collectPages(invoker, 'spotify saved albums', cursor => source.savedAlbums(cursor));
      return albums.map((album): SnapshotRecord => ({
        kind: 'Album',
        title: album.name,
        primaryArtistName: album.artists[0] ?? '',
        sourceEntityId: album.id
      }));
    }
    case 'artists': {
      const artists = await collectPages(invoker, 'spotify followed artists', cursor => source.followedArtists(cursor));
      return artists.map((artist): SnapshotRecord => ({
        kind: 'Artist',
        title: artist.name,
        primaryArtistName: artist.name,
        sourceEntityId: artist.id
      }));
    }
    case 'playlists': {
      const playlists = await collectPages(invoker, 'spotify playlists', cursor => source.playlists(cursor));
      const records: SnapshotRecord[] = [];
      for (const playlist of playlists) {
        const tracks = await collectPages(invoker, `spotify playlist "${playlist.name}"`, cursor =>
          source.playlistTracks(playlist.id, cursor)
        );
        tracks.forEach((track, position) => {
          records.push({
            kind: 'Playlist',
            ...trackFields(track),
            sourcePlaylistName: playlist.name,
            sourceEntityId: `${playlist.id}:${track.id}:${position}`
          });
        });
        logger.info({ playlist: playlist.name, trackCount: tracks.length }, 'exported playlist');
      }
      return records;
    }
  }
};

/**
 * Page through the source library and write one snapshot file per kind
 */
export const exportLibrary = async (
  source: SourceCatalog,
  kinds: readonly ExportKind[],
  options: ExportOptions
): Promise<ExportSummary[]> => {
  const at = options.now ?? new Date();
  const summaries: ExportSummary[] = [];

  for (const kind of kinds) {
    const records = keepValid(await exportRecords(source, kind, options.invoker));
    const path = join(options.directory, snapshotFileName(kind, at));
    await writeSnapshotFile(path, records);
    logger.info({ kind, path, recordCount: records.length }, 'exported snapshot');
    summaries.push({ kind, path, recordCount: records.length });
  }

  return summaries;
};
