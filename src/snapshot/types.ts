export const RECORD_KINDS = ['Track', 'Album', 'Artist', 'Playlist'] as const;

export type RecordKind = (typeof RECORD_KINDS)[number];

/**
 * One library item as exported from the source catalog.
 *
 * Playlist records describe one track inside a playlist: the track fields
 * belong to that track and sourcePlaylistName names the playlist.
 */
export interface SnapshotRecord {
  readonly kind: RecordKind;
  readonly title: string;
  readonly primaryArtistName: string;
  readonly albumName?: string;
  readonly durationSeconds?: number;
  readonly isrc?: string;
  readonly sourcePlaylistName?: string;
  readonly sourceEntityId: string;
}

/** Column order of a snapshot file; also the literal header row */
export const SNAPSHOT_COLUMNS = [
  'kind',
  'title',
  'primaryArtistName',
  'albumName',
  'durationSeconds',
  'isrc',
  'sourcePlaylistName',
  'sourceEntityId'
] as const satisfies ReadonlyArray<keyof SnapshotRecord>;

export type SnapshotColumn = (typeof SNAPSHOT_COLUMNS)[number];

export const isRecordKind = (value: string): value is RecordKind =>
  RECORD_KINDS.some(kind => kind === value);

/** Kinds that carry track-level fields (ISRC, duration) */
export const isTrackLike = (kind: RecordKind): boolean => kind === 'Track' || kind === 'Playlist';

export const recordKey = (record: Pick<SnapshotRecord, 'kind' | 'sourceEntityId'>): string =>
  `${record.kind}:${record.sourceEntityId}`;

export const describeRecord = (record: SnapshotRecord): string =>
  record.kind === 'Artist' ? record.title : `${record.primaryArtistName} - ${record.title}`;
