import type { MatchCandidate } from '../import/types.js';

export type SearchType = 'tracks' | 'albums' | 'artists';

/** Record kinds that map to a favorites collection */
export type FavoriteKind = 'Track' | 'Album' | 'Artist';

export interface CatalogPlaylist {
  id: string;
  name: string;
}

export interface CatalogUser {
  id: string;
  displayName: string;
}

/**
 * Authenticated client for the catalog being imported into. Failures surface
 * as CatalogApiError (or AuthorizationError) for the invoker to classify.
 */
export interface DestinationCatalog {
  search(type: SearchType, query: string, limit: number): Promise<MatchCandidate[]>;
  hasFavorite(kind: FavoriteKind, entityId: string): Promise<boolean>;
  addFavorite(kind: FavoriteKind, entityId: string): Promise<void>;
  findPlaylistByName(name: string): Promise<CatalogPlaylist | null>;
  createPlaylist(name: string, description: string): Promise<CatalogPlaylist>;
  listPlaylistItems(playlistId: string): Promise<string[]>;
  addToPlaylist(playlistId: string, entityId: string): Promise<void>;
  whoami(): Promise<CatalogUser>;
}

export interface SourceTrack {
  id: string;
  name: string;
  artists: string[];
  albumName: string;
  durationMs: number;
  isrc?: string;
}

export interface SourceAlbum {
  id: string;
  name: string;
  artists: string[];
}

export interface SourceArtist {
  id: string;
  name: string;
}

export interface SourcePlaylist {
  id: string;
  name: string;
}

export interface Page<T> {
  items: T[];
  /** Cursor for the next page, null when this was the last one */
  next: string | null;
}

/**
 * Authenticated client for the catalog being exported from. `cursor` is
 * whatever the previous page returned as `next` (undefined for the first page).
 */
export interface SourceCatalog {
  savedTracks(cursor?: string): Promise<Page<SourceTrack>>;
  savedAlbums(cursor?: string): Promise<Page<SourceAlbum>>;
  followedArtists(cursor?: string): Promise<Page<SourceArtist>>;
  playlists(cursor?: string): Promise<Page<SourcePlaylist>>;
  playlistTracks(playlistId: string, cursor?: string): Promise<Page<SourceTrack>>;
  whoami(): Promise<CatalogUser>;
}
