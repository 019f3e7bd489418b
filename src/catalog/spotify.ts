import got, { type Got } from 'got';
import { withCatalogErrors } from './http.js';
import type {
  CatalogUser,
  Page,
  SourceAlbum,
  SourceArtist,
  SourceCatalog,
  SourcePlaylist,
  SourceTrack
} from './types.js';

const SPOTIFY_API_BASE = 'https://api.spotify.com/v1/';
const PAGE_SIZE = 50;
const PLAYLIST_PAGE_SIZE = 100;

interface SpotifyArtistRef {
  id: string | null;
  name: string;
}

interface SpotifyTrack {
  id: string | null;
  name: string;
  type: 'track' | 'episode';
  duration_ms: number;
  artists: SpotifyArtistRef[];
  album: { name: string };
  external_ids?: { isrc?: string };
}

interface SpotifyAlbum {
  id: string;
  name: string;
  artists: SpotifyArtistRef[];
}

interface SpotifyPlaylist {
  id: string;
  name: string;
}

interface SpotifyPaging<T> {
  items: T[];
  next: string | null;
}

interface SpotifyCursorPaging<T> {
  items: T[];
  next: string | null;
  cursors?: { after?: string | null };
}

interface SpotifyUser {
  id: string;
  display_name: string | null;
}

/** Tracks without an id (local files) or that are podcast episodes are dropped */
const toSourceTrack = (track: SpotifyTrack | null): SourceTrack | null => {
  if (!track || track.type !== 'track' || !track.id) {
    return null;
  }
  return {
    id: track.id,
    name: track.name,
    artists: track.artists.map(artist => artist.name),
    albumName: track.album.name,
    durationMs: track.duration_ms,
    isrc: track.external_ids?.isrc
  };
};

const isPresent = <T>(value: T | null): value is T => value !== null;

const offsetOf = (cursor: string | undefined): number => (cursor ? Number.parseInt(cursor, 10) : 0);

const nextOffset = (paging: SpotifyPaging<unknown>, offset: number, pageSize: number): string | null =>
  paging.next ? String(offset + pageSize) : null;

/**
 * Spotify Web API client for the user library, built on an access token
 * obtained by the session collaborator.
 */
export class SpotifyClient implements SourceCatalog {
  private readonly http: Got;

  constructor(accessToken: string, timeoutMs: number = 10000) {
    this.http = got.extend({
      prefixUrl: SPOTIFY_API_BASE,
      headers: {
        Authorization: `Bearer ${accessToken}`
      },
      timeout: {
        request: timeoutMs
      },
      retry: {
        limit: 0
      }
    });
  }

  async savedTracks(cursor?: string): Promise<Page<SourceTrack>> {
    const offset = offsetOf(cursor);
    const paging = await this.get<SpotifyPaging<{ track: SpotifyTrack | null }>>('me/tracks', 'spotify saved tracks', {
      limit: PAGE_SIZE,
      offset
    });
    return {
      items: paging.items.map(entry => toSourceTrack(entry.track)).filter(isPresent),
      next: nextOffset(paging, offset, PAGE_SIZE)
    };
  }

  async savedAlbums(cursor?: string): Promise<Page<SourceAlbum>> {
    const offset = offsetOf(cursor);
    const paging = await this.get<SpotifyPaging<{ album: SpotifyAlbum }>>('me/albums', 'spotify saved albums', {
      limit: PAGE_SIZE,
      offset
    });
    return {
      items: paging.items.map(({ album }) => ({
        id: album.id,
        name: album.name,
        artists: album.artists.map(artist => artist.name)
      })),
      next: nextOffset(paging, offset, PAGE_SIZE)
    };
  }

  async followedArtists(cursor?: string): Promise<Page<SourceArtist>> {
    const response = await this.get<{ artists: SpotifyCursorPaging<SpotifyArtistRef> }>(
      'me/following',
      'spotify followed artists',
      cursor ? { type: 'artist', limit: PAGE_SIZE, after: cursor } : { type: 'artist', limit: PAGE_SIZE }
    );
    const { artists } = response;
    return {
      items: artists.items.flatMap(artist => (artist.id ? [{ id: artist.id, name: artist.name }] : [])),
      next: artists.next ? artists.cursors?.after ?? null : null
    };
  }

  async playlists(cursor?: string): Promise<Page<SourcePlaylist>> {
    const offset = offsetOf(cursor);
    const paging = await this.get<SpotifyPaging<SpotifyPlaylist | null>>('me/playlists', 'spotify playlists', {
      limit: PAGE_SIZE,
      offset
    });
    return {
      items: paging.items.filter(isPresent).map(playlist => ({ id: playlist.id, name: playlist.name })),
      next: nextOffset(paging, offset, PAGE_SIZE)
    };
  }

  async playlistTracks(playlistId: string, cursor?: string): Promise<Page<SourceTrack>> {
    const offset = offsetOf(cursor);
    const paging = await this.get<SpotifyPaging<{ track: SpotifyTrack | null }>>(
      `playlists/${playlistId}/tracks`,
      'spotify playlist tracks',
      { limit: PLAYLIST_PAGE_SIZE, offset }
    );
    return {
      items: paging.items.map(entry => toSourceTrack(entry.track)).filter(isPresent),
      next: nextOffset(paging, offset, PLAYLIST_PAGE_SIZE)
    };
  }

  async whoami(): Promise<CatalogUser> {
    const user = await this.get<SpotifyUser>('me', 'spotify current user', {});
    return { id: user.id, displayName: user.display_name ?? user.id };
  }

  private get<T>(path: string, label: string, searchParams: Record<string, string | number>): Promise<T> {
    return withCatalogErrors(label, () => this.http.get(path, { searchParams }).json<T>());
  }
}
