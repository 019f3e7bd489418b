import got, { type Got } from 'got';
import { logger } from '../logger.js';
import type { MatchCandidate } from '../import/types.js';
import { withCatalogErrors } from './http.js';
import type { CatalogPlaylist, CatalogUser, DestinationCatalog, FavoriteKind, SearchType } from './types.js';

const TIDAL_API_BASE = 'https://api.tidal.com/v1/';
const PAGE_SIZE = 100;

interface TidalArtistRef {
  id: number;
  name: string;
}

interface TidalTrack {
  id: number;
  title: string;
  version?: string | null;
  duration?: number;
  isrc?: string | null;
  artist?: TidalArtistRef | null;
  artists?: TidalArtistRef[];
  album?: { id: number; title: string } | null;
}

interface TidalAlbum {
  id: number;
  title: string;
  artist?: TidalArtistRef | null;
  artists?: TidalArtistRef[];
}

interface TidalSearchResponse {
  tracks?: { items: TidalTrack[] };
  albums?: { items: TidalAlbum[] };
  artists?: { items: TidalArtistRef[] };
}

interface TidalPage<T> {
  items: T[];
  totalNumberOfItems: number;
}

interface TidalPlaylist {
  uuid: string;
  title: string;
}

interface TidalUser {
  id: number;
  username?: string;
  firstName?: string | null;
}

export interface TidalClientOptions {
  accessToken: string;
  userId: string;
  countryCode: string;
  timeoutMs?: number;
}

const FAVORITE_PATHS: Record<FavoriteKind, { path: string; field: string }> = {
  Track: { path: 'tracks', field: 'trackIds' },
  Album: { path: 'albums', field: 'albumIds' },
  Artist: { path: 'artists', field: 'artistIds' }
};

const SEARCH_TYPES: Record<SearchType, string> = {
  tracks: 'TRACKS',
  albums: 'ALBUMS',
  artists: 'ARTISTS'
};

const primaryArtist = (item: { artist?: TidalArtistRef | null; artists?: TidalArtistRef[] }): string =>
  item.artist?.name ?? item.artists?.[0]?.name ?? '';

const trackCandidate = (track: TidalTrack): MatchCandidate => ({
  destinationEntityId: String(track.id),
  // TIDAL keeps "Remastered 2011", "Live" etc. apart from the title
  title: track.version ? `${track.title} (${track.version})` : track.title,
  artistName: primaryArtist(track),
  albumName: track.album?.title,
  durationSeconds: track.duration,
  isrc: track.isrc ?? undefined
});

const albumCandidate = (album: TidalAlbum): MatchCandidate => ({
  destinationEntityId: String(album.id),
  title: album.title,
  artistName: primaryArtist(album)
});

const artistCandidate = (artist: TidalArtistRef): MatchCandidate => ({
  destinationEntityId: String(artist.id),
  title: artist.name,
  artistName: artist.name
});

/**
 * TIDAL v1 API client for an already-authenticated user session.
 * got's own retries are off: the rate-limited invoker owns retrying.
 */
export class TidalClient implements DestinationCatalog {
  private readonly http: Got;
  private readonly userId: string;
  private readonly countryCode: string;
  private readonly favorites = new Map<FavoriteKind, Set<string>>();

  constructor(options: TidalClientOptions) {
    this.userId = options.userId;
    this.countryCode = options.countryCode;
    this.http = got.extend({
      prefixUrl: TIDAL_API_BASE,
      headers: {
        Authorization: `Bearer ${options.accessToken}`
      },
      timeout: {
        request: options.timeoutMs ?? 15000
      },
      retry: {
        limit: 0
      }
    });
  }

  async search(type: SearchType, query: string, limit: number): Promise<MatchCandidate[]> {
    const response = await withCatalogErrors(`tidal search ${type}`, () =>
      this.http
        .get('search', {
          searchParams: { query, types: SEARCH_TYPES[type], limit, countryCode: this.countryCode }
        })
        .json<TidalSearchResponse>()
    );

    switch (type) {
      case 'tracks':
        return (response.tracks?.items ?? []).map(trackCandidate);
      case 'albums':
        return (response.albums?.items ?? []).map(albumCandidate);
      case 'artists':
        return (response.artists?.items ?? []).map(artistCandidate);
    }
  }

  async hasFavorite(kind: FavoriteKind, entityId: string): Promise<boolean> {
    const favorites = await this.loadFavorites(kind);
    return favorites.has(entityId);
  }

  async addFavorite(kind: FavoriteKind, entityId: string): Promise<void> {
    const { path, field } = FAVORITE_PATHS[kind];
    await withCatalogErrors(`tidal add favorite ${kind}`, () =>
      this.http.post(`users/${this.userId}/favorites/${path}`, {
        searchParams: { countryCode: this.countryCode },
        form: { [field]: entityId }
      })
    );
    (await this.loadFavorites(kind)).add(entityId);
  }

  async findPlaylistByName(name: string): Promise<CatalogPlaylist | null> {
    const playlists = await this.collect<TidalPlaylist>(`users/${this.userId}/playlists`, 'tidal list playlists');
    const playlist = playlists.find(entry => entry.title === name);
    return playlist ? { id: playlist.uuid, name: playlist.title } : null;
  }

  async createPlaylist(name: string, description: string): Promise<CatalogPlaylist> {
    const playlist = await withCatalogErrors('tidal create playlist', () =>
      this.http
        .post(`users/${this.userId}/playlists`, {
          searchParams: { countryCode: this.countryCode },
          form: { title: name, description }
        })
        .json<TidalPlaylist>()
    );
    return { id: playlist.uuid, name: playlist.title };
  }

  async listPlaylistItems(playlistId: string): Promise<string[]> {
    const items = await this.collect<{ item: { id: number } }>(`playlists/${playlistId}/items`, 'tidal list playlist items');
    return items.map(entry => String(entry.item.id));
  }

  async addToPlaylist(playlistId: string, entityId: string): Promise<void> {
    // Playlist writes need the current ETag
    const etag = await withCatalogErrors('tidal get playlist', async () => {
      const response = await this.http.get(`playlists/${playlistId}`, {
        searchParams: { countryCode: this.countryCode }
      });
      return response.headers.etag ?? '*';
    });

    await withCatalogErrors('tidal add to playlist', () =>
      this.http.post(`playlists/${playlistId}/items`, {
        searchParams: { countryCode: this.countryCode },
        headers: { 'If-None-Match': etag },
        form: { trackIds: entityId, onDupes: 'SKIP', onArtifactNotFound: 'FAIL' }
      })
    );
  }

  async whoami(): Promise<CatalogUser> {
    const user = await withCatalogErrors('tidal get user', () =>
      this.http.get(`users/${this.userId}`, { searchParams: { countryCode: this.countryCode } }).json<TidalUser>()
    );
    return { id: String(user.id), displayName: user.username ?? user.firstName ?? String(user.id) };
  }

  /**
   * Favorites of one kind, fetched on first use and kept current by addFavorite
   */
  private async loadFavorites(kind: FavoriteKind): Promise<Set<string>> {
    const cached = this.favorites.get(kind);
    if (cached) {
      return cached;
    }

    const { path } = FAVORITE_PATHS[kind];
    const items = await this.collect<{ item: { id: number } }>(
      `users/${this.userId}/favorites/${path}`,
      `tidal list favorite ${kind}`
    );
    const ids = new Set(items.map(entry => String(entry.item.id)));
    logger.debug({ kind, count: ids.size }, 'loaded tidal favorites');
    this.favorites.set(kind, ids);
    return ids;
  }

  private async collect<T>(path: string, label: string): Promise<T[]> {
    const all: T[] = [];
    let offset = 0;

    while (true) {
      const page = await withCatalogErrors(label, () =>
        this.http
          .get(path, {
            searchParams: { limit: PAGE_SIZE, offset, countryCode: this.countryCode }
          })
          .json<TidalPage<T>>()
      );

      all.push(...page.items);
      offset += page.items.length;

      if (page.items.length === 0 || offset >= page.totalNumberOfItems) {
        break;
      }
    }

    return all;
  }
}
