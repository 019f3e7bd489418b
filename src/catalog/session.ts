import got, { HTTPError } from 'got';
import { logger } from '../logger.js';
import { AuthorizationError } from '../errors.js';
import type { AppEnv } from '../config.js';
import { toCatalogError } from './http.js';
import { SpotifyClient } from './spotify.js';
import { TidalClient } from './tidal.js';

const SPOTIFY_AUTH_URL = 'https://accounts.spotify.com/api/token';

interface SpotifyAuthResponse {
  access_token: string;
  token_type: string;
  expires_in: number;
}

/** Show only the tail of a credential in logs */
export const maskSecret = (value: string): string => {
  if (!value) {
    return '(missing)';
  }
  if (value.length <= 4) {
    return '****';
  }
  return '*'.repeat(value.length - 4) + value.slice(-4);
};

/**
 * Exchange the configured refresh token for an access token and return a
 * library client. The interactive authorization that issued the refresh
 * token happens outside this tool.
 */
export const connectSpotify = async (env: AppEnv): Promise<SpotifyClient> => {
  const clientId = env.SPOTIFY_CLIENT_ID;
  const clientSecret = env.SPOTIFY_CLIENT_SECRET;
  const refreshToken = env.SPOTIFY_REFRESH_TOKEN;

  logger.debug(
    { clientId: maskSecret(clientId), redirectUri: env.SPOTIFY_REDIRECT_URI },
    'connecting to spotify'
  );

  if (!clientId || !clientSecret || !refreshToken) {
    throw new AuthorizationError(
      'Spotify credentials not set: SPOTIFY_CLIENT_ID, SPOTIFY_CLIENT_SECRET and SPOTIFY_REFRESH_TOKEN are required'
    );
  }

  const authString = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');

  try {
    const response = await got
      .post(SPOTIFY_AUTH_URL, {
        form: {
          grant_type: 'refresh_token',
          refresh_token: refreshToken
        },
        headers: {
          Authorization: `Basic ${authString}`
        },
        timeout: {
          request: 5000
        }
      })
      .json<SpotifyAuthResponse>();

    logger.debug({ expiresIn: response.expires_in }, 'spotify access token obtained');
    return new SpotifyClient(response.access_token);
  } catch (error) {
    // invalid_grant / invalid_client come back as 400 or 401
    if (error instanceof HTTPError && (error.response.statusCode === 400 || error.response.statusCode === 401)) {
      throw new AuthorizationError(
        'Spotify rejected the credentials; check the client id/secret, the redirect URI registered for the app, and the refresh token',
        { cause: error }
      );
    }
    throw toCatalogError(error, 'spotify token refresh');
  }
};

export const connectTidal = (env: AppEnv): TidalClient => {
  if (!env.TIDAL_ACCESS_TOKEN || !env.TIDAL_USER_ID) {
    throw new AuthorizationError('TIDAL session not set: TIDAL_ACCESS_TOKEN and TIDAL_USER_ID are required');
  }

  logger.debug({ userId: env.TIDAL_USER_ID, countryCode: env.TIDAL_COUNTRY_CODE }, 'connecting to tidal');

  return new TidalClient({
    accessToken: env.TIDAL_ACCESS_TOKEN,
    userId: env.TIDAL_USER_ID,
    countryCode: env.TIDAL_COUNTRY_CODE,
    timeoutMs: env.TIDAL_TIMEOUT
  });
};
