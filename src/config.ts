import { cleanEnv, num, str } from 'envalid';
import type { MatchOptions } from './import/types.js';
import type { RetryPolicy } from './import/rate-limited-invoker.js';

/**
 * Read and validate the process configuration. Call once at startup and pass
 * the result down; nothing else reads process.env.
 */
export const loadAppEnv = (env: NodeJS.ProcessEnv = process.env) =>
  cleanEnv(env, {
    // Source catalog (Spotify)
    SPOTIFY_CLIENT_ID: str({ default: '', desc: 'Spotify app client ID' }),
    SPOTIFY_CLIENT_SECRET: str({ default: '', desc: 'Spotify app client secret' }),
    SPOTIFY_REDIRECT_URI: str({
      default: 'http://localhost:8888/callback',
      desc: 'Redirect URI registered for the Spotify app (must match the one used to obtain the refresh token)'
    }),
    SPOTIFY_REFRESH_TOKEN: str({ default: '', desc: 'Refresh token from a completed Spotify authorization' }),
    // Destination catalog (TIDAL)
    TIDAL_ACCESS_TOKEN: str({ default: '', desc: 'TIDAL session access token' }),
    TIDAL_USER_ID: str({ default: '', desc: 'TIDAL user ID owning the session' }),
    TIDAL_COUNTRY_CODE: str({ default: 'US', desc: 'Country code sent with every TIDAL request' }),
    TIDAL_TIMEOUT: num({ default: 15000, desc: 'TIDAL API request timeout in milliseconds' }),
    // Files
    EXPORT_DIR: str({ default: './exports', desc: 'Directory for snapshot CSV files' }),
    OUTCOME_LOG_DIR: str({ default: './exports/logs', desc: 'Directory for import outcome logs' }),
    LOG_LEVEL: str({
      default: 'info',
      choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']
    }),
    // Matching
    MATCH_ACCEPT_THRESHOLD: num({ default: 0.85, desc: 'Minimum candidate score accepted as a match (0.0-1.0)' }),
    MATCH_MIN_MARGIN: num({ default: 0.05, desc: 'Required score gap between best and second-best candidate' }),
    MATCH_DURATION_TOLERANCE: num({ default: 3, desc: 'Duration difference in seconds still treated as the same recording' }),
    SEARCH_RESULT_LIMIT: num({ default: 10, desc: 'Search results considered per record' }),
    // Rate limiting
    RETRY_MAX_ATTEMPTS: num({ default: 5, desc: 'Retries per API call on rate limits and transient failures' }),
    RETRY_BASE_DELAY_MS: num({ default: 1000, desc: 'First backoff delay in milliseconds (doubles per retry)' }),
    RETRY_MAX_DELAY_MS: num({ default: 300000, desc: 'Cap on a single backoff delay (default: 5 minutes)' })
  });

export type AppEnv = ReturnType<typeof loadAppEnv>;

export interface ImportSettings {
  match: MatchOptions;
  searchLimit: number;
  retry: RetryPolicy;
}

export const importSettingsFrom = (env: AppEnv): ImportSettings => ({
  match: {
    acceptThreshold: env.MATCH_ACCEPT_THRESHOLD,
    minMargin: env.MATCH_MIN_MARGIN,
    durationToleranceSeconds: env.MATCH_DURATION_TOLERANCE
  },
  searchLimit: env.SEARCH_RESULT_LIMIT,
  retry: {
    maxRetries: env.RETRY_MAX_ATTEMPTS,
    baseDelayMs: env.RETRY_BASE_DELAY_MS,
    maxDelayMs: env.RETRY_MAX_DELAY_MS
  }
});
