import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],
    setupFiles: ['src/__tests__/setup.ts'],
    // Keep tests independent of a developer's local .env
    env: {
      SPOTIFY_CLIENT_ID: 'test-client-id',
      SPOTIFY_CLIENT_SECRET: 'test-secret',
      SPOTIFY_REFRESH_TOKEN: 'test-refresh-token',
      TIDAL_ACCESS_TOKEN: 'test-token',
      TIDAL_USER_ID: '1000',
      LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],

      thresholds: {
        lines: 70,
        functions: 70,
        branches: 65,
      },

      include: ['src/**/*.ts'],
      exclude: [
        '**/__tests__/**',
        'src/cli.ts',           // CLI entry point
        'src/catalog/tidal.ts', // HTTP clients (exercised against live services only)
        'src/catalog/spotify.ts',
        'src/**/types.ts',      // Type definition files
      ],
    },
  },
});
