import { mkdirSync } from 'node:fs';
import { defineConfig } from 'vitest/config';

// The SQLite and config loader tests create scratch directories under TMPDIR.
const tmpDir = process.env.TMPDIR && process.env.TMPDIR.trim().length > 0 ? process.env.TMPDIR : '/tmp';
process.env.TMPDIR = tmpDir;
mkdirSync(tmpDir, { recursive: true });

/**
 * Vitest Configuration for repo-concord
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
  },
});
