/**
 * Centralized Vitest Setup for repo-concord
 *
 * Pipeline code logs degradations and diagnostics to stderr. Keep test output
 * readable by defaulting to 'silent'; individual tests raise the level when
 * they assert on log calls.
 */

import { afterEach, vi } from 'vitest';

process.env.CONCORD_LOG_LEVEL = process.env.CONCORD_LOG_LEVEL ?? 'silent';

afterEach(() => {
  vi.restoreAllMocks();
});
