/**
 * @fileoverview Request-scoped store wrapper with timeouts and degradation.
 *
 * Every call to the backing store is bounded by a timeout and retried once,
 * with exponential backoff, when the failure is transient. A call that still
 * fails switches this wrapper to an in-memory store for the rest of the
 * request and reports one `CacheUnavailable` diagnostic. Store trouble never
 * fails a request.
 */

import { CacheUnavailableError, isRetryableError } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';
import { retryWithBackoff, withTimeout } from '../utils/async.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import type { CandidateSignature, Diagnostic, ResolvedPolicy, Session } from '../types.js';
import { InMemoryConcordStore } from './memory_store.js';
import type { ConcordStore, EvictionReport, SignatureCacheEntry } from './types.js';

export interface ResilientStoreOptions {
  /** Per-call timeout; 0 disables */
  timeoutMs?: number;
  /** Transient failures are retried this many times (default: 1) */
  retries?: number;
  retryBaseDelayMs?: number;
  /** Called once, on the first call that exhausts its retries */
  onDegraded?: (diagnostic: Diagnostic) => void;
}

export class ResilientStore implements ConcordStore {
  private readonly fallback = new InMemoryConcordStore();
  private degradedBy: CacheUnavailableError | null = null;

  constructor(
    private readonly primary: ConcordStore,
    private readonly options: ResilientStoreOptions = {},
  ) {}

  get degraded(): boolean {
    return this.degradedBy !== null;
  }

  private async call<T>(operation: string, work: (store: ConcordStore) => Promise<T>): Promise<T> {
    if (this.degradedBy) {
      return work(this.fallback);
    }
    try {
      return await retryWithBackoff(
        () => withTimeout(work(this.primary), this.options.timeoutMs, { context: operation }),
        {
          retries: this.options.retries ?? 1,
          baseDelayMs: this.options.retryBaseDelayMs,
          shouldRetry: isRetryableError,
          onRetry: (error, attempt, delayMs) =>
            logWarning('Retrying store call', { operation, attempt, delayMs, error: getErrorMessage(error) }),
        },
      );
    } catch (error) {
      this.degrade(operation, error);
      return work(this.fallback);
    }
  }

  private degrade(operation: string, error: unknown): void {
    const cause = new CacheUnavailableError(operation, getErrorMessage(error), toError(error));
    this.degradedBy = cause;
    logWarning('Store unavailable; continuing with request-scoped state', {
      operation,
      error: cause.message,
    });
    this.options.onDegraded?.({
      kind: 'CacheUnavailable',
      message: cause.message,
      details: { operation, code: cause.code },
    });
  }

  getSession(sessionId: string): Promise<Session | null> {
    return this.call('getSession', (store) => store.getSession(sessionId));
  }

  putSession(session: Session, ttlMs: number): Promise<void> {
    return this.call('putSession', (store) => store.putSession(session, ttlMs));
  }

  closeSession(sessionId: string): Promise<boolean> {
    return this.call('closeSession', (store) => store.closeSession(sessionId));
  }

  getPolicy(requestKey: string): Promise<ResolvedPolicy | null> {
    return this.call('getPolicy', (store) => store.getPolicy(requestKey));
  }

  putPolicy(requestKey: string, policy: ResolvedPolicy, ttlMs: number): Promise<void> {
    return this.call('putPolicy', (store) => store.putPolicy(requestKey, policy, ttlMs));
  }

  getSignatures(keys: readonly string[]): Promise<Map<string, CandidateSignature>> {
    return this.call('getSignatures', (store) => store.getSignatures(keys));
  }

  putSignatures(entries: readonly SignatureCacheEntry[], ttlMs: number): Promise<void> {
    return this.call('putSignatures', (store) => store.putSignatures(entries, ttlMs));
  }

  evictExpired(): Promise<EvictionReport> {
    return this.call('evictExpired', (store) => store.evictExpired());
  }

  /** Releases the request-scoped state only; the backing store stays open. */
  async close(): Promise<void> {
    await this.fallback.close();
  }
}
