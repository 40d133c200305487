/**
 * @fileoverview Storage contracts for sessions and the two cache tiers.
 *
 * The pipeline only talks to these interfaces; backends are collaborators:
 * - SQLite (default, embedded)
 * - In-memory (tests, and the degraded request-scoped fallback)
 *
 * Every method is async so a remote backend can satisfy the same contract.
 */

import type { CandidateSignature, ResolvedPolicy, Session } from '../types.js';

// ============================================================================
// SESSIONS
// ============================================================================

export interface SessionStore {
  /** `null` means the session does not exist or has expired. */
  getSession(sessionId: string): Promise<Session | null>;
  /** Insert or replace; the session expires `ttlMs` after this write. */
  putSession(session: Session, ttlMs: number): Promise<void>;
  /** @returns true when a live session was removed */
  closeSession(sessionId: string): Promise<boolean>;
}

// ============================================================================
// CACHE TIERS
// ============================================================================

/** Short-lived tier: resolved policy per request key (minutes). */
export interface PolicyCache {
  getPolicy(requestKey: string): Promise<ResolvedPolicy | null>;
  putPolicy(requestKey: string, policy: ResolvedPolicy, ttlMs: number): Promise<void>;
}

export interface SignatureCacheEntry {
  key: string;
  signature: CandidateSignature;
}

/** Long-lived tier: per-candidate signatures keyed by policy fingerprint (hours). */
export interface SignatureCache {
  /** Live entries among `keys`; absent keys are misses. */
  getSignatures(keys: readonly string[]): Promise<Map<string, CandidateSignature>>;
  putSignatures(entries: readonly SignatureCacheEntry[], ttlMs: number): Promise<void>;
}

// ============================================================================
// COMBINED STORE
// ============================================================================

export interface EvictionReport {
  sessions: number;
  policies: number;
  signatures: number;
}

export interface ConcordStore extends SessionStore, PolicyCache, SignatureCache {
  /** Drop everything past its expiry across all tiers. */
  evictExpired(): Promise<EvictionReport>;
  close(): Promise<void>;
}

/** Wall clock in epoch milliseconds; injectable for expiry tests. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
