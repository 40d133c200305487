/**
 * @fileoverview In-memory store
 *
 * Backs tests and serves as the request-scoped fallback when the configured
 * store is unavailable. Values are kept as the frozen objects they were
 * written as; expiry is checked on read and swept by `evictExpired`.
 */

import type { CandidateSignature, ResolvedPolicy, Session } from '../types.js';
import { systemClock, type Clock, type ConcordStore, type EvictionReport, type SignatureCacheEntry } from './types.js';

interface Expiring<T> {
  value: T;
  expiresAt: number;
}

export interface InMemoryStoreOptions {
  now?: Clock;
}

export class InMemoryConcordStore implements ConcordStore {
  private readonly sessions = new Map<string, Expiring<Session>>();
  private readonly policies = new Map<string, Expiring<ResolvedPolicy>>();
  private readonly signatures = new Map<string, Expiring<CandidateSignature>>();
  private readonly now: Clock;

  constructor(options: InMemoryStoreOptions = {}) {
    this.now = options.now ?? systemClock;
  }

  private live<T>(table: Map<string, Expiring<T>>, key: string): T | null {
    const entry = table.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      table.delete(key);
      return null;
    }
    return entry.value;
  }

  async getSession(sessionId: string): Promise<Session | null> {
    const session = this.live(this.sessions, sessionId);
    return session ? { ...session, aggregate: [...session.aggregate] } : null;
  }

  async putSession(session: Session, ttlMs: number): Promise<void> {
    const expiresAt = this.now() + ttlMs;
    this.sessions.set(session.sessionId, {
      value: { ...session, aggregate: [...session.aggregate], expiresAt },
      expiresAt,
    });
  }

  async closeSession(sessionId: string): Promise<boolean> {
    const existed = this.live(this.sessions, sessionId) !== null;
    this.sessions.delete(sessionId);
    return existed;
  }

  async getPolicy(requestKey: string): Promise<ResolvedPolicy | null> {
    return this.live(this.policies, requestKey);
  }

  async putPolicy(requestKey: string, policy: ResolvedPolicy, ttlMs: number): Promise<void> {
    this.policies.set(requestKey, { value: policy, expiresAt: this.now() + ttlMs });
  }

  async getSignatures(keys: readonly string[]): Promise<Map<string, CandidateSignature>> {
    const found = new Map<string, CandidateSignature>();
    for (const key of keys) {
      const signature = this.live(this.signatures, key);
      if (signature) found.set(key, signature);
    }
    return found;
  }

  async putSignatures(entries: readonly SignatureCacheEntry[], ttlMs: number): Promise<void> {
    const expiresAt = this.now() + ttlMs;
    for (const { key, signature } of entries) {
      this.signatures.set(key, { value: signature, expiresAt });
    }
  }

  async evictExpired(): Promise<EvictionReport> {
    const now = this.now();
    const sweep = <T>(table: Map<string, Expiring<T>>): number => {
      let removed = 0;
      for (const [key, entry] of table) {
        if (entry.expiresAt <= now) {
          table.delete(key);
          removed++;
        }
      }
      return removed;
    };
    return {
      sessions: sweep(this.sessions),
      policies: sweep(this.policies),
      signatures: sweep(this.signatures),
    };
  }

  async close(): Promise<void> {
    this.sessions.clear();
    this.policies.clear();
    this.signatures.clear();
  }
}
