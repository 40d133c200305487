/**
 * @fileoverview SQLite store
 *
 * Persists sessions and both cache tiers in one better-sqlite3 database.
 * Statements are prepared once; every row carries its own `expires_at`, so
 * a read past expiry is a miss even before `evictExpired` sweeps the row.
 * Payloads are JSON and are re-validated on the way out; a row that no
 * longer parses is deleted and reported as a miss.
 *
 * @packageDocumentation
 */

import Database from 'better-sqlite3';
import { StorageError, type StorageOperation } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import type { CandidateSignature, ResolvedPolicy, Session } from '../types.js';
import { parsePolicy, parseSession, parseSignature } from './schemas.js';
import { systemClock, type Clock, type ConcordStore, type EvictionReport, type SignatureCacheEntry } from './types.js';

// ============================================================================
// SCHEMA
// ============================================================================

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS concord_sessions (
    session_id TEXT PRIMARY KEY,
    payload TEXT NOT NULL,
    updated_at INTEGER NOT NULL,
    expires_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_concord_sessions_expires ON concord_sessions(expires_at);

  CREATE TABLE IF NOT EXISTS concord_policy_cache (
    request_key TEXT PRIMARY KEY,
    payload TEXT NOT NULL,
    expires_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_concord_policy_expires ON concord_policy_cache(expires_at);

  CREATE TABLE IF NOT EXISTS concord_signature_cache (
    signature_key TEXT PRIMARY KEY,
    payload TEXT NOT NULL,
    expires_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_concord_signature_expires ON concord_signature_cache(expires_at);
`;

/** SQLite result codes worth a retry. */
const TRANSIENT_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED']);

interface PayloadRow {
  payload: string;
}

interface KeyedPayloadRow {
  signature_key: string;
  payload: string;
}

/** Lock wait used when no store timeout is configured. */
export const DEFAULT_BUSY_TIMEOUT_MS = 5000;

export interface SqliteStoreOptions {
  now?: Clock;
  /**
   * How long a statement waits on a locked database before failing with
   * SQLITE_BUSY. Statements run synchronously, so this is the only bound on
   * how long a single call can hold the event loop.
   */
  busyTimeoutMs?: number;
}

function isTransient(error: unknown): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && TRANSIENT_CODES.has(error.code);
}

// ============================================================================
// STORE
// ============================================================================

export class SqliteConcordStore implements ConcordStore {
  private readonly now: Clock;
  private closed = false;

  private readonly stmtGetSession: Database.Statement<[string, number], PayloadRow>;
  private readonly stmtPutSession: Database.Statement<[string, string, number, number]>;
  private readonly stmtDeleteSession: Database.Statement<[string, number]>;
  private readonly stmtDropSession: Database.Statement<[string]>;
  private readonly stmtGetPolicy: Database.Statement<[string, number], PayloadRow>;
  private readonly stmtPutPolicy: Database.Statement<[string, string, number]>;
  private readonly stmtDropPolicy: Database.Statement<[string]>;
  private readonly stmtGetSignature: Database.Statement<[string, number], KeyedPayloadRow>;
  private readonly stmtPutSignature: Database.Statement<[string, string, number]>;
  private readonly stmtDropSignature: Database.Statement<[string]>;
  private readonly stmtEvictSessions: Database.Statement<[number]>;
  private readonly stmtEvictPolicies: Database.Statement<[number]>;
  private readonly stmtEvictSignatures: Database.Statement<[number]>;

  constructor(
    private readonly db: Database.Database,
    options: SqliteStoreOptions = {},
  ) {
    this.now = options.now ?? systemClock;
    this.db.exec(SCHEMA);

    this.stmtGetSession = this.db.prepare<[string, number], PayloadRow>(`
      SELECT payload FROM concord_sessions WHERE session_id = ? AND expires_at > ?
    `);
    this.stmtPutSession = this.db.prepare<[string, string, number, number]>(`
      INSERT INTO concord_sessions (session_id, payload, updated_at, expires_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(session_id) DO UPDATE SET
        payload = excluded.payload,
        updated_at = excluded.updated_at,
        expires_at = excluded.expires_at
    `);
    this.stmtDeleteSession = this.db.prepare<[string, number]>(`
      DELETE FROM concord_sessions WHERE session_id = ? AND expires_at > ?
    `);
    this.stmtDropSession = this.db.prepare<[string]>(`DELETE FROM concord_sessions WHERE session_id = ?`);

    this.stmtGetPolicy = this.db.prepare<[string, number], PayloadRow>(`
      SELECT payload FROM concord_policy_cache WHERE request_key = ? AND expires_at > ?
    `);
    this.stmtPutPolicy = this.db.prepare<[string, string, number]>(`
      INSERT INTO concord_policy_cache (request_key, payload, expires_at)
      VALUES (?, ?, ?)
      ON CONFLICT(request_key) DO UPDATE SET
        payload = excluded.payload,
        expires_at = excluded.expires_at
    `);
    this.stmtDropPolicy = this.db.prepare<[string]>(`DELETE FROM concord_policy_cache WHERE request_key = ?`);

    this.stmtGetSignature = this.db.prepare<[string, number], KeyedPayloadRow>(`
      SELECT signature_key, payload FROM concord_signature_cache WHERE signature_key = ? AND expires_at > ?
    `);
    this.stmtPutSignature = this.db.prepare<[string, string, number]>(`
      INSERT INTO concord_signature_cache (signature_key, payload, expires_at)
      VALUES (?, ?, ?)
      ON CONFLICT(signature_key) DO UPDATE SET
        payload = excluded.payload,
        expires_at = excluded.expires_at
    `);
    this.stmtDropSignature = this.db.prepare<[string]>(`DELETE FROM concord_signature_cache WHERE signature_key = ?`);

    this.stmtEvictSessions = this.db.prepare<[number]>(`DELETE FROM concord_sessions WHERE expires_at <= ?`);
    this.stmtEvictPolicies = this.db.prepare<[number]>(`DELETE FROM concord_policy_cache WHERE expires_at <= ?`);
    this.stmtEvictSignatures = this.db.prepare<[number]>(`DELETE FROM concord_signature_cache WHERE expires_at <= ?`);
  }

  /**
   * Open (or create) a database file. `:memory:` gives a private in-memory
   * database.
   */
  static open(dbPath: string, options: SqliteStoreOptions = {}): SqliteConcordStore {
    const db = new Database(dbPath);
    const busyTimeoutMs = Math.max(0, Math.floor(options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS));
    db.pragma(`busy_timeout = ${busyTimeoutMs}`);
    if (dbPath !== ':memory:') {
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
    }
    return new SqliteConcordStore(db, options);
  }

  private run<T>(operation: StorageOperation, work: () => T): T {
    if (this.closed) {
      throw new StorageError(operation, false, 'store is closed');
    }
    try {
      return work();
    } catch (error) {
      throw new StorageError(operation, isTransient(error), getErrorMessage(error), toError(error));
    }
  }

  // --------------------------------------------------------------------------
  // Sessions
  // --------------------------------------------------------------------------

  async getSession(sessionId: string): Promise<Session | null> {
    return this.run('read', () => {
      const row = this.stmtGetSession.get(sessionId, this.now());
      if (!row) return null;
      const session = parseSession(row.payload);
      if (!session) {
        logWarning('Dropping unreadable session row', { sessionId });
        this.stmtDropSession.run(sessionId);
      }
      return session;
    });
  }

  async putSession(session: Session, ttlMs: number): Promise<void> {
    this.run('write', () => {
      const now = this.now();
      const expiresAt = now + ttlMs;
      this.stmtPutSession.run(session.sessionId, JSON.stringify({ ...session, expiresAt }), now, expiresAt);
    });
  }

  async closeSession(sessionId: string): Promise<boolean> {
    return this.run('delete', () => {
      const removed = this.stmtDeleteSession.run(sessionId, this.now()).changes > 0;
      this.stmtDropSession.run(sessionId);
      return removed;
    });
  }

  // --------------------------------------------------------------------------
  // Policy cache
  // --------------------------------------------------------------------------

  async getPolicy(requestKey: string): Promise<ResolvedPolicy | null> {
    return this.run('read', () => {
      const row = this.stmtGetPolicy.get(requestKey, this.now());
      if (!row) return null;
      const policy = parsePolicy(row.payload);
      if (!policy) this.stmtDropPolicy.run(requestKey);
      return policy;
    });
  }

  async putPolicy(requestKey: string, policy: ResolvedPolicy, ttlMs: number): Promise<void> {
    this.run('write', () => {
      this.stmtPutPolicy.run(requestKey, JSON.stringify(policy), this.now() + ttlMs);
    });
  }

  // --------------------------------------------------------------------------
  // Signature cache
  // --------------------------------------------------------------------------

  async getSignatures(keys: readonly string[]): Promise<Map<string, CandidateSignature>> {
    return this.run('read', () => {
      const now = this.now();
      const found = new Map<string, CandidateSignature>();
      for (const key of keys) {
        const row = this.stmtGetSignature.get(key, now);
        if (!row) continue;
        const signature = parseSignature(row.payload);
        if (signature) {
          found.set(row.signature_key, signature);
        } else {
          this.stmtDropSignature.run(key);
        }
      }
      return found;
    });
  }

  async putSignatures(entries: readonly SignatureCacheEntry[], ttlMs: number): Promise<void> {
    this.run('write', () => {
      const expiresAt = this.now() + ttlMs;
      const insertAll = this.db.transaction((batch: readonly SignatureCacheEntry[]) => {
        for (const { key, signature } of batch) {
          this.stmtPutSignature.run(key, JSON.stringify(signature), expiresAt);
        }
      });
      insertAll(entries);
    });
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  async evictExpired(): Promise<EvictionReport> {
    return this.run('evict', () => {
      const now = this.now();
      return {
        sessions: this.stmtEvictSessions.run(now).changes,
        policies: this.stmtEvictPolicies.run(now).changes,
        signatures: this.stmtEvictSignatures.run(now).changes,
      };
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }
}
