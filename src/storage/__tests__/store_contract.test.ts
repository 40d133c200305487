import Database from 'better-sqlite3';
import { describe, expect, it } from 'vitest';
import { detectConflicts } from '../../conflicts/detector.js';
import { resolveConflicts } from '../../conflicts/resolver.js';
import { extractObjectives } from '../../objectives/extractor.js';
import type { CandidateSignature, Session } from '../../types.js';
import { InMemoryConcordStore } from '../memory_store.js';
import { SqliteConcordStore } from '../sqlite_store.js';
import type { Clock, ConcordStore } from '../types.js';

const objectives = extractObjectives('', { breadth: 0.9, precision: 0.9 });
const policy = resolveConflicts(objectives, detectConflicts(objectives));

const signature: CandidateSignature = {
  candidateId: 'repo-a',
  metrics: [0.1, 0.2],
  computedScore: 0.15,
  rank: 1,
  metadata: { name: 'Repo A', language: 'Go' },
};

function session(sessionId: string): Session {
  return {
    sessionId,
    policy,
    aggregate: [signature],
    requestCount: 1,
    createdAt: 10,
    updatedAt: 10,
    expiresAt: 0,
  };
}

interface Harness {
  store: ConcordStore;
  advance(ms: number): void;
}

function harness(create: (now: Clock) => ConcordStore): () => Harness {
  return () => {
    let time = 1_000;
    const store = create(() => time);
    return {
      store,
      advance: (ms) => {
        time += ms;
      },
    };
  };
}

describe.each([
  ['in-memory', harness((now) => new InMemoryConcordStore({ now }))],
  ['sqlite', harness((now) => new SqliteConcordStore(new Database(':memory:'), { now }))],
])('%s store', (_label, setup) => {
  it('round-trips a session and stamps its expiry', async () => {
    const { store } = setup();
    await store.putSession(session('s1'), 500);
    expect(await store.getSession('s1')).toEqual({ ...session('s1'), expiresAt: 1_500 });
    expect(await store.getSession('other')).toBeNull();
  });

  it('expires sessions at their ttl', async () => {
    const { store, advance } = setup();
    await store.putSession(session('s1'), 500);
    advance(499);
    expect(await store.getSession('s1')).not.toBeNull();
    advance(1);
    expect(await store.getSession('s1')).toBeNull();
  });

  it('reports whether close removed a live session', async () => {
    const { store } = setup();
    await store.putSession(session('s1'), 500);
    expect(await store.closeSession('s1')).toBe(true);
    expect(await store.closeSession('s1')).toBe(false);
    expect(await store.getSession('s1')).toBeNull();
  });

  it('caches policies until they expire', async () => {
    const { store, advance } = setup();
    await store.putPolicy('req', policy, 100);
    expect(await store.getPolicy('req')).toEqual(policy);
    advance(100);
    expect(await store.getPolicy('req')).toBeNull();
  });

  it('returns only live signature keys', async () => {
    const { store, advance } = setup();
    await store.putSignatures([{ key: 'k1', signature }], 100);
    advance(50);
    await store.putSignatures([{ key: 'k2', signature: { ...signature, candidateId: 'repo-b' } }], 100);
    advance(50);
    const found = await store.getSignatures(['k1', 'k2', 'k3']);
    expect(Array.from(found.keys())).toEqual(['k2']);
    expect(found.get('k2')?.candidateId).toBe('repo-b');
  });

  it('evicts expired entries across every tier', async () => {
    const { store, advance } = setup();
    await store.putSession(session('old'), 10);
    await store.putSession(session('new'), 1_000);
    await store.putPolicy('req', policy, 10);
    await store.putSignatures(
      [
        { key: 'k1', signature },
        { key: 'k2', signature },
      ],
      10,
    );
    advance(10);
    expect(await store.evictExpired()).toEqual({ sessions: 1, policies: 1, signatures: 2 });
    expect(await store.evictExpired()).toEqual({ sessions: 0, policies: 0, signatures: 0 });
    expect(await store.getSession('new')).not.toBeNull();
  });
});
