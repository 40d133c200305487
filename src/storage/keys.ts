/**
 * @fileoverview Content-hash cache keys.
 *
 * Both cache tiers are content-addressed: a key is the SHA-256 of exactly the
 * inputs that determine the cached value, so a changed input is a miss rather
 * than a stale hit.
 */

import { createHash } from 'node:crypto';
import type { Candidate, ResolvedPolicy } from '../types.js';

/**
 * Hex-encoded SHA-256 (64 characters) of `content`.
 */
export function computeContentHash(content: string): string {
  return createHash('sha256').update(content, 'utf-8').digest('hex');
}

export interface RequestKeyInput {
  intent: string;
  objectives?: Readonly<Record<string, number>>;
  minHarmony: number;
  fallbackToRelevance: boolean;
  dimensions: readonly string[];
}

export function computeRequestKey(input: RequestKeyInput): string {
  const objectives = Object.entries(input.objectives ?? {}).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return computeContentHash(
    JSON.stringify([
      'request',
      input.intent.trim().toLowerCase(),
      objectives,
      input.minHarmony,
      input.fallbackToRelevance,
      input.dimensions,
    ]),
  );
}

/** Identifies the scoring behaviour of a policy: two policies with one fingerprint score identically. */
export function computePolicyFingerprint(policy: ResolvedPolicy): string {
  return computeContentHash(
    JSON.stringify(['policy', policy.dimensions, policy.directionality, policy.weights, policy.tieBreakOrder]),
  );
}

export function computeSignatureKey(fingerprint: string, candidate: Candidate): string {
  return computeContentHash(
    JSON.stringify(['signature', fingerprint, candidate.candidateId, candidate.metrics, candidate.metadata ?? null]),
  );
}
