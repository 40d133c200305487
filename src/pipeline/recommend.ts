/**
 * @fileoverview Recommendation pipeline
 *
 * Extract → detect → resolve → score → aggregate → materialize, with the
 * store consulted at the stage boundaries:
 *
 * - the resolved policy is cached per request key (short tier)
 * - signatures are cached per policy fingerprint and candidate (long tier)
 * - a session's running aggregate is read, merged and written back under a
 *   per-session lock
 *
 * Input errors come back as `Err` before any store write. Store trouble is
 * absorbed by {@link ResilientStore} and surfaces only as a diagnostic.
 *
 * @packageDocumentation
 */

import { presetDefaults, type ConcordConfig } from '../config/presets.js';
import { detectConflicts } from '../conflicts/detector.js';
import { resolveConflicts } from '../conflicts/resolver.js';
import { UnknownObjectiveError, UnresolvableConflictError, ValidationError } from '../core/errors.js';
import { Err, Ok, captureSync, type Result } from '../core/result.js';
import { aggregateSignatures } from '../aggregation/aggregator.js';
import { METRIC_NAMES, noopMetrics, type MetricsSink } from '../metrics/recorder.js';
import { extractObjectives } from '../objectives/extractor.js';
import { getDefaultRegistry, type ObjectiveRegistry } from '../objectives/registry.js';
import { materializeOutput, type RecommendationOutput } from '../output/materializer.js';
import { scoreCandidate, scoreCandidates, type CandidateStream } from '../scoring/scorer.js';
import { computePolicyFingerprint, computeRequestKey, computeSignatureKey } from '../storage/keys.js';
import { InMemoryConcordStore } from '../storage/memory_store.js';
import { ResilientStore } from '../storage/resilient_store.js';
import { SessionLocks } from '../storage/session_locks.js';
import { systemClock, type Clock, type ConcordStore, type EvictionReport } from '../storage/types.js';
import { logDebug, logInfo, logWarning } from '../telemetry/logger.js';
import type { Candidate, CandidateSignature, Diagnostic, ResolvedPolicy, Session } from '../types.js';
import { parseRecommendRequest, type RecommendRequest } from './schema.js';

export type RecommendationFailure = UnknownObjectiveError | UnresolvableConflictError | ValidationError;

export function isRecommendationFailure(error: unknown): error is RecommendationFailure {
  return (
    error instanceof UnknownObjectiveError ||
    error instanceof UnresolvableConflictError ||
    error instanceof ValidationError
  );
}

export interface PipelineOptions {
  config?: ConcordConfig;
  store?: ConcordStore;
  metrics?: MetricsSink;
  registry?: ObjectiveRegistry;
  now?: Clock;
}

export interface RecommendCallOptions {
  signal?: AbortSignal;
}

interface EffectiveSettings {
  parallelism: number;
  minHarmony: number;
  limit: number;
  timeoutMs: number;
  fallbackToRelevance: boolean;
}

const LOOKUP_BATCH_SIZE = 64;

export class RecommendationPipeline {
  private readonly config: ConcordConfig;
  private readonly store: ConcordStore;
  private readonly metrics: MetricsSink;
  private readonly registry: ObjectiveRegistry;
  private readonly now: Clock;
  private readonly locks = new SessionLocks();

  constructor(options: PipelineOptions = {}) {
    this.config = options.config ?? presetDefaults('balanced');
    this.store = options.store ?? new InMemoryConcordStore({ now: options.now });
    this.metrics = options.metrics ?? noopMetrics;
    this.registry = options.registry ?? getDefaultRegistry();
    this.now = options.now ?? systemClock;
  }

  async recommend(
    request: RecommendRequest,
    candidates: CandidateStream,
    options: RecommendCallOptions = {},
  ): Promise<Result<RecommendationOutput, RecommendationFailure>> {
    const validated = captureSync(() => parseRecommendRequest(request), isRecommendationFailure);
    if (!validated.ok) return validated;
    const input = validated.value;
    const settings = this.settingsFor(input);

    const diagnostics: Diagnostic[] = [];
    const store = new ResilientStore(this.store, {
      timeoutMs: this.config.storeTimeoutMs,
      retryBaseDelayMs: this.config.retryBaseDelayMs,
      onDegraded: (diagnostic) => diagnostics.push(diagnostic),
    });

    try {
      const resolved = await this.resolvePolicy(input, settings, store);
      if (!resolved.ok) {
        if (resolved.error instanceof UnresolvableConflictError) {
          this.metrics.increment(METRIC_NAMES.resolutionFailures);
        }
        logInfo('Recommendation request rejected', { code: resolved.error.code, message: resolved.error.message });
        return resolved;
      }
      const policy = resolved.value;
      this.metrics.observe(METRIC_NAMES.harmonyScore, policy.harmonyScore);

      const fingerprint = computePolicyFingerprint(policy);
      const cached: CandidateSignature[] = [];
      const outcome = await scoreCandidates(policy, this.withCachedSignatures(candidates, fingerprint, store, cached), {
        parallelism: settings.parallelism,
        timeoutMs: settings.timeoutMs,
        signal: options.signal,
      });
      diagnostics.push(...outcome.diagnostics);
      this.metrics.gauge(METRIC_NAMES.scorerThroughput, outcome.stats.throughputPerSec);

      if (outcome.signatures.length > 0) {
        await store.putSignatures(
          outcome.signatures.map((signature) => ({
            key: computeSignatureKey(fingerprint, signatureCandidate(signature)),
            signature,
          })),
          this.config.signatureCacheTtlMs,
        );
      }

      const ranked = input.sessionId
        ? await this.mergeIntoSession(input.sessionId, policy, [cached, outcome.signatures], store, diagnostics)
        : aggregateSignatures([cached, outcome.signatures], { policy });

      const output = materializeOutput(ranked, policy, {
        limit: settings.limit,
        intent: input.intent,
        sessionId: input.sessionId,
        diagnostics,
      });
      logInfo('Recommendation complete', {
        sessionId: input.sessionId,
        harmony: policy.harmonyScore,
        scored: outcome.stats.scored,
        fromCache: cached.length,
        returned: output.recommendations.length,
        cancelled: outcome.cancelled,
        diagnostics: diagnostics.length,
      });
      return Ok(output);
    } finally {
      await store.close();
    }
  }

  /** @returns true when a live session was closed */
  async closeSession(sessionId: string): Promise<boolean> {
    return this.locks.withLock(sessionId, () => this.store.closeSession(sessionId));
  }

  async evictExpired(): Promise<EvictionReport> {
    const report = await this.store.evictExpired();
    logDebug('Evicted expired entries', { ...report });
    return report;
  }

  private settingsFor(input: RecommendRequest): EffectiveSettings {
    const base = input.preset ? { ...this.config, ...pick(presetDefaults(input.preset)) } : this.config;
    return {
      parallelism: input.parallelism ?? base.parallelism,
      minHarmony: input.minHarmony ?? base.minHarmony,
      limit: input.limit ?? base.resultLimit,
      timeoutMs: input.timeoutMs ?? base.scoringTimeoutMs,
      fallbackToRelevance: input.fallbackToRelevance ?? base.fallbackToRelevance,
    };
  }

  private async resolvePolicy(
    input: RecommendRequest,
    settings: EffectiveSettings,
    store: ResilientStore,
  ): Promise<Result<ResolvedPolicy, RecommendationFailure>> {
    const requestKey = computeRequestKey({
      intent: input.intent,
      objectives: input.objectives,
      minHarmony: settings.minHarmony,
      fallbackToRelevance: settings.fallbackToRelevance,
      dimensions: this.registry.dimensions,
    });

    const cached = await store.getPolicy(requestKey);
    if (cached) {
      this.metrics.increment(METRIC_NAMES.cacheHits, 1, { tier: 'policy' });
      return Ok(cached);
    }
    this.metrics.increment(METRIC_NAMES.cacheMisses, 1, { tier: 'policy' });

    const resolved = captureSync(() => {
      const objectives = extractObjectives(input.intent, input.objectives ?? {}, {
        registry: this.registry,
        fallbackToRelevance: settings.fallbackToRelevance,
      });
      const conflicts = detectConflicts(objectives, this.registry);
      return resolveConflicts(objectives, conflicts, { minHarmony: settings.minHarmony, registry: this.registry });
    }, isRecommendationFailure);
    if (!resolved.ok) return Err(resolved.error);

    await store.putPolicy(requestKey, resolved.value, this.config.requestCacheTtlMs);
    return resolved;
  }

  /**
   * Pass through candidates with no cached signature under `fingerprint`;
   * cached ones are collected into `hits` instead of being re-scored.
   */
  private async *withCachedSignatures(
    candidates: CandidateStream,
    fingerprint: string,
    store: ResilientStore,
    hits: CandidateSignature[],
  ): AsyncGenerator<Candidate> {
    let batch: Candidate[] = [];
    for await (const candidate of candidates) {
      batch.push(candidate);
      if (batch.length >= LOOKUP_BATCH_SIZE) {
        yield* await this.lookupSignatures(batch, fingerprint, store, hits);
        batch = [];
      }
    }
    if (batch.length > 0) {
      yield* await this.lookupSignatures(batch, fingerprint, store, hits);
    }
  }

  /** @returns the candidates of `batch` that missed the cache */
  private async lookupSignatures(
    batch: readonly Candidate[],
    fingerprint: string,
    store: ResilientStore,
    hits: CandidateSignature[],
  ): Promise<Candidate[]> {
    const keys = batch.map((candidate) => computeSignatureKey(fingerprint, candidate));
    const found = await store.getSignatures(keys);
    const misses: Candidate[] = [];
    batch.forEach((candidate, index) => {
      const signature = found.get(keys[index]);
      if (signature) hits.push(signature);
      else misses.push(candidate);
    });
    this.metrics.increment(METRIC_NAMES.cacheHits, batch.length - misses.length, { tier: 'signature' });
    this.metrics.increment(METRIC_NAMES.cacheMisses, misses.length, { tier: 'signature' });
    return misses;
  }

  private async mergeIntoSession(
    sessionId: string,
    policy: ResolvedPolicy,
    batches: CandidateSignature[][],
    store: ResilientStore,
    diagnostics: Diagnostic[],
  ): Promise<CandidateSignature[]> {
    return this.locks.withLock(sessionId, async () => {
      const existing = await store.getSession(sessionId);
      const carried = existing ? rescore(existing.aggregate, policy, diagnostics) : [];
      const merged = aggregateSignatures([carried, ...batches], { policy });

      const now = this.now();
      const session: Session = {
        sessionId,
        policy,
        aggregate: merged.slice(0, this.config.sessionAggregateLimit),
        requestCount: (existing?.requestCount ?? 0) + 1,
        createdAt: existing?.createdAt ?? now,
        updatedAt: now,
        expiresAt: now + this.config.sessionTtlMs,
      };
      await store.putSession(session, this.config.sessionTtlMs);
      logDebug('Session updated', { sessionId, requestCount: session.requestCount, carried: carried.length });
      return merged;
    });
  }
}

function pick(preset: ConcordConfig): Pick<ConcordConfig, 'parallelism' | 'minHarmony' | 'resultLimit'> {
  return { parallelism: preset.parallelism, minHarmony: preset.minHarmony, resultLimit: preset.resultLimit };
}

function signatureCandidate(signature: CandidateSignature): Candidate {
  return {
    candidateId: signature.candidateId,
    metrics: [...signature.metrics],
    ...(signature.metadata ? { metadata: signature.metadata } : {}),
  };
}

/**
 * Re-score a carried aggregate under the current policy. Entries that no
 * longer fit the dimension basis drop out with a `MalformedCandidate`
 * diagnostic.
 */
function rescore(
  signatures: readonly CandidateSignature[],
  policy: ResolvedPolicy,
  diagnostics: Diagnostic[],
): CandidateSignature[] {
  const rescored: CandidateSignature[] = [];
  for (const signature of signatures) {
    const result = scoreCandidate(policy, signatureCandidate(signature));
    if (result.ok) {
      rescored.push(result.value);
    } else {
      logWarning('Dropping carried session entry', { candidateId: signature.candidateId, reason: result.error.message });
      diagnostics.push({ ...result.error, details: { ...result.error.details, carried: true } });
    }
  }
  return rescored;
}
