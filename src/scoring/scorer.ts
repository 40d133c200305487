/**
 * @fileoverview Candidate Scorer
 *
 * Applies a resolved policy to a candidate stream. Each candidate is an
 * independent unit that only reads the frozen policy, so units run across a
 * bounded async worker pool in any order and the ranked output is identical
 * for every parallelism setting.
 *
 * A malformed metric vector skips that one candidate and records a
 * `MalformedCandidate` diagnostic; it never aborts the batch. A batch can be
 * cancelled through an AbortSignal or a deadline, in which case whatever was
 * already scored is returned.
 *
 * @packageDocumentation
 */

import { availableParallelism } from 'node:os';
import { Err, Ok, type Result } from '../core/result.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { TimeoutError, yieldToEventLoop } from '../utils/async.js';
import type { Candidate, CandidateSignature, Diagnostic, ResolvedPolicy } from '../types.js';
import { orientMetric, rankSignatures } from './ranking.js';

export type CandidateStream = Iterable<Candidate> | AsyncIterable<Candidate>;

export interface ScoreOptions {
  /** Worker lanes (default: available processing units) */
  parallelism?: number;
  /** Candidates per unit of scheduled work (default: 64) */
  chunkSize?: number;
  signal?: AbortSignal;
  /** Stop issuing work after this many milliseconds; 0 disables */
  timeoutMs?: number;
}

export interface ScoringStats {
  received: number;
  scored: number;
  skipped: number;
  durationMs: number;
  throughputPerSec: number;
}

export interface ScoringOutcome {
  signatures: CandidateSignature[];
  diagnostics: Diagnostic[];
  cancelled: boolean;
  stats: ScoringStats;
}

const DEFAULT_CHUNK_SIZE = 64;

export function defaultParallelism(): number {
  return Math.max(1, availableParallelism());
}

/**
 * Score a single candidate. Pure: the same policy and metrics always give
 * the same score. The returned signature is unranked (rank 0).
 */
export function scoreCandidate(policy: ResolvedPolicy, candidate: Candidate): Result<CandidateSignature, Diagnostic> {
  const { metrics } = candidate;
  if (!Array.isArray(metrics) || metrics.length !== policy.dimensions.length) {
    return Err({
      kind: 'MalformedCandidate',
      candidateId: candidate.candidateId,
      message: `Expected ${policy.dimensions.length} metrics, got ${Array.isArray(metrics) ? metrics.length : typeof metrics}`,
      details: { expected: policy.dimensions.length, received: Array.isArray(metrics) ? metrics.length : null },
    });
  }

  let computedScore = 0;
  for (let i = 0; i < metrics.length; i++) {
    const value = metrics[i];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      return Err({
        kind: 'MalformedCandidate',
        candidateId: candidate.candidateId,
        message: `Metric ${policy.dimensions[i]} is not a finite number`,
        details: { dimension: policy.dimensions[i], value: String(value) },
      });
    }
    computedScore += policy.weights[i] * orientMetric(policy, i, value);
  }

  return Ok(
    Object.freeze({
      candidateId: candidate.candidateId,
      metrics: Object.freeze([...metrics]),
      computedScore,
      rank: 0,
      ...(candidate.metadata ? { metadata: candidate.metadata } : {}),
    }),
  );
}

async function* batches(stream: CandidateStream, size: number): AsyncGenerator<Candidate[]> {
  let buffer: Candidate[] = [];
  for await (const candidate of stream) {
    buffer.push(candidate);
    if (buffer.length >= size) {
      yield buffer;
      buffer = [];
    }
  }
  if (buffer.length > 0) yield buffer;
}

/**
 * Score a candidate stream under `policy`.
 *
 * Chunks are dispatched to at most `parallelism` in-flight units while the
 * stream is still being read. Once the signal aborts, no further chunk is
 * dispatched; chunks already in flight finish and are kept.
 *
 * Signatures come back sorted best-first with 1-based ranks; diagnostics keep
 * the input order of the candidates they refer to.
 */
export async function scoreCandidates(
  policy: ResolvedPolicy,
  candidates: CandidateStream,
  options: ScoreOptions = {},
): Promise<ScoringOutcome> {
  const startedAt = Date.now();
  const parallelism = Math.max(1, Math.floor(options.parallelism ?? defaultParallelism()));
  const chunkSize = Math.max(1, Math.floor(options.chunkSize ?? DEFAULT_CHUNK_SIZE));

  const controller = new AbortController();
  const onAbort = (): void => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) {
    controller.abort(options.signal.reason);
  } else {
    options.signal?.addEventListener('abort', onAbort, { once: true });
  }
  let timer: ReturnType<typeof setTimeout> | null = null;
  if (options.timeoutMs && options.timeoutMs > 0) {
    const timeoutMs = options.timeoutMs;
    timer = setTimeout(() => controller.abort(new TimeoutError(timeoutMs, 'candidate scoring')), timeoutMs);
  }

  const chunkResults: Array<Array<Result<CandidateSignature, Diagnostic>>> = [];
  const inFlight = new Set<Promise<void>>();
  let received = 0;

  try {
    if (!controller.signal.aborted) {
      for await (const unit of batches(candidates, chunkSize)) {
        if (controller.signal.aborted) break;
        received += unit.length;
        const slot = chunkResults.length;
        chunkResults.push([]);
        const task: Promise<void> = yieldToEventLoop()
          .then(() => {
            chunkResults[slot] = unit.map((candidate) => scoreCandidate(policy, candidate));
          })
          .finally(() => inFlight.delete(task));
        inFlight.add(task);
        if (inFlight.size >= parallelism) {
          await Promise.race(inFlight);
        }
      }
    }
    await Promise.all(inFlight);
  } finally {
    if (timer) clearTimeout(timer);
    options.signal?.removeEventListener('abort', onAbort);
  }

  const scored: CandidateSignature[] = [];
  const diagnostics: Diagnostic[] = [];
  for (const results of chunkResults) {
    for (const result of results) {
      if (result.ok) scored.push(result.value);
      else diagnostics.push(result.error);
    }
  }
  for (const diagnostic of diagnostics) {
    logWarning('Skipping malformed candidate', { candidateId: diagnostic.candidateId, reason: diagnostic.message });
  }

  const cancelled = controller.signal.aborted;
  const reason: unknown = controller.signal.reason;
  if (cancelled && reason instanceof TimeoutError) {
    diagnostics.push({
      kind: 'Timeout',
      message: reason.message,
      details: { timeoutMs: reason.timeoutMs, scored: scored.length, received },
    });
  }

  const durationMs = Date.now() - startedAt;
  const stats: ScoringStats = {
    received,
    scored: scored.length,
    skipped: diagnostics.filter((diagnostic) => diagnostic.kind === 'MalformedCandidate').length,
    durationMs,
    throughputPerSec: durationMs > 0 ? (scored.length * 1000) / durationMs : scored.length * 1000,
  };
  logDebug('Scored candidate batch', { ...stats, parallelism, cancelled });

  return {
    signatures: rankSignatures(scored, policy),
    diagnostics,
    cancelled,
    stats,
  };
}
