/**
 * @fileoverview Result Aggregator
 *
 * Folds batches of signatures into one ranked list. The fold is a max-by-key
 * reduction over candidateId: the surviving signature for an id is the one
 * the ranking comparator places first, with a lexicographic metric compare
 * as the last word, so merging batches in any order or grouping gives the
 * same result.
 *
 * @packageDocumentation
 */

import type { CandidateSignature, ResolvedPolicy } from '../types.js';
import { createSignatureComparator, rankSignatures, type SignatureComparator } from '../scoring/ranking.js';

export interface AggregateOptions {
  /** Keep at most this many signatures; omitted or 0 keeps all */
  limit?: number;
  policy?: ResolvedPolicy;
}

function compareMetrics(x: readonly number[], y: readonly number[]): number {
  const length = Math.min(x.length, y.length);
  for (let i = 0; i < length; i++) {
    if (x[i] !== y[i]) return x[i] > y[i] ? -1 : 1;
  }
  return y.length - x.length;
}

/** True when `challenger` should replace `incumbent` for the same candidateId. */
function supersedes(
  challenger: CandidateSignature,
  incumbent: CandidateSignature,
  comparator: SignatureComparator,
): boolean {
  const order = comparator(challenger, incumbent);
  if (order !== 0) return order < 0;
  return compareMetrics(challenger.metrics, incumbent.metrics) < 0;
}

/**
 * Incremental form of {@link aggregateSignatures}. Batches can arrive one at
 * a time, from any number of producers; `snapshot` ranks what has been seen.
 */
export class SignatureAccumulator {
  private readonly best = new Map<string, CandidateSignature>();
  private readonly comparator: SignatureComparator;

  constructor(private readonly policy?: ResolvedPolicy) {
    this.comparator = createSignatureComparator(policy);
  }

  add(batch: Iterable<CandidateSignature>): this {
    for (const signature of batch) {
      const incumbent = this.best.get(signature.candidateId);
      if (!incumbent || supersedes(signature, incumbent, this.comparator)) {
        this.best.set(signature.candidateId, signature);
      }
    }
    return this;
  }

  get size(): number {
    return this.best.size;
  }

  snapshot(limit?: number): CandidateSignature[] {
    const ranked = rankSignatures(Array.from(this.best.values()), this.policy);
    return limit && limit > 0 ? ranked.slice(0, limit) : ranked;
  }
}

/**
 * Merge signature batches into one list ranked 1..N and truncated to
 * `limit`. Idempotent, commutative and associative over batches.
 */
export function aggregateSignatures(
  batches: Iterable<Iterable<CandidateSignature>>,
  options: AggregateOptions = {},
): CandidateSignature[] {
  const accumulator = new SignatureAccumulator(options.policy);
  for (const batch of batches) {
    accumulator.add(batch);
  }
  return accumulator.snapshot(options.limit);
}
