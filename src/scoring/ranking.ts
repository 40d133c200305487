/**
 * @fileoverview Ranking order shared by the scorer and the aggregator.
 *
 * Scores are compared on a 1e-9 grid so that "equal within epsilon" is a
 * true equivalence and the comparator is a total order. Ties fall through:
 *
 * 1. candidate whose strongest objective comes earlier in the tie-break order
 * 2. oriented metrics compared along the tie-break order
 * 3. candidateId ascending
 */

import type { CandidateSignature, ResolvedPolicy } from '../types.js';

export const SCORE_EPSILON = 1e-9;

export function quantizeScore(score: number): number {
  return Math.round(score / SCORE_EPSILON);
}

/** Orient a raw metric so that larger is always better. */
export function orientMetric(policy: ResolvedPolicy, dimensionIndex: number, value: number): number {
  return policy.directionality[dimensionIndex] === 'minimize' ? 1 - value : value;
}

export type SignatureComparator = (x: CandidateSignature, y: CandidateSignature) => number;

/**
 * Comparator placing better signatures first. With no policy, ties go
 * straight to candidateId.
 */
export function createSignatureComparator(policy?: ResolvedPolicy): SignatureComparator {
  const tieBreakIndexes = policy
    ? policy.tieBreakOrder.map((name) => policy.dimensions.indexOf(name)).filter((index) => index >= 0)
    : [];

  const oriented = (signature: CandidateSignature, index: number): number =>
    policy ? orientMetric(policy, index, signature.metrics[index] ?? 0) : 0;

  const strongestPosition = (signature: CandidateSignature): number => {
    let best = 0;
    for (let position = 1; position < tieBreakIndexes.length; position++) {
      if (
        quantizeScore(oriented(signature, tieBreakIndexes[position])) >
        quantizeScore(oriented(signature, tieBreakIndexes[best]))
      ) {
        best = position;
      }
    }
    return best;
  };

  return (x, y) => {
    const byScore = quantizeScore(y.computedScore) - quantizeScore(x.computedScore);
    if (byScore !== 0) return byScore;

    if (tieBreakIndexes.length > 0) {
      const byStrongest = strongestPosition(x) - strongestPosition(y);
      if (byStrongest !== 0) return byStrongest;

      for (const index of tieBreakIndexes) {
        const byMetric = quantizeScore(oriented(y, index)) - quantizeScore(oriented(x, index));
        if (byMetric !== 0) return byMetric;
      }
    }

    if (x.candidateId === y.candidateId) return 0;
    return x.candidateId < y.candidateId ? -1 : 1;
  };
}

/**
 * Sort into a new array and assign 1-based ranks. Inputs are left untouched;
 * every returned signature is a new frozen object.
 */
export function rankSignatures(
  signatures: readonly CandidateSignature[],
  policy?: ResolvedPolicy,
): CandidateSignature[] {
  const comparator = createSignatureComparator(policy);
  return [...signatures]
    .sort(comparator)
    .map((signature, index) => Object.freeze({ ...signature, rank: index + 1 }));
}
