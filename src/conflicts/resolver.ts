/**
 * @fileoverview Conflict Resolver
 *
 * Folds a possibly-conflicting objective set into one frozen scoring policy.
 *
 * For each detected conflict, in canonical order, the two competing weights
 * are pulled toward their shared midpoint. The pull is stronger for harder
 * conflicts, and the pair's total weight is preserved. Each conflict then
 * contributes a harmony factor:
 *
 *   lopsidedness = |wa' − wb'| / (wa' + wb')
 *   contention   = tension(severity) × (wa' + wb')
 *   factor       = (1 − lopsidedness) × (1 − contention)
 *
 * A later step can move an objective a hard pair shares with a softer one
 * and reopen the hard gap. Hard pairs whose final gap is not narrower than
 * their original gap are pulled again, on the final weights, until every
 * one is.
 *
 * The policy's harmony score is the product of the factors (1.0 when there
 * are no conflicts). A product below the configured minimum fails the
 * request with {@link UnresolvableConflictError}.
 *
 * @packageDocumentation
 */

import { UnresolvableConflictError, ValidationError, type OffendingConflict } from '../core/errors.js';
import { getDefaultRegistry, type ObjectiveRegistry } from '../objectives/registry.js';
import type {
  ConflictResolution,
  ConflictSeverity,
  DetectedConflict,
  Objective,
  ResolvedPolicy,
} from '../types.js';
import { sortConflicts } from './detector.js';

/** Fraction of the distance to the midpoint each weight travels. */
export const HARMONIZATION_PULL: Record<ConflictSeverity, number> = {
  low: 0.25,
  moderate: 0.5,
  hard: 0.75,
};

/** Harmony lost per unit of policy weight held by a contended pair. */
export const CONFLICT_TENSION: Record<ConflictSeverity, number> = {
  low: 0.1,
  moderate: 0.2,
  hard: 0.3,
};

export const DEFAULT_MIN_HARMONY = 0.5;

/** Bound on re-pull sweeps over hard pairs that share objectives. */
const MAX_HARD_SWEEPS = 16;

export interface ResolveOptions {
  minHarmony?: number;
  registry?: ObjectiveRegistry;
}

export interface HarmonizedPair {
  a: number;
  b: number;
  component: number;
}

/**
 * One harmonization step on a single pair of weights.
 */
export function harmonizePair(wa: number, wb: number, severity: ConflictSeverity): HarmonizedPair {
  const total = wa + wb;
  if (total <= 0) {
    return { a: wa, b: wb, component: 1 };
  }
  const mid = total / 2;
  const pull = HARMONIZATION_PULL[severity];
  const a = wa + pull * (mid - wa);
  const b = wb + pull * (mid - wb);
  const lopsidedness = Math.abs(a - b) / total;
  const contention = CONFLICT_TENSION[severity] * total;
  const component = (1 - lopsidedness) * (1 - contention);
  return { a, b, component: Math.min(1, Math.max(0, component)) };
}

function normalizedWeights(objectives: readonly Objective[]): Map<string, number> {
  const merged = new Map<string, number>();
  for (const objective of objectives) {
    if (!Number.isFinite(objective.weight) || objective.weight < 0) {
      throw new ValidationError(`objectives.${objective.name}`, 'finite non-negative weight', String(objective.weight));
    }
    merged.set(objective.name, Math.max(merged.get(objective.name) ?? 0, objective.weight));
  }
  const total = Array.from(merged.values()).reduce((sum, weight) => sum + weight, 0);
  if (total <= 0) {
    throw new ValidationError('objectives', 'at least one positive weight', 'all weights are zero');
  }
  for (const [name, weight] of merged) {
    merged.set(name, weight / total);
  }
  return merged;
}

/**
 * Objectives by original weight descending; equal weights fall back to
 * registration order.
 */
export function buildTieBreakOrder(weights: ReadonlyMap<string, number>, registry: ObjectiveRegistry): string[] {
  return Array.from(weights.entries())
    .filter(([, weight]) => weight > 0)
    .sort(([nameA, weightA], [nameB, weightB]) => weightB - weightA || registry.order(nameA) - registry.order(nameB))
    .map(([name]) => name);
}

function gap(weights: ReadonlyMap<string, number>, a: string, b: string): number {
  return Math.abs((weights.get(a) ?? 0) - (weights.get(b) ?? 0));
}

/**
 * Re-pull hard pairs whose gap in `working` is not strictly narrower than
 * in `original`. Pair totals are kept, so the weights still sum to one.
 */
function settleHardGaps(
  working: Map<string, number>,
  original: ReadonlyMap<string, number>,
  resolutions: readonly ConflictResolution[],
): void {
  const hard = resolutions.filter(
    (resolution) => resolution.severity === 'hard' && gap(original, resolution.a, resolution.b) > 0,
  );
  for (let sweep = 0; sweep < MAX_HARD_SWEEPS; sweep++) {
    let settled = true;
    for (const { a, b } of hard) {
      if (gap(working, a, b) < gap(original, a, b)) continue;
      settled = false;
      const step = harmonizePair(working.get(a) ?? 0, working.get(b) ?? 0, 'hard');
      working.set(a, step.a);
      working.set(b, step.b);
    }
    if (settled) return;
  }
}

/**
 * Resolve conflicts into a frozen policy.
 *
 * @throws UnresolvableConflictError when harmony falls below `minHarmony`
 * @throws ValidationError when an objective is not registered or no weight is positive
 */
export function resolveConflicts(
  objectives: readonly Objective[],
  conflicts: readonly DetectedConflict[],
  options: ResolveOptions = {},
): ResolvedPolicy {
  const registry = options.registry ?? getDefaultRegistry();
  const minHarmony = options.minHarmony ?? DEFAULT_MIN_HARMONY;
  if (!Number.isFinite(minHarmony) || minHarmony < 0 || minHarmony > 1) {
    throw new ValidationError('minHarmony', 'number in [0, 1]', String(minHarmony));
  }

  const original = normalizedWeights(objectives);
  for (const name of original.keys()) {
    if (!registry.has(name)) {
      throw new ValidationError('objectives', 'registered objective', `"${name}"`);
    }
  }

  const working = new Map(original);
  const resolutions: ConflictResolution[] = [];
  let harmonyScore = 1;

  for (const conflict of sortConflicts(conflicts)) {
    const before = { a: working.get(conflict.a) ?? 0, b: working.get(conflict.b) ?? 0 };
    if (before.a + before.b <= 0) continue;
    const step = harmonizePair(before.a, before.b, conflict.severity);
    working.set(conflict.a, step.a);
    working.set(conflict.b, step.b);
    harmonyScore *= step.component;
    resolutions.push({
      a: conflict.a,
      b: conflict.b,
      severity: conflict.severity,
      before,
      after: { a: step.a, b: step.b },
      component: step.component,
    });
  }

  settleHardGaps(working, original, resolutions);

  if (harmonyScore < minHarmony) {
    const offending: OffendingConflict[] = resolutions
      .filter((resolution) => resolution.component < 1)
      .sort((x, y) => x.component - y.component)
      .map(({ a, b, severity, component }) => ({ a, b, severity, component }));
    throw new UnresolvableConflictError(offending, harmonyScore, minHarmony);
  }

  const dimensions = registry.dimensions;
  return Object.freeze({
    dimensions,
    directionality: Object.freeze(dimensions.map((name) => registry.directionality(name))),
    weights: Object.freeze(dimensions.map((name) => working.get(name) ?? 0)),
    tieBreakOrder: Object.freeze(buildTieBreakOrder(original, registry)),
    harmonyScore,
    minHarmony,
    conflicts: Object.freeze(resolutions.map((resolution) => Object.freeze(resolution))),
    objectives: Object.freeze(
      Array.from(original.entries())
        .sort(([a], [b]) => registry.order(a) - registry.order(b))
        .map(([name, weight]) =>
          Object.freeze({
            name,
            weight,
            directionality: registry.directionality(name),
            source: objectives.find((objective) => objective.name === name)?.source ?? 'inferred',
          }),
        ),
    ),
  });
}
