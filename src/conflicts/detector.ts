import { getDefaultRegistry, type ObjectiveRegistry } from '../objectives/registry.js';
import type { ConflictSeverity, DetectedConflict, Objective } from '../types.js';

export const SEVERITY_RANK: Record<ConflictSeverity, number> = {
  low: 0,
  moderate: 1,
  hard: 2,
};

/**
 * Canonical conflict order: name pair (code-unit order), then severity.
 * Harmonization is not associative across pairs that share an objective, so
 * every consumer must process conflicts in this order.
 */
export function compareConflicts(x: DetectedConflict, y: DetectedConflict): number {
  if (x.a !== y.a) return x.a < y.a ? -1 : 1;
  if (x.b !== y.b) return x.b < y.b ? -1 : 1;
  return SEVERITY_RANK[x.severity] - SEVERITY_RANK[y.severity];
}

export function sortConflicts(conflicts: readonly DetectedConflict[]): DetectedConflict[] {
  return conflicts
    .map((conflict) => (conflict.a <= conflict.b ? { ...conflict } : { ...conflict, a: conflict.b, b: conflict.a }))
    .sort(compareConflicts);
}

/**
 * Every registered conflict between two objectives present (weight > 0) in
 * the set, in canonical order. An empty list is a normal outcome.
 */
export function detectConflicts(
  objectives: readonly Objective[],
  registry: ObjectiveRegistry = getDefaultRegistry(),
): DetectedConflict[] {
  const present = Array.from(new Set(objectives.filter((objective) => objective.weight > 0).map((objective) => objective.name)));
  const detected: DetectedConflict[] = [];

  for (let i = 0; i < present.length; i++) {
    for (let j = i + 1; j < present.length; j++) {
      const pair = registry.findConflict(present[i], present[j]);
      if (pair) {
        detected.push({ a: pair.a, b: pair.b, severity: pair.severity, rationale: pair.rationale });
      }
    }
  }

  return sortConflicts(detected);
}
