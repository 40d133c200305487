/**
 * @fileoverview Objective Extractor
 *
 * Turns an intent string plus optional explicit weights into a normalized
 * objective set. Intent parsing is a deterministic keyword classifier over
 * the registry lexicon; no model is involved.
 *
 * Weighting rules:
 * - an inferred objective weighs `0.5 + 0.25 × (hits − 1)`, capped at 1
 * - an explicit weight replaces the inferred weight for the same name
 * - explicit names that collide after case folding merge by max weight
 * - weights are renormalized to sum to 1
 */

import { UnknownObjectiveError, ValidationError } from '../core/errors.js';
import type { Objective, ObjectiveSource } from '../types.js';
import { GENERAL_RELEVANCE, getDefaultRegistry, type ObjectiveRegistry } from './registry.js';

export interface ExtractionOptions {
  registry?: ObjectiveRegistry;
  /**
   * Fold unknown explicit objectives into general relevance instead of
   * rejecting the request.
   */
  fallbackToRelevance?: boolean;
}

interface WeightedEntry {
  weight: number;
  source: ObjectiveSource;
}

const INFERRED_BASE_WEIGHT = 0.5;
const INFERRED_STEP = 0.25;

export function tokenizeIntent(intent: string): string[] {
  return intent
    .toLowerCase()
    .split(/[^a-z0-9+#_-]+/)
    .map((token) => token.replace(/^-+|-+$/g, ''))
    .filter((token) => token.length > 0);
}

/**
 * Keyword hits per objective, counting each distinct keyword once.
 */
export function matchKeywords(intent: string, registry: ObjectiveRegistry = getDefaultRegistry()): Map<string, string[]> {
  const haystack = ` ${tokenizeIntent(intent).join(' ')} `;
  const hits = new Map<string, string[]>();
  if (haystack.trim().length === 0) return hits;

  for (const name of registry.dimensions) {
    const matched = registry.keywords(name).filter((keyword) => haystack.includes(` ${keyword} `));
    if (matched.length > 0) {
      hits.set(name, Array.from(new Set(matched)));
    }
  }
  return hits;
}

function inferredWeight(hitCount: number): number {
  return Math.min(1, INFERRED_BASE_WEIGHT + INFERRED_STEP * (hitCount - 1));
}

function validateWeight(name: string, weight: number): void {
  if (typeof weight !== 'number' || !Number.isFinite(weight) || weight < 0) {
    throw new ValidationError(`objectives.${name}`, 'finite non-negative number', String(weight));
  }
}

function mergeMax(target: Map<string, WeightedEntry>, name: string, entry: WeightedEntry): void {
  const existing = target.get(name);
  if (!existing || entry.weight > existing.weight) {
    target.set(name, entry);
  }
}

/**
 * Extract the validated objective set for one request.
 *
 * @throws UnknownObjectiveError when an explicit name is not registered and
 *   the relevance fallback is off
 * @throws ValidationError for negative or non-finite weights, or when every
 *   explicit weight is zero and nothing was inferred
 */
export function extractObjectives(
  intent: string,
  overrides: Readonly<Record<string, number>> = {},
  options: ExtractionOptions = {},
): Objective[] {
  const registry = options.registry ?? getDefaultRegistry();

  const inferred = new Map<string, WeightedEntry>();
  for (const [name, keywords] of matchKeywords(intent, registry)) {
    inferred.set(name, { weight: inferredWeight(keywords.length), source: 'inferred' });
  }

  const explicit = new Map<string, WeightedEntry>();
  const unknown: string[] = [];
  for (const [rawName, weight] of Object.entries(overrides)) {
    validateWeight(rawName, weight);
    const name = rawName.trim().toLowerCase();
    if (registry.has(name)) {
      mergeMax(explicit, name, { weight, source: 'explicit' });
    } else if (options.fallbackToRelevance && registry.has(GENERAL_RELEVANCE)) {
      mergeMax(explicit, GENERAL_RELEVANCE, { weight, source: 'explicit' });
    } else {
      unknown.push(rawName);
    }
  }
  if (unknown.length > 0) {
    throw new UnknownObjectiveError(unknown, [...registry.dimensions]);
  }

  const combined = new Map(inferred);
  for (const [name, entry] of explicit) {
    combined.set(name, entry);
  }
  for (const [name, entry] of combined) {
    if (entry.weight === 0) combined.delete(name);
  }

  if (combined.size === 0) {
    if (explicit.size > 0) {
      throw new ValidationError('objectives', 'at least one positive weight', 'all weights are zero');
    }
    if (!registry.has(GENERAL_RELEVANCE)) {
      throw new ValidationError('intent', 'at least one recognizable objective', JSON.stringify(intent));
    }
    combined.set(GENERAL_RELEVANCE, { weight: 1, source: 'inferred' });
  }

  const total = Array.from(combined.values()).reduce((sum, entry) => sum + entry.weight, 0);
  return Array.from(combined.entries())
    .sort(([a], [b]) => registry.order(a) - registry.order(b))
    .map(([name, entry]) => ({
      name,
      weight: entry.weight / total,
      directionality: registry.directionality(name),
      source: entry.source,
    }));
}

/** Sum of objective weights; 1 for any extractor output. */
export function totalWeight(objectives: readonly Objective[]): number {
  return objectives.reduce((sum, objective) => sum + objective.weight, 0);
}
