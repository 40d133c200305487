/**
 * @fileoverview Objective and conflict registry
 *
 * The objective vocabulary is closed: a request may only name objectives
 * registered here, and the registration order fixes both the scoring-dimension
 * basis and the last-resort tie-break. Extending the vocabulary goes through
 * {@link ObjectiveRegistry.extend}, which returns a new registry; an existing
 * registry never changes.
 *
 * @packageDocumentation
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import type { ConflictPair, ConflictSeverity, Directionality, ObjectiveDefinition } from '../types.js';

// ============================================================================
// DEFAULT VOCABULARY
// ============================================================================

/** Substituted for unknown objectives when the caller opts into the fallback. */
export const GENERAL_RELEVANCE = 'relevance';

export const DEFAULT_OBJECTIVES: readonly ObjectiveDefinition[] = [
  { name: GENERAL_RELEVANCE, directionality: 'maximize', description: 'General relevance to the intent' },
  { name: 'breadth', directionality: 'maximize', description: 'Covers a wide surface of the problem space' },
  { name: 'precision', directionality: 'maximize', description: 'Solves exactly the stated problem' },
  { name: 'depth', directionality: 'maximize', description: 'Thorough, exhaustive treatment' },
  { name: 'speed', directionality: 'maximize', description: 'Fast to run and to get results from' },
  { name: 'simplicity', directionality: 'maximize', description: 'Small, approachable surface' },
  { name: 'stability', directionality: 'maximize', description: 'Mature and production-proven' },
  { name: 'innovation', directionality: 'maximize', description: 'Novel or cutting-edge approach' },
  { name: 'security', directionality: 'maximize', description: 'Security posture and audit focus' },
  { name: 'community', directionality: 'maximize', description: 'Active maintenance and contributors' },
  { name: 'documentation', directionality: 'maximize', description: 'Quality of docs and examples' },
  { name: 'integration_effort', directionality: 'minimize', description: 'Work needed to adopt the repository' },
];

export const DEFAULT_CONFLICTS: readonly ConflictPair[] = [
  { a: 'breadth', b: 'precision', severity: 'hard', rationale: 'Scanning everything dilutes how exactly any one result fits' },
  { a: 'depth', b: 'speed', severity: 'hard', rationale: 'Exhaustive analysis cannot also be instant' },
  { a: 'breadth', b: 'simplicity', severity: 'moderate', rationale: 'Comprehensive tools expose a large surface' },
  { a: 'depth', b: 'simplicity', severity: 'moderate', rationale: 'Thorough processing resists a simple interface' },
  { a: 'innovation', b: 'stability', severity: 'moderate', rationale: 'Cutting-edge projects have had less time to settle' },
  { a: 'breadth', b: 'speed', severity: 'low', rationale: 'Wider scans take longer' },
  { a: 'security', b: 'speed', severity: 'low', rationale: 'Audit-grade checks add latency' },
];

// ============================================================================
// LEXICON
// ============================================================================

const LexiconSchema = z.record(z.string(), z.array(z.string().min(1)));

export type Lexicon = Readonly<Record<string, readonly string[]>>;

let defaultLexicon: Lexicon | null = null;

/**
 * Keyword lexicon shipped beside this module. Keywords are lower-case; a
 * multi-token keyword matches as a phrase.
 */
export function loadDefaultLexicon(): Lexicon {
  if (!defaultLexicon) {
    const raw = readFileSync(new URL('./lexicon.json', import.meta.url), 'utf8');
    defaultLexicon = LexiconSchema.parse(JSON.parse(raw));
  }
  return defaultLexicon;
}

// ============================================================================
// REGISTRY
// ============================================================================

export interface RegistryExtension {
  objectives?: readonly ObjectiveDefinition[];
  conflicts?: readonly ConflictPair[];
  keywords?: Lexicon;
}

interface RegisteredObjective {
  definition: ObjectiveDefinition;
  order: number;
  keywords: readonly string[];
}

export function conflictKey(a: string, b: string): string {
  return a < b ? `${a}\u0000${b}` : `${b}\u0000${a}`;
}

export class ObjectiveRegistry {
  private readonly objectives = new Map<string, RegisteredObjective>();
  private readonly conflicts = new Map<string, ConflictPair>();
  readonly dimensions: readonly string[];

  constructor(
    definitions: readonly ObjectiveDefinition[],
    conflicts: readonly ConflictPair[],
    lexicon: Lexicon = {},
  ) {
    definitions.forEach((definition, order) => {
      const name = definition.name.trim().toLowerCase();
      if (!name) {
        throw new ValidationError('objective.name', 'non-empty name', JSON.stringify(definition.name));
      }
      if (this.objectives.has(name)) {
        throw new ValidationError('objective.name', 'unique name', `duplicate "${name}"`);
      }
      this.objectives.set(name, {
        definition: Object.freeze({ ...definition, name }),
        order,
        keywords: Object.freeze((lexicon[name] ?? []).map((keyword) => keyword.toLowerCase())),
      });
    });

    for (const name of Object.keys(lexicon)) {
      if (!this.objectives.has(name)) {
        throw new ValidationError('lexicon', 'keywords for a registered objective', `"${name}"`);
      }
    }

    for (const pair of conflicts) {
      if (pair.a === pair.b) {
        throw new ValidationError('conflict', 'two distinct objectives', `${pair.a}/${pair.b}`);
      }
      for (const name of [pair.a, pair.b]) {
        if (!this.objectives.has(name)) {
          throw new ValidationError('conflict', 'registered objective', `"${name}"`);
        }
      }
      const key = conflictKey(pair.a, pair.b);
      if (this.conflicts.has(key)) {
        throw new ValidationError('conflict', 'unique pair', `duplicate ${pair.a}/${pair.b}`);
      }
      const [a, b] = pair.a < pair.b ? [pair.a, pair.b] : [pair.b, pair.a];
      this.conflicts.set(key, Object.freeze({ ...pair, a, b }));
    }

    this.dimensions = Object.freeze(Array.from(this.objectives.keys()));
  }

  has(name: string): boolean {
    return this.objectives.has(name);
  }

  get(name: string): ObjectiveDefinition | undefined {
    return this.objectives.get(name)?.definition;
  }

  directionality(name: string): Directionality {
    return this.objectives.get(name)?.definition.directionality ?? 'maximize';
  }

  /** Registration position; unknown names sort last. */
  order(name: string): number {
    return this.objectives.get(name)?.order ?? Number.MAX_SAFE_INTEGER;
  }

  keywords(name: string): readonly string[] {
    return this.objectives.get(name)?.keywords ?? [];
  }

  list(): ObjectiveDefinition[] {
    return Array.from(this.objectives.values(), (entry) => entry.definition);
  }

  findConflict(a: string, b: string): ConflictPair | undefined {
    return this.conflicts.get(conflictKey(a, b));
  }

  listConflicts(severity?: ConflictSeverity): ConflictPair[] {
    const all = Array.from(this.conflicts.values());
    return severity ? all.filter((pair) => pair.severity === severity) : all;
  }

  /**
   * New registry with extra objectives appended (after the existing basis),
   * extra conflict pairs and extra keywords. Keywords for an existing
   * objective are added to, not replaced.
   */
  extend(extension: RegistryExtension): ObjectiveRegistry {
    const lexicon: Record<string, string[]> = {};
    for (const entry of this.objectives.values()) {
      lexicon[entry.definition.name] = [...entry.keywords];
    }
    for (const [name, keywords] of Object.entries(extension.keywords ?? {})) {
      lexicon[name] = [...(lexicon[name] ?? []), ...keywords];
    }
    return new ObjectiveRegistry(
      [...this.list(), ...(extension.objectives ?? [])],
      [...this.conflicts.values(), ...(extension.conflicts ?? [])],
      lexicon,
    );
  }
}

let defaultRegistry: ObjectiveRegistry | null = null;

export function getDefaultRegistry(): ObjectiveRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new ObjectiveRegistry(DEFAULT_OBJECTIVES, DEFAULT_CONFLICTS, loadDefaultLexicon());
  }
  return defaultRegistry;
}
