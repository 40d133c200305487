/**
 * @fileoverview Shared domain types for the recommendation pipeline.
 *
 * Everything a stage hands to the next stage is declared here so that the
 * stages themselves only depend on types, never on each other's internals.
 */

// ============================================================================
// OBJECTIVES
// ============================================================================

export type Directionality = 'maximize' | 'minimize';
export type ObjectiveSource = 'explicit' | 'inferred';

/** A named, weighted scoring dimension requested for a recommendation. */
export interface Objective {
  name: string;
  /** In [0, 1]; after extraction the weights of one request sum to 1. */
  weight: number;
  directionality: Directionality;
  source: ObjectiveSource;
}

export interface ObjectiveDefinition {
  name: string;
  directionality: Directionality;
  description: string;
}

// ============================================================================
// CONFLICTS
// ============================================================================

export type ConflictSeverity = 'low' | 'moderate' | 'hard';

/** A registered pair of objectives known to trade off against each other. */
export interface ConflictPair {
  readonly a: string;
  readonly b: string;
  readonly severity: ConflictSeverity;
  readonly rationale: string;
}

export interface DetectedConflict {
  a: string;
  b: string;
  severity: ConflictSeverity;
  rationale: string;
}

export interface ConflictResolution {
  a: string;
  b: string;
  severity: ConflictSeverity;
  before: { a: number; b: number };
  after: { a: number; b: number };
  /** Per-conflict harmony factor; 1 minus the residual imbalance. */
  component: number;
}

// ============================================================================
// POLICY
// ============================================================================

export interface ResolvedPolicy {
  /** Scoring-dimension basis, in registry order. */
  readonly dimensions: readonly string[];
  readonly directionality: readonly Directionality[];
  /** Harmonized weights aligned with `dimensions`; absent objectives weigh 0. */
  readonly weights: readonly number[];
  readonly tieBreakOrder: readonly string[];
  readonly harmonyScore: number;
  readonly minHarmony: number;
  readonly conflicts: readonly ConflictResolution[];
  readonly objectives: readonly Objective[];
}

// ============================================================================
// CANDIDATES
// ============================================================================

export interface RepositoryMetadata {
  name?: string;
  url?: string;
  language?: string;
  topics?: string[];
}

export interface Candidate {
  candidateId: string;
  /** One scalar per scoring dimension, in [0, 1]. */
  metrics: number[];
  metadata?: RepositoryMetadata;
}

export interface CandidateSignature {
  readonly candidateId: string;
  readonly metrics: readonly number[];
  readonly computedScore: number;
  readonly rank: number;
  readonly metadata?: RepositoryMetadata;
}

// ============================================================================
// DIAGNOSTICS
// ============================================================================

export type DiagnosticKind = 'MalformedCandidate' | 'CacheUnavailable' | 'Timeout';

export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  candidateId?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// SESSIONS
// ============================================================================

export interface Session {
  sessionId: string;
  policy: ResolvedPolicy;
  /** Running max-by-key aggregate over every request in the thread. */
  aggregate: CandidateSignature[];
  requestCount: number;
  createdAt: number;
  updatedAt: number;
  expiresAt: number;
}
