/**
 * @fileoverview repo-concord public API
 *
 * @packageDocumentation
 */

export * from './types.js';

// Errors and results
export {
  ConcordError,
  UnknownObjectiveError,
  UnresolvableConflictError,
  ValidationError,
  StorageError,
  CacheUnavailableError,
  isConcordError,
  isRetryableError,
  type ErrorJSON,
  type OffendingConflict,
  type StorageOperation,
} from './core/errors.js';
export { Ok, Err, isOk, isErr, unwrap, type Result } from './core/result.js';
export { TimeoutError, withTimeout } from './utils/async.js';

// Objectives and conflicts
export {
  ObjectiveRegistry,
  DEFAULT_OBJECTIVES,
  DEFAULT_CONFLICTS,
  GENERAL_RELEVANCE,
  getDefaultRegistry,
  type RegistryExtension,
  type Lexicon,
} from './objectives/registry.js';
export { extractObjectives, tokenizeIntent, type ExtractionOptions } from './objectives/extractor.js';
export { detectConflicts } from './conflicts/detector.js';
export {
  resolveConflicts,
  harmonizePair,
  DEFAULT_MIN_HARMONY,
  HARMONIZATION_PULL,
  CONFLICT_TENSION,
  type ResolveOptions,
} from './conflicts/resolver.js';

// Scoring, aggregation, output
export {
  scoreCandidate,
  scoreCandidates,
  type CandidateStream,
  type ScoreOptions,
  type ScoringOutcome,
  type ScoringStats,
} from './scoring/scorer.js';
export { rankSignatures, createSignatureComparator } from './scoring/ranking.js';
export { aggregateSignatures, SignatureAccumulator, type AggregateOptions } from './aggregation/aggregator.js';
export {
  materializeOutput,
  type MaterializeOptions,
  type Recommendation,
  type RecommendationOutput,
  type RecommendationType,
  type EffortLevel,
} from './output/materializer.js';

// Pipeline
export {
  RecommendationPipeline,
  isRecommendationFailure,
  type PipelineOptions,
  type RecommendationFailure,
} from './pipeline/recommend.js';
export { RecommendRequestSchema, parseRecommendRequest, type RecommendRequest } from './pipeline/schema.js';
export { ArrayCandidateSource, loadCandidateFile, parseCandidates } from './candidates/source.js';

// Storage
export type {
  ConcordStore,
  SessionStore,
  PolicyCache,
  SignatureCache,
  SignatureCacheEntry,
  EvictionReport,
  Clock,
} from './storage/types.js';
export { InMemoryConcordStore } from './storage/memory_store.js';
export { SqliteConcordStore } from './storage/sqlite_store.js';
export { ResilientStore, type ResilientStoreOptions } from './storage/resilient_store.js';
export { SessionLocks } from './storage/session_locks.js';
export { computePolicyFingerprint, computeContentHash } from './storage/keys.js';

// Ambient
export { loadConfig, presetDefaults, PRESET_NAMES, type ConcordConfig, type PresetName } from './config/index.js';
export { InMemoryMetricsRecorder, METRIC_NAMES, noopMetrics, type MetricsSink } from './metrics/recorder.js';
export { setLogLevel, getLogLevel, type LogLevel } from './telemetry/logger.js';
