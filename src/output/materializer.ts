/**
 * @fileoverview Output Materializer
 *
 * Renders a ranked signature list and its policy into the caller-facing
 * recommendation output: per-candidate recommendation type and integration
 * effort, a conflict explanation, summary insights and next actions.
 * Pure; inputs are never mutated.
 *
 * @packageDocumentation
 */

import { orientMetric } from '../scoring/ranking.js';
import type { CandidateSignature, Diagnostic, RepositoryMetadata, ResolvedPolicy } from '../types.js';

// ============================================================================
// TYPES
// ============================================================================

export type RecommendationType = 'quick-integration' | 'high-value' | 'security-enhancement' | 'strategic';
export type EffortLevel = 'low' | 'medium' | 'high' | 'unknown';

export interface Recommendation {
  rank: number;
  candidateId: string;
  score: number;
  metadata?: RepositoryMetadata;
  recommendationType: RecommendationType;
  integrationEffort: EffortLevel;
  /** Dimension contributing most to the score */
  strongestDimension: string | null;
  notes: string[];
}

export interface RecommendationOutput {
  intent?: string;
  sessionId?: string;
  harmonyScore: number;
  recommendations: Recommendation[];
  explanation: string[];
  insights: string[];
  nextActions: string[];
  diagnostics: Diagnostic[];
}

export interface MaterializeOptions {
  limit?: number;
  intent?: string;
  sessionId?: string;
  diagnostics?: readonly Diagnostic[];
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

export const INTEGRATION_EFFORT = 'integration_effort';

const QUICK_EFFORT_BELOW = 0.3;
const MEDIUM_EFFORT_BELOW = 0.6;
const HIGH_VALUE_ABOVE = 0.9;
const COMPLEX_EFFORT_ABOVE = 0.7;

/** Raw integration_effort metric, or null when the basis has no such dimension. */
export function integrationEffortOf(policy: ResolvedPolicy, signature: CandidateSignature): number | null {
  const index = policy.dimensions.indexOf(INTEGRATION_EFFORT);
  if (index < 0) return null;
  return signature.metrics[index] ?? null;
}

export function effortLevel(effort: number | null): EffortLevel {
  if (effort === null) return 'unknown';
  if (effort < QUICK_EFFORT_BELOW) return 'low';
  if (effort < MEDIUM_EFFORT_BELOW) return 'medium';
  return 'high';
}

export function strongestDimension(policy: ResolvedPolicy, signature: CandidateSignature): string | null {
  let best: string | null = null;
  let bestContribution = 0;
  for (let index = 0; index < policy.dimensions.length; index++) {
    const contribution = policy.weights[index] * orientMetric(policy, index, signature.metrics[index] ?? 0);
    if (contribution > bestContribution) {
      best = policy.dimensions[index];
      bestContribution = contribution;
    }
  }
  return best;
}

export function recommendationType(
  score: number,
  effort: number | null,
  strongest: string | null,
): RecommendationType {
  if (effort !== null && effort < QUICK_EFFORT_BELOW) return 'quick-integration';
  if (score > HIGH_VALUE_ABOVE) return 'high-value';
  if (strongest === 'security') return 'security-enhancement';
  return 'strategic';
}

const LANGUAGE_NOTES: Record<string, string> = {
  python: 'Python package; install into an isolated virtual environment',
  javascript: 'Node.js package; add it through npm',
  typescript: 'Node.js package; add it through npm',
  go: 'Go module; vendor it as a library or build it as a binary',
};

function implementationNotes(
  metadata: RepositoryMetadata | undefined,
  effort: number | null,
  type: RecommendationType,
  strongest: string | null,
): string[] {
  const notes: string[] = [];
  const languageNote = metadata?.language ? LANGUAGE_NOTES[metadata.language.toLowerCase()] : undefined;
  if (languageNote) notes.push(languageNote);
  if (effort !== null && effort > COMPLEX_EFFORT_ABOVE) {
    notes.push('Complex integration; start with a proof of concept');
  }
  if (type === 'security-enhancement' || strongest === 'security') {
    notes.push('Security tooling; wire it into the CI pipeline');
  }
  return notes;
}

// ============================================================================
// SUMMARY
// ============================================================================

function formatWeight(value: number): string {
  return value.toFixed(3);
}

export function explainPolicy(policy: ResolvedPolicy): string[] {
  const lines = policy.conflicts.map(
    (conflict) =>
      `${conflict.a} vs ${conflict.b} (${conflict.severity}): ` +
      `${formatWeight(conflict.before.a)}/${formatWeight(conflict.before.b)} -> ` +
      `${formatWeight(conflict.after.a)}/${formatWeight(conflict.after.b)}`,
  );
  if (lines.length === 0) {
    lines.push('No conflicting objectives');
  }
  lines.push(`Harmony ${formatWeight(policy.harmonyScore)} (minimum ${formatWeight(policy.minHarmony)})`);
  return lines;
}

function dominantLanguage(recommendations: readonly Recommendation[]): string | null {
  const counts = new Map<string, number>();
  for (const recommendation of recommendations) {
    const language = recommendation.metadata?.language;
    if (language) counts.set(language, (counts.get(language) ?? 0) + 1);
  }
  let dominant: string | null = null;
  let dominantCount = 0;
  // Map iteration follows first appearance, so ties go to the better-ranked language.
  for (const [language, count] of counts) {
    if (count > dominantCount) {
      dominant = language;
      dominantCount = count;
    }
  }
  return dominant;
}

function buildInsights(
  recommendations: readonly Recommendation[],
  efforts: readonly (number | null)[],
): string[] {
  if (recommendations.length === 0) return [];
  const insights: string[] = [];
  const averageScore = recommendations.reduce((sum, entry) => sum + entry.score, 0) / recommendations.length;
  insights.push(`Average score: ${averageScore.toFixed(3)}`);

  const language = dominantLanguage(recommendations);
  if (language) insights.push(`Dominant language: ${language}`);

  const known = efforts.filter((effort): effort is number => effort !== null);
  if (known.length > 0) {
    const averageEffort = known.reduce((sum, effort) => sum + effort, 0) / known.length;
    insights.push(`Average integration effort: ${effortLevel(averageEffort)} (${averageEffort.toFixed(2)})`);
  }
  return insights;
}

function buildNextActions(
  recommendations: readonly Recommendation[],
  policy: ResolvedPolicy,
  diagnostics: readonly Diagnostic[],
): string[] {
  const actions: string[] = [];
  const top = recommendations[0];
  if (!top) {
    actions.push('No candidate was ranked; widen the candidate set or relax the objectives');
  } else {
    const label = top.metadata?.name ?? top.candidateId;
    actions.push(`Evaluate ${label} first (${top.recommendationType}, ${top.integrationEffort} effort)`);
  }

  const quick = recommendations.filter((entry) => entry.recommendationType === 'quick-integration').length;
  if (quick > 0) {
    actions.push(`Prototype the ${quick} quick-integration candidate${quick === 1 ? '' : 's'}`);
  }

  if (policy.conflicts.length > 0) {
    const count = policy.conflicts.length;
    actions.push(`Review the ${count} objective trade-off${count === 1 ? '' : 's'} in the explanation`);
  }

  const malformed = diagnostics.filter((diagnostic) => diagnostic.kind === 'MalformedCandidate').length;
  if (malformed > 0) {
    actions.push(`Fix ${malformed} malformed candidate record${malformed === 1 ? '' : 's'}`);
  }
  return actions;
}

// ============================================================================
// MATERIALIZE
// ============================================================================

export function materializeOutput(
  ranked: readonly CandidateSignature[],
  policy: ResolvedPolicy,
  options: MaterializeOptions = {},
): RecommendationOutput {
  const selected = options.limit && options.limit > 0 ? ranked.slice(0, options.limit) : ranked;
  const diagnostics = [...(options.diagnostics ?? [])];

  const efforts = selected.map((signature) => integrationEffortOf(policy, signature));
  const recommendations = selected.map((signature, index): Recommendation => {
    const effort = efforts[index];
    const strongest = strongestDimension(policy, signature);
    const type = recommendationType(signature.computedScore, effort, strongest);
    return {
      rank: signature.rank,
      candidateId: signature.candidateId,
      score: signature.computedScore,
      ...(signature.metadata ? { metadata: { ...signature.metadata } } : {}),
      recommendationType: type,
      integrationEffort: effortLevel(effort),
      strongestDimension: strongest,
      notes: implementationNotes(signature.metadata, effort, type, strongest),
    };
  });

  return {
    ...(options.intent !== undefined ? { intent: options.intent } : {}),
    ...(options.sessionId !== undefined ? { sessionId: options.sessionId } : {}),
    harmonyScore: policy.harmonyScore,
    recommendations,
    explanation: explainPolicy(policy),
    insights: buildInsights(recommendations, efforts),
    nextActions: buildNextActions(recommendations, policy, diagnostics),
    diagnostics,
  };
}
