import { describe, expect, it } from 'vitest';
import { detectConflicts } from '../../conflicts/detector.js';
import { resolveConflicts } from '../../conflicts/resolver.js';
import { extractObjectives } from '../../objectives/extractor.js';
import { ObjectiveRegistry, getDefaultRegistry } from '../../objectives/registry.js';
import { rankSignatures } from '../../scoring/ranking.js';
import { scoreCandidate } from '../../scoring/scorer.js';
import type { Candidate, CandidateSignature, ResolvedPolicy } from '../../types.js';
import { effortLevel, explainPolicy, materializeOutput, recommendationType } from '../materializer.js';

function policyFor(weights: Record<string, number>, registry?: ObjectiveRegistry): ResolvedPolicy {
  const objectives = extractObjectives('', weights, { registry });
  return resolveConflicts(objectives, detectConflicts(objectives, registry), { registry });
}

function score(policy: ResolvedPolicy, candidates: Candidate[]): CandidateSignature[] {
  const signatures = candidates.map((candidate) => {
    const result = scoreCandidate(policy, candidate);
    if (!result.ok) throw new Error(result.error.message);
    return result.value;
  });
  return rankSignatures(signatures, policy);
}

function candidate(candidateId: string, values: Record<string, number>, name: string, language: string): Candidate {
  return {
    candidateId,
    metrics: getDefaultRegistry().dimensions.map((dimension) => values[dimension] ?? 0),
    metadata: { name, language },
  };
}

const securityPolicy = policyFor({ security: 0.6, speed: 0.4 });
const ranked = score(securityPolicy, [
  candidate('c3', { security: 0.1, speed: 0.8, integration_effort: 0.5 }, 'gamma-fast', 'Python'),
  candidate('c1', { security: 0.9, speed: 0.2, integration_effort: 0.1 }, 'alpha-scan', 'Python'),
  candidate('c2', { security: 0.95, speed: 0.1, integration_effort: 0.8 }, 'beta-audit', 'Go'),
]);

describe('effortLevel', () => {
  it('buckets integration effort', () => {
    expect([null, 0, 0.29, 0.3, 0.59, 0.6, 1].map(effortLevel)).toEqual([
      'unknown',
      'low',
      'low',
      'medium',
      'medium',
      'high',
      'high',
    ]);
  });
});

describe('recommendationType', () => {
  it('prefers quick integration, then high value, then security', () => {
    expect(recommendationType(0.95, 0.1, 'security')).toBe('quick-integration');
    expect(recommendationType(0.95, 0.5, 'security')).toBe('high-value');
    expect(recommendationType(0.5, 0.5, 'security')).toBe('security-enhancement');
    expect(recommendationType(0.5, null, 'speed')).toBe('strategic');
  });
});

describe('explainPolicy', () => {
  it('describes each resolved conflict and the harmony', () => {
    expect(explainPolicy(securityPolicy)).toEqual([
      'security vs speed (low): 0.600/0.400 -> 0.575/0.425',
      'Harmony 0.765 (minimum 0.500)',
    ]);
  });

  it('says so when nothing conflicts', () => {
    expect(explainPolicy(policyFor({ speed: 1 }))).toEqual(['No conflicting objectives', 'Harmony 1.000 (minimum 0.500)']);
  });
});

describe('materializeOutput', () => {
  const output = materializeOutput(ranked, securityPolicy, {
    intent: 'secure scanner',
    sessionId: 'thread-1',
    diagnostics: [{ kind: 'MalformedCandidate', candidateId: 'bad', message: 'Expected 12 metrics, got 2' }],
  });

  it('classifies each recommendation', () => {
    expect(
      output.recommendations.map(({ rank, candidateId, recommendationType: type, integrationEffort, strongestDimension }) => ({
        rank,
        candidateId,
        type,
        integrationEffort,
        strongestDimension,
      })),
    ).toEqual([
      { rank: 1, candidateId: 'c1', type: 'quick-integration', integrationEffort: 'low', strongestDimension: 'security' },
      { rank: 2, candidateId: 'c2', type: 'security-enhancement', integrationEffort: 'high', strongestDimension: 'security' },
      { rank: 3, candidateId: 'c3', type: 'strategic', integrationEffort: 'medium', strongestDimension: 'speed' },
    ]);
    expect(output.recommendations[0].score).toBeCloseTo(0.6025, 12);
  });

  it('adds implementation notes', () => {
    expect(output.recommendations.map((recommendation) => recommendation.notes)).toEqual([
      ['Python package; install into an isolated virtual environment', 'Security tooling; wire it into the CI pipeline'],
      [
        'Go module; vendor it as a library or build it as a binary',
        'Complex integration; start with a proof of concept',
        'Security tooling; wire it into the CI pipeline',
      ],
      ['Python package; install into an isolated virtual environment'],
    ]);
  });

  it('summarizes the list', () => {
    expect(output.insights).toEqual([
      'Average score: 0.530',
      'Dominant language: Python',
      'Average integration effort: medium (0.47)',
    ]);
    expect(output.nextActions).toEqual([
      'Evaluate alpha-scan first (quick-integration, low effort)',
      'Prototype the 1 quick-integration candidate',
      'Review the 1 objective trade-off in the explanation',
      'Fix 1 malformed candidate record',
    ]);
    expect(output.intent).toBe('secure scanner');
    expect(output.sessionId).toBe('thread-1');
    expect(output.harmonyScore).toBeCloseTo(0.765, 12);
    expect(output.diagnostics).toHaveLength(1);
  });

  it('copies metadata instead of sharing it', () => {
    expect(output.recommendations[0].metadata).toEqual({ name: 'alpha-scan', language: 'Python' });
    expect(output.recommendations[0].metadata).not.toBe(ranked[0].metadata);
  });

  it('truncates to the limit', () => {
    expect(materializeOutput(ranked, securityPolicy, { limit: 2 }).recommendations).toHaveLength(2);
  });

  it('flags high-value candidates', () => {
    const policy = policyFor({ speed: 1 });
    const [top] = materializeOutput(
      score(policy, [candidate('r', { speed: 0.95, integration_effort: 0.5 }, 'rocket', 'Rust')]),
      policy,
    ).recommendations;
    expect(top.recommendationType).toBe('high-value');
    expect(top.notes).toEqual([]);
  });

  it('reports unknown effort when the basis has no effort dimension', () => {
    const registry = new ObjectiveRegistry(
      [
        { name: 'relevance', directionality: 'maximize', description: 'Relevance' },
        { name: 'speed', directionality: 'maximize', description: 'Speed' },
      ],
      [],
    );
    const policy = policyFor({ speed: 1 }, registry);
    const [top] = materializeOutput(score(policy, [{ candidateId: 'solo', metrics: [0.3, 0.4] }]), policy).recommendations;
    expect(top.integrationEffort).toBe('unknown');
    expect(top.recommendationType).toBe('strategic');
    expect(top.strongestDimension).toBe('speed');
  });

  it('suggests widening the search when nothing ranked', () => {
    const empty = materializeOutput([], policyFor({ speed: 1 }));
    expect(empty.recommendations).toEqual([]);
    expect(empty.insights).toEqual([]);
    expect(empty.nextActions).toEqual(['No candidate was ranked; widen the candidate set or relax the objectives']);
    expect(empty).not.toHaveProperty('intent');
  });
});
