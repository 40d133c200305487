import { describe, expect, it } from 'vitest';
import { detectConflicts } from '../../conflicts/detector.js';
import { resolveConflicts } from '../../conflicts/resolver.js';
import { extractObjectives } from '../../objectives/extractor.js';
import { computeContentHash, computePolicyFingerprint, computeRequestKey, computeSignatureKey } from '../keys.js';
import { parsePolicy, parseSession, parseSignature } from '../schemas.js';

const dimensions = ['speed', 'depth'];

function policyFor(weights: Record<string, number>) {
  const objectives = extractObjectives('', weights);
  return resolveConflicts(objectives, detectConflicts(objectives));
}

describe('computeContentHash', () => {
  it('returns hex sha256', () => {
    expect(computeContentHash('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });
});

describe('computeRequestKey', () => {
  const base = { intent: 'Fast tools', objectives: { speed: 1, depth: 0.5 }, minHarmony: 0.5, fallbackToRelevance: false, dimensions };

  it('ignores intent case, surrounding whitespace and objective order', () => {
    expect(computeRequestKey({ ...base, intent: '  fast TOOLS ', objectives: { depth: 0.5, speed: 1 } })).toBe(
      computeRequestKey(base),
    );
  });

  it('changes with anything that affects the policy', () => {
    const key = computeRequestKey(base);
    expect(computeRequestKey({ ...base, minHarmony: 0.6 })).not.toBe(key);
    expect(computeRequestKey({ ...base, fallbackToRelevance: true })).not.toBe(key);
    expect(computeRequestKey({ ...base, dimensions: ['speed'] })).not.toBe(key);
    expect(computeRequestKey({ ...base, objectives: { speed: 1 } })).not.toBe(key);
  });
});

describe('computePolicyFingerprint', () => {
  it('is equal for policies that score identically', () => {
    expect(computePolicyFingerprint(policyFor({ speed: 2 }))).toBe(computePolicyFingerprint(policyFor({ speed: 1 })));
    expect(computePolicyFingerprint(policyFor({ depth: 1 }))).not.toBe(computePolicyFingerprint(policyFor({ speed: 1 })));
  });
});

describe('computeSignatureKey', () => {
  it('covers id, metrics and metadata', () => {
    const candidate = { candidateId: 'a', metrics: [0.1, 0.2] };
    const key = computeSignatureKey('fp', candidate);
    expect(computeSignatureKey('fp', { ...candidate })).toBe(key);
    expect(computeSignatureKey('other', candidate)).not.toBe(key);
    expect(computeSignatureKey('fp', { ...candidate, metrics: [0.1, 0.3] })).not.toBe(key);
    expect(computeSignatureKey('fp', { ...candidate, metadata: { name: 'a' } })).not.toBe(key);
  });
});

describe('schemas', () => {
  it('round-trips a policy through JSON', () => {
    const policy = policyFor({ breadth: 0.8, precision: 0.2 });
    const parsed = parsePolicy(JSON.stringify(policy));
    expect(parsed).toEqual(policy);
    expect(Object.isFrozen(parsed?.weights)).toBe(true);
  });

  it('rejects a policy whose vectors do not align', () => {
    const policy = policyFor({ speed: 1 });
    expect(parsePolicy(JSON.stringify({ ...policy, weights: [1] }))).toBeNull();
  });

  it('returns null for invalid JSON', () => {
    expect(parseSignature('not json')).toBeNull();
    expect(parseSession('{}')).toBeNull();
  });

  it('drops unknown fields from signatures', () => {
    expect(parseSignature(JSON.stringify({ candidateId: 'a', metrics: [1], computedScore: 1, rank: 2, extra: true }))).toEqual({
      candidateId: 'a',
      metrics: [1],
      computedScore: 1,
      rank: 2,
    });
  });
});
