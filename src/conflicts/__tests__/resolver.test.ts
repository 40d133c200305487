import { describe, expect, it } from 'vitest';
import { UnresolvableConflictError, ValidationError } from '../../core/errors.js';
import { extractObjectives } from '../../objectives/extractor.js';
import { getDefaultRegistry } from '../../objectives/registry.js';
import { detectConflicts } from '../detector.js';
import { buildTieBreakOrder, harmonizePair, resolveConflicts } from '../resolver.js';

function resolve(weights: Record<string, number>, minHarmony?: number) {
  const objectives = extractObjectives('', weights);
  return resolveConflicts(objectives, detectConflicts(objectives), { minHarmony });
}

function weightOf(policy: ReturnType<typeof resolve>, name: string): number {
  return policy.weights[policy.dimensions.indexOf(name)];
}

describe('harmonizePair', () => {
  it('preserves the pair total and narrows the gap', () => {
    for (const severity of ['low', 'moderate', 'hard'] as const) {
      const step = harmonizePair(0.7, 0.1, severity);
      expect(step.a + step.b).toBeCloseTo(0.8, 12);
      expect(Math.abs(step.a - step.b)).toBeLessThan(0.6);
      expect(step.component).toBeGreaterThanOrEqual(0);
      expect(step.component).toBeLessThanOrEqual(1);
    }
  });

  it('pulls harder for harder conflicts', () => {
    const low = harmonizePair(0.8, 0.2, 'low');
    const hard = harmonizePair(0.8, 0.2, 'hard');
    expect(hard.a).toBeLessThan(low.a);
    expect(low.a).toBeCloseTo(0.725, 12);
    expect(hard.a).toBeCloseTo(0.575, 12);
  });

  it('leaves a zero-weight pair alone', () => {
    expect(harmonizePair(0, 0, 'hard')).toEqual({ a: 0, b: 0, component: 1 });
  });
});

describe('resolveConflicts', () => {
  it('resolves balanced breadth and precision into an even policy', () => {
    const policy = resolve({ breadth: 0.9, precision: 0.9 });
    expect(policy.harmonyScore).toBeCloseTo(0.7, 12);
    expect(weightOf(policy, 'breadth')).toBeCloseTo(0.5, 12);
    expect(weightOf(policy, 'precision')).toBeCloseTo(0.5, 12);
    expect(Math.abs(weightOf(policy, 'breadth') - weightOf(policy, 'precision'))).toBeLessThan(0.2);
    expect(policy.conflicts).toHaveLength(1);
    expect(policy.conflicts[0]).toMatchObject({ a: 'breadth', b: 'precision', severity: 'hard' });
  });

  it('narrows an uneven hard conflict toward the midpoint', () => {
    const policy = resolve({ breadth: 0.8, precision: 0.2 });
    expect(weightOf(policy, 'breadth')).toBeCloseTo(0.575, 12);
    expect(weightOf(policy, 'precision')).toBeCloseTo(0.425, 12);
    expect(policy.harmonyScore).toBeCloseTo(0.595, 12);
  });

  it('scores a conflict-free policy at exactly 1', () => {
    const policy = resolve({ speed: 0.5, simplicity: 0.5 });
    expect(policy.harmonyScore).toBe(1);
    expect(policy.conflicts).toEqual([]);
  });

  it('keeps the sum of weights at 1 and aligns vectors with the registry', () => {
    const policy = resolve({ breadth: 0.4, speed: 0.3, simplicity: 0.2, security: 0.1 });
    expect(policy.dimensions).toEqual(getDefaultRegistry().dimensions);
    expect(policy.weights).toHaveLength(policy.dimensions.length);
    expect(policy.weights.reduce((sum, weight) => sum + weight, 0)).toBeCloseTo(1, 9);
    expect(policy.directionality[policy.dimensions.indexOf('integration_effort')]).toBe('minimize');
  });

  it('orders tie-breaks by original weight then registration order', () => {
    expect(resolve({ speed: 0.25, security: 0.75 }).tieBreakOrder).toEqual(['security', 'speed']);
    expect(resolve({ precision: 0.5, breadth: 0.5 }).tieBreakOrder).toEqual(['breadth', 'precision']);
  });

  it('returns a frozen policy', () => {
    const policy = resolve({ breadth: 0.9, precision: 0.9 });
    expect(Object.isFrozen(policy)).toBe(true);
    expect(Object.isFrozen(policy.weights)).toBe(true);
  });

  it('fails with the weakest pairs first when harmony is too low', () => {
    let caught: unknown;
    try {
      resolve({ breadth: 0.99, precision: 0.01, depth: 0.99, speed: 0.01 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(UnresolvableConflictError);
    if (!(caught instanceof UnresolvableConflictError)) return;
    expect(caught.pairs.map((pair) => `${pair.a}/${pair.b}`)).toEqual([
      'breadth/speed',
      'breadth/precision',
      'depth/speed',
    ]);
    expect(caught.harmonyScore).toBeLessThan(0.5);
    expect(caught.minHarmony).toBe(0.5);
  });

  it('honours a stricter minimum', () => {
    expect(() => resolve({ breadth: 0.9, precision: 0.9 }, 0.8)).toThrow(UnresolvableConflictError);
    expect(() => resolve({ breadth: 0.9, precision: 0.9 }, 0.69)).not.toThrow();
  });

  it('keeps a hard gap narrower after a softer pair moves a shared objective', () => {
    const policy = resolve({ depth: 0.3, speed: 0.31, security: 0.39 });
    expect(policy.conflicts.map((conflict) => `${conflict.a}/${conflict.b}`)).toEqual(['depth/speed', 'security/speed']);
    const finalGap = Math.abs(weightOf(policy, 'depth') - weightOf(policy, 'speed'));
    expect(finalGap).toBeLessThan(0.01);
    expect(policy.weights.reduce((sum, weight) => sum + weight, 0)).toBeCloseTo(1, 9);
  });

  it('narrows every hard gap on the final policy across overlapping objective sets', () => {
    const names = ['breadth', 'precision', 'depth', 'speed', 'simplicity', 'security', 'innovation', 'stability'];
    let seed = 7;
    const next = () => {
      seed = (seed * 16807) % 2147483647;
      return seed / 2147483647;
    };

    for (let round = 0; round < 300; round++) {
      const weights: Record<string, number> = {};
      for (const name of names) {
        if (next() < 0.7) weights[name] = 0.05 + next() * 0.95;
      }
      if (Object.keys(weights).length === 0) continue;
      const policy = resolve(weights, 0);
      const original = new Map(policy.objectives.map((objective) => [objective.name, objective.weight]));

      for (const conflict of policy.conflicts.filter((entry) => entry.severity === 'hard')) {
        const before = Math.abs((original.get(conflict.a) ?? 0) - (original.get(conflict.b) ?? 0));
        if (before === 0) continue;
        const after = Math.abs(weightOf(policy, conflict.a) - weightOf(policy, conflict.b));
        expect(after).toBeLessThan(before);
      }
    }
  });

  it('rejects a minimum outside [0, 1]', () => {
    expect(() => resolve({ speed: 1 }, 1.5)).toThrow(ValidationError);
  });

  it('rejects objectives the registry does not know', () => {
    const objectives = [{ name: 'nope', weight: 1, directionality: 'maximize' as const, source: 'explicit' as const }];
    expect(() => resolveConflicts(objectives, [])).toThrow('Validation failed for objectives: expected registered objective, got "nope"');
  });
});

describe('buildTieBreakOrder', () => {
  it('drops zero weights', () => {
    const weights = new Map([
      ['speed', 0],
      ['depth', 0.5],
      ['breadth', 0.5],
    ]);
    expect(buildTieBreakOrder(weights, getDefaultRegistry())).toEqual(['breadth', 'depth']);
  });
});
