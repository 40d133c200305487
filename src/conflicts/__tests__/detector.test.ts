import { describe, expect, it } from 'vitest';
import { extractObjectives } from '../../objectives/extractor.js';
import type { DetectedConflict } from '../../types.js';
import { compareConflicts, detectConflicts, sortConflicts } from '../detector.js';

describe('detectConflicts', () => {
  it('returns every registered pair among present objectives in canonical order', () => {
    const objectives = extractObjectives('', { speed: 0.2, simplicity: 0.2, precision: 0.3, breadth: 0.3 });
    expect(detectConflicts(objectives).map(({ a, b, severity }) => `${a}/${b}:${severity}`)).toEqual([
      'breadth/precision:hard',
      'breadth/simplicity:moderate',
      'breadth/speed:low',
    ]);
  });

  it('ignores objectives with zero weight', () => {
    const objectives = [
      { name: 'depth', weight: 1, directionality: 'maximize' as const, source: 'explicit' as const },
      { name: 'speed', weight: 0, directionality: 'maximize' as const, source: 'explicit' as const },
    ];
    expect(detectConflicts(objectives)).toEqual([]);
  });

  it('returns an empty list when nothing conflicts', () => {
    expect(detectConflicts(extractObjectives('fast and simple'))).toEqual([]);
  });
});

describe('sortConflicts', () => {
  it('canonicalizes reversed pairs and sorts by names then severity', () => {
    const input: DetectedConflict[] = [
      { a: 'speed', b: 'depth', severity: 'hard', rationale: 'x' },
      { a: 'breadth', b: 'speed', severity: 'low', rationale: 'y' },
    ];
    const sorted = sortConflicts(input);
    expect(sorted.map(({ a, b }) => [a, b])).toEqual([
      ['breadth', 'speed'],
      ['depth', 'speed'],
    ]);
    expect(input[0].a).toBe('speed');
  });

  it('orders equal pairs by severity', () => {
    const low: DetectedConflict = { a: 'a', b: 'b', severity: 'low', rationale: '' };
    const hard: DetectedConflict = { ...low, severity: 'hard' };
    expect(compareConflicts(hard, low)).toBeGreaterThan(0);
    expect(compareConflicts(low, low)).toBe(0);
  });
});
