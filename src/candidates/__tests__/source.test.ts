import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ValidationError } from '../../core/errors.js';
import { detectConflicts } from '../../conflicts/detector.js';
import { resolveConflicts } from '../../conflicts/resolver.js';
import { extractObjectives } from '../../objectives/extractor.js';
import { getDefaultRegistry } from '../../objectives/registry.js';
import { scoreCandidates } from '../../scoring/scorer.js';
import { ArrayCandidateSource, loadCandidateFile, parseCandidates } from '../source.js';

describe('parseCandidates', () => {
  it('accepts a bare array and a wrapped list', () => {
    const candidate = { candidateId: 'a', metrics: [0.1, 0.2], metadata: { language: 'Go' } };
    expect(parseCandidates([candidate])).toEqual([candidate]);
    expect(parseCandidates({ candidates: [candidate] })).toEqual([candidate]);
  });

  it('keeps null metrics as NaN for the scorer to report', () => {
    const [candidate] = parseCandidates([{ candidateId: 'a', metrics: [0.1, null] }]);
    expect(candidate.metrics[0]).toBe(0.1);
    expect(Number.isNaN(candidate.metrics[1])).toBe(true);
  });

  it('rejects input that is not a candidate list', () => {
    let caught: unknown;
    try {
      parseCandidates({ items: [] }, 'input.json');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught instanceof ValidationError && caught.field).toBe('input.json.candidates');
    expect(() => parseCandidates(42, 'input.json')).toThrow(ValidationError);
  });

  it('keeps a record with unreadable metrics for the scorer to report', () => {
    const parsed = parseCandidates([{ candidateId: 'a', metrics: [0.2] }, { candidateId: 'bad', metrics: ['x', 0.5] }]);
    expect(parsed).toHaveLength(2);
    expect(parsed[1].candidateId).toBe('bad');
    expect(Number.isNaN(parsed[1].metrics[0])).toBe(true);
    expect(parsed[1].metrics[1]).toBe(0.5);
  });

  it('turns a record without metrics into an empty vector', () => {
    expect(parseCandidates([{ candidateId: 'a', metrics: 'high' }, { candidateId: 'b' }])).toEqual([
      { candidateId: 'a', metrics: [] },
      { candidateId: 'b', metrics: [] },
    ]);
  });

  it('names a record without an id by its position', () => {
    expect(parseCandidates([{ candidateId: 'a', metrics: [1] }, { metrics: [1] }, 7], 'input.json')).toEqual([
      { candidateId: 'a', metrics: [1] },
      { candidateId: 'input.json#1', metrics: [] },
      { candidateId: 'input.json#2', metrics: [] },
    ]);
  });

  it('drops malformed metadata but keeps the candidate', () => {
    expect(parseCandidates([{ candidateId: 'a', metrics: [1], metadata: { topics: 'cli' } }])).toEqual([
      { candidateId: 'a', metrics: [1] },
    ]);
  });

  it('lets one malformed record among fifty reach the scorer as a diagnostic', async () => {
    const dimensions = getDefaultRegistry().dimensions;
    const records: unknown[] = Array.from({ length: 49 }, (_, i) => ({
      candidateId: `repo-${i}`,
      metrics: dimensions.map(() => 0.5),
    }));
    records.push({ candidateId: 'bad', metrics: dimensions.map((_, i) => (i === 0 ? 'x' : 0.5)) });

    const objectives = extractObjectives('fast');
    const policy = resolveConflicts(objectives, detectConflicts(objectives));
    const outcome = await scoreCandidates(policy, parseCandidates(records));

    expect(outcome.signatures).toHaveLength(49);
    expect(outcome.diagnostics).toEqual([
      {
        kind: 'MalformedCandidate',
        candidateId: 'bad',
        message: `Metric ${dimensions[0]} is not a finite number`,
        details: { dimension: dimensions[0], value: 'NaN' },
      },
    ]);
  });
});

describe('ArrayCandidateSource', () => {
  it('iterates a copy of its input', () => {
    const input = [{ candidateId: 'a', metrics: [1] }];
    const source = new ArrayCandidateSource(input);
    input.push({ candidateId: 'b', metrics: [1] });
    expect(source.size).toBe(1);
    expect(Array.from(source).map((candidate) => candidate.candidateId)).toEqual(['a']);
  });
});

describe('loadCandidateFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'concord-candidates-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads a JSON file', async () => {
    const file = path.join(dir, 'candidates.json');
    writeFileSync(file, JSON.stringify({ candidates: [{ candidateId: 'x', metrics: [0.5] }] }));
    const source = await loadCandidateFile(file);
    expect(Array.from(source)).toEqual([{ candidateId: 'x', metrics: [0.5] }]);
  });

  it('rejects malformed JSON', async () => {
    const file = path.join(dir, 'broken.json');
    writeFileSync(file, '[{');
    await expect(loadCandidateFile(file)).rejects.toMatchObject({ field: 'candidates.file', expected: 'valid JSON' });
  });

  it('rejects a missing file', async () => {
    await expect(loadCandidateFile(path.join(dir, 'none.json'))).rejects.toMatchObject({
      field: 'candidates.file',
      expected: 'readable JSON file',
    });
  });
});
