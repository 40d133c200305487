/**
 * @fileoverview Candidate sources
 *
 * The scorer takes any iterable or async iterable of candidates. These are
 * the two sources shipped with the library: an in-memory list and a JSON
 * file, either a bare array or `{ "candidates": [...] }`. Only a file that is
 * not JSON, or not a list, is rejected outright.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import type { Candidate } from '../types.js';

const MetadataSchema = z.object({
  name: z.string().optional(),
  url: z.string().optional(),
  language: z.string().optional(),
  topics: z.array(z.string()).optional(),
});

/**
 * Every list element is kept as a record. Entries of `metrics` that are
 * not numbers become NaN and a missing vector becomes empty; the scorer then
 * reports the candidate as malformed.
 */
const CandidateRecordSchema = z
  .object({
    candidateId: z.string().min(1).optional().catch(undefined),
    metrics: z
      .array(z.unknown())
      .transform((values) => values.map((value) => (typeof value === 'number' ? value : Number.NaN)))
      .catch([]),
    metadata: MetadataSchema.optional().catch(undefined),
  })
  .catch({ metrics: [] });

const CandidateListSchema = z.array(CandidateRecordSchema);
const CandidateFileSchema = z.object({ candidates: CandidateListSchema }).transform((file) => file.candidates);

export class ArrayCandidateSource implements Iterable<Candidate> {
  private readonly candidates: readonly Candidate[];

  constructor(candidates: readonly Candidate[]) {
    this.candidates = [...candidates];
  }

  get size(): number {
    return this.candidates.length;
  }

  [Symbol.iterator](): Iterator<Candidate> {
    return this.candidates[Symbol.iterator]();
  }
}

export function parseCandidates(value: unknown, origin = 'candidates'): Candidate[] {
  const parsed = Array.isArray(value) ? CandidateListSchema.safeParse(value) : CandidateFileSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`${origin}${issue.path.length > 0 ? `.${issue.path.join('.')}` : ''}`, 'candidate list', issue.message);
  }
  return parsed.data.map(({ candidateId, metrics, metadata }, index) => {
    if (candidateId !== undefined) {
      return metadata ? { candidateId, metrics, metadata } : { candidateId, metrics };
    }
    const positional = `${origin}#${index}`;
    logWarning('Candidate record has no candidateId; using its position', { origin, index, candidateId: positional });
    return { candidateId: positional, metrics: [] };
  });
}

export async function loadCandidateFile(filePath: string): Promise<ArrayCandidateSource> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ValidationError('candidates.file', 'readable JSON file', `${filePath} (${getErrorMessage(error)})`);
  }
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError('candidates.file', 'valid JSON', `${filePath} (${getErrorMessage(error)})`);
  }
  return new ArrayCandidateSource(parseCandidates(value, filePath));
}
