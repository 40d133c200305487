/**
 * @fileoverview Zod validators for the request surface.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import { MAX_PARALLELISM, PRESET_NAMES } from '../config/presets.js';

/**
 * Recommendation request schema
 */
export const RecommendRequestSchema = z
  .object({
    intent: z.string().max(2000).describe('Free-text statement of what the caller is looking for'),
    objectives: z
      .record(z.string(), z.number())
      .optional()
      .describe('Explicit objective weights; these replace weights inferred from the intent'),
    sessionId: z.string().min(1).max(128).optional().describe('Continue the running aggregate of a session'),
    parallelism: z.number().int().min(1).max(MAX_PARALLELISM).optional().describe('Scorer worker lanes'),
    limit: z.number().int().min(1).max(1000).optional().describe('Recommendations to return'),
    timeoutMs: z.number().int().min(0).optional().describe('Scoring deadline in ms (0 disables)'),
    minHarmony: z.number().min(0).max(1).optional().describe('Reject policies with lower harmony'),
    preset: z.enum(PRESET_NAMES).optional().describe('Processing preset for this request'),
    fallbackToRelevance: z.boolean().optional().describe('Fold unknown objectives into general relevance'),
  })
  .strict();

export type RecommendRequest = z.infer<typeof RecommendRequestSchema>;

function describeValueAt(value: unknown, path: ReadonlyArray<string | number>): string {
  let current = value;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return 'undefined';
    current = Reflect.get(current, key);
  }
  return current === undefined ? 'undefined' : String(JSON.stringify(current));
}

export function parseRecommendRequest(value: unknown): RecommendRequest {
  const parsed = RecommendRequestSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? `request.${issue.path.join('.')}` : 'request';
    throw new ValidationError(field, issue.message, describeValueAt(value, issue.path));
  }
  return parsed.data;
}
