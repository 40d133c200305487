/**
 * @fileoverview Zod schemas for persisted records.
 *
 * Anything read back from a backend is parsed here before the pipeline sees
 * it. A row that no longer parses is treated as a miss by the stores.
 */

import { z } from 'zod';
import type { CandidateSignature, ResolvedPolicy, Session } from '../types.js';

const DirectionalitySchema = z.enum(['maximize', 'minimize']);
const SeveritySchema = z.enum(['low', 'moderate', 'hard']);
const WeightPairSchema = z.object({ a: z.number(), b: z.number() });

export const ObjectiveSchema = z.object({
  name: z.string(),
  weight: z.number().min(0).max(1),
  directionality: DirectionalitySchema,
  source: z.enum(['explicit', 'inferred']),
});

export const ConflictResolutionSchema = z.object({
  a: z.string(),
  b: z.string(),
  severity: SeveritySchema,
  before: WeightPairSchema,
  after: WeightPairSchema,
  component: z.number(),
});

export const ResolvedPolicySchema = z
  .object({
    dimensions: z.array(z.string()),
    directionality: z.array(DirectionalitySchema),
    weights: z.array(z.number()),
    tieBreakOrder: z.array(z.string()),
    harmonyScore: z.number().min(0).max(1),
    minHarmony: z.number().min(0).max(1),
    conflicts: z.array(ConflictResolutionSchema),
    objectives: z.array(ObjectiveSchema),
  })
  .refine(
    (policy) =>
      policy.directionality.length === policy.dimensions.length && policy.weights.length === policy.dimensions.length,
    { message: 'directionality and weights must align with dimensions' },
  );

export const RepositoryMetadataSchema = z.object({
  name: z.string().optional(),
  url: z.string().optional(),
  language: z.string().optional(),
  topics: z.array(z.string()).optional(),
});

export const CandidateSignatureSchema = z.object({
  candidateId: z.string().min(1),
  metrics: z.array(z.number()),
  computedScore: z.number(),
  rank: z.number().int().min(0),
  metadata: RepositoryMetadataSchema.optional(),
});

export const SessionSchema = z.object({
  sessionId: z.string().min(1),
  policy: ResolvedPolicySchema,
  aggregate: z.array(CandidateSignatureSchema),
  requestCount: z.number().int().min(0),
  createdAt: z.number(),
  updatedAt: z.number(),
  expiresAt: z.number(),
});

// ============================================================================
// FREEZING
// ============================================================================

export function freezeSignature(signature: z.infer<typeof CandidateSignatureSchema>): CandidateSignature {
  return Object.freeze({
    candidateId: signature.candidateId,
    metrics: Object.freeze([...signature.metrics]),
    computedScore: signature.computedScore,
    rank: signature.rank,
    ...(signature.metadata ? { metadata: signature.metadata } : {}),
  });
}

export function freezePolicy(policy: z.infer<typeof ResolvedPolicySchema>): ResolvedPolicy {
  return Object.freeze({
    dimensions: Object.freeze([...policy.dimensions]),
    directionality: Object.freeze([...policy.directionality]),
    weights: Object.freeze([...policy.weights]),
    tieBreakOrder: Object.freeze([...policy.tieBreakOrder]),
    harmonyScore: policy.harmonyScore,
    minHarmony: policy.minHarmony,
    conflicts: Object.freeze(policy.conflicts.map((conflict) => Object.freeze({ ...conflict }))),
    objectives: Object.freeze(policy.objectives.map((objective) => Object.freeze({ ...objective }))),
  });
}

// ============================================================================
// PARSERS
// ============================================================================

/** Parse serialized JSON; `null` when it is not valid JSON or fails the schema. */
function parseJson<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function parsePolicy(raw: string): ResolvedPolicy | null {
  const policy = parseJson(raw, ResolvedPolicySchema);
  return policy ? freezePolicy(policy) : null;
}

export function parseSignature(raw: string): CandidateSignature | null {
  const signature = parseJson(raw, CandidateSignatureSchema);
  return signature ? freezeSignature(signature) : null;
}

export function parseSession(raw: string): Session | null {
  const session = parseJson(raw, SessionSchema);
  if (!session) return null;
  return {
    ...session,
    policy: freezePolicy(session.policy),
    aggregate: session.aggregate.map(freezeSignature),
  };
}
