/**
 * @fileoverview Processing presets
 *
 * - `minimal`: one scoring lane, lenient harmony floor, short result list
 * - `balanced`: up to four lanes, default harmony floor (default)
 * - `maximal`: every available core, strict harmony floor, long result list
 */

import { availableParallelism } from 'node:os';
import type { LogLevel } from '../telemetry/logger.js';

export const PRESET_NAMES = ['minimal', 'balanced', 'maximal'] as const;
export type PresetName = (typeof PRESET_NAMES)[number];

export interface ConcordConfig {
  preset: PresetName;
  /** Scorer worker lanes */
  parallelism: number;
  minHarmony: number;
  /** Recommendations returned per request */
  resultLimit: number;
  /** Signatures carried forward in a session's running aggregate */
  sessionAggregateLimit: number;
  sessionTtlMs: number;
  requestCacheTtlMs: number;
  signatureCacheTtlMs: number;
  /** Per-call store timeout; 0 disables */
  storeTimeoutMs: number;
  /** Scoring deadline; 0 disables */
  scoringTimeoutMs: number;
  retryBaseDelayMs: number;
  fallbackToRelevance: boolean;
  logLevel: LogLevel;
  /** SQLite file; null keeps state in memory */
  dbPath: string | null;
}

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;

export const MAX_PARALLELISM = 256;

export function isPresetName(value: unknown): value is PresetName {
  return typeof value === 'string' && PRESET_NAMES.some((name) => name === value);
}

export function presetDefaults(preset: PresetName, cores: number = availableParallelism()): ConcordConfig {
  const shared = {
    sessionAggregateLimit: 100,
    sessionTtlMs: 30 * MINUTE,
    requestCacheTtlMs: 5 * MINUTE,
    signatureCacheTtlMs: 12 * HOUR,
    storeTimeoutMs: 250,
    scoringTimeoutMs: 0,
    retryBaseDelayMs: 50,
    fallbackToRelevance: false,
    logLevel: 'info' as const,
    dbPath: null,
  };
  const lanes = Math.min(MAX_PARALLELISM, Math.max(1, cores));
  switch (preset) {
    case 'minimal':
      return { ...shared, preset, parallelism: 1, minHarmony: 0.4, resultLimit: 5 };
    case 'balanced':
      return { ...shared, preset, parallelism: Math.min(4, lanes), minHarmony: 0.5, resultLimit: 10 };
    case 'maximal':
      return { ...shared, preset, parallelism: lanes, minHarmony: 0.6, resultLimit: 25 };
  }
}
