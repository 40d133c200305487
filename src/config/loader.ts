/**
 * @fileoverview Configuration loading
 *
 * Sources, later ones winning:
 * 1. preset defaults
 * 2. `concord.config.yaml` (or an explicit file)
 * 3. `CONCORD_*` environment variables
 * 4. explicit overrides
 *
 * The merged result is validated as a whole; any invalid field raises a
 * ValidationError naming it.
 */

import { existsSync, readFileSync } from 'node:fs';
import * as path from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';
import { MAX_PARALLELISM, PRESET_NAMES, isPresetName, presetDefaults, type ConcordConfig, type PresetName } from './presets.js';

export const DEFAULT_CONFIG_FILE = 'concord.config.yaml';

const booleanLike = z.preprocess((value) => {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return value;
}, z.boolean());

const nonNegativeInt = z.coerce.number().int().min(0);

const ConfigSchema = z
  .object({
    preset: z.enum(PRESET_NAMES),
    parallelism: z.coerce.number().int().min(1).max(MAX_PARALLELISM),
    minHarmony: z.coerce.number().min(0).max(1),
    resultLimit: z.coerce.number().int().min(1),
    sessionAggregateLimit: z.coerce.number().int().min(1),
    sessionTtlMs: z.coerce.number().int().min(1),
    requestCacheTtlMs: z.coerce.number().int().min(1),
    signatureCacheTtlMs: z.coerce.number().int().min(1),
    storeTimeoutMs: nonNegativeInt,
    scoringTimeoutMs: nonNegativeInt,
    retryBaseDelayMs: nonNegativeInt,
    fallbackToRelevance: booleanLike,
    logLevel: z.preprocess(
      (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
      z.enum(['debug', 'info', 'warn', 'error', 'silent']),
    ),
    dbPath: z.string().min(1).nullable(),
  })
  .strict();

export type ConfigInput = Partial<{ [K in keyof ConcordConfig]: unknown }>;

const ENV_KEYS: Record<string, keyof ConcordConfig> = {
  CONCORD_PRESET: 'preset',
  CONCORD_PARALLELISM: 'parallelism',
  CONCORD_MIN_HARMONY: 'minHarmony',
  CONCORD_RESULT_LIMIT: 'resultLimit',
  CONCORD_SESSION_AGGREGATE_LIMIT: 'sessionAggregateLimit',
  CONCORD_SESSION_TTL_MS: 'sessionTtlMs',
  CONCORD_REQUEST_CACHE_TTL_MS: 'requestCacheTtlMs',
  CONCORD_SIGNATURE_CACHE_TTL_MS: 'signatureCacheTtlMs',
  CONCORD_STORE_TIMEOUT_MS: 'storeTimeoutMs',
  CONCORD_SCORING_TIMEOUT_MS: 'scoringTimeoutMs',
  CONCORD_RETRY_BASE_DELAY_MS: 'retryBaseDelayMs',
  CONCORD_FALLBACK_TO_RELEVANCE: 'fallbackToRelevance',
  CONCORD_LOG_LEVEL: 'logLevel',
  CONCORD_DB_PATH: 'dbPath',
};

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Explicit YAML file; must exist when given */
  filePath?: string;
  /** Directory searched for `concord.config.yaml` when no file is given */
  cwd?: string;
  overrides?: ConfigInput;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readConfigFile(filePath: string): ConfigInput {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ValidationError('config.file', 'readable YAML file', `${filePath} (${getErrorMessage(error)})`);
  }
  let parsed: unknown;
  try {
    parsed = yaml.parse(raw);
  } catch (error) {
    throw new ValidationError('config.file', 'valid YAML', `${filePath} (${getErrorMessage(error)})`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ValidationError('config.file', 'YAML mapping', `${filePath} (${typeof parsed})`);
  }
  return parsed;
}

export function readEnvConfig(env: NodeJS.ProcessEnv): ConfigInput {
  const values: ConfigInput = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value.trim() !== '') {
      values[key] = value.trim();
    }
  }
  return values;
}

function pickPreset(...layers: ConfigInput[]): PresetName {
  for (const layer of layers) {
    const preset = layer.preset;
    if (preset === undefined) continue;
    if (!isPresetName(preset)) {
      throw new ValidationError('config.preset', PRESET_NAMES.join(' | '), String(preset));
    }
    return preset;
  }
  return 'balanced';
}

function definedEntries(layer: ConfigInput): ConfigInput {
  return Object.fromEntries(Object.entries(layer).filter(([, value]) => value !== undefined));
}

export function loadConfig(options: LoadConfigOptions = {}): ConcordConfig {
  const env = options.env ?? process.env;
  const overrides = definedEntries(options.overrides ?? {});
  const envLayer = readEnvConfig(env);

  let fileLayer: ConfigInput = {};
  if (options.filePath) {
    fileLayer = readConfigFile(options.filePath);
  } else {
    const candidate = path.join(options.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);
    if (existsSync(candidate)) {
      fileLayer = readConfigFile(candidate);
    }
  }

  const preset = pickPreset(overrides, envLayer, fileLayer);
  const merged = { ...presetDefaults(preset), ...fileLayer, ...envLayer, ...overrides, preset };

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const fields: Record<string, unknown> = merged;
    const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
    const received = issue.path.length > 0 ? String(JSON.stringify(fields[String(issue.path[0])])) : 'config';
    throw new ValidationError(`config.${field}`, issue.message, received);
  }
  return parsed.data;
}
