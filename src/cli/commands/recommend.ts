import { loadConfig } from '../../config/loader.js';
import { isPresetName, type ConcordConfig, type PresetName } from '../../config/presets.js';
import { loadCandidateFile } from '../../candidates/source.js';
import { RecommendationPipeline } from '../../pipeline/recommend.js';
import type { RecommendRequest } from '../../pipeline/schema.js';
import { InMemoryConcordStore } from '../../storage/memory_store.js';
import { SqliteConcordStore } from '../../storage/sqlite_store.js';
import type { ConcordStore } from '../../storage/types.js';
import { setLogLevel } from '../../telemetry/logger.js';
import type { Candidate } from '../../types.js';
import { getErrorMessage } from '../../utils/errors.js';
import { createError } from '../errors.js';
import { formatRecommendation } from '../format.js';
import {
  parseCommandArgs,
  parseNonNegativeInt,
  parsePositiveInt,
  parseUnitInterval,
  parseWeights,
} from './args.js';
import type { CommandContext } from './types.js';

function parsePreset(raw: string | undefined): PresetName | undefined {
  if (raw === undefined) return undefined;
  if (!isPresetName(raw)) {
    throw createError('INVALID_ARGUMENT', `--preset must be one of minimal, balanced, maximal, got "${raw}".`);
  }
  return raw;
}

/**
 * A locked database holds a statement for up to its busy timeout, so the
 * store timeout doubles as the lock wait.
 */
export function openStore(config: ConcordConfig): ConcordStore {
  if (!config.dbPath) return new InMemoryConcordStore();
  try {
    return SqliteConcordStore.open(config.dbPath, {
      busyTimeoutMs: config.storeTimeoutMs > 0 ? config.storeTimeoutMs : undefined,
    });
  } catch (error) {
    throw createError('STORAGE_ERROR', `Cannot open database "${config.dbPath}": ${getErrorMessage(error)}`, {
      dbPath: config.dbPath,
    });
  }
}

export async function recommendCommand(context: CommandContext): Promise<void> {
  const { values, positionals } = parseCommandArgs(context.args, {
    candidates: { type: 'string', short: 'c' },
    weight: { type: 'string', short: 'w', multiple: true },
    preset: { type: 'string' },
    limit: { type: 'string', short: 'n' },
    parallelism: { type: 'string', short: 'p' },
    session: { type: 'string', short: 's' },
    db: { type: 'string' },
    config: { type: 'string' },
    'min-harmony': { type: 'string' },
    timeout: { type: 'string' },
    'fallback-to-relevance': { type: 'boolean', default: false },
    json: { type: 'boolean', default: false },
  });

  const intent = positionals.join(' ').trim();
  const objectives = parseWeights(values.weight);
  if (!intent && !objectives) {
    throw createError('INVALID_ARGUMENT', 'An intent or at least one --weight is required. Usage: concord recommend "<intent>"');
  }

  const preset = parsePreset(values.preset);
  const config = loadConfig({
    env: context.env,
    cwd: context.cwd,
    filePath: values.config,
    overrides: {
      preset,
      dbPath: values.db,
      fallbackToRelevance: values['fallback-to-relevance'] ? true : undefined,
    },
  });
  setLogLevel(config.logLevel);

  const candidates: Iterable<Candidate> = values.candidates ? await loadCandidateFile(values.candidates) : [];
  const request: RecommendRequest = {
    intent,
    objectives,
    sessionId: values.session,
    limit: parsePositiveInt('limit', values.limit),
    parallelism: parsePositiveInt('parallelism', values.parallelism),
    minHarmony: parseUnitInterval('min-harmony', values['min-harmony']),
    timeoutMs: parseNonNegativeInt('timeout', values.timeout),
  };

  const store = openStore(config);
  try {
    const pipeline = new RecommendationPipeline({ config, store });
    const result = await pipeline.recommend(request, candidates);
    if (!result.ok) {
      throw result.error;
    }
    context.io.stdout(values.json ? JSON.stringify(result.value, null, 2) : formatRecommendation(result.value));
  } finally {
    await store.close();
  }
}
