import { parseArgs, type ParseArgsConfig } from 'node:util';
import { getErrorMessage } from '../../utils/errors.js';
import { createError } from '../errors.js';

type ParseOptions = NonNullable<ParseArgsConfig['options']>;

/**
 * `parseArgs` in strict mode, with its TypeError turned into a usage error.
 */
export function parseCommandArgs<T extends ParseOptions>(
  args: string[],
  options: T,
): ReturnType<typeof parseArgs<{ args: string[]; options: T; allowPositionals: true; strict: true }>> {
  try {
    return parseArgs({ args, options, allowPositionals: true, strict: true });
  } catch (error) {
    throw createError('INVALID_ARGUMENT', getErrorMessage(error));
  }
}

export function parsePositiveInt(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw createError('INVALID_ARGUMENT', `--${flag} must be a positive integer, got "${raw}".`);
  }
  return value;
}

export function parseNonNegativeInt(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw createError('INVALID_ARGUMENT', `--${flag} must be a non-negative integer, got "${raw}".`);
  }
  return value;
}

export function parseUnitInterval(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value) || value < 0 || value > 1) {
    throw createError('INVALID_ARGUMENT', `--${flag} must be a number between 0 and 1, got "${raw}".`);
  }
  return value;
}

/** `name=value` pairs into a weight map; a repeated name keeps its last value. */
export function parseWeights(pairs: readonly string[] | undefined): Record<string, number> | undefined {
  if (!pairs || pairs.length === 0) return undefined;
  const weights: Record<string, number> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    const name = separator > 0 ? pair.slice(0, separator).trim() : '';
    const raw = separator > 0 ? pair.slice(separator + 1).trim() : '';
    const value = Number(raw);
    if (!name || raw === '' || !Number.isFinite(value)) {
      throw createError('INVALID_ARGUMENT', `--weight expects name=value, got "${pair}".`);
    }
    weights[name] = value;
  }
  return weights;
}
