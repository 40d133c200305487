import { getDefaultRegistry } from '../../objectives/registry.js';
import type { ConflictSeverity } from '../../types.js';
import { createError } from '../errors.js';
import { formatConflicts, formatObjectives } from '../format.js';
import { parseCommandArgs } from './args.js';
import type { CommandContext } from './types.js';

const SEVERITIES: readonly ConflictSeverity[] = ['low', 'moderate', 'hard'];

export async function objectivesCommand(context: CommandContext): Promise<void> {
  const { values } = parseCommandArgs(context.args, {
    json: { type: 'boolean', default: false },
  });
  const registry = getDefaultRegistry();
  if (values.json) {
    const objectives = registry.list().map((objective) => ({ ...objective, keywords: registry.keywords(objective.name) }));
    context.io.stdout(JSON.stringify(objectives, null, 2));
    return;
  }
  context.io.stdout(formatObjectives(registry.list(), (name) => registry.keywords(name)));
}

export async function conflictsCommand(context: CommandContext): Promise<void> {
  const { values } = parseCommandArgs(context.args, {
    severity: { type: 'string' },
    json: { type: 'boolean', default: false },
  });
  const severity = SEVERITIES.find((entry) => entry === values.severity);
  if (values.severity !== undefined && !severity) {
    throw createError('INVALID_ARGUMENT', `--severity must be one of ${SEVERITIES.join(', ')}, got "${values.severity}".`);
  }
  const conflicts = getDefaultRegistry().listConflicts(severity);
  context.io.stdout(values.json ? JSON.stringify(conflicts, null, 2) : formatConflicts(conflicts));
}
