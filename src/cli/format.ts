/**
 * @fileoverview Human-readable rendering for CLI output.
 */

import type { RecommendationOutput } from '../output/materializer.js';
import type { ConflictPair, ObjectiveDefinition } from '../types.js';

function section(title: string, lines: readonly string[]): string[] {
  if (lines.length === 0) return [];
  return ['', `${title}:`, ...lines.map((line) => `  - ${line}`)];
}

export function formatRecommendation(output: RecommendationOutput): string {
  const lines: string[] = [];
  if (output.intent) lines.push(`Intent: ${output.intent}`);
  if (output.sessionId) lines.push(`Session: ${output.sessionId}`);
  lines.push(...output.explanation);

  lines.push('', 'Recommendations:');
  if (output.recommendations.length === 0) {
    lines.push('  (none)');
  }
  for (const entry of output.recommendations) {
    const label = entry.metadata?.name ? `${entry.metadata.name} (${entry.candidateId})` : entry.candidateId;
    lines.push(
      `  ${entry.rank}. ${label}  score ${entry.score.toFixed(3)}  ${entry.recommendationType}  effort: ${entry.integrationEffort}`,
    );
    if (entry.metadata?.url) lines.push(`     ${entry.metadata.url}`);
    for (const note of entry.notes) {
      lines.push(`     * ${note}`);
    }
  }

  lines.push(...section('Insights', output.insights));
  lines.push(...section('Next actions', output.nextActions));
  lines.push(
    ...section(
      'Diagnostics',
      output.diagnostics.map(
        (diagnostic) => `[${diagnostic.kind}] ${diagnostic.candidateId ? `${diagnostic.candidateId}: ` : ''}${diagnostic.message}`,
      ),
    ),
  );
  return lines.join('\n');
}

export function formatObjectives(objectives: readonly ObjectiveDefinition[], keywords: (name: string) => readonly string[]): string {
  const width = Math.max(...objectives.map((objective) => objective.name.length));
  return objectives
    .map((objective) => {
      const words = keywords(objective.name);
      const suffix = words.length > 0 ? ` [${words.slice(0, 5).join(', ')}${words.length > 5 ? ', ...' : ''}]` : '';
      return `${objective.name.padEnd(width)}  ${objective.directionality.padEnd(8)}  ${objective.description}${suffix}`;
    })
    .join('\n');
}

export function formatConflicts(conflicts: readonly ConflictPair[]): string {
  if (conflicts.length === 0) return '(no conflicts registered)';
  return conflicts
    .map((pair) => `${`${pair.a} vs ${pair.b}`.padEnd(24)}  ${pair.severity.padEnd(8)}  ${pair.rationale}`)
    .join('\n');
}
