/**
 * Request artifacts
 *
 * The markdown document a generator reads to propose the next candidate:
 * where the search stands, what recent attempts scored, and the source to
 * improve on.
 */

import { HistoryEntry, RequestContext, ScoreBreakdown } from '../types.js';
import { fenceFor } from './responses.js';

const HISTORY_ROWS = 10;

export function requestFileName(requestId: number): string {
  return `prompt_${String(requestId).padStart(4, '0')}.md`;
}

export function responseFileName(requestId: number): string {
  return `prompt_${String(requestId).padStart(4, '0')}.response.md`;
}

/**
 * Inverse of requestFileName; null for anything else in the directory.
 */
export function parseRequestFileName(fileName: string): number | null {
  const match = fileName.match(/^prompt_(\d+)\.md$/);
  return match ? Number.parseInt(match[1], 10) : null;
}

function formatScore(score: number | null): string {
  return score === null ? 'n/a' : score.toFixed(4);
}

function formatBreakdown(breakdown: ScoreBreakdown): string {
  const entries = Object.entries(breakdown);
  if (entries.length === 0) {
    return '_no breakdown yet_';
  }
  return entries.map(([key, value]) => `- ${key}: ${value}`).join('\n');
}

function formatHistory(history: readonly HistoryEntry[]): string {
  if (history.length === 0) {
    return '_no previous iterations_';
  }
  const rows = history.slice(-HISTORY_ROWS).map((entry) => {
    const note = entry.error ? entry.error.replace(/\|/g, '\\|').replace(/\s+/g, ' ') : '';
    return `| ${entry.iteration} | ${entry.status} | ${formatScore(entry.score)} | ${note} |`;
  });
  return ['| iteration | status | score | note |', '| --- | --- | --- | --- |', ...rows].join('\n');
}

/**
 * Render the request for `context`. The current best source goes in a fenced
 * block labeled `language`; the reply must use the same shape.
 */
export function renderRequest(context: RequestContext, language: string): string {
  const { iteration, best, history, instructions } = context;
  const source = best.source.replace(/\n$/, '');
  const fence = fenceFor(source);

  const sections = [
    `# Iteration ${iteration}`,
    '',
    `Best so far: iteration ${best.iteration}, score ${formatScore(best.score)}`,
    '',
    '## Score breakdown',
    '',
    formatBreakdown(best.breakdown),
    '',
    '## Recent history',
    '',
    formatHistory(history),
    '',
  ];

  if (instructions) {
    sections.push('## Instructions', '', instructions.trim(), '');
  }

  sections.push(
    '## Rules',
    '',
    '1. Reply with the COMPLETE replacement file, not a diff',
    `2. Put it in exactly one fenced code block labeled \`${language}\``,
    '3. Keep the public interface of the file unchanged',
    '4. Numeric knobs may be exposed for tuning with annotation comments',
    '',
    '## Current best source',
    '',
    `${fence}${language}`,
    source,
    fence,
    ''
  );

  return sections.join('\n');
}
