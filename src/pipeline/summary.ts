/**
 * Run summary rendering and exit codes
 */

import { NoMatchError } from '../utils/errors';
import type { RunSummary } from './epg-generator';
import type { RunWarning } from '../types/playlist';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_NO_MATCH = 2;

export function formatWarnings(warnings: readonly RunWarning[]): string[] {
  if (warnings.length === 0) {
    return [];
  }
  return [
    `Warnings (${warnings.length}):`,
    ...warnings.map((warning) => {
      const location = warning.location ? ` [${warning.location}]` : '';
      return `  - ${warning.kind}: ${warning.message}${location}`;
    }),
  ];
}

export function formatSummary(summary: RunSummary): string[] {
  const { counts } = summary;
  const lines = [
    `Matched ${counts.matched}/${counts.total} channels with EPG sources${summary.fromCache ? ' (cached)' : ''}`,
    `Removed ${counts.removed} channels (${counts.unidentified} without tvg-id, ${counts.duplicates} duplicates)`,
  ];

  if (counts.passedThrough > 0) {
    lines.push(`Kept ${counts.passedThrough} channels without tvg-id`);
  }

  if (summary.unmatchedIdentifiers.length > 0) {
    lines.push(`No EPG source: ${summary.unmatchedIdentifiers.join(', ')}`);
  }

  lines.push(...formatWarnings(summary.warnings));

  lines.push(`Filtered playlist: ${summary.playlistPath}`);

  switch (summary.guide.status) {
    case 'generated':
      lines.push(`EPG guide generated: ${summary.guide.path}`);
      break;
    case 'skipped':
      lines.push(`EPG guide: ${summary.guide.path} (recent, not regenerated; use --refresh-epg)`);
      break;
    case 'failed':
      lines.push(`EPG generation failed: ${summary.guide.error}`);
      break;
  }

  lines.push(`Duration: ${summary.durationSeconds} seconds`);
  return lines;
}

export function exitCodeForSummary(summary: RunSummary): number {
  return summary.guide.status === 'failed' ? EXIT_FAILURE : EXIT_OK;
}

export function exitCodeForError(error: unknown): number {
  return error instanceof NoMatchError ? EXIT_NO_MATCH : EXIT_FAILURE;
}
