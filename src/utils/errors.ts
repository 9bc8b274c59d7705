/**
 * Error types surfaced by a run
 */

import type { MatchCounts, RunWarning } from '../types/playlist';

export class EpgMatcherError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Playlist could not be retrieved. Never retried.
 */
export class FetchError extends EpgMatcherError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super(`Failed to fetch playlist from ${url}: ${message}`);
    this.url = url;
    this.status = status;
  }
}

/**
 * No playlist entry had a guide source.
 */
export class NoMatchError extends EpgMatcherError {
  readonly counts: MatchCounts;
  readonly unmatchedIdentifiers: string[];
  /** Parse and index warnings collected before matching gave up */
  readonly warnings: RunWarning[];

  constructor(counts: MatchCounts, unmatchedIdentifiers: string[], warnings: RunWarning[] = []) {
    super(`No channels were matched with EPG sources (${counts.total} entries checked)`);
    this.counts = counts;
    this.unmatchedIdentifiers = unmatchedIdentifiers;
    this.warnings = warnings;
  }
}

/**
 * git, npm or the guide grabber failed.
 */
export class ExternalToolError extends EpgMatcherError {
  readonly command: string;
  readonly exitCode?: number;
  readonly signal?: string;

  constructor(command: string, message: string, exitCode?: number, signal?: string) {
    super(`${command}: ${message}`);
    this.command = command;
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
