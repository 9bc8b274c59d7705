/**
 * Channel Matcher
 * Keeps the playlist entries whose tvg-id has a guide source
 */

import { NoMatchError } from '../utils/errors';
import { byCodeUnit } from '../sources/source-index';
import type { ChannelEntry, MatchCounts, SourceIndex } from '../types/playlist';

export interface MatchOptions {
  /** Keep entries without a tvg-id in place instead of dropping them */
  keepUnidentified?: boolean;
}

export interface MatchResult {
  /** Matched identifiers in first-seen playlist order */
  retainedIdentifiers: ReadonlySet<string>;
  /** Kept entries in playlist order */
  filteredEntries: ChannelEntry[];
  counts: MatchCounts;
  /** Identifiers without a guide source, sorted */
  unmatchedIdentifiers: string[];
}

/**
 * Exact, case-sensitive match of entry identifiers against the source index.
 * Repeats of an identifier + stream URL pair are dropped.
 *
 * @throws NoMatchError when no entry matched
 */
export function matchChannels(
  entries: readonly ChannelEntry[],
  index: SourceIndex,
  options: MatchOptions = {}
): MatchResult {
  const retained = new Set<string>();
  const unmatched = new Set<string>();
  const seenPairs = new Set<string>();
  const filteredEntries: ChannelEntry[] = [];
  const counts: MatchCounts = {
    total: entries.length,
    matched: 0,
    removed: 0,
    unidentified: 0,
    duplicates: 0,
    passedThrough: 0,
  };

  for (const entry of entries) {
    const { identifier } = entry;

    if (identifier === undefined) {
      counts.unidentified++;
      if (options.keepUnidentified) {
        filteredEntries.push(entry);
        counts.passedThrough++;
      }
      continue;
    }

    if (!index.has(identifier)) {
      unmatched.add(identifier);
      continue;
    }

    const pair = `${identifier}\n${entry.streamUrl}`;
    if (seenPairs.has(pair)) {
      counts.duplicates++;
      continue;
    }

    seenPairs.add(pair);
    retained.add(identifier);
    filteredEntries.push(entry);
    counts.matched++;
  }

  counts.removed = counts.total - counts.matched - counts.passedThrough;
  const unmatchedIdentifiers = [...unmatched].sort(byCodeUnit);

  if (counts.matched === 0) {
    throw new NoMatchError(counts, unmatchedIdentifiers);
  }

  return { retainedIdentifiers: retained, filteredEntries, counts, unmatchedIdentifiers };
}
