/**
 * Channel Cache
 * Keeps the last matching outcome so repeat runs can skip fetching and indexing
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { MatchCounts, RunWarning } from '../types/playlist';

/** Run settings the cached documents were rendered with */
export interface CacheKey {
  playlistUrl: string;
  keepUnidentified: boolean;
  guideUrl: string | null;
  channelFileSuffix: string;
}

export interface CachedMatch extends CacheKey {
  timestamp: number;
  filteredPlaylist: string;
  channelsRequest: string;
  counts: MatchCounts;
  unmatchedIdentifiers: string[];
}

export interface CacheLookup {
  entry: CachedMatch | null;
  warning?: RunWarning;
  /** Age in hours of the entry found on disk, valid or not */
  ageHours?: number;
}

const COUNT_KEYS: Array<keyof MatchCounts> = [
  'total',
  'matched',
  'removed',
  'unidentified',
  'duplicates',
  'passedThrough',
];

function isCounts(value: unknown): value is MatchCounts {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return COUNT_KEYS.every((key) => typeof record[key] === 'number');
}

function isCachedMatch(value: unknown): value is CachedMatch {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.timestamp === 'number' &&
    typeof record.playlistUrl === 'string' &&
    typeof record.keepUnidentified === 'boolean' &&
    (typeof record.guideUrl === 'string' || record.guideUrl === null) &&
    typeof record.channelFileSuffix === 'string' &&
    typeof record.filteredPlaylist === 'string' &&
    typeof record.channelsRequest === 'string' &&
    isCounts(record.counts) &&
    Array.isArray(record.unmatchedIdentifiers) &&
    record.unmatchedIdentifiers.every((id) => typeof id === 'string')
  );
}

function sameKey(a: CacheKey, b: CacheKey): boolean {
  return (
    a.playlistUrl === b.playlistUrl &&
    a.keepUnidentified === b.keepUnidentified &&
    a.guideUrl === b.guideUrl &&
    a.channelFileSuffix === b.channelFileSuffix
  );
}

export class ChannelCache {
  private readonly file: string;
  private readonly maxAgeHours: number;

  constructor(file: string, maxAgeHours: number) {
    this.file = file;
    this.maxAgeHours = maxAgeHours;
  }

  /**
   * Return the cached outcome when it exists, was built with the same key
   * and is younger than the configured age.
   */
  async load(key: CacheKey, now: number = Date.now()): Promise<CacheLookup> {
    let raw: string;
    try {
      raw = await fs.readFile(this.file, 'utf-8');
    } catch {
      return { entry: null };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      return {
        entry: null,
        warning: { kind: 'cache', message: `Failed to load cache: ${error}`, location: this.file },
      };
    }

    if (!isCachedMatch(parsed)) {
      return {
        entry: null,
        warning: { kind: 'cache', message: 'Ignoring cache with unexpected format', location: this.file },
      };
    }

    const ageHours = (now - parsed.timestamp) / 3600000;
    if (!sameKey(parsed, key) || ageHours > this.maxAgeHours) {
      return { entry: null, ageHours };
    }

    return { entry: parsed, ageHours };
  }

  async save(entry: Omit<CachedMatch, 'timestamp'>, now: number = Date.now()): Promise<void> {
    const data: CachedMatch = { timestamp: now, ...entry };
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    await fs.writeFile(this.file, JSON.stringify(data, null, 2), 'utf-8');
    console.log(`Channel cache saved to: ${this.file}`);
  }
}
