/**
 * Playlist and guide-source record types
 */

/**
 * One channel record of an extended M3U playlist.
 * `infoLine` and `metadata` hold the source lines as read so that a kept
 * entry renders back unchanged.
 */
export interface ChannelEntry {
  /** Non-empty tvg-id, absent when the attribute is missing or empty */
  readonly identifier?: string;
  readonly displayName: string;
  readonly duration: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly infoLine: string;
  readonly metadata: readonly string[];
  readonly streamUrl: string;
  /** 1-based line number of the #EXTINF line */
  readonly line: number;
}

export interface SourceRecord {
  readonly identifier: string;
  /** Provider (site) directory name */
  readonly provider: string;
  readonly providerFile: string;
  /** The defining <channel> element, serialised on a single line */
  readonly rawDefinitionFragment: string;
}

export type SourceIndex = ReadonlyMap<string, SourceRecord>;

export type WarningKind = 'parse' | 'index' | 'cache' | 'guide';

export interface RunWarning {
  kind: WarningKind;
  message: string;
  location?: string;
}

export interface MatchCounts {
  total: number;
  matched: number;
  removed: number;
  unidentified: number;
  duplicates: number;
  passedThrough: number;
}
