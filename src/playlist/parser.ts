/**
 * Extended M3U Parser
 * Line state machine turning playlist text into channel entries
 *
 * #EXTM3U
 * #EXTINF:-1 tvg-id="ABC.us" group-title="News",ABC News
 * #EXTVLCOPT:http-user-agent=Mozilla/5.0
 * https://example.com/abc.m3u8
 */

import type { ChannelEntry, RunWarning } from '../types/playlist';

export const HEADER_TAG = '#EXTM3U';
export const INFO_TAG = '#EXTINF:';
export const IDENTIFIER_ATTRIBUTE = 'tvg-id';

export interface PlaylistParseResult {
  /**
   * Header line as found, or undefined when the playlist has none.
   * Not carried into the output: the renderer writes its own header, so an
   * input x-tvg-url is replaced by the configured guide URL.
   */
  header?: string;
  entries: ChannelEntry[];
  warnings: RunWarning[];
}

export interface InfoLineFields {
  duration: string;
  attributes: Record<string, string>;
  displayName: string;
}

/**
 * Record being assembled between an #EXTINF line and its stream URL
 */
interface RecordAccumulator {
  infoLine: string;
  metadata: string[];
  line: number;
}

const ATTRIBUTE_PATTERN = /([A-Za-z0-9_:-]+)="([^"]*)"/g;

/**
 * Split an #EXTINF line into duration, key="value" attributes and display name.
 * The display name starts after the first comma that is not inside quotes.
 */
export function parseInfoLine(infoLine: string): InfoLineFields {
  const payload = infoLine.startsWith(INFO_TAG) ? infoLine.slice(INFO_TAG.length) : infoLine;

  let separator = -1;
  let quoted = false;
  for (let i = 0; i < payload.length; i++) {
    const char = payload[i];
    if (char === '"') {
      quoted = !quoted;
    } else if (char === ',' && !quoted) {
      separator = i;
      break;
    }
  }

  const head = separator === -1 ? payload : payload.slice(0, separator);
  const displayName = separator === -1 ? '' : payload.slice(separator + 1).trim();

  const attributes: Record<string, string> = {};
  for (const match of head.matchAll(ATTRIBUTE_PATTERN)) {
    attributes[match[1]] = match[2];
  }

  const duration = head.trim().split(/\s+/)[0] || '';

  return { duration, attributes, displayName };
}

function toEntry(record: RecordAccumulator, streamUrl: string): ChannelEntry {
  const { duration, attributes, displayName } = parseInfoLine(record.infoLine);
  const identifier = attributes[IDENTIFIER_ATTRIBUTE];

  return {
    ...(identifier ? { identifier } : {}),
    displayName,
    duration,
    attributes,
    infoLine: record.infoLine,
    metadata: record.metadata,
    streamUrl,
    line: record.line,
  };
}

/**
 * Parse playlist text into entries in source order.
 * Malformed records are skipped with a warning; this never throws.
 */
export function parsePlaylist(text: string): PlaylistParseResult {
  const result: PlaylistParseResult = { entries: [], warnings: [] };
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);

  let current: RecordAccumulator | null = null;

  const dropCurrent = (reason: string) => {
    if (current) {
      result.warnings.push({
        kind: 'parse',
        message: `Skipped "${parseInfoLine(current.infoLine).displayName}": ${reason}`,
        location: `line ${current.line}`,
      });
      current = null;
    }
  };

  lines.forEach((raw, index) => {
    const line = raw.trim();
    const lineNumber = index + 1;

    if (!line) {
      return;
    }

    if (line.startsWith(INFO_TAG)) {
      dropCurrent(`no stream URL before the next ${INFO_TAG} line`);
      current = { infoLine: line, metadata: [], line: lineNumber };
      return;
    }

    if (line.startsWith('#')) {
      if (current) {
        current.metadata.push(line);
      } else if (line.startsWith(HEADER_TAG) && result.header === undefined) {
        result.header = line;
      }
      return;
    }

    if (!current) {
      result.warnings.push({
        kind: 'parse',
        message: `Skipped stream URL without a preceding ${INFO_TAG} line`,
        location: `line ${lineNumber}`,
      });
      return;
    }

    result.entries.push(toEntry(current, line));
    current = null;
  });

  dropCurrent('no stream URL before end of playlist');

  return result;
}
