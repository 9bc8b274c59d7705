/**
 * Extended M3U Renderer
 */

import { HEADER_TAG } from './parser';
import type { ChannelEntry } from '../types/playlist';

export interface RenderOptions {
  /** Guide location advertised to players through url-tvg */
  guideUrl?: string;
}

export function renderHeader(options: RenderOptions = {}): string {
  return options.guideUrl ? `${HEADER_TAG} url-tvg="${options.guideUrl}"` : HEADER_TAG;
}

/**
 * Render entries back to playlist text: header, then info line, metadata
 * lines and stream URL per entry, newline-terminated.
 */
export function renderPlaylist(entries: readonly ChannelEntry[], options: RenderOptions = {}): string {
  const lines = [renderHeader(options)];

  for (const entry of entries) {
    lines.push(entry.infoLine, ...entry.metadata, entry.streamUrl);
  }

  return `${lines.join('\n')}\n`;
}
