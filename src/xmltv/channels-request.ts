/**
 * Grabber channel list (channels.xml)
 */

import { byCodeUnit } from '../sources/source-index';
import type { SourceIndex } from '../types/playlist';

export const CHANNELS_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

/**
 * Wrap the defining fragment of each retained identifier in a <channels> root.
 * Channels are listed by identifier so that unchanged inputs give identical files.
 */
export function buildChannelsRequest(retained: Iterable<string>, index: SourceIndex): string {
  const lines = [CHANNELS_DECLARATION, '<channels>'];

  for (const identifier of [...new Set(retained)].sort(byCodeUnit)) {
    const record = index.get(identifier);
    if (record) {
      lines.push(`  ${record.rawDefinitionFragment}`);
    }
  }

  lines.push('</channels>');
  return `${lines.join('\n')}\n`;
}
