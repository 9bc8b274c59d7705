/**
 * Guide Source Index
 * Scans <root>/<provider>/*.channels.xml and maps xmltv_id to its defining <channel>
 */

import { promises as fs, type Dirent } from 'fs';
import path from 'path';
import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import type { RunWarning, SourceRecord } from '../types/playlist';

export const SOURCE_IDENTIFIER_ATTRIBUTE = 'xmltv_id';
export const DEFAULT_CHANNEL_FILE_SUFFIX = '.channels.xml';

const ATTRIBUTE_PREFIX = '@_';

export interface SourceIndexOptions {
  channelFileSuffix?: string;
}

export interface SourceIndexResult {
  index: Map<string, SourceRecord>;
  warnings: RunWarning[];
  providers: number;
  files: number;
}

type XmlNode = Record<string, unknown>;

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Plain code-unit ordering, independent of locale */
export function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: (tagName) => tagName === 'channel',
});

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  format: false,
  suppressEmptyNode: true,
  suppressBooleanAttributes: false,
});

/**
 * Collect every <channel> element, whether the file uses a <channels> root
 * or nests it under a <site> element.
 */
function collectChannels(node: unknown, found: XmlNode[] = []): XmlNode[] {
  if (Array.isArray(node)) {
    node.forEach((child) => collectChannels(child, found));
    return found;
  }

  if (!isXmlNode(node)) {
    return found;
  }

  for (const [key, value] of Object.entries(node)) {
    if (key === 'channel' && Array.isArray(value)) {
      found.push(...value.filter(isXmlNode));
    } else if (!key.startsWith(ATTRIBUTE_PREFIX)) {
      collectChannels(value, found);
    }
  }

  return found;
}

/**
 * Serialise one parsed <channel> element on a single line
 */
export function renderChannelFragment(channel: XmlNode): string {
  return builder.build({ channel }).trim();
}

/**
 * Extract the channel records defined in one provider file
 */
export function readChannelDefinitions(
  xml: string,
  provider: string,
  providerFile: string
): SourceRecord[] {
  const parsed: unknown = parser.parse(xml);
  const records: SourceRecord[] = [];

  for (const channel of collectChannels(parsed)) {
    const identifier = channel[`${ATTRIBUTE_PREFIX}${SOURCE_IDENTIFIER_ATTRIBUTE}`];

    if (typeof identifier !== 'string' || identifier.length === 0) {
      continue;
    }

    records.push({
      identifier,
      provider,
      providerFile,
      rawDefinitionFragment: renderChannelFragment(channel),
    });
  }

  return records;
}

async function listSorted(dir: string): Promise<Dirent[]> {
  const dirents = await fs.readdir(dir, { withFileTypes: true });
  return dirents.sort((a, b) => byCodeUnit(a.name, b.name));
}

/**
 * Build the identifier → source record lookup.
 * Providers are visited in name order, then files in name order; the first
 * definition of an identifier wins. Unreadable or malformed input only adds a warning.
 */
export async function buildSourceIndex(
  rootDir: string,
  options: SourceIndexOptions = {}
): Promise<SourceIndexResult> {
  const suffix = options.channelFileSuffix ?? DEFAULT_CHANNEL_FILE_SUFFIX;
  const result: SourceIndexResult = { index: new Map(), warnings: [], providers: 0, files: 0 };

  const warn = (message: string, location: string) => {
    result.warnings.push({ kind: 'index', message, location });
  };

  let providers: Dirent[];
  try {
    providers = (await listSorted(rootDir)).filter((dirent) => dirent.isDirectory());
  } catch (error) {
    warn(`Source directory is not readable: ${error}`, rootDir);
    return result;
  }

  for (const provider of providers) {
    const providerDir = path.join(rootDir, provider.name);

    let files: Dirent[];
    try {
      files = (await listSorted(providerDir)).filter(
        (dirent) => dirent.isFile() && dirent.name.endsWith(suffix)
      );
    } catch (error) {
      warn(`Provider directory is not readable: ${error}`, providerDir);
      continue;
    }

    result.providers++;

    for (const file of files) {
      const providerFile = path.join(providerDir, file.name);

      let xml: string;
      try {
        xml = await fs.readFile(providerFile, 'utf-8');
      } catch (error) {
        warn(`Definition file is not readable: ${error}`, providerFile);
        continue;
      }

      const validation = XMLValidator.validate(xml);
      if (validation !== true) {
        warn(
          `Malformed XML (${validation.err.msg}) at line ${validation.err.line}`,
          providerFile
        );
        continue;
      }

      result.files++;

      for (const record of readChannelDefinitions(xml, provider.name, providerFile)) {
        if (!result.index.has(record.identifier)) {
          result.index.set(record.identifier, record);
        }
      }
    }
  }

  return result;
}
