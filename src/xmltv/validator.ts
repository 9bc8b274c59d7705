/**
 * XML Validation
 * Checks XML we write (channels.xml) and the guide the grabber hands back
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';

export interface ValidationResult {
  valid: boolean;
  error?: string;
  /** Problems that leave the document usable */
  warnings: string[];
}

const parser = new XMLParser({
  ignoreAttributes: false,
  parseTagValue: false,
  isArray: (tagName) => tagName === 'channel' || tagName === 'programme',
});

function fail(error: string): ValidationResult {
  return { valid: false, error, warnings: [] };
}

/**
 * Validate XML string is well-formed and carries an XML declaration
 */
export function validateXML(xmlString: string): ValidationResult {
  if (!xmlString || xmlString.trim().length === 0) {
    return fail('XML string is empty');
  }

  if (!xmlString.trim().startsWith('<?xml')) {
    return fail('Missing XML declaration');
  }

  const result = XMLValidator.validate(xmlString);
  if (result !== true) {
    return fail(`XML parsing failed: ${result.err.msg} (line ${result.err.line})`);
  }

  return { valid: true, warnings: [] };
}

/**
 * Validate a grabber request document: <channels> root with <channel> children
 */
export function validateChannelsRequest(xmlString: string): ValidationResult {
  const basic = validateXML(xmlString);
  if (!basic.valid) {
    return basic;
  }

  const parsed: unknown = parser.parse(xmlString);
  if (!hasElement(parsed, 'channels')) {
    return fail('Missing <channels> root element');
  }

  return basic;
}

/**
 * Validate a guide produced by the grabber.
 * A guide without programmes is usable but reported: some sites failed.
 */
export function validateGuide(xmlString: string): ValidationResult {
  const basic = validateXML(xmlString);
  if (!basic.valid) {
    return basic;
  }

  const parsed: unknown = parser.parse(xmlString);
  const tv = hasElement(parsed, 'tv') ? parsed.tv : undefined;

  if (tv === undefined) {
    return fail('Missing <tv> root element');
  }

  const channels = countElements(tv, 'channel');
  if (channels === 0) {
    return fail('No channels found in XMLTV');
  }

  const warnings: string[] = [];
  const programmes = countElements(tv, 'programme');
  if (programmes === 0) {
    warnings.push(`Guide lists ${channels} channels but no programmes`);
  }

  return { valid: true, warnings };
}

function hasElement<K extends string>(value: unknown, key: K): value is Record<K, unknown> {
  return typeof value === 'object' && value !== null && key in value;
}

function countElements(parent: unknown, key: string): number {
  if (!hasElement(parent, key)) {
    return 0;
  }
  const value = parent[key];
  return Array.isArray(value) ? value.length : 0;
}
