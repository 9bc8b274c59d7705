import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { buildSourceIndex, readChannelDefinitions } from './source-index';

async function writeSite(root: string, provider: string, file: string, content: string) {
  await fs.mkdir(path.join(root, provider), { recursive: true });
  await fs.writeFile(path.join(root, provider, file), content, 'utf-8');
}

function channelsFile(...channels: string[]): string {
  return ['<?xml version="1.0" encoding="UTF-8"?>', '<channels>', ...channels.map((c) => `  ${c}`), '</channels>', ''].join(
    '\n'
  );
}

describe('readChannelDefinitions', () => {
  it('should re-serialise each channel with its attributes in source order', () => {
    const records = readChannelDefinitions(
      channelsFile('<channel site="tv.example" lang="en" xmltv_id="A.us" site_id="101">Alpha</channel>'),
      'tv.example',
      'sites/tv.example/tv.example.channels.xml'
    );

    expect(records).toEqual([
      {
        identifier: 'A.us',
        provider: 'tv.example',
        providerFile: 'sites/tv.example/tv.example.channels.xml',
        rawDefinitionFragment:
          '<channel site="tv.example" lang="en" xmltv_id="A.us" site_id="101">Alpha</channel>',
      },
    ]);
  });

  it('should keep escaped characters escaped', () => {
    const [record] = readChannelDefinitions(
      channelsFile('<channel site="tv.example" xmltv_id="F.us" site_id="f&amp;f">Fox &amp; Friends</channel>'),
      'tv.example',
      'f.channels.xml'
    );

    expect(record.rawDefinitionFragment).toBe(
      '<channel site="tv.example" xmltv_id="F.us" site_id="f&amp;f">Fox &amp; Friends</channel>'
    );
  });

  it('should skip channels without an xmltv_id', () => {
    const records = readChannelDefinitions(
      channelsFile(
        '<channel site="tv.example" xmltv_id="" site_id="1">Nameless</channel>',
        '<channel site="tv.example" site_id="2">No id</channel>',
        '<channel site="tv.example" xmltv_id="B.us" site_id="3">Bravo</channel>'
      ),
      'tv.example',
      'f.channels.xml'
    );

    expect(records.map((r) => r.identifier)).toEqual(['B.us']);
  });

  it('should find channels nested under a site element', () => {
    const xml = [
      '<?xml version="1.0" encoding="UTF-8"?>',
      '<site site="old.example">',
      '  <channels>',
      '    <channel lang="en" xmltv_id="Old.us" site_id="9">Old One</channel>',
      '  </channels>',
      '</site>',
    ].join('\n');

    expect(readChannelDefinitions(xml, 'old.example', 'f.channels.xml').map((r) => r.identifier)).toEqual([
      'Old.us',
    ]);
  });
});

describe('buildSourceIndex', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'source-index-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should map identifiers to the first provider that defines them', async () => {
    await writeSite(
      root,
      'p2',
      'p2.channels.xml',
      channelsFile('<channel site="p2" xmltv_id="X" site_id="20">X from p2</channel>')
    );
    await writeSite(
      root,
      'p1',
      'p1.channels.xml',
      channelsFile(
        '<channel site="p1" xmltv_id="X" site_id="10">X from p1</channel>',
        '<channel site="p1" xmltv_id="A" site_id="11">Alpha</channel>'
      )
    );

    const result = await buildSourceIndex(root);

    expect(result.warnings).toEqual([]);
    expect(result.providers).toBe(2);
    expect(result.files).toBe(2);
    expect([...result.index.keys()]).toEqual(['X', 'A']);
    expect(result.index.get('X')).toEqual({
      identifier: 'X',
      provider: 'p1',
      providerFile: path.join(root, 'p1', 'p1.channels.xml'),
      rawDefinitionFragment: '<channel site="p1" xmltv_id="X" site_id="10">X from p1</channel>',
    });
  });

  it('should visit files of a provider in name order', async () => {
    await writeSite(root, 'p1', 'b.channels.xml', channelsFile('<channel site="b" xmltv_id="X">From b</channel>'));
    await writeSite(root, 'p1', 'a.channels.xml', channelsFile('<channel site="a" xmltv_id="X">From a</channel>'));

    const result = await buildSourceIndex(root);

    expect(result.index.get('X')?.providerFile).toBe(path.join(root, 'p1', 'a.channels.xml'));
  });

  it('should ignore files without the definition suffix', async () => {
    await writeSite(root, 'p1', 'p1.config.js', 'module.exports = {}');
    await writeSite(root, 'p1', 'readme.md', '# p1');
    await fs.writeFile(path.join(root, 'stray.channels.xml'), channelsFile('<channel xmltv_id="S">S</channel>'));

    const result = await buildSourceIndex(root);

    expect(result.index.size).toBe(0);
    expect(result.files).toBe(0);
    expect(result.warnings).toEqual([]);
  });

  it('should honour a custom suffix', async () => {
    await writeSite(root, 'p1', 'p1.xml', channelsFile('<channel xmltv_id="Q">Q</channel>'));

    const result = await buildSourceIndex(root, { channelFileSuffix: '.xml' });

    expect([...result.index.keys()]).toEqual(['Q']);
  });

  it('should warn about malformed files and keep indexing', async () => {
    await writeSite(root, 'p1', 'broken.channels.xml', '<channels><channel xmltv_id="Z">Z</channels>');
    await writeSite(root, 'p2', 'p2.channels.xml', channelsFile('<channel xmltv_id="A">Alpha</channel>'));

    const result = await buildSourceIndex(root);

    expect([...result.index.keys()]).toEqual(['A']);
    expect(result.files).toBe(1);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0].kind).toBe('index');
    expect(result.warnings[0].location).toBe(path.join(root, 'p1', 'broken.channels.xml'));
  });

  it('should return an empty index with a warning when the root is missing', async () => {
    const missing = path.join(root, 'does-not-exist');

    const result = await buildSourceIndex(missing);

    expect(result.index.size).toBe(0);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toMatchObject({ kind: 'index', location: missing });
  });
});
