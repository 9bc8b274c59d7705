import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { ChannelCache } from './channel-cache';

const URL = 'http://playlists.test/us.m3u';
const HOUR = 3600000;

const KEY = {
  playlistUrl: URL,
  keepUnidentified: false,
  guideUrl: null,
  channelFileSuffix: '.channels.xml',
};

const ENTRY = {
  ...KEY,
  filteredPlaylist: '#EXTM3U\n#EXTINF:-1 tvg-id="A",Alpha\nhttp://a\n',
  channelsRequest: '<?xml version="1.0" encoding="UTF-8"?>\n<channels>\n</channels>\n',
  counts: { total: 2, matched: 1, removed: 1, unidentified: 0, duplicates: 0, passedThrough: 0 },
  unmatchedIdentifiers: ['B'],
};

describe('ChannelCache', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'channel-cache-'));
    file = path.join(dir, 'nested', 'channel-cache.json');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should return a saved entry while it is fresh', async () => {
    const cache = new ChannelCache(file, 24);
    await cache.save(ENTRY, 1_000_000);

    const lookup = await cache.load(KEY, 1_000_000 + 2 * HOUR);

    expect(lookup.entry).toEqual({ timestamp: 1_000_000, ...ENTRY });
    expect(lookup.ageHours).toBe(2);
    expect(lookup.warning).toBeUndefined();
  });

  it('should miss once the entry is older than the limit', async () => {
    const cache = new ChannelCache(file, 24);
    await cache.save(ENTRY, 0);

    const lookup = await cache.load(KEY, 30 * HOUR);

    expect(lookup).toEqual({ entry: null, ageHours: 30 });
  });

  it('should miss when the playlist URL changed', async () => {
    const cache = new ChannelCache(file, 24);
    await cache.save(ENTRY, 0);

    expect((await cache.load({ ...KEY, playlistUrl: 'http://playlists.test/uk.m3u' }, HOUR)).entry).toBeNull();
  });

  it('should miss when the output settings changed', async () => {
    const cache = new ChannelCache(file, 24);
    await cache.save(ENTRY, 0);

    expect((await cache.load({ ...KEY, keepUnidentified: true }, HOUR)).entry).toBeNull();
    expect((await cache.load({ ...KEY, guideUrl: 'http://media.local/guide.xml' }, HOUR)).entry).toBeNull();
    expect((await cache.load({ ...KEY, channelFileSuffix: '.xml' }, HOUR)).entry).toBeNull();
    expect((await cache.load(KEY, HOUR)).entry).not.toBeNull();
  });

  it('should miss quietly when no cache exists', async () => {
    await expect(new ChannelCache(file, 24).load(KEY)).resolves.toEqual({ entry: null });
  });

  it('should warn about unreadable cache contents', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, '{ not json', 'utf-8');

    const lookup = await new ChannelCache(file, 24).load(KEY);

    expect(lookup.entry).toBeNull();
    expect(lookup.warning?.kind).toBe('cache');
    expect(lookup.warning?.location).toBe(file);
  });

  it('should warn about a cache with an unexpected shape', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify({ timestamp: 1, matched_channels: [] }), 'utf-8');

    const lookup = await new ChannelCache(file, 24).load(KEY);

    expect(lookup.entry).toBeNull();
    expect(lookup.warning?.message).toBe('Ignoring cache with unexpected format');
  });
});
