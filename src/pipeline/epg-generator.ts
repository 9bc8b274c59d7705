/**
 * EPG Generation Orchestrator
 * Coordinates repository sync, playlist filtering, channels.xml and the grabber run
 */

import { promises as fs } from 'fs';
import path from 'path';
import { PlaylistClient } from '../api/playlist-client';
import { ChannelCache, type CacheKey, type CachedMatch } from '../cache/channel-cache';
import { EpgRepository } from '../grabber/epg-repository';
import { GuideGrabber, isFileRecent } from '../grabber/guide-grabber';
import { matchChannels, type MatchResult } from '../matching/matcher';
import { parsePlaylist } from '../playlist/parser';
import { renderPlaylist } from '../playlist/renderer';
import { buildSourceIndex } from '../sources/source-index';
import { ExternalToolError, NoMatchError } from '../utils/errors';
import { buildChannelsRequest } from '../xmltv/channels-request';
import { validateChannelsRequest } from '../xmltv/validator';
import type { AppConfig } from '../types/config';
import type { MatchCounts, RunWarning } from '../types/playlist';

export interface RunOptions {
  /** Ignore the channel cache */
  refresh?: boolean;
  /** Run the grabber even when the guide is recent */
  refreshEpg?: boolean;
  /** Do not clone/pull the repository or install its dependencies */
  skipUpdate?: boolean;
}

export type GuideStatus = 'generated' | 'skipped' | 'failed';

export interface RunSummary {
  counts: MatchCounts;
  unmatchedIdentifiers: string[];
  warnings: RunWarning[];
  fromCache: boolean;
  playlistPath: string;
  channelsPath: string;
  guide: {
    status: GuideStatus;
    path: string;
    error?: string;
  };
  durationSeconds: string;
}

export interface GeneratorDependencies {
  client?: PlaylistClient;
  repository?: EpgRepository;
  grabber?: GuideGrabber;
  cache?: ChannelCache;
}

const STEPS = 6;

function step(n: number, message: string) {
  console.log(`[${n}/${STEPS}] ${message}`);
}

export class EPGGenerator {
  private readonly config: AppConfig;
  private readonly client: PlaylistClient;
  private readonly repository: EpgRepository;
  private readonly grabber: GuideGrabber;
  private readonly cache: ChannelCache;

  constructor(config: AppConfig, deps: GeneratorDependencies = {}) {
    this.config = config;
    this.client = deps.client ?? new PlaylistClient(config.playlist.timeoutMs);
    this.repository = deps.repository ?? new EpgRepository(config.epg);
    this.grabber = deps.grabber ?? new GuideGrabber(config);
    this.cache = deps.cache ?? new ChannelCache(config.cache.file, config.cache.maxAgeHours);
  }

  /**
   * Perform a complete run.
   * Throws FetchError, NoMatchError or ExternalToolError (repository stage);
   * a failing grabber is reported in the summary since the playlist is already written.
   */
  async run(options: RunOptions = {}): Promise<RunSummary> {
    const startTime = Date.now();
    const warnings: RunWarning[] = [];

    step(1, 'Setting up workspace...');
    await fs.mkdir(this.config.epg.workDir, { recursive: true });

    if (options.skipUpdate) {
      step(2, 'Skipping EPG repository update');
      step(3, 'Skipping dependency install');
    } else {
      step(2, 'Syncing EPG repository...');
      await this.repository.sync();
      step(3, 'Installing dependencies...');
      await this.repository.installDependencies();
    }

    let match: Omit<CachedMatch, 'timestamp'> | null = null;
    let fromCache = false;

    if (!options.refresh) {
      const lookup = await this.cache.load(this.cacheKey());
      if (lookup.warning) {
        warnings.push(lookup.warning);
      }
      if (lookup.entry) {
        console.log(`Loaded channel cache (${(lookup.ageHours ?? 0).toFixed(1)} hours old)`);
        step(4, 'Using cached M3U playlist data');
        step(5, 'Using cached channel matching results');
        match = lookup.entry;
        fromCache = true;
      } else if (lookup.ageHours !== undefined) {
        console.log(`Cache is ${lookup.ageHours.toFixed(1)} hours old, refreshing...`);
      }
    }

    if (!match) {
      match = await this.filterPlaylist(warnings);
      await this.cache.save(match);
    }

    const playlistPath = path.resolve(this.config.output.playlist);
    await this.writeFile(this.grabber.channelsPath, match.channelsRequest);
    await this.writeFile(playlistPath, match.filteredPlaylist);
    console.log(`Filtered playlist saved: ${playlistPath}`);
    console.log(`Contains ${match.counts.matched + match.counts.passedThrough} channels\n`);

    const guide = await this.generateGuide(options, warnings);

    return {
      counts: match.counts,
      unmatchedIdentifiers: match.unmatchedIdentifiers,
      warnings,
      fromCache,
      playlistPath,
      channelsPath: this.grabber.channelsPath,
      guide,
      durationSeconds: ((Date.now() - startTime) / 1000).toFixed(2),
    };
  }

  /**
   * Fetch, parse, index and match; render both output documents
   */
  private async filterPlaylist(warnings: RunWarning[]): Promise<Omit<CachedMatch, 'timestamp'>> {
    step(4, 'Downloading M3U playlist...');
    const text = await this.client.fetchPlaylist(this.config.playlist.url);
    const parsed = parsePlaylist(text);
    warnings.push(...parsed.warnings);
    console.log(`Found ${parsed.entries.length} channels in M3U playlist\n`);

    step(5, 'Matching channels with EPG sources and filtering playlist...');
    const sources = await buildSourceIndex(this.repository.sitesDirectory, {
      channelFileSuffix: this.config.epg.channelFileSuffix,
    });
    warnings.push(...sources.warnings);
    console.log(
      `Indexed ${sources.index.size} guide sources from ${sources.files} files across ${sources.providers} sites`
    );

    let result: MatchResult;
    try {
      result = matchChannels(parsed.entries, sources.index, {
        keepUnidentified: this.config.playlist.keepUnidentified,
      });
    } catch (error) {
      if (error instanceof NoMatchError) {
        console.warn('=== WARNING ===');
        console.warn('No channels were matched with EPG sources.');
        console.warn('The EPG repository may not have sources for these channels.');
        throw new NoMatchError(error.counts, error.unmatchedIdentifiers, warnings);
      }
      throw error;
    }

    for (const identifier of result.retainedIdentifiers) {
      console.log(`  ✓ Matched: ${identifier}`);
    }
    for (const identifier of result.unmatchedIdentifiers) {
      console.log(`  ✗ Removed: ${identifier} (no EPG source)`);
    }

    const channelsRequest = buildChannelsRequest(result.retainedIdentifiers, sources.index);
    const validation = validateChannelsRequest(channelsRequest);
    if (!validation.valid) {
      throw new Error(`channels.xml validation failed: ${validation.error}`);
    }

    return {
      ...this.cacheKey(),
      filteredPlaylist: renderPlaylist(result.filteredEntries, { guideUrl: this.config.output.guideUrl }),
      channelsRequest,
      counts: result.counts,
      unmatchedIdentifiers: result.unmatchedIdentifiers,
    };
  }

  private cacheKey(): CacheKey {
    return {
      playlistUrl: this.config.playlist.url,
      keepUnidentified: this.config.playlist.keepUnidentified,
      guideUrl: this.config.output.guideUrl ?? null,
      channelFileSuffix: this.config.epg.channelFileSuffix,
    };
  }

  private async generateGuide(options: RunOptions, warnings: RunWarning[]): Promise<RunSummary['guide']> {
    const guidePath = path.resolve(this.config.output.guide);

    if (!options.refreshEpg && (await isFileRecent(guidePath, this.config.cache.guideMaxAgeHours))) {
      step(6, 'Skipping EPG generation (guide.xml is recent)\n');
      return { status: 'skipped', path: guidePath };
    }

    step(6, 'Generating EPG data...');
    console.log('This may take several minutes...\n');

    try {
      const result = await this.grabber.grab();
      for (const message of result.warnings) {
        warnings.push({ kind: 'guide', message, location: result.guidePath });
      }
      return { status: 'generated', path: result.guidePath };
    } catch (error) {
      if (error instanceof ExternalToolError) {
        return { status: 'failed', path: guidePath, error: error.message };
      }
      throw error;
    }
  }

  /**
   * Write through a temp file and rename into place
   */
  private async writeFile(target: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(target), { recursive: true });
    const tempPath = `${target}.tmp`;

    try {
      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, target);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new Error(`Failed to write ${target}: ${error}`);
    }
  }
}
