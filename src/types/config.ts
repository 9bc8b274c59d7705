/**
 * Application configuration types
 */

import path from 'path';

export interface AppConfig {
  playlist: {
    url: string;
    timeoutMs: number;
    keepUnidentified: boolean;
  };
  epg: {
    repository: string;
    workDir: string;
    /** Clone target, i.e. `<workDir>/epg` */
    repoDir: string;
    channelFileSuffix: string;
    maxConnections: number;
    days: number;
    memoryMb: number;
  };
  cache: {
    file: string;
    maxAgeHours: number;
    guideMaxAgeHours: number;
  };
  output: {
    playlist: string;
    guide: string;
    /** Advertised as url-tvg in the playlist header when set */
    guideUrl?: string;
  };
  server: {
    port: number;
  };
}

type Env = Record<string, string | undefined>;

function intFrom(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function getConfig(env: Env = process.env): AppConfig {
  const workDir = env.WORK_DIR || './epg-workspace';

  const config: AppConfig = {
    playlist: {
      url: env.M3U_URL || 'https://iptv-org.github.io/iptv/countries/us.m3u',
      timeoutMs: intFrom(env.FETCH_TIMEOUT_MS, 30000),
      keepUnidentified: env.KEEP_UNIDENTIFIED === 'true',
    },
    epg: {
      repository: env.EPG_REPO || 'https://github.com/iptv-org/epg.git',
      workDir,
      repoDir: path.join(workDir, 'epg'),
      channelFileSuffix: env.CHANNEL_FILE_SUFFIX || '.channels.xml',
      maxConnections: intFrom(env.MAX_CONNECTIONS, 5),
      days: intFrom(env.EPG_DAYS, 1),
      memoryMb: intFrom(env.GRAB_MEMORY_MB, 8192),
    },
    cache: {
      file: path.join(workDir, 'channel-cache.json'),
      maxAgeHours: intFrom(env.CACHE_MAX_AGE_HOURS, 24),
      guideMaxAgeHours: intFrom(env.GUIDE_MAX_AGE_HOURS, 12),
    },
    output: {
      playlist: env.OUTPUT_PLAYLIST || './playlist-filtered.m3u',
      guide: env.OUTPUT_GUIDE || './guide.xml',
    },
    server: {
      port: intFrom(env.WEB_PORT, 3000),
    },
  };

  if (env.GUIDE_URL) {
    config.output.guideUrl = env.GUIDE_URL;
  }

  return config;
}
