/**
 * Command-line argument handling
 */

import type { AppConfig } from './types/config';
import type { RunOptions } from './pipeline/epg-generator';

export type Command = 'run' | 'serve' | 'help';

export interface ParsedArgs {
  command: Command;
  run: RunOptions;
  maxConnections?: number;
  days?: number;
  keepUnidentified?: boolean;
  port?: number;
}

export const USAGE = `Usage: m3u-epg-matcher [run|serve] [options]

Commands:
  run (default)           Filter the playlist, write channels.xml and grab the guide
  serve                   Serve the filtered playlist and guide over HTTP

Options:
  --refresh               Ignore the channel cache
  --refresh-epg           Regenerate the guide even if it is recent
  --skip-update           Do not clone/pull the EPG repository or run npm install
  --max-connections=N     Parallel grabber requests
  --days=N                Days of guide data to grab
  --keep-unidentified     Keep playlist entries without a tvg-id
  --port=N                Port for serve
  -h, --help              Show this help`;

export class UsageError extends Error {}

function positiveInt(name: string, value: string | undefined): number {
  const parsed = Number(value);
  if (!value || !Number.isInteger(parsed) || parsed < 1) {
    throw new UsageError(`${name} expects a positive integer, got "${value ?? ''}"`);
  }
  return parsed;
}

/**
 * Parse process arguments (without node and script path).
 * Numeric options accept both --name=N and --name N.
 */
export function parseArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = { command: 'run', run: {} };
  let commandSeen = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const equals = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = equals === -1 ? arg : arg.slice(0, equals);
    const inline = equals === -1 ? undefined : arg.slice(equals + 1);
    const takeValue = () => inline ?? args[++i];

    switch (flag) {
      case '-h':
      case '--help':
        parsed.command = 'help';
        return parsed;
      case '--refresh':
        parsed.run.refresh = true;
        break;
      case '--refresh-epg':
        parsed.run.refreshEpg = true;
        break;
      case '--skip-update':
        parsed.run.skipUpdate = true;
        break;
      case '--keep-unidentified':
        parsed.keepUnidentified = true;
        break;
      case '--max-connections':
        parsed.maxConnections = positiveInt(flag, takeValue());
        break;
      case '--days':
        parsed.days = positiveInt(flag, takeValue());
        break;
      case '--port':
        parsed.port = positiveInt(flag, takeValue());
        break;
      default:
        if (!commandSeen && (arg === 'run' || arg === 'serve')) {
          parsed.command = arg;
          commandSeen = true;
          break;
        }
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  return parsed;
}

/**
 * Apply command-line overrides on top of the environment configuration
 */
export function applyOverrides(config: AppConfig, args: ParsedArgs): AppConfig {
  return {
    ...config,
    playlist: {
      ...config.playlist,
      keepUnidentified: args.keepUnidentified ?? config.playlist.keepUnidentified,
    },
    epg: {
      ...config.epg,
      maxConnections: args.maxConnections ?? config.epg.maxConnections,
      days: args.days ?? config.epg.days,
    },
    server: {
      port: args.port ?? config.server.port,
    },
  };
}
