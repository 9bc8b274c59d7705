#!/usr/bin/env node
/**
 * m3u-epg-matcher
 * Main entry point
 */

import 'dotenv/config';
import { getConfig } from './types/config';
import { applyOverrides, parseArgs, USAGE, UsageError, type ParsedArgs } from './cli';
import { EPGGenerator, type RunOptions } from './pipeline/epg-generator';
import { exitCodeForError, exitCodeForSummary, formatSummary, formatWarnings } from './pipeline/summary';
import { EPGServer } from './server/express-server';
import { NoMatchError, formatError } from './utils/errors';

async function runGenerator(generator: EPGGenerator, options: RunOptions): Promise<number> {
  try {
    const summary = await generator.run(options);
    const failed = summary.guide.status === 'failed';

    console.log(failed ? '\n=== ERROR ===' : '\n=== SUCCESS ===');
    formatSummary(summary).forEach((line) => (failed ? console.error(line) : console.log(line)));

    if (!failed) {
      console.log('\nUse these in Jellyfin:');
      console.log(`  M3U URL: file://${summary.playlistPath}`);
      console.log(`  EPG URL: file://${summary.guide.path}`);
      console.log('\nOr serve them with: m3u-epg-matcher serve');
    }

    return exitCodeForSummary(summary);
  } catch (error) {
    console.error('\n=== ERROR ===');
    console.error(formatError(error));

    if (error instanceof NoMatchError) {
      if (error.unmatchedIdentifiers.length > 0) {
        console.error(`No EPG source: ${error.unmatchedIdentifiers.join(', ')}`);
      }
      formatWarnings(error.warnings).forEach((line) => console.error(line));
    }

    return exitCodeForError(error);
  }
}

async function main(): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      console.error(USAGE);
      return 1;
    }
    throw error;
  }

  if (args.command === 'help') {
    console.log(USAGE);
    return 0;
  }

  const config = applyOverrides(getConfig(), args);

  if (args.command === 'serve') {
    const server = new EPGServer(config);
    await server.start();

    const shutdown = () => {
      console.log('\n\nShutting down gracefully...');
      process.exit(0);
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    // Keep running until a signal arrives
    return new Promise<number>(() => undefined);
  }

  console.log('=== IPTV EPG Generator ===\n');
  console.log('Configuration:');
  console.log(`  Playlist: ${config.playlist.url}`);
  console.log(`  EPG repository: ${config.epg.repository}`);
  console.log(`  Workspace: ${config.epg.workDir}`);
  console.log(`  Output: ${config.output.playlist}, ${config.output.guide}`);
  console.log('');

  return runGenerator(new EPGGenerator(config), args.run);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
