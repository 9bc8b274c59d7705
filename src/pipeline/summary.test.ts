import { describe, it, expect } from 'vitest';
import { EXIT_FAILURE, EXIT_NO_MATCH, EXIT_OK, exitCodeForError, exitCodeForSummary, formatSummary } from './summary';
import type { RunSummary } from './epg-generator';
import { ExternalToolError, FetchError, NoMatchError } from '../utils/errors';

function summary(overrides: Partial<RunSummary> = {}): RunSummary {
  return {
    counts: { total: 3, matched: 2, removed: 1, unidentified: 1, duplicates: 0, passedThrough: 0 },
    unmatchedIdentifiers: [],
    warnings: [],
    fromCache: false,
    playlistPath: '/srv/playlist-filtered.m3u',
    channelsPath: '/srv/epg-workspace/epg/channels.xml',
    guide: { status: 'generated', path: '/srv/guide.xml' },
    durationSeconds: '1.50',
    ...overrides,
  };
}

describe('formatSummary', () => {
  it('should report counts and output paths', () => {
    expect(formatSummary(summary())).toEqual([
      'Matched 2/3 channels with EPG sources',
      'Removed 1 channels (1 without tvg-id, 0 duplicates)',
      'Filtered playlist: /srv/playlist-filtered.m3u',
      'EPG guide generated: /srv/guide.xml',
      'Duration: 1.50 seconds',
    ]);
  });

  it('should list unmatched identifiers and warnings', () => {
    const lines = formatSummary(
      summary({
        unmatchedIdentifiers: ['B.us', 'D.us'],
        warnings: [
          { kind: 'parse', message: 'Skipped "Delta": no stream URL before end of playlist', location: 'line 9' },
          { kind: 'guide', message: 'Guide lists 2 channels but no programmes' },
        ],
      })
    );

    expect(lines).toContain('No EPG source: B.us, D.us');
    expect(lines).toContain('Warnings (2):');
    expect(lines).toContain('  - parse: Skipped "Delta": no stream URL before end of playlist [line 9]');
    expect(lines).toContain('  - guide: Guide lists 2 channels but no programmes');
  });

  it('should mention cached results and pass-through entries', () => {
    const lines = formatSummary(
      summary({
        fromCache: true,
        counts: { total: 3, matched: 2, removed: 0, unidentified: 1, duplicates: 0, passedThrough: 1 },
      })
    );

    expect(lines[0]).toBe('Matched 2/3 channels with EPG sources (cached)');
    expect(lines).toContain('Kept 1 channels without tvg-id');
  });

  it('should describe skipped and failed guide generation', () => {
    expect(formatSummary(summary({ guide: { status: 'skipped', path: '/srv/guide.xml' } }))).toContain(
      'EPG guide: /srv/guide.xml (recent, not regenerated; use --refresh-epg)'
    );
    expect(
      formatSummary(summary({ guide: { status: 'failed', path: '/srv/guide.xml', error: 'npm run grab: exited with code 1' } }))
    ).toContain('EPG generation failed: npm run grab: exited with code 1');
  });
});

describe('exit codes', () => {
  it('should succeed unless the guide failed', () => {
    expect(exitCodeForSummary(summary())).toBe(EXIT_OK);
    expect(exitCodeForSummary(summary({ guide: { status: 'skipped', path: '/srv/guide.xml' } }))).toBe(EXIT_OK);
    expect(exitCodeForSummary(summary({ guide: { status: 'failed', path: '/srv/guide.xml' } }))).toBe(EXIT_FAILURE);
  });

  it('should single out runs where nothing matched', () => {
    const counts = { total: 1, matched: 0, removed: 1, unidentified: 0, duplicates: 0, passedThrough: 0 };

    expect(exitCodeForError(new NoMatchError(counts, ['A']))).toBe(EXIT_NO_MATCH);
    expect(exitCodeForError(new FetchError('http://x', 'HTTP 500', 500))).toBe(EXIT_FAILURE);
    expect(exitCodeForError(new ExternalToolError('git pull', 'exited with code 1', 1))).toBe(EXIT_FAILURE);
  });
});
