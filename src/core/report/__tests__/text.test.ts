// src/core/report/__tests__/text.test.ts
import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import chalk from 'chalk';
import {
  formatPlatformSummary,
  formatPostsTable,
  formatRunSummary,
  previewText,
  shortId,
  titleCase,
} from '../text.js';
import { buildPlatformReport, buildScrubReport } from '../json.js';
import { makePost } from '../../__tests__/helpers.js';

const range = {
  startDate: new Date('2024-01-01T00:00:00.000Z'),
  endDate: new Date('2024-01-31T23:59:59.999Z'),
};

describe('text report', () => {
  const originalLevel = chalk.level;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = originalLevel;
  });

  describe('helpers', () => {
    it('title-cases platform names', () => {
      expect(titleCase('bluesky')).toBe('Bluesky');
    });

    it('truncates previews and flattens newlines', () => {
      expect(previewText('short\ntext')).toBe('short text');
      expect(previewText('x'.repeat(60))).toBe(`${'x'.repeat(50)}...`);
    });

    it('keeps the tail of long ids', () => {
      expect(shortId('at://did:plc:abc/app.bsky.feed.post/3kabcdefghij')).toBe('3kabcdefghij');
      expect(shortId('12345')).toBe('12345');
    });
  });

  describe('formatPostsTable', () => {
    it('prints one row per post', () => {
      const table = formatPostsTable(
        [makePost('109876543210123', '2024-01-15T10:30:00.000Z', 'hello\nworld')],
        'Mastodon posts'
      );

      expect(table.split('\n')).toEqual([
        'Mastodon posts (1 posts)',
        'Date              Post ID       Content',
        '2024-01-15 10:30  876543210123  hello world',
      ]);
    });

    it('says so when nothing matched', () => {
      expect(formatPostsTable([], 'Bluesky posts')).toBe('No posts found for bluesky posts');
    });
  });

  describe('formatPlatformSummary', () => {
    it('summarises a live run with failed posts', () => {
      const report = buildPlatformReport({
        platform: 'mastodon',
        dryRun: false,
        handle: 'tester',
        listed: 5,
        candidates: 3,
        results: [
          { postId: '1', platform: 'mastodon', outcome: 'deleted', archivePath: '/a/1.json' },
          { postId: '2', platform: 'mastodon', outcome: 'deleted', archivePath: '/a/2.json' },
          { postId: '3', platform: 'mastodon', outcome: 'failed', error: 'Failed to delete status 3: boom' },
        ],
      });

      expect(formatPlatformSummary(report)).toBe(
        '✓ Mastodon @tester: 2 deleted, 1 failed, 0 cancelled, 2 archived\n  - 3: Failed to delete status 3: boom'
      );
    });

    it('lists cancelled posts with their reason', () => {
      const report = buildPlatformReport({
        platform: 'bluesky',
        dryRun: false,
        handle: 'bluesky-user',
        listed: 2,
        candidates: 2,
        results: [
          { postId: 'p1', platform: 'bluesky', outcome: 'deleted' },
          { postId: 'p2', platform: 'bluesky', outcome: 'skipped-cancelled', error: 'Run interrupted', errorCode: 'cancelled' },
        ],
      });

      expect(formatPlatformSummary(report).split('\n')).toEqual([
        '✓ Bluesky @bluesky-user: 1 deleted, 0 failed, 1 cancelled, 0 archived',
        '  ~ p2: Run interrupted',
      ]);
    });

    it('summarises a dry run', () => {
      const report = buildPlatformReport({
        platform: 'bluesky',
        dryRun: true,
        handle: 'tester.bsky.social',
        listed: 4,
        candidates: 2,
        results: [
          { postId: 'a', platform: 'bluesky', outcome: 'skipped-dry-run' },
          { postId: 'b', platform: 'bluesky', outcome: 'skipped-dry-run' },
        ],
      });

      expect(formatPlatformSummary(report)).toBe('◌ Bluesky @tester.bsky.social: would delete 2 of 4 listed posts');
    });

    it('reports a platform failure with its stage and suggestion', () => {
      const report = buildPlatformReport({
        platform: 'bluesky',
        dryRun: false,
        listed: 0,
        candidates: 0,
        results: [],
        failure: {
          stage: 'authenticating',
          code: 'auth_failed',
          message: 'Failed to authenticate with Bluesky: bad password',
          suggestion: 'Use an app password',
        },
      });

      expect(formatPlatformSummary(report)).toBe(
        '✗ Bluesky: Failed to authenticate with Bluesky: bad password (during authenticating)\n  Use an app password'
      );
    });
  });

  describe('formatRunSummary', () => {
    it('totals a live run', () => {
      const ok = buildPlatformReport({
        platform: 'mastodon',
        dryRun: false,
        listed: 2,
        candidates: 2,
        results: [
          { postId: '1', platform: 'mastodon', outcome: 'deleted' },
          { postId: '2', platform: 'mastodon', outcome: 'failed', error: 'boom' },
        ],
      });
      const broken = buildPlatformReport({
        platform: 'bluesky',
        dryRun: false,
        listed: 0,
        candidates: 0,
        results: [],
        failure: { stage: 'listing', code: 'list_failed', message: 'timeout' },
      });

      const summary = formatRunSummary(
        buildScrubReport([ok, broken], { ...range, dryRun: false, cancelled: true, duration: 2345 })
      );

      expect(summary.split('\n')).toEqual([
        '━'.repeat(50),
        'Summary: 1 deleted, 1 failed, 1 platform failed, 2.3s',
        'Run was interrupted; remaining posts were not deleted.',
      ]);
    });

    it('labels dry runs', () => {
      const summary = formatRunSummary(buildScrubReport([], { ...range, dryRun: true, cancelled: false, duration: 0 }));

      expect(summary.split('\n')[1]).toBe('Summary [DRY RUN]: 0 would be deleted, 0 platforms failed, 0.0s');
    });
  });
});
