// src/core/report/text.ts
import chalk from 'chalk';
import { formatDateTime } from '../config/dates.js';
import type { Post } from '../types/index.js';
import type { PlatformReport, ScrubReport } from './types.js';

const PREVIEW_LENGTH = 50;
const ID_LENGTH = 12;

export function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function previewText(text: string, length: number = PREVIEW_LENGTH): string {
  const flat = text.replace(/[\r\n]+/g, ' ');
  return flat.length > length ? `${flat.slice(0, length)}...` : flat;
}

export function shortId(id: string): string {
  return id.length > ID_LENGTH ? id.slice(-ID_LENGTH) : id;
}

function pad(value: string, width: number): string {
  return value.length >= width ? value : value + ' '.repeat(width - value.length);
}

/** A fixed-width table of posts, one line per post. */
export function formatPostsTable(posts: readonly Post[], title: string): string {
  if (posts.length === 0) {
    return chalk.yellow(`No posts found for ${title.toLowerCase()}`);
  }

  const header = `${pad('Date', 16)}  ${pad('Post ID', ID_LENGTH)}  Content`;
  const rows = posts.map(post =>
    `${chalk.magenta(pad(formatDateTime(post.createdAt), 16))}  ${chalk.dim(pad(shortId(post.id), ID_LENGTH))}  ${previewText(post.text)}`
  );

  return [chalk.bold(`${title} (${posts.length} posts)`), header, ...rows].join('\n');
}

export function formatPlatformSummary(report: PlatformReport): string {
  const name = titleCase(report.platform);
  const lines: string[] = [];

  if (report.failure) {
    lines.push(chalk.red(`✗ ${name}: ${report.failure.message} (during ${report.failure.stage})`));
    if (report.failure.suggestion) {
      lines.push(`  ${report.failure.suggestion}`);
    }
    return lines.join('\n');
  }

  const { stats } = report;
  const account = report.handle ? ` @${report.handle}` : '';

  if (report.dryRun) {
    lines.push(`${chalk.cyan('◌')} ${name}${account}: would delete ${stats.previewed} of ${stats.listed} listed posts`);
  } else {
    lines.push(
      `${chalk.green('✓')} ${name}${account}: ${stats.deleted} deleted, ${stats.failed} failed, ${stats.cancelled} cancelled, ${stats.archived} archived`
    );
  }

  for (const result of report.results) {
    if (result.outcome === 'failed') {
      lines.push(chalk.red(`  - ${shortId(result.postId)}: ${result.error ?? 'Unknown error'}`));
    } else if (result.outcome === 'skipped-cancelled') {
      lines.push(chalk.yellow(`  ~ ${shortId(result.postId)}: ${result.error ?? 'Cancelled'}`));
    }
  }

  return lines.join('\n');
}

export function formatRunSummary(report: ScrubReport): string {
  const totals = report.platforms.reduce(
    (acc, platform) => ({
      deleted: acc.deleted + platform.stats.deleted,
      previewed: acc.previewed + platform.stats.previewed,
      failed: acc.failed + platform.stats.failed,
    }),
    { deleted: 0, previewed: 0, failed: 0 }
  );
  const failedPlatforms = report.platforms.filter(platform => platform.status === 'failed').length;

  const parts = report.dryRun
    ? [`${totals.previewed} would be deleted`]
    : [`${totals.deleted} deleted`, `${totals.failed} failed`];
  parts.push(`${failedPlatforms} platform${failedPlatforms === 1 ? '' : 's'} failed`);

  const lines = [
    '━'.repeat(50),
    `Summary${report.dryRun ? ' [DRY RUN]' : ''}: ${parts.join(', ')}, ${(report.duration / 1000).toFixed(1)}s`,
  ];

  if (report.cancelled) {
    lines.push(chalk.yellow('Run was interrupted; remaining posts were not deleted.'));
  }

  return lines.join('\n');
}
