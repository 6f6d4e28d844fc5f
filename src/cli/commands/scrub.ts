// src/cli/commands/scrub.ts
import { Command } from 'commander';
import { Archiver } from '../../core/archive/archiver.js';
import { ScrubOrchestrator } from '../../core/orchestrator.js';
import { formatJsonOutput } from '../../core/report/json.js';
import {
  formatPlatformSummary,
  formatPostsTable,
  formatRunSummary,
  titleCase,
} from '../../core/report/text.js';
import type { ConfigOverrides } from '../../core/config/types.js';
import { addCommonOptions, defaultDeps, resolveConfig, type CliDeps, type CommonOptions } from '../context.js';

export interface ScrubCommandOptions extends CommonOptions {
  dryRun?: boolean;
  maxPosts?: string;
  startDate?: string;
  endDate?: string;
  keyword?: string[];
  postId?: string[];
  match?: string;
  order?: string;
  archive?: boolean;
  archivePath?: string;
  yes?: boolean;
}

export function toOverrides(options: ScrubCommandOptions): ConfigOverrides {
  return {
    dryRun: options.dryRun,
    maxPosts: options.maxPosts,
    startDate: options.startDate,
    endDate: options.endDate,
    keywords: options.keyword,
    postIds: options.postId,
    matchMode: options.match,
    order: options.order,
    archive: options.archive,
    archivePath: options.archivePath,
  };
}

export async function runScrub(options: ScrubCommandOptions, deps: CliDeps = defaultDeps): Promise<number> {
  const resolved = resolveConfig(options, toOverrides(options), deps);
  if (!resolved.ok) {
    return resolved.exitCode;
  }

  const { config, logger } = resolved;

  if (config.enabledPlatforms.length === 0) {
    console.error('Error: No platforms are configured. Please check your .env file.');
    return 1;
  }

  const controller = new AbortController();
  const onInterrupt = () => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    logger.warn('Interrupted: finishing the current post, no further deletions (Ctrl+C again to quit now)');
    controller.abort();
  };
  process.on('SIGINT', onInterrupt);

  const orchestrator = new ScrubOrchestrator(config, {
    adapters: deps.createAdapters(config, logger, config.enabledPlatforms, controller.signal),
    archiver: new Archiver(config.archivePath),
    logger,
    signal: controller.signal,
    confirm: options.yes
      ? undefined
      : (platform, candidates) =>
          deps.confirm(`Delete ${candidates.length} posts from ${titleCase(platform)}?`, {
            defaultValue: false,
            toStderr: options.json,
            onInterrupt,
          }),
    onCandidates: (platform, candidates) => {
      if (!options.json && candidates.length > 0) {
        console.log(formatPostsTable(candidates, `${titleCase(platform)} Posts`));
      }
    },
  });

  try {
    const report = await orchestrator.run();

    if (options.json) {
      console.log(formatJsonOutput(report));
    } else {
      console.log('');
      for (const platform of report.platforms) {
        console.log(formatPlatformSummary(platform));
      }
      console.log(formatRunSummary(report));
    }

    return report.status === 'success' ? 0 : 1;
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

export function registerScrubCommand(program: Command, deps: CliDeps = defaultDeps): void {
  const command = program
    .command('scrub', { isDefault: true })
    .description('Find posts in the date range and delete them (dry run by default)');

  addCommonOptions(command)
    .option('--dry-run', 'Preview only; never delete (overrides DRY_RUN)')
    .option('--no-dry-run', 'Really delete the selected posts')
    .option('--max-posts <n>', 'Maximum posts to delete per platform (overrides MAX_POSTS_PER_SCRUB)')
    .option('--start-date <date>', 'Start date: YYYY-MM-DD, ISO date-time, "today" or "N_days_ago"')
    .option('--end-date <date>', 'End date: YYYY-MM-DD, ISO date-time or "today"')
    .option('--keyword <words...>', 'Only posts containing one of these words')
    .option('--post-id <ids...>', 'Only these post IDs (Bluesky: AT URI or record key)')
    .option('--match <mode>', 'How --keyword and --post-id combine (any|all)')
    .option('--order <order>', 'Which posts the cap keeps (newest-first|oldest-first)')
    .option('--archive', 'Archive each post to JSON before deleting it')
    .option('--no-archive', 'Delete without archiving')
    .option('--archive-path <dir>', 'Archive directory (overrides ARCHIVE_PATH)')
    .option('-y, --yes', 'Do not ask for confirmation before deleting', false)
    .action(async (options: ScrubCommandOptions) => {
      process.exitCode = await runScrub(options, deps);
    });
}
