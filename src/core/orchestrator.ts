// src/core/orchestrator.ts
import { ErrorCode, ScrubError, createFailedResult, errorMessage } from './errors.js';
import { filterPosts, type FilterCriteria } from './filter/engine.js';
import { silentLogger, type Logger } from './logger.js';
import { formatDateRange } from './config/dates.js';
import { buildPlatformReport, buildScrubReport } from './report/json.js';
import type { PlatformAdapter, PlatformSession } from './platforms/types.js';
import type { PlatformFailure, PlatformReport, PlatformStage, ScrubReport } from './report/types.js';
import type { ScrubConfig } from './config/types.js';
import type { DeletionResult, Platform, Post } from './types/index.js';

// Codes for unexpected errors, by the stage they escaped from
const STAGE_ERROR_CODES: Partial<Record<PlatformStage, ErrorCode>> = {
  authenticating: ErrorCode.AUTH_FAILED,
  listing: ErrorCode.LIST_FAILED,
};

export interface PostArchiver {
  archive(post: Post): Promise<string>;
}

export interface OrchestratorOptions {
  adapters: PlatformAdapter[];
  archiver: PostArchiver;
  logger?: Logger;
  signal?: AbortSignal;
  /** Asked once per platform before the first delete call; false skips deletion. */
  confirm?: (platform: Platform, candidates: readonly Post[]) => Promise<boolean>;
  onCandidates?: (platform: Platform, candidates: readonly Post[]) => void;
  onStageChange?: (platform: Platform, stage: PlatformStage) => void;
  clock?: () => number;
}

class PlatformRun {
  stage: PlatformStage = 'idle';

  constructor(
    readonly platform: Platform,
    private readonly onStageChange?: OrchestratorOptions['onStageChange']
  ) {}

  enter(stage: PlatformStage): void {
    if (this.stage !== stage) {
      this.stage = stage;
      this.onStageChange?.(this.platform, stage);
    }
  }
}

export class ScrubOrchestrator {
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(
    private readonly config: ScrubConfig,
    private readonly options: OrchestratorOptions
  ) {
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? Date.now;
  }

  async run(): Promise<ScrubReport> {
    const startTime = this.clock();
    const reports: PlatformReport[] = [];

    this.logger.info(`Date range: ${formatDateRange(this.config.startDate, this.config.endDate)}`);
    this.logger.info(`Max posts per platform: ${this.config.maxPostsPerPlatform}`);
    this.logger.info(`Dry run mode: ${this.config.dryRun ? 'ON' : 'OFF'}`);

    for (const adapter of this.options.adapters) {
      if (this.options.signal?.aborted) {
        reports.push(this.notStarted(adapter.platform));
        continue;
      }
      reports.push(await this.runPlatform(adapter));
    }

    return buildScrubReport(reports, {
      dryRun: this.config.dryRun,
      startDate: this.config.startDate,
      endDate: this.config.endDate,
      cancelled: this.options.signal?.aborted ?? false,
      duration: this.clock() - startTime,
    });
  }

  async runPlatform(adapter: PlatformAdapter): Promise<PlatformReport> {
    const run = new PlatformRun(adapter.platform, this.options.onStageChange);
    const name = adapter.displayName;
    let session: PlatformSession;
    let listed: Post[];
    let candidates: Post[];

    try {
      run.enter('authenticating');
      this.logger.info(`Authenticating with ${name}...`);
      session = await adapter.authenticate();
      this.logger.info(`✓ Authenticated with ${name} as @${session.handle}`);

      run.enter('listing');
      this.logger.info(`Fetching posts from ${name}...`);
      listed = [];
      for await (const post of adapter.listPosts(session, {
        start: this.config.startDate,
        end: this.config.endDate,
      })) {
        listed.push(post);
      }

      run.enter('filtering');
      candidates = filterPosts(listed, this.criteria());
      this.logger.info(`Found ${listed.length} posts in range, ${candidates.length} selected for deletion`);
      this.options.onCandidates?.(adapter.platform, candidates);
    } catch (error) {
      return this.failed(run, error);
    }

    let results: DeletionResult[];

    if (candidates.length === 0) {
      results = [];
    } else if (this.config.dryRun) {
      run.enter('previewing');
      this.logger.info(`[DRY RUN] Would delete ${candidates.length} posts from ${name}`);
      results = candidates.map((post): DeletionResult => ({
        postId: post.id,
        platform: adapter.platform,
        outcome: 'skipped-dry-run',
      }));
    } else if (this.options.confirm && !(await this.options.confirm(adapter.platform, candidates))) {
      // An interrupt at the prompt also answers it
      const reason = this.options.signal?.aborted ? 'Run interrupted' : 'Deletion declined';
      this.logger.warn(`Deletion from ${name} skipped: ${reason.toLowerCase()}`);
      results = candidates.map(post => this.cancelled(adapter.platform, post, reason));
    } else {
      results = await this.deleteCandidates(run, adapter, session, candidates);
    }

    run.enter('reporting');
    const report = buildPlatformReport({
      platform: adapter.platform,
      dryRun: this.config.dryRun,
      handle: session.handle,
      listed: listed.length,
      candidates: candidates.length,
      results,
    });
    run.enter('done');

    return report;
  }

  private async deleteCandidates(
    run: PlatformRun,
    adapter: PlatformAdapter,
    session: PlatformSession,
    candidates: Post[]
  ): Promise<DeletionResult[]> {
    const results: DeletionResult[] = [];
    this.logger.info(`Deleting ${candidates.length} posts from ${adapter.displayName}...`);

    for (const post of candidates) {
      if (this.options.signal?.aborted) {
        results.push(this.cancelled(adapter.platform, post, 'Run interrupted'));
        continue;
      }

      let archivePath: string | undefined;
      if (this.config.archiveBeforeDelete) {
        run.enter('archiving');
        try {
          archivePath = await this.options.archiver.archive(post);
          this.logger.debug(`Archived ${post.id} to ${archivePath}`);
        } catch (error) {
          this.logger.error(`✗ ${post.id}: ${errorMessage(error)}; not deleted`);
          results.push(createFailedResult(adapter.platform, post.id, error));
          continue;
        }

        // The archive write finishes even when interrupted; the delete does not start
        if (this.options.signal?.aborted) {
          results.push(this.cancelled(adapter.platform, post, 'Run interrupted', archivePath));
          continue;
        }
      }

      run.enter('deleting');
      try {
        await adapter.deletePost(session, post.id);
        this.logger.debug(`✓ Deleted ${post.id}`);
        results.push({ postId: post.id, platform: adapter.platform, outcome: 'deleted', archivePath });
      } catch (error) {
        this.logger.error(`✗ ${post.id}: ${errorMessage(error)}`);
        results.push(createFailedResult(adapter.platform, post.id, error, archivePath));
      }
    }

    return results;
  }

  private criteria(): FilterCriteria {
    return {
      start: this.config.startDate,
      end: this.config.endDate,
      keywords: this.config.keywords,
      postIds: this.config.postIds,
      matchMode: this.config.matchMode,
      order: this.config.order,
      maxPosts: this.config.maxPostsPerPlatform,
    };
  }

  private cancelled(platform: Platform, post: Post, reason: string, archivePath?: string): DeletionResult {
    const result: DeletionResult = {
      postId: post.id,
      platform,
      outcome: 'skipped-cancelled',
      error: reason,
      errorCode: ErrorCode.CANCELLED,
    };
    if (archivePath) {
      result.archivePath = archivePath;
    }
    return result;
  }

  private failed(run: PlatformRun, error: unknown): PlatformReport {
    const failure: PlatformFailure =
      error instanceof ScrubError
        ? { stage: run.stage, code: error.code, message: error.message, suggestion: error.suggestion }
        : { stage: run.stage, code: STAGE_ERROR_CODES[run.stage] ?? ErrorCode.LIST_FAILED, message: errorMessage(error) };
    this.logger.error(`✗ ${failure.message}`);
    run.enter('failed');

    return buildPlatformReport({
      platform: run.platform,
      dryRun: this.config.dryRun,
      listed: 0,
      candidates: 0,
      results: [],
      failure,
    });
  }

  private notStarted(platform: Platform): PlatformReport {
    return buildPlatformReport({
      platform,
      dryRun: this.config.dryRun,
      listed: 0,
      candidates: 0,
      results: [],
      failure: { stage: 'idle', code: ErrorCode.CANCELLED, message: 'Run interrupted before this platform started' },
    });
  }
}
