// src/core/report/json.ts
import type { DeletionResult, Platform } from '../types/index.js';
import type { PlatformFailure, PlatformReport, PlatformStats, ScrubReport } from './types.js';

export interface PlatformReportInput {
  platform: Platform;
  dryRun: boolean;
  handle?: string;
  listed: number;
  candidates: number;
  results: DeletionResult[];
  failure?: PlatformFailure;
}

export function computeStats(listed: number, candidates: number, results: DeletionResult[]): PlatformStats {
  const count = (outcome: DeletionResult['outcome']) =>
    results.filter(result => result.outcome === outcome).length;

  return {
    listed,
    candidates,
    deleted: count('deleted'),
    previewed: count('skipped-dry-run'),
    cancelled: count('skipped-cancelled'),
    failed: count('failed'),
    archived: results.filter(result => result.archivePath !== undefined).length,
  };
}

export function buildPlatformReport(input: PlatformReportInput): PlatformReport {
  const report: PlatformReport = {
    platform: input.platform,
    status: input.failure ? 'failed' : 'done',
    dryRun: input.dryRun,
    stats: computeStats(input.listed, input.candidates, input.results),
    results: input.results,
  };

  if (input.handle) {
    report.handle = input.handle;
  }
  if (input.failure) {
    report.failure = input.failure;
  }

  return report;
}

export function buildScrubReport(
  platforms: PlatformReport[],
  options: { dryRun: boolean; startDate: Date; endDate: Date; cancelled: boolean; duration: number }
): ScrubReport {
  const failed = platforms.some(
    platform => platform.status === 'failed' || platform.stats.failed > 0
  );

  return {
    status: failed ? 'failed' : 'success',
    dryRun: options.dryRun,
    startDate: options.startDate.toISOString(),
    endDate: options.endDate.toISOString(),
    cancelled: options.cancelled,
    platforms,
    duration: options.duration,
  };
}

export function formatJsonOutput(report: ScrubReport): string {
  return JSON.stringify(report, null, 2);
}
