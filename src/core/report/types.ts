// src/core/report/types.ts
import type { DeletionResult, Platform } from '../types/index.js';

export type PlatformStage =
  | 'idle'
  | 'authenticating'
  | 'listing'
  | 'filtering'
  | 'archiving'
  | 'deleting'
  | 'previewing'
  | 'reporting'
  | 'done'
  | 'failed';

export interface PlatformFailure {
  stage: PlatformStage;
  code: string;
  message: string;
  suggestion?: string;
}

export interface PlatformStats {
  listed: number;
  candidates: number;
  deleted: number;
  previewed: number;
  cancelled: number;
  failed: number;
  archived: number;
}

export interface PlatformReport {
  platform: Platform;
  status: 'done' | 'failed';
  handle?: string;
  dryRun: boolean;
  stats: PlatformStats;
  results: DeletionResult[];
  failure?: PlatformFailure;
}

export interface ScrubReport {
  status: 'success' | 'failed';
  dryRun: boolean;
  startDate: string;
  endDate: string;
  cancelled: boolean;
  platforms: PlatformReport[];
  duration: number;
}
