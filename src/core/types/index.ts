// src/core/types/index.ts
export const PLATFORMS = ['bluesky', 'mastodon', 'twitter'] as const;

export type Platform = (typeof PLATFORMS)[number];

export function isPlatform(value: string): value is Platform {
  return PLATFORMS.some(platform => platform === value);
}

export interface Post {
  readonly id: string;
  readonly platform: Platform;
  readonly createdAt: Date;
  readonly text: string;
  readonly url?: string;
  readonly attachments: readonly string[];
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface DateRange {
  start: Date;
  end: Date;
}

export type DeletionOutcome = 'deleted' | 'skipped-dry-run' | 'skipped-cancelled' | 'failed';

export interface DeletionResult {
  postId: string;
  platform: Platform;
  outcome: DeletionOutcome;
  error?: string;
  errorCode?: string;
  archivePath?: string;
}

export interface ArchiveRecord {
  id: string;
  platform: Platform;
  createdAt: string;      // ISO 8601
  text: string;
  url: string | null;
  attachments: string[];
  metadata: Record<string, unknown> | null;
  archivedAt: string;     // ISO 8601
}

export type MatchMode = 'any' | 'all';

export type CandidateOrder = 'newest-first' | 'oldest-first';

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
