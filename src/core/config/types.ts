// src/core/config/types.ts
import type { LogLevel } from '../logger.js';
import type { RetryPolicy } from '../retry/policy.js';
import type { CandidateOrder, MatchMode, Platform } from '../types/index.js';

export interface BlueskyCredentials {
  handle: string;
  password: string;   // app password
  service: string;
}

export interface MastodonCredentials {
  apiBaseUrl: string;
  accessToken: string;
}

export interface TwitterCredentials {
  apiKey: string;
  apiSecret: string;
  accessToken: string;
  accessTokenSecret: string;
  bearerToken: string;
}

export interface Credentials {
  bluesky: BlueskyCredentials;
  mastodon: MastodonCredentials;
  twitter: TwitterCredentials;
}

export interface ScrubConfig {
  startDate: Date;
  endDate: Date;
  maxPostsPerPlatform: number;
  dryRun: boolean;
  archiveBeforeDelete: boolean;
  archivePath: string;
  enabledPlatforms: Platform[];
  keywords: string[];
  postIds: string[];
  matchMode: MatchMode;
  order: CandidateOrder;
  retry: RetryPolicy;
  logLevel: LogLevel;
  credentials: Credentials;
}

/** Command-line values that take precedence over the environment. */
export interface ConfigOverrides {
  dryRun?: boolean;
  platforms?: string;
  maxPosts?: string;
  startDate?: string;
  endDate?: string;
  keywords?: string[];
  postIds?: string[];
  matchMode?: string;
  order?: string;
  archive?: boolean;
  archivePath?: string;
}
