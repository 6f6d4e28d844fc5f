// src/core/platforms/types.ts
import type { Logger } from '../logger.js';
import type { RetryHooks, RetryPolicy } from '../retry/policy.js';
import type { DateRange, Platform, Post } from '../types/index.js';

export interface PlatformSession {
  platform: Platform;
  handle: string;
}

export interface PlatformAdapter<TSession extends PlatformSession = PlatformSession> {
  readonly platform: Platform;
  readonly displayName: string;

  isConfigured(): boolean;
  authenticate(): Promise<TSession>;
  listPosts(session: TSession, range: DateRange): AsyncIterable<Post>;
  deletePost(session: TSession, postId: string): Promise<void>;
}

export interface AdapterOptions {
  retryPolicy: RetryPolicy;
  logger?: Logger;
  maxPages?: number;
  sleep?: RetryHooks['sleep'];
  /** Stops retry waits early once aborted */
  signal?: AbortSignal;
}
