// src/core/platforms/base.ts
import { silentLogger, type Logger } from '../logger.js';
import { withRetry, type RetryPolicy, type RetryHooks } from '../retry/policy.js';
import type { DateRange, Platform, Post } from '../types/index.js';
import type { AdapterOptions, PlatformAdapter, PlatformSession } from './types.js';
import { DEFAULT_MAX_PAGES } from '../config/constants.js';

export abstract class BaseAdapter<TSession extends PlatformSession>
  implements PlatformAdapter<TSession>
{
  abstract readonly platform: Platform;

  protected readonly retryPolicy: RetryPolicy;
  protected readonly logger: Logger;
  protected readonly maxPages: number;
  private readonly sleep?: RetryHooks['sleep'];
  private readonly signal?: AbortSignal;

  constructor(options: AdapterOptions) {
    this.retryPolicy = options.retryPolicy;
    this.logger = options.logger ?? silentLogger;
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    this.sleep = options.sleep;
    this.signal = options.signal;
  }

  get displayName(): string {
    return this.platform.charAt(0).toUpperCase() + this.platform.slice(1);
  }

  abstract isConfigured(): boolean;
  abstract authenticate(): Promise<TSession>;
  abstract listPosts(session: TSession, range: DateRange): AsyncIterable<Post>;
  abstract deletePost(session: TSession, postId: string): Promise<void>;

  protected withRetry<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return withRetry(operation, this.retryPolicy, {
      sleep: this.sleep,
      signal: this.signal,
      onRetry: (attempt, delayMs) => {
        this.logger.warn(
          `Rate limited during ${label}, retrying in ${Math.ceil(delayMs / 1000)}s (attempt ${attempt + 1}/${this.retryPolicy.maxAttempts})`
        );
      },
    });
  }

  protected isBeforeRange(createdAt: Date, range: DateRange): boolean {
    return createdAt.getTime() < range.start.getTime();
  }

  protected isInRange(createdAt: Date, range: DateRange): boolean {
    const time = createdAt.getTime();
    return time >= range.start.getTime() && time <= range.end.getTime();
  }
}
