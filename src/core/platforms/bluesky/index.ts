// src/core/platforms/bluesky/index.ts
import { AtpAgent } from '@atproto/api';
import { AuthError, DeleteError, ErrorCode, ListError, ScrubError, errorMessage } from '../../errors.js';
import type { DateRange, Post } from '../../types/index.js';
import type { BlueskyCredentials } from '../../config/types.js';
import { BLUESKY_PAGE_SIZE } from '../../config/constants.js';
import { BaseAdapter } from '../base.js';
import type { AdapterOptions } from '../types.js';
import { isRecordNotFound, toRateLimitError } from './errors.js';
import { isPinned, isRepost, parseFeedItem } from './parser.js';
import type { BlueskyAgent, BlueskySession } from './types.js';

export type BlueskyAgentFactory = (service: string) => BlueskyAgent;

const defaultAgentFactory: BlueskyAgentFactory = service => new AtpAgent({ service });

export class BlueskyAdapter extends BaseAdapter<BlueskySession> {
  readonly platform = 'bluesky' as const;

  constructor(
    private readonly credentials: BlueskyCredentials,
    options: AdapterOptions,
    private readonly createAgent: BlueskyAgentFactory = defaultAgentFactory
  ) {
    super(options);
  }

  isConfigured(): boolean {
    return Boolean(this.credentials.handle && this.credentials.password);
  }

  async authenticate(): Promise<BlueskySession> {
    if (!this.isConfigured()) {
      throw new AuthError(
        'bluesky',
        'Bluesky configuration missing',
        ErrorCode.NOT_CONFIGURED,
        'Set BLUESKY_HANDLE and BLUESKY_PASSWORD'
      );
    }

    const agent = this.createAgent(this.credentials.service);

    try {
      const { data } = await this.withRetry('login', () =>
        this.call(() =>
          agent.login({ identifier: this.credentials.handle, password: this.credentials.password })
        )
      );
      this.logger.debug(`Logged in as @${data.handle} (${data.did})`);
      return { platform: 'bluesky', handle: data.handle, did: data.did, agent };
    } catch (error) {
      throw new AuthError(
        'bluesky',
        `Failed to authenticate with Bluesky: ${errorMessage(error)}`,
        ErrorCode.AUTH_FAILED,
        'Use an app password from Settings → Privacy and security → App passwords'
      );
    }
  }

  async *listPosts(session: BlueskySession, range: DateRange): AsyncGenerator<Post> {
    const seen = new Set<string>();
    let cursor: string | undefined;

    for (let page = 1; page <= this.maxPages; page++) {
      const { data } = await this.fetchPage(session, cursor);
      this.logger.debug(`Page ${page}: ${data.feed.length} feed items`);

      for (const item of data.feed) {
        // Reposts show up in the author feed but belong to someone else or
        // duplicate one of our own posts
        if (isRepost(item) || item.post.author.did !== session.did) {
          continue;
        }

        const post = parseFeedItem(item, session.handle);
        if (!post) {
          this.logger.warn(`Skipping ${item.post.uri}: record has no valid createdAt`);
          continue;
        }

        if (this.isBeforeRange(post.createdAt, range)) {
          // A pinned post sits at the top of the feed whatever its age
          if (isPinned(item)) {
            continue;
          }
          return;
        }

        if (this.isInRange(post.createdAt, range) && !seen.has(post.id)) {
          seen.add(post.id);
          yield post;
        }
      }

      cursor = data.cursor;
      if (!cursor || data.feed.length === 0) {
        return;
      }
    }

    this.logger.warn(`Stopped listing after ${this.maxPages} pages`);
  }

  async deletePost(session: BlueskySession, postId: string): Promise<void> {
    if (!postId.startsWith('at://')) {
      throw new DeleteError(postId, `Invalid Bluesky post URI: ${postId}`);
    }

    try {
      await this.withRetry('delete', () => this.call(() => session.agent.deletePost(postId)));
    } catch (error) {
      if (isRecordNotFound(error)) {
        this.logger.debug(`${postId} already deleted`);
        return;
      }
      if (error instanceof ScrubError) {
        throw error;
      }
      throw new DeleteError(postId, `Failed to delete ${postId}: ${errorMessage(error)}`, error);
    }
  }

  private async fetchPage(session: BlueskySession, cursor: string | undefined) {
    try {
      return await this.withRetry('listing', () =>
        this.call(() =>
          session.agent.getAuthorFeed({ actor: session.did, limit: BLUESKY_PAGE_SIZE, cursor })
        )
      );
    } catch (error) {
      if (error instanceof ScrubError) {
        throw error;
      }
      throw new ListError('bluesky', `Failed to list Bluesky posts: ${errorMessage(error)}`, error);
    }
  }

  private async call<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw toRateLimitError(error);
    }
  }
}
