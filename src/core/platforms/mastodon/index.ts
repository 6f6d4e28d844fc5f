// src/core/platforms/mastodon/index.ts
import { AuthError, DeleteError, ErrorCode, ListError, ScrubError, errorMessage } from '../../errors.js';
import type { DateRange, Post } from '../../types/index.js';
import type { MastodonCredentials } from '../../config/types.js';
import { MASTODON_PAGE_SIZE } from '../../config/constants.js';
import { BaseAdapter } from '../base.js';
import type { AdapterOptions, PlatformSession } from '../types.js';
import { MastodonClient, httpStatus, type MastodonApi } from './client.js';
import { parseStatus } from './parser.js';

export interface MastodonSession extends PlatformSession {
  platform: 'mastodon';
  accountId: string;
  api: MastodonApi;
}

export type MastodonApiFactory = (credentials: MastodonCredentials) => MastodonApi;

const defaultApiFactory: MastodonApiFactory = credentials => new MastodonClient(credentials);

export class MastodonAdapter extends BaseAdapter<MastodonSession> {
  readonly platform = 'mastodon' as const;

  constructor(
    private readonly credentials: MastodonCredentials,
    options: AdapterOptions,
    private readonly createApi: MastodonApiFactory = defaultApiFactory
  ) {
    super(options);
  }

  isConfigured(): boolean {
    return Boolean(this.credentials.apiBaseUrl && this.credentials.accessToken);
  }

  async authenticate(): Promise<MastodonSession> {
    if (!this.isConfigured()) {
      throw new AuthError(
        'mastodon',
        'Mastodon configuration missing',
        ErrorCode.NOT_CONFIGURED,
        'Set MASTODON_API_BASE_URL and MASTODON_ACCESS_TOKEN'
      );
    }

    const api = this.createApi(this.credentials);

    try {
      const account = await this.withRetry('verify credentials', () => api.verifyCredentials());
      this.logger.debug(`Verified credentials for @${account.acct} (${account.id})`);
      return { platform: 'mastodon', handle: account.acct, accountId: account.id, api };
    } catch (error) {
      const status = httpStatus(error);
      throw new AuthError(
        'mastodon',
        `Failed to authenticate with Mastodon: ${errorMessage(error)}`,
        ErrorCode.AUTH_FAILED,
        status === 401 || status === 403
          ? 'Check MASTODON_ACCESS_TOKEN; it needs the read:statuses and write:statuses scopes'
          : undefined
      );
    }
  }

  async *listPosts(session: MastodonSession, range: DateRange): AsyncGenerator<Post> {
    let maxId: string | undefined;

    for (let page = 1; page <= this.maxPages; page++) {
      const statuses = await this.fetchPage(session, maxId);
      this.logger.debug(`Page ${page}: ${statuses.length} statuses`);

      if (statuses.length === 0) {
        return;
      }

      for (const status of statuses) {
        // Boosts are excluded server-side; guard against instances that ignore the flag
        if (status.reblog) {
          continue;
        }

        const post = parseStatus(status);
        if (!post) {
          this.logger.warn(`Skipping status ${status.id}: invalid created_at "${status.created_at}"`);
          continue;
        }

        if (this.isBeforeRange(post.createdAt, range)) {
          return;
        }

        if (this.isInRange(post.createdAt, range)) {
          yield post;
        }
      }

      maxId = statuses[statuses.length - 1].id;
    }

    this.logger.warn(`Stopped listing after ${this.maxPages} pages`);
  }

  async deletePost(session: MastodonSession, postId: string): Promise<void> {
    try {
      await this.withRetry('delete', () => session.api.deleteStatus(postId));
    } catch (error) {
      if (httpStatus(error) === 404) {
        this.logger.debug(`Status ${postId} already deleted`);
        return;
      }
      if (error instanceof ScrubError) {
        throw error;
      }
      throw new DeleteError(postId, `Failed to delete status ${postId}: ${errorMessage(error)}`, error);
    }
  }

  private async fetchPage(session: MastodonSession, maxId: string | undefined) {
    try {
      return await this.withRetry('listing', () =>
        session.api.listStatuses(session.accountId, { limit: MASTODON_PAGE_SIZE, maxId })
      );
    } catch (error) {
      if (error instanceof ScrubError) {
        throw error;
      }
      throw new ListError('mastodon', `Failed to list Mastodon statuses: ${errorMessage(error)}`, error);
    }
  }
}
