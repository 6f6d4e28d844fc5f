// src/core/platforms/bluesky/__tests__/adapter.test.ts
import { describe, it, expect, beforeEach } from '@jest/globals';
import { BlueskyAdapter } from '../index.js';
import { AuthError, DeleteError, ErrorCode, ListError, RateLimitError } from '../../../errors.js';
import type { BlueskyAgent, BlueskyFeedItem, BlueskySession } from '../types.js';
import type { BlueskyCredentials } from '../../../config/types.js';
import type { DateRange, Post } from '../../../types/index.js';

const DID = 'did:plc:tester';

const credentials: BlueskyCredentials = {
  handle: 'tester.bsky.social',
  password: 'test-secret',
  service: 'https://bsky.social',
};

const range: DateRange = {
  start: new Date('2024-01-01T00:00:00.000Z'),
  end: new Date('2024-01-31T23:59:59.999Z'),
};

function feedItem(rkey: string, createdAt: string, options: { author?: string; reason?: string } = {}): BlueskyFeedItem {
  return {
    post: {
      uri: `at://${options.author ?? DID}/app.bsky.feed.post/${rkey}`,
      cid: `cid-${rkey}`,
      author: { did: options.author ?? DID, handle: 'tester.bsky.social' },
      record: { text: `post ${rkey}`, createdAt },
    },
    reason: options.reason ? { $type: options.reason } : undefined,
  };
}

class XrpcError extends Error {
  constructor(
    readonly status: number,
    readonly error: string,
    message: string,
    readonly headers: Record<string, string> = {}
  ) {
    super(message);
  }
}

class FakeAgent implements BlueskyAgent {
  pages: Array<{ cursor?: string; feed: BlueskyFeedItem[] }> = [];
  feedCalls: Array<string | undefined> = [];
  deleted: string[] = [];
  loginError?: Error;
  feedErrors: Error[] = [];
  deleteErrors: Error[] = [];

  async login(opts: { identifier: string; password: string }) {
    if (this.loginError) {
      throw this.loginError;
    }
    return { data: { did: DID, handle: opts.identifier } };
  }

  async getAuthorFeed(params: { actor: string; limit?: number; cursor?: string }) {
    this.feedCalls.push(params.cursor);
    const error = this.feedErrors.shift();
    if (error) {
      throw error;
    }
    const index = params.cursor ? Number(params.cursor) : 0;
    return { data: this.pages[index] ?? { feed: [] } };
  }

  async deletePost(postUri: string) {
    const error = this.deleteErrors.shift();
    if (error) {
      throw error;
    }
    this.deleted.push(postUri);
  }
}

async function collect(iterable: AsyncIterable<Post>): Promise<string[]> {
  const ids: string[] = [];
  for await (const post of iterable) {
    ids.push(post.id);
  }
  return ids;
}

describe('BlueskyAdapter', () => {
  let agent: FakeAgent;
  let adapter: BlueskyAdapter;
  let session: BlueskySession;

  beforeEach(async () => {
    agent = new FakeAgent();
    adapter = new BlueskyAdapter(
      credentials,
      { retryPolicy: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 }, sleep: () => Promise.resolve() },
      () => agent
    );
    session = await adapter.authenticate();
  });

  describe('authenticate', () => {
    it('returns the session handle and DID', () => {
      expect(session.handle).toBe('tester.bsky.social');
      expect(session.did).toBe(DID);
      expect(adapter.displayName).toBe('Bluesky');
    });

    it('fails fast when credentials are missing', async () => {
      const unconfigured = new BlueskyAdapter(
        { ...credentials, password: '' },
        { retryPolicy: { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 } },
        () => agent
      );

      expect(unconfigured.isConfigured()).toBe(false);
      await expect(unconfigured.authenticate()).rejects.toMatchObject({ code: ErrorCode.NOT_CONFIGURED });
    });

    it('wraps login failures in AuthError', async () => {
      agent.loginError = new XrpcError(401, 'AuthenticationRequired', 'Invalid identifier or password');

      const failure = adapter.authenticate();

      await expect(failure).rejects.toBeInstanceOf(AuthError);
      await expect(failure).rejects.toThrow(
        'Failed to authenticate with Bluesky: Invalid identifier or password'
      );
    });
  });

  describe('listPosts', () => {
    it('pages through the feed and yields posts inside the range', async () => {
      agent.pages = [
        { cursor: '1', feed: [feedItem('a', '2024-02-10T00:00:00Z'), feedItem('b', '2024-01-20T00:00:00Z')] },
        { cursor: '2', feed: [feedItem('c', '2024-01-05T00:00:00Z')] },
        { feed: [feedItem('d', '2024-01-02T00:00:00Z')] },
      ];

      const ids = await collect(adapter.listPosts(session, range));

      expect(ids).toEqual([
        `at://${DID}/app.bsky.feed.post/b`,
        `at://${DID}/app.bsky.feed.post/c`,
        `at://${DID}/app.bsky.feed.post/d`,
      ]);
      expect(agent.feedCalls).toEqual([undefined, '1', '2']);
    });

    it('stops at the first post older than the range', async () => {
      agent.pages = [
        { cursor: '1', feed: [feedItem('b', '2024-01-20T00:00:00Z'), feedItem('old', '2023-12-20T00:00:00Z')] },
        { feed: [feedItem('never', '2024-01-10T00:00:00Z')] },
      ];

      const ids = await collect(adapter.listPosts(session, range));

      expect(ids).toEqual([`at://${DID}/app.bsky.feed.post/b`]);
      expect(agent.feedCalls).toEqual([undefined]);
    });

    it('skips reposts, foreign posts and an old pinned post', async () => {
      agent.pages = [
        {
          feed: [
            feedItem('pin', '2022-05-01T00:00:00Z', { reason: 'app.bsky.feed.defs#reasonPin' }),
            feedItem('rp', '2024-01-15T00:00:00Z', { reason: 'app.bsky.feed.defs#reasonRepost' }),
            feedItem('other', '2024-01-14T00:00:00Z', { author: 'did:plc:someone-else' }),
            feedItem('mine', '2024-01-13T00:00:00Z'),
          ],
        },
      ];

      const ids = await collect(adapter.listPosts(session, range));

      expect(ids).toEqual([`at://${DID}/app.bsky.feed.post/mine`]);
    });

    it('does not yield the same post twice', async () => {
      agent.pages = [
        { cursor: '1', feed: [feedItem('a', '2024-01-20T00:00:00Z')] },
        { feed: [feedItem('a', '2024-01-20T00:00:00Z')] },
      ];

      const ids = await collect(adapter.listPosts(session, range));

      expect(ids).toEqual([`at://${DID}/app.bsky.feed.post/a`]);
    });

    it('stops after maxPages', async () => {
      const limited = new BlueskyAdapter(
        credentials,
        { retryPolicy: { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 }, maxPages: 2 },
        () => agent
      );
      agent.pages = [
        { cursor: '1', feed: [feedItem('a', '2024-01-20T00:00:00Z')] },
        { cursor: '2', feed: [feedItem('b', '2024-01-19T00:00:00Z')] },
        { feed: [feedItem('c', '2024-01-18T00:00:00Z')] },
      ];

      const ids = await collect(limited.listPosts(session, range));

      expect(ids).toHaveLength(2);
      expect(agent.feedCalls).toEqual([undefined, '1']);
    });

    it('retries a rate-limited page', async () => {
      agent.feedErrors = [new XrpcError(429, 'RateLimitExceeded', 'Rate Limit Exceeded')];
      agent.pages = [{ feed: [feedItem('a', '2024-01-20T00:00:00Z')] }];

      const ids = await collect(adapter.listPosts(session, range));

      expect(ids).toEqual([`at://${DID}/app.bsky.feed.post/a`]);
      expect(agent.feedCalls).toEqual([undefined, undefined]);
    });

    it('raises ListError when the feed cannot be read', async () => {
      agent.feedErrors = [new XrpcError(500, 'InternalServerError', 'upstream failure')];

      const failure = collect(adapter.listPosts(session, range));

      await expect(failure).rejects.toBeInstanceOf(ListError);
      await expect(failure).rejects.toThrow('Failed to list Bluesky posts: upstream failure');
    });

    it('gives up with RateLimitError once retries run out', async () => {
      agent.feedErrors = [
        new XrpcError(429, 'RateLimitExceeded', 'Rate Limit Exceeded'),
        new XrpcError(429, 'RateLimitExceeded', 'Rate Limit Exceeded'),
      ];

      const failure = collect(adapter.listPosts(session, range));

      await expect(failure).rejects.toBeInstanceOf(RateLimitError);
      await expect(failure).rejects.toMatchObject({ retryable: false });
    });

    it('does not wait out a rate limit once the run is interrupted', async () => {
      const controller = new AbortController();
      const interrupted = new BlueskyAdapter(
        credentials,
        {
          retryPolicy: { maxAttempts: 4, baseDelayMs: 60000, maxDelayMs: 60000 },
          signal: controller.signal,
        },
        () => agent
      );
      agent.feedErrors = [new XrpcError(429, 'RateLimitExceeded', 'Rate Limit Exceeded')];
      controller.abort();

      const failure = collect(interrupted.listPosts(session, range));

      await expect(failure).rejects.toMatchObject({ retryable: false });
      expect(agent.feedCalls).toEqual([undefined]);
    });
  });

  describe('deletePost', () => {
    const postUri = `at://${DID}/app.bsky.feed.post/a`;

    it('deletes by AT URI', async () => {
      await adapter.deletePost(session, postUri);

      expect(agent.deleted).toEqual([postUri]);
    });

    it('treats an already-deleted record as success', async () => {
      agent.deleteErrors = [new XrpcError(400, 'RecordNotFound', 'Could not locate record')];

      await expect(adapter.deletePost(session, postUri)).resolves.toBeUndefined();
    });

    it('is idempotent across repeated calls', async () => {
      await adapter.deletePost(session, postUri);
      agent.deleteErrors = [new XrpcError(400, 'InvalidRequest', 'Could not locate record: ' + postUri)];

      await expect(adapter.deletePost(session, postUri)).resolves.toBeUndefined();
    });

    it('rejects ids that are not AT URIs', async () => {
      await expect(adapter.deletePost(session, '3kabc')).rejects.toThrow('Invalid Bluesky post URI: 3kabc');
      expect(agent.deleted).toEqual([]);
    });

    it('wraps other failures in DeleteError', async () => {
      agent.deleteErrors = [new XrpcError(500, 'InternalServerError', 'boom')];

      const failure = adapter.deletePost(session, postUri);

      await expect(failure).rejects.toBeInstanceOf(DeleteError);
      await expect(failure).rejects.toThrow(`Failed to delete ${postUri}: boom`);
    });
  });
});
