// src/core/__tests__/helpers.ts
import { DeleteError, type ScrubError } from '../errors.js';
import type { PlatformAdapter, PlatformSession } from '../platforms/types.js';
import type { ScrubConfig } from '../config/types.js';
import type { DateRange, Platform, Post } from '../types/index.js';

export function makePost(
  id: string,
  createdAt: string,
  text: string = `post ${id}`,
  platform: Platform = 'bluesky'
): Post {
  return {
    id,
    platform,
    createdAt: new Date(createdAt),
    text,
    attachments: [],
  };
}

export function makeConfig(overrides: Partial<ScrubConfig> = {}): ScrubConfig {
  return {
    startDate: new Date('2024-01-01T00:00:00.000Z'),
    endDate: new Date('2024-01-31T23:59:59.999Z'),
    maxPostsPerPlatform: 10,
    dryRun: false,
    archiveBeforeDelete: false,
    archivePath: './archives',
    enabledPlatforms: ['bluesky'],
    keywords: [],
    postIds: [],
    matchMode: 'any',
    order: 'newest-first',
    retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 },
    logLevel: 'silent',
    credentials: {
      bluesky: { handle: 'tester.bsky.social', password: 'test-secret', service: 'https://bsky.social' },
      mastodon: { apiBaseUrl: 'https://mastodon.example', accessToken: 'test-token' },
      twitter: { apiKey: '', apiSecret: '', accessToken: '', accessTokenSecret: '', bearerToken: '' },
    },
    ...overrides,
  };
}

/**
 * In-memory adapter. Lists every post it holds, in order, without applying
 * the range itself, so the orchestrator's own filtering is what gets tested.
 */
export class FakeAdapter implements PlatformAdapter {
  readonly displayName: string;
  readonly deleted: string[] = [];
  authError?: ScrubError;
  listError?: Error;
  failDeletes = new Set<string>();
  onDelete?: (postId: string) => void;

  constructor(
    readonly platform: Platform,
    private readonly posts: Post[] = []
  ) {
    this.displayName = platform;
  }

  isConfigured(): boolean {
    return true;
  }

  async authenticate(): Promise<PlatformSession> {
    if (this.authError) {
      throw this.authError;
    }
    return { platform: this.platform, handle: `${this.platform}-user` };
  }

  async *listPosts(_session: PlatformSession, _range: DateRange): AsyncGenerator<Post> {
    for (const post of this.posts) {
      yield post;
    }
    if (this.listError) {
      throw this.listError;
    }
  }

  async deletePost(_session: PlatformSession, postId: string): Promise<void> {
    this.onDelete?.(postId);
    if (this.failDeletes.has(postId)) {
      throw new DeleteError(postId, `Failed to delete ${postId}: server error`);
    }
    this.deleted.push(postId);
  }
}
