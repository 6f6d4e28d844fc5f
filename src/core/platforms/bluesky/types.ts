// src/core/platforms/bluesky/types.ts
import type { PlatformSession } from '../types.js';

export interface BlueskyFeedItem {
  post: {
    uri: string;
    cid: string;
    author: { did: string; handle: string };
    record: { [key: string]: unknown };
    embed?: unknown;
    replyCount?: number;
    repostCount?: number;
    likeCount?: number;
  };
  reason?: unknown;
}

/** The slice of `AtpAgent` the adapter relies on. */
export interface BlueskyAgent {
  login(opts: { identifier: string; password: string }): Promise<{
    data: { did: string; handle: string };
  }>;
  getAuthorFeed(params: { actor: string; limit?: number; cursor?: string }): Promise<{
    data: { cursor?: string; feed: BlueskyFeedItem[] };
  }>;
  deletePost(postUri: string): Promise<void>;
}

export interface BlueskySession extends PlatformSession {
  platform: 'bluesky';
  did: string;
  agent: BlueskyAgent;
}
