// src/core/platforms/twitter.ts
import { AuthError, DeleteError, ErrorCode } from '../errors.js';
import type { Post } from '../types/index.js';
import type { TwitterCredentials } from '../config/types.js';
import { BaseAdapter } from './base.js';
import type { AdapterOptions, PlatformSession } from './types.js';

/**
 * Twitter/X is recognised in configuration but not supported yet:
 * authentication always fails, so the orchestrator never lists or deletes.
 */
export class TwitterAdapter extends BaseAdapter<PlatformSession> {
  readonly platform = 'twitter' as const;

  constructor(
    private readonly credentials: TwitterCredentials,
    options: AdapterOptions
  ) {
    super(options);
  }

  get displayName(): string {
    return 'Twitter/X';
  }

  isConfigured(): boolean {
    const { apiKey, apiSecret, accessToken, accessTokenSecret } = this.credentials;
    return Boolean(apiKey && apiSecret && accessToken && accessTokenSecret);
  }

  async authenticate(): Promise<PlatformSession> {
    throw new AuthError(
      'twitter',
      'Twitter/X integration is not yet implemented',
      ErrorCode.NOT_IMPLEMENTED,
      'Remove twitter from --platforms or SCRUB_PLATFORMS'
    );
  }

  async *listPosts(): AsyncGenerator<Post> {
    // Unreachable without a session
  }

  async deletePost(_session: PlatformSession, postId: string): Promise<void> {
    throw new DeleteError(postId, 'Twitter/X integration is not yet implemented');
  }
}
