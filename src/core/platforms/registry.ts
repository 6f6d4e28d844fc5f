// src/core/platforms/registry.ts
import type { ScrubConfig } from '../config/types.js';
import type { Logger } from '../logger.js';
import type { RetryHooks } from '../retry/policy.js';
import type { Platform } from '../types/index.js';
import { BlueskyAdapter } from './bluesky/index.js';
import { MastodonAdapter } from './mastodon/index.js';
import { TwitterAdapter } from './twitter.js';
import type { AdapterOptions, PlatformAdapter } from './types.js';

export interface RegistryOptions {
  logger: Logger;
  maxPages?: number;
  sleep?: RetryHooks['sleep'];
  signal?: AbortSignal;
}

export class PlatformRegistry {
  private adapters = new Map<Platform, PlatformAdapter>();

  get(platform: Platform): PlatformAdapter {
    const adapter = this.adapters.get(platform);

    if (!adapter) {
      throw new Error(`No adapter registered for platform: ${platform}`);
    }

    return adapter;
  }

  register(adapter: PlatformAdapter): void {
    this.adapters.set(adapter.platform, adapter);
  }

  /** Adapters for the given platforms, in the order given. */
  select(platforms: readonly Platform[]): PlatformAdapter[] {
    return platforms.map(platform => this.get(platform));
  }

  static fromConfig(config: ScrubConfig, options: RegistryOptions): PlatformRegistry {
    const adapterOptions = (platform: Platform): AdapterOptions => ({
      retryPolicy: config.retry,
      logger: options.logger.child(platform),
      maxPages: options.maxPages,
      sleep: options.sleep,
      signal: options.signal,
    });

    const registry = new PlatformRegistry();
    registry.register(new BlueskyAdapter(config.credentials.bluesky, adapterOptions('bluesky')));
    registry.register(new MastodonAdapter(config.credentials.mastodon, adapterOptions('mastodon')));
    registry.register(new TwitterAdapter(config.credentials.twitter, adapterOptions('twitter')));
    return registry;
  }
}
