// src/core/platforms/bluesky/parser.ts
import { isObject, type Post } from '../../types/index.js';
import type { BlueskyFeedItem } from './types.js';

const REASON_PIN = 'app.bsky.feed.defs#reasonPin';
const REASON_REPOST = 'app.bsky.feed.defs#reasonRepost';

export function getRecordKey(uri: string): string {
  return uri.split('/').pop() ?? uri;
}

export function buildPostUrl(handle: string, uri: string): string {
  return `https://bsky.app/profile/${handle}/post/${getRecordKey(uri)}`;
}

export function isPinned(item: BlueskyFeedItem): boolean {
  return isObject(item.reason) && item.reason.$type === REASON_PIN;
}

export function isRepost(item: BlueskyFeedItem): boolean {
  return isObject(item.reason) && item.reason.$type === REASON_REPOST;
}

/**
 * Media URLs from an embed view: image fullsizes, video playlists and
 * external link cards. Quote posts with media are unwrapped.
 */
export function collectAttachments(embed: unknown): string[] {
  if (!isObject(embed)) {
    return [];
  }

  const urls: string[] = [];

  if (Array.isArray(embed.images)) {
    for (const image of embed.images) {
      if (isObject(image) && typeof image.fullsize === 'string') {
        urls.push(image.fullsize);
      }
    }
  }

  if (typeof embed.playlist === 'string') {
    urls.push(embed.playlist);
  }

  if (isObject(embed.external) && typeof embed.external.uri === 'string') {
    urls.push(embed.external.uri);
  }

  if (isObject(embed.media)) {
    urls.push(...collectAttachments(embed.media));
  }

  return urls;
}

/** Returns null when the record has no usable `createdAt`. */
export function parseFeedItem(item: BlueskyFeedItem, handle: string): Post | null {
  const { post } = item;
  const record = post.record;

  if (typeof record.createdAt !== 'string') {
    return null;
  }

  const createdAt = new Date(record.createdAt);
  if (Number.isNaN(createdAt.getTime())) {
    return null;
  }

  return {
    id: post.uri,
    platform: 'bluesky',
    createdAt,
    text: typeof record.text === 'string' ? record.text : '',
    url: buildPostUrl(handle, post.uri),
    attachments: collectAttachments(post.embed),
    metadata: {
      uri: post.uri,
      cid: post.cid,
      author: post.author.handle,
      isReply: isObject(record.reply),
      replyCount: post.replyCount ?? 0,
      repostCount: post.repostCount ?? 0,
      likeCount: post.likeCount ?? 0,
    },
  };
}
