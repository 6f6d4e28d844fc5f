// src/core/platforms/bluesky/__tests__/parser.test.ts
import { describe, it, expect } from '@jest/globals';
import { buildPostUrl, collectAttachments, getRecordKey, isPinned, isRepost, parseFeedItem } from '../parser.js';
import type { BlueskyFeedItem } from '../types.js';

const uri = 'at://did:plc:tester/app.bsky.feed.post/3kxyz';

function item(record: Record<string, unknown>, extra: Partial<BlueskyFeedItem['post']> = {}): BlueskyFeedItem {
  return {
    post: {
      uri,
      cid: 'bafy-cid',
      author: { did: 'did:plc:tester', handle: 'tester.bsky.social' },
      record,
      ...extra,
    },
  };
}

describe('getRecordKey', () => {
  it('returns the last URI segment', () => {
    expect(getRecordKey(uri)).toBe('3kxyz');
    expect(buildPostUrl('tester.bsky.social', uri)).toBe('https://bsky.app/profile/tester.bsky.social/post/3kxyz');
  });
});

describe('feed reasons', () => {
  it('recognises pins and reposts', () => {
    const pinned = { ...item({}), reason: { $type: 'app.bsky.feed.defs#reasonPin' } };
    const repost = { ...item({}), reason: { $type: 'app.bsky.feed.defs#reasonRepost', by: {} } };

    expect(isPinned(pinned)).toBe(true);
    expect(isRepost(pinned)).toBe(false);
    expect(isRepost(repost)).toBe(true);
    expect(isPinned(item({}))).toBe(false);
  });
});

describe('collectAttachments', () => {
  it('collects images, video playlists and link cards', () => {
    expect(
      collectAttachments({
        images: [{ fullsize: 'https://cdn.example/1.jpg' }, { thumb: 'https://cdn.example/t.jpg' }],
      })
    ).toEqual(['https://cdn.example/1.jpg']);
    expect(collectAttachments({ playlist: 'https://video.example/p.m3u8' })).toEqual([
      'https://video.example/p.m3u8',
    ]);
    expect(collectAttachments({ external: { uri: 'https://example.com/article' } })).toEqual([
      'https://example.com/article',
    ]);
  });

  it('unwraps media inside quote posts', () => {
    expect(
      collectAttachments({ record: {}, media: { images: [{ fullsize: 'https://cdn.example/q.jpg' }] } })
    ).toEqual(['https://cdn.example/q.jpg']);
  });

  it('returns nothing for missing embeds', () => {
    expect(collectAttachments(undefined)).toEqual([]);
  });
});

describe('parseFeedItem', () => {
  it('maps a feed item to a post', () => {
    const post = parseFeedItem(
      item(
        { text: 'hello', createdAt: '2024-01-15T10:00:00.000Z', reply: { root: {}, parent: {} } },
        { likeCount: 3 }
      ),
      'tester.bsky.social'
    );

    expect(post).toEqual({
      id: uri,
      platform: 'bluesky',
      createdAt: new Date('2024-01-15T10:00:00.000Z'),
      text: 'hello',
      url: 'https://bsky.app/profile/tester.bsky.social/post/3kxyz',
      attachments: [],
      metadata: {
        uri,
        cid: 'bafy-cid',
        author: 'tester.bsky.social',
        isReply: true,
        replyCount: 0,
        repostCount: 0,
        likeCount: 3,
      },
    });
  });

  it('returns null without a valid createdAt', () => {
    expect(parseFeedItem(item({ text: 'x' }), 'tester.bsky.social')).toBeNull();
    expect(parseFeedItem(item({ text: 'x', createdAt: 'not a date' }), 'tester.bsky.social')).toBeNull();
  });
});
