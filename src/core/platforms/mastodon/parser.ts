// src/core/platforms/mastodon/parser.ts
import type { Post } from '../../types/index.js';
import type { MastodonStatus } from './client.js';
import { htmlToText } from './html-to-text.js';

export function parseStatus(status: MastodonStatus): Post | null {
  const createdAt = new Date(status.created_at);
  if (Number.isNaN(createdAt.getTime())) {
    return null;
  }

  const body = htmlToText(status.content);
  const text = status.spoiler_text ? `${status.spoiler_text}\n\n${body}`.trim() : body;

  return {
    id: status.id,
    platform: 'mastodon',
    createdAt,
    text,
    url: status.url ?? status.uri,
    attachments: status.media_attachments
      .map(media => media.url ?? media.remote_url)
      .filter((url): url is string => typeof url === 'string' && url.length > 0),
    metadata: {
      uri: status.uri,
      visibility: status.visibility,
      isReply: Boolean(status.in_reply_to_id),
      contentWarning: status.spoiler_text || null,
      repliesCount: status.replies_count,
      reblogsCount: status.reblogs_count,
      favouritesCount: status.favourites_count,
    },
  };
}
