// src/core/filter/engine.ts
import type { CandidateOrder, MatchMode, Post } from '../types/index.js';

export interface FilterCriteria {
  start: Date;
  end: Date;
  keywords?: readonly string[];
  postIds?: readonly string[];
  matchMode?: MatchMode;
  order?: CandidateOrder;
  maxPosts: number;
}

export function isWithinRange(post: Post, start: Date, end: Date): boolean {
  const time = post.createdAt.getTime();
  return time >= start.getTime() && time <= end.getTime();
}

export function matchesKeyword(post: Post, keywords: readonly string[]): boolean {
  const text = post.text.toLowerCase();
  return keywords.some(keyword => text.includes(keyword.toLowerCase()));
}

/**
 * Exact id match, or a match on the record key when the id is an AT URI
 * (`at://did/app.bsky.feed.post/<rkey>`), so Bluesky posts can be named by
 * the last segment of their web URL.
 */
export function matchesPostId(post: Post, postIds: readonly string[]): boolean {
  const recordKey = post.id.startsWith('at://') ? post.id.split('/').pop() : undefined;
  return postIds.some(id => id === post.id || (recordKey !== undefined && id === recordKey));
}

function matchesOptionalFilters(post: Post, criteria: FilterCriteria): boolean {
  const keywords = criteria.keywords ?? [];
  const postIds = criteria.postIds ?? [];
  const hasKeywords = keywords.length > 0;
  const hasIds = postIds.length > 0;

  if (!hasKeywords && !hasIds) {
    return true;
  }
  if (hasKeywords && !hasIds) {
    return matchesKeyword(post, keywords);
  }
  if (!hasKeywords && hasIds) {
    return matchesPostId(post, postIds);
  }

  return (criteria.matchMode ?? 'any') === 'all'
    ? matchesKeyword(post, keywords) && matchesPostId(post, postIds)
    : matchesKeyword(post, keywords) || matchesPostId(post, postIds);
}

/**
 * Picks the deletion candidates from a listed sequence of posts.
 *
 * The date range always applies. Keyword and id filters apply when given and
 * combine per `matchMode`. When more than `maxPosts` posts survive, the cap
 * keeps the newest (or oldest, per `order`), breaking ties by position in
 * the input. The result keeps input order.
 */
export function filterPosts(posts: readonly Post[], criteria: FilterCriteria): Post[] {
  const matching = posts
    .map((post, index) => ({ post, index }))
    .filter(({ post }) => isWithinRange(post, criteria.start, criteria.end))
    .filter(({ post }) => matchesOptionalFilters(post, criteria));

  const limit = Math.max(0, Math.floor(criteria.maxPosts));
  if (matching.length <= limit) {
    return matching.map(({ post }) => post);
  }

  const direction = (criteria.order ?? 'newest-first') === 'newest-first' ? -1 : 1;
  const kept = [...matching]
    .sort((a, b) => {
      const byDate = (a.post.createdAt.getTime() - b.post.createdAt.getTime()) * direction;
      return byDate !== 0 ? byDate : a.index - b.index;
    })
    .slice(0, limit);

  return kept.sort((a, b) => a.index - b.index).map(({ post }) => post);
}
