// src/core/config/constants.ts
export const DEFAULT_BLUESKY_SERVICE = 'https://bsky.social';
export const BLUESKY_PAGE_SIZE = 50;
export const MASTODON_PAGE_SIZE = 40;
export const DEFAULT_MAX_PAGES = 100;

export const DEFAULT_START_DATE = '7_days_ago';
export const DEFAULT_END_DATE = 'today';
export const DEFAULT_MAX_POSTS = 10;
export const DEFAULT_ARCHIVE_PATH = './archives';

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 1000; // 1 second
export const DEFAULT_RETRY_MAX_DELAY_MS = 60000; // 1 minute

export const REDACTED = '********';
