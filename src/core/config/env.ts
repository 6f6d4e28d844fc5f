// src/core/config/env.ts
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { LOG_LEVELS } from '../logger.js';
import { PLATFORMS, type Platform } from '../types/index.js';
import {
  DEFAULT_ARCHIVE_PATH,
  DEFAULT_BLUESKY_SERVICE,
  DEFAULT_END_DATE,
  DEFAULT_MAX_POSTS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  DEFAULT_START_DATE,
  REDACTED,
} from './constants.js';
import { parseDateSpec, type DateBoundary } from './dates.js';
import type { ConfigOverrides, Credentials, ScrubConfig } from './types.js';

const OPTION_NAMES: Record<string, string> = {
  SCRUB_START_DATE: '--start-date',
  SCRUB_END_DATE: '--end-date',
  MAX_POSTS_PER_SCRUB: '--max-posts',
  SCRUB_PLATFORMS: '--platforms',
  SCRUB_MATCH_MODE: '--match',
  SCRUB_ORDER: '--order',
  ARCHIVE_PATH: '--archive-path',
};

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine(v => TRUE_VALUES.includes(v) || FALSE_VALUES.includes(v), {
    message: 'Expected true or false',
  })
  .transform(v => TRUE_VALUES.includes(v));

const csv = z
  .string()
  .transform(v => v.split(',').map(item => item.trim()).filter(item => item.length > 0));

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

function dateSpec(boundary: DateBoundary, now: Date) {
  return z.string().transform((value, ctx) => {
    const parsed = parseDateSpec(value, boundary, now);
    if (!parsed) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid date "${value}" (use YYYY-MM-DD, an ISO date-time, "today" or "N_days_ago")`,
      });
      return z.NEVER;
    }
    return parsed;
  });
}

function buildSchema(now: Date) {
  return z.object({
    BLUESKY_HANDLE: z.string().trim(),
    BLUESKY_PASSWORD: z.string(),
    BLUESKY_SERVICE: z.string().trim().url(),
    MASTODON_API_BASE_URL: z
      .string()
      .trim()
      .refine(v => v === '' || z.string().url().safeParse(v).success, { message: 'Invalid URL' })
      .transform(v => v.replace(/\/+$/, '')),
    MASTODON_ACCESS_TOKEN: z.string().trim(),
    TWITTER_API_KEY: z.string().trim(),
    TWITTER_API_SECRET: z.string().trim(),
    TWITTER_ACCESS_TOKEN: z.string().trim(),
    TWITTER_ACCESS_TOKEN_SECRET: z.string().trim(),
    TWITTER_BEARER_TOKEN: z.string().trim(),
    SCRUB_START_DATE: dateSpec('start', now),
    SCRUB_END_DATE: dateSpec('end', now),
    MAX_POSTS_PER_SCRUB: positiveInt,
    DRY_RUN: booleanFlag,
    ARCHIVE_BEFORE_DELETE: booleanFlag,
    ARCHIVE_PATH: z.string().trim().min(1),
    SCRUB_PLATFORMS: csv.pipe(z.array(z.enum(PLATFORMS))),
    SCRUB_KEYWORDS: z.union([csv, z.array(z.string())]),
    SCRUB_POST_IDS: z.union([csv, z.array(z.string())]),
    SCRUB_MATCH_MODE: z.string().trim().toLowerCase().pipe(z.enum(['any', 'all'])),
    SCRUB_ORDER: z.string().trim().toLowerCase().pipe(z.enum(['newest-first', 'oldest-first'])),
    RATE_LIMIT_MAX_RETRIES: nonNegativeInt,
    RATE_LIMIT_BASE_DELAY_MS: nonNegativeInt,
    RATE_LIMIT_MAX_DELAY_MS: nonNegativeInt,
    LOG_LEVEL: z
      .string()
      .trim()
      .toLowerCase()
      .transform(v => (v === 'warning' ? 'warn' : v === 'critical' ? 'error' : v))
      .pipe(z.enum(LOG_LEVELS)),
  });
}

type RawConfig = {
  [K in keyof z.infer<ReturnType<typeof buildSchema>>]: string | string[];
};

/** Loads a .env file into process.env without overriding variables already set. */
export function loadEnvFile(path?: string): void {
  dotenv.config(path ? { path } : undefined);
}

function pick(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  const value = env[name];
  return value === undefined || value.trim() === '' ? fallback : value;
}

function flag(value: boolean | undefined, env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  return value === undefined ? pick(env, name, fallback) : String(value);
}

function mergeRaw(env: NodeJS.ProcessEnv, overrides: ConfigOverrides): RawConfig {
  return {
    BLUESKY_HANDLE: pick(env, 'BLUESKY_HANDLE', ''),
    BLUESKY_PASSWORD: pick(env, 'BLUESKY_PASSWORD', ''),
    BLUESKY_SERVICE: pick(env, 'BLUESKY_SERVICE', DEFAULT_BLUESKY_SERVICE),
    MASTODON_API_BASE_URL: pick(env, 'MASTODON_API_BASE_URL', ''),
    MASTODON_ACCESS_TOKEN: pick(env, 'MASTODON_ACCESS_TOKEN', ''),
    TWITTER_API_KEY: pick(env, 'TWITTER_API_KEY', ''),
    TWITTER_API_SECRET: pick(env, 'TWITTER_API_SECRET', ''),
    TWITTER_ACCESS_TOKEN: pick(env, 'TWITTER_ACCESS_TOKEN', ''),
    TWITTER_ACCESS_TOKEN_SECRET: pick(env, 'TWITTER_ACCESS_TOKEN_SECRET', ''),
    TWITTER_BEARER_TOKEN: pick(env, 'TWITTER_BEARER_TOKEN', ''),
    SCRUB_START_DATE: overrides.startDate ?? pick(env, 'SCRUB_START_DATE', DEFAULT_START_DATE),
    SCRUB_END_DATE: overrides.endDate ?? pick(env, 'SCRUB_END_DATE', DEFAULT_END_DATE),
    MAX_POSTS_PER_SCRUB: overrides.maxPosts ?? pick(env, 'MAX_POSTS_PER_SCRUB', String(DEFAULT_MAX_POSTS)),
    DRY_RUN: flag(overrides.dryRun, env, 'DRY_RUN', 'true'),
    ARCHIVE_BEFORE_DELETE: flag(overrides.archive, env, 'ARCHIVE_BEFORE_DELETE', 'true'),
    ARCHIVE_PATH: overrides.archivePath ?? pick(env, 'ARCHIVE_PATH', DEFAULT_ARCHIVE_PATH),
    SCRUB_PLATFORMS: overrides.platforms ?? pick(env, 'SCRUB_PLATFORMS', ''),
    SCRUB_KEYWORDS: overrides.keywords ?? pick(env, 'SCRUB_KEYWORDS', ''),
    SCRUB_POST_IDS: overrides.postIds ?? pick(env, 'SCRUB_POST_IDS', ''),
    SCRUB_MATCH_MODE: overrides.matchMode ?? pick(env, 'SCRUB_MATCH_MODE', 'any'),
    SCRUB_ORDER: overrides.order ?? pick(env, 'SCRUB_ORDER', 'newest-first'),
    RATE_LIMIT_MAX_RETRIES: pick(env, 'RATE_LIMIT_MAX_RETRIES', String(DEFAULT_MAX_RETRIES)),
    RATE_LIMIT_BASE_DELAY_MS: pick(env, 'RATE_LIMIT_BASE_DELAY_MS', String(DEFAULT_RETRY_BASE_DELAY_MS)),
    RATE_LIMIT_MAX_DELAY_MS: pick(env, 'RATE_LIMIT_MAX_DELAY_MS', String(DEFAULT_RETRY_MAX_DELAY_MS)),
    LOG_LEVEL: pick(env, 'LOG_LEVEL', 'info'),
  };
}

function describeIssue(issue: z.ZodIssue): string {
  const name = String(issue.path[0] ?? 'config');
  const option = OPTION_NAMES[name];
  return `${option ? `${name} (${option})` : name}: ${issue.message}`;
}

export function isPlatformConfigured(platform: Platform, credentials: Credentials): boolean {
  switch (platform) {
    case 'bluesky':
      return Boolean(credentials.bluesky.handle && credentials.bluesky.password);
    case 'mastodon':
      return Boolean(credentials.mastodon.apiBaseUrl && credentials.mastodon.accessToken);
    case 'twitter': {
      const { apiKey, apiSecret, accessToken, accessTokenSecret } = credentials.twitter;
      return Boolean(apiKey && apiSecret && accessToken && accessTokenSecret);
    }
  }
}

/**
 * Resolves the run configuration from environment variables, with
 * command-line overrides taking precedence.
 *
 * Throws a {@link ConfigError} listing every invalid setting.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
  now: Date = new Date()
): ScrubConfig {
  const parsed = buildSchema(now).safeParse(mergeRaw(env, overrides));

  if (!parsed.success) {
    const issues = parsed.error.issues.map(describeIssue);
    throw new ConfigError(`Invalid configuration:\n  ${issues.join('\n  ')}`, issues);
  }

  const raw = parsed.data;

  if (raw.SCRUB_START_DATE.getTime() > raw.SCRUB_END_DATE.getTime()) {
    const issue = 'SCRUB_START_DATE (--start-date): start date is after the end date';
    throw new ConfigError(`Invalid configuration:\n  ${issue}`, [issue]);
  }

  const credentials: Credentials = {
    bluesky: {
      handle: raw.BLUESKY_HANDLE.replace(/^@/, ''),
      password: raw.BLUESKY_PASSWORD,
      service: raw.BLUESKY_SERVICE,
    },
    mastodon: {
      apiBaseUrl: raw.MASTODON_API_BASE_URL,
      accessToken: raw.MASTODON_ACCESS_TOKEN,
    },
    twitter: {
      apiKey: raw.TWITTER_API_KEY,
      apiSecret: raw.TWITTER_API_SECRET,
      accessToken: raw.TWITTER_ACCESS_TOKEN,
      accessTokenSecret: raw.TWITTER_ACCESS_TOKEN_SECRET,
      bearerToken: raw.TWITTER_BEARER_TOKEN,
    },
  };

  const enabledPlatforms =
    raw.SCRUB_PLATFORMS.length > 0
      ? [...new Set(raw.SCRUB_PLATFORMS)]
      : PLATFORMS.filter(platform => isPlatformConfigured(platform, credentials));

  return {
    startDate: raw.SCRUB_START_DATE,
    endDate: raw.SCRUB_END_DATE,
    maxPostsPerPlatform: raw.MAX_POSTS_PER_SCRUB,
    dryRun: raw.DRY_RUN,
    archiveBeforeDelete: raw.ARCHIVE_BEFORE_DELETE,
    archivePath: raw.ARCHIVE_PATH,
    enabledPlatforms,
    keywords: raw.SCRUB_KEYWORDS.map(k => k.trim()).filter(k => k.length > 0),
    postIds: raw.SCRUB_POST_IDS.map(id => id.trim()).filter(id => id.length > 0),
    matchMode: raw.SCRUB_MATCH_MODE,
    order: raw.SCRUB_ORDER,
    retry: {
      maxAttempts: raw.RATE_LIMIT_MAX_RETRIES + 1,
      baseDelayMs: raw.RATE_LIMIT_BASE_DELAY_MS,
      maxDelayMs: raw.RATE_LIMIT_MAX_DELAY_MS,
    },
    logLevel: raw.LOG_LEVEL,
    credentials,
  };
}

function redact(secret: string): string {
  return secret ? REDACTED : '';
}

/** A printable view of the configuration with every secret masked. */
export function redactConfig(config: ScrubConfig): Record<string, unknown> {
  const { bluesky, mastodon, twitter } = config.credentials;

  return {
    startDate: config.startDate.toISOString(),
    endDate: config.endDate.toISOString(),
    maxPostsPerPlatform: config.maxPostsPerPlatform,
    dryRun: config.dryRun,
    archiveBeforeDelete: config.archiveBeforeDelete,
    archivePath: config.archivePath,
    enabledPlatforms: config.enabledPlatforms,
    keywords: config.keywords,
    postIds: config.postIds,
    matchMode: config.matchMode,
    order: config.order,
    retry: config.retry,
    logLevel: config.logLevel,
    credentials: {
      bluesky: { handle: bluesky.handle, password: redact(bluesky.password), service: bluesky.service },
      mastodon: { apiBaseUrl: mastodon.apiBaseUrl, accessToken: redact(mastodon.accessToken) },
      twitter: {
        apiKey: redact(twitter.apiKey),
        apiSecret: redact(twitter.apiSecret),
        accessToken: redact(twitter.accessToken),
        accessTokenSecret: redact(twitter.accessTokenSecret),
        bearerToken: redact(twitter.bearerToken),
      },
    },
  };
}
