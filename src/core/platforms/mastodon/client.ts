// src/core/platforms/mastodon/client.ts
import axios, { AxiosError, type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import { RateLimitError } from '../../errors.js';
import { isObject } from '../../types/index.js';
import type { MastodonCredentials } from '../../config/types.js';

const DEFAULT_TIMEOUT_MS = 30000;

export const accountSchema = z.object({
  id: z.string(),
  username: z.string(),
  acct: z.string(),
  url: z.string().optional(),
});

const mediaAttachmentSchema = z.object({
  id: z.string(),
  type: z.string(),
  url: z.string().nullable().optional(),
  remote_url: z.string().nullable().optional(),
  description: z.string().nullable().optional(),
});

export const statusSchema = z.object({
  id: z.string(),
  uri: z.string(),
  url: z.string().nullable().optional(),
  created_at: z.string(),
  content: z.string(),
  spoiler_text: z.string().optional().default(''),
  visibility: z.string(),
  in_reply_to_id: z.string().nullable().optional(),
  reblog: z.unknown().optional(),
  replies_count: z.number().optional().default(0),
  reblogs_count: z.number().optional().default(0),
  favourites_count: z.number().optional().default(0),
  media_attachments: z.array(mediaAttachmentSchema).optional().default([]),
});

export type MastodonAccount = z.infer<typeof accountSchema>;
export type MastodonStatus = z.infer<typeof statusSchema>;

export interface ListStatusesParams {
  limit: number;
  maxId?: string;
}

export interface MastodonApi {
  verifyCredentials(): Promise<MastodonAccount>;
  listStatuses(accountId: string, params: ListStatusesParams): Promise<MastodonStatus[]>;
  deleteStatus(statusId: string): Promise<void>;
}

export interface MastodonClientOptions {
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

/**
 * Seconds in `Retry-After`, or the ISO timestamp in `X-RateLimit-Reset`.
 */
export function retryAfterFromHeaders(headers: unknown, now: number = Date.now()): number | undefined {
  if (!isObject(headers)) {
    return undefined;
  }

  const retryAfter = headers['retry-after'];
  if (typeof retryAfter === 'string' && /^\d+$/.test(retryAfter.trim())) {
    return Number(retryAfter.trim()) * 1000;
  }

  const reset = headers['x-ratelimit-reset'];
  if (typeof reset === 'string') {
    const resetAt = Date.parse(reset);
    if (!Number.isNaN(resetAt)) {
      return Math.max(0, resetAt - now);
    }
  }

  return undefined;
}

export function httpStatus(error: unknown): number | undefined {
  return error instanceof AxiosError ? error.response?.status : undefined;
}

export class MastodonClient implements MastodonApi {
  private readonly http: AxiosInstance;

  constructor(credentials: MastodonCredentials, options: MastodonClientOptions = {}) {
    this.http = axios.create({
      baseURL: `${credentials.apiBaseUrl}/api/v1`,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      headers: {
        Authorization: `Bearer ${credentials.accessToken}`,
        Accept: 'application/json',
      },
      adapter: options.adapter,
    });
  }

  async verifyCredentials(): Promise<MastodonAccount> {
    const data = await this.request('GET', '/accounts/verify_credentials');
    return accountSchema.parse(data);
  }

  async listStatuses(accountId: string, params: ListStatusesParams): Promise<MastodonStatus[]> {
    const data = await this.request('GET', `/accounts/${encodeURIComponent(accountId)}/statuses`, {
      limit: params.limit,
      max_id: params.maxId,
      exclude_reblogs: true,
    });
    return z.array(statusSchema).parse(data);
  }

  async deleteStatus(statusId: string): Promise<void> {
    await this.request('DELETE', `/statuses/${encodeURIComponent(statusId)}`);
  }

  private async request(
    method: 'GET' | 'DELETE',
    url: string,
    params?: Record<string, string | number | boolean | undefined>
  ): Promise<unknown> {
    try {
      const response = await this.http.request<unknown>({ method, url, params });
      return response.data;
    } catch (error) {
      if (error instanceof AxiosError && error.response?.status === 429) {
        throw new RateLimitError(
          `Mastodon rate limit hit on ${method} ${url}`,
          retryAfterFromHeaders(error.response.headers)
        );
      }
      throw error;
    }
  }
}
