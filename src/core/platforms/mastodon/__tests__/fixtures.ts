// src/core/platforms/mastodon/__tests__/fixtures.ts
import { AxiosError, AxiosHeaders, type InternalAxiosRequestConfig } from 'axios';
import type { MastodonStatus } from '../client.js';

export function makeStatus(id: string, createdAt: string, overrides: Partial<MastodonStatus> = {}): MastodonStatus {
  return {
    id,
    uri: `https://mastodon.example/users/tester/statuses/${id}`,
    url: `https://mastodon.example/@tester/${id}`,
    created_at: createdAt,
    content: `<p>status ${id}</p>`,
    spoiler_text: '',
    visibility: 'public',
    in_reply_to_id: null,
    replies_count: 0,
    reblogs_count: 0,
    favourites_count: 0,
    media_attachments: [],
    ...overrides,
  };
}

export function axiosFailure(
  status: number,
  headers: Record<string, string> = {},
  config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() }
): AxiosError {
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', config, undefined, {
    data: { error: 'failure' },
    status,
    statusText: '',
    headers,
    config,
  });
}
