/**
 * Graph client tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AuthenticationError, DataQualityError, RateLimitError } from '../errors/index.js';
import { RetryPolicy } from '../http/retry.js';
import { GraphClient, createGraphClient } from './client.js';
import type { MessagePage } from './types.js';

const BASE_URL = 'https://graph.example.test/beta';
const channel = { groupId: 'group-1', channelId: '19:abc@thread.tacv2' };
const CHANNEL_URL = `${BASE_URL}/teams/group-1/channels/19%3Aabc%40thread.tacv2`;

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'content-type': 'application/json' },
    ...init,
  });
}

function message(id: string) {
  return {
    id,
    messageType: 'message',
    createdDateTime: '2024-03-01T10:00:00Z',
    body: { contentType: 'html', content: `<p>${id}</p>` },
  };
}

describe('GraphClient', () => {
  const fetchMock = vi.fn<typeof fetch>();
  const sleep = vi.fn<(ms: number) => Promise<void>>();
  let client: GraphClient;

  beforeEach(() => {
    fetchMock.mockReset();
    sleep.mockReset();
    sleep.mockResolvedValue(undefined);
    vi.stubGlobal('fetch', fetchMock);
    client = new GraphClient({
      accessToken: 'test-token',
      baseUrl: BASE_URL,
      retry: new RetryPolicy({ maxAttempts: 3, jitter: false }, { sleep }),
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('constructor', () => {
    it('should require an access token', () => {
      expect(() => new GraphClient({ accessToken: '' })).toThrow(AuthenticationError);
    });
  });

  describe('urls', () => {
    it('should encode channel coordinates', () => {
      expect(client.messagesUrl(channel)).toBe(`${CHANNEL_URL}/messages?$top=50`);
      expect(client.repliesUrl(channel, '1700000000000')).toBe(
        `${CHANNEL_URL}/messages/1700000000000/replies?$top=50`
      );
    });
  });

  describe('listMessagePages', () => {
    it('should follow continuation links in order', async () => {
      const next = `${CHANNEL_URL}/messages?$skiptoken=page2`;
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ value: [message('m1'), message('m2')], '@odata.nextLink': next }))
        .mockResolvedValueOnce(jsonResponse({ value: [message('m3')] }));

      const pages: MessagePage[] = [];
      for await (const page of client.listMessagePages(channel)) {
        pages.push(page);
      }

      expect(pages.map(page => page.value.length)).toEqual([2, 1]);
      expect(fetchMock.mock.calls.map(call => call[0])).toEqual([`${CHANNEL_URL}/messages?$top=50`, next]);
      expect(fetchMock.mock.calls[0][1]).toMatchObject({
        method: 'GET',
        headers: { Authorization: 'Bearer test-token' },
      });
    });

    it('should fail on a page that is not a collection', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ items: [] }));

      const pages = client.listMessagePages(channel)[Symbol.asyncIterator]();

      await expect(pages.next()).rejects.toThrow(DataQualityError);
    });
  });

  describe('listReplies', () => {
    it('should collect replies across pages', async () => {
      const next = `${CHANNEL_URL}/messages/m1/replies?$skiptoken=2`;
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ value: [message('r1')], '@odata.nextLink': next }))
        .mockResolvedValueOnce(jsonResponse({ value: [message('r2')] }));

      const replies = await client.listReplies(channel, 'm1');

      expect(replies).toEqual([message('r1'), message('r2')]);
    });

    it('should return an empty list when there are no replies', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ value: [] }));

      await expect(client.listReplies(channel, 'm1')).resolves.toEqual([]);
    });
  });

  describe('error handling', () => {
    it('should treat 401 as fatal without retrying', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ error: { code: 'InvalidAuthenticationToken', message: 'Access token has expired.' } }, { status: 401 })
      );

      await expect(client.listReplies(channel, 'm1')).rejects.toThrow(
        'Graph rejected the access token (expired or invalid): InvalidAuthenticationToken: Access token has expired.'
      );
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should wait out a 429 retry-after before retrying', async () => {
      fetchMock
        .mockResolvedValueOnce(new Response('', { status: 429, headers: { 'retry-after': '5' } }))
        .mockResolvedValueOnce(jsonResponse({ value: [message('r1')] }));

      const replies = await client.listReplies(channel, 'm1');

      expect(replies).toHaveLength(1);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep.mock.calls[0][0]).toBeGreaterThanOrEqual(5000);
    });

    it('should surface a rate limit once attempts are exhausted', async () => {
      fetchMock.mockImplementation(async () => new Response('', { status: 429, headers: { 'retry-after': '1' } }));

      await expect(client.listReplies(channel, 'm1')).rejects.toBeInstanceOf(RateLimitError);
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it('should retry server errors with backoff', async () => {
      fetchMock
        .mockResolvedValueOnce(new Response('upstream unavailable', { status: 503 }))
        .mockResolvedValueOnce(new Response('upstream unavailable', { status: 503 }))
        .mockResolvedValueOnce(jsonResponse({ value: [] }));

      await expect(client.listReplies(channel, 'm1')).resolves.toEqual([]);
      expect(sleep.mock.calls).toEqual([[1000], [2000]]);
    });

    it('should retry network failures', async () => {
      fetchMock
        .mockRejectedValueOnce(new TypeError('fetch failed'))
        .mockResolvedValueOnce(jsonResponse({ value: [] }));

      await expect(client.listReplies(channel, 'm1')).resolves.toEqual([]);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('should classify 404 as data quality', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ error: { code: 'NotFound', message: 'Message not found' } }, { status: 404 })
      );

      await expect(client.listReplies(channel, 'gone')).rejects.toThrow('Graph resource not found: NotFound: Message not found');
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });
});

describe('createGraphClient', () => {
  it('should build a client from settings', () => {
    const client = createGraphClient({ accessToken: 'test-token', baseUrl: `${BASE_URL}/` });

    expect(client.name).toBe('graph');
    expect(client.messagesUrl(channel)).toBe(`${CHANNEL_URL}/messages?$top=50`);
  });
});
