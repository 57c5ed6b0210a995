/**
 * Unit tests for the urlscan.io client.
 *
 * Tests: buildUrlscanQuery, UrlscanClient.search, UrlscanClient.fetchScreenshot
 */

import { describe, it, expect, vi, type Mock } from 'vitest';

import { PlatformError } from '@/errors.js';
import { UrlscanClient, buildUrlscanQuery } from '@/platforms/urlscan-client.js';
import type { FetchFn } from '@/platforms/types.js';
import type { LookbackWindow } from '@/query/lookback.js';
import { jsonResponse, urlscanRecord } from '../../helpers/fixtures.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const WINDOW: LookbackWindow = {
  start: new Date('2026-10-11T12:00:00.500Z'),
  end: new Date('2026-10-18T12:00:00.000Z'),
  source: 'default_days',
};

function requestedUrl(fetchFn: Mock<FetchFn>, call = 0): string {
  return String(fetchFn.mock.calls[call][0]);
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('buildUrlscanQuery', () => {
  it('wraps the query and appends a second-precision date range', () => {
    expect(buildUrlscanQuery('domain:*usaa*', WINDOW)).toBe(
      '(domain:*usaa*) AND date:[2026-10-11T12:00:00Z TO 2026-10-18T12:00:00Z]',
    );
  });
});

describe('UrlscanClient.search', () => {
  it('sends the search with the API key and returns scan records', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(
      jsonResponse({ results: [urlscanRecord('usaa-login.example.net', 'aaaa-1111')], total: 1 }),
    );
    const client = new UrlscanClient({ apiKey: 'test-secret', fetchFn, pageSize: 50 });

    const batch = await client.search({ query: 'domain:*usaa*', window: WINDOW, endpoint: null });

    const url = new URL(requestedUrl(fetchFn));
    expect(url.origin + url.pathname).toBe('https://urlscan.io/api/v1/search/');
    expect(url.searchParams.get('q')).toBe(buildUrlscanQuery('domain:*usaa*', WINDOW));
    expect(url.searchParams.get('size')).toBe('50');
    expect(fetchFn.mock.calls[0][1]?.headers).toEqual({ 'API-Key': 'test-secret' });

    expect(batch.platform).toBe('urlscan');
    expect(batch.dataType).toBe('scan');
    expect(batch.records).toHaveLength(1);
    expect(batch.records[0].screenshotRef).toBe('aaaa-1111');
  });

  it('sends no API-Key header without a key', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(jsonResponse({ results: [] }));
    const client = new UrlscanClient({ fetchFn });

    const batch = await client.search({ query: 'x', window: WINDOW, endpoint: null });

    expect(fetchFn.mock.calls[0][1]?.headers).toEqual({});
    expect(batch.dataType).toBe('generic');
    expect(batch.records).toEqual([]);
  });

  it('drops screenshot references that are not scan IDs', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(
      jsonResponse({ results: [{ task: { uuid: '../../etc/passwd' }, page: {} }] }),
    );
    const client = new UrlscanClient({ fetchFn });

    const batch = await client.search({ query: 'x', window: WINDOW, endpoint: null });
    expect(batch.records[0].screenshotRef).toBeNull();
  });

  it('raises PlatformError with the status on an HTTP error', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(new Response('rate limited', { status: 429 }));
    const client = new UrlscanClient({ fetchFn });

    const error = await client.search({ query: 'x', window: WINDOW, endpoint: null }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(PlatformError);
    if (error instanceof PlatformError) {
      expect(error.platform).toBe('urlscan');
      expect(error.statusCode).toBe(429);
      expect(error.message).toBe('urlscan: API error (429): rate limited');
    }
  });

  it('raises PlatformError when the network fails', async () => {
    const fetchFn = vi.fn<FetchFn>().mockRejectedValue(new TypeError('fetch failed'));
    const client = new UrlscanClient({ fetchFn });

    await expect(client.search({ query: 'x', window: WINDOW, endpoint: null })).rejects.toThrow(
      'urlscan: request failed: fetch failed',
    );
  });

  it('raises PlatformError on an unexpected body', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(jsonResponse({ message: 'nope' }));
    const client = new UrlscanClient({ fetchFn });

    await expect(client.search({ query: 'x', window: WINDOW, endpoint: null })).rejects.toThrow(PlatformError);
  });
});

describe('UrlscanClient.fetchScreenshot', () => {
  it('downloads the PNG for a scan ID', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(new Response(new Uint8Array([137, 80, 78, 71])));
    const client = new UrlscanClient({ fetchFn, baseUrl: 'https://scanner.test' });

    const bytes = await client.fetchScreenshot('aaaa-1111');

    expect(requestedUrl(fetchFn)).toBe('https://scanner.test/screenshots/aaaa-1111.png');
    expect(bytes?.length).toBe(4);
  });

  it('returns null on a failed download', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(new Response('', { status: 404 }));
    const client = new UrlscanClient({ fetchFn });
    expect(await client.fetchScreenshot('aaaa-1111')).toBeNull();
  });

  it('refuses references that are not scan IDs', async () => {
    const fetchFn = vi.fn<FetchFn>();
    const client = new UrlscanClient({ fetchFn });
    expect(await client.fetchScreenshot('../x')).toBeNull();
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
