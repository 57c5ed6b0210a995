/**
 * urlscan.io search client.
 *
 * Search results nest the interesting fields under `page` and `task`;
 * the screenshot of a scan is addressed by `task.uuid`.
 */

import { z } from 'zod';

import { PlatformError } from '../errors.js';
import type { LookbackWindow } from '../query/lookback.js';
import type { SearchBatch } from '../types/results.js';
import { getPath } from '../utils/guards.js';
import { createLogger } from '../utils/logger.js';
import { detectDataType } from './data-type.js';
import { requestBytes, requestJson } from './http.js';
import type { FetchFn, HttpClientOptions, PlatformClient, SearchRequest } from './types.js';

const log = createLogger('urlscan');

const DEFAULT_BASE_URL = 'https://urlscan.io';
const DEFAULT_PAGE_SIZE = 100;

const SearchResponseSchema = z.object({
  results: z.array(z.record(z.string(), z.unknown())),
  total: z.number().optional(),
});

const SCAN_ID = /^[A-Za-z0-9-]+$/;

export interface UrlscanClientOptions extends HttpClientOptions {
  apiKey?: string;
  pageSize?: number;
}

export class UrlscanClient implements PlatformClient {
  readonly platform = 'urlscan' as const;

  private readonly fetchFn: FetchFn;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly pageSize: number;
  private readonly headers: Record<string, string>;

  constructor(options: UrlscanClientOptions = {}) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.headers = options.apiKey ? { 'API-Key': options.apiKey } : {};
  }

  async search(request: SearchRequest): Promise<SearchBatch> {
    const q = buildUrlscanQuery(request.query, request.window);
    const url = `${this.baseUrl}/api/v1/search/?q=${encodeURIComponent(q)}&size=${this.pageSize}`;
    log.debug(`Searching: ${q}`);

    const body = await requestJson(this.platform, url, {
      fetchFn: this.fetchFn,
      timeoutMs: this.timeoutMs,
      init: { headers: this.headers },
    });

    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new PlatformError(this.platform, 'unexpected search response shape');
    }

    const payloads = parsed.data.results;
    return {
      platform: this.platform,
      dataType: detectDataType(this.platform, payloads),
      records: payloads.map((payload) => ({ payload, screenshotRef: scanIdOf(payload) })),
    };
  }

  async fetchScreenshot(reference: string): Promise<Buffer | null> {
    if (!SCAN_ID.test(reference)) return null;
    return requestBytes(this.platform, `${this.baseUrl}/screenshots/${reference}.png`, {
      fetchFn: this.fetchFn,
      timeoutMs: this.timeoutMs,
      init: { headers: this.headers },
    });
  }
}

/**
 * Append the lookback window as an Elasticsearch range on `date`.
 *
 * @example buildUrlscanQuery('domain:*usaa*', w)
 *   => '(domain:*usaa*) AND date:[2026-10-11T09:00:00Z TO 2026-10-18T09:00:00Z]'
 */
export function buildUrlscanQuery(query: string, window: LookbackWindow): string {
  return `(${query}) AND date:[${isoSeconds(window.start)} TO ${isoSeconds(window.end)}]`;
}

function isoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function scanIdOf(payload: Record<string, unknown>): string | null {
  const uuid = getPath(payload, 'task.uuid') ?? payload._id;
  return typeof uuid === 'string' && SCAN_ID.test(uuid) ? uuid : null;
}
