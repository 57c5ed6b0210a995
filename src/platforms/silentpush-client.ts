/**
 * Silent Push merge-API client.
 *
 * Searches are SPQL strings POSTed to a merge-api endpoint. The shape of
 * the records depends on the endpoint and on the data behind it, so the
 * batch type is decided by inspecting the records (see data-type.ts).
 */

import { z } from 'zod';

import { PlatformError } from '../errors.js';
import type { LookbackWindow } from '../query/lookback.js';
import type { SearchBatch } from '../types/results.js';
import { isRecord } from '../utils/guards.js';
import { createLogger } from '../utils/logger.js';
import { formatSqlTimestamp } from '../utils/time.js';
import { detectDataType } from './data-type.js';
import { requestJson } from './http.js';
import type { FetchFn, HttpClientOptions, PlatformClient, SearchRequest } from './types.js';

const log = createLogger('silentpush');

const DEFAULT_BASE_URL = 'https://api.silentpush.com/api/v1';
export const DEFAULT_SILENTPUSH_ENDPOINT = 'explore/scandata/search/raw';
const RESULT_LIMIT = 1000;

const EnvelopeSchema = z
  .object({
    status_code: z.number().optional(),
    error: z.unknown().optional(),
    response: z.unknown().optional(),
  })
  .passthrough();

export interface SilentPushClientOptions extends HttpClientOptions {
  apiKey?: string;
}

export class SilentPushClient implements PlatformClient {
  readonly platform = 'silentpush' as const;

  private readonly fetchFn: FetchFn;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly apiKey: string | undefined;

  constructor(options: SilentPushClientOptions = {}) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? 180_000;
    this.apiKey = options.apiKey;
  }

  async search(request: SearchRequest): Promise<SearchBatch> {
    if (!this.apiKey) {
      throw new PlatformError(this.platform, 'SILENTPUSH_API_KEY is required. Set it in .env or environment.');
    }

    const endpoint = (request.endpoint ?? DEFAULT_SILENTPUSH_ENDPOINT).replace(/^\/+/, '');
    const params = new URLSearchParams({
      limit: String(RESULT_LIMIT),
      skip: '0',
      with_metadata: '1',
    });
    const url = `${this.baseUrl}/merge-api/${endpoint}?${params.toString()}`;
    const query = buildSilentPushQuery(request.query, request.window);
    log.debug(`POST ${endpoint}: ${query}`);

    const body = await requestJson(this.platform, url, {
      fetchFn: this.fetchFn,
      timeoutMs: this.timeoutMs,
      init: {
        method: 'POST',
        headers: {
          'x-api-key': this.apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ query, sort: ['scan_date/desc'] }),
      },
    });

    const envelope = EnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new PlatformError(this.platform, 'unexpected response envelope');
    }
    const { error, response } = envelope.data;
    if (error !== undefined && error !== null && error !== '') {
      throw new PlatformError(this.platform, `API error: ${JSON.stringify(error)}`, envelope.data.status_code);
    }

    const payloads = extractRecords(response);
    return {
      platform: this.platform,
      dataType: detectDataType(this.platform, payloads),
      records: payloads.map((payload) => ({ payload, screenshotRef: null })),
    };
  }

  /** Silent Push search records carry no screenshots. */
  async fetchScreenshot(): Promise<Buffer | null> {
    return null;
  }
}

/**
 * Append the lookback window as an SPQL `scan_date` filter.
 *
 * @example buildSilentPushQuery('domain = "usaa.com"', w)
 *   => 'domain = "usaa.com" AND scan_date >= "2026-10-11 09:00:00"'
 */
export function buildSilentPushQuery(query: string, window: LookbackWindow): string {
  return `${query} AND scan_date >= "${formatSqlTimestamp(window.start)}"`;
}

/**
 * Pull the record list out of a merge-api `response` body: `scandata_raw`
 * when present, else the first array-valued field, looking one level into
 * a nested `response` object. Scalars in the list are wrapped as `{value}`.
 */
export function extractRecords(response: unknown): Record<string, unknown>[] {
  let list: unknown[] = [];

  if (Array.isArray(response)) {
    list = response;
  } else if (isRecord(response)) {
    if (Array.isArray(response.scandata_raw)) {
      list = response.scandata_raw;
    } else if (isRecord(response.response)) {
      return extractRecords(response.response);
    } else {
      list = Object.values(response).find((value): value is unknown[] => Array.isArray(value)) ?? [];
    }
  }

  return list.map((item) => (isRecord(item) ? item : { value: item }));
}
