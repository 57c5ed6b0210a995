/**
 * Platform client contract shared by the urlscan.io and Silent Push
 * implementations.
 */

import type { LookbackWindow } from '../query/lookback.js';
import type { Platform } from '../types/config.js';
import type { SearchBatch } from '../types/results.js';

export interface SearchRequest {
  query: string;
  window: LookbackWindow;
  endpoint: string | null;
}

export interface PlatformClient {
  readonly platform: Platform;

  /** @throws PlatformError on network, auth or response-shape failures. */
  search(request: SearchRequest): Promise<SearchBatch>;

  /** Screenshot bytes for a reference from a search record, or null. */
  fetchScreenshot(reference: string): Promise<Buffer | null>;
}

export type FetchFn = typeof fetch;

export interface HttpClientOptions {
  fetchFn?: FetchFn;
  baseUrl?: string;
  timeoutMs?: number;
}
