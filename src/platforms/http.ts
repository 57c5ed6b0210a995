/**
 * Thin fetch wrappers that turn every transport failure into a
 * PlatformError carrying the platform name.
 */

import { PlatformError, errorMessage } from '../errors.js';
import type { Platform } from '../types/config.js';
import { createLogger } from '../utils/logger.js';
import type { FetchFn } from './types.js';

const log = createLogger('http');

const MAX_ERROR_BODY = 300;

export interface RequestOptions {
  fetchFn: FetchFn;
  timeoutMs: number;
  init?: RequestInit;
}

export async function requestJson(
  platform: Platform,
  url: string,
  options: RequestOptions,
): Promise<unknown> {
  let response: Response;
  try {
    response = await options.fetchFn(url, {
      ...options.init,
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (err) {
    throw new PlatformError(platform, `request failed: ${errorMessage(err)}`, undefined, {
      cause: err,
    });
  }

  if (!response.ok) {
    const body = await response.text();
    throw new PlatformError(
      platform,
      `API error (${response.status}): ${body.substring(0, MAX_ERROR_BODY)}`,
      response.status,
    );
  }

  try {
    return await response.json();
  } catch (err) {
    throw new PlatformError(platform, `response is not valid JSON: ${errorMessage(err)}`, response.status, {
      cause: err,
    });
  }
}

/**
 * Download binary content. Screenshots are best-effort, so failures are
 * logged and reported as null rather than thrown.
 */
export async function requestBytes(
  platform: Platform,
  url: string,
  options: RequestOptions,
): Promise<Buffer | null> {
  try {
    const response = await options.fetchFn(url, {
      ...options.init,
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    if (!response.ok) {
      log.warn(`${platform}: ${url} returned ${response.status}`);
      return null;
    }
    return Buffer.from(await response.arrayBuffer());
  } catch (err) {
    log.warn(`${platform}: download of ${url} failed: ${errorMessage(err)}`);
    return null;
  }
}
