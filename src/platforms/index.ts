/**
 * Platform client factory. Credentials come from the process environment
 * (populated from `.env` by the CLI).
 */

import type { Platform } from '../types/config.js';
import { SilentPushClient } from './silentpush-client.js';
import type { FetchFn, PlatformClient } from './types.js';
import { UrlscanClient } from './urlscan-client.js';

export type ClientProvider = (platform: Platform) => PlatformClient;

export interface ClientProviderOptions {
  env?: NodeJS.ProcessEnv;
  fetchFn?: FetchFn;
}

/** One client per platform, created on first use. */
export function createClientProvider(options: ClientProviderOptions = {}): ClientProvider {
  const env = options.env ?? process.env;
  const clients = new Map<Platform, PlatformClient>();

  return (platform) => {
    let client = clients.get(platform);
    if (!client) {
      client =
        platform === 'urlscan'
          ? new UrlscanClient({ apiKey: env.URLSCAN_API_KEY || undefined, fetchFn: options.fetchFn })
          : new SilentPushClient({ apiKey: env.SILENTPUSH_API_KEY || undefined, fetchFn: options.fetchFn });
      clients.set(platform, client);
    }
    return client;
  };
}

export { UrlscanClient } from './urlscan-client.js';
export { SilentPushClient } from './silentpush-client.js';
export { detectDataType, classifyRecord } from './data-type.js';
export type { PlatformClient, SearchRequest, FetchFn } from './types.js';
