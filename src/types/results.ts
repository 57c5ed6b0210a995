/**
 * Normalized result types.
 *
 * A resolved result is a tagged union keyed by `(platform, dataType)`.
 * The tag is decided once, when a batch comes back from a platform, and
 * every later stage (partials, IOC extraction) switches on it.
 */

import type { Platform } from './config.js';

export type DataType = 'scan' | 'webscan' | 'whois' | 'domainsearch' | 'generic';

/** A raw platform record plus the reference used to fetch its screenshot. */
export interface RawRecord {
  payload: Record<string, unknown>;
  screenshotRef: string | null;
}

export interface SearchBatch {
  platform: Platform;
  dataType: DataType;
  records: RawRecord[];
}

export interface Screenshot {
  /** Path relative to the run directory, e.g. `images/<id>.png`. */
  fileName: string;
  dataUri: string;
}

interface ResultBase {
  sourceQuery: string;
  scanId: string | null;
  url: string | null;
  domain: string | null;
  ip: string | null;
  title: string | null;
  timestamp: string | null;
  defangedUrl: string | null;
  defangedDomain: string | null;
  screenshot: Screenshot | null;
  raw: Record<string, unknown>;
}

export interface UrlscanScanDetails {
  server: string | null;
  country: string | null;
  asnName: string | null;
  status: string | null;
}

export interface WebscanDetails {
  htmlTitle: string | null;
  server: string | null;
  faviconHash: string | null;
}

export interface WhoisDetails {
  registrar: string | null;
  created: string | null;
  updated: string | null;
  expires: string | null;
  registrant: string | null;
  emails: string[];
  organization: string | null;
  nameservers: string[];
  address: string | null;
  city: string | null;
  state: string | null;
  country: string | null;
  zipcode: string | null;
}

export interface DomainSearchDetails {
  host: string | null;
  asnDiversity: string | null;
  ipDiversity: string | null;
}

export interface GenericDetails {
  fields: Array<[string, string]>;
}

export type ResolvedResult =
  | (ResultBase & { platform: 'urlscan'; dataType: 'scan'; details: UrlscanScanDetails })
  | (ResultBase & { platform: 'silentpush'; dataType: 'webscan'; details: WebscanDetails })
  | (ResultBase & { platform: 'silentpush'; dataType: 'whois'; details: WhoisDetails })
  | (ResultBase & { platform: 'silentpush'; dataType: 'domainsearch'; details: DomainSearchDetails })
  | (ResultBase & { platform: Platform; dataType: 'generic'; details: GenericDetails });
