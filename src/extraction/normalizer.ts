/**
 * Result normalizer: turns raw platform records into ResolvedResult.
 *
 * The `(platform, dataType)` tag decided by the client selects the
 * variant. Missing fields become null; nothing here throws on bad input.
 * Any tag combination not listed falls through to the generic variant.
 */

import type { Platform } from '../types/config.js';
import type {
  DataType,
  GenericDetails,
  RawRecord,
  ResolvedResult,
  Screenshot,
} from '../types/results.js';
import { defangDomain, defangUrl } from '../utils/defang.js';
import { asString, asStringList, getPath, isRecord } from '../utils/guards.js';
import { extractDomain } from '../utils/network.js';

export interface NormalizeContext {
  sourceQuery: string;
  screenshot?: Screenshot | null;
}

interface Canonical {
  scanId: string | null;
  url: string | null;
  domain: string | null;
  ip: string | null;
  title: string | null;
  timestamp: string | null;
}

/** First path that yields a usable string. */
function pick(payload: Record<string, unknown>, ...paths: string[]): string | null {
  for (const path of paths) {
    const value = asString(getPath(payload, path));
    if (value !== null) return value;
  }
  return null;
}

export function normalize(
  record: RawRecord,
  batch: { platform: Platform; dataType: DataType },
  context: NormalizeContext,
): ResolvedResult {
  const p = record.payload;

  const base = (canonical: Canonical) => {
    const domain = canonical.domain ?? (canonical.url ? extractDomain(canonical.url) : null);
    return {
      ...canonical,
      domain,
      sourceQuery: context.sourceQuery,
      defangedUrl: canonical.url ? defangUrl(canonical.url) : null,
      defangedDomain: domain ? defangDomain(domain) : null,
      screenshot: context.screenshot ?? null,
      raw: p,
    };
  };

  if (batch.platform === 'urlscan' && batch.dataType === 'scan') {
    return {
      ...base({
        scanId: pick(p, 'task.uuid', '_id'),
        url: pick(p, 'page.url', 'task.url'),
        domain: pick(p, 'page.domain', 'task.domain'),
        ip: pick(p, 'page.ip'),
        title: pick(p, 'page.title'),
        timestamp: pick(p, 'task.time', 'indexedAt'),
      }),
      platform: 'urlscan',
      dataType: 'scan',
      details: {
        server: pick(p, 'page.server'),
        country: pick(p, 'page.country'),
        asnName: pick(p, 'page.asnname'),
        status: pick(p, 'page.status'),
      },
    };
  }

  if (batch.platform === 'silentpush') {
    switch (batch.dataType) {
      case 'webscan':
        return {
          ...base({
            scanId: pick(p, 'scan_id', 'id'),
            url: pick(p, 'url'),
            domain: pick(p, 'domain', 'hostname'),
            ip: pick(p, 'ip'),
            title: pick(p, 'htmltitle', 'title'),
            timestamp: pick(p, 'scan_date'),
          }),
          platform: 'silentpush',
          dataType: 'webscan',
          details: {
            htmlTitle: pick(p, 'htmltitle'),
            server: pick(p, 'server', 'header.server'),
            faviconHash: pick(p, 'favicon_md5', 'favicon_murmur3'),
          },
        };

      case 'whois':
        return {
          ...base({
            scanId: null,
            url: null,
            domain: pick(p, 'domain'),
            ip: null,
            title: null,
            timestamp: pick(p, 'scan_date'),
          }),
          platform: 'silentpush',
          dataType: 'whois',
          details: {
            registrar: pick(p, 'registrar'),
            created: pick(p, 'created'),
            updated: pick(p, 'updated'),
            expires: pick(p, 'expires'),
            registrant: pick(p, 'name'),
            emails: asStringList(p.email),
            organization: pick(p, 'organization'),
            nameservers: asStringList(p.nameserver),
            address: pick(p, 'address'),
            city: pick(p, 'city'),
            state: pick(p, 'state'),
            country: pick(p, 'country'),
            zipcode: pick(p, 'zipcode'),
          },
        };

      case 'domainsearch':
        return {
          ...base({
            scanId: null,
            url: null,
            domain: pick(p, 'host'),
            ip: null,
            title: null,
            timestamp: pick(p, 'first_seen', 'last_seen'),
          }),
          platform: 'silentpush',
          dataType: 'domainsearch',
          details: {
            host: pick(p, 'host'),
            asnDiversity: pick(p, 'asn_diversity'),
            ipDiversity: pick(p, 'ip_diversity_all', 'ip_diversity_groups'),
          },
        };

      default:
        break;
    }
  }

  return {
    ...base({
      scanId: pick(p, 'task.uuid', 'uuid', '_id', 'scan_id'),
      url: pick(p, 'url', 'page.url'),
      domain: pick(p, 'domain', 'host', 'hostname', 'page.domain'),
      ip: pick(p, 'ip', 'page.ip'),
      title: pick(p, 'title', 'htmltitle', 'page.title'),
      timestamp: pick(p, 'scan_date', 'date', 'task.time'),
    }),
    platform: batch.platform,
    dataType: 'generic',
    details: { fields: flattenRecord(p) },
  };
}

const MAX_FLATTEN_DEPTH = 4;

/**
 * Flatten a nested record into `dotted.key → text` pairs for tabular
 * display. Scalar arrays are joined; deeper structures are JSON-encoded.
 */
export function flattenRecord(record: Record<string, unknown>): GenericDetails['fields'] {
  const fields: GenericDetails['fields'] = [];

  const walk = (value: unknown, key: string, depth: number): void => {
    if (value === null || value === undefined) return;

    if (isRecord(value) && depth < MAX_FLATTEN_DEPTH) {
      for (const [child, childValue] of Object.entries(value)) {
        walk(childValue, key ? `${key}.${child}` : child, depth + 1);
      }
      return;
    }

    if (Array.isArray(value) && value.every((item) => asString(item) !== null)) {
      if (value.length > 0) fields.push([key, asStringList(value).join(', ')]);
      return;
    }

    const scalar = typeof value === 'string' ? value : asString(value);
    fields.push([key, scalar ?? JSON.stringify(value)]);
  };

  walk(record, '', 0);
  return fields;
}
