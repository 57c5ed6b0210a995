/**
 * Data-type detection for platform payloads.
 *
 * The endpoint alone does not fix the payload shape, so each record is
 * classified by the fields it carries. Detection is total: anything not
 * recognised is `generic`.
 */

import type { Platform } from '../types/config.js';
import type { DataType } from '../types/results.js';
import { isRecord } from '../utils/guards.js';

const DOMAIN_SEARCH_MARKERS = ['asn_diversity', 'ip_diversity_all', 'ip_diversity_groups'];

function has(payload: Record<string, unknown>, key: string): boolean {
  return payload[key] !== undefined && payload[key] !== null;
}

export function classifyRecord(platform: Platform, payload: Record<string, unknown>): DataType {
  if (platform === 'urlscan') {
    return isRecord(payload.page) || isRecord(payload.task) ? 'scan' : 'generic';
  }

  if (has(payload, 'registrar') || has(payload, 'nameserver') || (has(payload, 'created') && has(payload, 'expires'))) {
    return 'whois';
  }
  if (has(payload, 'host') && DOMAIN_SEARCH_MARKERS.some((key) => has(payload, key))) {
    return 'domainsearch';
  }
  if (has(payload, 'htmltitle') || has(payload, 'favicon_md5') || (has(payload, 'url') && has(payload, 'scan_date'))) {
    return 'webscan';
  }
  return 'generic';
}

/**
 * Classify a whole batch: the shared type when every record agrees,
 * otherwise `generic`. An empty batch is `generic`.
 */
export function detectDataType(platform: Platform, payloads: Record<string, unknown>[]): DataType {
  if (payloads.length === 0) return 'generic';

  const first = classifyRecord(platform, payloads[0]);
  for (const payload of payloads.slice(1)) {
    if (classifyRecord(platform, payload) !== first) {
      return 'generic';
    }
  }
  return first;
}
