/**
 * IOC extractor: typed indicators from resolved results.
 *
 * Structured variants contribute their canonical fields. The generic
 * variant has no fixed shape, so its raw payload is walked and any key in
 * RAW_KEY_TYPES contributes a value. Other keys are ignored, inherited
 * object members such as `constructor` included. Values are refanged and
 * validated per type before they are kept.
 *
 * Order follows the input. Duplicates are removed within one result only;
 * `consolidateIocs` dedupes across results when asked to.
 */

import { IOC_TYPES, type IocRecord, type IocType } from '../types/ioc.js';
import type { ResolvedResult } from '../types/results.js';
import { refang } from '../utils/defang.js';
import { asStringList, isRecord } from '../utils/guards.js';
import { isValidDomain, isValidEmail, isValidIP, isValidUrl } from '../utils/network.js';

// ---------------------------------------------------------------------------
// Raw key taxonomy
// ---------------------------------------------------------------------------

const RAW_KEY_TYPES = new Map<string, IocType>([
  ['domain', 'domain'],
  ['host', 'domain'],
  ['hostname', 'domain'],
  ['ip', 'ip'],
  ['ipv4', 'ip'],
  ['ipv6', 'ip'],
  ['url', 'url'],
  ['title', 'title'],
  ['htmltitle', 'title'],
  ['server', 'server'],
  ['email', 'email'],
  ['emails', 'email'],
  ['registrar', 'registrar'],
  ['nameserver', 'nameserver'],
  ['nameservers', 'nameserver'],
  ['organization', 'organization'],
  ['org', 'organization'],
]);

const MAX_WALK_DEPTH = 6;

type Candidate = [IocType, string | null];

// ---------------------------------------------------------------------------
// Value normalization
// ---------------------------------------------------------------------------

/**
 * Refang and validate a candidate value. Returns the normalized value or
 * null when it does not look like an indicator of that type.
 */
export function normalizeIocValue(type: IocType, value: string): string | null {
  const trimmed = refang(value.trim());
  if (trimmed === '') return null;

  switch (type) {
    case 'domain':
    case 'nameserver': {
      const host = trimmed.toLowerCase().replace(/\.$/, '');
      return isValidDomain(host) ? host : null;
    }
    case 'ip':
      return isValidIP(trimmed) ? trimmed.toLowerCase() : null;
    case 'url':
      return isValidUrl(trimmed) ? trimmed : null;
    case 'email': {
      const email = trimmed.toLowerCase();
      return isValidEmail(email) ? email : null;
    }
    case 'title':
    case 'server':
    case 'registrar':
    case 'organization':
      return value.trim();
  }
}

// ---------------------------------------------------------------------------
// Candidate collection per variant
// ---------------------------------------------------------------------------

function candidatesFor(result: ResolvedResult): Candidate[] {
  switch (result.dataType) {
    case 'scan':
    case 'webscan':
      return [
        ['domain', result.domain],
        ['ip', result.ip],
        ['url', result.url],
        ['title', result.title],
        ['server', result.details.server],
      ];
    case 'whois':
      return [
        ['domain', result.domain],
        ...result.details.emails.map((email): Candidate => ['email', email]),
        ['registrar', result.details.registrar],
        ...result.details.nameservers.map((ns): Candidate => ['nameserver', ns]),
        ['organization', result.details.organization],
      ];
    case 'domainsearch':
      return [['domain', result.domain]];
    case 'generic':
      return walkRaw(result.raw);
  }
}

/** Depth-first walk of a raw payload in document order. */
function walkRaw(payload: Record<string, unknown>): Candidate[] {
  const found: Candidate[] = [];

  const visit = (value: unknown, depth: number): void => {
    if (depth > MAX_WALK_DEPTH) return;

    if (Array.isArray(value)) {
      for (const item of value) visit(item, depth + 1);
      return;
    }
    if (!isRecord(value)) return;

    for (const [key, child] of Object.entries(value)) {
      const type = RAW_KEY_TYPES.get(key.toLowerCase());
      if (type) {
        for (const text of asStringList(child)) found.push([type, text]);
      } else {
        visit(child, depth + 1);
      }
    }
  };

  visit(payload, 0);
  return found;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function extractIocsFromResult(result: ResolvedResult): IocRecord[] {
  const iocs: IocRecord[] = [];
  const seen = new Set<string>();

  for (const [type, raw] of candidatesFor(result)) {
    if (raw === null) continue;
    const value = normalizeIocValue(type, raw);
    if (value === null) continue;

    const key = `${type}:${value.toLowerCase()}`;
    if (seen.has(key)) continue;
    seen.add(key);

    iocs.push({ type, value, sourceScanId: result.scanId, sourceQuery: result.sourceQuery });
  }

  return iocs;
}

export function extractIocs(results: ResolvedResult[]): IocRecord[] {
  return results.flatMap(extractIocsFromResult);
}

/** Drop repeated `(type, value)` pairs, keeping the first occurrence. */
export function consolidateIocs(iocs: IocRecord[]): IocRecord[] {
  const seen = new Set<string>();
  return iocs.filter((ioc) => {
    const key = `${ioc.type}:${ioc.value.toLowerCase()}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/** Bucket indicators by type, in taxonomy order, skipping empty types. */
export function groupIocsByType(iocs: IocRecord[]): Array<[IocType, IocRecord[]]> {
  return IOC_TYPES.map((type): [IocType, IocRecord[]] => [type, iocs.filter((ioc) => ioc.type === type)]).filter(
    ([, items]) => items.length > 0,
  );
}
