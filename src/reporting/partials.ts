/**
 * Result partials: HTML fragments for one result, chosen by the result's
 * `(platform, dataType)` tag.
 *
 * Lookup order: exact pair, `(platform, *)`, `(*, dataType)`, `(*, *)`.
 * The `(*, *)` entry is installed by the constructor, so every result
 * renders with something.
 */

import type { Platform } from '../types/config.js';
import type { DataType, ResolvedResult } from '../types/results.js';
import { defang, defangText } from '../utils/defang.js';
import { escapeHtml, escapeOrNA } from '../utils/html.js';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export type PartialRenderer = (result: ResolvedResult) => string;

export interface PartialEntry {
  /** Stable identifier, written into the output as `data-partial`. */
  id: string;
  render: PartialRenderer;
}

type PlatformKey = Platform | '*';
type DataTypeKey = DataType | '*';

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class PartialRegistry {
  private readonly entries = new Map<string, PartialEntry>();

  constructor(fallback: PartialEntry = genericPartial) {
    this.entries.set(key('*', '*'), fallback);
  }

  register(platform: PlatformKey, dataType: DataTypeKey, entry: PartialEntry): this {
    this.entries.set(key(platform, dataType), entry);
    return this;
  }

  lookup(platform: Platform, dataType: DataType): PartialEntry {
    return (
      this.entries.get(key(platform, dataType)) ??
      this.entries.get(key(platform, '*')) ??
      this.entries.get(key('*', dataType)) ??
      this.fallback()
    );
  }

  render(result: ResolvedResult): string {
    const partial = this.lookup(result.platform, result.dataType);
    return `<article class="result" data-partial="${escapeHtml(partial.id)}">\n${partial.render(result)}\n</article>`;
  }

  private fallback(): PartialEntry {
    const entry = this.entries.get(key('*', '*'));
    return entry ?? genericPartial;
  }
}

function key(platform: PlatformKey, dataType: DataTypeKey): string {
  return `${platform}/${dataType}`;
}

// ---------------------------------------------------------------------------
// Shared fragments
// ---------------------------------------------------------------------------

function fieldTable(rows: Array<[string, string | null]>): string {
  const body = rows
    .map(([label, value]) => `<tr><th>${escapeHtml(label)}</th><td>${escapeOrNA(value)}</td></tr>`)
    .join('\n');
  return `<table class="fields">\n${body}\n</table>`;
}

function resultHeading(result: ResolvedResult): string {
  const label = result.defangedDomain ?? result.defangedUrl ?? result.title ?? 'Unknown';
  const time = result.timestamp ? `<span class="timestamp">${escapeHtml(result.timestamp)}</span>` : '';
  return `<header class="result-header"><h3>${escapeHtml(label)}</h3>${time}</header>`;
}

function screenshotBlock(result: ResolvedResult): string {
  if (!result.screenshot) {
    return '<div class="no-screenshot">No screenshot available</div>';
  }
  const alt = `Screenshot of ${result.defangedDomain ?? 'scanned page'}`;
  return `<img class="screenshot" src="${result.screenshot.dataUri}" alt="${escapeHtml(alt)}">`;
}

function join(values: string[]): string | null {
  return values.length > 0 ? values.join(', ') : null;
}

// ---------------------------------------------------------------------------
// Built-in partials
// ---------------------------------------------------------------------------

export const genericPartial: PartialEntry = {
  id: 'generic',
  render: (result) => {
    const rows: Array<[string, string | null]> =
      result.dataType === 'generic'
        ? result.details.fields.map(([label, value]): [string, string] => [label, defangText(value)])
        : [
            ['URL', result.defangedUrl],
            ['Domain', result.defangedDomain],
            ['IP', result.ip],
            ['Title', result.title],
          ];
    return `${resultHeading(result)}\n${fieldTable(rows)}`;
  },
};

export const urlscanScanPartial: PartialEntry = {
  id: 'urlscan-scan',
  render: (result) => {
    const details = result.dataType === 'scan' ? result.details : null;
    return [
      resultHeading(result),
      '<div class="result-body">',
      screenshotBlock(result),
      fieldTable([
        ['URL', result.defangedUrl],
        ['IP', result.ip],
        ['Title', result.title],
        ['Server', details?.server ?? null],
        ['Country', details?.country ?? null],
        ['ASN', details?.asnName ?? null],
        ['HTTP status', details?.status ?? null],
        ['Scan ID', result.scanId],
      ]),
      '</div>',
    ].join('\n');
  },
};

export const silentPushWebscanPartial: PartialEntry = {
  id: 'silentpush-webscan',
  render: (result) => {
    const details = result.dataType === 'webscan' ? result.details : null;
    return [
      resultHeading(result),
      fieldTable([
        ['URL', result.defangedUrl],
        ['IP', result.ip],
        ['HTML title', details?.htmlTitle ?? result.title],
        ['Server', details?.server ?? null],
        ['Favicon hash', details?.faviconHash ?? null],
      ]),
    ].join('\n');
  },
};

export const silentPushWhoisPartial: PartialEntry = {
  id: 'silentpush-whois',
  render: (result) => {
    if (result.dataType !== 'whois') return genericPartial.render(result);
    const d = result.details;
    const location = [d.address, d.city, d.state, d.zipcode, d.country].filter((v): v is string => v !== null);
    return [
      resultHeading(result),
      fieldTable([
        ['Registrar', d.registrar],
        ['Created', d.created],
        ['Updated', d.updated],
        ['Expires', d.expires],
        ['Registrant', d.registrant],
        ['Organization', d.organization],
        ['Email', join(d.emails.map(defang))],
        ['Nameservers', join(d.nameservers.map(defang))],
        ['Location', join(location)],
      ]),
    ].join('\n');
  },
};

export const silentPushDomainSearchPartial: PartialEntry = {
  id: 'silentpush-domainsearch',
  render: (result) => {
    const details = result.dataType === 'domainsearch' ? result.details : null;
    return [
      resultHeading(result),
      fieldTable([
        ['Host', details?.host ? result.defangedDomain : null],
        ['ASN diversity', details?.asnDiversity ?? null],
        ['IP diversity', details?.ipDiversity ?? null],
      ]),
    ].join('\n');
  },
};

/** Registry with every built-in partial registered. */
export function createDefaultRegistry(): PartialRegistry {
  return new PartialRegistry(genericPartial)
    .register('urlscan', 'scan', urlscanScanPartial)
    .register('silentpush', 'webscan', silentPushWebscanPartial)
    .register('silentpush', 'whois', silentPushWhoisPartial)
    .register('silentpush', 'domainsearch', silentPushDomainSearchPartial);
}
