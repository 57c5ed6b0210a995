/**
 * Unit tests for IOC extraction.
 *
 * Tests: normalizeIocValue, extractIocs, consolidateIocs, groupIocsByType
 */

import { describe, it, expect } from 'vitest';

import {
  consolidateIocs,
  extractIocs,
  extractIocsFromResult,
  groupIocsByType,
  normalizeIocValue,
} from '@/extraction/ioc-extractor.js';
import { normalize } from '@/extraction/normalizer.js';
import type { IocRecord } from '@/types/ioc.js';
import { makeScanResult } from '../../helpers/fixtures.js';

describe('normalizeIocValue', () => {
  it('refangs and lowercases domains', () => {
    expect(normalizeIocValue('domain', 'Evil[.]Example[.]COM.')).toBe('evil.example.com');
  });

  it('rejects values that do not match the type', () => {
    expect(normalizeIocValue('domain', 'not a domain')).toBeNull();
    expect(normalizeIocValue('ip', '999.1.1.1')).toBeNull();
    expect(normalizeIocValue('url', 'example.com/path')).toBeNull();
    expect(normalizeIocValue('email', 'nobody')).toBeNull();
    expect(normalizeIocValue('title', '   ')).toBeNull();
  });

  it('refangs URLs and emails', () => {
    expect(normalizeIocValue('url', 'hxxps://evil[.]example[.]com/a')).toBe('https://evil.example.com/a');
    expect(normalizeIocValue('email', 'Ops[@]Evil[.]com')).toBe('ops@evil.com');
  });

  it('keeps free-text types as written', () => {
    expect(normalizeIocValue('title', '  Member Login ')).toBe('Member Login');
  });
});

describe('extractIocsFromResult', () => {
  it('takes canonical fields from a scan result', () => {
    const result = makeScanResult('usaa-domain', 'usaa-login.example.net', 'aaaa-1111');
    expect(extractIocsFromResult(result).map((ioc) => [ioc.type, ioc.value])).toEqual([
      ['domain', 'usaa-login.example.net'],
      ['ip', '203.0.113.10'],
      ['url', 'https://usaa-login.example.net/login'],
      ['title', 'Member Login'],
      ['server', 'nginx'],
    ]);
  });

  it('tags every indicator with its scan and source query', () => {
    const iocs = extractIocsFromResult(makeScanResult('usaa-domain', 'a.example.net', 'aaaa-1111'));
    for (const ioc of iocs) {
      expect(ioc.sourceScanId).toBe('aaaa-1111');
      expect(ioc.sourceQuery).toBe('usaa-domain');
    }
  });

  it('extracts whois contacts and nameservers', () => {
    const result = normalize(
      {
        payload: {
          domain: 'brand-secure.example',
          registrar: 'Example Registrar',
          email: ['Abuse@Registrant.example', 'abuse@registrant.example'],
          nameserver: ['NS1.Host.example.', 'ns2.host.example'],
          organization: 'Shell Co',
        },
        screenshotRef: null,
      },
      { platform: 'silentpush', dataType: 'whois' },
      { sourceQuery: 'whois' },
    );
    expect(extractIocsFromResult(result).map((ioc) => [ioc.type, ioc.value])).toEqual([
      ['domain', 'brand-secure.example'],
      ['email', 'abuse@registrant.example'],
      ['registrar', 'Example Registrar'],
      ['nameserver', 'ns1.host.example'],
      ['nameserver', 'ns2.host.example'],
      ['organization', 'Shell Co'],
    ]);
  });

  it('walks raw payloads of generic results and ignores unknown keys', () => {
    const result = normalize(
      {
        payload: {
          hostname: 'odd.example',
          nested: { ip: '198.51.100.9', colour: 'blue', emails: ['x@odd.example'] },
          list: [{ url: 'https://odd.example/a' }],
        },
        screenshotRef: null,
      },
      { platform: 'silentpush', dataType: 'generic' },
      { sourceQuery: 'g' },
    );
    expect(extractIocsFromResult(result).map((ioc) => [ioc.type, ioc.value])).toEqual([
      ['domain', 'odd.example'],
      ['ip', '198.51.100.9'],
      ['email', 'x@odd.example'],
      ['url', 'https://odd.example/a'],
    ]);
  });

  it('ignores keys named after inherited object members', () => {
    const payload: Record<string, unknown> = JSON.parse(
      '{"constructor":"x","toString":"y","__proto__":"z","hasOwnProperty":{"ip":"198.51.100.2"},"domain":"evil.example.com"}',
    );
    const result = normalize(
      { payload, screenshotRef: null },
      { platform: 'silentpush', dataType: 'generic' },
      { sourceQuery: 'g' },
    );
    expect(extractIocs([result]).map((ioc) => [ioc.type, ioc.value])).toEqual([
      ['ip', '198.51.100.2'],
      ['domain', 'evil.example.com'],
    ]);
  });
});

describe('extractIocs', () => {
  it('keeps input order and duplicates across results', () => {
    const results = [
      makeScanResult('a', 'dup.example.net', 'id-1'),
      makeScanResult('b', 'dup.example.net', 'id-2'),
    ];
    const domains = extractIocs(results).filter((ioc) => ioc.type === 'domain');
    expect(domains.map((ioc) => ioc.sourceQuery)).toEqual(['a', 'b']);
  });
});

describe('consolidateIocs', () => {
  it('dedupes by type and case-insensitive value, first wins', () => {
    const iocs: IocRecord[] = [
      { type: 'title', value: 'Login', sourceScanId: '1', sourceQuery: 'a' },
      { type: 'title', value: 'LOGIN', sourceScanId: '2', sourceQuery: 'b' },
      { type: 'server', value: 'Login', sourceScanId: '3', sourceQuery: 'b' },
    ];
    expect(consolidateIocs(iocs)).toEqual([iocs[0], iocs[2]]);
  });
});

describe('groupIocsByType', () => {
  it('buckets in taxonomy order and skips empty types', () => {
    const iocs: IocRecord[] = [
      { type: 'title', value: 'T', sourceScanId: null, sourceQuery: 'q' },
      { type: 'domain', value: 'd.example', sourceScanId: null, sourceQuery: 'q' },
    ];
    expect(groupIocsByType(iocs).map(([type, items]) => [type, items.length])).toEqual([
      ['domain', 1],
      ['title', 1],
    ]);
  });
});
