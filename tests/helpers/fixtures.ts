/**
 * Shared builders for unit and integration tests.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { GroupDefinition, QueryDefinition, QueryMetadata } from '@/types/config.js';
import type { ResolvedResult } from '@/types/results.js';

export function emptyMetadata(overrides: Partial<QueryMetadata> = {}): QueryMetadata {
  return {
    description: null,
    notes: [],
    references: [],
    frequency: null,
    priority: null,
    tags: [],
    titles: [],
    ...overrides,
  };
}

export function makeQuery(name: string, overrides: Partial<QueryDefinition> = {}): QueryDefinition {
  return {
    kind: 'query',
    name,
    query: { value: `domain:${name}`, tlp: 'clear' },
    platform: 'urlscan',
    endpoint: null,
    days: null,
    metadata: emptyMetadata(),
    lastRun: null,
    defaultTlp: null,
    templatePath: null,
    ...overrides,
  };
}

export function makeGroup(name: string, queries: string[], overrides: Partial<GroupDefinition> = {}): GroupDefinition {
  return {
    kind: 'group',
    name,
    queries,
    metadata: emptyMetadata(),
    lastRun: null,
    defaultTlp: null,
    templatePath: null,
    ...overrides,
  };
}

/** A urlscan scan result for `domain`. */
export function makeScanResult(sourceQuery: string, domain: string, scanId: string): ResolvedResult {
  const url = `https://${domain}/login`;
  return {
    platform: 'urlscan',
    dataType: 'scan',
    sourceQuery,
    scanId,
    url,
    domain,
    ip: '203.0.113.10',
    title: 'Member Login',
    timestamp: '2026-10-17T08:00:00.000Z',
    defangedUrl: `hxxps://${domain.replace(/\./g, '[.]')}/login`,
    defangedDomain: domain.replace(/\./g, '[.]'),
    screenshot: null,
    raw: { task: { uuid: scanId }, page: { domain, url } },
    details: { server: 'nginx', country: 'US', asnName: 'EXAMPLE-AS', status: '200' },
  };
}

/** urlscan search-API shaped record. */
export function urlscanRecord(domain: string, scanId: string): Record<string, unknown> {
  return {
    _id: scanId,
    task: { uuid: scanId, url: `https://${domain}/`, time: '2026-10-17T08:00:00.000Z' },
    page: {
      url: `https://${domain}/`,
      domain,
      ip: '203.0.113.10',
      title: 'Member Login',
      server: 'nginx',
      country: 'US',
      asnname: 'EXAMPLE-AS',
      status: 200,
    },
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export async function makeTempDir(prefix = 'masqwatch-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}
