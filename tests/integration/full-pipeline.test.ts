/**
 * End-to-end pipeline integration test.
 *
 * Drives the CLI program through a group run against in-process fakes of
 * both platform APIs, then re-renders the stored results offline. No real
 * API calls are made.
 */

import { readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from 'vitest';

import { createProgram } from '@/cli/program.js';
import type { FetchFn } from '@/platforms/types.js';
import { setLogLevel } from '@/utils/logger.js';
import { jsonResponse, makeTempDir, removeDir, urlscanRecord } from '../helpers/fixtures.js';

// ---------------------------------------------------------------------------
// Mocks
// ---------------------------------------------------------------------------

vi.mock('ora', () => ({
  default: () => ({
    start: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    info: vi.fn().mockReturnThis(),
  }),
}));

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const NOW = new Date('2026-10-18T09:30:05Z');
const STAMP = '20261018_093005';

const CONFIG = {
  output_directory: 'out',
  report_username: 'analyst',
  queries: {
    'brand-domain': {
      query: 'domain:*brand*',
      titles: [{ title: 'Brand lookalikes' }, { title: 'Brand lookalikes (case 42)', tlp_level: 'amber' }],
      notes: [{ text: 'Registrant linked to kit seller', tlp_level: 'red' }],
    },
    'brand-favicon': {
      query: 'favicon_md5 = "f00d"',
      platform: 'silentpush',
      query_tlp_level: 'amber',
    },
    'brand-watch': {
      type: 'query_group',
      queries: ['brand-domain', 'brand-favicon'],
      titles: [{ title: 'Brand watch' }],
    },
  },
};

const PNG = new Uint8Array([137, 80, 78, 71]);

const fakeApis = vi.fn<FetchFn>(async (input) => {
  const url = String(input);
  if (url.startsWith('https://urlscan.io/api/v1/search/')) {
    return jsonResponse({
      results: [urlscanRecord('brand-login.example.net', 'scan-1'), urlscanRecord('brand-pay.example.net', 'scan-2')],
      total: 2,
    });
  }
  if (url.startsWith('https://urlscan.io/screenshots/')) {
    return new Response(PNG, { status: 200 });
  }
  if (url.startsWith('https://api.silentpush.com/')) {
    return jsonResponse({
      status_code: 200,
      error: null,
      response: {
        scandata_raw: [
          {
            scan_id: 'sp-1',
            domain: 'brand-help.example.org',
            url: 'https://brand-help.example.org/',
            htmltitle: 'Brand Help',
            ip: '198.51.100.7',
          },
        ],
      },
    });
  }
  return new Response('not found', { status: 404 });
});

let dir: string;
let configPath: string;
let logSpy: MockInstance<typeof console.log>;

beforeEach(async () => {
  setLogLevel('error');
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  dir = await makeTempDir();
  configPath = join(dir, 'config.json');
  await writeFile(configPath, JSON.stringify(CONFIG));
});

afterEach(async () => {
  logSpy.mockRestore();
  fakeApis.mockClear();
  setLogLevel('info');
  await removeDir(dir);
});

function program() {
  return createProgram({ env: { SILENTPUSH_API_KEY: 'test-secret' }, fetchFn: fakeApis, now: () => NOW });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('masqwatch pipeline', () => {
  it('runs a group, writes reports and indicators, and advances last_run', async () => {
    await program().parseAsync(['run', '-c', configPath, '-g', 'brand-watch', '--tlp', 'green,red'], {
      from: 'user',
    });

    const runDir = join(dir, 'out', `brand-watch_${STAMP}_group`);
    expect((await readdir(runDir)).sort()).toEqual([
      'images',
      'iocs',
      'raw_results.json',
      `report_brand-watch_${STAMP}_TLP-green.html`,
      `report_brand-watch_${STAMP}_TLP-red.html`,
    ]);
    expect((await readdir(join(runDir, 'images'))).sort()).toEqual(['scan-1.png', 'scan-2.png']);

    const green = await readFile(join(runDir, `report_brand-watch_${STAMP}_TLP-green.html`), 'utf-8');
    expect(green).toContain('<div class="tlp-banner">TLP:GREEN</div>');
    expect(green).toContain('Total results: 3');
    expect(green).toContain('<h2>Brand lookalikes</h2>');
    expect(green).not.toContain('favicon_md5');
    expect(green).not.toContain('kit seller');

    const red = await readFile(join(runDir, `report_brand-watch_${STAMP}_TLP-red.html`), 'utf-8');
    expect(red).toContain('<h2>Brand lookalikes (case 42)</h2>');
    expect(red).toContain('<li>Registrant linked to kit seller</li>');
    expect(red).toContain('<code>favicon_md5 = &quot;f00d&quot;</code>');

    const scanIds = await readFile(join(runDir, 'iocs', 'brand-watch_scan_ids.csv'), 'utf-8');
    expect(scanIds).toBe('scan_id\nscan-1\nscan-2\nsp-1\n');

    const config: unknown = JSON.parse(await readFile(configPath, 'utf-8'));
    expect(config).toMatchObject({
      queries: {
        'brand-domain': { last_run: '2026-10-18T09:30:05.000Z' },
        'brand-favicon': { last_run: '2026-10-18T09:30:05.000Z' },
        'brand-watch': { last_run: '2026-10-18T09:30:05.000Z' },
      },
    });
  });

  it('re-renders stored results offline without calling any API', async () => {
    await program().parseAsync(['run', '-c', configPath, '-g', 'brand-watch'], { from: 'user' });
    const runDir = join(dir, 'out', `brand-watch_${STAMP}_group`);
    const before = await readFile(configPath, 'utf-8');
    fakeApis.mockClear();

    await program().parseAsync(
      ['report', '-c', configPath, '-q', 'brand-watch', '-i', join(runDir, 'raw_results.json'), '--tlp', 'amber'],
      { from: 'user' },
    );

    expect(fakeApis).not.toHaveBeenCalled();
    const amber = await readFile(join(runDir, `report_brand-watch_${STAMP}_TLP-amber.html`), 'utf-8');
    expect(amber).toContain('data-source-query="brand-domain" data-count="2"');
    expect(amber).toContain('data-source-query="brand-favicon" data-count="1"');
    expect(amber).toContain('src="data:image/png;base64,iVBORw=="');
    expect(await readFile(configPath, 'utf-8')).toBe(before);
  });
});
