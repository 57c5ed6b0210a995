/**
 * GTM extension: pulls Google Tag Manager container IDs out of the page
 * DOMs urlscan.io stored for the scans of a finished run.
 *
 * Input is `iocs/*scan_ids.csv` in the run directory. DOMs are cached in
 * `extensions/dom_cache/<scan_id>_dom.html`; output is
 * `extensions/gtm_ids_extracted_from_urlscan_dom.csv`.
 */

import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';

import { MasqwatchError, errorMessage } from '../errors.js';
import { extractGtmIds } from '../extraction/gtm-extractor.js';
import type { FetchFn } from '../platforms/types.js';
import { IOC_DIRECTORY } from '../reporting/ioc-exporter.js';
import { readFirstColumn, toCsv } from '../utils/csv.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('gtm');

export const EXTENSIONS_DIRECTORY = 'extensions';
export const GTM_OUTPUT_FILE = 'gtm_ids_extracted_from_urlscan_dom.csv';

const SCAN_ID = /^[A-Za-z0-9-]+$/;

export interface GtmExtractionOptions {
  runDir: string;
  useCache?: boolean;
  fetchFn?: FetchFn;
  baseUrl?: string;
  /** Pause before each DOM download. */
  delayMs?: number;
  timeoutMs?: number;
}

export interface GtmExtractionResult {
  scanned: number;
  /** Scan ID to container IDs, scans without any omitted. */
  matches: Map<string, string[]>;
  outputPath: string;
}

/**
 * Read the scan IDs of a run directory.
 *
 * @throws {MasqwatchError} When the run has no scan ID export.
 */
export async function readScanIds(runDir: string): Promise<string[]> {
  const iocDir = join(runDir, IOC_DIRECTORY);
  let files: string[];
  try {
    files = await readdir(iocDir);
  } catch (err) {
    throw new MasqwatchError(`No ${IOC_DIRECTORY} directory in ${runDir}`, { cause: err });
  }

  const scanFile = files.filter((f) => f.endsWith('scan_ids.csv')).sort()[0];
  if (!scanFile) {
    throw new MasqwatchError(`No *scan_ids.csv file in ${iocDir}`);
  }
  return readFirstColumn(await readFile(join(iocDir, scanFile), 'utf-8'));
}

export async function runGtmExtraction(options: GtmExtractionOptions): Promise<GtmExtractionResult> {
  const useCache = options.useCache ?? true;
  const fetchFn = options.fetchFn ?? fetch;
  const baseUrl = options.baseUrl ?? 'https://urlscan.io';
  const delayMs = options.delayMs ?? 1000;
  const timeoutMs = options.timeoutMs ?? 30_000;

  const scanIds = (await readScanIds(options.runDir)).filter((id) => SCAN_ID.test(id));
  const extensionsDir = join(options.runDir, EXTENSIONS_DIRECTORY);
  const cacheDir = join(extensionsDir, 'dom_cache');
  await mkdir(useCache ? cacheDir : extensionsDir, { recursive: true });

  const loadDom = async (scanId: string): Promise<string | null> => {
    const cachePath = join(cacheDir, `${scanId}_dom.html`);
    if (useCache) {
      const cached = await readFile(cachePath, 'utf-8').catch((err: unknown) => {
        logger.debug(`No cached DOM for ${scanId}: ${errorMessage(err)}`);
        return null;
      });
      if (cached !== null) return cached;
    }

    if (delayMs > 0) await sleep(delayMs);
    const response = await fetchFn(`${baseUrl}/dom/${scanId}/`, { signal: AbortSignal.timeout(timeoutMs) });
    if (!response.ok) {
      logger.warn(`DOM for ${scanId} returned ${response.status}`);
      return null;
    }
    const dom = await response.text();
    if (useCache) await writeFile(cachePath, dom, 'utf-8');
    return dom;
  };

  const matches = new Map<string, string[]>();
  for (const scanId of scanIds) {
    try {
      const dom = await loadDom(scanId);
      const ids = dom === null ? [] : extractGtmIds(dom);
      if (ids.length > 0) matches.set(scanId, ids);
      logger.debug(`${scanId}: ${ids.length} GTM ID(s)`);
    } catch (err) {
      logger.warn(`Skipping ${scanId}: ${errorMessage(err)}`);
    }
  }

  const rows: string[][] = [];
  for (const [scanId, ids] of matches) {
    for (const id of ids) rows.push([scanId, id]);
  }
  const outputPath = join(extensionsDir, GTM_OUTPUT_FILE);
  await writeFile(outputPath, toCsv(['scan_id', 'gtm_id'], rows), 'utf-8');
  logger.info(`Found ${rows.length} GTM ID(s) across ${matches.size} of ${scanIds.length} scan(s)`);

  return { scanned: scanIds.length, matches, outputPath };
}
