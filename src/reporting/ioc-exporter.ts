/**
 * Indicator export: CSV per type, one combined CSV, JSON, and the list of
 * scan IDs the GTM extension reads back.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { groupIocsByType } from '../extraction/ioc-extractor.js';
import type { IocRecord } from '../types/ioc.js';
import { toCsv } from '../utils/csv.js';
import { createLogger } from '../utils/logger.js';
import { safeFileComponent } from './html-reporter.js';

const logger = createLogger('ioc-exporter');

export const IOC_DIRECTORY = 'iocs';

export interface IocExportResult {
  directory: string;
  files: string[];
  count: number;
}

/** JSON document written to `<name>_iocs.json`. */
export interface IocJsonExport {
  name: string;
  generatedAt: string;
  count: number;
  byType: Record<string, string[]>;
  iocs: IocRecord[];
}

export function buildIocJson(name: string, iocs: IocRecord[], generatedAt: Date): IocJsonExport {
  const byType: Record<string, string[]> = {};
  for (const [type, items] of groupIocsByType(iocs)) {
    byType[type] = items.map((ioc) => ioc.value);
  }
  return { name, generatedAt: generatedAt.toISOString(), count: iocs.length, byType, iocs };
}

/** Unique non-null scan IDs in first-seen order. */
export function collectScanIds(iocs: IocRecord[]): string[] {
  const ids = new Set<string>();
  for (const ioc of iocs) {
    if (ioc.sourceScanId) ids.add(ioc.sourceScanId);
  }
  return [...ids];
}

/**
 * Write every export file under `<runDir>/iocs/`.
 *
 * @param scanIds - IDs of every scanned result; falls back to the IDs the
 *   indicators carry.
 */
export async function exportIocs(
  runDir: string,
  name: string,
  iocs: IocRecord[],
  generatedAt: Date,
  scanIds: string[] = collectScanIds(iocs),
): Promise<IocExportResult> {
  const directory = join(runDir, IOC_DIRECTORY);
  await mkdir(directory, { recursive: true });

  const base = safeFileComponent(name);
  const files: string[] = [];
  const write = async (fileName: string, content: string): Promise<void> => {
    const path = join(directory, fileName);
    await writeFile(path, content, 'utf-8');
    files.push(path);
  };

  for (const [type, items] of groupIocsByType(iocs)) {
    await write(
      `${base}_${type}.csv`,
      toCsv(
        ['value', 'source_scan_id', 'source_query'],
        items.map((ioc) => [ioc.value, ioc.sourceScanId, ioc.sourceQuery]),
      ),
    );
  }

  await write(
    `${base}_all_iocs.csv`,
    toCsv(
      ['type', 'value', 'source_scan_id', 'source_query'],
      iocs.map((ioc) => [ioc.type, ioc.value, ioc.sourceScanId, ioc.sourceQuery]),
    ),
  );

  await write(`${base}_iocs.json`, JSON.stringify(buildIocJson(name, iocs, generatedAt), null, 2) + '\n');

  if (scanIds.length > 0) {
    await write(`${base}_scan_ids.csv`, toCsv(['scan_id'], scanIds.map((id) => [id])));
  }

  logger.info(`Exported ${iocs.length} indicator(s) to ${directory}`);
  return { directory, files, count: iocs.length };
}
