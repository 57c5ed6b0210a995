/**
 * `raw_results.json`: the fetched records of one run, kept beside the
 * report so it can be rendered again without calling any API.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import { z } from 'zod';

import { formatIssues } from '../config/schema.js';
import { StoredResultsError, errorMessage } from '../errors.js';
import { normalize } from '../extraction/normalizer.js';
import { PLATFORMS } from '../types/config.js';
import type { ResolvedResult, Screenshot } from '../types/results.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('raw-results');

export const RAW_RESULTS_FILE = 'raw_results.json';

const DATA_TYPES = ['scan', 'webscan', 'whois', 'domainsearch', 'generic'] as const;

const StoredRecordSchema = z.object({
  payload: z.record(z.string(), z.unknown()),
  screenshot: z.string().nullable(),
});

const StoredBatchSchema = z.object({
  sourceQuery: z.string().min(1),
  platform: z.enum(PLATFORMS),
  dataType: z.enum(DATA_TYPES),
  records: z.array(StoredRecordSchema),
});

const RawResultsSchema = z.object({
  name: z.string().min(1),
  kind: z.enum(['query', 'group']),
  generatedAt: z.string(),
  batches: z.array(StoredBatchSchema),
});

export type StoredRecord = z.infer<typeof StoredRecordSchema>;
export type StoredBatch = z.infer<typeof StoredBatchSchema>;
export type RawResultsFile = z.infer<typeof RawResultsSchema>;

export async function writeRawResults(runDir: string, file: RawResultsFile): Promise<string> {
  const path = join(runDir, RAW_RESULTS_FILE);
  await writeFile(path, JSON.stringify(file, null, 2) + '\n', 'utf-8');
  return path;
}

/**
 * @throws {StoredResultsError} When the file is missing or malformed.
 */
export async function readRawResults(path: string): Promise<RawResultsFile> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, 'utf-8'));
  } catch (err) {
    throw new StoredResultsError(`cannot read results (${errorMessage(err)})`, path, { cause: err });
  }
  const result = RawResultsSchema.safeParse(parsed);
  if (!result.success) {
    throw new StoredResultsError(formatIssues(result.error), path);
  }
  return result.data;
}

/** Encode a PNG as an inline screenshot. */
export function toScreenshot(fileName: string, bytes: Buffer): Screenshot {
  return { fileName, dataUri: `data:image/png;base64,${bytes.toString('base64')}` };
}

/**
 * Load a stored screenshot relative to the run directory. A missing file
 * is logged and treated as no screenshot.
 */
export async function loadScreenshot(runDir: string, fileName: string): Promise<Screenshot | null> {
  try {
    return toScreenshot(fileName, await readFile(join(runDir, fileName)));
  } catch (err) {
    logger.warn(`Screenshot ${fileName} unavailable: ${errorMessage(err)}`);
    return null;
  }
}

/** Normalize stored batches back into results, re-embedding screenshots. */
export async function hydrateResults(file: RawResultsFile, filePath: string): Promise<ResolvedResult[]> {
  const runDir = dirname(filePath);
  const results: ResolvedResult[] = [];
  for (const batch of file.batches) {
    for (const record of batch.records) {
      const screenshot = record.screenshot ? await loadScreenshot(runDir, record.screenshot) : null;
      results.push(
        normalize(
          { payload: record.payload, screenshotRef: null },
          { platform: batch.platform, dataType: batch.dataType },
          { sourceQuery: batch.sourceQuery, screenshot },
        ),
      );
    }
  }
  return results;
}
