/**
 * State persister: writes `last_run` back into the configuration file.
 *
 * The document is written once per invocation, in the format it was read
 * in, through a temporary file renamed over the original.
 */

import { rename, writeFile } from 'node:fs/promises';

import type { QueryStore } from '../config/query-store.js';
import type { RawDocument } from '../config/schema.js';
import { ConfigurationError, errorMessage } from '../errors.js';
import { isRecord } from '../utils/guards.js';
import { createLogger } from '../utils/logger.js';
import { serializeYaml } from '../utils/yaml.js';

const logger = createLogger('state');

/**
 * Return a copy of `document` with `last_run` set on each named entry.
 * Names not present in the document are skipped.
 */
export function applyLastRun(document: RawDocument, names: string[], runTimestamp: Date): RawDocument {
  const stamp = runTimestamp.toISOString();
  const queries: Record<string, unknown> = { ...document.queries };
  for (const name of names) {
    const entry = queries[name];
    if (isRecord(entry)) {
      queries[name] = { ...entry, last_run: stamp };
    }
  }
  return { ...document, queries };
}

export function serializeDocument(document: RawDocument, format: 'json' | 'yaml'): string {
  return format === 'yaml' ? serializeYaml(document) : JSON.stringify(document, null, 2) + '\n';
}

export class StatePersister {
  constructor(private readonly store: QueryStore) {}

  /**
   * Set `last_run` for `names` and write the document back.
   *
   * @returns The names that were updated; empty when nothing was written.
   * @throws {ConfigurationError} When the store was not loaded from a file
   *   or the write fails.
   */
  async commit(names: string[], runTimestamp: Date): Promise<string[]> {
    const unique = [...new Set(names)].filter((name) => this.store.has(name));
    if (unique.length === 0) {
      logger.debug('No entries to commit');
      return [];
    }

    const path = this.store.sourcePath;
    if (path === null) {
      throw new ConfigurationError('cannot persist last_run: configuration has no source file');
    }

    const updated = applyLastRun(this.store.document, unique, runTimestamp);
    const tmpPath = `${path}.${process.pid}.tmp`;
    try {
      await writeFile(tmpPath, serializeDocument(updated, this.store.format), 'utf-8');
      await rename(tmpPath, path);
    } catch (err) {
      throw new ConfigurationError(`cannot write configuration (${errorMessage(err)})`, path, { cause: err });
    }

    logger.info(`Updated last_run for ${unique.length} entr${unique.length === 1 ? 'y' : 'ies'}`);
    return unique;
  }
}
