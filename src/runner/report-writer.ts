/**
 * Writes the HTML report(s) of one target, one file per TLP ceiling.
 * Shared by live runs and offline re-rendering.
 */

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { QueryStore } from '../config/query-store.js';
import type { QueryDefinition, QueryEntry, StoreSettings, TlpLevel } from '../types/config.js';
import type { ResolvedResult } from '../types/results.js';
import {
  renderReport,
  reportFileName,
  resolveTemplate,
  type PartialRegistry,
  type ReportInput,
  type SectionSource,
} from '../reporting/index.js';
import { resolveCeiling } from '../tlp/redaction.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('report-writer');

export function sectionSourceOf(entry: QueryEntry): SectionSource {
  return entry.kind === 'query'
    ? { name: entry.name, metadata: entry.metadata, query: entry.query, platform: entry.platform }
    : { name: entry.name, metadata: entry.metadata, query: null, platform: null };
}

/** Requested ceilings, or the single default ceiling for the entry. */
export function reportCeilings(
  requested: TlpLevel[],
  entry: QueryEntry,
  settings: StoreSettings,
): TlpLevel[] {
  if (requested.length > 0) return [...new Set(requested)];
  return [resolveCeiling(null, entry.defaultTlp, settings.defaultTlp)];
}

export interface WriteReportsOptions {
  store: QueryStore;
  entry: QueryEntry;
  /** Leaf queries in execution order; used as group sections. */
  leaves: QueryDefinition[];
  results: ResolvedResult[];
  runDir: string;
  ceilings: TlpLevel[];
  generatedAt: Date;
  registry?: PartialRegistry;
}

/**
 * Render and write one report per ceiling.
 *
 * @returns Paths of the written reports.
 * @throws {RenderError} When no template can be loaded.
 */
export async function writeReports(options: WriteReportsOptions): Promise<string[]> {
  const { store, entry } = options;
  const template = await resolveTemplate(entry.templatePath, store.settings.defaultTemplatePath);
  const paths: string[] = [];

  for (const ceiling of reportCeilings(options.ceilings, entry, store.settings)) {
    const base = {
      entry: sectionSourceOf(entry),
      results: options.results,
      ceiling,
      generatedAt: options.generatedAt,
      username: store.settings.reportUsername,
      registry: options.registry,
    };
    const input: ReportInput =
      entry.kind === 'group'
        ? { ...base, mode: 'group', sections: options.leaves.map(sectionSourceOf) }
        : { ...base, mode: 'single' };

    const path = join(options.runDir, reportFileName(entry.name, options.generatedAt, ceiling));
    await writeFile(path, renderReport(input, template), 'utf-8');
    logger.info(`Wrote ${path}`);
    paths.push(path);
  }

  return paths;
}
