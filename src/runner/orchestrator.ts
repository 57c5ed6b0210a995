/**
 * Run orchestrator: executes targets (queries or groups) end to end.
 *
 * Per target: resolve leaves, compute each leaf's window, fetch, save
 * screenshots, normalize, write `raw_results.json`, render one report per
 * ceiling and export indicators. Targets are isolated: a failure marks
 * that target failed and the next one runs. A group fails as a whole when
 * any of its leaves fails. `last_run` is committed once, after every
 * target has finished, for the succeeded targets only.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { QueryStore } from '../config/query-store.js';
import { errorMessage } from '../errors.js';
import { consolidateIocs, extractIocs } from '../extraction/ioc-extractor.js';
import { normalize } from '../extraction/normalizer.js';
import type { ClientProvider } from '../platforms/index.js';
import { effectiveWindow, describeWindow } from '../query/lookback.js';
import { QueryResolver, uniqueLeaves, type ResolvedLeaf } from '../query/resolver.js';
import { exportIocs, runDirectoryName, type PartialRegistry } from '../reporting/index.js';
import type { TlpLevel } from '../types/config.js';
import type { ResolvedResult, Screenshot } from '../types/results.js';
import type { RunSummary, TargetOutcome } from '../types/run.js';
import { createLogger } from '../utils/logger.js';
import { toScreenshot, writeRawResults, type StoredBatch } from './raw-results.js';
import { writeReports } from './report-writer.js';
import type { StatePersister } from './state-persister.js';

const logger = createLogger('runner');

export const IMAGES_DIRECTORY = 'images';

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface RunOptions {
  /** `--days`; beats `last_run` when set. */
  overrideDays?: number | null;
  /** Report ceilings; empty means the entry's default. */
  ceilings?: TlpLevel[];
  extractIocs?: boolean;
}

export interface QueryRunnerDeps {
  store: QueryStore;
  clients: ClientProvider;
  /** Omit to run without writing `last_run` back. */
  persister?: StatePersister;
  registry?: PartialRegistry;
  now?: () => Date;
}

interface TargetRun {
  outcome: TargetOutcome;
  /** Entries whose `last_run` advances if the target succeeded. */
  commitNames: string[];
}

interface LeafFetch {
  batch: StoredBatch;
  results: ResolvedResult[];
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

export class QueryRunner {
  private readonly resolver: QueryResolver;
  private readonly now: () => Date;

  constructor(private readonly deps: QueryRunnerDeps) {
    this.resolver = new QueryResolver(deps.store);
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Run every target in order and commit `last_run` for the ones that
   * succeeded.
   */
  async run(targets: string[], options: RunOptions = {}): Promise<RunSummary> {
    const startedAt = this.now();
    const outcomes: TargetOutcome[] = [];
    const commitNames: string[] = [];

    for (const name of targets) {
      const run = await this.runTarget(name, startedAt, options);
      outcomes.push(run.outcome);
      if (run.outcome.status === 'succeeded') {
        commitNames.push(...run.commitNames);
      }
    }

    const committed = this.deps.persister ? await this.deps.persister.commit(commitNames, startedAt) : [];

    return {
      startedAt,
      durationMs: this.now().getTime() - startedAt.getTime(),
      outcomes,
      committed,
    };
  }

  private async runTarget(name: string, startedAt: Date, options: RunOptions): Promise<TargetRun> {
    const outcome: TargetOutcome = {
      name,
      kind: 'query',
      status: 'failed',
      leaves: [],
      resultCount: 0,
      iocCount: 0,
      runDirectory: null,
      reports: [],
      error: null,
    };

    try {
      const { store } = this.deps;
      const entry = store.get(name);
      outcome.kind = entry.kind;

      const leaves = uniqueLeaves(this.resolver.resolve(name));
      outcome.leaves = leaves.map((leaf) => leaf.query.name);
      logger.info(`Running ${entry.kind} "${name}" (${leaves.length} leaf quer${leaves.length === 1 ? 'y' : 'ies'})`);

      const runDir = join(store.settings.outputDirectory, runDirectoryName(name, startedAt, entry.kind === 'group'));
      await mkdir(join(runDir, IMAGES_DIRECTORY), { recursive: true });
      outcome.runDirectory = runDir;

      const batches: StoredBatch[] = [];
      const results: ResolvedResult[] = [];
      for (const leaf of leaves) {
        const fetched = await this.fetchLeaf(leaf, runDir, startedAt, options);
        batches.push(fetched.batch);
        results.push(...fetched.results);
      }
      outcome.resultCount = results.length;

      await writeRawResults(runDir, {
        name,
        kind: entry.kind,
        generatedAt: startedAt.toISOString(),
        batches,
      });

      outcome.reports = await writeReports({
        store,
        entry,
        leaves: leaves.map((leaf) => leaf.query),
        results,
        runDir,
        ceilings: options.ceilings ?? [],
        generatedAt: startedAt,
        registry: this.deps.registry,
      });

      if (options.extractIocs ?? true) {
        const extracted = extractIocs(results);
        const iocs = entry.kind === 'group' ? consolidateIocs(extracted) : extracted;
        const scanIds = [...new Set(results.map((r) => r.scanId).filter((id): id is string => id !== null))];
        await exportIocs(runDir, name, iocs, startedAt, scanIds);
        outcome.iocCount = iocs.length;
      }

      outcome.status = 'succeeded';
      return { outcome, commitNames: commitNamesFor(name, leaves) };
    } catch (err) {
      outcome.error = errorMessage(err);
      logger.error(`Target "${name}" failed: ${outcome.error}`);
      return { outcome, commitNames: [] };
    }
  }

  private async fetchLeaf(
    leaf: ResolvedLeaf,
    runDir: string,
    startedAt: Date,
    options: RunOptions,
  ): Promise<LeafFetch> {
    const { query } = leaf;
    const window = effectiveWindow(query, {
      overrideDays: options.overrideDays,
      defaultDays: this.deps.store.settings.defaultDays,
      now: startedAt,
    });
    const log = logger.child(query.name);
    log.info(`${query.platform} window ${describeWindow(window)}`);

    const client = this.deps.clients(query.platform);
    const batch = await client.search({ query: query.query.value, window, endpoint: query.endpoint });
    log.info(`${batch.records.length} result(s), data type ${batch.dataType}`);

    const stored: StoredBatch = {
      sourceQuery: query.name,
      platform: batch.platform,
      dataType: batch.dataType,
      records: [],
    };
    const results: ResolvedResult[] = [];

    for (const record of batch.records) {
      let screenshot: Screenshot | null = null;
      if (record.screenshotRef) {
        const bytes = await client.fetchScreenshot(record.screenshotRef);
        if (bytes) {
          const fileName = `${IMAGES_DIRECTORY}/${record.screenshotRef}.png`;
          await writeFile(join(runDir, fileName), bytes);
          screenshot = toScreenshot(fileName, bytes);
        }
      }
      stored.records.push({ payload: record.payload, screenshot: screenshot?.fileName ?? null });
      results.push(
        normalize(record, { platform: batch.platform, dataType: batch.dataType }, { sourceQuery: query.name, screenshot }),
      );
    }

    return { batch: stored, results };
  }
}

/** The target itself, every group walked through, and every leaf. */
function commitNamesFor(name: string, leaves: ResolvedLeaf[]): string[] {
  const names = new Set<string>([name]);
  for (const leaf of leaves) {
    for (const group of leaf.groupPath) names.add(group);
    names.add(leaf.query.name);
  }
  return [...names];
}
