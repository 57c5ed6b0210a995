/**
 * Query store: loads and validates the configuration document and
 * resolves entry names to query or group definitions.
 *
 * Queries and groups share a single namespace (the `queries` mapping).
 * Relative paths in the document are resolved against the directory of
 * the configuration file.
 */

import { readFile } from 'node:fs/promises';
import { dirname, extname, resolve } from 'node:path';

import { ConfigurationError, UnknownQueryError, errorMessage } from '../errors.js';
import type {
  Classified,
  ConfigFormat,
  GroupDefinition,
  QueryDefinition,
  QueryEntry,
  QueryMetadata,
  StoreSettings,
  TlpLevel,
} from '../types/config.js';
import { createLogger } from '../utils/logger.js';
import { parseYaml } from '../utils/yaml.js';
import {
  RawDocumentSchema,
  RawGroupSchema,
  RawQuerySchema,
  formatIssues,
  type RawDocument,
  type RawMetadata,
} from './schema.js';

const log = createLogger('query-store');

export interface StoreSource {
  /** Path of the file the document was read from, if any. */
  path?: string;
  format?: ConfigFormat;
  /** Base directory for relative paths. Defaults to the file's directory, then cwd. */
  baseDir?: string;
}

export class QueryStore {
  private constructor(
    private readonly entries: Map<string, QueryEntry>,
    readonly settings: StoreSettings,
    /** The validated raw document, kept so state can be written back verbatim. */
    readonly document: RawDocument,
    readonly sourcePath: string | null,
    readonly format: ConfigFormat,
  ) {}

  /**
   * Read and validate a configuration file. `.yaml`/`.yml` files are parsed
   * as YAML, everything else as JSON.
   */
  static async load(path: string): Promise<QueryStore> {
    const absolute = resolve(path);
    const format = detectFormat(absolute);

    let text: string;
    try {
      text = await readFile(absolute, 'utf-8');
    } catch (err) {
      throw new ConfigurationError(
        `cannot read configuration file (${errorMessage(err)})`,
        absolute,
        { cause: err },
      );
    }

    let parsed: unknown;
    try {
      parsed = format === 'yaml' ? parseYaml(text) : JSON.parse(text);
    } catch (err) {
      throw new ConfigurationError(
        `invalid ${format.toUpperCase()} (${errorMessage(err)})`,
        absolute,
        { cause: err },
      );
    }

    log.debug(`Loaded ${format} configuration from ${absolute}`);
    return QueryStore.fromDocument(parsed, { path: absolute, format });
  }

  static fromDocument(input: unknown, source: StoreSource = {}): QueryStore {
    const path = source.path ?? null;
    const parsed = RawDocumentSchema.safeParse(input);
    if (!parsed.success) {
      throw new ConfigurationError(formatIssues(parsed.error), path ?? undefined);
    }

    const document = parsed.data;
    const baseDir = source.baseDir ?? (path ? dirname(path) : process.cwd());

    const entries = new Map<string, QueryEntry>();
    for (const [name, raw] of Object.entries(document.queries)) {
      entries.set(name, parseEntry(name, raw, baseDir, path));
    }

    const settings: StoreSettings = {
      outputDirectory: resolve(baseDir, document.output_directory),
      defaultDays: document.default_days,
      reportUsername: document.report_username,
      defaultTlp: document.default_tlp_level,
      defaultTemplatePath: document.default_template_path
        ? resolve(baseDir, document.default_template_path)
        : null,
    };

    return new QueryStore(entries, settings, document, path, source.format ?? 'json');
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /**
   * Look up an entry by name.
   * @throws UnknownQueryError when no query or group has that name.
   */
  get(name: string, referencedBy?: string): QueryEntry {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new UnknownQueryError(name, referencedBy);
    }
    return entry;
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  queries(): QueryDefinition[] {
    return [...this.entries.values()].filter((e): e is QueryDefinition => e.kind === 'query');
  }

  groups(): GroupDefinition[] {
    return [...this.entries.values()].filter((e): e is GroupDefinition => e.kind === 'group');
  }
}

// ---------------------------------------------------------------------------
// Entry parsing
// ---------------------------------------------------------------------------

function detectFormat(path: string): ConfigFormat {
  const ext = extname(path).toLowerCase();
  return ext === '.yaml' || ext === '.yml' ? 'yaml' : 'json';
}

function isGroupDocument(raw: unknown): boolean {
  return typeof raw === 'object' && raw !== null && 'type' in raw && raw.type === 'query_group';
}

function parseEntry(name: string, raw: unknown, baseDir: string, path: string | null): QueryEntry {
  const prefix = ['queries', name];

  if (isGroupDocument(raw)) {
    const result = RawGroupSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigurationError(formatIssues(result.error, prefix), path ?? undefined);
    }
    const group = result.data;
    return {
      kind: 'group',
      name,
      queries: group.queries,
      metadata: toMetadata(group),
      lastRun: group.last_run ?? null,
      defaultTlp: group.default_tlp_level ?? null,
      templatePath: group.template_path ? resolve(baseDir, group.template_path) : null,
    };
  }

  const result = RawQuerySchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error, prefix), path ?? undefined);
  }
  const query = result.data;
  return {
    kind: 'query',
    name,
    query: { value: query.query, tlp: query.query_tlp_level ?? 'clear' },
    platform: query.platform,
    endpoint: query.endpoint ?? null,
    days: query.days ?? null,
    metadata: toMetadata(query),
    lastRun: query.last_run ?? null,
    defaultTlp: query.default_tlp_level ?? null,
    templatePath: query.template_path ? resolve(baseDir, query.template_path) : null,
  };
}

// ---------------------------------------------------------------------------
// Metadata normalization: every field becomes Classified<string> pairs.
// ---------------------------------------------------------------------------

function classifyList<T extends { tlp_level?: TlpLevel }>(
  raw: string | Array<string | T> | undefined,
  pick: (item: T) => string,
  fieldLevel: TlpLevel | undefined,
): Classified<string>[] {
  if (raw === undefined) return [];
  const fallback = fieldLevel ?? 'clear';
  const items = typeof raw === 'string' ? [raw] : raw;
  return items.map((item) =>
    typeof item === 'string'
      ? { value: item, tlp: fallback }
      : { value: pick(item), tlp: item.tlp_level ?? fallback },
  );
}

function classifyValue(
  value: string | undefined,
  level: TlpLevel | undefined,
): Classified<string> | null {
  return value === undefined ? null : { value, tlp: level ?? 'clear' };
}

function toMetadata(raw: RawMetadata): QueryMetadata {
  return {
    description: classifyValue(raw.description, raw.description_tlp_level),
    notes: classifyList(raw.notes, (n) => n.text, raw.notes_tlp_level),
    references: classifyList(raw.references, (r) => r.url, raw.references_tlp_level),
    frequency: classifyValue(raw.frequency, raw.frequency_tlp_level),
    priority: classifyValue(raw.priority, raw.priority_tlp_level),
    tags: classifyList(raw.tags, (t) => t.tag, raw.tags_tlp_level),
    titles: classifyList(raw.titles, (t) => t.title, raw.titles_tlp_level),
  };
}
