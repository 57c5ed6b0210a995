/**
 * Configuration types for masqwatch.
 *
 * These are the normalized, in-memory shapes produced by the query store
 * after the raw configuration document has been validated. The raw
 * (snake_case) document shape lives in `config/schema.ts`.
 */

// --- TLP ---

export const TLP_LEVELS = ['clear', 'white', 'green', 'amber', 'red'] as const;

export type TlpLevel = (typeof TLP_LEVELS)[number];

/** A metadata value paired with its own TLP classification. */
export interface Classified<T> {
  value: T;
  tlp: TlpLevel;
}

// --- Platforms ---

export const PLATFORMS = ['urlscan', 'silentpush'] as const;

export type Platform = (typeof PLATFORMS)[number];

// --- Query entries ---

export interface QueryMetadata {
  description: Classified<string> | null;
  notes: Classified<string>[];
  references: Classified<string>[];
  frequency: Classified<string> | null;
  priority: Classified<string> | null;
  tags: Classified<string>[];
  titles: Classified<string>[];
}

interface EntryBase {
  name: string;
  metadata: QueryMetadata;
  /** Raw `last_run` string as stored; may be malformed. */
  lastRun: string | null;
  /** Entry-level default report ceiling. */
  defaultTlp: TlpLevel | null;
  templatePath: string | null;
}

export interface QueryDefinition extends EntryBase {
  kind: 'query';
  query: Classified<string>;
  platform: Platform;
  endpoint: string | null;
  days: number | null;
}

export interface GroupDefinition extends EntryBase {
  kind: 'group';
  /** Member names, in declared order. */
  queries: string[];
}

export type QueryEntry = QueryDefinition | GroupDefinition;

// --- Store-wide settings ---

export interface StoreSettings {
  outputDirectory: string;
  defaultDays: number;
  reportUsername: string;
  defaultTlp: TlpLevel;
  defaultTemplatePath: string | null;
}

export type ConfigFormat = 'json' | 'yaml';
