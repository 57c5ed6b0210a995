/**
 * TLP redaction engine.
 *
 * Pure functions deciding which classified metadata a report may show.
 * A value is visible iff its level ranks at or below the report ceiling.
 * `white` is the TLP 1.0 name for `clear` and ranks with it.
 */

import type { Classified, QueryMetadata, TlpLevel } from '../types/config.js';
import { TLP_LEVELS } from '../types/config.js';
import { firstPresentOr } from '../utils/precedence.js';

const TLP_RANK: Record<TlpLevel, number> = {
  clear: 0,
  white: 0,
  green: 1,
  amber: 2,
  red: 3,
};

export function tlpRank(level: TlpLevel): number {
  return TLP_RANK[level];
}

export function isTlpLevel(value: string): value is TlpLevel {
  return (TLP_LEVELS as readonly string[]).includes(value);
}

/** An absent field level counts as `clear`. */
export function isVisible(field: TlpLevel | null | undefined, ceiling: TlpLevel): boolean {
  return tlpRank(field ?? 'clear') <= tlpRank(ceiling);
}

export function visibleValue<T>(item: Classified<T> | null, ceiling: TlpLevel): T | null {
  return item && isVisible(item.tlp, ceiling) ? item.value : null;
}

export function visibleItems<T>(items: Classified<T>[], ceiling: TlpLevel): T[] {
  return items.filter((item) => isVisible(item.tlp, ceiling)).map((item) => item.value);
}

/**
 * Pick the most detailed title the ceiling allows: the highest-ranked
 * visible title, the first declared one on ties.
 */
export function selectTitle(titles: Classified<string>[], ceiling: TlpLevel): string | null {
  let best: Classified<string> | null = null;
  for (const title of titles) {
    if (!isVisible(title.tlp, ceiling)) continue;
    if (best === null || tlpRank(title.tlp) > tlpRank(best.tlp)) {
      best = title;
    }
  }
  return best?.value ?? null;
}

export interface VisibleMetadata {
  title: string | null;
  description: string | null;
  notes: string[];
  references: string[];
  frequency: string | null;
  priority: string | null;
  tags: string[];
}

export function redactMetadata(metadata: QueryMetadata, ceiling: TlpLevel): VisibleMetadata {
  return {
    title: selectTitle(metadata.titles, ceiling),
    description: visibleValue(metadata.description, ceiling),
    notes: visibleItems(metadata.notes, ceiling),
    references: visibleItems(metadata.references, ceiling),
    frequency: visibleValue(metadata.frequency, ceiling),
    priority: visibleValue(metadata.priority, ceiling),
    tags: visibleItems(metadata.tags, ceiling),
  };
}

/** The most sensitive level carried by any metadata value. */
export function highestTlpLevel(metadata: QueryMetadata, extra: TlpLevel[] = []): TlpLevel {
  const levels: TlpLevel[] = [
    ...extra,
    ...[metadata.description, metadata.frequency, metadata.priority]
      .filter((item): item is Classified<string> => item !== null)
      .map((item) => item.tlp),
    ...[...metadata.notes, ...metadata.references, ...metadata.tags, ...metadata.titles].map(
      (item) => item.tlp,
    ),
  ];

  return levels.reduce<TlpLevel>(
    (highest, level) => (tlpRank(level) > tlpRank(highest) ? level : highest),
    'clear',
  );
}

/**
 * Report ceiling: the requested level, else the entry default, else the
 * store-wide default.
 */
export function resolveCeiling(
  requested: TlpLevel | null | undefined,
  entryDefault: TlpLevel | null | undefined,
  globalDefault: TlpLevel,
): TlpLevel {
  return firstPresentOr(globalDefault, requested, entryDefault);
}

/** `TLP:AMBER` */
export function tlpLabel(level: TlpLevel): string {
  return `TLP:${level.toUpperCase()}`;
}
