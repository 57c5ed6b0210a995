/**
 * Lookback calculator: the time window a query should search.
 *
 * Precedence, highest first:
 *   1. explicit run-time override (`--days`)
 *   2. the query's `last_run`
 *   3. the query's own `days`
 *   4. the store-wide `default_days`
 *
 * A `last_run` that does not parse or lies in the future is ignored.
 * The window always ends at `now`.
 */

import type { QueryDefinition } from '../types/config.js';
import { firstPresentOr } from '../utils/precedence.js';
import { DAY_MS, parseTimestamp } from '../utils/time.js';

export type WindowSource = 'override' | 'last_run' | 'query_days' | 'default_days';

export interface LookbackWindow {
  start: Date;
  end: Date;
  source: WindowSource;
}

export interface LookbackOptions {
  overrideDays?: number | null;
  defaultDays: number;
  now: Date;
}

type Candidate = { source: WindowSource; start: Date };

export function effectiveWindow(
  query: Pick<QueryDefinition, 'lastRun' | 'days'>,
  options: LookbackOptions,
): LookbackWindow {
  const { now } = options;
  const daysBefore = (days: number | null | undefined): Date | null =>
    days === null || days === undefined ? null : new Date(now.getTime() - days * DAY_MS);

  const lastRun = parseTimestamp(query.lastRun);
  const usableLastRun = lastRun && lastRun.getTime() <= now.getTime() ? lastRun : null;

  const candidate = (source: WindowSource, start: Date | null): Candidate | null =>
    start ? { source, start } : null;

  const chosen = firstPresentOr<Candidate>(
    { source: 'default_days', start: daysBefore(options.defaultDays) ?? now },
    candidate('override', daysBefore(options.overrideDays)),
    candidate('last_run', usableLastRun),
    candidate('query_days', daysBefore(query.days)),
  );

  return { start: chosen.start, end: now, source: chosen.source };
}

export function describeWindow(window: LookbackWindow): string {
  const days = (window.end.getTime() - window.start.getTime()) / DAY_MS;
  return `${window.start.toISOString()} .. ${window.end.toISOString()} (${days.toFixed(1)}d, from ${window.source})`;
}
