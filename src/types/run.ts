/**
 * Per-invocation run outcome types.
 */

export type TargetKind = 'query' | 'group';

export interface TargetOutcome {
  name: string;
  kind: TargetKind;
  status: 'succeeded' | 'failed';
  /** Leaf queries executed for this target, in execution order. */
  leaves: string[];
  resultCount: number;
  iocCount: number;
  runDirectory: string | null;
  reports: string[];
  error: string | null;
}

export interface RunSummary {
  startedAt: Date;
  durationMs: number;
  outcomes: TargetOutcome[];
  /** Entries whose `last_run` was advanced. */
  committed: string[];
}
