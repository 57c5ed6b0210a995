/**
 * Error taxonomy for masqwatch.
 *
 * Every error raised by the pipeline extends MasqwatchError so the CLI can
 * tell expected failures (bad config, unknown query, upstream outage) from
 * programming errors.
 */

import type { Platform } from './types/config.js';

export class MasqwatchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MasqwatchError';
  }
}

/** Malformed or missing configuration. Fatal before any query runs. */
export class ConfigurationError extends MasqwatchError {
  constructor(
    message: string,
    public readonly configPath?: string,
    options?: { cause?: unknown },
  ) {
    super(configPath ? `${configPath}: ${message}` : message, options);
    this.name = 'ConfigurationError';
  }
}

/** Missing or malformed `raw_results.json` given to `report`. */
export class StoredResultsError extends MasqwatchError {
  constructor(
    message: string,
    public readonly resultsPath: string,
    options?: { cause?: unknown },
  ) {
    super(`${resultsPath}: ${message}`, options);
    this.name = 'StoredResultsError';
  }
}

export class UnknownQueryError extends MasqwatchError {
  constructor(
    public readonly queryName: string,
    public readonly referencedBy?: string,
  ) {
    super(
      referencedBy
        ? `Query "${queryName}" (referenced by group "${referencedBy}") is not defined`
        : `Query "${queryName}" is not defined`,
    );
    this.name = 'UnknownQueryError';
  }
}

export class CircularReferenceError extends MasqwatchError {
  constructor(public readonly cycle: string[]) {
    super(`Circular query group reference: ${cycle.join(' -> ')}`);
    this.name = 'CircularReferenceError';
  }
}

/** Upstream fetch failure: network, auth, rate limit or malformed body. */
export class PlatformError extends MasqwatchError {
  constructor(
    public readonly platform: Platform,
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(`${platform}: ${message}`, options);
    this.name = 'PlatformError';
  }
}

export class RenderError extends MasqwatchError {
  constructor(
    message: string,
    public readonly templatePath?: string,
    options?: { cause?: unknown },
  ) {
    super(templatePath ? `${message} (template: ${templatePath})` : message, options);
    this.name = 'RenderError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
