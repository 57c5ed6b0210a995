/**
 * Ordered override resolution.
 *
 * Defaults cascade (CLI flag → entry → file-level → built-in) are written as
 * a single call listing every candidate, highest precedence first.
 */

export function firstPresent<T>(...candidates: Array<T | null | undefined>): T | undefined {
  for (const candidate of candidates) {
    if (candidate !== null && candidate !== undefined) {
      return candidate;
    }
  }
  return undefined;
}

/** Like firstPresent, with a guaranteed fallback as the last candidate. */
export function firstPresentOr<T>(fallback: T, ...candidates: Array<T | null | undefined>): T {
  return firstPresent(...candidates) ?? fallback;
}
