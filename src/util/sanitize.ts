/**
 * Metric and label name sanitization for the Prometheus exposition format.
 */

const INVALID_CHARS = /[^a-zA-Z0-9_]/gu;

/** Replace every code point outside `[a-zA-Z0-9_]` with `_`. Idempotent. */
export function sanitizeName(name: string): string {
  return name.replace(INVALID_CHARS, '_');
}
