/**
 * Converts decoded line-protocol points to cached Samples.
 *
 *  - one Sample per float, integer or boolean field; other field types are skipped
 *  - field "value" keeps the bare measurement name, any other field is
 *    appended as `measurement_field`
 *  - metric names and tag keys are sanitized; tag values are copied as-is
 *  - the fingerprint is derived from the unsanitized name and the sorted labels
 */

import type { FieldValue, Point } from '../types/lineProtocol.ts';
import type { Sample } from '../types/sample.ts';
import { sanitizeName } from '../util/sanitize.ts';

/** Numeric value of a field, or undefined for types that are not exposed. */
export function coerceFieldValue(field: FieldValue): number | undefined {
  switch (field.type) {
    case 'float':
      return field.value;
    case 'integer':
      return Number(field.value);
    case 'boolean':
      return field.value ? 1 : 0;
    case 'unsigned':
    case 'string':
      return undefined;
  }
}

/** Metric name before sanitization. */
export function deriveName(measurement: string, fieldKey: string): string {
  return fieldKey === 'value' ? measurement : `${measurement}_${fieldKey}`;
}

/**
 * Deterministic series identity: a JSON string list of the name followed by
 * each label key and value, keys in ascending order.
 */
export function fingerprint(name: string, labels: ReadonlyMap<string, string>): string {
  const parts = [name];
  for (const key of [...labels.keys()].sort()) {
    parts.push(key, labels.get(key) ?? '');
  }
  return JSON.stringify(parts);
}

function sanitizeTags(tags: ReadonlyMap<string, string>): Map<string, string> {
  const labels = new Map<string, string>();
  for (const [key, value] of tags) {
    labels.set(sanitizeName(key), value);
  }
  return labels;
}

/** Translate one point into zero or more Samples. */
export function pointToSamples(point: Point): Sample[] {
  const result: Sample[] = [];
  const labels = sanitizeTags(point.tags);

  for (const [key, field] of point.fields) {
    const value = coerceFieldValue(field);
    if (value === undefined) continue;

    const rawName = deriveName(point.measurement, key);
    result.push({
      fingerprint: fingerprint(rawName, labels),
      name: sanitizeName(rawName),
      labels,
      value,
      timestamp: point.timestamp,
    });
  }

  return result;
}
