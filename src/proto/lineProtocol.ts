/**
 * InfluxDB line-protocol decoder.
 *
 *   measurement[,tag=value...] field=value[,field=value...] [timestamp]
 *
 * Each line is scanned once into three sections (key, fields, timestamp),
 * splitting on unescaped spaces. Quotes only matter inside the field
 * section, where string values may contain spaces and commas. The key and
 * field sections are then split on unescaped commas and equals signs, and
 * escapes are removed last.
 *
 * Decoding is all-or-nothing: the first malformed line throws and no points
 * from the payload are returned.
 */

import type { FieldValue, ParseOptions, Point, Precision } from '../types/lineProtocol.ts';

const DEC = new TextDecoder();

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;

const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_RE = /^[+-]?\d+i$/;
const UNSIGNED_RE = /^\d+u$/;
const TIMESTAMP_RE = /^-?\d+$/;

const TRUE_VALUES = new Set(['t', 'T', 'true', 'True', 'TRUE']);
const FALSE_VALUES = new Set(['f', 'F', 'false', 'False', 'FALSE']);

const PRECISION_MULTIPLIERS: Record<Precision, bigint> = {
  n: 1n,
  ns: 1n,
  u: 1_000n,
  us: 1_000n,
  ms: 1_000_000n,
  s: 1_000_000_000n,
  m: 60_000_000_000n,
  h: 3_600_000_000_000n,
};

export class LineProtocolError extends Error {
  constructor(
    readonly line: string,
    readonly lineNumber: number,
    readonly reason: string
  ) {
    super(`unable to parse '${line}': ${reason}`);
    this.name = 'LineProtocolError';
  }
}

/** Thrown inside a line; rewrapped with the line text by parsePoints. */
class LineSyntaxError extends Error {}

function isPrecision(p: string): p is Precision {
  return Object.hasOwn(PRECISION_MULTIPLIERS, p);
}

/** Nanosecond multiplier for a precision string; unknown precisions read as nanoseconds. */
export function precisionMultiplier(precision: string | undefined): bigint {
  if (precision && isPrecision(precision)) return PRECISION_MULTIPLIERS[precision];
  return 1n;
}

// ─── Scanning ───────────────────────────────────────────────────────────────

/** Split a line into sections on runs of unescaped spaces, honouring quotes in the field section. */
function splitSections(line: string): string[] {
  const sections: string[] = [];
  let start = 0;
  let inQuote = false;
  let i = 0;

  while (i < line.length) {
    const ch = line[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === '"' && sections.length === 1) {
      inQuote = !inQuote;
    } else if (ch === ' ' && !inQuote) {
      if (i > start) sections.push(line.slice(start, i));
      start = i + 1;
    }
    i++;
  }
  if (inQuote) throw new LineSyntaxError('unterminated string');
  if (start < line.length) sections.push(line.slice(start));
  return sections;
}

/** Split on an unescaped separator. Quotes are honoured when `quoted` is set. */
function splitUnescaped(s: string, sep: string, quoted = false): string[] {
  const parts: string[] = [];
  let start = 0;
  let inQuote = false;
  for (let i = 0; i < s.length; i++) {
    const ch = s[i];
    if (ch === '\\') {
      i++;
      continue;
    }
    if (quoted && ch === '"') {
      inQuote = !inQuote;
    } else if (ch === sep && !inQuote) {
      parts.push(s.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(s.slice(start));
  return parts;
}

/** Index of the first unescaped `=`, or -1. */
function indexOfEquals(s: string): number {
  for (let i = 0; i < s.length; i++) {
    const ch = s[i];
    if (ch === '\\') {
      i++;
      continue;
    }
    if (ch === '=') return i;
  }
  return -1;
}

function unescapeMeasurement(s: string): string {
  return s.replace(/\\([, ])/g, '$1');
}

function unescapeKey(s: string): string {
  return s.replace(/\\([,= ])/g, '$1');
}

function unescapeString(s: string): string {
  return s.replace(/\\(["\\])/g, '$1');
}

// ─── Values ─────────────────────────────────────────────────────────────────

function parseFieldValue(raw: string): FieldValue {
  if (raw.length === 0) throw new LineSyntaxError('missing field value');

  if (raw.startsWith('"')) {
    // splitSections already rejected unbalanced quotes; this catches `"a"b`.
    if (raw.length < 2 || !raw.endsWith('"')) throw new LineSyntaxError('invalid field value');
    return { type: 'string', value: unescapeString(raw.slice(1, -1)) };
  }
  if (INTEGER_RE.test(raw)) {
    const value = BigInt(raw.slice(0, -1));
    if (value < INT64_MIN || value > INT64_MAX) throw new LineSyntaxError('integer out of range');
    return { type: 'integer', value };
  }
  if (UNSIGNED_RE.test(raw)) {
    const value = BigInt(raw.slice(0, -1));
    if (value > UINT64_MAX) throw new LineSyntaxError('unsigned integer out of range');
    return { type: 'unsigned', value };
  }
  if (TRUE_VALUES.has(raw)) return { type: 'boolean', value: true };
  if (FALSE_VALUES.has(raw)) return { type: 'boolean', value: false };
  if (FLOAT_RE.test(raw)) {
    const value = Number(raw);
    if (!Number.isFinite(value)) throw new LineSyntaxError('invalid field value');
    return { type: 'float', value };
  }
  throw new LineSyntaxError('invalid field value');
}

function parseTimestamp(raw: string | undefined, multiplier: bigint, now: bigint): bigint {
  if (raw === undefined) return now;
  if (!TIMESTAMP_RE.test(raw)) throw new LineSyntaxError('invalid timestamp');
  const value = BigInt(raw);
  if (value < INT64_MIN || value > INT64_MAX) throw new LineSyntaxError('invalid timestamp');
  return value * multiplier;
}

// ─── Lines ──────────────────────────────────────────────────────────────────

function parseLine(line: string, multiplier: bigint, now: bigint): Point {
  const sections = splitSections(line);
  const [keySection, fieldSection, tsSection, ...rest] = sections;
  if (keySection === undefined) throw new LineSyntaxError('missing measurement');
  if (fieldSection === undefined) throw new LineSyntaxError('missing fields');
  if (rest.length > 0) throw new LineSyntaxError('unexpected data after timestamp');

  const [rawMeasurement = '', ...rawTags] = splitUnescaped(keySection, ',');
  const measurement = unescapeMeasurement(rawMeasurement);
  if (measurement.length === 0) throw new LineSyntaxError('missing measurement');

  const tags = new Map<string, string>();
  for (const rawTag of rawTags) {
    const eq = indexOfEquals(rawTag);
    if (eq <= 0) throw new LineSyntaxError('missing tag key');
    const value = rawTag.slice(eq + 1);
    if (value.length === 0) throw new LineSyntaxError('missing tag value');
    tags.set(unescapeKey(rawTag.slice(0, eq)), unescapeKey(value));
  }

  const fields = new Map<string, FieldValue>();
  for (const rawField of splitUnescaped(fieldSection, ',', true)) {
    const eq = indexOfEquals(rawField);
    if (eq < 0) throw new LineSyntaxError('missing field value');
    if (eq === 0) throw new LineSyntaxError('missing field key');
    fields.set(unescapeKey(rawField.slice(0, eq)), parseFieldValue(rawField.slice(eq + 1)));
  }

  return { measurement, tags, fields, timestamp: parseTimestamp(tsSection, multiplier, now) };
}

/**
 * Decode a line-protocol payload.
 * @throws LineProtocolError on the first malformed line
 */
export function parsePoints(payload: string | Uint8Array, options: ParseOptions = {}): Point[] {
  const text = typeof payload === 'string' ? payload : DEC.decode(payload);
  const multiplier = precisionMultiplier(options.precision);
  const now = options.now ?? BigInt(Date.now()) * 1_000_000n;

  const points: Point[] = [];
  const lines = text.split('\n');
  for (let i = 0; i < lines.length; i++) {
    let line = lines[i] ?? '';
    if (line.endsWith('\r')) line = line.slice(0, -1);
    const trimmed = line.trimStart();
    if (trimmed.length === 0 || trimmed.startsWith('#')) continue;

    try {
      points.push(parseLine(trimmed, multiplier, now));
    } catch (err) {
      if (err instanceof LineSyntaxError) {
        throw new LineProtocolError(trimmed, i + 1, err.message);
      }
      throw err;
    }
  }
  return points;
}
