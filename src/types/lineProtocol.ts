/**
 * Decoded line-protocol structures.
 */

export type FieldValue =
  | { type: 'float'; value: number }
  | { type: 'integer'; value: bigint }
  | { type: 'unsigned'; value: bigint }
  | { type: 'boolean'; value: boolean }
  | { type: 'string'; value: string };

export interface Point {
  measurement: string;
  tags: Map<string, string>;
  fields: Map<string, FieldValue>;
  timestamp: bigint; // nanoseconds since epoch
}

/** Timestamp precisions accepted on the write path. Unknown values read as nanoseconds. */
export type Precision = 'n' | 'ns' | 'u' | 'us' | 'ms' | 's' | 'm' | 'h';

export interface ParseOptions {
  precision?: string;
  /** Fallback timestamp (ns) for lines without one. */
  now?: bigint;
}
