/**
 * Cached sample data structures.
 * One Sample is one scalar series value as exposed to scrapers.
 */

export interface Sample {
  /** Store key: a pure function of the derived name and the sorted labels. */
  fingerprint: string;
  name: string;
  labels: ReadonlyMap<string, string>;
  value: number;
  timestamp: bigint; // nanoseconds since epoch, event time
}
