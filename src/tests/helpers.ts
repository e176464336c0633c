import { ExporterContext } from '../core/ExporterContext.ts';
import type { ExporterContextOptions } from '../core/ExporterContext.ts';
import { createLogger } from '../logging/logger.ts';
import type { Sample } from '../types/sample.ts';
import { fingerprint } from '../transform/pointToSamples.ts';

/** 2023-11-14T22:13:20Z */
export const NOW_MS = 1_700_000_000_000;
export const NOW_NS = BigInt(NOW_MS) * 1_000_000n;
export const EXPIRY_MS = 5 * 60_000;

export function makeContext(options: ExporterContextOptions = {}): ExporterContext {
  return new ExporterContext({
    sampleExpiryMs: EXPIRY_MS,
    logger: createLogger({ silent: true }),
    clock: () => NOW_MS,
    ...options,
  });
}

export function makeSample(
  name: string,
  labels: Record<string, string>,
  value: number,
  timestamp: bigint = NOW_NS
): Sample {
  const map = new Map(Object.entries(labels));
  return { fingerprint: fingerprint(name, map), name, labels: map, value, timestamp };
}
