/**
 * Process-wide exporter state, constructed once and handed to every
 * component: the metrics registry with the exporter's own metrics, the
 * logger, the clock and the sample expiry window.
 */

import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';
import type { Sample } from '../types/sample.ts';
import { createLogger } from '../logging/logger.ts';
import type { Logger } from '../logging/logger.ts';

export const DEFAULT_SAMPLE_EXPIRY_MS = 5 * 60_000;

export interface ExporterContextOptions {
  sampleExpiryMs?: number;
  logger?: Logger;
  /** Milliseconds since epoch; defaults to Date.now. */
  clock?: () => number;
  /** Also expose prom-client's process metrics. */
  processMetrics?: boolean;
}

export class ExporterContext {
  readonly registry = new Registry();
  readonly logger: Logger;
  readonly sampleExpiryMs: number;
  readonly lastPush: Gauge;
  readonly udpParseErrors: Counter;
  private readonly clock: () => number;

  constructor(options: ExporterContextOptions = {}) {
    this.sampleExpiryMs = options.sampleExpiryMs ?? DEFAULT_SAMPLE_EXPIRY_MS;
    this.logger = options.logger ?? createLogger();
    this.clock = options.clock ?? Date.now;

    this.lastPush = new Gauge({
      name: 'influxdb_last_push_timestamp_seconds',
      help: 'Unix timestamp of the last received influxdb metrics push in seconds.',
      registers: [this.registry],
    });
    this.udpParseErrors = new Counter({
      name: 'influxdb_udp_parse_errors_total',
      help: 'Current total udp parse errors.',
      registers: [this.registry],
    });

    if (options.processMetrics) {
      collectDefaultMetrics({ register: this.registry });
    }
  }

  /** Milliseconds since epoch. */
  now(): number {
    return this.clock();
  }

  /** Record an accepted ingestion request on the liveness gauge. */
  markPush(): void {
    this.lastPush.set(this.now() / 1000);
  }

  /** Oldest event time (ns) a sample may carry and still be exposed. */
  cutoff(): bigint {
    return BigInt(Math.floor(this.now() - this.sampleExpiryMs)) * 1_000_000n;
  }

  isExpired(sample: Sample, cutoff = this.cutoff()): boolean {
    return sample.timestamp < cutoff;
  }
}
