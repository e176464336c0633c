/**
 * Scrape-time exposition.
 *
 * Each scrape renders the exporter's own registry, then builds a throwaway
 * registry holding one untyped family per cached metric name. Samples past
 * the expiry cutoff are filtered here as well as by the sweep, since a
 * scrape can land between sweep ticks.
 */

import { Registry } from 'prom-client';
import type { Sample } from '../types/sample.ts';
import type { ExporterContext } from './ExporterContext.ts';
import type { SampleStore } from './SampleStore.ts';

export const SAMPLE_HELP = 'InfluxDB Metric';

const METRIC_NAME_RE = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const LABEL_NAME_RE = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export interface Exposition {
  contentType: string;
  body: string;
}

interface UntypedValue {
  value: number;
  labels: Record<string, string>;
}

interface UntypedMetricObject {
  name: string;
  help: string;
  type: 'untyped';
  aggregator: 'sum';
  values: UntypedValue[];
}

/** One metric family exposed with `# TYPE <name> untyped`. */
export class UntypedFamily {
  readonly help = SAMPLE_HELP;

  constructor(
    readonly name: string,
    private readonly values: UntypedValue[]
  ) {}

  async get(): Promise<UntypedMetricObject> {
    return { name: this.name, help: this.help, type: 'untyped', aggregator: 'sum', values: this.values };
  }
}

/**
 * prom-client's registry renders any object with a `name` and `get()`, but its
 * typings only admit the built-in metric classes.
 */
interface FamilySink {
  registerMetric(metric: { get(): Promise<unknown> }): void;
}

export function isValidMetricName(name: string): boolean {
  return METRIC_NAME_RE.test(name);
}

export function isValidLabelName(name: string): boolean {
  return LABEL_NAME_RE.test(name) && !name.startsWith('__');
}

/** Group samples by exposed name, preserving first-seen order. */
export function groupByName(samples: Sample[]): Map<string, Sample[]> {
  const groups = new Map<string, Sample[]>();
  for (const sample of samples) {
    const group = groups.get(sample.name);
    if (group) {
      group.push(sample);
    } else {
      groups.set(sample.name, [sample]);
    }
  }
  return groups;
}

export class Collector {
  constructor(
    private readonly ctx: ExporterContext,
    private readonly store: SampleStore
  ) {}

  /** Samples that would be exposed right now. */
  liveSamples(): Sample[] {
    const cutoff = this.ctx.cutoff();
    return this.store.snapshot().filter((s) => !this.ctx.isExpired(s, cutoff));
  }

  async collect(): Promise<Exposition> {
    const sampleRegistry = new Registry();
    const sink: FamilySink = sampleRegistry;

    for (const [name, samples] of groupByName(this.liveSamples())) {
      if (!isValidMetricName(name)) {
        this.ctx.logger.warn('cannot expose cached metric, skipping', { name, error: 'invalid metric name' });
        continue;
      }
      if (this.ctx.registry.getSingleMetric(name)) {
        this.ctx.logger.warn('cached metric collides with an exporter metric, skipping', { name });
        continue;
      }
      const values = this.toValues(name, samples);
      if (values.length > 0) sink.registerMetric(new UntypedFamily(name, values));
    }

    const parts = await Promise.all([this.ctx.registry.metrics(), sampleRegistry.metrics()]);
    const body = parts
      .map((p) => p.trim())
      .filter((p) => p.length > 0)
      .join('\n');

    return { contentType: this.ctx.registry.contentType, body: `${body}\n` };
  }

  /** One value per label set; series whose raw names sanitize alike collapse onto the latest. */
  private toValues(name: string, samples: Sample[]): UntypedValue[] {
    const values = new Map<string, UntypedValue & { timestamp: bigint }>();
    for (const sample of samples) {
      const keys = [...sample.labels.keys()].sort();
      const invalid = keys.find((key) => !isValidLabelName(key));
      if (invalid !== undefined) {
        this.ctx.logger.warn('cannot expose cached series, skipping', { name, label: invalid });
        continue;
      }
      const labels: Record<string, string> = {};
      for (const key of keys) labels[key] = sample.labels.get(key) ?? '';
      const id = JSON.stringify(Object.entries(labels));
      const previous = values.get(id);
      if (!previous || sample.timestamp >= previous.timestamp) {
        values.set(id, { value: sample.value, labels, timestamp: sample.timestamp });
      }
    }
    return [...values.values()].map(({ value, labels }) => ({ value, labels }));
  }
}
