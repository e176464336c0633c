import { bench, group, run } from 'mitata';
import { parsePoints } from './src/proto/lineProtocol.ts';
import { pointToSamples, fingerprint } from './src/transform/pointToSamples.ts';
import { sanitizeName } from './src/util/sanitize.ts';
import { LineExporter } from './src/core/LineExporter.ts';
import { createLogger } from './src/logging/logger.ts';

// ─── Fixtures ──────────────────────────────────────────────────────────────

function makePayload(measurements: number, hosts: number): string {
  const lines: string[] = [];
  for (let m = 0; m < measurements; m++) {
    for (let h = 0; h < hosts; h++) {
      lines.push(
        `metric_${m},host=host-${h},region=us-east-1,env=prod value=${m * h},idle=0.5,up=true,count=${h}i 1700000000000000000`
      );
    }
  }
  return lines.join('\n');
}

const smallPayload = makePayload(1, 1);
const medPayload = makePayload(10, 5);    // 50 lines → 200 samples
const largePayload = makePayload(50, 10); // 500 lines → 2000 samples

const medPoints = parsePoints(medPayload);
const largePoints = parsePoints(largePayload);

const labels = new Map([
  ['env', 'prod'],
  ['host', 'host-1'],
  ['region', 'us-east-1'],
]);

const exporter = new LineExporter()
  .logger(createLogger({ silent: true }))
  .sampleExpiry(Number.MAX_SAFE_INTEGER / 2)
  .build();
exporter.store.start();
exporter.ingest(largePayload);
await exporter.store.settled();

// ─── Benchmarks ────────────────────────────────────────────────────────────

group('sanitize', () => {
  bench('clean name', () => sanitizeName('cpu_usage_idle'));
  bench('dotted name', () => sanitizeName('my.metric-name.with.dots'));
});

group('fingerprint', () => {
  bench('3 labels', () => fingerprint('cpu', labels));
  bench('no labels', () => fingerprint('cpu', new Map()));
});

group('line protocol decode', () => {
  bench('1 line', () => parsePoints(smallPayload));
  bench('50 lines', () => parsePoints(medPayload));
  bench('500 lines', () => parsePoints(largePayload));
});

group('point → samples', () => {
  bench('50 points', () => medPoints.flatMap(pointToSamples));
  bench('500 points', () => largePoints.flatMap(pointToSamples));
});

group('pipeline end-to-end', () => {
  bench('medium payload (200 samples)', () => exporter.ingest(medPayload));
  bench('large payload (2000 samples)', () => exporter.ingest(largePayload));
});

group('scrape', () => {
  bench('2000 cached samples', () => exporter.scrape());
});

await run({ format: 'mitata', colors: true });
await exporter.stop();
