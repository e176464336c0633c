import { describe, it, expect, afterEach } from 'vitest';
import { LineExporter } from '../core/LineExporter.ts';
import type { BuiltLineExporter } from '../core/LineExporter.ts';
import { loadConfig } from '../core/ExporterConfig.ts';
import { createLogger } from '../logging/logger.ts';
import { NOW_MS } from './helpers.ts';

const silent = createLogger({ silent: true });

describe('LineExporter', () => {
  let exporter: BuiltLineExporter | undefined;

  afterEach(async () => {
    await exporter?.stop();
    exporter = undefined;
  });

  function build(builder: LineExporter): BuiltLineExporter {
    exporter = builder.logger(silent).clock(() => NOW_MS).build();
    return exporter;
  }

  describe('build', () => {
    it('rejects a negative sample expiry', () => {
      expect(() => new LineExporter().sampleExpiry(-1).build()).toThrow('sampleExpiry');
    });

    it.each([0, -1, Number.NaN])('rejects a sweep interval of %s', (ms) => {
      expect(() => new LineExporter().sweepInterval(ms).build()).toThrow('sweepInterval');
    });

    it('rejects a metrics path without a leading slash', () => {
      expect(() => new LineExporter().metricsPath('metrics').build()).toThrow('metricsPath');
    });

    it('creates a UDP listener only when a bind address is set', () => {
      expect(build(new LineExporter()).udpListener).toBeUndefined();
    });

    it('takes its settings from a validated config', () => {
      const config = loadConfig({ sampleExpiryMs: '2m', metricsPath: '/prom', udpBindAddress: ':0' });
      const built = build(new LineExporter().configure(config));
      expect(built.context.sampleExpiryMs).toBe(120_000);
      expect(built.udpListener).toBeDefined();
    });
  });

  describe('ingest and scrape', () => {
    it('exposes ingested samples', async () => {
      const built = build(new LineExporter());
      await built.start();

      const result = built.ingest('cpu,host=a value=1.5,idle=3i 1700000000', 's');
      expect(result).toEqual({ status: 204, message: '', samples: 2 });
      await built.store.settled();

      const { body } = await built.scrape();
      const lines = body.split('\n');
      expect(lines).toContain('cpu{host="a"} 1.5');
      expect(lines).toContain('cpu_idle{host="a"} 3');
      expect(lines).toContain(`influxdb_last_push_timestamp_seconds ${NOW_MS / 1000}`);
    });

    it('reports parse errors without caching anything', async () => {
      const built = build(new LineExporter());
      await built.start();

      const result = built.ingest('cpu value=nope');
      expect(result.status).toBe(400);
      expect(result.samples).toBe(0);
      await built.store.settled();
      expect(built.store.size).toBe(0);
    });

    it('drops samples older than the configured expiry', async () => {
      const built = build(new LineExporter().sampleExpiry(60_000));
      await built.start();

      built.ingest(`old value=1 ${NOW_MS / 1000 - 120}\nnew value=2 ${NOW_MS / 1000 - 30}`, 's');
      await built.store.settled();

      const names = built.collector.liveSamples().map((s) => s.name);
      expect(names).toEqual(['new']);
    });
  });

  describe('fetchHandler', () => {
    it('serves the configured metrics path', async () => {
      const built = build(new LineExporter().metricsPath('/prom'));
      await built.start();
      const handler = built.fetchHandler();

      expect((await handler(new Request('http://localhost/prom'))).status).toBe(200);
      expect((await handler(new Request('http://localhost/metrics'))).status).toBe(404);
    });

    it('has no HTTP port without a listen address', async () => {
      const built = build(new LineExporter());
      await built.start();
      expect(built.httpPort).toBeUndefined();
    });
  });
});
