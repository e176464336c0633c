// LineExporter fluent builder and built instance.
//
// Usage:
//   const exporter = new LineExporter()
//     .sampleExpiry(5 * 60_000)
//     .metricsPath('/metrics')
//     .listen(':9122')
//     .udp(':9122')
//     .build();
//
//   await exporter.start();
//   http.createServer(exporter.nodeListener()).listen(8080); // or embed the handler yourself

import { createServer } from 'node:http';
import type { Server } from 'node:http';
import type { Logger } from '../logging/logger.ts';
import type { ExporterConfig } from './ExporterConfig.ts';
import { ExporterContext, DEFAULT_SAMPLE_EXPIRY_MS } from './ExporterContext.ts';
import { SampleStore, SWEEP_INTERVAL_MS } from './SampleStore.ts';
import { Pipeline } from './Pipeline.ts';
import type { PipelineResult } from './Pipeline.ts';
import { Collector } from './Collector.ts';
import type { Exposition } from './Collector.ts';
import { createHttpHandler } from '../adapters/http.ts';
import type { FetchHandler } from '../adapters/http.ts';
import { toNodeListener } from '../adapters/node.ts';
import { UdpListener } from '../adapters/udp.ts';
import { parseHostPort } from '../util/address.ts';

/** LineExporter fluent builder. */
export class LineExporter {
  private _sampleExpiryMs = DEFAULT_SAMPLE_EXPIRY_MS;
  private _metricsPath = '/metrics';
  private _listenAddress?: string;
  private _udpBindAddress?: string;
  private _logger?: Logger;
  private _clock?: () => number;
  private _sweepIntervalMs = SWEEP_INTERVAL_MS;
  private _processMetrics = false;

  /** Apply a validated configuration in one go. */
  configure(config: ExporterConfig): this {
    return this.sampleExpiry(config.sampleExpiryMs)
      .metricsPath(config.metricsPath)
      .listen(config.listenAddress)
      .udp(config.udpBindAddress)
      .processMetrics(config.processMetrics);
  }

  /** How long a sample stays exposed after its own timestamp, in milliseconds. */
  sampleExpiry(ms: number): this {
    this._sampleExpiryMs = ms;
    return this;
  }

  metricsPath(path: string): this {
    this._metricsPath = path;
    return this;
  }

  /** HTTP listen address for start(). Without it start() serves no HTTP. */
  listen(address: string): this {
    this._listenAddress = address;
    return this;
  }

  /** UDP bind address for start(). Without it start() binds no UDP socket. */
  udp(address: string): this {
    this._udpBindAddress = address;
    return this;
  }

  logger(logger: Logger): this {
    this._logger = logger;
    return this;
  }

  /** Clock in milliseconds since epoch (tests pin it). */
  clock(clock: () => number): this {
    this._clock = clock;
    return this;
  }

  sweepInterval(ms: number): this {
    this._sweepIntervalMs = ms;
    return this;
  }

  /** Also expose prom-client's process metrics on the scrape. */
  processMetrics(enabled: boolean): this {
    this._processMetrics = enabled;
    return this;
  }

  build(): BuiltLineExporter {
    if (!Number.isFinite(this._sampleExpiryMs) || this._sampleExpiryMs < 0) {
      throw new Error('LineExporter: sampleExpiry must be a non-negative number of milliseconds');
    }
    if (!Number.isFinite(this._sweepIntervalMs) || this._sweepIntervalMs <= 0) {
      throw new Error('LineExporter: sweepInterval must be a positive number of milliseconds');
    }
    if (!this._metricsPath.startsWith('/')) {
      throw new Error('LineExporter: metricsPath must start with "/"');
    }
    const ctx = new ExporterContext({
      sampleExpiryMs: this._sampleExpiryMs,
      logger: this._logger,
      clock: this._clock,
      processMetrics: this._processMetrics,
    });
    const store = new SampleStore(ctx, { sweepIntervalMs: this._sweepIntervalMs });
    return new BuiltLineExporter(ctx, store, {
      metricsPath: this._metricsPath,
      listenAddress: this._listenAddress,
      udpBindAddress: this._udpBindAddress,
    });
  }
}

interface BuiltOptions {
  metricsPath: string;
  listenAddress: string | undefined;
  udpBindAddress: string | undefined;
}

/** A configured exporter: handlers for embedding, or start()/stop() to run standalone. */
export class BuiltLineExporter {
  readonly pipeline: Pipeline;
  readonly collector: Collector;
  readonly udpListener: UdpListener | undefined;
  private readonly handler: FetchHandler;
  private server: Server | undefined;

  constructor(
    readonly context: ExporterContext,
    readonly store: SampleStore,
    private readonly options: BuiltOptions
  ) {
    this.pipeline = new Pipeline(context, store);
    this.collector = new Collector(context, store);
    this.handler = createHttpHandler(context, this.pipeline, this.collector, {
      metricsPath: options.metricsPath,
    });
    this.udpListener = options.udpBindAddress
      ? new UdpListener(context, this.pipeline, options.udpBindAddress)
      : undefined;
  }

  /** Fetch handler serving every exporter route. */
  fetchHandler(): FetchHandler {
    return this.handler;
  }

  /** node:http request listener serving every exporter route. */
  nodeListener(): ReturnType<typeof toNodeListener> {
    return toNodeListener(this.handler, this.context.logger);
  }

  /** Decode and cache a payload directly, bypassing HTTP. */
  ingest(body: string | Uint8Array, precision = 'ns'): PipelineResult {
    this.context.markPush();
    return this.pipeline.process(body, precision);
  }

  scrape(): Promise<Exposition> {
    return this.collector.collect();
  }

  /** Port of the running HTTP server, if any. */
  get httpPort(): number | undefined {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : undefined;
  }

  /**
   * Start the store, then bind UDP and HTTP where configured.
   * Rejects on an invalid address or a bind failure.
   */
  async start(): Promise<void> {
    this.store.start();
    if (this.udpListener) await this.udpListener.start();
    if (this.options.listenAddress) await this.listenHttp(this.options.listenAddress);
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    }
    if (this.udpListener) await this.udpListener.stop();
    await this.store.stop();
  }

  private async listenHttp(address: string): Promise<void> {
    const { host, port } = parseHostPort(address);
    const server = createServer(this.nodeListener());
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    server.on('error', (err) => this.context.logger.error('http server error', { error: err.message }));
    this.server = server;
    this.context.logger.info('http listener started', { address, metricsPath: this.options.metricsPath });
  }
}
