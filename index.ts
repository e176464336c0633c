// lineproto-exporter: InfluxDB line protocol to a Prometheus scrape target

// Core builder
export { LineExporter, BuiltLineExporter } from './src/core/LineExporter.ts';

// Components (for advanced/testing use)
export { ExporterContext, DEFAULT_SAMPLE_EXPIRY_MS } from './src/core/ExporterContext.ts';
export type { ExporterContextOptions } from './src/core/ExporterContext.ts';
export { SampleStore, SWEEP_INTERVAL_MS } from './src/core/SampleStore.ts';
export type { StoreCommand, SampleStoreOptions } from './src/core/SampleStore.ts';
export { Pipeline } from './src/core/Pipeline.ts';
export type { PipelineResult } from './src/core/Pipeline.ts';
export { Collector, SAMPLE_HELP } from './src/core/Collector.ts';
export type { Exposition } from './src/core/Collector.ts';
export { Channel } from './src/core/Channel.ts';

// Configuration
export { exporterConfigSchema, loadConfig, formatConfigError, LOG_LEVELS } from './src/core/ExporterConfig.ts';
export type { ExporterConfig, ExporterConfigInput } from './src/core/ExporterConfig.ts';

// Transports
export { createHttpHandler, createWriteHandler, createMetricsHandler } from './src/adapters/http.ts';
export type { FetchHandler, HttpHandlerOptions } from './src/adapters/http.ts';
export { toNodeListener, toRequest } from './src/adapters/node.ts';
export { UdpListener, MAX_DATAGRAM_SIZE } from './src/adapters/udp.ts';

// Types
export type { Sample } from './src/types/sample.ts';
export type { Point, FieldValue, Precision, ParseOptions } from './src/types/lineProtocol.ts';

// Decoding and translation (for advanced use)
export { parsePoints, LineProtocolError } from './src/proto/lineProtocol.ts';
export { pointToSamples, fingerprint, coerceFieldValue, deriveName } from './src/transform/pointToSamples.ts';
export { sanitizeName } from './src/util/sanitize.ts';

// Logging
export { createLogger } from './src/logging/logger.ts';
export type { Logger, LoggerOptions } from './src/logging/logger.ts';
