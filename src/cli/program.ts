/**
 * Command-line flags. Names follow the Prometheus exporter convention of
 * dotted namespaces (`--web.listen-address`).
 */

import { Command } from 'commander';
import type { ExporterConfigInput } from '../core/ExporterConfig.ts';

/** Parsed flags. Commander camel-cases only the dash-separated words. */
export type CliOptions = {
  'web.listenAddress': string;
  'web.telemetryPath': string;
  'udp.bindAddress': string;
  'influxdb.sampleExpiry': string;
  'log.level': string;
  processMetrics: boolean;
};

export function buildProgram(): Command {
  return new Command()
    .name('lineproto-exporter')
    .description('Exposes InfluxDB line-protocol pushes as a Prometheus scrape target')
    .version('0.1.0')
    .option('--web.listen-address <address>', 'Address on which to expose metrics and web interface.', ':9122')
    .option('--web.telemetry-path <path>', 'Path under which to expose Prometheus metrics.', '/metrics')
    .option('--udp.bind-address <address>', 'Address on which to listen for udp packets.', ':9122')
    .option('--influxdb.sample-expiry <duration>', 'How long a sample is valid for.', '5m')
    .option('--log.level <level>', 'Only log messages with the given severity or above.', process.env.LOG_LEVEL ?? 'info')
    .option('--no-process-metrics', 'Do not expose process metrics.');
}

export function toConfigInput(opts: CliOptions): ExporterConfigInput {
  return {
    listenAddress: opts['web.listenAddress'],
    metricsPath: opts['web.telemetryPath'],
    udpBindAddress: opts['udp.bindAddress'],
    sampleExpiryMs: opts['influxdb.sampleExpiry'],
    logLevel: opts['log.level'],
    processMetrics: opts.processMetrics,
  };
}

/** Parse argv (including the node and script entries) into config input. */
export function parseArgs(argv: string[]): ExporterConfigInput {
  const program = buildProgram();
  program.parse(argv);
  return toConfigInput(program.opts<CliOptions>());
}
