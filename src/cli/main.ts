#!/usr/bin/env node
/**
 * lineproto-exporter entry point.
 */

import { ZodError } from 'zod';
import { LineExporter } from '../core/LineExporter.ts';
import { formatConfigError, loadConfig } from '../core/ExporterConfig.ts';
import type { ExporterConfig } from '../core/ExporterConfig.ts';
import { createLogger } from '../logging/logger.ts';
import { parseArgs } from './program.ts';

async function main(argv: string[]): Promise<void> {
  let config: ExporterConfig;
  try {
    config = loadConfig(parseArgs(argv));
  } catch (err) {
    if (err instanceof ZodError) {
      createLogger().error('invalid configuration', { error: formatConfigError(err) });
      process.exit(1);
    }
    throw err;
  }

  const logger = createLogger({ level: config.logLevel });
  const exporter = new LineExporter().configure(config).logger(logger).build();

  logger.info('Starting Server', {
    listenAddress: config.listenAddress,
    udpBindAddress: config.udpBindAddress,
    sampleExpiryMs: config.sampleExpiryMs,
  });
  try {
    await exporter.start();
  } catch (err) {
    logger.error('failed to start', { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  }

  const shutdown = (signal: string): void => {
    logger.info('shutting down', { signal });
    exporter.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('shutdown failed', { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main(process.argv).catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
