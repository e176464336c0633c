/**
 * Exporter configuration, validated with zod.
 * Durations arrive as strings ("5m") and are normalized to milliseconds.
 */

import { z } from 'zod';
import { parseDuration } from '../util/duration.ts';
import { parseHostPort } from '../util/address.ts';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

const address = z.string().superRefine((value, ctx) => {
  try {
    parseHostPort(value);
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
  }
});

const duration = z.union([z.number().int().nonnegative(), z.string()]).transform((value, ctx) => {
  if (typeof value === 'number') return value;
  try {
    return Math.round(parseDuration(value));
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
    return z.NEVER;
  }
});

export const exporterConfigSchema = z.object({
  listenAddress: address.default(':9122'),
  metricsPath: z.string().startsWith('/').default('/metrics'),
  udpBindAddress: address.default(':9122'),
  sampleExpiryMs: duration.default('5m'),
  logLevel: z.string().pipe(z.enum(LOG_LEVELS)).default('info'),
  processMetrics: z.boolean().default(true),
});

export type ExporterConfigInput = z.input<typeof exporterConfigSchema>;
export type ExporterConfig = z.output<typeof exporterConfigSchema>;

/** Validate raw settings; throws a ZodError listing every invalid field. */
export function loadConfig(input: ExporterConfigInput = {}): ExporterConfig {
  return exporterConfigSchema.parse(input);
}

export function formatConfigError(err: z.ZodError): string {
  return err.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`).join('; ');
}
