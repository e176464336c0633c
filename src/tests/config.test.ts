import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig, formatConfigError } from '../core/ExporterConfig.ts';
import { parseArgs } from '../cli/program.ts';
import { parseDuration } from '../util/duration.ts';
import { parseHostPort } from '../util/address.ts';

function configError(input: Parameters<typeof loadConfig>[0]): ZodError {
  try {
    loadConfig(input);
  } catch (err) {
    if (err instanceof ZodError) return err;
    throw err;
  }
  throw new Error('expected loadConfig to throw');
}

describe('parseDuration', () => {
  it.each([
    ['0', 0],
    ['300ms', 300],
    ['30s', 30_000],
    ['5m', 300_000],
    ['1h30m', 5_400_000],
    ['1.5h', 5_400_000],
    ['2m30.5s', 150_500],
    ['1500us', 1.5],
  ])('parses %s', (input, expected) => {
    expect(parseDuration(input)).toBe(expected);
  });

  it.each(['', '5', 'm', '5 m', '5d', '-5m', '5m!'])('rejects %j', (input) => {
    expect(() => parseDuration(input)).toThrow('duration');
  });
});

describe('parseHostPort', () => {
  it('treats an empty host as all interfaces', () => {
    expect(parseHostPort(':9122')).toEqual({ host: undefined, port: 9122 });
  });

  it('parses hostnames and IPv4 addresses', () => {
    expect(parseHostPort('localhost:8080')).toEqual({ host: 'localhost', port: 8080 });
    expect(parseHostPort('0.0.0.0:9122')).toEqual({ host: '0.0.0.0', port: 9122 });
  });

  it('parses bracketed IPv6 addresses', () => {
    expect(parseHostPort('[::1]:9122')).toEqual({ host: '::1', port: 9122 });
  });

  it.each(['9122', 'host:', 'host:abc', '::1:9122', '[::1:9122', 'h:70000'])('rejects %j', (input) => {
    expect(() => parseHostPort(input)).toThrow(`address ${input}`);
  });
});

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig()).toEqual({
      listenAddress: ':9122',
      metricsPath: '/metrics',
      udpBindAddress: ':9122',
      sampleExpiryMs: 300_000,
      logLevel: 'info',
      processMetrics: true,
    });
  });

  it('normalizes duration strings and accepts milliseconds', () => {
    expect(loadConfig({ sampleExpiryMs: '90s' }).sampleExpiryMs).toBe(90_000);
    expect(loadConfig({ sampleExpiryMs: 1234 }).sampleExpiryMs).toBe(1234);
  });

  it('reports every invalid field', () => {
    const err = configError({
      listenAddress: 'nope',
      metricsPath: 'metrics',
      sampleExpiryMs: 'soon',
      logLevel: 'loud',
    });
    const paths = err.issues.map((i) => i.path.join('.')).sort();
    expect(paths).toEqual(['listenAddress', 'logLevel', 'metricsPath', 'sampleExpiryMs']);
    expect(formatConfigError(err)).toContain('listenAddress: address nope: missing port');
  });
});

describe('parseArgs', () => {
  const argv = (...args: string[]) => ['node', 'lineproto-exporter', ...args];

  it('maps dotted flags onto config fields', () => {
    const input = parseArgs(
      argv(
        '--web.listen-address',
        '127.0.0.1:9200',
        '--web.telemetry-path',
        '/prom',
        '--udp.bind-address',
        ':8089',
        '--influxdb.sample-expiry',
        '10m',
        '--log.level',
        'debug',
        '--no-process-metrics'
      )
    );
    expect(loadConfig(input)).toEqual({
      listenAddress: '127.0.0.1:9200',
      metricsPath: '/prom',
      udpBindAddress: ':8089',
      sampleExpiryMs: 600_000,
      logLevel: 'debug',
      processMetrics: false,
    });
  });

  it('falls back to the flag defaults', () => {
    const input = parseArgs(argv());
    expect(input.listenAddress).toBe(':9122');
    expect(input.sampleExpiryMs).toBe('5m');
    expect(input.processMetrics).toBe(true);
  });
});
