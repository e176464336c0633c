import { describe, it, expect } from 'vitest';
import { pointToSamples, fingerprint, coerceFieldValue, deriveName } from '../transform/pointToSamples.ts';
import { sanitizeName } from '../util/sanitize.ts';
import type { FieldValue, Point } from '../types/lineProtocol.ts';

function point(
  measurement: string,
  fields: Array<[string, FieldValue]>,
  tags: Array<[string, string]> = [],
  timestamp = 1_000_000_000n
): Point {
  return { measurement, tags: new Map(tags), fields: new Map(fields), timestamp };
}

describe('sanitizeName', () => {
  it('leaves valid names unchanged', () => {
    expect(sanitizeName('cpu_usage_Idle9')).toBe('cpu_usage_Idle9');
  });

  it('replaces every invalid character with an underscore', () => {
    expect(sanitizeName('my.metric')).toBe('my_metric');
    expect(sanitizeName('host-name')).toBe('host_name');
    expect(sanitizeName('a b/c:d')).toBe('a_b_c_d');
  });

  it('replaces a non-ASCII code point with a single underscore', () => {
    expect(sanitizeName('temp°C')).toBe('temp_C');
    expect(sanitizeName('x😀y')).toBe('x_y');
  });

  it('is idempotent', () => {
    for (const name of ['my.metric', 'a--b', 'ok_name', '😀.😀']) {
      const once = sanitizeName(name);
      expect(sanitizeName(once)).toBe(once);
    }
  });
});

describe('coerceFieldValue', () => {
  it('passes floats through', () => {
    expect(coerceFieldValue({ type: 'float', value: 1.25 })).toBe(1.25);
  });

  it('widens integers', () => {
    expect(coerceFieldValue({ type: 'integer', value: 42n })).toBe(42);
  });

  it('maps booleans to 1 and 0', () => {
    expect(coerceFieldValue({ type: 'boolean', value: true })).toBe(1);
    expect(coerceFieldValue({ type: 'boolean', value: false })).toBe(0);
  });

  it('skips strings and unsigned integers', () => {
    expect(coerceFieldValue({ type: 'string', value: '42' })).toBeUndefined();
    expect(coerceFieldValue({ type: 'unsigned', value: 42n })).toBeUndefined();
  });
});

describe('deriveName', () => {
  it('keeps the measurement for the "value" field', () => {
    expect(deriveName('cpu', 'value')).toBe('cpu');
  });

  it('appends any other field key', () => {
    expect(deriveName('cpu', 'idle')).toBe('cpu_idle');
  });
});

describe('fingerprint', () => {
  it('serializes the name and sorted labels as a JSON list', () => {
    const labels = new Map([
      ['zone', 'eu'],
      ['host', 'a'],
    ]);
    expect(fingerprint('cpu', labels)).toBe('["cpu","host","a","zone","eu"]');
  });

  it('does not depend on label insertion order', () => {
    const a = new Map([
      ['b', '2'],
      ['a', '1'],
      ['c', '3'],
    ]);
    const b = new Map([
      ['c', '3'],
      ['a', '1'],
      ['b', '2'],
    ]);
    expect(fingerprint('m', a)).toBe(fingerprint('m', b));
  });

  it('is well defined for an empty label set', () => {
    expect(fingerprint('cpu', new Map())).toBe('["cpu"]');
  });

  it('distinguishes values that would collide under naive joining', () => {
    const a = fingerprint('m', new Map([['a', 'b,c']]));
    const b = fingerprint('m', new Map([['a', 'b'], ['c', '']]));
    expect(a).not.toBe(b);
  });
});

describe('pointToSamples', () => {
  it('translates the "value" field to a sample named after the measurement', () => {
    const samples = pointToSamples(point('cpu', [['value', { type: 'float', value: 42 }]], [['host', 'a']]));
    expect(samples).toHaveLength(1);
    const s = samples[0]!;
    expect(s.name).toBe('cpu');
    expect(s.labels).toEqual(new Map([['host', 'a']]));
    expect(s.value).toBe(42);
    expect(s.timestamp).toBe(1_000_000_000n);
    expect(s.fingerprint).toBe('["cpu","host","a"]');
  });

  it('suffixes other field keys', () => {
    const samples = pointToSamples(
      point(
        'cpu',
        [
          ['idle', { type: 'float', value: 10 }],
          ['used', { type: 'float', value: 5 }],
        ],
        [['host', 'a']]
      )
    );
    expect(samples.map((s) => [s.name, s.value])).toEqual([
      ['cpu_idle', 10],
      ['cpu_used', 5],
    ]);
  });

  it('coerces booleans and integers and skips strings', () => {
    const samples = pointToSamples(
      point('svc', [
        ['up', { type: 'boolean', value: true }],
        ['down', { type: 'boolean', value: false }],
        ['count', { type: 'integer', value: 42n }],
        ['version', { type: 'string', value: '1.2.3' }],
      ])
    );
    expect(samples.map((s) => [s.name, s.value])).toEqual([
      ['svc_up', 1],
      ['svc_down', 0],
      ['svc_count', 42],
    ]);
  });

  it('yields nothing for a point without usable fields', () => {
    expect(pointToSamples(point('log', [['msg', { type: 'string', value: 'hi' }]]))).toEqual([]);
  });

  it('yields empty labels for a point without tags', () => {
    const [s] = pointToSamples(point('cpu', [['value', { type: 'float', value: 1 }]]));
    expect(s!.labels.size).toBe(0);
    expect(s!.fingerprint).toBe('["cpu"]');
  });

  it('sanitizes the metric name and tag keys but not tag values', () => {
    const [s] = pointToSamples(
      point('my.metric', [['value', { type: 'float', value: 1 }]], [['host-name', 'web-1.example']])
    );
    expect(s!.name).toBe('my_metric');
    expect(s!.labels).toEqual(new Map([['host_name', 'web-1.example']]));
  });

  it('fingerprints with the name before sanitization', () => {
    const [s] = pointToSamples(point('my.metric', [['value', { type: 'float', value: 1 }]], [['host-name', 'a']]));
    expect(s!.fingerprint).toBe('["my.metric","host_name","a"]');
  });

  it('produces identical fingerprints for repeated ingestion of a series', () => {
    const first = pointToSamples(point('cpu', [['value', { type: 'float', value: 1 }]], [['b', '2'], ['a', '1']]));
    const second = pointToSamples(
      point('cpu', [['value', { type: 'float', value: 2 }]], [['a', '1'], ['b', '2']], 5n)
    );
    expect(first[0]!.fingerprint).toBe(second[0]!.fingerprint);
  });
});
