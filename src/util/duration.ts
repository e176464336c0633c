/**
 * Duration strings: a sequence of decimal numbers with units,
 * e.g. "300ms", "1.5h", "1h30m". Returns milliseconds.
 */

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  µs: 1e-3,
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

const SEGMENT_RE = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|s|m|h)/gy;

export function parseDuration(input: string): number {
  const s = input.trim();
  if (s === '0') return 0;
  if (s.length === 0) throw new Error(`invalid duration "${input}"`);

  SEGMENT_RE.lastIndex = 0;
  let total = 0;
  let consumed = 0;
  for (let m = SEGMENT_RE.exec(s); m !== null; m = SEGMENT_RE.exec(s)) {
    const [whole, amount = '', unit = ''] = m;
    const factor = UNIT_MS[unit];
    if (factor === undefined) throw new Error(`unknown unit "${unit}" in duration "${input}"`);
    total += Number(amount) * factor;
    consumed += whole.length;
  }
  if (consumed !== s.length) throw new Error(`invalid duration "${input}"`);
  return total;
}
