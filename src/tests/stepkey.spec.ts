import { describe, it, expect } from 'vitest';
import {
  appendAfter, compareStepKeys, formatStepKey, keyToken, midpoint, midpointAtPrecision, parseStepKey, prependBefore,
  withPrecision, withPrecisionAll
} from '../stepkey/index.js';
import { AdjacentKeysError, FormatError, PrecisionLossError } from '../errors.js';

const k = (t: string) => parseStepKey(t);
const fmt = (t: string) => formatStepKey(k(t));

describe('stepkey parse/format', () => {
  it('stores precision from the digit count', () => {
    expect(k('1.001')).toEqual({ major: 1, fraction: 1n, precision: 3 });
    expect(k('1.0010')).toEqual({ major: 1, fraction: 10n, precision: 4 });
    expect(k('12')).toEqual({ major: 12, fraction: 0n, precision: 0 });
  });

  it('formats back to the same text', () => {
    for (const t of ['1', '1.001', '1.0010', '3.0015', '10.000', '7.12345678901234567890']) {
      expect(formatStepKey(parseStepKey(t))).toBe(t);
    }
  });

  it('rejects malformed text', () => {
    for (const t of ['', '1.', '.001', 'a.001', ' 1.001', '1.001 ', '1.01', '0.001', '-1.001', '01.001', '007']) {
      expect(() => parseStepKey(t)).toThrow(FormatError);
    }
  });

  it('honours a configured minimum precision', () => {
    expect(formatStepKey(parseStepKey('1.01', { minPrecision: 2 }))).toBe('1.01');
    expect(() => parseStepKey('1.001', { minPrecision: 4 })).toThrow(FormatError);
  });
});

describe('stepkey ordering', () => {
  it('compares major first, then padded fractions', () => {
    expect(compareStepKeys(k('1.001'), k('1.0010'))).toBe(0);
    expect(compareStepKeys(k('1.001'), k('1.0015'))).toBe(-1);
    expect(compareStepKeys(k('1.002'), k('1.0015'))).toBe(1);
    expect(compareStepKeys(k('1.999'), k('2'))).toBe(-1);
    expect(compareStepKeys(k('2'), k('2.001'))).toBe(-1);
  });

  it('gives equal keys one token', () => {
    expect(keyToken(k('1.0010'))).toBe('1.001');
    expect(keyToken(k('2.000'))).toBe('2');
  });
});

describe('midpoint', () => {
  it('splits adjacent keys one digit deeper', () => {
    expect(midpoint(k('1.001'), k('1.002'))).toEqual(k('1.0015'));
  });

  it('stays at the common precision when there is room', () => {
    expect(formatStepKey(midpoint(k('1.001'), k('1.005')))).toBe('1.003');
  });

  it('always lands strictly between and grows at most one digit per call', () => {
    const a = k('1.001');
    let b = k('1.002');
    for (let i = 0; i < 25; i++) {
      const m = midpoint(a, b);
      expect(compareStepKeys(a, m)).toBe(-1);
      expect(compareStepKeys(m, b)).toBe(-1);
      expect(m.precision).toBeLessThanOrEqual(Math.max(a.precision, b.precision) + 1);
      b = m;
    }
  });

  it('requires ordered keys in one section', () => {
    expect(() => midpoint(k('1.001'), k('2.001'))).toThrow(AdjacentKeysError);
    expect(() => midpoint(k('1.002'), k('1.001'))).toThrow(AdjacentKeysError);
    expect(() => midpoint(k('1.001'), k('1.0010'))).toThrow(AdjacentKeysError);
  });

  it('has a strict fixed-precision variant', () => {
    expect(() => midpointAtPrecision(k('1.001'), k('1.002'), 3)).toThrow(AdjacentKeysError);
    expect(formatStepKey(midpointAtPrecision(k('1.001'), k('1.002'), 4))).toBe('1.0015');
  });
});

describe('precision changes', () => {
  it('rounds half-up when narrowing and pads when widening', () => {
    expect(formatStepKey(withPrecision(k('1.0015'), 3))).toBe('1.002');
    expect(formatStepKey(withPrecision(k('1.0014'), 3))).toBe('1.001');
    expect(formatStepKey(withPrecision(k('1.001'), 5))).toBe('1.00100');
  });

  it('refuses to round into the next section', () => {
    expect(() => withPrecision(k('1.9996'), 3)).toThrow(PrecisionLossError);
  });

  it('refuses to merge distinct keys', () => {
    expect(() => withPrecisionAll([k('1.0011'), k('1.0012')], 3)).toThrow(PrecisionLossError);
    expect(withPrecisionAll([k('1.0014'), k('1.0026')], 3).map(formatStepKey)).toEqual(['1.001', '1.003']);
    expect(withPrecisionAll([k('1.001'), k('1.0010')], 3).map(formatStepKey)).toEqual(['1.001', '1.001']);
  });
});

describe('append/prepend', () => {
  it('increments the last digit, extending on overflow', () => {
    expect(formatStepKey(appendAfter(k('1.001')))).toBe('1.002');
    expect(formatStepKey(appendAfter(k('1.0015')))).toBe('1.0016');
    expect(formatStepKey(appendAfter(k('1.999')))).toBe('1.9991');
    expect(formatStepKey(appendAfter(k('2')))).toBe('2.001');
    expect(formatStepKey(appendAfter(k('2'), { minPrecision: 4 }))).toBe('2.0001');
  });

  it('finds room below the first key of a section', () => {
    expect(fmt('1.001')).toBe('1.001');
    expect(formatStepKey(prependBefore(k('1.001')))).toBe('1.0005');
    expect(formatStepKey(prependBefore(k('1.010')))).toBe('1.005');
    expect(() => prependBefore(k('3'))).toThrow(AdjacentKeysError);
  });
});
