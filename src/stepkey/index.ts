import { AdjacentKeysError, FormatError, PrecisionLossError } from "../errors.js";

/**
 * Sortable step identifier `major.fraction`.
 *
 * `fraction` is held as a bigint scaled by `10^precision`, so `1.0015` is
 * `{ major: 1, fraction: 15n, precision: 4 }`. Keys are frozen values; every
 * operation below returns a new key.
 */
export interface StepKey {
  readonly major: number;
  readonly fraction: bigint;
  readonly precision: number;
}

export interface StepKeyOptions {
  /** Minimum fractional digits when a fraction is present */
  minPrecision?: number;
}

export const DEFAULT_MIN_PRECISION = 3;

const KEY_RE = /^([1-9]\d*)(?:\.(\d+))?$/;

const pow10 = (n: number): bigint => 10n ** BigInt(n);

export function makeStepKey(major: number, fraction: bigint, precision: number): StepKey {
  if (!Number.isSafeInteger(major) || major < 1) throw new FormatError(`major must be an integer >= 1, got ${major}`);
  if (!Number.isInteger(precision) || precision < 0) throw new FormatError(`precision must be a non-negative integer, got ${precision}`);
  if (fraction < 0n || fraction >= pow10(precision)) {
    throw new FormatError(`fraction ${fraction} does not fit ${precision} digit(s)`);
  }
  return Object.freeze({ major, fraction, precision });
}

export function parseStepKey(text: string, opts: StepKeyOptions = {}): StepKey {
  const minPrecision = opts.minPrecision ?? DEFAULT_MIN_PRECISION;
  const m = KEY_RE.exec(text);
  if (!m) throw new FormatError(`malformed step key "${text}"`);
  const major = Number(m[1]);
  if (!Number.isSafeInteger(major) || major < 1) throw new FormatError(`step key "${text}" needs a major >= 1`);
  const frac = m[2];
  if (frac === undefined) return makeStepKey(major, 0n, 0);
  if (frac.length < minPrecision) {
    throw new FormatError(`step key "${text}" needs at least ${minPrecision} fractional digits`);
  }
  return makeStepKey(major, BigInt(frac), frac.length);
}

export function isStepKeyText(text: string, opts: StepKeyOptions = {}): boolean {
  try {
    parseStepKey(text, opts);
    return true;
  } catch (e) {
    if (e instanceof FormatError) return false;
    throw e;
  }
}

export function formatStepKey(key: StepKey): string {
  if (key.precision === 0) return `${key.major}`;
  return `${key.major}.${key.fraction.toString().padStart(key.precision, "0")}`;
}

function scaled(key: StepKey, precision: number): bigint {
  return key.fraction * pow10(precision - key.precision);
}

export function compareStepKeys(a: StepKey, b: StepKey): -1 | 0 | 1 {
  if (a.major !== b.major) return a.major < b.major ? -1 : 1;
  const p = Math.max(a.precision, b.precision);
  const fa = scaled(a, p);
  const fb = scaled(b, p);
  return fa === fb ? 0 : fa < fb ? -1 : 1;
}

export function stepKeysEqual(a: StepKey, b: StepKey): boolean {
  return compareStepKeys(a, b) === 0;
}

/** Identity string with trailing zeros dropped: `1.0010` and `1.001` share a token. */
export function keyToken(key: StepKey): string {
  let f = key.fraction;
  let p = key.precision;
  while (p > 0 && f % 10n === 0n) {
    f /= 10n;
    p -= 1;
  }
  return p === 0 ? `${key.major}` : `${key.major}.${f.toString().padStart(p, "0")}`;
}

/** Strict variant of {@link midpoint}: never changes precision. */
export function midpointAtPrecision(a: StepKey, b: StepKey, precision: number): StepKey {
  assertOrderedSameMajor(a, b);
  const p = Math.max(precision, a.precision, b.precision);
  const fa = scaled(a, p);
  const fb = scaled(b, p);
  if (fb - fa < 2n) {
    throw new AdjacentKeysError(`no key between ${formatStepKey(a)} and ${formatStepKey(b)} at precision ${p}`);
  }
  return makeStepKey(a.major, (fa + fb) / 2n, p);
}

/**
 * Key strictly between `a` and `b` (same major, `a < b`). Adjacent keys are
 * split one digit deeper, so precision grows by at most one per call.
 */
export function midpoint(a: StepKey, b: StepKey): StepKey {
  assertOrderedSameMajor(a, b);
  const p = Math.max(a.precision, b.precision);
  const adjacent = scaled(b, p) - scaled(a, p) < 2n;
  return midpointAtPrecision(a, b, adjacent ? p + 1 : p);
}

function assertOrderedSameMajor(a: StepKey, b: StepKey): void {
  if (a.major !== b.major) {
    throw new AdjacentKeysError(`keys ${formatStepKey(a)} and ${formatStepKey(b)} belong to different sections`);
  }
  if (compareStepKeys(a, b) >= 0) {
    throw new AdjacentKeysError(`expected ${formatStepKey(a)} < ${formatStepKey(b)}`);
  }
}

/** Re-express a key at `precision` digits, rounding half-up when narrowing. */
export function withPrecision(key: StepKey, precision: number): StepKey {
  if (!Number.isInteger(precision) || precision < 0) {
    throw new FormatError(`precision must be a non-negative integer, got ${precision}`);
  }
  if (precision >= key.precision) return makeStepKey(key.major, scaled(key, precision), precision);
  const d = pow10(key.precision - precision);
  let q = key.fraction / d;
  if ((key.fraction % d) * 2n >= d) q += 1n;
  if (q >= pow10(precision)) {
    throw new PrecisionLossError(`${formatStepKey(key)} rounds into the next section at precision ${precision}`);
  }
  return makeStepKey(key.major, q, precision);
}

export const canonicalize = withPrecision;

/** {@link withPrecision} over a set; distinct keys must stay distinct. */
export function withPrecisionAll(keys: readonly StepKey[], precision: number): StepKey[] {
  const out = keys.map(k => withPrecision(k, precision));
  const seen = new Map<string, StepKey>();
  keys.forEach((k, i) => {
    const token = keyToken(out[i]);
    const prior = seen.get(token);
    if (prior && !stepKeysEqual(prior, k)) {
      throw new PrecisionLossError(
        `${formatStepKey(prior)} and ${formatStepKey(k)} collapse to ${formatStepKey(out[i])} at precision ${precision}`
      );
    }
    seen.set(token, k);
  });
  return out;
}

/** Next key in the same section when nothing follows `key`. */
export function appendAfter(key: StepKey, opts: StepKeyOptions = {}): StepKey {
  if (key.precision === 0) return makeStepKey(key.major, 1n, opts.minPrecision ?? DEFAULT_MIN_PRECISION);
  const next = key.fraction + 1n;
  if (next < pow10(key.precision)) return makeStepKey(key.major, next, key.precision);
  return makeStepKey(key.major, key.fraction * 10n + 1n, key.precision + 1);
}

/** Key below `key` in the same section when nothing precedes it. */
export function prependBefore(key: StepKey): StepKey {
  const floor = makeStepKey(key.major, 0n, key.precision);
  if (key.fraction === 0n) {
    throw new AdjacentKeysError(`nothing fits before ${formatStepKey(key)} in section ${key.major}`);
  }
  return midpoint(floor, key);
}
