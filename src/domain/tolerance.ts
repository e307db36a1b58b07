/**
 * Tolerance-bounded comparison.
 *
 * Observed values are compared structurally against expected values;
 * numbers at the leaves are compared under a Tolerance:
 *   - exact: strict equality (NaN matches NaN)
 *   - absolute: |actual - expected| <= epsilon
 *   - relative: |actual - expected| <= epsilon * |expected|
 *   - ulp: at most `ulps` representable values apart, in float32 or float64
 */

export type Tolerance =
  | { kind: 'exact' }
  | { kind: 'absolute'; epsilon: number }
  | { kind: 'relative'; epsilon: number }
  | { kind: 'ulp'; ulps: number; precision?: 'float32' | 'float64' };

export const EXACT: Tolerance = { kind: 'exact' };

export function absolute(epsilon: number): Tolerance {
  return { kind: 'absolute', epsilon };
}

export function relative(epsilon: number): Tolerance {
  return { kind: 'relative', epsilon };
}

export function ulp(ulps: number, precision: 'float32' | 'float64' = 'float64'): Tolerance {
  return { kind: 'ulp', ulps, precision };
}

/** A single structural difference between observed and expected values. */
export interface Mismatch {
  /** Dotted path to the differing leaf; empty for the root. */
  path: string;
  expected: unknown;
  actual: unknown;
  reason: string;
}

const scratch = new DataView(new ArrayBuffer(8));

/** Map a float's bit pattern onto integers ordered like the floats themselves. */
function orderedBits(value: number, precision: 'float32' | 'float64'): bigint {
  if (precision === 'float32') {
    scratch.setFloat32(0, value);
    const bits = scratch.getInt32(0);
    return BigInt(bits < 0 ? -(bits & 0x7fffffff) : bits);
  }
  scratch.setFloat64(0, value);
  const bits = scratch.getBigInt64(0);
  return bits < BigInt(0) ? -(bits & BigInt('0x7fffffffffffffff')) : bits;
}

/** Number of representable values between two finite floats. */
export function ulpDistance(a: number, b: number, precision: 'float32' | 'float64' = 'float64'): number {
  const diff = orderedBits(a, precision) - orderedBits(b, precision);
  return Number(diff < BigInt(0) ? -diff : diff);
}

export function compareNumbers(actual: number, expected: number, tolerance: Tolerance = EXACT): boolean {
  if (actual === expected) return true;
  if (Number.isNaN(actual) || Number.isNaN(expected)) {
    return Number.isNaN(actual) && Number.isNaN(expected)
      && (tolerance.kind === 'exact' || tolerance.kind === 'ulp');
  }
  if (!Number.isFinite(actual) || !Number.isFinite(expected)) return false;

  switch (tolerance.kind) {
    case 'exact':
      return false;
    case 'absolute':
      return Math.abs(actual - expected) <= tolerance.epsilon;
    case 'relative':
      return Math.abs(actual - expected) <= tolerance.epsilon * Math.abs(expected);
    case 'ulp':
      return ulpDistance(actual, expected, tolerance.precision ?? 'float64') <= tolerance.ulps;
  }
}

export function describeTolerance(tolerance: Tolerance): string {
  switch (tolerance.kind) {
    case 'exact':
      return 'exact';
    case 'absolute':
      return `±${tolerance.epsilon}`;
    case 'relative':
      return `±${tolerance.epsilon * 100}%`;
    case 'ulp':
      return `${tolerance.ulps} ulp (${tolerance.precision ?? 'float64'})`;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function joinPath(path: string, key: string | number): string {
  if (typeof key === 'number') return `${path}[${key}]`;
  return path ? `${path}.${key}` : key;
}

/**
 * Walk expected and actual in parallel and list every difference.
 * Arrays must match in length; plain objects must have the same keys.
 */
export function structuralMismatches(
  actual: unknown,
  expected: unknown,
  tolerance: Tolerance = EXACT,
  path = '',
): Mismatch[] {
  if (typeof expected === 'number') {
    if (typeof actual !== 'number') {
      return [{ path, expected, actual, reason: `expected a number, got ${typeOf(actual)}` }];
    }
    return compareNumbers(actual, expected, tolerance)
      ? []
      : [{ path, expected, actual, reason: `outside tolerance ${describeTolerance(tolerance)}` }];
  }

  if (Array.isArray(expected)) {
    if (!Array.isArray(actual)) {
      return [{ path, expected, actual, reason: `expected an array, got ${typeOf(actual)}` }];
    }
    if (actual.length !== expected.length) {
      return [{ path, expected, actual, reason: `expected length ${expected.length}, got ${actual.length}` }];
    }
    return expected.flatMap((item, i) => structuralMismatches(actual[i], item, tolerance, joinPath(path, i)));
  }

  if (isPlainObject(expected)) {
    if (!isPlainObject(actual)) {
      return [{ path, expected, actual, reason: `expected an object, got ${typeOf(actual)}` }];
    }
    const mismatches: Mismatch[] = [];
    for (const key of Object.keys(expected)) {
      if (!(key in actual)) {
        mismatches.push({ path: joinPath(path, key), expected: expected[key], actual: undefined, reason: 'missing key' });
        continue;
      }
      mismatches.push(...structuralMismatches(actual[key], expected[key], tolerance, joinPath(path, key)));
    }
    for (const key of Object.keys(actual)) {
      if (!(key in expected)) {
        mismatches.push({ path: joinPath(path, key), expected: undefined, actual: actual[key], reason: 'unexpected key' });
      }
    }
    return mismatches;
  }

  return actual === expected ? [] : [{ path, expected, actual, reason: 'not equal' }];
}

function typeOf(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function formatValue(value: unknown): string {
  if (typeof value === 'number' || typeof value === 'boolean' || value === null || value === undefined) {
    return String(value);
  }
  if (typeof value === 'string') return JSON.stringify(value);
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/** Render a mismatch; `subject` names the compared value and prefixes the path. */
export function formatMismatch(mismatch: Mismatch, subject?: string): string {
  let where = mismatch.path || '<root>';
  if (subject) {
    if (!mismatch.path) where = subject;
    else where = mismatch.path.startsWith('[') ? `${subject}${mismatch.path}` : `${subject}.${mismatch.path}`;
  }
  return `${where}: expected ${formatValue(mismatch.expected)}, got ${formatValue(mismatch.actual)} (${mismatch.reason})`;
}
