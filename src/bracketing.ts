import type { ScalarFunction, SolveResult, BisectionOptions, SecantOptions, RidderOptions } from './types.js';
import { ErrorCodes, success, failure } from './errors.js';
import {
  DEFAULT_TOL,
  DEFAULT_MAX_ITER,
  assertTolerance,
  assertMaxIter,
  assertFinite,
  assertStepCount,
} from './options.js';

/** True when u and v are non-zero with opposite signs (false for NaN) */
function signChange(u: number, v: number): boolean {
  return (u < 0 && v > 0) || (u > 0 && v < 0);
}

function sameSignFailure(a: number, b: number, fa: number, fb: number): SolveResult {
  return failure(
    ErrorCodes.INVALID_BRACKET,
    `f(a) and f(b) must have opposite signs: f(${a}) = ${fa}, f(${b}) = ${fb}`
  );
}

/**
 * Bisection method for f(x) = 0 on [a, b]
 *
 * The step count ⌈log₂((b − a)/tol)⌉ is fixed up front, so the final
 * midpoint is within tol/2 of a root.
 */
export function bisection(
  f: ScalarFunction,
  a: number,
  b: number,
  options: BisectionOptions = {}
): SolveResult {
  const { tol = DEFAULT_TOL } = options;
  assertTolerance(tol);
  assertFinite('a', a);
  assertFinite('b', b);

  let lo = Math.min(a, b);
  let hi = Math.max(a, b);
  const steps = Math.max(0, Math.ceil(Math.log2((hi - lo) / tol)));
  assertStepCount(steps, hi - lo, tol);

  let flo = f(lo);
  let fhi = f(hi);

  if (flo === 0) return success(lo);
  if (fhi === 0) return success(hi);
  if (!signChange(flo, fhi)) return sameSignFailure(lo, hi, flo, fhi);

  for (let i = 0; i < steps; i++) {
    const mid = (lo + hi) / 2;
    const fmid = f(mid);

    if (fmid === 0) return success(mid);

    if (signChange(flo, fmid)) {
      hi = mid;
      fhi = fmid;
    } else if (signChange(fmid, fhi)) {
      lo = mid;
      flo = fmid;
    } else {
      return failure(
        ErrorCodes.INVALID_BRACKET,
        `No sign change in either half of [${lo}, ${hi}] (f(${mid}) = ${fmid})`
      );
    }
  }

  return success((lo + hi) / 2);
}

/**
 * Secant method for f(x) = 0 from two estimates a and b
 *
 * c = a − f(a)·(a − b)/(f(a) − f(b))
 *
 * No bracket is required and convergence is not guaranteed: a vanishing
 * f(a) − f(b) is not guarded and the last estimate is returned when the
 * budget runs out.
 */
export function secant(
  f: ScalarFunction,
  a: number,
  b: number,
  options: SecantOptions = {}
): number {
  const { tol = DEFAULT_TOL, maxIter = DEFAULT_MAX_ITER } = options;
  assertTolerance(tol);
  assertMaxIter(maxIter);
  assertFinite('a', a);
  assertFinite('b', b);

  let fa = f(a);
  let fb = f(b);

  for (let iter = 0; iter < maxIter; iter++) {
    const c = a - (fa * (a - b)) / (fa - fb);
    b = a;
    fb = fa;
    a = c;
    if (Math.abs(a - b) < tol) break;
    fa = f(a);
  }

  return a;
}

/**
 * Ridder's method for f(x) = 0 on a sign-change bracket [a, b]
 *
 * Each step fits an exponential through f(a), f(c), f(b) at the midpoint c:
 *
 * x = c + sign(f(a) − f(b))·(c − a)·f(c) / √(f(c)² − f(a)·f(b))
 *
 * then keeps the tightest sub-bracket that still changes sign.
 */
export function ridder(
  f: ScalarFunction,
  a: number,
  b: number,
  options: RidderOptions = {}
): SolveResult {
  const { tol = DEFAULT_TOL, maxIter = DEFAULT_MAX_ITER } = options;
  assertTolerance(tol);
  assertMaxIter(maxIter);
  assertFinite('a', a);
  assertFinite('b', b);

  let fa = f(a);
  let fb = f(b);

  if (fa === 0) return success(a);
  if (fb === 0) return success(b);
  if (!signChange(fa, fb)) return sameSignFailure(a, b, fa, fb);

  let previous = NaN;

  for (let iter = 0; iter < maxIter; iter++) {
    const c = (a + b) / 2;
    const fc = f(c);
    const s = Math.sqrt(fc * fc - fa * fb);

    // s vanishes only through under/overflow; fall back to false position
    const x = s === 0
      ? c - (fc * (b - a)) / (fb - fa)
      : c + (Math.sign(fa - fb) * (c - a) * fc) / s;
    const fx = f(x);

    if (fx === 0) return success(x);
    if (Math.abs(x - previous) < tol * Math.max(Math.abs(x), 1)) return success(x);
    previous = x;

    if (signChange(fc, fx)) {
      a = c;
      fa = fc;
      b = x;
      fb = fx;
    } else if (signChange(fa, fx)) {
      b = x;
      fb = fx;
    } else if (signChange(fb, fx)) {
      a = x;
      fa = fx;
    } else {
      return failure(
        ErrorCodes.INVALID_BRACKET,
        `Bracket lost its sign change at x = ${x} (f(x) = ${fx})`
      );
    }
  }

  return failure(
    ErrorCodes.NON_CONVERGENCE,
    `Ridder's method did not converge within ${maxIter} iterations (last x = ${previous})`
  );
}
