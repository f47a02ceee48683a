import type { ScalarFunction, NewtonOptions, NewtonNumericOptions } from './types.js';
import { centralDifference } from './derivative.js';
import {
  DEFAULT_TOL,
  DEFAULT_MAX_ITER,
  DEFAULT_STEP,
  assertTolerance,
  assertMaxIter,
  assertStep,
  assertFinite,
} from './options.js';

/**
 * Newton's method for f(x) = 0
 *
 * xₖ₊₁ = xₖ − f(xₖ)/f'(xₖ)
 *
 * Stops once |step| < tol. When f'(x) is exactly zero the step is f(x)
 * itself. Running out of iterations is not reported: the last iterate is
 * returned and the caller checks |f(x)| if it needs to know.
 */
export function newton(
  f: ScalarFunction,
  df: ScalarFunction,
  x0: number,
  options: NewtonOptions = {}
): number {
  const { tol = DEFAULT_TOL, maxIter = DEFAULT_MAX_ITER } = options;
  assertTolerance(tol);
  assertMaxIter(maxIter);
  assertFinite('x0', x0);

  let x = x0;
  for (let iter = 0; iter < maxIter; iter++) {
    const fx = f(x);
    const dfx = df(x);
    const step = dfx === 0 ? fx : fx / dfx;
    x -= step;
    if (Math.abs(step) < tol) break;
  }

  return x;
}

/**
 * Newton's method with f' estimated by central difference of step h.
 */
export function newtonNumeric(
  f: ScalarFunction,
  x0: number,
  options: NewtonNumericOptions = {}
): number {
  const { h = DEFAULT_STEP, ...rest } = options;
  assertStep('h', h);
  return newton(f, centralDifference(f, h), x0, rest);
}
