import type { ScalarFunction, SolveResult, HalleyOptions, HalleyNumericOptions } from './types.js';
import { centralDifference, secondCentralDifference } from './derivative.js';
import { ErrorCodes, success, failure } from './errors.js';
import { resolveLogger } from './logging.js';
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
 * Halley's method for f(x) = 0
 *
 * xₖ₊₁ = xₖ − 2·f·f' / (2·f'² − f·f'')
 *
 * Converged when |f(x)| < tol. Unlike Newton, an exhausted budget is
 * reported as a NON_CONVERGENCE failure.
 */
export function halley(
  f: ScalarFunction,
  df: ScalarFunction,
  d2f: ScalarFunction,
  x0: number,
  options: HalleyOptions = {}
): SolveResult {
  const { tol = DEFAULT_TOL, maxIter = DEFAULT_MAX_ITER } = options;
  assertTolerance(tol);
  assertMaxIter(maxIter);
  assertFinite('x0', x0);
  const logger = resolveLogger(options, 'halley');

  let x = x0;
  for (let iter = 0; iter < maxIter; iter++) {
    const fx = f(x);
    logger.debug(`iter ${iter}: x = ${x}, f(x) = ${fx}`);

    if (Math.abs(fx) < tol) {
      logger.debug(`converged after ${iter} iterations`);
      return success(x);
    }

    const dfx = df(x);
    const d2fx = d2f(x);
    x -= (2 * fx * dfx) / (2 * dfx * dfx - fx * d2fx);
  }

  logger.debug(`no convergence after ${maxIter} iterations, last x = ${x}`);
  return failure(
    ErrorCodes.NON_CONVERGENCE,
    `Halley's method did not converge within ${maxIter} iterations (last x = ${x})`
  );
}

/**
 * Halley's method with f' and f'' from the three-point central stencil
 * over f(x−h), f(x), f(x+h).
 */
export function halleyNumeric(
  f: ScalarFunction,
  x0: number,
  options: HalleyNumericOptions = {}
): SolveResult {
  const { h = DEFAULT_STEP, ...rest } = options;
  assertStep('h', h);
  return halley(f, centralDifference(f, h), secondCentralDifference(f, h), x0, rest);
}
