import type { ScalarFunction } from './types.js';

/**
 * First derivative by central difference.
 *
 * f'(x) ≈ (f(x+h) − f(x−h)) / 2h
 */
export function centralDifference(f: ScalarFunction, h: number): ScalarFunction {
  return (x: number) => (f(x + h) - f(x - h)) / (2 * h);
}

/**
 * Second derivative by central difference.
 *
 * f''(x) ≈ (f(x+h) − 2·f(x) + f(x−h)) / h²
 */
export function secondCentralDifference(f: ScalarFunction, h: number): ScalarFunction {
  return (x: number) => (f(x + h) - 2 * f(x) + f(x - h)) / (h * h);
}
