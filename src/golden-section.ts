import type { ScalarFunction, GoldenSectionOptions } from './types.js';
import { DEFAULT_TOL, assertTolerance, assertFinite, assertStepCount } from './options.js';

const INV_PHI = (Math.sqrt(5) - 1) / 2;   // 1/φ
const INV_PHI2 = (3 - Math.sqrt(5)) / 2;  // 1/φ²

/**
 * Golden-section search for the minimum of a unimodal f on [a, b].
 *
 * The bracket shrinks by 1/φ per step, so ⌈ln(tol/h) / ln(1/φ)⌉ steps
 * bring it below tol. Each step evaluates f once: one of the two interior
 * probes is always carried over from the previous step.
 */
export function goldenSection(
  f: ScalarFunction,
  a: number,
  b: number,
  options: GoldenSectionOptions = {}
): number {
  const { tol = DEFAULT_TOL } = options;
  assertTolerance(tol);
  assertFinite('a', a);
  assertFinite('b', b);

  let lo = Math.min(a, b);
  let hi = Math.max(a, b);
  let h = hi - lo;
  if (h <= tol) return (lo + hi) / 2;

  const steps = Math.ceil(Math.log(tol / h) / Math.log(INV_PHI));
  assertStepCount(steps, h, tol);

  let c = lo + INV_PHI2 * h;
  let d = lo + INV_PHI * h;
  let yc = f(c);
  let yd = f(d);

  for (let i = 0; i < steps; i++) {
    h *= INV_PHI;
    if (yc < yd) {
      hi = d;
      d = c;
      yd = yc;
      c = lo + INV_PHI2 * h;
      yc = f(c);
    } else {
      lo = c;
      c = d;
      yc = yd;
      d = lo + INV_PHI * h;
      yd = f(d);
    }
  }

  return yc < yd ? (lo + d) / 2 : (c + hi) / 2;
}
