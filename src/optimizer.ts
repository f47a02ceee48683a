import type { VectorFunction, OptimizerResult, NelderMeadOptions } from './types.js';
import type { Logger } from './logging.js';
import { resolveLogger } from './logging.js';
import { add, subtract, scale, centroid, standardDeviation, meanPairwiseDistance } from './utils.js';
import {
  DEFAULT_TOL,
  DEFAULT_SIMPLEX_MAX_ITER,
  DEFAULT_SIMPLEX_SIZE,
  assertTolerance,
  assertMaxIter,
  assertStep,
  assertPoint,
} from './options.js';

const ALPHA = 1;    // reflection
const GAMMA = 2;    // expansion
const RHO = 0.5;    // contraction
const SIGMA = 0.5;  // shrink

interface Vertex {
  x: number[];
  fx: number;
}

/** Ascending by value; NaN sorts last */
function byValue(p: Vertex, q: Vertex): number {
  if (Number.isNaN(p.fx)) return Number.isNaN(q.fx) ? 0 : 1;
  if (Number.isNaN(q.fx)) return -1;
  return p.fx < q.fx ? -1 : p.fx > q.fx ? 1 : 0;
}

function formatVector(x: number[]): string {
  return `[${x.join(', ')}]`;
}

function logSimplex(logger: Logger, simplex: Vertex[]): void {
  for (const v of simplex) {
    logger.debug(`  ${formatVector(v.x)} -> ${v.fx}`);
  }
}

/**
 * Nelder-Mead simplex minimization.
 *
 * Starts from x0 plus one vertex per axis, offset by simplexSize. Stops
 * when the spread of vertex values or the mean vertex distance drops below
 * tol. Running out of iterations is not reported; the best vertex found is
 * returned either way.
 */
export function nelderMead(
  fn: VectorFunction,
  x0: number[],
  options: NelderMeadOptions = {}
): OptimizerResult {
  const {
    tol = DEFAULT_TOL,
    maxIter = DEFAULT_SIMPLEX_MAX_ITER,
    simplexSize = DEFAULT_SIMPLEX_SIZE,
  } = options;
  assertTolerance(tol);
  assertMaxIter(maxIter);
  assertStep('simplexSize', simplexSize);
  assertPoint(x0);
  const logger = resolveLogger(options, 'nelder-mead');

  const n = x0.length;
  const evaluate = (x: number[]): Vertex => ({ x, fx: fn(x) });

  // Initialize simplex
  let simplex: Vertex[] = [evaluate(x0.slice())];
  for (let i = 0; i < n; i++) {
    const point = x0.slice();
    point[i] += simplexSize;
    simplex.push(evaluate(point));
  }

  logger.debug('initial simplex:');
  logSimplex(logger, simplex);

  for (let iter = 0; iter < maxIter; iter++) {
    simplex = [...simplex].sort(byValue);

    logger.debug(`iteration ${iter}, sorted simplex:`);
    logSimplex(logger, simplex);

    if (standardDeviation(simplex.map(v => v.fx)) < tol) {
      logger.debug(`converged on function values after ${iter} iterations`);
      return result(simplex[0]);
    }

    if (meanPairwiseDistance(simplex.map(v => v.x)) < tol) {
      logger.debug(`converged on simplex size after ${iter} iterations`);
      return result(simplex[0]);
    }

    const best = simplex[0];
    const secondWorst = simplex[n - 1];
    const worst = simplex[n];

    // Centroid of all points except worst
    const center = centroid(simplex.slice(0, n).map(v => v.x));
    logger.debug(`centroid: ${formatVector(center)}`);

    const reflected = evaluate(add(center, scale(subtract(center, worst.x), ALPHA)));
    logger.debug(`reflection: ${formatVector(reflected.x)} -> ${reflected.fx}`);

    if (best.fx <= reflected.fx && reflected.fx < secondWorst.fx) {
      simplex[n] = reflected;
      continue;
    }

    if (reflected.fx < best.fx) {
      const expanded = evaluate(add(center, scale(subtract(reflected.x, center), GAMMA)));
      logger.debug(`expansion: ${formatVector(expanded.x)} -> ${expanded.fx}`);
      simplex[n] = expanded.fx <= reflected.fx ? expanded : reflected;
      continue;
    }

    const contracted = evaluate(add(center, scale(subtract(worst.x, center), RHO)));
    logger.debug(`contraction: ${formatVector(contracted.x)} -> ${contracted.fx}`);

    if (contracted.fx < worst.fx) {
      simplex[n] = contracted;
      continue;
    }

    simplex = simplex.map((v, i) =>
      i === 0 ? v : evaluate(add(best.x, scale(subtract(v.x, best.x), SIGMA)))
    );
    logger.debug('shrinking the whole simplex');
  }

  logger.debug(`maximum number of iterations (${maxIter}) reached`);
  return result([...simplex].sort(byValue)[0]);
}

function result(vertex: Vertex): OptimizerResult {
  return { x: vertex.x.slice(), fx: vertex.fx };
}
