import { describe, it, expect, vi } from 'vitest';
import {
  nelderMead,
  norm,
  subtract,
  MemoryLogger,
  SolverError,
  ErrorCodes,
  hasErrorCode,
} from '../src/index.js';

// Rosenbrock: f(x,y) = (1-x)² + 100(y-x²)², minimum 0 at (1, 1)
function rosenbrock(x: number[]): number {
  return (1 - x[0]) ** 2 + 100 * (x[1] - x[0] ** 2) ** 2;
}

function quadratic(x: number[]): number {
  return (x[0] - 3) ** 2 + (x[1] + 2) ** 2;
}

describe('nelderMead', () => {
  it('should minimize Rosenbrock function from (2, -1)', () => {
    const result = nelderMead(rosenbrock, [2, -1], {
      simplexSize: 0.1,
      tol: 1e-10,
      maxIter: 1000,
    });

    expect(norm(subtract(result.x, [1, 1]))).toBeLessThan(1e-4);
    expect(Math.abs(result.fx)).toBeLessThan(1e-6);
  });

  it('should minimize quadratic function', () => {
    const result = nelderMead(quadratic, [0, 0]);

    expect(result.x[0]).toBeCloseTo(3, 4);
    expect(result.x[1]).toBeCloseTo(-2, 4);
    expect(result.fx).toBeLessThan(1e-6);
  });

  it('should handle 1D optimization', () => {
    const result = nelderMead(x => (x[0] - 5) ** 2, [0]);
    expect(result.x[0]).toBeCloseTo(5, 4);
  });

  it('should handle 3D optimization', () => {
    const sphere = (x: number[]) => x[0] ** 2 + x[1] ** 2 + x[2] ** 2;
    const result = nelderMead(sphere, [1, 2, 3], { simplexSize: 0.5 });

    expect(result.x[0]).toBeCloseTo(0, 3);
    expect(result.x[1]).toBeCloseTo(0, 3);
    expect(result.x[2]).toBeCloseTo(0, 3);
  });

  it('should build the initial simplex along the unit axes', () => {
    const fn = vi.fn((x: number[]) => x[0] ** 2 + x[1] ** 2);
    nelderMead(fn, [1, 2], { simplexSize: 0.5, maxIter: 1 });

    const initial = fn.mock.calls.slice(0, 3).map(call => call[0]);
    expect(initial).toEqual([[1, 2], [1.5, 2], [1, 2.5]]);
  });

  it('should return fx equal to f(x)', () => {
    const result = nelderMead(rosenbrock, [2, -1], { maxIter: 50 });
    expect(result.fx).toBe(rosenbrock(result.x));
  });

  it('should return the best point silently when maxIter runs out', () => {
    const x0 = [2, -1];
    const result = nelderMead(rosenbrock, x0, { maxIter: 5 });

    expect(Object.keys(result).sort()).toEqual(['fx', 'x']);
    expect(result.fx).toBeLessThanOrEqual(rosenbrock(x0));
  });

  it('should not mutate the starting point', () => {
    const x0 = [2, -1];
    const result = nelderMead(rosenbrock, x0, { maxIter: 20 });

    expect(x0).toEqual([2, -1]);
    expect(result.x).not.toBe(x0);
  });

  it('should never pick a NaN vertex as best', () => {
    const fn = (x: number[]) => (x[0] > 1.05 ? NaN : x[0] ** 2 + x[1] ** 2);
    const result = nelderMead(fn, [1, 0], { maxIter: 500 });

    expect(Number.isNaN(result.fx)).toBe(false);
    expect(result.fx).toBeLessThan(1);
  });

  it('should trace the run to the given logger', () => {
    const logger = new MemoryLogger();
    nelderMead(quadratic, [0, 0], { simplexSize: 0.5, logger });

    const messages = logger.messages();
    expect(messages.slice(0, 4)).toEqual([
      'initial simplex:',
      '  [0, 0] -> 13',
      '  [0.5, 0] -> 10.25',
      '  [0, 0.5] -> 15.25',
    ]);
    expect(messages[4]).toBe('iteration 0, sorted simplex:');
    expect(messages[5]).toBe('  [0.5, 0] -> 10.25');
    expect(messages[messages.length - 1]).toMatch(
      /^converged on (function values|simplex size) after \d+ iterations$/
    );
  });

  it('should report reaching maxIter in the trace', () => {
    const logger = new MemoryLogger();
    nelderMead(rosenbrock, [2, -1], { maxIter: 3, logger });

    const messages = logger.messages();
    expect(messages[messages.length - 1]).toBe('maximum number of iterations (3) reached');
  });

  it('should reject an empty starting point', () => {
    try {
      nelderMead(() => 0, []);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SolverError);
      expect(hasErrorCode(error, ErrorCodes.INVALID_OPTIONS)).toBe(true);
    }
  });

  it('should reject a non-positive simplex size', () => {
    expect(() => nelderMead(quadratic, [0, 0], { simplexSize: 0 })).toThrow(
      'simplexSize must be a positive finite number, got 0'
    );
  });
});

describe('nelderMead acceptance rules', () => {
  // Simplex from [0, 0] with size 1: f = 0, 1, 2 at [0, 0], [1, 0], [0, 1].
  // First iteration trial points: centroid [0.5, 0], reflection [1, -1],
  // expansion [1.5, -2], contraction [0.25, 0.5].
  function run(trial: Record<string, number>) {
    const values: Record<string, number> = { '0,0': 0, '1,0': 1, '0,1': 2, ...trial };
    const fn = vi.fn((x: number[]) => values[x.join(',')] ?? 10);
    const logger = new MemoryLogger();
    nelderMead(fn, [0, 0], { simplexSize: 1, maxIter: 2, logger });

    const messages = logger.messages();
    const first = messages.indexOf('iteration 0, sorted simplex:');
    const second = messages.indexOf('iteration 1, sorted simplex:');
    return {
      steps: messages.slice(first + 4, second),
      next: messages.slice(second + 1, second + 4),
    };
  }

  it('should accept a reflection equal to the best value', () => {
    const { steps, next } = run({ '1,-1': 0 });

    expect(steps).toEqual(['centroid: [0.5, 0]', 'reflection: [1, -1] -> 0']);
    expect(next).toEqual(['  [0, 0] -> 0', '  [1, -1] -> 0', '  [1, 0] -> 1']);
  });

  it('should not accept a reflection equal to the second-worst value', () => {
    const { steps, next } = run({ '1,-1': 1, '0.25,0.5': 1.5 });

    expect(steps).toEqual([
      'centroid: [0.5, 0]',
      'reflection: [1, -1] -> 1',
      'contraction: [0.25, 0.5] -> 1.5',
    ]);
    expect(next).toEqual(['  [0, 0] -> 0', '  [1, 0] -> 1', '  [0.25, 0.5] -> 1.5']);
  });

  it('should take the expansion when it ties the reflection', () => {
    const { steps, next } = run({ '1,-1': -1, '1.5,-2': -1 });

    expect(steps).toEqual([
      'centroid: [0.5, 0]',
      'reflection: [1, -1] -> -1',
      'expansion: [1.5, -2] -> -1',
    ]);
    expect(next).toEqual(['  [1.5, -2] -> -1', '  [0, 0] -> 0', '  [1, 0] -> 1']);
  });

  it('should keep the reflection when the expansion is worse', () => {
    const { next } = run({ '1,-1': -1, '1.5,-2': -0.5 });
    expect(next).toEqual(['  [1, -1] -> -1', '  [0, 0] -> 0', '  [1, 0] -> 1']);
  });

  it('should shrink when the contraction only ties the worst value', () => {
    const { steps, next } = run({ '1,-1': 3, '0.25,0.5': 2 });

    expect(steps).toEqual([
      'centroid: [0.5, 0]',
      'reflection: [1, -1] -> 3',
      'contraction: [0.25, 0.5] -> 2',
      'shrinking the whole simplex',
    ]);
    expect(next).toEqual(['  [0, 0] -> 0', '  [0.5, 0] -> 10', '  [0, 0.5] -> 10']);
  });
});

describe('nelderMead determinism', () => {
  it('should give bit-identical results for identical calls', () => {
    const first = nelderMead(rosenbrock, [2, -1], { tol: 1e-10, maxIter: 1000 });
    const second = nelderMead(rosenbrock, [2, -1], { tol: 1e-10, maxIter: 1000 });

    expect(second).toEqual(first);
    expect(Object.is(second.fx, first.fx)).toBe(true);
  });
});
