import { ErrorCodes, SolverError } from './errors.js';

export const DEFAULT_TOL = 1e-10;
export const DEFAULT_MAX_ITER = 100;
export const DEFAULT_STEP = 1e-6;
export const DEFAULT_SIMPLEX_SIZE = 0.1;
export const DEFAULT_SIMPLEX_MAX_ITER = 1000;

function invalid(message: string, details: unknown): never {
  throw new SolverError(ErrorCodes.INVALID_OPTIONS, message, details);
}

export function assertTolerance(tol: number): void {
  if (!(Number.isFinite(tol) && tol > 0)) {
    invalid(`Tolerance must be a positive finite number, got ${tol}`, { tol });
  }
}

export function assertMaxIter(maxIter: number): void {
  if (!(Number.isInteger(maxIter) && maxIter > 0)) {
    invalid(`maxIter must be a positive integer, got ${maxIter}`, { maxIter });
  }
}

export function assertStep(name: string, value: number): void {
  if (!(Number.isFinite(value) && value > 0)) {
    invalid(`${name} must be a positive finite number, got ${value}`, { [name]: value });
  }
}

export function assertFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    invalid(`${name} must be finite, got ${value}`, { [name]: value });
  }
}

export function assertPoint(x0: number[]): void {
  if (x0.length === 0) {
    invalid('Starting point must have at least one coordinate', { x0 });
  }
  x0.forEach((v, i) => assertFinite(`x0[${i}]`, v));
}

/**
 * Fixed step count from a bracket width and tolerance; overflow of the
 * width or underflow of tol/width leaves no finite count.
 */
export function assertStepCount(steps: number, width: number, tol: number): void {
  if (!Number.isFinite(steps)) {
    invalid(
      `Bracket width ${width} and tolerance ${tol} give no finite step count`,
      { width, tol }
    );
  }
}
