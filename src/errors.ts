import type { SolveResult } from './types.js';

export const ErrorCodes = {
  /** Iteration budget exhausted before the convergence test passed */
  NON_CONVERGENCE: 'NON_CONVERGENCE',
  /** Interval has no sign change, or lost it mid-iteration */
  INVALID_BRACKET: 'INVALID_BRACKET',
  /** Tolerance, budget, step or starting point out of range */
  INVALID_OPTIONS: 'INVALID_OPTIONS',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class SolverError extends Error {
  readonly code: ErrorCode;
  readonly details?: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'SolverError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SolverError);
    }
  }

  toJSON(): { name: string; code: ErrorCode; message: string; details: unknown } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export function success(value: number): SolveResult {
  return { ok: true, value };
}

export function failure(code: ErrorCode, message: string): SolveResult {
  return { ok: false, code, message };
}

/**
 * Value of a successful result; throws the failure as a SolverError otherwise.
 */
export function unwrap(result: SolveResult): number {
  if (result.ok) return result.value;
  throw new SolverError(result.code, result.message);
}

export function isSolverError(error: unknown): error is SolverError {
  return error instanceof SolverError;
}

export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return isSolverError(error) && error.code === code;
}
