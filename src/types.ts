import type { ErrorCode } from './errors.js';
import type { Logger } from './logging.js';

export type ScalarFunction = (x: number) => number;

export type VectorFunction = (x: number[]) => number;

/**
 * Outcome of a solver that can detect its own failure.
 */
export type SolveResult =
  | { ok: true; value: number }
  | { ok: false; code: ErrorCode; message: string };

export interface OptimizerResult {
  x: number[];
  fx: number;
}

export interface IterativeOptions {
  tol?: number;
  maxIter?: number;
}

export interface NumericDerivativeOptions extends IterativeOptions {
  /** Central-difference step */
  h?: number;
}

export interface TraceOptions {
  verbose?: boolean;
  logger?: Logger;
}

export type NewtonOptions = IterativeOptions;

export type NewtonNumericOptions = NumericDerivativeOptions;

export type HalleyOptions = IterativeOptions & TraceOptions;

export type HalleyNumericOptions = NumericDerivativeOptions & TraceOptions;

export interface BisectionOptions {
  tol?: number;
}

export type SecantOptions = IterativeOptions;

export type RidderOptions = IterativeOptions;

export interface GoldenSectionOptions {
  tol?: number;
}

export interface NelderMeadOptions extends IterativeOptions, TraceOptions {
  /** Offset of each initial vertex from x0 along its axis */
  simplexSize?: number;
}
