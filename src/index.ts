// Derivative-based solvers
export { newton, newtonNumeric } from './newton.js';
export { halley, halleyNumeric } from './halley.js';
export { centralDifference, secondCentralDifference } from './derivative.js';

// Bracketing solvers
export { bisection, secant, ridder } from './bracketing.js';

// Minimizers
export { goldenSection } from './golden-section.js';
export { nelderMead } from './optimizer.js';

// Errors
export {
  ErrorCodes,
  SolverError,
  success,
  failure,
  unwrap,
  isSolverError,
  hasErrorCode,
  type ErrorCode,
} from './errors.js';

// Logging
export {
  ConsoleLogger,
  MemoryLogger,
  silentLogger,
  type Logger,
  type LogLevel,
  type MemoryLogEntry,
} from './logging.js';

// Utilities
export {
  add,
  subtract,
  scale,
  dot,
  norm,
  mean,
  standardDeviation,
  meanPairwiseDistance,
  centroid,
} from './utils.js';

// Types
export type {
  ScalarFunction,
  VectorFunction,
  SolveResult,
  OptimizerResult,
  IterativeOptions,
  NumericDerivativeOptions,
  TraceOptions,
  NewtonOptions,
  NewtonNumericOptions,
  HalleyOptions,
  HalleyNumericOptions,
  BisectionOptions,
  SecantOptions,
  RidderOptions,
  GoldenSectionOptions,
  NelderMeadOptions,
} from './types.js';
