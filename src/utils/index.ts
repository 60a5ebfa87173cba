/**
 * Utility exports
 * @module utils
 */

// Math utilities
export {
  clamp,
  linspace,
  cumulativeSum,
  mean,
  standardDeviation,
  maxAbs,
  hanning,
  resampleLinear,
  nextPowerOfTwo,
  linearRegressionSlope,
} from './math';

// Validation and errors
export {
  SynthesisError,
  InvalidParameterError,
  InsufficientDurationError,
  UnsupportedTypeError,
  requireFinite,
  requirePositive,
  requireNonNegative,
  requireInRange,
  requireUnitInterval,
  requireInteger,
  requireOneOf,
  requireSignalLength,
} from './validation';

// Logging utilities
export {
  Logger,
  LogLevel,
  createLogger,
  createSilentLogger,
  configureLogger,
  configureFromEnvironment,
  parseLogLevel,
  setLogLevel,
  getLogLevel,
  defaultLogger,
  type LogEntry,
  type LoggerConfig,
  type LogLevelName,
} from './logger';
