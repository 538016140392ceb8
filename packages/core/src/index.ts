/**
 * @cellwatch/core
 *
 * Reactive cells and dynamic wait-for-any aggregation.
 *
 * @fileoverview Public API exports.
 */

export const VERSION = '0.1.0';

// Core API
export {Cell} from './lib/cell.js';
export {Aggregation} from './lib/aggregation.js';
export {Latch, setListenerErrorHandler} from './lib/latch.js';

// Errors
export {
  ReentrantUpdateError,
  CancelledError,
  ChangeCallbackError,
  StoppedError,
  formatValue,
} from './lib/errors.js';

// Logging
export {createLogger, noopLogger} from './lib/logger.js';

// Types
export type {UpdateResult} from './lib/cell.js';
export type {AggregationOptions, UntypedCell} from './lib/aggregation.js';
export type {ChangeSignal, ListenerErrorHandler} from './lib/latch.js';
export type {
  Logger,
  LogEntry,
  LogLevel,
  LoggerOptions,
} from './lib/logger.js';
