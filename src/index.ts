/**
 * scrubline - streaming row pipelines for cleaning tabular data
 *
 * Pipelines are lazy chains of row operators over a CSV file or an
 * in-memory table. Nothing is read until a terminal operation runs.
 *
 * @example
 * ```ts
 * import { col, Gt, IsEmpty, MinMaxScale, stream } from 'scrubline';
 *
 * const cleaned = stream('./prices.csv', { nullToken: 'NA' })
 *   .delete(new IsEmpty('price'))
 *   .update('price', new MinMaxScale())
 *   .filter(new Gt(col('price'), 0.5))
 *   .toTable();
 *
 * cleaned.print();
 * ```
 */

// Pipelines
export { DataPipeline, stream } from './pipeline';
export type { PipelineFilterOptions, StreamSource } from './pipeline';

// Data structures
export { DataTable, DataGrouping, formatTable, formatValue } from './data';
export type { PrintOptions } from './data';

// Row model
export * from './types';

// Evaluation functions
export * from './function';

// Operators and consumers
export * from './ops';

// Row sources and CSV files
export * from './io';

// Errors
export * from './errors';

// Configuration
export { configure, getConfig, resetConfig, getDefaultConfig } from './core/config';
export type { ScrublineConfig } from './core/config';

// Logging
export {
  createConsoleLogger,
  createLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  getLogger,
  isLevelEnabled,
  setLogger,
  withContext,
} from './core/logging';
export type {
  ConsoleLoggerConfig,
  LogContext,
  LogContextValue,
  LogEntry,
  LogFormat,
  LogLevel,
  Logger,
  LoggerConfig,
  TestLogger,
} from './core/logging';

// Utilities
export { Counter } from './utils/counter';
export { keyOf, valuesEqual } from './utils/key';
export { toNumber, isNumeric } from './utils/numeric';
