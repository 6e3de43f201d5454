/**
 * Error module - exports all scrubline error types.
 */

export { ScrublineError } from './base';
export { ConfigurationError } from './configuration-error';
export { ColumnNotFoundError } from './column-not-found';
export { SchemaError } from './schema-error';
export { InvalidOperationError } from './invalid-operation';
export { UnpreparedFunctionError } from './unprepared-function';
export { PredicateTypeError } from './predicate-type';
export { DataError } from './data-error';
export { FileError } from './file-error';
export { LimitReachedSignal, isLimitReached } from './limit-reached';
