/**
 * Evaluation functions.
 */

export { ValueFunction, applyPolicy, isEvalFunction } from './base';
export type { ErrorPolicy, EvalFunction, RowValueFunction } from './base';
export { Col, Cols, col } from './column';
export { Const, asFunction, isValue } from './constant';
export { Eval } from './eval';
export type { EvalOptions } from './eval';
export { BinaryFunction } from './binary';
export { Eq, Neq, Gt, Geq, Lt, Leq, OrderComparison } from './compare';
export type { CompareOptions, EqualityOptions } from './compare';
export { Add, Subtract, Multiply, Divide, FloorDivide, Arithmetic } from './arithmetic';
export type { ArithmeticOptions } from './arithmetic';
export { And, Or, Not } from './logic';
export { IsIn, IsNotIn } from './domain';
export type { DomainOptions } from './domain';
export { IsEmpty, IsNotEmpty, ColumnCheck, isEmptyValue } from './null';
export type { ColumnQuantifier, EmptyOptions } from './null';
export { IsMatch, IsNotMatch } from './regex';
export type { MatchOptions } from './regex';
export { Get, ListOf } from './list';
export type { GetOptions } from './list';
export { IfThenReplace } from './replace';
export { MinMaxScale, MaxAbsScale, DivideByTotal, Normalizer } from './normalize';
export type { NormalizeOptions } from './normalize';
export { Frequency } from './frequency';
export type { FrequencyOptions } from './frequency';
export { Lookup } from './lookup';
export type { LookupMapping, LookupOptions } from './lookup';
export { getUpdateFunction } from './update';
export type { UpdateSpec } from './update';
