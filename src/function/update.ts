import { type ColumnRef, type Value, isTuple } from '../types/row';
import { type EvalFunction, type RowValueFunction, ValueFunction, isEvalFunction } from './base';
import { col } from './column';
import { Const, isValue } from './constant';
import { Eval } from './eval';
import { type LookupMapping, Lookup } from './lookup';
import { IfThenReplace } from './replace';

/**
 * Anything an update accepts as the new value of its columns.
 */
export type UpdateSpec = EvalFunction | ValueFunction | RowValueFunction | LookupMapping | Value;

/**
 * Turn an update argument into the evaluation function that computes the
 * new column values.
 *
 * - callables and value functions apply to the column values, per column
 *   when several columns are updated
 * - mappings replace values through a `Lookup`
 * - constants fill every updated column
 * - `IfThenReplace` without a fallback keeps the current values of the
 *   updated columns for rows that do not match
 */
export function getUpdateFunction(columns: readonly ColumnRef[], func: UpdateSpec): EvalFunction {
  const unary = columns.length > 1;

  if (isValue(func)) {
    const value = func;
    if (unary && !isTuple(value)) {
      return new Const(columns.map(() => value));
    }
    return new Const(value);
  }
  if (typeof func === 'function') {
    return new Eval(columns, func, { unary });
  }
  if (func instanceof ValueFunction) {
    return new Eval(columns, func, { unary });
  }
  if (func instanceof IfThenReplace) {
    return func.hasOtherwise ? func : func.withOtherwise(col(columns));
  }
  if (isEvalFunction(func)) {
    return func;
  }
  return new Eval(columns, new Lookup(func), { unary });
}
