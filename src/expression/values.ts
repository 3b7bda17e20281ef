/**
 * Expression Values
 *
 * Closed set of tagged runtime values. Vectors carry no dimension; matrices
 * are stored column-major. Scalars are length-1 vectors.
 *
 * @module expression/values
 */

import type { DataValue, MainValue } from '../types/index.js';
import { EvaluationError } from '../core/errors.js';
import type { Scope } from './scope.js';

export interface NumericValue {
  type: 'numeric';
  values: number[];
  names: string[] | null;
}

export interface CharacterValue {
  type: 'character';
  values: string[];
}

export interface LogicalValue {
  type: 'logical';
  values: boolean[];
}

export interface MatrixValue {
  type: 'matrix';
  nrow: number;
  ncol: number;
  /** Column-major */
  data: number[];
  rowNames: string[] | null;
}

export interface ListValue {
  type: 'list';
  items: Value[];
  names: Array<string | null>;
}

/**
 * Argument as seen by a callable
 */
export interface CallArgument {
  name: string | null;
  value: Value;
}

export interface FunctionValue {
  type: 'function';
  name: string;
  call: (args: CallArgument[], scope: Scope) => Value;
}

export interface NullValue {
  type: 'null';
}

export type Value =
  | NumericValue
  | CharacterValue
  | LogicalValue
  | MatrixValue
  | ListValue
  | FunctionValue
  | NullValue;

export const NULL: NullValue = { type: 'null' };

export function numeric(values: number[], names: string[] | null = null): NumericValue {
  return { type: 'numeric', values, names };
}

export function character(values: string[]): CharacterValue {
  return { type: 'character', values };
}

export function logical(values: boolean[]): LogicalValue {
  return { type: 'logical', values };
}

export function matrix(nrow: number, ncol: number, data: number[], rowNames: string[] | null = null): MatrixValue {
  if (data.length !== nrow * ncol) {
    throw new EvaluationError(`matrix data length ${data.length} does not match ${nrow}x${ncol}`);
  }
  return { type: 'matrix', nrow, ncol, data, rowNames };
}

/**
 * Single-column matrix from a vector
 */
export function columnMatrix(values: number[], rowNames: string[] | null = null): MatrixValue {
  return matrix(values.length, 1, [...values], rowNames);
}

export function list(items: Value[], names?: Array<string | null>): ListValue {
  return { type: 'list', items, names: names ?? items.map(() => null) };
}

export function fn(name: string, call: (args: CallArgument[], scope: Scope) => Value): FunctionValue {
  return { type: 'function', name, call };
}

/**
 * Human-readable type name for error messages
 */
export function typeName(value: Value): string {
  return value.type;
}

/**
 * Length: vector length, matrix cells, list items
 */
export function valueLength(value: Value): number {
  switch (value.type) {
    case 'numeric':
    case 'character':
    case 'logical':
      return value.values.length;
    case 'matrix':
      return value.data.length;
    case 'list':
      return value.items.length;
    case 'function':
      return 1;
    case 'null':
      return 0;
  }
}

/**
 * Number of rows: vector length or matrix rows
 */
export function rowCount(value: Value): number {
  return value.type === 'matrix' ? value.nrow : valueLength(value);
}

/**
 * Numeric view of a value; logicals become 0/1
 */
export function asNumbers(value: Value, context: string): number[] {
  switch (value.type) {
    case 'numeric':
      return value.values;
    case 'logical':
      return value.values.map(b => (b ? 1 : 0));
    case 'matrix':
      return value.data;
    case 'null':
      return [];
    case 'character':
    case 'list':
    case 'function':
      throw new EvaluationError(`${context}: expected a numeric value, got ${typeName(value)}`);
  }
}

/**
 * Logical view of a value; numbers are true when nonzero
 */
export function asBooleans(value: Value, context: string): boolean[] {
  if (value.type === 'logical') return value.values;
  return asNumbers(value, context).map(x => x !== 0);
}

/**
 * Convert to mapper main values: numbers or stringified keys
 */
export function asMainValues(value: Value, context: string): MainValue[] {
  switch (value.type) {
    case 'character':
      return value.values;
    case 'numeric':
    case 'logical':
    case 'matrix':
    case 'null':
      return asNumbers(value, context);
    case 'list':
    case 'function':
      throw new EvaluationError(`${context}: expected a vector, got ${typeName(value)}`);
  }
}

/**
 * True for flat numeric results and single-column matrices
 */
export function isColumnLike(value: Value): boolean {
  return (
    value.type === 'numeric' ||
    value.type === 'logical' ||
    (value.type === 'matrix' && value.ncol === 1)
  );
}

/**
 * Row names a column-like value contributes to a result matrix
 */
export function rowNamesOf(value: Value): string[] | null {
  if (value.type === 'matrix') return value.rowNames ? [...value.rowNames] : null;
  if (value.type === 'numeric') return value.names ? [...value.names] : null;
  return null;
}

function isNumberArray(values: DataValue[]): values is number[] {
  return values.every(v => typeof v === 'number');
}

function isStringArray(values: DataValue[]): values is string[] {
  return values.every(v => typeof v === 'string');
}

function isBooleanArray(values: DataValue[]): values is boolean[] {
  return values.every(v => typeof v === 'boolean');
}

/**
 * Convert raw data into an expression value
 */
export function fromData(data: DataValue): Value {
  if (data === null) return NULL;
  if (typeof data === 'number') return numeric([data]);
  if (typeof data === 'string') return character([data]);
  if (typeof data === 'boolean') return logical([data]);
  if (Array.isArray(data)) {
    const items: DataValue[] = data;
    if (items.length === 0) return numeric([]);
    if (isNumberArray(items)) return numeric([...items]);
    if (isStringArray(items)) return character([...items]);
    if (isBooleanArray(items)) return logical([...items]);
    return list(items.map(fromData));
  }
  const names = Object.keys(data);
  return list(names.map(n => fromData(data[n])), names);
}

/**
 * Plain JSON-friendly form of a value
 */
export function toPlain(value: Value): unknown {
  switch (value.type) {
    case 'numeric':
    case 'character':
    case 'logical':
      return value.values;
    case 'matrix': {
      const columns: number[][] = [];
      for (let j = 0; j < value.ncol; j++) {
        columns.push(value.data.slice(j * value.nrow, (j + 1) * value.nrow));
      }
      return { nrow: value.nrow, ncol: value.ncol, columns, rowNames: value.rowNames };
    }
    case 'list': {
      const named = value.names.some(n => n !== null);
      if (!named) return value.items.map(toPlain);
      const out: Record<string, unknown> = {};
      value.items.forEach((item, i) => {
        out[value.names[i] ?? String(i + 1)] = toPlain(item);
      });
      return out;
    }
    case 'function':
      return `<function ${value.name}>`;
    case 'null':
      return null;
  }
}
