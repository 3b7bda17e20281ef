/**
 * Builtin Function Library
 *
 * The functions a predictor or input expression may call. They live in the
 * outermost scope, so data columns and effects shadow them as plain names
 * but never as callables.
 *
 * @module expression/builtins
 */

import { EvaluationError } from '../core/errors.js';
import { asStrings, recycledLength } from './interpreter.js';
import { Scope } from './scope.js';
import {
  NULL,
  asBooleans,
  asNumbers,
  character,
  fn,
  list,
  logical,
  matrix,
  numeric,
  rowCount,
  valueLength,
  type CallArgument,
  type FunctionValue,
  type Value,
} from './values.js';

/**
 * Match call arguments to formal names: exact names first, then positions.
 * Unmatched formals are absent from the result.
 */
export function bindArguments(
  fnName: string,
  args: CallArgument[],
  formals: readonly string[]
): Map<string, Value> {
  const bound = new Map<string, Value>();
  const positional: Value[] = [];

  for (const arg of args) {
    if (arg.name === null) {
      positional.push(arg.value);
      continue;
    }
    if (!formals.includes(arg.name)) {
      throw new EvaluationError(`${fnName}(): unused argument '${arg.name}'`);
    }
    if (bound.has(arg.name)) {
      throw new EvaluationError(`${fnName}(): argument '${arg.name}' matched more than once`);
    }
    bound.set(arg.name, arg.value);
  }

  const free = formals.filter(f => !bound.has(f));
  if (positional.length > free.length) {
    throw new EvaluationError(`${fnName}(): too many arguments`);
  }
  positional.forEach((value, i) => bound.set(free[i], value));
  return bound;
}

function required(fnName: string, bound: Map<string, Value>, name: string): Value {
  const value = bound.get(name);
  if (value === undefined) {
    throw new EvaluationError(`${fnName}(): argument '${name}' is missing`);
  }
  return value;
}

function scalar(fnName: string, value: Value | undefined, fallback: number): number {
  if (value === undefined || value.type === 'null') return fallback;
  const xs = asNumbers(value, `${fnName}()`);
  if (xs.length === 0) return fallback;
  return xs[0];
}

/**
 * Elementwise numeric function that keeps matrix shape and names
 */
function mathFunction(name: string, f: (x: number) => number): FunctionValue {
  return fn(name, args => {
    const x = required(name, bindArguments(name, args, ['x']), 'x');
    return mapNumbers(x, f, `${name}()`);
  });
}

function mapNumbers(x: Value, f: (v: number) => number, context: string): Value {
  if (x.type === 'matrix') return matrix(x.nrow, x.ncol, x.data.map(f), x.rowNames);
  const values = asNumbers(x, context).map(f);
  return numeric(values, x.type === 'numeric' ? x.names : null);
}

function reduction(name: string, f: (xs: number[]) => number): FunctionValue {
  return fn(name, args => {
    const xs = args.flatMap(a => asNumbers(a.value, `${name}()`));
    return numeric([f(xs)]);
  });
}

/**
 * Combine values into one vector (or list, when any part is a list)
 */
function combine(args: CallArgument[]): Value {
  const parts = args.filter(a => a.value.type !== 'null');
  if (parts.length === 0) return NULL;

  if (parts.some(a => a.value.type === 'list' || a.value.type === 'function')) {
    const items: Value[] = [];
    const names: Array<string | null> = [];
    for (const part of parts) {
      if (part.value.type === 'list') {
        items.push(...part.value.items);
        names.push(...part.value.names);
      } else {
        items.push(part.value);
        names.push(part.name);
      }
    }
    return list(items, names);
  }

  if (parts.some(a => a.value.type === 'character')) {
    return character(parts.flatMap(a => asStrings(a.value)));
  }
  if (parts.every(a => a.value.type === 'logical')) {
    return logical(parts.flatMap(a => asBooleans(a.value, 'c()')));
  }

  const values: number[] = [];
  const names: string[] = [];
  let named = false;
  for (const part of parts) {
    const xs = asNumbers(part.value, 'c()');
    values.push(...xs);
    const own = part.value.type === 'numeric' ? part.value.names : null;
    for (let i = 0; i < xs.length; i++) {
      if (own) {
        named = true;
        names.push(own[i]);
      } else if (part.name !== null) {
        named = true;
        names.push(xs.length === 1 ? part.name : `${part.name}${i + 1}`);
      } else {
        names.push('');
      }
    }
  }
  return numeric(values, named ? names : null);
}

function repeat(args: CallArgument[]): Value {
  const bound = bindArguments('rep', args, ['x', 'times', 'each', 'length.out']);
  const x = required('rep', bound, 'x');
  const each = scalar('rep', bound.get('each'), 1);
  const lengthOut = bound.get('length.out');

  const positions: number[] = [];
  const n = valueLength(x);
  for (let i = 0; i < n; i++) {
    for (let e = 0; e < each; e++) positions.push(i);
  }

  let out: number[];
  const times = bound.get('times');
  if (lengthOut !== undefined) {
    const len = scalar('rep', lengthOut, positions.length);
    out = positions.length === 0 ? [] : Array.from({ length: len }, (_, i) => positions[i % positions.length]);
  } else if (times !== undefined && valueLength(times) > 1) {
    const counts = asNumbers(times, 'rep()');
    if (counts.length !== positions.length) {
      throw new EvaluationError("rep(): invalid 'times' argument");
    }
    out = positions.flatMap((p, i) => Array.from({ length: counts[i] }, () => p));
  } else {
    const t = scalar('rep', times, 1);
    out = [];
    for (let k = 0; k < t; k++) out.push(...positions);
  }

  switch (x.type) {
    case 'character':
      return character(out.map(i => x.values[i]));
    case 'logical':
      return logical(out.map(i => x.values[i]));
    case 'list':
      return list(out.map(i => x.items[i]), out.map(i => x.names[i]));
    case 'null':
      return NULL;
    case 'numeric':
    case 'matrix':
    case 'function': {
      const xs = asNumbers(x, 'rep()');
      return numeric(out.map(i => xs[i]));
    }
  }
}

function sequence(args: CallArgument[]): Value {
  const bound = bindArguments('seq', args, ['from', 'to', 'by', 'length.out']);
  const from = scalar('seq', bound.get('from'), 1);
  const lengthOut = bound.get('length.out');
  const to = bound.get('to');

  if (lengthOut !== undefined) {
    const len = scalar('seq', lengthOut, 1);
    if (len === 1) return numeric([from]);
    const end = scalar('seq', to, from + len - 1);
    const by = (end - from) / (len - 1);
    return numeric(Array.from({ length: len }, (_, i) => from + i * by));
  }

  const end = scalar('seq', to, from);
  const by = scalar('seq', bound.get('by'), end >= from ? 1 : -1);
  if (by === 0 || (end - from) / by < 0) {
    throw new EvaluationError("seq(): wrong sign in 'by' argument");
  }
  const count = Math.floor((end - from) / by + 1e-10) + 1;
  return numeric(Array.from({ length: count }, (_, i) => from + i * by));
}

function columnBind(args: CallArgument[]): Value {
  const parts = args.filter(a => a.value.type !== 'null').map(a => a.value);
  if (parts.length === 0) return NULL;
  const nrow = Math.max(...parts.map(rowCount));
  const data: number[] = [];
  let ncol = 0;
  let rowNames: string[] | null = null;

  for (const part of parts) {
    if (part.type === 'matrix') {
      if (part.nrow !== nrow) {
        throw new EvaluationError(`cbind(): number of rows of matrices must match (${part.nrow} vs ${nrow})`);
      }
      data.push(...part.data);
      ncol += part.ncol;
      rowNames = rowNames ?? part.rowNames;
      continue;
    }
    const xs = asNumbers(part, 'cbind()');
    recycledLength(nrow, xs.length, 'cbind');
    for (let i = 0; i < nrow; i++) data.push(xs[xs.length === 1 ? 0 : i]);
    ncol += 1;
    if (part.type === 'numeric' && part.names && part.names.length === nrow) {
      rowNames = rowNames ?? part.names;
    }
  }
  return matrix(nrow, ncol, data, rowNames);
}

function makeMatrix(args: CallArgument[]): Value {
  const bound = bindArguments('matrix', args, ['data', 'nrow', 'ncol', 'byrow']);
  const data = asNumbers(bound.get('data') ?? numeric([NaN]), 'matrix()');
  const nrowArg = bound.get('nrow');
  const ncolArg = bound.get('ncol');
  let nrow: number;
  let ncol: number;
  if (nrowArg !== undefined && ncolArg !== undefined) {
    nrow = scalar('matrix', nrowArg, 1);
    ncol = scalar('matrix', ncolArg, 1);
  } else if (nrowArg !== undefined) {
    nrow = scalar('matrix', nrowArg, 1);
    ncol = Math.ceil(data.length / nrow);
  } else if (ncolArg !== undefined) {
    ncol = scalar('matrix', ncolArg, 1);
    nrow = Math.ceil(data.length / ncol);
  } else {
    nrow = data.length;
    ncol = 1;
  }
  if (data.length === 0) {
    throw new EvaluationError('matrix(): data has length 0');
  }
  const byrow = bound.has('byrow') && asBooleans(required('matrix', bound, 'byrow'), 'matrix()')[0] === true;
  const out = new Array<number>(nrow * ncol);
  for (let j = 0; j < ncol; j++) {
    for (let i = 0; i < nrow; i++) {
      const k = byrow ? i * ncol + j : i + j * nrow;
      out[i + j * nrow] = data[k % data.length];
    }
  }
  return matrix(nrow, ncol, out);
}

function columnReduce(name: string, mean: boolean): FunctionValue {
  return fn(name, args => {
    const x = required(name, bindArguments(name, args, ['x']), 'x');
    if (x.type !== 'matrix') {
      throw new EvaluationError(`${name}(): 'x' must be a matrix`);
    }
    const out: number[] = [];
    for (let j = 0; j < x.ncol; j++) {
      let total = 0;
      for (let i = 0; i < x.nrow; i++) total += x.data[i + j * x.nrow];
      out.push(mean ? total / x.nrow : total);
    }
    return numeric(out);
  });
}

function rowReduce(name: string, mean: boolean): FunctionValue {
  return fn(name, args => {
    const x = required(name, bindArguments(name, args, ['x']), 'x');
    if (x.type !== 'matrix') {
      throw new EvaluationError(`${name}(): 'x' must be a matrix`);
    }
    const out: number[] = [];
    for (let i = 0; i < x.nrow; i++) {
      let total = 0;
      for (let j = 0; j < x.ncol; j++) total += x.data[i + j * x.nrow];
      out.push(mean ? total / x.ncol : total);
    }
    return numeric(out, x.rowNames);
  });
}

function parallel(name: string, pick: (a: number, b: number) => number): FunctionValue {
  return fn(name, args => {
    const columns = args.map(a => asNumbers(a.value, `${name}()`));
    if (columns.length === 0) {
      throw new EvaluationError(`${name}(): no arguments`);
    }
    const n = columns.reduce((len, c) => recycledLength(len, c.length, name), columns[0].length);
    const out = Array.from({ length: n }, (_, i) =>
      columns.map(c => c[c.length === 1 ? 0 : i]).reduce((a, b) => pick(a, b))
    );
    return numeric(out);
  });
}

function conditional(args: CallArgument[]): Value {
  const bound = bindArguments('ifelse', args, ['test', 'yes', 'no']);
  const test = asBooleans(required('ifelse', bound, 'test'), 'ifelse()');
  const yes = asNumbers(required('ifelse', bound, 'yes'), 'ifelse()');
  const no = asNumbers(required('ifelse', bound, 'no'), 'ifelse()');
  return numeric(
    test.map((t, i) => (t ? yes[i % yes.length] : no[i % no.length]))
  );
}

function logistic(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

function builtinTable(): FunctionValue[] {
  return [
    fn('c', combine),
    fn('list', args => list(args.map(a => a.value), args.map(a => a.name))),
    fn('length', args => numeric([valueLength(required('length', bindArguments('length', args, ['x']), 'x'))])),
    reduction('sum', xs => xs.reduce((s, x) => s + x, 0)),
    reduction('prod', xs => xs.reduce((s, x) => s * x, 1)),
    reduction('mean', xs => (xs.length === 0 ? NaN : xs.reduce((s, x) => s + x, 0) / xs.length)),
    reduction('min', xs => Math.min(...xs)),
    reduction('max', xs => Math.max(...xs)),
    mathFunction('exp', Math.exp),
    mathFunction('log1p', Math.log1p),
    mathFunction('expm1', Math.expm1),
    mathFunction('sqrt', Math.sqrt),
    mathFunction('abs', Math.abs),
    mathFunction('sin', Math.sin),
    mathFunction('cos', Math.cos),
    mathFunction('tan', Math.tan),
    mathFunction('plogis', logistic),
    mathFunction('qlogis', p => Math.log(p / (1 - p))),
    fn('log', args => {
      const bound = bindArguments('log', args, ['x', 'base']);
      const x = required('log', bound, 'x');
      const base = bound.get('base');
      if (base === undefined) return mapNumbers(x, Math.log, 'log()');
      const denom = Math.log(scalar('log', base, Math.E));
      return mapNumbers(x, v => Math.log(v) / denom, 'log()');
    }),
    parallel('pmin', Math.min),
    parallel('pmax', Math.max),
    fn('rep', repeat),
    fn('seq', sequence),
    fn('seq_len', args => {
      const n = scalar('seq_len', required('seq_len', bindArguments('seq_len', args, ['length.out']), 'length.out'), 0);
      return numeric(Array.from({ length: n }, (_, i) => i + 1));
    }),
    fn('cbind', columnBind),
    fn('matrix', makeMatrix),
    fn('NROW', args => numeric([rowCount(required('NROW', bindArguments('NROW', args, ['x']), 'x'))])),
    fn('NCOL', args => {
      const x = required('NCOL', bindArguments('NCOL', args, ['x']), 'x');
      return numeric([x.type === 'matrix' ? x.ncol : 1]);
    }),
    fn('nrow', args => {
      const x = required('nrow', bindArguments('nrow', args, ['x']), 'x');
      return x.type === 'matrix' ? numeric([x.nrow]) : NULL;
    }),
    fn('ncol', args => {
      const x = required('ncol', bindArguments('ncol', args, ['x']), 'x');
      return x.type === 'matrix' ? numeric([x.ncol]) : NULL;
    }),
    fn('as.vector', args => {
      const x = required('as.vector', bindArguments('as.vector', args, ['x']), 'x');
      return x.type === 'matrix' ? numeric([...x.data]) : x;
    }),
    fn('ifelse', conditional),
    fn('is.null', args => logical([required('is.null', bindArguments('is.null', args, ['x']), 'x').type === 'null'])),
    columnReduce('colSums', false),
    columnReduce('colMeans', true),
    rowReduce('rowSums', false),
    rowReduce('rowMeans', true),
  ];
}

/**
 * Fresh scope holding every builtin function
 */
export function createBuiltinScope(): Scope {
  const scope = new Scope();
  for (const builtin of builtinTable()) {
    scope.define(builtin.name, builtin);
  }
  return scope;
}

/**
 * Names of all builtin functions
 */
export function builtinNames(): string[] {
  return builtinTable().map(b => b.name);
}
