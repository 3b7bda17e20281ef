/**
 * Expression Interpreter
 *
 * Tree-walking evaluator over parsed expressions. Names resolve through an
 * explicit Scope; there is no access to host globals. Arithmetic is
 * vectorized with length-1 recycling, keeps matrix shape and carries vector
 * names through.
 *
 * @module expression/interpreter
 */

import { EvaluationError } from '../core/errors.js';
import { parseExpression, type ArgumentNode, type BinaryOperator, type ExprNode } from './parser.js';
import { Scope } from './scope.js';
import {
  NULL,
  asBooleans,
  asNumbers,
  character,
  list,
  logical,
  matrix,
  numeric,
  typeName,
  valueLength,
  type CallArgument,
  type MatrixValue,
  type Value,
} from './values.js';

type Arith = (a: number, b: number) => number;

const ARITHMETIC: Partial<Record<BinaryOperator, Arith>> = {
  '+': (a, b) => a + b,
  '-': (a, b) => a - b,
  '*': (a, b) => a * b,
  '/': (a, b) => a / b,
  '^': (a, b) => Math.pow(a, b),
  '%%': (a, b) => a - Math.floor(a / b) * b,
};

type Compare = (a: number | string, b: number | string) => boolean;

const COMPARISONS: Partial<Record<BinaryOperator, Compare>> = {
  '==': (a, b) => a === b,
  '!=': (a, b) => a !== b,
  '<': (a, b) => a < b,
  '<=': (a, b) => a <= b,
  '>': (a, b) => a > b,
  '>=': (a, b) => a >= b,
};

/**
 * Length of an elementwise result, or an error when lengths do not recycle
 */
export function recycledLength(la: number, lb: number, op: string): number {
  if (la === 0 || lb === 0) return 0;
  if (la === lb || lb === 1) return la;
  if (la === 1) return lb;
  throw new EvaluationError(`Operands of '${op}' have incompatible lengths ${la} and ${lb}`);
}

function shapeOf(a: Value, b: Value, length: number): MatrixValue | null {
  if (a.type === 'matrix' && a.data.length === length) return a;
  if (b.type === 'matrix' && b.data.length === length) return b;
  return null;
}

function namesOf(a: Value, b: Value, length: number): string[] | null {
  if (a.type === 'numeric' && a.names && a.names.length === length) return a.names;
  if (b.type === 'numeric' && b.names && b.names.length === length) return b.names;
  return null;
}

function arithmetic(op: BinaryOperator, f: Arith, a: Value, b: Value): Value {
  const xs = asNumbers(a, `'${op}'`);
  const ys = asNumbers(b, `'${op}'`);
  const n = recycledLength(xs.length, ys.length, op);
  const out = new Array<number>(n);
  for (let i = 0; i < n; i++) {
    out[i] = f(xs[xs.length === 1 ? 0 : i], ys[ys.length === 1 ? 0 : i]);
  }
  const shape = shapeOf(a, b, n);
  if (shape) {
    return matrix(shape.nrow, shape.ncol, out, shape.rowNames);
  }
  return numeric(out, namesOf(a, b, n));
}

function comparison(op: BinaryOperator, f: Compare, a: Value, b: Value): Value {
  const useStrings = a.type === 'character' || b.type === 'character';
  const xs: Array<number | string> = useStrings ? asStrings(a) : asNumbers(a, `'${op}'`);
  const ys: Array<number | string> = useStrings ? asStrings(b) : asNumbers(b, `'${op}'`);
  const n = recycledLength(xs.length, ys.length, op);
  const out = new Array<boolean>(n);
  for (let i = 0; i < n; i++) {
    out[i] = f(xs[xs.length === 1 ? 0 : i], ys[ys.length === 1 ? 0 : i]);
  }
  return logical(out);
}

function logicalOp(op: '&' | '|', a: Value, b: Value): Value {
  const xs = asBooleans(a, `'${op}'`);
  const ys = asBooleans(b, `'${op}'`);
  const n = recycledLength(xs.length, ys.length, op);
  const out = new Array<boolean>(n);
  for (let i = 0; i < n; i++) {
    const x = xs[xs.length === 1 ? 0 : i];
    const y = ys[ys.length === 1 ? 0 : i];
    out[i] = op === '&' ? x && y : x || y;
  }
  return logical(out);
}

function range(a: Value, b: Value): Value {
  const from = asNumbers(a, "':'");
  const to = asNumbers(b, "':'");
  if (from.length === 0 || to.length === 0) {
    throw new EvaluationError("Argument of length 0 in ':'");
  }
  const start = from[0];
  const end = to[0];
  const step = end >= start ? 1 : -1;
  const out: number[] = [];
  for (let x = start; step > 0 ? x <= end + 1e-10 : x >= end - 1e-10; x += step) {
    out.push(x);
  }
  return numeric(out);
}

/**
 * Character view of a value
 */
export function asStrings(value: Value): string[] {
  switch (value.type) {
    case 'character':
      return value.values;
    case 'logical':
      return value.values.map(b => (b ? 'TRUE' : 'FALSE'));
    case 'numeric':
      return value.values.map(formatNumber);
    case 'matrix':
      return value.data.map(formatNumber);
    case 'null':
      return [];
    case 'list':
    case 'function':
      throw new EvaluationError(`Cannot convert ${typeName(value)} to character`);
  }
}

function formatNumber(x: number): string {
  if (Number.isNaN(x)) return 'NaN';
  if (x === Infinity) return 'Inf';
  if (x === -Infinity) return '-Inf';
  return String(x);
}

// ============================================================================
// Indexing
// ============================================================================

/**
 * Resolve one index argument into 0-based positions over `length` elements
 */
function resolvePositions(index: Value | null, length: number, names: readonly (string | null)[] | null): number[] {
  const all = Array.from({ length }, (_, i) => i);
  if (index === null) return all;

  switch (index.type) {
    case 'logical': {
      const mask = index.values;
      if (mask.length === 0) return [];
      return all.filter(i => mask[i % mask.length]);
    }
    case 'character': {
      return index.values.map(name => {
        const pos = names ? names.indexOf(name) : -1;
        if (pos < 0) {
          throw new EvaluationError(`Subscript '${name}' out of bounds`);
        }
        return pos;
      });
    }
    case 'numeric':
    case 'matrix': {
      const raw = asNumbers(index, 'index').map(Math.trunc).filter(i => i !== 0);
      if (raw.length === 0) return [];
      if (raw.every(i => i < 0)) {
        const drop = new Set(raw.map(i => -i - 1));
        return all.filter(i => !drop.has(i));
      }
      if (raw.some(i => i < 0)) {
        throw new EvaluationError('Cannot mix positive and negative subscripts');
      }
      return raw.map(i => i - 1);
    }
    case 'null':
      return [];
    case 'list':
    case 'function':
      throw new EvaluationError(`Invalid subscript type '${typeName(index)}'`);
  }
}

function checkBounds(positions: number[], length: number): void {
  const bad = positions.find(i => i >= length);
  if (bad !== undefined) {
    throw new EvaluationError(`Subscript ${bad + 1} out of bounds (length ${length})`);
  }
}

function indexVector(target: Value, index: Value | null): Value {
  switch (target.type) {
    case 'numeric': {
      const pos = resolvePositions(index, target.values.length, target.names);
      checkBounds(pos, target.values.length);
      const names = target.names;
      return numeric(pos.map(i => target.values[i]), names ? pos.map(i => names[i]) : null);
    }
    case 'character': {
      const pos = resolvePositions(index, target.values.length, null);
      checkBounds(pos, target.values.length);
      return character(pos.map(i => target.values[i]));
    }
    case 'logical': {
      const pos = resolvePositions(index, target.values.length, null);
      checkBounds(pos, target.values.length);
      return logical(pos.map(i => target.values[i]));
    }
    case 'matrix': {
      const pos = resolvePositions(index, target.data.length, null);
      checkBounds(pos, target.data.length);
      return numeric(pos.map(i => target.data[i]));
    }
    case 'list': {
      const pos = resolvePositions(index, target.items.length, target.names);
      checkBounds(pos, target.items.length);
      return list(pos.map(i => target.items[i]), pos.map(i => target.names[i]));
    }
    case 'null':
      return NULL;
    case 'function':
      throw new EvaluationError('Object of type function is not subsettable');
  }
}

function indexMatrix(target: MatrixValue, rows: Value | null, cols: Value | null): Value {
  const r = resolvePositions(rows, target.nrow, target.rowNames);
  const c = resolvePositions(cols, target.ncol, null);
  checkBounds(r, target.nrow);
  checkBounds(c, target.ncol);

  const data: number[] = [];
  for (const j of c) {
    for (const i of r) data.push(target.data[i + j * target.nrow]);
  }
  const rowNames = target.rowNames;
  const selectedNames = rowNames ? r.map(i => rowNames[i]) : null;

  // Single row or column drops to a plain vector
  if (c.length === 1) return numeric(data, selectedNames);
  if (r.length === 1) return numeric(data);
  return matrix(r.length, c.length, data, selectedNames);
}

function indexDouble(target: Value, index: Value): Value {
  if (valueLength(index) !== 1) {
    throw new EvaluationError('[[ ]] requires a single subscript');
  }
  if (target.type === 'list') {
    const [pos] = resolvePositions(index, target.items.length, target.names);
    if (pos === undefined || pos >= target.items.length) {
      throw new EvaluationError('Subscript out of bounds');
    }
    return target.items[pos];
  }
  const picked = indexVector(target, index);
  if (valueLength(picked) !== 1) {
    throw new EvaluationError('Subscript out of bounds');
  }
  if (picked.type === 'numeric') return numeric(picked.values);
  return picked;
}

function member(target: Value, name: string): Value {
  if (target.type === 'null') return NULL;
  if (target.type !== 'list') {
    throw new EvaluationError(`$ operator is invalid for ${typeName(target)} values`);
  }
  const pos = target.names.indexOf(name);
  return pos < 0 ? NULL : target.items[pos];
}

// ============================================================================
// Evaluation
// ============================================================================

function evaluateArguments(args: ArgumentNode[], scope: Scope, callee: string): CallArgument[] {
  return args.map(arg => {
    if (arg.value === null) {
      throw new EvaluationError(`Empty argument in call to '${callee}'`);
    }
    return { name: arg.name, value: evaluateNode(arg.value, scope) };
  });
}

function evaluateIndexArgument(arg: ArgumentNode, scope: Scope): Value | null {
  if (arg.name !== null) {
    throw new EvaluationError(`Named subscript '${arg.name}' is not supported`);
  }
  return arg.value === null ? null : evaluateNode(arg.value, scope);
}

function evaluateCall(node: Extract<ExprNode, { kind: 'call' }>, scope: Scope): Value {
  let name: string;
  let callee: Value | undefined;
  if (node.callee.kind === 'identifier') {
    name = node.callee.name;
    callee = scope.lookupFunction(name);
    if (callee === undefined) {
      throw new EvaluationError(`could not find function '${name}'`);
    }
  } else {
    name = '<anonymous>';
    callee = evaluateNode(node.callee, scope);
  }
  if (callee.type !== 'function') {
    throw new EvaluationError(`Attempt to apply non-function (${typeName(callee)})`);
  }
  return callee.call(evaluateArguments(node.args, scope, name), scope);
}

/**
 * Evaluate a parsed expression in a scope
 */
export function evaluateNode(node: ExprNode, scope: Scope): Value {
  switch (node.kind) {
    case 'number':
      return numeric([node.value]);
    case 'string':
      return character([node.value]);
    case 'logical':
      return logical([node.value]);
    case 'null':
      return NULL;
    case 'identifier': {
      const value = scope.lookup(node.name);
      if (value === undefined) {
        throw new EvaluationError(`object '${node.name}' not found`);
      }
      return value;
    }
    case 'unary': {
      const operand = evaluateNode(node.operand, scope);
      if (node.op === '!') {
        return logical(asBooleans(operand, "'!'").map(b => !b));
      }
      return arithmetic(node.op, node.op === '-' ? (a, b) => a - b : (a, b) => a + b, numeric([0]), operand);
    }
    case 'binary': {
      const left = evaluateNode(node.left, scope);
      const right = evaluateNode(node.right, scope);
      if (node.op === '&' || node.op === '|') return logicalOp(node.op, left, right);
      if (node.op === ':') return range(left, right);
      const arith = ARITHMETIC[node.op];
      if (arith) return arithmetic(node.op, arith, left, right);
      const compare = COMPARISONS[node.op];
      if (compare) return comparison(node.op, compare, left, right);
      throw new EvaluationError(`Unsupported operator '${node.op}'`);
    }
    case 'call':
      return evaluateCall(node, scope);
    case 'index': {
      const target = evaluateNode(node.target, scope);
      const indices = node.args.map(arg => evaluateIndexArgument(arg, scope));
      if (node.double) {
        const [only] = indices;
        if (indices.length !== 1 || only === null) {
          throw new EvaluationError('[[ ]] requires a single subscript');
        }
        return indexDouble(target, only);
      }
      if (indices.length === 0) return target;
      if (indices.length === 1) return indexVector(target, indices[0]);
      if (indices.length === 2 && target.type === 'matrix') {
        return indexMatrix(target, indices[0], indices[1]);
      }
      throw new EvaluationError(`Incorrect number of dimensions for ${typeName(target)}`);
    }
    case 'member':
      return member(evaluateNode(node.target, scope), node.name);
  }
}

/**
 * Parse (when given source text) and evaluate an expression
 */
export function evaluateExpression(expression: string | ExprNode, scope: Scope): Value {
  const node = typeof expression === 'string' ? parseExpression(expression) : expression;
  return evaluateNode(node, scope);
}
