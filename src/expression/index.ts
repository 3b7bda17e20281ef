/**
 * Expression Language Export
 * @module expression
 */

export { tokenize } from './tokenizer.js';
export type { Token, TokenKind } from './tokenizer.js';

export { parseExpression, parsePredictor } from './parser.js';
export type { ExprNode, ArgumentNode, BinaryOperator, UnaryOperator } from './parser.js';

export { evaluateNode, evaluateExpression, asStrings, recycledLength } from './interpreter.js';

export { createBuiltinScope, builtinNames, bindArguments } from './builtins.js';

export { Scope } from './scope.js';

export {
  NULL,
  numeric,
  character,
  logical,
  matrix,
  columnMatrix,
  list,
  fn,
  typeName,
  valueLength,
  rowCount,
  asNumbers,
  asBooleans,
  asMainValues,
  isColumnLike,
  rowNamesOf,
  fromData,
  toPlain,
} from './values.js';
export type {
  Value,
  NumericValue,
  CharacterValue,
  LogicalValue,
  MatrixValue,
  ListValue,
  FunctionValue,
  NullValue,
  CallArgument,
} from './values.js';
