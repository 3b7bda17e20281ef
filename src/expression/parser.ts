/**
 * Expression Parser
 *
 * Recursive descent over the token stream. Precedence, lowest first:
 *   | ||   & &&   !   comparisons   + -   * / %%   :   unary -/+   ^
 * then postfix calls, `[ ]`, `[[ ]]` and `$name`. `^` is right-associative
 * and binds tighter than unary minus, so -2^2 is -4.
 *
 * @module expression/parser
 */

import { EvaluationError } from '../core/errors.js';
import { tokenize, type Token } from './tokenizer.js';

export type BinaryOperator =
  | '+' | '-' | '*' | '/' | '^' | '%%' | ':'
  | '==' | '!=' | '<' | '<=' | '>' | '>='
  | '&' | '|';

export type UnaryOperator = '-' | '+' | '!';

export interface ArgumentNode {
  name: string | null;
  /** null for an empty slot, as in m[, 1] */
  value: ExprNode | null;
}

export type ExprNode =
  | { kind: 'number'; value: number; pos: number }
  | { kind: 'string'; value: string; pos: number }
  | { kind: 'logical'; value: boolean; pos: number }
  | { kind: 'null'; pos: number }
  | { kind: 'identifier'; name: string; pos: number }
  | { kind: 'unary'; op: UnaryOperator; operand: ExprNode; pos: number }
  | { kind: 'binary'; op: BinaryOperator; left: ExprNode; right: ExprNode; pos: number }
  | { kind: 'call'; callee: ExprNode; args: ArgumentNode[]; pos: number }
  | { kind: 'index'; target: ExprNode; args: ArgumentNode[]; double: boolean; pos: number }
  | { kind: 'member'; target: ExprNode; name: string; pos: number };

const COMPARISON: readonly BinaryOperator[] = ['==', '!=', '<', '<=', '>', '>='];

function comparisonOperator(text: string): BinaryOperator | undefined {
  return COMPARISON.find(op => op === text);
}

class Parser {
  private readonly tokens: Token[];
  private index = 0;

  constructor(source: string) {
    this.tokens = tokenize(source);
  }

  private peek(offset: number = 0): Token {
    return this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') this.index++;
    return token;
  }

  private isOperator(text: string): boolean {
    const t = this.peek();
    return t.kind === 'operator' && t.text === text;
  }

  private isPunct(text: string): boolean {
    const t = this.peek();
    return t.kind === 'punct' && t.text === text;
  }

  private expectPunct(text: string): Token {
    const t = this.next();
    if (t.kind !== 'punct' || t.text !== text) {
      throw this.error(`expected '${text}'`, t);
    }
    return t;
  }

  private error(message: string, token: Token = this.peek()): EvaluationError {
    const found = token.kind === 'eof' ? 'end of input' : `'${token.text}'`;
    return new EvaluationError(`Parse error at position ${token.pos}: ${message}, found ${found}`);
  }

  /**
   * Formula or plain expression; for `lhs ~ rhs` and `~ rhs` only rhs is kept
   */
  parsePredictor(): ExprNode {
    let node: ExprNode;
    if (this.isOperator('~')) {
      this.next();
      node = this.parseExpression();
    } else {
      node = this.parseExpression();
      if (this.isOperator('~')) {
        this.next();
        node = this.parseExpression();
      }
    }
    this.expectEnd();
    return node;
  }

  parseStandalone(): ExprNode {
    const node = this.parseExpression();
    this.expectEnd();
    return node;
  }

  private expectEnd(): void {
    if (this.peek().kind !== 'eof') {
      throw this.error('unexpected trailing input');
    }
  }

  private parseExpression(): ExprNode {
    return this.parseOr();
  }

  private parseOr(): ExprNode {
    let left = this.parseAnd();
    while (this.isOperator('|') || this.isOperator('||')) {
      const op = this.next();
      left = { kind: 'binary', op: '|', left, right: this.parseAnd(), pos: op.pos };
    }
    return left;
  }

  private parseAnd(): ExprNode {
    let left = this.parseNot();
    while (this.isOperator('&') || this.isOperator('&&')) {
      const op = this.next();
      left = { kind: 'binary', op: '&', left, right: this.parseNot(), pos: op.pos };
    }
    return left;
  }

  private parseNot(): ExprNode {
    if (this.isOperator('!')) {
      const op = this.next();
      return { kind: 'unary', op: '!', operand: this.parseNot(), pos: op.pos };
    }
    return this.parseComparison();
  }

  private parseComparison(): ExprNode {
    const left = this.parseAdditive();
    const t = this.peek();
    const op = t.kind === 'operator' ? comparisonOperator(t.text) : undefined;
    if (op) {
      this.next();
      return { kind: 'binary', op, left, right: this.parseAdditive(), pos: t.pos };
    }
    return left;
  }

  private parseAdditive(): ExprNode {
    let left = this.parseMultiplicative();
    while (this.isOperator('+') || this.isOperator('-')) {
      const op = this.next();
      const right = this.parseMultiplicative();
      left = { kind: 'binary', op: op.text === '+' ? '+' : '-', left, right, pos: op.pos };
    }
    return left;
  }

  private parseMultiplicative(): ExprNode {
    let left = this.parseRange();
    for (;;) {
      const t = this.peek();
      if (t.kind !== 'operator' || (t.text !== '*' && t.text !== '/' && t.text !== '%%')) break;
      this.next();
      const op: BinaryOperator = t.text === '*' ? '*' : t.text === '/' ? '/' : '%%';
      left = { kind: 'binary', op, left, right: this.parseRange(), pos: t.pos };
    }
    return left;
  }

  private parseRange(): ExprNode {
    let left = this.parseUnary();
    while (this.isOperator(':')) {
      const op = this.next();
      left = { kind: 'binary', op: ':', left, right: this.parseUnary(), pos: op.pos };
    }
    return left;
  }

  private parseUnary(): ExprNode {
    if (this.isOperator('-') || this.isOperator('+')) {
      const op = this.next();
      return { kind: 'unary', op: op.text === '-' ? '-' : '+', operand: this.parseUnary(), pos: op.pos };
    }
    return this.parsePower();
  }

  private parsePower(): ExprNode {
    const base = this.parsePostfix();
    if (this.isOperator('^')) {
      const op = this.next();
      return { kind: 'binary', op: '^', left: base, right: this.parseUnary(), pos: op.pos };
    }
    return base;
  }

  private parsePostfix(): ExprNode {
    let node = this.parsePrimary();
    for (;;) {
      if (this.isPunct('(')) {
        const open = this.next();
        node = { kind: 'call', callee: node, args: this.parseArguments(')'), pos: open.pos };
      } else if (this.isPunct('[')) {
        const open = this.next();
        if (this.isPunct('[')) {
          this.next();
          const args = this.parseArguments(']');
          this.expectPunct(']');
          node = { kind: 'index', target: node, args, double: true, pos: open.pos };
        } else {
          node = { kind: 'index', target: node, args: this.parseArguments(']'), double: false, pos: open.pos };
        }
      } else if (this.isOperator('$')) {
        const op = this.next();
        const name = this.next();
        if (name.kind !== 'identifier' && name.kind !== 'string') {
          throw this.error("expected a name after '$'", name);
        }
        node = { kind: 'member', target: node, name: name.text, pos: op.pos };
      } else {
        return node;
      }
    }
  }

  /**
   * Comma-separated arguments up to and including the closing punctuation.
   * Supports `name = value` and empty slots.
   */
  private parseArguments(close: ')' | ']'): ArgumentNode[] {
    const args: ArgumentNode[] = [];
    if (this.isPunct(close)) {
      this.next();
      return args;
    }
    for (;;) {
      if (this.isPunct(',') || this.isPunct(close)) {
        args.push({ name: null, value: null });
      } else {
        const t = this.peek();
        const after = this.peek(1);
        if ((t.kind === 'identifier' || t.kind === 'string') && after.kind === 'operator' && after.text === '=') {
          this.next();
          this.next();
          args.push({ name: t.text, value: this.parseExpression() });
        } else {
          args.push({ name: null, value: this.parseExpression() });
        }
      }
      const sep = this.next();
      if (sep.kind === 'punct' && sep.text === close) return args;
      if (sep.kind !== 'punct' || sep.text !== ',') {
        throw this.error(`expected ',' or '${close}'`, sep);
      }
    }
  }

  private parsePrimary(): ExprNode {
    const t = this.next();
    switch (t.kind) {
      case 'number':
        return { kind: 'number', value: Number(t.text), pos: t.pos };
      case 'string':
        return { kind: 'string', value: t.text, pos: t.pos };
      case 'identifier':
        if (t.text === 'TRUE') return { kind: 'logical', value: true, pos: t.pos };
        if (t.text === 'FALSE') return { kind: 'logical', value: false, pos: t.pos };
        if (t.text === 'NULL') return { kind: 'null', pos: t.pos };
        if (t.text === 'Inf') return { kind: 'number', value: Infinity, pos: t.pos };
        if (t.text === 'NaN' || t.text === 'NA') return { kind: 'number', value: NaN, pos: t.pos };
        return { kind: 'identifier', name: t.text, pos: t.pos };
      case 'punct':
        if (t.text === '(') {
          const inner = this.parseExpression();
          this.expectPunct(')');
          return inner;
        }
        throw this.error('unexpected punctuation', t);
      case 'operator':
      case 'eof':
        throw this.error('expected a value', t);
    }
  }
}

/**
 * Parse a predictor: an expression or a formula whose right-hand side is used
 */
export function parsePredictor(source: string): ExprNode {
  return new Parser(source).parsePredictor();
}

/**
 * Parse a single expression; `~` is not accepted
 */
export function parseExpression(source: string): ExprNode {
  return new Parser(source).parseStandalone();
}
