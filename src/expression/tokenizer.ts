/**
 * Expression Tokenizer
 *
 * Identifiers may contain letters, digits, `_` and `.` and may start with
 * `.` (so `.data.` is a single name). Backticks quote arbitrary names.
 *
 * @module expression/tokenizer
 */

import { EvaluationError } from '../core/errors.js';

export type TokenKind =
  | 'number'
  | 'string'
  | 'identifier'
  | 'operator'
  | 'punct'
  | 'eof';

export interface Token {
  kind: TokenKind;
  text: string;
  /** Offset into the source */
  pos: number;
}

const OPERATORS = ['%%', '==', '!=', '<=', '>=', '&&', '||', '+', '-', '*', '/', '^', '<', '>', '&', '|', '!', ':', '~', '=', '$'];
const PUNCT = new Set(['(', ')', '[', ']', ',']);

function isIdentStart(ch: string): boolean {
  return /[A-Za-z_.]/.test(ch);
}

function isIdentPart(ch: string): boolean {
  return /[A-Za-z0-9_.]/.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/**
 * Split source text into tokens, ending with an eof token
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === '#') {
      while (i < source.length && source[i] !== '\n') i++;
      continue;
    }

    // Numbers: 12, 1.5, .5, 1e-3 (".5" starts like an identifier, so check first)
    if (isDigit(ch) || (ch === '.' && i + 1 < source.length && isDigit(source[i + 1]))) {
      const match = /^(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?L?/.exec(source.slice(i));
      if (!match) {
        throw new EvaluationError(`Malformed number at position ${i}`);
      }
      tokens.push({ kind: 'number', text: match[0].replace(/L$/, ''), pos: i });
      i += match[0].length;
      continue;
    }

    if (isIdentStart(ch)) {
      const start = i;
      while (i < source.length && isIdentPart(source[i])) i++;
      tokens.push({ kind: 'identifier', text: source.slice(start, i), pos: start });
      continue;
    }

    if (ch === '`') {
      const end = source.indexOf('`', i + 1);
      if (end < 0) {
        throw new EvaluationError(`Unterminated backtick name at position ${i}`);
      }
      tokens.push({ kind: 'identifier', text: source.slice(i + 1, end), pos: i });
      i = end + 1;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const start = i;
      let text = '';
      i++;
      while (i < source.length && source[i] !== ch) {
        if (source[i] === '\\' && i + 1 < source.length) {
          const next = source[i + 1];
          text += next === 'n' ? '\n' : next === 't' ? '\t' : next;
          i += 2;
        } else {
          text += source[i];
          i++;
        }
      }
      if (i >= source.length) {
        throw new EvaluationError(`Unterminated string at position ${start}`);
      }
      i++;
      tokens.push({ kind: 'string', text, pos: start });
      continue;
    }

    if (PUNCT.has(ch)) {
      tokens.push({ kind: 'punct', text: ch, pos: i });
      i++;
      continue;
    }

    const op = OPERATORS.find(o => source.startsWith(o, i));
    if (op) {
      tokens.push({ kind: 'operator', text: op, pos: i });
      i += op.length;
      continue;
    }

    throw new EvaluationError(`Unexpected character '${ch}' at position ${i}`);
  }

  tokens.push({ kind: 'eof', text: '', pos: source.length });
  return tokens;
}
