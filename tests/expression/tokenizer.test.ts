/**
 * Tokenizer Tests
 */
import { describe, it, expect } from 'vitest';
import { tokenize } from '../../src/expression/tokenizer.js';

function texts(source: string): string[] {
  return tokenize(source).map(t => t.text);
}

describe('tokenize', () => {
  it('should split a predictor into tokens', () => {
    const tokens = tokenize('intercept_eval() + x_eval(x)');

    expect(tokens.map(t => t.kind)).toEqual([
      'identifier', 'punct', 'punct', 'operator', 'identifier', 'punct', 'identifier', 'punct', 'eof',
    ]);
    expect(tokens[3]).toEqual({ kind: 'operator', text: '+', pos: 17 });
  });

  it('should read dotted identifiers as one name', () => {
    expect(texts('.data.$x')).toEqual(['.data.', '$', 'x', '']);
    expect(texts('as.vector(m)')).toEqual(['as.vector', '(', 'm', ')', '']);
  });

  it('should read number forms', () => {
    const tokens = tokenize('12 1.5 .5 1e-3 2L');
    expect(tokens.filter(t => t.kind === 'number').map(t => t.text)).toEqual(['12', '1.5', '.5', '1e-3', '2']);
  });

  it('should prefer two-character operators', () => {
    expect(texts('a<=b %% 2 == c')).toEqual(['a', '<=', 'b', '%%', '2', '==', 'c', '']);
  });

  it('should unescape string literals', () => {
    const [token] = tokenize('"a\\"b\\n"');
    expect(token).toEqual({ kind: 'string', text: 'a"b\n', pos: 0 });
  });

  it('should read backtick names as identifiers', () => {
    const [token] = tokenize('`my name`');
    expect(token.kind).toBe('identifier');
    expect(token.text).toBe('my name');
  });

  it('should skip comments', () => {
    expect(texts('x # comment\n+ 1')).toEqual(['x', '+', '1', '']);
  });

  it('should reject unterminated strings', () => {
    expect(() => tokenize("'abc")).toThrow('Unterminated string at position 0');
  });

  it('should reject unknown characters', () => {
    expect(() => tokenize('x @ y')).toThrow("Unexpected character '@' at position 2");
  });
});
