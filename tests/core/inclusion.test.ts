/**
 * Inclusion Resolver Tests
 */
import { describe, it, expect } from 'vitest';
import { resolveInclusion } from '../../src/core/inclusion.js';
import { ConfigurationError } from '../../src/core/errors.js';

describe('resolveInclusion', () => {
  const labels = ['intercept', 'x', 'u', 'off'];

  it('should return all labels without filters', () => {
    expect(resolveInclusion(labels, null, null)).toEqual(labels);
    expect(resolveInclusion(labels)).toEqual(labels);
  });

  it('should keep label order regardless of include order', () => {
    expect(resolveInclusion(labels, ['u', 'intercept'])).toEqual(['intercept', 'u']);
  });

  it('should remove excluded labels', () => {
    expect(resolveInclusion(labels, null, ['x', 'off'])).toEqual(['intercept', 'u']);
  });

  it('should let exclusion win', () => {
    expect(resolveInclusion(['a', 'b'], ['a'], ['a'])).toEqual([]);
  });

  it('should return nothing for an empty include list', () => {
    expect(resolveInclusion(labels, [])).toEqual([]);
  });

  it('should reject unknown labels', () => {
    expect(() => resolveInclusion(labels, ['v'])).toThrow(ConfigurationError);
    expect(() => resolveInclusion(labels, null, ['w', 'w'])).toThrow('Unknown component label(s) in exclude: w');
  });
});
