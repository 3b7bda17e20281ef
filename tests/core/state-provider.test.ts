/**
 * State Provider Tests
 */
import { describe, it, expect, vi } from 'vitest';
import { createComponent } from '../../src/core/component.js';
import { ConfigurationError } from '../../src/core/errors.js';
import { createModel } from '../../src/core/model.js';
import { evaluateState, parseStateProperty, zeroState } from '../../src/core/state-provider.js';
import { ConstMapper, IndexMapper, LinearMapper, OffsetMapper } from '../../src/mappers/index.js';
import type { FittedResult, LatentState, SampleOptions, SummaryOptions, SummaryProperty } from '../../src/types/index.js';

function fakeResult() {
  const summary = vi.fn((_property: SummaryProperty, _options: SummaryOptions): LatentState => ({ x: [1.5] }));
  const sample = vi.fn((n: number, _options: SampleOptions): LatentState[] =>
    Array.from({ length: n }, (_, i) => ({ x: [i] }))
  );
  const result: FittedResult = { summary, sample };
  return { result, summary, sample };
}

describe('parseStateProperty', () => {
  it('should accept summary names and sampling', () => {
    expect(parseStateProperty('mode')).toBe('mode');
    expect(parseStateProperty('sd')).toBe('sd');
    expect(parseStateProperty('sample')).toBe('sample');
  });

  it('should normalize quantile names', () => {
    expect(parseStateProperty('0.025quant')).toBe('0.025quant');
    expect(parseStateProperty('0.50quant')).toBe('0.5quant');
  });

  it('should reject quantiles outside [0, 1]', () => {
    expect(() => parseStateProperty('1.5quant')).toThrow(ConfigurationError);
  });

  it('should reject unknown names', () => {
    expect(() => parseStateProperty('median')).toThrow(
      'Unknown state property "median": expected mode, mean, sd, sample or <p>quant (e.g. 0.025quant)'
    );
  });
});

describe('evaluateState', () => {
  const model = createModel(
    [
      createComponent({ label: 'intercept', mapper: new ConstMapper() }),
      createComponent({ label: 'x', mapper: new LinearMapper() }),
      createComponent({ label: 'u', main: 'site', mapper: new IndexMapper(['a', 'b']) }),
      createComponent({ label: 'off', mapper: new OffsetMapper() }),
    ],
    [{ family: 'gaussian', linear: true }]
  );

  it('should size the zero state by latent dimension', () => {
    expect(zeroState(model)).toEqual([{ intercept: [0], x: [0], u: [0, 0], off: [] }]);
  });

  it('should use the zero state without a fitted result', () => {
    expect(evaluateState(model, null, { property: 'sample', n: 5 })).toEqual(zeroState(model));
  });

  it('should extract a summary state', () => {
    const { result, summary } = fakeResult();

    expect(evaluateState(model, result, { property: 'mean', internalHyperpar: true })).toEqual([{ x: [1.5] }]);
    expect(summary).toHaveBeenCalledWith('mean', { internalHyperpar: true });
  });

  it('should default to the mode on the user scale', () => {
    const { result, summary } = fakeResult();
    evaluateState(model, result);
    expect(summary).toHaveBeenCalledWith('mode', { internalHyperpar: false });
  });

  it('should draw n samples single threaded for a nonzero seed', () => {
    const { result, sample } = fakeResult();
    const states = evaluateState(model, result, { property: 'sample', n: 3, seed: 42, numThreads: '4:1' });

    expect(states).toEqual([{ x: [0] }, { x: [1] }, { x: [2] }]);
    expect(sample).toHaveBeenCalledWith(3, { seed: 42, numThreads: '1:1' });
  });

  it('should pass the thread setting through without a seed', () => {
    const { result, sample } = fakeResult();
    evaluateState(model, result, { property: 'sample', numThreads: '4:1' });
    evaluateState(model, result, { property: 'sample' });

    expect(sample).toHaveBeenNthCalledWith(1, 1, { seed: 0, numThreads: '4:1' });
    expect(sample).toHaveBeenNthCalledWith(2, 1, { seed: 0, numThreads: null });
  });

  it('should reject invalid sample counts', () => {
    const { result } = fakeResult();
    expect(() => evaluateState(model, result, { property: 'sample', n: 0 })).toThrow(
      'Number of samples must be a positive integer, got 0'
    );
    expect(() => evaluateState(model, result, { property: 'sample', n: 1.5 })).toThrow(ConfigurationError);
  });
});
