/**
 * Tabulated Result Tests
 */
import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../src/core/errors.js';
import { TabulatedResult, parsePosteriorSummary, type PosteriorSummary } from '../../src/results/tabulated-result.js';

const posterior: PosteriorSummary = {
  latent: {
    x: { mean: [1, 2], sd: [0.1, 0.2], mode: [1.1, 2.1], quantiles: { '0.025': [0.8, 1.6], '0.50': [1, 2] } },
  },
  hyperparameters: {
    Precision_for_u: {
      internalName: 'Log_precision_for_u',
      link: 'log',
      model: { mean: [4], sd: [1], mode: [3.5] },
      internal: { mean: [1.4], sd: [0.25], mode: [1.25] },
    },
  },
};

describe('TabulatedResult.summary', () => {
  const result = new TabulatedResult(posterior);

  it('should report hyperparameters on the model scale', () => {
    expect(result.summary('mean', { internalHyperpar: false })).toEqual({ x: [1, 2], Precision_for_u: [4] });
  });

  it('should report hyperparameters on the internal scale', () => {
    expect(result.summary('mode', { internalHyperpar: true })).toEqual({ x: [1.1, 2.1], Log_precision_for_u: [1.25] });
  });

  it('should match quantiles numerically', () => {
    const latentOnly = new TabulatedResult({ latent: posterior.latent, hyperparameters: {} });
    expect(latentOnly.summary('0.5quant', { internalHyperpar: false })).toEqual({ x: [1, 2] });
    expect(latentOnly.summary('0.025quant', { internalHyperpar: false })).toEqual({ x: [0.8, 1.6] });
  });

  it('should fail for missing statistics', () => {
    expect(() => result.summary('0.975quant', { internalHyperpar: false })).toThrow('No 0.975quant available for "x"');
    const noMode = new TabulatedResult({ latent: { z: { mean: [0], sd: [1] } }, hyperparameters: {} });
    expect(() => noMode.summary('mode', { internalHyperpar: false })).toThrow('No mode available for "z"');
  });

  it('should not expose its tables through returned states', () => {
    const state = result.summary('mean', { internalHyperpar: false });
    state.x[0] = 99;
    expect(result.tables.latent.x.mean).toEqual([1, 2]);
  });
});

describe('TabulatedResult.sample', () => {
  it('should be reproducible for a seed', () => {
    const result = new TabulatedResult(posterior);
    const a = result.sample(3, { seed: 7, numThreads: '1:1' });
    const b = result.sample(3, { seed: 7, numThreads: '1:1' });

    expect(a).toHaveLength(3);
    expect(a).toEqual(b);
    expect(Object.keys(a[0])).toEqual(['x', 'Precision_for_u']);
  });

  it('should map hyperparameters back through the link', () => {
    const result = new TabulatedResult({
      latent: { x: { mean: [1, 2], sd: [0, 0] } },
      hyperparameters: {
        Precision_for_u: { internalName: 'Log_precision_for_u', link: 'log', model: { mean: [1], sd: [0] }, internal: { mean: [0], sd: [0] } },
        rho: { internalName: 'Internal_rho', link: 'identity', model: { mean: [0.3], sd: [0] }, internal: { mean: [0.3], sd: [0] } },
      },
    });

    expect(result.sample(2, { seed: 3, numThreads: null })).toEqual([
      { x: [1, 2], Precision_for_u: [1], rho: [0.3] },
      { x: [1, 2], Precision_for_u: [1], rho: [0.3] },
    ]);
  });
});

describe('parsePosteriorSummary', () => {
  it('should fill in hyperparameter defaults', () => {
    const parsed = parsePosteriorSummary({
      latent: { x: { mean: [1], sd: [0.5] } },
      hyperparameters: { rho: { model: { mean: [0.3], sd: [0.1] }, internal: { mean: [0.3], sd: [0.1] } } },
    });

    expect(parsed.hyperparameters.rho.internalName).toBe('Internal_rho');
    expect(parsed.hyperparameters.rho.link).toBe('identity');
  });

  it('should reject malformed tables', () => {
    expect(() => parsePosteriorSummary({})).toThrow('Posterior summary needs a "latent" object');
    expect(() => parsePosteriorSummary({ latent: { x: { mean: [1, 2], sd: [1] } } })).toThrow(
      'latent.x: sd has 1 values, mean has 2'
    );
    expect(() => parsePosteriorSummary({ latent: { x: { mean: ['1'], sd: [1] } } })).toThrow(
      'latent.x.mean must be an array of numbers'
    );
  });

  it('should reject unknown links', () => {
    const summary = {
      latent: {},
      hyperparameters: { h: { link: 'logit', model: { mean: [1], sd: [1] }, internal: { mean: [1], sd: [1] } } },
    };
    expect(() => parsePosteriorSummary(summary)).toThrow(ConfigurationError);
    expect(() => parsePosteriorSummary(summary)).toThrow('hyperparameters.h.link must be "log" or "identity"');
  });
});
