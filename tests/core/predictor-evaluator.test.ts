/**
 * Predictor Evaluator Tests
 */
import { describe, it, expect, vi, type Mock } from 'vitest';
import { createComponent } from '../../src/core/component.js';
import { ConfigurationError, EvaluationError } from '../../src/core/errors.js';
import { createModel } from '../../src/core/model.js';
import { COMPONENT_EVAL_MESSAGE, evaluatePredictor, parseFormat } from '../../src/core/predictor-evaluator.js';
import { list, numeric } from '../../src/expression/values.js';
import { ConstMapper, IndexMapper, LinearMapper } from '../../src/mappers/index.js';
import type { LatentState } from '../../src/types/index.js';
import type { RandomSource } from '../../src/utils/random.js';

const gaussian = { family: 'gaussian', linear: true };

interface FakeRandom extends RandomSource {
  normal: Mock<[number, number], number>;
}

function fakeRandom(...draws: number[]): FakeRandom {
  const normal = vi.fn<[number, number], number>();
  for (const d of draws) normal.mockReturnValueOnce(d);
  return { nextFloat: () => 0.5, normal };
}

describe('parseFormat', () => {
  it('should accept known formats', () => {
    expect(parseFormat('list')).toBe('list');
  });

  it('should reject unknown formats', () => {
    expect(() => parseFormat('table')).toThrow('Unknown predictor format "table": expected auto, matrix or list');
  });
});

describe('evaluatePredictor', () => {
  const intercept = createComponent({ label: 'intercept', mapper: new ConstMapper() });
  const x = createComponent({ label: 'x', mapper: new LinearMapper() });
  const model = createModel([intercept, x], [gaussian]);
  const data = { x: [1, 2, 3] };

  it('should combine component evaluators into a matrix', () => {
    const output = evaluatePredictor(
      model,
      [{ intercept: [2], x: [0.5] }],
      data,
      null,
      'intercept_eval() + x_eval(x)'
    );

    expect(output).toEqual({ format: 'matrix', nrow: 3, ncol: 1, rowNames: null, columns: [[2.5, 3, 3.5]] });
  });

  it('should use the right-hand side of a formula', () => {
    const output = evaluatePredictor(model, [{ intercept: [1], x: [2] }], data, null, '~ x_eval(x)');
    expect(output).toEqual({ format: 'matrix', nrow: 3, ncol: 1, rowNames: null, columns: [[2, 4, 6]] });
  });

  it('should add one column per state', () => {
    const states = [
      { intercept: [1], x: [1] },
      { intercept: [5], x: [1] },
    ];
    const output = evaluatePredictor(model, states, data, null, 'intercept_latent');

    expect(output).toEqual({ format: 'matrix', nrow: 1, ncol: 2, rowNames: null, columns: [[1], [5]] });
  });

  it('should bind effects by label', () => {
    const output = evaluatePredictor(
      model,
      [{ intercept: [1], x: [2] }],
      data,
      [{ intercept: [1, 1, 1], x: [2, 4, 6] }],
      'intercept + x'
    );

    expect(output).toEqual({ format: 'matrix', nrow: 3, ncol: 1, rowNames: null, columns: [[3, 5, 7]] });
  });

  it('should bind non-component state entries by name', () => {
    const output = evaluatePredictor(model, [{ x: [1], Precision_for_obs: [4] }], null, null, 'sqrt(Precision_for_obs)');
    expect(output).toEqual({ format: 'matrix', nrow: 1, ncol: 1, rowNames: null, columns: [[2]] });
  });

  it('should not leak names from one state into the next', () => {
    const states: LatentState[] = [{ x: [1], extra: [3] }, { x: [1] }];

    expect(() => evaluatePredictor(model, states, null, null, 'extra')).toThrow(
      "Predictor evaluation failed for state 1: object 'extra' not found"
    );
  });

  it('should keep list results in list format', () => {
    const output = evaluatePredictor(model, [{ x: [0.5] }], null, null, 'x_latent * 2', { format: 'list' });
    expect(output).toEqual({ format: 'list', values: [numeric([1])] });
  });

  it('should pick list format for non-column results', () => {
    const output = evaluatePredictor(model, [{ x: [0.5] }], null, null, 'list(a = x_latent)');
    expect(output).toEqual({ format: 'list', values: [list([numeric([0.5])], ['a'])] });
  });

  it('should only define evaluators for components in the state', () => {
    expect(() => evaluatePredictor(model, [{ x: [1] }], data, null, 'intercept_eval()')).toThrow(
      "Predictor evaluation failed for state 0: could not find function 'intercept_eval'"
    );
  });

  it('should not treat inherited object keys as state entries', () => {
    const named = createComponent({ label: 'toString', mapper: new LinearMapper() });
    const withNamed = createModel([x, named], [gaussian]);

    expect(() => evaluatePredictor(withNamed, [{ x: [1] }], data, null, 'toString_eval(x)')).toThrow(
      "Predictor evaluation failed for state 0: could not find function 'toString_eval'"
    );
  });

  it('should point component_eval users to the labelled evaluators', () => {
    expect(() => evaluatePredictor(model, [{ x: [1] }], data, null, 'component_eval(x)')).toThrow(
      `Predictor evaluation failed for state 0: ${COMPONENT_EVAL_MESSAGE}`
    );
  });

  it('should report the failing state index', () => {
    const states = [{ x: [1, 2] }, { x: [1, 2, 3] }];
    let caught: unknown;
    try {
      evaluatePredictor(model, states, null, null, 'x_latent');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(EvaluationError);
    expect(caught instanceof EvaluationError ? caught.stateIndex : undefined).toBe(1);
    expect(caught instanceof Error ? caught.message : '').toBe(
      'Predictor evaluation failed for state 1: Predictor result has 3 values for state 1, expected 2 (from the first state)'
    );
  });

  it('should reject an empty state sequence', () => {
    expect(() => evaluatePredictor(model, [], data, null, 'x_latent')).toThrow(ConfigurationError);
    expect(() => evaluatePredictor(model, null, data, null, 'x_latent')).toThrow('No states given for predictor evaluation');
  });

  it('should reject effects that do not match the states', () => {
    expect(() => evaluatePredictor(model, [{ x: [1] }], null, [], 'x_latent')).toThrow('Got 0 effect sets for 1 states');
  });
});

describe('iid components', () => {
  const u = createComponent({ label: 'u', type: 'iid', main: 'site', mapper: new IndexMapper(['a', 'b']) });
  const model = createModel([u], [gaussian]);
  const data = { site: ['a', 'z', 'z', 'b'] };

  it('should draw one deviate per unseen level and state', () => {
    const random = fakeRandom(0.7, -0.3);
    const states = [
      { u: [1, 2], Precision_for_u: [4] },
      { u: [3, 4], Precision_for_u: [4] },
    ];

    const output = evaluatePredictor(model, states, data, null, 'u_eval(site)', { random });

    expect(output).toEqual({
      format: 'matrix',
      nrow: 4,
      ncol: 2,
      rowNames: null,
      columns: [
        [1, 0.7, 0.7, 2],
        [3, -0.3, -0.3, 4],
      ],
    });
    expect(random.normal).toHaveBeenCalledTimes(2);
    expect(random.normal).toHaveBeenCalledWith(0, 0.5);
  });

  it('should reuse deviates across calls within a state', () => {
    const random = fakeRandom(0.25);
    const output = evaluatePredictor(
      model,
      [{ u: [1, 2], Precision_for_u: [1] }],
      data,
      null,
      'u_eval("z") - u_eval(site)',
      { random }
    );

    expect(output).toEqual({ format: 'matrix', nrow: 4, ncol: 1, rowNames: null, columns: [[-0.75, 0, 0, -1.75]] });
    expect(random.normal).toHaveBeenCalledTimes(1);
  });

  it('should need a single precision value', () => {
    expect(() =>
      evaluatePredictor(model, [{ u: [1, 2], Precision_for_u: [] }], data, null, 'u_eval(site)', { random: fakeRandom(0) })
    ).toThrow("Predictor evaluation failed for state 0: 'Precision_for_u' must be a single value, got 0");
  });

  it('should need the precision for unseen levels', () => {
    expect(() => evaluatePredictor(model, [{ u: [1, 2] }], data, null, 'u_eval(site)', { random: fakeRandom(0) }))
      .toThrow("Predictor evaluation failed for state 0: object 'Precision_for_u' not found");
  });
});
