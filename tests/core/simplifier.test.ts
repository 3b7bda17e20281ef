/**
 * Mapper Simplifier Tests
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { ComponentList, createComponent } from '../../src/core/component.js';
import { UnsupportedModelWarning } from '../../src/core/errors.js';
import { evaluateComponentInputs } from '../../src/core/input.js';
import { createModel } from '../../src/core/model.js';
import { linearizeComponents, linearizeModel, simplifyComponents, simplifyModel } from '../../src/core/simplifier.js';
import { ConstMapper, LinearMapper, PointwiseMapper } from '../../src/mappers/index.js';

describe('simplifyComponents', () => {
  const intercept = createComponent({ label: 'intercept', mapper: new ConstMapper() });
  const x = createComponent({ label: 'x', mapper: new LinearMapper() });
  const ex = createComponent({ label: 'ex', main: 'x', mapper: PointwiseMapper.exp(new LinearMapper()) });
  const components = new ComponentList([intercept, x, ex]);
  const inputs = evaluateComponentInputs(components, { x: [1, 2] });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should linearize affine mappers', () => {
    const { mappers, warnings } = simplifyComponents(components, inputs, { included: ['intercept', 'x'] });

    expect(mappers.map(m => [m.kind, m.label])).toEqual([
      ['linearized', 'intercept'],
      ['linearized', 'x'],
    ]);
    expect(warnings).toEqual([]);
    expect(mappers[1].mapper.evaluate(null, [3])).toEqual([3, 6]);
  });

  it('should keep nonlinear mappers and warn once', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { mappers, warnings } = simplifyComponents(components, inputs);

    expect(mappers.map(m => m.kind)).toEqual(['linearized', 'linearized', 'original']);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toBeInstanceOf(UnsupportedModelWarning);
    expect(warnings[0].labels).toEqual(['ex']);
    expect(warnings[0].message).toBe('Non-linear mappers are experimental! (components: ex)');
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should default to the components that have inputs', () => {
    const partial = { x: inputs.x };
    const { mappers } = simplifyComponents(components, partial);
    expect(mappers.map(m => m.label)).toEqual(['x']);
  });

  it('should fail for an included component without input', () => {
    expect(() => simplifyComponents(components, { x: inputs.x }, { included: ['intercept'] }))
      .toThrow('No input evaluated for component "intercept"');
  });
});

describe('linearizeComponents', () => {
  const ex = createComponent({ label: 'ex', main: 'x', mapper: PointwiseMapper.exp(new LinearMapper()) });
  const components = new ComponentList([ex]);
  const inputs = evaluateComponentInputs(components, { x: [1, 2] });

  it('should expand nonlinear mappers around the given state', () => {
    const [entry] = linearizeComponents(components, inputs, { ex: [0] });

    expect(entry.kind).toBe('linearized');
    // exp(b * x) ~ 1 + x * b around b = 0
    expect(entry.mapper.evaluate(null, [0.5])).toEqual([1.5, 2]);
  });

  it('should expand around zero without a state', () => {
    const [entry] = linearizeComponents(components, inputs, null);
    expect(entry.mapper.evaluate(null)).toEqual([1, 1]);
  });
});

describe('per-likelihood simplification', () => {
  it('should simplify each input list separately', () => {
    const a = createComponent({ label: 'a', mapper: new LinearMapper() });
    const b = createComponent({ label: 'b', mapper: new LinearMapper() });
    const model = createModel([a, b], [{ family: 'gaussian', linear: true }]);
    const inputs = [
      evaluateComponentInputs([a], { a: [1] }),
      evaluateComponentInputs([a, b], { a: [1, 2], b: [3, 4] }),
    ];

    expect(simplifyModel(model, inputs).map(r => r.mappers.map(m => m.label))).toEqual([['a'], ['a', 'b']]);
    expect(linearizeModel(model, inputs, null).map(list => list.length)).toEqual([1, 2]);
  });
});
