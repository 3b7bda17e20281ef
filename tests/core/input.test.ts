/**
 * Input Evaluation Tests
 */
import { describe, it, expect } from 'vitest';
import { createComponent } from '../../src/core/component.js';
import { createDataScope, evaluateComponentInputs, tabularRowCount } from '../../src/core/input.js';
import { EvaluationError } from '../../src/core/errors.js';
import { ConstMapper, IndexMapper, LinearMapper } from '../../src/mappers/index.js';

describe('tabularRowCount', () => {
  it('should return the common array length', () => {
    expect(tabularRowCount({ x: [1, 2, 3], site: ['a', 'b', 'c'], scale: 2 })).toBe(3);
  });

  it('should return null for ragged or scalar data', () => {
    expect(tabularRowCount({ x: [1, 2], y: [1] })).toBeNull();
    expect(tabularRowCount({ k: 1 })).toBeNull();
    expect(tabularRowCount(null)).toBeNull();
  });
});

describe('createDataScope', () => {
  it('should bind data fields and .data.', () => {
    const scope = createDataScope({ x: [1, 2] });
    expect(scope.lookup('x')).toEqual({ type: 'numeric', values: [1, 2], names: null });
    expect(scope.lookup('.data.')?.type).toBe('list');
    expect(scope.lookupFunction('exp')?.name).toBe('exp');
  });
});

describe('evaluateComponentInputs', () => {
  const data = { x: [1, 2, 3], site: ['a', 'b', 'a'], w: [1, 2, 3] };

  it('should evaluate main expressions and default group/replicate', () => {
    const x = createComponent({ label: 'x', mapper: new LinearMapper() });
    const inputs = evaluateComponentInputs([x], data);

    expect(inputs.x).toEqual({ main: [1, 2, 3], group: [1, 1, 1], replicate: [1, 1, 1], scale: null });
  });

  it('should expand scalar main values to the row count', () => {
    const intercept = createComponent({ label: 'intercept', mapper: new ConstMapper() });
    const inputs = evaluateComponentInputs([intercept], data);

    expect(inputs.intercept.main).toEqual([1, 1, 1]);
  });

  it('should evaluate expressions over data columns', () => {
    const x = createComponent({ label: 'x2', main: 'x^2', weights: 'w / 2', mapper: new LinearMapper() });
    const inputs = evaluateComponentInputs([x], data);

    expect(inputs.x2.main).toEqual([1, 4, 9]);
    expect(inputs.x2.scale).toEqual([0.5, 1, 1.5]);
  });

  it('should keep character keys', () => {
    const u = createComponent({ label: 'u', main: 'site', mapper: new IndexMapper(['a', 'b']) });
    expect(evaluateComponentInputs([u], data).u.main).toEqual(['a', 'b', 'a']);
  });

  it('should name the component and expression on failure', () => {
    const bad = createComponent({ label: 'z', main: 'missing + 1', mapper: new LinearMapper() });

    expect(() => evaluateComponentInputs([bad], data)).toThrow(EvaluationError);
    expect(() => evaluateComponentInputs([bad], data)).toThrow(
      `Failed to evaluate main input "missing + 1" of component "z": object 'missing' not found`
    );
  });

  it('should reject group lengths that do not match main', () => {
    const x = createComponent({ label: 'x', group: 'c(1, 2)', mapper: new LinearMapper(), groupLevels: [1, 2] });
    expect(() => evaluateComponentInputs([x], data)).toThrow('Component "x": group has 2 values, main has 3');
  });
});
