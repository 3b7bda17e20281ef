/**
 * Mapper Tests
 */
import { describe, it, expect } from 'vitest';
import type { ComponentInput } from '../../src/types/index.js';
import {
  ComponentMapper,
  ConstMapper,
  IndexMapper,
  LinearMapper,
  OffsetMapper,
  PointwiseMapper,
  TaylorMapper,
  buildMainMapper,
  parseMapperDescriptor,
} from '../../src/mappers/index.js';

function input(main: ComponentInput['main'], extra: Partial<ComponentInput> = {}): ComponentInput {
  return {
    main,
    group: extra.group ?? main.map(() => 1),
    replicate: extra.replicate ?? main.map(() => 1),
    scale: extra.scale ?? null,
  };
}

describe('LinearMapper', () => {
  const mapper = new LinearMapper();

  it('should scale covariates by the coefficient', () => {
    expect(mapper.evaluate([1, 2, 3], [0.5])).toEqual([0.5, 1, 1.5]);
  });

  it('should default to a zero state', () => {
    expect(mapper.evaluate([4, 5])).toEqual([0, 0]);
  });

  it('should parse numeric strings', () => {
    expect(mapper.evaluate(['2'], [3])).toEqual([6]);
  });

  it('should reject non-numeric input', () => {
    expect(() => mapper.evaluate(['a'], [1])).toThrow('linear mapper needs numeric input, got "a"');
  });

  it('should reject states of the wrong size', () => {
    expect(() => mapper.evaluate([1], [1, 2])).toThrow('State length mismatch for linear mapper: got 2, expected 1');
  });

  it('should put covariates in the Jacobian', () => {
    expect(mapper.jacobian([2, 3]).toDense()).toEqual([[2], [3]]);
  });
});

describe('ConstMapper and OffsetMapper', () => {
  it('should repeat the intercept', () => {
    expect(new ConstMapper().evaluate([1, 1, 1], [2])).toEqual([2, 2, 2]);
  });

  it('should pass offsets through without latent state', () => {
    const offset = new OffsetMapper();
    expect(offset.size()).toBe(0);
    expect(offset.evaluate([1.5, -2])).toEqual([1.5, -2]);
    expect(offset.jacobian([1, 2]).ncol).toBe(0);
  });
});

describe('IndexMapper', () => {
  const mapper = new IndexMapper(['a', 'b', 'c']);

  it('should pick one coefficient per level', () => {
    expect(mapper.evaluate(['c', 'a', 'c'], [10, 20, 30])).toEqual([30, 10, 30]);
  });

  it('should mark unknown levels as invalid and map them to 0', () => {
    expect(mapper.invalidOutput(['a', 'z'])).toEqual([false, true]);
    expect(mapper.evaluate(['a', 'z'], [1, 2, 3])).toEqual([1, 0]);
  });

  it('should match numbers and strings by key', () => {
    const numeric = new IndexMapper([1, 2]);
    expect(numeric.indexOf('2')).toBe(1);
    expect(numeric.indexOf(3)).toBe(-1);
  });

  it('should collect levels in first-appearance order', () => {
    expect(IndexMapper.fromValues([3, 1, 3, 2]).getLevels()).toEqual([3, 1, 2]);
  });

  it('should reject duplicate levels', () => {
    expect(() => new IndexMapper([1, '1'])).toThrow('Duplicate index level: 1');
  });
});

describe('PointwiseMapper', () => {
  const mapper = PointwiseMapper.exp(new LinearMapper());

  it('should transform the inner output', () => {
    expect(mapper.kind).toBe('exp(linear)');
    expect(mapper.isLinear()).toBe(false);
    expect(mapper.evaluate([0, 1], [0])).toEqual([1, 1]);
  });

  it('should apply the chain rule', () => {
    expect(mapper.jacobian([2], [0]).toDense()).toEqual([[2]]);
  });
});

describe('ComponentMapper', () => {
  it('should lay out blocks by group and replicate', () => {
    const mapper = new ComponentMapper({
      main: new LinearMapper(),
      group: new IndexMapper([1, 2]),
    });

    expect(mapper.size()).toBe(2);
    const result = mapper.evaluate(input([1, 1, 2], { group: [1, 2, 2] }), [10, 100]);
    expect(result).toEqual([10, 100, 200]);
  });

  it('should multiply by weights', () => {
    const mapper = new ComponentMapper({ main: new LinearMapper() });
    expect(mapper.evaluate(input([1, 2], { scale: [2, 0.5] }), [3])).toEqual([6, 3]);
  });

  it('should shift Jacobian columns into the block', () => {
    const mapper = new ComponentMapper({
      main: new IndexMapper(['a', 'b']),
      replicate: new IndexMapper([1, 2]),
    });

    const jac = mapper.jacobian(input(['b', 'a'], { replicate: [2, 1] }));
    expect(jac.toDense()).toEqual([
      [0, 0, 0, 1],
      [1, 0, 0, 0],
    ]);
  });

  it('should flag rows outside the group levels', () => {
    const mapper = new ComponentMapper({ main: new LinearMapper(), group: new IndexMapper([1]) });
    expect(mapper.invalidOutput(input([1, 1], { group: [1, 5] }))).toEqual([false, true]);
  });

  it('should reject mismatched input lengths', () => {
    const mapper = new ComponentMapper({ main: new LinearMapper() });
    expect(() => mapper.evaluate({ main: [1, 2], group: [1], replicate: [1, 1], scale: null }))
      .toThrow('Input length mismatch for group: expected 2 values');
  });
});

describe('TaylorMapper', () => {
  it('should reproduce an affine mapper exactly', () => {
    const mapper = new ComponentMapper({ main: new LinearMapper() });
    const data = input([1, 2, 3]);
    const taylor = TaylorMapper.linearize(mapper, data);

    expect(taylor.size()).toBe(1);
    expect(taylor.evaluate(null, [0.5])).toEqual(mapper.evaluate(data, [0.5]));
  });

  it('should expand a nonlinear mapper around the reference state', () => {
    const mapper = new ComponentMapper({ main: PointwiseMapper.exp(new LinearMapper()) });
    const taylor = TaylorMapper.linearize(mapper, input([1]), [0]);

    // exp(b) ~ 1 + b around 0
    expect(taylor.offset).toEqual([1]);
    expect(taylor.evaluate(null, [0.5])).toEqual([1.5]);
  });

  it('should return the offset without a state', () => {
    const taylor = TaylorMapper.linearize(new ComponentMapper({ main: new OffsetMapper() }), input([4, 5]));
    expect(taylor.evaluate(null)).toEqual([4, 5]);
  });
});

describe('mapper descriptors', () => {
  it('should build nested mappers', () => {
    const mapper = buildMainMapper(parseMapperDescriptor({ kind: 'exp', inner: { kind: 'index', levels: [1, 2] } }));
    expect(mapper.kind).toBe('exp(index)');
    expect(mapper.size()).toBe(2);
  });

  it('should reject unknown kinds', () => {
    expect(() => parseMapperDescriptor({ kind: 'spde' })).toThrow('mapper.kind "spde" is not a known mapper');
  });

  it('should validate index levels', () => {
    expect(() => parseMapperDescriptor({ kind: 'index', levels: [true] }, 'components[0].mapper'))
      .toThrow('components[0].mapper.levels must be an array of numbers or strings');
  });
});
