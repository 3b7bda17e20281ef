/**
 * Component Tests
 */
import { describe, it, expect } from 'vitest';
import { ComponentList, createComponent, isJointMapper } from '../../src/core/component.js';
import { ComponentMapper, ConstMapper, IndexMapper, LinearMapper, OffsetMapper } from '../../src/mappers/index.js';

describe('createComponent', () => {
  it('should infer type and model from the mapper', () => {
    const x = createComponent({ label: 'x', mapper: new LinearMapper() });

    expect(x.type).toBe('fixed');
    expect(x.model).toBe('linear');
    expect(x.input).toEqual({ main: 'x', group: null, replicate: null, weights: null });
    expect(x.mapper.stages[0].kind).toBe('linear');
  });

  it('should default a const main input to 1', () => {
    const intercept = createComponent({ label: 'intercept', mapper: new ConstMapper() });
    expect(intercept.type).toBe('const');
    expect(intercept.input.main).toBe('1');
  });

  it('should wrap main mappers with group levels', () => {
    const u = createComponent({
      label: 'u',
      type: 'iid',
      main: 'site',
      group: 'year',
      mapper: new IndexMapper(['a', 'b']),
      groupLevels: [2020, 2021],
    });

    expect(u.model).toBe('iid');
    expect(u.mapper.size()).toBe(4);
  });

  it('should accept complete joint mappers', () => {
    const joint = new ComponentMapper({ main: new OffsetMapper() });
    const off = createComponent({ label: 'off', mapper: joint });

    expect(isJointMapper(joint)).toBe(true);
    expect(off.mapper).toBe(joint);
    expect(off.type).toBe('offset');
  });

  it('should reject levels next to a joint mapper', () => {
    expect(() => createComponent({
      label: 'z',
      mapper: new ComponentMapper({ main: new LinearMapper() }),
      groupLevels: [1],
    })).toThrow('Component "z": group/replicate levels only apply to main-value mappers');
  });

  it('should reject invalid labels', () => {
    expect(() => createComponent({ label: '1x', mapper: new LinearMapper() })).toThrow('Invalid component label "1x"');
  });

  it('should be frozen', () => {
    const x = createComponent({ label: 'x', mapper: new LinearMapper() });
    expect(Object.isFrozen(x)).toBe(true);
    expect(Object.isFrozen(x.input)).toBe(true);
  });
});

describe('ComponentList', () => {
  const a = createComponent({ label: 'a', mapper: new LinearMapper() });
  const b = createComponent({ label: 'b', mapper: new ConstMapper() });
  const c = createComponent({ label: 'c', mapper: new OffsetMapper() });

  it('should keep definition order', () => {
    const list = new ComponentList([c, a, b]);
    expect(list.labels()).toEqual(['c', 'a', 'b']);
    expect(list.size).toBe(3);
    expect([...list].map(x => x.label)).toEqual(['c', 'a', 'b']);
  });

  it('should select in list order', () => {
    const list = new ComponentList([a, b, c]);
    expect(list.select(['c', 'a']).map(x => x.label)).toEqual(['a', 'c']);
  });

  it('should look up by label', () => {
    const list = new ComponentList([a, b]);
    expect(list.get('b')).toBe(b);
    expect(list.has('c')).toBe(false);
    expect(() => list.get('c')).toThrow('Unknown component label: c');
  });

  it('should reject duplicate labels', () => {
    expect(() => new ComponentList([a, b, a])).toThrow('Duplicate component label(s): a');
  });
});
