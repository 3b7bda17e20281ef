/**
 * Mapper Descriptors - JSON form of the reference mappers
 *
 * @module mappers/descriptor
 */

import type { MainMapper, MainValue } from '../types/index.js';
import { ConfigurationError } from '../core/errors.js';
import { ConstMapper, LinearMapper, OffsetMapper } from './basic-mappers.js';
import { IndexMapper } from './index-mapper.js';
import { PointwiseMapper } from './pointwise-mapper.js';

export type MapperDescriptor =
  | { kind: 'linear' }
  | { kind: 'const' }
  | { kind: 'offset' }
  | { kind: 'index'; levels: MainValue[] }
  | { kind: 'exp'; inner: MapperDescriptor };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMainValue(value: unknown): value is MainValue {
  return typeof value === 'number' || typeof value === 'string';
}

/**
 * Validate an untrusted descriptor
 */
export function parseMapperDescriptor(value: unknown, path: string = 'mapper'): MapperDescriptor {
  if (!isRecord(value) || typeof value.kind !== 'string') {
    throw new ConfigurationError(`${path} must be an object with a "kind" field`);
  }

  switch (value.kind) {
    case 'linear':
    case 'const':
    case 'offset':
      return { kind: value.kind };
    case 'index': {
      const levels = value.levels;
      if (!Array.isArray(levels) || !levels.every(isMainValue)) {
        throw new ConfigurationError(`${path}.levels must be an array of numbers or strings`);
      }
      return { kind: 'index', levels };
    }
    case 'exp':
      return { kind: 'exp', inner: parseMapperDescriptor(value.inner, `${path}.inner`) };
    default:
      throw new ConfigurationError(`${path}.kind "${value.kind}" is not a known mapper`);
  }
}

/**
 * Instantiate the main-value mapper for a descriptor
 */
export function buildMainMapper(descriptor: MapperDescriptor): MainMapper {
  switch (descriptor.kind) {
    case 'linear':
      return new LinearMapper();
    case 'const':
      return new ConstMapper();
    case 'offset':
      return new OffsetMapper();
    case 'index':
      return new IndexMapper(descriptor.levels);
    case 'exp':
      return PointwiseMapper.exp(buildMainMapper(descriptor.inner));
  }
}
