/**
 * Mappers Export
 * @module mappers
 */

export {
  LinearMapper,
  ConstMapper,
  OffsetMapper,
  resolveState,
  toNumeric,
} from './basic-mappers.js';

export { IndexMapper, keyOf } from './index-mapper.js';

export { PointwiseMapper, EXP_TRANSFORM } from './pointwise-mapper.js';
export type { PointwiseTransform } from './pointwise-mapper.js';

export { ComponentMapper } from './component-mapper.js';
export type { ComponentMapperOptions } from './component-mapper.js';

export { TaylorMapper } from './taylor-mapper.js';

export { parseMapperDescriptor, buildMainMapper } from './descriptor.js';
export type { MapperDescriptor } from './descriptor.js';
