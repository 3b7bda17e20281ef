/**
 * Pointwise Mapper - elementwise nonlinear transform of another mapper
 *
 * @module mappers/pointwise-mapper
 */

import type { MainMapper, MainValue } from '../types/index.js';
import { SparseMatrix } from '../utils/linalg.js';

export interface PointwiseTransform {
  name: string;
  fn: (eta: number) => number;
  derivative: (eta: number) => number;
}

export const EXP_TRANSFORM: PointwiseTransform = {
  name: 'exp',
  fn: Math.exp,
  derivative: Math.exp,
};

/**
 * f(inner(values, state)), never linear
 */
export class PointwiseMapper implements MainMapper {
  readonly kind: string;
  private readonly inner: MainMapper;
  private readonly transform: PointwiseTransform;

  constructor(inner: MainMapper, transform: PointwiseTransform) {
    this.inner = inner;
    this.transform = transform;
    this.kind = `${transform.name}(${inner.kind})`;
  }

  static exp(inner: MainMapper): PointwiseMapper {
    return new PointwiseMapper(inner, EXP_TRANSFORM);
  }

  size(): number {
    return this.inner.size();
  }

  isLinear(): boolean {
    return false;
  }

  evaluate(values: MainValue[], state?: ArrayLike<number>): number[] {
    return this.inner.evaluate(values, state).map(this.transform.fn);
  }

  jacobian(values: MainValue[], state?: ArrayLike<number>): SparseMatrix {
    const eta = this.inner.evaluate(values, state);
    return this.inner.jacobian(values, state).scaleRows(eta.map(this.transform.derivative));
  }

  invalidOutput(values: MainValue[], state?: ArrayLike<number>): boolean[] {
    return this.inner.invalidOutput(values, state);
  }
}
