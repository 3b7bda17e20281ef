/**
 * Taylor Mapper - affine approximation bound to one evaluated input
 *
 * evaluate(_, state) = offset + jacobian · state. The input argument is
 * ignored: the Jacobian and offset were computed from the input at
 * construction time.
 *
 * @module mappers/taylor-mapper
 */

import type { ComponentInput, Mapper } from '../types/index.js';
import { SparseMatrix, addVectors, subtractVectors } from '../utils/linalg.js';

export class TaylorMapper implements Mapper<ComponentInput> {
  readonly kind = 'taylor';
  readonly jac: SparseMatrix;
  readonly offset: readonly number[];

  constructor(jacobian: SparseMatrix, offset: readonly number[]) {
    if (offset.length !== jacobian.nrow) {
      throw new Error(`Taylor offset length ${offset.length} does not match ${jacobian.nrow} rows`);
    }
    this.jac = jacobian;
    this.offset = [...offset];
  }

  /**
   * First-order expansion of a mapper around a reference state (zeros when omitted).
   * For an affine mapper the result is exact and independent of the reference.
   */
  static linearize(mapper: Mapper<ComponentInput>, input: ComponentInput, state?: ArrayLike<number>): TaylorMapper {
    const s0 = state === undefined ? new Array<number>(mapper.size()).fill(0) : Array.from(state);
    const jacobian = mapper.jacobian(input, s0);
    const value = mapper.evaluate(input, s0);
    return new TaylorMapper(jacobian, subtractVectors(value, jacobian.multiply(s0)));
  }

  size(): number {
    return this.jac.ncol;
  }

  isLinear(): boolean {
    return true;
  }

  evaluate(_input: ComponentInput | null, state?: ArrayLike<number>): number[] {
    if (state === undefined) {
      return [...this.offset];
    }
    return addVectors(this.offset, this.jac.multiply(state));
  }

  jacobian(): SparseMatrix {
    return this.jac;
  }

  invalidOutput(): boolean[] {
    return new Array<boolean>(this.jac.nrow).fill(false);
  }
}
