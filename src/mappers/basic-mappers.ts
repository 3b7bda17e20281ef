/**
 * Basic Main-Value Mappers
 *
 * - LinearMapper: covariate times a single coefficient
 * - ConstMapper: a single coefficient at every evaluation point (intercept)
 * - OffsetMapper: the covariate itself, no latent coefficients
 *
 * @module mappers/basic-mappers
 */

import type { MainMapper, MainValue } from '../types/index.js';
import { SparseMatrix } from '../utils/linalg.js';

/**
 * Resolve an optional state against the expected latent size
 */
export function resolveState(kind: string, state: ArrayLike<number> | undefined, size: number): ArrayLike<number> {
  if (state === undefined) {
    return new Array<number>(size).fill(0);
  }
  if (state.length !== size) {
    throw new Error(`State length mismatch for ${kind} mapper: got ${state.length}, expected ${size}`);
  }
  return state;
}

/**
 * Coerce a main value to a finite-or-NaN number
 */
export function toNumeric(kind: string, value: MainValue): number {
  if (typeof value === 'number') return value;
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new Error(`${kind} mapper needs numeric input, got "${value}"`);
  }
  return parsed;
}

export class LinearMapper implements MainMapper {
  readonly kind = 'linear';

  size(): number {
    return 1;
  }

  isLinear(): boolean {
    return true;
  }

  evaluate(values: MainValue[], state?: ArrayLike<number>): number[] {
    const beta = resolveState(this.kind, state, 1)[0];
    return values.map(v => toNumeric(this.kind, v) * beta);
  }

  jacobian(values: MainValue[]): SparseMatrix {
    return SparseMatrix.fromRows(
      values.map(v => ({ cols: [0], values: [toNumeric(this.kind, v)] })),
      1
    );
  }

  invalidOutput(values: MainValue[]): boolean[] {
    return values.map(() => false);
  }
}

export class ConstMapper implements MainMapper {
  readonly kind = 'const';

  size(): number {
    return 1;
  }

  isLinear(): boolean {
    return true;
  }

  evaluate(values: MainValue[], state?: ArrayLike<number>): number[] {
    const beta = resolveState(this.kind, state, 1)[0];
    return values.map(() => beta);
  }

  jacobian(values: MainValue[]): SparseMatrix {
    return SparseMatrix.fromRows(values.map(() => ({ cols: [0], values: [1] })), 1);
  }

  invalidOutput(values: MainValue[]): boolean[] {
    return values.map(() => false);
  }
}

export class OffsetMapper implements MainMapper {
  readonly kind = 'offset';

  size(): number {
    return 0;
  }

  isLinear(): boolean {
    return true;
  }

  evaluate(values: MainValue[], state?: ArrayLike<number>): number[] {
    resolveState(this.kind, state, 0);
    return values.map(v => toNumeric(this.kind, v));
  }

  jacobian(values: MainValue[]): SparseMatrix {
    return SparseMatrix.zeros(values.length, 0);
  }

  invalidOutput(values: MainValue[]): boolean[] {
    return values.map(() => false);
  }
}
