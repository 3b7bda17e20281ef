/**
 * Index Mapper - one latent coefficient per factor level
 *
 * Used for unstructured (iid) effects and for group/replicate blocks.
 * Keys outside the level set map to 0 and are reported as invalid output.
 *
 * @module mappers/index-mapper
 */

import type { MainMapper, MainValue } from '../types/index.js';
import { SparseMatrix } from '../utils/linalg.js';
import { resolveState } from './basic-mappers.js';

/**
 * Stringified lookup key of a main value
 */
export function keyOf(value: MainValue): string {
  return String(value);
}

export class IndexMapper implements MainMapper {
  readonly kind = 'index';
  private readonly levels: readonly MainValue[];
  private readonly positions: Map<string, number>;

  constructor(levels: readonly MainValue[]) {
    this.levels = [...levels];
    this.positions = new Map();
    for (const level of levels) {
      const key = keyOf(level);
      if (this.positions.has(key)) {
        throw new Error(`Duplicate index level: ${key}`);
      }
      this.positions.set(key, this.positions.size);
    }
  }

  /**
   * Levels in first-appearance order of the observed values
   */
  static fromValues(values: readonly MainValue[]): IndexMapper {
    const seen = new Map<string, MainValue>();
    for (const v of values) {
      const key = keyOf(v);
      if (!seen.has(key)) seen.set(key, v);
    }
    return new IndexMapper([...seen.values()]);
  }

  getLevels(): MainValue[] {
    return [...this.levels];
  }

  /**
   * Position of a value among the levels, -1 when unknown
   */
  indexOf(value: MainValue): number {
    return this.positions.get(keyOf(value)) ?? -1;
  }

  size(): number {
    return this.levels.length;
  }

  isLinear(): boolean {
    return true;
  }

  evaluate(values: MainValue[], state?: ArrayLike<number>): number[] {
    const s = resolveState(this.kind, state, this.size());
    return values.map(v => {
      const idx = this.indexOf(v);
      return idx < 0 ? 0 : s[idx];
    });
  }

  jacobian(values: MainValue[]): SparseMatrix {
    return SparseMatrix.fromRows(
      values.map(v => {
        const idx = this.indexOf(v);
        return idx < 0 ? { cols: [], values: [] } : { cols: [idx], values: [1] };
      }),
      this.size()
    );
  }

  invalidOutput(values: MainValue[]): boolean[] {
    return values.map(v => this.indexOf(v) < 0);
  }
}
