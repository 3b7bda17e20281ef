/**
 * Component Mapper - main mapper expanded over group/replicate blocks
 *
 * The latent vector is laid out block by block: block (g, r) occupies
 * positions [(g + nGroup * r) * nMain, (g + nGroup * r + 1) * nMain).
 * Row i of the output uses the block selected by (group[i], replicate[i])
 * and is multiplied by scale[i] when weights are given.
 *
 * @module mappers/component-mapper
 */

import type { ComponentInput, JointMapper, MainMapper } from '../types/index.js';
import { SparseMatrix, type SparseRow } from '../utils/linalg.js';
import { resolveState } from './basic-mappers.js';
import { IndexMapper } from './index-mapper.js';

export interface ComponentMapperOptions {
  main: MainMapper;
  group?: IndexMapper;
  replicate?: IndexMapper;
}

/**
 * Rows sharing one latent block
 */
interface BlockRows {
  block: number;
  rows: number[];
}

export class ComponentMapper implements JointMapper {
  readonly kind: string;
  readonly stages: readonly [MainMapper, IndexMapper, IndexMapper];

  constructor(options: ComponentMapperOptions) {
    const group = options.group ?? new IndexMapper([1]);
    const replicate = options.replicate ?? new IndexMapper([1]);
    this.stages = [options.main, group, replicate];
    this.kind = options.main.kind;
  }

  get main(): MainMapper {
    return this.stages[0];
  }

  size(): number {
    const [main, group, replicate] = this.stages;
    return main.size() * group.size() * replicate.size();
  }

  isLinear(): boolean {
    return this.main.isLinear();
  }

  evaluate(input: ComponentInput, state?: ArrayLike<number>): number[] {
    const s = Array.from(resolveState(this.kind, state, this.size()));
    const n = this.checkInput(input);
    const nMain = this.main.size();
    const out = new Array<number>(n).fill(0);

    for (const { block, rows } of this.blocks(input)) {
      if (block < 0) continue;
      const slice = s.slice(block * nMain, (block + 1) * nMain);
      const values = this.main.evaluate(rows.map(i => input.main[i]), slice);
      rows.forEach((i, k) => {
        out[i] = values[k];
      });
    }

    const scale = input.scale;
    return scale ? out.map((v, i) => v * scale[i]) : out;
  }

  jacobian(input: ComponentInput, state?: ArrayLike<number>): SparseMatrix {
    const s = Array.from(resolveState(this.kind, state, this.size()));
    const n = this.checkInput(input);
    const nMain = this.main.size();
    const rows: SparseRow[] = Array.from({ length: n }, () => ({ cols: [], values: [] }));

    for (const { block, rows: members } of this.blocks(input)) {
      if (block < 0) continue;
      const slice = s.slice(block * nMain, (block + 1) * nMain);
      const local = this.main.jacobian(members.map(i => input.main[i]), slice);
      members.forEach((i, k) => {
        const r = local.row(k);
        rows[i] = { cols: r.cols.map(c => c + block * nMain), values: r.values };
      });
    }

    const jac = SparseMatrix.fromRows(rows, this.size());
    return input.scale ? jac.scaleRows(input.scale) : jac;
  }

  invalidOutput(input: ComponentInput): boolean[] {
    const [main, group, replicate] = this.stages;
    return main.invalidOutput(input.main).map(
      (bad, i) => bad || group.indexOf(input.group[i]) < 0 || replicate.indexOf(input.replicate[i]) < 0
    );
  }

  private checkInput(input: ComponentInput): number {
    const n = input.main.length;
    const mismatched = (['group', 'replicate'] as const).filter(k => input[k].length !== n);
    if (mismatched.length > 0) {
      throw new Error(`Input length mismatch for ${mismatched.join(', ')}: expected ${n} values`);
    }
    if (input.scale && input.scale.length !== n) {
      throw new Error(`Input length mismatch for scale: expected ${n} values, got ${input.scale.length}`);
    }
    return n;
  }

  private blocks(input: ComponentInput): BlockRows[] {
    const [, group, replicate] = this.stages;
    const byBlock = new Map<number, number[]>();
    input.main.forEach((_value, i) => {
      const g = group.indexOf(input.group[i]);
      const r = replicate.indexOf(input.replicate[i]);
      const block = g < 0 || r < 0 ? -1 : g + group.size() * r;
      const rows = byBlock.get(block);
      if (rows) {
        rows.push(i);
      } else {
        byBlock.set(block, [i]);
      }
    });
    return [...byBlock.entries()].map(([block, rows]) => ({ block, rows }));
  }
}
