/**
 * Sparse Linear Algebra
 *
 * Row-compressed sparse matrices for mapper Jacobians. Only the handful of
 * operations the mappers need: products with dense vectors, row scaling and
 * row-block placement.
 *
 * @module utils/linalg
 */

/**
 * One sparse row as parallel column/value arrays
 */
export interface SparseRow {
  cols: number[];
  values: number[];
}

/**
 * Immutable row-compressed sparse matrix
 */
export class SparseMatrix {
  readonly nrow: number;
  readonly ncol: number;
  private readonly rows: ReadonlyArray<SparseRow>;

  private constructor(rows: SparseRow[], ncol: number) {
    this.rows = rows;
    this.nrow = rows.length;
    this.ncol = ncol;
  }

  /**
   * Build from explicit rows. Column indices must lie in [0, ncol).
   */
  static fromRows(rows: SparseRow[], ncol: number): SparseMatrix {
    for (let i = 0; i < rows.length; i++) {
      const row = rows[i];
      if (row.cols.length !== row.values.length) {
        throw new Error(`Sparse row ${i} has ${row.cols.length} columns but ${row.values.length} values`);
      }
      for (const c of row.cols) {
        if (!Number.isInteger(c) || c < 0 || c >= ncol) {
          throw new Error(`Invalid column index ${c} in row ${i} (ncol = ${ncol})`);
        }
      }
    }
    return new SparseMatrix(rows.map(r => ({ cols: [...r.cols], values: [...r.values] })), ncol);
  }

  /**
   * All-zero matrix
   */
  static zeros(nrow: number, ncol: number): SparseMatrix {
    return new SparseMatrix(Array.from({ length: nrow }, () => ({ cols: [], values: [] })), ncol);
  }

  /**
   * Dense matrix given as an array of rows
   */
  static fromDense(dense: number[][], ncol?: number): SparseMatrix {
    const width = ncol ?? (dense.length > 0 ? dense[0].length : 0);
    const rows: SparseRow[] = dense.map(r => {
      const cols: number[] = [];
      const values: number[] = [];
      r.forEach((v, j) => {
        if (v !== 0) {
          cols.push(j);
          values.push(v);
        }
      });
      return { cols, values };
    });
    return SparseMatrix.fromRows(rows, width);
  }

  row(i: number): SparseRow {
    const r = this.rows[i];
    return { cols: [...r.cols], values: [...r.values] };
  }

  /**
   * Matrix-vector product
   */
  multiply(x: ArrayLike<number>): number[] {
    if (x.length !== this.ncol) {
      throw new Error(`Vector length mismatch: ${x.length} vs ${this.ncol}`);
    }
    const out = new Array<number>(this.nrow);
    for (let i = 0; i < this.nrow; i++) {
      const r = this.rows[i];
      let sum = 0;
      for (let k = 0; k < r.cols.length; k++) {
        sum += r.values[k] * x[r.cols[k]];
      }
      out[i] = sum;
    }
    return out;
  }

  /**
   * Multiply row i by scale[i]
   */
  scaleRows(scale: ArrayLike<number>): SparseMatrix {
    if (scale.length !== this.nrow) {
      throw new Error(`Scale length mismatch: ${scale.length} vs ${this.nrow}`);
    }
    return new SparseMatrix(
      this.rows.map((r, i) => ({ cols: [...r.cols], values: r.values.map(v => v * scale[i]) })),
      this.ncol
    );
  }

  toDense(): number[][] {
    return this.rows.map(r => {
      const dense = new Array<number>(this.ncol).fill(0);
      r.cols.forEach((c, k) => {
        dense[c] += r.values[k];
      });
      return dense;
    });
  }

  nonZeros(): number {
    return this.rows.reduce((n, r) => n + r.cols.length, 0);
  }
}

/**
 * Zero vector of length n
 */
export function zeros(n: number): number[] {
  return new Array<number>(n).fill(0);
}

/**
 * Elementwise sum of two equal-length vectors
 */
export function addVectors(a: ArrayLike<number>, b: ArrayLike<number>): number[] {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }
  const out = new Array<number>(a.length);
  for (let i = 0; i < a.length; i++) {
    out[i] = a[i] + b[i];
  }
  return out;
}

/**
 * Elementwise difference a - b
 */
export function subtractVectors(a: ArrayLike<number>, b: ArrayLike<number>): number[] {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }
  const out = new Array<number>(a.length);
  for (let i = 0; i < a.length; i++) {
    out[i] = a[i] - b[i];
  }
  return out;
}
