export type Matrix = number[][];

/**
 * Dense Cholesky factorisation A = LLᵀ for a small symmetric matrix.
 * Returns null when a pivot is not positive (matrix not positive-definite).
 */
export const choleskyDecompose = (a: Matrix, minPivot = 0): Matrix | null => {
  const n = a.length;
  const l: Matrix = Array.from({ length: n }, () => new Array<number>(n).fill(0));
  for (let j = 0; j < n; j += 1) {
    let diagonal = a[j][j];
    for (let k = 0; k < j; k += 1) diagonal -= l[j][k] * l[j][k];
    if (!(diagonal > minPivot)) {
      return null;
    }
    l[j][j] = Math.sqrt(diagonal);
    for (let i = j + 1; i < n; i += 1) {
      let value = a[i][j];
      for (let k = 0; k < j; k += 1) value -= l[i][k] * l[j][k];
      l[i][j] = value / l[j][j];
    }
  }
  return l;
};

const substitute = (l: Matrix, rhs: number[]): number[] => {
  const n = l.length;
  const g = new Array<number>(n);
  for (let i = 0; i < n; i += 1) {
    let value = rhs[i];
    for (let k = 0; k < i; k += 1) value -= l[i][k] * g[k];
    g[i] = value / l[i][i];
  }
  const x = new Array<number>(n);
  for (let i = n - 1; i >= 0; i -= 1) {
    let value = g[i];
    for (let k = i + 1; k < n; k += 1) value -= l[k][i] * x[k];
    x[i] = value / l[i][i];
  }
  return x;
};

export const choleskySolve = (a: Matrix, rhs: number[]): number[] | null => {
  const l = choleskyDecompose(a);
  return l ? substitute(l, rhs) : null;
};

/**
 * Inverse of a normal matrix JᵀJ. The matrix is scaled to unit diagonal first
 * so the singularity test does not depend on parameter units; returns null
 * when the scaled matrix has a pivot below `minPivot`.
 */
export const invertNormalMatrix = (a: Matrix, minPivot = 1e-12): Matrix | null => {
  const n = a.length;
  const scale = a.map((row, i) => Math.sqrt(row[i]));
  if (scale.some((value) => !(value > 0) || !Number.isFinite(value))) {
    return null;
  }
  const scaled = a.map((row, i) => row.map((value, j) => value / (scale[i] * scale[j])));
  const l = choleskyDecompose(scaled, minPivot);
  if (!l) {
    return null;
  }
  const inverse: Matrix = Array.from({ length: n }, () => new Array<number>(n).fill(0));
  for (let column = 0; column < n; column += 1) {
    const unit = new Array<number>(n).fill(0);
    unit[column] = 1;
    const solved = substitute(l, unit);
    for (let row = 0; row < n; row += 1) {
      inverse[row][column] = solved[row] / (scale[row] * scale[column]);
    }
  }
  return inverse;
};

export const normalEquations = (
  jacobian: Matrix,
  residuals: number[]
): { jtj: Matrix; jtr: number[] } => {
  const p = jacobian.length;
  const jtj: Matrix = Array.from({ length: p }, () => new Array<number>(p).fill(0));
  const jtr = new Array<number>(p).fill(0);
  for (let i = 0; i < p; i += 1) {
    const column = jacobian[i];
    for (let k = 0; k < residuals.length; k += 1) jtr[i] += column[k] * residuals[k];
    for (let j = 0; j <= i; j += 1) {
      const other = jacobian[j];
      let sum = 0;
      for (let k = 0; k < column.length; k += 1) sum += column[k] * other[k];
      jtj[i][j] = sum;
      jtj[j][i] = sum;
    }
  }
  return { jtj, jtr };
};

export const sumOfSquares = (values: number[]): number =>
  values.reduce((sum, value) => sum + value * value, 0);
