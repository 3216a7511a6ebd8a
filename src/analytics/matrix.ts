/**
 * Dense matrix helpers for the optimizer.
 *
 * Covariance matrices are symmetric positive semi-definite, so the
 * pseudo-inverse is built from a Jacobi eigen-decomposition rather than a
 * general SVD.
 */

import { mean } from './numeric';

export type Matrix = number[][];

const MAX_JACOBI_SWEEPS = 100;

export function identity(n: number): Matrix {
  return Array.from({ length: n }, (_, i) =>
    Array.from({ length: n }, (_, j) => (i === j ? 1 : 0))
  );
}

export function multiplyVector(matrix: Matrix, vector: readonly number[]): number[] {
  return matrix.map((row) => row.reduce((acc, value, j) => acc + value * vector[j], 0));
}

/**
 * Column means of a rows-by-columns table.
 */
export function columnMeans(rows: readonly (readonly number[])[]): number[] {
  if (rows.length === 0) return [];
  const width = rows[0].length;
  return Array.from({ length: width }, (_, j) => mean(rows.map((row) => row[j])));
}

/**
 * Sample covariance (ddof 1) of the columns.
 */
export function sampleCovariance(rows: readonly (readonly number[])[]): Matrix {
  const n = rows.length;
  const means = columnMeans(rows);
  const width = means.length;
  const cov: Matrix = Array.from({ length: width }, () => new Array<number>(width).fill(0));

  for (let i = 0; i < width; i++) {
    for (let j = i; j < width; j++) {
      let acc = 0;
      for (const row of rows) {
        acc += (row[i] - means[i]) * (row[j] - means[j]);
      }
      const value = n > 1 ? acc / (n - 1) : NaN;
      cov[i][j] = value;
      cov[j][i] = value;
    }
  }
  return cov;
}

export interface EigenDecomposition {
  values: number[];
  /** Eigenvectors stored as columns: vectors[i][k] is component i of vector k. */
  vectors: Matrix;
}

function offDiagonalNorm(a: Matrix): number {
  let acc = 0;
  for (let p = 0; p < a.length; p++) {
    for (let q = p + 1; q < a.length; q++) {
      acc += a[p][q] ** 2;
    }
  }
  return acc;
}

function frobeniusNorm(a: Matrix): number {
  let acc = 0;
  for (const row of a) {
    for (const value of row) acc += value ** 2;
  }
  return acc;
}

/**
 * Cyclic Jacobi eigenvalue algorithm for symmetric matrices.
 */
export function symmetricEigen(matrix: Matrix): EigenDecomposition {
  const n = matrix.length;
  const a = matrix.map((row) => row.slice());
  const v = identity(n);
  const threshold = frobeniusNorm(a) * 1e-30;

  for (let sweep = 0; sweep < MAX_JACOBI_SWEEPS; sweep++) {
    if (offDiagonalNorm(a) <= threshold) break;

    for (let p = 0; p < n - 1; p++) {
      for (let q = p + 1; q < n; q++) {
        const apq = a[p][q];
        if (apq === 0) continue;

        const theta = (a[q][q] - a[p][p]) / (2 * apq);
        const t = (theta >= 0 ? 1 : -1) / (Math.abs(theta) + Math.sqrt(theta * theta + 1));
        const c = 1 / Math.sqrt(t * t + 1);
        const s = t * c;

        for (let k = 0; k < n; k++) {
          const akp = a[k][p];
          const akq = a[k][q];
          a[k][p] = c * akp - s * akq;
          a[k][q] = s * akp + c * akq;
        }
        for (let k = 0; k < n; k++) {
          const apk = a[p][k];
          const aqk = a[q][k];
          a[p][k] = c * apk - s * aqk;
          a[q][k] = s * apk + c * aqk;
        }
        for (let k = 0; k < n; k++) {
          const vkp = v[k][p];
          const vkq = v[k][q];
          v[k][p] = c * vkp - s * vkq;
          v[k][q] = s * vkp + c * vkq;
        }
      }
    }
  }

  return { values: a.map((row, i) => row[i]), vectors: v };
}

/**
 * Moore-Penrose pseudo-inverse of a symmetric matrix. Eigenvalues within
 * `n * eps * max|lambda|` of zero are dropped, so singular and
 * near-singular inputs produce a finite result.
 */
export function symmetricPseudoInverse(matrix: Matrix): Matrix {
  const n = matrix.length;
  if (n === 0) return [];

  const { values, vectors } = symmetricEigen(matrix);
  const largest = Math.max(...values.map((value) => Math.abs(value)));
  const tolerance = n * Number.EPSILON * largest;
  const inverted = values.map((value) => (Math.abs(value) > tolerance ? 1 / value : 0));

  const result: Matrix = Array.from({ length: n }, () => new Array<number>(n).fill(0));
  for (let i = 0; i < n; i++) {
    for (let j = i; j < n; j++) {
      let acc = 0;
      for (let k = 0; k < n; k++) {
        acc += vectors[i][k] * inverted[k] * vectors[j][k];
      }
      result[i][j] = acc;
      result[j][i] = acc;
    }
  }
  return result;
}
