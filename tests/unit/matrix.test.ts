import { describe, expect, it } from 'vitest';
import {
  columnMeans,
  multiplyVector,
  sampleCovariance,
  symmetricEigen,
  symmetricPseudoInverse,
  type Matrix,
} from '@/analytics/matrix';

function multiply(a: Matrix, b: Matrix): Matrix {
  return a.map((row) => b[0].map((_, j) => row.reduce((acc, v, k) => acc + v * b[k][j], 0)));
}

function expectMatrixClose(actual: Matrix, expected: Matrix, digits = 12): void {
  expect(actual).toHaveLength(expected.length);
  actual.forEach((row, i) => {
    row.forEach((value, j) => {
      expect(value).toBeCloseTo(expected[i][j], digits);
    });
  });
}

describe('sampleCovariance', () => {
  it('uses n - 1 in the denominator', () => {
    expect(columnMeans([[1, 2], [3, 6]])).toEqual([2, 4]);
    expect(sampleCovariance([[1, 2], [3, 6]])).toEqual([
      [2, 4],
      [4, 8],
    ]);
  });
});

describe('symmetricEigen', () => {
  it('finds the eigenvalues of a 2x2 matrix', () => {
    const { values } = symmetricEigen([
      [2, 1],
      [1, 2],
    ]);
    const sorted = [...values].sort((a, b) => a - b);
    expect(sorted[0]).toBeCloseTo(1, 12);
    expect(sorted[1]).toBeCloseTo(3, 12);
  });

  it('returns orthonormal eigenvectors that reconstruct the matrix', () => {
    const a: Matrix = [
      [4, 1, 0.5],
      [1, 3, 0.2],
      [0.5, 0.2, 2],
    ];
    const { values, vectors } = symmetricEigen(a);
    const diag = values.map((v, i) => values.map((_, j) => (i === j ? v : 0)));
    const transposed = vectors[0].map((_, j) => vectors.map((row) => row[j]));
    expectMatrixClose(multiply(multiply(vectors, diag), transposed), a);
  });
});

describe('symmetricPseudoInverse', () => {
  it('matches the inverse of a non-singular matrix', () => {
    expectMatrixClose(
      symmetricPseudoInverse([
        [4, 1],
        [1, 3],
      ]),
      [
        [3 / 11, -1 / 11],
        [-1 / 11, 4 / 11],
      ]
    );
  });

  it('inverts a singular matrix without failing', () => {
    expectMatrixClose(
      symmetricPseudoInverse([
        [1, 1],
        [1, 1],
      ]),
      [
        [0.25, 0.25],
        [0.25, 0.25],
      ]
    );
  });

  it('maps the zero matrix to zero', () => {
    expect(symmetricPseudoInverse([[0, 0], [0, 0]])).toEqual([
      [0, 0],
      [0, 0],
    ]);
  });

  it('satisfies A A+ A = A', () => {
    const a: Matrix = [
      [2, 2, 0],
      [2, 2, 0],
      [0, 0, 1],
    ];
    expectMatrixClose(multiply(multiply(a, symmetricPseudoInverse(a)), a), a);
  });
});

describe('multiplyVector', () => {
  it('multiplies row by row', () => {
    expect(multiplyVector([[1, 2], [3, 4]], [1, 1])).toEqual([3, 7]);
  });
});
