// Exact integer matrix arithmetic for the Hill cipher. No floating point:
// determinant and adjugate come from cofactor expansion.

import { gcd, mod, modInverse } from './alphabet.js';
import { InvalidKeyError } from './errors.js';

export type Matrix = number[][];

export function assertSquare(matrix: Matrix): void {
  const size = matrix.length;
  if (size === 0) {
    throw new InvalidKeyError('Key matrix must not be empty');
  }
  for (const row of matrix) {
    if (row.length !== size) {
      throw new InvalidKeyError(`Key matrix must be square, found a row of ${row.length} in a ${size}x${size} matrix`);
    }
    if (!row.every(Number.isInteger)) {
      throw new InvalidKeyError('Key matrix entries must be integers');
    }
  }
}

// Matrix without the given row and column
export function minor(matrix: Matrix, row: number, col: number): Matrix {
  return matrix
    .filter((_, r) => r !== row)
    .map((cells) => cells.filter((_, c) => c !== col));
}

export function determinant(matrix: Matrix): number {
  assertSquare(matrix);
  return expand(matrix);
}

function expand(matrix: Matrix): number {
  const size = matrix.length;
  if (size === 1) return matrix[0][0];
  if (size === 2) {
    return matrix[0][0] * matrix[1][1] - matrix[0][1] * matrix[1][0];
  }

  let det = 0;
  for (let col = 0; col < size; col++) {
    const sign = col % 2 === 0 ? 1 : -1;
    det += sign * matrix[0][col] * expand(minor(matrix, 0, col));
  }
  return det;
}

// Transpose of the cofactor matrix
export function adjugate(matrix: Matrix): Matrix {
  assertSquare(matrix);
  const size = matrix.length;
  if (size === 1) return [[1]];

  return Array.from({ length: size }, (_, row) =>
    Array.from({ length: size }, (_, col) => {
      const sign = (row + col) % 2 === 0 ? 1 : -1;
      // adj[row][col] is the cofactor at (col, row)
      return sign * expand(minor(matrix, col, row));
    }),
  );
}

// Entries reduced into [0, m). det and adj mod m are unchanged, and the
// cofactor products stay well inside the safe integer range.
export function reduceMatrix(matrix: Matrix, modulus: number): Matrix {
  assertSquare(matrix);
  return matrix.map((row) => row.map((value) => mod(value, modulus)));
}

export function isInvertibleMod(matrix: Matrix, modulus: number): boolean {
  return gcd(mod(determinant(reduceMatrix(matrix, modulus)), modulus), modulus) === 1;
}

// K⁻¹ = det⁻¹ · adj(K) mod m
export function modularInverse(matrix: Matrix, modulus: number): Matrix {
  const reduced = reduceMatrix(matrix, modulus);
  const det = mod(determinant(reduced), modulus);
  if (gcd(det, modulus) !== 1) {
    throw new InvalidKeyError(`Key matrix determinant ${det} is not invertible modulo ${modulus}`);
  }

  const detInverse = modInverse(det, modulus);
  return adjugate(reduced).map((row) => row.map((value) => mod(detInverse * value, modulus)));
}

export function multiplyVector(matrix: Matrix, vector: readonly number[], modulus: number): number[] {
  return matrix.map((row) =>
    mod(row.reduce((sum, value, i) => sum + value * vector[i], 0), modulus),
  );
}
