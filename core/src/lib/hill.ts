import { ALPHABET_SIZE, fromResidue, normalizeText, toResidue } from './alphabet.js';
import { InvalidKeyError, InvalidParameterError } from './errors.js';
import { padToBlock, stripPadding } from './grid.js';
import {
  isInvertibleMod,
  modularInverse,
  multiplyVector,
  reduceMatrix,
  type Matrix,
} from './matrix.js';
import type { CipherResult } from './types.js';

function toResidues(text: string): number[] {
  return Array.from(text, (char) => {
    const symbol = toResidue(char);
    return symbol.kind === 'alpha' ? symbol.residue : 0;
  });
}

function applyBlocks(residues: number[], matrix: Matrix): string {
  const size = matrix.length;
  let result = '';
  for (let start = 0; start < residues.length; start += size) {
    const block = multiplyVector(matrix, residues.slice(start, start + size), ALPHABET_SIZE);
    result += block.map((value) => fromResidue(value)).join('');
  }
  return result;
}

// C = K·P mod 26, block by block over the letters of the text
export function hillEncrypt(text: string, matrix: Matrix): CipherResult {
  const key = reduceMatrix(matrix, ALPHABET_SIZE);
  if (!isInvertibleMod(key, ALPHABET_SIZE)) {
    throw new InvalidKeyError(`Key matrix is not invertible modulo ${ALPHABET_SIZE}`);
  }

  const { text: padded, padding } = padToBlock(normalizeText(text), key.length);
  return { text: applyBlocks(toResidues(padded), key), padding };
}

// P = K⁻¹·C mod 26; `padding` trailing characters are dropped from the result
export function hillDecrypt(text: string, matrix: Matrix, padding = 0): string {
  const inverse = modularInverse(matrix, ALPHABET_SIZE);

  const letters = normalizeText(text);
  if (letters.length % matrix.length !== 0) {
    throw new InvalidParameterError(
      `Ciphertext length ${letters.length} is not a multiple of the block size ${matrix.length}`,
    );
  }

  const plaintext = applyBlocks(toResidues(letters), inverse);
  return stripPadding(plaintext, padding);
}
