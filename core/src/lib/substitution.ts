// Monoalphabetic and polyalphabetic substitution ciphers.
// Case is kept per character and anything that is not a letter passes through.

import { ALPHABET_SIZE, fromResidue, gcd, mod, modInverse, shiftText, toResidue } from './alphabet.js';
import { InvalidKeyError } from './errors.js';
import {
  autokeyResidue,
  autokeyStream,
  parseKeyword,
  progressiveKeyStream,
  repeatingKeyStream,
} from './keystream.js';

// E(x) = (x + k) mod 26
export function caesarEncrypt(text: string, shift: number): string {
  const k = mod(shift, ALPHABET_SIZE);
  return shiftText(text, (x) => x + k);
}

export function caesarDecrypt(text: string, shift: number): string {
  const k = mod(shift, ALPHABET_SIZE);
  return shiftText(text, (x) => x - k);
}

function assertAffineKey(a: number): void {
  if (gcd(mod(a, ALPHABET_SIZE), ALPHABET_SIZE) !== 1) {
    throw new InvalidKeyError(`Affine key a=${a} must be coprime with ${ALPHABET_SIZE}`);
  }
}

// E(x) = (a·x + b) mod 26
export function affineEncrypt(text: string, a: number, b: number): string {
  assertAffineKey(a);
  const [ka, kb] = [mod(a, ALPHABET_SIZE), mod(b, ALPHABET_SIZE)];
  return shiftText(text, (x) => ka * x + kb);
}

export function affineDecrypt(text: string, a: number, b: number): string {
  assertAffineKey(a);
  const aInverse = modInverse(a, ALPHABET_SIZE);
  const kb = mod(b, ALPHABET_SIZE);
  return shiftText(text, (y) => aInverse * (y - kb));
}

// Self-inverse: E(x) = 25 - x
export function atbash(text: string): string {
  return shiftText(text, (x) => ALPHABET_SIZE - 1 - x);
}

// August: the shift grows by one after every letter
export function augustEncrypt(text: string, initialShift = 1): string {
  const shiftAt = progressiveKeyStream(initialShift);
  return shiftText(text, (x, i) => x + shiftAt(i));
}

export function augustDecrypt(text: string, initialShift = 1): string {
  const shiftAt = progressiveKeyStream(initialShift);
  return shiftText(text, (x, i) => x - shiftAt(i));
}

// E(x_i) = (x_i + k_i) mod 26
export function vigenereEncrypt(text: string, keyword: string): string {
  const keyAt = repeatingKeyStream(keyword);
  return shiftText(text, (x, i) => x + keyAt(i));
}

export function vigenereDecrypt(text: string, keyword: string): string {
  const keyAt = repeatingKeyStream(keyword);
  return shiftText(text, (x, i) => x - keyAt(i));
}

// Reciprocal: E(x_i) = D(x_i) = (k_i - x_i) mod 26
export function beaufort(text: string, keyword: string): string {
  const keyAt = repeatingKeyStream(keyword);
  return shiftText(text, (x, i) => keyAt(i) - x);
}

export function autokeyEncrypt(text: string, primingKey: string): string {
  const stream = autokeyStream(text, primingKey);
  let result = '';

  Array.from(text).forEach((char, position) => {
    const symbol = toResidue(char);
    result += symbol.kind === 'alpha'
      ? fromResidue(symbol.residue + stream[position], symbol.isUpper)
      : symbol.char;
  });

  return result;
}

// Each recovered character becomes key material further along, so this runs strictly in order
export function autokeyDecrypt(text: string, primingKey: string): string {
  const priming = Array.from(parseKeyword(primingKey));
  const output: string[] = [];

  Array.from(text).forEach((char, position) => {
    const symbol = toResidue(char);
    if (symbol.kind === 'other') {
      output.push(symbol.char);
      return;
    }
    const key = autokeyResidue(position, priming, output);
    output.push(fromResidue(symbol.residue - key, symbol.isUpper));
  });

  return output.join('');
}
