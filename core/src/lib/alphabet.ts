import { InvalidKeyError } from './errors.js';

export const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
export const ALPHABET_SIZE = ALPHABET.length;

const UPPER_A = 65;
const LOWER_A = 97;

export type TextSymbol =
  | { kind: 'alpha'; residue: number; isUpper: boolean }
  | { kind: 'other'; char: string };

// Non-negative remainder, so -1 mod 26 is 25
export function mod(n: number, m: number): number {
  return ((n % m) + m) % m;
}

export function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    [x, y] = [y, x % y];
  }
  return x;
}

// Multiplicative inverse of a modulo m via the extended Euclidean algorithm
export function modInverse(a: number, m: number): number {
  const reduced = mod(a, m);
  if (gcd(reduced, m) !== 1) {
    throw new InvalidKeyError(`${a} has no inverse modulo ${m}`);
  }

  let [oldR, r] = [reduced, m];
  let [oldS, s] = [1, 0];
  while (r !== 0) {
    const quotient = Math.floor(oldR / r);
    [oldR, r] = [r, oldR - quotient * r];
    [oldS, s] = [s, oldS - quotient * s];
  }

  return mod(oldS, m);
}

export function toResidue(char: string): TextSymbol {
  const code = char.charCodeAt(0);
  if (char.length === 1 && code >= UPPER_A && code < UPPER_A + ALPHABET_SIZE) {
    return { kind: 'alpha', residue: code - UPPER_A, isUpper: true };
  }
  if (char.length === 1 && code >= LOWER_A && code < LOWER_A + ALPHABET_SIZE) {
    return { kind: 'alpha', residue: code - LOWER_A, isUpper: false };
  }
  return { kind: 'other', char };
}

export function fromResidue(residue: number, isUpper = true): string {
  const base = isUpper ? UPPER_A : LOWER_A;
  return String.fromCharCode(base + mod(residue, ALPHABET_SIZE));
}

// Normalize text to uppercase A-Z only
export function normalizeText(text: string): string {
  return text.toUpperCase().replace(/[^A-Z]/g, '');
}

// Uppercase A-Z and 0-9, the working form of the transposition ciphers
export function normalizeAlphanumeric(text: string): string {
  return text.toUpperCase().replace(/[^A-Z0-9]/g, '');
}

/**
 * Shared loop of the substitution ciphers. `residueAt` receives the residue of
 * each letter and its index among the letters seen so far; the returned
 * residue is recased to match the input. Other characters are copied as-is
 * and do not advance the index.
 */
export function shiftText(
  text: string,
  residueAt: (residue: number, letterIndex: number) => number,
): string {
  let result = '';
  let letterIndex = 0;

  for (const char of text) {
    const symbol = toResidue(char);
    if (symbol.kind === 'other') {
      result += symbol.char;
      continue;
    }
    result += fromResidue(residueAt(symbol.residue, letterIndex), symbol.isUpper);
    letterIndex++;
  }

  return result;
}
