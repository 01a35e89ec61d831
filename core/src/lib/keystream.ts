import { ALPHABET_SIZE, mod } from './alphabet.js';
import { InvalidKeyError } from './errors.js';

export type KeyStream = (letterIndex: number) => number;

// Uppercase keyword, letters only
export function parseKeyword(keyword: string): string {
  const upper = keyword.toUpperCase();
  if (upper.length === 0) {
    throw new InvalidKeyError('Keyword must not be empty');
  }
  if (!/^[A-Z]+$/.test(upper)) {
    throw new InvalidKeyError(`Keyword "${keyword}" must contain letters only`);
  }
  return upper;
}

const KEY_BASE = 'A'.charCodeAt(0);

// Residue of a key character: (code - 'A') mod 26 of its uppercase form, so a
// non-letter slot still shifts (a space by 19)
export function keyResidue(char: string | undefined): number {
  if (char === undefined) return 0;
  const code = char.toUpperCase().codePointAt(0) ?? KEY_BASE;
  return mod(code - KEY_BASE, ALPHABET_SIZE);
}

// Vigenère / Beaufort: cycle the keyword over the letters of the text
export function repeatingKeyStream(keyword: string): KeyStream {
  const residues = Array.from(parseKeyword(keyword), (char) => keyResidue(char));
  return (letterIndex) => residues[letterIndex % residues.length];
}

// August: shift, shift + 1, shift + 2, ... one step per letter
export function progressiveKeyStream(initialShift: number): KeyStream {
  const start = mod(initialShift, ALPHABET_SIZE);
  return (letterIndex) => start + (letterIndex % ALPHABET_SIZE);
}

/**
 * Autokey key for text position `position`: the priming key while it lasts,
 * then the plaintext `primingKey.length` positions back. Every character of
 * the text takes a slot, letters or not.
 *
 * `plaintext` is the known plaintext when encrypting. When decrypting it is the
 * output decoded so far, which always reaches far enough because the lookup
 * trails the current position by the priming key's length.
 */
export function autokeyResidue(
  position: number,
  primingKey: readonly string[],
  plaintext: readonly string[],
): number {
  if (position < primingKey.length) {
    return keyResidue(primingKey[position]);
  }
  return keyResidue(plaintext[position - primingKey.length]);
}

// Full autokey stream for a known plaintext, one residue per character
export function autokeyStream(text: string, primingKey: string): number[] {
  const priming = Array.from(parseKeyword(primingKey));
  const chars = Array.from(text);
  return chars.map((_, position) => autokeyResidue(position, priming, chars));
}
