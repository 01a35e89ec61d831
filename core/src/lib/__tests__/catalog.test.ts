import { describe, it, expect } from 'vitest';
import { canonicalForm, decrypt, describeCiphers, encrypt, encryptWithPadding } from '../catalog.js';
import { InvalidKeyError, InvalidParameterError } from '../errors.js';
import type { CipherKey } from '../types.js';

const TEXT = 'Meet me at the old mill, 9pm!';

const KEYS: CipherKey[] = [
  { cipher: 'caesar', shift: 11 },
  { cipher: 'affine', a: 7, b: 3 },
  { cipher: 'atbash' },
  { cipher: 'august', shift: 4 },
  { cipher: 'vigenere', keyword: 'lantern' },
  { cipher: 'beaufort', keyword: 'ROPE' },
  { cipher: 'autokey', keyword: 'QUEEN' },
  { cipher: 'hill', matrix: [[6, 24, 1], [13, 16, 10], [20, 17, 15]] },
  { cipher: 'railFence', rails: 4 },
  { cipher: 'route', rows: 5, cols: 5, pattern: 'spiral_in' },
  { cipher: 'myszkowski', keyword: 'BANANA' },
];

const SUBSTITUTION = new Set(['caesar', 'affine', 'atbash', 'august', 'vigenere', 'beaufort', 'autokey']);

describe('cipher catalog', () => {
  it('lists every cipher once', () => {
    const ids = describeCiphers().map((descriptor) => descriptor.id);
    expect(ids).toHaveLength(11);
    expect(new Set(ids).size).toBe(11);
  });

  it('dispatches the reference vectors', () => {
    expect(encrypt('HELLO', { cipher: 'caesar', shift: 3 })).toBe('KHOOR');
    expect(encrypt('HELLO', { cipher: 'vigenere', keyword: 'KEY' })).toBe('RIJVS');
    expect(encrypt('HELLO', { cipher: 'atbash' })).toBe('SVOOL');
  });

  it.each(KEYS)('round-trips $cipher', (key) => {
    const { text, padding } = encryptWithPadding(TEXT, key);
    expect(decrypt(text, key, padding)).toBe(canonicalForm(TEXT, key));
  });

  it('reports padding for block ciphers', () => {
    expect(encryptWithPadding(TEXT, { cipher: 'route', rows: 5, cols: 5, pattern: 'snake' }).padding).toBe(4);
    expect(encryptWithPadding(TEXT, { cipher: 'hill', matrix: [[2, 1], [3, 4]] }).padding).toBe(0);
    expect(encryptWithPadding(TEXT, { cipher: 'railFence', rails: 3 }).padding).toBe(0);
  });

  it('keeps case and non-letters in place for substitution ciphers', () => {
    for (const key of KEYS.filter(({ cipher }) => SUBSTITUTION.has(cipher))) {
      const encrypted = encrypt(TEXT, key);
      expect(encrypted).toHaveLength(TEXT.length);
      Array.from(TEXT).forEach((char, i) => {
        const out = encrypted[i];
        if (/[a-z]/.test(char)) expect(out).toMatch(/[a-z]/);
        else if (/[A-Z]/.test(char)) expect(out).toMatch(/[A-Z]/);
        else expect(out).toBe(char);
      });
    }
  });

  it('normalizes transposition and hill text in the canonical form', () => {
    expect(canonicalForm(TEXT, { cipher: 'railFence', rails: 3 })).toBe('MEETMEATTHEOLDMILL9PM');
    expect(canonicalForm(TEXT, { cipher: 'hill', matrix: [[2, 1], [3, 4]] })).toBe('MEETMEATTHEOLDMILLPM');
    expect(canonicalForm(TEXT, { cipher: 'caesar', shift: 1 })).toBe(TEXT);
  });

  it('surfaces typed failures', () => {
    expect(() => encrypt(TEXT, { cipher: 'affine', a: 2, b: 1 })).toThrow(InvalidKeyError);
    expect(() => encrypt(TEXT, { cipher: 'hill', matrix: [[2, 4], [1, 2]] })).toThrow(InvalidKeyError);
    expect(() => encrypt(TEXT, { cipher: 'railFence', rails: 1 })).toThrow(InvalidParameterError);
  });
});
