import { describe, it, expect } from 'vitest';
import { InvalidKeyError, InvalidParameterError } from '../errors.js';
import { hillDecrypt, hillEncrypt } from '../hill.js';

const KEY_2X2 = [[2, 1], [3, 4]];
const KEY_3X3 = [[6, 24, 1], [13, 16, 10], [20, 17, 15]];

describe('hill cipher', () => {
  it('encrypts HELP and decrypts it back', () => {
    const result = hillEncrypt('HELP', KEY_2X2);
    expect(result).toEqual({ text: 'SLLP', padding: 0 });
    expect(hillDecrypt(result.text, KEY_2X2)).toBe('HELP');
  });

  it('pads the last block and strips the padding on decrypt', () => {
    const result = hillEncrypt('Hello!', KEY_2X2);
    expect(result).toEqual({ text: 'SLHZZE', padding: 1 });
    expect(hillDecrypt(result.text, KEY_2X2, result.padding)).toBe('HELLO');
  });

  it('works with 3x3 keys', () => {
    expect(hillEncrypt('act', KEY_3X3).text).toBe('POH');
    expect(hillDecrypt('POH', KEY_3X3)).toBe('ACT');
  });

  it('round-trips with a 4x4 key', () => {
    const key = [[1, 2, 3, 4], [0, 1, 5, 6], [2, 0, 1, 7], [3, 1, 0, 1]];
    const { text } = hillEncrypt('CRYPTOGRAPHY', key);
    expect(text).toHaveLength(12);
    expect(hillDecrypt(text, key)).toBe('CRYPTOGRAPHY');
  });

  it('treats keys congruent modulo 26 alike, however large the entries', () => {
    const m = 26e9;
    const key = [[2 + m, 1 + m], [3 + m, 4 + m]];
    expect(hillEncrypt('HELP', key)).toEqual({ text: 'SLLP', padding: 0 });
    expect(hillDecrypt('SLLP', key)).toBe('HELP');
  });

  it('rejects keys that are not invertible modulo 26', () => {
    expect(() => hillEncrypt('HELP', [[2, 4], [1, 2]])).toThrow(InvalidKeyError);
    expect(() => hillDecrypt('HELP', [[1, 2], [3, 4]])).toThrow(InvalidKeyError);
  });

  it('rejects ciphertext that does not fill whole blocks', () => {
    expect(() => hillDecrypt('ABC', KEY_2X2)).toThrow(InvalidParameterError);
  });
});
