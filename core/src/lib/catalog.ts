// Uniform encrypt/decrypt over every cipher, dispatched on the key's variant

import { normalizeAlphanumeric, normalizeText } from './alphabet.js';
import { hillDecrypt, hillEncrypt } from './hill.js';
import {
  affineDecrypt,
  affineEncrypt,
  atbash,
  augustDecrypt,
  augustEncrypt,
  autokeyDecrypt,
  autokeyEncrypt,
  beaufort,
  caesarDecrypt,
  caesarEncrypt,
  vigenereDecrypt,
  vigenereEncrypt,
} from './substitution.js';
import {
  myszkowskiDecrypt,
  myszkowskiEncrypt,
  railFenceDecrypt,
  railFenceEncrypt,
  routeDecrypt,
  routeEncrypt,
} from './transposition.js';
import type { CipherDescriptor, CipherFamily, CipherId, CipherKey, CipherResult } from './types.js';

export const CIPHERS: readonly CipherDescriptor[] = [
  { id: 'caesar', name: 'Caesar', family: 'substitution', keyFields: ['shift'], reciprocal: false },
  { id: 'affine', name: 'Affine', family: 'substitution', keyFields: ['a', 'b'], reciprocal: false },
  { id: 'atbash', name: 'Atbash', family: 'substitution', keyFields: [], reciprocal: true },
  { id: 'august', name: 'August', family: 'substitution', keyFields: ['shift'], reciprocal: false },
  { id: 'vigenere', name: 'Vigenère', family: 'substitution', keyFields: ['keyword'], reciprocal: false },
  { id: 'beaufort', name: 'Beaufort', family: 'substitution', keyFields: ['keyword'], reciprocal: true },
  { id: 'autokey', name: 'Autokey', family: 'substitution', keyFields: ['keyword'], reciprocal: false },
  { id: 'hill', name: 'Hill', family: 'polygraphic', keyFields: ['matrix'], reciprocal: false },
  { id: 'railFence', name: 'Rail Fence', family: 'transposition', keyFields: ['rails'], reciprocal: false },
  { id: 'route', name: 'Route', family: 'transposition', keyFields: ['rows', 'cols', 'pattern'], reciprocal: false },
  { id: 'myszkowski', name: 'Myszkowski', family: 'transposition', keyFields: ['keyword'], reciprocal: false },
];

export function describeCiphers(): CipherDescriptor[] {
  return CIPHERS.map((descriptor) => ({ ...descriptor, keyFields: [...descriptor.keyFields] }));
}

export function familyOf(id: CipherId): CipherFamily {
  const descriptor = CIPHERS.find((candidate) => candidate.id === id);
  if (!descriptor) {
    throw new Error(`No cipher registered for "${id}"`);
  }
  return descriptor.family;
}

function unpadded(text: string): CipherResult {
  return { text, padding: 0 };
}

export function encryptWithPadding(text: string, key: CipherKey): CipherResult {
  switch (key.cipher) {
    case 'caesar':
      return unpadded(caesarEncrypt(text, key.shift));
    case 'affine':
      return unpadded(affineEncrypt(text, key.a, key.b));
    case 'atbash':
      return unpadded(atbash(text));
    case 'august':
      return unpadded(augustEncrypt(text, key.shift));
    case 'vigenere':
      return unpadded(vigenereEncrypt(text, key.keyword));
    case 'beaufort':
      return unpadded(beaufort(text, key.keyword));
    case 'autokey':
      return unpadded(autokeyEncrypt(text, key.keyword));
    case 'hill':
      return hillEncrypt(text, key.matrix);
    case 'railFence':
      return unpadded(railFenceEncrypt(text, key.rails));
    case 'route':
      return routeEncrypt(text, key.rows, key.cols, key.pattern);
    case 'myszkowski':
      return myszkowskiEncrypt(text, key.keyword);
  }
}

export function encrypt(text: string, key: CipherKey): string {
  return encryptWithPadding(text, key).text;
}

/**
 * `padding` is the count reported by encryptWithPadding; it only applies to
 * Hill, Route and Myszkowski, which fill their last block with 'X'.
 */
export function decrypt(text: string, key: CipherKey, padding = 0): string {
  switch (key.cipher) {
    case 'caesar':
      return caesarDecrypt(text, key.shift);
    case 'affine':
      return affineDecrypt(text, key.a, key.b);
    case 'atbash':
      return atbash(text);
    case 'august':
      return augustDecrypt(text, key.shift);
    case 'vigenere':
      return vigenereDecrypt(text, key.keyword);
    case 'beaufort':
      return beaufort(text, key.keyword);
    case 'autokey':
      return autokeyDecrypt(text, key.keyword);
    case 'hill':
      return hillDecrypt(text, key.matrix, padding);
    case 'railFence':
      return railFenceDecrypt(text, key.rails);
    case 'route':
      return routeDecrypt(text, key.rows, key.cols, key.pattern, padding);
    case 'myszkowski':
      return myszkowskiDecrypt(text, key.keyword, padding);
  }
}

// What decrypt(encrypt(text)) gives back for this key
export function canonicalForm(text: string, key: CipherKey): string {
  if (key.cipher === 'hill') return normalizeText(text);
  if (familyOf(key.cipher) === 'transposition') return normalizeAlphanumeric(text);
  return text;
}
