import type { Matrix } from './matrix.js';

export type RoutePattern = 'spiral_in' | 'spiral_out' | 'snake' | 'diagonal';

export type CipherKey =
  | { cipher: 'caesar'; shift: number }
  | { cipher: 'affine'; a: number; b: number }
  | { cipher: 'atbash' }
  | { cipher: 'august'; shift: number }
  | { cipher: 'vigenere'; keyword: string }
  | { cipher: 'beaufort'; keyword: string }
  | { cipher: 'autokey'; keyword: string }
  | { cipher: 'hill'; matrix: Matrix }
  | { cipher: 'railFence'; rails: number }
  | { cipher: 'route'; rows: number; cols: number; pattern: RoutePattern }
  | { cipher: 'myszkowski'; keyword: string };

export type CipherId = CipherKey['cipher'];

export type CipherFamily = 'substitution' | 'polygraphic' | 'transposition';

// Output text plus the number of 'X' characters appended to fill the last block
export interface CipherResult {
  text: string;
  padding: number;
}

export interface CipherDescriptor {
  id: CipherId;
  name: string;
  family: CipherFamily;
  keyFields: string[];
  reciprocal: boolean;
}
