// Rail Fence, Route and Myszkowski. All three work on the uppercased
// alphanumeric form of the text and emit uppercase output.

import { normalizeAlphanumeric } from './alphabet.js';
import { InvalidKeyError, InvalidParameterError } from './errors.js';
import {
  applyOrder,
  buildGrid,
  fillOrder,
  myszkowskiOrder,
  padToBlock,
  railFenceOrder,
  routeOrder,
  stripPadding,
  toFlatOrder,
} from './grid.js';
import type { CipherResult } from './types.js';

function assertRails(rails: number, length: number): void {
  if (!Number.isInteger(rails) || rails < 2) {
    throw new InvalidParameterError(`Number of rails must be an integer of at least 2, got ${rails}`);
  }
  if (rails > length) {
    throw new InvalidParameterError(`Number of rails (${rails}) cannot be greater than text length (${length})`);
  }
}

export function railFenceEncrypt(text: string, rails: number): string {
  const chars = Array.from(normalizeAlphanumeric(text));
  assertRails(rails, chars.length);
  return applyOrder(chars, railFenceOrder(chars.length, rails));
}

export function railFenceDecrypt(text: string, rails: number): string {
  const chars = Array.from(normalizeAlphanumeric(text));
  assertRails(rails, chars.length);
  return fillOrder(chars, railFenceOrder(chars.length, rails));
}

function assertGridShape(rows: number, cols: number): void {
  if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows < 1 || cols < 1) {
    throw new InvalidParameterError(`Grid dimensions must be positive integers, got ${rows}x${cols}`);
  }
}

export function routeEncrypt(text: string, rows: number, cols: number, pattern: string): CipherResult {
  assertGridShape(rows, cols);
  const order = toFlatOrder(routeOrder(rows, cols, pattern), cols);

  const normalized = normalizeAlphanumeric(text);
  if (normalized.length > rows * cols) {
    throw new InvalidParameterError(
      `Text of length ${normalized.length} does not fit a ${rows}x${cols} grid`,
    );
  }

  const cells = buildGrid(normalized, rows, cols).flat();
  return { text: applyOrder(cells, order), padding: rows * cols - normalized.length };
}

export function routeDecrypt(
  text: string,
  rows: number,
  cols: number,
  pattern: string,
  padding = 0,
): string {
  assertGridShape(rows, cols);
  const order = toFlatOrder(routeOrder(rows, cols, pattern), cols);

  const chars = Array.from(normalizeAlphanumeric(text));
  if (chars.length !== rows * cols) {
    throw new InvalidParameterError(
      `Ciphertext length ${chars.length} must equal the grid size ${rows}x${cols}`,
    );
  }

  return stripPadding(fillOrder(chars, order), padding);
}

function assertMyszkowskiKey(keyword: string): string {
  const key = keyword.toUpperCase();
  if (key.length === 0) {
    throw new InvalidKeyError('Myszkowski keyword must not be empty');
  }
  return key;
}

export function myszkowskiEncrypt(text: string, keyword: string): CipherResult {
  const key = assertMyszkowskiKey(keyword);
  const cols = key.length;
  const { text: padded, padding } = padToBlock(normalizeAlphanumeric(text), cols);
  const rows = padded.length / cols;

  const cells = buildGrid(padded, rows, cols).flat();
  return { text: applyOrder(cells, toFlatOrder(myszkowskiOrder(key, rows), cols)), padding };
}

export function myszkowskiDecrypt(text: string, keyword: string, padding = 0): string {
  const key = assertMyszkowskiKey(keyword);
  const cols = key.length;
  const chars = Array.from(normalizeAlphanumeric(text));
  if (chars.length % cols !== 0) {
    throw new InvalidParameterError(
      `Ciphertext length ${chars.length} is not a multiple of the keyword length ${cols}`,
    );
  }

  const rows = chars.length / cols;
  return stripPadding(fillOrder(chars, toFlatOrder(myszkowskiOrder(key, rows), cols)), padding);
}
