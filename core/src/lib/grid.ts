// Coordinate orders for the transposition ciphers. Each generator depends only
// on the grid shape (or key), so decryption regenerates the same order and
// applies its inverse permutation.

import { InvalidParameterError } from './errors.js';
import type { RoutePattern } from './types.js';

export const PAD_CHAR = 'X';

export interface Coordinate {
  row: number;
  col: number;
}

export type CoordinateOrder = Coordinate[];

export function padToBlock(text: string, blockSize: number): { text: string; padding: number } {
  const padding = (blockSize - (text.length % blockSize)) % blockSize;
  return { text: text + PAD_CHAR.repeat(padding), padding };
}

export function stripPadding(text: string, padding: number): string {
  if (!Number.isInteger(padding) || padding < 0 || padding > text.length) {
    throw new InvalidParameterError(`Padding ${padding} does not fit a text of length ${text.length}`);
  }
  return padding === 0 ? text : text.slice(0, text.length - padding);
}

// Row-major fill, padded out to rows × cols
export function buildGrid(text: string, rows: number, cols: number): string[][] {
  const padded = text.padEnd(rows * cols, PAD_CHAR);
  return Array.from({ length: rows }, (_, row) =>
    Array.from(padded.slice(row * cols, (row + 1) * cols)),
  );
}

// Clockwise rings from the outside in
export function spiralIn(rows: number, cols: number): CoordinateOrder {
  const order: CoordinateOrder = [];
  let top = 0;
  let bottom = rows - 1;
  let left = 0;
  let right = cols - 1;

  while (top <= bottom && left <= right) {
    for (let col = left; col <= right; col++) order.push({ row: top, col });
    top++;

    for (let row = top; row <= bottom; row++) order.push({ row, col: right });
    right--;

    if (top <= bottom) {
      for (let col = right; col >= left; col--) order.push({ row: bottom, col });
      bottom--;
    }

    if (left <= right) {
      for (let row = bottom; row >= top; row--) order.push({ row, col: left });
      left++;
    }
  }

  return order;
}

export function spiralOut(rows: number, cols: number): CoordinateOrder {
  return spiralIn(rows, cols).reverse();
}

// Even rows left to right, odd rows right to left
export function snake(rows: number, cols: number): CoordinateOrder {
  const order: CoordinateOrder = [];
  for (let row = 0; row < rows; row++) {
    for (let i = 0; i < cols; i++) {
      order.push({ row, col: row % 2 === 0 ? i : cols - 1 - i });
    }
  }
  return order;
}

// Anti-diagonals (row + col constant) in ascending order, each by increasing row
export function diagonal(rows: number, cols: number): CoordinateOrder {
  const order: CoordinateOrder = [];
  for (let sum = 0; sum < rows + cols - 1; sum++) {
    for (let row = 0; row < rows; row++) {
      const col = sum - row;
      if (col >= 0 && col < cols) order.push({ row, col });
    }
  }
  return order;
}

export const ROUTE_PATTERNS: readonly RoutePattern[] = ['spiral_in', 'spiral_out', 'snake', 'diagonal'];

const ROUTE_GENERATORS: Record<RoutePattern, (rows: number, cols: number) => CoordinateOrder> = {
  spiral_in: spiralIn,
  spiral_out: spiralOut,
  snake,
  diagonal,
};

export function parseRoutePattern(name: string): RoutePattern {
  const pattern = ROUTE_PATTERNS.find((candidate) => candidate === name);
  if (!pattern) {
    throw new InvalidParameterError(`Unknown route pattern "${name}". Choose from: ${ROUTE_PATTERNS.join(', ')}`);
  }
  return pattern;
}

export function routeOrder(rows: number, cols: number, pattern: string): CoordinateOrder {
  return ROUTE_GENERATORS[parseRoutePattern(pattern)](rows, cols);
}

// Rail of every text position: the pointer bounces between rail 0 and rail `rails - 1`
export function railFenceRails(length: number, rails: number): number[] {
  const assignment: number[] = [];
  let rail = 0;
  let direction = 1;

  for (let i = 0; i < length; i++) {
    assignment.push(rail);
    if (rails > 1) {
      if (rail === 0) direction = 1;
      else if (rail === rails - 1) direction = -1;
      rail += direction;
    }
  }

  return assignment;
}

// Text positions in read-out order: rails top to bottom, left to right within a rail
export function railFenceOrder(length: number, rails: number): number[] {
  const buckets: number[][] = Array.from({ length: Math.min(Math.max(rails, 1), length) }, () => []);
  railFenceRails(length, rails).forEach((rail, position) => buckets[rail].push(position));
  return buckets.flat();
}

export interface ColumnGroup {
  letter: string;
  columns: number[];
}

// Columns sharing a key letter form one group; groups sorted by letter
export function myszkowskiGroups(keyword: string): ColumnGroup[] {
  const groups = new Map<string, number[]>();
  Array.from(keyword.toUpperCase()).forEach((letter, col) => {
    const columns = groups.get(letter) ?? [];
    columns.push(col);
    groups.set(letter, columns);
  });

  return [...groups.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([letter, columns]) => ({ letter, columns }));
}

// Inside a group every column is read top to bottom before moving to the next column
export function myszkowskiOrder(keyword: string, rows: number): CoordinateOrder {
  const order: CoordinateOrder = [];
  for (const { columns } of myszkowskiGroups(keyword)) {
    for (const col of columns) {
      for (let row = 0; row < rows; row++) order.push({ row, col });
    }
  }
  return order;
}

export function toFlatOrder(order: CoordinateOrder, cols: number): number[] {
  return order.map(({ row, col }) => row * cols + col);
}

export function invertPermutation(permutation: number[]): number[] {
  const inverse = new Array<number>(permutation.length).fill(-1);
  permutation.forEach((target, index) => {
    if (target < 0 || target >= permutation.length || inverse[target] !== -1) {
      throw new Error(`Order is not a permutation: position ${target} is out of range or repeated`);
    }
    inverse[target] = index;
  });
  return inverse;
}

// Encryption direction: output[i] = chars[order[i]]
export function applyOrder(chars: readonly string[], order: number[]): string {
  if (order.length !== chars.length) {
    throw new Error(`Order covers ${order.length} cells but the text has ${chars.length}`);
  }
  return order.map((source) => chars[source]).join('');
}

// Decryption direction: the inverse permutation of applyOrder
export function fillOrder(chars: readonly string[], order: number[]): string {
  return applyOrder(chars, invertPermutation(order));
}
