export * from './lib/errors.js';
export * from './lib/alphabet.js';
export * from './lib/keystream.js';
export * from './lib/matrix.js';
export * from './lib/grid.js';
export * from './lib/substitution.js';
export * from './lib/hill.js';
export * from './lib/transposition.js';
export * from './lib/catalog.js';
export * from './lib/analysis.js';
export type * from './lib/types.js';
