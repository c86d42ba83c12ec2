export * from './levels.js';
export * from './types.js';
export * from './lib/normalization.js';
export * from './lib/parsing.js';
