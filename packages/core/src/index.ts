export * from './types.js';
export * from './math.js';
export * from './errors.js';
export * from './instrument.js';
