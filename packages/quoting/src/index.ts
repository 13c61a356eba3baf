export * from './fair-value.js';
export * from './quote-gate.js';
export * from './requote-policy.js';
export * from './quote.js';
