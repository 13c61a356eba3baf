export * from './market-selector.js';
