export * from './price-stream.js';
export * from './reconnect-policy.js';
