export * from './rate-limiter.js';
export * from './http.js';
export * from './rest-client.js';
export * from './gamma-client.js';
