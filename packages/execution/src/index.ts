export * from './order-lifecycle-manager.js';
export * from './paper-exchange.js';
