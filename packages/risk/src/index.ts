export * from './daily-risk-ledger.js';
export * from './kill-switch.js';
