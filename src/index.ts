/**
 * zk-rollup-client
 * Build, sign, submit and track transactions on an account-based zk-rollup
 */

// Wallet facade, configuration and errors
export * from './wallet/index.js';

// Rollup protocol: transactions, signing, operator, tracking
export * from './protocol/index.js';

// Primitives
export * from './core/index.js';
