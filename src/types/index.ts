export * from './policy.js';
export * from './request.js';
export * from './response.js';
export * from './ledger.js';
