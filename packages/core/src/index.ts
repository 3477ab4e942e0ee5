export * from './domain/identifiers.js';
export * from './errors/index.js';
export * from './schemas/transaction-row.js';
export * from './types/transaction-record.js';
export * from './utils/decimal-utils.js';
export * from './value-objects/positive-amount.js';
