// Transaction model + checkpoint record schemas
export * from './schemas/transaction.js';

// Closed category vocabulary and resolver
export * from './categories/vocabulary.js';

// Logger contract
export * from './logging/logger.js';

// Pure utils (date, money, constants)
export * from './utils/index.js';
