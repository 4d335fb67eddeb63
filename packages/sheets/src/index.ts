// Document contract and backends
export * from './document.js';
export * from './memory-document.js';
export * from './google/sheets-document.js';
export * from './google/drive.js';

// A1 helpers
export * from './a1.js';

// Workbook layout, rows, formulas, validation
export * from './layout.js';
export * from './rows.js';
export * from './formulas.js';
export * from './validation.js';
export * from './recon.js';

// Reconciliation engine
export * from './sync.js';
export * from './reconcile.js';
