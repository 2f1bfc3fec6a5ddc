export * from './column.js';
export * from './table.js';
export * from './table-index.js';
export * from './snapshot.js';
export * from './operations.js';
