export * from './output.js';
export * from './errors.js';
export * from './config.js';
export * from './table.js';
