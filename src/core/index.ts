/**
 * Core barrel.
 */
export * from './config/index.js';
export * from './parse/index.js';
export * from './lookup/index.js';
export * from './report/index.js';
export * from './pipeline.js';
