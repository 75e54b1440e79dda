export * from './schema.js';
export * from './validator.js';
export * from './loader.js';
