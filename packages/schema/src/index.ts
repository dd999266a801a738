export * from './variants.js';
export * from './validate.js';
