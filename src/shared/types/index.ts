export * from './evaluation.js';
export * from './interfaces.js';
