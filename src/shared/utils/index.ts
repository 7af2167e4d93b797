export * from './random.js';
export * from './time.js';
