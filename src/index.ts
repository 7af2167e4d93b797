// Export evaluator functionality
export * from './client/index.js';

// Export shared data model and utilities
export * from './shared/index.js';
