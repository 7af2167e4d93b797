/**
 * Shared functionality for format evaluation
 * Core data model and utilities used by every evaluator
 */

// Core type definitions
export * from './types/index.js';

// Utility functions
export * from './utils/index.js';
