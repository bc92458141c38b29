// Main export file - re-exports all public APIs

// Core exports
export * from './core/index.js';

// Configuration and secret resolution exports
export * from './config/index.js';

// Utility exports
export * from './utils/errors.js';
export { runWithTimeout, type RunWithTimeoutOptions } from './utils/timeout.js';
