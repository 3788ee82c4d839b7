/**
 * docforge - markdown to PDF and Word export
 *
 * Main entry point for the library.
 * Exports all public APIs and utilities.
 */

// Parser
export * from './parser/index.js';

// Diagrams
export * from './diagrams/index.js';

// Templates
export * from './templates/index.js';

// Format renderers
export * from './renderers/index.js';

// Progress tracking
export * from './progress/index.js';

// Export orchestration
export * from './export/index.js';

// Config
export * from './config/index.js';

// Errors + logging
export * from './errors/index.js';
export * from './logging/index.js';

// Concurrency
export * from './performance/index.js';

// CLI
export * from './cli/index.js';

/**
 * Library version
 */
export const VERSION = '0.1.0';
