/**
 * @styx/types - Type definitions shared by the Styx compiler packages
 */

// IR parameter tree
export * from './ir.js';

// Generated source model
export * from './codegen.js';

// Logging
export * from './logging.js';
