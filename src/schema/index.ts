/**
 * Schema module — single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 */

export * from './topology.js';
export * from './facts.js';
export * from './config.js';
export * from './jsonOutput.js';
