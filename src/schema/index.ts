/**
 * Schema module — single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './replay.js';
export * from './agentStep.js';
export * from './prescan.js';
export * from './config.js';
export * from './jsonOutput.js';
