/**
 * Data Models
 *
 * Barrel export for all model interfaces.
 */

// Analysis models
export * from './analysis.js';

// Run and ingestion record models
export * from './ingestion.js';

// Chunk models
export * from './chunk.js';
