/**
 * redirector-wire - wire schema of the game redirector service
 *
 * Encodes and decodes the instance details a redirector hands to clients,
 * on top of the TDF tag-value binary format.
 */

// Error types
export * from './types/index.js';

// TDF codec
export * from './tdf/index.js';

// Redirector models
export * from './models/index.js';

// Hex helpers
export * from './utils/index.js';
