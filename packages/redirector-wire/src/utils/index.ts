/**
 * Shared utilities
 */

export * from './hex.js';
