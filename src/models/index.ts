/**
 * Data models
 *
 * Barrel export for all model interfaces.
 */

// Source and extraction models
export * from './document.js';

// Metadata record
export * from './metadata.js';
