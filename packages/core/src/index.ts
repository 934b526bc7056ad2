/**
 * @trellis/core
 *
 * Core types, errors, ID generation, and utilities for Trellis.
 * This package provides the foundational building blocks used by
 * the storage and records packages.
 */

// Types - record kinds, Field Schema, validators, factories
export * from './types/index.js';

// Errors - structured error handling
export * from './errors/index.js';

// ID Generation - kind-prefixed, collision-resistant ids
export * from './id/index.js';

// Utils - shared utility functions
export * from './utils/index.js';
