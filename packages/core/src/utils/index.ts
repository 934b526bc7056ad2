/**
 * Utility Functions
 *
 * Shared utilities used across the Trellis codebase.
 */

export { createClock, MonotonicClock, type Clock, type TimeSource } from './clock.js';
