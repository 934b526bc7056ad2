/**
 * Trellis Type Definitions
 */

export * from './record.js';
export * from './capture-type.js';
export * from './field-schema.js';
export * from './capture.js';
export * from './sprint.js';
export * from './workspace.js';
export * from './document.js';
export * from './template.js';
