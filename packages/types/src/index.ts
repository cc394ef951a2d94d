/**
 * @msgstream/types - Type definitions for severity-tagged diagnostic channels
 */

export * from './severity.js';

// Sinks, targets, io context, process context, termination
export * from './channels.js';

// Configuration records
export * from './config.js';
