/**
 * Handler exports for the API layer.
 */

export * from './ExperimentHandlers.js';
