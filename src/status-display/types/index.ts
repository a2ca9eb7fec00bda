/**
 * Status Display - Type Definitions
 */

export * from './snapshot.js';
export * from './collaborators.js';
export * from './display-configuration.js';
