/**
 * Status Display
 *
 * Samples host metrics once per period and renders them as centered or
 * scrolling text lines on a small raster panel.
 */

export * from './types/index.js';
export * from './errors.js';
export * from './snapshot-store/index.js';
export * from './scroll-layout/index.js';
export * from './sampler/index.js';
export * from './render-loop/index.js';
export * from './metric-sources/index.js';
export * from './display/index.js';
export * from './hardware/index.js';
export * from './status-display.js';
