export * from './metric-sources.js';
