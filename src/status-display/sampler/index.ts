export * from './sampler.js';
export * from './metric-lines.js';
