export * from './render-loop.js';
