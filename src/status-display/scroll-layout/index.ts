export * from './scroll-layout.js';
